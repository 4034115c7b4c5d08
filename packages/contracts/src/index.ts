// Pushscribe Contracts
// Shared type-level contracts for the Agent and its local clients
//
// RULES:
// - No logic
// - No helpers
// - No data access
// - Only DTOs, event schemas, request/response shapes
// - If something needs logic, it lives in the agent, not here

export * from './events/index.js';
export * from './ipc/index.js';

// IPC Contracts
// Request/response shapes for the Agent's local control server
//
// RULES:
// - No logic
// - No helpers
// - No data access
// - Only interfaces, types, and enums

import type { SessionState } from '../events/index.js';

// ============================================
// CONTROL ROUTES
// ============================================

export type ControlRoute =
    | '/health'
    | '/recording/status'
    | '/recording/start'
    | '/recording/stop'
    | '/recording/toggle'
    | '/events';

export type BackendMode = 'local' | 'remote';

// ============================================
// STATUS
// ============================================

export interface RecordingStatusResponse {
    readonly ok: true;
    readonly state: SessionState;
    readonly sessionId?: string;
    readonly recordingStartedAt?: number;
    readonly contextSize: number;
    readonly backend: BackendMode;
}

export interface HealthResponse {
    readonly status: 'ok';
    readonly service: string;
    readonly version: string;
    readonly platform: string;
    readonly backend: BackendMode;
    readonly hotkeyListener: boolean;
    readonly timestamp: string;
}

// ============================================
// RECORDING CONTROL
// ============================================

export type RecordingAction = 'started' | 'stopped' | 'ignored';

export interface RecordingControlResponse {
    readonly ok: true;
    readonly action: RecordingAction;
    readonly state: SessionState;
    readonly sessionId?: string;
}

export interface ControlErrorResponse {
    readonly ok: false;
    readonly error: string;
    readonly code: string;
}

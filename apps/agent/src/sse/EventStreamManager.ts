// SSE Connection Manager for Session Events
// Fans domain events out to every connected /events client

import type { DomainEvent } from '@pushscribe/contracts';
import { describeError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('sse');

/**
 * The part of an http.ServerResponse the manager writes to
 */
export interface SSEWritable {
    write(chunk: string): boolean;
    end(): void;
    on(event: 'close', listener: () => void): unknown;
    on(event: 'error', listener: (error: Error) => void): unknown;
}

export interface ConnectionEstablishedEvent {
    type: 'connection-established';
    timestamp: number;
}

export type StreamEvent = DomainEvent | ConnectionEstablishedEvent;

interface SSEClient {
    id: number;
    response: SSEWritable;
    connectedAt: number;
}

/**
 * Format event as SSE: data: {json}\n\n
 */
export function formatSSEEvent(event: StreamEvent): string {
    return `data: ${JSON.stringify(event)}\n\n`;
}

export class EventStreamManager {
    private clients = new Set<SSEClient>();
    private nextId = 1;

    /**
     * Register a new SSE client
     * @returns unsubscribe function to remove client on disconnect
     */
    registerClient(response: SSEWritable): () => void {
        const client: SSEClient = {
            id: this.nextId++,
            response,
            connectedAt: Date.now(),
        };
        this.clients.add(client);
        log.info(`Client ${client.id} connected. Total clients: ${this.clients.size}`);

        response.on('close', () => {
            this.removeClient(client);
        });

        response.on('error', (error) => {
            log.error(`Client ${client.id} error: ${error.message}`);
            this.removeClient(client);
        });

        this.sendToClient(client, { type: 'connection-established', timestamp: client.connectedAt });

        return () => this.removeClient(client);
    }

    /**
     * Broadcast a domain event to all connected clients
     */
    broadcast(event: DomainEvent): void {
        if (this.clients.size === 0) return;

        const data = formatSSEEvent(event);
        for (const client of [...this.clients]) {
            this.write(client, data);
        }
        log.debug(`Broadcast ${event.type} to ${this.clients.size} clients`);
    }

    getClientCount(): number {
        return this.clients.size;
    }

    /**
     * End every open stream (shutdown)
     */
    closeAll(): void {
        if (this.clients.size === 0) return;
        log.info(`Closing ${this.clients.size} connections`);

        const clients = [...this.clients];
        this.clients.clear();
        for (const client of clients) {
            try {
                client.response.end();
            } catch (error) {
                log.debug(`Client ${client.id} already closed: ${describeError(error)}`);
            }
        }
    }

    private sendToClient(client: SSEClient, event: StreamEvent): void {
        this.write(client, formatSSEEvent(event));
    }

    private write(client: SSEClient, data: string): void {
        try {
            client.response.write(data);
        } catch (error) {
            log.error(`Error writing to client ${client.id}: ${describeError(error)}`);
            this.removeClient(client);
        }
    }

    private removeClient(client: SSEClient): void {
        if (!this.clients.delete(client)) return;
        log.info(`Client ${client.id} disconnected. Remaining clients: ${this.clients.size}`);
    }
}

import { describe, it, expect, vi } from 'vitest';
import { EventEmitter } from 'node:events';
import type { DomainEvent } from '@pushscribe/contracts';
import { EventStreamManager, formatSSEEvent } from '../EventStreamManager.js';

class FakeResponse extends EventEmitter {
    readonly chunks: string[] = [];
    ended = false;
    failWrites = false;

    write(chunk: string): boolean {
        if (this.failWrites) {
            throw new Error('socket closed');
        }
        this.chunks.push(chunk);
        return true;
    }

    end(): void {
        this.ended = true;
    }
}

const idle: DomainEvent = {
    type: 'session.state.changed',
    payload: { state: 'idle', previous: 'transcribing', timestamp: 2000 },
};

describe('formatSSEEvent', () => {
    it('frames one JSON object per event', () => {
        expect(formatSSEEvent(idle)).toBe(
            'data: {"type":"session.state.changed","payload":{"state":"idle","previous":"transcribing","timestamp":2000}}\n\n'
        );
    });
});

describe('EventStreamManager', () => {
    it('greets new clients', () => {
        vi.spyOn(Date, 'now').mockReturnValue(1700000000000);
        const manager = new EventStreamManager();
        const response = new FakeResponse();

        manager.registerClient(response);

        expect(response.chunks).toEqual(['data: {"type":"connection-established","timestamp":1700000000000}\n\n']);
        expect(manager.getClientCount()).toBe(1);
    });

    it('broadcasts to every client', () => {
        const manager = new EventStreamManager();
        const first = new FakeResponse();
        const second = new FakeResponse();
        manager.registerClient(first);
        manager.registerClient(second);

        manager.broadcast(idle);

        expect(first.chunks[1]).toBe(formatSSEEvent(idle));
        expect(second.chunks[1]).toBe(formatSSEEvent(idle));
    });

    it('forgets clients that disconnect or unsubscribe', () => {
        const manager = new EventStreamManager();
        const closed = new FakeResponse();
        const leaving = new FakeResponse();
        manager.registerClient(closed);
        const unsubscribe = manager.registerClient(leaving);

        closed.emit('close');
        unsubscribe();
        manager.broadcast(idle);

        expect(manager.getClientCount()).toBe(0);
        expect(closed.chunks).toHaveLength(1);
        expect(leaving.chunks).toHaveLength(1);
    });

    it('drops a client whose write fails', () => {
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const manager = new EventStreamManager();
        const broken = new FakeResponse();
        const healthy = new FakeResponse();
        manager.registerClient(broken);
        manager.registerClient(healthy);
        broken.failWrites = true;

        manager.broadcast(idle);

        expect(manager.getClientCount()).toBe(1);
        expect(healthy.chunks).toHaveLength(2);
    });

    it('ends every stream on closeAll', () => {
        const manager = new EventStreamManager();
        const response = new FakeResponse();
        manager.registerClient(response);

        manager.closeAll();

        expect(response.ended).toBe(true);
        expect(manager.getClientCount()).toBe(0);
    });
});

// Chunk Channel
// Bounded single-consumer queue between the capture driver (producer) and the session buffer (consumer)

export type PushResult = 'queued' | 'overflow' | 'closed';

export class ChunkChannel<T> implements AsyncIterable<T> {
    private readonly queue: T[] = [];
    private waiter: ((result: IteratorResult<T>) => void) | null = null;
    private closed = false;
    private dropped = 0;

    constructor(private readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`ChunkChannel capacity must be a positive integer, got ${capacity}`);
        }
    }

    /**
     * Hand an item to the consumer. A full queue drops the item and reports overflow.
     */
    push(item: T): PushResult {
        if (this.closed) {
            return 'closed';
        }

        if (this.waiter) {
            const resolve = this.waiter;
            this.waiter = null;
            resolve({ value: item, done: false });
            return 'queued';
        }

        if (this.queue.length >= this.capacity) {
            this.dropped++;
            return 'overflow';
        }

        this.queue.push(item);
        return 'queued';
    }

    /**
     * No further pushes; the consumer still receives everything already queued.
     */
    close(): void {
        if (this.closed) return;
        this.closed = true;

        if (this.waiter) {
            const resolve = this.waiter;
            this.waiter = null;
            resolve({ value: undefined, done: true });
        }
    }

    get droppedCount(): number {
        return this.dropped;
    }

    get pending(): number {
        return this.queue.length;
    }

    private next(): Promise<IteratorResult<T>> {
        const item = this.queue.shift();
        if (item !== undefined) {
            return Promise.resolve({ value: item, done: false });
        }
        if (this.closed) {
            return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => {
            this.waiter = resolve;
        });
    }

    [Symbol.asyncIterator](): AsyncIterator<T> {
        return {
            next: () => this.next(),
        };
    }
}

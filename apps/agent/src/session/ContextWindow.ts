// Context Window
// Bounded FIFO of recent transcripts used to prime the next transcription

export const DEFAULT_MAX_CONTEXT_ITEMS = 3;

export class ContextWindow {
    private readonly items: string[] = [];

    constructor(readonly maxItems: number = DEFAULT_MAX_CONTEXT_ITEMS) {
        if (!Number.isInteger(maxItems) || maxItems < 1) {
            throw new RangeError(`maxItems must be a positive integer, got ${maxItems}`);
        }
    }

    /**
     * Append a transcript, evicting the oldest entries beyond capacity
     */
    push(text: string): void {
        this.items.push(text);
        while (this.items.length > this.maxItems) {
            this.items.shift();
        }
    }

    /**
     * Space-joined entries in insertion order, or undefined when empty
     */
    prompt(): string | undefined {
        return this.items.length > 0 ? this.items.join(' ') : undefined;
    }

    entries(): readonly string[] {
        return [...this.items];
    }

    get size(): number {
        return this.items.length;
    }

    clear(): void {
        this.items.length = 0;
    }
}

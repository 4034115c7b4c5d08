// Audio Buffer
// Append-only sequence of mono float32 chunks captured during one recording session

export class AudioBuffer {
    private readonly chunks: Float32Array[] = [];
    private totalSamples = 0;
    private sealed = false;

    constructor(readonly sampleRate: number) {}

    /**
     * Append a chunk in arrival order. Returns false once the buffer is sealed.
     */
    append(chunk: Float32Array): boolean {
        if (this.sealed) {
            return false;
        }
        if (chunk.length === 0) {
            return true;
        }
        this.chunks.push(chunk);
        this.totalSamples += chunk.length;
        return true;
    }

    /**
     * Mark capture as complete; no further appends are accepted.
     */
    seal(): void {
        this.sealed = true;
    }

    get isSealed(): boolean {
        return this.sealed;
    }

    get chunkCount(): number {
        return this.chunks.length;
    }

    get sampleCount(): number {
        return this.totalSamples;
    }

    get durationMs(): number {
        return Math.round((this.totalSamples / this.sampleRate) * 1000);
    }

    isEmpty(): boolean {
        return this.chunks.length === 0;
    }

    /**
     * Concatenate all chunks. Only legal after seal(): a backend must never
     * read samples that capture could still be writing.
     */
    toFloat32(): Float32Array {
        if (!this.sealed) {
            throw new Error('AudioBuffer read before capture completed');
        }
        const out = new Float32Array(this.totalSamples);
        let offset = 0;
        for (const chunk of this.chunks) {
            out.set(chunk, offset);
            offset += chunk.length;
        }
        return out;
    }
}

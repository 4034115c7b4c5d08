// Audio Capture Module
// Owns the microphone input stream for one recording session and fills its AudioBuffer

import type { AudioBuffer } from './AudioBuffer.js';
import { ChunkChannel } from './ChunkChannel.js';
import { CaptureError, describeError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('capture');

/**
 * Callbacks a driver invokes while its stream is open
 */
export interface AudioInputHandlers {
    onChunk(chunk: Float32Array): void;
    /** Device-level warnings such as overruns; never fatal */
    onWarning(message: string): void;
    /** Stream failure after open; capture keeps what it already has */
    onError(error: Error): void;
}

export interface AudioInputStream {
    /**
     * Stop the device. Resolves only once no further onChunk calls can happen.
     */
    close(): Promise<void>;
}

export interface AudioInputDriver {
    readonly name: string;
    open(options: { sampleRate: number; channels: 1 }, handlers: AudioInputHandlers): Promise<AudioInputStream>;
}

export interface AudioCaptureConfig {
    sampleRate: number;
    /** Max chunks waiting for the consumer before new ones are dropped */
    queueCapacity?: number;
    label?: string;
}

const DEFAULT_QUEUE_CAPACITY = 1024;

export class AudioCapture {
    private readonly driver: AudioInputDriver;
    private readonly config: Required<AudioCaptureConfig>;
    private stream: AudioInputStream | null = null;
    private channel: ChunkChannel<Float32Array> | null = null;
    private consumer: Promise<void> | null = null;
    private buffer: AudioBuffer | null = null;
    private isCapturing = false;

    constructor(driver: AudioInputDriver, config: AudioCaptureConfig) {
        this.driver = driver;
        this.config = {
            queueCapacity: DEFAULT_QUEUE_CAPACITY,
            label: 'session',
            ...config,
        };
    }

    /**
     * Open the input stream and start appending chunks to `buffer` in arrival order.
     * Throws CaptureError when the device cannot be opened.
     */
    async begin(buffer: AudioBuffer): Promise<void> {
        if (this.isCapturing) {
            throw new CaptureError('Capture already running');
        }

        const tag = `[${this.config.label}]`;
        const channel = new ChunkChannel<Float32Array>(this.config.queueCapacity);
        let overflowWarned = false;

        const handlers: AudioInputHandlers = {
            onChunk: (chunk) => {
                const result = channel.push(chunk);
                if (result === 'overflow' && !overflowWarned) {
                    overflowWarned = true;
                    log.warn(`${tag} Chunk queue full, dropping audio (capacity ${this.config.queueCapacity})`);
                }
            },
            onWarning: (message) => {
                log.warn(`${tag} ${message}`);
            },
            onError: (error) => {
                log.error(`${tag} Input stream error: ${error.message}`);
            },
        };

        let stream: AudioInputStream;
        try {
            stream = await this.driver.open({ sampleRate: this.config.sampleRate, channels: 1 }, handlers);
        } catch (error) {
            channel.close();
            if (error instanceof CaptureError) {
                throw error;
            }
            throw new CaptureError(`Failed to open ${this.driver.name} input: ${describeError(error)}`, error);
        }

        this.stream = stream;
        this.channel = channel;
        this.buffer = buffer;
        this.isCapturing = true;
        this.consumer = this.consume(channel, buffer);

        log.debug(`${tag} Capture started via ${this.driver.name} at ${this.config.sampleRate} Hz`);
    }

    /**
     * Stop the stream and wait until every delivered chunk is in the buffer.
     * After this resolves the buffer is sealed and never written again.
     */
    async end(): Promise<void> {
        if (!this.isCapturing) {
            this.buffer?.seal();
            return;
        }
        this.isCapturing = false;

        const tag = `[${this.config.label}]`;
        const { stream, channel, consumer, buffer } = this;
        this.stream = null;

        try {
            await stream?.close();
        } catch (error) {
            log.error(`${tag} Failed to close input stream cleanly: ${describeError(error)}`);
        }

        channel?.close();
        await consumer;
        buffer?.seal();

        if (channel && channel.droppedCount > 0) {
            log.warn(`${tag} ${channel.droppedCount} chunk(s) dropped during capture`);
        }
        if (buffer) {
            log.debug(`${tag} Capture stopped: ${buffer.chunkCount} chunks, ${buffer.durationMs}ms`);
        }
    }

    getStatus(): boolean {
        return this.isCapturing;
    }

    private async consume(channel: ChunkChannel<Float32Array>, buffer: AudioBuffer): Promise<void> {
        for await (const chunk of channel) {
            buffer.append(chunk);
        }
    }
}

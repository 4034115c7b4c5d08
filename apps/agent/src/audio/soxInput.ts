// Sox Input Driver
// Spawns sox against the default input device and reads raw float32 PCM frames from its stdout

import { spawn, type ChildProcess } from 'node:child_process';
import type { AudioInputDriver, AudioInputHandlers, AudioInputStream } from './AudioCapture.js';
import { CaptureError } from '../utils/errors.js';

const BYTES_PER_SAMPLE = 4;
const STARTUP_GRACE_MS = 150;
const STOP_TIMEOUT_MS = 2000;

/**
 * Reassembles little-endian float32 samples from arbitrarily split stdout reads
 */
export class Float32FrameReader {
    private remainder: Buffer = Buffer.alloc(0);

    read(data: Buffer): Float32Array {
        const bytes = this.remainder.length > 0 ? Buffer.concat([this.remainder, data]) : data;
        const sampleCount = Math.floor(bytes.length / BYTES_PER_SAMPLE);
        const usable = sampleCount * BYTES_PER_SAMPLE;

        const samples = new Float32Array(sampleCount);
        for (let i = 0; i < sampleCount; i++) {
            samples[i] = bytes.readFloatLE(i * BYTES_PER_SAMPLE);
        }

        this.remainder = Buffer.from(bytes.subarray(usable));
        return samples;
    }

    get pendingBytes(): number {
        return this.remainder.length;
    }
}

export function buildSoxArgs(sampleRate: number): string[] {
    return [
        '-q',
        '-d',
        '-t', 'raw',
        '-r', String(sampleRate),
        '-c', '1',
        '-e', 'floating-point',
        '-b', '32',
        '-L',
        '-',
    ];
}

export class SoxInputDriver implements AudioInputDriver {
    readonly name = 'sox';

    constructor(private readonly command: string = 'sox') {}

    async open(options: { sampleRate: number; channels: 1 }, handlers: AudioInputHandlers): Promise<AudioInputStream> {
        const child = spawn(this.command, buildSoxArgs(options.sampleRate), {
            stdio: ['ignore', 'pipe', 'pipe'],
            windowsHide: true,
        });

        const reader = new Float32FrameReader();
        let started = false;
        let closing = false;
        let closed = false;

        child.stdout.on('data', (data: Buffer) => {
            if (closed) return;
            const samples = reader.read(data);
            if (samples.length > 0) {
                handlers.onChunk(samples);
            }
        });

        child.stderr.on('data', (data: Buffer) => {
            for (const line of data.toString().split('\n')) {
                const message = line.trim();
                if (message) handlers.onWarning(`${this.command}: ${message}`);
            }
        });

        const closedPromise = new Promise<void>((resolve) => {
            child.once('close', (code, signal) => {
                closed = true;
                if (started && !closing) {
                    handlers.onError(new Error(`${this.command} exited unexpectedly (code=${code}, signal=${signal})`));
                }
                resolve();
            });
        });

        child.on('error', (error) => {
            if (started) handlers.onError(error);
        });

        await this.waitForStartup(child);
        started = true;

        return {
            close: async (): Promise<void> => {
                if (closed) return;
                closing = true;
                child.kill('SIGINT');

                const timeout = setTimeout(() => {
                    child.kill('SIGKILL');
                }, STOP_TIMEOUT_MS);

                // 'close' fires after stdout has been fully drained
                await closedPromise;
                clearTimeout(timeout);
            },
        };
    }

    /**
     * Resolve once the process is running and has survived a short grace period;
     * sox exits immediately when no input device is available.
     */
    private waitForStartup(child: ChildProcess): Promise<void> {
        return new Promise((resolve, reject) => {
            let timer: NodeJS.Timeout | null = null;

            const onError = (error: Error): void => {
                cleanup();
                reject(new CaptureError(`Failed to start ${this.command}: ${error.message}`, error));
            };
            const onExit = (code: number | null): void => {
                cleanup();
                reject(new CaptureError(`${this.command} exited during startup (code=${code}); is a microphone available?`));
            };
            const cleanup = (): void => {
                if (timer) clearTimeout(timer);
                child.off('error', onError);
                child.off('exit', onExit);
            };

            child.once('error', onError);
            child.once('exit', onExit);
            child.once('spawn', () => {
                timer = setTimeout(() => {
                    cleanup();
                    resolve();
                }, STARTUP_GRACE_MS);
            });
        });
    }
}

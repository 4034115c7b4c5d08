// Key Event Sidecar
// Runs the configured global-keyboard listener and feeds its events to the router
//
// Wire format on the listener's stdout: one JSON object per line,
//   {"type":"press","key":"alt_r"}
//   {"type":"release","key":"alt_r"}

import { spawn, type ChildProcess } from 'node:child_process';
import { createInterface } from 'node:readline';
import { z } from 'zod';
import { AppError, describeError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { KeyEvent } from './HotkeyRouter.js';

const log = createLogger('key-sidecar');

const keyEventSchema = z.object({
    type: z.enum(['press', 'release']),
    key: z.string().min(1),
});

/**
 * Parse one listener line. Malformed lines are logged and yield null.
 */
export function parseKeyEventLine(line: string): KeyEvent | null {
    const trimmed = line.trim();
    if (!trimmed) return null;

    let raw: unknown;
    try {
        raw = JSON.parse(trimmed);
    } catch (error) {
        log.warn(`Skipping malformed line (${describeError(error)}): ${trimmed}`);
        return null;
    }

    const parsed = keyEventSchema.safeParse(raw);
    if (!parsed.success) {
        log.warn(`Skipping unrecognised event: ${trimmed}`);
        return null;
    }
    return parsed.data;
}

/**
 * Split a command line into program and arguments. Double quotes group words.
 */
export function splitCommand(command: string): string[] {
    const parts: string[] = [];
    for (const match of command.matchAll(/"([^"]*)"|(\S+)/g)) {
        parts.push(match[1] ?? match[2] ?? '');
    }
    return parts;
}

export class KeyEventSidecar {
    private child: ChildProcess | null = null;
    private stopping = false;

    constructor(
        private readonly command: string,
        private readonly onEvent: (event: KeyEvent) => void
    ) {}

    get isRunning(): boolean {
        return this.child !== null;
    }

    /**
     * Spawn the listener. Resolves once the process is running.
     */
    async start(): Promise<void> {
        const [program, ...args] = splitCommand(this.command);
        if (!program) {
            throw new AppError('Hotkey listener command is empty', 'HOTKEY_LISTENER_ERROR');
        }

        const child = spawn(program, args, {
            stdio: ['ignore', 'pipe', 'pipe'],
            windowsHide: true,
        });

        await new Promise<void>((resolve, reject) => {
            child.once('spawn', () => resolve());
            child.once('error', (error) => {
                reject(new AppError(`Failed to start hotkey listener '${program}': ${error.message}`, 'HOTKEY_LISTENER_ERROR', true, undefined, { cause: error }));
            });
        });

        this.child = child;
        this.stopping = false;
        log.info(`Listening for key events from ${program} (pid ${child.pid ?? 'unknown'})`);

        child.stderr?.on('data', (data: Buffer) => {
            const msg = data.toString().trim();
            if (msg) log.warn(`${program}: ${msg}`);
        });

        child.on('error', (error) => {
            log.error(`Process error: ${error.message}`);
        });

        child.on('exit', (code, signal) => {
            this.child = null;
            if (!this.stopping) {
                log.warn(`Listener exited unexpectedly (code ${code ?? 'none'}, signal ${signal ?? 'none'}); hotkeys disabled`);
            }
        });

        if (child.stdout) {
            this.consume(child.stdout).catch((error: unknown) => {
                log.error(`Reading listener output failed: ${describeError(error)}`);
            });
        }
    }

    /**
     * Dispatch every well-formed line of `input`. Resolves when the stream ends.
     */
    async consume(input: NodeJS.ReadableStream): Promise<void> {
        const lines = createInterface({ input, crlfDelay: Infinity });
        for await (const line of lines) {
            const event = parseKeyEventLine(line);
            if (event) {
                this.onEvent(event);
            }
        }
    }

    async stop(): Promise<void> {
        const child = this.child;
        if (!child) return;

        this.stopping = true;
        await new Promise<void>((resolve) => {
            const timeout = setTimeout(() => {
                child.kill('SIGKILL');
                resolve();
            }, 2000);

            child.once('exit', () => {
                clearTimeout(timeout);
                resolve();
            });

            child.kill('SIGTERM');
        });
        this.child = null;
    }
}

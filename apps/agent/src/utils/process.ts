// Process Utilities
// Spawn short-lived helper commands (whisper-cli, pbcopy, osascript...) and collect their output

import { spawn } from 'node:child_process';

export interface CommandResult {
    code: number | null;
    stdout: string;
    stderr: string;
}

export interface RunCommandOptions {
    /** Written to stdin, which is then closed */
    input?: string;
    timeoutMs?: number;
    env?: NodeJS.ProcessEnv;
    /**
     * Discard stdout/stderr and settle on exit. For helpers such as xclip that
     * leave a background child holding the inherited pipes open.
     */
    detachOutput?: boolean;
}

export type CommandRunner = (command: string, args: readonly string[], options?: RunCommandOptions) => Promise<CommandResult>;

export class CommandTimeoutError extends Error {
    constructor(command: string, timeoutMs: number) {
        super(`${command} timed out after ${timeoutMs}ms`);
        this.name = 'CommandTimeoutError';
    }
}

/**
 * Run a command to completion. Rejects only when the process cannot be
 * spawned or exceeds its timeout; a non-zero exit code is returned to the caller.
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
    const detached = options.detachOutput === true;
    return new Promise((resolve, reject) => {
        const child = spawn(command, [...args], {
            stdio: detached ? ['pipe', 'ignore', 'ignore'] : ['pipe', 'pipe', 'pipe'],
            env: options.env ?? process.env,
            windowsHide: true,
        });

        let stdout = '';
        let stderr = '';
        let settled = false;
        let timer: NodeJS.Timeout | null = null;

        const finish = (fn: () => void): void => {
            if (settled) return;
            settled = true;
            if (timer) clearTimeout(timer);
            fn();
        };

        if (options.timeoutMs !== undefined) {
            const timeoutMs = options.timeoutMs;
            timer = setTimeout(() => {
                child.kill('SIGKILL');
                finish(() => reject(new CommandTimeoutError(command, timeoutMs)));
            }, timeoutMs);
        }

        child.stdout?.on('data', (data: Buffer) => {
            stdout += data.toString();
        });

        child.stderr?.on('data', (data: Buffer) => {
            stderr += data.toString();
        });

        child.on('error', (error) => {
            finish(() => reject(error));
        });

        const settle = (code: number | null): void => {
            finish(() => resolve({ code, stdout, stderr }));
        };
        // 'close' waits for every pipe; a detached helper's pipes may outlive it
        if (detached) {
            child.on('exit', settle);
        } else {
            child.on('close', settle);
        }

        // A helper that exits without reading stdin raises EPIPE here
        child.stdin?.on('error', (error) => {
            stderr += `stdin: ${error.message}\n`;
        });
        if (options.input !== undefined) {
            child.stdin?.end(options.input);
        } else {
            child.stdin?.end();
        }
    });
};

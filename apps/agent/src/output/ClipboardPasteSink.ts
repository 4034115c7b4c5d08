// Clipboard Paste Sink
// Copies the transcript to the system clipboard, then simulates the paste shortcut
// in whichever window has focus

import { setTimeout as sleep } from 'node:timers/promises';
import { OutputError, describeError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { runCommand, type CommandResult, type CommandRunner, type RunCommandOptions } from '../utils/process.js';
import type { OutputSink } from './OutputSink.js';

const log = createLogger('output');

interface HelperCommand {
    command: string;
    args: string[];
}

interface PlatformCommands {
    copy: HelperCommand;
    paste: HelperCommand;
}

/**
 * Clipboard and keystroke helpers per platform. Linux picks the Wayland tools
 * when a Wayland session is detected, X11 tools otherwise.
 */
export function resolvePlatformCommands(platform: NodeJS.Platform, env: NodeJS.ProcessEnv): PlatformCommands | null {
    switch (platform) {
        case 'darwin':
            return {
                copy: { command: 'pbcopy', args: [] },
                paste: {
                    command: 'osascript',
                    args: ['-e', 'tell application "System Events" to keystroke "v" using command down'],
                },
            };
        case 'linux':
            if (env.WAYLAND_DISPLAY) {
                return {
                    copy: { command: 'wl-copy', args: [] },
                    paste: { command: 'wtype', args: ['-M', 'ctrl', 'v', '-m', 'ctrl'] },
                };
            }
            return {
                copy: { command: 'xclip', args: ['-selection', 'clipboard'] },
                paste: { command: 'xdotool', args: ['key', '--clearmodifiers', 'ctrl+v'] },
            };
        case 'win32':
            return {
                copy: { command: 'clip', args: [] },
                paste: {
                    command: 'powershell',
                    args: ['-NoProfile', '-Command', "(New-Object -ComObject WScript.Shell).SendKeys('^v')"],
                },
            };
        default:
            return null;
    }
}

export interface ClipboardPasteSinkOptions {
    pasteDelayMs: number;
    autoPaste: boolean;
    platform?: NodeJS.Platform;
    env?: NodeJS.ProcessEnv;
    runCommand?: CommandRunner;
    sleep?: (ms: number) => Promise<unknown>;
}

export class ClipboardPasteSink implements OutputSink {
    private readonly commands: PlatformCommands | null;
    private readonly platform: NodeJS.Platform;
    private readonly run: CommandRunner;
    private readonly wait: (ms: number) => Promise<unknown>;

    constructor(private readonly options: ClipboardPasteSinkOptions) {
        this.platform = options.platform ?? process.platform;
        this.commands = resolvePlatformCommands(this.platform, options.env ?? process.env);
        this.run = options.runCommand ?? runCommand;
        this.wait = options.sleep ?? sleep;
    }

    async emit(text: string): Promise<void> {
        if (!this.commands) {
            throw new OutputError('clipboard', `Clipboard is not supported on ${this.platform}`);
        }

        // Clipboard owners (xclip, wl-copy) stay alive in the background after handing off
        await this.invoke('clipboard', this.commands.copy, { input: text, detachOutput: true });
        log.debug(`Copied ${text.length} characters to clipboard`);

        if (!this.options.autoPaste) {
            return;
        }

        // Let the clipboard owner settle before the target app reads it
        await this.wait(this.options.pasteDelayMs);
        await this.invoke('paste', this.commands.paste);
    }

    private async invoke(step: 'clipboard' | 'paste', helper: HelperCommand, options: RunCommandOptions = {}): Promise<void> {
        let result: CommandResult;
        try {
            result = await this.run(helper.command, helper.args, { ...options, timeoutMs: 5000 });
        } catch (error) {
            throw new OutputError(step, `${helper.command} failed: ${describeError(error)}`, error);
        }

        if (result.code !== 0) {
            const detail = result.stderr.trim();
            throw new OutputError(
                step,
                `${helper.command} exited with code ${result.code}${detail ? `: ${detail}` : ''}`
            );
        }
    }
}

// Local Whisper Backend
// On-device transcription through the whisper.cpp CLI with a fixed decoding policy

import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import type { DecodingParameters, LocalBackendConfig } from '../config/env.js';
import { encodeWav } from '../audio/wav.js';
import { BackendError, ConfigError, describeError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { CommandTimeoutError, runCommand, type CommandResult, type CommandRunner } from '../utils/process.js';
import { getModelPath, listInstalledModelIds, resolveModelPath } from './models.js';
import type { TranscriptionBackend, TranscriptionRequest } from './TranscriptionTypes.js';

const log = createLogger('whisper');

const whisperOutputSchema = z.object({
    transcription: z.array(
        z.object({
            text: z.string(),
        })
    ),
});

/** Bracketed or parenthesised tokens whisper emits for non-speech, e.g. [BLANK_AUDIO] */
const NON_SPEECH_MARKER = /^[[(][^\])]*[\])]$/;

export interface WhisperArgsOptions {
    modelPath: string;
    audioPath: string;
    outputBase: string;
    language: string;
    threads: number;
    decoding: DecodingParameters;
    vadModelPath: string;
    prompt?: string;
}

export function buildWhisperArgs(options: WhisperArgsOptions): string[] {
    const { decoding } = options;
    const args = [
        '-m', options.modelPath,
        '-f', options.audioPath,
        '-l', options.language,
        '-t', String(options.threads),
        '-bs', String(decoding.beamSize),
        '-tp', String(decoding.temperature),
        '-nf',
        '-nth', String(decoding.noSpeechThreshold),
        '-et', String(decoding.compressionRatioThreshold),
        '-lpt', String(decoding.logProbThreshold),
        // Each utterance decoded on its own; only the explicit prompt carries context
        '-mc', '0',
        '--vad',
        '-vm', options.vadModelPath,
        '-vt', String(decoding.vad.threshold),
        '-vspd', String(decoding.vad.minSpeechDurationMs),
        '-vsd', String(decoding.vad.minSilenceDurationMs),
        '-vp', String(decoding.vad.speechPadMs),
        '-nt',
        '-np',
        '-oj',
        '-of', options.outputBase,
    ];

    if (options.prompt) {
        args.push('--prompt', options.prompt);
    }

    return args;
}

/**
 * Join accepted segments into one transcript. Returns '' when nothing but
 * silence markers survived the VAD and confidence gates.
 */
export function parseWhisperOutput(raw: unknown): string {
    const parsed = whisperOutputSchema.safeParse(raw);
    if (!parsed.success) {
        throw new BackendError('local', `Unexpected whisper-cli output: ${parsed.error.issues[0]?.message ?? 'invalid JSON'}`, 'BACKEND_LOCAL');
    }

    return parsed.data.transcription
        .map((segment) => segment.text.trim())
        .filter((text) => text.length > 0 && !NON_SPEECH_MARKER.test(text))
        .join(' ')
        .trim();
}

export interface LocalWhisperDeps {
    runCommand?: CommandRunner;
    tempRoot?: string;
}

export class LocalWhisperBackend implements TranscriptionBackend {
    readonly name = 'local';
    private readonly run: CommandRunner;
    private readonly tempRoot: string;

    constructor(
        private readonly config: LocalBackendConfig,
        private readonly language: string,
        private readonly decoding: DecodingParameters,
        deps: LocalWhisperDeps = {}
    ) {
        this.run = deps.runCommand ?? runCommand;
        this.tempRoot = deps.tempRoot ?? tmpdir();
    }

    /**
     * Startup check: the model file is installed and whisper-cli can be executed.
     * Throws ConfigError, which is fatal.
     */
    async verify(): Promise<void> {
        const modelPath = resolveModelPath(this.config.modelsDir, this.config.modelSize);
        if (!modelPath) {
            const installed = listInstalledModelIds(this.config.modelsDir);
            throw new ConfigError(
                `Whisper model '${this.config.modelSize}' not found at ${getModelPath(this.config.modelsDir, this.config.modelSize)}` +
                    (installed.length > 0 ? ` (installed: ${installed.join(', ')})` : ''),
                { modelsDir: this.config.modelsDir }
            );
        }

        if (!existsSync(this.config.vadModelPath)) {
            throw new ConfigError(`VAD model not found at ${this.config.vadModelPath}`, { vadModelPath: this.config.vadModelPath });
        }

        try {
            await this.run(this.config.cliPath, ['--help'], { timeoutMs: 5000 });
        } catch (error) {
            throw new ConfigError(`whisper-cli not runnable at '${this.config.cliPath}': ${describeError(error)}`);
        }

        log.info(`Local Whisper ${this.config.modelSize} model ready (${modelPath})`);
    }

    async transcribe(request: TranscriptionRequest): Promise<string> {
        const modelPath = getModelPath(this.config.modelsDir, this.config.modelSize);
        const workDir = await mkdtemp(join(this.tempRoot, 'pushscribe-'));

        try {
            const audioPath = join(workDir, 'recording.wav');
            const outputBase = join(workDir, 'output');
            await writeFile(audioPath, encodeWav(request.audio.toFloat32(), request.sampleRate));

            const args = buildWhisperArgs({
                modelPath,
                audioPath,
                outputBase,
                language: this.language,
                threads: this.config.threads,
                decoding: this.decoding,
                vadModelPath: this.config.vadModelPath,
                prompt: request.promptContext,
            });

            let result: CommandResult;
            try {
                result = await this.run(this.config.cliPath, args, { timeoutMs: this.config.timeoutMs });
            } catch (error) {
                if (error instanceof CommandTimeoutError) {
                    throw new BackendError('local', error.message, 'BACKEND_TIMEOUT', error);
                }
                throw new BackendError('local', `Failed to run whisper-cli: ${describeError(error)}`, 'BACKEND_LOCAL', error);
            }

            if (result.code !== 0) {
                const detail = result.stderr.trim().split('\n').pop() ?? '';
                throw new BackendError('local', `whisper-cli failed with code ${result.code}: ${detail}`, 'BACKEND_LOCAL');
            }

            let raw: unknown;
            try {
                raw = JSON.parse(await readFile(`${outputBase}.json`, 'utf-8'));
            } catch (error) {
                throw new BackendError('local', `Failed to read whisper-cli output: ${describeError(error)}`, 'BACKEND_LOCAL', error);
            }

            return parseWhisperOutput(raw);
        } finally {
            await rm(workDir, { recursive: true, force: true });
        }
    }
}

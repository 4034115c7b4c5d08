// Agent Configuration
// Validates process.env into an immutable AgentConfig, fixed for the process lifetime

import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { VAD_MODEL_FILE } from '../transcription/models.js';
import { ConfigError } from '../utils/errors.js';

/** Capture and backends always run at 16 kHz mono */
export const SAMPLE_RATE = 16000;

const DATA_DIR = join(homedir(), '.pushscribe');

const booleanFlag = z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .transform((value) => value === 'true' || value === '1' || value === 'yes');

const optionalString = z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined));

const envSchema = z.object({
    TRANSCRIPTION_MODE: z.enum(['remote', 'local']).default('remote'),
    REMOTE_PROVIDER: z.enum(['openai', 'deepgram']).default('openai'),
    OPENAI_API_KEY: optionalString,
    DEEPGRAM_API_KEY: optionalString,
    REMOTE_BASE_URL: z.string().url().optional(),
    REMOTE_MODEL: optionalString,
    REMOTE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

    LOCAL_MODEL_SIZE: z.enum(['tiny', 'base', 'small', 'medium', 'large-v3']).default('small'),
    WHISPER_CLI_PATH: z.string().min(1).default('whisper-cli'),
    WHISPER_MODELS_DIR: z.string().min(1).default(join(DATA_DIR, 'models')),
    WHISPER_VAD_MODEL: optionalString,
    WHISPER_THREADS: z.coerce.number().int().positive().default(4),
    WHISPER_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),

    LANGUAGE: z.string().min(2).default('en'),
    MAX_CONTEXT_ITEMS: z.coerce.number().int().min(1).default(3),
    AUDIO_INPUT_COMMAND: z.string().min(1).default('sox'),

    HOTKEY_TOGGLE: z.string().min(1).default('cmd+space'),
    HOTKEY_HOLD: z.string().min(1).default('alt_r'),
    HOTKEY_LISTENER_COMMAND: optionalString,

    AGENT_HOST: z.string().min(1).default('127.0.0.1'),
    AGENT_PORT: z.coerce.number().int().min(0).max(65535).default(3001),

    PASTE_DELAY_MS: z.coerce.number().int().min(0).default(100),
    AUTO_PASTE: booleanFlag.default('true'),

    LOG_FILE: z.string().min(1).default(join(DATA_DIR, 'logs', 'dictation.log')),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type LocalModelSize = z.infer<typeof envSchema>['LOCAL_MODEL_SIZE'];
export type RemoteProvider = z.infer<typeof envSchema>['REMOTE_PROVIDER'];

export interface VadParameters {
    readonly threshold: number;
    readonly minSpeechDurationMs: number;
    readonly minSilenceDurationMs: number;
    readonly speechPadMs: number;
}

export interface DecodingParameters {
    readonly beamSize: number;
    readonly temperature: number;
    readonly noSpeechThreshold: number;
    readonly compressionRatioThreshold: number;
    readonly logProbThreshold: number;
    readonly vad: VadParameters;
}

export const DEFAULT_DECODING: DecodingParameters = Object.freeze({
    beamSize: 5,
    temperature: 0,
    noSpeechThreshold: 0.6,
    compressionRatioThreshold: 2.4,
    logProbThreshold: -1.0,
    vad: Object.freeze({
        threshold: 0.5,
        minSpeechDurationMs: 250,
        minSilenceDurationMs: 2000,
        speechPadMs: 400,
    }),
});

export interface LocalBackendConfig {
    readonly modelSize: LocalModelSize;
    readonly cliPath: string;
    readonly modelsDir: string;
    readonly vadModelPath: string;
    readonly threads: number;
    readonly timeoutMs: number;
}

export interface RemoteBackendConfig {
    readonly provider: RemoteProvider;
    readonly apiKey?: string;
    readonly baseUrl?: string;
    readonly model?: string;
    readonly timeoutMs: number;
}

export interface BackendConfig {
    readonly mode: 'local' | 'remote';
    readonly language: string;
    readonly decoding: DecodingParameters;
    readonly local: LocalBackendConfig;
    readonly remote: RemoteBackendConfig;
}

export interface AgentConfig {
    readonly sampleRate: number;
    readonly maxContextItems: number;
    readonly audioInputCommand: string;
    readonly backend: BackendConfig;
    readonly hotkeys: {
        readonly toggle: string;
        readonly hold: string;
        readonly listenerCommand?: string;
    };
    readonly server: {
        readonly host: string;
        readonly port: number;
    };
    readonly output: {
        readonly pasteDelayMs: number;
        readonly autoPaste: boolean;
    };
    readonly logging: {
        readonly file: string;
        readonly level: 'debug' | 'info' | 'warn' | 'error';
    };
}

/**
 * Parse the environment into a frozen AgentConfig.
 * Throws ConfigError naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AgentConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, { issues });
    }
    const e = parsed.data;

    const apiKey = e.REMOTE_PROVIDER === 'openai' ? e.OPENAI_API_KEY : e.DEEPGRAM_API_KEY;

    const config: AgentConfig = {
        sampleRate: SAMPLE_RATE,
        maxContextItems: e.MAX_CONTEXT_ITEMS,
        audioInputCommand: e.AUDIO_INPUT_COMMAND,
        backend: {
            mode: e.TRANSCRIPTION_MODE,
            language: e.LANGUAGE,
            decoding: DEFAULT_DECODING,
            local: {
                modelSize: e.LOCAL_MODEL_SIZE,
                cliPath: e.WHISPER_CLI_PATH,
                modelsDir: e.WHISPER_MODELS_DIR,
                vadModelPath: e.WHISPER_VAD_MODEL ?? join(e.WHISPER_MODELS_DIR, VAD_MODEL_FILE),
                threads: e.WHISPER_THREADS,
                timeoutMs: e.WHISPER_TIMEOUT_MS,
            },
            remote: {
                provider: e.REMOTE_PROVIDER,
                apiKey,
                baseUrl: e.REMOTE_BASE_URL,
                model: e.REMOTE_MODEL,
                timeoutMs: e.REMOTE_TIMEOUT_MS,
            },
        },
        hotkeys: {
            toggle: e.HOTKEY_TOGGLE,
            hold: e.HOTKEY_HOLD,
            listenerCommand: e.HOTKEY_LISTENER_COMMAND,
        },
        server: {
            host: e.AGENT_HOST,
            port: e.AGENT_PORT,
        },
        output: {
            pasteDelayMs: e.PASTE_DELAY_MS,
            autoPaste: e.AUTO_PASTE,
        },
        logging: {
            file: e.LOG_FILE,
            level: e.LOG_LEVEL,
        },
    };

    return deepFreeze(config);
}

function deepFreeze<T extends object>(value: T): T {
    for (const key of Object.keys(value)) {
        const child: unknown = Reflect.get(value, key);
        if (child && typeof child === 'object' && !Object.isFrozen(child)) {
            deepFreeze(child);
        }
    }
    return Object.freeze(value);
}

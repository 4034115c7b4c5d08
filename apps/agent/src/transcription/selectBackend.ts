// Backend Selection
// Chooses the transcription backend once at startup, with a single logged fallback to local

import type { BackendConfig } from '../config/env.js';
import { createLogger } from '../utils/logger.js';
import { LocalWhisperBackend, type LocalWhisperDeps } from './LocalWhisperBackend.js';
import { RemoteTranscriber, type FetchLike } from './RemoteTranscriber.js';

const log = createLogger('backend');

export type BackendSelection =
    | { mode: 'local'; backend: LocalWhisperBackend; fellBack: boolean }
    | { mode: 'remote'; backend: RemoteTranscriber };

export interface SelectBackendDeps {
    fetch?: FetchLike;
    local?: LocalWhisperDeps;
}

/**
 * Resolve the configured backend. A remote backend without credentials falls
 * back to local here and only here; a local backend that cannot run throws
 * ConfigError, which is fatal for the process.
 */
export async function selectBackend(config: BackendConfig, deps: SelectBackendDeps = {}): Promise<BackendSelection> {
    if (config.mode === 'remote') {
        if (config.remote.apiKey) {
            const backend = new RemoteTranscriber(config.remote, config.language, deps.fetch);
            log.info(`Using ${config.remote.provider} transcription API`);
            return { mode: 'remote', backend };
        }

        const keyName = config.remote.provider === 'openai' ? 'OPENAI_API_KEY' : 'DEEPGRAM_API_KEY';
        log.error(`No API key found (${keyName}); falling back to local mode`);
    }

    const backend = new LocalWhisperBackend(config.local, config.language, config.decoding, deps.local);
    await backend.verify();
    log.info(`Using local Whisper ${config.local.modelSize} model`);
    return { mode: 'local', backend, fellBack: config.mode === 'remote' };
}

// Remote Transcriber
// Uploads the finished recording to a network transcription API (OpenAI or Deepgram)
// NO secrets in logs

import { z } from 'zod';
import type { RemoteBackendConfig } from '../config/env.js';
import { encodeWav } from '../audio/wav.js';
import { BackendError, describeError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { TranscriptionBackend, TranscriptionRequest } from './TranscriptionTypes.js';

const log = createLogger('remote');

const OPENAI_BASE_URL = 'https://api.openai.com/v1';
const OPENAI_DEFAULT_MODEL = 'whisper-1';
const DEEPGRAM_BASE_URL = 'https://api.deepgram.com/v1';
const DEEPGRAM_DEFAULT_MODEL = 'nova-2';

const openAIResponseSchema = z.object({
    text: z.string(),
});

const deepgramResponseSchema = z.object({
    results: z.object({
        channels: z.array(
            z.object({
                alternatives: z.array(
                    z.object({
                        transcript: z.string(),
                    })
                ),
            })
        ),
    }),
});

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export class RemoteTranscriber implements TranscriptionBackend {
    readonly name: string;
    private readonly apiKey: string;
    private readonly fetchImpl: FetchLike;

    constructor(
        private readonly config: RemoteBackendConfig,
        private readonly language: string,
        fetchImpl: FetchLike = fetch
    ) {
        if (!config.apiKey) {
            throw new BackendError(`remote:${config.provider}`, 'API key not configured', 'BACKEND_AUTH');
        }
        this.apiKey = config.apiKey;
        this.name = `remote:${config.provider}`;
        this.fetchImpl = fetchImpl;
    }

    async transcribe(request: TranscriptionRequest): Promise<string> {
        const wav = encodeWav(request.audio.toFloat32(), request.sampleRate);
        log.debug(`Uploading ${wav.byteLength} bytes to ${this.config.provider}`);

        const text =
            this.config.provider === 'openai'
                ? await this.transcribeOpenAI(wav, request.promptContext)
                : await this.transcribeDeepgram(wav, request.promptContext);

        return text.trim();
    }

    private async transcribeOpenAI(wav: Buffer, prompt?: string): Promise<string> {
        const baseUrl = (this.config.baseUrl ?? OPENAI_BASE_URL).replace(/\/$/, '');

        const form = new FormData();
        form.append('file', new Blob([new Uint8Array(wav)], { type: 'audio/wav' }), 'recording.wav');
        form.append('model', this.config.model ?? OPENAI_DEFAULT_MODEL);
        form.append('language', this.language);
        form.append('response_format', 'json');
        if (prompt) {
            form.append('prompt', prompt);
        }

        const body = await this.post(`${baseUrl}/audio/transcriptions`, {
            method: 'POST',
            headers: { Authorization: `Bearer ${this.apiKey}` },
            body: form,
        });

        const parsed = openAIResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new BackendError(this.name, 'Unexpected transcription response shape', 'BACKEND_HTTP');
        }
        return parsed.data.text;
    }

    private async transcribeDeepgram(wav: Buffer, prompt?: string): Promise<string> {
        const url = new URL(`${(this.config.baseUrl ?? DEEPGRAM_BASE_URL).replace(/\/$/, '')}/listen`);
        url.searchParams.set('model', this.config.model ?? DEEPGRAM_DEFAULT_MODEL);
        url.searchParams.set('language', this.language);
        url.searchParams.set('punctuate', 'true');
        url.searchParams.set('smart_format', 'true');

        if (prompt) {
            log.debug('Deepgram does not take a free-text prompt; context ignored');
        }

        const body = await this.post(url.toString(), {
            method: 'POST',
            headers: {
                Authorization: `Token ${this.apiKey}`,
                'Content-Type': 'audio/wav',
            },
            body: wav,
        });

        const parsed = deepgramResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new BackendError(this.name, 'Unexpected transcription response shape', 'BACKEND_HTTP');
        }
        return parsed.data.results.channels[0]?.alternatives[0]?.transcript ?? '';
    }

    /**
     * POST with a hard timeout; maps every failure to a BackendError
     */
    private async post(url: string, init: RequestInit): Promise<unknown> {
        let response: Response;
        try {
            response = await this.fetchImpl(url, {
                ...init,
                signal: AbortSignal.timeout(this.config.timeoutMs),
            });
        } catch (error) {
            if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
                throw new BackendError(this.name, `Request timed out after ${this.config.timeoutMs}ms`, 'BACKEND_TIMEOUT', error);
            }
            throw new BackendError(this.name, `Network error: ${describeError(error)}`, 'BACKEND_NETWORK', error);
        }

        if (response.status === 401 || response.status === 403) {
            throw new BackendError(this.name, `Authentication failed (${response.status})`, 'BACKEND_AUTH');
        }

        if (!response.ok) {
            throw new BackendError(this.name, `Transcription request failed: ${response.status}`, 'BACKEND_HTTP');
        }

        try {
            return await response.json();
        } catch (error) {
            throw new BackendError(this.name, `Invalid JSON in transcription response: ${describeError(error)}`, 'BACKEND_HTTP', error);
        }
    }
}

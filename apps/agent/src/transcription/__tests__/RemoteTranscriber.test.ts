import { describe, it, expect, vi } from 'vitest';
import { AudioBuffer } from '../../audio/AudioBuffer.js';
import type { RemoteBackendConfig } from '../../config/env.js';
import { BackendError } from '../../utils/errors.js';
import { RemoteTranscriber, type FetchLike } from '../RemoteTranscriber.js';

function request(promptContext?: string) {
    const audio = new AudioBuffer(16000);
    audio.append(new Float32Array([0.1, -0.1]));
    audio.seal();
    return { audio, sampleRate: 16000, promptContext };
}

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

const openai: RemoteBackendConfig = { provider: 'openai', apiKey: 'test-secret', timeoutMs: 30000 };
const deepgram: RemoteBackendConfig = { provider: 'deepgram', apiKey: 'test-secret', timeoutMs: 30000 };

describe('RemoteTranscriber', () => {
    it('refuses to construct without an API key', () => {
        expect(() => new RemoteTranscriber({ provider: 'openai', timeoutMs: 30000 }, 'en')).toThrow(BackendError);
    });

    describe('openai', () => {
        it('uploads a WAV form with model, language and prompt', async () => {
            const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse({ text: ' hello world ' }));
            const transcriber = new RemoteTranscriber(openai, 'en', fetchImpl);

            const text = await transcriber.transcribe(request('earlier text'));

            expect(text).toBe('hello world');
            expect(transcriber.name).toBe('remote:openai');
            const [url, init] = fetchImpl.mock.calls[0];
            expect(url).toBe('https://api.openai.com/v1/audio/transcriptions');
            expect(init.method).toBe('POST');
            expect(init.headers).toEqual({ Authorization: 'Bearer test-secret' });
            expect(init.signal).toBeInstanceOf(AbortSignal);

            const form = init.body;
            if (!(form instanceof FormData)) {
                throw new Error('expected multipart body');
            }
            expect(form.get('model')).toBe('whisper-1');
            expect(form.get('language')).toBe('en');
            expect(form.get('response_format')).toBe('json');
            expect(form.get('prompt')).toBe('earlier text');
            const file = form.get('file');
            expect(file).toBeInstanceOf(Blob);
            if (file instanceof Blob) {
                expect(file.size).toBe(44 + 4);
            }
        });

        it('omits the prompt when there is no context', async () => {
            const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse({ text: 'hi' }));
            await new RemoteTranscriber(openai, 'en', fetchImpl).transcribe(request());

            const form = fetchImpl.mock.calls[0][1].body;
            expect(form instanceof FormData && form.get('prompt')).toBe(null);
        });

        it('honours a custom base URL and model', async () => {
            const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse({ text: 'hi' }));
            const config = { ...openai, baseUrl: 'http://localhost:9000/v1/', model: 'whisper-large' };
            await new RemoteTranscriber(config, 'en', fetchImpl).transcribe(request());

            const [url, init] = fetchImpl.mock.calls[0];
            expect(url).toBe('http://localhost:9000/v1/audio/transcriptions');
            expect(init.body instanceof FormData && init.body.get('model')).toBe('whisper-large');
        });
    });

    describe('deepgram', () => {
        it('posts raw WAV and reads the first alternative', async () => {
            const fetchImpl = vi.fn<FetchLike>(async () =>
                jsonResponse({ results: { channels: [{ alternatives: [{ transcript: 'hi there' }] }] } })
            );
            const transcriber = new RemoteTranscriber(deepgram, 'en', fetchImpl);

            expect(await transcriber.transcribe(request('ignored'))).toBe('hi there');

            const [url, init] = fetchImpl.mock.calls[0];
            expect(url).toBe('https://api.deepgram.com/v1/listen?model=nova-2&language=en&punctuate=true&smart_format=true');
            expect(init.headers).toEqual({ Authorization: 'Token test-secret', 'Content-Type': 'audio/wav' });
            expect(Buffer.isBuffer(init.body)).toBe(true);
        });

        it('returns an empty transcript when there are no channels', async () => {
            const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse({ results: { channels: [] } }));
            expect(await new RemoteTranscriber(deepgram, 'en', fetchImpl).transcribe(request())).toBe('');
        });
    });

    describe('failures', () => {
        it('maps 401 to BACKEND_AUTH', async () => {
            const transcriber = new RemoteTranscriber(openai, 'en', async () => jsonResponse({ error: 'bad key' }, 401));
            await expect(transcriber.transcribe(request())).rejects.toMatchObject({
                code: 'BACKEND_AUTH',
                message: 'Authentication failed (401)',
            });
        });

        it('maps other error statuses to BACKEND_HTTP', async () => {
            const transcriber = new RemoteTranscriber(openai, 'en', async () => jsonResponse({}, 500));
            await expect(transcriber.transcribe(request())).rejects.toMatchObject({
                code: 'BACKEND_HTTP',
                message: 'Transcription request failed: 500',
            });
        });

        it('maps connection failures to BACKEND_NETWORK', async () => {
            const transcriber = new RemoteTranscriber(openai, 'en', async () => {
                throw new TypeError('fetch failed');
            });
            await expect(transcriber.transcribe(request())).rejects.toMatchObject({
                code: 'BACKEND_NETWORK',
                message: 'Network error: fetch failed',
            });
        });

        it('maps an aborted request to BACKEND_TIMEOUT', async () => {
            const transcriber = new RemoteTranscriber(openai, 'en', async () => {
                throw Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
            });
            await expect(transcriber.transcribe(request())).rejects.toMatchObject({
                code: 'BACKEND_TIMEOUT',
                message: 'Request timed out after 30000ms',
            });
        });

        it('rejects an unexpected response shape', async () => {
            const transcriber = new RemoteTranscriber(openai, 'en', async () => jsonResponse({ transcript: 'hi' }));
            await expect(transcriber.transcribe(request())).rejects.toMatchObject({
                code: 'BACKEND_HTTP',
                message: 'Unexpected transcription response shape',
            });
        });
    });
});

import { afterEach, beforeEach, describe, it, expect, vi, type Mock } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig } from '../../config/env.js';
import { ConfigError } from '../../utils/errors.js';
import type { CommandRunner } from '../../utils/process.js';
import { LocalWhisperBackend } from '../LocalWhisperBackend.js';
import { VAD_MODEL_FILE } from '../models.js';
import { RemoteTranscriber } from '../RemoteTranscriber.js';
import { selectBackend } from '../selectBackend.js';

describe('selectBackend', () => {
    let modelsDir: string;
    let runCommand: Mock<CommandRunner>;

    beforeEach(async () => {
        modelsDir = await mkdtemp(join(tmpdir(), 'select-backend-test-'));
        runCommand = vi.fn<CommandRunner>(async () => ({ code: 0, stdout: '', stderr: '' }));
    });

    afterEach(async () => {
        await rm(modelsDir, { recursive: true, force: true });
    });

    it('uses the remote backend when its key is present', async () => {
        const { backend } = loadConfig({ OPENAI_API_KEY: 'test-secret' });

        const selection = await selectBackend(backend, { local: { runCommand } });

        expect(selection.mode).toBe('remote');
        expect(selection.backend).toBeInstanceOf(RemoteTranscriber);
        expect(runCommand).not.toHaveBeenCalled();
    });

    it('falls back to local once when the remote key is missing', async () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        await writeFile(join(modelsDir, 'ggml-small.bin'), 'model');
        await writeFile(join(modelsDir, VAD_MODEL_FILE), 'vad');
        const { backend } = loadConfig({ REMOTE_PROVIDER: 'deepgram', WHISPER_MODELS_DIR: modelsDir });

        const selection = await selectBackend(backend, { local: { runCommand } });

        expect(selection).toMatchObject({ mode: 'local', fellBack: true });
        expect(selection.backend).toBeInstanceOf(LocalWhisperBackend);
        expect(error).toHaveBeenCalledWith('[backend] No API key found (DEEPGRAM_API_KEY); falling back to local mode');
    });

    it('selects local directly without a fallback flag', async () => {
        await writeFile(join(modelsDir, 'ggml-base.bin'), 'model');
        await writeFile(join(modelsDir, VAD_MODEL_FILE), 'vad');
        const { backend } = loadConfig({
            TRANSCRIPTION_MODE: 'local',
            LOCAL_MODEL_SIZE: 'base',
            WHISPER_MODELS_DIR: modelsDir,
        });

        const selection = await selectBackend(backend, { local: { runCommand } });

        expect(selection).toMatchObject({ mode: 'local', fellBack: false });
        expect(runCommand).toHaveBeenCalledWith('whisper-cli', ['--help'], { timeoutMs: 5000 });
    });

    it('fails fatally when the local backend cannot run', async () => {
        const { backend } = loadConfig({ TRANSCRIPTION_MODE: 'local', WHISPER_MODELS_DIR: modelsDir });

        await expect(selectBackend(backend, { local: { runCommand } })).rejects.toBeInstanceOf(ConfigError);
    });

    it('fails fatally when the VAD model is missing', async () => {
        await writeFile(join(modelsDir, 'ggml-small.bin'), 'model');
        const { backend } = loadConfig({ TRANSCRIPTION_MODE: 'local', WHISPER_MODELS_DIR: modelsDir });

        await expect(selectBackend(backend, { local: { runCommand } })).rejects.toThrow(
            `VAD model not found at ${join(modelsDir, VAD_MODEL_FILE)}`
        );
        expect(runCommand).not.toHaveBeenCalled();
    });
});

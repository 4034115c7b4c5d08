// Whisper Model Catalog
// Local ggml model files understood by whisper-cli

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { LocalModelSize } from '../config/env.js';

export interface WhisperModelSpec {
    id: LocalModelSize;
    label: string;
    file: string;
    sizeMB: number;
}

const MODEL_CATALOG: readonly WhisperModelSpec[] = [
    { id: 'tiny', label: 'Tiny', file: 'ggml-tiny.bin', sizeMB: 75 },
    { id: 'base', label: 'Base', file: 'ggml-base.bin', sizeMB: 142 },
    { id: 'small', label: 'Small', file: 'ggml-small.bin', sizeMB: 466 },
    { id: 'medium', label: 'Medium', file: 'ggml-medium.bin', sizeMB: 1500 },
    { id: 'large-v3', label: 'Large v3', file: 'ggml-large-v3.bin', sizeMB: 3100 },
];

/** Silero VAD weights in whisper.cpp's ggml format, expected beside the speech models */
export const VAD_MODEL_FILE = 'ggml-silero-v5.1.2.bin';

export function getModelSpec(modelId: string): WhisperModelSpec | undefined {
    return MODEL_CATALOG.find((model) => model.id === modelId);
}

export function getModelPath(modelsDir: string, modelId: LocalModelSize): string {
    const model = getModelSpec(modelId);
    if (!model) {
        throw new Error(`Unknown model id: ${modelId}`);
    }
    return join(modelsDir, model.file);
}

/**
 * Path of the model file if it is installed, otherwise null
 */
export function resolveModelPath(modelsDir: string, modelId: LocalModelSize): string | null {
    const modelPath = getModelPath(modelsDir, modelId);
    return existsSync(modelPath) ? modelPath : null;
}

export function listInstalledModelIds(modelsDir: string): LocalModelSize[] {
    return MODEL_CATALOG.filter((model) => existsSync(join(modelsDir, model.file))).map((model) => model.id);
}

// Transcription Types
// Type definitions for transcription backends

import type { AudioBuffer } from '../audio/AudioBuffer.js';

export interface TranscriptionRequest {
    /** Sealed buffer of the finished recording */
    audio: AudioBuffer;
    sampleRate: number;
    /** Recent transcripts used to bias vocabulary and style */
    promptContext?: string;
}

/**
 * A speech-to-text backend.
 * Resolves with the trimmed transcript, or '' when no speech was detected.
 * Rejects with BackendError on any failure.
 */
export interface TranscriptionBackend {
    readonly name: string;
    transcribe(request: TranscriptionRequest): Promise<string>;
}

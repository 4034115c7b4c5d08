// Session Controller
// State machine for one push-to-talk cycle: idle -> recording -> transcribing -> idle
//
// Every transition is a synchronous check-and-set on the event loop, so two hotkey
// events arriving back to back can never both observe the same state.

import { EventEmitter } from 'node:events';
import { randomUUID } from 'node:crypto';
import type { BackendMode, DomainEvent, SessionState } from '@pushscribe/contracts';
import { AudioBuffer } from '../audio/AudioBuffer.js';
import type { AudioCapture } from '../audio/AudioCapture.js';
import type { OutputSink } from '../output/OutputSink.js';
import type { TranscriptionBackend } from '../transcription/TranscriptionTypes.js';
import {
    AppError,
    BackendError,
    CaptureError,
    EmptyAudioError,
    OutputError,
    describeError,
    toBackendError,
} from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { ContextWindow } from './ContextWindow.js';

const log = createLogger('session');

export type CycleOutcome =
    | { kind: 'committed'; sessionId: string; text: string }
    | { kind: 'no-speech'; sessionId: string }
    | { kind: 'empty-audio'; sessionId: string }
    | { kind: 'capture-error'; sessionId: string; error: CaptureError }
    | { kind: 'backend-error'; sessionId: string; error: BackendError }
    | { kind: 'aborted'; sessionId: string; error: AppError };

/**
 * Handle for a stopped recording; `outcome` settles when the cycle is back to idle.
 * It never rejects.
 */
export interface TranscriptionTask {
    readonly sessionId: string;
    readonly outcome: Promise<CycleOutcome>;
}

export type ToggleResult =
    | { action: 'started'; sessionId: string }
    | { action: 'stopped'; task: TranscriptionTask }
    | { action: 'ignored'; state: SessionState };

export interface SessionStatus {
    state: SessionState;
    sessionId?: string;
    recordingStartedAt?: number;
    contextSize: number;
    backend: BackendMode;
}

export interface SessionControllerDeps {
    backend: TranscriptionBackend;
    backendMode: BackendMode;
    output: OutputSink;
    /** Fresh capture per recording, bound to the configured input driver */
    createCapture: (sessionId: string) => AudioCapture;
    context?: ContextWindow;
    sampleRate: number;
    createSessionId?: () => string;
    now?: () => number;
}

interface ActiveRecording {
    sessionId: string;
    log: Logger;
    buffer: AudioBuffer;
    capture: AudioCapture;
    startedAt: number;
    /** Resolves false when the input device could not be opened */
    opened: Promise<boolean>;
    captureError?: CaptureError;
}

export class SessionController extends EventEmitter {
    private state: SessionState = 'idle';
    private active: ActiveRecording | null = null;
    private inFlight: Promise<CycleOutcome> | null = null;
    private inFlightSessionId: string | null = null;

    private readonly backend: TranscriptionBackend;
    private readonly backendMode: BackendMode;
    private readonly output: OutputSink;
    private readonly createCapture: (sessionId: string) => AudioCapture;
    private readonly context: ContextWindow;
    private readonly sampleRate: number;
    private readonly createSessionId: () => string;
    private readonly now: () => number;

    constructor(deps: SessionControllerDeps) {
        super();
        this.backend = deps.backend;
        this.backendMode = deps.backendMode;
        this.output = deps.output;
        this.createCapture = deps.createCapture;
        this.context = deps.context ?? new ContextWindow();
        this.sampleRate = deps.sampleRate;
        this.createSessionId = deps.createSessionId ?? randomUUID;
        this.now = deps.now ?? Date.now;
    }

    getState(): SessionState {
        return this.state;
    }

    getStatus(): SessionStatus {
        return {
            state: this.state,
            sessionId: this.active?.sessionId ?? this.inFlightSessionId ?? undefined,
            recordingStartedAt: this.active?.startedAt,
            contextSize: this.context.size,
            backend: this.backendMode,
        };
    }

    /**
     * Subscribe to domain events; returns an unsubscribe function
     */
    onEvent(listener: (event: DomainEvent) => void): () => void {
        this.on('event', listener);
        return () => this.off('event', listener);
    }

    /**
     * idle -> recording. Returns the new session id, or null when not idle.
     */
    startRecording(): string | null {
        if (this.state !== 'idle') {
            log.debug(`Start ignored while ${this.state}`);
            return null;
        }

        const sessionId = this.createSessionId();
        const recording: ActiveRecording = {
            sessionId,
            log: createLogger(`session:${sessionId}`),
            buffer: new AudioBuffer(this.sampleRate),
            capture: this.createCapture(sessionId),
            startedAt: this.now(),
            opened: Promise.resolve(false),
        };
        recording.opened = recording.capture.begin(recording.buffer).then(
            () => true,
            (error: unknown) => this.handleCaptureFailure(recording, error)
        );

        this.active = recording;
        this.setState('recording');
        recording.log.info('Recording started');
        this.publish({ type: 'recording.started', payload: { sessionId, timestamp: recording.startedAt } });
        return sessionId;
    }

    /**
     * recording -> transcribing. Returns at once; capture drain and transcription
     * run in the returned task. Returns null when not recording.
     */
    stopRecording(): TranscriptionTask | null {
        const recording = this.active;
        if (this.state !== 'recording' || !recording) {
            log.debug(`Stop ignored while ${this.state}`);
            return null;
        }

        this.active = null;
        this.inFlightSessionId = recording.sessionId;
        this.setState('transcribing');

        const outcome = this.completeCycle(recording);
        this.inFlight = outcome;
        return { sessionId: recording.sessionId, outcome };
    }

    /**
     * Start when idle, stop when recording, ignore while transcribing
     */
    toggleRecording(): ToggleResult {
        if (this.state === 'idle') {
            const sessionId = this.startRecording();
            if (sessionId) return { action: 'started', sessionId };
        } else if (this.state === 'recording') {
            const task = this.stopRecording();
            if (task) return { action: 'stopped', task };
        }
        log.debug(`Toggle ignored while ${this.state}`);
        return { action: 'ignored', state: this.state };
    }

    /**
     * Resolves once no transcription is in flight
     */
    async whenIdle(): Promise<void> {
        if (this.inFlight) {
            await this.inFlight;
        }
    }

    /**
     * Stop any active recording and let its cycle finish
     */
    async shutdown(): Promise<void> {
        if (this.state === 'recording') {
            this.stopRecording();
        }
        await this.whenIdle();
    }

    private handleCaptureFailure(recording: ActiveRecording, error: unknown): false {
        const captureError = error instanceof CaptureError ? error : new CaptureError(describeError(error), error);
        recording.captureError = captureError;
        recording.log.warn(`Capture failed: ${captureError.message}`);
        this.publish({
            type: 'capture.failed',
            payload: { sessionId: recording.sessionId, message: captureError.message, timestamp: this.now() },
        });

        // Still the live recording: nothing was captured, go straight back to idle
        if (this.active === recording) {
            this.active = null;
            this.setState('idle');
        }
        return false;
    }

    private async completeCycle(recording: ActiveRecording): Promise<CycleOutcome> {
        let outcome: CycleOutcome;
        try {
            outcome = await this.runCycle(recording);
        } catch (error) {
            recording.log.error(`Cycle aborted: ${describeError(error)}`);
            outcome = {
                kind: 'aborted',
                sessionId: recording.sessionId,
                error: error instanceof AppError ? error : new AppError(describeError(error), 'INTERNAL_ERROR', false),
            };
        }

        this.inFlight = null;
        this.inFlightSessionId = null;
        this.setState('idle');
        return outcome;
    }

    private async runCycle(recording: ActiveRecording): Promise<CycleOutcome> {
        const { sessionId, buffer } = recording;

        const opened = await recording.opened;
        if (!opened) {
            return {
                kind: 'capture-error',
                sessionId,
                error: recording.captureError ?? new CaptureError('Capture failed to start'),
            };
        }

        // Capture is fully drained and the buffer sealed before anything reads it
        await recording.capture.end();
        recording.log.info(`Recording stopped (${buffer.durationMs}ms, ${buffer.chunkCount} chunks)`);
        this.publish({
            type: 'recording.stopped',
            payload: { sessionId, timestamp: this.now(), durationMs: buffer.durationMs, chunkCount: buffer.chunkCount },
        });

        if (buffer.isEmpty()) {
            const error = new EmptyAudioError(sessionId);
            recording.log.warn(error.message);
            this.publish({ type: 'transcription.skipped', payload: { sessionId, reason: 'empty-audio', timestamp: this.now() } });
            return { kind: 'empty-audio', sessionId };
        }

        recording.log.info(`Transcribing with ${this.backend.name}...`);
        const startedAt = this.now();

        let text: string;
        try {
            const result = await this.backend.transcribe({
                audio: buffer,
                sampleRate: this.sampleRate,
                promptContext: this.context.prompt(),
            });
            text = result.trim();
        } catch (error) {
            const backendError = toBackendError(this.backend.name, error);
            recording.log.error(`Transcription failed: ${backendError.message}`);
            this.publish({
                type: 'transcription.failed',
                payload: { sessionId, code: backendError.code, message: backendError.message, timestamp: this.now() },
            });
            return { kind: 'backend-error', sessionId, error: backendError };
        }

        if (!text) {
            recording.log.warn('No speech detected');
            this.publish({ type: 'transcription.skipped', payload: { sessionId, reason: 'no-speech', timestamp: this.now() } });
            return { kind: 'no-speech', sessionId };
        }

        const elapsedMs = this.now() - startedAt;
        this.context.push(text);
        recording.log.info(`Transcribed in ${(elapsedMs / 1000).toFixed(1)}s: ${text}`);
        this.publish({ type: 'transcript.committed', payload: { sessionId, text, elapsedMs, timestamp: this.now() } });

        await this.deliver(recording, text);
        return { kind: 'committed', sessionId, text };
    }

    /**
     * Output failures are reported, never retried, and never undo the transcript
     */
    private async deliver(recording: ActiveRecording, text: string): Promise<void> {
        try {
            await this.output.emit(text);
            recording.log.info('Text pasted');
        } catch (error) {
            const outputError = error instanceof OutputError ? error : new OutputError('paste', describeError(error), error);
            recording.log.error(`Output failed: ${outputError.message}`);
            this.publish({
                type: 'output.failed',
                payload: { sessionId: recording.sessionId, message: outputError.message, timestamp: this.now() },
            });
        }
    }

    private setState(next: SessionState): void {
        const previous = this.state;
        if (previous === next) return;
        this.state = next;
        this.publish({ type: 'session.state.changed', payload: { state: next, previous, timestamp: this.now() } });
    }

    /**
     * Listener failures are logged and never reach the state machine or a task's outcome
     */
    private publish(event: DomainEvent): void {
        try {
            this.emit('event', event);
        } catch (error) {
            log.error(`Event listener failed on ${event.type}: ${describeError(error)}`);
        }
    }
}

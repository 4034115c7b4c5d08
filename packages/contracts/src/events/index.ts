// Event Contracts
// Domain events emitted by the dictation session controller
//
// RULES:
// - No logic
// - No helpers
// - No data access
// - Only interfaces, types, and enums

// ============================================
// SESSION STATE
// ============================================

export type SessionState = 'idle' | 'recording' | 'transcribing';

export interface SessionStateChangedEvent {
    readonly type: 'session.state.changed';
    readonly payload: {
        readonly state: SessionState;
        readonly previous: SessionState;
        readonly timestamp: number;
    };
}

// ============================================
// RECORDING EVENTS
// ============================================

export interface RecordingStartedEvent {
    readonly type: 'recording.started';
    readonly payload: {
        readonly sessionId: string;
        readonly timestamp: number;
    };
}

export interface RecordingStoppedEvent {
    readonly type: 'recording.stopped';
    readonly payload: {
        readonly sessionId: string;
        readonly timestamp: number;
        readonly durationMs: number;
        readonly chunkCount: number;
    };
}

export interface CaptureFailedEvent {
    readonly type: 'capture.failed';
    readonly payload: {
        readonly sessionId: string;
        readonly message: string;
        readonly timestamp: number;
    };
}

// ============================================
// TRANSCRIPTION EVENTS
// ============================================

export type TranscriptionSkipReason = 'empty-audio' | 'no-speech';

export interface TranscriptCommittedEvent {
    readonly type: 'transcript.committed';
    readonly payload: {
        readonly sessionId: string;
        readonly text: string;
        readonly elapsedMs: number;
        readonly timestamp: number;
    };
}

export interface TranscriptionSkippedEvent {
    readonly type: 'transcription.skipped';
    readonly payload: {
        readonly sessionId: string;
        readonly reason: TranscriptionSkipReason;
        readonly timestamp: number;
    };
}

export interface TranscriptionFailedEvent {
    readonly type: 'transcription.failed';
    readonly payload: {
        readonly sessionId: string;
        readonly code: string;
        readonly message: string;
        readonly timestamp: number;
    };
}

// ============================================
// OUTPUT EVENTS
// ============================================

export interface OutputFailedEvent {
    readonly type: 'output.failed';
    readonly payload: {
        readonly sessionId: string;
        readonly message: string;
        readonly timestamp: number;
    };
}

// ============================================
// UNION TYPE
// ============================================

export type DomainEvent =
    | SessionStateChangedEvent
    | RecordingStartedEvent
    | RecordingStoppedEvent
    | CaptureFailedEvent
    | TranscriptCommittedEvent
    | TranscriptionSkippedEvent
    | TranscriptionFailedEvent
    | OutputFailedEvent;

// Output Sink
// Where committed transcripts go once a cycle succeeds

export interface OutputSink {
    /** Deliver one transcript. Rejects with OutputError; callers never retry. */
    emit(text: string): Promise<void>;
}

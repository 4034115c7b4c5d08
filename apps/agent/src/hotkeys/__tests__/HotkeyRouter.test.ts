import { describe, it, expect } from 'vitest';
import type { SessionState } from '@pushscribe/contracts';
import type { CycleOutcome, SessionStatus, ToggleResult, TranscriptionTask } from '../../session/SessionController.js';
import { ConfigError } from '../../utils/errors.js';
import { HotkeyRouter, parseHotkey, type HotkeyTarget, type KeyEvent } from '../HotkeyRouter.js';

class FakeTarget implements HotkeyTarget {
    state: SessionState = 'idle';
    sessionId: string | undefined;
    readonly calls: string[] = [];
    private counter = 0;

    getState(): SessionState {
        return this.state;
    }

    getStatus(): SessionStatus {
        return { state: this.state, sessionId: this.sessionId, contextSize: 0, backend: 'local' };
    }

    startRecording(): string | null {
        this.calls.push('start');
        return this.start();
    }

    stopRecording(): TranscriptionTask | null {
        this.calls.push('stop');
        return this.stop();
    }

    toggleRecording(): ToggleResult {
        this.calls.push('toggle');
        if (this.state === 'idle') {
            return { action: 'started', sessionId: this.start() ?? '' };
        }
        const task = this.stop();
        return task ? { action: 'stopped', task } : { action: 'ignored', state: this.state };
    }

    private start(): string | null {
        if (this.state !== 'idle') return null;
        this.state = 'recording';
        this.sessionId = `s${++this.counter}`;
        return this.sessionId;
    }

    private stop(): TranscriptionTask | null {
        if (this.state !== 'recording' || !this.sessionId) return null;
        this.state = 'transcribing';
        const outcome: Promise<CycleOutcome> = Promise.resolve({ kind: 'no-speech', sessionId: this.sessionId });
        return { sessionId: this.sessionId, outcome };
    }
}

const press = (key: string): KeyEvent => ({ type: 'press', key });
const release = (key: string): KeyEvent => ({ type: 'release', key });

function setup() {
    const target = new FakeTarget();
    const router = new HotkeyRouter(target, { toggle: 'cmd+space', hold: 'alt_r' });
    const send = (...events: KeyEvent[]) => events.forEach((event) => router.handle(event));
    return { target, send };
}

describe('parseHotkey', () => {
    it('splits modifiers from the trigger key', () => {
        expect(parseHotkey('cmd+space')).toEqual({ key: 'space', modifiers: ['cmd'] });
        expect(parseHotkey('Ctrl+Shift+D')).toEqual({ key: 'd', modifiers: ['ctrl', 'shift'] });
        expect(parseHotkey('option+f1')).toEqual({ key: 'f1', modifiers: ['alt'] });
        expect(parseHotkey('f9')).toEqual({ key: 'f9', modifiers: [] });
    });

    it('rejects unknown modifiers and empty parts', () => {
        expect(() => parseHotkey('hyper+space')).toThrow(ConfigError);
        expect(() => parseHotkey('cmd+')).toThrow(ConfigError);
        expect(() => parseHotkey('')).toThrow(ConfigError);
    });
});

describe('HotkeyRouter', () => {
    describe('toggle combination', () => {
        it('toggles while the modifier is held', () => {
            const { target, send } = setup();

            send(press('cmd'), press('space'), release('space'), press('space'));

            expect(target.calls).toEqual(['toggle', 'toggle']);
            expect(target.state).toBe('transcribing');
        });

        it('ignores the trigger key alone', () => {
            const { target, send } = setup();

            send(press('space'), release('space'));

            expect(target.calls).toEqual([]);
        });

        it('accepts either side of a modifier', () => {
            const { target, send } = setup();

            send(press('Cmd_R'), press('space'));

            expect(target.calls).toEqual(['toggle']);
        });

        it('ignores auto-repeat', () => {
            const { target, send } = setup();

            send(press('cmd'), press('space'), press('space'), press('space'));

            expect(target.calls).toEqual(['toggle']);
        });

        it('stops once the modifier is released', () => {
            const { target, send } = setup();

            send(press('cmd'), release('cmd'), press('space'));

            expect(target.calls).toEqual([]);
        });
    });

    describe('hold key', () => {
        it('records while held', () => {
            const { target, send } = setup();

            send(press('alt_r'));
            expect(target.state).toBe('recording');

            send(release('alt_r'));
            expect(target.calls).toEqual(['start', 'stop']);
            expect(target.state).toBe('transcribing');
        });

        it('starts once despite auto-repeat', () => {
            const { target, send } = setup();

            send(press('alt_r'), press('alt_r'), press('alt_r'));

            expect(target.calls).toEqual(['start']);
        });

        it('does nothing unless idle', () => {
            const { target, send } = setup();
            target.state = 'transcribing';

            send(press('alt_r'), release('alt_r'));

            expect(target.calls).toEqual([]);
        });

        it('leaves a toggled recording running on release', () => {
            const { target, send } = setup();

            send(press('cmd'), press('space'), release('space'), release('cmd'));
            send(press('alt_r'), release('alt_r'));

            expect(target.calls).toEqual(['toggle']);
            expect(target.state).toBe('recording');
        });

        it('does not stop again after a toggle already stopped the recording', () => {
            const { target, send } = setup();

            send(press('alt_r'), press('cmd'), press('space'), release('alt_r'));

            expect(target.calls).toEqual(['start', 'toggle']);
            expect(target.state).toBe('transcribing');
        });
    });
});

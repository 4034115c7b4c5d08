// Hotkey Router
// Maps raw key press/release events onto session controller calls
//
// Toggle combination: start or stop on each press while its modifiers are held.
// Hold key: start on press, stop on release of the recording that press started.

import type { SessionController } from '../session/SessionController.js';
import { ConfigError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('hotkeys');

export interface KeyEvent {
    type: 'press' | 'release';
    key: string;
}

export interface Hotkey {
    key: string;
    modifiers: string[];
}

const MODIFIER_ALIASES = new Map<string, string>([
    ['cmd', 'cmd'],
    ['command', 'cmd'],
    ['meta', 'cmd'],
    ['super', 'cmd'],
    ['win', 'cmd'],
    ['ctrl', 'ctrl'],
    ['control', 'ctrl'],
    ['alt', 'alt'],
    ['option', 'alt'],
    ['opt', 'alt'],
    ['shift', 'shift'],
]);

/**
 * Lowercase, with left/right variants of a modifier folded into one name:
 * `Alt_R` -> `alt`, `cmd_l` -> `cmd`. Non-modifier keys are only lowercased.
 */
function modifierOf(key: string): string | null {
    const base = key.toLowerCase().replace(/_(l|r)$/, '');
    return MODIFIER_ALIASES.get(base) ?? null;
}

export function normalizeKey(key: string): string {
    return key.trim().toLowerCase();
}

/**
 * Parse a combination such as `cmd+space` or `ctrl+shift+d`. The last
 * part is the trigger key; every other part must be a known modifier.
 */
export function parseHotkey(combo: string): Hotkey {
    const parts = combo.split('+').map(normalizeKey);
    const key = parts.pop();
    if (!key || parts.some((part) => part.length === 0)) {
        throw new ConfigError(`Invalid hotkey '${combo}'`);
    }

    const modifiers = parts.map((part) => {
        const modifier = modifierOf(part);
        if (!modifier) {
            throw new ConfigError(`Invalid hotkey '${combo}': '${part}' is not a modifier`);
        }
        return modifier;
    });

    return { key, modifiers };
}

export type HotkeyTarget = Pick<SessionController, 'getState' | 'getStatus' | 'startRecording' | 'stopRecording' | 'toggleRecording'>;

export interface HotkeyBindings {
    toggle: string;
    hold: string;
}

export class HotkeyRouter {
    private readonly toggle: Hotkey;
    private readonly holdKey: string;
    private readonly pressed = new Set<string>();
    /** Session started by the current hold, cleared on release */
    private holdSessionId: string | null = null;

    constructor(
        private readonly target: HotkeyTarget,
        bindings: HotkeyBindings
    ) {
        this.toggle = parseHotkey(bindings.toggle);
        this.holdKey = normalizeKey(bindings.hold);
    }

    handle(event: KeyEvent): void {
        const key = normalizeKey(event.key);
        if (event.type === 'press') {
            this.onPress(key);
        } else {
            this.onRelease(key);
        }
    }

    private onPress(key: string): void {
        // Auto-repeat delivers presses without releases
        if (this.pressed.has(key)) return;
        this.pressed.add(key);

        if (key === this.holdKey) {
            if (this.holdSessionId === null && this.target.getState() === 'idle') {
                this.holdSessionId = this.target.startRecording();
                if (this.holdSessionId) {
                    log.debug(`Hold ${this.holdKey} started ${this.holdSessionId}`);
                }
            }
            return;
        }

        if (key === this.toggle.key && this.modifiersHeld(this.toggle.modifiers)) {
            const result = this.target.toggleRecording();
            log.debug(`Toggle: ${result.action}`);
        }
    }

    private onRelease(key: string): void {
        this.pressed.delete(key);

        if (key !== this.holdKey || this.holdSessionId === null) return;

        const sessionId = this.holdSessionId;
        this.holdSessionId = null;

        const status = this.target.getStatus();
        if (status.state === 'recording' && status.sessionId === sessionId) {
            this.target.stopRecording();
        }
    }

    private modifiersHeld(modifiers: string[]): boolean {
        const held = new Set<string>();
        for (const key of this.pressed) {
            const modifier = modifierOf(key);
            if (modifier) held.add(modifier);
        }
        return modifiers.every((modifier) => held.has(modifier));
    }
}

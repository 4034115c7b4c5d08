// Dictation Agent - Entry Point
// Push-to-talk dictation: hotkey -> record -> transcribe -> paste
//
// Runs as a local background process. Startup order:
//   1. Load and validate configuration (fatal on error)
//   2. Select the transcription backend (fatal when no backend can run)
//   3. Wire the session controller, hotkey listener and control server

// Load environment variables from .env file
import 'dotenv/config';

import type { Server } from 'node:http';
import { AudioCapture } from './audio/AudioCapture.js';
import { SoxInputDriver } from './audio/soxInput.js';
import { loadConfig } from './config/env.js';
import { HotkeyRouter } from './hotkeys/HotkeyRouter.js';
import { KeyEventSidecar } from './hotkeys/keySidecar.js';
import { ClipboardPasteSink } from './output/ClipboardPasteSink.js';
import { closeControlServer, createControlServer, startControlServer } from './server.js';
import { ContextWindow } from './session/ContextWindow.js';
import { SessionController } from './session/SessionController.js';
import { EventStreamManager } from './sse/EventStreamManager.js';
import { selectBackend } from './transcription/selectBackend.js';
import { logError } from './utils/errors.js';
import { closeLogging, configureLogging, createLogger } from './utils/logger.js';

const VERSION = '0.1.0';

const log = createLogger('agent');

async function main(): Promise<void> {
    const config = loadConfig();
    configureLogging({ level: config.logging.level, file: config.logging.file });

    log.info('Dictation agent starting...');
    log.info(`Platform: ${process.platform}`);
    log.info(`Logging to ${config.logging.file}`);

    const selection = await selectBackend(config.backend);

    const driver = new SoxInputDriver(config.audioInputCommand);
    const controller = new SessionController({
        backend: selection.backend,
        backendMode: selection.mode,
        output: new ClipboardPasteSink(config.output),
        createCapture: (sessionId) => new AudioCapture(driver, { sampleRate: config.sampleRate, label: sessionId }),
        context: new ContextWindow(config.maxContextItems),
        sampleRate: config.sampleRate,
    });

    const events = new EventStreamManager();
    controller.onEvent((event) => events.broadcast(event));

    const router = new HotkeyRouter(controller, config.hotkeys);
    let sidecar: KeyEventSidecar | null = null;
    if (config.hotkeys.listenerCommand) {
        const listener = new KeyEventSidecar(config.hotkeys.listenerCommand, (event) => router.handle(event));
        try {
            await listener.start();
            sidecar = listener;
            log.info(`Hotkeys: ${config.hotkeys.toggle} (toggle) or hold ${config.hotkeys.hold} to record`);
        } catch (error) {
            logError(error, 'agent');
            log.warn('Hotkeys disabled; use the control server instead');
        }
    } else {
        log.warn('HOTKEY_LISTENER_COMMAND not set; hotkeys disabled, use the control server instead');
    }

    const app = createControlServer({
        controller,
        events,
        isHotkeyListenerActive: () => sidecar?.isRunning ?? false,
        version: VERSION,
    });
    const server: Server = await startControlServer(app, config.server);

    let shuttingDown = false;
    const shutdown = async (signal: string): Promise<void> => {
        if (shuttingDown) return;
        shuttingDown = true;
        log.info(`${signal} received, shutting down...`);

        await sidecar?.stop();
        // Lets an in-flight transcription finish and paste
        await controller.shutdown();
        events.closeAll();
        await closeControlServer(server);
        log.info('Goodbye');
        await closeLogging();
        process.exit(0);
    };

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
        process.on(signal, () => {
            shutdown(signal).catch(async (error: unknown) => {
                logError(error, 'agent');
                await closeLogging();
                process.exit(1);
            });
        });
    }

    log.info('Ready');
}

main().catch(async (error: unknown) => {
    logError(error, 'agent');
    log.error('Startup failed');
    await closeLogging();
    process.exit(1);
});

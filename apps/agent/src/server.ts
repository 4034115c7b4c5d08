// Agent Control Server
// Local HTTP surface for driving the dictation session from other tools
//
// Endpoints:
//   GET  /health            - Health check
//   GET  /recording/status  - Current session state
//   POST /recording/start   - Start recording (ignored unless idle)
//   POST /recording/stop    - Stop recording and transcribe (ignored unless recording)
//   POST /recording/toggle  - Start or stop
//   GET  /events            - Server-Sent Events stream of session events

import type { Server } from 'node:http';
import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type {
    ControlErrorResponse,
    ControlRoute,
    HealthResponse,
    RecordingControlResponse,
    RecordingStatusResponse,
} from '@pushscribe/contracts';
import type { SessionController } from './session/SessionController.js';
import type { EventStreamManager } from './sse/EventStreamManager.js';
import { AppError, logError } from './utils/errors.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('server');

export const SERVICE_NAME = 'pushscribe-agent';

export type RecordingCommand = 'start' | 'stop' | 'toggle';

const RECORDING_ROUTES: Record<RecordingCommand, ControlRoute> = {
    start: '/recording/start',
    stop: '/recording/stop',
    toggle: '/recording/toggle',
};

const HEALTH_ROUTE: ControlRoute = '/health';
const STATUS_ROUTE: ControlRoute = '/recording/status';
const EVENTS_ROUTE: ControlRoute = '/events';

export type ControlTarget = Pick<
    SessionController,
    'getState' | 'getStatus' | 'startRecording' | 'stopRecording' | 'toggleRecording'
>;

export interface ControlServerDeps {
    controller: ControlTarget;
    events: EventStreamManager;
    isHotkeyListenerActive: () => boolean;
    version: string;
}

export function buildHealth(deps: ControlServerDeps): HealthResponse {
    return {
        status: 'ok',
        service: SERVICE_NAME,
        version: deps.version,
        platform: process.platform,
        backend: deps.controller.getStatus().backend,
        hotkeyListener: deps.isHotkeyListenerActive(),
        timestamp: new Date().toISOString(),
    };
}

export function buildStatus(controller: ControlTarget): RecordingStatusResponse {
    return { ok: true, ...controller.getStatus() };
}

/**
 * Apply a control command. Commands that do not fit the current state are
 * reported as 'ignored', never as errors.
 */
export function applyRecordingCommand(controller: ControlTarget, command: RecordingCommand): RecordingControlResponse {
    switch (command) {
        case 'start': {
            const sessionId = controller.startRecording();
            return sessionId
                ? { ok: true, action: 'started', state: controller.getState(), sessionId }
                : ignored(controller);
        }
        case 'stop': {
            const task = controller.stopRecording();
            return task
                ? { ok: true, action: 'stopped', state: controller.getState(), sessionId: task.sessionId }
                : ignored(controller);
        }
        case 'toggle': {
            const result = controller.toggleRecording();
            if (result.action === 'started') {
                return { ok: true, action: 'started', state: controller.getState(), sessionId: result.sessionId };
            }
            if (result.action === 'stopped') {
                return { ok: true, action: 'stopped', state: controller.getState(), sessionId: result.task.sessionId };
            }
            return ignored(controller);
        }
    }
}

function ignored(controller: ControlTarget): RecordingControlResponse {
    const status = controller.getStatus();
    return { ok: true, action: 'ignored', state: status.state, sessionId: status.sessionId };
}

export function createControlServer(deps: ControlServerDeps): express.Express {
    const app = express();

    // Local tools only; reflect whatever origin asks
    app.use(cors({
        origin: true,
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type'],
    }));

    app.use((req, _res, next) => {
        log.debug(`${req.method} ${req.url}`);
        next();
    });

    app.get(HEALTH_ROUTE, (_req, res) => {
        res.json(buildHealth(deps));
    });

    app.get(STATUS_ROUTE, (_req, res) => {
        res.json(buildStatus(deps.controller));
    });

    const commands: RecordingCommand[] = ['start', 'stop', 'toggle'];
    for (const command of commands) {
        app.post(RECORDING_ROUTES[command], (_req, res) => {
            const response = applyRecordingCommand(deps.controller, command);
            log.info(`${command}: ${response.action} (${response.state})`);
            res.json(response);
        });
    }

    app.get(EVENTS_ROUTE, (req, res) => {
        res.setHeader('Content-Type', 'text/event-stream');
        res.setHeader('Cache-Control', 'no-cache');
        res.setHeader('Connection', 'keep-alive');
        res.setHeader('X-Accel-Buffering', 'no');
        res.flushHeaders();

        const unsubscribe = deps.events.registerClient(res);
        req.on('close', () => {
            unsubscribe();
        });
    });

    app.use((_req, res) => {
        const body: ControlErrorResponse = { ok: false, error: 'Not found', code: 'NOT_FOUND' };
        res.status(404).json(body);
    });

    app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
        logError(error, 'server');
        const body: ControlErrorResponse = {
            ok: false,
            error: error instanceof Error ? error.message : 'Unknown error',
            code: error instanceof AppError ? error.code : 'INTERNAL_ERROR',
        };
        res.status(500).json(body);
    });

    return app;
}

export interface ListenOptions {
    host: string;
    port: number;
}

/**
 * Start listening; rejects if the port cannot be bound
 */
export function startControlServer(app: express.Express, options: ListenOptions): Promise<Server> {
    return new Promise((resolve, reject) => {
        const server = app.listen(options.port, options.host);
        server.once('error', (error) => {
            reject(new AppError(`Control server failed to listen on ${options.host}:${options.port}: ${error.message}`, 'SERVER_ERROR', true, undefined, { cause: error }));
        });
        server.once('listening', () => {
            log.info(`Server listening on http://${options.host}:${options.port}`);
            resolve(server);
        });
    });
}

export function closeControlServer(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close((error) => {
            if (error) {
                reject(error);
                return;
            }
            log.info('Server closed');
            resolve();
        });
    });
}

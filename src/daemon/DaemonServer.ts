/**
 * Daemon Server
 *
 * Long-running process that keeps engine clients warm between sessions and
 * accepts requests over a WebSocket bound to a Unix domain socket.
 */

import { createServer, IncomingMessage, Server as HTTPServer, ServerResponse } from 'http';
import { rm } from 'fs/promises';
import WebSocket, { WebSocketServer } from 'ws';
import { AppConfig, EngineAdapter, LanguageMode, Notifier, TextInjector } from '../types.js';
import { SessionError, describeError } from '../errors.js';
import type { FrameSource } from '../audio/FrameSource.js';
import { probeEngines } from '../engines/index.js';
import { LanguagePreference } from '../services/LanguagePreference.js';
import { SessionLock, withSessionLock } from '../session/SessionLock.js';
import { SessionEvent, TranscriptionSession, sessionOptionsFromConfig } from '../session/TranscriptionSession.js';
import { DaemonRequest, DaemonResponse, completedResponse, parseRequest, rawToString } from './protocol.js';

export interface DaemonServerOptions {
    config: AppConfig;
    engines: EngineAdapter[];
    createFrameSource: () => FrameSource;
    injector: TextInjector;
    notifier: Notifier;
    languages: LanguagePreference;
    lock: SessionLock;
}

export class DaemonServer {
    private readonly options: DaemonServerOptions;
    private readonly httpServer: HTTPServer;
    private readonly wss: WebSocketServer;
    private active: TranscriptionSession | null = null;
    private startedAt: number = 0;

    constructor(options: DaemonServerOptions) {
        this.options = options;
        this.httpServer = createServer((req, res) => this.handleHttp(req, res));
        this.wss = new WebSocketServer({ server: this.httpServer });
        this.wss.on('connection', (ws) => this.handleConnection(ws));
        this.wss.on('error', (error) => {
            console.error(`[Daemon] Server error: ${describeError(error)}`);
        });
    }

    get socketPath(): string {
        return this.options.config.socketPath;
    }

    get sessionActive(): boolean {
        return this.active !== null;
    }

    async start(): Promise<void> {
        // A socket file left by a crashed daemon blocks listen()
        await rm(this.socketPath, { force: true });

        await new Promise<void>((resolve, reject) => {
            this.httpServer.once('error', reject);
            this.httpServer.listen(this.socketPath, () => {
                this.httpServer.off('error', reject);
                resolve();
            });
        });
        this.startedAt = Date.now();
        console.log(`[Daemon] Listening on ${this.socketPath}`);
    }

    /**
     * Stop the running session, if any. Returns whether one was running.
     */
    stopActiveSession(): boolean {
        if (!this.active) {
            return false;
        }
        this.active.stop('external_stop');
        return true;
    }

    async close(): Promise<void> {
        this.stopActiveSession();
        for (const client of this.wss.clients) {
            client.close(1001, 'Daemon shutting down');
        }
        await new Promise<void>((resolve) => this.wss.close(() => resolve()));
        await new Promise<void>((resolve) => this.httpServer.close(() => resolve()));
        await rm(this.socketPath, { force: true });
        console.log('[Daemon] Closed');
    }

    private handleHttp(req: IncomingMessage, res: ServerResponse): void {
        res.setHeader('Content-Type', 'application/json');
        if (req.url === '/health') {
            res.writeHead(200);
            res.end(JSON.stringify({
                status: 'ok',
                uptimeMs: Date.now() - this.startedAt,
                sessionActive: this.sessionActive,
            }));
            return;
        }
        res.writeHead(404);
        res.end(JSON.stringify({ error: 'Not found' }));
    }

    private handleConnection(ws: WebSocket): void {
        // ws emits protocol violations from the peer here; the session goes on
        ws.on('error', (error) => {
            console.error(`[Daemon] Connection error: ${describeError(error)}`);
        });
        ws.once('message', (data: WebSocket.RawData) => {
            const request = parseRequest(rawToString(data));
            if (!request) {
                send(ws, { status: 'error', kind: 'bad_request', message: 'Unrecognised request' });
                ws.close(1008, 'Bad request');
                return;
            }
            void this.handleRequest(ws, request);
        });
    }

    private async handleRequest(ws: WebSocket, request: DaemonRequest): Promise<void> {
        if (this.options.config.debug) {
            console.log(`[Daemon] Request: ${request.command}`);
        }

        try {
            switch (request.command) {
                case 'ping':
                    send(ws, { status: 'alive', pid: process.pid, sessionActive: this.sessionActive });
                    break;

                case 'stop':
                    send(ws, this.stopActiveSession() ? { status: 'stopping' } : { status: 'idle' });
                    break;

                case 'status': {
                    const [engines, language] = await Promise.all([
                        probeEngines(this.options.engines),
                        this.options.languages.get(),
                    ]);
                    send(ws, { status: 'report', language, engines });
                    break;
                }

                case 'transcribe':
                    await this.transcribe(ws, request.language);
                    break;
            }
        } catch (error) {
            const kind = error instanceof SessionError ? error.kind : 'internal';
            console.error(`[Daemon] ${request.command} failed: ${describeError(error)}`);
            send(ws, { status: 'error', kind, message: describeError(error) });
        } finally {
            ws.close(1000, 'Done');
        }
    }

    private async transcribe(ws: WebSocket, language: LanguageMode | undefined): Promise<void> {
        const { config } = this.options;
        const languageMode = language ?? await this.options.languages.get();

        if (this.active) {
            throw new SessionError('already_active', 'A dictation session is already running');
        }

        const session = new TranscriptionSession(
            {
                engines: this.options.engines,
                frames: this.options.createFrameSource(),
                injector: this.options.injector,
                notifier: this.options.notifier,
            },
            sessionOptionsFromConfig(config, languageMode, (event) => send(ws, eventResponse(event)))
        );

        // The requester going away ends the session it asked for
        ws.once('close', () => session.stop('external_stop'));

        this.active = session;
        try {
            const summary = await withSessionLock(this.options.lock, () => session.run());
            send(ws, completedResponse(summary));
        } finally {
            this.active = null;
        }
    }
}

function eventResponse(event: SessionEvent): DaemonResponse {
    switch (event.type) {
        case 'recording':
            return { status: 'recording', sessionId: event.sessionId, engine: event.engine };
        case 'partial':
            return { status: 'partial', sequence: event.sequence, text: event.text };
        case 'phrase':
            return { status: 'phrase', sequence: event.sequence, text: event.text };
        case 'fallback':
            return { status: 'fallback', from: event.from, to: event.to };
    }
}

function send(ws: WebSocket, response: DaemonResponse): void {
    if (ws.readyState === WebSocket.OPEN) {
        ws.send(JSON.stringify(response));
    }
}

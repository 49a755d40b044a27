/**
 * Daemon Client
 *
 * Sends one request to the daemon and yields its responses until the
 * daemon closes the connection.
 */

import WebSocket from 'ws';
import { DaemonRequest, DaemonResponse, parseResponse, rawToString } from './protocol.js';

export class DaemonUnavailableError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'DaemonUnavailableError';
    }
}

export interface DaemonClientOptions {
    connectTimeoutMs?: number;
}

interface ReadState {
    closed: boolean;
    failure: Error | null;
    wake: (() => void) | null;
}

export class DaemonClient {
    readonly socketPath: string;
    private readonly connectTimeoutMs: number;

    constructor(socketPath: string, options: DaemonClientOptions = {}) {
        this.socketPath = socketPath;
        this.connectTimeoutMs = options.connectTimeoutMs ?? 1000;
    }

    async *request(request: DaemonRequest): AsyncGenerator<DaemonResponse> {
        const ws = await this.connect();
        const queue: DaemonResponse[] = [];
        const state: ReadState = { closed: false, failure: null, wake: null };

        const wake = (): void => {
            const resolve = state.wake;
            state.wake = null;
            resolve?.();
        };

        ws.on('message', (data: WebSocket.RawData) => {
            const response = parseResponse(rawToString(data));
            if (response) {
                queue.push(response);
            } else {
                console.warn('[DaemonClient] Ignoring unrecognised response');
            }
            wake();
        });
        ws.on('close', () => {
            state.closed = true;
            wake();
        });
        ws.on('error', (error) => {
            state.failure = error;
            state.closed = true;
            wake();
        });

        ws.send(JSON.stringify(request));

        try {
            for (;;) {
                const next = queue.shift();
                if (next) {
                    yield next;
                    continue;
                }
                if (state.closed) break;
                await new Promise<void>(resolve => {
                    state.wake = resolve;
                });
            }
            if (state.failure) {
                throw state.failure;
            }
        } finally {
            if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
                ws.close(1000, 'Client done');
            }
        }
    }

    /**
     * The daemon's alive answer, or null when no daemon is listening.
     */
    async ping(): Promise<Extract<DaemonResponse, { status: 'alive' }> | null> {
        try {
            for await (const response of this.request({ command: 'ping' })) {
                if (response.status === 'alive') {
                    return response;
                }
            }
        } catch (error) {
            if (error instanceof DaemonUnavailableError) {
                return null;
            }
            throw error;
        }
        return null;
    }

    private connect(): Promise<WebSocket> {
        return new Promise((resolve, reject) => {
            const ws = new WebSocket(`ws+unix://${this.socketPath}`);

            const timer = setTimeout(() => {
                ws.terminate();
                reject(new DaemonUnavailableError(`Daemon at ${this.socketPath} did not answer`));
            }, this.connectTimeoutMs);

            ws.once('open', () => {
                clearTimeout(timer);
                ws.removeAllListeners('error');
                resolve(ws);
            });

            ws.once('error', (error) => {
                clearTimeout(timer);
                reject(new DaemonUnavailableError(`No daemon at ${this.socketPath}: ${error.message}`, { cause: error }));
            });
        });
    }
}

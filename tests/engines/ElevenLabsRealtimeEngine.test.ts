import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createServer, Server } from 'http';
import type { Duplex } from 'stream';
import { ElevenLabsRealtimeEngine } from '../../src/engines/ElevenLabsRealtimeEngine.js';
import { makeChunk } from '../helpers.js';

const CLOSED_WHILE_CONNECTING = '[ElevenLabsRealtime] Ignoring error after close: WebSocket was closed before the connection was established';

describe('ElevenLabsRealtimeEngine handshake failures', () => {
    let server: Server;
    let sockets: Duplex[];
    let baseUrl: string;
    let answer: 'reject' | 'hang';

    beforeEach(async () => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);

        sockets = [];
        answer = 'reject';
        server = createServer();
        server.on('upgrade', (_req, socket: Duplex) => {
            sockets.push(socket);
            if (answer === 'reject') {
                socket.end('HTTP/1.1 401 Unauthorized\r\nContent-Length: 0\r\nConnection: close\r\n\r\n');
            }
        });
        await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
        const address = server.address();
        if (address === null || typeof address === 'string') {
            throw new Error('Test server has no TCP address');
        }
        baseUrl = `ws://127.0.0.1:${address.port}`;
    });

    afterEach(async () => {
        for (const socket of sockets) {
            socket.destroy();
        }
        await new Promise<void>((resolve) => server.close(() => resolve()));
        vi.restoreAllMocks();
    });

    function engine(): ElevenLabsRealtimeEngine {
        return new ElevenLabsRealtimeEngine({
            apiKey: 'test-secret',
            model: 'test-model',
            baseUrl,
            timeoutMs: 1000,
            probeTimeoutMs: 100,
            debug: true,
        });
    }

    it('reports a rejected upgrade as auth_invalid and absorbs the closing error', async () => {
        const result = await engine().probe();

        expect(result).toMatchObject({ ok: false, error: { kind: 'auth_invalid', message: 'Handshake rejected with HTTP 401' } });
        await vi.waitFor(() => {
            expect(console.log).toHaveBeenCalledWith(CLOSED_WHILE_CONNECTING);
        });
    });

    it('times out a handshake that never completes', async () => {
        answer = 'hang';

        const result = await engine().probe();

        expect(result).toMatchObject({ ok: false, error: { kind: 'timeout' } });
        await vi.waitFor(() => {
            expect(console.log).toHaveBeenCalledWith(CLOSED_WHILE_CONNECTING);
        });
    });

    it('gives up the handshake when the caller aborts', async () => {
        answer = 'hang';
        const controller = new AbortController();
        setTimeout(() => controller.abort(), 50);

        await expect(engine().transcribe(makeChunk(0), 'auto', { signal: controller.signal }))
            .rejects.toMatchObject({ kind: 'timeout' });
        await vi.waitFor(() => {
            expect(console.log).toHaveBeenCalledWith(CLOSED_WHILE_CONNECTING);
        });
    });
});

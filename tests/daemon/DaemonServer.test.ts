import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { existsSync } from 'fs';
import { connect } from 'net';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig } from '../../src/config.js';
import { DaemonClient } from '../../src/daemon/DaemonClient.js';
import { DaemonResponse } from '../../src/daemon/protocol.js';
import { DaemonServer } from '../../src/daemon/DaemonServer.js';
import { LanguagePreference } from '../../src/services/LanguagePreference.js';
import { SessionLock } from '../../src/session/SessionLock.js';
import { ArrayFrameSource, FakeEngine, RecordingInjector, RecordingNotifier, framesFor } from '../helpers.js';

async function collect(responses: AsyncIterable<DaemonResponse>): Promise<DaemonResponse[]> {
    const all: DaemonResponse[] = [];
    for await (const response of responses) {
        all.push(response);
    }
    return all;
}

describe('DaemonServer', () => {
    let dir: string;
    let server: DaemonServer;
    let client: DaemonClient;
    let injector: RecordingInjector;
    let lockPath: string;
    let socketPath: string;

    beforeEach(async () => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);

        dir = await mkdtemp(join(tmpdir(), 'dictd-'));
        lockPath = join(dir, 'session.pid');
        const config = loadConfig({ SOCKET_PATH: join(dir, 'd.sock'), LOCK_PATH: lockPath, STATE_DIR: dir });
        injector = new RecordingInjector();

        server = new DaemonServer({
            config,
            engines: [new FakeEngine('deepgram', 'Deepgram')],
            createFrameSource: () => new ArrayFrameSource(framesFor([
                ['speech', 3000],
                ['silence', 2000],
                ['speech', 2000],
                ['silence', 5000],
            ])),
            injector,
            notifier: new RecordingNotifier(),
            languages: new LanguagePreference(dir),
            lock: new SessionLock(lockPath, { isAlive: (pid) => pid === process.pid || pid === 999999 }),
        });
        await server.start();
        socketPath = config.socketPath;
        client = new DaemonClient(socketPath);
    });

    afterEach(async () => {
        await server.close();
        vi.restoreAllMocks();
        await rm(dir, { recursive: true, force: true });
    });

    it('answers a ping', async () => {
        expect(await client.ping()).toEqual({ status: 'alive', pid: process.pid, sessionActive: false });
    });

    it('reports idle when asked to stop with no session', async () => {
        expect(await collect(client.request({ command: 'stop' }))).toEqual([{ status: 'idle' }]);
    });

    it('reports engine availability and the stored language', async () => {
        expect(await collect(client.request({ command: 'status' }))).toEqual([{
            status: 'report',
            language: 'auto',
            engines: [{ id: 'deepgram', label: 'Deepgram', available: true, latencyMs: 1, error: undefined }],
        }]);
    });

    it('streams a whole session back to the requester', async () => {
        const responses = await collect(client.request({ command: 'transcribe', language: 'en' }));

        expect(responses.map(r => r.status)).toEqual(['recording', 'phrase', 'phrase', 'completed']);
        expect(responses.slice(1)).toEqual([
            { status: 'phrase', sequence: 0, text: 'deepgram:0' },
            { status: 'phrase', sequence: 1, text: 'deepgram:1' },
            { status: 'completed', reason: 'long_silence', chunks: 2, injected: ['deepgram:0', 'deepgram:1'], engine: 'deepgram' },
        ]);
        expect(injector.texts).toEqual(['deepgram:0', 'deepgram:1']);
        expect(existsSync(lockPath)).toBe(false);
        expect(server.sessionActive).toBe(false);
    });

    it('refuses a session while another process holds the lock', async () => {
        await writeFile(lockPath, '999999\n');

        expect(await collect(client.request({ command: 'transcribe' }))).toEqual([{
            status: 'error',
            kind: 'already_active',
            message: 'A dictation session is already running (pid 999999)',
        }]);
        expect(injector.texts).toEqual([]);
    });

    it('survives a peer that sends an invalid frame', async () => {
        const socket = connect(socketPath);
        socket.on('error', () => undefined);
        await new Promise<void>((resolve) => {
            socket.once('data', () => resolve());
            socket.write([
                'GET / HTTP/1.1',
                'Host: localhost',
                'Upgrade: websocket',
                'Connection: Upgrade',
                'Sec-WebSocket-Key: dGhlIHNhbXBsZSBub25jZQ==',
                'Sec-WebSocket-Version: 13',
                '',
                '',
            ].join('\r\n'));
        });

        // FIN with reserved opcode 3, masked, empty payload
        socket.write(Buffer.from([0x83, 0x80, 0, 0, 0, 0]));

        await vi.waitFor(() => {
            expect(console.error).toHaveBeenCalledWith('[Daemon] Connection error: Invalid WebSocket frame: invalid opcode 3');
        });
        socket.destroy();

        expect(await client.ping()).toEqual({ status: 'alive', pid: process.pid, sessionActive: false });
    });
});

describe('DaemonClient', () => {
    it('reads a missing daemon as no answer', async () => {
        const dir = await mkdtemp(join(tmpdir(), 'dictd-'));
        try {
            expect(await new DaemonClient(join(dir, 'absent.sock')).ping()).toBeNull();
        } finally {
            await rm(dir, { recursive: true, force: true });
        }
    });
});

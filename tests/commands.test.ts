import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { existsSync } from 'fs';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig } from '../src/config.js';
import { ExitCode } from '../src/errors.js';
import { CommandContext, USAGE, executeCommand } from '../src/commands.js';
import { DaemonClient } from '../src/daemon/DaemonClient.js';
import { LanguagePreference } from '../src/services/LanguagePreference.js';
import { SessionLock } from '../src/session/SessionLock.js';
import { ArrayFrameSource, FakeEngine, RecordingInjector, RecordingNotifier, framesFor } from './helpers.js';

interface TestContext {
    ctx: CommandContext;
    out: string[];
    err: string[];
    injector: RecordingInjector;
    notifier: RecordingNotifier;
    signals: Array<[number, NodeJS.Signals]>;
    lockPath: string;
}

describe('executeCommand', () => {
    let dir: string;

    beforeEach(async () => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        dir = await mkdtemp(join(tmpdir(), 'dictcmd-'));
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await rm(dir, { recursive: true, force: true });
    });

    function context(options: { engines?: () => FakeEngine[]; isAlive?: (pid: number) => boolean } = {}): TestContext {
        const lockPath = join(dir, 'session.pid');
        const config = loadConfig({ LOCK_PATH: lockPath, SOCKET_PATH: join(dir, 'absent.sock'), STATE_DIR: dir });
        const out: string[] = [];
        const err: string[] = [];
        const injector = new RecordingInjector();
        const notifier = new RecordingNotifier();
        const signals: Array<[number, NodeJS.Signals]> = [];

        const ctx: CommandContext = {
            config,
            out: (line) => out.push(line),
            err: (line) => err.push(line),
            createEngines: options.engines ?? (() => [new FakeEngine('deepgram', 'Deepgram')]),
            createFrameSource: () => new ArrayFrameSource(framesFor([
                ['speech', 3000],
                ['silence', 2000],
                ['speech', 2000],
                ['silence', 5000],
            ])),
            injector,
            notifier,
            languages: new LanguagePreference(dir),
            lock: new SessionLock(lockPath, { isAlive: options.isAlive ?? (() => true) }),
            daemon: new DaemonClient(config.socketPath, { connectTimeoutMs: 500 }),
            sendSignal: (pid, signal) => {
                signals.push([pid, signal]);
            },
        };
        return { ctx, out, err, injector, notifier, signals, lockPath };
    }

    describe('run', () => {
        it('runs a session in-process when no daemon is listening', async () => {
            const { ctx, out, injector, lockPath } = context();

            expect(await executeCommand('run', [], ctx)).toBe(ExitCode.OK);

            expect(out).toEqual([
                '🎤 Recording with deepgram. Pause for a few seconds to finish.',
                '📝 deepgram:0',
                '📝 deepgram:1',
                '✅ Session ended (long_silence): 2 of 2 phrase(s) typed',
            ]);
            expect(injector.texts).toEqual(['deepgram:0', 'deepgram:1']);
            expect(existsSync(lockPath)).toBe(false);
        });

        it('exits 3 while another session holds the lock', async () => {
            const { ctx, err, notifier, injector, lockPath } = context();
            await writeFile(lockPath, '999999\n');

            expect(await executeCommand('run', [], ctx)).toBe(ExitCode.LOCK_CONTENTION);

            expect(err).toEqual(['❌ A dictation session is already running (pid 999999)']);
            expect(notifier.notices).toEqual([
                { message: 'A dictation session is already running (pid 999999)', urgency: 'critical' },
            ]);
            expect(injector.texts).toEqual([]);
            expect(await readFile(lockPath, 'utf-8')).toBe('999999\n');
        });

        it('exits 4 when no engine is available', async () => {
            const { ctx, err, lockPath } = context({
                engines: () => [new FakeEngine('deepgram', 'Deepgram').failProbe('auth_missing')],
            });

            expect(await executeCommand('run', [], ctx)).toBe(ExitCode.NO_ENGINE);

            expect(err).toEqual(['❌ No transcription engine available (deepgram: auth_missing)']);
            expect(existsSync(lockPath)).toBe(false);
        });
    });

    describe('stop', () => {
        it('exits 2 when nothing is running', async () => {
            const { ctx, out, signals, lockPath } = context();

            expect(await executeCommand('stop', [], ctx)).toBe(ExitCode.NO_SESSION);

            expect(out).toEqual(['Nothing to stop']);
            expect(signals).toEqual([]);
            expect(existsSync(lockPath)).toBe(false);
        });

        it('leaves a stale lock untouched', async () => {
            const { ctx, signals, lockPath } = context({ isAlive: () => false });
            await writeFile(lockPath, '4242\n');

            expect(await executeCommand('stop', [], ctx)).toBe(ExitCode.NO_SESSION);

            expect(signals).toEqual([]);
            expect(await readFile(lockPath, 'utf-8')).toBe('4242\n');
        });

        it('signals the live lock owner', async () => {
            const { ctx, out, signals, lockPath } = context();
            await writeFile(lockPath, '4242\n');

            expect(await executeCommand('stop', [], ctx)).toBe(ExitCode.OK);

            expect(signals).toEqual([[4242, 'SIGUSR1']]);
            expect(out).toEqual(['Stopping session (pid 4242)']);
        });
    });

    describe('status', () => {
        it('lists engines in priority order with the language', async () => {
            const { ctx, out } = context({
                engines: () => [
                    new FakeEngine('deepgram', 'Deepgram'),
                    new FakeEngine('elevenlabs', 'ElevenLabs').failProbe('auth_missing'),
                ],
            });

            expect(await executeCommand('status', [], ctx)).toBe(ExitCode.OK);

            expect(out).toEqual([
                '📋 Engines (priority order):',
                '   ✅ Deepgram (1ms)',
                '   ❌ ElevenLabs: auth_missing: elevenlabs unavailable',
                '🌐 Language: auto (Auto-detect)',
            ]);
        });

        it('exits 4 when nothing is available', async () => {
            const { ctx } = context({ engines: () => [new FakeEngine('whisper-cpp').failProbe('unavailable')] });

            expect(await executeCommand('status', [], ctx)).toBe(ExitCode.NO_ENGINE);
        });
    });

    describe('ping', () => {
        it('exits 2 without a daemon', async () => {
            const { ctx, out } = context();

            expect(await executeCommand('ping', [], ctx)).toBe(ExitCode.NO_SESSION);
            expect(out).toEqual(['No daemon running']);
        });
    });

    describe('lang', () => {
        it('shows, sets and validates the language', async () => {
            const { ctx, out, err } = context();

            expect(await executeCommand('lang', [], ctx)).toBe(ExitCode.OK);
            expect(await executeCommand('lang', ['EN'], ctx)).toBe(ExitCode.OK);
            expect(await executeCommand('lang', [], ctx)).toBe(ExitCode.OK);
            expect(await executeCommand('lang', ['xx'], ctx)).toBe(ExitCode.FAILURE);

            expect(out).toEqual([
                'Language: auto (Auto-detect)',
                'Language set to en (English)',
                'Language: en (English)',
            ]);
            expect(err).toEqual(['Unsupported language "xx". Supported: auto, en, cs']);
        });
    });

    describe('help and unknown commands', () => {
        it('prints usage', async () => {
            const { ctx, out } = context();

            expect(await executeCommand(undefined, [], ctx)).toBe(ExitCode.OK);
            expect(await executeCommand('--help', [], ctx)).toBe(ExitCode.OK);
            expect(out).toEqual([USAGE, USAGE]);
        });

        it('exits 1 for an unknown command', async () => {
            const { ctx, err } = context();

            expect(await executeCommand('frobnicate', [], ctx)).toBe(ExitCode.FAILURE);
            expect(err).toEqual(['Unknown command: frobnicate\n', USAGE]);
        });
    });
});

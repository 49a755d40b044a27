import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadConfig } from '../../src/config.js';
import {
    DeepgramEngine,
    ElevenLabsEngine,
    ElevenLabsRealtimeEngine,
    OpenAIWhisperEngine,
    WhisperCppEngine,
    createEngines,
    probeEngines,
} from '../../src/engines/index.js';
import { parseMessage } from '../../src/engines/ElevenLabsRealtimeEngine.js';
import { FakeEngine, makeChunk } from '../helpers.js';

const options = { timeoutMs: 1000, probeTimeoutMs: 1000, model: 'test-model' };

describe('engines without credentials', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it.each([
        ['ElevenLabs', new ElevenLabsEngine(options), 'ELEVENLABS_API_KEY is not set'],
        ['ElevenLabsRealtime', new ElevenLabsRealtimeEngine(options), 'ELEVENLABS_API_KEY is not set'],
        ['Deepgram', new DeepgramEngine(options), 'DEEPGRAM_API_KEY is not set'],
        ['OpenAIWhisper', new OpenAIWhisperEngine(options), 'OPENAI_API_KEY is not set'],
    ])('%s probes as auth_missing', async (_label, engine, message) => {
        const result = await engine.probe();

        expect(result).toEqual({ ok: false, error: expect.objectContaining({ kind: 'auth_missing', message }) });
    });

    it('fails a transcription with auth_missing rather than calling out', async () => {
        const engine = new DeepgramEngine(options);

        await expect(engine.transcribe(makeChunk(0), 'auto')).rejects.toMatchObject({
            kind: 'auth_missing',
            engine: 'deepgram',
        });
    });

    it('reports whisper.cpp without a model as unavailable', async () => {
        const engine = new WhisperCppEngine({ timeoutMs: 1000, probeTimeoutMs: 1000 });

        const result = await engine.probe();

        expect(result).toEqual({
            ok: false,
            error: expect.objectContaining({ kind: 'unavailable', message: 'WHISPER_CPP_MODEL is not set' }),
        });
    });

    it('reports a missing whisper.cpp model file', async () => {
        const engine = new WhisperCppEngine({ timeoutMs: 1000, probeTimeoutMs: 1000, modelPath: '/nonexistent/ggml-base.bin' });

        const result = await engine.probe();

        expect(result).toEqual({
            ok: false,
            error: expect.objectContaining({ kind: 'unavailable', message: 'Model file not found: /nonexistent/ggml-base.bin' }),
        });
    });
});

describe('createEngines', () => {
    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('orders engines by priority and keeps declaration order on ties', () => {
        const config = loadConfig({ ENGINES: 'whisper-cpp:1,deepgram:5,openai-whisper' });

        expect(createEngines(config).map(e => e.id)).toEqual(['deepgram', 'whisper-cpp', 'openai-whisper']);
    });

    it('marks only the realtime engine as streaming', () => {
        const config = loadConfig({ ENGINES: 'elevenlabs-realtime,elevenlabs' });

        expect(createEngines(config).map(e => [e.id, e.streaming])).toEqual([
            ['elevenlabs-realtime', true],
            ['elevenlabs', false],
        ]);
    });
});

describe('probeEngines', () => {
    it('reports every engine in list order', async () => {
        const ready = new FakeEngine('deepgram', 'Deepgram');
        const missing = new FakeEngine('elevenlabs', 'ElevenLabs').failProbe('auth_missing');

        expect(await probeEngines([missing, ready])).toEqual([
            { id: 'elevenlabs', label: 'ElevenLabs', available: false, error: 'auth_missing: elevenlabs unavailable' },
            { id: 'deepgram', label: 'Deepgram', available: true, latencyMs: 1 },
        ]);
    });
});

describe('parseMessage', () => {
    it('reads realtime transcript messages', () => {
        expect(parseMessage(Buffer.from(JSON.stringify({ message_type: 'partial_transcript', text: 'hel' })))).toEqual({
            type: 'partial_transcript',
            text: 'hel',
            detail: undefined,
        });
    });

    it('picks up error details', () => {
        expect(parseMessage(Buffer.from(JSON.stringify({ message_type: 'auth_error', error: 'Invalid key' })))).toEqual({
            type: 'auth_error',
            text: '',
            detail: 'Invalid key',
        });
    });

    it('rejects anything without a message type', () => {
        expect(parseMessage(Buffer.from('not json'))).toBeNull();
        expect(parseMessage(Buffer.from('42'))).toBeNull();
        expect(parseMessage(Buffer.from(JSON.stringify({ text: 'orphan' })))).toBeNull();
    });
});

describe('DeepgramEngine cancellation', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        vi.restoreAllMocks();
    });

    it('cancels the HTTP request when the caller aborts', async () => {
        const fetchMock = vi.fn((_input: string | URL | Request, init?: RequestInit) =>
            new Promise<Response>((_resolve, reject) => {
                init?.signal?.addEventListener('abort', () => reject(new Error('request cancelled')));
            })
        );
        vi.stubGlobal('fetch', fetchMock);
        const engine = new DeepgramEngine({ ...options, apiKey: 'test-secret' });
        const controller = new AbortController();

        const pending = engine.transcribe(makeChunk(0), 'en', { signal: controller.signal });
        await vi.waitFor(() => expect(fetchMock).toHaveBeenCalledTimes(1));
        controller.abort();

        await expect(pending).rejects.toMatchObject({ kind: 'timeout' });
        expect(fetchMock.mock.calls[0][1]?.signal?.aborted).toBe(true);
    });
});

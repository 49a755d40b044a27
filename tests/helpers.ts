/**
 * Test doubles shared across suites
 */

import {
    AudioChunk,
    AudioFrame,
    EngineAdapter,
    EngineId,
    EngineTranscript,
    LanguageMode,
    NotificationUrgency,
    Notifier,
    ProbeResult,
    TextInjector,
    TranscribeOptions,
} from '../src/types.js';
import { EngineError, InjectError } from '../src/errors.js';
import type { FrameSource } from '../src/audio/FrameSource.js';

export const SAMPLE_RATE = 16000;
export const FRAME_MS = 100;
export const SPEECH = 1000;
export const SILENCE = 0;

/**
 * PCM16 buffer of a constant sample value; its RMS equals the value.
 */
export function constantPcm(ms: number, value: number, sampleRate: number = SAMPLE_RATE): Buffer {
    const samples = Math.round((ms * sampleRate) / 1000);
    const buffer = Buffer.alloc(samples * 2);
    for (let i = 0; i < samples; i++) {
        buffer.writeInt16LE(value, i * 2);
    }
    return buffer;
}

export type Segment = ['speech' | 'silence', number];

/**
 * Frames of FRAME_MS each for a list of [kind, milliseconds] segments.
 */
export function framesFor(segments: Segment[], frameMs: number = FRAME_MS): AudioFrame[] {
    const frames: AudioFrame[] = [];
    let timestamp = 0;
    for (const [kind, ms] of segments) {
        const count = Math.round(ms / frameMs);
        for (let i = 0; i < count; i++) {
            frames.push({
                timestamp,
                samples: constantPcm(frameMs, kind === 'speech' ? SPEECH : SILENCE),
                sampleRate: SAMPLE_RATE,
            });
            timestamp += frameMs;
        }
    }
    return frames;
}

export function makeChunk(sequence: number, durationMs: number = 2000): AudioChunk {
    return {
        sequence,
        pcm16: constantPcm(durationMs, SPEECH),
        sampleRate: SAMPLE_RATE,
        durationMs,
        startedAtMs: 0,
        final: false,
    };
}

/**
 * Yields a fixed frame list, giving pending callbacks a turn between
 * frames. close() ends the iteration at the next frame.
 */
export class ArrayFrameSource implements FrameSource {
    closed = false;
    delivered = 0;

    constructor(
        private readonly frames: AudioFrame[],
        private readonly options: { failAfter?: number; delayMs?: number } = {}
    ) {}

    close(): void {
        this.closed = true;
    }

    async *[Symbol.asyncIterator](): AsyncGenerator<AudioFrame> {
        for (const frame of this.frames) {
            await pause(this.options.delayMs ?? 0);
            if (this.closed) return;
            if (this.options.failAfter !== undefined && this.delivered >= this.options.failAfter) {
                throw new Error('microphone unplugged');
            }
            this.delivered++;
            yield frame;
        }
    }
}

export function pause(ms: number = 0): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

export interface Deferred<T> {
    promise: Promise<T>;
    resolve: (value: T) => void;
    reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
    let resolve: (value: T) => void = () => undefined;
    let reject: (error: unknown) => void = () => undefined;
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}

type TranscribeHandler = (chunk: AudioChunk, options: TranscribeOptions) => Promise<EngineTranscript>;

/**
 * Scriptable engine. Probes succeed unless told otherwise; transcribe
 * echoes "<id>:<sequence>" unless a handler is set.
 */
export class FakeEngine implements EngineAdapter {
    readonly timeoutMs = 8000;
    readonly streaming = false;
    readonly calls: Array<{ sequence: number; languageMode: LanguageMode }> = [];
    probeCount = 0;
    probeResult: ProbeResult = { ok: true, latencyMs: 1 };
    handler: TranscribeHandler;

    constructor(readonly id: EngineId, readonly label: string = id) {
        this.handler = async (chunk) => ({ text: `${this.id}:${chunk.sequence}` });
    }

    failProbe(kind: EngineError['kind'] = 'auth_missing'): this {
        this.probeResult = { ok: false, error: new EngineError(this.id, kind, `${this.id} unavailable`) };
        return this;
    }

    async probe(): Promise<ProbeResult> {
        this.probeCount++;
        return this.probeResult;
    }

    async transcribe(chunk: AudioChunk, languageMode: LanguageMode, options: TranscribeOptions = {}): Promise<EngineTranscript> {
        this.calls.push({ sequence: chunk.sequence, languageMode });
        return this.handler(chunk, options);
    }
}

export class RecordingInjector implements TextInjector {
    readonly texts: string[] = [];
    readonly events: string[] = [];
    failOn: Set<string> = new Set();
    delayMs: (text: string) => number = () => 0;

    async inject(text: string): Promise<void> {
        this.events.push(`start:${text}`);
        await pause(this.delayMs(text));
        this.events.push(`end:${text}`);
        if (this.failOn.has(text)) {
            throw new InjectError('target_window_lost', 'window went away');
        }
        this.texts.push(text);
    }
}

export class RecordingNotifier implements Notifier {
    readonly notices: Array<{ message: string; urgency: NotificationUrgency }> = [];

    notify(message: string, urgency: NotificationUrgency = 'normal'): void {
        this.notices.push({ message, urgency });
    }

    messages(): string[] {
        return this.notices.map(n => n.message);
    }
}

/**
 * Small deterministic generator for shuffles and latencies
 */
export function seededRandom(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state * 1664525 + 1013904223) >>> 0;
        return state / 0x100000000;
    };
}

export function shuffle<T>(items: T[], random: () => number): T[] {
    const result = [...items];
    for (let i = result.length - 1; i > 0; i--) {
        const j = Math.floor(random() * (i + 1));
        [result[i], result[j]] = [result[j], result[i]];
    }
    return result;
}

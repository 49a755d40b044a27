/**
 * Voice-activity segmenter
 *
 * Turns a frame sequence into phrase chunks and a single session-end event.
 * A short pause (after enough speech) closes a phrase without ending the
 * session; a long pause, the maximum duration or an external stop ends it.
 * All timing is counted in samples, so the output depends only on the frames.
 */

import { AudioChunk, AudioFrame, TerminationReason, VadOptions } from '../types.js';
import { rmsAmplitude, sampleCount } from '../audio/wav.js';

export type SegmenterState = 'idle' | 'in_phrase' | 'short_silence' | 'awaiting_phrase' | 'ended';

export type SegmenterEvent =
    | { type: 'chunk'; chunk: AudioChunk }
    | { type: 'end'; reason: TerminationReason };

export const DEFAULT_VAD_OPTIONS: VadOptions = {
    silenceThreshold: 50,
    shortPauseMs: 1500,
    longPauseMs: 4000,
    minPhraseMs: 2000,
    maxDurationMs: 45000,
};

interface Thresholds {
    shortPause: number;
    longPause: number;
    minPhrase: number;
    maxDuration: number;
}

export class VadSegmenter {
    private readonly options: VadOptions;
    private readonly debug: boolean;

    private _state: SegmenterState = 'idle';
    private sampleRate: number = 0;
    private thresholds: Thresholds | null = null;

    private phraseFrames: Buffer[] = [];
    private phraseSamples: number = 0;
    private phraseStartSample: number = 0;
    private silenceSamples: number = 0;
    private totalSamples: number = 0;
    private nextSequence: number = 0;
    private _endReason: TerminationReason | null = null;

    constructor(options: Partial<VadOptions> = {}, debug: boolean = false) {
        this.options = { ...DEFAULT_VAD_OPTIONS, ...options };
        this.debug = debug;
    }

    get state(): SegmenterState {
        return this._state;
    }

    get endReason(): TerminationReason | null {
        return this._endReason;
    }

    get chunkCount(): number {
        return this.nextSequence;
    }

    get elapsedMs(): number {
        return this.sampleRate > 0 ? (this.totalSamples / this.sampleRate) * 1000 : 0;
    }

    /**
     * Feed one frame. Returns the events it produced, in order.
     * Frames pushed after the session ended are ignored.
     */
    push(frame: AudioFrame): SegmenterEvent[] {
        if (this._state === 'ended') {
            return [];
        }

        const limits = this.resolveThresholds(frame.sampleRate);
        const frameSamples = sampleCount(frame.samples);
        const volume = rmsAmplitude(frame.samples);
        const isSpeech = volume > this.options.silenceThreshold;
        const events: SegmenterEvent[] = [];

        this.totalSamples += frameSamples;

        if (isSpeech) {
            if (this._state === 'idle' || this._state === 'awaiting_phrase') {
                if (this._state === 'idle') {
                    console.log(`[VadSegmenter] Speech detected (volume: ${volume.toFixed(1)})`);
                }
                this.openPhrase(frameSamples);
            }
            this.appendFrame(frame.samples, frameSamples);
            this.silenceSamples = 0;
            this._state = 'in_phrase';
        } else {
            switch (this._state) {
                case 'idle':
                    break;

                case 'in_phrase':
                case 'short_silence':
                    this.appendFrame(frame.samples, frameSamples);
                    this.silenceSamples += frameSamples;
                    this._state = 'short_silence';

                    if (this.silenceSamples >= limits.shortPause && this.phraseSamples >= limits.minPhrase) {
                        const chunk = this.closePhrase(false);
                        console.log(`[VadSegmenter] Phrase boundary detected - sending ${(chunk.durationMs / 1000).toFixed(1)}s audio (#${chunk.sequence})`);
                        events.push({ type: 'chunk', chunk });
                        this._state = 'awaiting_phrase';
                    }
                    break;

                case 'awaiting_phrase':
                    this.silenceSamples += frameSamples;
                    break;
            }

            if (this._state !== 'idle' && this.silenceSamples >= limits.longPause) {
                console.log('[VadSegmenter] Long pause detected - ending session');
                events.push(...this.end('long_silence'));
                return events;
            }
        }

        if (this.debug) {
            console.log(`[VadSegmenter] volume=${volume.toFixed(1)} state=${this._state} silence=${this.silenceSamples} total=${this.totalSamples}`);
        }

        if (this.totalSamples >= limits.maxDuration) {
            console.log(`[VadSegmenter] Maximum duration reached (${(this.elapsedMs / 1000).toFixed(1)}s)`);
            events.push(...this.end('max_duration'));
        }

        return events;
    }

    /**
     * End the session from outside (stop signal, source failure).
     * Any open phrase is flushed as a final chunk.
     */
    stop(reason: TerminationReason = 'external_stop'): SegmenterEvent[] {
        if (this._state === 'ended') {
            return [];
        }
        console.log(`[VadSegmenter] Stopped (${reason})`);
        return this.end(reason);
    }

    private end(reason: TerminationReason): SegmenterEvent[] {
        const events: SegmenterEvent[] = [];
        if (this.phraseFrames.length > 0) {
            const chunk = this.closePhrase(true);
            console.log(`[VadSegmenter] Final phrase - sending ${(chunk.durationMs / 1000).toFixed(1)}s audio (#${chunk.sequence})`);
            events.push({ type: 'chunk', chunk });
        }
        this._state = 'ended';
        this._endReason = reason;
        events.push({ type: 'end', reason });
        return events;
    }

    private openPhrase(firstFrameSamples: number): void {
        this.phraseFrames = [];
        this.phraseSamples = 0;
        this.phraseStartSample = this.totalSamples - firstFrameSamples;
    }

    private appendFrame(samples: Buffer, frameSamples: number): void {
        this.phraseFrames.push(samples);
        this.phraseSamples += frameSamples;
    }

    private closePhrase(final: boolean): AudioChunk {
        const chunk: AudioChunk = {
            sequence: this.nextSequence++,
            pcm16: Buffer.concat(this.phraseFrames),
            sampleRate: this.sampleRate,
            durationMs: (this.phraseSamples / this.sampleRate) * 1000,
            startedAtMs: (this.phraseStartSample / this.sampleRate) * 1000,
            final,
        };
        this.phraseFrames = [];
        this.phraseSamples = 0;
        return chunk;
    }

    private resolveThresholds(sampleRate: number): Thresholds {
        if (this.thresholds && this.sampleRate === sampleRate) {
            return this.thresholds;
        }
        if (this.thresholds) {
            throw new Error(`Sample rate changed mid-session (${this.sampleRate} -> ${sampleRate})`);
        }
        const toSamples = (ms: number) => Math.round((ms * sampleRate) / 1000);
        this.sampleRate = sampleRate;
        this.thresholds = {
            shortPause: toSamples(this.options.shortPauseMs),
            longPause: toSamples(this.options.longPauseMs),
            minPhrase: toSamples(this.options.minPhraseMs),
            maxDuration: toSamples(this.options.maxDurationMs),
        };
        return this.thresholds;
    }
}

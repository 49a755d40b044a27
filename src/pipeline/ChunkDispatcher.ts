/**
 * Chunk Dispatcher
 *
 * Runs transcription calls concurrently without ever blocking the audio
 * loop. Every dispatched chunk produces exactly one result: the engine's,
 * a deadline failure, or an overflow failure when the queue is full.
 */

import { AudioChunk, TranscriptionResult } from '../types.js';
import { describeError } from '../errors.js';

/**
 * restartDeadline gives the call a fresh deadline, for when it moves on
 * to another engine.
 */
export type TranscribeFn = (
    chunk: AudioChunk,
    signal: AbortSignal,
    restartDeadline: () => void
) => Promise<TranscriptionResult>;
export type SubmitFn = (result: TranscriptionResult) => void;

export interface ChunkDispatcherOptions {
    maxInFlight: number;
    maxQueued: number;
    deadlineMs: number;
    debug?: boolean;
}

interface InFlightCall {
    controller: AbortController;
    timer: NodeJS.Timeout;
    settled: boolean;
}

export class ChunkDispatcher {
    private readonly transcribe: TranscribeFn;
    private readonly submit: SubmitFn;
    private readonly options: ChunkDispatcherOptions;

    private queue: AudioChunk[] = [];
    private inFlight: Map<number, InFlightCall> = new Map();
    private outstanding: number = 0;
    private idleWaiters: Array<() => void> = [];
    private abandoned: boolean = false;

    constructor(transcribe: TranscribeFn, submit: SubmitFn, options: ChunkDispatcherOptions) {
        this.transcribe = transcribe;
        this.submit = submit;
        this.options = options;
    }

    get pending(): number {
        return this.outstanding;
    }

    get activeCalls(): number {
        return this.inFlight.size;
    }

    get queued(): number {
        return this.queue.length;
    }

    dispatch(chunk: AudioChunk): void {
        if (this.abandoned) {
            console.log(`[Dispatcher] Ignoring chunk #${chunk.sequence}: dispatcher abandoned`);
            return;
        }

        this.outstanding++;

        if (this.inFlight.size < this.options.maxInFlight) {
            this.start(chunk);
        } else if (this.queue.length >= this.options.maxQueued) {
            console.warn(`[Dispatcher] Queue full (${this.queue.length}), giving up on chunk #${chunk.sequence}`);
            this.deliver(failed(chunk.sequence));
        } else {
            this.queue.push(chunk);
        }
    }

    /**
     * Resolves once every dispatched chunk has produced a result.
     */
    drain(): Promise<void> {
        if (this.outstanding === 0) {
            return Promise.resolve();
        }
        return new Promise(resolve => this.idleWaiters.push(resolve));
    }

    /**
     * Abort in-flight calls, drop the queue and discard anything that
     * completes afterwards.
     */
    abandon(): void {
        if (this.abandoned) return;
        this.abandoned = true;

        for (const [sequence, call] of this.inFlight) {
            call.settled = true;
            clearTimeout(call.timer);
            call.controller.abort();
            console.log(`[Dispatcher] Abandoned chunk #${sequence}`);
        }
        this.inFlight.clear();
        this.queue = [];
        this.outstanding = 0;
        this.wakeIdleWaiters();
    }

    private start(chunk: AudioChunk): void {
        const call: InFlightCall = {
            controller: new AbortController(),
            timer: this.armDeadline(chunk, () => call),
            settled: false,
        };

        this.inFlight.set(chunk.sequence, call);
        void this.run(chunk, call);
    }

    private armDeadline(chunk: AudioChunk, getCall: () => InFlightCall): NodeJS.Timeout {
        return setTimeout(() => {
            const call = getCall();
            console.warn(`[Dispatcher] Chunk #${chunk.sequence} exceeded ${this.options.deadlineMs}ms, treating as lost`);
            call.controller.abort();
            this.finish(chunk.sequence, call, failed(chunk.sequence));
        }, this.options.deadlineMs);
    }

    private async run(chunk: AudioChunk, call: InFlightCall): Promise<void> {
        const restartDeadline = (): void => {
            if (call.settled) return;
            clearTimeout(call.timer);
            call.timer = this.armDeadline(chunk, () => call);
            if (this.options.debug) {
                console.log(`[Dispatcher] Deadline restarted for chunk #${chunk.sequence}`);
            }
        };

        let result: TranscriptionResult;
        try {
            result = await this.transcribe(chunk, call.controller.signal, restartDeadline);
        } catch (error) {
            console.error(`[Dispatcher] Transcription of chunk #${chunk.sequence} threw: ${describeError(error)}`);
            result = failed(chunk.sequence);
        }
        this.finish(chunk.sequence, call, result);
    }

    /**
     * First result for a call wins; a real result arriving after the
     * deadline failure is dropped.
     */
    private finish(sequence: number, call: InFlightCall, result: TranscriptionResult): void {
        if (call.settled) {
            console.log(`[Dispatcher] Discarding late result for chunk #${sequence}`);
            return;
        }
        call.settled = true;
        clearTimeout(call.timer);
        this.inFlight.delete(sequence);

        this.deliver(result);

        const next = this.queue.shift();
        if (next) {
            this.start(next);
        }
    }

    private deliver(result: TranscriptionResult): void {
        if (this.abandoned) {
            return;
        }
        this.outstanding--;
        this.submit(result);
        if (this.outstanding === 0) {
            this.wakeIdleWaiters();
        }
    }

    private wakeIdleWaiters(): void {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) {
            resolve();
        }
    }
}

function failed(sequence: number): TranscriptionResult {
    return { sequence, text: '', success: false };
}

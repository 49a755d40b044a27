/**
 * Transcription Session
 *
 * One recording-to-completion run: selects an engine, reads frames into the
 * segmenter, dispatches phrase chunks and injects their text in order as
 * they come back.
 */

import { randomUUID } from 'crypto';
import {
    AppConfig,
    EngineAdapter,
    EngineId,
    LanguageMode,
    Notifier,
    Session,
    SessionSummary,
    TerminationReason,
    TextInjector,
    VadOptions,
} from '../types.js';
import { describeError } from '../errors.js';
import type { FrameSource } from '../audio/FrameSource.js';
import { VadSegmenter, SegmenterEvent } from '../vad/VadSegmenter.js';
import { EngineSelector } from '../pipeline/EngineSelector.js';
import { ChunkDispatcher } from '../pipeline/ChunkDispatcher.js';
import { OrderedInjectionPipeline } from '../pipeline/OrderedInjectionPipeline.js';

export type SessionEvent =
    | { type: 'recording'; sessionId: string; engine: EngineId }
    | { type: 'partial'; sequence: number; text: string }
    | { type: 'phrase'; sequence: number; text: string }
    | { type: 'fallback'; from: EngineId; to: EngineId };

export interface SessionDependencies {
    engines: EngineAdapter[];
    frames: FrameSource;
    injector: TextInjector;
    notifier: Notifier;
    sleep?: (ms: number) => Promise<void>;
}

export interface SessionOptions {
    languageMode: LanguageMode;
    vad: VadOptions;
    failureThreshold: number;
    rateLimitRetries: number;
    rateLimitBackoffMs: number;
    maxInFlight: number;
    maxQueuedChunks: number;
    chunkDeadlineMs: number;
    debug?: boolean;
    onEvent?: (event: SessionEvent) => void;
}

export function sessionOptionsFromConfig(
    config: AppConfig,
    languageMode: LanguageMode,
    onEvent?: (event: SessionEvent) => void
): SessionOptions {
    return {
        languageMode,
        vad: config.vad,
        failureThreshold: config.failureThreshold,
        rateLimitRetries: config.rateLimitRetries,
        rateLimitBackoffMs: config.rateLimitBackoffMs,
        maxInFlight: config.maxInFlight,
        maxQueuedChunks: config.maxQueuedChunks,
        chunkDeadlineMs: config.chunkDeadlineMs,
        debug: config.debug,
        onEvent,
    };
}

export class TranscriptionSession {
    readonly session: Session;

    private readonly deps: SessionDependencies;
    private readonly options: SessionOptions;
    private stopReason: TerminationReason | null = null;

    constructor(deps: SessionDependencies, options: SessionOptions) {
        this.deps = deps;
        this.options = options;
        this.session = {
            id: randomUUID(),
            startedAt: Date.now(),
            languageMode: options.languageMode,
            engine: null,
            nextSequence: 0,
            terminationReason: null,
        };
    }

    /**
     * Ask a running session to end. Safe to call at any time.
     */
    stop(reason: TerminationReason = 'external_stop'): void {
        if (this.stopReason || this.session.terminationReason) {
            return;
        }
        console.log(`[Session] Stop requested (${reason})`);
        this.stopReason = reason;
        this.deps.frames.close();
    }

    /**
     * Run the session to its end. Rejects with SessionError
     * ('no_engine_available') before any audio is read.
     */
    async run(): Promise<SessionSummary> {
        const { frames, notifier } = this.deps;
        const { options, session } = this;

        const selector = new EngineSelector(this.deps.engines, {
            failureThreshold: options.failureThreshold,
            rateLimitRetries: options.rateLimitRetries,
            rateLimitBackoffMs: options.rateLimitBackoffMs,
            notifier,
            sleep: this.deps.sleep,
            onExhausted: () => this.stop('error'),
        });

        let engine: EngineAdapter;
        try {
            engine = await selector.start();
        } catch (error) {
            frames.close();
            throw error;
        }
        session.engine = engine.id;

        console.log(`[Session] ${session.id} started on ${engine.label} (language: ${session.languageMode})`);
        notifier.notify(`Recording... speak now (${engine.label})`, 'low');
        this.emit({ type: 'recording', sessionId: session.id, engine: engine.id });

        const pipeline = new OrderedInjectionPipeline(this.deps.injector, {
            debug: options.debug,
            onInjected: (sequence, text) => this.emit({ type: 'phrase', sequence, text }),
        });

        let transitionsSeen = 0;
        const dispatcher = new ChunkDispatcher(
            (chunk, signal, restartDeadline) => selector.transcribe(chunk, session.languageMode, {
                signal,
                onPartial: (text) => this.emit({ type: 'partial', sequence: chunk.sequence, text }),
                onFallback: restartDeadline,
            }),
            (result) => {
                const { transitions, current } = selector.status();
                for (; transitionsSeen < transitions.length; transitionsSeen++) {
                    this.emit({ type: 'fallback', ...transitions[transitionsSeen] });
                }
                session.engine = current ?? session.engine;
                pipeline.submit(result);
            },
            {
                maxInFlight: options.maxInFlight,
                maxQueued: options.maxQueuedChunks,
                deadlineMs: options.chunkDeadlineMs,
                debug: options.debug,
            }
        );

        const segmenter = new VadSegmenter(options.vad, options.debug);
        const handle = (events: SegmenterEvent[]): TerminationReason | null => {
            let ended: TerminationReason | null = null;
            for (const event of events) {
                if (event.type === 'chunk') {
                    session.nextSequence = event.chunk.sequence + 1;
                    notifier.notify(`Processing phrase ${event.chunk.sequence + 1}...`, 'low');
                    dispatcher.dispatch(event.chunk);
                } else {
                    ended = event.reason;
                }
            }
            return ended;
        };

        let endReason: TerminationReason | null = null;
        try {
            for await (const frame of frames) {
                if (this.stopReason) break;
                endReason = handle(segmenter.push(frame));
                if (endReason) break;
            }
        } catch (error) {
            console.error(`[Session] Audio capture failed: ${describeError(error)}`);
            this.stopReason ??= 'error';
        } finally {
            frames.close();
        }

        if (!endReason) {
            endReason = handle(segmenter.stop(this.stopReason ?? 'external_stop'));
        }
        const reason: TerminationReason = endReason ?? 'external_stop';

        if (reason === 'long_silence' || reason === 'max_duration') {
            await dispatcher.drain();
        } else {
            dispatcher.abandon();
            pipeline.close();
        }
        await pipeline.flush();

        session.terminationReason = reason;
        const status = selector.status();
        const summary: SessionSummary = {
            sessionId: session.id,
            reason,
            chunks: segmenter.chunkCount,
            injected: [...pipeline.released],
            engine: status.current ?? session.engine,
            fallbacks: status.transitions,
            durationMs: Date.now() - session.startedAt,
        };

        console.log(`[Session] ${session.id} ended (${reason}): ${summary.chunks} chunk(s), ${summary.injected.length} injected`);
        notifier.notify(endNotice(reason, summary.injected.length), reason === 'error' ? 'critical' : 'low');
        return summary;
    }

    private emit(event: SessionEvent): void {
        this.options.onEvent?.(event);
    }
}

function endNotice(reason: TerminationReason, injected: number): string {
    switch (reason) {
        case 'error':
            return 'Transcription failed';
        case 'external_stop':
            return 'Recording stopped';
        default:
            return injected > 0 ? `Transcription complete (${injected} phrase${injected === 1 ? '' : 's'})` : 'No speech transcribed';
    }
}

/**
 * Engine Selector
 *
 * Picks the session's engine at start-up and fails over to the next one
 * when the current engine keeps failing. Demotion is sticky for the
 * session: a demoted engine is never tried again.
 */

import {
    AudioChunk,
    EngineAdapter,
    EngineId,
    EngineState,
    EngineTranscript,
    LanguageMode,
    Notifier,
    TranscribeOptions,
    TranscriptionResult,
} from '../types.js';
import { EngineError, SessionError, describeError } from '../errors.js';

export interface EngineSelectorOptions {
    failureThreshold: number;
    rateLimitRetries: number;
    rateLimitBackoffMs: number;
    notifier?: Notifier;
    onExhausted?: (lastError: EngineError | null) => void;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface SelectorCallOptions extends TranscribeOptions {
    /** Called when the chunk is about to be handed to the next engine. */
    onFallback?: () => void;
}

/**
 * Resolves after ms, or as soon as the signal aborts.
 */
function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve) => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const done = (): void => {
            clearTimeout(timer);
            signal?.removeEventListener('abort', done);
            resolve();
        };
        const timer = setTimeout(done, ms);
        signal?.addEventListener('abort', done, { once: true });
    });
}

export class EngineSelector {
    private readonly engines: EngineAdapter[];
    private readonly options: EngineSelectorOptions;
    private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

    private current: EngineAdapter | null = null;
    private failed: Set<EngineId> = new Set();
    private consecutiveFailures: number = 0;
    private transitions: Array<{ from: EngineId; to: EngineId }> = [];
    private noticed: Set<string> = new Set();
    private exhausted: boolean = false;
    private lastError: EngineError | null = null;
    private promotion: Promise<EngineAdapter | null> | null = null;

    /**
     * @param engines candidates in priority order, highest first
     */
    constructor(engines: EngineAdapter[], options: EngineSelectorOptions) {
        this.engines = engines;
        this.options = options;
        this.sleep = options.sleep ?? defaultSleep;
    }

    get currentEngine(): EngineId | null {
        return this.current?.id ?? null;
    }

    get isExhausted(): boolean {
        return this.exhausted;
    }

    /**
     * Probe candidates in order and settle on the first available one.
     * Rejects with SessionError('no_engine_available') when none answers.
     */
    async start(): Promise<EngineAdapter> {
        this.current = null;
        this.failed.clear();
        this.consecutiveFailures = 0;
        this.transitions = [];
        this.noticed.clear();
        this.exhausted = false;
        this.lastError = null;
        this.promotion = null;

        const reasons: string[] = [];
        for (const engine of this.engines) {
            const probe = await engine.probe();
            if (probe.ok) {
                this.current = engine;
                console.log(`[EngineSelector] Using ${engine.label}`);
                return engine;
            }
            this.failed.add(engine.id);
            reasons.push(`${engine.id}: ${probe.error.kind}`);
        }

        this.exhausted = true;
        const detail = reasons.length > 0 ? ` (${reasons.join(', ')})` : '';
        throw new SessionError('no_engine_available', `No transcription engine available${detail}`);
    }

    /**
     * Transcribe one chunk on the current engine. Never rejects; failures
     * come back as a result with success=false.
     */
    async transcribe(
        chunk: AudioChunk,
        languageMode: LanguageMode,
        options: SelectorCallOptions = {}
    ): Promise<TranscriptionResult> {
        let engine = await this.activeEngine();
        let retried = false;

        while (engine) {
            try {
                const transcript = await this.callEngine(engine, chunk, languageMode, options);
                if (engine === this.current) {
                    this.consecutiveFailures = 0;
                }
                return this.success(chunk, engine, transcript);
            } catch (error) {
                const engineError = toEngineError(engine.id, error);
                this.lastError = engineError;

                if (options.signal?.aborted) {
                    return this.failure(chunk, engineError);
                }

                let next: EngineAdapter | null;
                if (this.failed.has(engine.id)) {
                    // Demoted by a concurrent failure while this call was in flight
                    if (!retried) options.onFallback?.();
                    next = await this.activeEngine();
                } else {
                    this.consecutiveFailures++;
                    console.warn(`[EngineSelector] ${engine.label} failed on chunk #${chunk.sequence} (${engineError.kind}): ${engineError.message}`);
                    if (this.consecutiveFailures < this.options.failureThreshold) {
                        return this.failure(chunk, engineError);
                    }
                    if (!retried) options.onFallback?.();
                    next = await this.demote(engine);
                }

                if (options.signal?.aborted) {
                    return this.failure(chunk, engineError);
                }

                if (!next || retried) {
                    return this.failure(chunk, engineError);
                }
                console.log(`[EngineSelector] Retrying chunk #${chunk.sequence} on ${next.label}`);
                retried = true;
                engine = next;
            }
        }

        return this.failure(chunk, this.lastError);
    }

    status(): EngineState {
        return {
            current: this.currentEngine,
            failed: [...this.failed],
            consecutiveFailures: this.consecutiveFailures,
            transitions: [...this.transitions],
            exhausted: this.exhausted,
        };
    }

    private async activeEngine(): Promise<EngineAdapter | null> {
        if (this.promotion) {
            return this.promotion;
        }
        return this.exhausted ? null : this.current;
    }

    private async callEngine(
        engine: EngineAdapter,
        chunk: AudioChunk,
        languageMode: LanguageMode,
        options: TranscribeOptions
    ): Promise<EngineTranscript> {
        for (let attempt = 0; ; attempt++) {
            try {
                return await engine.transcribe(chunk, languageMode, options);
            } catch (error) {
                const engineError = toEngineError(engine.id, error);
                const canRetry = engineError.kind === 'rate_limited'
                    && attempt < this.options.rateLimitRetries
                    && !options.signal?.aborted;
                if (!canRetry) {
                    throw engineError;
                }
                console.log(`[EngineSelector] ${engine.label} rate limited, retrying in ${this.options.rateLimitBackoffMs}ms (${attempt + 1}/${this.options.rateLimitRetries})`);
                await this.sleep(this.options.rateLimitBackoffMs, options.signal);
                if (options.signal?.aborted) {
                    throw engineError;
                }
            }
        }
    }

    private demote(engine: EngineAdapter): Promise<EngineAdapter | null> {
        this.failed.add(engine.id);
        this.current = null;
        this.consecutiveFailures = 0;
        console.warn(`[EngineSelector] Demoting ${engine.label}`);

        const promotion = this.promoteNext(engine).then((next) => {
            if (this.promotion === promotion) {
                this.promotion = null;
            }
            return next;
        });
        this.promotion = promotion;
        return promotion;
    }

    private async promoteNext(from: EngineAdapter): Promise<EngineAdapter | null> {
        for (const candidate of this.engines) {
            if (this.failed.has(candidate.id)) {
                continue;
            }
            const probe = await candidate.probe();
            if (probe.ok) {
                this.current = candidate;
                this.recordTransition(from, candidate);
                return candidate;
            }
            this.failed.add(candidate.id);
        }

        this.exhausted = true;
        console.error('[EngineSelector] No transcription engine left');
        this.options.onExhausted?.(this.lastError);
        return null;
    }

    private recordTransition(from: EngineAdapter, to: EngineAdapter): void {
        this.transitions.push({ from: from.id, to: to.id });
        console.log(`[EngineSelector] Switched ${from.label} -> ${to.label}`);

        const key = `${from.id}->${to.id}`;
        if (!this.noticed.has(key)) {
            this.noticed.add(key);
            this.options.notifier?.notify(`${from.label} failed, switched to ${to.label}`, 'normal');
        }
    }

    private success(chunk: AudioChunk, engine: EngineAdapter, transcript: EngineTranscript): TranscriptionResult {
        return {
            sequence: chunk.sequence,
            text: transcript.text,
            language: transcript.language,
            engine: engine.id,
            success: true,
        };
    }

    private failure(chunk: AudioChunk, error: EngineError | null): TranscriptionResult {
        return {
            sequence: chunk.sequence,
            text: '',
            engine: error?.engine,
            success: false,
            error: error ?? undefined,
        };
    }
}

function toEngineError(engine: EngineId, error: unknown): EngineError {
    if (error instanceof EngineError) {
        return error;
    }
    return new EngineError(engine, 'network_unreachable', describeError(error), { cause: error });
}

/**
 * Base class for transcription engines
 *
 * Handles what every backend shares: the per-call timeout, the short-clip
 * shortcut, language mapping and translation of library errors into
 * EngineError. Subclasses only talk to their API.
 */

import {
    AudioChunk,
    EngineAdapter,
    EngineId,
    EngineTranscript,
    LanguageMode,
    ProbeResult,
    TranscribeOptions,
} from '../types.js';
import { EngineError, EngineErrorKind, describeError } from '../errors.js';

/** Clips shorter than this are not worth a call. */
export const MIN_TRANSCRIBE_MS = 500;

export interface BaseEngineOptions {
    timeoutMs: number;
    probeTimeoutMs: number;
    debug?: boolean;
}

export abstract class BaseEngine implements EngineAdapter {
    abstract readonly id: EngineId;
    abstract readonly label: string;
    readonly streaming: boolean = false;
    readonly timeoutMs: number;

    protected readonly probeTimeoutMs: number;
    protected readonly debug: boolean;

    constructor(options: BaseEngineOptions) {
        this.timeoutMs = options.timeoutMs;
        this.probeTimeoutMs = options.probeTimeoutMs;
        this.debug = options.debug ?? false;
    }

    /**
     * Check that the backend is reachable and the credentials work.
     * Never rejects.
     */
    async probe(): Promise<ProbeResult> {
        const startedAt = Date.now();
        try {
            await this.runWithDeadline(this.probeTimeoutMs, undefined, (signal) => this.checkAvailability(signal));
            const latencyMs = Date.now() - startedAt;
            console.log(`[${this.label}] Available (${latencyMs}ms)`);
            return { ok: true, latencyMs };
        } catch (error) {
            const engineError = this.toEngineError(error);
            console.warn(`[${this.label}] Probe failed (${engineError.kind}): ${engineError.message}`);
            return { ok: false, error: engineError };
        }
    }

    async transcribe(
        chunk: AudioChunk,
        languageMode: LanguageMode,
        options: TranscribeOptions = {}
    ): Promise<EngineTranscript> {
        if (chunk.durationMs < MIN_TRANSCRIBE_MS) {
            console.log(`[${this.label}] Skipping chunk #${chunk.sequence}: too short (${Math.round(chunk.durationMs)}ms)`);
            return { text: '' };
        }

        const startedAt = Date.now();
        try {
            const result = await this.runWithDeadline(this.timeoutMs, options.signal, (signal) =>
                this.transcribeAudio(chunk, languageMode, signal, options)
            );
            if (this.debug) {
                console.log(`[${this.label}] Chunk #${chunk.sequence} transcribed in ${Date.now() - startedAt}ms: "${result.text}"`);
            }
            return { text: result.text.trim(), language: result.language };
        } catch (error) {
            throw this.toEngineError(error);
        }
    }

    protected abstract checkAvailability(signal: AbortSignal): Promise<void>;

    protected abstract transcribeAudio(
        chunk: AudioChunk,
        languageMode: LanguageMode,
        signal: AbortSignal,
        options: TranscribeOptions
    ): Promise<EngineTranscript>;

    /**
     * Map a library-specific failure to an EngineError, or null when the
     * error is not recognised.
     */
    protected abstract classifyError(error: unknown): EngineError | null;

    protected fail(kind: EngineErrorKind, message: string, cause?: unknown): EngineError {
        return new EngineError(this.id, kind, message, { cause });
    }

    /** Language code to send, or undefined to let the backend detect it. */
    protected languageCode(mode: LanguageMode): string | undefined {
        return mode === 'auto' ? undefined : mode;
    }

    protected classifyStatus(status: number | undefined, message: string, cause?: unknown): EngineError | null {
        if (status === undefined) {
            return null;
        }
        if (status === 401 || status === 403) {
            return this.fail('auth_invalid', message, cause);
        }
        if (status === 429) {
            return this.fail('rate_limited', message, cause);
        }
        if (status === 408 || status === 504) {
            return this.fail('timeout', message, cause);
        }
        return this.fail('network_unreachable', message, cause);
    }

    private toEngineError(error: unknown): EngineError {
        if (error instanceof EngineError) {
            return error;
        }
        const classified = this.classifyError(error);
        if (classified) {
            return classified;
        }
        return this.fail('network_unreachable', describeError(error), error);
    }

    /**
     * Run an operation under a deadline. The race guarantees the deadline
     * even when the library ignores the abort signal.
     */
    private async runWithDeadline<T>(
        timeoutMs: number,
        external: AbortSignal | undefined,
        operation: (signal: AbortSignal) => Promise<T>
    ): Promise<T> {
        const controller = new AbortController();
        let timer: NodeJS.Timeout | undefined;
        let onExternalAbort: (() => void) | undefined;

        const deadline = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                controller.abort();
                reject(this.fail('timeout', `No response within ${timeoutMs}ms`));
            }, timeoutMs);

            if (external) {
                onExternalAbort = () => {
                    controller.abort();
                    reject(this.fail('timeout', 'Request aborted'));
                };
                if (external.aborted) {
                    onExternalAbort();
                } else {
                    external.addEventListener('abort', onExternalAbort, { once: true });
                }
            }
        });

        try {
            return await Promise.race([operation(controller.signal), deadline]);
        } finally {
            clearTimeout(timer);
            if (external && onExternalAbort) {
                external.removeEventListener('abort', onExternalAbort);
            }
        }
    }
}

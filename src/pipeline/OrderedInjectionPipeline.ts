/**
 * Ordered Injection Pipeline
 *
 * Accepts results in any arrival order and hands their text to the
 * injector strictly by ascending sequence number, with no gaps. A failed
 * result still takes its slot, so it never holds back later phrases.
 */

import { TextInjector, TranscriptionResult } from '../types.js';
import { InjectError, describeError } from '../errors.js';

export interface OrderedInjectionOptions {
    onInjected?: (sequence: number, text: string) => void;
    debug?: boolean;
}

export class OrderedInjectionPipeline {
    private readonly injector: TextInjector;
    private readonly options: OrderedInjectionOptions;

    private cursor: number = 0;
    private buffered: Map<number, TranscriptionResult> = new Map();
    private chain: Promise<void> = Promise.resolve();
    private closed: boolean = false;
    private readonly _released: string[] = [];

    constructor(injector: TextInjector, options: OrderedInjectionOptions = {}) {
        this.injector = injector;
        this.options = options;
    }

    /** Next sequence number waiting to be released */
    get injectionCursor(): number {
        return this.cursor;
    }

    get bufferedCount(): number {
        return this.buffered.size;
    }

    /** Phrases handed to the injector, in order */
    get released(): readonly string[] {
        return this._released;
    }

    /**
     * Buffer a result and detach the contiguous run starting at the cursor.
     * Synchronous: no other submit can interleave with the detach.
     */
    submit(result: TranscriptionResult): void {
        if (this.closed) {
            console.log(`[Injection] Pipeline closed, discarding #${result.sequence}`);
            return;
        }
        if (result.sequence < this.cursor || this.buffered.has(result.sequence)) {
            if (this.options.debug) {
                console.log(`[Injection] Discarding late or duplicate result #${result.sequence}`);
            }
            return;
        }

        this.buffered.set(result.sequence, result);

        const run: TranscriptionResult[] = [];
        for (let next = this.buffered.get(this.cursor); next; next = this.buffered.get(this.cursor)) {
            this.buffered.delete(this.cursor);
            run.push(next);
            this.cursor++;
        }

        if (run.length > 0) {
            this.chain = this.chain.then(() => this.release(run));
        } else if (this.options.debug) {
            console.log(`[Injection] Holding #${result.sequence} until #${this.cursor} arrives`);
        }
    }

    /**
     * Wait until every released phrase has been injected.
     */
    async flush(): Promise<void> {
        let pending: Promise<void>;
        do {
            pending = this.chain;
            await pending;
        } while (pending !== this.chain);
    }

    /**
     * Stop accepting results. Phrases already released still go out.
     */
    close(): void {
        if (this.closed) return;
        this.closed = true;
        if (this.buffered.size > 0) {
            console.log(`[Injection] Dropping ${this.buffered.size} out-of-order result(s) on close`);
            this.buffered.clear();
        }
    }

    private async release(run: TranscriptionResult[]): Promise<void> {
        for (const result of run) {
            const text = result.text.trim();
            if (!result.success || !text) {
                if (this.options.debug) {
                    console.log(`[Injection] Skipping #${result.sequence} (${result.success ? 'empty' : 'failed'})`);
                }
                continue;
            }

            try {
                await this.injector.inject(text);
                this._released.push(text);
                this.options.onInjected?.(result.sequence, text);
            } catch (error) {
                if (error instanceof InjectError) {
                    console.error(`[Injection] Dropping #${result.sequence} (${error.kind}): ${error.message}`);
                } else {
                    console.error(`[Injection] Injector failed on #${result.sequence}: ${describeError(error)}`);
                }
            }
        }
    }
}

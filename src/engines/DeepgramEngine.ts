/**
 * Deepgram pre-recorded transcription
 */

import { createClient, DeepgramApiError, DeepgramError, PrerecordedSchema } from '@deepgram/sdk';
import { AudioChunk, EngineTranscript, LanguageMode } from '../types.js';
import { EngineError } from '../errors.js';
import { pcmToWav } from '../audio/wav.js';
import { BaseEngine, BaseEngineOptions } from './BaseEngine.js';

export interface DeepgramEngineOptions extends BaseEngineOptions {
    apiKey?: string;
    model: string;
}

export class DeepgramEngine extends BaseEngine {
    readonly id = 'deepgram' as const;
    readonly label = 'Deepgram';

    private readonly apiKey: string | undefined;
    private readonly model: string;

    constructor(options: DeepgramEngineOptions) {
        super(options);
        this.model = options.model;
        this.apiKey = options.apiKey;
    }

    protected async checkAvailability(signal: AbortSignal): Promise<void> {
        const { error } = await this.clientFor(signal).manage.getProjects();
        if (error) {
            throw error;
        }
    }

    protected async transcribeAudio(chunk: AudioChunk, languageMode: LanguageMode, signal: AbortSignal): Promise<EngineTranscript> {
        const wav = pcmToWav(chunk.pcm16, chunk.sampleRate);
        const language = this.languageCode(languageMode);

        const options: PrerecordedSchema = {
            model: this.model,
            smart_format: true,
        };
        if (language) {
            options.language = language;
        } else {
            options.detect_language = true;
        }

        const { result, error } = await this.clientFor(signal).listen.prerecorded.transcribeFile(wav, options);
        if (error) {
            throw error;
        }

        const channel = result?.results?.channels?.[0];
        const transcript = channel?.alternatives?.[0]?.transcript;
        if (typeof transcript !== 'string') {
            throw this.fail('malformed_response', 'Response carried no transcript');
        }
        return { text: transcript, language: channel?.detected_language };
    }

    protected classifyError(error: unknown): EngineError | null {
        if (error instanceof DeepgramApiError) {
            return this.classifyStatus(error.status, error.message, error);
        }
        if (error instanceof DeepgramError) {
            return this.fail('network_unreachable', error.message, error);
        }
        return null;
    }

    /**
     * A client whose requests are cancelled with the call; the SDK takes
     * no per-request signal.
     */
    private clientFor(signal: AbortSignal): ReturnType<typeof createClient> {
        if (!this.apiKey) {
            throw this.fail('auth_missing', 'DEEPGRAM_API_KEY is not set');
        }
        const cancellable: typeof fetch = (input, init) => fetch(input, { ...init, signal });
        return createClient(this.apiKey, { global: { fetch: { client: cancellable } } });
    }
}

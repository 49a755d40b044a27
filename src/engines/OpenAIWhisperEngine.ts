/**
 * OpenAI Whisper transcription
 */

import OpenAI, { toFile } from 'openai';
import { AudioChunk, EngineTranscript, LanguageMode } from '../types.js';
import { EngineError } from '../errors.js';
import { pcmToWav } from '../audio/wav.js';
import { BaseEngine, BaseEngineOptions } from './BaseEngine.js';

export interface OpenAIWhisperOptions extends BaseEngineOptions {
    apiKey?: string;
    model: string;
}

export class OpenAIWhisperEngine extends BaseEngine {
    readonly id = 'openai-whisper' as const;
    readonly label = 'OpenAIWhisper';

    private readonly openai: OpenAI | null;
    private readonly model: string;

    constructor(options: OpenAIWhisperOptions) {
        super(options);
        this.model = options.model;
        this.openai = options.apiKey
            ? new OpenAI({ apiKey: options.apiKey, timeout: options.timeoutMs, maxRetries: 0 })
            : null;
    }

    protected async checkAvailability(signal: AbortSignal): Promise<void> {
        await this.requireClient().models.retrieve(this.model, { signal, timeout: this.probeTimeoutMs });
    }

    protected async transcribeAudio(
        chunk: AudioChunk,
        languageMode: LanguageMode,
        signal: AbortSignal
    ): Promise<EngineTranscript> {
        const wavBuffer = pcmToWav(chunk.pcm16, chunk.sampleRate);
        const language = this.languageCode(languageMode);

        const transcription = await this.requireClient().audio.transcriptions.create(
            {
                file: await toFile(wavBuffer, 'audio.wav', { type: 'audio/wav' }),
                model: this.model,
                ...(language ? { language } : {}),
            },
            { signal }
        );

        if (typeof transcription.text !== 'string') {
            throw this.fail('malformed_response', 'Response carried no transcript text');
        }
        return { text: transcription.text, language };
    }

    protected classifyError(error: unknown): EngineError | null {
        if (error instanceof OpenAI.APIConnectionTimeoutError) {
            return this.fail('timeout', error.message, error);
        }
        if (error instanceof OpenAI.APIUserAbortError) {
            return this.fail('timeout', 'Request aborted', error);
        }
        if (error instanceof OpenAI.APIConnectionError) {
            return this.fail('network_unreachable', error.message, error);
        }
        if (error instanceof OpenAI.APIError) {
            return this.classifyStatus(error.status, error.message, error);
        }
        return null;
    }

    private requireClient(): OpenAI {
        if (!this.openai) {
            throw this.fail('auth_missing', 'OPENAI_API_KEY is not set');
        }
        return this.openai;
    }
}

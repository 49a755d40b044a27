/**
 * ElevenLabs Scribe (batch)
 *
 * Uploads each phrase as a WAV file to the speech-to-text endpoint.
 */

import { ElevenLabsClient, ElevenLabsError, ElevenLabsTimeoutError } from '@elevenlabs/elevenlabs-js';
import { AudioChunk, EngineTranscript, LanguageMode } from '../types.js';
import { EngineError } from '../errors.js';
import { pcmToWav } from '../audio/wav.js';
import { BaseEngine, BaseEngineOptions } from './BaseEngine.js';

export interface ElevenLabsEngineOptions extends BaseEngineOptions {
    apiKey?: string;
    model: string;
}

export class ElevenLabsEngine extends BaseEngine {
    readonly id = 'elevenlabs' as const;
    readonly label = 'ElevenLabs';

    private readonly client: ElevenLabsClient | null;
    private readonly model: string;

    constructor(options: ElevenLabsEngineOptions) {
        super(options);
        this.model = options.model;
        this.client = options.apiKey ? new ElevenLabsClient({ apiKey: options.apiKey }) : null;
    }

    protected async checkAvailability(signal: AbortSignal): Promise<void> {
        const client = this.requireClient();
        await client.models.list({
            abortSignal: signal,
            timeoutInSeconds: this.probeTimeoutMs / 1000,
            maxRetries: 0,
        });
    }

    protected async transcribeAudio(
        chunk: AudioChunk,
        languageMode: LanguageMode,
        signal: AbortSignal
    ): Promise<EngineTranscript> {
        const client = this.requireClient();
        const wav = pcmToWav(chunk.pcm16, chunk.sampleRate);

        const response = await client.speechToText.convert(
            {
                file: new Blob([new Uint8Array(wav)], { type: 'audio/wav' }),
                modelId: this.model,
                languageCode: this.languageCode(languageMode),
                tagAudioEvents: false,
            },
            {
                abortSignal: signal,
                timeoutInSeconds: this.timeoutMs / 1000,
                maxRetries: 0,
            }
        );

        if (!('text' in response) || typeof response.text !== 'string') {
            throw this.fail('malformed_response', 'Response carried no transcript text');
        }
        return { text: response.text, language: response.languageCode };
    }

    protected classifyError(error: unknown): EngineError | null {
        if (error instanceof ElevenLabsTimeoutError) {
            return this.fail('timeout', error.message, error);
        }
        if (error instanceof ElevenLabsError) {
            return this.classifyStatus(error.statusCode, error.message, error);
        }
        return null;
    }

    private requireClient(): ElevenLabsClient {
        if (!this.client) {
            throw this.fail('auth_missing', 'ELEVENLABS_API_KEY is not set');
        }
        return this.client;
    }
}

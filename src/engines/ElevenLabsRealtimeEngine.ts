/**
 * ElevenLabs Scribe realtime
 *
 * Streams each phrase over the realtime WebSocket API and commits it,
 * surfacing partial transcripts while the phrase is processed.
 */

import WebSocket from 'ws';
import { AudioChunk, EngineTranscript, LanguageMode, TranscribeOptions } from '../types.js';
import { EngineError } from '../errors.js';
import { BaseEngine, BaseEngineOptions } from './BaseEngine.js';

export interface ElevenLabsRealtimeOptions extends BaseEngineOptions {
    apiKey?: string;
    model: string;
    region?: 'us' | 'eu' | 'default';
    /** Overrides the regional endpoint, e.g. ws://127.0.0.1:8080 */
    baseUrl?: string;
}

interface RealtimeMessage {
    type: string;
    text: string;
    detail?: string;
}

// Half a second of 16 kHz mono PCM16 per message
const SEND_SLICE_MS = 500;

export class ElevenLabsRealtimeEngine extends BaseEngine {
    readonly id = 'elevenlabs-realtime' as const;
    readonly label = 'ElevenLabsRealtime';
    override readonly streaming = true;

    private readonly apiKey: string | undefined;
    private readonly model: string;
    private readonly region: string;
    private readonly baseUrl: string | undefined;

    constructor(options: ElevenLabsRealtimeOptions) {
        super(options);
        this.apiKey = options.apiKey;
        this.model = options.model;
        this.region = options.region ?? 'default';
        this.baseUrl = options.baseUrl;
    }

    private endpointBase(): string {
        if (this.baseUrl) {
            return this.baseUrl;
        }
        switch (this.region) {
            case 'us':
                return 'wss://api.us.elevenlabs.io';
            case 'eu':
                return 'wss://api.eu.residency.elevenlabs.io';
            default:
                return 'wss://api.elevenlabs.io';
        }
    }

    private getEndpoint(languageMode: LanguageMode): string {
        const params = new URLSearchParams({ model_id: this.model });
        const language = this.languageCode(languageMode);
        if (language) {
            params.set('language_code', language);
        }
        return `${this.endpointBase()}/v1/speech-to-text/realtime?${params.toString()}`;
    }

    protected async checkAvailability(signal: AbortSignal): Promise<void> {
        const ws = await this.connect(this.getEndpoint('auto'), signal);
        ws.close(1000, 'Probe complete');
    }

    protected async transcribeAudio(
        chunk: AudioChunk,
        languageMode: LanguageMode,
        signal: AbortSignal,
        options: TranscribeOptions
    ): Promise<EngineTranscript> {
        const ws = await this.connect(this.getEndpoint(languageMode), signal);

        return new Promise<EngineTranscript>((resolve, reject) => {
            let commitSent = false;
            let settled = false;

            const settle = (error: EngineError | null, result?: EngineTranscript): void => {
                if (settled) return;
                settled = true;
                signal.removeEventListener('abort', onAbort);
                ws.removeAllListeners();
                ws.on('error', this.onLateError);
                if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
                    ws.close(1000, 'Client closing');
                }
                if (error) {
                    reject(error);
                } else {
                    resolve(result ?? { text: '' });
                }
            };

            const onAbort = (): void => settle(this.fail('timeout', 'Request aborted'));
            signal.addEventListener('abort', onAbort, { once: true });

            ws.on('message', (data: WebSocket.RawData) => {
                const message = parseMessage(data);
                if (!message) {
                    console.warn(`[${this.label}] Ignoring unparseable message`);
                    return;
                }

                switch (message.type) {
                    case 'session_started':
                        break;

                    case 'partial_transcript':
                        if (message.text) {
                            options.onPartial?.(message.text);
                        }
                        break;

                    case 'committed_transcript':
                    case 'committed_transcript_with_timestamps':
                        if (commitSent) {
                            settle(null, { text: message.text });
                        }
                        break;

                    case 'auth_error':
                        settle(this.fail('auth_invalid', message.detail ?? 'Authentication rejected'));
                        break;

                    case 'quota_exceeded':
                    case 'rate_limited':
                        settle(this.fail('rate_limited', message.detail ?? 'Quota exceeded'));
                        break;

                    case 'error':
                        settle(this.fail('malformed_response', message.detail ?? 'Unknown error'));
                        break;

                    default:
                        if (this.debug) {
                            console.log(`[${this.label}] Unhandled message type: ${message.type}`);
                        }
                }
            });

            ws.on('error', (error) => {
                settle(this.fail('network_unreachable', error.message, error));
            });

            ws.on('close', (code) => {
                settle(this.fail('malformed_response', `Connection closed (${code}) before a transcript was committed`));
            });

            const sliceBytes = Math.max(2, Math.floor((chunk.sampleRate * SEND_SLICE_MS) / 1000) * 2);
            for (let offset = 0; offset < chunk.pcm16.length; offset += sliceBytes) {
                ws.send(JSON.stringify({
                    message_type: 'input_audio_chunk',
                    audio_base_64: chunk.pcm16.subarray(offset, offset + sliceBytes).toString('base64'),
                    commit: false,
                    sample_rate: chunk.sampleRate,
                }));
            }
            ws.send(JSON.stringify({
                message_type: 'input_audio_chunk',
                audio_base_64: '',
                commit: true,
                sample_rate: chunk.sampleRate,
            }));
            commitSent = true;
        });
    }

    private readonly onLateError = (error: Error): void => {
        if (this.debug) {
            console.log(`[${this.label}] Ignoring error after close: ${error.message}`);
        }
    };

    protected classifyError(): EngineError | null {
        return null;
    }

    private connect(endpoint: string, signal: AbortSignal): Promise<WebSocket> {
        if (!this.apiKey) {
            return Promise.reject(this.fail('auth_missing', 'ELEVENLABS_API_KEY is not set'));
        }

        const ws = new WebSocket(endpoint, {
            headers: { 'xi-api-key': this.apiKey },
        });

        return new Promise<WebSocket>((resolve, reject) => {
            const cleanup = (): void => {
                signal.removeEventListener('abort', onAbort);
                ws.removeAllListeners('open');
                ws.removeAllListeners('error');
                ws.removeAllListeners('unexpected-response');
                // terminate() while connecting still emits 'error' on the next tick
                ws.on('error', this.onLateError);
            };
            const onAbort = (): void => {
                cleanup();
                ws.terminate();
                reject(this.fail('timeout', 'Connection aborted'));
            };
            signal.addEventListener('abort', onAbort, { once: true });

            ws.once('open', () => {
                cleanup();
                if (this.debug) {
                    console.log(`[${this.label}] Connected`);
                }
                resolve(ws);
            });

            ws.once('unexpected-response', (_request, response) => {
                cleanup();
                ws.terminate();
                const status = response.statusCode;
                reject(
                    this.classifyStatus(status, `Handshake rejected with HTTP ${status}`)
                    ?? this.fail('network_unreachable', 'Handshake rejected')
                );
            });

            ws.once('error', (error) => {
                cleanup();
                reject(this.fail('network_unreachable', error.message, error));
            });
        });
    }
}

function toBuffer(data: WebSocket.RawData): Buffer {
    if (Buffer.isBuffer(data)) return data;
    if (Array.isArray(data)) return Buffer.concat(data);
    return Buffer.from(data);
}

export function parseMessage(data: WebSocket.RawData): RealtimeMessage | null {
    let parsed: unknown;
    try {
        parsed = JSON.parse(toBuffer(data).toString());
    } catch {
        return null;
    }
    if (typeof parsed !== 'object' || parsed === null) {
        return null;
    }

    const type = 'message_type' in parsed ? parsed.message_type : 'type' in parsed ? parsed.type : undefined;
    if (typeof type !== 'string') {
        return null;
    }

    const text = 'text' in parsed && typeof parsed.text === 'string' ? parsed.text : '';
    let detail: string | undefined;
    if ('message' in parsed && typeof parsed.message === 'string') {
        detail = parsed.message;
    } else if ('error' in parsed && typeof parsed.error === 'string') {
        detail = parsed.error;
    }

    return { type, text, detail };
}

/**
 * Core types for live-dictation
 */

import type { EngineError } from './errors.js';

export type LanguageMode = 'auto' | 'en' | 'cs';

export type EngineId =
    | 'elevenlabs'
    | 'elevenlabs-realtime'
    | 'deepgram'
    | 'openai-whisper'
    | 'whisper-cpp';

export type TerminationReason = 'long_silence' | 'max_duration' | 'external_stop' | 'error';

export type InjectStrategy = 'type' | 'paste';

export type NotificationUrgency = 'low' | 'normal' | 'critical';

// ── Audio ────────────────────────────────────────────────────────────

export interface AudioFrame {
    timestamp: number;       // ms since epoch when the frame was read
    samples: Buffer;         // PCM16 little-endian, mono
    sampleRate: number;
}

/**
 * A contiguous run of frames judged to be one phrase.
 */
export interface AudioChunk {
    sequence: number;
    pcm16: Buffer;
    sampleRate: number;
    durationMs: number;
    startedAtMs: number;     // offset from the first frame of the session
    final: boolean;          // flushed at session end rather than cut at a phrase boundary
}

// ── Transcription ────────────────────────────────────────────────────

export interface EngineTranscript {
    text: string;
    language?: string;
}

export interface TranscriptionResult {
    sequence: number;
    text: string;
    language?: string;
    engine?: EngineId;
    success: boolean;
    error?: EngineError;
}

export type ProbeResult =
    | { ok: true; latencyMs: number }
    | { ok: false; error: EngineError };

export interface TranscribeOptions {
    signal?: AbortSignal;
    onPartial?: (text: string) => void;
}

/**
 * Uniform contract over heterogeneous transcription backends.
 * transcribe() rejects with an EngineError on failure.
 */
export interface EngineAdapter {
    readonly id: EngineId;
    readonly label: string;
    readonly timeoutMs: number;
    readonly streaming: boolean;

    probe(): Promise<ProbeResult>;

    transcribe(
        chunk: AudioChunk,
        languageMode: LanguageMode,
        options?: TranscribeOptions
    ): Promise<EngineTranscript>;
}

export interface EngineSpec {
    id: EngineId;
    priority: number;
}

// ── Session ──────────────────────────────────────────────────────────

export interface Session {
    id: string;
    startedAt: number;
    languageMode: LanguageMode;
    engine: EngineId | null;
    nextSequence: number;
    terminationReason: TerminationReason | null;
}

export interface EngineState {
    current: EngineId | null;
    failed: EngineId[];
    consecutiveFailures: number;
    transitions: Array<{ from: EngineId; to: EngineId }>;
    exhausted: boolean;
}

export interface SessionSummary {
    sessionId: string;
    reason: TerminationReason;
    chunks: number;
    injected: string[];
    engine: EngineId | null;
    fallbacks: Array<{ from: EngineId; to: EngineId }>;
    durationMs: number;
}

// ── External collaborators ───────────────────────────────────────────

export interface TextInjector {
    inject(text: string): Promise<void>;
}

export interface Notifier {
    notify(message: string, urgency?: NotificationUrgency): void;
}

/**
 * Application configuration
 */
export interface AppConfig {
    engines: EngineSpec[];
    elevenlabsApiKey?: string;
    deepgramApiKey?: string;
    openaiApiKey?: string;
    elevenlabsModel: string;
    elevenlabsRealtimeModel: string;
    deepgramModel: string;
    openaiSttModel: string;
    whisperCppPath?: string;
    whisperCppModel?: string;
    engineTimeoutMs: number;
    localEngineTimeoutMs: number;
    probeTimeoutMs: number;
    vad: VadOptions;
    sampleRate: number;
    frameSize: number;
    failureThreshold: number;
    rateLimitRetries: number;
    rateLimitBackoffMs: number;
    maxInFlight: number;
    maxQueuedChunks: number;
    chunkDeadlineMs: number;
    injectStrategy: InjectStrategy;
    cleanFillerWords: boolean;
    lockPath: string;
    socketPath: string;
    stateDir: string;
    debug: boolean;
}

export interface VadOptions {
    silenceThreshold: number;
    shortPauseMs: number;
    longPauseMs: number;
    minPhraseMs: number;
    maxDurationMs: number;
}

/**
 * Configuration
 *
 * Loads configuration from environment variables with sensible defaults.
 */

import { config as loadEnv } from 'dotenv';
import { homedir, tmpdir } from 'os';
import { join } from 'path';
import { AppConfig, EngineId, EngineSpec, InjectStrategy } from './types.js';

// Load .env file when present
loadEnv();

type Env = Record<string, string | undefined>;

export const KNOWN_ENGINES: readonly EngineId[] = [
    'elevenlabs',
    'elevenlabs-realtime',
    'deepgram',
    'openai-whisper',
    'whisper-cpp',
];

const DEFAULT_ENGINES = 'elevenlabs,deepgram,openai-whisper,whisper-cpp';

function getEnvString(env: Env, key: string, defaultValue: string): string {
    const value = env[key];
    return value && value.trim() ? value.trim() : defaultValue;
}

function getEnvOptional(env: Env, key: string): string | undefined {
    const value = env[key]?.trim();
    return value ? value : undefined;
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
    const value = env[key];
    if (!value) return defaultValue;
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
        console.warn(`[Config] Invalid number for ${key}, using default: ${defaultValue}`);
        return defaultValue;
    }
    return parsed;
}

function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
    const value = env[key];
    if (!value) return defaultValue;
    return value.toLowerCase() === 'true' || value === '1';
}

function isEngineId(value: string): value is EngineId {
    return KNOWN_ENGINES.some(id => id === value);
}

/**
 * Parse "elevenlabs,deepgram:5,whisper-cpp" into engine specs.
 * Entries without an explicit priority descend in declaration order.
 * Unknown ids are reported and skipped.
 */
export function parseEngineList(raw: string): EngineSpec[] {
    const entries = raw.split(',').map(e => e.trim()).filter(Boolean);
    const specs: EngineSpec[] = [];

    entries.forEach((entry, index) => {
        const [id, priorityText] = entry.split(':').map(part => part.trim());
        if (!isEngineId(id)) {
            console.warn(`[Config] Unknown engine "${id}" in ENGINES, skipping`);
            return;
        }
        if (specs.some(s => s.id === id)) {
            console.warn(`[Config] Duplicate engine "${id}" in ENGINES, skipping`);
            return;
        }
        const explicit = priorityText !== undefined ? parseInt(priorityText, 10) : NaN;
        specs.push({
            id,
            priority: isNaN(explicit) ? entries.length - index : explicit,
        });
    });

    return specs;
}

function getInjectStrategy(env: Env): InjectStrategy {
    const strategy = env.INJECT_STRATEGY?.toLowerCase();
    if (strategy === 'paste') return 'paste';
    return 'type';
}

function getStateDir(env: Env): string {
    const explicit = getEnvOptional(env, 'STATE_DIR');
    if (explicit) return explicit;
    const base = getEnvOptional(env, 'XDG_CONFIG_HOME') ?? join(homedir(), '.config');
    return join(base, 'live-dictation');
}

export function loadConfig(env: Env = process.env): AppConfig {
    return {
        engines: parseEngineList(getEnvString(env, 'ENGINES', DEFAULT_ENGINES)),
        elevenlabsApiKey: getEnvOptional(env, 'ELEVENLABS_API_KEY'),
        deepgramApiKey: getEnvOptional(env, 'DEEPGRAM_API_KEY'),
        openaiApiKey: getEnvOptional(env, 'OPENAI_API_KEY'),
        elevenlabsModel: getEnvString(env, 'ELEVENLABS_MODEL', 'scribe_v1'),
        elevenlabsRealtimeModel: getEnvString(env, 'ELEVENLABS_REALTIME_MODEL', 'scribe_v2_realtime'),
        deepgramModel: getEnvString(env, 'DEEPGRAM_MODEL', 'nova-2'),
        openaiSttModel: getEnvString(env, 'OPENAI_STT_MODEL', 'whisper-1'),
        whisperCppPath: getEnvOptional(env, 'WHISPER_CPP_PATH'),
        whisperCppModel: getEnvOptional(env, 'WHISPER_CPP_MODEL'),
        engineTimeoutMs: getEnvNumber(env, 'ENGINE_TIMEOUT_MS', 8000),
        localEngineTimeoutMs: getEnvNumber(env, 'LOCAL_ENGINE_TIMEOUT_MS', 15000),
        probeTimeoutMs: getEnvNumber(env, 'PROBE_TIMEOUT_MS', 5000),
        vad: {
            silenceThreshold: getEnvNumber(env, 'VAD_SILENCE_THRESHOLD', 50),
            shortPauseMs: getEnvNumber(env, 'VAD_SHORT_PAUSE_MS', 1500),
            longPauseMs: getEnvNumber(env, 'VAD_LONG_PAUSE_MS', 4000),
            minPhraseMs: getEnvNumber(env, 'VAD_MIN_PHRASE_MS', 2000),
            maxDurationMs: getEnvNumber(env, 'VAD_MAX_DURATION_MS', 45000),
        },
        sampleRate: getEnvNumber(env, 'SAMPLE_RATE', 16000),
        frameSize: getEnvNumber(env, 'FRAME_SIZE', 1024),
        failureThreshold: getEnvNumber(env, 'FAILURE_THRESHOLD', 1),
        rateLimitRetries: getEnvNumber(env, 'RATE_LIMIT_RETRIES', 2),
        rateLimitBackoffMs: getEnvNumber(env, 'RATE_LIMIT_BACKOFF_MS', 1000),
        maxInFlight: getEnvNumber(env, 'MAX_IN_FLIGHT', 3),
        maxQueuedChunks: getEnvNumber(env, 'MAX_QUEUED_CHUNKS', 16),
        chunkDeadlineMs: getEnvNumber(env, 'CHUNK_DEADLINE_MS', 25000),
        injectStrategy: getInjectStrategy(env),
        cleanFillerWords: getEnvBoolean(env, 'CLEAN_FILLER_WORDS', true),
        lockPath: getEnvString(env, 'LOCK_PATH', join(tmpdir(), 'live-dictation.pid')),
        socketPath: getEnvString(env, 'SOCKET_PATH', join(tmpdir(), 'live-dictation.sock')),
        stateDir: getStateDir(env),
        debug: getEnvBoolean(env, 'DEBUG', false),
    };
}

export function validateConfig(config: AppConfig): void {
    const errors: string[] = [];

    if (config.engines.length === 0) {
        errors.push('ENGINES must name at least one known engine');
    }

    const { vad } = config;
    if (vad.shortPauseMs >= vad.longPauseMs) {
        errors.push('VAD_SHORT_PAUSE_MS must be shorter than VAD_LONG_PAUSE_MS');
    }
    if (vad.maxDurationMs <= 0 || vad.minPhraseMs < 0 || vad.silenceThreshold < 0) {
        errors.push('VAD thresholds must be positive');
    }

    if (config.sampleRate <= 0 || config.frameSize <= 0) {
        errors.push('SAMPLE_RATE and FRAME_SIZE must be positive');
    }

    if (config.maxInFlight < 1) {
        errors.push('MAX_IN_FLIGHT must be at least 1');
    }

    if (config.failureThreshold < 1) {
        errors.push('FAILURE_THRESHOLD must be at least 1');
    }

    // Restarted on fallback, the deadline must still cover a probe plus one call
    const slowestCall = Math.max(config.engineTimeoutMs, config.localEngineTimeoutMs);
    const minDeadline = config.probeTimeoutMs + slowestCall;
    if (config.chunkDeadlineMs < minDeadline) {
        errors.push(`CHUNK_DEADLINE_MS must be at least PROBE_TIMEOUT_MS + the slowest engine timeout (${minDeadline})`);
    }

    if (errors.length > 0) {
        throw new Error(`Configuration errors:\n${errors.join('\n')}`);
    }
}

/**
 * Transcription engines
 *
 * Cloud engines (ElevenLabs, Deepgram, OpenAI Whisper) and a local
 * whisper.cpp fallback behind one EngineAdapter contract.
 */

export { BaseEngine, MIN_TRANSCRIBE_MS } from './BaseEngine.js';
export type { BaseEngineOptions } from './BaseEngine.js';
export { ElevenLabsEngine } from './ElevenLabsEngine.js';
export { ElevenLabsRealtimeEngine } from './ElevenLabsRealtimeEngine.js';
export { DeepgramEngine } from './DeepgramEngine.js';
export { OpenAIWhisperEngine } from './OpenAIWhisperEngine.js';
export { WhisperCppEngine, findWhisperCppBinary } from './WhisperCppEngine.js';

import { AppConfig, EngineAdapter, EngineId } from '../types.js';
import { ElevenLabsEngine } from './ElevenLabsEngine.js';
import { ElevenLabsRealtimeEngine } from './ElevenLabsRealtimeEngine.js';
import { DeepgramEngine } from './DeepgramEngine.js';
import { OpenAIWhisperEngine } from './OpenAIWhisperEngine.js';
import { WhisperCppEngine } from './WhisperCppEngine.js';

/**
 * Create one engine by id
 */
export function createEngine(id: EngineId, config: AppConfig): EngineAdapter {
    const cloud = {
        timeoutMs: config.engineTimeoutMs,
        probeTimeoutMs: config.probeTimeoutMs,
        debug: config.debug,
    };

    switch (id) {
        case 'elevenlabs':
            return new ElevenLabsEngine({
                ...cloud,
                apiKey: config.elevenlabsApiKey,
                model: config.elevenlabsModel,
            });

        case 'elevenlabs-realtime':
            return new ElevenLabsRealtimeEngine({
                ...cloud,
                apiKey: config.elevenlabsApiKey,
                model: config.elevenlabsRealtimeModel,
            });

        case 'deepgram':
            return new DeepgramEngine({
                ...cloud,
                apiKey: config.deepgramApiKey,
                model: config.deepgramModel,
            });

        case 'openai-whisper':
            return new OpenAIWhisperEngine({
                ...cloud,
                apiKey: config.openaiApiKey,
                model: config.openaiSttModel,
            });

        case 'whisper-cpp':
            return new WhisperCppEngine({
                timeoutMs: config.localEngineTimeoutMs,
                probeTimeoutMs: config.probeTimeoutMs,
                debug: config.debug,
                binaryPath: config.whisperCppPath,
                modelPath: config.whisperCppModel,
            });
    }
}

/**
 * Create the configured engines, highest priority first.
 * Equal priorities keep their declaration order.
 */
export function createEngines(config: AppConfig): EngineAdapter[] {
    return [...config.engines]
        .sort((a, b) => b.priority - a.priority)
        .map(spec => createEngine(spec.id, config));
}

export interface EngineReport {
    id: string;
    label: string;
    available: boolean;
    latencyMs?: number;
    error?: string;
}

/**
 * Probe every engine concurrently and report availability in list order
 */
export async function probeEngines(engines: EngineAdapter[]): Promise<EngineReport[]> {
    const results = await Promise.all(engines.map(engine => engine.probe()));
    return engines.map((engine, i) => {
        const result = results[i];
        return result.ok
            ? { id: engine.id, label: engine.label, available: true, latencyMs: result.latencyMs }
            : { id: engine.id, label: engine.label, available: false, error: `${result.error.kind}: ${result.error.message}` };
    });
}

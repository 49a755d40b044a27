/**
 * Daemon wire protocol
 *
 * One JSON object per WebSocket message. The client sends a single request;
 * the daemon answers with one or more responses and closes the connection.
 */

import type { RawData } from 'ws';
import { LanguageMode, SessionSummary } from '../types.js';
import type { EngineReport } from '../engines/index.js';
import { isLanguageMode } from '../services/LanguagePreference.js';

export type DaemonRequest =
    | { command: 'transcribe'; language?: LanguageMode }
    | { command: 'ping' }
    | { command: 'status' }
    | { command: 'stop' };

export type DaemonResponse =
    | { status: 'recording'; sessionId: string; engine: string }
    | { status: 'partial'; sequence: number; text: string }
    | { status: 'phrase'; sequence: number; text: string }
    | { status: 'fallback'; from: string; to: string }
    | { status: 'completed'; reason: string; chunks: number; injected: string[]; engine: string | null }
    | { status: 'error'; kind: string; message: string }
    | { status: 'alive'; pid: number; sessionActive: boolean }
    | { status: 'stopping' }
    | { status: 'idle' }
    | { status: 'report'; language: string; engines: EngineReport[] };

export function completedResponse(summary: SessionSummary): DaemonResponse {
    return {
        status: 'completed',
        reason: summary.reason,
        chunks: summary.chunks,
        injected: summary.injected,
        engine: summary.engine,
    };
}

export function rawToString(data: RawData): string {
    if (Buffer.isBuffer(data)) return data.toString();
    if (Array.isArray(data)) return Buffer.concat(data).toString();
    return Buffer.from(data).toString();
}

function parseObject(raw: string): object | null {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        return null;
    }
    return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed) ? parsed : null;
}

function field(obj: object, key: string): unknown {
    return key in obj ? Reflect.get(obj, key) : undefined;
}

function str(obj: object, key: string): string | undefined {
    const value = field(obj, key);
    return typeof value === 'string' ? value : undefined;
}

function num(obj: object, key: string): number | undefined {
    const value = field(obj, key);
    return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function parseRequest(raw: string): DaemonRequest | null {
    const obj = parseObject(raw);
    if (!obj) return null;

    switch (str(obj, 'command')) {
        case 'transcribe': {
            const language = field(obj, 'language');
            if (language === undefined) return { command: 'transcribe' };
            return isLanguageMode(language) ? { command: 'transcribe', language } : null;
        }
        case 'ping':
            return { command: 'ping' };
        case 'status':
            return { command: 'status' };
        case 'stop':
            return { command: 'stop' };
        default:
            return null;
    }
}

function parseEngineReport(value: unknown): EngineReport | null {
    if (typeof value !== 'object' || value === null) return null;
    const id = str(value, 'id');
    const label = str(value, 'label');
    const available = field(value, 'available');
    if (id === undefined || label === undefined || typeof available !== 'boolean') return null;
    return { id, label, available, latencyMs: num(value, 'latencyMs'), error: str(value, 'error') };
}

export function parseResponse(raw: string): DaemonResponse | null {
    const obj = parseObject(raw);
    if (!obj) return null;

    switch (str(obj, 'status')) {
        case 'recording': {
            const sessionId = str(obj, 'sessionId');
            const engine = str(obj, 'engine');
            return sessionId !== undefined && engine !== undefined ? { status: 'recording', sessionId, engine } : null;
        }
        case 'partial':
        case 'phrase': {
            const sequence = num(obj, 'sequence');
            const text = str(obj, 'text');
            if (sequence === undefined || text === undefined) return null;
            return str(obj, 'status') === 'phrase'
                ? { status: 'phrase', sequence, text }
                : { status: 'partial', sequence, text };
        }
        case 'fallback': {
            const from = str(obj, 'from');
            const to = str(obj, 'to');
            return from !== undefined && to !== undefined ? { status: 'fallback', from, to } : null;
        }
        case 'completed': {
            const reason = str(obj, 'reason');
            const chunks = num(obj, 'chunks');
            const injectedValue = field(obj, 'injected');
            const injected = Array.isArray(injectedValue)
                ? injectedValue.filter((item): item is string => typeof item === 'string')
                : [];
            if (reason === undefined || chunks === undefined) return null;
            return { status: 'completed', reason, chunks, injected, engine: str(obj, 'engine') ?? null };
        }
        case 'error':
            return {
                status: 'error',
                kind: str(obj, 'kind') ?? 'unknown',
                message: str(obj, 'message') ?? 'Unknown error',
            };
        case 'alive': {
            const pid = num(obj, 'pid');
            return pid !== undefined ? { status: 'alive', pid, sessionActive: field(obj, 'sessionActive') === true } : null;
        }
        case 'stopping':
            return { status: 'stopping' };
        case 'idle':
            return { status: 'idle' };
        case 'report': {
            const enginesValue = field(obj, 'engines');
            const engines = Array.isArray(enginesValue)
                ? enginesValue.map(parseEngineReport).filter((e): e is EngineReport => e !== null)
                : [];
            return { status: 'report', language: str(obj, 'language') ?? 'auto', engines };
        }
        default:
            return null;
    }
}

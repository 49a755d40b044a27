/**
 * Error taxonomy
 *
 * Each taxonomy is one Error subclass discriminated by `kind`.
 */

import type { EngineId } from './types.js';

export type SessionErrorKind =
    | 'already_active'
    | 'no_engine_available'
    | 'lock_stale_override'
    | 'no_session';

export type EngineErrorKind =
    | 'auth_missing'
    | 'auth_invalid'
    | 'network_unreachable'
    | 'timeout'
    | 'rate_limited'
    | 'malformed_response'
    | 'unavailable';

export type InjectErrorKind = 'injector_unavailable' | 'target_window_lost';

export class SessionError extends Error {
    readonly kind: SessionErrorKind;

    constructor(kind: SessionErrorKind, message: string) {
        super(message);
        this.name = 'SessionError';
        this.kind = kind;
    }
}

export class EngineError extends Error {
    readonly kind: EngineErrorKind;
    readonly engine: EngineId;

    constructor(engine: EngineId, kind: EngineErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'EngineError';
        this.engine = engine;
        this.kind = kind;
    }
}

export class InjectError extends Error {
    readonly kind: InjectErrorKind;

    constructor(kind: InjectErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'InjectError';
        this.kind = kind;
    }
}

/**
 * Process exit codes for the command surface
 */
export const ExitCode = {
    OK: 0,
    FAILURE: 1,
    NO_SESSION: 2,
    LOCK_CONTENTION: 3,
    NO_ENGINE: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeForSessionError(error: SessionError): ExitCode {
    switch (error.kind) {
        case 'already_active':
            return ExitCode.LOCK_CONTENTION;
        case 'no_engine_available':
            return ExitCode.NO_ENGINE;
        case 'no_session':
            return ExitCode.NO_SESSION;
        default:
            return ExitCode.FAILURE;
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

/**
 * True when a Node system error carries the given errno code
 */
export function hasErrorCode(error: unknown, code: string): boolean {
    return error instanceof Error && 'code' in error && error.code === code;
}

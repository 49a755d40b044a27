/**
 * Command surface
 *
 * run, stop, status, ping, lang and daemon. Every command resolves to a
 * process exit code; nothing here calls process.exit.
 */

import { AppConfig, EngineAdapter, Notifier, TextInjector } from './types.js';
import { ExitCode, SessionError, describeError, exitCodeForSessionError } from './errors.js';
import { FrameSource, MicrophoneFrameSource } from './audio/FrameSource.js';
import { createEngines, probeEngines } from './engines/index.js';
import { createInjector } from './inject/TextInjector.js';
import { createNotifier } from './services/Notifier.js';
import { LanguagePreference, SUPPORTED_LANGUAGES, describeLanguage } from './services/LanguagePreference.js';
import { SessionLock, withSessionLock } from './session/SessionLock.js';
import { SessionEvent, TranscriptionSession, sessionOptionsFromConfig } from './session/TranscriptionSession.js';
import { DaemonClient } from './daemon/DaemonClient.js';
import { DaemonServer } from './daemon/DaemonServer.js';

export interface CommandContext {
    config: AppConfig;
    out: (line: string) => void;
    err: (line: string) => void;
    createEngines: (config: AppConfig) => EngineAdapter[];
    createFrameSource: () => FrameSource;
    injector: TextInjector;
    notifier: Notifier;
    languages: LanguagePreference;
    lock: SessionLock;
    daemon: DaemonClient;
    sendSignal: (pid: number, signal: NodeJS.Signals) => void;
}

export function createCommandContext(config: AppConfig): CommandContext {
    return {
        config,
        out: (line) => console.log(line),
        err: (line) => console.error(line),
        createEngines,
        createFrameSource: () => new MicrophoneFrameSource({
            sampleRate: config.sampleRate,
            frameSize: config.frameSize,
        }),
        injector: createInjector(config.injectStrategy, { cleanFillerWords: config.cleanFillerWords }),
        notifier: createNotifier(process.env, config.debug),
        languages: new LanguagePreference(config.stateDir),
        lock: new SessionLock(config.lockPath),
        daemon: new DaemonClient(config.socketPath),
        sendSignal: (pid, signal) => {
            process.kill(pid, signal);
        },
    };
}

export const USAGE = `Usage: dictate <command>

Commands:
  run            Record and type what you say until you pause
  stop           Stop the running session
  status         Check which transcription engines are available
  ping           Check whether the daemon is running
  lang [code]    Show or set the language (${Object.keys(SUPPORTED_LANGUAGES).join(', ')})
  daemon         Run the long-lived daemon
  help           Show this help`;

export async function executeCommand(command: string | undefined, args: string[], ctx: CommandContext): Promise<ExitCode> {
    switch (command) {
        case 'run':
            return runSession(ctx);
        case 'stop':
            return stopSession(ctx);
        case 'status':
            return showStatus(ctx);
        case 'ping':
            return pingDaemon(ctx);
        case 'lang':
            return language(ctx, args[0]);
        case 'daemon':
            return runDaemon(ctx);
        case undefined:
        case 'help':
        case '--help':
        case '-h':
            ctx.out(USAGE);
            return ExitCode.OK;
        default:
            ctx.err(`Unknown command: ${command}\n`);
            ctx.err(USAGE);
            return ExitCode.FAILURE;
    }
}

function printEvent(ctx: CommandContext, event: SessionEvent): void {
    switch (event.type) {
        case 'recording':
            ctx.out(`🎤 Recording with ${event.engine}. Pause for a few seconds to finish.`);
            break;
        case 'phrase':
            ctx.out(`📝 ${event.text}`);
            break;
        case 'fallback':
            ctx.out(`⚠️  Switched ${event.from} -> ${event.to}`);
            break;
        case 'partial':
            break;
    }
}

async function runSession(ctx: CommandContext): Promise<ExitCode> {
    if (await ctx.daemon.ping()) {
        return runViaDaemon(ctx);
    }

    const languageMode = await ctx.languages.get();
    const session = new TranscriptionSession(
        {
            engines: ctx.createEngines(ctx.config),
            frames: ctx.createFrameSource(),
            injector: ctx.injector,
            notifier: ctx.notifier,
        },
        sessionOptionsFromConfig(ctx.config, languageMode, (event) => printEvent(ctx, event))
    );

    const requestStop = (): void => session.stop('external_stop');
    process.on('SIGUSR1', requestStop);
    process.on('SIGINT', requestStop);

    try {
        const summary = await withSessionLock(ctx.lock, () => session.run());
        ctx.out(`✅ Session ended (${summary.reason}): ${summary.injected.length} of ${summary.chunks} phrase(s) typed`);
        return summary.reason === 'error' ? ExitCode.FAILURE : ExitCode.OK;
    } catch (error) {
        if (error instanceof SessionError) {
            ctx.err(`❌ ${error.message}`);
            ctx.notifier.notify(error.message, 'critical');
            return exitCodeForSessionError(error);
        }
        throw error;
    } finally {
        process.off('SIGUSR1', requestStop);
        process.off('SIGINT', requestStop);
    }
}

async function runViaDaemon(ctx: CommandContext): Promise<ExitCode> {
    const requestStop = (): void => {
        void stopDaemonSession(ctx);
    };
    process.on('SIGINT', requestStop);

    try {
        for await (const response of ctx.daemon.request({ command: 'transcribe' })) {
            switch (response.status) {
                case 'recording':
                    ctx.out(`🎤 Recording with ${response.engine} (daemon). Pause for a few seconds to finish.`);
                    break;
                case 'phrase':
                    ctx.out(`📝 ${response.text}`);
                    break;
                case 'fallback':
                    ctx.out(`⚠️  Switched ${response.from} -> ${response.to}`);
                    break;
                case 'completed':
                    ctx.out(`✅ Session ended (${response.reason}): ${response.injected.length} of ${response.chunks} phrase(s) typed`);
                    return response.reason === 'error' ? ExitCode.FAILURE : ExitCode.OK;
                case 'error':
                    ctx.err(`❌ ${response.message}`);
                    if (response.kind === 'already_active') return ExitCode.LOCK_CONTENTION;
                    if (response.kind === 'no_engine_available') return ExitCode.NO_ENGINE;
                    return ExitCode.FAILURE;
            }
        }
        ctx.err('❌ Daemon closed the connection before the session finished');
        return ExitCode.FAILURE;
    } finally {
        process.off('SIGINT', requestStop);
    }
}

async function stopDaemonSession(ctx: CommandContext): Promise<void> {
    try {
        for await (const response of ctx.daemon.request({ command: 'stop' })) {
            if (ctx.config.debug) {
                ctx.out(`Daemon: ${response.status}`);
            }
        }
    } catch (error) {
        ctx.err(`Could not reach daemon to stop the session: ${describeError(error)}`);
    }
}

async function stopSession(ctx: CommandContext): Promise<ExitCode> {
    const owner = await ctx.lock.readOwner();
    if (owner === null) {
        ctx.out('Nothing to stop');
        return ExitCode.NO_SESSION;
    }

    ctx.sendSignal(owner, 'SIGUSR1');
    ctx.out(`Stopping session (pid ${owner})`);
    return ExitCode.OK;
}

async function showStatus(ctx: CommandContext): Promise<ExitCode> {
    const engines = ctx.createEngines(ctx.config);
    const [reports, languageMode] = await Promise.all([probeEngines(engines), ctx.languages.get()]);

    ctx.out('📋 Engines (priority order):');
    for (const report of reports) {
        if (report.available) {
            ctx.out(`   ✅ ${report.label} (${report.latencyMs}ms)`);
        } else {
            ctx.out(`   ❌ ${report.label}: ${report.error}`);
        }
    }
    ctx.out(`🌐 Language: ${describeLanguage(languageMode)}`);

    return reports.some(r => r.available) ? ExitCode.OK : ExitCode.NO_ENGINE;
}

async function pingDaemon(ctx: CommandContext): Promise<ExitCode> {
    const alive = await ctx.daemon.ping();
    if (!alive) {
        ctx.out('No daemon running');
        return ExitCode.NO_SESSION;
    }
    ctx.out(`Daemon alive (pid ${alive.pid}, ${alive.sessionActive ? 'session active' : 'idle'})`);
    return ExitCode.OK;
}

async function language(ctx: CommandContext, code: string | undefined): Promise<ExitCode> {
    if (code === undefined) {
        ctx.out(`Language: ${describeLanguage(await ctx.languages.get())}`);
        return ExitCode.OK;
    }
    try {
        const mode = await ctx.languages.set(code);
        ctx.out(`Language set to ${describeLanguage(mode)}`);
        return ExitCode.OK;
    } catch (error) {
        ctx.err(describeError(error));
        return ExitCode.FAILURE;
    }
}

async function runDaemon(ctx: CommandContext): Promise<ExitCode> {
    const server = new DaemonServer({
        config: ctx.config,
        engines: ctx.createEngines(ctx.config),
        createFrameSource: ctx.createFrameSource,
        injector: ctx.injector,
        notifier: ctx.notifier,
        languages: ctx.languages,
        lock: ctx.lock,
    });
    await server.start();
    ctx.out(`🎤 Daemon ready on ${server.socketPath}`);

    const stopSessionSignal = (): void => {
        if (!server.stopActiveSession()) {
            console.log('[Daemon] SIGUSR1 with no active session');
        }
    };
    process.on('SIGUSR1', stopSessionSignal);

    await new Promise<void>((resolve) => {
        const shutdown = (): void => {
            ctx.out('\n👋 Shutting down...');
            process.off('SIGINT', shutdown);
            process.off('SIGTERM', shutdown);
            resolve();
        };
        process.on('SIGINT', shutdown);
        process.on('SIGTERM', shutdown);
    });

    process.off('SIGUSR1', stopSessionSignal);
    await server.close();
    return ExitCode.OK;
}

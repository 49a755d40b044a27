/**
 * Desktop text injection
 *
 * Delivers each phrase to whatever window has focus, either by synthesizing
 * keystrokes or through the clipboard and a paste shortcut.
 */

import { spawn } from 'child_process';
import { InjectStrategy, TextInjector } from '../types.js';
import { InjectError, describeError, hasErrorCode } from '../errors.js';
import { prepareText } from './textCleanup.js';

export type CommandRunner = (command: string, args: string[], input?: string) => Promise<void>;

export class CommandFailedError extends Error {
    readonly command: string;
    readonly exitCode: number | null;

    constructor(command: string, exitCode: number | null, stderr: string) {
        super(`${command} exited with code ${exitCode}${stderr ? `: ${stderr}` : ''}`);
        this.name = 'CommandFailedError';
        this.command = command;
        this.exitCode = exitCode;
    }
}

/**
 * Run a command to completion. Resolves on exit rather than on stream
 * close, since clipboard tools leave a child holding the pipes.
 */
export const runCommand: CommandRunner = (command, args, input) => {
    return new Promise((resolve, reject) => {
        const proc = spawn(command, args, { stdio: ['pipe', 'ignore', 'pipe'] });

        let stderr = '';
        proc.stderr.on('data', (chunk: Buffer) => {
            stderr += chunk.toString();
        });

        proc.once('error', reject);
        proc.once('exit', (code) => {
            if (code === 0) {
                resolve();
            } else {
                reject(new CommandFailedError(command, code, stderr.slice(0, 300).trim()));
            }
        });

        proc.stdin.end(input ?? '');
    });
};

export interface DesktopInjectorOptions {
    cleanFillerWords: boolean;
    run?: CommandRunner;
    env?: Record<string, string | undefined>;
}

abstract class DesktopInjector implements TextInjector {
    protected readonly run: CommandRunner;
    protected readonly env: Record<string, string | undefined>;
    private readonly cleanFillerWords: boolean;

    constructor(options: DesktopInjectorOptions) {
        this.cleanFillerWords = options.cleanFillerWords;
        this.run = options.run ?? runCommand;
        this.env = options.env ?? process.env;
    }

    async inject(text: string): Promise<void> {
        const prepared = prepareText(text, { cleanFillerWords: this.cleanFillerWords });
        if (!prepared) {
            console.log(`[Injector] Skipping filler-only phrase: "${text}"`);
            return;
        }

        await this.requireActiveWindow();

        const startedAt = Date.now();
        if (prepared.text) {
            await this.deliver(prepared.text);
        }
        if (prepared.pressEnter) {
            await this.exec('xdotool', ['key', 'Return']);
        }

        const preview = prepared.text.length > 30 ? `${prepared.text.slice(0, 30)}...` : prepared.text;
        console.log(`[Injector] Injected in ${Date.now() - startedAt}ms: "${preview}"${prepared.pressEnter ? ' + Return' : ''}`);
    }

    protected abstract deliver(text: string): Promise<void>;

    protected async exec(command: string, args: string[], input?: string): Promise<void> {
        try {
            await this.run(command, args, input);
        } catch (error) {
            if (hasErrorCode(error, 'ENOENT')) {
                throw new InjectError('injector_unavailable', `${command} is not installed`, { cause: error });
            }
            throw new InjectError('target_window_lost', describeError(error), { cause: error });
        }
    }

    private async requireActiveWindow(): Promise<void> {
        try {
            await this.run('xdotool', ['getactivewindow']);
        } catch (error) {
            if (hasErrorCode(error, 'ENOENT')) {
                throw new InjectError('injector_unavailable', 'xdotool is not installed. Install with: sudo apt install xdotool', { cause: error });
            }
            throw new InjectError('target_window_lost', 'No active window to type into', { cause: error });
        }
    }
}

/**
 * Types text with xdotool
 */
export class KeystrokeInjector extends DesktopInjector {
    protected async deliver(text: string): Promise<void> {
        await this.exec('xdotool', ['type', '--delay', '0', '--', text]);
    }
}

/**
 * Copies text to the clipboard, then pastes it with Ctrl+V
 */
export class ClipboardPasteInjector extends DesktopInjector {
    protected async deliver(text: string): Promise<void> {
        if (this.env.WAYLAND_DISPLAY) {
            await this.exec('wl-copy', [], text);
        } else {
            await this.exec('xclip', ['-selection', 'clipboard'], text);
        }
        await this.exec('xdotool', ['key', '--clearmodifiers', 'ctrl+v']);
    }
}

export function createInjector(strategy: InjectStrategy, options: DesktopInjectorOptions): TextInjector {
    switch (strategy) {
        case 'paste':
            return new ClipboardPasteInjector(options);
        case 'type':
            return new KeystrokeInjector(options);
    }
}

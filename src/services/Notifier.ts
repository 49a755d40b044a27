/**
 * Desktop notifications via notify-send
 */

import { execFile } from 'child_process';
import { Notifier, NotificationUrgency } from '../types.js';

export interface DesktopNotifierOptions {
    appName?: string;
    debug?: boolean;
}

export class DesktopNotifier implements Notifier {
    private readonly appName: string;
    private readonly debug: boolean;
    private unavailable: boolean = false;

    constructor(options: DesktopNotifierOptions = {}) {
        this.appName = options.appName ?? 'Live Dictation';
        this.debug = options.debug ?? false;
    }

    notify(message: string, urgency: NotificationUrgency = 'normal'): void {
        if (this.unavailable) {
            return;
        }

        const expireTime = urgency === 'low' ? 800 : 1500;
        const args = [
            '--app-name', this.appName,
            '--urgency', urgency,
            '--expire-time', String(expireTime),
            '--hint', 'int:transient:1',
            this.appName,
            message,
        ];

        execFile('notify-send', args, (error) => {
            if (!error) return;
            if ('code' in error && error.code === 'ENOENT') {
                this.unavailable = true;
                console.warn('[Notifier] notify-send not found, desktop notices disabled');
            } else if (this.debug) {
                console.warn(`[Notifier] notify-send failed: ${error.message}`);
            }
        });
    }
}

/**
 * Logs notices instead of showing them, for the daemon and headless runs
 */
export class ConsoleNotifier implements Notifier {
    notify(message: string, urgency: NotificationUrgency = 'normal'): void {
        console.log(`[Notice:${urgency}] ${message}`);
    }
}

export function createNotifier(env: Record<string, string | undefined> = process.env, debug: boolean = false): Notifier {
    if (env.DISPLAY || env.WAYLAND_DISPLAY) {
        return new DesktopNotifier({ debug });
    }
    return new ConsoleNotifier();
}

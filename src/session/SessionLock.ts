/**
 * Session Lock
 *
 * A pid file admitting one dictation session at a time. The file is
 * created exclusively; a file naming a process that no longer runs is
 * stale and gets replaced. Eviction renames the file aside first, so two
 * processes replacing the same stale lock cannot both end up holding it.
 */

import { randomUUID } from 'crypto';
import { link, readFile, rename, rm, unlink, writeFile } from 'fs/promises';
import { SessionError, hasErrorCode } from '../errors.js';

export interface SessionLockOptions {
    pid?: number;
    isAlive?: (pid: number) => boolean;
}

export function isProcessAlive(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch (error) {
        // EPERM: exists but belongs to someone else
        return hasErrorCode(error, 'EPERM');
    }
}

export class SessionLock {
    readonly path: string;
    private readonly pid: number;
    private readonly isAlive: (pid: number) => boolean;
    private held: boolean = false;

    constructor(path: string, options: SessionLockOptions = {}) {
        this.path = path;
        this.pid = options.pid ?? process.pid;
        this.isAlive = options.isAlive ?? isProcessAlive;
    }

    get isHeld(): boolean {
        return this.held;
    }

    /**
     * Rejects with SessionError('already_active') while a live owner exists.
     */
    async acquire(): Promise<void> {
        for (let attempt = 0; attempt < 2; attempt++) {
            try {
                await writeFile(this.path, `${this.pid}\n`, { flag: 'wx' });
                this.held = true;
                console.log(`[SessionLock] Acquired ${this.path} (pid ${this.pid})`);
                return;
            } catch (error) {
                if (!hasErrorCode(error, 'EEXIST')) {
                    throw error;
                }
            }

            const owner = await this.readPid();
            const ownerIsUs = owner === this.pid;
            if (owner !== null && (ownerIsUs ? this.held : this.isAlive(owner))) {
                throw new SessionError('already_active', `A dictation session is already running (pid ${owner})`);
            }

            await this.evictStale(owner);
        }

        throw new SessionError('already_active', `Could not acquire ${this.path}`);
    }

    /**
     * Remove the lock file if it still names this process.
     */
    async release(): Promise<void> {
        if (!this.held) {
            return;
        }
        this.held = false;

        const owner = await this.readPid();
        if (owner !== this.pid) {
            console.warn(`[SessionLock] Lock now owned by ${owner ?? 'nobody'}, leaving it in place`);
            return;
        }
        await rm(this.path, { force: true });
        console.log('[SessionLock] Released');
    }

    /**
     * Live owner pid, or null when the lock is absent or stale.
     * Never modifies the file.
     */
    async readOwner(): Promise<number | null> {
        const owner = await this.readPid();
        return owner !== null && this.isAlive(owner) ? owner : null;
    }

    /**
     * Move the stale file aside and drop it. When what got moved is no
     * longer the stale file, another acquirer won in between: put theirs back.
     */
    private async evictStale(staleOwner: number | null): Promise<void> {
        const aside = `${this.path}.${randomUUID()}.stale`;
        try {
            await rename(this.path, aside);
        } catch (error) {
            if (hasErrorCode(error, 'ENOENT')) {
                return;
            }
            throw error;
        }

        const moved = await this.readPid(aside);
        if (moved !== staleOwner) {
            console.warn(`[SessionLock] Lock was taken over by pid ${moved ?? 'unknown'}, restoring it`);
            try {
                await link(aside, this.path);
            } catch (error) {
                if (!hasErrorCode(error, 'EEXIST')) {
                    throw error;
                }
            }
            await unlink(aside);
            return;
        }

        console.warn(`[SessionLock] lock_stale_override: removing stale lock${staleOwner !== null ? ` left by pid ${staleOwner}` : ''}`);
        await unlink(aside);
    }

    private async readPid(path: string = this.path): Promise<number | null> {
        let content: string;
        try {
            content = await readFile(path, 'utf-8');
        } catch (error) {
            if (hasErrorCode(error, 'ENOENT')) {
                return null;
            }
            throw error;
        }
        const pid = parseInt(content.trim(), 10);
        return Number.isInteger(pid) && pid > 0 ? pid : null;
    }
}

/**
 * Run fn while holding the lock. Release happens on every exit path.
 */
export async function withSessionLock<T>(lock: SessionLock, fn: () => Promise<T>): Promise<T> {
    await lock.acquire();
    try {
        return await fn();
    } finally {
        await lock.release();
    }
}

/**
 * Persisted language mode
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { LanguageMode } from '../types.js';
import { hasErrorCode } from '../errors.js';

export const SUPPORTED_LANGUAGES: Record<LanguageMode, string> = {
    auto: 'Auto-detect',
    en: 'English',
    cs: 'Czech',
};

export function isLanguageMode(value: unknown): value is LanguageMode {
    return typeof value === 'string' && Object.prototype.hasOwnProperty.call(SUPPORTED_LANGUAGES, value);
}

export class LanguagePreference {
    readonly filePath: string;

    constructor(stateDir: string) {
        this.filePath = join(stateDir, 'language.json');
    }

    /**
     * Missing or unreadable preferences read as auto.
     */
    async get(): Promise<LanguageMode> {
        let raw: string;
        try {
            raw = await readFile(this.filePath, 'utf-8');
        } catch (error) {
            if (!hasErrorCode(error, 'ENOENT')) {
                console.warn(`[Language] Could not read ${this.filePath}, using auto`);
            }
            return 'auto';
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch {
            console.warn(`[Language] Invalid JSON in ${this.filePath}, using auto`);
            return 'auto';
        }

        if (typeof parsed === 'object' && parsed !== null && 'language' in parsed && isLanguageMode(parsed.language)) {
            return parsed.language;
        }
        console.warn(`[Language] Unknown language in ${this.filePath}, using auto`);
        return 'auto';
    }

    async set(code: string): Promise<LanguageMode> {
        const normalized = code.trim().toLowerCase();
        if (!isLanguageMode(normalized)) {
            const supported = Object.keys(SUPPORTED_LANGUAGES).join(', ');
            throw new Error(`Unsupported language "${code}". Supported: ${supported}`);
        }

        await mkdir(dirname(this.filePath), { recursive: true });
        await writeFile(this.filePath, JSON.stringify({ language: normalized }, null, 2) + '\n');
        console.log(`[Language] Set to ${normalized} (${SUPPORTED_LANGUAGES[normalized]})`);
        return normalized;
    }
}

export function describeLanguage(mode: LanguageMode): string {
    return `${mode} (${SUPPORTED_LANGUAGES[mode]})`;
}

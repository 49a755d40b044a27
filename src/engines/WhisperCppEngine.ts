/**
 * Local whisper.cpp transcription
 *
 * Runs whisper-cli on a temporary WAV file. No network, no key; it is
 * only as available as the binary and model on disk.
 */

import { execFile } from 'child_process';
import { access, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { cpus, tmpdir } from 'os';
import { join } from 'path';
import { AudioChunk, EngineTranscript, LanguageMode } from '../types.js';
import { EngineError } from '../errors.js';
import { pcmToWav } from '../audio/wav.js';
import { binaryExists } from '../audio/FrameSource.js';
import { BaseEngine, BaseEngineOptions } from './BaseEngine.js';

export interface WhisperCppOptions extends BaseEngineOptions {
    binaryPath?: string;
    modelPath?: string;
}

export class WhisperCppEngine extends BaseEngine {
    readonly id = 'whisper-cpp' as const;
    readonly label = 'WhisperCpp';

    private readonly binarySetting: string | undefined;
    private readonly modelPath: string | undefined;
    private resolvedBinary: string | undefined;

    constructor(options: WhisperCppOptions) {
        super(options);
        this.binarySetting = options.binaryPath;
        this.modelPath = options.modelPath;
    }

    protected async checkAvailability(): Promise<void> {
        await this.resolve();
    }

    protected async transcribeAudio(
        chunk: AudioChunk,
        languageMode: LanguageMode,
        signal: AbortSignal
    ): Promise<EngineTranscript> {
        const { binary, model } = await this.resolve();

        const workDir = await mkdtemp(join(tmpdir(), 'live-dictation-'));
        const wavPath = join(workDir, `chunk-${chunk.sequence}.wav`);
        const outputBase = join(workDir, `chunk-${chunk.sequence}`);

        try {
            await writeFile(wavPath, pcmToWav(chunk.pcm16, chunk.sampleRate));

            const args = [
                '-m', model,
                '-l', this.languageCode(languageMode) ?? 'auto',
                '--output-txt',
                '--no-timestamps',
                '--no-prints',
                '-of', outputBase,
                '-t', String(Math.min(cpus().length, 4)),
                '-bs', '1',
                wavPath,
            ];
            await this.runWhisperCli(binary, args, signal);

            // No txt file when nothing was recognised
            const text = await readFile(`${outputBase}.txt`, 'utf-8').catch(() => '');
            return { text: text.trim() };
        } finally {
            await rm(workDir, { recursive: true, force: true });
        }
    }

    protected classifyError(): EngineError | null {
        return null;
    }

    private async resolve(): Promise<{ binary: string; model: string }> {
        if (!this.modelPath) {
            throw this.fail('unavailable', 'WHISPER_CPP_MODEL is not set');
        }
        if (!(await fileExists(this.modelPath))) {
            throw this.fail('unavailable', `Model file not found: ${this.modelPath}`);
        }
        this.resolvedBinary ??= await findWhisperCppBinary(this.binarySetting);
        if (!this.resolvedBinary) {
            throw this.fail('unavailable', 'whisper-cli not found. Install whisper.cpp or set WHISPER_CPP_PATH');
        }
        return { binary: this.resolvedBinary, model: this.modelPath };
    }

    private runWhisperCli(binary: string, args: string[], signal: AbortSignal): Promise<void> {
        return new Promise((resolve, reject) => {
            execFile(binary, args, { signal }, (error, _stdout, stderr) => {
                if (error) {
                    const msg = stderr.slice(0, 300).trim() || error.message;
                    reject(this.fail('unavailable', `whisper-cli failed: ${msg}`, error));
                    return;
                }
                resolve();
            });
        });
    }
}

export async function findWhisperCppBinary(settingPath?: string): Promise<string | undefined> {
    if (settingPath && await fileExists(settingPath)) {
        return settingPath;
    }

    const names = process.platform === 'win32'
        ? ['whisper-cli.exe', 'whisper-cpp.exe', 'whisper.exe']
        : ['whisper-cli', 'whisper-cpp', 'whisper'];

    for (const name of names) {
        if (await binaryExists(name)) {
            return name;
        }
    }
    return undefined;
}

function fileExists(path: string): Promise<boolean> {
    return access(path).then(() => true, () => false);
}

/**
 * Frame Sources
 *
 * A FrameSource yields fixed-size PCM16 frames at a known sample rate.
 * The microphone source records through whichever command-line recorder
 * is installed (arecord, SoX or FFmpeg) and re-slices its raw stdout.
 */

import { spawn, execFile } from 'child_process';
import { AudioFrame } from '../types.js';
import { BYTES_PER_SAMPLE } from './wav.js';

export interface FrameSource extends AsyncIterable<AudioFrame> {
    close(): void;
}

type RecorderBackend = 'arecord' | 'sox' | 'ffmpeg';

export interface RecorderInfo {
    backend: RecorderBackend;
    binaryPath: string;
}

export interface MicrophoneOptions {
    sampleRate: number;
    frameSize: number;
    recorder?: RecorderInfo;
    signal?: AbortSignal;
}

interface RecorderExit {
    code: number | null;
    signal: NodeJS.Signals | null;
    error?: Error;
}

export class MicrophoneFrameSource implements FrameSource {
    private readonly options: MicrophoneOptions;
    private kill: (() => void) | null = null;
    private closed: boolean = false;

    constructor(options: MicrophoneOptions) {
        this.options = options;
        options.signal?.addEventListener('abort', () => this.close(), { once: true });
    }

    close(): void {
        this.closed = true;
        this.kill?.();
    }

    async *[Symbol.asyncIterator](): AsyncGenerator<AudioFrame> {
        if (this.closed) {
            return;
        }

        const recorder = this.options.recorder ?? await detectRecorder();
        if (!recorder) {
            throw new Error(getInstallInstructions());
        }

        const { sampleRate, frameSize } = this.options;
        const proc = spawn(recorder.binaryPath, buildRecorderArgs(recorder.backend, sampleRate), {
            stdio: ['ignore', 'pipe', 'pipe'],
        });
        const stopRecorder = (): void => {
            if (!proc.killed) {
                proc.kill('SIGTERM');
            }
        };
        this.kill = stopRecorder;

        let stderrData = '';
        proc.stderr.on('data', (chunk: Buffer) => {
            stderrData += chunk.toString();
        });

        const finished = new Promise<RecorderExit>((resolve) => {
            proc.once('error', (error) => resolve({ code: null, signal: null, error }));
            proc.once('close', (code, signal) => resolve({ code, signal }));
        });

        console.log(`[Microphone] Recording with ${recorder.backend} at ${sampleRate} Hz`);

        const frameBytes = frameSize * BYTES_PER_SAMPLE;
        let pending: Buffer = Buffer.alloc(0);

        try {
            for await (const data of proc.stdout) {
                const chunk: Buffer = data;
                pending = pending.length === 0 ? chunk : Buffer.concat([pending, chunk]);
                while (pending.length >= frameBytes) {
                    const samples = pending.subarray(0, frameBytes);
                    pending = pending.subarray(frameBytes);
                    yield { timestamp: Date.now(), samples, sampleRate };
                }
                if (this.closed) {
                    break;
                }
            }
        } finally {
            stopRecorder();
        }

        const exit = await finished;
        if (exit.error) {
            throw new Error(`Recording failed to start: ${exit.error.message}`);
        }
        if (!this.closed && exit.code !== 0 && exit.code !== null) {
            const msg = stderrData.slice(0, 300).trim();
            throw new Error(`Recording exited with code ${exit.code}: ${msg}`);
        }
    }
}

function buildRecorderArgs(backend: RecorderBackend, sampleRate: number): string[] {
    const rate = String(sampleRate);
    switch (backend) {
        case 'arecord':
            return ['-q', '-f', 'S16_LE', '-r', rate, '-c', '1', '-t', 'raw'];
        case 'sox':
            return ['-q', '-d', '-t', 'raw', '-r', rate, '-c', '1', '-b', '16', '-e', 'signed-integer', '-'];
        case 'ffmpeg':
            return [
                '-loglevel', 'error',
                '-f', getFFmpegInputFormat(), '-i', getFFmpegInputDevice(),
                '-ar', rate, '-ac', '1', '-f', 's16le', '-',
            ];
    }
}

function getFFmpegInputFormat(): string {
    switch (process.platform) {
        case 'win32': return 'dshow';
        case 'darwin': return 'avfoundation';
        default: return 'pulse';
    }
}

function getFFmpegInputDevice(): string {
    switch (process.platform) {
        case 'win32': return 'audio=default';
        case 'darwin': return ':default';
        default: return 'default';
    }
}

export async function detectRecorder(): Promise<RecorderInfo | undefined> {
    for (const c of getCandidates()) {
        if (await binaryExists(c.binary)) {
            return { backend: c.backend, binaryPath: c.binary };
        }
    }
    return undefined;
}

function getCandidates(): Array<{ backend: RecorderBackend; binary: string }> {
    switch (process.platform) {
        case 'linux':
            return [
                { backend: 'arecord', binary: 'arecord' },
                { backend: 'sox', binary: 'sox' },
                { backend: 'ffmpeg', binary: 'ffmpeg' },
            ];
        case 'win32':
            return [
                { backend: 'ffmpeg', binary: 'ffmpeg' },
                { backend: 'sox', binary: 'sox' },
            ];
        default:
            return [
                { backend: 'sox', binary: 'sox' },
                { backend: 'ffmpeg', binary: 'ffmpeg' },
            ];
    }
}

export function binaryExists(name: string): Promise<boolean> {
    const cmd = process.platform === 'win32' ? 'where' : 'which';
    return new Promise((resolve) => {
        execFile(cmd, [name], (err) => resolve(!err));
    });
}

function getInstallInstructions(): string {
    switch (process.platform) {
        case 'linux':
            return 'No audio recorder found. Install arecord (alsa-utils) or SoX: sudo apt install alsa-utils';
        case 'darwin':
            return 'No audio recorder found. Install SoX: brew install sox';
        default:
            return 'No audio recorder found. Install SoX or FFmpeg.';
    }
}

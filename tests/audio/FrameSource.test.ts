import { describe, expect, it } from 'vitest';
import { AudioFrame } from '../../src/types.js';
import { MicrophoneFrameSource } from '../../src/audio/FrameSource.js';

async function drain(source: AsyncIterable<AudioFrame>): Promise<AudioFrame[]> {
    const frames: AudioFrame[] = [];
    for await (const frame of source) {
        frames.push(frame);
    }
    return frames;
}

describe('MicrophoneFrameSource', () => {
    it('yields nothing once closed, without starting a recorder', async () => {
        const source = new MicrophoneFrameSource({
            sampleRate: 16000,
            frameSize: 1024,
            recorder: { backend: 'arecord', binaryPath: '/nonexistent/arecord' },
        });
        source.close();

        expect(await drain(source)).toEqual([]);
    });

    it('closes when its abort signal fires', async () => {
        const controller = new AbortController();
        const source = new MicrophoneFrameSource({
            sampleRate: 16000,
            frameSize: 1024,
            recorder: { backend: 'arecord', binaryPath: '/nonexistent/arecord' },
            signal: controller.signal,
        });
        controller.abort();

        expect(await drain(source)).toEqual([]);
    });
});

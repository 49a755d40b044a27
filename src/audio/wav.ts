/**
 * PCM16 helpers shared by the segmenter and the engines
 */

export const BYTES_PER_SAMPLE = 2;

/**
 * RMS amplitude of little-endian 16-bit samples
 */
export function rmsAmplitude(pcm16: Buffer): number {
    const sampleCount = Math.floor(pcm16.length / BYTES_PER_SAMPLE);
    if (sampleCount === 0) {
        return 0;
    }
    let sumSquares = 0;
    for (let i = 0; i < sampleCount; i++) {
        const sample = pcm16.readInt16LE(i * BYTES_PER_SAMPLE);
        sumSquares += sample * sample;
    }
    return Math.sqrt(sumSquares / sampleCount);
}

export function sampleCount(pcm16: Buffer): number {
    return Math.floor(pcm16.length / BYTES_PER_SAMPLE);
}

export function pcmDurationMs(pcm16: Buffer, sampleRate: number): number {
    return (sampleCount(pcm16) / sampleRate) * 1000;
}

/**
 * Convert raw PCM16 to WAV format for file-based transcription APIs
 */
export function pcmToWav(pcmData: Buffer, sampleRate: number, numChannels: number = 1): Buffer {
    const bitsPerSample = 16;
    const byteRate = sampleRate * numChannels * (bitsPerSample / 8);
    const blockAlign = numChannels * (bitsPerSample / 8);
    const dataSize = pcmData.length;
    const headerSize = 44;

    const wav = Buffer.alloc(headerSize + dataSize);

    // RIFF header
    wav.write('RIFF', 0);
    wav.writeUInt32LE(36 + dataSize, 4);
    wav.write('WAVE', 8);

    // fmt chunk
    wav.write('fmt ', 12);
    wav.writeUInt32LE(16, 16);
    wav.writeUInt16LE(1, 20); // PCM
    wav.writeUInt16LE(numChannels, 22);
    wav.writeUInt32LE(sampleRate, 24);
    wav.writeUInt32LE(byteRate, 28);
    wav.writeUInt16LE(blockAlign, 32);
    wav.writeUInt16LE(bitsPerSample, 34);

    // data chunk
    wav.write('data', 36);
    wav.writeUInt32LE(dataSize, 40);
    pcmData.copy(wav, 44);

    return wav;
}

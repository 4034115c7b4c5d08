// WAV Encoding
// 16-bit PCM RIFF/WAVE container for the float samples both backends upload or hand to whisper-cli

const HEADER_SIZE = 44;
const BITS_PER_SAMPLE = 16;

/**
 * Encode mono float samples in [-1, 1] as a 16-bit PCM WAV file.
 * Out-of-range samples are clipped.
 */
export function encodeWav(samples: Float32Array, sampleRate: number): Buffer {
    const bytesPerSample = BITS_PER_SAMPLE / 8;
    const dataSize = samples.length * bytesPerSample;
    const buffer = Buffer.alloc(HEADER_SIZE + dataSize);

    // RIFF header
    buffer.write('RIFF', 0, 'ascii');
    buffer.writeUInt32LE(36 + dataSize, 4);
    buffer.write('WAVE', 8, 'ascii');

    // fmt chunk
    buffer.write('fmt ', 12, 'ascii');
    buffer.writeUInt32LE(16, 16);
    buffer.writeUInt16LE(1, 20); // PCM
    buffer.writeUInt16LE(1, 22); // mono
    buffer.writeUInt32LE(sampleRate, 24);
    buffer.writeUInt32LE(sampleRate * bytesPerSample, 28);
    buffer.writeUInt16LE(bytesPerSample, 32);
    buffer.writeUInt16LE(BITS_PER_SAMPLE, 34);

    // data chunk
    buffer.write('data', 36, 'ascii');
    buffer.writeUInt32LE(dataSize, 40);

    let offset = HEADER_SIZE;
    for (let i = 0; i < samples.length; i++) {
        const clipped = Math.max(-1, Math.min(1, samples[i]));
        const value = clipped < 0 ? Math.round(clipped * 0x8000) : Math.round(clipped * 0x7fff);
        buffer.writeInt16LE(value, offset);
        offset += bytesPerSample;
    }

    return buffer;
}

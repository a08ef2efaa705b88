export const FLOAT32_BYTES_PER_SAMPLE = 4;
export const INT16_BYTES_PER_SAMPLE = 2;

const INT16_SCALE = 32767;

/**
 * Converts little-endian float32 samples in [-1, 1] to LINEAR16 (signed
 * 16-bit little-endian). Out-of-range samples are clipped; a trailing partial
 * sample is dropped.
 */
export const float32ToInt16Le = (input: Buffer): Buffer => {
  const sampleCount = Math.floor(input.length / FLOAT32_BYTES_PER_SAMPLE);
  const output = Buffer.alloc(sampleCount * INT16_BYTES_PER_SAMPLE);

  for (let index = 0; index < sampleCount; index += 1) {
    const sample = input.readFloatLE(index * FLOAT32_BYTES_PER_SAMPLE);
    const clipped = Number.isNaN(sample) ? 0 : Math.max(-1, Math.min(1, sample));
    output.writeInt16LE(Math.trunc(clipped * INT16_SCALE), index * INT16_BYTES_PER_SAMPLE);
  }

  return output;
};

export const bytesPerChunk = (
  sampleRate: number,
  chunkDurationMs: number,
  bytesPerSample: number
): number => Math.max(1, Math.floor((sampleRate * chunkDurationMs) / 1000)) * bytesPerSample;

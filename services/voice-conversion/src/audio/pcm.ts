/**
 * Raw little-endian float32 sample buffers, as exchanged with ffmpeg and
 * the inference server
 */
export function float32ToBytes(samples: Float32Array): Buffer {
  const buffer = Buffer.alloc(samples.length * 4);
  for (let i = 0; i < samples.length; i++) {
    buffer.writeFloatLE(samples[i], i * 4);
  }
  return buffer;
}

export function bytesToFloat32(buffer: Buffer): Float32Array {
  const count = Math.floor(buffer.length / 4);
  const samples = new Float32Array(count);
  for (let i = 0; i < count; i++) {
    samples[i] = buffer.readFloatLE(i * 4);
  }
  return samples;
}

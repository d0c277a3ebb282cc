import { InputError, type AudioTranscoder, type LossyFormat, type ProbeResult } from '@timbre/core';

const MAGIC: Record<LossyFormat, Buffer> = {
  mp3: Buffer.from('ID3\u0004', 'latin1'),
  ogg: Buffer.from('OggS', 'latin1')
};

const HEADER_BYTES = 8;

/**
 * In-process stand-in for ffmpeg.
 *
 * Output is `magic(4) | sampleRate u32le | float32le samples`: the magic makes
 * container detection see mp3 or ogg, and decoding is exact.
 */
export class FakeTranscoder implements AudioTranscoder {
  readonly encoded: Array<{ format: LossyFormat; samples: number; sampleRate: number }> = [];
  decodeCalls = 0;

  async encode(samples: Float32Array, sampleRate: number, format: LossyFormat): Promise<Buffer> {
    this.encoded.push({ format, samples: samples.length, sampleRate });
    return encodeFake(samples, sampleRate, format);
  }

  async decode(bytes: Buffer, sampleRate: number): Promise<Float32Array> {
    this.decodeCalls++;
    const { samples, sampleRate: stored } = parseFake(bytes);

    if (stored === sampleRate) {
      return samples;
    }

    // Nearest-sample rate change is enough for tests
    const length = Math.round(samples.length * sampleRate / stored);
    const output = new Float32Array(length);
    for (let i = 0; i < length; i++) {
      output[i] = samples[Math.min(samples.length - 1, Math.floor(i * stored / sampleRate))];
    }
    return output;
  }

  async probe(bytes: Buffer): Promise<ProbeResult> {
    return { sampleRate: parseFake(bytes).sampleRate, channels: 1 };
  }
}

export function encodeFake(samples: Float32Array, sampleRate: number, format: LossyFormat): Buffer {
  const buffer = Buffer.alloc(HEADER_BYTES + samples.length * 4);
  MAGIC[format].copy(buffer, 0);
  buffer.writeUInt32LE(sampleRate, 4);
  for (let i = 0; i < samples.length; i++) {
    buffer.writeFloatLE(samples[i], HEADER_BYTES + i * 4);
  }
  return buffer;
}

function parseFake(bytes: Buffer): { samples: Float32Array; sampleRate: number } {
  if (bytes.length < HEADER_BYTES || (bytes.length - HEADER_BYTES) % 4 !== 0) {
    throw new InputError('Failed to decode audio: not produced by the fake transcoder');
  }

  const sampleRate = bytes.readUInt32LE(4);
  const samples = new Float32Array((bytes.length - HEADER_BYTES) / 4);
  for (let i = 0; i < samples.length; i++) {
    samples[i] = bytes.readFloatLE(HEADER_BYTES + i * 4);
  }
  return { samples, sampleRate };
}

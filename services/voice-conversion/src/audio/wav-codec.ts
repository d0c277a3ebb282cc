import { InputError } from '@timbre/core';

const WAVE_FORMAT_PCM = 0x0001;
const WAVE_FORMAT_IEEE_FLOAT = 0x0003;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

export interface DecodedWav {
  sampleRate: number;
  channels: Float32Array[];
}

interface WavFormat {
  formatTag: number;
  channelCount: number;
  sampleRate: number;
  bitsPerSample: number;
  blockAlign: number;
}

/**
 * Decode a RIFF/WAVE buffer into per-channel float samples.
 * Handles PCM 8/16/24/32-bit, IEEE float 32/64-bit and WAVE_FORMAT_EXTENSIBLE.
 */
export function decodeWav(buffer: Buffer): DecodedWav {
  if (
    buffer.length < 12 ||
    buffer.toString('latin1', 0, 4) !== 'RIFF' ||
    buffer.toString('latin1', 8, 12) !== 'WAVE'
  ) {
    throw new InputError('Invalid audio file: not a RIFF/WAVE container');
  }

  let format: WavFormat | null = null;
  let dataOffset = -1;
  let dataLength = 0;
  let offset = 12;

  while (offset + 8 <= buffer.length) {
    const chunkId = buffer.toString('latin1', offset, offset + 4);
    const chunkSize = buffer.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (chunkId === 'fmt ') {
      format = readFormat(buffer, body, chunkSize);
    } else if (chunkId === 'data') {
      dataOffset = body;
      // Streamed WAVs may carry a placeholder size
      dataLength = Math.min(chunkSize, buffer.length - body);
      break;
    }

    offset = body + chunkSize + (chunkSize % 2);
  }

  if (!format) {
    throw new InputError('Invalid audio file: WAV has no fmt chunk');
  }
  if (dataOffset < 0) {
    throw new InputError('Invalid audio file: WAV has no data chunk');
  }

  return {
    sampleRate: format.sampleRate,
    channels: readSamples(buffer, dataOffset, dataLength, format)
  };
}

function readFormat(buffer: Buffer, body: number, size: number): WavFormat {
  if (size < 16 || body + 16 > buffer.length) {
    throw new InputError('Invalid audio file: truncated WAV fmt chunk');
  }

  let formatTag = buffer.readUInt16LE(body);
  const channelCount = buffer.readUInt16LE(body + 2);
  const sampleRate = buffer.readUInt32LE(body + 4);
  const blockAlign = buffer.readUInt16LE(body + 12);
  const bitsPerSample = buffer.readUInt16LE(body + 14);

  if (formatTag === WAVE_FORMAT_EXTENSIBLE) {
    if (size < 40 || body + 26 > buffer.length) {
      throw new InputError('Invalid audio file: truncated WAVE_FORMAT_EXTENSIBLE header');
    }
    // First two bytes of the sub-format GUID carry the real format tag
    formatTag = buffer.readUInt16LE(body + 24);
  }

  if (channelCount === 0 || sampleRate === 0 || blockAlign === 0) {
    throw new InputError('Invalid audio file: WAV header declares no audio', {
      channelCount,
      sampleRate
    });
  }

  const supported =
    (formatTag === WAVE_FORMAT_PCM && [8, 16, 24, 32].includes(bitsPerSample)) ||
    (formatTag === WAVE_FORMAT_IEEE_FLOAT && [32, 64].includes(bitsPerSample));

  if (!supported) {
    throw new InputError('Unsupported WAV encoding', { formatTag, bitsPerSample });
  }

  return { formatTag, channelCount, sampleRate, bitsPerSample, blockAlign };
}

function readSamples(buffer: Buffer, start: number, length: number, format: WavFormat): Float32Array[] {
  const bytesPerSample = format.bitsPerSample / 8;
  const frameCount = Math.floor(length / format.blockAlign);
  const channels = Array.from({ length: format.channelCount }, () => new Float32Array(frameCount));

  for (let frame = 0; frame < frameCount; frame++) {
    const frameOffset = start + frame * format.blockAlign;
    for (let ch = 0; ch < format.channelCount; ch++) {
      channels[ch][frame] = readSample(buffer, frameOffset + ch * bytesPerSample, format);
    }
  }

  return channels;
}

function readSample(buffer: Buffer, at: number, format: WavFormat): number {
  if (format.formatTag === WAVE_FORMAT_IEEE_FLOAT) {
    return format.bitsPerSample === 32 ? buffer.readFloatLE(at) : buffer.readDoubleLE(at);
  }

  switch (format.bitsPerSample) {
    case 8:
      return (buffer.readUInt8(at) - 128) / 128;
    case 16:
      return buffer.readInt16LE(at) / 32768;
    case 24:
      return buffer.readIntLE(at, 3) / 8388608;
    default:
      return buffer.readInt32LE(at) / 2147483648;
  }
}

/**
 * Encode mono samples as a 32-bit IEEE float WAV.
 * Float32 samples survive a decode unchanged.
 */
export function encodeWav(samples: Float32Array, sampleRate: number): Buffer {
  const dataLength = samples.length * 4;
  const fmtLength = 18;
  const headerLength = 12 + (8 + fmtLength) + (8 + 4) + 8;
  const buffer = Buffer.alloc(headerLength + dataLength);

  let offset = 0;
  buffer.write('RIFF', offset, 'latin1'); offset += 4;
  buffer.writeUInt32LE(headerLength - 8 + dataLength, offset); offset += 4;
  buffer.write('WAVE', offset, 'latin1'); offset += 4;

  buffer.write('fmt ', offset, 'latin1'); offset += 4;
  buffer.writeUInt32LE(fmtLength, offset); offset += 4;
  buffer.writeUInt16LE(WAVE_FORMAT_IEEE_FLOAT, offset); offset += 2;
  buffer.writeUInt16LE(1, offset); offset += 2;
  buffer.writeUInt32LE(sampleRate, offset); offset += 4;
  buffer.writeUInt32LE(sampleRate * 4, offset); offset += 4;
  buffer.writeUInt16LE(4, offset); offset += 2;
  buffer.writeUInt16LE(32, offset); offset += 2;
  buffer.writeUInt16LE(0, offset); offset += 2;

  buffer.write('fact', offset, 'latin1'); offset += 4;
  buffer.writeUInt32LE(4, offset); offset += 4;
  buffer.writeUInt32LE(samples.length, offset); offset += 4;

  buffer.write('data', offset, 'latin1'); offset += 4;
  buffer.writeUInt32LE(dataLength, offset); offset += 4;

  for (let i = 0; i < samples.length; i++) {
    buffer.writeFloatLE(samples[i], offset + i * 4);
  }

  return buffer;
}

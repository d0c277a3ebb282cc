import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { InputError } from '@timbre/core';
import { createPcm16Wav, createTone, encodeFake, FakeTranscoder } from '@timbre/test-utils';
import { decodeWav, encodeWav } from '../src/audio/wav-codec';
import { detectContainer } from '../src/audio/container';
import { downmix, resample, rmsDb, stretchToLength } from '../src/audio/dsp';
import {
  AudioResolver,
  decodeBase64Audio,
  describeAsset,
  selectAudioSource
} from '../src/audio/audio-resolver';

function stereoPcm16(left: number[], right: number[], sampleRate: number): Buffer {
  const frames = left.length;
  const buffer = Buffer.alloc(44 + frames * 4);

  buffer.write('RIFF', 0, 'latin1');
  buffer.writeUInt32LE(36 + frames * 4, 4);
  buffer.write('WAVE', 8, 'latin1');
  buffer.write('fmt ', 12, 'latin1');
  buffer.writeUInt32LE(16, 16);
  buffer.writeUInt16LE(1, 20);
  buffer.writeUInt16LE(2, 22);
  buffer.writeUInt32LE(sampleRate, 24);
  buffer.writeUInt32LE(sampleRate * 4, 28);
  buffer.writeUInt16LE(4, 32);
  buffer.writeUInt16LE(16, 34);
  buffer.write('data', 36, 'latin1');
  buffer.writeUInt32LE(frames * 4, 40);

  for (let i = 0; i < frames; i++) {
    buffer.writeInt16LE(left[i], 44 + i * 4);
    buffer.writeInt16LE(right[i], 46 + i * 4);
  }
  return buffer;
}

describe('WAV codec', () => {
  it('should round-trip float samples exactly', () => {
    const samples = createTone(0.5, 8000, { frequency: 440, amplitude: 0.8 });
    const decoded = decodeWav(encodeWav(samples, 8000));

    expect(decoded.sampleRate).toBe(8000);
    expect(decoded.channels).toHaveLength(1);
    expect(Array.from(decoded.channels[0])).toEqual(Array.from(samples));
  });

  it('should write a 58-byte float header', () => {
    const encoded = encodeWav(new Float32Array(10), 22050);

    expect(encoded.length).toBe(58 + 40);
    expect(encoded.readUInt16LE(20)).toBe(3);
    expect(encoded.readUInt32LE(24)).toBe(22050);
  });

  it('should decode 16-bit PCM', () => {
    const decoded = decodeWav(createPcm16Wav(Float32Array.from([0, 0.5, -0.5, 1, -1]), 16000));

    expect(Array.from(decoded.channels[0])).toEqual([0, 16384 / 32768, -0.5, 32767 / 32768, -1]);
  });

  it('should clip when writing 16-bit PCM', () => {
    const decoded = decodeWav(createPcm16Wav(Float32Array.from([2, -3]), 16000));

    expect(Array.from(decoded.channels[0])).toEqual([32767 / 32768, -1]);
  });

  it('should keep channels separate', () => {
    const decoded = decodeWav(stereoPcm16([16384, 0], [0, -16384], 44100));

    expect(decoded.channels).toHaveLength(2);
    expect(Array.from(decoded.channels[0])).toEqual([0.5, 0]);
    expect(Array.from(decoded.channels[1])).toEqual([0, -0.5]);
  });

  it('should reject non-WAV data', () => {
    expect(() => decodeWav(Buffer.from('not audio at all'))).toThrow(InputError);
  });

  it('should reject a WAV without data chunk', () => {
    const header = createPcm16Wav(new Float32Array(0), 16000).subarray(0, 36);

    expect(() => decodeWav(header)).toThrow('Invalid audio file: WAV has no data chunk');
  });
});

describe('detectContainer', () => {
  it('should recognize supported containers', () => {
    expect(detectContainer(encodeWav(new Float32Array(4), 8000))).toBe('wav');
    expect(detectContainer(Buffer.from('OggS\u0000\u0002', 'latin1'))).toBe('ogg');
    expect(detectContainer(Buffer.from('fLaC\u0000\u0000', 'latin1'))).toBe('flac');
    expect(detectContainer(Buffer.from('ID3\u0004\u0000', 'latin1'))).toBe('mp3');
    expect(detectContainer(Buffer.from([0xff, 0xfb, 0x90, 0x64]))).toBe('mp3');
  });

  it('should return null for unknown or short input', () => {
    expect(detectContainer(Buffer.from('hello world'))).toBeNull();
    expect(detectContainer(Buffer.from([0x52, 0x49]))).toBeNull();
  });
});

describe('DSP helpers', () => {
  it('should average channels when down-mixing', () => {
    const mono = downmix([Float32Array.from([1, 0.5]), Float32Array.from([0, -0.5])]);

    expect(Array.from(mono)).toEqual([0.5, 0]);
  });

  it('should keep duration when resampling', () => {
    expect(resample(new Float32Array(44100), 44100, 22050)).toHaveLength(22050);
    expect(resample(new Float32Array(1000), 16000, 22050)).toHaveLength(1378);
  });

  it('should interpolate linearly', () => {
    expect(Array.from(stretchToLength(Float32Array.from([0, 1]), 3))).toEqual([0, 0.5, 1]);
  });

  it('should measure full-scale square wave at 0 dB', () => {
    expect(rmsDb(Float32Array.from([1, -1, 1, -1]), 0, 4)).toBeCloseTo(0, 6);
    expect(rmsDb(new Float32Array(4), 0, 4)).toBeCloseTo(-200, 6);
  });
});

describe('selectAudioSource', () => {
  it('should reject a missing source', () => {
    expect(() => selectAudioSource('source', {})).toThrow(InputError);
    expect(() => selectAudioSource('source', {})).toThrow(/^No source audio provided/);
  });

  it('should reject conflicting forms', () => {
    expect(() => selectAudioSource('reference', {
      path: '/tmp/a.wav',
      base64: 'AAAA'
    })).toThrow(/^Conflicting reference audio/);
  });

  it('should pick the single populated form', () => {
    expect(selectAudioSource('source', { path: '/tmp/a.wav' })).toEqual({ kind: 'path', path: '/tmp/a.wav' });
    expect(selectAudioSource('source', {
      upload: { buffer: Buffer.from('x'), originalname: 'a.wav' }
    })).toEqual({ kind: 'upload', buffer: Buffer.from('x'), filename: 'a.wav' });
  });
});

describe('decodeBase64Audio', () => {
  it('should strip data-URI prefixes and whitespace', () => {
    const bytes = Buffer.from('RIFF1234WAVE');
    const text = `data:audio/wav;base64,${bytes.toString('base64').slice(0, 8)}\n${bytes.toString('base64').slice(8)}`;

    expect(decodeBase64Audio(text).equals(bytes)).toBe(true);
  });

  it('should reject text that is not base64', () => {
    expect(() => decodeBase64Audio('not base64!')).toThrow(InputError);
    expect(() => decodeBase64Audio('   ')).toThrow(InputError);
  });
});

describe('AudioResolver', () => {
  const transcoder = new FakeTranscoder();
  const resolver = new AudioResolver({ sampleRate: 16000, transcoder });
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'timbre-resolver-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should resolve a WAV file from a path', async () => {
    const samples = createTone(1, 16000);
    const filePath = path.join(tempDir, 'source.wav');
    await fs.writeFile(filePath, encodeWav(samples, 16000));

    const asset = await resolver.resolve({ kind: 'path', path: filePath });

    expect(asset.provenance).toBe('path');
    expect(asset.format).toBe('wav');
    expect(asset.sampleRate).toBe(16000);
    expect(asset.durationSec).toBe(1);
    expect(Array.from(asset.samples)).toEqual(Array.from(samples));
  });

  it('should report a missing file', async () => {
    const missing = path.join(tempDir, 'missing.wav');

    await expect(resolver.resolve({ kind: 'path', path: missing }))
      .rejects.toThrow(`Audio file not found: ${missing}`);
  });

  it('should reject a directory path', async () => {
    await expect(resolver.resolve({ kind: 'path', path: tempDir })).rejects.toBeInstanceOf(InputError);
  });

  it('should down-mix and resample stereo input', async () => {
    const left = Array.from({ length: 44100 }, () => 16384);
    const right = Array.from({ length: 44100 }, () => 0);
    const upload = stereoPcm16(left, right, 44100);

    const asset = await resolver.resolve({ kind: 'upload', buffer: upload, filename: 'stereo.wav' });

    expect(asset.samples).toHaveLength(16000);
    expect(asset.samples[100]).toBeCloseTo(0.25, 6);
    expect(asset.originalChannels).toBe(2);
    expect(describeAsset(asset)).toEqual({
      duration: 1,
      sample_rate: 44100,
      channels: 1,
      file_size: upload.length,
      file_format: 'wav'
    });
  });

  it('should decode other containers through the transcoder', async () => {
    const encoded = encodeFake(new Float32Array(8000).fill(0.25), 8000, 'mp3');

    const asset = await resolver.resolve({ kind: 'inline', data: encoded.toString('base64') });

    expect(asset.format).toBe('mp3');
    expect(asset.provenance).toBe('inline');
    expect(asset.originalSampleRate).toBe(8000);
    expect(asset.samples).toHaveLength(16000);
    expect(asset.samples[0]).toBe(0.25);
  });

  it('should reject an empty upload', async () => {
    await expect(resolver.resolve({ kind: 'upload', buffer: Buffer.alloc(0) }))
      .rejects.toThrow('Uploaded audio file is empty');
  });

  it('should reject an unknown container', async () => {
    await expect(resolver.resolve({ kind: 'upload', buffer: Buffer.from('plain text, no audio') }))
      .rejects.toThrow('Invalid audio file: unrecognized container format');
  });

  it('should reject a WAV with no samples', async () => {
    await expect(resolver.resolve({ kind: 'upload', buffer: encodeWav(new Float32Array(0), 16000) }))
      .rejects.toThrow('Invalid audio file: contains no samples');
  });
});

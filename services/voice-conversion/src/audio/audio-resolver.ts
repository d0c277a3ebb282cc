import { promises as fs } from 'fs';
import * as path from 'path';
import {
  createLogger,
  InputError,
  type AudioAsset,
  type AudioInfo,
  type AudioTranscoder,
  type ContainerFormat
} from '@timbre/core';
import { detectContainer } from './container';
import { downmix, resample } from './dsp';
import { decodeWav } from './wav-codec';

const logger = createLogger('audio-resolver');

export type AudioSlot = 'source' | 'reference';

export interface UploadedAudio {
  buffer: Buffer;
  originalname?: string;
  mimetype?: string;
}

/**
 * One audio slot of a request, in exactly one of its three forms
 */
export type AudioSource =
  | { kind: 'path'; path: string }
  | { kind: 'inline'; data: string }
  | { kind: 'upload'; buffer: Buffer; filename?: string };

export interface SlotCandidates {
  path?: string;
  base64?: string;
  upload?: UploadedAudio;
}

const BASE64_PATTERN = /^[A-Za-z0-9+/_-]*={0,2}$/;

/**
 * Pick the single populated form of a slot
 */
export function selectAudioSource(slot: AudioSlot, candidates: SlotCandidates): AudioSource {
  const sources: AudioSource[] = [];

  if (candidates.path) {
    sources.push({ kind: 'path', path: candidates.path });
  }
  if (candidates.base64) {
    sources.push({ kind: 'inline', data: candidates.base64 });
  }
  if (candidates.upload) {
    sources.push({
      kind: 'upload',
      buffer: candidates.upload.buffer,
      filename: candidates.upload.originalname
    });
  }

  if (sources.length === 0) {
    throw new InputError(
      `No ${slot} audio provided: supply a ${slot} path, base64 data or an uploaded file`,
      { slot }
    );
  }

  if (sources.length > 1) {
    throw new InputError(
      `Conflicting ${slot} audio: exactly one of path, base64 data or upload is allowed`,
      { slot, forms: sources.map(s => s.kind) }
    );
  }

  return sources[0];
}

export interface AudioResolverOptions {
  sampleRate: number;
  transcoder: AudioTranscoder;
}

/**
 * Turns an audio source into a canonical mono waveform
 */
export class AudioResolver {
  private readonly sampleRate: number;
  private readonly transcoder: AudioTranscoder;

  constructor(options: AudioResolverOptions) {
    this.sampleRate = options.sampleRate;
    this.transcoder = options.transcoder;
  }

  /**
   * Read, detect, decode, down-mix and resample
   */
  async resolve(source: AudioSource): Promise<AudioAsset> {
    const { bytes, label } = await this.readBytes(source);

    const format = detectContainer(bytes);
    if (!format) {
      throw new InputError('Invalid audio file: unrecognized container format', {
        provenance: source.kind,
        label
      });
    }

    const decoded = await this.decode(bytes, format);

    if (decoded.samples.length === 0) {
      throw new InputError('Invalid audio file: contains no samples', { label, format });
    }

    const asset: AudioAsset = {
      samples: decoded.samples,
      sampleRate: this.sampleRate,
      durationSec: decoded.samples.length / this.sampleRate,
      channels: 1,
      provenance: source.kind,
      format,
      byteSize: bytes.length,
      originalSampleRate: decoded.originalSampleRate,
      originalChannels: decoded.originalChannels,
      label
    };

    logger.info({
      provenance: asset.provenance,
      format,
      durationSec: Number(asset.durationSec.toFixed(2)),
      originalSampleRate: asset.originalSampleRate,
      originalChannels: asset.originalChannels
    }, 'Audio resolved');

    return asset;
  }

  private async readBytes(source: AudioSource): Promise<{ bytes: Buffer; label?: string }> {
    switch (source.kind) {
      case 'path':
        return { bytes: await this.readPath(source.path), label: source.path };

      case 'inline':
        return { bytes: decodeBase64Audio(source.data) };

      case 'upload':
        if (source.buffer.length === 0) {
          throw new InputError('Uploaded audio file is empty', { filename: source.filename });
        }
        return { bytes: source.buffer, label: source.filename };
    }
  }

  private async readPath(filePath: string): Promise<Buffer> {
    const resolved = path.resolve(filePath);

    try {
      const stats = await fs.stat(resolved);
      if (!stats.isFile()) {
        throw new InputError(`Audio path is not a file: ${filePath}`);
      }
      return await fs.readFile(resolved);
    } catch (error) {
      if (error instanceof InputError) {
        throw error;
      }

      const code = error instanceof Error && 'code' in error ? String(error.code) : undefined;
      if (code === 'ENOENT') {
        throw new InputError(`Audio file not found: ${filePath}`);
      }

      logger.error({ error, filePath }, 'Failed to read audio file');
      throw new InputError(`Audio file is not readable: ${filePath}`, { code });
    }
  }

  private async decode(
    bytes: Buffer,
    format: ContainerFormat
  ): Promise<{ samples: Float32Array; originalSampleRate: number; originalChannels: number }> {
    if (format === 'wav') {
      const wav = decodeWav(bytes);
      const mono = downmix(wav.channels);

      return {
        samples: resample(mono, wav.sampleRate, this.sampleRate),
        originalSampleRate: wav.sampleRate,
        originalChannels: wav.channels.length
      };
    }

    const probe = await this.transcoder.probe(bytes);
    const samples = await this.transcoder.decode(bytes, this.sampleRate);

    return {
      samples,
      originalSampleRate: probe.sampleRate,
      originalChannels: probe.channels
    };
  }
}

/**
 * Decode transport text, tolerating data-URI prefixes and line breaks
 */
export function decodeBase64Audio(data: string): Buffer {
  const payload = data.replace(/^data:[^,]*;base64,/, '').replace(/\s+/g, '');

  if (payload.length === 0 || !BASE64_PATTERN.test(payload)) {
    throw new InputError('Failed to decode base64 audio: not valid base64 text');
  }

  const bytes = Buffer.from(payload, payload.includes('-') || payload.includes('_') ? 'base64url' : 'base64');

  if (bytes.length === 0) {
    throw new InputError('Failed to decode base64 audio: payload is empty');
  }

  return bytes;
}

/**
 * Metadata reported for an input in the response
 */
export function describeAsset(asset: AudioAsset): AudioInfo {
  return {
    duration: asset.durationSec,
    sample_rate: asset.originalSampleRate,
    channels: asset.channels,
    file_size: asset.byteSize,
    file_format: asset.format
  };
}

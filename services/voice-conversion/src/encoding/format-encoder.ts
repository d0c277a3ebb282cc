import {
  createLogger,
  OUTPUT_FORMATS,
  parseOutputFormat,
  type AudioTranscoder,
  type OutputFormat
} from '@timbre/core';
import { encodeWav } from '../audio/wav-codec';

const logger = createLogger('format-encoder');

export interface EncodedAudio {
  format: OutputFormat;
  mimeType: string;
  extension: string;
  bytes: Buffer;
}

/**
 * Serializes assembled waveforms into output containers
 */
export class FormatEncoder {
  private readonly transcoder: AudioTranscoder;

  constructor(transcoder: AudioTranscoder) {
    this.transcoder = transcoder;
  }

  /**
   * Encode a waveform; `wav` is lossless, `mp3` and `ogg` go through the transcoder
   */
  async encode(waveform: Float32Array, sampleRate: number, tag: string): Promise<EncodedAudio> {
    const format = parseOutputFormat(tag);
    const { mimeType, extension } = OUTPUT_FORMATS[format];

    // The transcoder gets its own copy so the caller's waveform is never touched
    const bytes = format === 'wav'
      ? encodeWav(waveform, sampleRate)
      : await this.transcoder.encode(waveform.slice(), sampleRate, format);

    logger.debug({
      format,
      samples: waveform.length,
      sizeKB: Math.round(bytes.length / 1024)
    }, 'Waveform encoded');

    return { format, mimeType, extension, bytes };
  }

  /**
   * Transport-safe text form of encoded bytes
   */
  toTransport(bytes: Buffer): string {
    return bytes.toString('base64');
  }
}

import { spawn } from 'child_process';
import {
  createLogger,
  InputError,
  MP3_BITRATE_KBPS,
  OGG_QUALITY,
  ProcessingError,
  type AudioTranscoder,
  type LossyFormat,
  type ProbeResult
} from '@timbre/core';
import { bytesToFloat32, float32ToBytes } from './pcm';

const logger = createLogger('ffmpeg-transcoder');

const CODEC_ARGS: Record<LossyFormat, string[]> = {
  mp3: ['-f', 'mp3', '-codec:a', 'libmp3lame', '-b:a', `${MP3_BITRATE_KBPS}k`],
  ogg: ['-f', 'ogg', '-codec:a', 'libvorbis', '-q:a', String(OGG_QUALITY)]
};

interface RunResult {
  code: number | null;
  stdout: Buffer;
  stderr: string;
}

/**
 * Transcoder backed by the ffmpeg binary.
 * Samples cross the pipe as raw little-endian float32.
 */
export class FfmpegTranscoder implements AudioTranscoder {
  private readonly ffmpegBinary: string;
  private readonly ffprobeBinary: string;

  constructor(ffmpegBinary: string = 'ffmpeg', ffprobeBinary: string = 'ffprobe') {
    this.ffmpegBinary = ffmpegBinary;
    this.ffprobeBinary = ffprobeBinary;

    logger.info({
      ffmpeg: this.ffmpegBinary,
      ffprobe: this.ffprobeBinary
    }, 'ffmpeg transcoder initialized');
  }

  /**
   * Encode mono samples into a lossy container
   */
  async encode(samples: Float32Array, sampleRate: number, format: LossyFormat): Promise<Buffer> {
    const args = [
      '-hide_banner', '-loglevel', 'error',
      '-f', 'f32le', '-ar', String(sampleRate), '-ac', '1', '-i', 'pipe:0',
      ...CODEC_ARGS[format],
      'pipe:1'
    ];

    const startTime = Date.now();
    const result = await this.run(args, float32ToBytes(samples));

    if (result.code !== 0) {
      logger.error({ code: result.code, stderr: result.stderr, format }, 'ffmpeg encode failed');
      throw new ProcessingError(`Failed to encode ${format}: ffmpeg exited with code ${result.code}`, {
        format
      });
    }

    logger.debug({
      format,
      duration: Date.now() - startTime,
      sizeKB: Math.round(result.stdout.length / 1024)
    }, 'Encoded audio');

    return result.stdout;
  }

  /**
   * Decode any container ffmpeg understands to mono float samples
   */
  async decode(bytes: Buffer, sampleRate: number): Promise<Float32Array> {
    const args = [
      '-hide_banner', '-loglevel', 'error',
      '-i', 'pipe:0',
      '-f', 'f32le', '-ac', '1', '-ar', String(sampleRate),
      'pipe:1'
    ];

    const result = await this.run(args, bytes);

    if (result.code !== 0) {
      logger.error({ code: result.code, stderr: result.stderr }, 'ffmpeg decode failed');
      throw new InputError(`Invalid audio file: ffmpeg could not decode input (code ${result.code})`);
    }

    return bytesToFloat32(result.stdout);
  }

  /**
   * Read native sample rate and channel count with ffprobe
   */
  async probe(bytes: Buffer): Promise<ProbeResult> {
    const args = [
      '-v', 'error',
      '-select_streams', 'a:0',
      '-show_entries', 'stream=sample_rate,channels',
      '-of', 'default=noprint_wrappers=1',
      '-i', 'pipe:0'
    ];

    const result = await this.run(args, bytes, this.ffprobeBinary);

    if (result.code !== 0) {
      logger.error({ code: result.code, stderr: result.stderr }, 'ffprobe failed');
      throw new InputError('Invalid audio file: ffprobe could not read input');
    }

    const fields = new Map(
      result.stdout.toString().trim().split('\n').map(line => {
        const [key, value] = line.split('=');
        return [key.trim(), Number(value)] as const;
      })
    );

    const sampleRate = fields.get('sample_rate');
    const channels = fields.get('channels');

    if (!sampleRate || !channels) {
      throw new InputError('Invalid audio file: no audio stream found');
    }

    return { sampleRate, channels };
  }

  /**
   * Run ffmpeg (or ffprobe) with stdin fed from `input`, collecting stdout
   */
  private run(args: string[], input: Buffer, binary: string = this.ffmpegBinary): Promise<RunResult> {
    return new Promise((resolve, reject) => {
      logger.debug({ binary, args }, 'Running ffmpeg');

      const ffmpeg = spawn(binary, args);

      const stdout: Buffer[] = [];
      let stderr = '';

      ffmpeg.stdout.on('data', (data: Buffer) => {
        stdout.push(data);
      });

      ffmpeg.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      // ffmpeg may close stdin early on bad input
      ffmpeg.stdin.on('error', (error) => {
        logger.debug({ error }, 'ffmpeg stdin closed');
      });

      ffmpeg.on('close', (code) => {
        resolve({ code, stdout: Buffer.concat(stdout), stderr });
      });

      ffmpeg.on('error', (error) => {
        logger.error({ error }, 'ffmpeg spawn error');
        reject(new ProcessingError(`Failed to start ${binary}: ${error.message}`, {
          binary
        }));
      });

      ffmpeg.stdin.end(input);
    });
  }
}

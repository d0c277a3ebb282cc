import type { OutputFormat } from '../schemas';

/**
 * Container metadata per output tag
 */
export const OUTPUT_FORMATS: Record<OutputFormat, { mimeType: string; extension: string; lossless: boolean }> = {
  wav: { mimeType: 'audio/wav', extension: 'wav', lossless: true },
  mp3: { mimeType: 'audio/mpeg', extension: 'mp3', lossless: false },
  ogg: { mimeType: 'audio/ogg', extension: 'ogg', lossless: false }
};

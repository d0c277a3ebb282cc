import type { ContainerFormat } from '@timbre/core';

/**
 * Identify an audio container from its leading bytes
 */
export function detectContainer(bytes: Buffer): ContainerFormat | null {
  if (bytes.length < 4) {
    return null;
  }

  const head4 = bytes.toString('latin1', 0, 4);

  if (head4 === 'RIFF' && bytes.length >= 12 && bytes.toString('latin1', 8, 12) === 'WAVE') {
    return 'wav';
  }
  if (head4 === 'OggS') {
    return 'ogg';
  }
  if (head4 === 'fLaC') {
    return 'flac';
  }
  if (bytes.toString('latin1', 0, 3) === 'ID3') {
    return 'mp3';
  }
  // MPEG audio frame sync
  if (bytes[0] === 0xff && (bytes[1] & 0xe0) === 0xe0) {
    return 'mp3';
  }

  return null;
}

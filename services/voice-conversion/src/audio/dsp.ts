/**
 * Sample-level helpers shared by the resolver, segmenter and assembler
 */

export function concatFloat32(parts: readonly Float32Array[]): Float32Array {
  let total = 0;
  for (const part of parts) {
    total += part.length;
  }

  const out = new Float32Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/**
 * Average all channels into one
 */
export function downmix(channels: readonly Float32Array[]): Float32Array {
  if (channels.length === 0) {
    return new Float32Array(0);
  }
  if (channels.length === 1) {
    return channels[0];
  }

  const length = Math.min(...channels.map(c => c.length));
  const out = new Float32Array(length);
  for (let i = 0; i < length; i++) {
    let sum = 0;
    for (const channel of channels) {
      sum += channel[i];
    }
    out[i] = sum / channels.length;
  }
  return out;
}

/**
 * Linear-interpolation resampling to an explicit output length
 */
export function stretchToLength(samples: Float32Array, targetLength: number): Float32Array {
  const out = new Float32Array(targetLength);
  if (samples.length === 0 || targetLength === 0) {
    return out;
  }
  if (samples.length === targetLength) {
    out.set(samples);
    return out;
  }

  const ratio = targetLength > 1 ? (samples.length - 1) / (targetLength - 1) : 0;
  for (let i = 0; i < targetLength; i++) {
    const position = i * ratio;
    const left = Math.floor(position);
    const right = Math.min(left + 1, samples.length - 1);
    const fraction = position - left;
    out[i] = samples[left] * (1 - fraction) + samples[right] * fraction;
  }
  return out;
}

/**
 * Resample between rates, keeping duration
 */
export function resample(samples: Float32Array, fromRate: number, toRate: number): Float32Array {
  if (fromRate === toRate) {
    return samples;
  }
  const targetLength = Math.round(samples.length * toRate / fromRate);
  return stretchToLength(samples, targetLength);
}

/**
 * RMS level of samples[start, end) in dBFS
 */
export function rmsDb(samples: Float32Array, start: number, end: number): number {
  const count = end - start;
  if (count <= 0) {
    return -Infinity;
  }

  let sumSquares = 0;
  for (let i = start; i < end; i++) {
    sumSquares += samples[i] * samples[i];
  }
  const rms = Math.sqrt(sumSquares / count);
  return 20 * Math.log10(rms + 1e-10);
}

/**
 * System limits and thresholds
 */

// Engine
export const ENGINE_SAMPLE_RATE = 22050;
export const ENGINE_HOP_SIZE = 256;
export const ENGINE_MAX_CHUNK_SEC = 30;

// Input durations
export const SOURCE_RECOMMENDED_MAX_SEC = 240;
export const SOURCE_HARD_MAX_SEC = 600; // 10 minutes
export const REFERENCE_MAX_SEC = 120;

// Segmentation
export const SILENCE_THRESHOLD_DB = -40;
export const SILENCE_MIN_DURATION_SEC = 0.3;
export const SILENCE_FRAME_MS = 20;
export const SEGMENT_SEARCH_WINDOW_SEC = 5;

// Assembly
export const CROSSFADE_HOPS = 4;

// Scheduling
export const DEFAULT_MAX_CONCURRENT_JOBS = 1;

// Encoding
export const MP3_BITRATE_KBPS = 192;
export const OGG_QUALITY = 5;

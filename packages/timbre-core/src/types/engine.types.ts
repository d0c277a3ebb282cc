import type { ConversionParameters } from '../schemas';

export type EngineStatus = {
  loaded: boolean;
  device: string | null;
  maxChunkSec?: number;
};

/**
 * Fixed conditioning derived once from a reference recording
 */
export type ReferenceConditioning = {
  id: string;
  durationSec: number;
};

/**
 * Generation controls forwarded to the engine for each chunk
 */
export type EngineParameters = Pick<
  ConversionParameters,
  | 'diffusion_steps'
  | 'length_adjust'
  | 'intelligibility_cfg_rate'
  | 'similarity_cfg_rate'
  | 'top_p'
  | 'temperature'
  | 'repetition_penalty'
  | 'convert_style'
  | 'anonymization_only'
>;

/**
 * Voice model engine - the only gateway to the generative model.
 * Stateful across the chunks converted with one conditioning handle.
 */
export interface VoiceModelEngine {
  status(): EngineStatus;
  load(): Promise<EngineStatus>;
  prepareReference(waveform: Float32Array, sampleRate: number): Promise<ReferenceConditioning>;
  convert(
    chunk: Float32Array,
    conditioning: ReferenceConditioning,
    parameters: EngineParameters
  ): Promise<Float32Array>;
  releaseReference?(conditioning: ReferenceConditioning): Promise<void>;
}

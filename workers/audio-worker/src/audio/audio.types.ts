/**
 * Mono PCM samples in [-1, 1] at the file's native rate
 */
export type DecodedAudio = {
  samples: Float32Array;
  sampleRate: number;
  channels: number;
  decoder: string;
};

export type StemAudio = {
  key: string;
  samples: Float32Array;
  sampleRate: number;
};

export type MixResult = {
  samples: Float32Array;
  sampleRate: number;
  includedKeys: string[];
  skippedKeys: string[];
  peakBeforeLimit: number;
  limited: boolean;
};

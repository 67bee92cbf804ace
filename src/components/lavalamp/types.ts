/**
 * Emotion Lava Lamp
 * Core types and configuration
 */

export interface EmotionAxes {
  readonly valence: number;     // -1 (unpleasant) .. 1 (pleasant)
  readonly arousal: number;     // -1 (calm) .. 1 (excited)
  readonly dominance: number;   // -1 (submissive) .. 1 (in control)
}

/** Raw sample from the outside world, clamped to [-1, 1] per axis. */
export interface TargetEmotion extends EmotionAxes {
  readonly kind: 'target';
}

/** Output of the temporal filter. Same shape as a target, never interchangeable. */
export interface SmoothedEmotion extends EmotionAxes {
  readonly kind: 'smoothed';
}

/**
 * What a VAD source may hand back each frame.
 * `null` / `undefined` mean "no new sample" and keep the previous target.
 */
export type VadSample =
  | { valence: number; arousal: number; dominance: number }
  | readonly [number, number, number];

export type VadSource = () => VadSample | null | undefined;

export type Hsv = readonly [hue: number, saturation: number, value: number];
export type Rgb = readonly [r: number, g: number, b: number];

export interface VisualParams {
  readonly hsvPrimary: Hsv;
  readonly hsvSecondary: Hsv;
  readonly rgbPrimary: Rgb;
  readonly rgbSecondary: Rgb;
  readonly blobCount: number;
  readonly blobSizeMean: number;
  readonly surfaceTension: number;
  readonly viscosity: number;
  readonly buoyancy: number;
  readonly turbulence: number;
  readonly threshold: number;
  readonly gravityX: number;
}

export interface LavaBlob {
  x: number;
  y: number;
  vx: number;
  vy: number;
  radius: number;
  color: Rgb;
}

export interface TemporalFilterConfig {
  tauValence: number;
  tauArousal: number;
  tauDominance: number;
  maxStep: number;
}

export interface EnergyConfig {
  decayPerFrame: number;
  maxEnergy: number;
}

export interface MappingConfig {
  baseTurbulence: number;
  arousalGain: number;
  energyGain: number;
  hueJitter: number;
}

export interface SimulationConfig {
  width: number;
  height: number;
  baseDamping: number;
  seedVelocity: number;
  seedSizeStdDev: number;
  splitRatio: number;
  splitOffset: number;
}

export const DEFAULT_FILTER_CONFIG: TemporalFilterConfig = {
  tauValence: 2.0,      // Mood drifts slowly
  tauArousal: 0.6,      // Excitement reacts fastest
  tauDominance: 1.2,
  maxStep: 0.25,        // Largest requested move per tick, before the blend
};

export const DEFAULT_ENERGY_CONFIG: EnergyConfig = {
  decayPerFrame: 0.995,
  maxEnergy: 10,
};

export const DEFAULT_MAPPING_CONFIG: MappingConfig = {
  baseTurbulence: 0.1,
  arousalGain: 0.9,
  energyGain: 0.4,
  hueJitter: 24,        // ±degrees on the secondary hue at zero dominance
};

export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  width: 1.0,
  height: 1.0,
  baseDamping: 0.995,
  seedVelocity: 0.05,
  seedSizeStdDev: 0.015,
  splitRatio: 1.8,      // Split once radius exceeds this multiple of the mean size
  splitOffset: 0.03,
};

export const MIN_BLOB_RADIUS = 0.01;

/** Frame step used when callers don't pass one (~60fps). */
export const DEFAULT_DT = 0.016;

export interface EngineStatus {
  smoothed: SmoothedEmotion;
  energy: number;
  blobCount: number;
  turbulence: number;
}

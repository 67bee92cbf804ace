/**
 * Emotion → Visual Mapping
 *
 * - Valence drives hue (220° cool → 20° warm), viscosity and buoyancy
 * - Arousal drives saturation/brightness, blob count, blob size and turbulence
 * - Dominance drives surface tension and the split threshold, and calms the hue jitter
 * - Energy adds turbulence and widens the side-to-side gravity sway
 */

import type { MappingConfig, SmoothedEmotion, VisualParams } from './types';
import { DEFAULT_MAPPING_CONFIG } from './types';
import { hsvToRgb, lerp, normalizeAxis } from './math';
import { resolveRandom, uniform, type RandomFn } from './random';

export interface VisualMappingOptions extends Partial<MappingConfig> {
  seed?: number;
  random?: RandomFn;
}

export class VisualMapping {
  private readonly config: MappingConfig;
  private readonly random: RandomFn;

  constructor({ seed, random, ...config }: VisualMappingOptions = {}) {
    this.config = { ...DEFAULT_MAPPING_CONFIG, ...config };
    this.random = resolveRandom(seed, random);
  }

  map(vad: SmoothedEmotion, energy: number, elapsedS: number): VisualParams {
    const { baseTurbulence, arousalGain, energyGain, hueJitter } = this.config;
    const nv = normalizeAxis(vad.valence);
    const na = normalizeAxis(vad.arousal);
    const nd = normalizeAxis(vad.dominance);

    const hue = lerp(220, 20, nv);
    const saturation = 0.3 + 0.7 * na;
    const value = 0.4 + 0.6 * na;

    // Low dominance → erratic secondary hue
    const jitter = uniform(this.random, -hueJitter, hueJitter) * (1 - nd);
    const hue2 = (((hue + jitter) % 360) + 360) % 360;

    // Sway frequency follows arousal, amplitude follows energy
    const swayFreq = 0.1 + na * 1.5;
    const swayAmp = 0.02 + energy * 0.05;

    const hsvPrimary = [hue, saturation, value] as const;
    const hsvSecondary = [hue2, saturation, value] as const;

    return Object.freeze({
      hsvPrimary,
      hsvSecondary,
      rgbPrimary: hsvToRgb(...hsvPrimary),
      rgbSecondary: hsvToRgb(...hsvSecondary),
      blobCount: 3 + Math.floor(na * 10),
      blobSizeMean: lerp(0.14, 0.05, na),
      surfaceTension: lerp(0.2, 1.0, nd),
      viscosity: lerp(1.0, 0.2, nv),
      buoyancy: lerp(-0.3, 0.3, nv),
      turbulence: baseTurbulence + na * arousalGain + energy * energyGain,
      threshold: lerp(1.2, 0.9, nd),
      gravityX: Math.sin(elapsedS * swayFreq * 2 * Math.PI) * swayAmp,
    });
  }
}

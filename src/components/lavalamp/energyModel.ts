/**
 * Emotion Energy Model
 *
 * Decaying accumulator of the gap between the raw target and the smoothed state.
 * Spikes while the emotion is moving fast, bleeds off when it settles.
 * Only ever read downstream as a turbulence modifier.
 */

import type { EnergyConfig, SmoothedEmotion, TargetEmotion } from './types';
import { DEFAULT_ENERGY_CONFIG } from './types';
import { axesOf, clamp } from './math';

export class EmotionEnergyModel {
  private readonly config: EnergyConfig;
  private value = 0;

  constructor(config: Partial<EnergyConfig> = {}) {
    this.config = { ...DEFAULT_ENERGY_CONFIG, ...config };
  }

  get energy(): number {
    return this.value;
  }

  update(target: TargetEmotion, smoothed: SmoothedEmotion): number {
    const s = axesOf(smoothed);
    const delta = axesOf(target).reduce((sum, t, i) => sum + Math.abs(t - s[i]), 0) / 3;

    this.value = clamp((this.value + delta) * this.config.decayPerFrame, 0, this.config.maxEnergy);
    return this.value;
  }

  reset(): void {
    this.value = 0;
  }
}

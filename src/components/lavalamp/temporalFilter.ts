/**
 * Temporal Filter
 *
 * Per-axis exponential smoothing with a rate limit in front of it:
 * 1. Clamp the requested move (target - current) to ±maxStep
 * 2. Blend toward the limited target with alpha = 1 - e^(-dt/tau)
 * 3. Clamp the result to [-1, 1]
 *
 * Valence has the longest time constant, arousal the shortest.
 */

import type { SmoothedEmotion, TargetEmotion, TemporalFilterConfig } from './types';
import { DEFAULT_FILTER_CONFIG } from './types';
import { axesOf, clamp, lerp, smoothedEmotion } from './math';

const NEUTRAL = smoothedEmotion(0, 0, 0);

export class TemporalFilter {
  private readonly config: TemporalFilterConfig;
  private current: SmoothedEmotion = NEUTRAL;

  constructor(config: Partial<TemporalFilterConfig> = {}) {
    this.config = { ...DEFAULT_FILTER_CONFIG, ...config };
  }

  get state(): SmoothedEmotion {
    return this.current;
  }

  update(target: TargetEmotion, dt: number): SmoothedEmotion {
    const { tauValence, tauArousal, tauDominance, maxStep } = this.config;
    const taus = [tauValence, tauArousal, tauDominance];
    const targets = axesOf(target);

    const [v, a, d] = axesOf(this.current).map((cur, i) => {
      const alpha = 1 - Math.exp(-dt / taus[i]);
      const bounded = cur + clamp(targets[i] - cur, -maxStep, maxStep);
      return lerp(cur, bounded, alpha);
    });

    this.current = smoothedEmotion(v, a, d);
    return this.current;
  }

  reset(): void {
    this.current = NEUTRAL;
  }
}

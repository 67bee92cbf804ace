/**
 * Built-in VAD test signals
 *
 * Stand-ins for a real emotion feed (sensor, model, network):
 * - sine:   three slow sines at different rates
 * - noise:  slow sines plus simplex noise, clamped to [-1, 1]
 * - step:   a fixed point that flips sign every 1.5 s
 * - silent: never yields a sample, so the engine holds its last target
 *
 * Each call advances an internal clock by a fixed frame step.
 */

import { createNoise2D } from 'simplex-noise';
import type { VadSample, VadSource } from '../components/lavalamp/types';
import { DEFAULT_DT } from '../components/lavalamp/types';
import { clamp } from '../components/lavalamp/math';
import { resolveRandom, type RandomFn } from '../components/lavalamp/random';
import type { SignalMode } from './types';

export interface VadSignalOptions {
  seed?: number;
  random?: RandomFn;
  frameStep?: number;
}

const STEP_START: readonly [number, number, number] = [-0.8, -0.6, -0.6];
const STEP_PERIOD_S = 1.5;

// Rows of the noise plane sampled for each axis
const NOISE_ROWS = [0, 17.3, 41.9] as const;
const NOISE_RATE = 0.9;

function clampAxes(v: number, a: number, d: number): VadSample {
  return [clamp(v, -1, 1), clamp(a, -1, 1), clamp(d, -1, 1)];
}

export function createVadSignal(mode: SignalMode, options: VadSignalOptions = {}): VadSource {
  const frameStep = options.frameStep ?? DEFAULT_DT;
  let t = 0;

  switch (mode) {
    case 'sine':
      return () => {
        t += frameStep;
        return clampAxes(Math.sin(t * 0.5), Math.sin(t * 1.4), Math.sin(t * 0.8 + 1.2));
      };

    case 'noise': {
      const noise2D = createNoise2D(resolveRandom(options.seed, options.random));
      return () => {
        t += frameStep;
        const n = NOISE_ROWS.map(row => noise2D(t * NOISE_RATE, row));
        return clampAxes(
          Math.sin(t * 0.25) * 0.5 + n[0] * 0.5,
          Math.sin(t * 0.9) * 0.4 + n[1] * 0.6,
          Math.sin(t * 0.45 + 1.0) * 0.3 + n[2] * 0.4
        );
      };
    }

    case 'step': {
      let state = STEP_START;
      let nextFlip = STEP_PERIOD_S;
      return () => {
        t += frameStep;
        if (t > nextFlip) {
          nextFlip += STEP_PERIOD_S;
          state = [-state[0], -state[1], -state[2]];
        }
        return state;
      };
    }

    case 'silent':
      return () => null;

    default:
      throw new Error(`unknown signal mode: ${String(mode)}`);
  }
}

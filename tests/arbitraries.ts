import * as fc from 'fast-check';
import type { VisualParams } from '../src/components/lavalamp/types';
import { hsvToRgb, smoothedEmotion, targetEmotion } from '../src/components/lavalamp/math';

export const axisArbitrary = fc.double({ min: -1, max: 1, noNaN: true });

// Sources are allowed to overshoot; the engine clamps
export const rawAxisArbitrary = fc.double({ min: -5, max: 5, noNaN: true });

export const targetArbitrary = fc
  .tuple(axisArbitrary, axisArbitrary, axisArbitrary)
  .map(([v, a, d]) => targetEmotion(v, a, d));

export const smoothedArbitrary = fc
  .tuple(axisArbitrary, axisArbitrary, axisArbitrary)
  .map(([v, a, d]) => smoothedEmotion(v, a, d));

export const frameTimeArbitrary = fc.double({ min: 0.001, max: 0.1, noNaN: true });

export const energyArbitrary = fc.double({ min: 0, max: 10, noNaN: true });

export const blobCountArbitrary = fc.integer({ min: -3, max: 20 });

/** Calm, motionless defaults; override what a test cares about. */
export function makeParams(overrides: Partial<VisualParams> = {}): VisualParams {
  const hsv = [200, 0.5, 0.5] as const;
  return {
    hsvPrimary: hsv,
    hsvSecondary: hsv,
    rgbPrimary: hsvToRgb(...hsv),
    rgbSecondary: hsvToRgb(...hsv),
    blobCount: 5,
    blobSizeMean: 0.05,
    surfaceTension: 0.5,
    viscosity: 1,
    buoyancy: 0,
    turbulence: 0,
    threshold: 1,
    gravityX: 0,
    ...overrides,
  };
}

export const paramsArbitrary = fc
  .record({
    blobCount: fc.integer({ min: 0, max: 15 }),
    blobSizeMean: fc.double({ min: 0.05, max: 0.14, noNaN: true }),
    viscosity: fc.double({ min: 0.2, max: 1, noNaN: true }),
    buoyancy: fc.double({ min: -0.3, max: 0.3, noNaN: true }),
    turbulence: fc.double({ min: 0, max: 5, noNaN: true }),
    gravityX: fc.double({ min: -0.6, max: 0.6, noNaN: true }),
  })
  .map(overrides => makeParams(overrides));

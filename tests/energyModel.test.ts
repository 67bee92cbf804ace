import { describe, it, expect } from 'vitest';
import { test, fc } from '@fast-check/vitest';
import { EmotionEnergyModel } from '../src/components/lavalamp/energyModel';
import { smoothedEmotion, targetEmotion } from '../src/components/lavalamp/math';
import { smoothedArbitrary, targetArbitrary } from './arbitraries';

describe('EmotionEnergyModel', () => {
  it('adds the mean axis gap, then decays', () => {
    const model = new EmotionEnergyModel();
    const target = targetEmotion(1, 1, 1);
    const smoothed = smoothedEmotion(0, 0, 0);

    expect(model.update(target, smoothed)).toBeCloseTo(0.995, 12);
    expect(model.update(target, smoothed)).toBeCloseTo((0.995 + 1) * 0.995, 12);
  });

  it('averages absolute gaps across axes', () => {
    const model = new EmotionEnergyModel({ decayPerFrame: 1 });
    expect(model.update(targetEmotion(0.6, -0.3, 0), smoothedEmotion(0, 0, 0.3))).toBeCloseTo(0.4, 12);
  });

  it('saturates at 10', () => {
    const model = new EmotionEnergyModel();
    for (let i = 0; i < 20; i++) {
      model.update(targetEmotion(1, 1, 1), smoothedEmotion(-1, -1, -1));
    }
    expect(model.energy).toBe(10);
  });

  it('decays toward zero once target and smoothed agree', () => {
    const model = new EmotionEnergyModel();
    for (let i = 0; i < 20; i++) {
      model.update(targetEmotion(1, 1, 1), smoothedEmotion(-1, -1, -1));
    }
    const calm = targetEmotion(0.2, 0.2, 0.2);
    const settled = smoothedEmotion(0.2, 0.2, 0.2);
    expect(model.update(calm, settled)).toBeCloseTo(9.95, 12);

    for (let i = 0; i < 2000; i++) {
      model.update(calm, settled);
    }
    expect(model.energy).toBeLessThan(0.001);
    expect(model.energy).toBeGreaterThanOrEqual(0);
  });

  it('resets to zero', () => {
    const model = new EmotionEnergyModel();
    model.update(targetEmotion(1, 1, 1), smoothedEmotion(0, 0, 0));
    model.reset();
    expect(model.energy).toBe(0);
  });
});

test.prop([fc.array(fc.tuple(targetArbitrary, smoothedArbitrary), { minLength: 1, maxLength: 200 })])(
  'EmotionEnergyModel: energy stays in [0, 10] for any input sequence',
  (pairs) => {
    const model = new EmotionEnergyModel();
    for (const [target, smoothed] of pairs) {
      const energy = model.update(target, smoothed);
      expect(energy).toBeGreaterThanOrEqual(0);
      expect(energy).toBeLessThanOrEqual(10);
    }
  }
);

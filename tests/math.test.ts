import { describe, it, expect } from 'vitest';
import {
  clamp,
  hsvToRgb,
  lerp,
  normalizeAxis,
  rgbToHex,
  smoothedEmotion,
  targetEmotion,
} from '../src/components/lavalamp/math';
import { createRng, gaussian, uniform } from '../src/components/lavalamp/random';

describe('scalar helpers', () => {
  it('clamps and interpolates', () => {
    expect(clamp(1.5, -1, 1)).toBe(1);
    expect(clamp(-3, -1, 1)).toBe(-1);
    expect(clamp(0.25, -1, 1)).toBe(0.25);
    expect(lerp(220, 20, 0.5)).toBe(120);
    expect(normalizeAxis(-1)).toBe(0);
    expect(normalizeAxis(1)).toBe(1);
  });

  it('clamps emotion constructors and tags their kind', () => {
    expect(targetEmotion(2, -2, 0.5)).toEqual({ kind: 'target', valence: 1, arousal: -1, dominance: 0.5 });
    expect(smoothedEmotion(0, 3, -0.5)).toEqual({ kind: 'smoothed', valence: 0, arousal: 1, dominance: -0.5 });
  });
});

describe('hsvToRgb', () => {
  it('projects the primary hues', () => {
    expect(hsvToRgb(0, 1, 1)).toEqual([1, 0, 0]);
    expect(hsvToRgb(120, 1, 1)).toEqual([0, 1, 0]);
    expect(hsvToRgb(240, 1, 1)).toEqual([0, 0, 1]);
  });

  it('wraps hue', () => {
    expect(hsvToRgb(360, 1, 1)).toEqual(hsvToRgb(0, 1, 1));
    expect(hsvToRgb(-120, 1, 1)).toEqual(hsvToRgb(240, 1, 1));
  });

  it('keeps grey for zero saturation', () => {
    expect(hsvToRgb(77, 0, 0.4)).toEqual([0.4, 0.4, 0.4]);
  });
});

describe('rgbToHex', () => {
  it('encodes and clamps channels', () => {
    expect(rgbToHex([1, 0.5, 0])).toBe('#ff8000');
    expect(rgbToHex([2, -1, 1])).toBe('#ff00ff');
  });
});

describe('createRng', () => {
  it('replays the same sequence for the same seed', () => {
    const a = createRng(42);
    const b = createRng(42);
    const seqA = Array.from({ length: 20 }, () => a());
    const seqB = Array.from({ length: 20 }, () => b());
    expect(seqA).toEqual(seqB);
  });

  it('diverges for different seeds', () => {
    expect(createRng(1)()).not.toBe(createRng(2)());
  });

  it('stays in [0, 1)', () => {
    const random = createRng(7);
    for (let i = 0; i < 5000; i++) {
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('drives uniform and gaussian draws', () => {
    expect(uniform(() => 0.5, -24, 24)).toBe(0);
    expect(uniform(() => 0, -24, 24)).toBe(-24);

    const random = createRng(3);
    const draws = Array.from({ length: 20000 }, () => gaussian(random, 0.1, 0.015));
    const mean = draws.reduce((sum, x) => sum + x, 0) / draws.length;
    expect(mean).toBeCloseTo(0.1, 3);
  });
});

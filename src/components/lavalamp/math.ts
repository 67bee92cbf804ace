/**
 * Scalar helpers and color conversion shared by the mapper and simulation
 */

import type { EmotionAxes, Rgb, SmoothedEmotion, TargetEmotion } from './types';

export function clamp(value: number, low: number, high: number): number {
  return Math.max(low, Math.min(high, value));
}

export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

/** Map an axis from [-1, 1] onto [0, 1]. */
export function normalizeAxis(value: number): number {
  return (value + 1) / 2;
}

export function targetEmotion(valence: number, arousal: number, dominance: number): TargetEmotion {
  return {
    kind: 'target',
    valence: clamp(valence, -1, 1),
    arousal: clamp(arousal, -1, 1),
    dominance: clamp(dominance, -1, 1),
  };
}

export function smoothedEmotion(valence: number, arousal: number, dominance: number): SmoothedEmotion {
  return {
    kind: 'smoothed',
    valence: clamp(valence, -1, 1),
    arousal: clamp(arousal, -1, 1),
    dominance: clamp(dominance, -1, 1),
  };
}

export function axesOf(vad: EmotionAxes): [number, number, number] {
  return [vad.valence, vad.arousal, vad.dominance];
}

/**
 * HSV → RGB with hue in degrees (any value, wrapped) and s/v in 0-1.
 * Channels come back in 0-1.
 */
export function hsvToRgb(hue: number, saturation: number, value: number): Rgb {
  const h = ((hue % 360) + 360) % 360;
  const c = value * saturation;
  const x = c * (1 - Math.abs(((h / 60) % 2) - 1));
  const m = value - c;

  let r = 0, g = 0, b = 0;
  if (h < 60) {
    r = c; g = x;
  } else if (h < 120) {
    r = x; g = c;
  } else if (h < 180) {
    g = c; b = x;
  } else if (h < 240) {
    g = x; b = c;
  } else if (h < 300) {
    r = x; b = c;
  } else {
    r = c; b = x;
  }
  return [r + m, g + m, b + m];
}

/** 0-1 channels → `#rrggbb`, clamping out-of-range values. */
export function rgbToHex(rgb: Rgb): string {
  return '#' + rgb
    .map(channel => Math.round(clamp(channel, 0, 1) * 255).toString(16).padStart(2, '0'))
    .join('');
}

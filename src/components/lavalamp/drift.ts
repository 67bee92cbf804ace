/**
 * Breathing - slow per-blob size pulse for the renderer.
 * Display only: the simulation's radii are never touched.
 */

export const BREATHING_CONFIG = {
  rate: 0.8,        // radians per second
  amount: 0.03,     // ±3% size variation
  phaseStep: 0.5,   // phase offset between neighbouring blobs
} as const;

/**
 * @param elapsedS - Simulated time
 * @param blobIndex - Index of the blob (for phase offset)
 * @param amount - Overrides the default pulse depth, e.g. scaled by arousal
 */
export function getSizeBreathingMultiplier(
  elapsedS: number,
  blobIndex: number,
  amount: number = BREATHING_CONFIG.amount
): number {
  const phaseOffset = blobIndex * BREATHING_CONFIG.phaseStep;
  return 1 + Math.sin(elapsedS * BREATHING_CONFIG.rate + phaseOffset) * amount;
}

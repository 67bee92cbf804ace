/**
 * Curl-like Flow Field
 * Sums of sines/cosines of position and time, giving a swirling push
 * without solving any fluid equations. Deterministic: same (x, y, t) → same vector.
 */

export interface FlowVector {
  x: number;
  y: number;
}

export function sampleFlowField(x: number, y: number, time: number): FlowVector {
  // Horizontal push depends on height, vertical push on horizontal position
  const fx = Math.sin(3.0 * y + 1.7 * time) * 0.5 + Math.sin(7.0 * y - 0.6 * time) * 0.5;
  const fy = Math.cos(3.0 * x - 1.3 * time) * 0.5 + Math.cos(5.0 * x + 0.8 * time) * 0.5;
  return { x: fx, y: fy };
}

/**
 * Lava Lamp Physics
 * Blob creation, integration, boundary handling, merge and split
 */

import type { LavaBlob, SimulationConfig, VisualParams } from './types';
import { DEFAULT_SIMULATION_CONFIG, MIN_BLOB_RADIUS } from './types';
import { clamp } from './math';
import { sampleFlowField } from './flowField';
import { gaussian, uniform, type RandomFn } from './random';

export function wrapCoordinate(value: number, size: number): number {
  const wrapped = value % size;
  if (wrapped >= 0) return wrapped;
  const shifted = wrapped + size;
  // A tiny negative remainder can round up to exactly `size`
  return shifted < size ? shifted : 0;
}

export function getDamping(viscosity: number, baseDamping: number = DEFAULT_SIMULATION_CONFIG.baseDamping): number {
  return baseDamping - (1 - viscosity) * 0.02;
}

export function createSeedBlob(
  params: VisualParams,
  random: RandomFn,
  config: SimulationConfig = DEFAULT_SIMULATION_CONFIG
): LavaBlob {
  return {
    x: random() * config.width,
    y: random() * config.height,
    vx: uniform(random, -config.seedVelocity, config.seedVelocity),
    vy: uniform(random, -config.seedVelocity, config.seedVelocity),
    radius: Math.max(MIN_BLOB_RADIUS, gaussian(random, params.blobSizeMean, config.seedSizeStdDev)),
    color: params.rgbPrimary,
  };
}

/** Blob added during count reconciliation: at rest, at the mean size. */
export function createFillerBlob(
  params: VisualParams,
  random: RandomFn,
  config: SimulationConfig = DEFAULT_SIMULATION_CONFIG
): LavaBlob {
  return {
    x: random() * config.width,
    y: random() * config.height,
    vx: 0,
    vy: 0,
    radius: Math.max(MIN_BLOB_RADIUS, params.blobSizeMean),
    color: params.rgbPrimary,
  };
}

export function integrateBlob(
  blob: LavaBlob,
  params: VisualParams,
  dt: number,
  elapsedS: number,
  config: SimulationConfig = DEFAULT_SIMULATION_CONFIG
): void {
  const flow = sampleFlowField(blob.x, blob.y, elapsedS);
  const damping = getDamping(params.viscosity, config.baseDamping);

  blob.vx += (flow.x * params.turbulence + params.gravityX) * dt;
  blob.vy += (flow.y * params.turbulence + params.buoyancy) * dt;
  blob.vx *= damping;
  blob.vy *= damping;

  // x wraps around the lamp, y stops at the glass
  blob.x = wrapCoordinate(blob.x + blob.vx * dt, config.width);
  blob.y = clamp(blob.y + blob.vy * dt, 0, config.height);
  blob.color = params.rgbPrimary;
}

/** Contact distance shrinks as dominance rises: 1.5×(ra+rb) at nd=0, 1.0× at nd=1. */
export function isWithinMergeRange(a: LavaBlob, b: LavaBlob, nd: number): boolean {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  const threshold = (a.radius + b.radius) * (1.5 - 0.5 * nd);
  return dx * dx + dy * dy < threshold * threshold;
}

/** Absorb `other` into `survivor`, keeping total area. */
export function mergeBlobs(survivor: LavaBlob, other: LavaBlob): void {
  survivor.radius = Math.sqrt(survivor.radius * survivor.radius + other.radius * other.radius);
  survivor.vx = (survivor.vx + other.vx) * 0.5;
  survivor.vy = (survivor.vy + other.vy) * 0.5;
}

/** Halve the blob's area and return the equally sized child. */
export function splitBlob(blob: LavaBlob, config: SimulationConfig = DEFAULT_SIMULATION_CONFIG): LavaBlob {
  const radius = blob.radius / Math.SQRT2;
  blob.radius = radius;
  return {
    x: wrapCoordinate(blob.x + config.splitOffset, config.width),
    y: clamp(blob.y + config.splitOffset, 0, config.height),
    vx: -blob.vx,
    vy: blob.vy,
    radius,
    color: blob.color,
  };
}

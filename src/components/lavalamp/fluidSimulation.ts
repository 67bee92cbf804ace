/**
 * Fluid Simulation
 *
 * Owns the blob set. Each step:
 * 1. Seed on first use
 * 2. Reconcile count (append at rest / truncate from the end)
 * 3. Integrate against the flow field, gravity sway and buoyancy
 * 4. Merge touching pairs (probability = dominance)
 * 5. Split oversized blobs (probability = arousal)
 * 6. Reconcile again so the step ends at exactly params.blobCount
 *
 * Topology runs after motion so merge/split see this tick's positions.
 */

import type { LavaBlob, SimulationConfig, VisualParams } from './types';
import { DEFAULT_SIMULATION_CONFIG } from './types';
import {
  createFillerBlob,
  createSeedBlob,
  integrateBlob,
  isWithinMergeRange,
  mergeBlobs,
  splitBlob,
} from './physics';
import { resolveRandom, type RandomFn } from './random';

export interface FluidSimulationOptions extends Partial<SimulationConfig> {
  seed?: number;
  random?: RandomFn;
}

export interface StepReport {
  merges: number;
  splits: number;
}

export interface SimulationStats {
  count: number;
  totalArea: number;
}

export class FluidSimulation {
  readonly config: SimulationConfig;
  private readonly random: RandomFn;
  private items: LavaBlob[] = [];

  constructor({ seed, random, ...config }: FluidSimulationOptions = {}) {
    this.config = { ...DEFAULT_SIMULATION_CONFIG, ...config };
    this.random = resolveRandom(seed, random);
  }

  get blobs(): ReadonlyArray<Readonly<LavaBlob>> {
    return this.items;
  }

  reset(params: VisualParams): void {
    this.items = [];
    for (let i = 0; i < params.blobCount; i++) {
      this.items.push(createSeedBlob(params, this.random, this.config));
    }
  }

  step(params: VisualParams, nd: number, na: number, dt: number, elapsedS: number): StepReport {
    if (this.items.length === 0) {
      this.reset(params);
    }
    this.reconcile(params);

    for (const blob of this.items) {
      integrateBlob(blob, params, dt, elapsedS, this.config);
    }

    const merges = this.mergePass(nd);
    const splits = this.splitPass(na, params);
    this.reconcile(params);

    return { merges, splits };
  }

  stats(): SimulationStats {
    return {
      count: this.items.length,
      totalArea: this.items.reduce((sum, blob) => sum + Math.PI * blob.radius * blob.radius, 0),
    };
  }

  private reconcile(params: VisualParams): void {
    const target = Math.max(0, params.blobCount);
    while (this.items.length < target) {
      this.items.push(createFillerBlob(params, this.random, this.config));
    }
    if (this.items.length > target) {
      this.items.length = target;
    }
  }

  // A survivor keeps scanning after an absorb, so it can take several blobs in one tick
  private mergePass(nd: number): number {
    let merges = 0;
    for (let i = 0; i < this.items.length; i++) {
      let j = i + 1;
      while (j < this.items.length) {
        const a = this.items[i];
        const b = this.items[j];
        if (isWithinMergeRange(a, b, nd) && this.random() < nd) {
          mergeBlobs(a, b);
          this.items.splice(j, 1);
          merges++;
          continue;
        }
        j++;
      }
    }
    return merges;
  }

  private splitPass(na: number, params: VisualParams): number {
    const limit = params.blobSizeMean * this.config.splitRatio;
    if (limit <= 0) return 0;
    let splits = 0;
    // Children are appended and visited too; each split halves the area so this terminates
    for (let i = 0; i < this.items.length; i++) {
      const blob = this.items[i];
      if (blob.radius > limit && this.random() < na) {
        this.items.push(splitBlob(blob, this.config));
        splits++;
      }
    }
    return splits;
  }
}

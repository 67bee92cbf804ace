/**
 * Emotion Lava Lamp Engine
 *
 * Pulls one VAD sample per tick and drives, in this order:
 * filter → energy → clock → mapping → simulation.
 * Returns the frame's VisualParams; the blob list is readable through `blobs`.
 */

import type {
  EngineStatus,
  LavaBlob,
  SmoothedEmotion,
  TargetEmotion,
  VadSource,
  VisualParams,
} from './types';
import { DEFAULT_DT } from './types';
import { normalizeAxis, targetEmotion } from './math';
import { TemporalFilter } from './temporalFilter';
import { EmotionEnergyModel } from './energyModel';
import { VisualMapping } from './visualMapping';
import { FluidSimulation, type StepReport } from './fluidSimulation';
import { createRng, type RandomFn } from './random';

export class VadSourceError extends Error {
  readonly sample: unknown;

  constructor(message: string, sample: unknown) {
    super(message);
    this.name = 'VadSourceError';
    this.sample = sample;
  }
}

function describe(value: unknown): string {
  if (Array.isArray(value)) return `array of length ${value.length}`;
  if (value === null) return 'null';
  return typeof value;
}

function isNumberRecord(value: object): value is { valence: unknown; arousal: unknown; dominance: unknown } {
  return 'valence' in value && 'arousal' in value && 'dominance' in value;
}

/**
 * Validate a raw source result. `null`/`undefined` mean "no sample".
 * Anything else must be three finite numbers, as a tuple or a named record.
 */
export function parseVadSample(sample: unknown): TargetEmotion | null {
  if (sample === null || sample === undefined) return null;

  let axes: unknown[];
  if (Array.isArray(sample)) {
    if (sample.length !== 3) {
      throw new VadSourceError(`VAD sample must have 3 components, got ${describe(sample)}`, sample);
    }
    axes = sample;
  } else if (typeof sample === 'object' && isNumberRecord(sample)) {
    axes = [sample.valence, sample.arousal, sample.dominance];
  } else {
    throw new VadSourceError(`VAD sample must be a [v, a, d] tuple or a VAD record, got ${describe(sample)}`, sample);
  }

  const [valence, arousal, dominance] = axes;
  if (
    typeof valence !== 'number' || !Number.isFinite(valence) ||
    typeof arousal !== 'number' || !Number.isFinite(arousal) ||
    typeof dominance !== 'number' || !Number.isFinite(dominance)
  ) {
    throw new VadSourceError(`VAD sample components must be finite numbers, got [${axes.map(String).join(', ')}]`, sample);
  }

  return targetEmotion(valence, arousal, dominance);
}

export interface EngineOptions {
  /** Seeds mapper and simulation from one generator. Omit for Math.random. */
  seed?: number;
  filter?: TemporalFilter;
  energyModel?: EmotionEnergyModel;
  mapper?: VisualMapping;
  simulation?: FluidSimulation;
}

export class EmotionLavaLampEngine {
  readonly filter: TemporalFilter;
  readonly energyModel: EmotionEnergyModel;
  readonly mapper: VisualMapping;
  readonly simulation: FluidSimulation;

  private readonly source: VadSource;
  private target: TargetEmotion = targetEmotion(0, 0, 0);
  private clock = 0;
  private lastParams: VisualParams | null = null;
  private lastStep: StepReport = { merges: 0, splits: 0 };

  constructor(source: VadSource, options: EngineOptions = {}) {
    this.source = source;
    const random: RandomFn | undefined = options.seed === undefined ? undefined : createRng(options.seed);
    this.filter = options.filter ?? new TemporalFilter();
    this.energyModel = options.energyModel ?? new EmotionEnergyModel();
    this.mapper = options.mapper ?? new VisualMapping({ random });
    this.simulation = options.simulation ?? new FluidSimulation({ random });
  }

  get targetVad(): TargetEmotion {
    return this.target;
  }

  get smoothed(): SmoothedEmotion {
    return this.filter.state;
  }

  get energy(): number {
    return this.energyModel.energy;
  }

  get timeS(): number {
    return this.clock;
  }

  get blobs(): ReadonlyArray<Readonly<LavaBlob>> {
    return this.simulation.blobs;
  }

  get params(): VisualParams | null {
    return this.lastParams;
  }

  get lastStepReport(): StepReport {
    return this.lastStep;
  }

  tick(dt: number = DEFAULT_DT): VisualParams {
    if (!Number.isFinite(dt) || dt < 0) {
      throw new RangeError(`tick dt must be a finite, non-negative number of seconds, got ${dt}`);
    }

    const sample = parseVadSample(this.source());
    if (sample) {
      this.target = sample;
    }

    const smoothed = this.filter.update(this.target, dt);
    const energy = this.energyModel.update(this.target, smoothed);
    this.clock += dt;

    const params = this.mapper.map(smoothed, energy, this.clock);
    this.lastStep = this.simulation.step(
      params,
      normalizeAxis(smoothed.dominance),
      normalizeAxis(smoothed.arousal),
      dt,
      this.clock
    );
    this.lastParams = params;
    return params;
  }

  status(): EngineStatus {
    return {
      smoothed: this.filter.state,
      energy: this.energyModel.energy,
      blobCount: this.simulation.blobs.length,
      turbulence: this.lastParams?.turbulence ?? 0,
    };
  }
}

function signed(value: number): string {
  return (value >= 0 ? '+' : '') + value.toFixed(2);
}

export function formatStatus(status: EngineStatus): string {
  const { valence, arousal, dominance } = status.smoothed;
  return (
    `Smoothed VAD: V=${signed(valence)}, A=${signed(arousal)}, D=${signed(dominance)}   ` +
    `Energy=${status.energy.toFixed(3)}   ` +
    `Blobs=${status.blobCount}   Turb=${status.turbulence.toFixed(2)}`
  );
}

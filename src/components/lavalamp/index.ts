export { LavaLamp } from './LavaLamp';
export { useLavaLampEngine, clampFrameDt } from './useLavaLampEngine';
export type { LavaLampFrame, LavaLampEngineResult } from './useLavaLampEngine';
export { EmotionLavaLampEngine, VadSourceError, parseVadSample, formatStatus } from './engine';
export type { EngineOptions } from './engine';
export { TemporalFilter } from './temporalFilter';
export { EmotionEnergyModel } from './energyModel';
export { VisualMapping } from './visualMapping';
export type { VisualMappingOptions } from './visualMapping';
export { FluidSimulation } from './fluidSimulation';
export type { FluidSimulationOptions, SimulationStats, StepReport } from './fluidSimulation';
export { createRng } from './random';
export type { RandomFn } from './random';
export * from './types';

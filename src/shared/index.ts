export { createVadSignal } from './vadSignal';
export type { VadSignalOptions } from './vadSignal';
export { useVadSignal } from './useVadSignal';
export { SIGNAL_MODES, isSignalMode } from './types';
export type { SignalMode } from './types';

/**
 * VAD Signal Hook
 * Keeps one signal generator per (mode, seed) across renders
 */

import { useMemo } from 'react';
import type { VadSource } from '../components/lavalamp/types';
import { createVadSignal } from './vadSignal';
import type { SignalMode } from './types';

export function useVadSignal(mode: SignalMode, seed?: number): VadSource {
  return useMemo(() => createVadSignal(mode, { seed }), [mode, seed]);
}

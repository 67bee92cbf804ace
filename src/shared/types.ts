/**
 * Shared types for the emotion signal sources
 */

export type SignalMode = 'sine' | 'noise' | 'step' | 'silent';

export const SIGNAL_MODES: readonly SignalMode[] = ['sine', 'noise', 'step', 'silent'];

export function isSignalMode(value: string): value is SignalMode {
  return SIGNAL_MODES.some(mode => mode === value);
}

/**
 * SignalSwitcher - Overlay component to pick the built-in emotion signal
 * Positioned in the top-right corner, styled like the lamp control panel
 */

import type { SignalMode } from '../shared/types';
import { SIGNAL_MODES } from '../shared/types';

interface SignalSwitcherProps {
  mode: SignalMode;
  onModeChange: (mode: SignalMode) => void;
}

const LABELS: Record<SignalMode, string> = {
  sine: 'Sine',
  noise: 'Noise',
  step: 'Step',
  silent: 'Hold',
};

const styles = {
  container: {
    position: 'absolute' as const,
    top: 16,
    right: 16,
    zIndex: 20,
    backgroundColor: 'hsla(240, 20%, 16%, 0.7)',
    borderRadius: 16,
    padding: 12,
    display: 'flex',
    gap: 8,
    backdropFilter: 'blur(8px)',
  },
  button: {
    padding: '8px 16px',
    borderRadius: 12,
    border: 'none',
    cursor: 'pointer',
    fontSize: 13,
    fontWeight: 500,
    fontFamily: 'system-ui, sans-serif',
    transition: 'all 0.2s ease',
  },
  buttonActive: {
    backgroundColor: 'hsla(0, 0%, 100%, 0.2)',
    color: 'hsla(0, 0%, 100%, 0.85)',
  },
  buttonInactive: {
    backgroundColor: 'hsla(0, 0%, 100%, 0.08)',
    color: 'hsla(0, 0%, 100%, 0.45)',
  },
};

export function SignalSwitcher({ mode, onModeChange }: SignalSwitcherProps) {
  return (
    <div style={styles.container} onClick={(e) => e.stopPropagation()}>
      {SIGNAL_MODES.map(option => (
        <button
          key={option}
          style={{
            ...styles.button,
            ...(mode === option ? styles.buttonActive : styles.buttonInactive),
          }}
          onClick={() => onModeChange(option)}
        >
          {LABELS[option]}
        </button>
      ))}
    </div>
  );
}

/**
 * LavaLamp - Emotion-Reactive Metaball Visualization
 *
 * - Valence warms the palette (blue → orange) and loosens the wax
 * - Arousal brightens colors and breaks the wax into more, smaller blobs
 * - Dominance makes blobs stick together and keeps the hue steady
 *
 * The engine lives in the unit square with y pointing up; this component
 * scales it into the lamp body and flips y for SVG.
 */

import { useState, useEffect, useCallback } from 'react';
import type { VadSource } from './types';
import { formatStatus } from './engine';
import { normalizeAxis, rgbToHex } from './math';
import { getSizeBreathingMultiplier, BREATHING_CONFIG } from './drift';
import { useLavaLampEngine } from './useLavaLampEngine';

interface LavaLampProps {
  source: VadSource;
  seed?: number;
}

const LAMP_MARGIN = 48;
const RADIUS_SCALE = 0.35;
const MAX_ENERGY_DISPLAY = 10;

// Inline styles since we don't have Tailwind
const styles = {
  container: {
    position: 'fixed' as const,
    inset: 0,
    overflow: 'hidden',
    backgroundColor: '#0f0f16',
  },
  controlPanel: {
    position: 'absolute' as const,
    top: 16,
    left: 16,
    zIndex: 20,
    backgroundColor: 'rgba(39, 39, 42, 0.8)',
    borderRadius: 16,
    padding: 16,
    color: 'white',
    fontFamily: 'system-ui, sans-serif',
    minWidth: 220,
  },
  title: {
    fontSize: 20,
    fontWeight: 'bold' as const,
    marginBottom: 12,
  },
  error: {
    color: '#f87171',
    fontSize: 12,
    marginBottom: 8,
  },
  stats: {
    marginTop: 12,
    fontSize: 11,
    color: '#a1a1aa',
    fontFamily: 'ui-monospace, monospace',
    whiteSpace: 'pre-wrap' as const,
  },
  meterContainer: {
    display: 'flex',
    flexDirection: 'column' as const,
    gap: 6,
  },
  meterRow: {
    display: 'flex',
    alignItems: 'center',
    gap: 8,
  },
  meterLabel: {
    width: 70,
    fontSize: 12,
  },
  meterBg: {
    flex: 1,
    height: 6,
    backgroundColor: '#3f3f46',
    borderRadius: 3,
    overflow: 'hidden',
  },
  svg: {
    position: 'absolute' as const,
    top: 0,
    left: 0,
    width: '100%',
    height: '100%',
  },
};

export function LavaLamp({ source, seed }: LavaLampProps) {
  const [viewport, setViewport] = useState({ width: window.innerWidth, height: window.innerHeight });
  const { frame, error, isPaused, togglePause } = useLavaLampEngine(source, seed);
  const { params, blobs, status, timeS } = frame;

  useEffect(() => {
    const handleResize = () => {
      setViewport({ width: window.innerWidth, height: window.innerHeight });
    };
    window.addEventListener('resize', handleResize);
    return () => window.removeEventListener('resize', handleResize);
  }, []);

  const handleBackgroundClick = useCallback(() => {
    togglePause();
  }, [togglePause]);

  const lampWidth = Math.max(1, viewport.width - LAMP_MARGIN * 2);
  const lampHeight = Math.max(1, viewport.height - LAMP_MARGIN * 2);
  const radiusScale = Math.min(viewport.width, viewport.height) * RADIUS_SCALE;

  // Calmer lamps breathe more
  const arousal = normalizeAxis(status.smoothed.arousal);
  const breathingAmount = BREATHING_CONFIG.amount * (2 - arousal);

  const glowColor = params ? rgbToHex(params.rgbSecondary) : '#1a1a2e';

  return (
    <div style={styles.container} onClick={handleBackgroundClick}>
      {/* Control Panel - stop propagation so clicks here don't toggle pause */}
      <div style={styles.controlPanel} onClick={(e) => e.stopPropagation()}>
        <h1 style={styles.title}>Emotion Lava Lamp</h1>

        {error && <p style={styles.error}>{error}</p>}

        <div style={styles.meterContainer}>
          {[
            { label: 'Valence', value: normalizeAxis(status.smoothed.valence), color: '#f97316' },
            { label: 'Arousal', value: arousal, color: '#ec4899' },
            { label: 'Dominance', value: normalizeAxis(status.smoothed.dominance), color: '#8b5cf6' },
            { label: 'Energy', value: Math.min(1, status.energy / MAX_ENERGY_DISPLAY), color: '#eab308' },
          ].map(({ label, value, color }) => (
            <div key={label} style={styles.meterRow}>
              <span style={styles.meterLabel}>{label}:</span>
              <div style={styles.meterBg}>
                <div
                  style={{
                    height: '100%',
                    backgroundColor: color,
                    width: `${value * 100}%`,
                    transition: 'width 75ms',
                  }}
                />
              </div>
            </div>
          ))}
        </div>

        <p style={styles.stats}>
          {formatStatus(status)}
          {'\n'}
          {isPaused ? 'paused' : `${timeS.toFixed(1)}s`}
        </p>
      </div>

      <svg style={styles.svg} viewBox={`0 0 ${viewport.width} ${viewport.height}`}>
        <defs>
          {/* Gooey metaball filter: blur then sharpen alpha so touching blobs melt together */}
          <filter id="goo" colorInterpolationFilters="sRGB">
            <feGaussianBlur in="SourceGraphic" stdDeviation="16" />
            <feColorMatrix values="1 0 0 0 0  0 1 0 0 0  0 0 1 0 0  0 0 0 96 -48" />
          </filter>
          <radialGradient id="lamp-glow" cx="50%" cy="85%" r="80%">
            <stop offset="0%" stopColor={glowColor} stopOpacity={0.35} />
            <stop offset="100%" stopColor="#0f0f16" stopOpacity={0} />
          </radialGradient>
        </defs>

        {/* Lamp body */}
        <rect
          x={LAMP_MARGIN}
          y={LAMP_MARGIN}
          width={lampWidth}
          height={lampHeight}
          rx={24}
          fill="url(#lamp-glow)"
          stroke="#6c6c8a"
          strokeWidth={2}
        />

        <g filter="url(#goo)">
          {blobs.map((blob, index) => (
            <circle
              key={index}
              cx={LAMP_MARGIN + blob.x * lampWidth}
              cy={LAMP_MARGIN + (1 - blob.y) * lampHeight}
              r={blob.radius * radiusScale * getSizeBreathingMultiplier(timeS, index, breathingAmount)}
              fill={rgbToHex(blob.color)}
            />
          ))}
        </g>
      </svg>
    </div>
  );
}

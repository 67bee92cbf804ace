/**
 * Animation loop hook
 * Owns one engine per source and ticks it from requestAnimationFrame
 */

import { useState, useEffect, useRef, useCallback } from 'react';
import type { EngineStatus, LavaBlob, VadSource, VisualParams } from './types';
import { EmotionLavaLampEngine } from './engine';
import { smoothedEmotion } from './math';

// Long frames (tab switch, debugger) would otherwise fling blobs across the lamp
const MAX_FRAME_DT = 0.05;

export interface LavaLampFrame {
  params: VisualParams | null;
  blobs: ReadonlyArray<Readonly<LavaBlob>>;
  status: EngineStatus;
  timeS: number;
}

export interface LavaLampEngineResult {
  frame: LavaLampFrame;
  error: string | null;
  isPaused: boolean;
  togglePause: () => void;
}

const EMPTY_FRAME: LavaLampFrame = {
  params: null,
  blobs: [],
  status: { smoothed: smoothedEmotion(0, 0, 0), energy: 0, blobCount: 0, turbulence: 0 },
  timeS: 0,
};

export function clampFrameDt(deltaMs: number): number {
  return Math.max(0, Math.min(MAX_FRAME_DT, deltaMs / 1000));
}

function snapshot(engine: EmotionLavaLampEngine): LavaLampFrame {
  return {
    params: engine.params,
    // Copy so React sees a new array; blobs are mutated in place by the simulation
    blobs: engine.blobs.map(blob => ({ ...blob })),
    status: engine.status(),
    timeS: engine.timeS,
  };
}

export function useLavaLampEngine(source: VadSource, seed?: number): LavaLampEngineResult {
  const engineRef = useRef<EmotionLavaLampEngine | null>(null);
  const animationRef = useRef<number | null>(null);
  const lastFrameRef = useRef<number | null>(null);

  const [frame, setFrame] = useState<LavaLampFrame>(EMPTY_FRAME);
  const [error, setError] = useState<string | null>(null);
  const [isPaused, setIsPaused] = useState(false);

  // New source → fresh engine
  useEffect(() => {
    engineRef.current = new EmotionLavaLampEngine(source, { seed });
    lastFrameRef.current = null;
    setError(null);
    setFrame(EMPTY_FRAME);
  }, [source, seed]);

  const animate = useCallback((timestamp: number) => {
    const engine = engineRef.current;
    const last = lastFrameRef.current;
    lastFrameRef.current = timestamp;

    if (engine && !isPaused && last !== null) {
      try {
        engine.tick(clampFrameDt(timestamp - last));
        setFrame(snapshot(engine));
      } catch (err) {
        setError(err instanceof Error ? err.message : 'Emotion source failed');
        console.error('Lava lamp tick error:', err);
        return; // stop the loop; a bad source would fail every frame
      }
    }

    animationRef.current = requestAnimationFrame(animate);
  }, [isPaused]);

  useEffect(() => {
    animationRef.current = requestAnimationFrame(animate);
    return () => {
      if (animationRef.current !== null) {
        cancelAnimationFrame(animationRef.current);
      }
    };
  }, [animate, source]);

  const togglePause = useCallback(() => {
    setIsPaused(prev => !prev);
  }, []);

  return { frame, error, isPaused, togglePause };
}

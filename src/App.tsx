import { useState } from 'react';
import { LavaLamp } from './components/lavalamp';
import { SignalSwitcher } from './components/SignalSwitcher';
import { useVadSignal, isSignalMode } from './shared';
import type { SignalMode } from './shared/types';
import './index.css';

// ?signal=noise picks the test signal, ?seed=42 makes the run reproducible
function getInitialMode(): SignalMode {
  const requested = new URLSearchParams(window.location.search).get('signal');
  return requested !== null && isSignalMode(requested) ? requested : 'sine';
}

function getSeed(): number | undefined {
  const raw = new URLSearchParams(window.location.search).get('seed');
  if (raw === null) return undefined;
  const seed = Number.parseInt(raw, 10);
  if (Number.isNaN(seed)) {
    console.warn(`Ignoring non-numeric seed: ${raw}`);
    return undefined;
  }
  return seed;
}

function App() {
  const [mode, setMode] = useState<SignalMode>(getInitialMode);
  const [seed] = useState<number | undefined>(getSeed);
  const source = useVadSignal(mode, seed);

  return (
    <>
      <SignalSwitcher mode={mode} onModeChange={setMode} />
      <LavaLamp source={source} seed={seed} />
    </>
  );
}

export default App;

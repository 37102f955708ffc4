import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import App, { StartupFailure } from './App';
import { loadAppConfig } from './lib/config';
import { loadBundledContent } from './lib/content';
import { error } from './lib/logging';
import { RewardEngine } from './lib/reward-engine';
import { loadRewardState, saveRewardState } from './lib/storage';

const container = document.getElementById('root');
if (!container) throw new Error('Missing #root element');
const root = createRoot(container);

try {
  const config = loadAppConfig();
  const content = loadBundledContent();
  const engine = new RewardEngine({ content: content.creatures, initialState: loadRewardState() });
  engine.subscribe(() => saveRewardState(engine.getSnapshot()));

  root.render(
    <StrictMode>
      <App engine={engine} config={config} reading={content.reading} />
    </StrictMode>
  );
} catch (startupError) {
  error('startup failed', startupError);
  root.render(<StartupFailure message={startupError instanceof Error ? startupError.message : String(startupError)} />);
}

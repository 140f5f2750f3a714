import { render } from 'ink';
import { createElement } from 'react';
import type { UiHandle, UiInput } from '../runtime/app.js';
import { HeatmapApp } from './HeatmapApp.js';

const ENTER_ALT_SCREEN = '\u001b[?1049h';
const LEAVE_ALT_SCREEN = '\u001b[?1049l';

/** Mount the heatmap on the alternate screen; the terminal is restored on exit. */
export function renderHeatmap({ config, samples, stats }: UiInput): UiHandle {
  process.stdout.write(ENTER_ALT_SCREEN);

  const instance = render(
    createElement(HeatmapApp, {
      target: config.target,
      historySize: config.historySize,
      showHelp: config.showHelp,
      samples,
      stats,
    }),
  );

  const exited = instance.waitUntilExit().finally(() => {
    process.stdout.write(LEAVE_ALT_SCREEN);
  });

  return {
    waitUntilExit: () => exited,
    unmount: () => instance.unmount(),
  };
}

import type { Sample, Stats } from '@pingscope/shared';
import { Box, Text, useApp, useInput, useStdout } from 'ink';
import { useEffect, useRef, useState } from 'react';
import type { Channel } from '../runtime/channel.js';
import { Heatmap } from './Heatmap.js';
import { HelpPanel } from './HelpPanel.js';
import { HeatmapModel, actionForKey } from './model.js';
import { StatsPanel } from './StatsPanel.js';
import { StatusBar } from './StatusBar.js';
import { gridDimensions } from './viewport.js';

/** Repaint interval; samples arriving in between are batched. */
const FRAME_MS = 100;

interface HeatmapAppProps {
  target: string;
  historySize: number;
  showHelp: boolean;
  samples: Channel<Sample>;
  stats: Channel<Stats>;
}

export function HeatmapApp({
  target,
  historySize,
  showHelp,
  samples,
  stats,
}: HeatmapAppProps): JSX.Element {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const [model] = useState(() => new HeatmapModel(historySize, showHelp));
  const [size, setSize] = useState({ width: stdout.columns || 80, height: stdout.rows || 24 });
  const [, setFrame] = useState(0);
  const dirty = useRef(false);

  useEffect(() => {
    const onResize = (): void => {
      setSize({ width: stdout.columns || 80, height: stdout.rows || 24 });
    };
    stdout.on('resize', onResize);
    return () => {
      stdout.off('resize', onResize);
    };
  }, [stdout]);

  useEffect(() => {
    const controller = new AbortController();
    const drain = async <T,>(channel: Channel<T>, apply: (value: T) => void): Promise<void> => {
      for (;;) {
        const next = await channel.receive(controller.signal);
        if (next.done) return;
        apply(next.value);
        dirty.current = true;
      }
    };
    // receive never rejects; both loops end on close or abort.
    void Promise.all([
      drain(samples, (sample) => model.pushSample(sample)),
      drain(stats, (snapshot) => model.setStats(snapshot)),
    ]);
    return () => controller.abort();
  }, [samples, stats, model]);

  useEffect(() => {
    const timer = setInterval(() => {
      if (dirty.current) {
        dirty.current = false;
        setFrame((n) => n + 1);
      }
    }, FRAME_MS);
    return () => clearInterval(timer);
  }, []);

  const grid = gridDimensions(size.width, size.height);

  useEffect(() => {
    model.fit(gridDimensions(size.width, size.height));
  }, [model, size]);

  useInput((input, key) => {
    const action = actionForKey(input, key);
    if (!action) return;
    if (model.apply(action, grid)) {
      exit();
      return;
    }
    setFrame((n) => n + 1);
  });

  const visible = model.visibleSamples(grid);

  return (
    <Box flexDirection="column" width={size.width}>
      <Box>
        <Text bold color="#FFFFFF" backgroundColor="#5F5FD7">
          {' pingscope '}
        </Text>
        <Text> </Text>
        <Text bold color="#00FF00">
          {target}
        </Text>
      </Box>
      <StatsPanel stats={model.stats} />
      {model.showHelp ? <HelpPanel /> : <Heatmap samples={visible} grid={grid} />}
      <StatusBar
        width={size.width}
        message={model.status}
        scroll={model.scroll}
        scrollable={model.canScrollUp(grid) || model.canScrollDown()}
      />
    </Box>
  );
}

import type { UiFactory, UiHandle, UiInput } from '../runtime/app.js';
import type { Channel } from '../runtime/channel.js';
import { formatSampleLine, formatStatsLine } from './format.js';

export type LineWriter = (line: string) => void;

const stdoutWriter: LineWriter = (line) => {
  process.stdout.write(`${line}\n`);
};

async function drain<T>(channel: Channel<T>, signal: AbortSignal, emit: (value: T) => void): Promise<void> {
  for (;;) {
    const next = await channel.receive(signal);
    if (next.done) return;
    emit(next.value);
  }
}

/**
 * Plain-text stand-in for the heatmap: a line per sample and a summary line
 * per snapshot. Exits when both channels close or on unmount.
 */
export function createHeadlessReporter(write: LineWriter = stdoutWriter): UiFactory {
  return ({ config, samples, stats }: UiInput): UiHandle => {
    const controller = new AbortController();
    write(`pingscope ${config.target} every ${config.intervalMs}ms`);

    const done = Promise.all([
      drain(samples, controller.signal, (sample) => write(formatSampleLine(sample))),
      drain(stats, controller.signal, (snapshot) => write(`  ${formatStatsLine(snapshot)}`)),
    ]).then(() => undefined);

    return {
      waitUntilExit: () => done,
      unmount: () => controller.abort(),
    };
  };
}

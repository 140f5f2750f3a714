#!/usr/bin/env -S node --import tsx

import { PrometheusExporter } from '@pingscope/exporter';
import { createParser } from '@pingscope/parsers';
import { type MonitorConfig, createLogger } from '@pingscope/shared';
import { UsageError, parseArgs, usage } from './cli/args.js';
import { App, type UiFactory } from './runtime/app.js';
import { PingRunner } from './runtime/runner.js';
import { createHeadlessReporter } from './tui/headless.js';
import { VERSION } from './version.js';

async function loadUi(config: MonitorConfig): Promise<UiFactory> {
  if (config.headless) return createHeadlessReporter();
  // Ink pulls in React and takes over the terminal; load it only when needed.
  const { renderHeatmap } = await import('./tui/render.js');
  return renderHeatmap;
}

async function cmdRun(config: MonitorConfig): Promise<void> {
  const logger = createLogger({ level: config.logLevel, file: config.logFile });

  const runner = new PingRunner({
    target: config.target,
    intervalMs: config.intervalMs,
    parser: createParser(process.platform),
    logger,
  });
  const exporter = config.exporterAddr
    ? new PrometheusExporter({ target: config.target, addr: config.exporterAddr, logger })
    : undefined;

  const controller = new AbortController();
  const shutdown = (): void => controller.abort();
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    const app = new App(config, { runner, exporter, ui: await loadUi(config), logger });
    await app.run(controller.signal);
  } finally {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
  }
}

async function main(): Promise<void> {
  const command = parseArgs(process.argv.slice(2), process.env);
  switch (command.kind) {
    case 'version':
      console.log(`pingscope v${VERSION}`);
      return;
    case 'usage':
      console.log(usage());
      return;
    case 'run':
      await cmdRun(command.config);
      return;
  }
}

main().then(
  () => process.exit(0),
  (err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
    if (err instanceof UsageError) {
      console.error('');
      console.error(usage());
    }
    process.exit(1);
  },
);

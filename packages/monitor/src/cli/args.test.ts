import { describe, expect, it } from 'vitest';
import { UsageError, parseArgs, usage } from './args.js';

function runConfig(argv: string[], env: NodeJS.ProcessEnv = {}) {
  const command = parseArgs(argv, env);
  if (command.kind !== 'run') throw new Error(`expected run, got ${command.kind}`);
  return command.config;
}

describe('parseArgs', () => {
  it('uses defaults for a bare target', () => {
    expect(runConfig(['example.com'])).toEqual({
      target: 'example.com',
      intervalMs: 1_000,
      historySize: 30_000,
      sampleBufferSize: 100,
      uiBufferSize: 100,
      metricsBufferSize: 10,
      showHelp: false,
      headless: false,
      logLevel: 'warn',
    });
  });

  it('accepts the short and long interval forms', () => {
    expect(runConfig(['-i', '500ms', '192.0.2.1']).intervalMs).toBe(500);
    expect(runConfig(['--interval', '2s', '192.0.2.1']).intervalMs).toBe(2_000);
    expect(runConfig(['--interval=1m30s', '192.0.2.1']).intervalMs).toBe(90_000);
  });

  it('lets the last interval flag win', () => {
    expect(runConfig(['-i', '500ms', '--interval', '2s', 'example.com']).intervalMs).toBe(2_000);
  });

  it('enforces interval bounds', () => {
    expect(() => parseArgs(['-i', '50ms', 'example.com'])).toThrow('interval must be at least 100ms');
    expect(() => parseArgs(['-i', '2h', 'example.com'])).toThrow('interval must be at most 1 hour');
  });

  it('rejects malformed durations as usage errors', () => {
    expect(() => parseArgs(['-i', 'soon', 'example.com'])).toThrow(UsageError);
  });

  it('reads history, exporter and mode flags', () => {
    const config = runConfig(['--history', '500', '--exporter', ':9090', '--headless', '--help', 'example.com']);
    expect(config.historySize).toBe(500);
    expect(config.exporterAddr).toBe(':9090');
    expect(config.headless).toBe(true);
    expect(config.showHelp).toBe(true);
  });

  it('validates the exporter address', () => {
    expect(() => parseArgs(['--exporter', ':70000', 'example.com'])).toThrow(
      'port must be between 1 and 65535 for exporter: 70000',
    );
    expect(() => parseArgs(['--exporter', 'localhost', 'example.com'])).toThrow(
      'invalid exporter address "localhost": missing port',
    );
  });

  it('requires a target', () => {
    expect(() => parseArgs([])).toThrow(new UsageError('target host required'));
  });

  it('validates the target format', () => {
    expect(() => parseArgs(['exa mple'])).toThrow('invalid target format');
  });

  it('rejects unknown flags and missing values', () => {
    expect(() => parseArgs(['--count', '3', 'example.com'])).toThrow('flag provided but not defined: --count');
    expect(() => parseArgs(['example.com', '--history'])).toThrow('flag needs an argument: --history');
  });

  it('rejects extra positional arguments', () => {
    expect(() => parseArgs(['example.com', 'example.org'])).toThrow(UsageError);
  });

  it('returns version and usage commands', () => {
    expect(parseArgs(['--version'])).toEqual({ kind: 'version' });
    expect(parseArgs(['-version', 'example.com'])).toEqual({ kind: 'version' });
    expect(parseArgs(['--help'])).toEqual({ kind: 'usage' });
  });

  it('takes logging settings from the environment', () => {
    const config = runConfig(['example.com'], {
      PINGSCOPE_LOG_LEVEL: 'debug',
      PINGSCOPE_LOG_FILE: '/tmp/pingscope.log',
    });
    expect(config.logLevel).toBe('debug');
    expect(config.logFile).toBe('/tmp/pingscope.log');
  });

  it('prefers flags over the environment', () => {
    const config = runConfig(['--log-level', 'error', 'example.com'], { PINGSCOPE_LOG_LEVEL: 'debug' });
    expect(config.logLevel).toBe('error');
  });

  it('rejects an unknown log level', () => {
    expect(() => parseArgs(['--log-level', 'loud', 'example.com'])).toThrow();
  });
});

describe('usage', () => {
  it('starts with the synopsis', () => {
    expect(usage().split('\n')[0]).toBe('Usage: pingscope [options] <target>');
  });
});

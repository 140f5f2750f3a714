import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import type { LineParser } from '@pingscope/parsers';
import { type Logger, type Sample, silentLogger } from '@pingscope/shared';
import type { Channel } from './channel.js';
import { buildPingCommand, describeCommand } from './command.js';

/** The slice of a child process the runner depends on */
export interface PingProcess {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  once(event: 'error', listener: (err: Error) => void): this;
}

export interface PingSpawnOptions {
  env: NodeJS.ProcessEnv;
  windowsVerbatimArguments: boolean;
}

export type SpawnFn = (command: string, args: string[], options: PingSpawnOptions) => PingProcess;

export interface PingRunnerOptions {
  target: string;
  intervalMs: number;
  parser: LineParser;
  /** Defaults to `process.platform` */
  platform?: string;
  spawn?: SpawnFn;
  logger?: Logger;
}

/** Lines of stderr kept for the failure message */
const STDERR_TAIL_LINES = 20;

const defaultSpawn: SpawnFn = (command, args, options) =>
  spawn(command, args, { ...options, stdio: ['ignore', 'pipe', 'pipe'] });

/**
 * Drives the platform's continuous `ping` and turns its output into samples.
 * Suspends on `samples.send` when downstream falls behind.
 */
export class PingRunner {
  private readonly parser: LineParser;
  private readonly spawn: SpawnFn;
  private readonly platform: string;
  private readonly logger: Logger;

  constructor(private readonly options: PingRunnerOptions) {
    this.parser = options.parser;
    this.spawn = options.spawn ?? defaultSpawn;
    this.platform = options.platform ?? process.platform;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Resolves when `signal` aborts (the child is killed) or the command exits
   * cleanly. Rejects when the command cannot start or exits with a failure.
   */
  async run(samples: Channel<Sample>, signal: AbortSignal): Promise<void> {
    const command = buildPingCommand(this.platform, this.options.target, this.options.intervalMs);
    const commandLine = describeCommand(command);
    if (signal.aborted) return;

    const child = this.spawn(command.command, command.args, {
      env: { ...process.env, ...command.env },
      windowsVerbatimArguments: command.verbatim,
    });
    this.logger.info({ command: commandLine }, 'Ping runner started');

    const exited = new Promise<{ code: number | null; signal: NodeJS.Signals | null }>(
      (resolve, reject) => {
        child.once('error', reject);
        child.once('close', (code, exitSignal) => resolve({ code, signal: exitSignal }));
      },
    );

    const stderrTail: string[] = [];
    const onAbort = (): void => {
      child.kill();
    };
    signal.addEventListener('abort', onAbort, { once: true });

    let exit: { code: number | null; signal: NodeJS.Signals | null };
    try {
      [, , exit] = await Promise.all([
        this.pump(child.stdout, samples, signal),
        this.pump(child.stderr, samples, signal, (line) => {
          stderrTail.push(line);
          if (stderrTail.length > STDERR_TAIL_LINES) stderrTail.shift();
        }),
        exited,
      ]);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`failed to start ping command '${commandLine}': ${message}`);
    } finally {
      signal.removeEventListener('abort', onAbort);
    }

    if (signal.aborted) {
      this.logger.info({ command: commandLine }, 'Ping runner stopped');
      return;
    }
    if (exit.code === 0) return;

    const reason = exit.code !== null ? `exit code ${exit.code}` : `killed by ${exit.signal ?? 'signal'}`;
    const stderr = stderrTail.join('\n').trim();
    if (stderr !== '') {
      throw new Error(`ping command failed: ${reason} (stderr: ${stderr})`);
    }
    throw new Error(`ping command failed (${commandLine}): ${reason}`);
  }

  /** Some systems report timeouts on stderr, so both streams go through the parser. */
  private async pump(
    stream: Readable | null,
    samples: Channel<Sample>,
    signal: AbortSignal,
    onLine?: (line: string) => void,
  ): Promise<void> {
    if (!stream) return;

    const lines = createInterface({ input: stream, crlfDelay: Number.POSITIVE_INFINITY });
    try {
      for await (const line of lines) {
        onLine?.(line);
        const result = this.parser.parseLine(line);
        if (!result.matched) continue;
        if (!(await samples.send(result.sample, signal))) break;
      }
    } finally {
      lines.close();
    }
  }
}

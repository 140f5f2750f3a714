import { type MonitorConfigInput, MonitorConfig, parseListenAddress } from '@pingscope/shared';
import { parseDuration } from './duration.js';
import { validateTarget } from './target.js';

/** A command-line mistake; the caller prints usage after the message. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type CliCommand =
  | { kind: 'run'; config: MonitorConfig }
  | { kind: 'version' }
  | { kind: 'usage' };

const VALUE_FLAGS = new Set(['i', 'interval', 'history', 'exporter', 'log-level', 'log-file']);
const BOOLEAN_FLAGS = new Set(['version', 'help', 'headless']);

export function usage(program = 'pingscope'): string {
  return [
    `Usage: ${program} [options] <target>`,
    '',
    `${program} - network latency heatmap`,
    '',
    'Options:',
    '  -i, --interval <duration>  Ping interval, 100ms to 1h (default 1s)',
    '  --history <n>              Samples kept for scroll-back (default 30000)',
    '  --exporter <addr>          Serve Prometheus metrics on addr (e.g. :9090)',
    '  --headless                 Print samples and statistics instead of the heatmap',
    '  --log-level <level>        fatal, error, warn, info, debug, trace or silent (default warn)',
    '  --log-file <path>          Write logs to a file instead of stderr',
    '  --help                     Open the help panel on startup',
    '  --version                  Print the version and exit',
    '',
    'Environment:',
    '  PINGSCOPE_LOG_LEVEL, PINGSCOPE_LOG_FILE',
    '',
    'Examples:',
    `  ${program} example.com`,
    `  ${program} -i 500ms 192.0.2.1`,
    `  ${program} --exporter :9090 2001:db8::1`,
  ].join('\n');
}

interface RawArgs {
  values: Map<string, string>;
  flags: Set<string>;
  positionals: string[];
}

/** Accepts `-flag`, `--flag`, `--flag=value` and `--flag value`; `--` ends flag parsing. */
function tokenize(argv: readonly string[]): RawArgs {
  const values = new Map<string, string>();
  const flags = new Set<string>();
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i] ?? '';
    if (token === '--') {
      positionals.push(...argv.slice(i + 1));
      break;
    }
    if (!token.startsWith('-') || token === '-') {
      positionals.push(token);
      continue;
    }

    const body = token.replace(/^--?/, '');
    const eq = body.indexOf('=');
    const name = eq === -1 ? body : body.slice(0, eq);
    const inline = eq === -1 ? undefined : body.slice(eq + 1);

    if (BOOLEAN_FLAGS.has(name)) {
      if (inline !== undefined && inline !== 'true' && inline !== 'false') {
        throw new UsageError(`invalid boolean value "${inline}" for flag -${name}`);
      }
      if (inline !== 'false') flags.add(name);
      continue;
    }
    if (!VALUE_FLAGS.has(name)) {
      throw new UsageError(`flag provided but not defined: ${token}`);
    }

    const value = inline ?? argv[i + 1];
    if (value === undefined) {
      throw new UsageError(`flag needs an argument: ${token}`);
    }
    if (inline === undefined) i++;
    values.set(name === 'i' ? 'interval' : name, value);
  }

  return { values, flags, positionals };
}

function parseInterval(text: string): number {
  const ms = parseDuration(text);
  if (ms === undefined) {
    throw new UsageError(`invalid value "${text}" for flag -interval: invalid duration`);
  }
  return Math.round(ms);
}

function parseCount(text: string, flag: string): number {
  if (!/^-?\d+$/.test(text)) {
    throw new UsageError(`invalid value "${text}" for flag -${flag}: not an integer`);
  }
  return Number.parseInt(text, 10);
}

/**
 * Turn argv (without node and script) plus the environment into a command.
 * Flags win over environment variables. Throws {@link UsageError} for syntax
 * problems and a plain Error for values that fail validation.
 */
export function parseArgs(argv: readonly string[], env: NodeJS.ProcessEnv = {}): CliCommand {
  const { values, flags, positionals } = tokenize(argv);

  if (flags.has('version')) return { kind: 'version' };

  const target = positionals[0];
  if (target === undefined) {
    if (flags.has('help')) return { kind: 'usage' };
    throw new UsageError('target host required');
  }
  if (positionals.length > 1) {
    throw new UsageError(`unexpected arguments after target: ${positionals.slice(1).join(' ')}`);
  }

  const interval = values.get('interval');
  const history = values.get('history');
  const raw: MonitorConfigInput = {
    target,
    intervalMs: interval === undefined ? undefined : parseInterval(interval),
    historySize: history === undefined ? undefined : parseCount(history, 'history'),
    exporterAddr: values.get('exporter') || undefined,
    showHelp: flags.has('help'),
    headless: flags.has('headless'),
    logFile: values.get('log-file') ?? (env.PINGSCOPE_LOG_FILE || undefined),
  };
  const logLevel = values.get('log-level') ?? (env.PINGSCOPE_LOG_LEVEL || undefined);

  const parsed = MonitorConfig.safeParse({ ...raw, logLevel });
  if (!parsed.success) {
    throw new Error(parsed.error.issues.map((issue) => issue.message).join('; '));
  }
  const config = parsed.data;

  validateTarget(config.target);
  if (config.exporterAddr !== undefined) {
    parseListenAddress(config.exporterAddr, 'exporter');
  }

  return { kind: 'run', config };
}

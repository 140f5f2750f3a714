import { isIPv6 } from 'node:net';

export interface PingCommand {
  command: string;
  args: string[];
  /** Variables layered over the inherited environment */
  env: Record<string, string>;
  /** Pass `args` to the shell untouched (Windows `cmd.exe /C`) */
  verbatim: boolean;
}

// Hostnames, IPv4, IPv6 and zone IDs. Anything else could reach cmd.exe.
const WINDOWS_TARGET_RE = /^[-A-Za-z0-9._:%]+$/;

/** Strips one pair of enclosing brackets, as in `[::1]`. */
export function normalizeTarget(target: string): string {
  if (target.length >= 2 && target.startsWith('[') && target.endsWith(']')) {
    return target.slice(1, -1);
  }
  return target;
}

export function isIPv6Literal(target: string): boolean {
  let host = normalizeTarget(target);
  const zone = host.indexOf('%');
  if (zone !== -1) host = host.slice(0, zone);
  return isIPv6(host) && !isIPv4Mapped(host);
}

/** `::ffff:1.2.3.4` is an IPv4 host; `ping` copes with it without `-6`. */
function isIPv4Mapped(host: string): boolean {
  return /^::ffff:\d+\.\d+\.\d+\.\d+$/i.test(host);
}

export function validateWindowsTarget(target: string): void {
  if (target === '') {
    throw new Error('target host required');
  }
  if (!WINDOWS_TARGET_RE.test(target)) {
    throw new Error('target contains unsupported characters for Windows ping');
  }
}

/** Double-quotes an argument for cmd.exe, escaping `%` so it is not expanded. */
export function quoteCmdArg(arg: string): string {
  return `"${arg.replaceAll('%', '^%')}"`;
}

/** Seconds with at most two decimals, truncated: 1000 → "1", 1500 → "1.5". */
export function formatInterval(intervalMs: number): string {
  return String(Math.floor(intervalMs / 10) / 100);
}

/**
 * The continuous ping invocation for a platform identifier as reported by
 * `process.platform`. Unix variants force the C locale so output stays parseable.
 */
export function buildPingCommand(platform: string, target: string, intervalMs: number): PingCommand {
  const host = normalizeTarget(target);
  const unixEnv = { LC_ALL: 'C', LANG: 'C' };

  switch (platform) {
    case 'win32': {
      // Windows ping has no usable interval flag; it sends once a second.
      validateWindowsTarget(host);
      return {
        command: 'cmd.exe',
        args: ['/C', `chcp 437 >nul & ping -t ${quoteCmdArg(host)}`],
        env: {},
        verbatim: true,
      };
    }
    case 'darwin':
      return {
        command: isIPv6Literal(host) ? 'ping6' : 'ping',
        args: ['-i', formatInterval(intervalMs), host],
        env: unixEnv,
        verbatim: false,
      };
    default: {
      const args = ['-i', formatInterval(intervalMs), host];
      return {
        command: 'ping',
        args: isIPv6Literal(host) ? ['-6', ...args] : args,
        env: unixEnv,
        verbatim: false,
      };
    }
  }
}

export function describeCommand(command: PingCommand): string {
  return [command.command, ...command.args].join(' ');
}

import { isIP } from 'node:net';

// RFC 1123: alphanumeric labels of up to 63 characters, inner hyphens allowed
const HOSTNAME_RE =
  /^[a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(\.[a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*$/;

const INVALID = 'invalid target format';

/**
 * Check that `target` looks like an IP address or host name. Format only;
 * nothing is resolved. Accepts `[v6]`, zone IDs and a trailing dot.
 */
export function validateTarget(target: string): void {
  if (target === '') {
    throw new Error(INVALID);
  }
  if (isIP(target) !== 0) return;

  if (target.startsWith('[') && target.endsWith(']')) {
    let host = target.slice(1, -1);
    const zone = host.indexOf('%');
    if (zone !== -1) {
      if (zone === host.length - 1) {
        throw new Error(`${INVALID}: "${target}" has empty zone identifier`);
      }
      host = host.slice(0, zone);
    }
    if (isIP(host) !== 0) return;
    throw new Error(`${INVALID}: "${target}" must be a valid IP address or hostname`);
  }

  const zone = target.indexOf('%');
  if (zone !== -1) {
    if (zone === target.length - 1) {
      throw new Error(`${INVALID}: "${target}" has empty zone identifier`);
    }
    if (isIP(target.slice(0, zone)) !== 0) return;
    throw new Error(
      `${INVALID}: "${target}" must be a valid zoned IPv6 address (hostnames cannot contain '%')`,
    );
  }

  const hostname = target.endsWith('.') ? target.slice(0, -1) : target;
  if (!HOSTNAME_RE.test(hostname)) {
    throw new Error(`${INVALID}: "${target}" must be a valid IP address or hostname`);
  }
}

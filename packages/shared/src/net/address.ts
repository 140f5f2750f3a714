export interface ListenAddress {
  /** Undefined binds every interface */
  host?: string;
  port: number;
}

/**
 * Parse a listen address of the form ":9090", "host:9090" or "[::1]:9090".
 * Throws with a message naming `name` when the address or port is invalid.
 */
export function parseListenAddress(addr: string, name = 'listen'): ListenAddress {
  let host: string | undefined;
  let portText: string;

  const bracketed = addr.match(/^\[([^\]]*)\]:(.*)$/);
  if (bracketed) {
    host = bracketed[1];
    portText = bracketed[2] ?? '';
  } else {
    const idx = addr.lastIndexOf(':');
    if (idx === -1) {
      throw new Error(`invalid ${name} address "${addr}": missing port`);
    }
    const hostPart = addr.slice(0, idx);
    if (hostPart.includes(':')) {
      throw new Error(`invalid ${name} address "${addr}": too many colons`);
    }
    host = hostPart || undefined;
    portText = addr.slice(idx + 1);
  }

  if (!/^\d+$/.test(portText)) {
    throw new Error(`invalid ${name} port "${portText}"`);
  }
  const port = Number.parseInt(portText, 10);
  if (port < 1 || port > 65535) {
    throw new Error(`port must be between 1 and 65535 for ${name}: ${port}`);
  }

  return host ? { host, port } : { port };
}

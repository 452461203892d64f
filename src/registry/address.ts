/**
 * A network endpoint. Value type: two addresses are the same endpoint
 * when host and port match.
 */
export interface Address {
  readonly host: string;
  readonly port: number;
}

/**
 * Creates a frozen address value.
 */
export function createAddress(host: string, port: number): Address {
  return Object.freeze({ host, port });
}

/**
 * Canonical string form of an address, used as map key and for display.
 * IPv6 hosts are bracketed: `[::1]:8090`.
 */
export function addressKey(address: Address): string {
  const host = address.host.includes(':') ? `[${address.host}]` : address.host;
  return `${host}:${address.port}`;
}

export function addressEquals(a: Address, b: Address): boolean {
  return a.host === b.host && a.port === b.port;
}

function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 0 && port <= 65535;
}

/**
 * Parses the canonical `host:port` form back into an address.
 *
 * @throws Error if the value has no host or no valid port
 */
export function parseAddress(value: string): Address {
  const trimmed = value.trim();
  let host: string;
  let portText: string;

  if (trimmed.startsWith('[')) {
    const close = trimmed.indexOf(']');
    if (close === -1 || trimmed[close + 1] !== ':') {
      throw new Error(`Invalid address: ${value}`);
    }
    host = trimmed.slice(1, close);
    portText = trimmed.slice(close + 2);
  } else {
    const separator = trimmed.lastIndexOf(':');
    if (separator === -1) {
      throw new Error(`Invalid address: ${value} (expected host:port)`);
    }
    host = trimmed.slice(0, separator);
    portText = trimmed.slice(separator + 1);
    if (host.includes(':')) {
      throw new Error(`Invalid address: ${value} (IPv6 hosts must be bracketed)`);
    }
  }

  const port = Number(portText);
  if (host === '' || portText === '' || !isValidPort(port)) {
    throw new Error(`Invalid address: ${value}`);
  }

  return createAddress(host, port);
}

/**
 * Validates an untyped `{ host, port }` value.
 */
export function toAddress(value: unknown): Address | undefined {
  if (!value || typeof value !== 'object') {
    return undefined;
  }
  const raw = value as Record<string, unknown>;
  if (typeof raw.host !== 'string' || raw.host === '' || typeof raw.port !== 'number' || !isValidPort(raw.port)) {
    return undefined;
  }
  return createAddress(raw.host, raw.port);
}

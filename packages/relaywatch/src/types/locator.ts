/**
 * Locator identifies a host:port endpoint: the listening address or the
 * upstream target.
 */

export interface Locator {
  /** Host address (IP or hostname) */
  readonly host: string;
  /** Port number */
  readonly port: number;
}

/**
 * Parse a locator string (host:port, or [v6-address]:port)
 */
export function parseLocator(locator: string): Locator {
  const match = locator.match(/^\[([^\]]+)\]:(\d+)$/) ?? locator.match(/^([^:]+):(\d+)$/);
  if (!match) {
    throw new Error(`Invalid locator format: ${locator}`);
  }

  return createLocator(match[1], parseInt(match[2], 10));
}

/**
 * Format a Locator to string
 */
export function formatLocator(locator: Locator): string {
  const host = locator.host.includes(':') ? `[${locator.host}]` : locator.host;
  return `${host}:${locator.port}`;
}

/**
 * Create a Locator, validating the port
 */
export function createLocator(host: string, port: number): Locator {
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port number: ${port}`);
  }
  return { host, port };
}

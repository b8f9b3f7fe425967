/**
 * Parsing of node endpoints as reported by the store client.
 *
 * The driver reports hosts as `host:port`, with IPv6 hosts unbracketed
 * (`fd00::5:9042`); nodes and containers are compared by host only.
 *
 * - host: IPv4 address, IPv6 address, or hostname
 * - port: optional TCP port number (1-65535)
 *
 * @module store/endpoint
 */

// =============================================================================
// Error Class
// =============================================================================

/**
 * Error thrown when an endpoint string is malformed.
 */
export class InvalidEndpointError extends Error {
  override readonly name = 'InvalidEndpointError' as const;

  constructor(
    readonly value: string,
    readonly reason: string,
  ) {
    super(`Invalid endpoint '${value}': ${reason}`);
  }
}

// =============================================================================
// Constants
// =============================================================================

const MIN_PORT = 1;

const MAX_PORT = 65535;

const IPV4_PATTERN = /^(?:(?:25[0-5]|2[0-4][0-9]|1[0-9]{2}|[1-9]?[0-9])\.){3}(?:25[0-5]|2[0-4][0-9]|1[0-9]{2}|[1-9]?[0-9])$/;

/**
 * Numbers and dots only. Used to reject invalid IPv4-like strings that
 * would otherwise pass hostname validation.
 */
const LOOKS_LIKE_IPV4_PATTERN = /^[\d.]+$/;

/**
 * Simplified IPv6 check; catches the common formats.
 */
const IPV6_PATTERN = /^([0-9a-fA-F]{0,4}:){2,7}[0-9a-fA-F]{0,4}$/;

/**
 * RFC 1123 hostnames.
 */
const HOSTNAME_PATTERN = /^(?!-)[a-zA-Z0-9-]{1,63}(?<!-)(?:\.(?!-)[a-zA-Z0-9-]{1,63}(?<!-))*$/;

// =============================================================================
// Parsed Components
// =============================================================================

export interface EndpointComponents {
  /** Host without brackets (e.g., '10.0.0.2', '::1', 'cassandra-node1') */
  readonly host: string;

  /** Port, when the endpoint carried one */
  readonly port: number | undefined;
}

// =============================================================================
// Validation
// =============================================================================

function validateHost(value: string, host: string): void {
  if (host.length === 0) {
    throw new InvalidEndpointError(value, 'host cannot be empty');
  }

  if (IPV4_PATTERN.test(host)) {
    return;
  }

  // e.g. '256.0.0.1', '1.2.3'
  if (LOOKS_LIKE_IPV4_PATTERN.test(host)) {
    throw new InvalidEndpointError(value, 'host looks like IPv4 but is not a valid IPv4 address');
  }

  if (IPV6_PATTERN.test(host) || HOSTNAME_PATTERN.test(host)) {
    return;
  }

  throw new InvalidEndpointError(value, 'host must be a valid IPv4 address, IPv6 address, or hostname');
}

function parsePort(value: string, portStr: string): number {
  if (!/^\d+$/.test(portStr)) {
    throw new InvalidEndpointError(value, 'port is not a valid number');
  }
  const port = parseInt(portStr, 10);
  if (port < MIN_PORT || port > MAX_PORT) {
    throw new InvalidEndpointError(value, `port must be between ${MIN_PORT} and ${MAX_PORT}`);
  }
  return port;
}

// =============================================================================
// Endpoint Namespace
// =============================================================================

export const Endpoint = {
  /**
   * Parses an endpoint string.
   *
   * @throws {InvalidEndpointError} If the string is malformed
   *
   * @example
   * ```typescript
   * Endpoint.parse('10.0.0.2:9042'); // { host: '10.0.0.2', port: 9042 }
   * Endpoint.parse('[::1]:9042');    // { host: '::1', port: 9042 }
   * Endpoint.parse('10.0.0.2');      // { host: '10.0.0.2', port: undefined }
   * ```
   */
  parse(value: string): EndpointComponents {
    const trimmed = value.trim();

    if (trimmed.startsWith('[')) {
      const closing = trimmed.indexOf(']');
      if (closing === -1) {
        throw new InvalidEndpointError(value, "missing closing ']'");
      }
      const host = trimmed.slice(1, closing);
      const rest = trimmed.slice(closing + 1);
      validateHost(value, host);
      if (rest === '') {
        return { host, port: undefined };
      }
      if (!rest.startsWith(':')) {
        throw new InvalidEndpointError(value, "expected ':' after ']'");
      }
      return { host, port: parsePort(value, rest.slice(1)) };
    }

    const colonCount = trimmed.split(':').length - 1;
    if (colonCount === 1) {
      const colon = trimmed.indexOf(':');
      const host = trimmed.slice(0, colon);
      validateHost(value, host);
      return { host, port: parsePort(value, trimmed.slice(colon + 1)) };
    }

    // Bare host, including unbracketed IPv6
    validateHost(value, trimmed);
    return { host: trimmed, port: undefined };
  },

  /**
   * Returns the host of an endpoint, or the input unchanged when it does
   * not parse.
   */
  hostOf(value: string): string {
    try {
      return Endpoint.parse(value).host;
    } catch {
      return value;
    }
  },

  /**
   * Returns the host of a `host:port` string that always ends in a port, as
   * the driver's address translator formats it. IPv6 hosts arrive without
   * brackets (`fd00::5:9042`), so the port is cut at the last colon.
   */
  hostOfHostPort(value: string): string {
    const trimmed = value.trim();
    if (trimmed.startsWith('[')) {
      return Endpoint.hostOf(trimmed);
    }
    const colon = trimmed.lastIndexOf(':');
    if (colon <= 0 || !/^\d+$/.test(trimmed.slice(colon + 1))) {
      return trimmed;
    }
    return trimmed.slice(0, colon);
  },

  /**
   * Checks whether two endpoints name the same host, ignoring ports.
   */
  sameHost(a: string, b: string): boolean {
    return Endpoint.hostOf(a) === Endpoint.hostOf(b);
  },
} as const;

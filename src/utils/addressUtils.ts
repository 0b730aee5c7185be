import { ConfigurationError } from './errors';

export type AdminEndpoint =
  | { kind: 'unix'; path: string }
  | { kind: 'tcp'; host: string; port: number };

export interface ListenAddress {
  host?: string;
  port: number;
}

function parsePort(value: string, source: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port < 0 || port > 65535) {
    throw new ConfigurationError(`Invalid port "${value}" in "${source}"`);
  }
  return port;
}

function stripBrackets(host: string): string {
  return host.startsWith('[') && host.endsWith(']') ? host.slice(1, -1) : host;
}

/**
 * Parse an admin socket address: `unix:///path`, `tcp://host:port` or plain `host:port`.
 */
export function parseAdminAddress(address: string): AdminEndpoint {
  const trimmed = address.trim();
  if (!trimmed) {
    throw new ConfigurationError('Admin socket address is empty');
  }

  if (trimmed.startsWith('unix://')) {
    const socketPath = trimmed.slice('unix://'.length);
    if (!socketPath.startsWith('/')) {
      throw new ConfigurationError(`Unix admin socket path must be absolute: "${address}"`);
    }
    return { kind: 'unix', path: socketPath };
  }

  const hostPort = trimmed.startsWith('tcp://') ? trimmed.slice('tcp://'.length) : trimmed;
  if (hostPort.includes('://')) {
    throw new ConfigurationError(`Unsupported admin socket scheme in "${address}"`);
  }

  let url: URL;
  try {
    url = new URL(`tcp://${hostPort}`);
  } catch {
    throw new ConfigurationError(`Malformed admin socket address "${address}"`);
  }

  if (!url.hostname || !url.port || (url.pathname !== '' && url.pathname !== '/')) {
    throw new ConfigurationError(`Admin socket address must be host:port, got "${address}"`);
  }

  return { kind: 'tcp', host: stripBrackets(url.hostname), port: parsePort(url.port, address) };
}

/**
 * Parse a listen address such as `[::]:80`, `0.0.0.0:8080` or `:8080`.
 * An empty host means all interfaces.
 */
export function parseListenAddress(address: string): ListenAddress {
  const separator = address.lastIndexOf(':');
  if (separator === -1) {
    throw new ConfigurationError(`Listen address must be host:port, got "${address}"`);
  }

  const host = stripBrackets(address.slice(0, separator));
  if (host.includes(':') && !address.startsWith('[')) {
    throw new ConfigurationError(`IPv6 listen addresses must be bracketed, got "${address}"`);
  }

  const port = parsePort(address.slice(separator + 1), address);
  return host ? { host, port } : { port };
}

export function describeEndpoint(endpoint: AdminEndpoint): string {
  return endpoint.kind === 'unix'
    ? `unix://${endpoint.path}`
    : `tcp://${endpoint.host.includes(':') ? `[${endpoint.host}]` : endpoint.host}:${endpoint.port}`;
}

import type { Protocol } from './type.ts'

const DEFAULT_PORTS: Record<Protocol, number> = { 'http:': 80, 'https:': 443 }

/**
 * joinHostPort combines host and port into a network address of the
 * form "host:port". If host contains a colon, as found in literal
 * IPv6 addresses, then JoinHostPort returns "[host]:port".
 *
 * @internal
 */
export function joinHostPort(host: string, port?: number): string {
  if (port === undefined) {
    return host
  }

  // We assume that host is a literal IPv6 address if host has
  // colons.
  if (host.includes(':')) {
    return `[${host}]:${port.toString()}`
  }

  return `${host}:${port.toString()}`
}

/**
 * Port the connection is made to: `0` means the protocol default.
 *
 * @internal
 */
export function effectivePort(protocol: Protocol, port: number): number {
  return port || DEFAULT_PORTS[protocol]
}

/**
 * Value of the Host header, the port is left out when it is the default
 * one of the protocol.
 *
 * @internal
 */
export function hostHeader(protocol: Protocol, host: string, port: number): string {
  const resolved = effectivePort(protocol, port)
  if (resolved === DEFAULT_PORTS[protocol]) {
    return host.includes(':') ? `[${host}]` : host
  }
  return joinHostPort(host, resolved)
}

import * as fsp from 'node:fs/promises'

import { InvalidConfigError } from './errors.ts'
import type { ClientOptions } from './internal/client.ts'
import { isBoolean, isNumber, isRecord, isString, isValidEndpoint, isValidPort } from './internal/helper.ts'
import type { ProxyAddress } from './internal/type.ts'

/**
 * Endpoint and credential settings as stored in the JSON configuration
 * document.
 */
export interface S3RestConfig {
  access_key: string
  secret_key: string
  protocol: 'http' | 'https'
  host: string
  port: number
  region?: string
  service?: string
  session_token?: string
  path_style?: boolean
  /**
   * `host:port` the requests are transmitted to
   */
  proxy?: string
}

export type ConfigOverrides = Partial<S3RestConfig>

function requireString(doc: Record<string, unknown>, field: string): string {
  const value = doc[field]
  if (value === undefined) {
    throw new InvalidConfigError(`Missing configuration field : ${field}`, field)
  }
  if (!isString(value) || value === '') {
    throw new InvalidConfigError(`Configuration field ${field} should be a non-empty string`, field)
  }
  return value
}

function optionalString(doc: Record<string, unknown>, field: string): string | undefined {
  const value = doc[field]
  if (value === undefined || value === null) {
    return undefined
  }
  if (!isString(value)) {
    throw new InvalidConfigError(`Configuration field ${field} should be a string`, field)
  }
  return value
}

// ports are numbers in the document, numeric strings are accepted too
function parsePort(value: unknown): number | undefined {
  if (isNumber(value)) {
    return value
  }
  if (isString(value) && /^\d+$/.test(value)) {
    return Number(value)
  }
  return undefined
}

/**
 * Splits `host:port`; IPv6 hosts are written in brackets.
 */
export function parseProxy(value: string): ProxyAddress {
  const match = /^(?:\[([^\]]+)\]|([^:]+)):(\d+)$/.exec(value.trim())
  const host = match?.[1] ?? match?.[2]
  const port = match?.[3] === undefined ? undefined : Number(match[3])
  if (host === undefined || port === undefined || !isValidEndpoint(host) || !isValidPort(port) || port === 0) {
    throw new InvalidConfigError(`Invalid proxy address : ${value}, expected host:port`, 'proxy')
  }
  return { host, port }
}

/**
 * Validates a configuration document. Unknown fields are ignored.
 *
 * @throws InvalidConfigError
 */
export function parseConfig(doc: unknown): S3RestConfig {
  if (!isRecord(doc)) {
    throw new InvalidConfigError('Configuration should be a JSON object')
  }

  const protocol = requireString(doc, 'protocol').toLowerCase()
  if (protocol !== 'http' && protocol !== 'https') {
    throw new InvalidConfigError(`Invalid protocol : ${protocol}, expected http or https`, 'protocol')
  }

  const host = requireString(doc, 'host')
  if (!isValidEndpoint(host)) {
    throw new InvalidConfigError(`Invalid host : ${host}`, 'host')
  }

  if (doc.port === undefined) {
    throw new InvalidConfigError('Missing configuration field : port', 'port')
  }
  const port = parsePort(doc.port)
  if (!isValidPort(port)) {
    throw new InvalidConfigError(`Invalid port : ${String(doc.port)}`, 'port')
  }

  const pathStyle = doc.path_style
  if (pathStyle !== undefined && !isBoolean(pathStyle)) {
    throw new InvalidConfigError('Configuration field path_style should be a boolean', 'path_style')
  }

  const proxy = optionalString(doc, 'proxy')
  if (proxy) {
    parseProxy(proxy)
  }

  return {
    access_key: requireString(doc, 'access_key'),
    secret_key: requireString(doc, 'secret_key'),
    protocol,
    host,
    port,
    region: optionalString(doc, 'region'),
    service: optionalString(doc, 'service'),
    session_token: optionalString(doc, 'session_token'),
    path_style: pathStyle,
    proxy: proxy || undefined,
  }
}

/**
 * Lays overrides over a raw document; undefined overrides leave the field
 * untouched.
 */
export function mergeConfig(doc: unknown, overrides: ConfigOverrides = {}): unknown {
  if (!isRecord(doc)) {
    return doc
  }
  const merged: Record<string, unknown> = { ...doc }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value
    }
  }
  return merged
}

/**
 * Reads, merges and validates a JSON configuration file.
 *
 * @throws InvalidConfigError
 */
export async function loadConfig(path: string, overrides: ConfigOverrides = {}): Promise<S3RestConfig> {
  let text: string
  try {
    text = await fsp.readFile(path, 'utf8')
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e)
    throw new InvalidConfigError(`Cannot read configuration file ${path}: ${reason}`, undefined, { cause: e })
  }
  let doc: unknown
  try {
    doc = JSON.parse(text)
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e)
    throw new InvalidConfigError(`Configuration file ${path} is not valid JSON: ${reason}`, undefined, { cause: e })
  }
  return parseConfig(mergeConfig(doc, overrides))
}

export function configToClientOptions(config: S3RestConfig): ClientOptions {
  return {
    endPoint: config.host,
    port: config.port,
    useSSL: config.protocol === 'https',
    accessKey: config.access_key,
    secretKey: config.secret_key,
    sessionToken: config.session_token,
    region: config.region,
    service: config.service,
    pathStyle: config.path_style,
    proxy: config.proxy ? parseProxy(config.proxy) : undefined,
  }
}

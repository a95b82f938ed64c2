import { InvalidRequestSpecError } from './errors.ts'
import {
  isBoolean,
  isString,
  isValidBucketName,
  isValidEndpoint,
  isValidObjectName,
  isValidPort,
  uriEscape,
} from './internal/helper.ts'
import type {
  Endpoint,
  HttpMethod,
  Payload,
  QueryParam,
  QueryParams,
  RequestHeaders,
  RequestSpec,
} from './internal/type.ts'
import { HTTP_METHODS } from './internal/type.ts'

export interface RequestSpecInput {
  method: HttpMethod | Lowercase<HttpMethod>
  endpoint: Endpoint
  bucketName?: string
  objectName?: string
  query?: QueryParams
  headers?: RequestHeaders
  payload?: Payload
  signPayload?: boolean
  pathStyle?: boolean
}

// headers whose value is owned by the signer
const reservedHeaders = ['host', 'authorization', 'x-amz-date', 'x-amz-content-sha256', 'x-amz-security-token']

// RFC 9110 token
const headerNamePattern = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/

// eslint-disable-next-line no-control-regex
const controlCharPattern = /[\u0000-\u001f\u007f]/

function normalizeMethod(method: unknown): HttpMethod {
  if (!isString(method)) {
    throw new InvalidRequestSpecError(`Invalid method : ${String(method)}`)
  }
  const upper = method.toUpperCase()
  const found = HTTP_METHODS.find((m) => m === upper)
  if (!found) {
    throw new InvalidRequestSpecError(`Invalid method : ${method}, expected one of ${HTTP_METHODS.join(', ')}`)
  }
  return found
}

function normalizeEndpoint(endpoint: Endpoint): Readonly<Endpoint> {
  if (endpoint.protocol !== 'http:' && endpoint.protocol !== 'https:') {
    throw new InvalidRequestSpecError(`Invalid protocol : ${String(endpoint.protocol)}`)
  }
  if (!isValidEndpoint(endpoint.host)) {
    throw new InvalidRequestSpecError(`Invalid endPoint : ${endpoint.host}`)
  }
  if (!isValidPort(endpoint.port)) {
    throw new InvalidRequestSpecError(`Invalid port : ${endpoint.port}`)
  }
  return Object.freeze({ protocol: endpoint.protocol, host: endpoint.host.toLowerCase(), port: endpoint.port })
}

function normalizeObjectName(objectName: string): string {
  if (!isValidObjectName(objectName)) {
    throw new InvalidRequestSpecError(`Invalid object name : ${objectName}`)
  }
  if (controlCharPattern.test(objectName)) {
    throw new InvalidRequestSpecError(`Object name cannot hold control characters : ${JSON.stringify(objectName)}`)
  }
  try {
    uriEscape(objectName)
  } catch {
    throw new InvalidRequestSpecError(`Object name cannot be encoded in a URI path : ${JSON.stringify(objectName)}`)
  }
  return objectName
}

function isQueryList(query: QueryParams): query is ReadonlyArray<QueryParam> {
  return Array.isArray(query)
}

function normalizeQuery(query: QueryParams | undefined): ReadonlyArray<QueryParam> {
  if (!query) {
    return Object.freeze([])
  }
  const entries: ReadonlyArray<QueryParam> = isQueryList(query) ? query : Object.entries(query)
  const seen = new Set<string>()
  const result: QueryParam[] = []
  for (const [key, value] of entries) {
    if (!isString(key) || key.length === 0) {
      throw new InvalidRequestSpecError('Query parameter keys cannot be empty')
    }
    if (!isString(value)) {
      throw new InvalidRequestSpecError(`Query parameter ${key} should be of type "string"`)
    }
    if (seen.has(key)) {
      throw new InvalidRequestSpecError(`Duplicate query parameter : ${key}`)
    }
    try {
      uriEscape(key)
      uriEscape(value)
    } catch {
      throw new InvalidRequestSpecError(`Query parameter ${key} cannot be percent-encoded`)
    }
    seen.add(key)
    result.push(Object.freeze([key, value] as const))
  }
  return Object.freeze(result)
}

function normalizeHeaders(headers: RequestHeaders | undefined): Readonly<Record<string, string>> {
  const result: Record<string, string> = {}
  for (const [name, value] of Object.entries(headers ?? {})) {
    if (value === undefined) {
      continue
    }
    if (!headerNamePattern.test(name)) {
      throw new InvalidRequestSpecError(`Invalid header name : ${JSON.stringify(name)}`)
    }
    const lower = name.toLowerCase()
    if (reservedHeaders.includes(lower)) {
      throw new InvalidRequestSpecError(`Header ${lower} is set by the signer and cannot be supplied`)
    }
    if (lower in result) {
      throw new InvalidRequestSpecError(`Duplicate header : ${lower}`)
    }
    const str = `${value}`
    if (/[\r\n]/.test(str)) {
      throw new InvalidRequestSpecError(`Header ${lower} cannot hold line breaks`)
    }
    result[lower] = str
  }
  return Object.freeze(result)
}

/**
 * Validates request parameters into a frozen RequestSpec.
 *
 * @throws InvalidRequestSpecError
 */
export function createRequestSpec(input: RequestSpecInput): RequestSpec {
  const method = normalizeMethod(input.method)
  const endpoint = normalizeEndpoint(input.endpoint)

  if (input.bucketName !== undefined && !isValidBucketName(input.bucketName)) {
    throw new InvalidRequestSpecError(`Invalid bucket name : ${input.bucketName}`)
  }
  if (input.objectName !== undefined && input.bucketName === undefined) {
    throw new InvalidRequestSpecError('An object name needs a bucket name')
  }
  const objectName = input.objectName === undefined ? undefined : normalizeObjectName(input.objectName)

  const payload = input.payload
  if (payload) {
    if (payload.kind === 'file' && (!isString(payload.path) || payload.path.length === 0)) {
      throw new InvalidRequestSpecError('File payload needs a path')
    }
    if (payload.kind === 'inline' && !isString(payload.data) && !Buffer.isBuffer(payload.data)) {
      throw new InvalidRequestSpecError('Inline payload should be a string or a Buffer')
    }
  }
  if (input.signPayload !== undefined && !isBoolean(input.signPayload)) {
    throw new InvalidRequestSpecError(`Invalid signPayload flag : ${String(input.signPayload)}`)
  }

  return Object.freeze({
    method,
    endpoint,
    bucketName: input.bucketName,
    objectName,
    query: normalizeQuery(input.query),
    headers: normalizeHeaders(input.headers),
    payload: payload ? Object.freeze({ ...payload }) : undefined,
    signPayload: input.signPayload ?? false,
    pathStyle: input.pathStyle ?? true,
  })
}

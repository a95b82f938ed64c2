import { InvalidRequestSpecError } from '../errors.ts'
import { isVirtualHostStyle, uriEscape, uriResourceEscape } from './helper.ts'
import type { CanonicalRequest, HttpMethod, QueryParam, RequestSpec } from './type.ts'
import { HTTP_METHODS } from './type.ts'

// Excerpts from @lsegal - https://github.com/aws/aws-sdk-js/issues/659#issuecomment-120477258
//
//  User-Agent, Content-Type: proxies and browsers rewrite them.
//  Content-Length: the payload hash already pins the length.
//  Authorization: carries the signature itself.
const ignoredHeaders = ['authorization', 'content-length', 'content-type', 'user-agent']

const compare = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0)

/**
 * Encodes every key and value with the strict unreserved set and sorts the
 * pairs by encoded key, then by encoded value. `key=''` stays in as `key=`.
 */
export function getCanonicalQueryString(query: ReadonlyArray<QueryParam>): string {
  return query
    .map(([key, value]) => [uriEscape(key), uriEscape(value)] as const)
    .sort(([ka, va], [kb, vb]) => compare(ka, kb) || compare(va, vb))
    .map(([key, value]) => `${key}=${value}`)
    .join('&')
}

/**
 * Host (without port) and canonical URI a request is addressed to. Buckets
 * go into the path for path-style requests and into the host otherwise.
 */
export function getRequestResource(spec: Pick<RequestSpec, 'endpoint' | 'bucketName' | 'objectName' | 'pathStyle'>) {
  const { endpoint, bucketName, objectName } = spec
  let host = endpoint.host
  let uri = '/'

  const objectPath = objectName ? uriResourceEscape(objectName) : undefined
  if (bucketName && isVirtualHostStyle(endpoint.protocol, bucketName, spec.pathStyle)) {
    //  host = 'bucketName.example.com'
    host = `${bucketName}.${host}`
    if (objectPath) {
      uri = `/${objectPath}`
    }
  } else if (bucketName) {
    uri = objectPath ? `/${bucketName}/${objectPath}` : `/${bucketName}`
  }
  return { host, uri }
}

/**
 * Trims the value and collapses inner runs of whitespace.
 */
export function canonicalHeaderValue(value: string): string {
  return value.trim().replace(/\s+/g, ' ')
}

// Returns signed headers array - lower-cased and alphabetically sorted
export function getSignedHeaders(headers: Record<string, string>): string[] {
  return [...new Set(Object.keys(headers).map((h) => h.toLowerCase()))]
    .filter((header) => !ignoredHeaders.includes(header))
    .sort(compare)
}

// getCanonicalRequest generate a canonical request of style.
//
// canonicalRequest =
//  <HTTPMethod>\n
//  <CanonicalURI>\n
//  <CanonicalQueryString>\n
//  <CanonicalHeaders>\n
//  <SignedHeaders>\n
//  <HashedPayload>
//
export function getCanonicalRequest(
  method: HttpMethod,
  uri: string,
  queryString: string,
  headers: Record<string, string>,
  signedHeaders: string[],
  payloadHash: string,
): CanonicalRequest {
  if (!HTTP_METHODS.includes(method)) {
    throw new InvalidRequestSpecError(`Invalid method : ${method}`, 'canonical')
  }
  if (!uri.startsWith('/')) {
    throw new InvalidRequestSpecError(`Canonical URI should be absolute : ${uri}`, 'canonical')
  }

  const lowered: Record<string, string> = {}
  for (const [name, value] of Object.entries(headers)) {
    lowered[name.toLowerCase()] = value
  }
  const names = signedHeaders.map((h) => h.toLowerCase()).sort(compare)
  const canonicalHeaders = names.map((name) => `${name}:${canonicalHeaderValue(lowered[name] ?? '')}\n`).join('')
  const signedHeaderList = names.join(';')

  const value = [method, uri, queryString, canonicalHeaders, signedHeaderList, payloadHash].join('\n')

  return Object.freeze({
    method,
    uri,
    queryString,
    canonicalHeaders,
    signedHeaders: signedHeaderList,
    payloadHash,
    value,
  })
}

import type * as http from 'node:http'
import type * as stream from 'node:stream'

export type Binary = string | Buffer

// nodejs IncomingHttpHeaders is Record<string, string | string[]>, but it's flattened to this:
export type ResponseHeader = Record<string, string>

export type RequestHeaders = Record<string, string | boolean | number | undefined>

export type HttpMethod = 'GET' | 'PUT' | 'POST' | 'DELETE' | 'HEAD'

export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'PUT', 'POST', 'DELETE', 'HEAD']

export type Protocol = 'http:' | 'https:'

export type Transport = Pick<typeof http, 'request'>

export interface Endpoint {
  protocol: Protocol
  host: string
  /**
   * `0` selects the protocol default.
   */
  port: number
}

/**
 * Network address the request is transmitted to instead of the endpoint.
 * Everything signed keeps referring to the endpoint.
 */
export interface ProxyAddress {
  host: string
  port: number
}

export type QueryParam = readonly [key: string, value: string]

export type QueryParams = Record<string, string> | ReadonlyArray<QueryParam>

export type Payload = { kind: 'inline'; data: Binary } | { kind: 'file'; path: string }

/**
 * Validated, frozen description of one request. Build it with
 * `createRequestSpec`.
 */
export interface RequestSpec {
  readonly method: HttpMethod
  readonly endpoint: Readonly<Endpoint>
  readonly bucketName?: string
  readonly objectName?: string
  readonly query: ReadonlyArray<QueryParam>
  /**
   * lower-cased names
   */
  readonly headers: Readonly<Record<string, string>>
  readonly payload?: Payload
  readonly signPayload: boolean
  readonly pathStyle: boolean
}

/**
 * Payload resolved once into the bytes (or the file) that go on the wire.
 */
export type ResolvedBody =
  | { kind: 'empty'; length: 0 }
  | { kind: 'buffer'; data: Buffer; length: number }
  | { kind: 'file'; path: string; length: number }

export interface ResolvedPayload {
  body: ResolvedBody
  /**
   * hex SHA-256 of the body, or UNSIGNED-PAYLOAD
   */
  sha256sum: string
}

export interface CanonicalRequest {
  readonly method: HttpMethod
  readonly uri: string
  readonly queryString: string
  readonly canonicalHeaders: string
  readonly signedHeaders: string
  readonly payloadHash: string
  readonly value: string
}

export interface SigningKeyChain {
  readonly dateKey: Buffer
  readonly regionKey: Buffer
  readonly serviceKey: Buffer
  readonly signingKey: Buffer
}

export type SignatureLocation = 'header' | 'query'

export interface SignedRequest {
  readonly method: HttpMethod
  readonly endpoint: Readonly<Endpoint>
  /**
   * network host the request is addressed to, with the bucket in front for
   * virtual-host-style requests
   */
  readonly host: string
  /**
   * canonical URI plus the query string exactly as sent
   */
  readonly path: string
  readonly headers: Readonly<Record<string, string>>
  readonly body: ResolvedBody
  readonly canonicalRequest: CanonicalRequest
  readonly stringToSign: string
  readonly signature: string
  readonly signatureLocation: SignatureLocation
  readonly date: Date
}

export interface DispatchOptions {
  transport?: Transport
  agent?: http.Agent
  proxy?: ProxyAddress
  /**
   * socket idle timeout in milliseconds
   */
  timeout?: number
  signal?: AbortSignal
  trace?: stream.Writable
}

export interface BucketItemFromList {
  name: string
  creationDate: Date
}

export interface FilterRule {
  Name: 'prefix' | 'suffix' | string
  Value: string
}

export interface NotificationTargetEntry {
  Id?: string
  Arn: string
  Event: string[]
  Filter: FilterRule[]
}

export interface BucketNotification {
  TopicConfiguration: NotificationTargetEntry[]
  QueueConfiguration: NotificationTargetEntry[]
  CloudFunctionConfiguration: NotificationTargetEntry[]
}

import type * as http from 'node:http'
import type * as stream from 'node:stream'

import { Credentials } from '../Credentials.ts'
import * as errors from '../errors.ts'
import { inlinePayload, PRESIGN_EXPIRY_DAYS_MAX } from '../helpers.ts'
import { NotificationConfig } from '../notification.ts'
import type { RequestSpecInput } from '../request-spec.ts'
import { createRequestSpec } from '../request-spec.ts'
import type { DispatchResult } from './dispatch-result.ts'
import {
  isBoolean,
  isNumber,
  isObject,
  isString,
  isValidBucketName,
  isValidEndpoint,
  isValidObjectName,
  isValidPort,
  sanitizeETag,
} from './helper.ts'
import { dispatch } from './request.ts'
import type { SignRequestOptions } from './sign-request.ts'
import { signRequest } from './sign-request.ts'
import type {
  Binary,
  BucketItemFromList,
  BucketNotification,
  DispatchOptions,
  Endpoint,
  Payload,
  Protocol,
  ProxyAddress,
  RequestSpec,
  SignedRequest,
  Transport,
} from './type.ts'
import { parseBucketNotification, parseListBucket } from './xml-parser.ts'

// version reported in the User-Agent, taken from S3_REST_PACKAGE_VERSION
const Package = { version: process.env.S3_REST_PACKAGE_VERSION || 'development' }

export interface ClientOptions {
  endPoint: string
  accessKey: string
  secretKey: string
  useSSL?: boolean
  port?: number
  sessionToken?: string
  region?: string
  service?: string
  pathStyle?: boolean
  transport?: Transport
  transportAgent?: http.Agent
  /**
   * address every request is transmitted to; signing keeps using endPoint
   */
  proxy?: ProxyAddress
  /**
   * socket idle timeout in milliseconds
   */
  timeout?: number
  /**
   * receives request and response traces with signatures redacted
   */
  trace?: stream.Writable
}

export type RequestOption = Omit<RequestSpecInput, 'endpoint'>

export interface PutObjectResult {
  etag: string
  versionId: string | null
}

function validateProxy(proxy: ProxyAddress) {
  if (!isString(proxy.host) || !isValidEndpoint(proxy.host)) {
    throw new errors.InvalidEndpointError(`Invalid proxy host : ${String(proxy.host)}`)
  }
  if (!isValidPort(proxy.port) || proxy.port === 0) {
    throw new errors.InvalidArgumentError(`Invalid proxy port : ${String(proxy.port)}`)
  }
}

/**
 * Signs and dispatches requests against one S3-compatible endpoint. All
 * settings are fixed at construction; every call is independent of the
 * others.
 */
export class S3RestClient {
  readonly endpoint: Readonly<Endpoint>
  readonly credentials: Credentials
  readonly pathStyle: boolean
  readonly userAgent: string
  private readonly dispatchOptions: Readonly<DispatchOptions>

  constructor(params: ClientOptions) {
    const useSSL = params.useSSL ?? true
    const port = params.port ?? 0

    // Validate input params.
    if (!isString(params.endPoint) || !isValidEndpoint(params.endPoint)) {
      throw new errors.InvalidEndpointError(`Invalid endPoint : ${String(params.endPoint)}`)
    }
    if (!isValidPort(port)) {
      throw new errors.InvalidArgumentError(`Invalid port : ${String(port)}`)
    }
    if (!isBoolean(useSSL)) {
      throw new errors.InvalidArgumentError(
        `Invalid useSSL flag type : ${String(useSSL)}, expected to be of type "boolean"`,
      )
    }
    if (params.pathStyle !== undefined && !isBoolean(params.pathStyle)) {
      throw new errors.InvalidArgumentError(`Invalid pathStyle flag type : ${String(params.pathStyle)}`)
    }
    if (params.region !== undefined && !isString(params.region)) {
      throw new errors.InvalidArgumentError(`Invalid region : ${String(params.region)}`)
    }
    if (params.transport !== undefined && !isObject(params.transport)) {
      throw new errors.InvalidArgumentError(`Invalid transport type, expected to be type "object"`)
    }
    if (params.timeout !== undefined && (!isNumber(params.timeout) || params.timeout <= 0)) {
      throw new errors.InvalidArgumentError(`Invalid timeout : ${String(params.timeout)}`)
    }
    if (params.proxy) {
      validateProxy(params.proxy)
    }

    const protocol: Protocol = useSSL ? 'https:' : 'http:'
    this.endpoint = Object.freeze({
      protocol,
      host: params.endPoint.toLowerCase(),
      port,
    })
    this.credentials = new Credentials({
      accessKey: params.accessKey,
      secretKey: params.secretKey,
      sessionToken: params.sessionToken,
      region: params.region,
      service: params.service,
    })
    this.pathStyle = params.pathStyle ?? true

    // User Agent should always following the below style.
    //
    //       s3-rest (OS; ARCH) LIB/VER
    //
    this.userAgent = `s3-rest (${process.platform}; ${process.arch}) s3-rest/${Package.version}`

    this.dispatchOptions = Object.freeze({
      transport: params.transport,
      agent: params.transportAgent,
      proxy: params.proxy ? Object.freeze({ ...params.proxy }) : undefined,
      timeout: params.timeout,
      trace: params.trace,
    })
    Object.freeze(this)
  }

  /**
   * Validates request parameters against the configured endpoint.
   *
   * @throws InvalidRequestSpecError
   */
  buildRequest(opts: RequestOption): RequestSpec {
    return createRequestSpec({ ...opts, endpoint: this.endpoint, pathStyle: opts.pathStyle ?? this.pathStyle })
  }

  async signRequest(opts: RequestOption, signOpts: Omit<SignRequestOptions, 'userAgent'> = {}): Promise<SignedRequest> {
    const spec = this.buildRequest(opts)
    return signRequest(spec, this.credentials, { ...signOpts, userAgent: this.userAgent })
  }

  /**
   * Generates a query-signed URL. The payload is never part of the
   * signature.
   *
   * @param expires - lifetime in seconds, 7 days at most
   */
  async presignedUrl(
    opts: Omit<RequestOption, 'payload' | 'signPayload'>,
    expires = PRESIGN_EXPIRY_DAYS_MAX,
    requestDate?: Date,
  ): Promise<string> {
    const signed = await this.signRequest(opts, { signatureLocation: 'query', expires, date: requestDate })
    return `${this.endpoint.protocol}//${signed.headers.host}${signed.path}`
  }

  /**
   * Signs one request and dispatches it once. Any status code resolves; the
   * caller inspects the result.
   *
   * @throws InvalidRequestSpecError, SigningError, TransportError, ProtocolError
   */
  async send(opts: RequestOption, dispatchOpts: DispatchOptions & { date?: Date } = {}): Promise<DispatchResult> {
    const { date, ...overrides } = dispatchOpts
    const signed = await this.signRequest(opts, { date })
    return dispatch(signed, { ...this.dispatchOptions, ...overrides })
  }

  /**
   * send() that rejects with the service error when the status code is not
   * one of the expected ones.
   *
   * @internal
   */
  async makeRequestAsync(opts: RequestOption, expectedCodes: number[] = [200]): Promise<DispatchResult> {
    const result = await this.send(opts)
    if (!expectedCodes.includes(result.statusCode)) {
      const err = result.toError()
      err.bucketName = err.bucketName ?? opts.bucketName
      err.key = err.key ?? opts.objectName
      throw err
    }
    return result
  }

  async listBuckets(): Promise<BucketItemFromList[]> {
    const res = await this.makeRequestAsync({ method: 'GET' })
    return parseListBucket(res.text())
  }

  async getObject(bucketName: string, objectName: string): Promise<Buffer> {
    this.checkObject(bucketName, objectName)
    const res = await this.makeRequestAsync({ method: 'GET', bucketName, objectName })
    return res.body
  }

  /**
   * Uploads a string, a Buffer or a file payload in one request.
   */
  async putObject(
    bucketName: string,
    objectName: string,
    data: Binary | Payload,
    metaData: Record<string, string> = {},
    signPayload = false,
  ): Promise<PutObjectResult> {
    this.checkObject(bucketName, objectName)
    const payload = isString(data) || Buffer.isBuffer(data) ? inlinePayload(data) : data
    const res = await this.makeRequestAsync({
      method: 'PUT',
      bucketName,
      objectName,
      headers: metaData,
      payload,
      signPayload,
    })
    return {
      etag: sanitizeETag(res.header('etag')),
      versionId: res.header('x-amz-version-id') ?? null,
    }
  }

  async removeObject(bucketName: string, objectName: string): Promise<void> {
    this.checkObject(bucketName, objectName)
    await this.makeRequestAsync({ method: 'DELETE', bucketName, objectName }, [200, 204])
  }

  async setBucketNotification(bucketName: string, config: NotificationConfig): Promise<void> {
    this.checkBucket(bucketName)
    await this.makeRequestAsync({
      method: 'PUT',
      bucketName,
      query: [['notification', '']],
      payload: inlinePayload(config.toXml()),
    })
  }

  async getBucketNotification(bucketName: string): Promise<BucketNotification> {
    this.checkBucket(bucketName)
    const res = await this.makeRequestAsync({ method: 'GET', bucketName, query: [['notification', '']] })
    return parseBucketNotification(res.text())
  }

  /**
   * Removes every notification target of the bucket by storing an empty
   * configuration.
   */
  async removeAllBucketNotification(bucketName: string): Promise<void> {
    await this.setBucketNotification(bucketName, new NotificationConfig())
  }

  private checkBucket(bucketName: string) {
    if (!isValidBucketName(bucketName)) {
      throw new errors.InvalidArgumentError(`Invalid bucket name : ${bucketName}`)
    }
  }

  private checkObject(bucketName: string, objectName: string) {
    this.checkBucket(bucketName)
    if (!isValidObjectName(objectName)) {
      throw new errors.InvalidArgumentError(`Invalid object name : ${objectName}`)
    }
  }
}

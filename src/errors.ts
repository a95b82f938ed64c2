/*
 * MinIO Javascript Library for Amazon S3 Compatible Cloud Storage, (C) 2016 MinIO, Inc.
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import type { ErrorStage } from './base-error.ts'
import { ExtendableError } from './base-error.ts'

export type { ErrorStage }
export { ExtendableError }

/**
 * InvalidArgumentError is generated when an argument has the wrong shape.
 */
export class InvalidArgumentError extends ExtendableError {
  constructor(message?: string, opt?: ErrorOptions) {
    super('config', message, opt)
  }
}

/**
 * InvalidEndpointError is generated when an invalid end point value is
 * provided which does not follow domain standards.
 */
export class InvalidEndpointError extends ExtendableError {
  constructor(message?: string, opt?: ErrorOptions) {
    super('config', message, opt)
  }
}

/**
 * InvalidConfigError is generated when the configuration document misses a
 * required field or carries a value of the wrong type.
 */
export class InvalidConfigError extends ExtendableError {
  readonly field?: string

  constructor(message?: string, field?: string, opt?: ErrorOptions) {
    super('config', message, opt)
    this.field = field
  }
}

/**
 * InvalidRequestSpecError is generated when method, path, query or headers
 * of a request cannot be normalized.
 */
export class InvalidRequestSpecError extends ExtendableError {
  constructor(message?: string, stage: Extract<ErrorStage, 'request-spec' | 'canonical'> = 'request-spec') {
    super(stage, message)
  }
}

/**
 * SigningError is generated when a request cannot be signed. Signing is
 * deterministic, repeating the attempt yields the same error.
 */
export class SigningError extends ExtendableError {
  constructor(message?: string, opt?: ErrorOptions) {
    super('signing', message, opt)
  }
}

/**
 * AccessKeyRequiredError generated by signature methods when access
 * key is not found.
 */
export class AccessKeyRequiredError extends SigningError {}

/**
 * SecretKeyRequiredError generated by signature methods when secret
 * key is not found.
 */
export class SecretKeyRequiredError extends SigningError {}

/**
 * ExpiresParamError generated when expires parameter value is not
 * well within stipulated limits.
 */
export class ExpiresParamError extends SigningError {}

/**
 * TransportError is generated when the request never produced a response:
 * connection refused or reset, timeout, abort, TLS failure.
 */
export class TransportError extends ExtendableError {
  readonly code?: string

  constructor(message: string, code?: string, opt?: ErrorOptions) {
    super('dispatch', message, opt)
    this.code = code
  }
}

/**
 * ProtocolError is generated when the server answered with something that is
 * not a complete HTTP response. Whatever body arrived is kept in partialBody.
 */
export class ProtocolError extends ExtendableError {
  readonly code?: string
  readonly partialBody: Buffer

  constructor(message: string, partialBody: Buffer = Buffer.alloc(0), code?: string, opt?: ErrorOptions) {
    super('dispatch', message, opt)
    this.partialBody = partialBody
    this.code = code
  }
}

/**
 * QueryError is generated for a syntactically invalid XML path expression.
 */
export class QueryError extends ExtendableError {
  readonly expression: string
  readonly position: number

  constructor(message: string, expression: string, position: number) {
    super('inspect', `${message} at position ${position} in "${expression}"`)
    this.expression = expression
    this.position = position
  }
}

/**
 * InvalidXMLError is generated when an unknown XML is found.
 */
export class InvalidXMLError extends ExtendableError {
  constructor(message?: string, opt?: ErrorOptions) {
    super('inspect', message, opt)
  }
}

/**
 * S3Error is generated for errors returned from S3 server.
 * see parseResponseError for details
 */
export class S3Error extends ExtendableError {
  code = ''
  statusCode = 0
  resource?: string
  requestId?: string
  hostId?: string
  bucketName?: string
  key?: string
  amzRequestid?: string
  amzId2?: string
  amzBucketRegion?: string

  constructor(message?: string, opt?: ErrorOptions) {
    super('service', message, opt)
  }
}

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

import * as crypto from 'node:crypto'

import type { Credentials } from './Credentials.ts'
import { ExpiresParamError, SigningError } from './errors.ts'
import { PRESIGN_EXPIRY_DAYS_MAX, UNSIGNED_PAYLOAD } from './helpers.ts'
import { getCanonicalQueryString, getCanonicalRequest, getSignedHeaders } from './internal/canonical-request.ts'
import { getScope, hmacSha256, isNumber, isValidDate, makeDateLong, makeDateShort, toSha256 } from './internal/helper.ts'
import type { CanonicalRequest, HttpMethod, QueryParam, SigningKeyChain } from './internal/type.ts'

export const signV4Algorithm = 'AWS4-HMAC-SHA256'

export interface SignableRequest {
  method: HttpMethod
  uri: string
  headers: Record<string, string>
}

export interface SigningResult {
  canonicalRequest: CanonicalRequest
  stringToSign: string
  signature: string
}

function assertDate(date: Date) {
  if (!isValidDate(date)) {
    throw new SigningError(`Invalid signing date : ${String(date)}`)
  }
}

// generate a credential string
export function getCredential(accessKey: string, region: string, requestDate: Date, serviceName = 's3') {
  return `${accessKey}/${getScope(region, requestDate, serviceName)}`
}

/**
 * Derives the scoped signing key. Each stage only depends on the previous
 * one and a single scope component, so a verifier holding the same secret
 * and date rebuilds the same bytes.
 */
export function deriveSigningKey(secretKey: string, date: Date, region: string, serviceName = 's3'): SigningKeyChain {
  assertDate(date)
  const dateKey = hmacSha256('AWS4' + secretKey, makeDateShort(date))
  const regionKey = hmacSha256(dateKey, region)
  const serviceKey = hmacSha256(regionKey, serviceName)
  const signingKey = hmacSha256(serviceKey, 'aws4_request')
  return Object.freeze({ dateKey, regionKey, serviceKey, signingKey })
}

// returns the string that needs to be signed
export function getStringToSign(
  canonicalRequest: CanonicalRequest,
  requestDate: Date,
  region: string,
  serviceName = 's3',
): string {
  const hash = toSha256(canonicalRequest.value)
  const scope = getScope(region, requestDate, serviceName)
  return [signV4Algorithm, makeDateLong(requestDate), scope, hash].join('\n')
}

export function computeSignature(signingKey: Buffer, stringToSign: string): string {
  return crypto.createHmac('sha256', signingKey).update(stringToSign).digest('hex').toLowerCase()
}

function signedHeadersFor(headers: Record<string, string>): string[] {
  const signedHeaders = getSignedHeaders(headers)
  if (!signedHeaders.includes('host')) {
    throw new SigningError('host header is required in the signed headers')
  }
  return signedHeaders
}

function sign(canonicalRequest: CanonicalRequest, credentials: Credentials, requestDate: Date): SigningResult {
  const stringToSign = getStringToSign(canonicalRequest, requestDate, credentials.region, credentials.service)
  const { signingKey } = deriveSigningKey(
    credentials.getSecretKey(),
    requestDate,
    credentials.region,
    credentials.service,
  )
  return { canonicalRequest, stringToSign, signature: computeSignature(signingKey, stringToSign) }
}

/**
 * Signs a request whose signing headers (x-amz-date, x-amz-content-sha256)
 * are already in place and returns the Authorization header value.
 */
export function signV4(
  request: SignableRequest & { queryString: string },
  credentials: Credentials,
  requestDate: Date,
  sha256sum: string,
): SigningResult & { authorization: string } {
  credentials.assertComplete()
  assertDate(requestDate)

  const signedHeaders = signedHeadersFor(request.headers)
  const canonicalRequest = getCanonicalRequest(
    request.method,
    request.uri,
    request.queryString,
    request.headers,
    signedHeaders,
    sha256sum,
  )
  const result = sign(canonicalRequest, credentials, requestDate)
  const credential = getCredential(credentials.accessKey, credentials.region, requestDate, credentials.service)

  return {
    ...result,
    authorization: `${signV4Algorithm} Credential=${credential}, SignedHeaders=${canonicalRequest.signedHeaders}, Signature=${result.signature}`,
  }
}

// lower-cased query parameters presignSignatureV4 adds itself
const presignParams = [
  'x-amz-algorithm',
  'x-amz-credential',
  'x-amz-date',
  'x-amz-expires',
  'x-amz-signedheaders',
  'x-amz-security-token',
  'x-amz-signature',
]

/**
 * Signs a request in query-string form. The returned query string already
 * ends in X-Amz-Signature.
 */
export function presignSignatureV4(
  request: SignableRequest & { query: ReadonlyArray<QueryParam> },
  credentials: Credentials,
  requestDate: Date,
  expires: number,
): SigningResult & { queryString: string } {
  credentials.assertComplete()
  assertDate(requestDate)

  if (!isNumber(expires) || !Number.isInteger(expires)) {
    throw new ExpiresParamError('expires should be an integer number of seconds')
  }
  if (expires < 1) {
    throw new ExpiresParamError('expires param cannot be less than 1 seconds')
  }
  if (expires > PRESIGN_EXPIRY_DAYS_MAX) {
    throw new ExpiresParamError('expires param cannot be greater than 7 days')
  }

  const reserved = request.query.find(([key]) => presignParams.includes(key.toLowerCase()))
  if (reserved) {
    throw new SigningError(`query parameter ${reserved[0]} is set by the signer`)
  }

  const signedHeaders = signedHeadersFor(request.headers)
  const credential = getCredential(credentials.accessKey, credentials.region, requestDate, credentials.service)

  const query: QueryParam[] = [
    ...request.query,
    ['X-Amz-Algorithm', signV4Algorithm],
    ['X-Amz-Credential', credential],
    ['X-Amz-Date', makeDateLong(requestDate)],
    ['X-Amz-Expires', expires.toString()],
    ['X-Amz-SignedHeaders', signedHeaders.join(';')],
  ]
  if (credentials.sessionToken) {
    query.push(['X-Amz-Security-Token', credentials.sessionToken])
  }

  const canonicalQuery = getCanonicalQueryString(query)
  const canonicalRequest = getCanonicalRequest(
    request.method,
    request.uri,
    canonicalQuery,
    request.headers,
    signedHeaders,
    UNSIGNED_PAYLOAD,
  )
  const result = sign(canonicalRequest, credentials, requestDate)
  return { ...result, queryString: `${canonicalQuery}&X-Amz-Signature=${result.signature}` }
}

/**
 * Recomputes the signature of a canonical request from scratch and compares
 * it with the one given.
 */
export function verifySignature(
  canonicalRequest: CanonicalRequest,
  credentials: Credentials,
  requestDate: Date,
  signature: string,
): boolean {
  credentials.assertComplete()
  const expected = Buffer.from(sign(canonicalRequest, credentials, requestDate).signature, 'utf8')
  const actual = Buffer.from(signature.toLowerCase(), 'utf8')
  return expected.length === actual.length && crypto.timingSafeEqual(expected, actual)
}

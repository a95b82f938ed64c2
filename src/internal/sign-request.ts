import type { Credentials } from '../Credentials.ts'
import { SigningError } from '../errors.ts'
import { presignSignatureV4, signV4 } from '../signing.ts'
import { getCanonicalQueryString, getRequestResource } from './canonical-request.ts'
import { isValidDate, makeDateLong, probeContentType } from './helper.ts'
import { hostHeader } from './join-host-port.ts'
import { resolvePayload } from './payload.ts'
import type { RequestSpec, SignatureLocation, SignedRequest } from './type.ts'

export interface SignRequestOptions {
  /**
   * signing time, defaults to now
   */
  date?: Date
  userAgent?: string
  signatureLocation?: SignatureLocation
  /**
   * lifetime in seconds of a query-signed request
   */
  expires?: number
}

const DEFAULT_EXPIRES = 24 * 60 * 60 * 7

/**
 * Turns a request spec into the exact request that goes on the wire. The
 * signer owns host, x-amz-date, x-amz-content-sha256, x-amz-security-token
 * and authorization; content-length follows the resolved body.
 */
export async function signRequest(
  spec: RequestSpec,
  credentials: Credentials,
  options: SignRequestOptions = {},
): Promise<SignedRequest> {
  const date = options.date ?? new Date()
  if (!isValidDate(date)) {
    throw new SigningError(`Invalid signing date : ${String(date)}`)
  }
  const signatureLocation = options.signatureLocation ?? 'header'
  credentials.assertComplete()

  // query-signed requests always carry UNSIGNED-PAYLOAD
  const { body, sha256sum } = await resolvePayload(spec.payload, signatureLocation === 'header' && spec.signPayload)
  const { host, uri } = getRequestResource(spec)

  const headers: Record<string, string> = {
    host: hostHeader(spec.endpoint.protocol, host, spec.endpoint.port),
  }
  if (options.userAgent) {
    headers['user-agent'] = options.userAgent
  }
  Object.assign(headers, spec.headers)
  if (body.length > 0 || spec.method === 'PUT' || spec.method === 'POST' || spec.method === 'DELETE') {
    headers['content-length'] = body.length.toString()
  }
  if (body.kind === 'file' && !headers['content-type']) {
    headers['content-type'] = probeContentType(body.path)
  }

  if (signatureLocation === 'query') {
    const presigned = presignSignatureV4(
      { method: spec.method, uri, headers, query: spec.query },
      credentials,
      date,
      options.expires ?? DEFAULT_EXPIRES,
    )
    return Object.freeze({
      method: spec.method,
      endpoint: spec.endpoint,
      host,
      path: `${uri}?${presigned.queryString}`,
      headers: Object.freeze(headers),
      body,
      canonicalRequest: presigned.canonicalRequest,
      stringToSign: presigned.stringToSign,
      signature: presigned.signature,
      signatureLocation,
      date,
    })
  }

  headers['x-amz-date'] = makeDateLong(date)
  headers['x-amz-content-sha256'] = sha256sum
  if (credentials.sessionToken) {
    headers['x-amz-security-token'] = credentials.sessionToken
  }
  const queryString = getCanonicalQueryString(spec.query)
  const signed = signV4({ method: spec.method, uri, headers, queryString }, credentials, date, sha256sum)
  headers.authorization = signed.authorization

  return Object.freeze({
    method: spec.method,
    endpoint: spec.endpoint,
    host,
    path: queryString ? `${uri}?${queryString}` : uri,
    headers: Object.freeze(headers),
    body,
    canonicalRequest: signed.canonicalRequest,
    stringToSign: signed.stringToSign,
    signature: signed.signature,
    signatureLocation,
    date,
  })
}

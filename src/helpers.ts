import type { Binary, Payload } from './internal/type.ts'

export const DEFAULT_REGION = 'us-east-1'

export const DEFAULT_SERVICE = 's3'

/**
 * Default XML namespace of S3 response documents.
 */
export const S3_NAMESPACE = 'http://s3.amazonaws.com/doc/2006-03-01/'

export const PRESIGN_EXPIRY_DAYS_MAX = 24 * 60 * 60 * 7 // 7 days in seconds

export const UNSIGNED_PAYLOAD = 'UNSIGNED-PAYLOAD'

export function inlinePayload(data: Binary): Payload {
  return { kind: 'inline', data }
}

export function filePayload(path: string): Payload {
  return { kind: 'file', path }
}

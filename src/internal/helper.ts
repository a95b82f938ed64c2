/*
 * MinIO Javascript Library for Amazon S3 Compatible Cloud Storage, (C) 2015 MinIO, Inc.
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

import ipaddr from 'ipaddr.js'
import _ from 'lodash'
import * as mime from 'mime-types'

import type { ResponseHeader } from './type.ts'

export function toSha256(payload: string | Buffer): string {
  return crypto.createHash('sha256').update(payload).digest('hex')
}

export function hmacSha256(key: string | Buffer, data: string): Buffer {
  return crypto.createHmac('sha256', key).update(data).digest()
}

// S3 percent-encodes some extra non-standard characters in a URI . So comply with S3.
const encodeAsHex = (c: string) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`

/**
 * Percent-encodes everything but the unreserved set `A-Z a-z 0-9 - . _ ~`.
 *
 * @throws URIError for strings holding lone surrogates
 */
export function uriEscape(uriStr: string): string {
  return encodeURIComponent(uriStr).replace(/[!'()*]/g, encodeAsHex)
}

export function uriResourceEscape(string: string) {
  return uriEscape(string).replace(/%2F/g, '/')
}

export function getScope(region: string, date: Date, serviceName = 's3') {
  return `${makeDateShort(date)}/${region}/${serviceName}/aws4_request`
}

/**
 * isVirtualHostStyle - bucketNames with periods should be always treated
 * as path style if the protocol is 'https:', this is due to SSL wildcard
 * limitation.
 */
export function isVirtualHostStyle(protocol: string, bucket: string, pathStyle: boolean) {
  if (protocol === 'https:' && bucket.includes('.')) {
    return false
  }
  return !pathStyle
}

export function isValidIP(ip: string) {
  return ipaddr.isValid(ip)
}

/**
 * @returns if endpoint is valid domain.
 */
export function isValidEndpoint(endpoint: string) {
  return isValidDomain(endpoint) || isValidIP(endpoint)
}

/**
 * @returns if input host is a valid domain.
 */
export function isValidDomain(host: string) {
  if (!isString(host)) {
    return false
  }
  // See RFC 1035, RFC 3696.
  if (host.length === 0 || host.length > 255) {
    return false
  }
  // Host cannot start or end with a '-'
  if (host[0] === '-' || host.slice(-1) === '-') {
    return false
  }
  // Host cannot start or end with a '_'
  if (host[0] === '_' || host.slice(-1) === '_') {
    return false
  }
  // Host cannot start with a '.'
  if (host[0] === '.') {
    return false
  }

  const nonAlphaNumerics = '`~!@#$%^&*()+={}[]|\\"\';:><?/ '
  for (const char of nonAlphaNumerics) {
    if (host.includes(char)) {
      return false
    }
  }
  return true
}

/**
 * Probes contentType using file extensions.
 *
 * @example
 * ```
 * // return 'image/png'
 * probeContentType('file.png')
 * ```
 */
export function probeContentType(path: string) {
  const contentType = mime.lookup(path)
  return contentType || 'application/octet-stream'
}

/**
 * is input port valid.
 */
export function isValidPort(port: unknown): port is number {
  if (!isNumber(port) || !Number.isInteger(port)) {
    return false
  }

  // port `0` is valid and special case
  return 0 <= port && port <= 65535
}

export function isValidBucketName(bucket: unknown): bucket is string {
  if (!isString(bucket)) {
    return false
  }

  // bucket length should be less than and no more than 63
  // characters long.
  if (bucket.length < 3 || bucket.length > 63) {
    return false
  }
  // bucket with successive periods is invalid.
  if (bucket.includes('..')) {
    return false
  }
  // bucket cannot have ip address style.
  if (/[0-9]+\.[0-9]+\.[0-9]+\.[0-9]+/.test(bucket)) {
    return false
  }
  // bucket should begin with alphabet/number and end with alphabet/number,
  // with alphabet/number/.- in the middle.
  return /^[a-z0-9][a-z0-9.-]+[a-z0-9]$/.test(bucket)
}

/**
 * check if objectName is a valid object name
 */
export function isValidObjectName(objectName: unknown): objectName is string {
  if (!isString(objectName)) {
    return false
  }
  return objectName.length !== 0 && objectName.length <= 1024
}

/**
 * check if typeof arg number
 */
export function isNumber(arg: unknown): arg is number {
  return typeof arg === 'number'
}

/**
 * check if typeof arg string
 */
export function isString(arg: unknown): arg is string {
  return typeof arg === 'string'
}

/**
 * check if typeof arg object
 */
export function isObject(arg: unknown): arg is object {
  return typeof arg === 'object' && arg !== null
}

/**
 * check if arg is a plain key/value record
 */
export function isRecord(arg: unknown): arg is Record<string, unknown> {
  return _.isPlainObject(arg)
}

/**
 * check if arg is boolean
 */
export function isBoolean(arg: unknown): arg is boolean {
  return typeof arg === 'boolean'
}

/**
 * check if arg is a valid date
 */
export function isValidDate(arg: unknown): arg is Date {
  return arg instanceof Date && !isNaN(arg.getTime())
}

/**
 * Create a Date string with format: 'YYYYMMDDTHHmmss' + Z
 */
export function makeDateLong(date?: Date): string {
  date = date || new Date()

  // Gives format like: '2017-08-07T16:28:59.889Z'
  const s = date.toISOString()

  return s.slice(0, 4) + s.slice(5, 7) + s.slice(8, 13) + s.slice(14, 16) + s.slice(17, 19) + 'Z'
}

/**
 * Create a Date string with format: 'YYYYMMDD'
 */
export function makeDateShort(date?: Date) {
  date = date || new Date()

  // Gives format like: '2017-08-07T16:28:59.889Z'
  const s = date.toISOString()

  return s.slice(0, 4) + s.slice(5, 7) + s.slice(8, 10)
}

/**
 * Lower-cases header names and joins repeated values with ', '.
 */
export function flattenHeaders(headers: Record<string, string | string[] | number | undefined>): ResponseHeader {
  return _.transform(
    headers,
    (acc: ResponseHeader, value, key) => {
      if (value === undefined) {
        return
      }
      acc[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : `${value}`
    },
    {},
  )
}

export function sanitizeETag(etag = ''): string {
  const replaceChars: Record<string, string> = {
    '"': '',
    '&quot;': '',
    '&#34;': '',
  }
  return etag.replace(/^("|&quot;|&#34;)|("|&quot;|&#34;)$/g, (m) => replaceChars[m] ?? '')
}

/**
 * toArray returns a single element array with param being the element,
 * if param is just a string, and returns 'param' back if it is an array
 * So, it makes sure param is always an array
 */
export function toArray<T = unknown>(param: T | T[] | undefined): Array<T> {
  if (param === undefined) {
    return []
  }
  if (!Array.isArray(param)) {
    return [param]
  }
  return param
}

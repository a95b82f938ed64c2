import type * as stream from 'node:stream'

import { isString } from './helper.ts'

export interface TracedRequest {
  method: string
  path: string
  headers: Readonly<Record<string, string>>
}

export interface TracedResponse {
  statusCode: number
  headers: Readonly<Record<string, string>>
}

const redactedHeaders = ['x-amz-security-token']

function redact(key: string, value: string): string {
  if (key === 'authorization') {
    return value.replace(/Signature=([0-9a-f]+)/, 'Signature=**REDACTED**')
  }
  if (redactedHeaders.includes(key)) {
    return '**REDACTED**'
  }
  return value
}

/**
 * log the request, response, error
 */
export function logHTTP(
  logStream: stream.Writable,
  request: TracedRequest,
  response: TracedResponse | null,
  err?: unknown,
): void {
  const logHeaders = (headers: Readonly<Record<string, string>>) => {
    Object.entries(headers).forEach(([k, v]) => {
      logStream.write(`${k}: ${redact(k.toLowerCase(), v)}\n`)
    })
    logStream.write('\n')
  }
  const path = request.path
    .replace(/X-Amz-Signature=[0-9a-f]+/, 'X-Amz-Signature=**REDACTED**')
    .replace(/X-Amz-Security-Token=[^&]+/, 'X-Amz-Security-Token=**REDACTED**')
  logStream.write(`REQUEST: ${request.method} ${path}\n`)
  logHeaders(request.headers)
  if (response) {
    logStream.write(`RESPONSE: ${response.statusCode}\n`)
    logHeaders(response.headers)
  }
  if (err) {
    logStream.write('ERROR BODY:\n')
    const message = err instanceof Error ? `${err.name}: ${err.message}` : isString(err) ? err : JSON.stringify(err)
    logStream.write(`${message}\n`)
  }
}

import type * as http from 'node:http'

import { ProtocolError } from '../errors.ts'

/**
 * Reads the whole response body. A connection that breaks before the body
 * is complete rejects with a ProtocolError holding the bytes read so far.
 */
export async function readAsBuffer(res: http.IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const body: Buffer[] = []
    res
      .on('data', (chunk: Buffer) => body.push(chunk))
      .on('error', (e: NodeJS.ErrnoException) =>
        reject(new ProtocolError(`response body interrupted: ${e.message}`, Buffer.concat(body), e.code, { cause: e })),
      )
      .on('end', () => resolve(Buffer.concat(body)))
      .on('close', () => {
        if (!res.complete) {
          reject(new ProtocolError('connection closed before the response body completed', Buffer.concat(body)))
        }
      })
  })
}

import * as crypto from 'node:crypto'
import * as fs from 'node:fs'
import * as fsp from 'node:fs/promises'
import type * as stream from 'node:stream'

import { InvalidRequestSpecError } from '../errors.ts'
import { UNSIGNED_PAYLOAD } from '../helpers.ts'
import { toSha256 } from './helper.ts'
import type { Payload, ResolvedBody, ResolvedPayload } from './type.ts'

/**
 * Hashes a file through a handle that is opened, read to the end and closed
 * before this resolves.
 */
async function hashFile(handle: fsp.FileHandle): Promise<{ sha256sum: string; length: number }> {
  const hash = crypto.createHash('sha256')
  let length = 0
  for await (const chunk of handle.createReadStream({ autoClose: false, start: 0 })) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(`${chunk}`)
    hash.update(buf)
    length += buf.length
  }
  return { sha256sum: hash.digest('hex'), length }
}

/**
 * Resolves a payload into the body that will be sent and the hash the
 * canonical request carries. File handles do not outlive this call.
 */
export async function resolvePayload(payload: Payload | undefined, signPayload: boolean): Promise<ResolvedPayload> {
  if (!payload) {
    return { body: { kind: 'empty', length: 0 }, sha256sum: signPayload ? toSha256('') : UNSIGNED_PAYLOAD }
  }

  if (payload.kind === 'inline') {
    const data = Buffer.isBuffer(payload.data) ? payload.data : Buffer.from(payload.data, 'utf8')
    const body: ResolvedBody = data.length ? { kind: 'buffer', data, length: data.length } : { kind: 'empty', length: 0 }
    return { body, sha256sum: signPayload ? toSha256(data) : UNSIGNED_PAYLOAD }
  }

  let handle: fsp.FileHandle
  try {
    handle = await fsp.open(payload.path, 'r')
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e)
    throw new InvalidRequestSpecError(`Cannot read payload file ${payload.path}: ${reason}`, 'canonical')
  }
  try {
    const stat = await handle.stat()
    if (!stat.isFile()) {
      throw new InvalidRequestSpecError(`Payload path is not a regular file : ${payload.path}`, 'canonical')
    }
    if (!signPayload) {
      return { body: { kind: 'file', path: payload.path, length: stat.size }, sha256sum: UNSIGNED_PAYLOAD }
    }
    const { sha256sum, length } = await hashFile(handle)
    return { body: { kind: 'file', path: payload.path, length }, sha256sum }
  } finally {
    await handle.close()
  }
}

/**
 * Readable for the request body, a fresh stream for file bodies.
 */
export function openBody(body: ResolvedBody): Buffer | stream.Readable | null {
  switch (body.kind) {
    case 'empty':
      return null
    case 'buffer':
      return body.data
    case 'file':
      return fs.createReadStream(body.path)
  }
}

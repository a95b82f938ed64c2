import * as fsp from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'

import { afterAll, beforeAll, describe, expect, it } from 'vitest'

import { InvalidRequestSpecError } from '../../src/errors.ts'
import { filePayload, inlinePayload, UNSIGNED_PAYLOAD } from '../../src/helpers.ts'
import { openBody, resolvePayload } from '../../src/internal/payload.ts'

const HELLO_SHA = 'b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9'
const EMPTY_SHA = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'

let dir: string
let helloFile: string

beforeAll(async () => {
  dir = await fsp.mkdtemp(path.join(os.tmpdir(), 's3-rest-payload-'))
  helloFile = path.join(dir, 'hello.txt')
  await fsp.writeFile(helloFile, 'hello world')
})

afterAll(async () => {
  await fsp.rm(dir, { recursive: true, force: true })
})

describe('resolvePayload', () => {
  it('hashes the empty string for an absent payload when signing', async () => {
    expect(await resolvePayload(undefined, true)).toEqual({ body: { kind: 'empty', length: 0 }, sha256sum: EMPTY_SHA })
  })

  it('leaves an absent payload unsigned otherwise', async () => {
    expect((await resolvePayload(undefined, false)).sha256sum).toBe(UNSIGNED_PAYLOAD)
  })

  it('hashes inline text as UTF-8', async () => {
    const resolved = await resolvePayload(inlinePayload('hello world'), true)
    expect(resolved.sha256sum).toBe(HELLO_SHA)
    expect(resolved.body).toEqual({ kind: 'buffer', data: Buffer.from('hello world'), length: 11 })
  })

  it('treats an empty inline payload as an empty body', async () => {
    expect((await resolvePayload(inlinePayload(Buffer.alloc(0)), true)).body).toEqual({ kind: 'empty', length: 0 })
  })

  it('hashes a file through a scoped read', async () => {
    const resolved = await resolvePayload(filePayload(helloFile), true)
    expect(resolved).toEqual({ body: { kind: 'file', path: helloFile, length: 11 }, sha256sum: HELLO_SHA })
  })

  it('takes the length of an unsigned file from its size', async () => {
    const resolved = await resolvePayload(filePayload(helloFile), false)
    expect(resolved).toEqual({ body: { kind: 'file', path: helloFile, length: 11 }, sha256sum: UNSIGNED_PAYLOAD })
  })

  it('rejects a missing file at the canonical stage', async () => {
    await expect(resolvePayload(filePayload(path.join(dir, 'missing.bin')), true)).rejects.toMatchObject({
      name: 'InvalidRequestSpecError',
      stage: 'canonical',
    })
  })

  it('rejects a directory', async () => {
    await expect(resolvePayload(filePayload(dir), true)).rejects.toThrow(InvalidRequestSpecError)
  })
})

describe('openBody', () => {
  it('returns null for an empty body and the bytes for a buffer', () => {
    expect(openBody({ kind: 'empty', length: 0 })).toBeNull()
    expect(openBody({ kind: 'buffer', data: Buffer.from('x'), length: 1 })).toEqual(Buffer.from('x'))
  })

  it('streams a file', async () => {
    const body = openBody({ kind: 'file', path: helloFile, length: 11 })
    if (body === null || Buffer.isBuffer(body)) {
      throw new Error('expected a stream')
    }
    const chunks: Buffer[] = []
    for await (const chunk of body) {
      chunks.push(Buffer.from(chunk))
    }
    expect(Buffer.concat(chunks).toString()).toBe('hello world')
  })
})

import { describe, expect, it } from 'vitest'

import { QueryError, S3Error } from '../../src/errors.ts'
import { DispatchResult } from '../../src/internal/dispatch-result.ts'

function result(statusCode: number, headers: Record<string, string>, body = '') {
  return new DispatchResult({ statusCode, headers, body: Buffer.from(body, 'utf8') })
}

const errorBody = `<?xml version="1.0" encoding="UTF-8"?>
<Error><Code>NoSuchKey</Code><Message>The specified key does not exist.</Message><Key>missing.txt</Key><BucketName>uv-bucket-3</BucketName><Resource>/uv-bucket-3/missing.txt</Resource><RequestId>req-1</RequestId><HostId>host-1</HostId></Error>`

describe('DispatchResult', () => {
  it('picks only the headers present, keyed as asked', () => {
    const res = result(200, { etag: '"abc"', 'content-length': '0' })
    expect(res.pickHeaders(['ETag', 'x-amz-request-id'])).toEqual({ ETag: '"abc"' })
  })

  it('keeps the requested order', () => {
    const res = result(200, { etag: '"abc"', 'content-type': 'text/plain', server: 'test' })
    expect(Object.keys(res.pickHeaders(['Server', 'ETag', 'Content-Type']))).toEqual(['Server', 'ETag', 'Content-Type'])
  })

  it('looks headers up without regard to case', () => {
    expect(result(200, { 'x-amz-request-id': 'req-9' }).header('X-Amz-Request-Id')).toBe('req-9')
  })

  it('freezes its headers', () => {
    expect(Object.isFrozen(result(200, {}).headers)).toBe(true)
  })

  it('reports 2xx as ok', () => {
    expect(result(204, {}).ok).toBe(true)
    expect(result(301, {}).ok).toBe(false)
  })

  it('parses the body once', () => {
    const res = result(200, {}, '<Root><Item>1</Item></Root>')
    expect(res.xml()).toBe(res.xml())
    expect(res.query('Item', {})).toEqual(['1'])
  })

  it('queries a non-XML body as empty', () => {
    expect(result(200, {}, 'plain text').query('.//aws:Name')).toEqual([])
  })

  it('rejects a bad expression even when the body is not XML', () => {
    expect(() => result(200, {}, 'plain text').query('')).toThrow(QueryError)
  })

  it('builds an S3Error from the XML error body', () => {
    const err = result(404, { 'x-amz-request-id': 'req-1', 'x-amz-id-2': 'id-2' }, errorBody).toError()
    expect(err).toBeInstanceOf(S3Error)
    expect(err).toMatchObject({
      name: 'S3Error',
      stage: 'service',
      code: 'NoSuchKey',
      message: 'The specified key does not exist.',
      key: 'missing.txt',
      bucketName: 'uv-bucket-3',
      resource: '/uv-bucket-3/missing.txt',
      requestId: 'req-1',
      hostId: 'host-1',
      statusCode: 404,
      amzRequestid: 'req-1',
      amzId2: 'id-2',
    })
  })

  it('falls back to the status code for an empty error body', () => {
    const err = result(403, {}).toError()
    expect(err.code).toBe('AccessDenied')
    expect(err.message).toBe('Valid and authorized credentials required')
    expect(result(418, {}).toError().message).toBe('Unexpected status 418')
  })
})

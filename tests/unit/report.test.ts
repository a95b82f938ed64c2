import * as fsp from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { Writable } from 'node:stream'

import { describe, expect, it } from 'vitest'

import { saveContent, writeReport, xmlToText } from '../../src/cli/report.ts'
import { DispatchResult } from '../../src/internal/dispatch-result.ts'

function sink() {
  const chunks: string[] = []
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString())
      callback()
    },
  })
  return { stream, text: () => chunks.join('') }
}

function result(statusCode: number, headers: Record<string, string>, body = '') {
  return new DispatchResult({ statusCode, headers, body: Buffer.from(body) })
}

const listBuckets =
  '<ListAllMyBucketsResult xmlns="http://s3.amazonaws.com/doc/2006-03-01/">' +
  '<Owner><ID>owner-1</ID></Owner><Buckets><Bucket><Name>alpha</Name></Bucket></Buckets></ListAllMyBucketsResult>'

describe('xmlToText', () => {
  it('outlines the document without namespaces', () => {
    expect(xmlToText(listBuckets)).toBe(
      ['ListAllMyBucketsResult', '  Owner', '    ID: owner-1', '  Buckets', '    Bucket', '      Name: alpha'].join('\n'),
    )
  })

  it('prints an empty element without a value', () => {
    expect(xmlToText('<Root><Empty/></Root>')).toBe('Root\n  Empty:')
  })

  it('returns an empty string for text that is not XML', () => {
    expect(xmlToText('plain text')).toBe('')
  })
})

describe('writeReport', () => {
  it('prints status, headers, body and outline for a 200', () => {
    const out = sink()
    const err = sink()

    writeReport(result(200, { etag: '"abc"' }, '<Root><Item>ok</Item></Root>'), out.stream, err.stream)

    expect(out.text()).toBe(
      'Response status: 200\n' +
        'Response headers: {"etag":"\\"abc\\""}\n' +
        'Response body: <Root><Item>ok</Item></Root>\n' +
        'Root\n  Item: ok\n',
    )
    expect(err.text()).toBe('')
  })

  it('prints only the requested headers and query values', () => {
    const out = sink()

    writeReport(
      result(200, { etag: '"abc"', server: 'test' }, listBuckets),
      out.stream,
      sink().stream,
      { showHeaders: ['Server'], queries: [['.//aws:Name', ['alpha']]] },
    )

    const lines = out.text().split('\n')
    expect(lines[1]).toBe('Response headers: {"Server":"test"}')
    expect(lines[2]).toBe('Query .//aws:Name: ["alpha"]')
  })

  it('sends other statuses to the error stream without the body', () => {
    const out = sink()
    const err = sink()

    writeReport(result(404, {}, '<Error><Code>NoSuchKey</Code></Error>'), out.stream, err.stream)

    expect(out.text()).toBe('')
    expect(err.text()).toBe('Response status: 404\nResponse headers: {}\n')
  })

  it('reports where a saved body went', () => {
    const out = sink()

    writeReport(result(200, {}, 'hello'), out.stream, sink().stream, { savedTo: '/tmp/out.bin' })

    expect(out.text()).toBe('Response status: 200\nResponse headers: {}\nResponse body saved to /tmp/out.bin (5 bytes)\n')
  })

  it('skips the outline for a body that is not XML', () => {
    const out = sink()

    writeReport(result(200, {}, 'hello'), out.stream, sink().stream)

    expect(out.text()).toBe('Response status: 200\nResponse headers: {}\nResponse body: hello\n')
  })
})

describe('saveContent', () => {
  it('writes the raw body', async () => {
    const dir = await fsp.mkdtemp(path.join(os.tmpdir(), 's3-rest-report-'))
    const file = path.join(dir, 'body.bin')
    try {
      await saveContent(result(200, {}, 'hello'), file)
      expect(await fsp.readFile(file, 'utf8')).toBe('hello')
    } finally {
      await fsp.rm(dir, { recursive: true, force: true })
    }
  })
})

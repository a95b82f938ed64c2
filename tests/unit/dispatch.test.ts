import * as fsp from 'node:fs/promises'
import * as http from 'node:http'
import * as net from 'node:net'
import * as os from 'node:os'
import * as path from 'node:path'
import { Writable } from 'node:stream'

import { afterEach, describe, expect, it } from 'vitest'

import { Credentials } from '../../src/Credentials.ts'
import { ProtocolError, TransportError } from '../../src/errors.ts'
import { filePayload } from '../../src/helpers.ts'
import { dispatch } from '../../src/internal/request.ts'
import { signRequest } from '../../src/internal/sign-request.ts'
import type { Endpoint, Transport } from '../../src/internal/type.ts'
import type { RequestSpecInput } from '../../src/request-spec.ts'
import { createRequestSpec } from '../../src/request-spec.ts'

interface Received {
  method?: string
  url?: string
  headers: http.IncomingHttpHeaders
  body: string
}

const credentials = new Credentials({ accessKey: 'test-access', secretKey: 'test-secret' })
const date = new Date('2024-03-05T12:34:56Z')
const closers: Array<() => Promise<void>> = []

afterEach(async () => {
  await Promise.all(closers.splice(0).map((close) => close()))
})

async function listen(server: net.Server): Promise<number> {
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve))
  const address = server.address()
  if (address === null || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port')
  }
  return address.port
}

function track(server: net.Server, sockets = new Set<net.Socket>()) {
  closers.push(
    () =>
      new Promise<void>((resolve) => {
        if (server instanceof http.Server) {
          server.closeAllConnections()
        }
        sockets.forEach((socket) => socket.destroy())
        server.close(() => resolve())
      }),
  )
}

/**
 * Records every request and answers with a small XML body.
 */
async function recordingServer(received: Received[]): Promise<number> {
  const server = http.createServer((req, res) => {
    const chunks: Buffer[] = []
    req.on('data', (chunk: Buffer) => chunks.push(chunk))
    req.on('end', () => {
      received.push({ method: req.method, url: req.url, headers: req.headers, body: Buffer.concat(chunks).toString() })
      res.writeHead(200, { 'content-type': 'application/xml', etag: '"abc"', 'x-amz-request-id': 'req-1' })
      res.end('<Root><Item>ok</Item></Root>')
    })
  })
  track(server)
  return listen(server)
}

/**
 * Answers every connection with the given raw bytes and closes it.
 */
async function rawServer(reply: string): Promise<number> {
  const sockets = new Set<net.Socket>()
  const server = net.createServer((socket) => {
    sockets.add(socket)
    socket.on('error', () => undefined)
    socket.end(reply)
  })
  track(server, sockets)
  return listen(server)
}

/**
 * Transport that records the options of each request and fails it.
 */
function recordingTransport(calls: unknown[]): Transport {
  return {
    request(...args: unknown[]): http.ClientRequest {
      calls.push(args[0])
      throw new Error('not connected')
    },
  }
}

async function signed(endpoint: Endpoint, input: Omit<RequestSpecInput, 'endpoint'>) {
  return signRequest(createRequestSpec({ ...input, endpoint }), credentials, { date })
}

describe('dispatch', () => {
  it('sends the signed request and collects the response', async () => {
    const received: Received[] = []
    const port = await recordingServer(received)
    const request = await signed(
      { protocol: 'http:', host: '127.0.0.1', port },
      { method: 'GET', bucketName: 'uv-bucket-3', query: [['versions', '']] },
    )

    const result = await dispatch(request)

    expect(result.statusCode).toBe(200)
    expect(result.header('ETag')).toBe('"abc"')
    expect(result.query('Item', {})).toEqual(['ok'])
    expect(received).toHaveLength(1)
    expect(received[0]?.url).toBe('/uv-bucket-3?versions=')
    expect(received[0]?.headers.host).toBe(`127.0.0.1:${port}`)
    expect(received[0]?.headers.authorization).toBe(request.headers.authorization)
  })

  it('keeps path, host and signature of the endpoint behind a proxy', async () => {
    const received: Received[] = []
    const proxyPort = await recordingServer(received)
    const request = await signed(
      { protocol: 'http:', host: 's3.example.test', port: 9000 },
      { method: 'GET', bucketName: 'uv-bucket-3', query: [['versions', '']] },
    )

    const result = await dispatch(request, { proxy: { host: '127.0.0.1', port: proxyPort } })

    expect(result.statusCode).toBe(200)
    expect(received[0]?.url).toBe('/uv-bucket-3?versions=')
    expect(received[0]?.headers.host).toBe('s3.example.test:9000')
    expect(received[0]?.headers.authorization).toBe(request.headers.authorization)
    expect(received[0]?.headers['x-amz-date']).toBe('20240305T123456Z')
  })

  it('connects to the proxy but negotiates TLS for the endpoint', async () => {
    const calls: unknown[] = []
    const request = await signed({ protocol: 'https:', host: 's3.example.test', port: 0 }, { method: 'GET', bucketName: 'uv-bucket-3' })

    const err = await dispatch(request, {
      proxy: { host: '127.0.0.1', port: 3128 },
      transport: recordingTransport(calls),
    }).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(TransportError)
    expect(calls).toHaveLength(1)
    expect(calls[0]).toMatchObject({
      protocol: 'https:',
      hostname: '127.0.0.1',
      port: 3128,
      path: '/uv-bucket-3',
      servername: 's3.example.test',
      headers: { host: 's3.example.test' },
    })
  })

  it('sends no server name for an IP endpoint behind a proxy', async () => {
    const calls: unknown[] = []
    const request = await signed({ protocol: 'https:', host: '10.0.0.5', port: 9000 }, { method: 'GET' })

    await dispatch(request, { proxy: { host: '127.0.0.1', port: 3128 }, transport: recordingTransport(calls) }).catch(
      (e: unknown) => e,
    )

    expect(calls[0]).toMatchObject({ hostname: '127.0.0.1', port: 3128, headers: { host: '10.0.0.5:9000' } })
    expect(calls[0]).not.toHaveProperty('servername')
  })

  it('sends no server name without a proxy', async () => {
    const calls: unknown[] = []
    const request = await signed({ protocol: 'https:', host: 's3.example.test', port: 0 }, { method: 'GET' })

    await dispatch(request, { transport: recordingTransport(calls) }).catch((e: unknown) => e)

    expect(calls[0]).toMatchObject({ hostname: 's3.example.test', port: 443 })
    expect(calls[0]).not.toHaveProperty('servername')
  })

  it('streams a file body', async () => {
    const dir = await fsp.mkdtemp(path.join(os.tmpdir(), 's3-rest-dispatch-'))
    closers.push(() => fsp.rm(dir, { recursive: true, force: true }))
    const file = path.join(dir, 'note.txt')
    await fsp.writeFile(file, 'hello world')

    const received: Received[] = []
    const port = await recordingServer(received)
    const request = await signed(
      { protocol: 'http:', host: '127.0.0.1', port },
      { method: 'PUT', bucketName: 'uv-bucket-3', objectName: 'note.txt', payload: filePayload(file), signPayload: true },
    )

    await dispatch(request)

    expect(received[0]?.method).toBe('PUT')
    expect(received[0]?.body).toBe('hello world')
    expect(received[0]?.headers['content-length']).toBe('11')
    expect(received[0]?.headers['content-type']).toBe('text/plain')
  })

  it('fails with a TransportError when the connection is refused', async () => {
    const probe = net.createServer()
    const port = await listen(probe)
    await new Promise<void>((resolve) => probe.close(() => resolve()))
    const request = await signed({ protocol: 'http:', host: '127.0.0.1', port }, { method: 'GET' })

    const err = await dispatch(request).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(TransportError)
    expect(err).toMatchObject({ code: 'ECONNREFUSED', stage: 'dispatch' })
  })

  it('fails with a ProtocolError when the reply is not HTTP', async () => {
    const port = await rawServer('NOT HTTP AT ALL\r\n\r\n')
    const request = await signed({ protocol: 'http:', host: '127.0.0.1', port }, { method: 'GET' })

    const err = await dispatch(request).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(ProtocolError)
    expect(err instanceof ProtocolError && err.code?.startsWith('HPE_')).toBe(true)
  })

  it('keeps the partial body when the connection closes early', async () => {
    const port = await rawServer('HTTP/1.1 200 OK\r\nContent-Length: 100\r\n\r\npartial')
    const request = await signed({ protocol: 'http:', host: '127.0.0.1', port }, { method: 'GET' })

    const err = await dispatch(request).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(ProtocolError)
    expect(err instanceof ProtocolError && err.partialBody.toString()).toBe('partial')
  })

  it('fails with a TransportError on timeout', async () => {
    const server = http.createServer(() => undefined)
    track(server)
    const port = await listen(server)
    const request = await signed({ protocol: 'http:', host: '127.0.0.1', port }, { method: 'GET' })

    const err = await dispatch(request, { timeout: 50 }).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(TransportError)
    expect(err).toMatchObject({ code: 'ETIMEDOUT' })
  })

  it('fails with a TransportError when aborted', async () => {
    const server = http.createServer(() => undefined)
    track(server)
    const port = await listen(server)
    const request = await signed({ protocol: 'http:', host: '127.0.0.1', port }, { method: 'GET' })
    const controller = new AbortController()

    const pending = dispatch(request, { signal: controller.signal }).catch((e: unknown) => e)
    setTimeout(() => controller.abort(), 20)
    const err = await pending

    expect(err).toBeInstanceOf(TransportError)
    expect(err).toMatchObject({ code: 'ABORT_ERR' })
  })

  it('traces the exchange with the signature redacted', async () => {
    const received: Received[] = []
    const port = await recordingServer(received)
    const request = await signed({ protocol: 'http:', host: '127.0.0.1', port }, { method: 'GET', bucketName: 'uv-bucket-3' })
    const lines: string[] = []
    const trace = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        lines.push(chunk.toString())
        callback()
      },
    })

    await dispatch(request, { trace })
    await new Promise((resolve) => setImmediate(resolve))
    const output = lines.join('')

    expect(output.startsWith('REQUEST: GET /uv-bucket-3\n')).toBe(true)
    expect(output).toContain('Signature=**REDACTED**')
    expect(output).not.toContain(request.signature)
    expect(output).toContain('RESPONSE: 200\n')
  })
})

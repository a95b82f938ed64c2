import * as http from 'node:http'
import * as https from 'node:https'
import { pipeline } from 'node:stream/promises'

import { ProtocolError, TransportError } from '../errors.ts'
import { DispatchResult } from './dispatch-result.ts'
import { flattenHeaders, isValidIP } from './helper.ts'
import { effectivePort, joinHostPort } from './join-host-port.ts'
import { logHTTP } from './logger.ts'
import { openBody } from './payload.ts'
import { readAsBuffer } from './response.ts'
import type { DispatchOptions, SignedRequest, Transport } from './type.ts'

function errorCode(err: Error): string | undefined {
  return 'code' in err && typeof err.code === 'string' ? err.code : undefined
}

/**
 * Maps a failure of the underlying transport onto TransportError or
 * ProtocolError. Errors already mapped pass through.
 */
export function toDispatchError(err: unknown, target: string): TransportError | ProtocolError {
  if (err instanceof TransportError || err instanceof ProtocolError) {
    return err
  }
  if (!(err instanceof Error)) {
    return new TransportError(`request to ${target} failed: ${String(err)}`)
  }
  const code = errorCode(err)
  if (code?.startsWith('HPE_')) {
    return new ProtocolError(`malformed HTTP response from ${target}: ${err.message}`, undefined, code, { cause: err })
  }
  if (err.name === 'AbortError') {
    return new TransportError(`request to ${target} aborted`, code ?? 'ABORT_ERR', { cause: err })
  }
  return new TransportError(`request to ${target} failed: ${err.message}`, code, { cause: err })
}

function defaultTransport(protocol: string): Transport {
  return protocol === 'https:' ? https : http
}

/**
 * Sends a signed request exactly once. With a proxy the connection goes to
 * the proxy address while path, Host header and signature stay those of
 * the endpoint.
 *
 * @throws TransportError when no response arrives
 * @throws ProtocolError when the response is not valid HTTP
 */
export async function dispatch(signed: SignedRequest, options: DispatchOptions = {}): Promise<DispatchResult> {
  const { endpoint } = signed
  const host = options.proxy?.host ?? signed.host
  const port = options.proxy?.port ?? effectivePort(endpoint.protocol, endpoint.port)
  const target = joinHostPort(host, port)

  const reqOptions: https.RequestOptions = {
    protocol: endpoint.protocol,
    hostname: host,
    port,
    method: signed.method,
    path: signed.path,
    headers: { ...signed.headers },
    agent: options.agent,
    timeout: options.timeout,
    signal: options.signal,
  }
  if (endpoint.protocol === 'https:' && options.proxy && !isValidIP(signed.host)) {
    // TLS is negotiated for the endpoint, not for the proxy
    reqOptions.servername = signed.host
  }

  const transport = options.transport ?? defaultTransport(endpoint.protocol)
  const trace = options.trace
  const traced = { method: signed.method, path: signed.path, headers: signed.headers }

  try {
    const result = await new Promise<DispatchResult>((resolve, reject) => {
      const onResponse = (res: http.IncomingMessage) => {
        if (!res.statusCode) {
          res.destroy()
          reject(new ProtocolError(`response from ${target} has no status code`))
          return
        }
        const statusCode = res.statusCode
        readAsBuffer(res).then(
          (body) =>
            resolve(
              new DispatchResult({
                statusCode,
                statusMessage: res.statusMessage,
                headers: flattenHeaders(res.headers),
                body,
              }),
            ),
          reject,
        )
      }

      let req: http.ClientRequest
      try {
        req = transport.request(reqOptions, onResponse)
      } catch (err) {
        reject(toDispatchError(err, target))
        return
      }

      req.on('timeout', () => {
        req.destroy(new TransportError(`request to ${target} timed out after ${options.timeout}ms`, 'ETIMEDOUT'))
      })
      req.on('error', (err) => reject(toDispatchError(err, target)))

      const body = openBody(signed.body)
      if (body === null) {
        req.end()
      } else if (Buffer.isBuffer(body)) {
        req.end(body)
      } else {
        pipeline(body, req).catch((err: unknown) => reject(toDispatchError(err, target)))
      }
    })
    if (trace) {
      logHTTP(trace, traced, result)
    }
    return result
  } catch (err) {
    if (trace) {
      logHTTP(trace, traced, null, err)
    }
    throw err
  }
}

import type * as stream from 'node:stream'

import { Command, CommanderError, InvalidArgumentError as InvalidOptionArgumentError, Option } from 'commander'

import { configToClientOptions, loadConfig } from '../config.ts'
import { filePayload, inlinePayload } from '../helpers.ts'
import { S3RestClient } from '../internal/client.ts'
import type { HttpMethod, Payload } from '../internal/type.ts'
import { parseHeaders, parseParameters, parsePairs, substituteParameters } from './args.ts'
import { saveContent, writeReport } from './report.ts'

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'] as const

export type CliOptions = {
  bucket?: string
  key?: string
  method: Lowercase<HttpMethod>
  config_file: string
  payload?: string
  payload_is_file: boolean
  sign_payload: boolean
  parameters?: string
  headers?: string
  save_content_to_file?: string
  substitute_parameters?: string
  proxy?: string
  query: string[]
  show_headers?: string
  presign?: number
  log_level: (typeof LOG_LEVELS)[number]
}

export interface CliIO {
  stdout: stream.Writable
  stderr: stream.Writable
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

const METHODS: readonly Lowercase<HttpMethod>[] = ['get', 'put', 'post', 'delete', 'head']

function toMethod(value: string): Lowercase<HttpMethod> {
  const lower = value.toLowerCase()
  const method = METHODS.find((m) => m === lower)
  if (!method) {
    throw new InvalidOptionArgumentError(`Allowed choices are ${METHODS.join(', ')}.`)
  }
  return method
}

function toSeconds(value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new InvalidOptionArgumentError('Expected an integer number of seconds.')
  }
  return Number(value)
}

function buildPayload(opts: CliOptions): Payload | undefined {
  if (opts.payload === undefined) {
    return undefined
  }
  if (opts.payload_is_file) {
    return filePayload(opts.payload)
  }
  const substitutions = opts.substitute_parameters ? parsePairs(opts.substitute_parameters, '=', 'substitution') : []
  return inlinePayload(substituteParameters(opts.payload, substitutions))
}

/**
 * Runs one request described by the parsed options and reports it. Resolves
 * to the process exit code: 0 for a 2xx response, 1 otherwise.
 */
export async function runRequest(opts: CliOptions, io: CliIO): Promise<number> {
  const config = await loadConfig(opts.config_file, { proxy: opts.proxy })
  const client = new S3RestClient({
    ...configToClientOptions(config),
    trace: opts.log_level === 'DEBUG' ? io.stderr : undefined,
  })

  const request = {
    method: opts.method,
    bucketName: opts.bucket,
    objectName: opts.key,
    query: opts.parameters ? parseParameters(opts.parameters) : undefined,
    headers: opts.headers ? parseHeaders(opts.headers) : undefined,
  }

  if (opts.presign !== undefined) {
    const url = await client.presignedUrl(request, opts.presign)
    io.stdout.write(`${url}\n`)
    return 0
  }

  const result = await client.send({ ...request, payload: buildPayload(opts), signPayload: opts.sign_payload })

  let savedTo: string | undefined
  if (opts.save_content_to_file && result.ok) {
    await saveContent(result, opts.save_content_to_file)
    savedTo = opts.save_content_to_file
  }

  writeReport(result, io.stdout, io.stderr, {
    showHeaders: opts.show_headers
      ?.split(',')
      .map((h) => h.trim())
      .filter(Boolean),
    savedTo,
    queries: opts.query.map((expression) => [expression, result.query(expression)] as const),
  })
  return result.ok ? 0 : 1
}

export function createProgram(io: CliIO, onExit: (exitCode: number) => void = () => undefined): Command {
  const program = new Command()
    .name('s3-rest')
    .description('Send a SigV4-signed REST request to an S3-compatible service')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    })
    .option('-b, --bucket <name>', 'bucket name')
    .option('-k, --key <key>', 'object key')
    .option('-m, --method <method>', `HTTP method, one of ${METHODS.join(', ')}`, toMethod, 'get')
    .requiredOption('-c, --config_file <path>', 'JSON configuration file')
    .option('-p, --payload <text>', 'request body, or a file path with --payload_is_file')
    .option('-f, --payload_is_file', 'read the body from the file named by --payload', false)
    .option('-s, --sign_payload', 'sign the SHA-256 of the body instead of UNSIGNED-PAYLOAD', false)
    .option('-t, --parameters <pairs>', "URL parameters: 'key=value;key2=value2', \"key=''\" for no value")
    .option('-e, --headers <pairs>', "additional headers: 'name:value;name2:value2'")
    .option('-n, --save_content_to_file <path>', 'write the response body to this file')
    .option('-x, --substitute_parameters <pairs>', "text replacements applied to the body: 'from=to;...'")
    .option('-P, --proxy <host:port>', 'send the request through this address')
    .option('-q, --query <expression>', 'XML path evaluated against the response body (repeatable)', collect, [])
    .option('--show_headers <names>', 'comma separated response headers to print')
    .option('--presign <seconds>', 'print a pre-signed URL instead of sending', toSeconds)
    .addOption(new Option('-l, --log_level <level>', 'log level').choices(LOG_LEVELS).default('WARNING'))

  program.action(async () => {
    onExit(await runRequest(program.opts<CliOptions>(), io))
  })
  return program
}

/**
 * Parses the arguments (without the node and script entries), runs the
 * request and resolves to the exit code. Failures are reported on stderr.
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  let exitCode = 0
  const program = createProgram(io, (code) => {
    exitCode = code
  })
  try {
    await program.parseAsync(argv, { from: 'user' })
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode
    }
    io.stderr.write(err instanceof Error ? `${err.name}: ${err.message}\n` : `${String(err)}\n`)
    return 2
  }
  return exitCode
}

import type { S3Error } from '../errors.ts'
import type { ResponseHeader } from './type.ts'
import { parseResponseError } from './xml-parser.ts'
import type { Namespaces, XmlElement } from './xml-query.ts'
import { compileQuery, DEFAULT_NAMESPACES, parseXmlDocument, selectElements } from './xml-query.ts'

export interface DispatchResultInit {
  statusCode: number
  statusMessage?: string
  headers: ResponseHeader
  body: Buffer
}

/**
 * Response of one dispatched request. Headers, body and status are read-only
 * views; the XML document is parsed the first time it is asked for.
 */
export class DispatchResult {
  readonly statusCode: number
  readonly statusMessage: string
  /**
   * lower-cased names
   */
  readonly headers: Readonly<ResponseHeader>
  readonly body: Buffer

  private document: XmlElement | null | undefined

  constructor({ statusCode, statusMessage = '', headers, body }: DispatchResultInit) {
    this.statusCode = statusCode
    this.statusMessage = statusMessage
    this.headers = Object.freeze({ ...headers })
    this.body = body
  }

  get ok(): boolean {
    return this.statusCode >= 200 && this.statusCode < 300
  }

  text(encoding: BufferEncoding = 'utf8'): string {
    return this.body.toString(encoding)
  }

  header(name: string): string | undefined {
    return this.headers[name.toLowerCase()]
  }

  /**
   * Headers present in the response among the requested ones, keyed as
   * requested and in the requested order.
   */
  pickHeaders(names: readonly string[]): Record<string, string> {
    const picked: Record<string, string> = {}
    for (const name of names) {
      const value = this.header(name)
      if (value !== undefined && !(name in picked)) {
        picked[name] = value
      }
    }
    return picked
  }

  /**
   * Root element of the body, null when the body is not well-formed XML.
   */
  xml(): XmlElement | null {
    if (this.document === undefined) {
      this.document = parseXmlDocument(this.text())
    }
    return this.document
  }

  /**
   * Elements selected by an ElementPath expression.
   *
   * @throws QueryError
   */
  findAll(expression: string, namespaces: Namespaces = DEFAULT_NAMESPACES): XmlElement[] {
    const query = compileQuery(expression, namespaces)
    const root = this.xml()
    return root ? selectElements(root, query) : []
  }

  /**
   * Text values of the elements selected by an ElementPath expression, e.g.
   * `.//aws:Bucket/aws:Name`.
   *
   * @throws QueryError
   */
  query(expression: string, namespaces: Namespaces = DEFAULT_NAMESPACES): string[] {
    return this.findAll(expression, namespaces).map((e) => e.text)
  }

  /**
   * S3Error described by a non-2xx response.
   */
  toError(): S3Error {
    return parseResponseError(this)
  }
}

import * as fsp from 'node:fs/promises'
import type * as stream from 'node:stream'

import type { DispatchResult } from '../internal/dispatch-result.ts'
import type { XmlElement } from '../internal/xml-query.ts'
import { parseXmlDocument } from '../internal/xml-query.ts'

const INDENT = '  '

function renderElement(element: XmlElement, depth: number, lines: string[]) {
  const pad = INDENT.repeat(depth)
  const text = element.text.trim()
  if (element.children.length === 0) {
    lines.push(`${pad}${element.localName}: ${text}`.trimEnd())
    return
  }
  lines.push(text ? `${pad}${element.localName}: ${text}` : `${pad}${element.localName}`)
  for (const child of element.children) {
    renderElement(child, depth + 1, lines)
  }
}

/**
 * Indented outline of an XML document, one element per line, namespaces
 * left out. Empty when the text is not well-formed XML.
 */
export function xmlToText(xml: string): string {
  const root = parseXmlDocument(xml)
  if (!root) {
    return ''
  }
  const lines: string[] = []
  renderElement(root, 0, lines)
  return lines.join('\n')
}

export interface ReportOptions {
  /**
   * header names to print; all headers when empty
   */
  showHeaders?: readonly string[]
  /**
   * body was saved to a file and is not printed
   */
  savedTo?: string
  queries?: ReadonlyArray<readonly [expression: string, values: readonly string[]]>
}

/**
 * Prints status and headers, then the body and its outline for a 200 response
 * that was not saved to a file. Everything goes to `out` on 200 and to `err`
 * otherwise.
 */
export function writeReport(
  result: DispatchResult,
  out: stream.Writable,
  err: stream.Writable,
  options: ReportOptions = {},
): void {
  const target = result.statusCode === 200 ? out : err
  const headers = options.showHeaders?.length ? result.pickHeaders(options.showHeaders) : result.headers
  target.write(`Response status: ${result.statusCode}\n`)
  target.write(`Response headers: ${JSON.stringify(headers)}\n`)
  for (const [expression, values] of options.queries ?? []) {
    target.write(`Query ${expression}: ${JSON.stringify(values)}\n`)
  }
  if (options.savedTo) {
    target.write(`Response body saved to ${options.savedTo} (${result.body.length} bytes)\n`)
    return
  }
  const text = result.text()
  if (text && result.statusCode === 200) {
    target.write(`Response body: ${text}\n`)
    const outline = xmlToText(text)
    if (outline) {
      target.write(`${outline}\n`)
    }
  }
}

export async function saveContent(result: DispatchResult, path: string): Promise<void> {
  await fsp.writeFile(path, result.body)
}

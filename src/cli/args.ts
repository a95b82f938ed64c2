import { InvalidArgumentError } from '../errors.ts'
import type { QueryParam } from '../internal/type.ts'

const EMPTY_MARKERS = ["''", '""']

/**
 * Parses `k<delimiter>v;k2<delimiter>v2` into ordered pairs. Each entry is
 * split on the first delimiter; `''` and `""` stand for the empty value.
 *
 * @throws InvalidArgumentError for an entry without the delimiter or with an empty key
 */
export function parsePairs(text: string, delimiter: string, what = 'pair'): QueryParam[] {
  const pairs: QueryParam[] = []
  for (const entry of text.split(';')) {
    if (entry.trim() === '') {
      continue
    }
    const at = entry.indexOf(delimiter)
    if (at < 0) {
      throw new InvalidArgumentError(`Invalid ${what} "${entry}", expected key${delimiter}value`)
    }
    const key = entry.slice(0, at).trim()
    const raw = entry.slice(at + delimiter.length)
    if (key === '') {
      throw new InvalidArgumentError(`Invalid ${what} "${entry}", key is empty`)
    }
    pairs.push([key, EMPTY_MARKERS.includes(raw.trim()) ? '' : raw])
  }
  return pairs
}

export function parseParameters(text: string): QueryParam[] {
  return parsePairs(text, '=', 'parameter')
}

export function parseHeaders(text: string): Record<string, string> {
  const headers: Record<string, string> = {}
  for (const [name, value] of parsePairs(text, ':', 'header')) {
    headers[name] = value.trim()
  }
  return headers
}

/**
 * Replaces every occurrence of each `from` with its `to`, in the given
 * order.
 */
export function substituteParameters(payload: string, substitutions: readonly QueryParam[]): string {
  return substitutions.reduce((text, [from, to]) => text.split(from).join(to), payload)
}

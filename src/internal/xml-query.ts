import { XMLParser, XMLValidator } from 'fast-xml-parser'

import { QueryError } from '../errors.ts'
import { S3_NAMESPACE } from '../helpers.ts'
import { isRecord, isString } from './helper.ts'

export type Namespaces = Readonly<Record<string, string>>

export const DEFAULT_NAMESPACES: Namespaces = Object.freeze({ aws: S3_NAMESPACE })

export interface XmlElement {
  /**
   * qualified name as written in the document
   */
  readonly name: string
  readonly localName: string
  readonly namespace?: string
  readonly attributes: Readonly<Record<string, string>>
  readonly children: readonly XmlElement[]
  readonly text: string
  readonly parent?: XmlElement
}

interface MutableElement extends XmlElement {
  children: MutableElement[]
  text: string
}

const fxp = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  parseTagValue: false,
  parseAttributeValue: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  trimValues: true,
})

const ATTRIBUTES_KEY = ':@'
const TEXT_KEY = '#text'

function splitName(name: string): [prefix: string, local: string] {
  const idx = name.indexOf(':')
  return idx === -1 ? ['', name] : [name.slice(0, idx), name.slice(idx + 1)]
}

function toElements(nodes: unknown, parent: MutableElement | undefined, scope: Namespaces): MutableElement[] {
  const elements: MutableElement[] = []
  if (!Array.isArray(nodes)) {
    return elements
  }
  for (const node of nodes) {
    if (!isRecord(node)) {
      continue
    }
    for (const [key, value] of Object.entries(node)) {
      if (key === ATTRIBUTES_KEY) {
        continue
      }
      if (key === TEXT_KEY) {
        if (parent) {
          parent.text += `${String(value)}`
        }
        continue
      }

      const attributes: Record<string, string> = {}
      const rawAttributes = node[ATTRIBUTES_KEY]
      if (isRecord(rawAttributes)) {
        for (const [attr, attrValue] of Object.entries(rawAttributes)) {
          attributes[attr] = String(attrValue)
        }
      }

      const elementScope: Record<string, string> = { ...scope }
      for (const [attr, attrValue] of Object.entries(attributes)) {
        if (attr === 'xmlns') {
          elementScope[''] = attrValue
        } else if (attr.startsWith('xmlns:')) {
          elementScope[attr.slice('xmlns:'.length)] = attrValue
        }
      }

      const [prefix, localName] = splitName(key)
      const element: MutableElement = {
        name: key,
        localName,
        namespace: elementScope[prefix] || undefined,
        attributes,
        children: [],
        text: '',
        parent,
      }
      element.children = toElements(value, element, elementScope)
      elements.push(element)
    }
  }
  return elements
}

/**
 * Parses an XML document into its root element, or null when the text is
 * not a well-formed document.
 */
export function parseXmlDocument(xml: string): XmlElement | null {
  if (!xml.trim()) {
    return null
  }
  if (XMLValidator.validate(xml) !== true) {
    return null
  }
  const roots = toElements(fxp.parse(xml), undefined, {})
  return roots.length === 1 ? roots[0] ?? null : null
}

type NameTest = { namespace: string | undefined | '*'; local: string | '*' }

type NodeTest = 'self' | 'parent' | NameTest

type Predicate =
  | { kind: 'attribute'; name: string; value?: string }
  | { kind: 'child'; test: NameTest; value?: string }
  | { kind: 'text'; value: string }
  | { kind: 'position'; index: number }
  | { kind: 'last'; offset: number }

interface Step {
  axis: 'child' | 'descendant'
  node: NodeTest
  predicates: Predicate[]
}

const namePattern = /^[\p{L}_][\p{L}\p{N}_.-]*$/u
const quoted = `(?:'([^']*)'|"([^"]*)")`
const attributePredicate = new RegExp(`^@([^\\s=]+)(?:\\s*=\\s*${quoted})?$`)
const textPredicate = new RegExp(`^\\.\\s*=\\s*${quoted}$`)
const childPredicate = new RegExp(`^([^\\s=@.'"][^\\s=]*)(?:\\s*=\\s*${quoted})?$`)
const lastPredicate = /^last\(\)(?:\s*-\s*(\d+))?$/

/**
 * Compiles an ElementPath expression (the XPath subset ElementTree accepts).
 */
class ExpressionParser {
  private pos = 0

  constructor(
    private readonly expression: string,
    private readonly namespaces: Namespaces,
  ) {}

  private fail(message: string, position = this.pos): never {
    throw new QueryError(message, this.expression, position)
  }

  parse(): Step[] {
    const expr = this.expression
    if (expr.trim().length === 0) {
      this.fail('empty expression', 0)
    }
    if (expr.startsWith('/')) {
      this.fail('cannot use absolute path on element', 0)
    }

    const steps: Step[] = []
    let axis: Step['axis'] = 'child'
    for (;;) {
      steps.push(this.parseStep(axis))
      if (this.pos >= expr.length) {
        return steps
      }
      if (expr.startsWith('//', this.pos)) {
        axis = 'descendant'
        this.pos += 2
      } else {
        axis = 'child'
        this.pos += 1
      }
      if (this.pos >= expr.length) {
        this.fail('expression cannot end with a separator')
      }
    }
  }

  private parseStep(axis: Step['axis']): Step {
    const expr = this.expression
    const start = this.pos
    while (this.pos < expr.length && expr[this.pos] !== '/' && expr[this.pos] !== '[') {
      if (expr[this.pos] === '{') {
        const close = expr.indexOf('}', this.pos)
        if (close === -1) {
          return this.fail('unterminated namespace uri')
        }
        this.pos = close
      }
      this.pos++
    }
    const text = expr.slice(start, this.pos)
    if (!text) {
      this.fail('empty path step', start)
    }
    const node: NodeTest = text === '.' ? 'self' : text === '..' ? 'parent' : this.parseNameTest(text, start)

    const predicates: Predicate[] = []
    while (expr[this.pos] === '[') {
      predicates.push(this.parsePredicate())
    }
    if (this.pos < expr.length && expr[this.pos] !== '/') {
      this.fail(`unexpected character '${expr[this.pos]}'`)
    }
    return { axis, node, predicates }
  }

  private parseNameTest(text: string, position: number): NameTest {
    if (text === '*') {
      return { namespace: '*', local: '*' }
    }
    if (text.startsWith('{')) {
      const close = text.indexOf('}')
      const uri = text.slice(1, close)
      const local = this.checkLocal(text.slice(close + 1), position)
      return { namespace: uri === '*' ? '*' : uri || undefined, local }
    }
    const [prefix, local] = splitName(text)
    if (prefix) {
      if (!namePattern.test(prefix)) {
        this.fail(`invalid prefix '${prefix}'`, position)
      }
      const uri = this.namespaces[prefix]
      if (uri === undefined) {
        this.fail(`prefix '${prefix}' not found in prefix map`, position)
      }
      return { namespace: uri, local: this.checkLocal(local, position) }
    }
    return { namespace: this.namespaces[''] || undefined, local: this.checkLocal(local, position) }
  }

  private checkLocal(local: string, position: number): string {
    if (local !== '*' && !namePattern.test(local)) {
      this.fail(`invalid name '${local}'`, position)
    }
    return local
  }

  private parsePredicate(): Predicate {
    const expr = this.expression
    const start = this.pos
    let quote: string | undefined
    let close = -1
    for (let i = start + 1; i < expr.length; i++) {
      const c = expr[i]
      if (quote) {
        if (c === quote) {
          quote = undefined
        }
      } else if (c === '"' || c === "'") {
        quote = c
      } else if (c === ']') {
        close = i
        break
      }
    }
    if (close === -1) {
      this.fail('unterminated predicate', start)
    }
    const body = expr.slice(start + 1, close).trim()
    this.pos = close + 1

    if (/^\d+$/.test(body)) {
      const index = Number.parseInt(body, 10)
      if (index < 1) {
        this.fail('XPath position >= 1 expected', start)
      }
      return { kind: 'position', index }
    }
    const last = lastPredicate.exec(body)
    if (last) {
      return { kind: 'last', offset: last[1] ? Number.parseInt(last[1], 10) : 0 }
    }
    const attr = attributePredicate.exec(body)
    if (attr) {
      const [, name = '', single, double] = attr
      return { kind: 'attribute', name, value: single ?? double }
    }
    const self = textPredicate.exec(body)
    if (self) {
      return { kind: 'text', value: self[1] ?? self[2] ?? '' }
    }
    const child = childPredicate.exec(body)
    if (child) {
      const [, name = '', single, double] = child
      return { kind: 'child', test: this.parseNameTest(name, start + 1), value: single ?? double }
    }
    return this.fail(`invalid predicate '${body}'`, start)
  }
}

export type CompiledQuery = readonly Step[]

/**
 * @throws QueryError when the expression is not valid
 */
export function compileQuery(expression: string, namespaces: Namespaces = DEFAULT_NAMESPACES): CompiledQuery {
  if (!isString(expression)) {
    throw new QueryError('expression should be of type "string"', String(expression), 0)
  }
  return new ExpressionParser(expression, namespaces).parse()
}

function matches(element: XmlElement, test: NameTest): boolean {
  if (test.local !== '*' && test.local !== element.localName) {
    return false
  }
  return test.namespace === '*' || test.namespace === element.namespace
}

function descendants(element: XmlElement): XmlElement[] {
  const result: XmlElement[] = []
  for (const child of element.children) {
    result.push(child, ...descendants(child))
  }
  return result
}

function applyPredicate(group: XmlElement[], predicate: Predicate): XmlElement[] {
  switch (predicate.kind) {
    case 'position': {
      const element = group[predicate.index - 1]
      return element ? [element] : []
    }
    case 'last': {
      const element = group[group.length - 1 - predicate.offset]
      return element ? [element] : []
    }
    case 'attribute':
      return group.filter((e) =>
        predicate.value === undefined ? predicate.name in e.attributes : e.attributes[predicate.name] === predicate.value,
      )
    case 'text':
      return group.filter((e) => e.text === predicate.value)
    case 'child':
      return group.filter((e) =>
        e.children.some((c) => matches(c, predicate.test) && (predicate.value === undefined || c.text === predicate.value)),
      )
  }
}

function candidates(context: XmlElement, step: Step): XmlElement[] {
  const scope = step.axis === 'child' ? context.children : descendants(context)
  if (step.node === 'self') {
    return step.axis === 'child' ? [context] : [context, ...scope]
  }
  if (step.node === 'parent') {
    const from = step.axis === 'child' ? [context] : [context, ...scope]
    return from.flatMap((e) => (e.parent ? [e.parent] : []))
  }
  const test = step.node
  return scope.filter((e) => matches(e, test))
}

/**
 * Runs a compiled query from the given element and returns the matching
 * elements in the order they are found.
 */
export function selectElements(root: XmlElement, query: CompiledQuery): XmlElement[] {
  let context: XmlElement[] = [root]
  for (const step of query) {
    const next = new Set<XmlElement>()
    for (const element of context) {
      let found = candidates(element, step)
      for (const predicate of step.predicates) {
        // positions count among siblings sharing a parent
        const groups = new Map<XmlElement | undefined, XmlElement[]>()
        for (const e of found) {
          const group = groups.get(e.parent) ?? []
          group.push(e)
          groups.set(e.parent, group)
        }
        found = [...groups.values()].flatMap((group) => applyPredicate(group, predicate))
      }
      found.forEach((e) => next.add(e))
    }
    context = [...next]
  }
  return context
}

/**
 * Text values of the elements an expression selects. A body that is not
 * well-formed XML selects nothing.
 *
 * @throws QueryError when the expression is not valid
 */
export function queryXml(xml: string, expression: string, namespaces: Namespaces = DEFAULT_NAMESPACES): string[] {
  const query = compileQuery(expression, namespaces)
  const root = parseXmlDocument(xml)
  return root ? selectElements(root, query).map((e) => e.text) : []
}

/**
 * Parser for SavedVariables files: a sequence of `Name = value` assignments
 * whose values are Lua literals (strings, numbers, booleans, nil, tables).
 *
 * Every node keeps `[start, end)` source offsets. Nothing here rewrites text;
 * the document model slices the original source with these offsets.
 */

import { LuaLexer, LuaSyntaxError, type LexerOptions, type Punct, type Token } from './lexer.js'

export interface Span {
  start: number
  end: number
}

export type LuaScalar = string | number | boolean

export type LuaNode =
  | ({ kind: 'string'; value: string } & Span)
  | ({ kind: 'number'; value: number } & Span)
  | ({ kind: 'boolean'; value: boolean } & Span)
  | ({ kind: 'nil' } & Span)
  | LuaTable

export interface LuaTable extends Span {
  kind: 'table'
  fields: LuaField[]
}

/**
 * One table field. `start` is the first token of the field (the key, or the
 * value for positional fields); `end` is past the trailing `,`/`;` when there is
 * one, else past the value.
 */
export interface LuaField extends Span {
  /** null for positional (`{ 1, 2 }`) fields. */
  key: LuaScalar | null
  value: LuaNode
  hasSeparator: boolean
}

export interface LuaAssignment extends Span {
  name: string
  value: LuaNode
}

export interface LuaChunk {
  assignments: LuaAssignment[]
}

const KEYWORDS = new Set(['true', 'false', 'nil'])

class Parser {
  private idx = 0

  constructor(private readonly tokens: Token[]) {}

  private peek(offset = 0): Token {
    const t = this.tokens[Math.min(this.idx + offset, this.tokens.length - 1)]
    if (!t) throw new LuaSyntaxError('empty token stream', 0)
    return t
  }

  private advance(): Token {
    const t = this.peek()
    if (t.type !== 'eof') this.idx++
    return t
  }

  private isPunct(t: Token, p: Punct): boolean {
    return t.type === 'punct' && t.value === p
  }

  private describe(t: Token): string {
    if (t.type === 'eof') return 'end of file'
    if (t.type === 'string') return 'string'
    return `'${String(t.value)}'`
  }

  private expect(p: Punct): Token {
    const t = this.advance()
    if (!this.isPunct(t, p)) {
      throw new LuaSyntaxError(`expected '${p}' near ${this.describe(t)}`, t.start)
    }
    return t
  }

  parseChunk(): LuaChunk {
    const assignments: LuaAssignment[] = []
    while (this.peek().type !== 'eof') {
      const nameTok = this.advance()
      if (nameTok.type !== 'name' || KEYWORDS.has(nameTok.value)) {
        throw new LuaSyntaxError(`expected a variable name near ${this.describe(nameTok)}`, nameTok.start)
      }
      this.expect('=')
      const value = this.parseValue()
      assignments.push({ name: nameTok.value, value, start: nameTok.start, end: value.end })
      if (this.isPunct(this.peek(), ';')) this.advance()
    }
    return { assignments }
  }

  private parseValue(): LuaNode {
    const t = this.advance()
    switch (t.type) {
      case 'string':
        return { kind: 'string', value: t.value, start: t.start, end: t.end }
      case 'number':
        return { kind: 'number', value: t.value, start: t.start, end: t.end }
      case 'name':
        if (t.value === 'true' || t.value === 'false') {
          return { kind: 'boolean', value: t.value === 'true', start: t.start, end: t.end }
        }
        if (t.value === 'nil') return { kind: 'nil', start: t.start, end: t.end }
        throw new LuaSyntaxError(`unsupported expression '${t.value}'`, t.start)
      case 'punct':
        if (t.value === '{') return this.parseTable(t.start)
        if (t.value === '-') {
          const n = this.advance()
          if (n.type !== 'number') {
            throw new LuaSyntaxError(`expected a number after '-' near ${this.describe(n)}`, n.start)
          }
          return { kind: 'number', value: -n.value, start: t.start, end: n.end }
        }
        throw new LuaSyntaxError(`unexpected '${t.value}'`, t.start)
      case 'eof':
        throw new LuaSyntaxError('unexpected end of file', t.start)
    }
  }

  /** `{` has been consumed; `start` is its offset. */
  private parseTable(start: number): LuaTable {
    const fields: LuaField[] = []
    while (true) {
      const t = this.peek()
      if (this.isPunct(t, '}')) {
        this.advance()
        return { kind: 'table', fields, start, end: t.end }
      }
      if (t.type === 'eof') throw new LuaSyntaxError("unclosed table, expected '}'", start)

      const fieldStart = t.start
      let key: LuaScalar | null = null

      if (this.isPunct(t, '[')) {
        this.advance()
        const k = this.parseValue()
        if (k.kind === 'table' || k.kind === 'nil') {
          throw new LuaSyntaxError(`unsupported ${k.kind} table key`, k.start)
        }
        key = k.value
        this.expect(']')
        this.expect('=')
      } else if (t.type === 'name' && !KEYWORDS.has(t.value) && this.isPunct(this.peek(1), '=')) {
        this.advance()
        this.advance()
        key = t.value
      }

      const value = this.parseValue()
      const sep = this.peek()
      const hasSeparator = this.isPunct(sep, ',') || this.isPunct(sep, ';')
      if (hasSeparator) this.advance()
      fields.push({ key, value, hasSeparator, start: fieldStart, end: hasSeparator ? sep.end : value.end })

      if (!hasSeparator && !this.isPunct(this.peek(), '}')) {
        const next = this.peek()
        throw new LuaSyntaxError(`expected ',' or '}' near ${this.describe(next)}`, next.start)
      }
    }
  }
}

/**
 * Parse a SavedVariables document. Throws `LuaSyntaxError` (with a source
 * offset) on malformed input.
 */
export function parseLua(text: string, opts: LexerOptions = {}): LuaChunk {
  const tokens = new LuaLexer(text, opts).tokenize()
  return new Parser(tokens).parseChunk()
}

/** Scalar value of a node, or undefined for tables and nil. */
export function scalarOf(node: LuaNode): LuaScalar | undefined {
  if (node.kind === 'string' || node.kind === 'number' || node.kind === 'boolean') return node.value
  return undefined
}

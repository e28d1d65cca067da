/**
 * Tokenizer for the Lua subset WoW writes into SavedVariables files.
 *
 * Comments and whitespace are skipped; every token keeps its source offsets so
 * the parser can hand exact text ranges back to the document model.
 */

import { Buffer } from 'node:buffer'

export type Punct = '{' | '}' | '[' | ']' | '=' | ',' | ';' | '-'

export type Token =
  | { type: 'name'; value: string; start: number; end: number }
  | { type: 'string'; value: string; start: number; end: number }
  | { type: 'number'; value: number; start: number; end: number }
  | { type: 'punct'; value: Punct; start: number; end: number }
  | { type: 'eof'; start: number; end: number }

export class LuaSyntaxError extends Error {
  constructor(
    message: string,
    readonly offset: number
  ) {
    super(message)
    this.name = 'LuaSyntaxError'
  }
}

/** 1-based line/column of an offset. */
export function lineColumn(text: string, offset: number): { line: number; column: number } {
  let line = 1
  let lineStart = 0
  for (let i = 0; i < offset && i < text.length; i++) {
    if (text.charCodeAt(i) === 10) {
      line++
      lineStart = i + 1
    }
  }
  return { line, column: offset - lineStart + 1 }
}

const PUNCTS: readonly Punct[] = ['{', '}', '[', ']', '=', ',', ';', '-']

function isPunct(ch: string): ch is Punct {
  return PUNCTS.some((p) => p === ch)
}

const NAME_START = /[A-Za-z_]/
const NAME_REST = /[A-Za-z0-9_]/y
const HEX_NUMBER = /0[xX](?:[0-9a-fA-F]+(?:\.[0-9a-fA-F]*)?|\.[0-9a-fA-F]+)(?:[pP][+-]?\d+)?/y
const DEC_NUMBER = /(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/y
const LONG_OPEN = /\[(=*)\[/y

const SIMPLE_ESCAPES: Record<string, number> = {
  a: 7,
  b: 8,
  f: 12,
  n: 10,
  r: 13,
  t: 9,
  v: 11,
  '\\': 92,
  '"': 34,
  "'": 39
}

function isSpace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === '\f' || ch === '\v'
}

function parseHexFloat(raw: string): number {
  const m = /^0[xX]([0-9a-fA-F]*)(?:\.([0-9a-fA-F]*))?(?:[pP]([+-]?\d+))?$/.exec(raw)
  if (!m) return Number.NaN
  const intPart = m[1] || '0'
  const frac = m[2] ?? ''
  const exp = m[3] ? Number.parseInt(m[3], 10) : 0
  let value = Number.parseInt(intPart, 16)
  for (let i = 0; i < frac.length; i++) {
    value += Number.parseInt(frac.charAt(i), 16) / 16 ** (i + 1)
  }
  return value * 2 ** exp
}

export interface LexerOptions {
  /**
   * `text` holds one character per file byte (read as latin1). String values
   * are decoded from those bytes as UTF-8.
   */
  bytes?: boolean
}

export class LuaLexer {
  private pos = 0
  private readonly encoding: BufferEncoding

  constructor(
    private readonly text: string,
    opts: LexerOptions = {}
  ) {
    this.encoding = opts.bytes ? 'latin1' : 'utf8'
    // Editors sometimes leave a BOM on SavedVariables files.
    if (text.charCodeAt(0) === 0xfeff) this.pos = 1
    else if (opts.bytes && text.startsWith('\xEF\xBB\xBF')) this.pos = 3
  }

  tokenize(): Token[] {
    const out: Token[] = []
    while (true) {
      const tok = this.next()
      out.push(tok)
      if (tok.type === 'eof') return out
    }
  }

  private peekChar(offset = 0): string {
    return this.text.charAt(this.pos + offset)
  }

  private error(message: string, offset = this.pos): never {
    throw new LuaSyntaxError(message, offset)
  }

  /** Length of a `[==[` opener at `at`, with its level, or null. */
  private longBracketAt(at: number): { level: number; length: number } | null {
    LONG_OPEN.lastIndex = at
    const m = LONG_OPEN.exec(this.text)
    if (!m) return null
    return { level: (m[1] ?? '').length, length: m[0].length }
  }

  /** Consume a long bracket body; returns its content. `pos` is just past the opener. */
  private readLongBody(level: number, openedAt: number, what: string): string {
    const close = `]${'='.repeat(level)}]`
    const endIdx = this.text.indexOf(close, this.pos)
    if (endIdx < 0) this.error(`unfinished long ${what}`, openedAt)
    let body = this.text.slice(this.pos, endIdx)
    // A newline right after the opener is not part of the content.
    if (body.startsWith('\r\n')) body = body.slice(2)
    else if (body.startsWith('\n') || body.startsWith('\r')) body = body.slice(1)
    this.pos = endIdx + close.length
    return body
  }

  private skipTrivia(): void {
    while (this.pos < this.text.length) {
      const ch = this.peekChar()
      if (isSpace(ch)) {
        this.pos++
        continue
      }
      if (ch === '-' && this.peekChar(1) === '-') {
        const commentStart = this.pos
        this.pos += 2
        const long = this.longBracketAt(this.pos)
        if (long) {
          this.pos += long.length
          this.readLongBody(long.level, commentStart, 'comment')
          continue
        }
        const nl = this.text.indexOf('\n', this.pos)
        this.pos = nl < 0 ? this.text.length : nl + 1
        continue
      }
      return
    }
  }

  next(): Token {
    this.skipTrivia()
    const start = this.pos
    if (start >= this.text.length) return { type: 'eof', start, end: start }

    const ch = this.peekChar()

    if (NAME_START.test(ch)) {
      this.pos++
      while (this.pos < this.text.length) {
        NAME_REST.lastIndex = this.pos
        if (!NAME_REST.test(this.text)) break
        this.pos++
      }
      return { type: 'name', value: this.text.slice(start, this.pos), start, end: this.pos }
    }

    if (/\d/.test(ch) || (ch === '.' && /\d/.test(this.peekChar(1)))) {
      return this.readNumber(start)
    }

    if (ch === '"' || ch === "'") {
      const value = this.readShortString(ch)
      return { type: 'string', value, start, end: this.pos }
    }

    if (ch === '[') {
      const long = this.longBracketAt(start)
      if (long) {
        this.pos += long.length
        const value = Buffer.from(this.readLongBody(long.level, start, 'string'), this.encoding).toString('utf8')
        return { type: 'string', value, start, end: this.pos }
      }
    }

    if (isPunct(ch)) {
      this.pos++
      return { type: 'punct', value: ch, start, end: this.pos }
    }

    return this.error(`unexpected character ${JSON.stringify(ch)}`)
  }

  private readNumber(start: number): Token {
    HEX_NUMBER.lastIndex = start
    const hex = HEX_NUMBER.exec(this.text)
    if (hex) {
      this.pos = start + hex[0].length
      const value = hex[0].includes('.') || /[pP]/.test(hex[0]) ? parseHexFloat(hex[0]) : Number.parseInt(hex[0].slice(2), 16)
      this.assertNumberEnd(start)
      return { type: 'number', value, start, end: this.pos }
    }
    DEC_NUMBER.lastIndex = start
    const dec = DEC_NUMBER.exec(this.text)
    if (!dec) return this.error('malformed number', start)
    this.pos = start + dec[0].length
    this.assertNumberEnd(start)
    return { type: 'number', value: Number(dec[0]), start, end: this.pos }
  }

  private assertNumberEnd(start: number): void {
    const ch = this.peekChar()
    if (ch && /[A-Za-z0-9_.]/.test(ch)) this.error('malformed number', start)
  }

  private readShortString(quote: string): string {
    const openedAt = this.pos
    this.pos++
    const parts: Buffer[] = []
    let runStart = this.pos

    const flushRun = (): void => {
      if (this.pos > runStart) parts.push(Buffer.from(this.text.slice(runStart, this.pos), this.encoding))
    }

    while (true) {
      if (this.pos >= this.text.length) this.error('unfinished string', openedAt)
      const ch = this.peekChar()
      if (ch === quote) {
        flushRun()
        this.pos++
        return Buffer.concat(parts).toString('utf8')
      }
      if (ch === '\n' || ch === '\r') this.error('unfinished string', openedAt)
      if (ch !== '\\') {
        this.pos++
        continue
      }

      flushRun()
      parts.push(Buffer.from(this.readEscape()))
      runStart = this.pos
    }
  }

  /** `pos` is at the backslash. Returns the escaped bytes and advances. */
  private readEscape(): number[] {
    const escAt = this.pos
    this.pos++
    const e = this.peekChar()

    const simple = SIMPLE_ESCAPES[e]
    if (simple !== undefined) {
      this.pos++
      return [simple]
    }

    if (e === '\n' || e === '\r') {
      // Escaped line break; \r\n and \n\r count as one.
      this.pos++
      const other = e === '\n' ? '\r' : '\n'
      if (this.peekChar() === other) this.pos++
      return [10]
    }

    if (e === 'x') {
      const hex = this.text.slice(this.pos + 1, this.pos + 3)
      if (!/^[0-9a-fA-F]{2}$/.test(hex)) this.error('hexadecimal digit expected', escAt)
      this.pos += 3
      return [Number.parseInt(hex, 16)]
    }

    if (e === 'z') {
      this.pos++
      while (this.pos < this.text.length && isSpace(this.peekChar())) this.pos++
      return []
    }

    if (e === 'u') {
      const m = /^\{([0-9a-fA-F]+)\}/.exec(this.text.slice(this.pos + 1, this.pos + 12))
      const digits = m?.[1]
      if (!m || !digits) return this.error('malformed \\u escape', escAt)
      const cp = Number.parseInt(digits, 16)
      if (cp > 0x10ffff) this.error('UTF-8 value too large', escAt)
      this.pos += 1 + m[0].length
      return [...Buffer.from(String.fromCodePoint(cp), 'utf8')]
    }

    if (/\d/.test(e)) {
      const digits = /^\d{1,3}/.exec(this.text.slice(this.pos, this.pos + 3))?.[0] ?? e
      const value = Number.parseInt(digits, 10)
      if (value > 255) this.error('decimal escape too large', escAt)
      this.pos += digits.length
      return [value]
    }

    return this.error('invalid escape sequence', escAt)
  }
}

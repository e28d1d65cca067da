/**
 * In-memory model of a SavedVariables file, split around the builds table.
 *
 *   head      source text up to and including the builds table's `{`
 *   entries   the table's fields, in source order
 *   tail      source text from the end of the last field to EOF
 *
 * All source text is held one character per file byte (latin1), so bytes that
 * are not valid UTF-8 survive a rewrite. Generated text is encoded to UTF-8
 * bytes before it joins the document.
 *
 * Each entry keeps the whitespace/comments in front of it (`leading`). Opaque
 * entries are never interpreted: they are written back as the exact source
 * slice they were read from. Managed entries (label ends with the marker) are
 * parsed, and re-rendered only once they have been replaced.
 *
 * Placement policy:
 * - a replaced managed entry keeps its position
 * - a new managed entry is appended after the last entry
 * - a removed managed entry takes its `leading` text with it
 */

import { LuaSyntaxError, lineColumn } from '../lua/lexer.js'
import { parseLua, scalarOf, type LuaChunk, type LuaField, type LuaScalar, type LuaTable } from '../lua/parser.js'
import { luaKey, luaScalar } from '../lua/serialize.js'
import { ParseError, SchemaError } from '../utils/errors.js'
import { DEFAULT_MARKER, isManagedLabel } from './labels.js'

export const DEFAULT_TABLE_PATH = 'ArchonBuildsDB'

export interface ManagedEntry {
  label: string
  buildCode: string
  /** Extra scalar fields written after `code`, in order. */
  fields: Array<[string, LuaScalar]>
}

export interface OpaqueEntry {
  kind: 'opaque'
  label: string
  leading: string
  /** Source bytes of the field, latin1-decoded. */
  text: string
  hasSeparator: boolean
}

export interface ManagedNode {
  kind: 'managed'
  label: string
  leading: string
  entry: ManagedEntry
  /** Source text while the entry is unchanged; cleared on replace. */
  text?: string
  hasSeparator: boolean
}

export type DocumentEntry = OpaqueEntry | ManagedNode

export interface PersistedDocument {
  filePath: string
  tablePath: string
  marker: string
  /** The file as read, latin1-decoded. */
  source: string
  head: string
  entries: DocumentEntry[]
  tail: string
  /** Indentation for entries of the builds table. */
  indent: string
  /** Indentation of the builds table's closing brace. */
  closeIndent: string
  eol: string
  /** false until the builds table is created by the first write. */
  tableExists: boolean
}

export interface DocumentOptions {
  filePath: string
  tablePath?: string
  marker?: string
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/

/** UTF-8 bytes of `text`, as a latin1 string that can be spliced into the source. */
function toBytes(text: string): string {
  return Buffer.from(text, 'utf8').toString('latin1')
}

function lineIndent(text: string, offset: number): string {
  const lineStart = text.lastIndexOf('\n', offset - 1) + 1
  return /^[ \t]*/.exec(text.slice(lineStart, offset))?.[0] ?? ''
}

function describeKind(field: LuaField): string {
  return field.value.kind
}

function splitTablePath(filePath: string, tablePath: string): [string, string[]] {
  const [global, ...rest] = tablePath.split('.')
  if (!global || !IDENTIFIER.test(global) || rest.some((s) => !s)) {
    throw new SchemaError(filePath, `invalid table path "${tablePath}"`)
  }
  return [global, rest]
}

/** Last field with the given key; Lua keeps the last duplicate. */
function findField(table: LuaTable, key: string): LuaField | undefined {
  for (let i = table.fields.length - 1; i >= 0; i--) {
    const f = table.fields[i]
    if (f && f.key === key) return f
  }
  return undefined
}

function parseManaged(filePath: string, label: string, field: LuaField): ManagedEntry {
  const value = field.value
  if (value.kind !== 'table') {
    throw new SchemaError(filePath, `managed entry "${label}" must be a table (found ${describeKind(field)})`)
  }
  let buildCode: string | undefined
  const fields: ManagedEntry['fields'] = []
  for (const f of value.fields) {
    const scalar = scalarOf(f.value)
    if (typeof f.key !== 'string' || scalar === undefined) {
      throw new SchemaError(filePath, `managed entry "${label}" may only contain named scalar fields`)
    }
    if (f.key === 'code') {
      if (typeof scalar !== 'string') throw new SchemaError(filePath, `managed entry "${label}" has a non-string code`)
      buildCode = scalar
    } else {
      fields.push([f.key, scalar])
    }
  }
  if (buildCode === undefined) throw new SchemaError(filePath, `managed entry "${label}" has no code field`)
  return { label, buildCode, fields }
}

function readEntries(text: string, table: LuaTable, filePath: string, tablePath: string, marker: string): {
  entries: DocumentEntry[]
  tail: string
} {
  const entries: DocumentEntry[] = []
  const managedLabels = new Set<string>()
  let prevEnd = table.start + 1

  for (const f of table.fields) {
    if (typeof f.key !== 'string') {
      const where = f.key === null ? 'a positional field' : `a non-string key ${String(f.key)}`
      throw new SchemaError(filePath, `"${tablePath}" has ${where}; expected a table of labelled entries`)
    }
    const leading = text.slice(prevEnd, f.start)
    const body = text.slice(f.start, f.end)
    prevEnd = f.end

    if (isManagedLabel(f.key, marker)) {
      if (managedLabels.has(f.key)) throw new SchemaError(filePath, `duplicate managed entry "${f.key}"`)
      managedLabels.add(f.key)
      const entry = parseManaged(filePath, f.key, f)
      entries.push({ kind: 'managed', label: f.key, leading, entry, text: body, hasSeparator: f.hasSeparator })
    } else {
      entries.push({ kind: 'opaque', label: f.key, leading, text: body, hasSeparator: f.hasSeparator })
    }
  }

  return { entries, tail: text.slice(prevEnd) }
}

/** Indentation used by the existing entries, or one level below the table. */
function inferIndent(entries: DocumentEntry[], tableIndent: string): string {
  const first = entries[0]
  if (first) {
    const nl = first.leading.lastIndexOf('\n')
    const lastLine = nl >= 0 ? first.leading.slice(nl + 1) : ''
    if (nl >= 0 && /^[ \t]+$/.test(lastLine)) return lastLine
  }
  return `${tableIndent}\t`
}

/**
 * Parse SavedVariables text into a document.
 *
 * Throws `ParseError` for invalid Lua and `SchemaError` when the builds table
 * has the wrong shape.
 */
export function parseDocument(input: string | Buffer, opts: DocumentOptions): PersistedDocument {
  const { filePath } = opts
  const text = (typeof input === 'string' ? Buffer.from(input, 'utf8') : input).toString('latin1')
  const tablePath = opts.tablePath || DEFAULT_TABLE_PATH
  const marker = opts.marker || DEFAULT_MARKER
  const eol = text.includes('\r\n') ? '\r\n' : '\n'
  const [global, nested] = splitTablePath(filePath, tablePath)

  let chunk: LuaChunk
  try {
    chunk = parseLua(text, { bytes: true })
  } catch (err) {
    if (err instanceof LuaSyntaxError) {
      const { line, column } = lineColumn(text, err.offset)
      throw new ParseError(filePath, line, column, err.message)
    }
    throw err
  }

  const base = { filePath, tablePath, marker, source: text, eol }
  const assignment = chunk.assignments.filter((a) => a.name === global).pop()

  if (!assignment) {
    // New global appended at EOF: `Global = {` ... nested keys ... `}`.
    const prefix = text.length > 0 && !text.endsWith('\n') ? text + eol : text
    let head = `${prefix}${global} = {`
    let tail = `${eol}}${eol}`
    nested.forEach((key, i) => {
      const pad = '\t'.repeat(i + 1)
      head += `${eol}${pad}${toBytes(luaKey(key))} = {`
      tail = `${eol}${pad}},` + tail
    })
    return {
      ...base,
      head,
      entries: [],
      tail,
      indent: '\t'.repeat(nested.length + 1),
      closeIndent: '\t'.repeat(nested.length),
      tableExists: false
    }
  }

  if (assignment.value.kind !== 'table') {
    throw new SchemaError(filePath, `"${global}" is ${assignment.value.kind}, expected a table`)
  }

  let table: LuaTable = assignment.value
  for (let depth = 0; depth < nested.length; depth++) {
    const key = nested[depth] ?? ''
    const field = findField(table, key)
    if (!field) return createNested(text, table, nested.slice(depth), base)
    if (field.value.kind !== 'table') {
      const at = [global, ...nested.slice(0, depth + 1)].join('.')
      throw new SchemaError(filePath, `"${at}" is ${describeKind(field)}, expected a table`)
    }
    table = field.value
  }

  const { entries, tail } = readEntries(text, table, filePath, tablePath, marker)
  const tableIndent = lineIndent(text, table.start)
  return {
    ...base,
    head: text.slice(0, table.start + 1),
    entries,
    tail,
    indent: inferIndent(entries, tableIndent),
    closeIndent: tableIndent,
    tableExists: true
  }
}

/** Builds table missing below an existing `parent`: insert it as the parent's last field. */
function createNested(
  text: string,
  parent: LuaTable,
  missing: string[],
  base: Pick<PersistedDocument, 'filePath' | 'tablePath' | 'marker' | 'source' | 'eol'>
): PersistedDocument {
  const { eol } = base
  const last = parent.fields[parent.fields.length - 1]
  const insertAt = last ? last.end : parent.start + 1
  const parentIndent = lineIndent(text, parent.start)

  let head = text.slice(0, insertAt) + (last && !last.hasSeparator ? ',' : '')
  let tail = ''
  missing.forEach((key, i) => {
    const pad = parentIndent + '\t'.repeat(i + 1)
    head += `${eol}${pad}${toBytes(luaKey(key))} = {`
    tail = `${eol}${pad}},` + tail
  })
  tail += text.slice(insertAt)

  return {
    ...base,
    head,
    entries: [],
    tail,
    indent: parentIndent + '\t'.repeat(missing.length + 1),
    closeIndent: parentIndent + '\t'.repeat(missing.length),
    tableExists: false
  }
}

export function renderManagedEntry(entry: ManagedEntry, indent: string, eol = '\n'): string {
  const inner = `${indent}\t`
  const lines = [`${luaKey(entry.label)} = {`, `${inner}${luaKey('code')} = ${luaScalar(entry.buildCode)},`]
  for (const [key, value] of entry.fields) {
    lines.push(`${inner}${luaKey(key)} = ${luaScalar(value)},`)
  }
  lines.push(`${indent}},`)
  return lines.join(eol)
}

export function managedEntries(doc: PersistedDocument): ManagedEntry[] {
  const out: ManagedEntry[] = []
  for (const e of doc.entries) if (e.kind === 'managed') out.push(e.entry)
  return out
}

export function opaqueEntries(doc: PersistedDocument): OpaqueEntry[] {
  return doc.entries.filter((e): e is OpaqueEntry => e.kind === 'opaque')
}

/** Remove every managed entry. Returns how many were removed. */
export function clearManaged(doc: PersistedDocument): number {
  const before = doc.entries.length
  doc.entries = doc.entries.filter((e) => e.kind === 'opaque')
  return before - doc.entries.length
}

/**
 * Insert or replace the managed entry with the same label.
 * Returns 'replaced' or 'added'.
 */
export function upsert(doc: PersistedDocument, entry: ManagedEntry): 'added' | 'replaced' {
  if (!isManagedLabel(entry.label, doc.marker)) {
    throw new Error(`[build-sync] label "${entry.label}" does not end with the managed marker "${doc.marker}"`)
  }
  const existing = doc.entries.find((e): e is ManagedNode => e.kind === 'managed' && e.label === entry.label)
  if (existing) {
    existing.entry = entry
    existing.text = undefined
    existing.hasSeparator = true
    return 'replaced'
  }
  doc.entries.push({
    kind: 'managed',
    label: entry.label,
    leading: doc.eol + doc.indent,
    entry,
    hasSeparator: true
  })
  return 'added'
}

/**
 * Render the document to file bytes. Unchanged regions are copied from the
 * source, so a document nobody modified comes back byte-identical.
 */
export function serializeDocument(doc: PersistedDocument): Buffer {
  if (!doc.tableExists && doc.entries.length === 0) return Buffer.from(doc.source, 'latin1')

  const parts: string[] = [doc.head]
  doc.entries.forEach((e, i) => {
    const body =
      e.kind === 'managed' && e.text === undefined ? toBytes(renderManagedEntry(e.entry, doc.indent, doc.eol)) : e.text
    parts.push(e.leading, body ?? '')
    if (!e.hasSeparator && i < doc.entries.length - 1) parts.push(',')
  })

  const last = doc.entries[doc.entries.length - 1]
  const lastGenerated = last?.kind === 'managed' && last.text === undefined
  if (lastGenerated && !/^[ \t]*\r?\n/.test(doc.tail)) parts.push(doc.eol + doc.closeIndent)

  parts.push(doc.tail)
  return Buffer.from(parts.join(''), 'latin1')
}

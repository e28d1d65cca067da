/**
 * SavedVariables file I/O.
 *
 * Reads go through `parseDocument()`; writes are atomic (temp file + rename)
 * so an interrupted run never leaves a half-written file behind.
 */

import fs from 'node:fs'
import path from 'node:path'
import { WriteError } from '../utils/errors.js'
import { parseDocument, serializeDocument, type DocumentOptions, type PersistedDocument } from './document.js'

export type LoadOptions = Omit<DocumentOptions, 'filePath'>

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

/**
 * Load a SavedVariables file. A file that does not exist yet loads as an empty
 * document (the addon has not saved anything so far).
 */
export function loadDocument(filePath: string, opts: LoadOptions = {}): PersistedDocument {
  let bytes = Buffer.alloc(0)
  try {
    bytes = fs.readFileSync(filePath)
  } catch (err) {
    if (!isMissingFile(err)) throw err
  }
  return parseDocument(bytes, { ...opts, filePath })
}

/** Write `data` to `filePath` atomically. Returns the number of bytes written. */
export function writeFileAtomic(filePath: string, data: Buffer): number {
  const dir = path.dirname(filePath)
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`)
  try {
    fs.mkdirSync(dir, { recursive: true })
    fs.writeFileSync(tmpPath, data)
    fs.renameSync(tmpPath, filePath)
    return data.length
  } catch (err) {
    if (fs.existsSync(tmpPath)) fs.rmSync(tmpPath, { force: true })
    throw new WriteError(filePath, err)
  }
}

export function saveDocument(doc: PersistedDocument): number {
  return writeFileAtomic(doc.filePath, serializeDocument(doc))
}

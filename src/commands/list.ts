/**
 * `build-sync list`: show the managed builds currently stored in a
 * SavedVariables file.
 */

import path from 'node:path'
import type { ToolConfig } from '../config/config.js'
import { managedEntries, opaqueEntries } from '../store/document.js'
import { loadDocument } from '../store/store.js'
import type { CommandContext, ListOptions } from '../types.js'

export function listCommand(ctx: CommandContext, options: ListOptions, config?: ToolConfig | null): string[] {
  const filePath = path.isAbsolute(options.outputPath) ? options.outputPath : path.join(ctx.cwd, options.outputPath)
  const doc = loadDocument(filePath, { tablePath: config?.store?.tablePath, marker: config?.store?.marker })

  const lines = managedEntries(doc).map((e) => `${e.label}\t${e.buildCode}`)
  ctx.log.log(lines.length ? lines.join('\n') : '(no managed builds)')
  ctx.log.info(`[build-sync] ${lines.length} managed, ${opaqueEntries(doc).length} other entries in ${filePath}`)
  return lines
}

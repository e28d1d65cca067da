/**
 * `build-sync sync`: fetch the selected builds and merge them into the
 * SavedVariables file.
 */

import path from 'node:path'
import type { ToolConfig } from '../config/config.js'
import { readSelectionFile } from '../config/selection.js'
import { createTextRequest } from '../http/fetch.js'
import { networkOptions } from '../http/network.js'
import { createRateLimiter } from '../http/rate-limiter.js'
import { logTargetResult } from '../log/run-log.js'
import { ArchonClient } from '../source/archon/client.js'
import { fileDocumentStore, runSync } from '../sync/orchestrator.js'
import type { CommandContext, RunReport, Selection, SyncOptions } from '../types.js'
import { AsyncQueue } from '../utils/async-queue.js'

function resolveFrom(cwd: string, p: string): string {
  return path.isAbsolute(p) ? p : path.join(cwd, p)
}

export async function syncCommand(ctx: CommandContext, options: SyncOptions, config?: ToolConfig | null): Promise<RunReport> {
  const loaded = readSelectionFile(resolveFrom(ctx.cwd, options.selectionPath))
  const selection: Selection = {
    ...loaded,
    outputPath: resolveFrom(ctx.cwd, options.outputPath ?? loaded.outputPath),
    clearPreviousBuilds: loaded.clearPreviousBuilds || options.clear
  }

  ctx.log.info(
    `[build-sync] sync: characters=${selection.characters.length} output=${selection.outputPath} ` +
      `clear=${selection.clearPreviousBuilds} concurrency=${options.concurrency} rps=${options.requestsPerSecond}`
  )

  const fetcher = new ArchonClient({
    limiter: createRateLimiter(options.requestsPerSecond),
    queue: new AsyncQueue(options.concurrency),
    timeoutMs: options.timeoutMs,
    noDataStatuses: config?.fetch?.noDataStatuses,
    request: createTextRequest(networkOptions(config)),
    endpoints: { baseUrl: config?.fetch?.baseUrl, mythicPlusBracket: config?.fetch?.mythicPlusBracket },
    log: ctx.log
  })

  const report = await runSync(selection, {
    fetcher,
    store: fileDocumentStore({ tablePath: config?.store?.tablePath, marker: config?.store?.marker }),
    concurrency: options.concurrency,
    log: ctx.log,
    onResult: logTargetResult
  })

  ctx.log.log(report.message)
  return report
}

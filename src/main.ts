/**
 * CLI router: argv -> config -> command handler.
 */

import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { listCommand } from './commands/list.js'
import { syncCommand } from './commands/sync.js'
import { loadToolConfig } from './config/config.js'
import { closeRunLog, initRunLog } from './log/run-log.js'
import { parseCliArgs } from './utils/cli-args.js'
import { formatError } from './utils/errors.js'
import type { CommandContext } from './types.js'

const __filename = fileURLToPath(import.meta.url)
const __dirname = path.dirname(__filename)

function getProjectRoot(): string {
  // dist/ (or src/) -> project root
  return path.resolve(__dirname, '..')
}

/**
 * Entrypoint used by cli.ts.
 */
export async function runCli(argv: string[]): Promise<void> {
  const projectRoot = getProjectRoot()
  const config = loadToolConfig(projectRoot)
  const parsed = parseCliArgs(argv, config ?? undefined)
  if (!parsed.ok) {
    console.error(parsed.error)
    process.exitCode = 1
    return
  }

  const ctx: CommandContext = {
    projectRoot,
    cwd: process.cwd(),
    now: new Date(),
    log: console
  }

  const cmd = parsed.data
  if (cmd.command === 'help') {
    console.log(cmd.helpText)
    return
  }

  const logFile = initRunLog({ projectRoot: ctx.projectRoot, now: ctx.now, command: cmd.command })
  try {
    switch (cmd.command) {
      case 'sync':
        await syncCommand(ctx, cmd.options, config)
        break
      case 'list':
        listCommand(ctx, cmd.options, config)
        break
    }
    if (logFile) ctx.log.info(`[build-sync] run log: ${logFile}`)
  } catch (err) {
    console.error(formatError(err))
    process.exitCode = 1
  } finally {
    closeRunLog()
  }
}

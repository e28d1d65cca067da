/**
 * Error types and formatting helpers.
 *
 * Document-level failures (validation, parse, schema, write) abort a run.
 * Per-target failures are values (`FetchOutcome`) and never use these classes.
 */

export class SyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Invalid class/spec/content in a selection. Raised before any I/O. */
export class ValidationError extends SyncError {
  readonly problems: string[]

  constructor(problems: string[]) {
    super(`Invalid selection:\n${problems.map((p) => `  - ${p}`).join('\n')}`)
    this.problems = problems
  }
}

/** The persisted file is not a valid Lua table literal. */
export class ParseError extends SyncError {
  constructor(
    readonly filePath: string,
    readonly line: number,
    readonly column: number,
    detail: string
  ) {
    super(`${filePath}:${line}:${column}: ${detail}`)
  }
}

/** The persisted file parses but does not have the expected shape. */
export class SchemaError extends SyncError {
  constructor(
    readonly filePath: string,
    detail: string
  ) {
    super(`${filePath}: ${detail}`)
  }
}

export class WriteError extends SyncError {
  constructor(
    readonly filePath: string,
    cause: unknown
  ) {
    super(`Failed to write ${filePath}: ${errorMessage(cause)}`, { cause })
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export function formatError(err: unknown): string {
  // Our own errors carry enough context; stacks only help for unexpected ones.
  if (err instanceof SyncError) return `${err.name}: ${err.message}`
  if (err instanceof Error) {
    const stack = err.stack || String(err)
    return stack
  }
  return String(err)
}

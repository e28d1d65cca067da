/**
 * Lua literal rendering, in the style WoW uses when it writes SavedVariables.
 */

import type { LuaScalar } from './parser.js'

/** Double-quoted Lua string; control characters become `\ddd` escapes. */
export function luaString(value: string): string {
  let out = '"'
  for (const ch of value) {
    const code = ch.codePointAt(0) ?? 0
    if (ch === '\\') out += '\\\\'
    else if (ch === '"') out += '\\"'
    else if (ch === '\n') out += '\\n'
    else if (ch === '\r') out += '\\r'
    else if (code < 0x20 || code === 0x7f) out += `\\${String(code).padStart(3, '0')}`
    else out += ch
  }
  return out + '"'
}

export function luaScalar(value: LuaScalar): string {
  if (typeof value === 'string') return luaString(value)
  if (typeof value === 'boolean') return value ? 'true' : 'false'
  if (!Number.isFinite(value)) throw new Error(`cannot write non-finite number ${value}`)
  return String(value)
}

/** `["key"]` / `[1]` */
export function luaKey(key: LuaScalar): string {
  return `[${luaScalar(key)}]`
}

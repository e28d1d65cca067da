/**
 * Selection file loader.
 *
 * Shape:
 *   {
 *     "characters": [{ "name": "Thrall", "class": "Warrior", "specializations": ["arms"] }],
 *     "raidDifficulties": ["heroic"],
 *     "raidBosses": ["broodtwister"],
 *     "dungeons": ["ara-kara"],
 *     "clearPreviousBuilds": false,
 *     "outputPath": "WTF/Account/NAME/SavedVariables/ArchonBuilds.lua"
 *   }
 *
 * Only the shape is checked here; class/spec/content names are checked by
 * `validateSelection()` before a run starts. JSON syntax errors propagate as-is.
 */

import fs from 'node:fs'
import type { Character, Selection } from '../types.js'
import { ValidationError } from '../utils/errors.js'

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

function stringList(problems: string[], v: unknown, field: string): string[] {
  if (v === undefined) return []
  if (!Array.isArray(v) || v.some((s) => typeof s !== 'string')) {
    problems.push(`${field} must be an array of strings`)
    return []
  }
  return v.filter((s): s is string => typeof s === 'string').map((s) => s.trim())
}

function toCharacter(problems: string[], v: unknown, i: number): Character | null {
  if (!isRecord(v)) {
    problems.push(`characters[${i}] must be an object`)
    return null
  }
  const name = typeof v.name === 'string' ? v.name.trim() : ''
  const className = typeof v.class === 'string' ? v.class.trim() : ''
  if (!name) problems.push(`characters[${i}].name is required`)
  if (!className) problems.push(`characters[${i}].class is required`)
  const specializations = stringList(problems, v.specializations, `characters[${i}].specializations`)
  if (!name || !className) return null
  return { name, className, specializations }
}

export function toSelection(raw: unknown): Selection {
  const problems: string[] = []
  if (!isRecord(raw)) throw new ValidationError(['selection must be a JSON object'])

  const characters: Character[] = []
  if (!Array.isArray(raw.characters)) {
    problems.push('characters must be an array')
  } else {
    raw.characters.forEach((c, i) => {
      const ch = toCharacter(problems, c, i)
      if (ch) characters.push(ch)
    })
  }

  const outputPath = typeof raw.outputPath === 'string' ? raw.outputPath.trim() : ''
  if (!outputPath) problems.push('outputPath is required')

  if (raw.clearPreviousBuilds !== undefined && typeof raw.clearPreviousBuilds !== 'boolean') {
    problems.push('clearPreviousBuilds must be true or false')
  }

  const selection: Selection = {
    characters,
    raidDifficulties: stringList(problems, raw.raidDifficulties, 'raidDifficulties'),
    raidBosses: stringList(problems, raw.raidBosses, 'raidBosses'),
    dungeons: stringList(problems, raw.dungeons, 'dungeons'),
    clearPreviousBuilds: raw.clearPreviousBuilds === true,
    outputPath
  }

  if (problems.length > 0) throw new ValidationError(problems)
  return selection
}

export function readSelectionFile(filePath: string): Selection {
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'))
  return toSelection(parsed)
}

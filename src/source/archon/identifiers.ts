/**
 * Class / spec / content name -> archon.gg URL token mapping.
 *
 * Pure lookups over fixed tables. Unknown names are configuration errors and are
 * rejected up front by `validateSelection()`, before any network activity.
 */

import type { RaidDifficulty, Selection } from '../../types.js'
import { ValidationError } from '../../utils/errors.js'

const CLASS_SPECS: Record<string, readonly string[]> = {
  'death-knight': ['blood', 'frost', 'unholy'],
  'demon-hunter': ['havoc', 'vengeance'],
  druid: ['balance', 'feral', 'guardian', 'restoration'],
  evoker: ['augmentation', 'devastation', 'preservation'],
  hunter: ['beast-mastery', 'marksmanship', 'survival'],
  mage: ['arcane', 'fire', 'frost'],
  monk: ['brewmaster', 'mistweaver', 'windwalker'],
  paladin: ['holy', 'protection', 'retribution'],
  priest: ['discipline', 'holy', 'shadow'],
  rogue: ['assassination', 'outlaw', 'subtlety'],
  shaman: ['elemental', 'enhancement', 'restoration'],
  warlock: ['affliction', 'demonology', 'destruction'],
  warrior: ['arms', 'fury', 'protection']
}

const DIFFICULTIES: readonly RaidDifficulty[] = ['normal', 'heroic', 'mythic']

const CANONICAL_NAME = /^[a-z0-9]+(?:-[a-z0-9]+)*$/

/** "Death Knight" / "death-knight" / "DEATH_KNIGHT" -> "deathknight" */
function squash(name: string): string {
  return name.toLowerCase().replace(/[\s_-]+/g, '')
}

const CLASS_BY_SQUASHED = new Map(Object.keys(CLASS_SPECS).map((token) => [squash(token), token]))

export function isKnownClass(className: string): boolean {
  return CLASS_BY_SQUASHED.has(squash(className))
}

export function knownClassTokens(): string[] {
  return Object.keys(CLASS_SPECS)
}

export function classToken(className: string): string {
  const token = CLASS_BY_SQUASHED.get(squash(className))
  if (!token) throw new ValidationError([`unknown class "${className}"`])
  return token
}

export function specToken(className: string, specialization: string): string {
  const cls = classToken(className)
  const wanted = squash(specialization)
  const token = CLASS_SPECS[cls]?.find((s) => squash(s) === wanted)
  if (!token) {
    throw new ValidationError([`"${specialization}" is not a ${cls} specialization`])
  }
  return token
}

function canonicalToken(kind: string, name: string): string {
  if (!CANONICAL_NAME.test(name)) {
    throw new ValidationError([`${kind} "${name}" must be lowercase-hyphenated (e.g. "ara-kara")`])
  }
  return name
}

export function bossToken(name: string): string {
  return canonicalToken('boss', name)
}

export function dungeonToken(name: string): string {
  return canonicalToken('dungeon', name)
}

export function difficultyToken(name: string): RaidDifficulty {
  const lower = name.toLowerCase()
  const found = DIFFICULTIES.find((d) => d === lower)
  if (!found) {
    throw new ValidationError([`unknown raid difficulty "${name}" (expected ${DIFFICULTIES.join(', ')})`])
  }
  return found
}

function collect(problems: string[], check: () => void, prefix = ''): void {
  try {
    check()
  } catch (err) {
    if (!(err instanceof ValidationError)) throw err
    problems.push(...err.problems.map((p) => prefix + p))
  }
}

/**
 * Check every class/spec/content name in a selection.
 *
 * All problems are gathered so the user can fix the config in one pass.
 */
export function validateSelection(selection: Selection): void {
  const problems: string[] = []
  const declared = new Set<string>()

  for (const ch of selection.characters) {
    if (!isKnownClass(ch.className)) {
      problems.push(`character "${ch.name}": unknown class "${ch.className}" (expected one of ${knownClassTokens().join(', ')})`)
      continue
    }
    const cls = classToken(ch.className)
    const key = `${ch.name}\u0000${cls}`
    if (declared.has(key)) {
      problems.push(`character "${ch.name}" (${cls}) is declared more than once`)
    }
    declared.add(key)
    if (ch.specializations.length === 0) {
      problems.push(`character "${ch.name}": no specializations declared`)
    }
    for (const spec of ch.specializations) {
      collect(problems, () => specToken(ch.className, spec), `character "${ch.name}": `)
    }
  }

  for (const d of selection.raidDifficulties) collect(problems, () => difficultyToken(d))
  for (const b of selection.raidBosses) collect(problems, () => bossToken(b))
  for (const d of selection.dungeons) collect(problems, () => dungeonToken(d))

  if (selection.raidBosses.length > 0 && selection.raidDifficulties.length === 0) {
    problems.push('raidBosses are declared but raidDifficulties is empty')
  }

  if (problems.length > 0) throw new ValidationError(problems)
}

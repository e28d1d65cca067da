/**
 * Selection -> work list.
 *
 * Order: character, then spec, then raid targets (boss x difficulty), then
 * dungeon targets. Dungeon targets start on the current period; the fallback
 * target is created by the orchestrator when needed.
 */

import type { FetchTarget, RaidDifficulty, Selection } from '../types.js'
import { difficultyToken, specToken } from '../source/archon/identifiers.js'

function unique<T>(items: T[]): T[] {
  return Array.from(new Set(items))
}

export function expandSelection(selection: Selection): FetchTarget[] {
  const difficulties: RaidDifficulty[] = unique(selection.raidDifficulties.map(difficultyToken))
  const bosses = unique(selection.raidBosses)
  const dungeons = unique(selection.dungeons)
  const targets: FetchTarget[] = []

  for (const character of selection.characters) {
    // "Beast Mastery" and "beast-mastery" are the same spec; keep the first spelling.
    const seen = new Set<string>()
    for (const specialization of character.specializations) {
      const token = specToken(character.className, specialization)
      if (seen.has(token)) continue
      seen.add(token)

      for (const boss of bosses) {
        for (const difficulty of difficulties) {
          targets.push({ character, specialization, content: { kind: 'raid', boss, difficulty } })
        }
      }
      for (const dungeon of dungeons) {
        targets.push({ character, specialization, content: { kind: 'dungeon', dungeon }, period: 'this-week' })
      }
    }
  }

  return targets
}

/**
 * Managed entry labels.
 *
 * The label is derived only from (character, class, spec, content identity)
 * and ends with the marker, so it doubles as the entry's key: two targets that
 * should share an entry always produce the same label. The class keeps
 * same-named characters apart when their specs share a name (Frost Mage,
 * Frost Death Knight).
 *
 *   "Thrall - Arms Warrior - Broodtwister (Heroic) [Archon]"
 *   "Thrall - Arms Warrior - Ara Kara (M+) [Archon]"
 */

import type { FetchTarget } from '../types.js'
import { classToken, specToken } from '../source/archon/identifiers.js'
import type { ManagedEntry } from './document.js'

export const DEFAULT_MARKER = ' [Archon]'

/** "beast-mastery" -> "Beast Mastery" */
export function titleize(token: string): string {
  return token
    .split('-')
    .filter(Boolean)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(' ')
}

export function isManagedLabel(label: string, marker: string = DEFAULT_MARKER): boolean {
  return label.endsWith(marker) && label.length > marker.length
}

export function managedLabel(target: FetchTarget, marker: string = DEFAULT_MARKER): string {
  const cls = titleize(classToken(target.character.className))
  const spec = titleize(specToken(target.character.className, target.specialization))
  const content = target.content
  const what =
    content.kind === 'raid'
      ? `${titleize(content.boss)} (${titleize(content.difficulty)})`
      : `${titleize(content.dungeon)} (M+)`
  return `${target.character.name} - ${spec} ${cls} - ${what}${marker}`
}

/**
 * Build the entry written for a found build. Dungeon entries record which
 * period the code came from; the period is not part of the label.
 */
export function buildManagedEntry(target: FetchTarget, buildCode: string, marker: string = DEFAULT_MARKER): ManagedEntry {
  const content = target.content
  const fields: ManagedEntry['fields'] = [
    ['character', target.character.name],
    ['class', classToken(target.character.className)],
    ['spec', specToken(target.character.className, target.specialization)],
    ['content', content.kind]
  ]
  if (content.kind === 'raid') {
    fields.push(['encounter', content.boss], ['difficulty', content.difficulty])
  } else {
    fields.push(['encounter', content.dungeon], ['period', target.period ?? 'this-week'])
  }
  return { label: managedLabel(target, marker), buildCode, fields }
}

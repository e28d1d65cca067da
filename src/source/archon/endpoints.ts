/**
 * archon.gg endpoint helpers.
 *
 * Page layout (as of the current season):
 * - raid:    {base}/{spec}/{class}/raid/talents/{difficulty}/{boss}
 * - dungeon: {base}/{spec}/{class}/mythic-plus/talents/{bracket}/{dungeon}/{this-week|last-week}
 */

import type { FetchTarget } from '../../types.js'
import { bossToken, classToken, dungeonToken, specToken } from './identifiers.js'

export const DEFAULT_ARCHON_BASE = 'https://www.archon.gg/wow/builds'
export const DEFAULT_MYTHIC_PLUS_BRACKET = '10'

export interface ArchonEndpointOptions {
  baseUrl?: string
  mythicPlusBracket?: string
}

export function archonBase(opts?: ArchonEndpointOptions): string {
  return (opts?.baseUrl || DEFAULT_ARCHON_BASE).replace(/\/+$/, '')
}

export function archonTargetUrl(target: FetchTarget, opts?: ArchonEndpointOptions): string {
  const cls = classToken(target.character.className)
  const spec = specToken(target.character.className, target.specialization)
  const prefix = `${archonBase(opts)}/${spec}/${cls}`

  const content = target.content
  if (content.kind === 'raid') {
    return `${prefix}/raid/talents/${content.difficulty}/${bossToken(content.boss)}`
  }

  const bracket = opts?.mythicPlusBracket || DEFAULT_MYTHIC_PLUS_BRACKET
  const period = target.period ?? 'this-week'
  return `${prefix}/mythic-plus/talents/${bracket}/${dungeonToken(content.dungeon)}/${period}`
}

/**
 * Locate the talent build code on an archon.gg build page.
 *
 * The page links its recommended build to the Wowhead talent calculator:
 *   <a href="https://www.wowhead.com/talent-calc/blizzard/warrior/arms/C4tAA...">
 *
 * This is the only place that knows the page structure; if archon changes its
 * markup, only this module should need to change.
 */

import { load } from 'cheerio'

export const TALENT_CALC_MARKER = 'wowhead.com/talent-calc/blizzard/'

// Loadout strings use the base64 alphabet, so the code runs to the end of the path.
const TALENT_CALC_PATH = /wowhead\.com\/talent-calc\/blizzard\/([^/?#]+)\/([^/?#]+)\/([^?#]+)/

export interface TalentLink {
  classToken: string
  specToken: string
  buildCode: string
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment)
  } catch {
    // Malformed percent-escape: keep the raw segment.
    return segment
  }
}

export function parseTalentLink(href: string): TalentLink | null {
  const m = TALENT_CALC_PATH.exec(href)
  if (!m) return null
  const [, cls, spec, code] = m
  if (!cls || !spec || !code) return null
  return {
    classToken: cls.toLowerCase(),
    specToken: spec.toLowerCase(),
    buildCode: safeDecode(code)
  }
}

/** All talent-calculator links on the page, in document order. */
export function findTalentLinks(html: string): TalentLink[] {
  const $ = load(html)
  const out: TalentLink[] = []
  for (const el of $(`a[href*="${TALENT_CALC_MARKER}"]`).toArray()) {
    const href = $(el).attr('href')
    if (!href) continue
    const link = parseTalentLink(href)
    if (link) out.push(link)
  }
  return out
}

/**
 * Return the build code for the requested class/spec, or null when the page has
 * none. When several links match, the first in document order wins.
 */
export function locateBuildCode(html: string, cls: string, spec: string): string | null {
  const match = findTalentLinks(html).find((l) => l.classToken === cls && l.specToken === spec)
  return match?.buildCode ?? null
}

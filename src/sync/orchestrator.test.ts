import { describe, expect, it, vi } from 'vitest'
import type { FetchOutcome, FetchTarget, Selection } from '../types.js'
import { managedEntries, parseDocument, serializeDocument, type PersistedDocument } from '../store/document.js'
import { ValidationError } from '../utils/errors.js'
import { archonTargetUrl } from '../source/archon/endpoints.js'
import { runSync, type BuildFetcher, type DocumentStore } from './orchestrator.js'

const OUTPUT = 'SavedVariables/Builds.lua'

/** Keeps files in memory and counts writes. */
class MemoryStore implements DocumentStore {
  readonly files = new Map<string, string>()
  loads = 0
  saves = 0

  load(filePath: string): PersistedDocument {
    this.loads++
    return parseDocument(this.files.get(filePath) ?? '', { filePath })
  }

  save(doc: PersistedDocument): number {
    this.saves++
    const bytes = serializeDocument(doc)
    this.files.set(doc.filePath, bytes.toString('utf8'))
    return bytes.length
  }
}

/** Answers by URL; unknown URLs are not available. */
function fakeFetcher(answers: Record<string, FetchOutcome>): BuildFetcher & { urls: string[] } {
  const urls: string[] = []
  return {
    urls,
    urlFor: (target: FetchTarget) => archonTargetUrl(target),
    async fetch(target: FetchTarget) {
      const url = archonTargetUrl(target)
      urls.push(url)
      return answers[url] ?? { status: 'not-available' }
    }
  }
}

const BASE = 'https://www.archon.gg/wow/builds/arms/warrior'
const RAID_URL = `${BASE}/raid/talents/heroic/broodtwister`
const DUNGEON_URL = `${BASE}/mythic-plus/talents/10/ara-kara/this-week`
const DUNGEON_LAST_URL = `${BASE}/mythic-plus/talents/10/ara-kara/last-week`

function selection(overrides: Partial<Selection> = {}): Selection {
  return {
    characters: [{ name: 'Thrall', className: 'Warrior', specializations: ['arms'] }],
    raidDifficulties: ['heroic'],
    raidBosses: ['broodtwister'],
    dungeons: ['ara-kara'],
    clearPreviousBuilds: false,
    outputPath: OUTPUT,
    ...overrides
  }
}

const USER_ENTRY = 'ArchonBuildsDB = {\n\t["My own build"] = {\n\t\t["code"] = "MINE",\n\t},\n}\n'

describe('runSync', () => {
  it('writes found builds and reports the rest', async () => {
    const store = new MemoryStore()
    const fetcher = fakeFetcher({
      [RAID_URL]: { status: 'found', buildCode: 'RAIDCODE' },
      [DUNGEON_URL]: { status: 'transport-error', reason: 'HTTP 502 Bad Gateway' }
    })

    const report = await runSync(selection(), { fetcher, store })

    expect(report.counts.raid).toEqual({ found: 1, notAvailable: 0, errors: 0 })
    expect(report.counts.dungeon).toEqual({ found: 0, notAvailable: 0, errors: 1 })
    expect(report.failures).toEqual([
      {
        label: 'Thrall - Arms Warrior - Ara Kara (M+) [Archon]',
        url: DUNGEON_URL,
        status: 'transport-error',
        reason: 'HTTP 502 Bad Gateway'
      }
    ])
    expect(store.saves).toBe(1)
    expect(store.files.get(OUTPUT)).toBe(
      [
        'ArchonBuildsDB = {',
        '\t["Thrall - Arms Warrior - Broodtwister (Heroic) [Archon]"] = {',
        '\t\t["code"] = "RAIDCODE",',
        '\t\t["character"] = "Thrall",',
        '\t\t["class"] = "warrior",',
        '\t\t["spec"] = "arms",',
        '\t\t["content"] = "raid",',
        '\t\t["encounter"] = "broodtwister",',
        '\t\t["difficulty"] = "heroic",',
        '\t},',
        '}',
        ''
      ].join('\n')
    )
  })

  it('falls back to last week exactly once for a missing dungeon build', async () => {
    const store = new MemoryStore()
    const fetcher = fakeFetcher({ [DUNGEON_LAST_URL]: { status: 'found', buildCode: 'LASTWEEK' } })

    const report = await runSync(selection({ raidBosses: [] }), { fetcher, store })

    expect(fetcher.urls).toEqual([DUNGEON_URL, DUNGEON_LAST_URL])
    expect(report.fallbacks).toBe(1)
    expect(report.counts.dungeon.found).toBe(1)
    expect(store.files.get(OUTPUT)).toContain('\t\t["period"] = "last-week",\n')
  })

  it('does not fall back after a transport error', async () => {
    const fetcher = fakeFetcher({ [DUNGEON_URL]: { status: 'transport-error', reason: 'timed out after 10 ms' } })
    const report = await runSync(selection({ raidBosses: [] }), { fetcher, store: new MemoryStore() })
    expect(fetcher.urls).toEqual([DUNGEON_URL])
    expect(report.fallbacks).toBe(0)
  })

  it('reports a dungeon missing in both periods as not available', async () => {
    const fetcher = fakeFetcher({})
    const report = await runSync(selection({ raidBosses: [] }), { fetcher, store: new MemoryStore() })
    expect(report.failures).toEqual([
      {
        label: 'Thrall - Arms Warrior - Ara Kara (M+) [Archon]',
        url: DUNGEON_LAST_URL,
        status: 'not-available',
        reason: 'no build for this week or last week'
      }
    ])
  })

  it('keeps entries it does not manage', async () => {
    const store = new MemoryStore()
    store.files.set(OUTPUT, USER_ENTRY)
    const fetcher = fakeFetcher({ [RAID_URL]: { status: 'found', buildCode: 'RAIDCODE' } })

    await runSync(selection({ dungeons: [], clearPreviousBuilds: true }), { fetcher, store })

    const text = store.files.get(OUTPUT) ?? ''
    expect(text.startsWith('ArchonBuildsDB = {\n\t["My own build"] = {\n\t\t["code"] = "MINE",\n\t},\n')).toBe(true)
    expect(text).toContain('"RAIDCODE"')
  })

  it('is idempotent for the same builds', async () => {
    const store = new MemoryStore()
    store.files.set(OUTPUT, USER_ENTRY)
    const answers: Record<string, FetchOutcome> = {
      [RAID_URL]: { status: 'found', buildCode: 'RAIDCODE' },
      [DUNGEON_URL]: { status: 'found', buildCode: 'DUNGEONCODE' }
    }

    await runSync(selection(), { fetcher: fakeFetcher(answers), store })
    const first = store.files.get(OUTPUT)
    await runSync(selection(), { fetcher: fakeFetcher(answers), store })

    expect(store.files.get(OUTPUT)).toBe(first)
  })

  it('replaces a stale build code instead of adding a second entry', async () => {
    const store = new MemoryStore()
    await runSync(selection({ dungeons: [] }), {
      fetcher: fakeFetcher({ [RAID_URL]: { status: 'found', buildCode: 'OLD' } }),
      store
    })
    await runSync(selection({ dungeons: [] }), {
      fetcher: fakeFetcher({ [RAID_URL]: { status: 'found', buildCode: 'NEW' } }),
      store
    })

    const text = store.files.get(OUTPUT) ?? ''
    expect(text.split('[Archon]').length - 1).toBe(1)
    expect(text).toContain('["code"] = "NEW"')
    expect(text).not.toContain('"OLD"')
  })

  it('clears previous managed builds when asked', async () => {
    const store = new MemoryStore()
    await runSync(selection({ dungeons: [] }), {
      fetcher: fakeFetcher({ [RAID_URL]: { status: 'found', buildCode: 'RAIDCODE' } }),
      store
    })

    const report = await runSync(selection({ raidBosses: [], clearPreviousBuilds: true }), {
      fetcher: fakeFetcher({}),
      store
    })

    expect(report.cleared).toBe(1)
    expect(store.files.get(OUTPUT)).toBe('ArchonBuildsDB = {\n}\n')
  })

  it('keeps separate entries for same-named characters of different classes', async () => {
    const store = new MemoryStore()
    const fetcher = fakeFetcher({
      'https://www.archon.gg/wow/builds/frost/mage/raid/talents/heroic/broodtwister': { status: 'found', buildCode: 'MAGE' },
      'https://www.archon.gg/wow/builds/frost/death-knight/raid/talents/heroic/broodtwister': {
        status: 'found',
        buildCode: 'DK'
      }
    })
    const characters = [
      { name: 'Bob', className: 'Mage', specializations: ['frost'] },
      { name: 'Bob', className: 'Death Knight', specializations: ['frost'] }
    ]

    const report = await runSync(selection({ characters, dungeons: [] }), { fetcher, store })

    expect(report.counts.raid.found).toBe(2)
    const doc = parseDocument(store.files.get(OUTPUT) ?? '', { filePath: OUTPUT })
    expect(managedEntries(doc).map((e) => [e.label, e.buildCode])).toEqual([
      ['Bob - Frost Mage - Broodtwister (Heroic) [Archon]', 'MAGE'],
      ['Bob - Frost Death Knight - Broodtwister (Heroic) [Archon]', 'DK']
    ])
  })

  it('rejects an invalid selection before touching the file or the network', async () => {
    const store = new MemoryStore()
    const fetcher = fakeFetcher({})
    const bad = selection({ characters: [{ name: 'Jaina', className: 'Wizard', specializations: ['frost'] }] })

    await expect(runSync(bad, { fetcher, store })).rejects.toBeInstanceOf(ValidationError)
    expect(store.loads).toBe(0)
    expect(fetcher.urls).toEqual([])
  })

  it('does not write when the existing file cannot be parsed', async () => {
    const store = new MemoryStore()
    store.files.set(OUTPUT, 'ArchonBuildsDB = {')
    const fetcher = fakeFetcher({})

    await expect(runSync(selection(), { fetcher, store })).rejects.toThrow(/unclosed table/)
    expect(store.saves).toBe(0)
    expect(fetcher.urls).toEqual([])
  })

  it('calls onResult once per target', async () => {
    const onResult = vi.fn()
    await runSync(selection(), { fetcher: fakeFetcher({}), store: new MemoryStore(), onResult })
    expect(onResult).toHaveBeenCalledTimes(2)
  })
})

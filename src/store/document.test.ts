import { describe, expect, it } from 'vitest'
import { ParseError, SchemaError } from '../utils/errors.js'
import {
  clearManaged,
  managedEntries,
  opaqueEntries,
  parseDocument,
  serializeDocument,
  upsert,
  type ManagedEntry,
  type PersistedDocument
} from './document.js'

const RAID_LABEL = 'Thrall - Arms Warrior - Broodtwister (Heroic) [Archon]'
const DUNGEON_LABEL = 'Thrall - Arms Warrior - Ara Kara (M+) [Archon]'

const SAMPLE = [
  'ArchonBuildsDB = {',
  '\t["My PvP build"] = {',
  '\t\t["code"] = "USERCODE",',
  '\t},',
  `\t["${RAID_LABEL}"] = {`,
  '\t\t["code"] = "OLDCODE",',
  '\t\t["character"] = "Thrall",',
  '\t},',
  '\t-- kept comment',
  '\t["Notes"] = "hello",',
  '}',
  'OtherAddonDB = { 1, 2 }',
  ''
].join('\n')

function entry(label: string, buildCode: string, fields: ManagedEntry['fields'] = []): ManagedEntry {
  return { label, buildCode, fields }
}

function render(doc: PersistedDocument): string {
  return serializeDocument(doc).toString('utf8')
}

function parse(text: string | Buffer, tablePath?: string) {
  return parseDocument(text, { filePath: 'Builds.lua', tablePath })
}

describe('parseDocument', () => {
  it('writes an untouched document back byte for byte', () => {
    expect(render(parse(SAMPLE))).toBe(SAMPLE)
  })

  it('splits managed and opaque entries', () => {
    const doc = parse(SAMPLE)
    expect(opaqueEntries(doc).map((e) => e.label)).toEqual(['My PvP build', 'Notes'])
    expect(managedEntries(doc)).toEqual([entry(RAID_LABEL, 'OLDCODE', [['character', 'Thrall']])])
  })

  it('reports syntax errors with line and column', () => {
    const text = 'ArchonBuildsDB = {\n\t["a"] = 1\n\t["b"] = 2\n}'
    try {
      parse(text)
      throw new Error('expected a parse error')
    } catch (err) {
      if (!(err instanceof ParseError)) throw err
      expect([err.line, err.column]).toEqual([3, 2])
      expect(err.message).toBe("Builds.lua:3:2: expected ',' or '}' near '['")
    }
  })

  it.each([
    ['ArchonBuildsDB = 5', '"ArchonBuildsDB" is number, expected a table'],
    ['ArchonBuildsDB = { "x" }', '"ArchonBuildsDB" has a positional field; expected a table of labelled entries'],
    [`ArchonBuildsDB = { ["${RAID_LABEL}"] = "x" }`, `managed entry "${RAID_LABEL}" must be a table (found string)`],
    [`ArchonBuildsDB = { ["${RAID_LABEL}"] = { ["spec"] = "arms" } }`, `managed entry "${RAID_LABEL}" has no code field`],
    [
      `ArchonBuildsDB = { ["${RAID_LABEL}"] = { code = "A" }, ["${RAID_LABEL}"] = { code = "B" } }`,
      `duplicate managed entry "${RAID_LABEL}"`
    ]
  ])('rejects %j', (text, detail) => {
    expect(() => parse(text)).toThrow(new SchemaError('Builds.lua', detail))
  })

  it('rejects a nested path through a non-table', () => {
    expect(() => parse('MyAddonDB = { builds = 1 }', 'MyAddonDB.builds')).toThrow(
      new SchemaError('Builds.lua', '"MyAddonDB.builds" is number, expected a table')
    )
  })
})

describe('upsert', () => {
  it('replaces a managed entry in place', () => {
    const doc = parse(SAMPLE)
    expect(upsert(doc, entry(RAID_LABEL, 'NEWCODE', [['character', 'Thrall']]))).toBe('replaced')
    expect(render(doc)).toBe(SAMPLE.replace('OLDCODE', 'NEWCODE'))
  })

  it('appends new managed entries after the last entry', () => {
    const doc = parse(SAMPLE)
    expect(upsert(doc, entry(DUNGEON_LABEL, 'DCODE'))).toBe('added')
    const expected = SAMPLE.replace(
      '\t["Notes"] = "hello",\n',
      ['\t["Notes"] = "hello",', `\t["${DUNGEON_LABEL}"] = {`, '\t\t["code"] = "DCODE",', '\t},', ''].join('\n')
    )
    expect(render(doc)).toBe(expected)
  })

  it('does not grow the document when the same builds are written again', () => {
    const first = parse(SAMPLE)
    upsert(first, entry(RAID_LABEL, 'NEWCODE', [['character', 'Thrall']]))
    upsert(first, entry(DUNGEON_LABEL, 'DCODE'))
    const once = render(first)

    const second = parse(once)
    upsert(second, entry(RAID_LABEL, 'NEWCODE', [['character', 'Thrall']]))
    upsert(second, entry(DUNGEON_LABEL, 'DCODE'))
    expect(render(second)).toBe(once)
    expect(managedEntries(second)).toHaveLength(2)
  })

  it('adds a separator to a last entry that has none', () => {
    const doc = parse('ArchonBuildsDB = {\n\t["Keep"] = 1\n}\n')
    upsert(doc, entry(DUNGEON_LABEL, 'C1'))
    expect(render(doc)).toBe(
      `ArchonBuildsDB = {\n\t["Keep"] = 1,\n\t["${DUNGEON_LABEL}"] = {\n\t\t["code"] = "C1",\n\t},\n}\n`
    )
  })

  it('fills an empty one-line table', () => {
    const doc = parse('ArchonBuildsDB = {}\n')
    upsert(doc, entry(DUNGEON_LABEL, 'C1'))
    expect(render(doc)).toBe(`ArchonBuildsDB = {\n\t["${DUNGEON_LABEL}"] = {\n\t\t["code"] = "C1",\n\t},\n}\n`)
  })

  it('keeps CRLF line endings', () => {
    const doc = parse('ArchonBuildsDB = {\r\n\t["Keep"] = 1,\r\n}\r\n')
    upsert(doc, entry(DUNGEON_LABEL, 'C1'))
    expect(render(doc)).toBe(
      `ArchonBuildsDB = {\r\n\t["Keep"] = 1,\r\n\t["${DUNGEON_LABEL}"] = {\r\n\t\t["code"] = "C1",\r\n\t},\r\n}\r\n`
    )
  })

  it('refuses labels without the marker', () => {
    const doc = parse(SAMPLE)
    expect(() => upsert(doc, entry('My PvP build', 'X'))).toThrow(/does not end with the managed marker/)
  })
})

describe('missing builds table', () => {
  it('leaves the text alone until something is written', () => {
    const doc = parse('')
    expect(doc.tableExists).toBe(false)
    expect(render(doc)).toBe('')
  })

  it('creates the table in an empty file', () => {
    const doc = parse('')
    upsert(doc, entry(DUNGEON_LABEL, 'C1'))
    expect(render(doc)).toBe(`ArchonBuildsDB = {\n\t["${DUNGEON_LABEL}"] = {\n\t\t["code"] = "C1",\n\t},\n}\n`)
  })

  it('appends the table after other globals', () => {
    const doc = parse('OtherDB = {}')
    upsert(doc, entry(DUNGEON_LABEL, 'C1'))
    expect(render(doc)).toBe(
      `OtherDB = {}\nArchonBuildsDB = {\n\t["${DUNGEON_LABEL}"] = {\n\t\t["code"] = "C1",\n\t},\n}\n`
    )
  })

  it('creates a nested table inside an existing global', () => {
    const doc = parse('MyAddonDB = {\n\t["profile"] = "Default"\n}\n', 'MyAddonDB.builds')
    upsert(doc, entry(DUNGEON_LABEL, 'C1'))
    const text = render(doc)
    expect(text).toBe(
      [
        'MyAddonDB = {',
        '\t["profile"] = "Default",',
        '\t["builds"] = {',
        `\t\t["${DUNGEON_LABEL}"] = {`,
        '\t\t\t["code"] = "C1",',
        '\t\t},',
        '\t},',
        '}',
        ''
      ].join('\n')
    )
    expect(managedEntries(parse(text, 'MyAddonDB.builds'))).toEqual([entry(DUNGEON_LABEL, 'C1')])
  })
})

describe('clearManaged', () => {
  it('removes managed entries and keeps everything else', () => {
    const doc = parse(SAMPLE)
    expect(clearManaged(doc)).toBe(1)
    const lines = SAMPLE.split('\n')
    lines.splice(4, 4)
    expect(render(doc)).toBe(lines.join('\n'))
    expect(opaqueEntries(doc)).toHaveLength(2)
  })
})

describe('file bytes', () => {
  const head = Buffer.from('ArchonBuildsDB = {\n\t["Mine"] = "caf', 'utf8')
  const rest = Buffer.from('",\n}\n', 'utf8')
  const latin1Byte = Buffer.from([0xe9])

  it('keeps bytes that are not valid UTF-8', () => {
    const bytes = Buffer.concat([head, latin1Byte, rest])
    expect(serializeDocument(parse(bytes)).equals(bytes)).toBe(true)
  })

  it('keeps those bytes when a managed entry is added next to them', () => {
    const doc = parse(Buffer.concat([head, latin1Byte, rest]))
    upsert(doc, entry(DUNGEON_LABEL, 'C1'))
    const expected = Buffer.concat([
      head,
      latin1Byte,
      Buffer.from(`",\n\t["${DUNGEON_LABEL}"] = {\n\t\t["code"] = "C1",\n\t},\n}\n`, 'utf8')
    ])
    expect(serializeDocument(doc).equals(expected)).toBe(true)
  })

  it('matches and writes non-ASCII labels as UTF-8', () => {
    const label = 'Zoë - Frost Mage - Broodtwister (Heroic) [Archon]'
    const text = `ArchonBuildsDB = {\n\t["Café"] = 1,\n\t["${label}"] = {\n\t\t["code"] = "OLD",\n\t},\n}\n`
    const doc = parse(Buffer.from(text, 'utf8'))
    expect(opaqueEntries(doc).map((e) => e.label)).toEqual(['Café'])
    expect(upsert(doc, entry(label, 'NEW'))).toBe('replaced')
    expect(serializeDocument(doc).equals(Buffer.from(text.replace('OLD', 'NEW'), 'utf8'))).toBe(true)
  })

  it('skips a UTF-8 byte order mark', () => {
    const doc = parse(Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('ArchonBuildsDB = {}\n')]))
    expect(doc.tableExists).toBe(true)
  })
})

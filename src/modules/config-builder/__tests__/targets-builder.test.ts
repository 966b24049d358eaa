import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import yaml from 'js-yaml'
import { TargetsFileSchema } from '../../config/config-schema.js'
import type { CsvTargetRow } from '../csv-input.js'
import {
  buildSubscriptionIndex,
  buildTargetsDocument,
  renderTargetsYaml,
  resolveOutputPath,
  resolveSubscriptionId,
  writeTargetsFile,
} from '../targets-builder.js'

const ID_A = 'aaaaaaaa-0000-0000-0000-000000000001'
const ID_B = 'bbbbbbbb-0000-0000-0000-000000000002'
const ID_C = 'cccccccc-0000-0000-0000-000000000003'
const ID_D = 'dddddddd-0000-0000-0000-000000000004'
const ID_E = 'eeeeeeee-0000-0000-0000-000000000005'

const DIRECTORY = [
  { subscriptionId: ID_A.toUpperCase(), displayName: 'Production' },
  { subscriptionId: ID_B, displayName: 'Staging' },
  { subscriptionId: ID_C, displayName: 'production' },
  { subscriptionId: ID_D, displayName: '' },
]

describe('buildSubscriptionIndex', () => {
  it('maps lowercased names to ids, keeping the first of duplicate names', () => {
    const index = buildSubscriptionIndex(DIRECTORY)

    expect(index.nameToId.get('production')).toBe(ID_A)
    expect(index.nameToId.get('staging')).toBe(ID_B)
    expect(index.idToName.get(ID_C)).toBe('production')
    expect(index.warnings).toEqual([
      "Duplicate subscription display name detected: 'production'. Matching by name may be ambiguous.",
    ])
  })

  it('warns when nothing is visible', () => {
    expect(buildSubscriptionIndex([]).warnings).toEqual(['No subscriptions visible for the signed-in account.'])
  })
})

describe('resolveSubscriptionId', () => {
  const index = buildSubscriptionIndex(DIRECTORY)

  it('passes GUIDs through in lowercase', () => {
    expect(resolveSubscriptionId(ID_E.toUpperCase(), index)).toBe(ID_E)
  })

  it('looks names up case-insensitively', () => {
    expect(resolveSubscriptionId('STAGING', index)).toBe(ID_B)
  })

  it('returns null for unknown names', () => {
    expect(resolveSubscriptionId('Sandbox', index)).toBeNull()
  })
})

describe('buildTargetsDocument', () => {
  it('groups, de-duplicates and sorts resource groups per resolved subscription', () => {
    const rows: CsvTargetRow[] = [
      { subscription: 'Production', resourceGroup: 'rg-web' },
      { subscription: 'PRODUCTION', resourceGroup: 'rg-api' },
      { subscription: 'Production', resourceGroup: 'rg-web' },
      { subscription: ID_E, resourceGroup: 'rg-e' },
      { subscription: ID_D.toUpperCase(), resourceGroup: 'rg-z' },
      { subscription: 'Unknown Sub', resourceGroup: 'rg-q' },
      { subscription: 'Unknown Sub', resourceGroup: 'rg-r' },
      { subscription: 'staging', resourceGroup: 'rg-s' },
    ]

    const { document, warnings } = buildTargetsDocument(rows, buildSubscriptionIndex(DIRECTORY))

    expect(document).toEqual({
      subscriptions: [
        { id: ID_A, name: 'Production', resource_groups: ['rg-api', 'rg-web'] },
        { id: ID_B, name: 'Staging', resource_groups: ['rg-s'] },
        { id: ID_D, name: '', resource_groups: ['rg-z'] },
        { id: ID_E, name: '', resource_groups: ['rg-e'] },
      ],
    })
    expect(warnings).toEqual([
      "Could not find subscription by name 'Unknown Sub'. Make sure your signed-in account has access.",
    ])
  })

  it('returns no subscriptions when nothing resolves', () => {
    const { document } = buildTargetsDocument(
      [{ subscription: 'Nope', resourceGroup: 'rg' }],
      buildSubscriptionIndex(DIRECTORY),
    )
    expect(document.subscriptions).toEqual([])
  })
})

describe('resolveOutputPath', () => {
  const cwd = '/work'

  it('defaults to subscriptions.yml in the working directory', () => {
    expect(resolveOutputPath({}, cwd)).toEqual({ path: join('/work', 'subscriptions.yml'), note: null })
  })

  it('uses --output as a full path', () => {
    expect(resolveOutputPath({ output: 'config/targets.yml' }, cwd)).toEqual({
      path: join('/work', 'config', 'targets.yml'),
      note: null,
    })
  })

  it('combines --output-dir and --output-name', () => {
    expect(resolveOutputPath({ outputDir: '/etc/rg', outputName: 'prod.yml' }, cwd).path).toBe(
      join('/etc/rg', 'prod.yml'),
    )
    expect(resolveOutputPath({ outputDir: 'cfg' }, cwd).path).toBe(join('/work', 'cfg', 'subscriptions.yml'))
  })

  it('keeps only the file name of --output when combined with directory or name options', () => {
    const withDir = resolveOutputPath({ output: 'x/targets.yml', outputDir: '/out' }, cwd)
    expect(withDir.path).toBe(join('/out', 'targets.yml'))
    expect(withDir.note).not.toBeNull()

    expect(resolveOutputPath({ output: 'x/targets.yml', outputName: 'other.yml' }, cwd).path).toBe(
      join('/work', 'other.yml'),
    )
  })
})

describe('renderTargetsYaml / writeTargetsFile', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'rg-cost-targets-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  const document = {
    subscriptions: [{ id: ID_A, name: 'Production', resource_groups: ['rg-api', 'rg-web'] }],
  }

  it('renders YAML that the targets file schema accepts', () => {
    const loaded = yaml.load(renderTargetsYaml(document))
    expect(loaded).toEqual(document)
    expect(TargetsFileSchema.safeParse(loaded).success).toBe(true)
  })

  it('preserves key order within entries', () => {
    const text = renderTargetsYaml(document)
    expect(text.indexOf('id:')).toBeLessThan(text.indexOf('name:'))
    expect(text.indexOf('name:')).toBeLessThan(text.indexOf('resource_groups:'))
  })

  it('writes the file, creating directories', async () => {
    const target = join(dir, 'a', 'b', 'subscriptions.yml')
    const text = await writeTargetsFile(target, document)
    expect(await readFile(target, 'utf-8')).toBe(text)
  })
})

/**
 * Turning CSV rows into a targets document.
 *
 * Subscription display names are resolved to ids through the subscription
 * directory; ids pass through untouched. Resource groups are grouped per
 * subscription, de-duplicated and sorted.
 */

import { mkdir, writeFile } from 'fs/promises'
import { homedir } from 'os'
import { basename, dirname, join, resolve } from 'path'
import yaml from 'js-yaml'
import { GUID_PATTERN } from '../config/config-schema.js'
import type { CsvTargetRow } from './csv-input.js'
import type { SubscriptionInfo } from './subscription-directory.js'

export const DEFAULT_TARGETS_FILE_NAME = 'subscriptions.yml'

export interface SubscriptionIndex {
  /** Lowercased display name → subscription id (first seen wins) */
  nameToId: Map<string, string>
  /** Subscription id (lowercase) → display name */
  idToName: Map<string, string>
  warnings: string[]
}

export interface TargetsDocumentEntry {
  id: string
  name: string
  resource_groups: string[]
}

export interface TargetsDocument {
  subscriptions: TargetsDocumentEntry[]
}

export interface BuildTargetsResult {
  document: TargetsDocument
  warnings: string[]
}

export function buildSubscriptionIndex(subscriptions: readonly SubscriptionInfo[]): SubscriptionIndex {
  const nameToId = new Map<string, string>()
  const idToName = new Map<string, string>()
  const warnings: string[] = []

  for (const { subscriptionId, displayName } of subscriptions) {
    const id = subscriptionId.toLowerCase()
    idToName.set(id, displayName)
    if (displayName === '') continue

    const key = displayName.toLowerCase()
    if (nameToId.has(key)) {
      warnings.push(
        `Duplicate subscription display name detected: '${displayName}'. Matching by name may be ambiguous.`,
      )
      continue
    }
    nameToId.set(key, id)
  }

  if (subscriptions.length === 0) {
    warnings.push('No subscriptions visible for the signed-in account.')
  }
  return { nameToId, idToName, warnings }
}

/**
 * Resolve a CSV subscription value to an id: GUIDs pass through (lowercased),
 * anything else is looked up as a display name. Returns null when not found.
 */
export function resolveSubscriptionId(input: string, index: SubscriptionIndex): string | null {
  if (GUID_PATTERN.test(input)) {
    return input.toLowerCase()
  }
  return index.nameToId.get(input.toLowerCase()) ?? null
}

export function buildTargetsDocument(rows: readonly CsvTargetRow[], index: SubscriptionIndex): BuildTargetsResult {
  const groups = new Map<string, Set<string>>()
  const names = new Map<string, string>()
  const unresolved = new Set<string>()
  const warnings: string[] = []

  for (const row of rows) {
    const id = resolveSubscriptionId(row.subscription, index)
    if (id === null) {
      if (!unresolved.has(row.subscription)) {
        unresolved.add(row.subscription)
        warnings.push(
          `Could not find subscription by name '${row.subscription}'. Make sure your signed-in account has access.`,
        )
      }
      continue
    }

    let resourceGroups = groups.get(id)
    if (resourceGroups === undefined) {
      resourceGroups = new Set<string>()
      groups.set(id, resourceGroups)
    }
    resourceGroups.add(row.resourceGroup)

    if (!names.has(id)) {
      const directoryName = index.idToName.get(id) ?? ''
      if (directoryName !== '') {
        names.set(id, directoryName)
      } else if (!GUID_PATTERN.test(row.subscription)) {
        names.set(id, row.subscription)
      }
    }
  }

  const subscriptions = [...groups.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([id, resourceGroups]) => ({
      id,
      name: names.get(id) ?? '',
      resource_groups: [...resourceGroups].sort(),
    }))

  return { document: { subscriptions }, warnings }
}

export interface OutputPathOptions {
  output?: string
  outputDir?: string
  outputName?: string
}

export interface ResolvedOutputPath {
  path: string
  /** Set when --output was combined with --output-dir or --output-name */
  note: string | null
}

function expandHome(p: string): string {
  if (p === '~') return homedir()
  if (p.startsWith('~/')) return join(homedir(), p.slice(2))
  return p
}

/**
 * Where to write the targets document.
 *
 * `output` alone is a full path. Otherwise the file is `outputName` (or the
 * basename of `output`, or subscriptions.yml) inside `outputDir` (or `cwd`).
 */
export function resolveOutputPath(options: OutputPathOptions, cwd: string): ResolvedOutputPath {
  const { output, outputDir, outputName } = options
  const hasDirOrName = outputDir !== undefined || outputName !== undefined

  if (output !== undefined && !hasDirOrName) {
    return { path: resolve(cwd, expandHome(output)), note: null }
  }

  const fileName = outputName ?? (output !== undefined ? basename(output) : DEFAULT_TARGETS_FILE_NAME)
  const dir = outputDir !== undefined ? expandHome(outputDir) : cwd
  return {
    path: resolve(cwd, dir, fileName),
    note: output !== undefined ? '--output provided together with --output-dir/--output-name; using the directory and file name options.' : null,
  }
}

export function renderTargetsYaml(document: TargetsDocument): string {
  return yaml.dump(document, { noRefs: true, lineWidth: -1 })
}

/**
 * Write the document as YAML, creating parent directories.
 * @returns The YAML text written
 */
export async function writeTargetsFile(filePath: string, document: TargetsDocument): Promise<string> {
  const text = renderTargetsYaml(document)
  await mkdir(dirname(filePath), { recursive: true })
  await writeFile(filePath, text, 'utf-8')
  return text
}

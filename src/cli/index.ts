#!/usr/bin/env node
/**
 * rg-costs CLI - Main entry point
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { z } from 'zod'
import { createLogger } from '../utils/logger.js'
import { registerCollectCommand } from './commands/collect.js'
import { registerBuildConfigCommand } from './commands/build-config.js'

const logger = createLogger('cli')

const PackageJsonSchema = z.object({ name: z.string().optional(), version: z.string().optional() })

/** Resolve the package version relative to this file (run from dist/ or src/) */
async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  const candidates = [resolve(here, '../../package.json'), resolve(here, '../package.json')]

  for (const pkgPath of candidates) {
    let content: string
    try {
      content = await readFile(pkgPath, 'utf-8')
    } catch {
      continue
    }
    const pkg = PackageJsonSchema.safeParse(JSON.parse(content))
    if (pkg.success && pkg.data.name === 'rg-cost-report' && pkg.data.version !== undefined) {
      return pkg.data.version
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('rg-costs')
    .description('Monthly pre-tax cost per Azure resource group')
    .version(version, '-v, --version', 'Output the current version')

  registerCollectCommand(program, version)
  registerBuildConfigCommand(program)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

// Errors are handled internally by main() which calls process.exit(1)
void main()

/**
 * `rg-costs build-config` command
 *
 * Builds a targets file for `collect` from a CSV of subscription (id or
 * display name) and resource group pairs.
 *
 * Usage:
 *   rg-costs build-config --input subscriptions.csv
 *   rg-costs build-config --input subscriptions.csv -o config/targets.yml
 *   rg-costs build-config --input subscriptions.csv --output-dir config --output-name prod.yml
 *
 * Exit codes:
 *   0 - Targets file written
 *   1 - No usable rows, no resolvable subscription, or a runtime error
 *   2 - CSV file unreadable or without the expected header
 */

import type { Command } from 'commander'
import { InputFileError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { createDefaultCredential, createTokenProvider } from '../../modules/auth/token-provider.js'
import type { TokenProvider } from '../../modules/auth/token-provider.js'
import { readTargetRows } from '../../modules/config-builder/csv-input.js'
import type { CsvTargetRow } from '../../modules/config-builder/csv-input.js'
import { ArmSubscriptionDirectory } from '../../modules/config-builder/subscription-directory.js'
import type { SubscriptionDirectory } from '../../modules/config-builder/subscription-directory.js'
import {
  buildSubscriptionIndex,
  buildTargetsDocument,
  resolveOutputPath,
  writeTargetsFile,
} from '../../modules/config-builder/targets-builder.js'

const logger = createLogger('build-config-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const BUILD_CONFIG_EXIT_SUCCESS = 0
export const BUILD_CONFIG_EXIT_ERROR = 1
export const BUILD_CONFIG_EXIT_USAGE = 2

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface BuildConfigActionOptions {
  inputPath: string
  output?: string
  outputDir?: string
  outputName?: string
  tenantId?: string
  cwd: string
  /** Subscription listing to resolve names against (default: Azure Resource Manager) */
  directory?: SubscriptionDirectory
  tokenProvider?: TokenProvider
}

// ---------------------------------------------------------------------------
// runBuildConfigAction — testable core logic
// ---------------------------------------------------------------------------

function createDirectory(options: BuildConfigActionOptions): SubscriptionDirectory {
  const tokenProvider =
    options.tokenProvider ??
    createTokenProvider(createDefaultCredential(options.tenantId !== undefined ? { tenantId: options.tenantId } : {}))
  return new ArmSubscriptionDirectory({ tokenProvider })
}

/**
 * Core action for the build-config command.
 *
 * Returns exit code. Separated from Commander integration for testability.
 */
export async function runBuildConfigAction(options: BuildConfigActionOptions): Promise<number> {
  let rows: CsvTargetRow[]
  try {
    rows = await readTargetRows(options.inputPath)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    process.stderr.write(`Error reading CSV: ${message}\n`)
    return err instanceof InputFileError ? BUILD_CONFIG_EXIT_USAGE : BUILD_CONFIG_EXIT_ERROR
  }

  if (rows.length === 0) {
    process.stderr.write('No valid rows found in the CSV. Nothing to do.\n')
    return BUILD_CONFIG_EXIT_ERROR
  }

  try {
    const directory = options.directory ?? createDirectory(options)
    const index = buildSubscriptionIndex(await directory.list())
    const { document, warnings } = buildTargetsDocument(rows, index)

    for (const warning of [...index.warnings, ...warnings]) {
      process.stderr.write(`Warning: ${warning}\n`)
    }

    if (document.subscriptions.length === 0) {
      process.stderr.write('No subscriptions resolved to IDs. Exiting.\n')
      return BUILD_CONFIG_EXIT_ERROR
    }

    const { path, note } = resolveOutputPath(
      {
        ...(options.output !== undefined && { output: options.output }),
        ...(options.outputDir !== undefined && { outputDir: options.outputDir }),
        ...(options.outputName !== undefined && { outputName: options.outputName }),
      },
      options.cwd,
    )
    if (note !== null) {
      process.stderr.write(`Note: ${note}\n`)
    }

    const yamlText = await writeTargetsFile(path, document)
    logger.debug({ path, subscriptionCount: document.subscriptions.length }, 'Targets file written')

    process.stdout.write(`Wrote ${path}\n`)
    process.stdout.write(yamlText)
    return BUILD_CONFIG_EXIT_SUCCESS
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    process.stderr.write(`Error: ${message}\n`)
    logger.error({ err }, 'runBuildConfigAction failed')
    return BUILD_CONFIG_EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// registerBuildConfigCommand
// ---------------------------------------------------------------------------

interface BuildConfigCommandOpts {
  input: string
  output?: string
  outputDir?: string
  outputName?: string
  tenantId?: string
}

/**
 * Register the `rg-costs build-config` command with the CLI program.
 *
 * @param program - Commander program instance
 * @param cwd     - Directory relative paths resolve against (defaults to process.cwd())
 */
export function registerBuildConfigCommand(program: Command, cwd = process.cwd()): void {
  program
    .command('build-config')
    .description('Build a targets YAML file from a CSV of subscriptions and resource groups')
    .requiredOption('-i, --input <path>', 'CSV with subscription and resource_group columns')
    .option('-o, --output <path>', 'Full path of the YAML file to write')
    .option('--output-dir <dir>', 'Directory to write the YAML file into (default: current directory)')
    .option('--output-name <name>', 'File name of the YAML file (default: subscriptions.yml)')
    .option('--tenant-id <id>', 'Tenant to authenticate against')
    .action(async (opts: BuildConfigCommandOpts) => {
      const exitCode = await runBuildConfigAction({
        inputPath: opts.input,
        ...(opts.output !== undefined && { output: opts.output }),
        ...(opts.outputDir !== undefined && { outputDir: opts.outputDir }),
        ...(opts.outputName !== undefined && { outputName: opts.outputName }),
        ...(opts.tenantId !== undefined && { tenantId: opts.tenantId }),
        cwd,
      })

      process.exitCode = exitCode
    })
}

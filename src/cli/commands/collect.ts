/**
 * `rg-costs collect` command
 *
 * Queries last month's pre-tax cost for every configured
 * (subscription, resource group) pair and writes one CSV row per pair.
 *
 * Usage:
 *   rg-costs collect --config subscriptions.yml
 *   rg-costs collect --config subscriptions.yml --out report.csv --sleep 2
 *   rg-costs collect --config subscriptions.yml --json
 *
 * Exit codes:
 *   0 - Report written (failed pairs are listed on stderr)
 *   1 - Runtime error, or failed pairs with fail_on_error set
 *   2 - Invalid or unreadable configuration
 */

import { InvalidArgumentError } from 'commander'
import type { Command } from 'commander'
import type { CollectionFailure } from '../../core/types.js'
import { createEventBus } from '../../core/event-bus.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import { ConfigError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { formatDuration, secondsToMs } from '../../utils/helpers.js'
import { createDefaultCredential, createTokenProvider } from '../../modules/auth/token-provider.js'
import { formatPeriodBoundary, previousMonthPeriod } from '../../modules/billing-period/billing-period.js'
import { createCollectionPipeline } from '../../modules/collection/factory.js'
import type { CollectorDependencies } from '../../modules/collection/factory.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { PartialRunSettings } from '../../modules/config/config-schema.js'
import {
  defaultReportPath,
  formatFailuresTable,
  toReportRecord,
  writeCostReport,
} from '../../modules/report/cost-report.js'
import type { CostReportRecord } from '../../modules/report/cost-report.js'
import { buildJsonOutput } from '../utils/formatting.js'

const logger = createLogger('collect-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const COLLECT_EXIT_SUCCESS = 0
export const COLLECT_EXIT_ERROR = 1
export const COLLECT_EXIT_USAGE = 2

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CollectActionOptions {
  configPath: string
  /** CSV destination (default: outputs/costs_<YYYY-MM>.csv under projectRoot) */
  outPath?: string
  cliOverrides?: PartialRunSettings
  tenantId?: string
  outputFormat: 'text' | 'json'
  projectRoot: string
  version?: string
  env?: NodeJS.ProcessEnv
  now?: () => Date
  /** Replacements for the network, clock and credential seams */
  dependencies?: Partial<CollectorDependencies>
}

/**
 * JSON data payload for `rg-costs collect --json`.
 */
export interface CollectJsonData {
  output_path: string
  period: { start: string; end: string }
  rows: CostReportRecord[]
  failures: CollectionFailure[]
}

// ---------------------------------------------------------------------------
// Progress reporting
// ---------------------------------------------------------------------------

function attachProgressLogging(eventBus: TypedEventBus): void {
  eventBus.on('pair:started', ({ subscriptionId, resourceGroup, index, total }) => {
    logger.info({ subscriptionId, resourceGroup }, `[${String(index)}/${String(total)}] Querying cost`)
  })
  eventBus.on('query:backoff', ({ subscriptionId, resourceGroup, attempt, delayMs, reason, hinted }) => {
    logger.info(
      { subscriptionId, resourceGroup, attempt, delayMs, hinted },
      `${reason}; retrying in ${formatDuration(delayMs)}`,
    )
  })
  eventBus.on('pipeline:complete', ({ rowCount, failureCount, durationMs }) => {
    logger.info({ rowCount, failureCount }, `Collection finished in ${formatDuration(durationMs)}`)
  })
}

// ---------------------------------------------------------------------------
// runCollectAction — testable core logic
// ---------------------------------------------------------------------------

/**
 * Core action for the collect command.
 *
 * Returns exit code. Separated from Commander integration for testability.
 */
export async function runCollectAction(options: CollectActionOptions): Promise<number> {
  const { outputFormat, projectRoot, version = '0.0.0', dependencies = {} } = options
  const now = options.now ?? (() => new Date())

  const configSystem = createConfigSystem({
    configPath: options.configPath,
    ...(options.cliOverrides !== undefined && { cliOverrides: options.cliOverrides }),
    ...(options.env !== undefined && { env: options.env }),
  })

  try {
    await configSystem.load()
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    process.stderr.write(`Error: ${message}\n`)
    return err instanceof ConfigError ? COLLECT_EXIT_USAGE : COLLECT_EXIT_ERROR
  }

  const settings = configSystem.getSettings()
  const targets = configSystem.getTargets()
  const period = previousMonthPeriod(now())

  const tokenProvider =
    dependencies.tokenProvider ??
    createTokenProvider(createDefaultCredential(options.tenantId !== undefined ? { tenantId: options.tenantId } : {}))

  // Fail before the first query if no credential can issue a token
  try {
    await tokenProvider.getToken()
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    process.stderr.write(`Error: ${message}\n`)
    logger.error({ err }, 'Authentication preflight failed')
    return COLLECT_EXIT_ERROR
  }

  const eventBus = dependencies.eventBus ?? createEventBus()
  attachProgressLogging(eventBus)

  try {
    const pipeline = createCollectionPipeline(settings, { ...dependencies, tokenProvider, eventBus })
    const result = await pipeline.run(targets, period, { pacingMs: secondsToMs(settings.pacing_seconds) })

    const outputPath = await writeCostReport(options.outPath ?? defaultReportPath(period, projectRoot), result.rows)

    if (outputFormat === 'json') {
      const output = buildJsonOutput<CollectJsonData>(
        'rg-costs collect',
        {
          output_path: outputPath,
          period: { start: formatPeriodBoundary(period.start), end: formatPeriodBoundary(period.end) },
          rows: result.rows.map(toReportRecord),
          failures: result.failures,
        },
        version,
      )
      process.stdout.write(JSON.stringify(output, null, 2) + '\n')
    } else {
      process.stdout.write(`Wrote ${String(result.rows.length)} rows to ${outputPath}\n`)
    }

    if (result.failures.length > 0) {
      process.stderr.write(
        `${String(result.failures.length)} resource group(s) failed:\n${formatFailuresTable(result.failures)}\n`,
      )
      if (settings.fail_on_error) {
        return COLLECT_EXIT_ERROR
      }
    }

    return COLLECT_EXIT_SUCCESS
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    process.stderr.write(`Error: ${message}\n`)
    logger.error({ err }, 'runCollectAction failed')
    return COLLECT_EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// registerCollectCommand
// ---------------------------------------------------------------------------

function parseNonNegativeNumber(value: string): number {
  const parsed = Number(value)
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative number.')
  }
  return parsed
}

function parsePositiveInteger(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.')
  }
  return parsed
}

interface CollectCommandOpts {
  config: string
  out?: string
  sleep?: number
  maxRetries?: number
  baseSleep?: number
  clientType?: string
  timeout?: number
  tenantId?: string
  failOnError?: boolean
  json?: boolean
}

/**
 * Translate flags into settings overrides; absent flags leave lower layers in effect.
 */
export function toCliOverrides(opts: CollectCommandOpts): PartialRunSettings {
  return {
    ...(opts.sleep !== undefined && { pacing_seconds: opts.sleep }),
    ...(opts.maxRetries !== undefined && { max_retries: opts.maxRetries }),
    ...(opts.baseSleep !== undefined && { base_sleep_seconds: opts.baseSleep }),
    ...(opts.clientType !== undefined && { client_type: opts.clientType }),
    ...(opts.timeout !== undefined && { request_timeout_seconds: opts.timeout }),
    ...(opts.failOnError === true && { fail_on_error: true }),
  }
}

/**
 * Register the `rg-costs collect` command with the CLI program.
 *
 * @param program     - Commander program instance
 * @param version     - Current package version (for JSON output)
 * @param projectRoot - Base directory of the default report path (defaults to process.cwd())
 */
export function registerCollectCommand(program: Command, version = '0.0.0', projectRoot = process.cwd()): void {
  program
    .command('collect')
    .description("Collect last month's pre-tax cost per resource group into a CSV report")
    .requiredOption('-c, --config <path>', 'YAML file listing subscriptions and resource groups')
    .option('-o, --out <path>', 'CSV output path (default: outputs/costs_<YYYY-MM>.csv)')
    .option('--sleep <seconds>', 'Pause between resource group queries', parseNonNegativeNumber)
    .option('--max-retries <n>', 'Attempts per query page before giving up', parsePositiveInteger)
    .option('--base-sleep <seconds>', 'Base of the exponential backoff', parseNonNegativeNumber)
    .option('--client-type <value>', 'ClientType header sent with each request')
    .option('--timeout <seconds>', 'Timeout of a single HTTP request', parseNonNegativeNumber)
    .option('--tenant-id <id>', 'Tenant to authenticate against')
    .option('--fail-on-error', 'Exit with status 1 when any resource group fails')
    .option('--json', 'Print a JSON summary instead of text')
    .action(async (opts: CollectCommandOpts) => {
      const exitCode = await runCollectAction({
        configPath: opts.config,
        ...(opts.out !== undefined && { outPath: opts.out }),
        cliOverrides: toCliOverrides(opts),
        ...(opts.tenantId !== undefined && { tenantId: opts.tenantId }),
        outputFormat: opts.json === true ? 'json' : 'text',
        projectRoot,
        version,
      })

      process.exitCode = exitCode
    })
}

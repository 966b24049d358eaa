/**
 * CollectionPipeline — runs the full subscription × resource-group matrix.
 *
 * Responsibilities:
 *  - Visit pairs in configured order (subscriptions, then their resource groups)
 *  - Fetch and aggregate each pair; record a row or a failure, never both
 *  - Isolate failures: one pair failing never stops the run
 *  - Pause for `pacingMs` between consecutive pairs
 *
 * Per pair: Pending → Fetching → Succeeded | Failed. Pairs run strictly one
 * after another; retries live inside the transport, never across pairs.
 */

import type {
  BillingPeriod,
  CollectionFailure,
  CollectionResult,
  CostLineItem,
  CostScope,
  ResourceGroupCostRow,
  Sleeper,
  SubscriptionTarget,
} from '../../core/types.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import { CollectionError } from '../../core/errors.js'
import { sleep as defaultSleep } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { CostAggregator } from '../cost-aggregator/aggregator.js'
import { createCostAggregator } from '../cost-aggregator/aggregator.js'

const logger = createLogger('collection')

/** Source of the complete line-item set for one scope */
export interface LineItemSource {
  fetchAll(scope: CostScope, period: BillingPeriod): Promise<CostLineItem[]>
}

export interface CollectionRunOptions {
  /** Pause between consecutive pairs, in milliseconds */
  pacingMs: number
}

export interface CollectionPipelineOptions {
  source: LineItemSource
  aggregator?: CostAggregator
  eventBus?: TypedEventBus
  sleep?: Sleeper
  now?: () => number
}

/**
 * Expand targets into pairs in canonical output order.
 */
export function expandPairs(targets: readonly SubscriptionTarget[]): CostScope[] {
  return targets.flatMap((target) =>
    target.resourceGroups.map((resourceGroup) => ({
      subscriptionId: target.subscriptionId,
      resourceGroup,
    })),
  )
}

function toFailure(scope: CostScope, err: unknown): CollectionFailure {
  if (err instanceof CollectionError) {
    return { ...scope, kind: err.kind, message: err.message }
  }
  const message = err instanceof Error ? err.message : String(err)
  return { ...scope, kind: 'FatalError', message }
}

export class CollectionPipeline {
  private readonly _source: LineItemSource
  private readonly _aggregator: CostAggregator
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _sleep: Sleeper
  private readonly _now: () => number

  constructor(options: CollectionPipelineOptions) {
    this._source = options.source
    this._aggregator = options.aggregator ?? createCostAggregator()
    this._eventBus = options.eventBus
    this._sleep = options.sleep ?? defaultSleep
    this._now = options.now ?? Date.now
  }

  async run(
    targets: readonly SubscriptionTarget[],
    period: BillingPeriod,
    options: CollectionRunOptions,
  ): Promise<CollectionResult> {
    const startedAt = this._now()
    const pairs = expandPairs(targets)
    const rows: ResourceGroupCostRow[] = []
    const failures: CollectionFailure[] = []

    logger.info({ pairCount: pairs.length, subscriptionCount: targets.length }, 'Starting cost collection')

    for (const [position, scope] of pairs.entries()) {
      this._eventBus?.emit('pair:started', { ...scope, index: position + 1, total: pairs.length })

      try {
        const lineItems = await this._source.fetchAll(scope, period)
        const row: ResourceGroupCostRow = {
          subscriptionId: scope.subscriptionId,
          resourceGroup: scope.resourceGroup.toLowerCase(),
          start: period.start,
          end: period.end,
          totalCost: this._aggregator.aggregate(lineItems),
        }
        rows.push(row)
        logger.debug({ ...scope, totalCost: row.totalCost.toFixed(2) }, 'Pair collected')
        this._eventBus?.emit('pair:succeeded', { row, lineItemCount: lineItems.length })
      } catch (err) {
        const failure = toFailure(scope, err)
        failures.push(failure)
        logger.warn({ ...scope, kind: failure.kind }, `Pair failed: ${failure.message}`)
        this._eventBus?.emit('pair:failed', { failure })
      }

      if (position < pairs.length - 1 && options.pacingMs > 0) {
        this._eventBus?.emit('pipeline:pacing', { delayMs: options.pacingMs })
        await this._sleep(options.pacingMs)
      }
    }

    const durationMs = this._now() - startedAt
    logger.info({ rowCount: rows.length, failureCount: failures.length, durationMs }, 'Cost collection complete')
    this._eventBus?.emit('pipeline:complete', { rowCount: rows.length, failureCount: failures.length, durationMs })

    return { rows, failures }
  }
}

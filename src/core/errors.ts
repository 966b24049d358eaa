/**
 * Error definitions for rg-cost-report
 * Provides the structured error hierarchy used across collection, config and CLI code
 */

/** Base error class for all rg-cost-report errors */
export class CostReportError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'CostReportError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CostReportError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends CostReportError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/**
 * Terminal failure kinds for a single (subscription, resource group) pair.
 * Throttled and TransientServerError outcomes never surface as errors on their own;
 * they either succeed on retry or become RetriesExhausted.
 */
export type CollectionErrorKind = 'FatalError' | 'RetriesExhausted'

/** Error thrown when a cost query for one pair cannot be completed */
export class CollectionError extends CostReportError {
  public readonly kind: CollectionErrorKind

  constructor(
    kind: CollectionErrorKind,
    message: string,
    context: Record<string, unknown> = {}
  ) {
    super(message, kind === 'FatalError' ? 'COLLECTION_FATAL' : 'COLLECTION_RETRIES_EXHAUSTED', {
      kind,
      ...context,
    })
    this.name = 'CollectionError'
    this.kind = kind
  }
}

/** Error thrown when line items for a single scope carry more than one currency */
export class MixedCurrencyError extends CollectionError {
  constructor(currencies: string[], context: Record<string, unknown> = {}) {
    super('FatalError', `Mixed currencies in cost line items: ${currencies.join(', ')}`, {
      currencies,
      ...context,
    })
    this.name = 'MixedCurrencyError'
  }
}

/** Error thrown when a provider response body does not have the expected shape */
export class ResponseFormatError extends CostReportError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'RESPONSE_FORMAT_ERROR', context)
    this.name = 'ResponseFormatError'
  }
}

/** Error thrown when a bearer token cannot be obtained from the credential chain */
export class AuthenticationError extends CostReportError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'AUTHENTICATION_ERROR', context)
    this.name = 'AuthenticationError'
  }
}

/** Error thrown when an input file (such as a subscriptions CSV) cannot be read or understood */
export class InputFileError extends CostReportError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'INPUT_FILE_ERROR', context)
    this.name = 'InputFileError'
  }
}

/** Error thrown when the list of visible subscriptions cannot be retrieved */
export class SubscriptionDirectoryError extends CostReportError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'SUBSCRIPTION_DIRECTORY_ERROR', context)
    this.name = 'SubscriptionDirectoryError'
  }
}

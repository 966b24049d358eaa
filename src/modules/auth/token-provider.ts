/**
 * Bearer-token access for Azure Resource Manager calls.
 *
 * The collection code only sees `TokenProvider`; how the session was
 * established (Azure CLI login, browser sign-in) is decided by the caller.
 */

import {
  AzureCliCredential,
  ChainedTokenCredential,
  InteractiveBrowserCredential,
} from '@azure/identity'
import type { AccessToken, TokenCredential } from '@azure/identity'
import { AuthenticationError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('auth')

/** OAuth scope for Azure Resource Manager */
export const ARM_SCOPE = 'https://management.azure.com/.default'

/** Refresh tokens this long before they expire */
const EXPIRY_MARGIN_MS = 2 * 60 * 1000

export interface TokenProvider {
  /**
   * Return a bearer token valid for Azure Resource Manager.
   * @throws {AuthenticationError} when no credential in the chain can issue one
   */
  getToken(): Promise<string>
}

export interface CredentialOptions {
  tenantId?: string
}

/**
 * Credential chain used by the CLI: the signed-in Azure CLI session first,
 * then an interactive browser sign-in.
 */
export function createDefaultCredential(options: CredentialOptions = {}): TokenCredential {
  const tenantOptions = options.tenantId !== undefined ? { tenantId: options.tenantId } : {}
  return new ChainedTokenCredential(
    new AzureCliCredential(tenantOptions),
    new InteractiveBrowserCredential(tenantOptions),
  )
}

/**
 * TokenProvider over an `@azure/identity` credential that reuses the cached
 * token until shortly before it expires.
 */
export class CredentialTokenProvider implements TokenProvider {
  private _cached: { token: string; expiresOnTimestamp: number } | null = null

  constructor(
    private readonly _credential: TokenCredential,
    private readonly _scope: string = ARM_SCOPE,
    private readonly _now: () => number = Date.now,
  ) {}

  async getToken(): Promise<string> {
    if (this._cached !== null && this._cached.expiresOnTimestamp - EXPIRY_MARGIN_MS > this._now()) {
      return this._cached.token
    }

    let accessToken: AccessToken | null
    try {
      accessToken = await this._credential.getToken(this._scope)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new AuthenticationError(`Could not acquire an access token: ${message}`, { scope: this._scope })
    }

    if (accessToken === null) {
      throw new AuthenticationError('Credential chain returned no access token', { scope: this._scope })
    }

    this._cached = { token: accessToken.token, expiresOnTimestamp: accessToken.expiresOnTimestamp }
    logger.debug({ expiresOn: new Date(accessToken.expiresOnTimestamp).toISOString() }, 'Acquired access token')
    return accessToken.token
  }
}

export function createTokenProvider(credential: TokenCredential, scope: string = ARM_SCOPE): TokenProvider {
  return new CredentialTokenProvider(credential, scope)
}

export type { TokenProvider, CredentialOptions } from './token-provider.js'
export {
  ARM_SCOPE,
  CredentialTokenProvider,
  createDefaultCredential,
  createTokenProvider,
} from './token-provider.js'

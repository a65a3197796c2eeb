/**
 * @capl/core - Capped Airdrop Ledger
 * 
 * A single-asset ledger with a hard per-holder balance cap, an
 * administrator-only mint/transfer/burn surface, and whitelist-gated
 * batch airdrops.
 * 
 * @example
 * ```typescript
 * import { CAPL } from '@capl/core'
 * 
 * const ledger = await CAPL.initialize({ admin: adminKey })
 * await ledger.mint(adminKey, holderKey, 50)
 * 
 * const balance = await ledger.getBalance(holderKey)
 * ```
 * 
 * @packageDocumentation
 */

// Main class
export { CAPL } from './CAPL.js'

// Components
export { AuthorizationGuard } from './AuthorizationGuard.js'
export { SupplyCapPolicy } from './SupplyCapPolicy.js'
export { WhitelistRegistry } from './WhitelistRegistry.js'
export { FeatureFlags } from './FeatureFlags.js'
export { Ledger } from './Ledger.js'
export { AirdropEngine } from './AirdropEngine.js'
export { BalanceJournal } from './BalanceJournal.js'
export { OperationQueue } from './OperationQueue.js'

// Default stores
export { MemoryBalanceStore } from './MemoryBalanceStore.js'
export { MemoryLedgerStateStore } from './MemoryLedgerStateStore.js'

// Errors
export { CAPLError, isCAPLError } from './errors.js'
export type { CAPLErrorCode } from './errors.js'

// Types
export type {
  CAPLAsset,
  CAPLAssetMetadata,
  CapabilityKind,
  FeatureState,
  SupplyInfo,
  LedgerStatus,
  LedgerStateRecord,
  AirdropResult,
  BalanceReader,
  BalanceStore,
  BalanceStoreFactory,
  LedgerStateStore,
  CAPLConfig,
  ResolvedCAPLConfig
} from './types.js'

// Utilities
export {
  isValidAmount,
  isValidIdentityKey,
  isValidAssetId,
  cloneStateRecord
} from './utils.js'

// Constants
export {
  DEFAULT_MAX_PER_HOLDER,
  MIN_AMOUNT,
  MAX_AMOUNT
} from './constants.js'

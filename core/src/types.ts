/**
 * CAPL Core Type Definitions
 *
 * Type definitions for the Capped Airdrop Ledger.
 */

import type { PubKeyHex } from '@bsv/sdk'
import type { CAPABILITY_KINDS } from './constants.js'

// ---------------------------------------------------------------------------
// Asset Types
// ---------------------------------------------------------------------------

/**
 * Asset metadata structure
 */
export interface CAPLAssetMetadata {
  /** Asset name */
  name?: string
  /** Ticker symbol */
  symbol?: string
  /** Asset description */
  description?: string
  /** Asset icon URL */
  iconURL?: string
  /** Additional custom fields */
  [key: string]: unknown
}

/**
 * The single asset managed by a ledger. Immutable after initialization.
 */
export interface CAPLAsset {
  /** Asset ID (sha256 hex + ".0") */
  assetId: string
  /** Identity key of the administrator */
  admin: PubKeyHex
  /** Asset metadata */
  metadata: CAPLAssetMetadata
  /** Maximum balance any single holder may hold */
  maxPerHolder: number
  /** Creation time */
  createdAt: Date
}

export type CapabilityKind = typeof CAPABILITY_KINDS[number]

// ---------------------------------------------------------------------------
// Ledger State Types
// ---------------------------------------------------------------------------

export interface FeatureState {
  airdropEnabled: boolean
  whitelistEnabled: boolean
}

export interface SupplyInfo {
  totalMinted: number
  totalBurned: number
  /** totalMinted - totalBurned, equal to the sum of all balances */
  circulating: number
}

export interface LedgerStatus {
  /** Persisted but not enforced by any operation */
  paused: boolean
}

/**
 * Persisted ledger state, one record per asset
 */
export interface LedgerStateRecord extends CAPLAsset {
  features: FeatureState
  /** Whitelisted identities in insertion order */
  whitelist: PubKeyHex[]
  paused: boolean
  totalMinted: number
  totalBurned: number
}

// ---------------------------------------------------------------------------
// Operation Result Types
// ---------------------------------------------------------------------------

export interface AirdropResult {
  /** Number of recipients credited */
  recipients: number
  /** Sum of all amounts moved from the administrator */
  totalDistributed: number
}

// ---------------------------------------------------------------------------
// Collaborator Interfaces
// ---------------------------------------------------------------------------

/**
 * Read access to holder balances
 */
export interface BalanceReader {
  getBalance(holder: PubKeyHex): Promise<number>
}

/**
 * External balance store. Each call is assumed atomic on its own.
 * debit must reject with an InsufficientBalance CAPLError on underflow.
 */
export interface BalanceStore extends BalanceReader {
  credit(holder: PubKeyHex, amount: number): Promise<void>
  debit(holder: PubKeyHex, amount: number): Promise<void>
}

/**
 * Builds the balance store of an asset once its ID is known
 */
export type BalanceStoreFactory = (assetId: string) => BalanceStore

/**
 * Persistence for the ledger state record
 */
export interface LedgerStateStore {
  load(assetId: string): Promise<LedgerStateRecord | undefined>
  save(record: LedgerStateRecord): Promise<void>
}

// ---------------------------------------------------------------------------
// Configuration Types
// ---------------------------------------------------------------------------

/**
 * CAPL configuration options
 */
export interface CAPLConfig {
  /** Administrator identity key (required by initialize, checked by load) */
  admin?: PubKeyHex
  /** Per-holder balance cap (default: 100) */
  maxPerHolder?: number
  /** Asset metadata recorded at initialization */
  metadata?: CAPLAssetMetadata
  /** Balance store, or a factory keyed by asset ID (default: new MemoryBalanceStore()) */
  balanceStore?: BalanceStore | BalanceStoreFactory
  /** Ledger state store (default: new MemoryLedgerStateStore()) */
  stateStore?: LedgerStateStore
}

/**
 * Resolved configuration with defaults applied
 */
export interface ResolvedCAPLConfig {
  maxPerHolder: number
  metadata: CAPLAssetMetadata
  balanceStore: BalanceStoreFactory
  stateStore: LedgerStateStore
}

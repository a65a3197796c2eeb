/**
 * CAPL Constants
 * 
 * Constants used throughout the CAPL core library.
 */

// ---------------------------------------------------------------------------
// Supply Constants
// ---------------------------------------------------------------------------

/** Per-holder balance cap used when no other cap is configured */
export const DEFAULT_MAX_PER_HOLDER = 100

/** Minimum quantity accepted by mint, transfer, burn and airdrop */
export const MIN_AMOUNT = 1

/** Maximum quantity accepted by any operation */
export const MAX_AMOUNT = Number.MAX_SAFE_INTEGER

// ---------------------------------------------------------------------------
// Asset Constants
// ---------------------------------------------------------------------------

/** Output index suffix of every asset ID (single-asset ledger) */
export const ASSET_OUTPUT_INDEX = 0

/** Number of random bytes mixed into a new asset ID */
export const ASSET_NONCE_BYTES = 16

/** Capability kinds held by the ledger on behalf of the administrator */
export const CAPABILITY_KINDS = ['mint', 'transfer', 'burn'] as const

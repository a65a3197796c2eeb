import { PubKeyHex } from '@bsv/sdk'

/**
 * A holder balance stored in the caplBalances collection
 */
export interface BalanceRecord {
  assetId: string
  holder: PubKeyHex
  balance: number
  updatedAt: Date
}

/**
 * Holder listing entry
 */
export interface HolderBalance {
  holder: PubKeyHex
  balance: number
}

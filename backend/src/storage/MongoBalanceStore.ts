import { PubKeyHex } from '@bsv/sdk'
import type { BalanceStore } from '@capl/core'
import { CAPLStorageManager } from './CAPLStorageManager.js'

/**
 * BalanceStore for one asset, backed by CAPLStorageManager.
 */
export class MongoBalanceStore implements BalanceStore {
  constructor (
    private readonly storage: CAPLStorageManager,
    readonly assetId: string
  ) { }

  async getBalance (holder: PubKeyHex): Promise<number> {
    return await this.storage.getBalance(this.assetId, holder)
  }

  async credit (holder: PubKeyHex, amount: number): Promise<void> {
    await this.storage.credit(this.assetId, holder, amount)
  }

  async debit (holder: PubKeyHex, amount: number): Promise<void> {
    await this.storage.debit(this.assetId, holder, amount)
  }
}

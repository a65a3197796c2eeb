import { Collection, Db } from 'mongodb'
import { PubKeyHex } from '@bsv/sdk'
import { CAPLError, cloneStateRecord, LedgerStateRecord } from '@capl/core'
import { BalanceRecord, HolderBalance } from './types.js'
import { log } from '../utils/logging.js'

/**
 * Storage manager for CAPL balances and ledger state using MongoDB.
 */
export class CAPLStorageManager {
  private readonly balances: Collection<BalanceRecord>
  private readonly states: Collection<LedgerStateRecord>

  /**
   * @param db A connected MongoDB database handle.
   */
  constructor (private readonly db: Db) {
    this.balances = db.collection<BalanceRecord>('caplBalances')
    this.states = db.collection<LedgerStateRecord>('caplLedgerState')

    // One balance document per holder per asset
    this.balances
      .createIndex({ assetId: 1, holder: 1 }, { unique: true })
      .catch(error => log.error('Failed to create caplBalances index', error))

    this.states
      .createIndex({ assetId: 1 }, { unique: true })
      .catch(error => log.error('Failed to create caplLedgerState index', error))
  }

  // ---------------------------------------------------------------------------
  // Balances
  // ---------------------------------------------------------------------------

  async getBalance (assetId: string, holder: PubKeyHex): Promise<number> {
    const record = await this.balances.findOne({ assetId, holder })
    return record?.balance ?? 0
  }

  async credit (assetId: string, holder: PubKeyHex, amount: number): Promise<void> {
    await this.balances.updateOne(
      { assetId, holder },
      { $inc: { balance: amount }, $set: { updatedAt: new Date() } },
      { upsert: true }
    )
  }

  /**
   * Conditional decrement; matches only when the balance covers the amount.
   *
   * @throws CAPLError InsufficientBalance
   */
  async debit (assetId: string, holder: PubKeyHex, amount: number): Promise<void> {
    const result = await this.balances.updateOne(
      { assetId, holder, balance: { $gte: amount } },
      { $inc: { balance: -amount }, $set: { updatedAt: new Date() } }
    )
    if (result.matchedCount === 0) {
      const balance = await this.getBalance(assetId, holder)
      throw new CAPLError(
        'InsufficientBalance',
        `Insufficient balance. Have ${balance}, need ${amount}`,
        { holder, balance, amount }
      )
    }
  }

  /**
   * Holders with a positive balance, ordered by identity key.
   */
  async listBalances (
    assetId: string,
    limit: number = 50,
    skip: number = 0
  ): Promise<HolderBalance[]> {
    const results = await this.balances
      .find({ assetId, balance: { $gt: 0 } })
      .sort({ holder: 1 })
      .skip(skip)
      .limit(limit)
      .toArray()

    return results.map(({ holder, balance }) => ({ holder, balance }))
  }

  // ---------------------------------------------------------------------------
  // Ledger State
  // ---------------------------------------------------------------------------

  async loadState (assetId: string): Promise<LedgerStateRecord | undefined> {
    const record = await this.states.findOne({ assetId }, { projection: { _id: 0 } })
    return record === null ? undefined : cloneStateRecord(record)
  }

  async saveState (record: LedgerStateRecord): Promise<void> {
    await this.states.replaceOne(
      { assetId: record.assetId },
      cloneStateRecord(record),
      { upsert: true }
    )
  }
}

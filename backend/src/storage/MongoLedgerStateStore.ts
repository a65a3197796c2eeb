import type { LedgerStateRecord, LedgerStateStore } from '@capl/core'
import { CAPLStorageManager } from './CAPLStorageManager.js'

export class MongoLedgerStateStore implements LedgerStateStore {
  constructor (private readonly storage: CAPLStorageManager) { }

  async load (assetId: string): Promise<LedgerStateRecord | undefined> {
    return await this.storage.loadState(assetId)
  }

  async save (record: LedgerStateRecord): Promise<void> {
    await this.storage.saveState(record)
  }
}

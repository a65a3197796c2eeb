import type { LedgerStateRecord, LedgerStateStore } from './types.js'
import { cloneStateRecord } from './utils.js'

/**
 * In-process LedgerStateStore. Records are copied in and out.
 */
export class MemoryLedgerStateStore implements LedgerStateStore {
  private readonly records = new Map<string, LedgerStateRecord>()

  async load(assetId: string): Promise<LedgerStateRecord | undefined> {
    const record = this.records.get(assetId)
    return record === undefined ? undefined : cloneStateRecord(record)
  }

  async save(record: LedgerStateRecord): Promise<void> {
    this.records.set(record.assetId, cloneStateRecord(record))
  }
}

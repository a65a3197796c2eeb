import type { PubKeyHex } from '@bsv/sdk'
import { CAPLError } from './errors.js'
import type { BalanceReader, BalanceStore } from './types.js'

interface JournalEntry {
  holder: PubKeyHex
  /** Positive for a credit, negative for a debit */
  delta: number
}

/**
 * Staged view over a BalanceStore.
 *
 * Reads fall through to the store until a holder is touched; credits and
 * debits only change the staged balances. commit() writes the entries to the
 * store in order and, if the store fails partway, undoes what it already
 * wrote before rethrowing.
 *
 * @example
 * ```typescript
 * const journal = new BalanceJournal(store)
 * await journal.debit(admin, 10)
 * await journal.credit(holder, 10)
 * await journal.commit()
 * ```
 */
export class BalanceJournal implements BalanceReader {
  private readonly staged = new Map<PubKeyHex, number>()
  private readonly entries: JournalEntry[] = []
  private applied = 0
  private committed = false

  constructor(private readonly store: BalanceStore) {}

  async getBalance(holder: PubKeyHex): Promise<number> {
    const staged = this.staged.get(holder)
    if (staged !== undefined) return staged
    return await this.store.getBalance(holder)
  }

  async credit(holder: PubKeyHex, amount: number): Promise<void> {
    this.assertOpen()
    const current = await this.getBalance(holder)
    this.staged.set(holder, current + amount)
    this.entries.push({ holder, delta: amount })
  }

  /**
   * @throws CAPLError InsufficientBalance
   */
  async debit(holder: PubKeyHex, amount: number): Promise<void> {
    this.assertOpen()
    const current = await this.getBalance(holder)
    if (current < amount) {
      throw new CAPLError(
        'InsufficientBalance',
        `Insufficient balance. Have ${current}, need ${amount}`,
        { holder, balance: current, amount }
      )
    }
    this.staged.set(holder, current - amount)
    this.entries.push({ holder, delta: -amount })
  }

  /** Number of staged credits and debits */
  get size(): number {
    return this.entries.length
  }

  async commit(): Promise<void> {
    this.assertOpen()
    this.committed = true
    try {
      for (const entry of this.entries) {
        await this.apply(entry.holder, entry.delta)
        this.applied++
      }
    } catch (error) {
      await this.rollback()
      throw error
    }
  }

  /**
   * Undo every entry written by commit(), newest first.
   */
  async rollback(): Promise<void> {
    while (this.applied > 0) {
      const entry = this.entries[this.applied - 1]
      await this.apply(entry.holder, -entry.delta)
      this.applied--
    }
  }

  private async apply(holder: PubKeyHex, delta: number): Promise<void> {
    if (delta >= 0) {
      await this.store.credit(holder, delta)
    } else {
      await this.store.debit(holder, -delta)
    }
  }

  private assertOpen(): void {
    if (this.committed) {
      throw new Error('Balance journal has already been committed')
    }
  }
}

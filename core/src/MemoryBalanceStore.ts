import type { PubKeyHex } from '@bsv/sdk'
import { CAPLError } from './errors.js'
import type { BalanceStore } from './types.js'

/**
 * In-process BalanceStore, the default when no store is configured.
 */
export class MemoryBalanceStore implements BalanceStore {
  private readonly balances = new Map<PubKeyHex, number>()

  async getBalance(holder: PubKeyHex): Promise<number> {
    return this.balances.get(holder) ?? 0
  }

  async credit(holder: PubKeyHex, amount: number): Promise<void> {
    this.balances.set(holder, (this.balances.get(holder) ?? 0) + amount)
  }

  async debit(holder: PubKeyHex, amount: number): Promise<void> {
    const current = this.balances.get(holder) ?? 0
    if (current < amount) {
      throw new CAPLError(
        'InsufficientBalance',
        `Insufficient balance. Have ${current}, need ${amount}`,
        { holder, balance: current, amount }
      )
    }
    this.balances.set(holder, current - amount)
  }

  /** All holders with a non-zero balance */
  entries(): Array<[PubKeyHex, number]> {
    return Array.from(this.balances.entries()).filter(([, balance]) => balance > 0)
  }
}

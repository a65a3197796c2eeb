import type { PubKeyHex } from '@bsv/sdk'
import { CAPLError } from './errors.js'
import type { BalanceReader } from './types.js'

/**
 * No holder's post-operation balance may exceed maxPerHolder.
 */
export class SupplyCapPolicy {
  readonly maxPerHolder: number

  constructor(maxPerHolder: number) {
    if (!Number.isSafeInteger(maxPerHolder) || maxPerHolder < 1) {
      throw new CAPLError('InvalidConfig', `maxPerHolder must be a positive integer, got ${maxPerHolder}`)
    }
    this.maxPerHolder = maxPerHolder
  }

  wouldExceed(currentBalance: number, incomingAmount: number): boolean {
    return currentBalance + incomingAmount > this.maxPerHolder
  }

  /**
   * @throws CAPLError CapacityExceeded
   */
  async checkCap(balances: BalanceReader, holder: PubKeyHex, incomingAmount: number): Promise<void> {
    const current = await balances.getBalance(holder)
    if (this.wouldExceed(current, incomingAmount)) {
      throw new CAPLError(
        'CapacityExceeded',
        `Balance of ${holder} would be ${current + incomingAmount}, cap is ${this.maxPerHolder}`,
        { holder, current, incomingAmount, maxPerHolder: this.maxPerHolder }
      )
    }
  }
}

import type { PubKeyHex } from '@bsv/sdk'
import type { AuthorizationGuard } from './AuthorizationGuard.js'
import type { BalanceJournal } from './BalanceJournal.js'
import { CAPLError } from './errors.js'
import type { SupplyCapPolicy } from './SupplyCapPolicy.js'
import { canonicalIdentity, normalizeIdentity, validateAmount } from './utils.js'

/**
 * Mint, transfer and burn against a staged balance journal.
 *
 * Every operation checks authorization first, then validates, then stages
 * its credits and debits. Nothing reaches the balance store until the
 * caller commits the journal.
 */
export class Ledger {
  constructor(
    private readonly guard: AuthorizationGuard,
    private readonly capPolicy: SupplyCapPolicy
  ) {}

  /**
   * Credit `to` with newly created units.
   *
   * @throws CAPLError PermissionDenied, InvalidAmount, InvalidIdentity, CapacityExceeded
   */
  async mint(caller: PubKeyHex, to: PubKeyHex, amount: number, balances: BalanceJournal): Promise<void> {
    const { mint } = this.guard.requireAdmin(caller)
    mint.assertGrants(this.guard.assetId, 'mint')
    validateAmount(amount)
    const holder = normalizeIdentity(to)

    await this.capPolicy.checkCap(balances, holder, amount)
    await balances.credit(holder, amount)
  }

  /**
   * Move units between two holders. The administrator acts as operator for
   * any pair of holders, itself included.
   *
   * @throws CAPLError PermissionDenied, InvalidAmount, InvalidIdentity, InsufficientBalance, CapacityExceeded
   */
  async transfer(
    caller: PubKeyHex,
    from: PubKeyHex,
    to: PubKeyHex,
    amount: number,
    balances: BalanceJournal
  ): Promise<void> {
    const { transfer } = this.guard.requireAdmin(caller)
    transfer.assertGrants(this.guard.assetId, 'transfer')
    validateAmount(amount)
    const sender = normalizeIdentity(from)
    const recipient = normalizeIdentity(to)

    const available = await balances.getBalance(sender)
    if (available < amount) {
      throw new CAPLError(
        'InsufficientBalance',
        `Insufficient balance. Have ${available}, need ${amount}`,
        { holder: sender, balance: available, amount }
      )
    }
    await this.capPolicy.checkCap(balances, recipient, amount)

    await balances.debit(sender, amount)
    await balances.credit(recipient, amount)
  }

  /**
   * Destroy units held by `from`. Underflow is reported by the journal.
   *
   * @throws CAPLError PermissionDenied, InvalidAmount, InsufficientBalance
   */
  async burn(caller: PubKeyHex, from: PubKeyHex, amount: number, balances: BalanceJournal): Promise<void> {
    const { burn } = this.guard.requireAdmin(caller)
    burn.assertGrants(this.guard.assetId, 'burn')
    validateAmount(amount)

    await balances.debit(canonicalIdentity(from), amount)
  }
}

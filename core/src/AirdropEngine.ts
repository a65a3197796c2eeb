import type { PubKeyHex } from '@bsv/sdk'
import type { AuthorizationGuard } from './AuthorizationGuard.js'
import type { BalanceJournal } from './BalanceJournal.js'
import { CAPLError } from './errors.js'
import type { FeatureFlags } from './FeatureFlags.js'
import type { Ledger } from './Ledger.js'
import type { SupplyCapPolicy } from './SupplyCapPolicy.js'
import type { AirdropResult } from './types.js'
import { canonicalIdentity, isValidAmount } from './utils.js'

/**
 * Administrator-funded batch distribution.
 *
 * All transfers of a batch are staged in the same journal, so a failure at
 * any index leaves every balance as it was once the journal is discarded.
 */
export class AirdropEngine {
  constructor(
    private readonly guard: AuthorizationGuard,
    private readonly features: FeatureFlags,
    private readonly isWhitelisted: (identity: PubKeyHex) => boolean,
    private readonly capPolicy: SupplyCapPolicy,
    private readonly ledger: Ledger
  ) {}

  /**
   * Transfer amounts[i] from the administrator to recipients[i], in order.
   *
   * @throws CAPLError PermissionDenied, FeatureInactive, LengthMismatch,
   *   NotWhitelisted, CapacityExceeded, InvalidAmount, InsufficientBalance
   */
  async airdrop(
    caller: PubKeyHex,
    recipients: readonly PubKeyHex[],
    amounts: readonly number[],
    balances: BalanceJournal
  ): Promise<AirdropResult> {
    this.guard.requireAdmin(caller)
    this.features.requireAirdrop()
    this.features.requireWhitelist()

    if (recipients.length !== amounts.length) {
      throw new CAPLError(
        'LengthMismatch',
        `Got ${recipients.length} recipients and ${amounts.length} amounts`,
        { recipients: recipients.length, amounts: amounts.length }
      )
    }

    let totalDistributed = 0
    for (let i = 0; i < recipients.length; i++) {
      const recipient = canonicalIdentity(recipients[i])
      const amount = amounts[i]

      if (!this.isWhitelisted(recipient)) {
        throw new CAPLError('NotWhitelisted', `Recipient ${recipient} is not whitelisted`, { index: i, identity: recipient })
      }
      await this.capPolicy.checkCap(balances, recipient, amount)
      if (!isValidAmount(amount)) {
        throw new CAPLError('InvalidAmount', `Airdrop amount at index ${i} must be a positive integer, got ${amount}`, { index: i, amount })
      }

      await this.ledger.transfer(caller, caller, recipient, amount, balances)
      totalDistributed += amount
    }

    return { recipients: recipients.length, totalDistributed }
  }
}

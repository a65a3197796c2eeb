import { PubKeyHex } from '@bsv/sdk'
import type { AirdropResult, CAPL, CAPLAsset, FeatureState, LedgerStatus, SupplyInfo } from '@capl/core'
import { CAPLStorageManager } from '../storage/CAPLStorageManager.js'
import { HolderBalance } from '../storage/types.js'
import { formatCAPLError } from '../utils/formatCAPLError.js'
import { logWithTimestamp } from '../utils/logging.js'

const LOG_FILE = 'service/CAPLService'

/**
 * Logged façade over a CAPL ledger.
 *
 * Each mutating call writes one log line with its outcome. Errors are
 * rethrown unchanged.
 */
export class CAPLService {
  constructor (
    readonly ledger: CAPL,
    private readonly storage?: CAPLStorageManager
  ) { }

  get assetId (): string {
    return this.ledger.getMetadata().assetId
  }

  async setFeatures (caller: PubKeyHex, airdropEnabled: boolean, whitelistEnabled: boolean): Promise<void> {
    await this.run('setFeatures', { airdropEnabled, whitelistEnabled }, async () =>
      await this.ledger.setFeatures(caller, airdropEnabled, whitelistEnabled))
  }

  async getFeatures (caller: PubKeyHex): Promise<FeatureState> {
    return await this.ledger.getFeatures(caller)
  }

  async isWhitelisted (caller: PubKeyHex, identity: PubKeyHex): Promise<boolean> {
    return await this.ledger.isWhitelisted(caller, identity)
  }

  async updateWhitelist (caller: PubKeyHex, identities: readonly PubKeyHex[], add: boolean): Promise<void> {
    await this.run('updateWhitelist', { count: identities.length, add }, async () =>
      await this.ledger.updateWhitelist(caller, identities, add))
  }

  async mint (caller: PubKeyHex, to: PubKeyHex, amount: number): Promise<void> {
    await this.run('mint', { to, amount }, async () => await this.ledger.mint(caller, to, amount))
  }

  async transfer (caller: PubKeyHex, from: PubKeyHex, to: PubKeyHex, amount: number): Promise<void> {
    await this.run('transfer', { from, to, amount }, async () => await this.ledger.transfer(caller, from, to, amount))
  }

  async burn (caller: PubKeyHex, from: PubKeyHex, amount: number): Promise<void> {
    await this.run('burn', { from, amount }, async () => await this.ledger.burn(caller, from, amount))
  }

  async airdrop (caller: PubKeyHex, recipients: readonly PubKeyHex[], amounts: readonly number[]): Promise<AirdropResult> {
    return await this.run('airdrop', { recipients: recipients.length }, async () =>
      await this.ledger.airdrop(caller, recipients, amounts))
  }

  async getBalance (identity: PubKeyHex): Promise<number> {
    return await this.ledger.getBalance(identity)
  }

  getMetadata (): CAPLAsset {
    return this.ledger.getMetadata()
  }

  async getSupply (): Promise<SupplyInfo> {
    return await this.ledger.getSupply()
  }

  async getStatus (): Promise<LedgerStatus> {
    return await this.ledger.getStatus()
  }

  /**
   * Holders with a positive balance. Needs the MongoDB storage manager.
   */
  async listHolders (limit: number = 50, skip: number = 0): Promise<HolderBalance[]> {
    if (this.storage === undefined) {
      throw new Error('Holder listing requires a storage manager')
    }
    return await this.storage.listBalances(this.assetId, limit, skip)
  }

  private async run<T> (operation: string, details: Record<string, unknown>, fn: () => Promise<T>): Promise<T> {
    try {
      const result = await fn()
      logWithTimestamp(LOG_FILE, `${operation} succeeded`, details)
      return result
    } catch (error) {
      logWithTimestamp(LOG_FILE, `${operation} failed: ${formatCAPLError(error)}`, details)
      throw error
    }
  }
}

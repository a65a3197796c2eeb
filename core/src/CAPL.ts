/**
 * CAPL - Capped Airdrop Ledger
 *
 * Main class for managing a single capped asset. Provides high-level methods for:
 * - Minting, transferring and burning units (administrator only)
 * - Toggling the airdrop and whitelist features
 * - Maintaining the airdrop whitelist
 * - Batch airdrops funded by the administrator
 * - Querying balances, supply and asset metadata
 *
 */

import type { PubKeyHex } from '@bsv/sdk'

import { AirdropEngine } from './AirdropEngine.js'
import { AuthorizationGuard } from './AuthorizationGuard.js'
import { BalanceJournal } from './BalanceJournal.js'
import { CAPLError } from './errors.js'
import { FeatureFlags } from './FeatureFlags.js'
import { Ledger } from './Ledger.js'
import { MemoryBalanceStore } from './MemoryBalanceStore.js'
import { MemoryLedgerStateStore } from './MemoryLedgerStateStore.js'
import { OperationQueue } from './OperationQueue.js'
import { SupplyCapPolicy } from './SupplyCapPolicy.js'
import { WhitelistRegistry } from './WhitelistRegistry.js'
import type {
  AirdropResult,
  BalanceStore,
  BalanceStoreFactory,
  CAPLAsset,
  CAPLConfig,
  FeatureState,
  LedgerStateRecord,
  LedgerStatus,
  ResolvedCAPLConfig,
  SupplyInfo
} from './types.js'
import { DEFAULT_MAX_PER_HOLDER } from './constants.js'
import { canonicalIdentity, cloneStateRecord, computeAssetId, normalizeIdentity } from './utils.js'

/**
 * CAPL - Capped Airdrop Ledger
 *
 * Every public operation runs alone (operations are queued per instance) and
 * either applies completely or leaves balances and ledger state untouched.
 *
 * @example
 * ```typescript
 * const ledger = await CAPL.initialize({ admin: adminKey, metadata: { name: 'POINTS' } })
 *
 * await ledger.mint(adminKey, adminKey, 100)
 * await ledger.setFeatures(adminKey, true, true)
 * await ledger.updateWhitelist(adminKey, [alice, bob], true)
 * await ledger.airdrop(adminKey, [alice, bob], [10, 20])
 *
 * const balance = await ledger.getBalance(alice) // 10
 * ```
 */
export class CAPL {
  private readonly config: ResolvedCAPLConfig
  private readonly balances: BalanceStore
  private readonly asset: CAPLAsset
  private readonly guard: AuthorizationGuard
  private readonly capPolicy: SupplyCapPolicy
  private readonly features: FeatureFlags
  private readonly whitelist: WhitelistRegistry
  private readonly ledger: Ledger
  private readonly airdropEngine: AirdropEngine
  private readonly queue = new OperationQueue()
  private paused: boolean
  private totalMinted: number
  private totalBurned: number

  private constructor(record: LedgerStateRecord, config: ResolvedCAPLConfig) {
    this.config = config
    this.balances = config.balanceStore(record.assetId)
    this.asset = {
      assetId: record.assetId,
      admin: canonicalIdentity(record.admin),
      metadata: { ...record.metadata },
      maxPerHolder: record.maxPerHolder,
      createdAt: new Date(record.createdAt.getTime())
    }
    this.guard = new AuthorizationGuard(record.assetId, record.admin)
    this.capPolicy = new SupplyCapPolicy(record.maxPerHolder)
    this.features = new FeatureFlags(this.guard, record.features)
    this.whitelist = new WhitelistRegistry(this.features, record.whitelist)
    this.ledger = new Ledger(this.guard, this.capPolicy)
    this.airdropEngine = new AirdropEngine(
      this.guard,
      this.features,
      identity => this.whitelist.contains(identity),
      this.capPolicy,
      this.ledger
    )
    this.paused = record.paused
    this.totalMinted = record.totalMinted
    this.totalBurned = record.totalBurned
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Create a new asset administered by `config.admin`.
   *
   * The asset starts with both features disabled, an empty whitelist and no
   * supply. The initial state is persisted before the instance is returned.
   *
   * @throws CAPLError InvalidConfig, InvalidIdentity
   */
  static async initialize(config: CAPLConfig): Promise<CAPL> {
    if (config.admin === undefined) {
      throw new CAPLError('InvalidConfig', 'An administrator identity key is required')
    }
    const admin = normalizeIdentity(config.admin)
    const resolved = CAPL.resolveConfig(config)

    const createdAt = new Date()
    const record: LedgerStateRecord = {
      assetId: computeAssetId(admin, createdAt),
      admin,
      metadata: { ...resolved.metadata },
      maxPerHolder: resolved.maxPerHolder,
      createdAt,
      features: { airdropEnabled: false, whitelistEnabled: false },
      whitelist: [],
      paused: false,
      totalMinted: 0,
      totalBurned: 0
    }
    await resolved.stateStore.save(record)

    return new CAPL(record, resolved)
  }

  /**
   * Re-open a previously initialized asset from its persisted state.
   *
   * The cap and metadata come from the stored record; `config.admin`, when
   * given, must match the stored administrator.
   *
   * @throws CAPLError AssetNotFound, InvalidConfig
   */
  static async load(assetId: string, config: CAPLConfig = {}): Promise<CAPL> {
    const resolved = CAPL.resolveConfig(config)
    const record = await resolved.stateStore.load(assetId)
    if (record === undefined) {
      throw new CAPLError('AssetNotFound', `No ledger state found for asset ${assetId}`, { assetId })
    }
    if (config.admin !== undefined && canonicalIdentity(config.admin) !== canonicalIdentity(record.admin)) {
      throw new CAPLError('InvalidConfig', `Asset ${assetId} is administered by a different key`, { assetId })
    }
    return new CAPL(record, { ...resolved, maxPerHolder: record.maxPerHolder, metadata: record.metadata })
  }

  // ---------------------------------------------------------------------------
  // Feature Flags
  // ---------------------------------------------------------------------------

  /**
   * Overwrite both feature flags.
   *
   * @throws CAPLError PermissionDenied
   */
  async setFeatures(caller: PubKeyHex, airdropEnabled: boolean, whitelistEnabled: boolean): Promise<void> {
    await this.queue.run(async () => {
      const previous = this.toRecord()
      this.features.setFeatures(caller, airdropEnabled, whitelistEnabled)
      await this.persist(previous)
    })
  }

  /**
   * @throws CAPLError PermissionDenied
   */
  async getFeatures(caller: PubKeyHex): Promise<FeatureState> {
    return await this.queue.run(async () => this.features.getFeatures(caller))
  }

  // ---------------------------------------------------------------------------
  // Whitelist
  // ---------------------------------------------------------------------------

  /**
   * @throws CAPLError PermissionDenied
   */
  async isWhitelisted(caller: PubKeyHex, identity: PubKeyHex): Promise<boolean> {
    return await this.queue.run(async () => {
      this.guard.requireAdmin(caller)
      return this.whitelist.contains(identity)
    })
  }

  /**
   * Whitelisted identities in the order they were added.
   *
   * @throws CAPLError PermissionDenied
   */
  async listWhitelist(caller: PubKeyHex): Promise<PubKeyHex[]> {
    return await this.queue.run(async () => {
      this.guard.requireAdmin(caller)
      return this.whitelist.list()
    })
  }

  /**
   * Add (`add = true`) or remove identities. Either every identity is
   * applied or none is.
   *
   * @throws CAPLError PermissionDenied, InvalidAddressList, FeatureInactive, InvalidIdentity,
   *   AlreadyWhitelisted, NotWhitelisted
   */
  async updateWhitelist(caller: PubKeyHex, identities: readonly PubKeyHex[], add: boolean): Promise<void> {
    await this.queue.run(async () => {
      this.guard.requireAdmin(caller)
      const previous = this.toRecord()
      if (add) {
        this.whitelist.addMany(identities)
      } else {
        this.whitelist.removeMany(identities)
      }
      await this.persist(previous)
    })
  }

  // ---------------------------------------------------------------------------
  // Ledger Operations
  // ---------------------------------------------------------------------------

  /**
   * @throws CAPLError PermissionDenied, InvalidAmount, InvalidIdentity, CapacityExceeded
   */
  async mint(caller: PubKeyHex, to: PubKeyHex, amount: number): Promise<void> {
    await this.queue.run(async () => {
      const previous = this.toRecord()
      const balances = new BalanceJournal(this.balances)
      await this.ledger.mint(caller, to, amount, balances)
      this.totalMinted += amount
      await this.persist(previous, balances)
    })
  }

  /**
   * Operator transfer between any two holders.
   *
   * @throws CAPLError PermissionDenied, InvalidAmount, InvalidIdentity,
   *   InsufficientBalance, CapacityExceeded
   */
  async transfer(caller: PubKeyHex, from: PubKeyHex, to: PubKeyHex, amount: number): Promise<void> {
    await this.queue.run(async () => {
      const previous = this.toRecord()
      const balances = new BalanceJournal(this.balances)
      await this.ledger.transfer(caller, from, to, amount, balances)
      await this.persist(previous, balances)
    })
  }

  /**
   * @throws CAPLError PermissionDenied, InvalidAmount, InsufficientBalance
   */
  async burn(caller: PubKeyHex, from: PubKeyHex, amount: number): Promise<void> {
    await this.queue.run(async () => {
      const previous = this.toRecord()
      const balances = new BalanceJournal(this.balances)
      await this.ledger.burn(caller, from, amount, balances)
      this.totalBurned += amount
      await this.persist(previous, balances)
    })
  }

  /**
   * Transfer amounts[i] from the administrator to recipients[i].
   *
   * Requires both the airdrop and whitelist features. If any recipient fails
   * validation or transfer, no balance changes.
   *
   * @throws CAPLError PermissionDenied, FeatureInactive, LengthMismatch,
   *   NotWhitelisted, CapacityExceeded, InvalidAmount, InsufficientBalance
   */
  async airdrop(caller: PubKeyHex, recipients: readonly PubKeyHex[], amounts: readonly number[]): Promise<AirdropResult> {
    return await this.queue.run(async () => {
      const previous = this.toRecord()
      const balances = new BalanceJournal(this.balances)
      const result = await this.airdropEngine.airdrop(caller, recipients, amounts, balances)
      await this.persist(previous, balances)
      return result
    })
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  async getBalance(identity: PubKeyHex): Promise<number> {
    return await this.queue.run(async () => await this.balances.getBalance(canonicalIdentity(identity)))
  }

  getMetadata(): CAPLAsset {
    return {
      ...this.asset,
      metadata: { ...this.asset.metadata },
      createdAt: new Date(this.asset.createdAt.getTime())
    }
  }

  async getSupply(): Promise<SupplyInfo> {
    return await this.queue.run(async () => ({
      totalMinted: this.totalMinted,
      totalBurned: this.totalBurned,
      circulating: this.totalMinted - this.totalBurned
    }))
  }

  async getStatus(): Promise<LedgerStatus> {
    return await this.queue.run(async () => ({ paused: this.paused }))
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  private static resolveConfig(config: CAPLConfig): ResolvedCAPLConfig {
    const { maxPerHolder } = new SupplyCapPolicy(config.maxPerHolder ?? DEFAULT_MAX_PER_HOLDER)

    let balanceStore: BalanceStoreFactory
    if (typeof config.balanceStore === 'function') {
      balanceStore = config.balanceStore
    } else {
      const store = config.balanceStore ?? new MemoryBalanceStore()
      balanceStore = () => store
    }

    return {
      maxPerHolder,
      metadata: config.metadata ?? {},
      balanceStore,
      stateStore: config.stateStore ?? new MemoryLedgerStateStore()
    }
  }

  private toRecord(): LedgerStateRecord {
    return cloneStateRecord({
      ...this.asset,
      features: this.features.snapshot(),
      whitelist: this.whitelist.list(),
      paused: this.paused,
      totalMinted: this.totalMinted,
      totalBurned: this.totalBurned
    })
  }

  private restore(record: LedgerStateRecord): void {
    this.features.restore(record.features)
    this.whitelist.restore(record.whitelist)
    this.paused = record.paused
    this.totalMinted = record.totalMinted
    this.totalBurned = record.totalBurned
  }

  /**
   * Write staged balances, then the state record. If either write fails,
   * balances and in-memory state return to `previous`.
   */
  private async persist(previous: LedgerStateRecord, balances?: BalanceJournal): Promise<void> {
    try {
      await balances?.commit()
    } catch (error) {
      this.restore(previous)
      throw error
    }

    try {
      await this.config.stateStore.save(this.toRecord())
    } catch (error) {
      await balances?.rollback()
      this.restore(previous)
      throw error
    }
  }
}

import type { PubKeyHex } from '@bsv/sdk'
import type { AuthorizationGuard } from './AuthorizationGuard.js'
import { CAPLError } from './errors.js'
import type { FeatureState } from './types.js'

/**
 * The airdrop and whitelist gates. Both are independent; setFeatures
 * overwrites them together without cross-validation.
 */
export class FeatureFlags {
  private state: FeatureState

  constructor(
    private readonly guard: AuthorizationGuard,
    initial: FeatureState = { airdropEnabled: false, whitelistEnabled: false }
  ) {
    this.state = { ...initial }
  }

  setFeatures(caller: PubKeyHex, airdropEnabled: boolean, whitelistEnabled: boolean): void {
    this.guard.requireAdmin(caller)
    this.state = { airdropEnabled, whitelistEnabled }
  }

  getFeatures(caller: PubKeyHex): FeatureState {
    this.guard.requireAdmin(caller)
    return this.snapshot()
  }

  /**
   * @throws CAPLError FeatureInactive
   */
  requireAirdrop(): void {
    if (!this.state.airdropEnabled) {
      throw new CAPLError('FeatureInactive', 'Airdrop is not enabled', { feature: 'airdrop' })
    }
  }

  /**
   * @throws CAPLError FeatureInactive
   */
  requireWhitelist(): void {
    if (!this.state.whitelistEnabled) {
      throw new CAPLError('FeatureInactive', 'Whitelist is not enabled', { feature: 'whitelist' })
    }
  }

  snapshot(): FeatureState {
    return { ...this.state }
  }

  restore(state: FeatureState): void {
    this.state = { ...state }
  }
}

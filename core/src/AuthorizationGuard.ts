import type { PubKeyHex } from '@bsv/sdk'
import { CapabilitySet, createCapabilitySet } from './Capability.js'
import { CAPLError } from './errors.js'
import { canonicalIdentity } from './utils.js'

/**
 * Gatekeeper for privileged operations.
 *
 * Holds the asset's capabilities and lends them only to the administrator.
 */
export class AuthorizationGuard {
  readonly assetId: string
  private readonly admin: PubKeyHex
  private readonly capabilities: CapabilitySet

  constructor(assetId: string, admin: PubKeyHex) {
    this.assetId = assetId
    this.admin = canonicalIdentity(admin)
    this.capabilities = createCapabilitySet(assetId)
  }

  isAdmin(caller: PubKeyHex): boolean {
    return canonicalIdentity(caller) === this.admin
  }

  /**
   * Verify the caller is the administrator and borrow the capabilities.
   *
   * @throws CAPLError PermissionDenied
   */
  requireAdmin(caller: PubKeyHex): CapabilitySet {
    if (!this.isAdmin(caller)) {
      throw new CAPLError(
        'PermissionDenied',
        `Caller ${caller} is not the administrator of asset ${this.assetId}`,
        { caller, assetId: this.assetId }
      )
    }
    return this.capabilities
  }
}

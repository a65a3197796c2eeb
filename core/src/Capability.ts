import { CAPLError } from './errors.js'
import type { CapabilityKind } from './types.js'

// Only code in this module can mint capabilities.
const ISSUER_KEY: unique symbol = Symbol('capl.capability')

/**
 * Authority to perform one privileged action on one asset.
 *
 * Capabilities have no public fields, refuse serialization and cannot be
 * constructed outside this module. The ledger holds them on behalf of the
 * administrator and only hands them out through AuthorizationGuard.
 */
export class Capability {
  readonly #assetId: string
  readonly #kind: CapabilityKind

  constructor(key: symbol, assetId: string, kind: CapabilityKind) {
    if (key !== ISSUER_KEY) {
      throw new CAPLError('PermissionDenied', 'Capabilities cannot be constructed directly')
    }
    this.#assetId = assetId
    this.#kind = kind
    Object.freeze(this)
  }

  /**
   * @throws CAPLError PermissionDenied if this capability does not grant `kind` on `assetId`
   */
  assertGrants(assetId: string, kind: CapabilityKind): void {
    if (this.#assetId !== assetId || this.#kind !== kind) {
      throw new CAPLError(
        'PermissionDenied',
        `Capability does not grant ${kind} on asset ${assetId}`,
        { assetId, kind }
      )
    }
  }

  toJSON(): never {
    throw new CAPLError('PermissionDenied', 'Capabilities cannot be serialized')
  }
}

export interface CapabilitySet {
  readonly mint: Capability
  readonly transfer: Capability
  readonly burn: Capability
}

/**
 * Create the capabilities of a newly initialized (or re-loaded) asset.
 */
export function createCapabilitySet(assetId: string): CapabilitySet {
  return Object.freeze({
    mint: new Capability(ISSUER_KEY, assetId, 'mint'),
    transfer: new Capability(ISSUER_KEY, assetId, 'transfer'),
    burn: new Capability(ISSUER_KEY, assetId, 'burn')
  })
}

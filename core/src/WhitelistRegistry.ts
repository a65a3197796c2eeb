import type { PubKeyHex } from '@bsv/sdk'
import { CAPLError } from './errors.js'
import type { FeatureFlags } from './FeatureFlags.js'
import { canonicalIdentity, normalizeIdentity } from './utils.js'

/**
 * Set of identities eligible to receive airdrops.
 *
 * Mutations are all-or-nothing: entries are staged on a copy of the set and
 * the copy replaces the live set only after every entry validated. Members
 * are stored in canonical (lower-case) form.
 */
export class WhitelistRegistry {
  private members: Set<PubKeyHex>

  constructor(
    private readonly features: FeatureFlags,
    initial: Iterable<PubKeyHex> = []
  ) {
    this.members = new Set(Array.from(initial, canonicalIdentity))
  }

  contains(identity: PubKeyHex): boolean {
    return this.members.has(canonicalIdentity(identity))
  }

  /**
   * @throws CAPLError InvalidAddressList, FeatureInactive, InvalidIdentity, AlreadyWhitelisted
   */
  addMany(identities: readonly PubKeyHex[]): void {
    this.assertMutable(identities)

    const staged = new Set(this.members)
    for (const entry of identities) {
      const identity = normalizeIdentity(entry)
      if (staged.has(identity)) {
        throw new CAPLError('AlreadyWhitelisted', `${identity} is already whitelisted`, { identity })
      }
      staged.add(identity)
    }
    this.members = staged
  }

  /**
   * @throws CAPLError InvalidAddressList, FeatureInactive, InvalidIdentity, NotWhitelisted
   */
  removeMany(identities: readonly PubKeyHex[]): void {
    this.assertMutable(identities)

    const staged = new Set(this.members)
    for (const entry of identities) {
      const identity = normalizeIdentity(entry)
      if (!staged.delete(identity)) {
        throw new CAPLError('NotWhitelisted', `${identity} is not whitelisted`, { identity })
      }
    }
    this.members = staged
  }

  get size(): number {
    return this.members.size
  }

  /** Members in insertion order */
  list(): PubKeyHex[] {
    return Array.from(this.members)
  }

  restore(identities: Iterable<PubKeyHex>): void {
    this.members = new Set(Array.from(identities, canonicalIdentity))
  }

  private assertMutable(identities: readonly PubKeyHex[]): void {
    if (identities.length === 0) {
      throw new CAPLError('InvalidAddressList', 'At least one identity is required')
    }
    this.features.requireWhitelist()
  }
}

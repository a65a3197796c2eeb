import { PrivateKey } from '@bsv/sdk'
import { AuthorizationGuard } from '../AuthorizationGuard.js'
import { FeatureFlags } from '../FeatureFlags.js'
import { WhitelistRegistry } from '../WhitelistRegistry.js'

const ASSET_ID = 'a'.repeat(64) + '.0'
const newKey = (): string => PrivateKey.fromRandom().toPublicKey().toString()
const ADMIN = newKey()
const ALICE = newKey()
const BOB = newKey()
const CAROL = newKey()

function thrown(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  throw new Error('Expected function to throw')
}

describe('WhitelistRegistry', () => {
  let features: FeatureFlags
  let registry: WhitelistRegistry

  beforeEach(() => {
    features = new FeatureFlags(new AuthorizationGuard(ASSET_ID, ADMIN), { airdropEnabled: false, whitelistEnabled: true })
    registry = new WhitelistRegistry(features)
  })

  it('should start empty', () => {
    expect(registry.size).toBe(0)
    expect(registry.contains(ALICE)).toBe(false)
  })

  it('should keep insertion order', () => {
    registry.addMany([BOB, ALICE])
    registry.addMany([CAROL])
    expect(registry.list()).toEqual([BOB, ALICE, CAROL])
  })

  it('should reject a duplicate inside a single call without adding anything', () => {
    expect(thrown(() => registry.addMany([ALICE, BOB, ALICE]))).toMatchObject({ code: 'AlreadyWhitelisted' })
    expect(registry.size).toBe(0)
  })

  it('should reject removing the same identity twice in one call', () => {
    registry.addMany([ALICE, BOB])
    expect(thrown(() => registry.removeMany([ALICE, ALICE]))).toMatchObject({ code: 'NotWhitelisted' })
    expect(registry.list()).toEqual([ALICE, BOB])
  })

  it('should check the list before the feature flag', () => {
    features.restore({ airdropEnabled: false, whitelistEnabled: false })
    expect(thrown(() => registry.addMany([]))).toMatchObject({ code: 'InvalidAddressList' })
    expect(thrown(() => registry.addMany([ALICE]))).toMatchObject({ code: 'FeatureInactive' })
    expect(thrown(() => registry.removeMany([ALICE]))).toMatchObject({ code: 'FeatureInactive' })
  })

  it('should answer contains regardless of the feature flag', () => {
    registry.addMany([ALICE])
    features.restore({ airdropEnabled: false, whitelistEnabled: false })
    expect(registry.contains(ALICE)).toBe(true)
  })

  it('should treat upper- and lower-case hex as the same identity', () => {
    registry.addMany([ALICE.toUpperCase()])

    expect(registry.list()).toEqual([ALICE])
    expect(registry.contains(ALICE)).toBe(true)
    expect(registry.contains(ALICE.toUpperCase())).toBe(true)
    expect(thrown(() => registry.addMany([ALICE]))).toMatchObject({ code: 'AlreadyWhitelisted' })

    registry.removeMany([ALICE.toUpperCase()])
    expect(registry.size).toBe(0)
  })

  it('should reject an invalid identity without adding the valid ones', () => {
    expect(thrown(() => registry.addMany([ALICE, 'garbage']))).toMatchObject({
      code: 'InvalidIdentity',
      details: { identity: 'garbage' }
    })
    expect(registry.size).toBe(0)
  })

  it('should reject an invalid identity on removal without removing the valid ones', () => {
    registry.addMany([ALICE])
    expect(thrown(() => registry.removeMany([ALICE, '02' + 'g'.repeat(64)]))).toMatchObject({ code: 'InvalidIdentity' })
    expect(registry.list()).toEqual([ALICE])
  })

  it('should replace its members on restore', () => {
    registry.addMany([ALICE])
    registry.restore([BOB, CAROL])
    expect(registry.list()).toEqual([BOB, CAROL])
  })
})

/**
 * Utility functions for CAPL
 */

import { Hash, PublicKey, PubKeyHex, Random, Utils } from '@bsv/sdk'
import { CAPLError } from './errors.js'
import { ASSET_NONCE_BYTES, ASSET_OUTPUT_INDEX, MAX_AMOUNT, MIN_AMOUNT } from './constants.js'
import type { LedgerStateRecord } from './types.js'

/**
 * Check whether an amount is an integer between MIN_AMOUNT and MAX_AMOUNT.
 */
export function isValidAmount(amount: number): boolean {
  return Number.isSafeInteger(amount) && amount >= MIN_AMOUNT && amount <= MAX_AMOUNT
}

/**
 * @throws CAPLError InvalidAmount
 */
export function validateAmount(amount: number): void {
  if (!isValidAmount(amount)) {
    throw new CAPLError(
      'InvalidAmount',
      `Amount must be an integer between ${MIN_AMOUNT} and ${MAX_AMOUNT}, got ${amount}`,
      { amount }
    )
  }
}

/**
 * Check if a string is a compressed secp256k1 public key in hex.
 */
export function isValidIdentityKey(identity: string): boolean {
  if (!/^0[23][a-fA-F0-9]{64}$/.test(identity)) return false
  try {
    PublicKey.fromString(identity.toLowerCase())
    return true
  } catch {
    return false
  }
}

/**
 * @throws CAPLError InvalidIdentity
 */
export function validateIdentity(identity: PubKeyHex): void {
  if (!isValidIdentityKey(identity)) {
    throw new CAPLError('InvalidIdentity', `Invalid identity key: ${identity}`, { identity })
  }
}

/**
 * Lower-case form used for every balance, whitelist and admin lookup.
 * Does not validate.
 */
export function canonicalIdentity(identity: PubKeyHex): PubKeyHex {
  return identity.toLowerCase()
}

/**
 * Validate an identity key and return its canonical form.
 *
 * @throws CAPLError InvalidIdentity
 */
export function normalizeIdentity(identity: PubKeyHex): PubKeyHex {
  validateIdentity(identity)
  return canonicalIdentity(identity)
}

/**
 * Derive a fresh asset ID for an administrator.
 *
 * The ID is sha256(admin || createdAt || nonce) in hex, followed by ".0".
 */
export function computeAssetId(admin: PubKeyHex, createdAt: Date): string {
  const nonce = Utils.toHex(Random(ASSET_NONCE_BYTES))
  const preimage = Utils.toArray(`${admin}:${createdAt.toISOString()}:${nonce}`, 'utf8')
  const digest = Utils.toHex(Hash.sha256(preimage))
  return `${digest}.${ASSET_OUTPUT_INDEX}`
}

/**
 * Check if a string is a valid asset ID format (64 hex chars + ".0")
 */
export function isValidAssetId(assetId: string): boolean {
  const parts = assetId.split('.')
  if (parts.length !== 2) return false

  const [digest, outputIndex] = parts
  return /^[a-fA-F0-9]{64}$/.test(digest) && outputIndex === String(ASSET_OUTPUT_INDEX)
}

/**
 * Deep copy of a state record so stores never share arrays or dates with callers.
 */
export function cloneStateRecord(record: LedgerStateRecord): LedgerStateRecord {
  return {
    ...record,
    metadata: { ...record.metadata },
    features: { ...record.features },
    whitelist: [...record.whitelist],
    createdAt: new Date(record.createdAt.getTime())
  }
}

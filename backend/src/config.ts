// ============================================================================
// BACKEND CONFIGURATION
// Server-side configuration with environment variable overrides
// ============================================================================

import { DEFAULT_MAX_PER_HOLDER, isValidAssetId, isValidIdentityKey } from '@capl/core'

export interface BackendConfig {
  mongo: {
    url: string
    dbName: string
  }
  ledger: {
    /** Administrator identity key */
    adminKey: string
    /** Existing asset to load; a new asset is initialized when empty */
    assetId: string
    maxPerHolder: number
    name: string
  }
}

export const BACKEND_CONFIG: BackendConfig = {
  mongo: {
    url: process.env.MONGO_URL || 'mongodb://localhost:27017',
    dbName: process.env.CAPL_DB_NAME || 'capl'
  },
  ledger: {
    adminKey: process.env.CAPL_ADMIN_KEY || '',
    assetId: process.env.CAPL_ASSET_ID || '',
    maxPerHolder: parseInt(process.env.CAPL_MAX_PER_HOLDER || String(DEFAULT_MAX_PER_HOLDER), 10),
    name: process.env.CAPL_ASSET_NAME || ''
  }
}

// ============================================================================
// VALIDATION
// ============================================================================

export function validateConfig (config: BackendConfig = BACKEND_CONFIG): string[] {
  const errors: string[] = []

  if (!config.mongo.url) {
    errors.push('MONGO_URL environment variable is required')
  }
  if (!config.ledger.adminKey) {
    errors.push('CAPL_ADMIN_KEY environment variable is required')
  } else if (!isValidIdentityKey(config.ledger.adminKey)) {
    errors.push('CAPL_ADMIN_KEY must be a compressed public key in hex')
  }
  if (config.ledger.assetId && !isValidAssetId(config.ledger.assetId)) {
    errors.push('CAPL_ASSET_ID must be a 64 character hex digest followed by ".0"')
  }
  if (!Number.isSafeInteger(config.ledger.maxPerHolder) || config.ledger.maxPerHolder < 1) {
    errors.push('CAPL_MAX_PER_HOLDER must be a positive integer')
  }

  return errors
}

import { Db, MongoClient } from 'mongodb'
import { PubKeyHex } from '@bsv/sdk'
import { CAPL, CAPLAssetMetadata } from '@capl/core'
import { BackendConfig, BACKEND_CONFIG, validateConfig } from './config.js'
import { CAPLService } from './service/CAPLService.js'
import { CAPLStorageManager } from './storage/CAPLStorageManager.js'
import { MongoBalanceStore } from './storage/MongoBalanceStore.js'
import { MongoLedgerStateStore } from './storage/MongoLedgerStateStore.js'
import { logWithTimestamp } from './utils/logging.js'

const LOG_FILE = 'CAPLBackend'

export interface CAPLBackendOptions {
  admin: PubKeyHex
  /** Load this asset instead of initializing a new one */
  assetId?: string
  maxPerHolder?: number
  metadata?: CAPLAssetMetadata
}

/**
 * Wire a CAPL ledger to MongoDB storage.
 *
 * Loads `options.assetId` when given, otherwise initializes a new asset.
 */
export async function createCAPLBackend (db: Db, options: CAPLBackendOptions): Promise<CAPLService> {
  const storage = new CAPLStorageManager(db)
  const config = {
    admin: options.admin,
    maxPerHolder: options.maxPerHolder,
    metadata: options.metadata,
    stateStore: new MongoLedgerStateStore(storage),
    balanceStore: (assetId: string) => new MongoBalanceStore(storage, assetId)
  }

  const ledger = options.assetId
    ? await CAPL.load(options.assetId, config)
    : await CAPL.initialize(config)

  const { assetId } = ledger.getMetadata()
  logWithTimestamp(LOG_FILE, options.assetId ? `Loaded asset ${assetId}` : `Initialized asset ${assetId}`)

  return new CAPLService(ledger, storage)
}

/**
 * Connect to MongoDB using the environment configuration and open the ledger.
 * The caller owns the returned client and closes it on shutdown.
 */
export async function connectCAPLBackend (
  config: BackendConfig = BACKEND_CONFIG
): Promise<{ client: MongoClient, service: CAPLService }> {
  const errors = validateConfig(config)
  if (errors.length > 0) {
    throw new Error(`Invalid backend configuration: ${errors.join('; ')}`)
  }

  const client = new MongoClient(config.mongo.url)
  await client.connect()
  try {
    const service = await createCAPLBackend(client.db(config.mongo.dbName), {
      admin: config.ledger.adminKey,
      assetId: config.ledger.assetId || undefined,
      maxPerHolder: config.ledger.maxPerHolder,
      metadata: config.ledger.name ? { name: config.ledger.name } : undefined
    })
    return { client, service }
  } catch (error) {
    await client.close()
    throw error
  }
}

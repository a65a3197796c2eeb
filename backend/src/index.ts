/**
 * @capl/backend - MongoDB persistence and service wiring for CAPL ledgers
 *
 * @packageDocumentation
 */

export { createCAPLBackend, connectCAPLBackend } from './CAPLBackend.js'
export { CAPLService } from './service/CAPLService.js'
export { CAPLStorageManager } from './storage/CAPLStorageManager.js'
export { MongoBalanceStore } from './storage/MongoBalanceStore.js'
export { MongoLedgerStateStore } from './storage/MongoLedgerStateStore.js'
export { BACKEND_CONFIG, validateConfig } from './config.js'
export { formatCAPLError } from './utils/formatCAPLError.js'
export { log, logWithTimestamp, setLoggingEnabled } from './utils/logging.js'
export type { BalanceRecord, HolderBalance, BackendConfig, CAPLBackendOptions } from './types.js'

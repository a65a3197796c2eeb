/**
 * Type definitions for CAPL backend services
 * @module types
 */

export type { BalanceRecord, HolderBalance } from './storage/types.js'
export type { BackendConfig } from './config.js'
export type { CAPLBackendOptions } from './CAPLBackend.js'

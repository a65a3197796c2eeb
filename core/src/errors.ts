/**
 * CAPL error taxonomy.
 * 
 * Every failure inside the core is raised as a CAPLError carrying one of the
 * codes below. Nothing is caught or retried inside the core.
 */

export type CAPLErrorCode =
  | 'PermissionDenied'
  | 'CapacityExceeded'
  | 'InsufficientBalance'
  | 'FeatureInactive'
  | 'LengthMismatch'
  | 'InvalidAmount'
  | 'InvalidAddressList'
  | 'AlreadyWhitelisted'
  | 'NotWhitelisted'
  | 'InvalidIdentity'
  | 'InvalidConfig'
  | 'AssetNotFound'

export class CAPLError extends Error {
  code: CAPLErrorCode
  details?: Record<string, unknown>

  constructor(code: CAPLErrorCode, message: string, details?: Record<string, unknown>) {
    super(message)
    this.name = 'CAPLError'
    this.code = code
    this.details = details
  }
}

export function isCAPLError(err: unknown, code?: CAPLErrorCode): err is CAPLError {
  if (!(err instanceof CAPLError)) return false
  return code === undefined || err.code === code
}

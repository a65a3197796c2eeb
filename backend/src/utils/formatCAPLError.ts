import { isCAPLError } from '@capl/core'

export const formatCAPLError = (error: unknown, fallback: string = 'Something went wrong!'): string => {
  if (isCAPLError(error)) {
    switch (error.code) {
      case 'PermissionDenied':
        return 'Only the asset administrator can do that'
      case 'CapacityExceeded':
        return 'That would put a holder over the balance cap'
      case 'InsufficientBalance':
        return 'Insufficient balance for this transaction'
      case 'FeatureInactive':
        return `The ${String(error.details?.feature ?? 'requested')} feature is not enabled`
      case 'LengthMismatch':
        return 'Recipients and amounts must have the same length'
      case 'InvalidAmount':
        return 'Amounts must be positive whole numbers'
      case 'InvalidAddressList':
        return 'Provide at least one identity'
      case 'AlreadyWhitelisted':
        return 'Identity is already whitelisted'
      case 'NotWhitelisted':
        return 'Identity is not whitelisted'
      default:
        return error.message
    }
  }

  const rawMessage = error instanceof Error ? error.message : String(error ?? '')
  if (!rawMessage) return fallback

  const lower = rawMessage.toLowerCase()
  if (lower.includes('timeout') || lower.includes('timed out')) {
    return 'Request timed out. Please try again.'
  }
  if (lower.includes('econnrefused') || lower.includes('network')) {
    return 'Storage is unreachable. Please try again later.'
  }

  return rawMessage.length < 120 && !rawMessage.includes('{') ? rawMessage : fallback
}

// Per-file logging switches for the CAPL backend.
// Keys are the `file` argument passed to logWithTimestamp; `default` covers the rest.

const enabled = process.env.CAPL_LOGGING !== 'off'

const loggingConfig: { [file: string]: boolean } = {
  default: enabled,
  CAPLBackend: enabled,
  'storage/CAPLStorageManager': enabled,
  'service/CAPLService': enabled
}

export default loggingConfig

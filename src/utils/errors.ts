import {
  AuthError,
  LocalIOError,
  NetworkError,
  RemoteIOError,
  SftpFerryError,
  type FerryErrorKind
} from '../types/errors'

/** errno codes that mean the transport is gone rather than a file problem */
const NETWORK_CODES: ReadonlySet<string> = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE'
])

/** ssh2 error levels raised while the transport is being established */
const NETWORK_LEVELS: ReadonlySet<string> = new Set([
  'client-socket',
  'client-timeout',
  'protocol',
  'handshake'
])

/** SFTP status codes (draft-ietf-secsh-filexfer-02) */
const SFTP_STATUS: Record<number, string> = {
  1: 'End of file',
  2: 'No such file',
  3: 'Permission denied',
  4: 'Failure',
  5: 'Bad message',
  6: 'No connection',
  7: 'Connection lost',
  8: 'Operation unsupported'
}

export function errorMessage(err: unknown, fallback: string = 'Unknown error'): string {
  if (err instanceof Error && err.message) return err.message
  if (typeof err === 'string' && err) return err
  return fallback
}

type IOFallback = Extract<FerryErrorKind, 'RemoteIOError' | 'LocalIOError' | 'NetworkError'>

/**
 * Map an ssh2, SFTP or fs error onto the package's error kinds.
 * Errors that already carry a kind pass through untouched.
 */
export function toFerryError(
  err: unknown,
  fallback: IOFallback,
  path?: string
): SftpFerryError {
  if (err instanceof SftpFerryError) return err

  const message = errorMessage(err)

  if (typeof err === 'object' && err !== null) {
    if ('level' in err && typeof err.level === 'string') {
      if (err.level === 'client-authentication') {
        return new AuthError(message, { cause: err })
      }
      if (NETWORK_LEVELS.has(err.level)) {
        return new NetworkError(message, { cause: err })
      }
    }

    if ('code' in err) {
      // SFTP status codes are numeric, errno codes are strings
      if (typeof err.code === 'number') {
        if (err.code === 6 || err.code === 7) {
          return new NetworkError(message, { cause: err })
        }
        const status = SFTP_STATUS[err.code] ?? `SFTP status ${err.code}`
        const text = message === 'Unknown error' ? status : message
        return new RemoteIOError(path ? `${text}: ${path}` : text, path, { cause: err })
      }
      if (typeof err.code === 'string') {
        if (NETWORK_CODES.has(err.code)) {
          return new NetworkError(message, { cause: err })
        }
        return new LocalIOError(message, path, { cause: err })
      }
    }
  }

  switch (fallback) {
    case 'LocalIOError':
      return new LocalIOError(message, path, { cause: err })
    case 'NetworkError':
      return new NetworkError(message, { cause: err })
    case 'RemoteIOError':
    default:
      return new RemoteIOError(message, path, { cause: err })
  }
}

import type { HostKeyInfo } from './hostkey'

/** Discriminator carried by every error this package raises */
export type FerryErrorKind =
  | 'AuthError'
  | 'NetworkError'
  | 'NotConnected'
  | 'RemoteIOError'
  | 'LocalIOError'
  | 'RemoteCommandError'
  | 'Cancelled'
  | 'Busy'
  | 'UntrustedHost'
  | 'InvalidSetting'

export class SftpFerryError extends Error {
  readonly kind: FerryErrorKind

  constructor(kind: FerryErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = kind
    this.kind = kind
  }
}

/** Credentials or auth method rejected by the server */
export class AuthError extends SftpFerryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('AuthError', message, options)
  }
}

/** Connect failure, timeout or reset */
export class NetworkError extends SftpFerryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('NetworkError', message, options)
  }
}

export class NotConnectedError extends SftpFerryError {
  constructor(message: string = 'Not connected') {
    super('NotConnected', message)
  }
}

/** Remote path missing, permission denied and other SFTP status failures */
export class RemoteIOError extends SftpFerryError {
  readonly path?: string

  constructor(message: string, path?: string, options?: { cause?: unknown }) {
    super('RemoteIOError', message, options)
    this.path = path
  }
}

/** Local disk full, permission denied and other filesystem failures */
export class LocalIOError extends SftpFerryError {
  readonly path?: string

  constructor(message: string, path?: string, options?: { cause?: unknown }) {
    super('LocalIOError', message, options)
    this.path = path
  }
}

/** Non-zero exit from a remote shell invocation */
export class RemoteCommandError extends SftpFerryError {
  readonly command: string
  readonly exitCode: number
  readonly stderr: string

  constructor(message: string, command: string, exitCode: number, stderr: string) {
    super('RemoteCommandError', message)
    this.command = command
    this.exitCode = exitCode
    this.stderr = stderr
  }
}

/** User-initiated stop. Not a failure. */
export class CancelledError extends SftpFerryError {
  constructor(message: string = 'Cancelled') {
    super('Cancelled', message)
  }
}

/** Rejected because another operation holds the session */
export class BusyError extends SftpFerryError {
  readonly activeOperation: string

  constructor(activeOperation: string) {
    super('Busy', `Session is busy: ${activeOperation} in progress`)
    this.activeOperation = activeOperation
  }
}

/** Server host key unknown or different from the trusted one */
export class UntrustedHostError extends SftpFerryError {
  readonly hostKey: HostKeyInfo
  readonly reason: 'unknown' | 'changed'

  constructor(hostKey: HostKeyInfo, reason: 'unknown' | 'changed') {
    super(
      'UntrustedHost',
      reason === 'changed'
        ? `Host key for ${hostKey.host}:${hostKey.port} has changed (${hostKey.keyType} ${hostKey.fingerprint})`
        : `Host key for ${hostKey.host}:${hostKey.port} is not trusted (${hostKey.keyType} ${hostKey.fingerprint})`
    )
    this.hostKey = hostKey
    this.reason = reason
  }
}

/** A settings update outside the accepted range */
export class InvalidSettingError extends SftpFerryError {
  readonly setting: string

  constructor(setting: string, message: string) {
    super('InvalidSetting', message)
    this.setting = setting
  }
}

import type { HostKeyStore } from '../services/HostKeyStore'
import type { LogService } from '../services/LogService'
import type { SessionManager } from '../services/SessionManager'
import type { SettingsStore } from '../services/SettingsStore'
import type { TransferChannel } from '../services/TransferChannel'
import type { FerryErrorKind } from '../types/errors'
import { toFerryError } from '../utils/errors'

/** Result envelope of every request/response call */
export type ApiResult<T> =
  | { success: true; data: T }
  | { success: false; error: string; kind: FerryErrorKind }

/** Services shared by the API handlers of one client */
export interface FerryContext {
  settings: SettingsStore
  hostKeys: HostKeyStore
  log: LogService
  sessions: SessionManager
  /** The transfer currently holding the session, if any */
  activeChannel: TransferChannel | null
  /** Where local archives are staged */
  tempDirectory?: string
  /** OpenSSH known_hosts file read by `importSystemKnownHosts` */
  knownHostsPath: string
}

export function ok<T>(data: T): ApiResult<T> {
  return { success: true, data }
}

export function fail<T>(err: unknown): ApiResult<T> {
  const error = toFerryError(err, 'LocalIOError')
  return { success: false, error: error.message, kind: error.kind }
}

/** Run a handler, turning a throw into a failed result */
export async function handle<T>(fn: () => T | Promise<T>): Promise<ApiResult<T>> {
  try {
    return ok(await fn())
  } catch (err) {
    return fail(err)
  }
}

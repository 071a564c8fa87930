import { getHostKeyStore, type HostKeyStore } from '../services/HostKeyStore'
import { getLogService, type LogService } from '../services/LogService'
import { SessionManager, type ConnectionFactory } from '../services/SessionManager'
import { getSettingsStore, type SettingsStore } from '../services/SettingsStore'
import { createSSHConnectionFactory } from '../services/SSHService'
import { getKnownHostsPath } from '../utils/platform'
import type { FerryContext } from './context'
import { registerSFTPApi } from './sftp.api'
import { applyLogSettings, registerSettingsApi } from './settings.api'
import { registerSSHApi } from './ssh.api'

export interface FerryClientOptions {
  settings?: SettingsStore
  hostKeys?: HostKeyStore
  log?: LogService
  /** Replaces the ssh2-backed connection (tests use an in-process stand-in) */
  createConnection?: ConnectionFactory
  sessionId?: string
  tempDirectory?: string
  knownHostsPath?: string
}

/** Wire the services together and expose the operations a UI binds to */
export function createFerryClient(options: FerryClientOptions = {}) {
  const settings = options.settings ?? getSettingsStore()
  const hostKeys = options.hostKeys ?? getHostKeyStore()
  const log = options.log ?? getLogService()

  const sessions = new SessionManager({
    createConnection: options.createConnection ?? createSSHConnectionFactory(hostKeys, log),
    log,
    sessionId: options.sessionId
  })

  const ctx: FerryContext = {
    settings,
    hostKeys,
    log,
    sessions,
    activeChannel: null,
    tempDirectory: options.tempDirectory,
    knownHostsPath: options.knownHostsPath ?? getKnownHostsPath()
  }

  applyLogSettings(ctx, settings.getAll())

  return {
    sessionId: sessions.sessionId,
    ...registerSSHApi(ctx),
    ...registerSFTPApi(ctx),
    ...registerSettingsApi(ctx)
  }
}

export type FerryClient = ReturnType<typeof createFerryClient>

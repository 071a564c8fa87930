export { createFerryClient, type FerryClient, type FerryClientOptions } from './api/client'
export type { ApiResult } from './api/context'

export { SessionManager, type ConnectionFactory } from './services/SessionManager'
export { SSHConnection, createSSHConnectionFactory, type SSHConnectionConfig } from './services/SSHService'
export { SFTPService, ensureRemoteDirectory } from './services/SFTPService'
export { HostKeyStore, getHostKeyStore } from './services/HostKeyStore'
export { createHostVerifier, fingerprintKey } from './services/hostKeyVerifier'
export { RemoteBrowser, sortEntries } from './services/RemoteBrowser'
export { ArchiveService, scratchArchivePath } from './services/ArchiveService'
export { TransferEngine, type ProgressCallback } from './services/TransferEngine'
export { TransferChannel, type CancelOptions } from './services/TransferChannel'
export { LogService, getLogService } from './services/LogService'
export { SettingsStore, getSettingsStore, DEFAULT_SETTINGS } from './services/SettingsStore'

export * from './types/errors'
export type * from './types/hostkey'
export type * from './types/log'
export type * from './types/session'
export type * from './types/settings'
export type * from './types/sftp'
export type * from './types/transfer'

export { navigateInto, navigateUp, normalizeRemotePath, joinRemotePath } from './utils/remotePath'

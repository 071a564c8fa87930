import type { Readable, Writable } from 'stream'
import type { HostKeyInfo } from './hostkey'
import type { ExecResult, RemoteEntry } from './sftp'

/** Secret used to authenticate the SSH user */
export type Credential =
  | { type: 'password'; password: string }
  | { type: 'publickey'; privateKey?: string; privateKeyPath?: string; passphrase?: string }
  | { type: 'agent'; agentSocket?: string }

/** Proxy configuration for a connection */
export interface ProxyConfig {
  type: 'none' | 'socks4' | 'socks5' | 'http-connect'
  host: string
  port: number
  requiresAuth: boolean
  username?: string
  password?: string
}

/** What the caller provides to open a session */
export interface ConnectParams {
  host: string
  port?: number
  username: string
  credential: Credential
  proxy?: ProxyConfig
}

export type SSHConnectionStatus =
  | 'disconnected'
  | 'connecting'
  | 'authenticating'
  | 'connected'
  | 'error'

/** Promise-based view of the SFTP subsystem */
export interface RemoteFileSystem {
  readdir(remotePath: string): Promise<RemoteEntry[]>
  stat(remotePath: string): Promise<RemoteEntry>
  mkdir(remotePath: string): Promise<void>
  unlink(remotePath: string): Promise<void>
  utimes(remotePath: string, atimeMs: number, mtimeMs: number): Promise<void>
  createReadStream(remotePath: string): Readable
  createWriteStream(remotePath: string): Writable
}

/** Live remote primitives handed to listing and transfer code */
export interface RemoteSession {
  readonly sftp: RemoteFileSystem
  exec(command: string, timeoutMs?: number): Promise<ExecResult>
}

/** Callback offered an unknown host key; exactly one of accept/reject must be called */
export type HostKeyPrompt = (info: HostKeyInfo, accept: () => void, reject: () => void) => void

/**
 * One SSH transport as the SessionManager sees it.
 * Emits 'status' (SSHConnectionStatus), 'close' and 'hostkey' (info, accept, reject).
 */
export interface SessionConnection {
  readonly status: SSHConnectionStatus
  connect(): Promise<void>
  openSFTP(): Promise<RemoteFileSystem>
  exec(command: string, timeoutMs?: number): Promise<ExecResult>
  disconnect(): void
  destroy(): void
  on(event: 'close', listener: () => void): this
  on(event: 'status', listener: (status: SSHConnectionStatus) => void): this
  on(event: 'hostkey', listener: HostKeyPrompt): this
  removeAllListeners(): this
}

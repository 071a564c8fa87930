import { Client, type ConnectConfig } from 'ssh2'
import { readFileSync } from 'fs'
import { connect as netConnect, type Socket } from 'net'
import { EventEmitter } from 'events'
import { SocksClient, type SocksClientOptions } from 'socks'
import { SFTPService } from './SFTPService'
import { createHostVerifier, type HostVerification } from './hostKeyVerifier'
import type { HostKeyStore } from './HostKeyStore'
import { getLogService, LogService } from './LogService'
import { CancelledError, NetworkError, NotConnectedError, RemoteCommandError } from '../types/errors'
import type { HostKeyPolicy } from '../types/hostkey'
import type { ExecResult } from '../types/sftp'
import type {
  Credential,
  HostKeyPrompt,
  ProxyConfig,
  RemoteFileSystem,
  SessionConnection,
  SSHConnectionStatus
} from '../types/session'
import { toFerryError } from '../utils/errors'

export interface SSHConnectionConfig {
  host: string
  port: number
  username: string
  credential: Credential

  hostKeyPolicy: HostKeyPolicy

  // Connection options
  keepAliveInterval?: number   // seconds
  keepAliveCountMax?: number
  readyTimeout?: number        // seconds

  proxy?: ProxyConfig

  /** Resolve symlinked entries to their target type when listing */
  followSymlinks?: boolean

  // Session ID for logging
  sessionId?: string
}

/** Timeout for remote commands when the caller gives none (ms) */
const DEFAULT_COMMAND_TIMEOUT = 300_000

/** Translate a credential into the ssh2 auth fields */
export function applyCredential(connectConfig: ConnectConfig, credential: Credential): void {
  switch (credential.type) {
    case 'password':
      connectConfig.password = credential.password
      connectConfig.tryKeyboard = false
      break

    case 'publickey':
      if (credential.privateKey) {
        connectConfig.privateKey = credential.privateKey
      } else if (credential.privateKeyPath) {
        connectConfig.privateKey = readFileSync(credential.privateKeyPath)
      }
      if (credential.passphrase) {
        connectConfig.passphrase = credential.passphrase
      }
      break

    case 'agent':
      connectConfig.agent = credential.agentSocket ?? process.env.SSH_AUTH_SOCK
      break
  }
}

/**
 * Manages a single SSH connection: authentication, host key checking,
 * one SFTP channel and ad-hoc exec channels.
 *
 * Emits:
 *   'status'   → (status: SSHConnectionStatus)
 *   'close'    → ()
 *   'banner'   → (message: string)
 *   'hostkey'  → (info: HostKeyInfo, accept: fn, reject: fn)
 */
export class SSHConnection extends EventEmitter implements SessionConnection {
  readonly id: string
  private client: Client
  private config: SSHConnectionConfig
  private hostKeys: Pick<HostKeyStore, 'verify' | 'add'>
  private _status: SSHConnectionStatus = 'disconnected'
  private log: LogService
  private proxySocket: Socket | null = null
  private sftp: SFTPService | null = null
  /** Set by disconnect()/destroy(); a pending connect() then settles as cancelled */
  private abandoned = false

  constructor(
    id: string,
    config: SSHConnectionConfig,
    hostKeys: Pick<HostKeyStore, 'verify' | 'add'>,
    log: LogService = getLogService()
  ) {
    super()
    this.id = id
    this.config = config
    this.hostKeys = hostKeys
    this.client = new Client()
    this.log = log

    this.setupClientEvents()
  }

  get status(): SSHConnectionStatus {
    return this._status
  }

  get sessionId(): string {
    return this.config.sessionId || this.id
  }

  /** Establish the SSH connection */
  async connect(): Promise<void> {
    if (this._status === 'connected') return

    this.abandoned = false
    this.setStatus('connecting')
    LogService.connecting(this.log, this.sessionId, this.config.host, this.config.port)

    let sock: Socket | undefined
    if (this.config.proxy && this.config.proxy.type !== 'none') {
      try {
        sock = await this.createProxySocket(this.config.proxy)
        this.proxySocket = sock
        this.log.log(
          this.sessionId,
          'info',
          'ssh',
          `Proxy connection established via ${this.config.proxy.type} (${this.config.proxy.host}:${this.config.proxy.port})`
        )
      } catch (err) {
        const error = toFerryError(err, 'NetworkError')
        LogService.connectFailed(this.log, this.sessionId, error.kind, error.message)
        this.setStatus('error')
        throw error
      }
    }

    if (this.abandoned) {
      // destroy() ran while the proxy tunnel was being set up
      sock?.destroy()
      this.proxySocket = null
      throw new CancelledError('Connection attempt abandoned')
    }

    const verification = this.createVerification()

    return new Promise<void>((resolve, reject) => {
      const connectConfig: ConnectConfig = {
        host: this.config.host,
        port: this.config.port,
        username: this.config.username,
        keepaliveInterval: (this.config.keepAliveInterval ?? 30) * 1000,
        keepaliveCountMax: this.config.keepAliveCountMax ?? 3,
        readyTimeout: (this.config.readyTimeout ?? 15) * 1000,
        hostVerifier: verification.verifier
      }

      if (sock) {
        connectConfig.sock = sock
      }

      applyCredential(connectConfig, this.config.credential)

      this.setStatus('authenticating')
      LogService.authenticating(this.log, this.sessionId, this.config.credential.type)

      const onReady = () => {
        cleanup()
        this.setStatus('connected')
        LogService.authSuccess(this.log, this.sessionId)
        LogService.connected(this.log, this.sessionId)
        resolve()
      }

      const onError = (err: Error) => {
        cleanup()
        const error = verification.rejection() ?? toFerryError(err, 'NetworkError')
        this.setStatus('error')
        LogService.connectFailed(this.log, this.sessionId, error.kind, error.message)
        this.client.end()
        reject(error)
      }

      // Closed before 'ready' without an error
      const onClose = () => {
        cleanup()
        if (this.abandoned) {
          reject(new CancelledError('Connection attempt abandoned'))
          return
        }
        const error = new NetworkError('Connection closed before authentication completed')
        this.setStatus('error')
        LogService.connectFailed(this.log, this.sessionId, error.kind, error.message)
        reject(error)
      }

      const cleanup = () => {
        this.client.removeListener('ready', onReady)
        this.client.removeListener('error', onError)
        this.client.removeListener('close', onClose)
      }

      this.client.once('ready', onReady)
      this.client.once('error', onError)
      this.client.once('close', onClose)

      try {
        this.client.connect(connectConfig)
      } catch (err) {
        cleanup()
        this.setStatus('error')
        reject(toFerryError(err, 'NetworkError'))
      }
    })
  }

  private createVerification(): HostVerification {
    // Only offer unknown keys to listeners when someone is listening
    const prompt: HostKeyPrompt | undefined =
      this.listenerCount('hostkey') > 0
        ? (info, accept, reject) => {
            this.emit('hostkey', info, accept, reject)
          }
        : undefined

    return createHostVerifier({
      host: this.config.host,
      port: this.config.port,
      policy: this.config.hostKeyPolicy,
      store: this.hostKeys,
      prompt,
      log: this.log,
      sessionId: this.sessionId
    })
  }

  /** Create a socket through a proxy server */
  private async createProxySocket(proxy: ProxyConfig): Promise<Socket> {
    this.log.log(
      this.sessionId,
      'info',
      'ssh',
      `Connecting through ${proxy.type} proxy at ${proxy.host}:${proxy.port}...`
    )

    if (proxy.type === 'socks4' || proxy.type === 'socks5') {
      return this.createSocksProxy(proxy)
    } else if (proxy.type === 'http-connect') {
      return this.createHttpConnectProxy(proxy)
    }

    throw new Error(`Unsupported proxy type: ${proxy.type}`)
  }

  /** Create a SOCKS4/5 proxy connection */
  private async createSocksProxy(proxy: ProxyConfig): Promise<Socket> {
    const socksOptions: SocksClientOptions = {
      proxy: {
        host: proxy.host,
        port: proxy.port,
        type: proxy.type === 'socks4' ? 4 : 5,
        ...(proxy.requiresAuth && proxy.username
          ? { userId: proxy.username, password: proxy.password }
          : {})
      },
      command: 'connect',
      destination: {
        host: this.config.host,
        port: this.config.port
      }
    }

    const { socket } = await SocksClient.createConnection(socksOptions)
    return socket
  }

  /** Create an HTTP CONNECT proxy tunnel */
  private createHttpConnectProxy(proxy: ProxyConfig): Promise<Socket> {
    return new Promise((resolve, reject) => {
      const socket = netConnect(proxy.port, proxy.host, () => {
        let connectReq = `CONNECT ${this.config.host}:${this.config.port} HTTP/1.1\r\n`
        connectReq += `Host: ${this.config.host}:${this.config.port}\r\n`

        if (proxy.requiresAuth && proxy.username) {
          const creds = Buffer.from(`${proxy.username}:${proxy.password || ''}`).toString('base64')
          connectReq += `Proxy-Authorization: Basic ${creds}\r\n`
        }

        connectReq += '\r\n'
        socket.write(connectReq)
      })

      let responseData = ''

      const onData = (data: Buffer) => {
        responseData += data.toString()

        if (responseData.includes('\r\n\r\n')) {
          socket.removeListener('data', onData)
          socket.setTimeout(0)

          const statusLine = responseData.split('\r\n')[0]
          const statusCode = parseInt(statusLine.split(' ')[1], 10)

          if (statusCode === 200) {
            resolve(socket)
          } else {
            socket.destroy()
            reject(new Error(`HTTP CONNECT proxy returned status ${statusCode}: ${statusLine}`))
          }
        }
      }

      socket.on('data', onData)
      socket.on('error', (err) => {
        reject(new Error(`HTTP CONNECT proxy error: ${err.message}`))
      })

      socket.setTimeout(10000, () => {
        socket.destroy()
        reject(new Error('HTTP CONNECT proxy timeout'))
      })
    })
  }

  /** Open (once) and return the SFTP subsystem */
  openSFTP(): Promise<RemoteFileSystem> {
    return new Promise((resolve, reject) => {
      if (this._status !== 'connected') {
        reject(new NotConnectedError())
        return
      }
      if (this.sftp) {
        resolve(this.sftp)
        return
      }
      this.client.sftp((err, sftp) => {
        if (err) {
          this.log.log(this.sessionId, 'error', 'sftp', `Failed to open SFTP: ${err.message}`)
          reject(toFerryError(err, 'NetworkError'))
        } else {
          this.sftp = new SFTPService(sftp, this.config.followSymlinks ?? true)
          LogService.sftpOpened(this.log, this.sessionId)
          resolve(this.sftp)
        }
      })
    })
  }

  /**
   * Execute a command with a timeout.
   * Returns stdout/stderr and exit code; a signal-terminated command reports exit code -1.
   */
  exec(command: string, timeoutMs: number = DEFAULT_COMMAND_TIMEOUT): Promise<ExecResult> {
    return new Promise((resolve, reject) => {
      if (this._status !== 'connected') {
        reject(new NotConnectedError())
        return
      }

      this.log.log(this.sessionId, 'debug', 'ssh', `exec: ${command}`)

      this.client.exec(command, (err, stream) => {
        if (err) {
          reject(toFerryError(err, 'NetworkError'))
          return
        }

        let stdout = ''
        let stderr = ''
        let exitCode = -1
        let settled = false

        const settle = (fn: () => void) => {
          if (settled) return
          settled = true
          clearTimeout(timer)
          fn()
        }

        const timer = setTimeout(() => {
          settle(() => {
            stream.destroy()
            reject(new RemoteCommandError(`Command timed out after ${timeoutMs}ms`, command, -1, stderr))
          })
        }, timeoutMs)

        stream.on('data', (d: Buffer) => {
          if (!settled) stdout += d.toString()
        })

        stream.stderr.on('data', (d: Buffer) => {
          if (!settled) stderr += d.toString()
        })

        stream.on('exit', (code: number | null) => {
          exitCode = code ?? -1
        })

        stream.on('error', (streamErr: Error) => {
          settle(() => reject(toFerryError(streamErr, 'NetworkError')))
        })

        stream.on('close', () => {
          settle(() => resolve({ exitCode, stdout, stderr }))
        })
      })
    })
  }

  /** Disconnect cleanly */
  disconnect(): void {
    this.abandoned = true
    this.sftp?.close()
    this.sftp = null

    if (this.proxySocket) {
      this.proxySocket.destroy()
      this.proxySocket = null
    }

    this.client.end()
    this.setStatus('disconnected')
  }

  /** Destroy the connection forcefully */
  destroy(): void {
    this.abandoned = true
    this.sftp = null

    if (this.proxySocket) {
      this.proxySocket.destroy()
      this.proxySocket = null
    }

    this.client.destroy()
    this.setStatus('disconnected')
  }

  private setStatus(status: SSHConnectionStatus): void {
    if (this._status === status) return
    this._status = status
    this.emit('status', status)
  }

  private setupClientEvents(): void {
    this.client.on('banner', (message) => {
      this.emit('banner', message)
      this.log.log(this.sessionId, 'info', 'ssh', `Server banner: ${message.trim()}`)
    })

    this.client.on('close', () => {
      if (this._status === 'connected') {
        LogService.connectionLost(this.log, this.sessionId, 'Connection closed unexpectedly.')
      }
      this.sftp = null
      this.setStatus('disconnected')
      this.emit('close')
    })

    // Errors before 'ready' are handled by connect(); later ones mean the transport died
    this.client.on('error', (err) => {
      if (this._status === 'connected') {
        LogService.connectionLost(this.log, this.sessionId, err.message)
      }
    })
  }
}

/** Build SSHConnection instances bound to a host key store */
export function createSSHConnectionFactory(
  hostKeys: Pick<HostKeyStore, 'verify' | 'add'>,
  log: LogService = getLogService()
): (id: string, config: SSHConnectionConfig) => SSHConnection {
  return (id, config) => new SSHConnection(id, config, hostKeys, log)
}

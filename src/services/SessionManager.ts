import { EventEmitter } from 'events'
import { randomUUID } from 'crypto'
import type { SSHConnectionConfig } from './SSHService'
import { getLogService, LogService } from './LogService'
import { BusyError, CancelledError, NotConnectedError } from '../types/errors'
import type {
  HostKeyPrompt,
  RemoteFileSystem,
  RemoteSession,
  SessionConnection,
  SSHConnectionStatus
} from '../types/session'
import { toFerryError } from '../utils/errors'

export type ConnectionFactory = (id: string, config: SSHConnectionConfig) => SessionConnection

export interface SessionManagerOptions {
  createConnection: ConnectionFactory
  log?: LogService
  sessionId?: string
}

interface ActiveOperation {
  label: string
  controller?: AbortController
}

/**
 * SessionManager — owns the single live connection and the busy flag.
 *
 * Emits:
 *   'status'   → (status: SSHConnectionStatus)
 *   'close'    → ()  the connection went away (disconnect, forced close or transport loss)
 *   'hostkey'  → (info, accept, reject)  forwarded from the connection under the 'ask' policy
 */
export class SessionManager extends EventEmitter {
  readonly sessionId: string
  private createConnection: ConnectionFactory
  private log: LogService
  private connection: SessionConnection | null = null
  /** Connection still handshaking; replaced or dropped by a later connect/disconnect */
  private pending: SessionConnection | null = null
  private sftp: RemoteFileSystem | null = null
  private active: ActiveOperation | null = null

  constructor(options: SessionManagerOptions) {
    super()
    this.createConnection = options.createConnection
    this.log = options.log ?? getLogService()
    this.sessionId = options.sessionId ?? randomUUID()
  }

  /**
   * Open a connection and its SFTP channel, replacing any existing one.
   * No retries: the first failure is thrown and no connection remains.
   * Busy while an operation holds the session; an attempt overtaken by
   * another connect() or a disconnect() rejects with CancelledError.
   */
  async connect(config: SSHConnectionConfig): Promise<void> {
    if (this.active) {
      throw new BusyError(this.active.label)
    }
    this.disconnect()

    const conn = this.createConnection(randomUUID(), { ...config, sessionId: this.sessionId })
    this.pending = conn

    conn.on('status', (status: SSHConnectionStatus) => {
      this.emit('status', status)
    })
    conn.on('close', () => {
      if (this.connection === conn) {
        this.invalidate()
        this.emit('close')
      }
    })
    if (this.listenerCount('hostkey') > 0) {
      const forward: HostKeyPrompt = (info, accept, reject) => {
        this.emit('hostkey', info, accept, reject)
      }
      conn.on('hostkey', forward)
    }

    try {
      await conn.connect()
      const sftp = await conn.openSFTP()
      if (this.pending !== conn) {
        throw new CancelledError('Connection attempt abandoned')
      }
      this.pending = null
      this.connection = conn
      this.sftp = sftp
    } catch (err) {
      const abandoned = this.pending !== conn
      if (!abandoned) this.pending = null
      conn.removeAllListeners()
      conn.destroy()
      throw abandoned ? new CancelledError('Connection attempt abandoned') : toFerryError(err, 'NetworkError')
    }
  }

  /** Close the connection; safe to call when not connected */
  disconnect(): void {
    this.abortActive()
    this.dropPending()
    const conn = this.connection
    if (!conn) return

    this.invalidate()
    conn.removeAllListeners()
    conn.disconnect()
    LogService.disconnectedByUser(this.log, this.sessionId)
    this.emit('close')
  }

  /** Destroy the socket immediately; the only way to stop a running remote command */
  forceClose(): void {
    this.dropPending()
    const conn = this.connection
    if (!conn) return

    this.invalidate()
    conn.removeAllListeners()
    conn.destroy()
    LogService.forcedClose(this.log, this.sessionId)
    this.emit('close')
  }

  isConnected(): boolean {
    return this.connection !== null && this.connection.status === 'connected'
  }

  /** Remote primitives of the live connection */
  getSession(): RemoteSession {
    const conn = this.connection
    const sftp = this.sftp
    if (!conn || !sftp || conn.status !== 'connected') {
      throw new NotConnectedError()
    }
    return {
      sftp,
      exec: (command, timeoutMs) => conn.exec(command, timeoutMs)
    }
  }

  /** Label of the operation holding the session, if any */
  get busy(): string | null {
    return this.active?.label ?? null
  }

  /**
   * Take the busy flag. Throws BusyError when another operation holds it.
   * The returned release function may be called more than once.
   */
  acquire(label: string, controller?: AbortController): () => void {
    if (this.active) {
      throw new BusyError(this.active.label)
    }
    const operation: ActiveOperation = { label, controller }
    this.active = operation
    return () => {
      if (this.active === operation) {
        this.active = null
      }
    }
  }

  private abortActive(): void {
    const controller = this.active?.controller
    if (controller && !controller.signal.aborted) {
      controller.abort()
    }
  }

  private dropPending(): void {
    const pending = this.pending
    if (!pending) return
    this.pending = null
    pending.removeAllListeners()
    pending.destroy()
  }

  private invalidate(): void {
    this.abortActive()
    this.connection = null
    this.sftp = null
  }
}

import { EventEmitter } from 'events'
import { randomUUID } from 'crypto'
import type { LogEntry, LogLevel, LogSource } from '../types/log'

const DEFAULT_MAX_ENTRIES = 5000

/**
 * LogService — central event-based log aggregator for session and transfer activity.
 *
 * Stores log entries per session in memory (FIFO with configurable max).
 * Emits 'entry' events with (sessionId, LogEntry) so a UI can follow along.
 */
export class LogService extends EventEmitter {
  private entries: Map<string, LogEntry[]> = new Map()
  private maxEntries: number
  private debugMode: boolean

  constructor(maxEntries: number = DEFAULT_MAX_ENTRIES, debugMode: boolean = false) {
    super()
    this.maxEntries = maxEntries
    this.debugMode = debugMode
  }

  /** Set the maximum number of log entries per session */
  setMaxEntries(max: number): void {
    this.maxEntries = max
  }

  /** Enable or disable debug-level log entries */
  setDebugMode(enabled: boolean): void {
    this.debugMode = enabled
  }

  /** Add a log entry for a session */
  log(
    sessionId: string,
    level: LogLevel,
    source: LogSource,
    message: string,
    details?: string
  ): LogEntry {
    const entry: LogEntry = {
      id: randomUUID(),
      timestamp: Date.now(),
      level,
      source,
      message,
      details,
      sessionId
    }

    // Debug entries are only kept in debug mode
    if (level === 'debug' && !this.debugMode) {
      return entry
    }

    let sessionEntries = this.entries.get(sessionId)
    if (!sessionEntries) {
      sessionEntries = []
      this.entries.set(sessionId, sessionEntries)
    }

    sessionEntries.push(entry)

    while (sessionEntries.length > this.maxEntries) {
      sessionEntries.shift()
    }

    this.emit('entry', sessionId, entry)
    return entry
  }

  /** Get all log entries for a session */
  getEntries(sessionId: string): LogEntry[] {
    return this.entries.get(sessionId) ?? []
  }

  /** Clear all log entries for a session */
  clearEntries(sessionId: string): void {
    this.entries.delete(sessionId)
  }

  /** Export log entries as formatted text */
  exportLog(sessionId: string): string {
    const entries = this.getEntries(sessionId)
    return entries
      .map((e) => {
        const ts = new Date(e.timestamp).toISOString()
        const level = e.level.toUpperCase().padEnd(7)
        const src = e.source.toUpperCase().padEnd(11)
        const detail = e.details ? `\n  ${e.details}` : ''
        return `[${ts}] [${level}] [${src}] ${e.message}${detail}`
      })
      .join('\n')
  }

  // ── Static helper methods for common log messages ──

  static connecting(log: LogService, sessionId: string, host: string, port: number): void {
    log.log(sessionId, 'info', 'ssh', `Connecting to SSH server ${host}:${port}...`)
  }

  static authenticating(log: LogService, sessionId: string, method: string): void {
    log.log(sessionId, 'info', 'ssh', `Authenticating with method: ${method}...`)
  }

  static authSuccess(log: LogService, sessionId: string): void {
    log.log(sessionId, 'success', 'ssh', 'Authentication successful.')
  }

  static connectFailed(log: LogService, sessionId: string, kind: string, reason: string): void {
    log.log(sessionId, 'error', 'ssh', `Connection failed (${kind}): ${reason}`)
  }

  static connected(log: LogService, sessionId: string): void {
    log.log(sessionId, 'success', 'ssh', 'Connection established.')
  }

  static connectionLost(log: LogService, sessionId: string, reason: string): void {
    log.log(sessionId, 'error', 'ssh', `Connection lost: ${reason}`)
  }

  static disconnectedByUser(log: LogService, sessionId: string): void {
    log.log(sessionId, 'info', 'ssh', 'Connection closed by user.')
  }

  static forcedClose(log: LogService, sessionId: string): void {
    log.log(sessionId, 'warning', 'ssh', 'Connection forcibly closed to cancel a running command.')
  }

  static sftpOpened(log: LogService, sessionId: string): void {
    log.log(sessionId, 'info', 'sftp', 'SFTP subsystem opened.')
  }

  static hostKeyVerified(log: LogService, sessionId: string, host: string, port: number): void {
    log.log(sessionId, 'info', 'ssh', `Host key verified for ${host}:${port}.`)
  }

  static hostKeyTrusted(log: LogService, sessionId: string, host: string, port: number, fingerprint: string): void {
    log.log(sessionId, 'info', 'ssh', `New host key trusted for ${host}:${port}: ${fingerprint}`)
  }

  static hostKeyRejected(log: LogService, sessionId: string, host: string, port: number, fingerprint: string): void {
    log.log(sessionId, 'error', 'ssh', `Host key rejected for ${host}:${port}: ${fingerprint}`)
  }

  static hostKeyChanged(log: LogService, sessionId: string, oldFp: string, newFp: string): void {
    log.log(
      sessionId,
      'warning',
      'ssh',
      `Host key changed! Previous fingerprint: ${oldFp}, New: ${newFp}`
    )
  }

  static hostKeyCheckDisabled(log: LogService, sessionId: string, host: string, port: number): void {
    log.log(sessionId, 'warning', 'ssh', `Host key verification is disabled; accepting any key for ${host}:${port}.`)
  }

  static transferStarted(log: LogService, sessionId: string, name: string, direction: string): void {
    log.log(sessionId, 'info', 'transfer', `Transfer started: ${name} (${direction})`)
  }

  static transferCompleted(log: LogService, sessionId: string, name: string, bytes: string, speed: string): void {
    log.log(sessionId, 'success', 'transfer', `Transfer completed: ${name} (${bytes}, ${speed})`)
  }

  static transferCancelled(log: LogService, sessionId: string, name: string): void {
    log.log(sessionId, 'warning', 'transfer', `Transfer cancelled: ${name}`)
  }

  static transferFailed(log: LogService, sessionId: string, name: string, reason: string): void {
    log.log(sessionId, 'error', 'transfer', `Transfer failed: ${name}: ${reason}`)
  }

  static cleanupFailed(log: LogService, sessionId: string, step: string, path: string, reason: string): void {
    log.log(sessionId, 'warning', 'transfer', `Cleanup of ${step} failed: ${path}`, reason)
  }

  static archiveCreated(log: LogService, sessionId: string, archivePath: string): void {
    log.log(sessionId, 'info', 'archive', `Archive created: ${archivePath}`)
  }

  static archiveExtracted(log: LogService, sessionId: string, archivePath: string, destDir: string): void {
    log.log(sessionId, 'info', 'archive', `Archive extracted: ${archivePath} -> ${destDir}`)
  }

  static remoteCommandFailed(log: LogService, sessionId: string, command: string, stderr: string): void {
    log.log(sessionId, 'error', 'archive', `Remote command failed: ${command}`, stderr)
  }
}

/** Singleton LogService instance */
let logServiceInstance: LogService | null = null

/** Get (or create) the singleton LogService */
export function getLogService(): LogService {
  if (!logServiceInstance) {
    logServiceInstance = new LogService()
  }
  return logServiceInstance
}

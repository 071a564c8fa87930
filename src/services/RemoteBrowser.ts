import type { SessionManager } from './SessionManager'
import { ensureRemoteDirectory } from './SFTPService'
import { getLogService, LogService } from './LogService'
import type { RemoteEntry } from '../types/sftp'
import {
  navigateInto,
  navigateUp,
  normalizeRemotePath
} from '../utils/remotePath'

/** Directories first, then case-insensitive name, ties broken by exact name */
export function compareEntries(a: RemoteEntry, b: RemoteEntry): number {
  if (a.isDirectory !== b.isDirectory) return a.isDirectory ? -1 : 1
  const left = a.name.toLowerCase()
  const right = b.name.toLowerCase()
  if (left !== right) return left < right ? -1 : 1
  if (a.name === b.name) return 0
  return a.name < b.name ? -1 : 1
}

export function sortEntries(entries: RemoteEntry[]): RemoteEntry[] {
  return [...entries].sort(compareEntries)
}

/**
 * RemoteBrowser — directory listing and navigation over the session's SFTP channel.
 * Listing and mkdir take the session's busy flag for their duration.
 */
export class RemoteBrowser {
  private sessions: SessionManager
  private root: string
  private log: LogService

  constructor(sessions: SessionManager, root: string = '/', log: LogService = getLogService()) {
    this.sessions = sessions
    this.root = normalizeRemotePath(root)
    this.log = log
  }

  async list(remotePath: string): Promise<RemoteEntry[]> {
    const path = normalizeRemotePath(remotePath)
    const session = this.sessions.getSession()
    const release = this.sessions.acquire(`listing ${path}`)
    try {
      const entries = await session.sftp.readdir(path)
      this.log.log(this.sessions.sessionId, 'debug', 'sftp', `Listed ${path} (${entries.length} entries)`)
      return sortEntries(entries.filter((e) => e.name !== '.' && e.name !== '..'))
    } finally {
      release()
    }
  }

  navigateInto(currentPath: string, entryName: string): string {
    return navigateInto(currentPath, entryName)
  }

  navigateUp(currentPath: string): string {
    return navigateUp(currentPath, this.root)
  }

  /** `mkdir -p` through SFTP */
  async makeDirectory(remotePath: string): Promise<void> {
    const path = normalizeRemotePath(remotePath)
    const session = this.sessions.getSession()
    const release = this.sessions.acquire(`creating ${path}`)
    try {
      await ensureRemoteDirectory(session.sftp, path)
      this.log.log(this.sessions.sessionId, 'info', 'sftp', `Created directory ${path}`)
    } finally {
      release()
    }
  }
}

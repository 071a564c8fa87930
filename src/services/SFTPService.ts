import type { SFTPWrapper, FileEntry as SSH2FileEntry, Stats } from 'ssh2'
import type { Readable, Writable } from 'stream'
import { posix } from 'path'
import { RemoteIOError } from '../types/errors'
import type { RemoteEntry } from '../types/sftp'
import type { RemoteFileSystem } from '../types/session'
import { normalizeRemotePath, remoteBasename } from '../utils/remotePath'
import { toFerryError } from '../utils/errors'

const S_IFMT = 0o170000
const S_IFDIR = 0o040000
const S_IFLNK = 0o120000

/**
 * SFTPService — promise wrapper around the ssh2 SFTP subsystem.
 * Callback errors are mapped to RemoteIOError (or NetworkError when the channel is gone).
 */
export class SFTPService implements RemoteFileSystem {
  private sftp: SFTPWrapper
  private followSymlinks: boolean

  constructor(sftp: SFTPWrapper, followSymlinks: boolean = true) {
    this.sftp = sftp
    this.followSymlinks = followSymlinks
  }

  /** List directory contents */
  async readdir(remotePath: string): Promise<RemoteEntry[]> {
    const list = await new Promise<SSH2FileEntry[]>((resolve, reject) => {
      this.sftp.readdir(remotePath, (err, items) => {
        if (err) reject(toFerryError(err, 'RemoteIOError', remotePath))
        else resolve(items)
      })
    })

    const entries: RemoteEntry[] = list
      .filter((item) => item.filename !== '.' && item.filename !== '..')
      .map((item) => {
        const attrs = item.attrs
        const mode = attrs.mode ?? 0
        return {
          name: item.filename,
          path: posix.join(remotePath, item.filename),
          isDirectory: (mode & S_IFMT) === S_IFDIR,
          isSymlink: (mode & S_IFMT) === S_IFLNK,
          size: attrs.size ?? 0,
          modifiedAt: (attrs.mtime ?? 0) * 1000,
          accessedAt: (attrs.atime ?? 0) * 1000,
          permissions: mode & 0o7777
        }
      })

    if (this.followSymlinks) {
      for (const entry of entries) {
        if (!entry.isSymlink) continue
        entry.symlinkTarget = await this.readlink(entry.path).catch(() => undefined)
        // stat follows symlinks; a broken link keeps its lstat view
        const realStat = await this.stat(entry.path).catch(() => null)
        if (realStat) {
          entry.isDirectory = realStat.isDirectory
          entry.size = realStat.size
        }
      }
    }

    return entries
  }

  /** Get file/directory stats */
  async stat(remotePath: string): Promise<RemoteEntry> {
    return new Promise((resolve, reject) => {
      this.sftp.stat(remotePath, (err, stats) => {
        if (err) {
          reject(toFerryError(err, 'RemoteIOError', remotePath))
          return
        }
        resolve(this.statsToEntry(remotePath, stats))
      })
    })
  }

  /** Read symlink target */
  async readlink(remotePath: string): Promise<string> {
    return new Promise((resolve, reject) => {
      this.sftp.readlink(remotePath, (err, target) => {
        if (err) reject(toFerryError(err, 'RemoteIOError', remotePath))
        else resolve(target)
      })
    })
  }

  /** Create a single directory */
  async mkdir(remotePath: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.sftp.mkdir(remotePath, (err) => {
        if (err) reject(toFerryError(err, 'RemoteIOError', remotePath))
        else resolve()
      })
    })
  }

  /** Remove file */
  async unlink(remotePath: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.sftp.unlink(remotePath, (err) => {
        if (err) reject(toFerryError(err, 'RemoteIOError', remotePath))
        else resolve()
      })
    })
  }

  /** Set file access and modification times (ms) */
  async utimes(remotePath: string, atimeMs: number, mtimeMs: number): Promise<void> {
    return new Promise((resolve, reject) => {
      // ssh2 sftp.utimes expects seconds, not milliseconds
      this.sftp.utimes(remotePath, Math.floor(atimeMs / 1000), Math.floor(mtimeMs / 1000), (err) => {
        if (err) reject(toFerryError(err, 'RemoteIOError', remotePath))
        else resolve()
      })
    })
  }

  createReadStream(remotePath: string): Readable {
    return this.sftp.createReadStream(remotePath)
  }

  createWriteStream(remotePath: string): Writable {
    return this.sftp.createWriteStream(remotePath)
  }

  /** Destroy/close the SFTP session */
  close(): void {
    this.sftp.end()
  }

  private statsToEntry(path: string, stats: Stats): RemoteEntry {
    return {
      name: remoteBasename(path) || path,
      path,
      isDirectory: stats.isDirectory(),
      isSymlink: stats.isSymbolicLink(),
      size: stats.size,
      modifiedAt: (stats.mtime ?? 0) * 1000,
      accessedAt: (stats.atime ?? 0) * 1000,
      permissions: stats.mode & 0o7777
    }
  }
}

/**
 * Create a remote directory and every missing ancestor (`mkdir -p`).
 * Succeeds when the directory already exists; fails when a component is a file.
 */
export async function ensureRemoteDirectory(sftp: RemoteFileSystem, remotePath: string): Promise<void> {
  const target = normalizeRemotePath(remotePath)
  const absolute = target.startsWith('/')
  const parts = target.split('/').filter(Boolean)

  let current = absolute ? '' : '.'
  for (const part of parts) {
    current = current === '' ? '/' + part : `${current}/${part}`
    const existing = await sftp.stat(current).catch(() => null)
    if (existing) {
      if (!existing.isDirectory) {
        throw new RemoteIOError(`Not a directory: ${current}`, current)
      }
      continue
    }
    try {
      await sftp.mkdir(current)
    } catch (err) {
      // Another client may have created it in between
      const raced = await sftp.stat(current).catch(() => null)
      if (!raced?.isDirectory) throw toFerryError(err, 'RemoteIOError', current)
    }
  }
}

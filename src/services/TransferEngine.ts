import { EventEmitter } from 'events'
import { createReadStream, createWriteStream, promises as fsp } from 'fs'
import { basename, join, resolve } from 'path'
import { PassThrough, type Transform } from 'stream'
import { pipeline } from 'stream/promises'
import { ArchiveService, scratchArchivePath } from './ArchiveService'
import { ensureRemoteDirectory } from './SFTPService'
import { getLogService, LogService } from './LogService'
import { ProgressTransform, ThrottleTransform } from './streams'
import { CancelledError, RemoteIOError, LocalIOError, SftpFerryError } from '../types/errors'
import type { RemoteSession } from '../types/session'
import type { CleanupIssue, CleanupResult, CleanupStep } from '../types/transfer'
import { toFerryError } from '../utils/errors'
import { formatFileSize, formatRate } from '../utils/fileSize'
import { joinRemotePath, normalizeRemotePath, remoteBasename } from '../utils/remotePath'

export type ProgressCallback = (bytesDone: number, bytesTotal: number) => void

export interface TransferEngineOptions {
  sessionId: string
  archives: ArchiveService
  log?: LogService
  /** Bytes per read and minimum bytes between progress reports */
  chunkSize: number
  /** Minimum ms between progress reports */
  progressIntervalMs: number
  bandwidthLimitUp: number     // KB/s, 0 = unlimited
  bandwidthLimitDown: number   // KB/s, 0 = unlimited
  preserveTimestamps: boolean
  /** Remote directory for transient archives */
  scratchDirectory: string
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new CancelledError()
}

/** Errno-coded errors come from the local side of a pipeline */
function streamError(err: unknown, localPath: string, remotePath: string): SftpFerryError {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return toFerryError(err, 'LocalIOError', localPath)
  }
  return toFerryError(err, 'RemoteIOError', remotePath)
}

/**
 * TransferEngine — moves files and folders over one session.
 * Folders travel as gzip tar archives built on one side and unpacked on the other.
 *
 * Cancellation is cooperative: the signal is checked between chunks and between steps.
 * Emits:
 *   'status'   → (message: string)
 *   'cleanup'  → (issue: CleanupIssue)  a best-effort cleanup step failed
 */
export class TransferEngine extends EventEmitter {
  private session: RemoteSession
  private options: TransferEngineOptions
  private archives: ArchiveService
  private log: LogService

  constructor(session: RemoteSession, options: TransferEngineOptions) {
    super()
    this.session = session
    this.options = options
    this.archives = options.archives
    this.log = options.log ?? getLogService()
  }

  /** Upload one local file into `remoteDir`; resolves to the remote path */
  uploadFile(localPath: string, remoteDir: string, onProgress: ProgressCallback, signal?: AbortSignal): Promise<string> {
    return this.cancellable(signal, async () => {
      throwIfAborted(signal)
      const localStats = await fsp.stat(localPath).catch((err: unknown) => {
        throw toFerryError(err, 'LocalIOError', localPath)
      })
      if (!localStats.isFile()) {
        throw new LocalIOError(`Not a file: ${localPath}`, localPath)
      }

      const dir = normalizeRemotePath(remoteDir)
      await ensureRemoteDirectory(this.session.sftp, dir)
      const remotePath = joinRemotePath(dir, basename(localPath))
      const fileName = basename(localPath)

      throwIfAborted(signal)
      LogService.transferStarted(this.log, this.options.sessionId, fileName, 'upload')
      const startedAt = Date.now()

      try {
        await pipeline(
          createReadStream(localPath, { highWaterMark: this.options.chunkSize }),
          this.throttle(this.options.bandwidthLimitUp),
          this.progress(localStats.size, onProgress, signal),
          this.session.sftp.createWriteStream(remotePath),
          { signal }
        )
      } catch (err) {
        if (signal?.aborted) {
          this.recordCleanup(
            'partial-remote-file',
            remotePath,
            await this.bestEffortUnlink(remotePath)
          )
          throw new CancelledError()
        }
        throw streamError(err, localPath, remotePath)
      }

      if (this.options.preserveTimestamps) {
        await this.session.sftp
          .utimes(remotePath, localStats.atimeMs, localStats.mtimeMs)
          .catch((err: unknown) => this.timestampWarning(remotePath, err))
      }

      this.completed(fileName, localStats.size, startedAt)
      return remotePath
    })
  }

  /** Download one remote file into `localDir`; resolves to the local path */
  downloadFile(remotePath: string, localDir: string, onProgress: ProgressCallback, signal?: AbortSignal): Promise<string> {
    return this.cancellable(signal, async () => {
      throwIfAborted(signal)
      const source = normalizeRemotePath(remotePath)
      const remoteStats = await this.session.sftp.stat(source)
      if (remoteStats.isDirectory) {
        throw new RemoteIOError(`Is a directory: ${source}`, source)
      }

      await fsp.mkdir(localDir, { recursive: true }).catch((err: unknown) => {
        throw toFerryError(err, 'LocalIOError', localDir)
      })
      const fileName = remoteBasename(source)
      const localPath = join(localDir, fileName)

      throwIfAborted(signal)
      LogService.transferStarted(this.log, this.options.sessionId, fileName, 'download')
      const startedAt = Date.now()

      try {
        await pipeline(
          this.session.sftp.createReadStream(source),
          this.throttle(this.options.bandwidthLimitDown),
          this.progress(remoteStats.size, onProgress, signal),
          createWriteStream(localPath, { highWaterMark: this.options.chunkSize }),
          { signal }
        )
      } catch (err) {
        if (signal?.aborted) {
          this.recordCleanup('partial-local-file', localPath, await this.archives.removeLocal(localPath))
          throw new CancelledError()
        }
        throw streamError(err, localPath, source)
      }

      if (this.options.preserveTimestamps) {
        await fsp
          .utimes(localPath, new Date(remoteStats.accessedAt), new Date(remoteStats.modifiedAt))
          .catch((err: unknown) => this.timestampWarning(localPath, err))
      }

      this.completed(fileName, remoteStats.size, startedAt)
      return localPath
    })
  }

  /** Upload several files into one directory, reporting progress across all of them */
  uploadFiles(localPaths: string[], remoteDir: string, onProgress: ProgressCallback, signal?: AbortSignal): Promise<string[]> {
    return this.cancellable(signal, async () => {
      const sizes = await Promise.all(
        localPaths.map((p) =>
          fsp.stat(p).then(
            (s) => s.size,
            (err: unknown) => {
              throw toFerryError(err, 'LocalIOError', p)
            }
          )
        )
      )
      const upload = (path: string, report: ProgressCallback) => this.uploadFile(path, remoteDir, report, signal)
      return this.runEach(localPaths, sizes, 'Uploading', basename, upload, onProgress)
    })
  }

  /** Download several remote files into one local directory */
  downloadFiles(remotePaths: string[], localDir: string, onProgress: ProgressCallback, signal?: AbortSignal): Promise<string[]> {
    return this.cancellable(signal, async () => {
      const sizes: number[] = []
      for (const path of remotePaths) {
        sizes.push((await this.session.sftp.stat(normalizeRemotePath(path))).size)
      }
      const download = (path: string, report: ProgressCallback) => this.downloadFile(path, localDir, report, signal)
      return this.runEach(remotePaths, sizes, 'Downloading', remoteBasename, download, onProgress)
    })
  }

  /**
   * Compress `localDir`, upload the archive into `remoteDir` and optionally unpack it there.
   * Resolves to the extracted folder, or to the remote archive when not extracting.
   */
  uploadFolder(
    localDir: string,
    remoteDir: string,
    extractRemotely: boolean,
    onProgress: ProgressCallback,
    signal?: AbortSignal
  ): Promise<string> {
    return this.cancellable(signal, async () => {
      const folderName = basename(resolve(localDir))
      const dir = normalizeRemotePath(remoteDir)

      throwIfAborted(signal)
      this.status(`Compressing ${folderName}...`)
      const localArchive = await this.archives.compressLocal(localDir)

      let remoteArchive: string
      try {
        throwIfAborted(signal)
        this.status(`Uploading ${basename(localArchive)}...`)
        remoteArchive = await this.uploadFile(localArchive, dir, onProgress, signal)
      } finally {
        this.recordCleanup('local-archive', localArchive, await this.archives.removeLocal(localArchive))
      }

      if (!extractRemotely) return remoteArchive

      try {
        throwIfAborted(signal)
        this.status(`Extracting ${basename(localArchive)} on the remote host...`)
        await this.archives.extractRemote(this.session, remoteArchive, dir)
        throwIfAborted(signal)
      } catch (err) {
        // A failed extraction leaves the archive in place for inspection
        if (signal?.aborted || err instanceof CancelledError) {
          this.recordCleanup('remote-archive', remoteArchive, await this.archives.removeRemote(this.session, remoteArchive))
        }
        throw err
      }

      this.status('Removing remote archive...')
      this.recordCleanup('remote-archive', remoteArchive, await this.archives.removeRemote(this.session, remoteArchive))
      return joinRemotePath(dir, folderName)
    })
  }

  /**
   * Compress `remoteDir` on the remote host, download the archive into `localDir`
   * and optionally unpack it there.
   * Resolves to the extracted folder, or to the local archive when not extracting.
   */
  downloadFolder(
    remoteDir: string,
    localDir: string,
    extractLocally: boolean,
    onProgress: ProgressCallback,
    signal?: AbortSignal
  ): Promise<string> {
    return this.cancellable(signal, async () => {
      const source = normalizeRemotePath(remoteDir)
      const folderName = remoteBasename(source)
      if (!folderName) {
        throw new RemoteIOError('Cannot archive the root directory', source)
      }
      const remoteStats = await this.session.sftp.stat(source)
      if (!remoteStats.isDirectory) {
        throw new RemoteIOError(`Not a directory: ${source}`, source)
      }

      const scratchArchive = scratchArchivePath(this.options.scratchDirectory, folderName)
      let localArchive: string
      try {
        throwIfAborted(signal)
        this.status(`Compressing ${source} on the remote host...`)
        await this.archives.compressRemote(this.session, source, scratchArchive)

        throwIfAborted(signal)
        this.status(`Downloading ${remoteBasename(scratchArchive)}...`)
        localArchive = await this.downloadFile(scratchArchive, localDir, onProgress, signal)
      } finally {
        this.recordCleanup('scratch-archive', scratchArchive, await this.archives.removeRemote(this.session, scratchArchive))
      }

      if (!extractLocally) return localArchive

      if (signal?.aborted) {
        this.recordCleanup('local-archive', localArchive, await this.archives.removeLocal(localArchive))
        throw new CancelledError()
      }

      this.status(`Extracting ${basename(localArchive)}...`)
      await this.archives.extractLocal(localArchive, localDir)
      this.recordCleanup('local-archive', localArchive, await this.archives.removeLocal(localArchive))
      return join(localDir, folderName)
    })
  }

  private async runEach(
    paths: string[],
    sizes: number[],
    verb: string,
    nameOf: (path: string) => string,
    transfer: (path: string, report: ProgressCallback) => Promise<string>,
    onProgress: ProgressCallback
  ): Promise<string[]> {
    const total = sizes.reduce((sum, size) => sum + size, 0)
    const results: string[] = []
    let offset = 0

    for (let i = 0; i < paths.length; i++) {
      this.status(`[${i + 1}/${paths.length}] ${verb} ${nameOf(paths[i])}...`)
      const base = offset
      results.push(await transfer(paths[i], (done) => onProgress(base + done, total)))
      offset += sizes[i]
    }

    onProgress(offset, total)
    return results
  }

  /** Any failure once the signal has fired is reported as a cancellation */
  private async cancellable<T>(signal: AbortSignal | undefined, work: () => Promise<T>): Promise<T> {
    try {
      return await work()
    } catch (err) {
      if (signal?.aborted) throw new CancelledError()
      throw err
    }
  }

  private throttle(kbPerSecond: number): Transform {
    return kbPerSecond > 0 ? new ThrottleTransform(kbPerSecond) : new PassThrough()
  }

  private progress(bytesTotal: number, onProgress: ProgressCallback, signal?: AbortSignal): ProgressTransform {
    return new ProgressTransform({
      bytesTotal,
      chunkSize: this.options.chunkSize,
      intervalMs: this.options.progressIntervalMs,
      onProgress,
      signal
    })
  }

  private bestEffortUnlink(remotePath: string): Promise<CleanupResult> {
    return this.session.sftp.unlink(remotePath).then(
      (): CleanupResult => ({ ok: true }),
      (err: unknown): CleanupResult => ({ ok: false, error: toFerryError(err, 'RemoteIOError', remotePath).message })
    )
  }

  private recordCleanup(step: CleanupStep, path: string, result: CleanupResult): void {
    if (result.ok) return
    const issue: CleanupIssue = { step, path, message: result.error }
    LogService.cleanupFailed(this.log, this.options.sessionId, step, path, result.error)
    this.emit('cleanup', issue)
  }

  private status(message: string): void {
    this.log.log(this.options.sessionId, 'info', 'transfer', message)
    this.emit('status', message)
  }

  private timestampWarning(path: string, err: unknown): void {
    const reason = err instanceof Error ? err.message : String(err)
    this.log.log(this.options.sessionId, 'warning', 'transfer', `Failed to preserve timestamps for ${path}`, reason)
  }

  private completed(fileName: string, bytes: number, startedAt: number): void {
    const elapsedMs = Date.now() - startedAt
    LogService.transferCompleted(this.log, this.options.sessionId, fileName, formatFileSize(bytes), formatRate(bytes, elapsedMs))
  }
}

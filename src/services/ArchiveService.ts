import archiver from 'archiver'
import { extract } from 'tar'
import { createWriteStream, promises as fsp } from 'fs'
import { basename, join, resolve } from 'path'
import { randomBytes } from 'crypto'
import { getLogService, LogService } from './LogService'
import { LocalIOError, RemoteCommandError } from '../types/errors'
import type { RemoteSession } from '../types/session'
import type { CleanupResult } from '../types/transfer'
import { bestEffort } from '../utils/cleanup'
import { toFerryError } from '../utils/errors'
import { getTempDirectory } from '../utils/platform'
import { joinRemotePath, normalizeRemotePath, remoteBasename, remoteDirname } from '../utils/remotePath'
import { shellCommand } from '../utils/shellEscape'

export const ARCHIVE_EXTENSION = '.tar.gz'

export interface ArchiveServiceOptions {
  log?: LogService
  sessionId: string
  /** Timeout for remote tar/rm invocations (ms) */
  commandTimeoutMs?: number
  /** Where local archives are written; defaults to the OS temp directory */
  tempDirectory?: string
}

function randomSuffix(): string {
  return randomBytes(4).toString('hex')
}

/** `<scratch>/<folder>_<timestamp>_<random>.tar.gz` */
export function scratchArchivePath(scratchDir: string, folderName: string): string {
  return joinRemotePath(scratchDir, `${folderName}_${Date.now()}_${randomSuffix()}${ARCHIVE_EXTENSION}`)
}

/**
 * ArchiveService — gzip tar archives on both ends of a folder transfer.
 * Local archives are built with archiver and unpacked with tar;
 * remote ones through `tar` over an exec channel.
 */
export class ArchiveService {
  private log: LogService
  private sessionId: string
  private commandTimeoutMs?: number
  private tempDirectory: string

  constructor(options: ArchiveServiceOptions) {
    this.log = options.log ?? getLogService()
    this.sessionId = options.sessionId
    this.commandTimeoutMs = options.commandTimeoutMs
    this.tempDirectory = options.tempDirectory ?? getTempDirectory()
  }

  /**
   * Archive `dirPath` into a fresh file under the temp directory.
   * Entries are rooted at the folder's own name.
   */
  async compressLocal(dirPath: string): Promise<string> {
    const source = resolve(dirPath)
    const stats = await fsp.stat(source).catch((err: unknown) => {
      throw toFerryError(err, 'LocalIOError', source)
    })
    if (!stats.isDirectory()) {
      throw new LocalIOError(`Not a directory: ${source}`, source)
    }

    const folderName = basename(source)
    const archivePath = join(this.tempDirectory, `${folderName}_${randomSuffix()}${ARCHIVE_EXTENSION}`)

    try {
      await new Promise<void>((done, fail) => {
        const output = createWriteStream(archivePath)
        const archive = archiver('tar', { gzip: true })

        output.on('close', () => done())
        output.on('error', (err) => fail(err))

        archive.on('warning', (err) => {
          if (err.code === 'ENOENT') return
          fail(err)
        })
        archive.on('error', (err) => fail(err))

        archive.pipe(output)
        archive.directory(source, folderName)
        archive.finalize().catch(fail)
      })
    } catch (err) {
      await bestEffort(() => fsp.rm(archivePath, { force: true }))
      throw toFerryError(err, 'LocalIOError', archivePath)
    }

    LogService.archiveCreated(this.log, this.sessionId, archivePath)
    return archivePath
  }

  /** Unpack a local archive into `destDir`, creating it when missing */
  async extractLocal(archivePath: string, destDir: string): Promise<void> {
    try {
      await fsp.mkdir(destDir, { recursive: true })
      await extract({ file: archivePath, cwd: destDir })
    } catch (err) {
      throw toFerryError(err, 'LocalIOError', archivePath)
    }
    LogService.archiveExtracted(this.log, this.sessionId, archivePath, destDir)
  }

  /** `tar -czf <dest> -C <parent> <base>` on the remote host */
  async compressRemote(session: RemoteSession, dirPath: string, destArchivePath: string): Promise<void> {
    const dir = normalizeRemotePath(dirPath)
    const command = shellCommand('tar', ['-czf', destArchivePath, '-C', remoteDirname(dir), remoteBasename(dir)])
    await this.run(session, command)
    LogService.archiveCreated(this.log, this.sessionId, destArchivePath)
  }

  /** `tar -xzf <archive> -C <dest>` on the remote host */
  async extractRemote(session: RemoteSession, archivePath: string, destDir: string): Promise<void> {
    const command = shellCommand('tar', ['-xzf', archivePath, '-C', normalizeRemotePath(destDir)])
    await this.run(session, command)
    LogService.archiveExtracted(this.log, this.sessionId, archivePath, destDir)
  }

  /** `rm -f` a remote file; reports failure instead of throwing */
  removeRemote(session: RemoteSession, remotePath: string): Promise<CleanupResult> {
    return bestEffort(async () => {
      const command = shellCommand('rm', ['-f', remotePath])
      const result = await session.exec(command, this.commandTimeoutMs)
      if (result.exitCode !== 0) {
        throw new Error(result.stderr.trim() || `rm exited with code ${result.exitCode}`)
      }
    })
  }

  /** Delete a local file; reports failure instead of throwing */
  removeLocal(localPath: string): Promise<CleanupResult> {
    return bestEffort(() => fsp.rm(localPath, { force: true }))
  }

  private async run(session: RemoteSession, command: string): Promise<void> {
    const result = await session.exec(command, this.commandTimeoutMs)
    if (result.exitCode !== 0) {
      const stderr = result.stderr.trim()
      LogService.remoteCommandFailed(this.log, this.sessionId, command, stderr)
      throw new RemoteCommandError(
        `Remote command failed with exit code ${result.exitCode}${stderr ? `: ${stderr}` : ''}`,
        command,
        result.exitCode,
        result.stderr
      )
    }
  }
}

import { randomUUID } from 'crypto'
import { basename } from 'path'
import { ArchiveService } from '../services/ArchiveService'
import { LogService } from '../services/LogService'
import { RemoteBrowser } from '../services/RemoteBrowser'
import { TransferChannel, type CancelOptions } from '../services/TransferChannel'
import { TransferEngine, type ProgressCallback } from '../services/TransferEngine'
import { LocalIOError, RemoteIOError } from '../types/errors'
import type { RemoteSession } from '../types/session'
import type { RemoteEntry } from '../types/sftp'
import type { CleanupIssue, TransferKind } from '../types/transfer'
import { remoteBasename } from '../utils/remotePath'
import { fail, handle, ok, type ApiResult, type FerryContext } from './context'

interface TransferRequest {
  kind: TransferKind
  sources: string[]
  destination: string
  extract?: boolean
}

type TransferRun = (
  engine: TransferEngine,
  onProgress: ProgressCallback,
  signal: AbortSignal
) => Promise<string[]>

function describe(request: TransferRequest): string {
  const names = request.kind.startsWith('upload')
    ? request.sources.map((p) => basename(p))
    : request.sources.map((p) => remoteBasename(p))
  return names.length === 1 ? names[0] : `${names.length} files`
}

function createEngine(ctx: FerryContext, session: RemoteSession): TransferEngine {
  const settings = ctx.settings.getAll()
  const sessionId = ctx.sessions.sessionId
  const archives = new ArchiveService({
    log: ctx.log,
    sessionId,
    commandTimeoutMs: settings.remoteCommandTimeout * 1000,
    tempDirectory: ctx.tempDirectory
  })
  return new TransferEngine(session, {
    sessionId,
    archives,
    log: ctx.log,
    chunkSize: settings.transferChunkSize,
    progressIntervalMs: settings.transferProgressInterval,
    bandwidthLimitUp: settings.transferBandwidthLimitUp,
    bandwidthLimitDown: settings.transferBandwidthLimitDown,
    preserveTimestamps: settings.transferPreserveTimestamps,
    scratchDirectory: settings.remoteScratchDirectory
  })
}

/**
 * Start a transfer in the background. The channel is returned before any byte moves;
 * Busy and NotConnected are reported here, everything later through the channel.
 */
function startTransfer(ctx: FerryContext, request: TransferRequest, run: TransferRun): ApiResult<TransferChannel> {
  if (request.sources.length === 0) {
    return fail(
      request.kind.startsWith('upload')
        ? new LocalIOError('No local files selected.')
        : new RemoteIOError('No remote files selected.')
    )
  }

  let session: RemoteSession
  let release: () => void
  const channel = new TransferChannel({
    id: randomUUID(),
    kind: request.kind,
    sources: request.sources,
    destination: request.destination,
    extract: request.extract,
    onForceCancel: () => ctx.sessions.forceClose()
  })
  const name = describe(request)

  try {
    session = ctx.sessions.getSession()
    release = ctx.sessions.acquire(`${request.kind} ${name}`, channel.abortController)
  } catch (err) {
    return fail(err)
  }

  const engine = createEngine(ctx, session)
  engine.on('status', (message: string) => channel.status(message))
  engine.on('cleanup', (issue: CleanupIssue) => channel.addCleanupIssue(issue))

  const sessionId = ctx.sessions.sessionId
  ctx.activeChannel = channel
  channel.start()

  const execute = async () => {
    let result: { resultPaths: string[] } | { error: unknown }
    try {
      result = { resultPaths: await run(engine, (done, total) => channel.progress(done, total), channel.signal) }
    } catch (error) {
      result = { error }
    }

    // Free the session before anyone hears about the outcome
    release()
    if (ctx.activeChannel === channel) ctx.activeChannel = null
    engine.removeAllListeners()

    const outcome = channel.finish(result)
    if (outcome.status === 'cancelled') {
      LogService.transferCancelled(ctx.log, sessionId, name)
    } else if (outcome.status === 'failed') {
      LogService.transferFailed(ctx.log, sessionId, name, outcome.error?.message ?? 'Unknown error')
    }
  }

  execute().catch((err: unknown) => {
    ctx.log.log(sessionId, 'error', 'transfer', `Transfer bookkeeping failed: ${name}`, String(err))
  })

  return ok(channel)
}

/**
 * Remote browsing and transfer handlers.
 *
 *   listRemote(path)                          → ApiResult<RemoteEntry[]>
 *   navigateInto(current, name)               → string
 *   navigateUp(current)                       → string
 *   makeRemoteDirectory(path)                 → ApiResult<void>
 *   uploadFiles(paths, remoteDir)             → ApiResult<TransferChannel>
 *   uploadFolder(path, remoteDir, extract)    → ApiResult<TransferChannel>
 *   downloadFiles(paths, localDir)            → ApiResult<TransferChannel>
 *   downloadFolder(path, localDir, extract)   → ApiResult<TransferChannel>
 *   cancel({ force })                         → boolean (whether a transfer was running)
 */
export function registerSFTPApi(ctx: FerryContext) {
  const browser = () => new RemoteBrowser(ctx.sessions, ctx.settings.get('remoteRoot'), ctx.log)

  return {
    listRemote(path: string): Promise<ApiResult<RemoteEntry[]>> {
      return handle(() => browser().list(path))
    },

    navigateInto(currentPath: string, entryName: string): string {
      return browser().navigateInto(currentPath, entryName)
    },

    navigateUp(currentPath: string): string {
      return browser().navigateUp(currentPath)
    },

    makeRemoteDirectory(path: string): Promise<ApiResult<void>> {
      return handle(() => browser().makeDirectory(path))
    },

    uploadFiles(localPaths: string[], remoteDir: string): ApiResult<TransferChannel> {
      return startTransfer(
        ctx,
        { kind: 'upload-files', sources: localPaths, destination: remoteDir },
        (engine, onProgress, signal) => engine.uploadFiles(localPaths, remoteDir, onProgress, signal)
      )
    },

    uploadFolder(localDir: string, remoteDir: string, extract: boolean): ApiResult<TransferChannel> {
      return startTransfer(
        ctx,
        { kind: 'upload-folder', sources: [localDir], destination: remoteDir, extract },
        async (engine, onProgress, signal) => [
          await engine.uploadFolder(localDir, remoteDir, extract, onProgress, signal)
        ]
      )
    },

    downloadFiles(remotePaths: string[], localDir: string): ApiResult<TransferChannel> {
      return startTransfer(
        ctx,
        { kind: 'download-files', sources: remotePaths, destination: localDir },
        (engine, onProgress, signal) => engine.downloadFiles(remotePaths, localDir, onProgress, signal)
      )
    },

    downloadFolder(remoteDir: string, localDir: string, extract: boolean): ApiResult<TransferChannel> {
      return startTransfer(
        ctx,
        { kind: 'download-folder', sources: [remoteDir], destination: localDir, extract },
        async (engine, onProgress, signal) => [
          await engine.downloadFolder(remoteDir, localDir, extract, onProgress, signal)
        ]
      )
    },

    cancel(options: CancelOptions = {}): boolean {
      const channel = ctx.activeChannel
      if (!channel || channel.finished) return false
      channel.cancel(options)
      return true
    }
  }
}

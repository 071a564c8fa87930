import type { FerryErrorKind } from './errors'

/** Kind of work a transfer task performs */
export type TransferKind = 'upload-files' | 'upload-folder' | 'download-files' | 'download-folder'

/** Lifecycle state of a transfer task */
export type TransferState = 'pending' | 'running' | 'completed' | 'cancelled' | 'failed'

/** Terminal status reported once per task */
export type TransferOutcomeStatus = 'success' | 'cancelled' | 'failed'

/** A single transfer, alive only while it runs */
export interface TransferTask {
  id: string
  kind: TransferKind
  sources: string[]
  destination: string
  extract: boolean
  state: TransferState
  bytesTotal: number
  bytesDone: number
  startedAt?: number
  completedAt?: number
}

/** Which cleanup step a {@link CleanupIssue} came from */
export type CleanupStep =
  | 'partial-remote-file'
  | 'partial-local-file'
  | 'local-archive'
  | 'remote-archive'
  | 'scratch-archive'

/** A cleanup step that failed; recorded for diagnostics, never raised */
export interface CleanupIssue {
  step: CleanupStep
  path: string
  message: string
}

/** Result of a best-effort cleanup action */
export type CleanupResult = { ok: true } | { ok: false; error: string }

/** The single terminal event of a transfer task */
export interface TransferOutcome {
  taskId: string
  status: TransferOutcomeStatus
  bytesDone: number
  bytesTotal: number
  error?: { kind: FerryErrorKind; message: string }
  cleanup: CleanupIssue[]
  /** True when the task was hard-cancelled by closing the connection */
  connectionClosed: boolean
  /** Where the result landed (remote or local path), when the task succeeded */
  resultPaths: string[]
}

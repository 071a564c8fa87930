import { EventEmitter } from 'events'
import { CancelledError, SftpFerryError } from '../types/errors'
import type {
  CleanupIssue,
  TransferKind,
  TransferOutcome,
  TransferOutcomeStatus,
  TransferTask
} from '../types/transfer'
import { toFerryError } from '../utils/errors'

export interface CancelOptions {
  /** Also close the connection, stopping remote commands that ignore the signal */
  force?: boolean
}

export interface TransferChannelOptions {
  id: string
  kind: TransferKind
  sources: string[]
  destination: string
  extract?: boolean
  /** Called on `cancel({ force: true })` */
  onForceCancel?: () => void
}

/**
 * TransferChannel — progress and cancellation for one transfer task.
 *
 * Emits:
 *   'progress'  → (bytesDone: number, bytesTotal: number)  coalesced, never decreasing
 *   'status'    → (message: string)
 *   'done'      → (outcome: TransferOutcome)  exactly once, nothing after it
 */
export class TransferChannel extends EventEmitter {
  readonly task: TransferTask
  private controller = new AbortController()
  private onForceCancel?: () => void
  private cleanup: CleanupIssue[] = []
  private connectionClosed = false
  private pendingProgress = false
  private progressTimer: NodeJS.Immediate | null = null
  private outcome: TransferOutcome | null = null
  private outcomePromise: Promise<TransferOutcome>
  private resolveOutcome: (outcome: TransferOutcome) => void = () => {}

  constructor(options: TransferChannelOptions) {
    super()
    this.task = {
      id: options.id,
      kind: options.kind,
      sources: [...options.sources],
      destination: options.destination,
      extract: options.extract ?? false,
      state: 'pending',
      bytesTotal: 0,
      bytesDone: 0
    }
    this.onForceCancel = options.onForceCancel
    this.outcomePromise = new Promise((resolve) => {
      this.resolveOutcome = resolve
    })
  }

  get id(): string {
    return this.task.id
  }

  get signal(): AbortSignal {
    return this.controller.signal
  }

  /** The controller behind {@link signal}; aborting it cancels the task */
  get abortController(): AbortController {
    return this.controller
  }

  get finished(): boolean {
    return this.outcome !== null
  }

  start(): void {
    if (this.task.state !== 'pending') return
    this.task.state = 'running'
    this.task.startedAt = Date.now()
  }

  /** Record progress; listeners see the latest value at most once per event-loop turn */
  progress(bytesDone: number, bytesTotal: number): void {
    if (this.outcome) return

    this.task.bytesTotal = Math.max(this.task.bytesTotal, bytesTotal)
    const clamped = Math.min(bytesDone, this.task.bytesTotal)
    if (clamped < this.task.bytesDone) return
    this.task.bytesDone = clamped
    this.pendingProgress = true

    if (!this.progressTimer) {
      this.progressTimer = setImmediate(() => {
        this.progressTimer = null
        this.flushProgress()
      })
    }
  }

  status(message: string): void {
    if (this.outcome) return
    this.emit('status', message)
  }

  addCleanupIssue(issue: CleanupIssue): void {
    this.cleanup.push(issue)
  }

  /** Abort the task; with `force` the connection is closed as well */
  cancel(options: CancelOptions = {}): void {
    if (this.outcome) return
    if (!this.controller.signal.aborted) {
      this.controller.abort()
    }
    if (options.force && !this.connectionClosed) {
      this.connectionClosed = true
      this.onForceCancel?.()
    }
  }

  /** Settle the task from the result of its work. Later calls are ignored. */
  finish(result: { resultPaths: string[] } | { error: unknown }): TransferOutcome {
    if (this.outcome) return this.outcome

    if (this.progressTimer) {
      clearImmediate(this.progressTimer)
      this.progressTimer = null
    }

    let status: TransferOutcomeStatus
    let error: SftpFerryError | undefined
    let resultPaths: string[] = []

    if ('error' in result) {
      error = this.controller.signal.aborted ? new CancelledError() : toFerryError(result.error, 'RemoteIOError')
      status = error instanceof CancelledError ? 'cancelled' : 'failed'
    } else {
      status = 'success'
      resultPaths = result.resultPaths
      // Fill the bar even when the final chunk report was coalesced away
      this.task.bytesDone = this.task.bytesTotal
      this.pendingProgress = true
    }
    this.flushProgress()

    this.task.state = status === 'success' ? 'completed' : status
    this.task.completedAt = Date.now()

    const outcome: TransferOutcome = {
      taskId: this.task.id,
      status,
      bytesDone: this.task.bytesDone,
      bytesTotal: this.task.bytesTotal,
      ...(error ? { error: { kind: error.kind, message: error.message } } : {}),
      cleanup: [...this.cleanup],
      connectionClosed: this.connectionClosed,
      resultPaths
    }
    this.outcome = outcome
    this.emit('done', outcome)
    this.resolveOutcome(outcome)
    return outcome
  }

  /** Resolves with the terminal outcome, however late it is called */
  result(): Promise<TransferOutcome> {
    return this.outcomePromise
  }

  private flushProgress(): void {
    if (!this.pendingProgress) return
    this.pendingProgress = false
    this.emit('progress', this.task.bytesDone, this.task.bytesTotal)
  }
}

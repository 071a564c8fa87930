import { Transform, TransformCallback } from 'stream'
import { CancelledError } from '../types/errors'

/**
 * ThrottleTransform — limits throughput to a given KB/s rate.
 * Used to enforce bandwidth limits on SFTP transfers.
 */
export class ThrottleTransform extends Transform {
  private bytesPerSecond: number
  private transferred = 0
  private startTime = Date.now()
  private timer: NodeJS.Timeout | null = null

  constructor(kbPerSecond: number) {
    super()
    this.bytesPerSecond = kbPerSecond * 1024
  }

  _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) {
    this.transferred += chunk.length
    const elapsed = (Date.now() - this.startTime) / 1000
    const expectedTime = this.transferred / this.bytesPerSecond
    const delay = Math.max(0, (expectedTime - elapsed) * 1000)

    if (delay > 0) {
      this.timer = setTimeout(() => {
        this.timer = null
        callback(null, chunk)
      }, delay)
    } else {
      callback(null, chunk)
    }
  }

  _destroy(error: Error | null, callback: (error?: Error | null) => void) {
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = null
    }
    callback(error)
  }
}

export interface ProgressTransformOptions {
  bytesTotal: number
  /** Report after at least this many bytes since the last report */
  chunkSize: number
  /** ...or after this many ms since the last report */
  intervalMs: number
  onProgress: (bytesDone: number, bytesTotal: number) => void
  signal?: AbortSignal
}

/**
 * ProgressTransform — counts bytes passing through, reports progress at a bounded
 * rate and fails the pipeline with CancelledError once the signal is aborted.
 */
export class ProgressTransform extends Transform {
  private options: ProgressTransformOptions
  private transferred = 0
  private lastReportedBytes = 0
  private lastReportedAt = Date.now()

  constructor(options: ProgressTransformOptions) {
    super()
    this.options = options
  }

  get bytesDone(): number {
    return this.transferred
  }

  _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) {
    if (this.options.signal?.aborted) {
      callback(new CancelledError())
      return
    }

    this.transferred += chunk.length
    const now = Date.now()
    if (
      this.transferred - this.lastReportedBytes >= this.options.chunkSize ||
      now - this.lastReportedAt >= this.options.intervalMs
    ) {
      this.report(now)
    }
    callback(null, chunk)
  }

  _flush(callback: TransformCallback) {
    this.report(Date.now())
    callback()
  }

  private report(now: number): void {
    this.lastReportedBytes = this.transferred
    this.lastReportedAt = now
    this.options.onProgress(this.transferred, this.options.bytesTotal)
  }
}

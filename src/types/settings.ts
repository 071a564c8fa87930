import type { HostKeyPolicy } from './hostkey'

/** Persisted preferences */
export interface AppSettings {
  // Connection
  connectionTimeout: number            // seconds
  connectionKeepAliveInterval: number  // seconds, 0 = disabled
  connectionKeepAliveCountMax: number
  hostKeyPolicy: HostKeyPolicy

  // Remote browsing
  remoteRoot: string
  remoteFollowSymlinks: boolean

  // Transfers
  transferChunkSize: number            // bytes between progress reports
  transferProgressInterval: number     // ms between progress reports
  transferBandwidthLimitUp: number     // KB/s, 0 = unlimited
  transferBandwidthLimitDown: number   // KB/s, 0 = unlimited
  transferPreserveTimestamps: boolean
  remoteScratchDirectory: string
  remoteCommandTimeout: number         // seconds

  // Log
  logMaxEntries: number
  logDebugMode: boolean
}

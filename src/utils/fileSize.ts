const UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const
const STEP = 1024

/** Byte count for log lines, e.g. `1.5 KB` */
export function formatFileSize(bytes: number, decimals: number = 1): string {
  if (!Number.isFinite(bytes) || bytes < 0) return '—'

  let value = bytes
  let unit = 0
  while (value >= STEP && unit < UNITS.length - 1) {
    value /= STEP
    unit++
  }
  return `${parseFloat(value.toFixed(decimals))} ${UNITS[unit]}`
}

/** Average rate of `bytes` moved over `elapsedMs`; '—' when nothing was timed */
export function formatRate(bytes: number, elapsedMs: number): string {
  if (bytes <= 0 || elapsedMs <= 0) return '—'
  return `${formatFileSize((bytes * 1000) / elapsedMs)}/s`
}

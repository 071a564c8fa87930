import type { AppSettings } from '../types/settings'
import type { LogEntry } from '../types/log'
import { handle, type ApiResult, type FerryContext } from './context'

/** Push the log-related settings into the LogService */
export function applyLogSettings(ctx: FerryContext, settings: Partial<AppSettings>): void {
  if (typeof settings.logMaxEntries === 'number') {
    ctx.log.setMaxEntries(settings.logMaxEntries)
  }
  if (typeof settings.logDebugMode === 'boolean') {
    ctx.log.setDebugMode(settings.logDebugMode)
  }
}

/**
 * Settings and activity log handlers.
 *
 *   getSettings()           → ApiResult<AppSettings>
 *   updateSettings(partial) → ApiResult<AppSettings>
 *   resetSettings()         → ApiResult<AppSettings>
 *   getLogEntries()         → ApiResult<LogEntry[]>
 *   exportLog()             → ApiResult<string>
 *   clearLog()              → ApiResult<void>
 */
export function registerSettingsApi(ctx: FerryContext) {
  return {
    getSettings(): Promise<ApiResult<AppSettings>> {
      return handle(() => ctx.settings.getAll())
    },

    updateSettings(updates: Partial<AppSettings>): Promise<ApiResult<AppSettings>> {
      return handle(() => {
        const result = ctx.settings.update(updates)
        applyLogSettings(ctx, updates)
        return result
      })
    },

    resetSettings(): Promise<ApiResult<AppSettings>> {
      return handle(() => {
        const result = ctx.settings.reset()
        applyLogSettings(ctx, result)
        return result
      })
    },

    getLogEntries(): Promise<ApiResult<LogEntry[]>> {
      return handle(() => [...ctx.log.getEntries(ctx.sessions.sessionId)])
    },

    exportLog(): Promise<ApiResult<string>> {
      return handle(() => ctx.log.exportLog(ctx.sessions.sessionId))
    },

    clearLog(): Promise<ApiResult<void>> {
      return handle(() => ctx.log.clearEntries(ctx.sessions.sessionId))
    }
  }
}

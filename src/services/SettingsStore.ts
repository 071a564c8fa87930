import Conf from 'conf'
import { InvalidSettingError } from '../types/errors'
import type { AppSettings } from '../types/settings'

export const DEFAULT_SETTINGS: AppSettings = {
  connectionTimeout: 15,
  connectionKeepAliveInterval: 30,
  connectionKeepAliveCountMax: 3,
  hostKeyPolicy: 'ask',

  remoteRoot: '/',
  remoteFollowSymlinks: true,

  transferChunkSize: 32 * 1024,
  transferProgressInterval: 200,
  transferBandwidthLimitUp: 0,
  transferBandwidthLimitDown: 0,
  transferPreserveTimestamps: true,
  remoteScratchDirectory: '/tmp',
  remoteCommandTimeout: 300,

  logMaxEntries: 5000,
  logDebugMode: false
}

type NumericSetting = {
  [K in keyof AppSettings]: AppSettings[K] extends number ? K : never
}[keyof AppSettings]

const POSITIVE_SETTINGS: readonly NumericSetting[] = [
  'transferChunkSize',
  'connectionTimeout',
  'remoteCommandTimeout',
  'logMaxEntries'
]

// 0 disables these
const NON_NEGATIVE_SETTINGS: readonly NumericSetting[] = [
  'transferProgressInterval',
  'transferBandwidthLimitUp',
  'transferBandwidthLimitDown',
  'connectionKeepAliveInterval',
  'connectionKeepAliveCountMax'
]

function validate(updates: Partial<AppSettings>): void {
  for (const key of POSITIVE_SETTINGS) {
    const value = updates[key]
    if (value !== undefined && !(Number.isFinite(value) && value > 0)) {
      throw new InvalidSettingError(key, `${key} must be a positive number (got ${value})`)
    }
  }
  for (const key of NON_NEGATIVE_SETTINGS) {
    const value = updates[key]
    if (value !== undefined && !(Number.isFinite(value) && value >= 0)) {
      throw new InvalidSettingError(key, `${key} must be zero or a positive number (got ${value})`)
    }
  }
}

type SettingsSchema = {
  settings: AppSettings
}

export interface SettingsStoreOptions {
  /** Directory holding the settings file; defaults to the per-user config directory */
  cwd?: string
}

/**
 * SettingsStore — persists app preferences using conf.
 */
export class SettingsStore {
  private store: Conf<SettingsSchema>

  constructor(options: SettingsStoreOptions = {}) {
    this.store = new Conf<SettingsSchema>({
      projectName: 'sftp-ferry',
      configName: 'settings',
      cwd: options.cwd,
      defaults: {
        settings: DEFAULT_SETTINGS
      }
    })
  }

  /** Get all settings, filling keys added since the file was written */
  getAll(): AppSettings {
    const saved: Partial<AppSettings> = this.store.get('settings')
    return { ...DEFAULT_SETTINGS, ...saved }
  }

  /** Get a single setting value */
  get<K extends keyof AppSettings>(key: K): AppSettings[K] {
    return this.getAll()[key]
  }

  /** Update one or more settings; an out-of-range value rejects the whole update */
  update(updates: Partial<AppSettings>): AppSettings {
    validate(updates)
    const updated = { ...this.getAll(), ...updates }
    this.store.set('settings', updated)
    return updated
  }

  /** Reset all settings to defaults */
  reset(): AppSettings {
    this.store.set('settings', DEFAULT_SETTINGS)
    return { ...DEFAULT_SETTINGS }
  }
}

let settingsStoreInstance: SettingsStore | null = null

/** Get (or create) the SettingsStore backed by the user config directory */
export function getSettingsStore(): SettingsStore {
  if (!settingsStoreInstance) {
    settingsStoreInstance = new SettingsStore()
  }
  return settingsStoreInstance
}

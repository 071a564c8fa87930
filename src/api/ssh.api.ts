import { promises as fsp } from 'fs'
import type { SSHConnectionConfig } from '../services/SSHService'
import type { TrustedHostKey } from '../types/hostkey'
import type { ConnectParams, HostKeyPrompt } from '../types/session'
import type { AppSettings } from '../types/settings'
import { toFerryError } from '../utils/errors'
import { fail, handle, ok, type ApiResult, type FerryContext } from './context'

const DEFAULT_SSH_PORT = 22

/** Combine what the caller supplies with the connection settings */
export function toConnectionConfig(params: ConnectParams, settings: AppSettings): SSHConnectionConfig {
  return {
    host: params.host,
    port: params.port ?? DEFAULT_SSH_PORT,
    username: params.username,
    credential: params.credential,
    proxy: params.proxy,
    hostKeyPolicy: settings.hostKeyPolicy,
    keepAliveInterval: settings.connectionKeepAliveInterval,
    keepAliveCountMax: settings.connectionKeepAliveCountMax,
    readyTimeout: settings.connectionTimeout,
    followSymlinks: settings.remoteFollowSymlinks
  }
}

/**
 * Connection and host key handlers.
 *
 *   connect(params)          → ApiResult<void>
 *   disconnect()             → ApiResult<void>
 *   isConnected()            → boolean
 *   onHostKey(listener)      → unsubscribe; listeners decide on unknown keys under the 'ask' policy
 *   listHostKeys()           → ApiResult<TrustedHostKey[]>
 *   removeHostKey(id)        → ApiResult<boolean>
 *   exportKnownHosts()       → ApiResult<string>
 *   importKnownHosts(text)   → ApiResult<number>  (imported count)
 *   importSystemKnownHosts() → ApiResult<number>
 */
export function registerSSHApi(ctx: FerryContext) {
  return {
    connect(params: ConnectParams): Promise<ApiResult<void>> {
      return handle(async () => {
        await ctx.sessions.connect(toConnectionConfig(params, ctx.settings.getAll()))
      })
    },

    disconnect(): ApiResult<void> {
      try {
        ctx.sessions.disconnect()
        return ok(undefined)
      } catch (err) {
        return fail(err)
      }
    },

    isConnected(): boolean {
      return ctx.sessions.isConnected()
    },

    onHostKey(listener: HostKeyPrompt): () => void {
      ctx.sessions.on('hostkey', listener)
      return () => {
        ctx.sessions.removeListener('hostkey', listener)
      }
    },

    listHostKeys(): Promise<ApiResult<TrustedHostKey[]>> {
      return handle(() => ctx.hostKeys.getAll())
    },

    removeHostKey(id: string): Promise<ApiResult<boolean>> {
      return handle(() => ctx.hostKeys.remove(id))
    },

    exportKnownHosts(): Promise<ApiResult<string>> {
      return handle(() => ctx.hostKeys.exportKnownHosts())
    },

    importKnownHosts(content: string): Promise<ApiResult<number>> {
      return handle(() => ctx.hostKeys.importKnownHosts(content))
    },

    importSystemKnownHosts(): Promise<ApiResult<number>> {
      return handle(async () => {
        const content = await fsp.readFile(ctx.knownHostsPath, 'utf-8').catch((err: unknown) => {
          throw toFerryError(err, 'LocalIOError', ctx.knownHostsPath)
        })
        return ctx.hostKeys.importKnownHosts(content)
      })
    }
  }
}

import { createHash } from 'crypto'
import type { HostKeyStore } from './HostKeyStore'
import { LogService } from './LogService'
import { UntrustedHostError } from '../types/errors'
import type { HostKeyInfo, HostKeyPolicy } from '../types/hostkey'
import type { HostKeyPrompt } from '../types/session'

/** OpenSSH-style SHA256 fingerprint of a raw key blob */
export function fingerprintKey(key: Buffer): string {
  return 'SHA256:' + createHash('sha256').update(key).digest('base64').replace(/=+$/, '')
}

/** Read the algorithm name that prefixes an SSH wire-format public key */
export function readKeyType(key: Buffer): string {
  if (key.length < 4) return 'unknown'
  const length = key.readUInt32BE(0)
  if (length === 0 || 4 + length > key.length) return 'unknown'
  return key.toString('ascii', 4, 4 + length)
}

export function describeHostKey(host: string, port: number, key: Buffer): HostKeyInfo {
  return {
    host,
    port,
    keyType: readKeyType(key),
    fingerprint: fingerprintKey(key),
    publicKeyBase64: key.toString('base64')
  }
}

export interface HostVerifierOptions {
  host: string
  port: number
  policy: HostKeyPolicy
  store: Pick<HostKeyStore, 'verify' | 'add'>
  /** Consulted for unknown keys under the 'ask' policy */
  prompt?: HostKeyPrompt
  log: LogService
  sessionId: string
}

export interface HostVerification {
  /** ssh2 `hostVerifier` callback */
  verifier: (key: Buffer, verify: (valid: boolean) => void) => void
  /** The error explaining the last rejection, if a key was rejected */
  rejection(): UntrustedHostError | null
}

/**
 * Build the ssh2 host verifier for a policy.
 * A changed key is rejected under every policy except 'accept-any'.
 */
export function createHostVerifier(options: HostVerifierOptions): HostVerification {
  const { host, port, policy, store, prompt, log, sessionId } = options
  let rejected: UntrustedHostError | null = null

  const verifier = (key: Buffer, verify: (valid: boolean) => void): void => {
    const info = describeHostKey(host, port, key)

    let settled = false
    const settle = (valid: boolean, reason?: 'unknown' | 'changed') => {
      if (settled) return
      settled = true
      if (!valid && reason) {
        rejected = new UntrustedHostError(info, reason)
        LogService.hostKeyRejected(log, sessionId, host, port, info.fingerprint)
      }
      verify(valid)
    }

    if (policy === 'accept-any') {
      LogService.hostKeyCheckDisabled(log, sessionId, host, port)
      settle(true)
      return
    }

    const result = store.verify(host, port, info.keyType, info.fingerprint, info.publicKeyBase64)

    if (result.status === 'trusted') {
      LogService.hostKeyVerified(log, sessionId, host, port)
      settle(true)
      return
    }

    if (result.status === 'changed') {
      LogService.hostKeyChanged(log, sessionId, result.previousKey.fingerprint || result.previousKey.publicKeyBase64, info.fingerprint)
      settle(false, 'changed')
      return
    }

    const trust = () => {
      store.add({
        host,
        port,
        keyType: info.keyType,
        fingerprint: info.fingerprint,
        publicKeyBase64: info.publicKeyBase64
      })
      LogService.hostKeyTrusted(log, sessionId, host, port, info.fingerprint)
      settle(true)
    }

    if (policy === 'accept-new') {
      trust()
    } else if (policy === 'ask' && prompt) {
      prompt(
        info,
        () => {
          if (!settled) trust()
        },
        () => settle(false, 'unknown')
      )
    } else {
      settle(false, 'unknown')
    }
  }

  return {
    verifier,
    rejection: () => rejected
  }
}

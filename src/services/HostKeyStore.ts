import Conf from 'conf'
import { randomUUID } from 'crypto'
import { fingerprintKey } from './hostKeyVerifier'
import type { TrustedHostKey } from '../types/hostkey'

type HostKeyStoreSchema = {
  trustedKeys: TrustedHostKey[]
}

/** Result of verifying a host key against the trusted store */
export type HostKeyVerifyResult =
  | { status: 'trusted' }
  | { status: 'new' }
  | { status: 'changed'; previousKey: TrustedHostKey }

export interface HostKeyStoreOptions {
  /** Directory holding the store file; defaults to the per-user config directory */
  cwd?: string
}

/**
 * HostKeyStore — persists trusted SSH host keys using conf.
 *
 * Backs the trust-on-first-use and prompt-based verification policies and
 * supports import/export in OpenSSH known_hosts format.
 */
export class HostKeyStore {
  private store: Conf<HostKeyStoreSchema>

  constructor(options: HostKeyStoreOptions = {}) {
    this.store = new Conf<HostKeyStoreSchema>({
      projectName: 'sftp-ferry',
      configName: 'hostkeys',
      cwd: options.cwd,
      defaults: {
        trustedKeys: []
      }
    })
  }

  /** Get all trusted host keys */
  getAll(): TrustedHostKey[] {
    return this.store.get('trustedKeys', [])
  }

  /** Get trusted keys for a specific host:port */
  getByHost(host: string, port: number): TrustedHostKey[] {
    return this.getAll().filter((k) => k.host === host && k.port === port)
  }

  /** Add a new trusted host key */
  add(key: Omit<TrustedHostKey, 'id' | 'trustedAt' | 'lastSeen'>): TrustedHostKey {
    const now = Date.now()
    const entry: TrustedHostKey = {
      ...key,
      id: randomUUID(),
      trustedAt: now,
      lastSeen: now
    }

    const keys = this.getAll()
    keys.push(entry)
    this.store.set('trustedKeys', keys)
    return entry
  }

  /** Remove a trusted host key by ID */
  remove(id: string): boolean {
    const keys = this.getAll()
    const filtered = keys.filter((k) => k.id !== id)
    if (filtered.length === keys.length) return false
    this.store.set('trustedKeys', filtered)
    return true
  }

  /** Remove all trusted keys for a specific host:port */
  removeAllForHost(host: string, port: number): number {
    const keys = this.getAll()
    const filtered = keys.filter((k) => !(k.host === host && k.port === port))
    const removed = keys.length - filtered.length
    this.store.set('trustedKeys', filtered)
    return removed
  }

  /** Update the lastSeen timestamp for a key */
  updateLastSeen(id: string): void {
    const keys = this.getAll()
    const key = keys.find((k) => k.id === id)
    if (key) {
      key.lastSeen = Date.now()
      this.store.set('trustedKeys', keys)
    }
  }

  /**
   * Verify a host key against the trusted store.
   * Returns 'trusted' if known and matching, 'new' if unknown, 'changed' if mismatch.
   */
  verify(
    host: string,
    port: number,
    keyType: string,
    fingerprint: string,
    publicKeyBase64: string
  ): HostKeyVerifyResult {
    const existing = this.getByHost(host, port)

    if (existing.length === 0) {
      return { status: 'new' }
    }

    const match = existing.find(
      (k) =>
        k.keyType === keyType &&
        (k.fingerprint === fingerprint || k.publicKeyBase64 === publicKeyBase64)
    )

    if (match) {
      this.updateLastSeen(match.id)
      return { status: 'trusted' }
    }

    const sameType = existing.find((k) => k.keyType === keyType)
    const previousKey = sameType ?? existing[0]

    return { status: 'changed', previousKey }
  }

  /** Export all trusted keys in OpenSSH known_hosts format */
  exportKnownHosts(): string {
    const keys = this.getAll()
    return keys
      .map((k) => {
        const hostStr = k.port === 22 ? k.host : `[${k.host}]:${k.port}`
        return `${hostStr} ${k.keyType} ${k.publicKeyBase64}`
      })
      .join('\n')
  }

  /**
   * Import keys from OpenSSH known_hosts format.
   * Returns the number of newly imported keys (duplicates skipped).
   * Hashed host entries (`|1|...`) cannot be mapped back to a host and are skipped.
   */
  importKnownHosts(content: string): number {
    const lines = content.split('\n').filter((l) => l.trim() && !l.trim().startsWith('#'))
    let imported = 0

    for (const line of lines) {
      const parts = line.trim().split(/\s+/)
      if (parts.length < 3) continue

      const [hostField, keyType, publicKeyBase64] = parts
      if (hostField.startsWith('|') || hostField.startsWith('@')) continue

      // A line may list several comma-separated hosts
      for (const hostPart of hostField.split(',')) {
        let host: string
        let port: number

        const bracketMatch = hostPart.match(/^\[(.+)\]:(\d+)$/)
        if (bracketMatch) {
          host = bracketMatch[1]
          port = parseInt(bracketMatch[2], 10)
        } else {
          host = hostPart
          port = 22
        }

        const isDuplicate = this.getByHost(host, port).some(
          (k) => k.keyType === keyType && k.publicKeyBase64 === publicKeyBase64
        )

        if (!isDuplicate) {
          this.add({
            host,
            port,
            keyType,
            fingerprint: fingerprintKey(Buffer.from(publicKeyBase64, 'base64')),
            publicKeyBase64,
            comment: 'Imported from known_hosts'
          })
          imported++
        }
      }
    }

    return imported
  }
}

let hostKeyStoreInstance: HostKeyStore | null = null

/** Get (or create) the HostKeyStore backed by the user config directory */
export function getHostKeyStore(): HostKeyStore {
  if (!hostKeyStoreInstance) {
    hostKeyStoreInstance = new HostKeyStore()
  }
  return hostKeyStoreInstance
}

/** A trusted SSH host key stored in the host key database */
export interface TrustedHostKey {
  id: string
  host: string
  port: number
  keyType: string                // ssh-rsa, ssh-ed25519, ecdsa-sha2-nistp256, etc.
  fingerprint: string            // SHA256 fingerprint
  publicKeyBase64: string        // Full public key data
  trustedAt: number              // Timestamp when first trusted
  lastSeen: number               // Timestamp of last connection using this key
  comment?: string
}

/** Key presented by a server during the handshake */
export interface HostKeyInfo {
  host: string
  port: number
  keyType: string
  fingerprint: string
  publicKeyBase64: string
}

/**
 * How unknown and changed host keys are handled.
 *
 * - `strict`: only keys already in the store are accepted
 * - `ask`: unknown keys are offered to `hostkey` listeners; rejected when nobody listens
 * - `accept-new`: trust on first use, changed keys are still rejected
 * - `accept-any`: every key is accepted and nothing is stored (insecure)
 */
export type HostKeyPolicy = 'strict' | 'ask' | 'accept-new' | 'accept-any'

import { posix } from 'path'

/**
 * Normalize a remote path to forward slashes, collapsing duplicate separators
 * and `.`/`..` segments. Trailing slashes are dropped except for the root.
 * An empty path is the root.
 */
export function normalizeRemotePath(remotePath: string): string {
  if (!remotePath) return '/'
  const normalized = posix.normalize(remotePath.replace(/\\/g, '/'))
  if (normalized.length > 1 && normalized.endsWith('/')) {
    return normalized.slice(0, -1)
  }
  return normalized
}

/** Join a remote directory and an entry name */
export function joinRemotePath(base: string, name: string): string {
  return normalizeRemotePath(posix.join(normalizeRemotePath(base), name.replace(/\\/g, '/')))
}

/** Parent directory of a remote path (the root is its own parent) */
export function remoteDirname(remotePath: string): string {
  return posix.dirname(normalizeRemotePath(remotePath))
}

/** Last segment of a remote path, '' for the root */
export function remoteBasename(remotePath: string): string {
  return posix.basename(normalizeRemotePath(remotePath))
}

/** Whether `remotePath` is `root` or lies below it */
export function isWithinRoot(remotePath: string, root: string): boolean {
  const path = normalizeRemotePath(remotePath)
  const base = normalizeRemotePath(root)
  if (base === '/') return path.startsWith('/')
  return path === base || path.startsWith(base + '/')
}

/** Path of `entryName` inside `currentPath` */
export function navigateInto(currentPath: string, entryName: string): string {
  return joinRemotePath(currentPath, entryName)
}

/**
 * Parent of `currentPath`; a no-op at (or outside) `root`.
 * Relative paths resolve against the login directory, so `root` does not clamp them.
 */
export function navigateUp(currentPath: string, root: string = '/'): string {
  const current = normalizeRemotePath(currentPath)
  const base = normalizeRemotePath(root)
  if (current === base) return current
  if (!current.startsWith('/')) return remoteDirname(current)
  if (!isWithinRoot(current, base)) return current
  return remoteDirname(current)
}

/** A file or directory entry on the remote host */
export interface RemoteEntry {
  name: string
  path: string
  isDirectory: boolean
  isSymlink: boolean
  size: number
  modifiedAt: number   // Unix ms
  accessedAt: number   // Unix ms
  permissions: number  // octal, e.g. 0o755
  symlinkTarget?: string
}

/** Exit status and captured output of a remote shell command */
export interface ExecResult {
  exitCode: number
  stdout: string
  stderr: string
}

import { homedir, tmpdir } from 'os'
import { join } from 'path'

/** Get the default SSH configuration directory */
export function getSSHDirectory(): string {
  return join(homedir(), '.ssh')
}

/** The user's OpenSSH known_hosts file */
export function getKnownHostsPath(): string {
  return join(getSSHDirectory(), 'known_hosts')
}

/** Directory for transient local archives */
export function getTempDirectory(): string {
  return tmpdir()
}

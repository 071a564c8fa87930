import type { CleanupResult } from '../types/transfer'
import { errorMessage } from './errors'

/** Run a cleanup action, turning any failure into a result instead of a throw */
export async function bestEffort(action: () => Promise<void>): Promise<CleanupResult> {
  try {
    await action()
    return { ok: true }
  } catch (err) {
    return { ok: false, error: errorMessage(err, 'Cleanup failed') }
  }
}

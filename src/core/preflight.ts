import { join } from 'node:path'
import { PROJECT_DIRS } from '../constants'
import type { ProjectRole, ProvisionConfig } from '../types/config'
import { notRoot, projectDirMissing } from '../utils/errors'
import { fsx } from '../utils/fs'

export type UidProvider = () => number | undefined

export const processUid: UidProvider = () => (typeof process.getuid === 'function' ? process.getuid() : undefined)

/**
 * Runs before anything on the host changes. Throws ProvisionError.
 * A dry run changes nothing, so it does not need root.
 */
export async function checkPreconditions(config: ProvisionConfig, getuid: UidProvider = processUid): Promise<void> {
  if (!config.dryRun && getuid() !== 0) throw notRoot()
  const roles: readonly ProjectRole[] = ['api', 'frontend', 'widget']
  for (const role of roles) {
    const dir = join(config.sourceDir, PROJECT_DIRS[role])
    if (!(await fsx.isDir(dir))) throw projectDirMissing(dir)
  }
}

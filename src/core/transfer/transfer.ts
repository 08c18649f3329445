import type { WorkingCopy } from '../../types/working-copy'
import { logger } from '../../utils/logger'
import type { RemoteSession } from '../remote/session'

/**
 * Mirror the staged checkout into the remote app directory. Must run after
 * provisioning (the directory exists and is writable) and before deploy.
 */
export async function transfer(session: RemoteSession, workingCopy: WorkingCopy, remoteDir: string): Promise<void> {
  logger.info(`Transferring ${workingCopy.dir} to ${session.address}:${remoteDir}`)
  await session.sync(workingCopy.dir, remoteDir)
  logger.success('Transfer complete')
}

import { join, posix } from 'node:path'
import type { BuildDescriptor } from '../../types/working-copy'
import { constants } from '../../constants'
import { fsx } from '../../utils/fs'
import type { RemoteSession } from '../remote/session'

type FileCheck = (name: string) => Promise<boolean>

/** Compose wins over a bare Dockerfile when both exist. */
async function detectWith(check: FileCheck): Promise<BuildDescriptor | undefined> {
  for (const file of constants.COMPOSE_FILES) {
    if (await check(file)) return { kind: 'compose', file }
  }
  if (await check(constants.DOCKERFILE)) return { kind: 'dockerfile', file: constants.DOCKERFILE }
  return undefined
}

export async function detectLocalDescriptor(dir: string): Promise<BuildDescriptor | undefined> {
  return await detectWith((name: string) => fsx.isFile(join(dir, name)))
}

export async function detectRemoteDescriptor(session: RemoteSession, remoteDir: string): Promise<BuildDescriptor | undefined> {
  return await detectWith((name: string) => session.succeeds(['test', '-f', posix.join(remoteDir, name)]))
}

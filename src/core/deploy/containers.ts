import type { RemoteResult, RemoteSession } from '../remote/session'

/** Force-remove every container, running or stopped, whose name matches. Absence is fine. */
export async function removeNamedContainers(session: RemoteSession, name: string): Promise<number> {
  const res: RemoteResult = await session.execute(['sudo', 'docker', 'ps', '-aq', '--filter', `name=${name}`], { tolerateFailure: true })
  if (!res.ok) return 0
  const ids: string[] = res.output.split(/\s+/).filter((id) => /^[0-9a-f]{12,64}$/.test(id))
  if (ids.length === 0) return 0
  await session.execute(['sudo', 'docker', 'rm', '-f', ...ids], { tolerateFailure: true })
  return ids.length
}

import type { RemoteSession } from '../remote/session'

/** `docker compose` when the plugin answers, otherwise the standalone binary. Both under sudo. */
export async function resolveComposeCommand(session: RemoteSession): Promise<string[]> {
  if (await session.succeeds(['docker', 'compose', 'version'])) return ['sudo', 'docker', 'compose']
  return ['sudo', 'docker-compose']
}

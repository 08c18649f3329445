import { posix } from 'node:path'
import { constants } from '../../constants'

export interface SitePaths {
  /** Where the rendered file is staged before it is moved into place */
  readonly temp: string
  readonly available: string
  readonly enabled: string
}

export function sitePaths(siteName: string = constants.NGINX_SITE_NAME): SitePaths {
  return {
    temp: `/tmp/${siteName}.conf`,
    available: posix.join(constants.NGINX_SITES_AVAILABLE, siteName),
    enabled: posix.join(constants.NGINX_SITES_ENABLED, siteName)
  }
}

/**
 * Site definition: port 80, every path proxied to the app on loopback, with
 * upgrade headers for websockets and the client's address forwarded.
 */
export function renderSiteConfig(appPort: number): string {
  if (!Number.isInteger(appPort) || appPort < 1 || appPort > 65535) {
    throw new RangeError(`invalid upstream port: ${appPort}`)
  }
  return [
    'server {',
    '    listen 80;',
    '    server_name _;',
    '',
    '    location / {',
    `        proxy_pass http://127.0.0.1:${appPort};`,
    '        proxy_http_version 1.1;',
    '        proxy_set_header Upgrade $http_upgrade;',
    "        proxy_set_header Connection 'upgrade';",
    '        proxy_set_header Host $host;',
    '        proxy_cache_bypass $http_upgrade;',
    '        proxy_set_header X-Real-IP $remote_addr;',
    '        proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;',
    '    }',
    '}',
    ''
  ].join('\n')
}

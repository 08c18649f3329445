export const constants = {
  REMOTE_APP_DIR: '/opt/deploy_app',
  /** Image and container name of the direct-build strategy */
  APP_NAME: 'deployed_app',
  NGINX_SITE_NAME: 'deployed_app',
  NGINX_SITES_AVAILABLE: '/etc/nginx/sites-available',
  NGINX_SITES_ENABLED: '/etc/nginx/sites-enabled',
  NGINX_ERROR_LOG: '/var/log/nginx/error.log',
  NGINX_LOG_TAIL_LINES: 200,
  DEFAULT_BRANCH: 'main',
  DEFAULT_SSH_KEY: '~/.ssh/id_rsa',
  DEFAULT_APP_PORT: 8080,
  DEFAULT_LOG_DIR: 'logs',
  CLEANUP_CONFIRM_TOKEN: 'YES',
  START_GRACE_MS: 5000,
  HTTP_CHECK_TIMEOUT_MS: 10000,
  CONNECT_CHECK_TIMEOUT_MS: 30000,
  COMPOSE_FILES: ['docker-compose.yml', 'docker-compose.yaml', 'compose.yml', 'compose.yaml'],
  DOCKERFILE: 'Dockerfile'
} as const

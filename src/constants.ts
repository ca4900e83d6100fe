import type { ProjectRole } from './types/config'

export const constants = {
  BASE_DIR: '/var/www/mevo',
  SYSTEMD_DIR: '/etc/systemd/system',
  NGINX_DIR: '/etc/nginx',
  SITE_FILE: 'mevo.conf',
  API_PORT: 3000,
  WIDGET_PORT: 3002,
  NODE_MAJOR: 18,
  RESTART_SEC: 5,
  API_ROOT_RELATIVE: '/api'
} as const

export const PROJECT_DIRS: Readonly<Record<ProjectRole, string>> = {
  api: 'mevo-api',
  frontend: 'mevo-v2',
  widget: 'mevobot_v2'
}

/** Build order is load-bearing: secrets follow the api build, the api root patch precedes the frontend build. */
export const BUILD_ORDER: readonly ProjectRole[] = ['api', 'frontend', 'widget']

export const BASE_PACKAGES: readonly string[] = ['curl', 'git', 'rsync', 'nginx', 'ufw', 'build-essential']
export const DATABASE_PACKAGE = 'mongodb'
export const CERTIFICATE_PACKAGES: readonly string[] = ['certbot', 'python3-certbot-nginx']

export const NODESOURCE_SETUP_URL = `https://deb.nodesource.com/setup_${constants.NODE_MAJOR}.x`

/** Paths inside the api project, relative to its root. */
export const API_ENV_DIR = 'src/common/envs'
export const API_LOCAL_ENV = `${API_ENV_DIR}/local.env`
export const API_PRODUCTION_ENV = `${API_ENV_DIR}/production.env`

/** Networking entry point of the frontend, relative to its root. */
export const FRONTEND_REQUEST_FILE = 'src/utils/http/request.ts'
export const FRONTEND_DIST_DIR = 'dist'

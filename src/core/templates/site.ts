import { join } from 'node:path'
import { FRONTEND_DIST_DIR, PROJECT_DIRS } from '../../constants'
import type { ProvisionConfig } from '../../types/config'

function proxyLocation(prefix: string, port: number): string {
  return `    location ${prefix} {
        proxy_pass http://127.0.0.1:${port}/;
        proxy_http_version 1.1;
        proxy_set_header Upgrade $http_upgrade;
        proxy_set_header Connection "upgrade";
        proxy_set_header Host $host;
        proxy_set_header X-Real-IP $remote_addr;
        proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;
        proxy_set_header X-Forwarded-Proto $scheme;
    }`
}

/**
 * Nginx server block: the built frontend at `/` with SPA fallback,
 * `/api/` and `/widget/` proxied to the two backend ports.
 */
export function renderSite(config: ProvisionConfig): string {
  const root = join(config.paths.baseDir, PROJECT_DIRS.frontend, FRONTEND_DIST_DIR)
  return `server {
    listen 80;
    listen [::]:80;
    server_name ${config.domain};

    root ${root};
    index index.html;

    location / {
        try_files $uri $uri/ /index.html;
    }

${proxyLocation('/api/', config.ports.api)}

${proxyLocation('/widget/', config.ports.widget)}
}
`
}

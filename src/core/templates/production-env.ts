/** Fallback api environment when the project ships no local.env to derive from. */
export function renderDefaultProductionEnv(port: number): string {
  return `MODE=production
MONGODB_URI=
JWT_SECRET=
JWT_EXPIRATION_TIME=86400
PORT=${port}
`
}

/** Rewrite every `MODE=...` line to production, leaving the rest of the file as is. */
export function toProductionMode(localEnv: string): string {
  return localEnv.replace(/^MODE=.*$/gm, 'MODE=production')
}

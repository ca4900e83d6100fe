import { constants } from '../../constants'

export const DEV_API_ROOT_LINE = 'const API_ROOT = "http://localhost/api";'
export const RELATIVE_API_ROOT_LINE = `const API_ROOT = "${constants.API_ROOT_RELATIVE}";`

export interface PatchResult {
  readonly changed: boolean
  readonly text: string
}

/**
 * Point the frontend at the proxy's own `/api` path. Only lines that start
 * with the exact development constant are touched; anything after it on the
 * line is kept.
 */
export function rewriteApiRoot(source: string): PatchResult {
  let changed = false
  const out = source.split('\n').map((line) => {
    if (!line.startsWith(DEV_API_ROOT_LINE)) return line
    changed = true
    return RELATIVE_API_ROOT_LINE + line.slice(DEV_API_ROOT_LINE.length)
  })
  return changed ? { changed, text: out.join('\n') } : { changed, text: source }
}

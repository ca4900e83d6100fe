import { lstat, readFile, stat } from 'node:fs/promises'

interface FSX {
  readonly exists: (path: string) => Promise<boolean>
  readonly isDir: (path: string) => Promise<boolean>
  readonly isLink: (path: string) => Promise<boolean>
  readonly readText: (path: string) => Promise<string | null>
}

async function exists(path: string): Promise<boolean> {
  try { const s = await stat(path); return s.isFile() || s.isDirectory() } catch { return false }
}

async function isDir(path: string): Promise<boolean> {
  try { const s = await stat(path); return s.isDirectory() } catch { return false }
}

async function isLink(path: string): Promise<boolean> {
  try { const s = await lstat(path); return s.isSymbolicLink() } catch { return false }
}

async function readText(path: string): Promise<string | null> {
  try { return await readFile(path, 'utf8') } catch { return null }
}

export const fsx: FSX = { exists, isDir, isLink, readText }

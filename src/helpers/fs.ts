import { constants, promises as fs } from 'node:fs'
import path from 'node:path'

export type WalkErrorHandler = (dir: string, err: unknown) => void

/**
 * Depth-first listing of regular files under `dir`, entries visited in name
 * order so repeated runs see the same sequence.
 *
 * Only an unreadable `dir` itself rejects. With `onError`, a subfolder that
 * cannot be listed is handed to it and the walk goes on with its siblings.
 */
export async function walk(dir: string, onError?: WalkErrorHandler): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true })
  const result: string[] = []

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))

  for (const e of entries) {
    const full = path.join(dir, e.name)
    if (e.isDirectory()) {
      try {
        result.push(...(await walk(full, onError)))
      }
      catch (err) {
        if (!onError)
          throw err
        onError(full, err)
      }
    }
    else if (e.isFile()) {
      result.push(full)
    }
  }

  return result
}

export async function ensureDir(p: string) {
  await fs.mkdir(p, { recursive: true })
}

export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.access(p)
    return true
  }
  catch {
    return false
  }
}

export async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory()
  }
  catch {
    return false
  }
}

export function isInside(parent: string, child: string): boolean {
  const rel = path.relative(path.resolve(parent), path.resolve(child))
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel))
}

/**
 * Copies without ever replacing an existing file and keeps the source's
 * access and modification times.
 */
export async function copyPreservingTimes(from: string, to: string) {
  const stat = await fs.stat(from)
  await fs.copyFile(from, to, constants.COPYFILE_EXCL)
  await fs.utimes(to, stat.atime, stat.mtime)
}

export async function moveFile(from: string, to: string) {
  try {
    await fs.rename(from, to)
  }
  catch (err) {
    if (!isErrnoException(err) || err.code !== 'EXDEV')
      throw err
    await copyPreservingTimes(from, to)
    await fs.unlink(from)
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err
}

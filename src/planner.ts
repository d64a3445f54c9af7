import path from 'node:path'
import { CopyError } from './errors'
import { formatMonthDir } from './helpers/date'
import { pathExists } from './helpers/fs'

export const MAX_SUFFIX = 10_000
export const TAG_SEPARATOR = '_'

export interface PlacementResult {
  dir: string
  fileName: string
  targetPath: string
  suffixed: boolean
}

export function withTag(fileName: string, tag?: string): string {
  return tag ? `${tag}${TAG_SEPARATOR}${fileName}` : fileName
}

export function hasTag(fileName: string, tag: string): boolean {
  return fileName.startsWith(`${tag}${TAG_SEPARATOR}`)
}

export function suffixedName(fileName: string, n: number): string {
  const ext = path.extname(fileName)
  const stem = fileName.slice(0, fileName.length - ext.length)
  return `${stem}_${n}${ext}`
}

/**
 * First name in `dir` not taken yet: `fileName`, then `stem_1.ext`,
 * `stem_2.ext`, ... Only names are compared, never contents.
 */
export async function findFreeName(dir: string, fileName: string): Promise<{ fileName: string, suffixed: boolean }> {
  if (!(await pathExists(path.join(dir, fileName))))
    return { fileName, suffixed: false }

  for (let n = 1; n <= MAX_SUFFIX; n++) {
    const candidate = suffixedName(fileName, n)
    if (!(await pathExists(path.join(dir, candidate))))
      return { fileName: candidate, suffixed: true }
  }

  throw new CopyError(`No free name for ${fileName} in ${dir} after ${MAX_SUFFIX} attempts`, {
    path: path.join(dir, fileName),
  })
}

export async function planDestination(
  baseDir: string,
  date: Date,
  fileName: string,
  tag?: string,
): Promise<PlacementResult> {
  const dir = formatMonthDir(baseDir, date)
  const free = await findFreeName(dir, withTag(fileName, tag))
  return {
    dir,
    fileName: free.fileName,
    targetPath: path.join(dir, free.fileName),
    suffixed: free.suffixed,
  }
}

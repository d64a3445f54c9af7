import { promises as fs } from 'node:fs'
import path from 'node:path'
import { CopyError, errorMessage, FatalConfigError } from './errors'
import { isDirectory, walk } from './helpers/fs'
import { isHiddenFile, isImageFile } from './helpers/media'
import { findFreeName, hasTag, withTag } from './planner'
import type { RunStatistics } from './stats'
import { createRunStatistics, recordFailure, skipUnreadableFolders } from './stats'

/**
 * Prefixes every image under `folder` with `tag_`, in place. Files that
 * already carry the prefix are left as they are, so the pass can be repeated.
 */
export async function runTagUpdate(folder: string, tag: string): Promise<RunStatistics> {
  if (!tag)
    throw new FatalConfigError('A tag prefix is required to update a folder.')
  if (!(await isDirectory(folder)))
    throw new FatalConfigError(`Folder '${folder}' does not exist.`)

  const stats = createRunStatistics()
  console.log(`🏷️  Adding prefix '${tag}' to files in ${folder}...`)

  for (const file of await walk(folder, skipUnreadableFolders(stats))) {
    const name = path.basename(file)
    if (isHiddenFile(file) || !isImageFile(file) || hasTag(name, tag)) {
      stats.skipped++
      continue
    }

    try {
      const dir = path.dirname(file)
      const { fileName } = await findFreeName(dir, withTag(name, tag))
      const target = path.join(dir, fileName)
      await fs.rename(file, target)
      console.log(`Renamed: ${file} -> ${target}`)
      stats.processed++
    }
    catch (err) {
      recordFailure(stats, file, 'copy', new CopyError(`Cannot rename ${file}: ${errorMessage(err)}`, { path: file, cause: err }))
    }
  }

  return stats
}

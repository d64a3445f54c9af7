import path from 'node:path'
import { ConflictError, errorMessage, ReadError } from './errors'
import { ensureDir, isInside, moveFile, pathExists, walk } from './helpers/fs'
import type { Hasher } from './helpers/hash'
import { memoizeHasher } from './helpers/hash'
import { isHiddenFile, isImageFile } from './helpers/media'
import { advance, createProgressBar } from './helpers/progress'
import type { RunStatistics } from './stats'
import { createRunStatistics, recordFailure, skipUnreadableFolders } from './stats'

export interface SourceFile {
  path: string
  /** Source folder the file was found under; relocation mirrors paths relative to it. */
  root: string
}

/** Files sharing one digest, in traversal order. `files[0]` is kept. */
export interface DuplicateSet {
  hash: string
  files: SourceFile[]
}

export interface FindDuplicatesOptions {
  hasher?: Hasher
  /** Subtree to leave out, typically the relocation target. */
  exclude?: string
}

export interface DuplicateReport {
  sets: DuplicateSet[]
  stats: RunStatistics
}

export interface RelocationResult {
  moved: { from: string, to: string }[]
  conflicts: ConflictError[]
  failures: { path: string, message: string }[]
}

export async function findDuplicates(
  sourceFolders: string[],
  options: FindDuplicatesOptions = {},
): Promise<DuplicateReport> {
  const hash = options.hasher ?? memoizeHasher()
  const stats = createRunStatistics()
  const index = new Map<string, SourceFile[]>()
  const seen = new Set<string>()

  for (const folder of sourceFolders) {
    const root = path.resolve(folder)
    console.log(`\n🔍 Scanning ${root} for duplicate images...`)
    const files = (await walk(root, skipUnreadableFolders(stats))).filter(f => !options.exclude || !isInside(options.exclude, f))

    const bar = createProgressBar(files.length, '🔑 Hashing files')
    for (const file of files) {
      advance(bar, file)
      if (seen.has(file))
        continue
      seen.add(file)

      if (isHiddenFile(file) || !isImageFile(file)) {
        stats.skipped++
        continue
      }

      let digest: string
      try {
        digest = await hash(file)
      }
      catch (err) {
        recordFailure(stats, file, 'read', new ReadError(`Cannot hash ${file}: ${errorMessage(err)}`, { path: file, cause: err }))
        continue
      }

      stats.processed++
      const group = index.get(digest)
      if (group)
        group.push({ path: file, root })
      else
        index.set(digest, [{ path: file, root }])
    }
    bar.stop()
  }

  const sets: DuplicateSet[] = []
  for (const [digest, files] of index) {
    if (files.length < 2)
      continue
    sets.push({ hash: digest, files })
    stats.duplicates += files.length - 1
  }

  return { sets, stats }
}

/**
 * Moves every member but the first of each set to `targetDir`, keeping its
 * path relative to the source folder. Existing destinations are left alone
 * and reported as conflicts.
 */
export async function relocateDuplicates(sets: DuplicateSet[], targetDir: string): Promise<RelocationResult> {
  const result: RelocationResult = { moved: [], conflicts: [], failures: [] }
  const target = path.resolve(targetDir)

  for (const set of sets) {
    for (const file of set.files.slice(1)) {
      const to = path.join(target, path.relative(file.root, file.path))

      if (await pathExists(to)) {
        result.conflicts.push(new ConflictError(`Not moving ${file.path}: ${to} already exists`, { path: file.path }))
        continue
      }

      try {
        await ensureDir(path.dirname(to))
        await moveFile(file.path, to)
        result.moved.push({ from: file.path, to })
      }
      catch (err) {
        result.failures.push({ path: file.path, message: errorMessage(err) })
      }
    }
  }

  return result
}

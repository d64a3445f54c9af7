import { promises as fs } from 'node:fs'
import path from 'node:path'
import { CopyError, errorMessage, FatalConfigError, ReadError } from './errors'
import type { MetadataExtractor } from './helpers/exif'
import { copyPreservingTimes, ensureDir, isDirectory, isInside, walk } from './helpers/fs'
import { isHiddenFile, isImageFile, isResourceFork } from './helpers/media'
import { advance, createProgressBar } from './helpers/progress'
import type { CaptureDate } from './metadata'
import { defaultExtractors, resolveCaptureDate } from './metadata'
import { planDestination } from './planner'
import type { RunStatistics } from './stats'
import { createRunStatistics, recordFailure, skipUnreadableFolders } from './stats'

export interface OrganizeOptions {
  sources: string[]
  destination: string
  rerun: boolean
  tag?: string
  extractors?: readonly MetadataExtractor[]
}

export type SkipReason = 'unsupported' | 'hidden' | 'unreadable' | 'exists'

export type FileOutcome =
  | { status: 'copied', target: string, capture: CaptureDate }
  | { status: 'skipped', reason: SkipReason, error?: ReadError }
  | { status: 'error', error: CopyError }

export interface OrganizeContext {
  destination: string
  rerun: boolean
  tag?: string
  extractors: readonly MetadataExtractor[]
}

/**
 * Keeps the sources that are directories. Missing ones are reported; when
 * none is left the run cannot start.
 */
export async function accessibleSources(sources: string[]): Promise<string[]> {
  const found: string[] = []
  for (const source of sources) {
    if (await isDirectory(source))
      found.push(path.resolve(source))
    else
      console.error(`❌ Source folder '${source}' does not exist or is not a directory.`)
  }
  if (found.length === 0)
    throw new FatalConfigError('No accessible source folder.')
  return found
}

export async function organizeFile(file: string, ctx: OrganizeContext): Promise<FileOutcome> {
  if (isHiddenFile(file))
    return { status: 'skipped', reason: 'hidden' }
  if (!isImageFile(file))
    return { status: 'skipped', reason: 'unsupported' }

  let capture: CaptureDate
  try {
    capture = await resolveCaptureDate(file, ctx.extractors)
  }
  catch (err) {
    if (err instanceof ReadError)
      return { status: 'skipped', reason: 'unreadable', error: err }
    throw err
  }

  const name = path.basename(file)

  try {
    const plan = await planDestination(ctx.destination, capture.date, name, ctx.tag)
    // suffixed means the plain name is already taken
    if (ctx.rerun && plan.suffixed)
      return { status: 'skipped', reason: 'exists' }

    await ensureDir(plan.dir)
    await copyPreservingTimes(file, plan.targetPath)
    return { status: 'copied', target: plan.targetPath, capture }
  }
  catch (err) {
    const error = err instanceof CopyError
      ? err
      : new CopyError(`Cannot copy ${file}: ${errorMessage(err)}`, { path: file, cause: err })
    return { status: 'error', error }
  }
}

/**
 * Deletes `._*` companions anywhere under `dir`. Returns how many went.
 */
export async function removeResourceForks(dir: string): Promise<number> {
  if (!(await isDirectory(dir)))
    return 0

  let removed = 0
  const files = await walk(dir, (sub, err) => {
    console.error(`❌ Could not read ${sub}: ${errorMessage(err)}`)
  })
  for (const file of files) {
    if (!isResourceFork(file))
      continue
    try {
      await fs.unlink(file)
      console.log(`🧹 Removed resource fork file: ${file}`)
      removed++
    }
    catch (err) {
      console.error(`❌ Could not remove ${file}: ${errorMessage(err)}`)
    }
  }
  return removed
}

export async function runOrganize(options: OrganizeOptions): Promise<RunStatistics> {
  const stats = createRunStatistics()
  const sources = await accessibleSources(options.sources)
  const destination = path.resolve(options.destination)
  const ctx: OrganizeContext = {
    destination,
    rerun: options.rerun,
    tag: options.tag,
    extractors: options.extractors ?? defaultExtractors,
  }

  // nested sources would otherwise reach the same file twice
  const seen = new Set<string>()

  await ensureDir(destination)

  for (const source of sources) {
    console.log(`\n🔍 Processing folder: ${source}`)
    const files = (await walk(source, skipUnreadableFolders(stats)))
      .filter(f => !isInside(destination, f) && !seen.has(f))
    files.forEach(f => seen.add(f))
    console.log(`📂 Found ${files.length} files`)

    const bar = createProgressBar(files.length, '📦 Copying files')
    for (const file of files) {
      const outcome = await organizeFile(file, ctx)
      switch (outcome.status) {
        case 'copied':
          stats.processed++
          break
        case 'skipped':
          if (outcome.error)
            recordFailure(stats, file, 'read', outcome.error)
          else
            stats.skipped++
          break
        case 'error':
          recordFailure(stats, file, 'copy', outcome.error)
          break
      }
      advance(bar, file)
    }
    bar.stop()
  }

  console.log('\n🧹 Cleaning up resource fork files...')
  stats.resourceForksRemoved = await removeResourceForks(destination)

  return stats
}

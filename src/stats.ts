import type { FailureKind } from './errors'
import { errorMessage, ReadError } from './errors'
import type { WalkErrorHandler } from './helpers/fs'

export interface FileFailure {
  path: string
  kind: FailureKind
  message: string
}

export interface RunStatistics {
  processed: number
  skipped: number
  duplicates: number
  errors: number
  resourceForksRemoved: number
  failures: FileFailure[]
}

export function createRunStatistics(): RunStatistics {
  return {
    processed: 0,
    skipped: 0,
    duplicates: 0,
    errors: 0,
    resourceForksRemoved: 0,
    failures: [],
  }
}

/**
 * Unreadable files count as skipped, everything else as an error. Both are
 * kept in `failures` so the report can name the path.
 */
export function recordFailure(stats: RunStatistics, file: string, kind: FailureKind, err: unknown) {
  if (kind === 'read')
    stats.skipped++
  else
    stats.errors++
  stats.failures.push({ path: file, kind, message: errorMessage(err) })
}

/** Unlistable subfolders are skipped like unreadable files. */
export function skipUnreadableFolders(stats: RunStatistics): WalkErrorHandler {
  return (dir, err) => {
    const error = new ReadError(`Cannot read folder ${dir}: ${errorMessage(err)}`, { path: dir, cause: err })
    recordFailure(stats, dir, 'read', error)
  }
}

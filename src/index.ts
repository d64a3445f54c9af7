import path from 'node:path'
import type { CliConfig } from './config'
import { findDuplicates, relocateDuplicates } from './duplicates'
import type { MetadataExtractor } from './helpers/exif'
import { exiftoolExtractor, exifrExtractor } from './helpers/exif'
import { printDuplicateSets, printFailures, printRelocation, printRunSummary } from './helpers/report'
import { accessibleSources, runOrganize } from './organize'
import type { RunStatistics } from './stats'
import { runTagUpdate } from './tag'

export type { CliConfig } from './config'
export type { DuplicateSet, RelocationResult, SourceFile } from './duplicates'
export type { MetadataExtractor } from './helpers/exif'
export type { CaptureDate } from './metadata'
export type { OrganizeOptions } from './organize'
export type { PlacementResult } from './planner'
export type { RunStatistics } from './stats'

export { findDuplicates, relocateDuplicates, runOrganize, runTagUpdate }
export { resolveCaptureDate } from './metadata'
export { planDestination } from './planner'

export function extractorsFor(exiftool: boolean): MetadataExtractor[] {
  return exiftool ? [exifrExtractor, exiftoolExtractor] : [exifrExtractor]
}

/* ---------- MAIN ---------- */

export async function runPhotoShelf(config: CliConfig): Promise<RunStatistics> {
  switch (config.mode) {
    case 'tag-update': {
      const stats = await runTagUpdate(config.folder, config.tag)
      printFailures(stats)
      printRunSummary('Rename operation complete!', stats, [
        ['Files renamed', stats.processed],
        ['Files skipped', stats.skipped],
      ])
      return stats
    }

    case 'check-duplicates': {
      const sources = await accessibleSources(config.sources)
      const moveTo = config.moveTo === undefined ? undefined : path.resolve(config.moveTo)
      const { sets, stats } = await findDuplicates(sources, { exclude: moveTo })

      printFailures(stats)
      printDuplicateSets(sets)

      const rows: [string, number][] = [
        ['Images hashed', stats.processed],
        ['Duplicate sets', sets.length],
        ['Total duplicates found', stats.duplicates],
      ]

      if (moveTo !== undefined) {
        console.log(`\n📦 Moving duplicates to ${moveTo}`)
        const relocation = await relocateDuplicates(sets, moveTo)
        printRelocation(relocation)
        stats.errors += relocation.conflicts.length + relocation.failures.length
        rows.push(['Duplicates moved', relocation.moved.length])
        rows.push(['Conflicts', relocation.conflicts.length])
      }

      printRunSummary('Duplicate check complete!', stats, rows)
      return stats
    }

    case 'organize': {
      const stats = await runOrganize({
        sources: config.sources,
        destination: config.destination,
        rerun: config.rerun,
        tag: config.tag,
        extractors: extractorsFor(config.exiftool),
      })
      printFailures(stats)
      printRunSummary('Processing complete!', stats, [
        ['Images processed', stats.processed],
        ['Files skipped', stats.skipped],
        ['Resource fork files removed', stats.resourceForksRemoved],
      ])
      return stats
    }
  }
}

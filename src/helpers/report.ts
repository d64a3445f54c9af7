import { bold, cyan, green, grey, red, yellow } from 'kleur/colors'
import type { DuplicateSet, RelocationResult } from '../duplicates'
import type { RunStatistics } from '../stats'

export function printFailures(stats: RunStatistics) {
  for (const f of stats.failures) {
    const line = `${f.kind === 'read' ? '⚠️ ' : '❌'} ${f.path}: ${f.message}`
    console.error(f.kind === 'read' ? yellow(line) : red(line))
  }
}

export function printRunSummary(title: string, stats: RunStatistics, rows: [string, number][]) {
  console.log(`\n${bold(title)}`)
  for (const [label, value] of rows) {
    console.log(`  ${label}: ${value > 0 ? green(String(value)) : grey(String(value))}`)
  }
  if (stats.errors > 0)
    console.log(red(`  Errors: ${stats.errors}`))
}

export function printDuplicateSets(sets: DuplicateSet[]) {
  if (sets.length === 0) {
    console.log('No duplicates found.')
    return
  }

  for (const set of sets) {
    const [kept, ...rest] = set.files
    console.log(`\n${cyan(`Duplicate set (hash: ${set.hash.slice(0, 8)}...)`)}`)
    console.log(`  Original: ${kept.path}`)
    rest.forEach((file, i) => {
      console.log(`  Duplicate ${i + 1}: ${file.path}`)
    })
  }
}

export function printRelocation(result: RelocationResult) {
  for (const { from, to } of result.moved) {
    console.log(`  ${grey(from)} → ${to}`)
  }
  for (const conflict of result.conflicts) {
    console.error(yellow(`⚠️  ${conflict.message}`))
  }
  for (const f of result.failures) {
    console.error(red(`❌ ${f.path}: ${f.message}`))
  }
}

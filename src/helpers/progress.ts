import path from 'node:path'
import cliProgress from 'cli-progress'
import type { SingleBar } from 'cli-progress'

export type ProgressBar = Pick<SingleBar, 'increment' | 'stop'>

export function createProgressBar(total: number, label: string): ProgressBar {
  const bar = new cliProgress.SingleBar(
    {
      format: `${label} [{bar}] {percentage}% ({value}/{total}) {duration_formatted} {filename}`,
      barCompleteChar: '█',
      barIncompleteChar: '░',
      hideCursor: true,
    },
    cliProgress.Presets.shades_classic,
  )

  bar.start(total, 0, { filename: '' })

  return bar
}

export function advance(bar: ProgressBar, file: string) {
  const name = path.basename(file)
  bar.increment(1, { filename: name ? `→ ${name}` : '' })
}

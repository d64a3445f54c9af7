import { parseArgs } from 'node:util'
import { errorMessage, FatalConfigError } from './errors'

export const DEFAULT_DESTINATION = './organized_images'
export const DEFAULT_DUPLICATES_DIR = './duplicates'

export type CliConfig =
  | { mode: 'tag-update', folder: string, tag: string }
  | { mode: 'check-duplicates', sources: string[], moveTo?: string }
  | { mode: 'organize', sources: string[], destination: string, rerun: boolean, tag?: string, exiftool: boolean }

export const HELP = `
Usage:
  photo-shelf <sourceFolder...> [options]

Options:
  -d, --destination <path>        Destination folder (default: ${DEFAULT_DESTINATION})
  -r, --rerun                     Skip files whose name already exists in the destination
  -cd, --check-duplicates         Report duplicate files across the source folders
  -m, --move-duplicates [path]    Move duplicates to <path> (default: ${DEFAULT_DUPLICATES_DIR})
  -t, --tag <prefix>              Prefix file names with <prefix>_
  -u, --update-folder <path>      Add the --tag prefix to images already in <path>
      --exiftool                  Also read dates with the exiftool binary
  -h, --help                      Show this help message

Example:
  photo-shelf ~/Pictures/card1 ~/Pictures/card2 -d ~/Photos --rerun
`

/**
 * `-cd` is a two-letter short flag and `-m` takes an optional value; neither
 * fits parseArgs, so both are rewritten to long forms first.
 */
export function normalizeArgv(argv: string[]): string[] {
  const out: string[] = []
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg === '-cd') {
      out.push('--check-duplicates')
    }
    else if (arg === '-m' || arg === '--move-duplicates') {
      const next = argv[i + 1]
      if (next !== undefined && !next.startsWith('-')) {
        out.push(`--move-duplicates=${next}`)
        i++
      }
      else {
        out.push(`--move-duplicates=${DEFAULT_DUPLICATES_DIR}`)
      }
    }
    else {
      out.push(arg)
    }
  }
  return out
}

export function wantsHelp(argv: string[]): boolean {
  return argv.length === 0 || argv.includes('-h') || argv.includes('--help')
}

function parse(argv: string[]) {
  try {
    return parseArgs({
      args: normalizeArgv(argv),
      allowPositionals: true,
      options: {
        'help': { type: 'boolean', short: 'h' },
        'destination': { type: 'string', short: 'd' },
        'rerun': { type: 'boolean', short: 'r' },
        'check-duplicates': { type: 'boolean' },
        'move-duplicates': { type: 'string' },
        'tag': { type: 'string', short: 't' },
        'update-folder': { type: 'string', short: 'u' },
        'exiftool': { type: 'boolean' },
      },
    })
  }
  catch (err) {
    throw new FatalConfigError(errorMessage(err), { cause: err })
  }
}

export function parseCliArgs(argv: string[]): CliConfig {
  const { positionals: sources, values } = parse(argv)
  const tag = values.tag

  if (tag !== undefined && !tag)
    throw new FatalConfigError('--tag needs a non-empty prefix.')

  const folder = values['update-folder']
  if (folder !== undefined) {
    if (!tag)
      throw new FatalConfigError('--update-folder requires --tag.')
    return { mode: 'tag-update', folder, tag }
  }

  if (sources.length === 0)
    throw new FatalConfigError('At least one source folder is required.')

  const moveTo = values['move-duplicates']
  if (values['check-duplicates'] || moveTo !== undefined)
    return { mode: 'check-duplicates', sources, moveTo }

  return {
    mode: 'organize',
    sources,
    destination: values.destination ?? DEFAULT_DESTINATION,
    rerun: values.rerun ?? false,
    tag,
    exiftool: values.exiftool ?? false,
  }
}

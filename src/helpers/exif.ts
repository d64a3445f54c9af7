import { spawn } from 'node:child_process'
import process from 'node:process'
import exifr from 'exifr'
import { isSupportedExtension } from './media'

const EXIFTOOL = process.platform === 'win32' ? 'exiftool.exe' : 'exiftool'

/**
 * One source of embedded capture dates. Extractors are tried in order and the
 * first that returns a date wins.
 */
export interface MetadataExtractor {
  readonly name: string
  supports: (ext: string) => boolean
  extract: (file: string) => Promise<Date | null>
}

export interface ExifRow {
  SourceFile: string

  // Capture time, then the IFD0 timestamp, then digitization time
  DateTimeOriginal?: string
  ModifyDate?: string
  CreateDate?: string
}

type ExifrDates = Partial<Record<'DateTimeOriginal' | 'ModifyDate' | 'CreateDate', unknown>>

const DATE_TAGS = ['DateTimeOriginal', 'ModifyDate', 'CreateDate'] as const

// Plain TIFF-structured RAW files parse like .tif; the rest go to exiftool
const EXIFR_EXT = new Set([
  '.jpg',
  '.jpeg',
  '.png',
  '.tif',
  '.tiff',
  '.arw',
  '.cr2',
  '.nef',
  '.dng',
  '.pef',
  '.srw',
])

export function parseExifDate(raw?: unknown): Date | null {
  if (raw instanceof Date)
    return Number.isNaN(raw.getTime()) ? null : raw
  if (typeof raw !== 'string' || !raw.trim())
    return null

  const match = /^(\d{4}):(\d{2}):(\d{2})[ T](\d{2}):(\d{2}):(\d{2})/.exec(raw.trim())
  if (!match)
    return null

  const [, y, mo, d, hh, mm, ss] = match.map(Number)
  const date = new Date(y, mo - 1, d, hh, mm, ss)
  // 0000:00:00 00:00:00 and friends
  if (y === 0 || date.getMonth() !== mo - 1 || date.getDate() !== d)
    return null
  return date
}

export function pickCaptureDate(row: ExifrDates): Date | null {
  for (const tag of DATE_TAGS) {
    const date = parseExifDate(row[tag])
    if (date)
      return date
  }
  return null
}

export const exifrExtractor: MetadataExtractor = {
  name: 'exifr',
  supports: ext => EXIFR_EXT.has(ext),
  async extract(file) {
    // raw strings, so zeroed and rolled-over dates hit parseExifDate's checks
    const tags: ExifrDates | undefined = await exifr.parse(file, { pick: [...DATE_TAGS], reviveValues: false })
    if (!tags)
      return null
    return pickCaptureDate(tags)
  },
}

function runExifTool(files: string[]): Promise<ExifRow[]> {
  return new Promise((resolve, reject) => {
    const args = [
      '-json',
      '-charset',
      'filename=UTF8',
      ...DATE_TAGS.map(tag => `-${tag}`),
      '-@',
      '-',
    ]

    const p = spawn(EXIFTOOL, args, {
      stdio: ['pipe', 'pipe', 'pipe'],
      windowsHide: true,
    })

    let out = ''
    let err = ''

    p.on('error', reject)
    p.stdout.on('data', d => (out += d))
    p.stderr.on('data', d => (err += d))

    for (const f of files) {
      p.stdin.write(`${f}\n`)
    }
    p.stdin.end()

    p.on('close', (code) => {
      if (code !== 0) {
        reject(new Error(err || `ExifTool exited with code ${code}`))
      }
      else {
        try {
          resolve(JSON.parse(out))
        }
        catch (parseErr) {
          reject(parseErr)
        }
      }
    })
  })
}

/**
 * Reads dates through the exiftool binary, which knows the RAW formats exifr
 * does not. Requires exiftool on PATH.
 */
export const exiftoolExtractor: MetadataExtractor = {
  name: 'exiftool',
  supports: isSupportedExtension,
  async extract(file) {
    const [row] = await runExifTool([file])
    return row ? pickCaptureDate(row) : null
  },
}

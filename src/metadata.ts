import { promises as fs } from 'node:fs'
import { yellow } from 'kleur/colors'
import { errorMessage, ReadError } from './errors'
import type { MetadataExtractor } from './helpers/exif'
import { exifrExtractor } from './helpers/exif'
import { extensionOf } from './helpers/media'

export type CaptureDate =
  | { date: Date, source: 'metadata', extractor: string }
  | { date: Date, source: 'mtime' }

export const defaultExtractors: readonly MetadataExtractor[] = [exifrExtractor]

/**
 * Embedded date first, file modification time otherwise. Extractor failures
 * only mean "no metadata"; a file that cannot even be stat'ed is a ReadError.
 */
export async function resolveCaptureDate(
  file: string,
  extractors: readonly MetadataExtractor[] = defaultExtractors,
): Promise<CaptureDate> {
  const ext = extensionOf(file)

  for (const extractor of extractors) {
    if (!extractor.supports(ext))
      continue
    try {
      const date = await extractor.extract(file)
      if (date)
        return { date, source: 'metadata', extractor: extractor.name }
    }
    catch (err) {
      console.error(yellow(`⚠️  Cannot read metadata of ${file}: ${errorMessage(err)}`))
    }
  }

  try {
    const stat = await fs.stat(file)
    return { date: stat.mtime, source: 'mtime' }
  }
  catch (err) {
    throw new ReadError(`Cannot read ${file}: ${errorMessage(err)}`, { path: file, cause: err })
  }
}

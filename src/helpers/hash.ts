import { createHash } from 'node:crypto'
import { createReadStream } from 'node:fs'

export type Hasher = (file: string) => Promise<string>

export async function md5(file: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const h = createHash('md5')
    const s = createReadStream(file)

    s.on('error', reject)
    s.on('data', c => h.update(c))
    s.on('end', () => resolve(h.digest('hex')))
  })
}

/**
 * Wraps a hasher so each path is read at most once per run.
 */
export function memoizeHasher(hash: Hasher = md5): Hasher {
  const cache = new Map<string, Promise<string>>()

  return (file) => {
    let digest = cache.get(file)
    if (!digest) {
      digest = hash(file)
      cache.set(file, digest)
      void digest.catch(() => cache.delete(file))
    }
    return digest
  }
}

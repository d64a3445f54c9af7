import { promises as fs } from 'node:fs'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ConflictError } from '../src/errors'
import { findDuplicates, relocateDuplicates } from '../src/duplicates'
import { md5 } from '../src/helpers/hash'
import { listFiles, lockFolder, makeTempDir, removeDir, writeFile } from './tmp'

vi.mock('../src/helpers/progress', () => ({
  createProgressBar: () => ({ increment: () => {}, stop: () => {} }),
  advance: () => {},
}))

describe('findDuplicates', () => {
  let root: string
  let first: string
  let second: string

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    root = await makeTempDir()
    first = path.join(root, 'first')
    second = path.join(root, 'second')
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await removeDir(root)
  })

  it('groups byte-identical files across folders in traversal order', async () => {
    await writeFile(path.join(first, 'holiday.jpg'), 'same bytes')
    await writeFile(path.join(second, 'nested', 'copy.jpg'), 'same bytes')
    await writeFile(path.join(second, 'other.jpg'), 'same bytez')

    const { sets, stats } = await findDuplicates([first, second])

    expect(sets).toEqual([{
      hash: await md5(path.join(first, 'holiday.jpg')),
      files: [
        { path: path.join(first, 'holiday.jpg'), root: first },
        { path: path.join(second, 'nested', 'copy.jpg'), root: second },
      ],
    }])
    expect(stats).toMatchObject({ processed: 3, duplicates: 1, skipped: 0, errors: 0 })
  })

  it('follows the order folders were given in', async () => {
    await writeFile(path.join(first, 'a.jpg'), 'same')
    await writeFile(path.join(second, 'b.jpg'), 'same')

    const { sets } = await findDuplicates([second, first])

    expect(sets[0].files.map(f => f.path)).toEqual([
      path.join(second, 'b.jpg'),
      path.join(first, 'a.jpg'),
    ])
  })

  it('reports nothing when every file is unique', async () => {
    await writeFile(path.join(first, 'a.jpg'), 'one')
    await writeFile(path.join(first, 'b.jpg'), 'two')

    const { sets, stats } = await findDuplicates([first])

    expect(sets).toEqual([])
    expect(stats.duplicates).toBe(0)
  })

  it('skips hidden and non-image files', async () => {
    await writeFile(path.join(first, 'a.jpg'), 'same')
    await writeFile(path.join(first, '.a.jpg'), 'same')
    await writeFile(path.join(first, 'a.txt'), 'same')

    const { sets, stats } = await findDuplicates([first])

    expect(sets).toEqual([])
    expect(stats).toMatchObject({ processed: 1, skipped: 2 })
  })

  it('indexes a path reached through overlapping folders once', async () => {
    await writeFile(path.join(first, 'sub', 'a.jpg'), 'same')

    const { sets, stats } = await findDuplicates([first, path.join(first, 'sub')])

    expect(sets).toEqual([])
    expect(stats.processed).toBe(1)
  })

  it('leaves out the excluded subtree', async () => {
    await writeFile(path.join(first, 'a.jpg'), 'same')
    await writeFile(path.join(first, 'duplicates', 'a.jpg'), 'same')

    const { sets } = await findDuplicates([first], { exclude: path.join(first, 'duplicates') })

    expect(sets).toEqual([])
  })

  it('skips a subfolder it cannot list', async () => {
    await writeFile(path.join(first, 'a.jpg'), 'same')
    await writeFile(path.join(first, 'locked', 'b.jpg'), 'same')
    await writeFile(path.join(second, 'c.jpg'), 'same')
    lockFolder(path.join(first, 'locked'))

    const { sets, stats } = await findDuplicates([first, second])

    expect(sets[0].files.map(f => f.path)).toEqual([path.join(first, 'a.jpg'), path.join(second, 'c.jpg')])
    expect(stats.failures.map(f => [f.path, f.kind])).toEqual([[path.join(first, 'locked'), 'read']])
  })

  it('records unhashable files and keeps going', async () => {
    await writeFile(path.join(first, 'a.jpg'), 'same')
    await writeFile(path.join(first, 'b.jpg'), 'same')
    await writeFile(path.join(first, 'c.jpg'), 'same')
    const hasher = vi.fn(async (file: string) => {
      if (file.endsWith('b.jpg'))
        throw new Error('EACCES')
      return 'digest'
    })

    const { sets, stats } = await findDuplicates([first], { hasher })

    expect(sets).toEqual([{
      hash: 'digest',
      files: [
        { path: path.join(first, 'a.jpg'), root: first },
        { path: path.join(first, 'c.jpg'), root: first },
      ],
    }])
    expect(stats.failures).toEqual([{
      path: path.join(first, 'b.jpg'),
      kind: 'read',
      message: `Cannot hash ${path.join(first, 'b.jpg')}: EACCES`,
    }])
    expect(stats.skipped).toBe(1)
  })
})

describe('relocateDuplicates', () => {
  let root: string

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    root = await makeTempDir()
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await removeDir(root)
  })

  it('keeps the first file and mirrors the others under the target', async () => {
    const first = path.join(root, 'first')
    const second = path.join(root, 'second')
    const target = path.join(root, 'dups')
    await writeFile(path.join(first, 'a.jpg'), 'same')
    await writeFile(path.join(second, '2020', 'trip', 'b.jpg'), 'same')

    const { sets } = await findDuplicates([first, second])
    const result = await relocateDuplicates(sets, target)

    expect(result.moved).toEqual([{
      from: path.join(second, '2020', 'trip', 'b.jpg'),
      to: path.join(target, '2020', 'trip', 'b.jpg'),
    }])
    expect(result.conflicts).toEqual([])
    expect(await listFiles(first)).toEqual(['a.jpg'])
    expect(await listFiles(target)).toEqual([path.join('2020', 'trip', 'b.jpg')])
    await expect(fs.access(path.join(second, '2020', 'trip', 'b.jpg'))).rejects.toThrow()
  })

  it('moves every member after the first of a larger set', async () => {
    const src = path.join(root, 'src')
    const target = path.join(root, 'dups')
    await writeFile(path.join(src, 'a.jpg'), 'same')
    await writeFile(path.join(src, 'b.jpg'), 'same')
    await writeFile(path.join(src, 'c.jpg'), 'same')

    const { sets } = await findDuplicates([src])
    const result = await relocateDuplicates(sets, target)

    expect(result.moved.map(m => path.basename(m.to))).toEqual(['b.jpg', 'c.jpg'])
    expect(await listFiles(src)).toEqual(['a.jpg'])
  })

  it('reports a conflict instead of overwriting', async () => {
    const src = path.join(root, 'src')
    const target = path.join(root, 'dups')
    await writeFile(path.join(src, 'a.jpg'), 'same')
    await writeFile(path.join(src, 'b.jpg'), 'same')
    await writeFile(path.join(target, 'b.jpg'), 'already here')

    const { sets } = await findDuplicates([src])
    const result = await relocateDuplicates(sets, target)

    expect(result.moved).toEqual([])
    expect(result.conflicts).toHaveLength(1)
    expect(result.conflicts[0]).toBeInstanceOf(ConflictError)
    expect(result.conflicts[0].path).toBe(path.join(src, 'b.jpg'))
    await expect(fs.readFile(path.join(target, 'b.jpg'), 'utf8')).resolves.toBe('already here')
    expect(await listFiles(src)).toEqual(['a.jpg', 'b.jpg'])
  })
})

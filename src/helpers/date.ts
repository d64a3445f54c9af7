import path from 'node:path'

export function getDateParts(date: Date) {
  return {
    y: String(date.getFullYear()).padStart(4, '0'),
    m: String(date.getMonth() + 1).padStart(2, '0'),
  }
}

export function formatMonthDir(baseDir: string, date: Date) {
  const { y, m } = getDateParts(date)
  return path.join(baseDir, y, m)
}

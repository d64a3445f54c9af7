import path from 'node:path'

const IMAGE_EXT = new Set([
  '.jpg',
  '.jpeg',
  '.png',
  '.gif',
  '.bmp',
  '.tiff',
  '.tif',
  '.webp',
])

const RAW_EXT = new Set([
  '.arw',
  '.raw',
  '.cr2',
  '.cr3',
  '.nef',
  '.dng',
  '.orf',
  '.rw2',
  '.pef',
  '.srw',
  '.raf',
])

export function extensionOf(file: string): string {
  return path.extname(file).toLowerCase()
}

export function isSupportedExtension(ext: string): boolean {
  return IMAGE_EXT.has(ext) || RAW_EXT.has(ext)
}

export function isImageFile(file: string): boolean {
  return isSupportedExtension(extensionOf(file))
}

export function isHiddenFile(file: string): boolean {
  return path.basename(file).startsWith('.')
}

// macOS AppleDouble companions
export function isResourceFork(file: string): boolean {
  return path.basename(file).startsWith('._')
}

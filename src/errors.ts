export type FailureKind = 'read' | 'copy' | 'conflict'

export class PhotoShelfError extends Error {
  readonly path?: string

  constructor(message: string, options: { path?: string, cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = new.target.name
    this.path = options.path
  }
}

/** File could not be read (stat, hash). The file is skipped, the run goes on. */
export class ReadError extends PhotoShelfError {
  readonly kind: FailureKind = 'read'
}

/** Placement failed: mkdir, copy or suffix probe. */
export class CopyError extends PhotoShelfError {
  readonly kind: FailureKind = 'copy'
}

/** Destination already taken while moving or renaming. Never overwritten. */
export class ConflictError extends PhotoShelfError {
  readonly kind: FailureKind = 'conflict'
}

/** Bad invocation. Raised before any file is touched. */
export class FatalConfigError extends PhotoShelfError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Error taxonomy for the project registry.
 * Every error carries a stable `code` so callers can branch without instanceof.
 */

export type RegistryErrorCode =
  | 'PROJECT_EXISTS'
  | 'NOT_FOUND'
  | 'DUPLICATE_NAME'
  | 'DIRECTORY_MISSING'
  | 'DIRECTORY_CREATION_FAILED'
  | 'DIRECTORY_COPY_FAILED'
  | 'DIRECTORY_DELETION_FAILED'
  | 'INVALID_NAME'
  | 'STORE_NOT_INITIALIZED'

export class RegistryError extends Error {
  public readonly code: RegistryErrorCode

  constructor(code: RegistryErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'RegistryError'
    this.code = code
  }
}

/**
 * A project with this name is already registered
 */
export class ProjectExistsError extends RegistryError {
  constructor(public readonly projectName: string) {
    super('PROJECT_EXISTS', `Project already exists: ${projectName}`)
    this.name = 'ProjectExistsError'
  }
}

/**
 * No project with this name is registered
 */
export class NotFoundError extends RegistryError {
  constructor(public readonly projectName: string) {
    super('NOT_FOUND', `Project not found: ${projectName}`)
    this.name = 'NotFoundError'
  }
}

/**
 * Store-level uniqueness violation
 */
export class DuplicateNameError extends RegistryError {
  constructor(public readonly projectName: string) {
    super('DUPLICATE_NAME', `Duplicate project name: ${projectName}`)
    this.name = 'DuplicateNameError'
  }
}

export class InvalidNameError extends RegistryError {
  constructor(
    public readonly projectName: string,
    reason: string
  ) {
    super('INVALID_NAME', `Invalid project name "${projectName}": ${reason}`)
    this.name = 'InvalidNameError'
  }
}

export class StoreNotInitializedError extends RegistryError {
  constructor() {
    super('STORE_NOT_INITIALIZED', 'Database not initialized. Call initialize() first.')
    this.name = 'StoreNotInitializedError'
  }
}

/**
 * Record present, directory absent
 */
export class DirectoryMissingError extends RegistryError {
  constructor(
    public readonly projectName: string,
    public readonly path: string
  ) {
    super('DIRECTORY_MISSING', `Directory for project ${projectName} does not exist: ${path}`)
    this.name = 'DirectoryMissingError'
  }
}

export class DirectoryCreationError extends RegistryError {
  constructor(
    public readonly path: string,
    cause: unknown
  ) {
    super('DIRECTORY_CREATION_FAILED', `Failed to create directory ${path}: ${describe(cause)}`, {
      cause
    })
    this.name = 'DirectoryCreationError'
  }
}

export class DirectoryCopyError extends RegistryError {
  constructor(
    public readonly source: string,
    public readonly path: string,
    cause: unknown
  ) {
    super(
      'DIRECTORY_COPY_FAILED',
      `Failed to copy directory ${source} to ${path}: ${describe(cause)}`,
      { cause }
    )
    this.name = 'DirectoryCopyError'
  }
}

export class DirectoryDeletionError extends RegistryError {
  constructor(
    public readonly path: string,
    cause: unknown
  ) {
    super('DIRECTORY_DELETION_FAILED', `Failed to delete directory ${path}: ${describe(cause)}`, {
      cause
    })
    this.name = 'DirectoryDeletionError'
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}

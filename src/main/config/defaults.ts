/**
 * Default registry configuration
 */

export const DEFAULT_DATABASE_NAME = 'projects.db'

export const DEFAULT_APP_NAME = 'ProjectRegistry'

export const DEFAULT_APP_AUTHOR = 'project-registry'

// Overrides the default base directory when no explicit one is given
export const BASE_DIRECTORY_ENV_VAR = 'PROJECT_REGISTRY_DIR'

// How many project names toString() lists before truncating
export const DEFAULT_MAX_REPR_LENGTH = 25

/**
 * Builds the immutable configuration a ProjectsManager runs with.
 * Ambient state (environment, platform directories) is read here once and never again.
 */
import * as path from 'path'
import type { ProjectAttributes } from '../../shared/types'
import type { IProjectStore } from '../store/types'
import type { ProjectsManager } from '../projects/ProjectsManager'
import { getUserDataDir, type AppIdentity } from '../utils/appDirs'
import { slugify } from '../utils/slugify'
import {
  BASE_DIRECTORY_ENV_VAR,
  DEFAULT_APP_AUTHOR,
  DEFAULT_APP_NAME,
  DEFAULT_DATABASE_NAME,
  DEFAULT_MAX_REPR_LENGTH
} from './defaults'

/**
 * Turns a raw project name into a path-safe name
 */
export type Normalizer = (text: string) => string

/**
 * Computes the default base directory when none is configured
 */
export type DefaultPathResolver = (identity: AppIdentity) => string

/**
 * Hook invoked after a create, activate or delete
 */
export type ProjectHook = (
  manager: ProjectsManager,
  projectName: string,
  attributes: ProjectAttributes,
  directoryPath: string
) => void

/**
 * Hook invoked after a copy, with the target directory
 */
export type CopyProjectHook = (
  manager: ProjectsManager,
  sourceName: string,
  targetName: string,
  directoryPath: string
) => void

export interface ProjectHooks {
  onCreate?: ProjectHook
  onActivate?: ProjectHook
  onCopy?: CopyProjectHook
  onDelete?: ProjectHook
}

export interface ProjectsManagerOptions {
  baseDirectory?: string
  databaseName?: string
  appName?: string
  appAuthor?: string
  basicDirectories?: string[] // Subdirectories created inside every new project
  maxReprLength?: number
  normalizer?: Normalizer
  resolveDefaultPath?: DefaultPathResolver
  store?: IProjectStore // Replaces the SQLite store at baseDirectory/databaseName
  hooks?: ProjectHooks
  env?: NodeJS.ProcessEnv
}

export interface RegistryConfiguration {
  readonly baseDirectory: string
  readonly databaseName: string
  readonly databasePath: string
  readonly appName: string
  readonly appAuthor: string
  readonly basicDirectories: readonly string[]
  readonly maxReprLength: number
  readonly normalizer: Normalizer
  readonly hooks: Readonly<ProjectHooks>
}

export function resolveConfiguration(options: ProjectsManagerOptions = {}): RegistryConfiguration {
  const appName = options.appName ?? DEFAULT_APP_NAME
  const appAuthor = options.appAuthor ?? DEFAULT_APP_AUTHOR
  const env = options.env ?? process.env
  const resolveDefaultPath = options.resolveDefaultPath ?? getUserDataDir
  const databaseName = options.databaseName ?? DEFAULT_DATABASE_NAME

  const baseDirectory = path.resolve(
    options.baseDirectory || env[BASE_DIRECTORY_ENV_VAR] || resolveDefaultPath({ appName, appAuthor })
  )

  return Object.freeze({
    baseDirectory,
    databaseName,
    databasePath: path.join(baseDirectory, databaseName),
    appName,
    appAuthor,
    basicDirectories: Object.freeze([...(options.basicDirectories ?? [])]),
    maxReprLength: options.maxReprLength ?? DEFAULT_MAX_REPR_LENGTH,
    normalizer: options.normalizer ?? slugify,
    hooks: Object.freeze({ ...options.hooks })
  })
}

export { ProjectsManager } from './main/projects/ProjectsManager'
export { ProjectDirectories } from './main/projects/ProjectDirectories'
export { DatabaseStore } from './main/store/DatabaseStore'
export type { IProjectStore } from './main/store/types'
export {
  resolveConfiguration,
  type CopyProjectHook,
  type DefaultPathResolver,
  type Normalizer,
  type ProjectHook,
  type ProjectHooks,
  type ProjectsManagerOptions,
  type RegistryConfiguration
} from './main/config/configuration'
export * from './main/config/defaults'
export { getUserDataDir, type AppIdentity } from './main/utils/appDirs'
export { slugify } from './main/utils/slugify'
export { isValidPathSegment } from './main/utils/pathValidation'
export { createLogger, setLogLevel, type Logger, type LogLevelOption } from './main/logger'
export * from './shared/errors'
export type * from './shared/types'

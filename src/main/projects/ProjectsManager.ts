/**
 * ProjectsManager - lifecycle of registered projects
 *
 * Keeps three things in step: the record store, one directory per project
 * under the base directory, and the persisted active-project pointer.
 * Every public operation normalizes the project name before touching either
 * resource, then runs the matching hook. Hook errors propagate unchanged.
 */
import type {
  CopyProjectOptions,
  CreateProjectOptions,
  DeleteProjectOptions,
  ProjectAttributes,
  ProjectRecord
} from '../../shared/types'
import {
  DirectoryMissingError,
  InvalidNameError,
  NotFoundError,
  ProjectExistsError
} from '../../shared/errors'
import {
  resolveConfiguration,
  type ProjectsManagerOptions,
  type RegistryConfiguration
} from '../config/configuration'
import { createLogger } from '../logger'
import { DatabaseStore } from '../store/DatabaseStore'
import type { IProjectStore } from '../store/types'
import { getPathSegmentProblem } from '../utils/pathValidation'
import { slugify } from '../utils/slugify'
import { ProjectDirectories } from './ProjectDirectories'

const log = createLogger('ProjectsManager')

export class ProjectsManager implements Iterable<ProjectRecord> {
  readonly config: RegistryConfiguration
  private readonly store: IProjectStore
  private readonly directories: ProjectDirectories

  constructor(options: ProjectsManagerOptions = {}) {
    this.config = resolveConfiguration(options)
    this.store = options.store ?? new DatabaseStore(this.config.databasePath)
    this.directories = new ProjectDirectories(
      this.config.baseDirectory,
      this.config.basicDirectories
    )
  }

  /**
   * Construct and initialize in one step
   */
  static async open(options: ProjectsManagerOptions = {}): Promise<ProjectsManager> {
    const manager = new ProjectsManager(options)
    await manager.initialize()
    return manager
  }

  /**
   * Create the base directory and open the store
   */
  async initialize(): Promise<void> {
    this.directories.ensureBase()
    await this.store.initialize()
    log.debug(`Registry ready at ${this.config.baseDirectory}`)
  }

  close(): void {
    this.store.close()
  }

  get baseDirectory(): string {
    return this.config.baseDirectory
  }

  /**
   * Normalize a name with the default normalizer
   */
  static getCleanProjectName(name: string): string {
    return slugify(name)
  }

  /**
   * Normalize a name with this manager's normalizer
   */
  getCleanProjectName(name: string): string {
    return this.config.normalizer(name)
  }

  [Symbol.iterator](): Iterator<ProjectRecord> {
    return this.store.listAll()[Symbol.iterator]()
  }

  get size(): number {
    return this.store.count()
  }

  has(name: string): boolean {
    return this.store.has(this.getCleanProjectName(name))
  }

  getProject(name: string): ProjectRecord {
    return this.store.get(this.normalize(name))
  }

  get activeProjectName(): string | null {
    return this.store.getActive()
  }

  get activeProject(): ProjectRecord | null {
    return this.getActiveProject()
  }

  getActiveProject(): ProjectRecord | null {
    const active = this.store.getActive()
    return active === null ? null : this.store.find(active)
  }

  /**
   * Path bound to a project name, whether or not it is registered
   */
  getProjectDirectory(name: string): string {
    return this.directories.pathFor(this.normalize(name))
  }

  /**
   * Register a project and create its directory.
   *
   * A directory left on disk without a record fails with
   * DirectoryCreationError. With `existsOk`, an existing record is returned
   * as is (activated if asked, onCreate not run again) and a leftover
   * directory is adopted as the new project's directory.
   */
  createProject(rawName: string, options: CreateProjectOptions = {}): ProjectRecord {
    const name = this.normalize(rawName)

    const existing = this.store.find(name)
    if (existing) {
      if (!options.existsOk) {
        throw new ProjectExistsError(name)
      }
      if (options.activate) {
        this.activateProject(name)
      }
      return existing
    }

    const dir = this.directories.pathFor(name)
    const createdDir = this.directories.create(name, options.existsOk ?? false)

    const now = new Date().toISOString()
    try {
      this.store.insert({
        name,
        attributes: options.attributes ?? {},
        createdAt: now,
        updatedAt: now
      })
    } catch (error) {
      log.warn(`Failed to register ${name}, rolling back its directory`)
      if (createdDir) {
        this.directories.discard(name)
      }
      throw error
    }

    const record = this.store.get(name)
    log.info(`Created project ${name} at ${dir}`)
    this.config.hooks.onCreate?.(this, name, record.attributes, dir)

    // Activation failure leaves the project created but inactive
    if (options.activate) {
      this.activateProject(name)
    }

    return record
  }

  activateProject(rawName: string): ProjectRecord {
    const name = this.normalize(rawName)
    const record = this.store.get(name)

    const dir = this.directories.pathFor(name)
    if (!this.directories.exists(name)) {
      log.warn(`Project ${name} is registered but ${dir} is missing`)
      throw new DirectoryMissingError(name, dir)
    }

    this.store.setActive(name)
    log.info(`Activated project ${name}`)
    this.config.hooks.onActivate?.(this, name, record.attributes, dir)

    return record
  }

  copyProject(
    rawSource: string,
    rawTarget: string,
    options: CopyProjectOptions = {}
  ): ProjectRecord {
    const sourceName = this.normalize(rawSource)
    const targetName = this.normalize(rawTarget)

    const source = this.store.get(sourceName)
    if (this.store.has(targetName)) {
      throw new ProjectExistsError(targetName)
    }
    if (!this.directories.exists(sourceName)) {
      throw new DirectoryMissingError(sourceName, this.directories.pathFor(sourceName))
    }

    const targetDir = this.directories.copy(sourceName, targetName)

    const now = new Date().toISOString()
    try {
      this.store.insert({
        name: targetName,
        attributes: structuredClone(source.attributes),
        createdAt: now,
        updatedAt: now
      })
    } catch (error) {
      log.warn(`Failed to register ${targetName}, removing copied directory`)
      this.directories.discard(targetName)
      throw error
    }

    log.info(`Copied project ${sourceName} to ${targetName}`)
    this.config.hooks.onCopy?.(this, sourceName, targetName, targetDir)

    if (options.switch) {
      this.activateProject(targetName)
    }

    return this.store.get(targetName)
  }

  /**
   * Delete a project. Returns false only when `notExistOk` is set and the
   * project was not registered.
   *
   * The record is removed first. If removing the directory then fails, the
   * record stays deleted, onDelete still runs, and DirectoryDeletionError is
   * thrown afterwards.
   */
  deleteProject(rawName: string, options: DeleteProjectOptions = {}): boolean {
    const name = this.normalize(rawName)
    const deleteDir = options.deleteDir ?? true

    const record = this.store.find(name)
    if (!record) {
      if (options.notExistOk) {
        return false
      }
      throw new NotFoundError(name)
    }

    if (this.store.getActive() === name) {
      this.store.clearActive()
    }
    this.store.delete(name)

    const dir = this.directories.pathFor(name)
    let removalError: unknown = null
    if (deleteDir) {
      try {
        this.directories.remove(name)
      } catch (error) {
        log.error(`Project ${name} was unregistered but ${dir} could not be removed`)
        removalError = error
      }
    }

    log.info(`Deleted project ${name}`)
    this.config.hooks.onDelete?.(this, name, record.attributes, dir)

    if (removalError !== null) {
      throw removalError
    }
    return true
  }

  /**
   * Replace a project's attributes
   */
  updateProjectAttributes(rawName: string, attributes: ProjectAttributes): ProjectRecord {
    return this.store.updateAttributes(this.normalize(rawName), attributes)
  }

  /**
   * Return a registered project's directory, recreating it if it went missing
   */
  requestDirectory(rawName: string): string {
    const name = this.normalize(rawName)
    if (!this.store.has(name)) {
      throw new NotFoundError(name)
    }

    if (!this.directories.exists(name)) {
      log.warn(`Recreating missing directory for ${name}`)
    }
    this.directories.create(name, true)

    return this.directories.pathFor(name)
  }

  /**
   * Remove directories under the base directory that no record claims.
   * Returns the number of directories removed.
   */
  purgeOrphanedDirectories(): number {
    const registered = new Set<string>()
    for (const record of this) {
      registered.add(record.name)
    }

    let purged = 0
    for (const dirName of this.directories.listDirectoryNames()) {
      if (registered.has(dirName)) continue
      this.directories.remove(dirName)
      purged++
    }

    if (purged > 0) {
      log.info(`Purged ${purged} orphaned project directories`)
    }
    return purged
  }

  toString(): string {
    const names = Array.from(this, (record) => record.name)
    const listed = names
      .slice(0, this.config.maxReprLength)
      .map((name) => `\n\t${name}`)
      .join('')

    let repr = `Projects manager with ${names.length} projects, including:${listed}`
    if (names.length > this.config.maxReprLength) {
      repr += '\n\t...\nIterate the manager to get the full list of projects.'
    }
    return repr
  }

  // ==================== Private Helper Methods ====================

  /**
   * Normalize a raw name and reject results that cannot name a directory
   */
  private normalize(rawName: string): string {
    const name = this.getCleanProjectName(rawName)

    const problem = getPathSegmentProblem(name)
    if (problem) {
      throw new InvalidNameError(rawName, problem)
    }
    if (name === this.config.databaseName) {
      throw new InvalidNameError(rawName, 'name is reserved for the registry database')
    }

    return name
  }
}

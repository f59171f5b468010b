/**
 * ProjectDirectories - filesystem side of the registry
 *
 * Every project owns `<baseDirectory>/<name>`. Failures are wrapped into the
 * registry's directory errors with the offending path and the OS error.
 */
import { cpSync, existsSync, mkdirSync, readdirSync, rmSync, statSync } from 'fs'
import * as path from 'path'
import {
  DirectoryCopyError,
  DirectoryCreationError,
  DirectoryDeletionError
} from '../../shared/errors'
import { createLogger } from '../logger'

const log = createLogger('ProjectDirectories')

export class ProjectDirectories {
  constructor(
    readonly baseDirectory: string,
    private readonly basicDirectories: readonly string[] = []
  ) {}

  /**
   * Create the base directory itself
   */
  ensureBase(): void {
    try {
      mkdirSync(this.baseDirectory, { recursive: true })
    } catch (error) {
      throw new DirectoryCreationError(this.baseDirectory, error)
    }
  }

  pathFor(name: string): string {
    return path.join(this.baseDirectory, name)
  }

  exists(name: string): boolean {
    const dir = this.pathFor(name)
    return existsSync(dir) && statSync(dir).isDirectory()
  }

  /**
   * Create a project directory and its basic subdirectories.
   * Unless `allowExisting` is set, a path already present on disk is refused.
   * Returns whether the project directory itself was newly created, so a
   * caller rolling back knows if it owns the directory.
   */
  create(name: string, allowExisting = false): boolean {
    const dir = this.pathFor(name)
    const created = !existsSync(dir)

    if (!created && !allowExisting) {
      throw new DirectoryCreationError(dir, new Error('directory already exists'))
    }

    try {
      mkdirSync(dir, { recursive: true })
      for (const basic of this.basicDirectories) {
        mkdirSync(path.join(dir, basic), { recursive: true })
      }
    } catch (error) {
      if (created) {
        this.removeQuietly(dir)
      }
      throw new DirectoryCreationError(dir, error)
    }

    return created
  }

  /**
   * Recursively copy one project tree to another.
   * The target must not exist; a partial copy is removed before throwing.
   */
  copy(sourceName: string, targetName: string): string {
    const source = this.pathFor(sourceName)
    const target = this.pathFor(targetName)

    if (existsSync(target)) {
      throw new DirectoryCopyError(source, target, new Error('target directory already exists'))
    }

    try {
      cpSync(source, target, { recursive: true, errorOnExist: true, force: false })
    } catch (error) {
      this.removeQuietly(target)
      throw new DirectoryCopyError(source, target, error)
    }

    return target
  }

  /**
   * Remove a project tree. A directory that is already gone is not an error.
   */
  remove(name: string): void {
    const dir = this.pathFor(name)
    try {
      rmSync(dir, { recursive: true, force: true })
    } catch (error) {
      throw new DirectoryDeletionError(dir, error)
    }
  }

  /**
   * Names of directories directly under the base directory
   */
  listDirectoryNames(): string[] {
    return readdirSync(this.baseDirectory, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
  }

  /**
   * Remove a project tree during rollback, logging instead of throwing so the
   * caller can report the error that caused the rollback
   */
  discard(name: string): void {
    this.removeQuietly(this.pathFor(name))
  }

  private removeQuietly(dir: string): void {
    try {
      rmSync(dir, { recursive: true, force: true })
    } catch (cleanupError) {
      log.warn(`Failed to clean up ${dir}:`, cleanupError)
    }
  }
}

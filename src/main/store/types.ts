import type { ProjectAttributes, ProjectRecord } from '../../shared/types'

/**
 * Persistence contract for project records.
 * Implementations enforce name uniqueness and existence only; lifecycle rules
 * live in ProjectsManager.
 */
export interface IProjectStore {
  initialize(): Promise<void>
  close(): void

  insert(record: ProjectRecord): void
  get(name: string): ProjectRecord
  find(name: string): ProjectRecord | null
  has(name: string): boolean
  count(): number
  delete(name: string): void
  updateAttributes(name: string, attributes: ProjectAttributes): ProjectRecord

  /**
   * All records sorted by name. Each iteration reads the current table.
   */
  listAll(): Iterable<ProjectRecord>

  setActive(name: string): void
  getActive(): string | null
  clearActive(): void
}

/**
 * Project types for the registry
 */

/**
 * JSON value allowed inside project attributes
 */
export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | AttributeValue[]
  | { [key: string]: AttributeValue }

/**
 * Application-defined metadata attached to a project (no fixed schema)
 */
export type ProjectAttributes = Record<string, AttributeValue>

/**
 * ProjectRecord - a registered project
 * The record's directory lives at `<baseDirectory>/<name>`.
 */
export interface ProjectRecord {
  name: string // Normalized name, primary key
  attributes: ProjectAttributes

  // Timestamps
  createdAt: string // ISO 8601
  updatedAt: string // ISO 8601, bumped when attributes are replaced
}

/**
 * Options for ProjectsManager.createProject
 */
export interface CreateProjectOptions {
  attributes?: ProjectAttributes
  activate?: boolean
  existsOk?: boolean // Return the existing record instead of throwing
}

/**
 * Options for ProjectsManager.copyProject
 */
export interface CopyProjectOptions {
  switch?: boolean // Activate the copy once it is registered
}

/**
 * Options for ProjectsManager.deleteProject
 */
export interface DeleteProjectOptions {
  deleteDir?: boolean
  notExistOk?: boolean // Return false instead of throwing when absent
}

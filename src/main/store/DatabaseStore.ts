/**
 * DatabaseStore - SQLite-based storage for project records
 *
 * Uses sql.js (pure JavaScript SQLite), so no native build is needed.
 * The whole database is exported to `dbPath` after every mutation.
 */
import { dirname } from 'path'
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs'
import initSqlJs, { type Database as SqlJsDatabase } from 'sql.js'
import type { ProjectAttributes, ProjectRecord } from '../../shared/types'
import { DuplicateNameError, NotFoundError, StoreNotInitializedError } from '../../shared/errors'
import { createLogger } from '../logger'
import type { IProjectStore } from './types'

const log = createLogger('DatabaseStore')

const ACTIVE_PROJECT_KEY = 'active_project'

export class DatabaseStore implements IProjectStore {
  private db: SqlJsDatabase | null = null

  constructor(private readonly dbPath: string) {}

  /**
   * Initialize database schema
   */
  async initialize(): Promise<void> {
    if (this.db) return

    const SQL = await initSqlJs()

    // Load existing database or create new one
    if (existsSync(this.dbPath)) {
      const fileBuffer = readFileSync(this.dbPath)
      this.db = new SQL.Database(fileBuffer)
      log.debug(`Opened ${this.dbPath}`)
    } else {
      mkdirSync(dirname(this.dbPath), { recursive: true })
      this.db = new SQL.Database()
      log.debug(`Created ${this.dbPath}`)
    }

    this.db.run(`
      CREATE TABLE IF NOT EXISTS projects (
        name TEXT PRIMARY KEY,
        attributes TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )
    `)

    // Single-row state such as the active project pointer
    this.db.run(`
      CREATE TABLE IF NOT EXISTS registry_state (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      )
    `)

    this.saveToFile()
  }

  /**
   * Close the database connection
   */
  close(): void {
    if (this.db) {
      this.saveToFile()
      this.db.close()
      this.db = null
    }
  }

  insert(record: ProjectRecord): void {
    const db = this.ensureDb()
    if (this.has(record.name)) {
      throw new DuplicateNameError(record.name)
    }

    db.run(
      `INSERT INTO projects (name, attributes, created_at, updated_at)
       VALUES (?, ?, ?, ?)`,
      [record.name, JSON.stringify(record.attributes), record.createdAt, record.updatedAt]
    )

    this.saveToFile()
  }

  get(name: string): ProjectRecord {
    const record = this.find(name)
    if (!record) {
      throw new NotFoundError(name)
    }
    return record
  }

  find(name: string): ProjectRecord | null {
    const db = this.ensureDb()
    const stmt = db.prepare(`
      SELECT name, attributes, created_at, updated_at
      FROM projects WHERE name = ?
    `)
    stmt.bind([name])

    try {
      return stmt.step() ? this.rowToRecord(toProjectRow(stmt.getAsObject())) : null
    } finally {
      stmt.free()
    }
  }

  has(name: string): boolean {
    const db = this.ensureDb()
    const stmt = db.prepare('SELECT 1 FROM projects WHERE name = ?')
    stmt.bind([name])
    const found = stmt.step()
    stmt.free()
    return found
  }

  count(): number {
    const db = this.ensureDb()
    const stmt = db.prepare('SELECT COUNT(*) AS count FROM projects')
    stmt.step()
    const { count } = stmt.getAsObject()
    stmt.free()
    return Number(count)
  }

  /**
   * Delete a record, clearing the active pointer if it referenced it
   */
  delete(name: string): void {
    const db = this.ensureDb()
    if (!this.has(name)) {
      throw new NotFoundError(name)
    }

    db.run('DELETE FROM projects WHERE name = ?', [name])
    db.run('DELETE FROM registry_state WHERE key = ? AND value = ?', [ACTIVE_PROJECT_KEY, name])

    this.saveToFile()
  }

  /**
   * Replace the attributes of a record
   */
  updateAttributes(name: string, attributes: ProjectAttributes): ProjectRecord {
    const db = this.ensureDb()
    if (!this.has(name)) {
      throw new NotFoundError(name)
    }

    db.run('UPDATE projects SET attributes = ?, updated_at = ? WHERE name = ?', [
      JSON.stringify(attributes),
      new Date().toISOString(),
      name
    ])

    this.saveToFile()

    return this.get(name)
  }

  listAll(): Iterable<ProjectRecord> {
    return {
      [Symbol.iterator]: () => this.iterateRecords()
    }
  }

  setActive(name: string): void {
    const db = this.ensureDb()
    if (!this.has(name)) {
      throw new NotFoundError(name)
    }

    db.run('INSERT OR REPLACE INTO registry_state (key, value) VALUES (?, ?)', [
      ACTIVE_PROJECT_KEY,
      name
    ])

    this.saveToFile()
  }

  getActive(): string | null {
    const db = this.ensureDb()
    const stmt = db.prepare('SELECT value FROM registry_state WHERE key = ?')
    stmt.bind([ACTIVE_PROJECT_KEY])

    let active: string | null = null
    if (stmt.step()) {
      const { value } = stmt.getAsObject()
      active = typeof value === 'string' ? value : null
    }
    stmt.free()

    return active
  }

  clearActive(): void {
    const db = this.ensureDb()
    db.run('DELETE FROM registry_state WHERE key = ?', [ACTIVE_PROJECT_KEY])
    this.saveToFile()
  }

  // ==================== Private Helper Methods ====================

  /**
   * Snapshot of the table taken when iteration starts. Every mutation exports
   * the database, which frees open statements, so no statement may stay open
   * across a yield.
   */
  private *iterateRecords(): Generator<ProjectRecord> {
    yield* this.readAllRecords()
  }

  private readAllRecords(): ProjectRecord[] {
    const db = this.ensureDb()
    const stmt = db.prepare(`
      SELECT name, attributes, created_at, updated_at
      FROM projects
      ORDER BY name ASC
    `)

    const records: ProjectRecord[] = []
    while (stmt.step()) {
      records.push(this.rowToRecord(toProjectRow(stmt.getAsObject())))
    }
    stmt.free()

    return records
  }

  /**
   * Save database to file
   */
  private saveToFile(): void {
    if (!this.db) return
    const data = this.db.export()
    writeFileSync(this.dbPath, Buffer.from(data))
  }

  /**
   * Ensure database is initialized
   */
  private ensureDb(): SqlJsDatabase {
    if (!this.db) {
      throw new StoreNotInitializedError()
    }
    return this.db
  }

  /**
   * Convert database row to ProjectRecord
   */
  private rowToRecord(row: ProjectRow): ProjectRecord {
    return {
      name: row.name,
      attributes: JSON.parse(row.attributes),
      createdAt: row.created_at,
      updatedAt: row.updated_at
    }
  }
}

// Type definitions for database rows
interface ProjectRow {
  name: string
  attributes: string
  created_at: string
  updated_at: string
}

function toProjectRow(row: Record<string, unknown>): ProjectRow {
  const { name, attributes, created_at, updated_at } = row
  if (
    typeof name !== 'string' ||
    typeof attributes !== 'string' ||
    typeof created_at !== 'string' ||
    typeof updated_at !== 'string'
  ) {
    throw new Error('Malformed row in projects table')
  }
  return { name, attributes, created_at, updated_at }
}

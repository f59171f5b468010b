import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'

vi.mock('fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs')>()
  return {
    ...actual,
    cpSync: vi.fn(actual.cpSync),
    rmSync: vi.fn(actual.rmSync)
  }
})

import { cpSync, existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { ProjectDirectories } from '../../../../src/main/projects/ProjectDirectories'
import { ProjectsManager } from '../../../../src/main/projects/ProjectsManager'
import {
  DirectoryCopyError,
  DirectoryCreationError,
  DirectoryDeletionError
} from '../../../../src/shared/errors'

const mockCpSync = vi.mocked(cpSync)
const mockRmSync = vi.mocked(rmSync)

describe('ProjectDirectories', () => {
  let baseDirectory: string

  beforeEach(() => {
    vi.clearAllMocks()
    baseDirectory = mkdtempSync(join(tmpdir(), 'project-dirs-'))
  })

  afterEach(() => {
    rmSync(baseDirectory, { recursive: true, force: true })
  })

  it('binds names to paths under the base directory', () => {
    const directories = new ProjectDirectories(baseDirectory)

    expect(directories.pathFor('alpha')).toBe(join(baseDirectory, 'alpha'))
  })

  it('reports whether it created the project directory', () => {
    const directories = new ProjectDirectories(baseDirectory, ['logs'])

    expect(directories.create('alpha')).toBe(true)
    expect(directories.create('alpha', true)).toBe(false)
    expect(existsSync(join(baseDirectory, 'alpha', 'logs'))).toBe(true)
  })

  it('refuses an existing directory unless allowed', () => {
    const directories = new ProjectDirectories(baseDirectory)
    mkdirSync(join(baseDirectory, 'alpha'))

    expect(() => directories.create('alpha')).toThrow(DirectoryCreationError)
    expect(() => directories.create('alpha')).toThrow('directory already exists')
    expect(existsSync(join(baseDirectory, 'alpha'))).toBe(true)
  })

  it('does not treat a file as a project directory', () => {
    const directories = new ProjectDirectories(baseDirectory)
    writeFileSync(join(baseDirectory, 'alpha'), 'file')

    expect(directories.exists('alpha')).toBe(false)
  })

  it('removes a partial copy before reporting DirectoryCopyError', () => {
    const directories = new ProjectDirectories(baseDirectory)
    directories.create('source')
    mockCpSync.mockImplementationOnce((_source, destination) => {
      mkdirSync(String(destination))
      writeFileSync(join(String(destination), 'partial.bin'), 'half')
      throw new Error('EIO: i/o error')
    })

    let thrown: unknown
    try {
      directories.copy('source', 'target')
    } catch (error) {
      thrown = error
    }

    expect(thrown).toBeInstanceOf(DirectoryCopyError)
    expect(thrown).toMatchObject({
      code: 'DIRECTORY_COPY_FAILED',
      path: join(baseDirectory, 'target'),
      cause: new Error('EIO: i/o error')
    })
    expect(existsSync(join(baseDirectory, 'target'))).toBe(false)
  })

  it('wraps removal failures in DirectoryDeletionError', () => {
    const directories = new ProjectDirectories(baseDirectory)
    directories.create('alpha')
    mockRmSync.mockImplementationOnce(() => {
      throw new Error('EBUSY: resource busy')
    })

    expect(() => directories.remove('alpha')).toThrow(DirectoryDeletionError)
    expect(existsSync(join(baseDirectory, 'alpha'))).toBe(true)
  })

  it('lists only directories', () => {
    const directories = new ProjectDirectories(baseDirectory)
    directories.create('alpha')
    directories.create('bravo')
    writeFileSync(join(baseDirectory, 'notes.txt'), 'text')

    expect(directories.listDirectoryNames().sort()).toEqual(['alpha', 'bravo'])
  })

  describe('through ProjectsManager', () => {
    let manager: ProjectsManager

    beforeEach(async () => {
      manager = await ProjectsManager.open({ baseDirectory })
    })

    afterEach(() => {
      manager.close()
    })

    it('leaves no target behind when a copy fails', () => {
      manager.createProject('a')
      mockCpSync.mockImplementationOnce(() => {
        throw new Error('ENOSPC: no space left on device')
      })

      expect(() => manager.copyProject('a', 'b')).toThrow(DirectoryCopyError)
      expect(manager.has('b')).toBe(false)
      expect(existsSync(join(baseDirectory, 'b'))).toBe(false)
    })

    it('keeps the record deleted and runs the hook when the directory cannot be removed', async () => {
      const onDelete = vi.fn()
      manager.close()
      manager = await ProjectsManager.open({ baseDirectory, hooks: { onDelete } })
      manager.createProject('a', { activate: true })
      mockRmSync.mockImplementationOnce(() => {
        throw new Error('EBUSY: resource busy')
      })

      expect(() => manager.deleteProject('a')).toThrow(DirectoryDeletionError)
      expect(manager.has('a')).toBe(false)
      expect(manager.activeProjectName).toBeNull()
      expect(existsSync(join(baseDirectory, 'a'))).toBe(true)
      expect(onDelete).toHaveBeenCalledWith(manager, 'a', {}, join(baseDirectory, 'a'))
    })
  })
})

import { describe, it, expect, vi } from 'vitest'
import { join, resolve } from 'path'
import { resolveConfiguration } from '../../../../src/main/config/configuration'
import { slugify } from '../../../../src/main/utils/slugify'

describe('resolveConfiguration', () => {
  it('prefers an explicit base directory', () => {
    const resolveDefaultPath = vi.fn(() => '/default/data')

    const config = resolveConfiguration({
      baseDirectory: '/explicit/base',
      env: { PROJECT_REGISTRY_DIR: '/from/env' },
      resolveDefaultPath
    })

    expect(config.baseDirectory).toBe(resolve('/explicit/base'))
    expect(config.databasePath).toBe(join(resolve('/explicit/base'), 'projects.db'))
    expect(resolveDefaultPath).not.toHaveBeenCalled()
  })

  it('falls back to the environment variable', () => {
    const config = resolveConfiguration({
      env: { PROJECT_REGISTRY_DIR: '/from/env' },
      resolveDefaultPath: () => '/default/data'
    })

    expect(config.baseDirectory).toBe(resolve('/from/env'))
  })

  it('asks the path resolver with the app identity last', () => {
    const resolveDefaultPath = vi.fn(() => '/default/data')

    const config = resolveConfiguration({
      appName: 'Analyses',
      appAuthor: 'lab',
      env: {},
      resolveDefaultPath
    })

    expect(resolveDefaultPath).toHaveBeenCalledWith({ appName: 'Analyses', appAuthor: 'lab' })
    expect(config.baseDirectory).toBe(resolve('/default/data'))
  })

  it('fills in defaults', () => {
    const config = resolveConfiguration({ baseDirectory: '/base', env: {} })

    expect(config.databaseName).toBe('projects.db')
    expect(config.appName).toBe('ProjectRegistry')
    expect(config.appAuthor).toBe('project-registry')
    expect(config.basicDirectories).toEqual([])
    expect(config.maxReprLength).toBe(25)
    expect(config.normalizer).toBe(slugify)
    expect(config.hooks).toEqual({})
  })

  it('is frozen and detached from the options', () => {
    const basicDirectories = ['backups']
    const config = resolveConfiguration({ baseDirectory: '/base', basicDirectories })

    basicDirectories.push('later')

    expect(config.basicDirectories).toEqual(['backups'])
    expect(Object.isFrozen(config)).toBe(true)
  })
})

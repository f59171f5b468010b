import { describe, expect, it } from 'vitest'
import {
  getPathSegmentProblem,
  isValidPathSegment
} from '../../../../src/main/utils/pathValidation'

describe('isValidPathSegment', () => {
  it('accepts slug-like names', () => {
    expect(isValidPathSegment('my-project')).toBe(true)
    expect(isValidPathSegment('run_2024.v2')).toBe(true)
  })

  it('rejects empty names', () => {
    expect(getPathSegmentProblem('')).toBe('name is empty after normalization')
  })

  it('rejects relative path references', () => {
    expect(isValidPathSegment('.')).toBe(false)
    expect(isValidPathSegment('..')).toBe(false)
  })

  it('rejects POSIX and Windows separators', () => {
    expect(isValidPathSegment('a/b')).toBe(false)
    expect(isValidPathSegment('a\\b')).toBe(false)
  })

  it('rejects reserved characters', () => {
    expect(getPathSegmentProblem('what?')).toBe(
      'name contains a path separator or reserved character'
    )
    expect(isValidPathSegment('tab\there')).toBe(false)
  })

  it('rejects Windows device names', () => {
    expect(isValidPathSegment('con')).toBe(false)
    expect(isValidPathSegment('LPT1.txt')).toBe(false)
    expect(isValidPathSegment('console')).toBe(true)
  })
})

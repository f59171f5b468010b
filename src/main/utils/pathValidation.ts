// Characters rejected in a file name on at least one supported platform
const RESERVED_CHARACTERS_REGEX = /[<>:"/\\|?*\u0000-\u001f]/

// Windows device names, reserved with or without an extension
const WINDOWS_RESERVED_NAME_REGEX = /^(con|prn|aux|nul|com[0-9]|lpt[0-9])(\..*)?$/i

/**
 * Returns the reason a string cannot be used as a single path segment,
 * or null when it can
 */
export function getPathSegmentProblem(segment: string): string | null {
  if (segment.length === 0) {
    return 'name is empty after normalization'
  }

  if (segment === '.' || segment === '..') {
    return 'name is a relative path reference'
  }

  if (RESERVED_CHARACTERS_REGEX.test(segment)) {
    return 'name contains a path separator or reserved character'
  }

  if (WINDOWS_RESERVED_NAME_REGEX.test(segment)) {
    return 'name is a reserved device name'
  }

  return null
}

export function isValidPathSegment(segment: string): boolean {
  return getPathSegmentProblem(segment) === null
}

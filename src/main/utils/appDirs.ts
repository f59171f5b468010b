/**
 * Per-user data directory resolution, following each platform's conventions
 */
import { homedir } from 'os'
import * as path from 'path'

export interface AppIdentity {
  appName: string
  appAuthor: string
}

/**
 * Resolve the default base directory for an application.
 * The platform, environment and home directory are injectable for tests.
 */
export function getUserDataDir(
  identity: AppIdentity,
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir()
): string {
  switch (platform) {
    case 'darwin':
      return path.posix.join(home, 'Library', 'Application Support', identity.appName)
    case 'win32': {
      const localAppData = env.LOCALAPPDATA || path.win32.join(home, 'AppData', 'Local')
      return path.win32.join(localAppData, identity.appAuthor, identity.appName)
    }
    default: {
      // XDG_DATA_HOME must be absolute to be honoured
      const xdgDataHome = env.XDG_DATA_HOME
      const dataHome =
        xdgDataHome && path.posix.isAbsolute(xdgDataHome)
          ? xdgDataHome
          : path.posix.join(home, '.local', 'share')
      return path.posix.join(dataHome, identity.appName)
    }
  }
}

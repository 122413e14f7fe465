import * as os from 'os'
import * as path from 'path'

const APP_DIR_NAME = 'tapline'
const STATS_FILE = 'stats.tapline'
const SETTINGS_FILE = 'settings.json'

export interface AppPaths {
  dataDir: string
  statsFile: string
  settingsFile: string
}

export function resolveAppPaths(env: NodeJS.ProcessEnv, homeDir: string = os.homedir()): AppPaths {
  const override = env.TAPLINE_DATA_DIR?.trim()
  const xdgDataHome = env.XDG_DATA_HOME?.trim()

  let dataDir: string
  if (override) {
    dataDir = path.resolve(override)
  } else if (xdgDataHome) {
    dataDir = path.join(xdgDataHome, APP_DIR_NAME)
  } else {
    dataDir = path.join(homeDir, '.local', 'share', APP_DIR_NAME)
  }

  return {
    dataDir,
    statsFile: path.join(dataDir, STATS_FILE),
    settingsFile: path.join(dataDir, SETTINGS_FILE),
  }
}

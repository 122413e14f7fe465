import * as fs from 'fs'
import * as path from 'path'
import type { AppConfig } from '../../src/types'
import { DEFAULT_CONFIG, normalizeConfig } from '../../src/lib/appConfig'

export function loadSettings(settingsPath: string): AppConfig {
  if (!fs.existsSync(settingsPath)) {
    return { ...DEFAULT_CONFIG }
  }

  try {
    const data = fs.readFileSync(settingsPath, 'utf-8')
    return normalizeConfig(JSON.parse(data))
  } catch (err) {
    console.warn(`Failed to load settings from ${settingsPath}, using defaults:`, err)
    return { ...DEFAULT_CONFIG }
  }
}

export function saveSettings(settingsPath: string, config: AppConfig): void {
  try {
    fs.mkdirSync(path.dirname(settingsPath), { recursive: true })
    fs.writeFileSync(settingsPath, JSON.stringify(config, null, 2))
  } catch (err) {
    console.error('Failed to save settings:', err)
  }
}

/**
 * CLI Config Store
 *
 * Persists monitoring defaults to:
 *   ~/.config/shardwatch/config.json (Linux)
 *   ~/Library/Preferences/shardwatch/config.json (Mac)
 *   %APPDATA%\shardwatch\Config\config.json (Windows)
 *
 * Command-line flags override whatever is stored here.
 */

import Conf from 'conf'
import { SETTING_DEFAULTS, parseSetting, type CliSettings, type SettingKey } from './settings'

const store = new Conf<CliSettings>({
  projectName: 'shardwatch',
  defaults: SETTING_DEFAULTS,
  configFileMode: 0o600,
})

export const config = {
  get path(): string { return store.path },

  all(): CliSettings {
    return {
      entropy_threshold:              store.get('entropy_threshold'),
      temperature_variance_threshold: store.get('temperature_variance_threshold'),
      check_interval_seconds:         store.get('check_interval_seconds'),
      alert_log:                      store.get('alert_log'),
    }
  },

  set(key: SettingKey, raw: string): Partial<CliSettings> {
    const update = parseSetting(key, raw)
    store.set(update)
    return update
  },

  reset() {
    store.clear()
  },
}

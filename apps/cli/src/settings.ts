/**
 * CLI Settings
 *
 * The keys an operator can persist with `shardwatch config set`, and how a
 * raw command-line string becomes a stored value. Values are checked against
 * the same bounds the enforcer enforces at construction.
 */

import { z } from 'zod'
import {
  DEFAULT_CHECK_INTERVAL_SECONDS,
  DEFAULT_ENTROPY_THRESHOLD,
  DEFAULT_TEMPERATURE_VARIANCE_THRESHOLD,
} from '@shardwatch/enforcer'

export interface CliSettings {
  entropy_threshold:              number
  temperature_variance_threshold: number
  check_interval_seconds:         number
  alert_log:                      string | null
}

export type SettingKey = keyof CliSettings

export const SETTING_DEFAULTS: CliSettings = {
  entropy_threshold:              DEFAULT_ENTROPY_THRESHOLD,
  temperature_variance_threshold: DEFAULT_TEMPERATURE_VARIANCE_THRESHOLD,
  check_interval_seconds:         DEFAULT_CHECK_INTERVAL_SECONDS,
  alert_log:                      null,
}

const settingSchemas = {
  entropy_threshold:              z.coerce.number().min(0).max(8),
  temperature_variance_threshold: z.coerce.number().positive().finite(),
  check_interval_seconds:         z.coerce.number().int().min(1),
  // "none" clears the alert log
  alert_log: z.string().min(1).transform(v => (v === 'none' ? null : v)),
}

export class SettingError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SettingError'
  }
}

export function isSettingKey(key: string): key is SettingKey {
  return Object.prototype.hasOwnProperty.call(settingSchemas, key)
}

/** Parse one raw value into the partial settings object to store. */
export function parseSetting(key: SettingKey, raw: string): Partial<CliSettings> {
  switch (key) {
    case 'entropy_threshold':
      return { entropy_threshold: check(key, settingSchemas.entropy_threshold, raw) }
    case 'temperature_variance_threshold':
      return { temperature_variance_threshold: check(key, settingSchemas.temperature_variance_threshold, raw) }
    case 'check_interval_seconds':
      return { check_interval_seconds: check(key, settingSchemas.check_interval_seconds, raw) }
    case 'alert_log':
      return { alert_log: check(key, settingSchemas.alert_log, raw) }
  }
}

function check<T>(key: SettingKey, schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string): T {
  const result = schema.safeParse(raw)
  if (!result.success) {
    throw new SettingError(`Invalid value for ${key}: ${result.error.issues.map(i => i.message).join('; ')}`)
  }
  return result.data
}

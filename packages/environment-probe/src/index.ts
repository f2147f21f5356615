/**
 * @shardwatch/environment-probe — Public API
 */

export type { EnvironmentProbe } from './types'
export { DEFAULT_FALLBACK_CELSIUS } from './types'
export { SyntheticTemperatureProbe } from './synthetic-probe'
export type { SyntheticProbeOptions } from './synthetic-probe'
export { ScriptedProbe } from './scripted-probe'
export { FailSafeProbe } from './fail-safe-probe'

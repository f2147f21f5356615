/**
 * @shardwatch/enforcer — Public API
 *
 * Import surface for operators and the CLI:
 *   import { ThermodynamicEnforcer } from '@shardwatch/enforcer'
 */

export {
  ThermodynamicEnforcer,
  ALERT_SOURCE,
  ENTROPY_REMEDIATION_BYTES,
  BACKDOOR_REMEDIATION_BYTES,
} from './thermodynamic-enforcer'

export type {
  EnforcerDeps,
  EnforcerState,
  CycleReport,
  MonitoringLifecycle,
  ShardScanReport,
} from './thermodynamic-enforcer'

export {
  enforcerConfigSchema,
  parseEnforcerConfig,
  EnforcerConfigError,
  DEFAULT_ENTROPY_THRESHOLD,
  DEFAULT_TEMPERATURE_VARIANCE_THRESHOLD,
  DEFAULT_CHECK_INTERVAL_SECONDS,
  DEFAULT_STOP_TIMEOUT_MS,
} from './config'

export type { EnforcerConfig, EnforcerConfigInput } from './config'

export {
  encryptWithEntropyGate,
  EntropyGateError,
  DEFAULT_CIPHERTEXT_ENTROPY_THRESHOLD,
} from './ciphertext-gate'

export type { EncryptionWrapper } from './ciphertext-gate'

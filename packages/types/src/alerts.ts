/**
 * @shardwatch/types — Alert Definitions
 *
 * Every alert the enforcer raises is typed here.
 * This is the contract between the enforcer, the alert bus and every
 * registered callback (pager hooks, audit sinks, the CLI printer).
 *
 * Alerts are ephemeral. The core never persists them — a callback that
 * wants an audit trail on disk writes it itself.
 */

// ─── Severity ─────────────────────────────────────────────────────────────────

export enum AlertSeverity {
  MEDIUM   = 'MEDIUM',   // Drift absorbed into the baseline
  HIGH     = 'HIGH',     // Large drift, low entropy
  CRITICAL = 'CRITICAL', // Regularity found, shard destroyed
}

// ─── Base ─────────────────────────────────────────────────────────────────────

export interface BaseAlert {
  alert_id: string
  cycle_id: string     // Shared by every alert raised in the same check cycle
  timestamp: string    // ISO 8601
  source: string       // e.g. "shardwatch.enforcer"
  severity: AlertSeverity
}

// ─── Environment ──────────────────────────────────────────────────────────────

export interface TemperatureViolationAlert extends BaseAlert {
  kind: 'temperature_violation'
  baseline: number
  current: number
  delta: number
  threshold: number
  baseline_adapted: boolean   // true when the reading replaced the baseline
}

// ─── Shard Checks ─────────────────────────────────────────────────────────────

export interface EntropyViolationAlert extends BaseAlert {
  kind: 'entropy_violation'
  shard: string
  entropy: number      // bits/byte
  threshold: number
}

export type RegularityKind = 'bit_balance' | 'repetition'

export interface RegularityDetectedAlert extends BaseAlert {
  kind: 'regularity_detected'
  shard: string
  finding: RegularityKind
}

// ─── Remediation ──────────────────────────────────────────────────────────────

export type ApoptosisReason = 'entropy_violation' | 'mathematical_backdoor'

export interface CryptographicApoptosisAlert extends BaseAlert {
  kind: 'cryptographic_apoptosis'
  shard: string
  reason: ApoptosisReason
  overwrite_bytes: number
  entropy?: number     // Present when reason is entropy_violation
}

// ─── Union of all alerts ──────────────────────────────────────────────────────

export type Alert =
  | TemperatureViolationAlert
  | EntropyViolationAlert
  | RegularityDetectedAlert
  | CryptographicApoptosisAlert

export type AlertKind = Alert['kind']

/** Fields the publisher fills in; callers building an alert supply the rest. */
export type AlertEnvelope = 'alert_id' | 'cycle_id' | 'timestamp' | 'source'

export type AlertCallback = (alert: Alert) => void | Promise<void>

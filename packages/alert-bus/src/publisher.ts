/**
 * @shardwatch/alert-bus — Envelope Helper
 *
 * Every alert gets: alert_id, cycle_id, timestamp, source.
 * Callers spread this into the kind-specific payload:
 *
 *   const alert: EntropyViolationAlert = { ...envelope(cycle_id, source), kind: 'entropy_violation', ... }
 */

import { v4 as uuidv4 } from 'uuid'
import type { AlertEnvelope, BaseAlert } from '@shardwatch/types'

export function envelope(cycle_id: string, source: string): Pick<BaseAlert, AlertEnvelope> {
  return {
    alert_id: uuidv4(),
    cycle_id,
    timestamp: new Date().toISOString(),
    source,
  }
}

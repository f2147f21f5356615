/**
 * Alert Output
 *
 * Turns alerts into terminal lines and JSON-lines audit records. The
 * enforcer keeps no alert history; the alert log is the CLI's audit trail.
 */

import { appendFile } from 'fs/promises'
import type { Alert, AlertCallback, Logger } from '@shardwatch/types'

export function describeAlert(alert: Alert): string {
  switch (alert.kind) {
    case 'temperature_violation':
      return `temperature drift ${alert.delta.toFixed(2)} ` +
        `(baseline ${alert.baseline.toFixed(2)} → ${alert.current.toFixed(2)}, threshold ${alert.threshold})` +
        (alert.baseline_adapted ? ' — baseline adapted' : '')
    case 'entropy_violation':
      return `${alert.shard}: entropy ${alert.entropy.toFixed(3)} below ${alert.threshold} bits/byte`
    case 'regularity_detected':
      return `${alert.shard}: ${alert.finding === 'bit_balance' ? 'bit balance' : 'repetition'} regularity`
    case 'cryptographic_apoptosis':
      return `${alert.shard}: overwritten with ${alert.overwrite_bytes} random bytes (${alert.reason})`
  }
}

/**
 * Callback that appends each alert to `path` as one JSON line. The returned
 * promise settles when the line is written; the bus logs a failed write.
 */
export function createAlertLogSink(path: string, logger?: Logger): AlertCallback {
  // Writes are chained so lines land in publish order
  let tail: Promise<void> = Promise.resolve()
  return (alert) => {
    const line = JSON.stringify(alert) + '\n'
    tail = tail
      // The previous line's failure was already handed to the bus
      .catch(() => undefined)
      .then(() => appendFile(path, line, 'utf8'))
    if (logger) logger.debug(`Queued ${alert.kind} for ${path}`)
    return tail
  }
}

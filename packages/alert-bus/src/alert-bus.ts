/**
 * @shardwatch/alert-bus — Alert Bus
 *
 * Every alert the enforcer raises goes through here, and every consumer
 * (pager hook, audit file, CLI printer) registers here.
 *
 * Bulkhead design:
 *   - Callbacks run synchronously, in registration order, on the caller's
 *     execution context (the enforcer's check cycle).
 *   - A callback that throws is caught, logged and counted. The remaining
 *     callbacks still receive the alert and the cycle keeps going.
 *   - A callback that returns a promise is not awaited. A rejection is
 *     logged and counted the same way. Slow work belongs in the callback's
 *     own hand-off, not on the cycle.
 */

import { v4 as uuidv4 } from 'uuid'
import {
  createConsoleLogger,
  type Alert,
  type AlertCallback,
  type Logger,
} from '@shardwatch/types'

// ─── Subscription Handle ──────────────────────────────────────────────────────

export interface AlertSubscription {
  id: string
  unsubscribe(): void
}

// ─── Bus Stats ────────────────────────────────────────────────────────────────

export interface AlertBusStats {
  alerts_published: number
  alerts_delivered: number      // Sync returns, plus async callbacks once resolved
  callback_failures: number     // Throws and rejections caught by the bulkhead
  active_subscriptions: number
}

// ─── Alert Bus ────────────────────────────────────────────────────────────────

export class AlertBus {
  // Map iteration order is insertion order, i.e. registration order
  private subscriptions = new Map<string, AlertCallback>()
  private stats: AlertBusStats = {
    alerts_published: 0,
    alerts_delivered: 0,
    callback_failures: 0,
    active_subscriptions: 0,
  }

  constructor(private readonly logger: Logger = createConsoleLogger('alert-bus')) {}

  /**
   * Register a callback. Returns a handle with an unsubscribe() method.
   * The same function registered twice is invoked twice.
   */
  register(callback: AlertCallback): AlertSubscription {
    const id = uuidv4()
    this.subscriptions.set(id, callback)
    this.stats.active_subscriptions++

    return {
      id,
      unsubscribe: () => {
        if (!this.subscriptions.delete(id)) return
        this.stats.active_subscriptions--
      },
    }
  }

  /**
   * Log the alert, then hand it to every callback in registration order.
   * Never throws.
   */
  publish(alert: Alert): void {
    this.stats.alerts_published++
    this.logAlert(alert)

    // Snapshot: a callback may unsubscribe while we iterate
    const callbacks = [...this.subscriptions.values()]

    for (const callback of callbacks) {
      try {
        const result = callback(alert)
        if (result instanceof Promise) {
          // Counted once it settles, as delivered or as a failure
          result.then(
            () => { this.stats.alerts_delivered++ },
            (err: unknown) => this.recordFailure(alert, err)
          )
        } else {
          this.stats.alerts_delivered++
        }
      } catch (err) {
        // BULKHEAD: one failing callback never starves the others
        this.recordFailure(alert, err)
      }
    }
  }

  getStats(): AlertBusStats {
    return { ...this.stats }
  }

  private recordFailure(alert: Alert, err: unknown): void {
    this.stats.callback_failures++
    this.logger.error(
      `Callback for ${alert.kind} (${alert.alert_id}) failed:`,
      err instanceof Error ? err.message : err
    )
  }

  private logAlert(alert: Alert): void {
    const { kind, severity, ...details } = alert
    const line = `ALERT ${kind} [${severity}] ${JSON.stringify(details)}`
    if (kind === 'cryptographic_apoptosis') this.logger.error(line)
    else this.logger.warn(line)
  }
}

/**
 * @shardwatch/enforcer — Thermodynamic Enforcer
 *
 * Watches key-shard storage for signs of compromise and destroys any shard
 * that fails a check ("cryptographic apoptosis").
 *
 * Every cycle:
 *   1. Ambient drift   — probe reading vs baseline. Moderate drift (< 2x the
 *                        threshold) is adopted as the new baseline; large
 *                        drift is alerted and the baseline is held.
 *   2. Entropy pass    — shard below the entropy threshold → alert, then
 *                        overwrite with 1024 random bytes.
 *   3. Regularity pass — shard with bit-balance or repetition structure →
 *                        alert, then overwrite with 2048 random bytes.
 *
 * Lifecycle:
 *   start()  → run a cycle now, then every check_interval_seconds
 *   stop()   → interrupt the sleep, resolve once the loop and every cycle
 *              queued before the call (nudges included) have finished
 *   nudge()  → force a cycle outside the schedule
 *
 * Bulkhead: a failing shard read, a failing overwrite or a throwing alert
 * callback never ends the loop. Only stop() does. A failed overwrite is not
 * retried in the same cycle; the next cycle re-checks the shard.
 *
 * Cycles are serialized — a nudge() during a scheduled cycle waits its turn.
 */

import { randomBytes } from 'crypto'
import { setTimeout as sleep } from 'timers/promises'
import { v4 as uuidv4 } from 'uuid'
import {
  AlertSeverity,
  createConsoleLogger,
  type Alert,
  type AlertCallback,
  type ApoptosisReason,
  type CryptographicApoptosisAlert,
  type EntropyViolationAlert,
  type Logger,
  type RegularityDetectedAlert,
  type TemperatureViolationAlert,
} from '@shardwatch/types'
import { AlertBus, envelope, type AlertBusStats, type AlertSubscription } from '@shardwatch/alert-bus'
import { analyzeRegularity, shannonEntropy, type RegularityFinding } from '@shardwatch/entropy'
import {
  FailSafeProbe,
  SyntheticTemperatureProbe,
  type EnvironmentProbe,
} from '@shardwatch/environment-probe'
import { ShardNotFoundError, type ShardStore } from '@shardwatch/shard-store'
import { parseEnforcerConfig, type EnforcerConfig, type EnforcerConfigInput } from './config'

export const ALERT_SOURCE = 'shardwatch.enforcer'
export const ENTROPY_REMEDIATION_BYTES = 1024
export const BACKDOOR_REMEDIATION_BYTES = 2048

// ─── Types ────────────────────────────────────────────────────────────────────

export type MonitoringLifecycle = 'STOPPED' | 'RUNNING'

export interface EnforcerDeps {
  store: ShardStore
  probe?: EnvironmentProbe      // Defaults to the synthetic temperature probe
  bus?: AlertBus
  logger?: Logger
  random?: (size: number) => Uint8Array
}

export interface CycleReport {
  cycle_id: string
  started_at: string
  finished_at: string
  shards_read: number
  shards_skipped: number        // Reads that failed, counted per pass
  alerts_published: number
  remediations_attempted: number
  remediations_failed: number
}

export interface EnforcerState {
  lifecycle: MonitoringLifecycle
  baseline: number
  cycles_completed: number
  last_cycle: CycleReport | null
  bus: AlertBusStats
}

export interface ShardScanReport {
  shard: string
  bytes: number
  entropy: number
  entropy_ok: boolean
  regularity: RegularityFinding | null
}

// Per-cycle working state; never outlives the cycle
interface CycleContext {
  report: CycleReport
  remediated: Set<string>
}

// ─── Enforcer ─────────────────────────────────────────────────────────────────

export class ThermodynamicEnforcer {
  readonly config: EnforcerConfig
  private readonly store: ShardStore
  private readonly probe: EnvironmentProbe
  private readonly bus: AlertBus
  private readonly logger: Logger
  private readonly random: (size: number) => Uint8Array

  // Mutated only inside a cycle, or by setBaseline() while STOPPED
  private baseline: number

  private lifecycle: MonitoringLifecycle = 'STOPPED'
  private abort: AbortController | null = null
  private loop: Promise<void> | null = null
  private stopping: Promise<void> | null = null
  // Tail of the cycle queue; every cycle chains onto the previous one
  private tail: Promise<unknown> = Promise.resolve()
  private cycles_completed = 0
  private last_cycle: CycleReport | null = null

  constructor(config: EnforcerConfigInput, deps: EnforcerDeps) {
    this.config = parseEnforcerConfig(config)
    this.logger = deps.logger ?? createConsoleLogger('enforcer')
    this.store  = deps.store
    this.bus    = deps.bus ?? new AlertBus(this.logger)
    this.random = deps.random ?? randomBytes
    this.probe  = new FailSafeProbe(
      deps.probe ?? new SyntheticTemperatureProbe({ logger: this.logger }),
      undefined,
      this.logger
    )

    this.baseline = this.probe.read()

    this.logger.info(
      `Initialized — entropy threshold ${this.config.entropy_threshold} bits/byte, ` +
      `temperature threshold ${this.config.temperature_variance_threshold}, ` +
      `interval ${this.config.check_interval_seconds}s, ` +
      `watching ${this.config.shard_ids.length} shard(s)`
    )
    this.logger.info(`Temperature baseline: ${this.baseline}`)
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  start(): void {
    if (this.lifecycle === 'RUNNING') {
      this.logger.warn('Monitoring is already active')
      return
    }

    const abort = new AbortController()
    this.lifecycle = 'RUNNING'
    this.abort = abort
    this.loop = this.monitoringLoop(abort.signal).catch((err: unknown) => {
      this.logger.error('Monitoring loop crashed:', errorMessage(err))
    })
    this.logger.info('Monitoring started')
  }

  async stop(): Promise<void> {
    if (this.lifecycle === 'STOPPED') {
      this.logger.warn('Monitoring is not active')
      // A stop() already in flight still has to finish before we return
      if (this.stopping) await this.stopping
      return
    }

    this.lifecycle = 'STOPPED'
    const abort = this.abort
    const loop  = this.loop
    this.abort  = null
    this.loop   = null

    // Cycles already queued (including nudges) finish before stop() resolves
    this.stopping = this.awaitLoopExit(abort, loop, this.tail)
    try {
      await this.stopping
    } finally {
      this.stopping = null
    }
    this.logger.info('Monitoring stopped')
  }

  isRunning(): boolean {
    return this.lifecycle === 'RUNNING'
  }

  // ─── Public Operations ──────────────────────────────────────────────────────

  registerAlertCallback(callback: AlertCallback): AlertSubscription {
    return this.bus.register(callback)
  }

  /** Force an immediate cycle. Waits for any cycle already in flight first. */
  nudge(): Promise<CycleReport> {
    return this.enqueueCycle()
  }

  getBaseline(): number {
    return this.baseline
  }

  /**
   * Replace the baseline. Only honoured while STOPPED — once the loop runs,
   * the baseline belongs to the cycle.
   */
  setBaseline(value: number): void {
    if (!Number.isFinite(value)) throw new RangeError(`Baseline must be finite, got ${value}`)
    if (this.lifecycle === 'RUNNING') {
      this.logger.warn('Baseline is owned by the running monitor — stop() before setting it')
      return
    }
    this.logger.info(`Temperature baseline set to ${value} (was ${this.baseline})`)
    this.baseline = value
  }

  getState(): EnforcerState {
    return {
      lifecycle:        this.lifecycle,
      baseline:         this.baseline,
      cycles_completed: this.cycles_completed,
      last_cycle:       this.last_cycle ? { ...this.last_cycle } : null,
      bus:              this.bus.getStats(),
    }
  }

  /** Read-only report for one shard: no alerts, no remediation. */
  async scanShard(shard: string): Promise<ShardScanReport> {
    const data = await this.store.readAll(shard)
    const entropy = shannonEntropy(data)
    return {
      shard,
      bytes:      data.length,
      entropy,
      entropy_ok: entropy >= this.config.entropy_threshold,
      regularity: analyzeRegularity(data),
    }
  }

  // ─── Loop ───────────────────────────────────────────────────────────────────

  private async monitoringLoop(signal: AbortSignal): Promise<void> {
    this.logger.info('Monitoring loop started')

    while (!signal.aborted) {
      await this.enqueueCycle()
      if (signal.aborted) break

      try {
        await sleep(this.config.check_interval_seconds * 1000, undefined, { signal })
      } catch (err) {
        // Abort is the expected way out of the sleep
        if (!signal.aborted) this.logger.error('Sleep ended unexpectedly:', errorMessage(err))
      }
    }

    this.logger.info('Monitoring loop exited')
  }

  private async awaitLoopExit(
    abort: AbortController | null,
    loop: Promise<void> | null,
    queue: Promise<unknown>
  ): Promise<void> {
    abort?.abort()

    const timeout = new AbortController()
    try {
      const exited = await Promise.race([
        Promise.all([loop, queue]).then(() => true),
        sleep(this.config.stop_timeout_ms, false, { signal: timeout.signal }),
      ])
      if (!exited) {
        this.logger.error(`Monitoring loop did not exit within ${this.config.stop_timeout_ms}ms`)
      }
    } finally {
      timeout.abort()
    }
  }

  private enqueueCycle(): Promise<CycleReport> {
    const run = this.tail.then(() => this.runCycle())
    // The caller gets the rejection; the queue must keep moving
    this.tail = run.catch(() => undefined)
    return run
  }

  // ─── Cycle ──────────────────────────────────────────────────────────────────

  private async runCycle(): Promise<CycleReport> {
    const ctx: CycleContext = {
      report: {
        cycle_id:               uuidv4(),
        started_at:             new Date().toISOString(),
        finished_at:            '',
        shards_read:            0,
        shards_skipped:         0,
        alerts_published:       0,
        remediations_attempted: 0,
        remediations_failed:    0,
      },
      remediated: new Set(),
    }

    const steps: Array<[string, (ctx: CycleContext) => Promise<void> | void]> = [
      ['ambient temperature', c => this.checkAmbientTemperature(c)],
      ['shard entropy',       c => this.checkShardEntropy(c)],
      ['shard regularity',    c => this.checkShardRegularity(c)],
    ]

    for (const [name, step] of steps) {
      try {
        await step(ctx)
      } catch (err) {
        // Never let one check end the cycle
        this.logger.error(`Error during ${name} check:`, errorMessage(err))
      }
    }

    const report = ctx.report
    report.finished_at = new Date().toISOString()
    this.cycles_completed++
    this.last_cycle = report

    this.logger.info(
      `Cycle ${report.cycle_id} complete — ${report.shards_read} read, ` +
      `${report.shards_skipped} skipped, ${report.alerts_published} alert(s), ` +
      `${report.remediations_attempted} remediation(s) (${report.remediations_failed} failed)`
    )
    return { ...report }
  }

  // ─── Step 1: Ambient Temperature ────────────────────────────────────────────

  private checkAmbientTemperature(ctx: CycleContext): void {
    const threshold = this.config.temperature_variance_threshold
    const current = this.probe.read()
    const delta = Math.abs(current - this.baseline)

    this.logger.debug(`Current temperature ${current}, delta ${delta}`)
    if (delta <= threshold) return

    const adapt = delta < threshold * 2
    const alert: TemperatureViolationAlert = {
      ...envelope(ctx.report.cycle_id, ALERT_SOURCE),
      kind:             'temperature_violation',
      severity:         adapt ? AlertSeverity.MEDIUM : AlertSeverity.HIGH,
      baseline:         this.baseline,
      current,
      delta,
      threshold,
      baseline_adapted: adapt,
    }
    this.publish(ctx, alert)

    if (adapt) {
      this.logger.info(`Updating temperature baseline to ${current} (was ${this.baseline})`)
      this.baseline = current
    } else {
      this.logger.warn(
        `Temperature drift ${delta} is at least twice the threshold — baseline held at ${this.baseline}`
      )
    }
  }

  // ─── Step 2: Entropy ────────────────────────────────────────────────────────

  private async checkShardEntropy(ctx: CycleContext): Promise<void> {
    const threshold = this.config.entropy_threshold

    for (const shard of this.config.shard_ids) {
      try {
        const data = await this.readShard(ctx, shard)
        if (!data) continue

        const entropy = shannonEntropy(data)
        this.logger.info(`Shard ${shard}: entropy ${entropy.toFixed(4)} bits/byte (${data.length} bytes)`)
        if (entropy >= threshold) continue

        const alert: EntropyViolationAlert = {
          ...envelope(ctx.report.cycle_id, ALERT_SOURCE),
          kind:     'entropy_violation',
          severity: AlertSeverity.HIGH,
          shard,
          entropy,
          threshold,
        }
        this.publish(ctx, alert)
        await this.apoptosis(ctx, shard, 'entropy_violation', ENTROPY_REMEDIATION_BYTES, entropy)
      } catch (err) {
        this.logger.error(`Error checking entropy of shard ${shard}:`, errorMessage(err))
      }
    }
  }

  // ─── Step 3: Regularity ─────────────────────────────────────────────────────

  private async checkShardRegularity(ctx: CycleContext): Promise<void> {
    for (const shard of this.config.shard_ids) {
      // Content is now our own random fill, or a failed write we must not retry this cycle
      if (ctx.remediated.has(shard)) {
        this.logger.debug(`Shard ${shard}: already remediated this cycle, regularity check deferred`)
        continue
      }

      try {
        const data = await this.readShard(ctx, shard)
        if (!data) continue

        const finding = analyzeRegularity(data)
        if (!finding) {
          this.logger.info(`Shard ${shard}: no regularity`)
          continue
        }

        const alert: RegularityDetectedAlert = {
          ...envelope(ctx.report.cycle_id, ALERT_SOURCE),
          kind:     'regularity_detected',
          severity: AlertSeverity.CRITICAL,
          shard,
          finding:  finding.kind,
        }
        this.publish(ctx, alert)
        this.logger.error(`MATHEMATICAL BACKDOOR suspected in shard ${shard}:`, JSON.stringify(finding))
        await this.apoptosis(ctx, shard, 'mathematical_backdoor', BACKDOOR_REMEDIATION_BYTES)
      } catch (err) {
        this.logger.error(`Error checking regularities in shard ${shard}:`, errorMessage(err))
      }
    }
  }

  // ─── Remediation ────────────────────────────────────────────────────────────

  private async apoptosis(
    ctx: CycleContext,
    shard: string,
    reason: ApoptosisReason,
    size: number,
    entropy?: number
  ): Promise<void> {
    this.logger.error(`CRYPTOGRAPHIC APOPTOSIS INITIATED on shard ${shard} (${reason})`)

    const alert: CryptographicApoptosisAlert = {
      ...envelope(ctx.report.cycle_id, ALERT_SOURCE),
      kind:            'cryptographic_apoptosis',
      severity:        AlertSeverity.CRITICAL,
      shard,
      reason,
      overwrite_bytes: size,
      ...(entropy !== undefined ? { entropy } : {}),
    }
    this.publish(ctx, alert)

    ctx.remediated.add(shard)
    ctx.report.remediations_attempted++

    try {
      await this.store.overwrite(shard, this.random(size))
      this.logger.info(`Shard ${shard} has been invalidated (${size} random bytes)`)
    } catch (err) {
      ctx.report.remediations_failed++
      this.logger.error(`Failed to invalidate shard ${shard}:`, errorMessage(err))
    }
  }

  // ─── Helpers ────────────────────────────────────────────────────────────────

  private async readShard(ctx: CycleContext, shard: string): Promise<Uint8Array | null> {
    try {
      const data = await this.store.readAll(shard)
      ctx.report.shards_read++
      return data
    } catch (err) {
      ctx.report.shards_skipped++
      if (err instanceof ShardNotFoundError) this.logger.warn(`Shard not found: ${shard}`)
      else this.logger.error(`Failed to read shard ${shard}:`, errorMessage(err))
      return null
    }
  }

  private publish(ctx: CycleContext, alert: Alert): void {
    this.bus.publish(alert)
    ctx.report.alerts_published++
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Fail-Safe Probe
 *
 * Bulkhead around any provider. A provider that throws or returns a
 * non-finite value is answered with the last good reading (or the fixed
 * fallback if none has been seen yet). The enforcer always wraps its probe
 * in one of these.
 */

import { createConsoleLogger, type Logger } from '@shardwatch/types'
import { DEFAULT_FALLBACK_CELSIUS, type EnvironmentProbe } from './types'

export class FailSafeProbe implements EnvironmentProbe {
  private lastGood: number | null = null
  private failures = 0

  constructor(
    private readonly inner: EnvironmentProbe,
    private readonly fallback: number = DEFAULT_FALLBACK_CELSIUS,
    private readonly logger: Logger = createConsoleLogger('environment-probe'),
  ) {}

  read(): number {
    try {
      const value = this.inner.read()
      if (!Number.isFinite(value)) throw new Error(`non-finite reading: ${value}`)
      this.lastGood = value
      return value
    } catch (err) {
      this.failures++
      const substitute = this.lastGood ?? this.fallback
      this.logger.warn(
        `Probe failure #${this.failures}, substituting ${substitute}:`,
        err instanceof Error ? err.message : err
      )
      return substitute
    }
  }

  get failureCount(): number {
    return this.failures
  }
}

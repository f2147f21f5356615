/**
 * Synthetic Temperature Probe
 *
 * Stand-in for a hardware sensor: a uniform reading in [20, 25) °C drawn
 * from OS randomness. If the randomness source fails the probe answers
 * with the fixed fallback instead of throwing.
 */

import { randomBytes } from 'crypto'
import { createConsoleLogger, type Logger } from '@shardwatch/types'
import { DEFAULT_FALLBACK_CELSIUS, type EnvironmentProbe } from './types'

export interface SyntheticProbeOptions {
  min_celsius?: number
  span_celsius?: number
  fallback_celsius?: number
  random?: (size: number) => Uint8Array
  logger?: Logger
}

export class SyntheticTemperatureProbe implements EnvironmentProbe {
  private readonly min: number
  private readonly span: number
  private readonly fallback: number
  private readonly random: (size: number) => Uint8Array
  private readonly logger: Logger

  constructor(options: SyntheticProbeOptions = {}) {
    this.min      = options.min_celsius ?? 20
    this.span     = options.span_celsius ?? 5
    this.fallback = options.fallback_celsius ?? DEFAULT_FALLBACK_CELSIUS
    this.random   = options.random ?? randomBytes
    this.logger   = options.logger ?? createConsoleLogger('environment-probe')
  }

  read(): number {
    try {
      const bytes = this.random(4)
      if (bytes.length < 4) throw new Error(`short read: ${bytes.length} bytes`)
      const unit = new DataView(bytes.buffer, bytes.byteOffset, 4).getUint32(0) / 2 ** 32
      return this.min + unit * this.span
    } catch (err) {
      this.logger.warn(
        `Synthetic reading failed, using fallback ${this.fallback}°C:`,
        err instanceof Error ? err.message : err
      )
      return this.fallback
    }
  }
}

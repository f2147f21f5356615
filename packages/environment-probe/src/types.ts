/**
 * @shardwatch/environment-probe — Core Types
 *
 * An EnvironmentProbe returns the current ambient reading (°C for the
 * bundled temperature probes). The enforcer treats it as an opaque, noisy
 * real-valued source.
 *
 * Contract:
 *   - read() never blocks and never throws
 *   - a provider that loses its sensor returns the last good reading
 *     or a fixed fallback. Losing the sensor must not halt monitoring.
 */

export interface EnvironmentProbe {
  read(): number
}

export const DEFAULT_FALLBACK_CELSIUS = 22.5

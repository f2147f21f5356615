/**
 * @shardwatch/enforcer — Configuration
 *
 * Construction-time only. Validated once, then frozen — the enforcer never
 * re-reads or mutates it while monitoring.
 */

import { z } from 'zod'

export const DEFAULT_ENTROPY_THRESHOLD = 7.2              // bits/byte
export const DEFAULT_TEMPERATURE_VARIANCE_THRESHOLD = 1.0 // probe units (°C)
export const DEFAULT_CHECK_INTERVAL_SECONDS = 60
export const DEFAULT_STOP_TIMEOUT_MS = 5_000

export const enforcerConfigSchema = z.object({
  entropy_threshold: z.number().min(0).max(8).default(DEFAULT_ENTROPY_THRESHOLD),
  temperature_variance_threshold: z.number().positive().finite().default(DEFAULT_TEMPERATURE_VARIANCE_THRESHOLD),
  check_interval_seconds: z.number().int().min(1).default(DEFAULT_CHECK_INTERVAL_SECONDS),
  shard_ids: z
    .array(z.string().min(1, 'shard id must not be empty'))
    .refine(ids => new Set(ids).size === ids.length, 'shard ids must be unique')
    .default([]),
  // Bounded wait for stop() to observe the loop exiting
  stop_timeout_ms: z.number().int().positive().default(DEFAULT_STOP_TIMEOUT_MS),
})

export type EnforcerConfigInput = z.input<typeof enforcerConfigSchema>

export interface EnforcerConfig {
  readonly entropy_threshold: number
  readonly temperature_variance_threshold: number
  readonly check_interval_seconds: number
  readonly shard_ids: readonly string[]
  readonly stop_timeout_ms: number
}

export class EnforcerConfigError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super(
      'Invalid enforcer configuration: ' +
      issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
    )
    this.name = 'EnforcerConfigError'
  }
}

export function parseEnforcerConfig(input: EnforcerConfigInput = {}): EnforcerConfig {
  const result = enforcerConfigSchema.safeParse(input)
  if (!result.success) throw new EnforcerConfigError(result.error.issues)

  return Object.freeze({
    ...result.data,
    shard_ids: Object.freeze([...result.data.shard_ids]),
  })
}

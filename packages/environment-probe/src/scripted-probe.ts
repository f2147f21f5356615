/**
 * Scripted Probe
 *
 * Replays a fixed sequence of readings, then holds the last one.
 * Used by tests and demos to stage drift deterministically.
 */

import type { EnvironmentProbe } from './types'

export class ScriptedProbe implements EnvironmentProbe {
  private readonly readings: number[]
  private cursor = 0
  private reads = 0

  constructor(readings: number[]) {
    if (readings.length === 0) throw new Error('ScriptedProbe needs at least one reading')
    this.readings = [...readings]
  }

  read(): number {
    const value = this.readings[Math.min(this.cursor, this.readings.length - 1)]
    this.cursor++
    this.reads++
    return value
  }

  /** Queue more readings after the current position. */
  push(...readings: number[]): void {
    // Drop anything already consumed so the next read returns the first pushed value
    const remaining = this.readings.slice(Math.min(this.cursor, this.readings.length))
    this.readings.splice(0, this.readings.length, ...remaining, ...readings)
    this.cursor = 0
  }

  get readsTaken(): number {
    return this.reads
  }
}

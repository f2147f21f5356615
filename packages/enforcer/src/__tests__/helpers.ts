import type { Alert, Logger } from '@shardwatch/types'

export interface LogLine {
  level: 'debug' | 'info' | 'warn' | 'error'
  message: string
}

export function captureLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = []
  const push = (level: LogLine['level']) => (message: string) => { lines.push({ level, message }) }
  return {
    logger: { debug: push('debug'), info: push('info'), warn: push('warn'), error: push('error') },
    lines,
  }
}

/** Every byte value in turn: entropy 8, set-bit fraction exactly 0.5. */
export const sequentialFill = (size: number) => Uint8Array.from({ length: size }, (_, i) => i & 0xff)

export const lowEntropyShard = () => new TextEncoder().encode('abc'.repeat(300))

export function collectAlerts(): { alerts: Alert[]; callback: (alert: Alert) => void } {
  const alerts: Alert[] = []
  return { alerts, callback: (alert) => { alerts.push(alert) } }
}

export async function waitFor(predicate: () => boolean, timeout_ms = 2_000): Promise<void> {
  const deadline = Date.now() + timeout_ms
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error(`condition not met within ${timeout_ms}ms`)
    await new Promise<void>((resolve) => setTimeout(resolve, 10))
  }
}

export const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

export function ofKind<K extends Alert['kind']>(alerts: Alert[], kind: K): Array<Extract<Alert, { kind: K }>> {
  return alerts.filter((alert): alert is Extract<Alert, { kind: K }> => alert.kind === kind)
}

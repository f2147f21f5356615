import { describe, it } from 'node:test'
import assert from 'node:assert/strict'

import { AlertSeverity, type Alert, type Logger } from '@shardwatch/types'
import { AlertBus } from '../alert-bus'
import { envelope } from '../publisher'

function captureLogger() {
  const lines: Array<{ level: string; message: string }> = []
  const push = (level: string) => (message: string) => { lines.push({ level, message }) }
  const logger: Logger = {
    debug: push('debug'),
    info:  push('info'),
    warn:  push('warn'),
    error: push('error'),
  }
  return { logger, lines }
}

function sampleAlert(): Alert {
  return {
    ...envelope('cycle-1', 'test'),
    kind: 'entropy_violation',
    severity: AlertSeverity.HIGH,
    shard: 'shard-a',
    entropy: 1.5,
    threshold: 7.2,
  }
}

describe('envelope', () => {
  it('stamps id, cycle, time and source', () => {
    const env = envelope('cycle-9', 'shardwatch.enforcer')
    assert.equal(env.cycle_id, 'cycle-9')
    assert.equal(env.source, 'shardwatch.enforcer')
    assert.match(env.alert_id, /^[0-9a-f-]{36}$/)
    assert.ok(!Number.isNaN(Date.parse(env.timestamp)))
  })
})

describe('AlertBus', () => {
  it('invokes callbacks in registration order', () => {
    const bus = new AlertBus(captureLogger().logger)
    const order: string[] = []
    bus.register(() => { order.push('first') })
    bus.register(() => { order.push('second') })
    bus.register(() => { order.push('third') })

    bus.publish(sampleAlert())

    assert.deepEqual(order, ['first', 'second', 'third'])
  })

  it('keeps delivering after a callback throws', () => {
    const { logger, lines } = captureLogger()
    const bus = new AlertBus(logger)
    const received: string[] = []
    bus.register(() => { throw new Error('pager offline') })
    bus.register((alert) => { received.push(alert.kind) })

    bus.publish(sampleAlert())
    bus.publish(sampleAlert())

    assert.deepEqual(received, ['entropy_violation', 'entropy_violation'])
    const stats = bus.getStats()
    assert.equal(stats.alerts_published, 2)
    assert.equal(stats.alerts_delivered, 2)
    assert.equal(stats.callback_failures, 2)
    assert.equal(lines.filter(l => l.level === 'error' && l.message.startsWith('Callback for entropy_violation')).length, 2)
  })

  it('logs a rejected async callback without blocking publish', async () => {
    const { logger, lines } = captureLogger()
    const bus = new AlertBus(logger)
    bus.register(async () => { throw new Error('sink unreachable') })

    bus.publish(sampleAlert())
    await new Promise<void>((resolve) => setImmediate(resolve))

    assert.equal(bus.getStats().callback_failures, 1)
    assert.equal(bus.getStats().alerts_delivered, 0)
    assert.ok(lines.some(l => l.level === 'error' && l.message.startsWith('Callback for entropy_violation')))
  })

  it('counts an async callback as delivered only once it resolves', async () => {
    const bus = new AlertBus(captureLogger().logger)
    let release: () => void = () => undefined
    bus.register(() => new Promise<void>((resolve) => { release = resolve }))

    bus.publish(sampleAlert())
    assert.equal(bus.getStats().alerts_delivered, 0)

    release()
    await new Promise<void>((resolve) => setImmediate(resolve))

    const stats = bus.getStats()
    assert.equal(stats.alerts_delivered, 1)
    assert.equal(stats.callback_failures, 0)
  })

  it('logs every alert, apoptosis at error level', () => {
    const { logger, lines } = captureLogger()
    const bus = new AlertBus(logger)

    bus.publish(sampleAlert())
    bus.publish({
      ...envelope('cycle-1', 'test'),
      kind: 'cryptographic_apoptosis',
      severity: AlertSeverity.CRITICAL,
      shard: 'shard-a',
      reason: 'entropy_violation',
      overwrite_bytes: 1024,
      entropy: 1.5,
    })

    assert.equal(lines.length, 2)
    assert.equal(lines[0].level, 'warn')
    assert.ok(lines[0].message.startsWith('ALERT entropy_violation [HIGH] '))
    assert.equal(lines[1].level, 'error')
    assert.ok(lines[1].message.startsWith('ALERT cryptographic_apoptosis [CRITICAL] '))
  })

  it('stops delivering after unsubscribe', () => {
    const bus = new AlertBus(captureLogger().logger)
    let calls = 0
    const sub = bus.register(() => { calls++ })

    bus.publish(sampleAlert())
    sub.unsubscribe()
    sub.unsubscribe()
    bus.publish(sampleAlert())

    assert.equal(calls, 1)
    assert.equal(bus.getStats().active_subscriptions, 0)
  })

  it('delivers twice to a callback registered twice', () => {
    const bus = new AlertBus(captureLogger().logger)
    let calls = 0
    const cb = () => { calls++ }
    bus.register(cb)
    bus.register(cb)

    bus.publish(sampleAlert())

    assert.equal(calls, 2)
  })
})

import { describe, it, after } from 'node:test'
import assert from 'node:assert/strict'
import { mkdtemp, readFile, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'

import { AlertSeverity, type Alert } from '@shardwatch/types'
import { createAlertLogSink, describeAlert } from '../alert-output'

const base = {
  alert_id:  'a1',
  cycle_id:  'c1',
  timestamp: '2026-01-01T00:00:00.000Z',
  source:    'shardwatch.enforcer',
}

const drift: Alert = {
  ...base, kind: 'temperature_violation', severity: AlertSeverity.MEDIUM,
  baseline: 22, current: 23.5, delta: 1.5, threshold: 1, baseline_adapted: true,
}
const entropy: Alert = {
  ...base, kind: 'entropy_violation', severity: AlertSeverity.HIGH,
  shard: 'shard-a', entropy: 1.58496, threshold: 7.2,
}
const regularity: Alert = {
  ...base, kind: 'regularity_detected', severity: AlertSeverity.CRITICAL,
  shard: 'shard-b', finding: 'repetition',
}
const apoptosis: Alert = {
  ...base, kind: 'cryptographic_apoptosis', severity: AlertSeverity.CRITICAL,
  shard: 'shard-b', reason: 'mathematical_backdoor', overwrite_bytes: 2048,
}

describe('describeAlert', () => {
  it('summarises each alert kind', () => {
    assert.equal(describeAlert(drift), 'temperature drift 1.50 (baseline 22.00 → 23.50, threshold 1) — baseline adapted')
    assert.equal(describeAlert(entropy), 'shard-a: entropy 1.585 below 7.2 bits/byte')
    assert.equal(describeAlert(regularity), 'shard-b: repetition regularity')
    assert.equal(describeAlert(apoptosis), 'shard-b: overwritten with 2048 random bytes (mathematical_backdoor)')
  })

  it('omits the adaptation note for held baselines', () => {
    const held: Alert = { ...base, kind: 'temperature_violation', severity: AlertSeverity.HIGH,
      baseline: 22, current: 25, delta: 3, threshold: 1, baseline_adapted: false }
    assert.equal(describeAlert(held), 'temperature drift 3.00 (baseline 22.00 → 25.00, threshold 1)')
  })
})

describe('createAlertLogSink', () => {
  let dir = ''
  after(async () => { if (dir) await rm(dir, { recursive: true, force: true }) })

  it('appends one JSON line per alert in publish order', async () => {
    dir = await mkdtemp(join(tmpdir(), 'shardwatch-cli-'))
    const path = join(dir, 'alerts.jsonl')
    const sink = createAlertLogSink(path)

    const first = sink(entropy)
    const second = sink(apoptosis)
    await Promise.all([first, second])

    const lines = (await readFile(path, 'utf8')).split('\n')
    assert.equal(lines.length, 3)
    assert.equal(lines[2], '')
    assert.deepEqual(JSON.parse(lines[0]), entropy)
    assert.deepEqual(JSON.parse(lines[1]), apoptosis)
  })

  it('rejects when the file cannot be written, then keeps going', async () => {
    const blocked = await mkdtemp(join(tmpdir(), 'shardwatch-cli-'))
    try {
      // A directory cannot be appended to
      const sink = createAlertLogSink(blocked)
      await assert.rejects(Promise.resolve(sink(entropy)))
      await assert.rejects(Promise.resolve(sink(entropy)))
    } finally {
      await rm(blocked, { recursive: true, force: true })
    }
  })
})

#!/usr/bin/env node
/**
 * ShardWatch Operator CLI
 *
 * Commands:
 *   shardwatch monitor <shards...>     — run the enforcer until Ctrl-C
 *   shardwatch scan <shards...>        — read-only entropy/regularity report
 *   shardwatch apoptosis <shard>       — destroy a shard by hand
 *   shardwatch shard [key-file]        — split a key into shard files
 *   shardwatch reconstruct <shards...> — recombine shard files into the key
 *   shardwatch config show             — show stored defaults
 *   shardwatch config set <key> <val>  — change a stored default
 *   shardwatch config reset            — restore built-in defaults
 */

import { randomBytes } from 'crypto'
import { readFile } from 'fs/promises'
import { Command } from 'commander'
import chalk from 'chalk'
import ora from 'ora'
import inquirer from 'inquirer'
import {
  BACKDOOR_REMEDIATION_BYTES,
  EnforcerConfigError,
  ThermodynamicEnforcer,
  type EnforcerConfigInput,
} from '@shardwatch/enforcer'
import { FileShardStore, ShardStoreError } from '@shardwatch/shard-store'
import { KeyShardingError, TimelockKeySharding } from '@shardwatch/key-sharding'
import { AlertSeverity, createConsoleLogger, type Alert, type Logger } from '@shardwatch/types'
import { config } from './config'
import { isSettingKey, SettingError } from './settings'
import { createAlertLogSink, describeAlert } from './alert-output'
import { readShardFiles, writeShardFiles } from './shard-files'

const program = new Command()

// ─── Helpers ──────────────────────────────────────────────────────────────────

const $ = chalk
const ok   = (msg: string) => console.log($.green('✓'), msg)
const warn = (msg: string) => console.log($.yellow('⚠'), msg)
const fail = (msg: string): never => { console.error($.red('✗'), msg); process.exit(1) }

// Enforcer chatter would tear through the spinner; keep warnings and errors
function quietLogger(scope: string): Logger {
  const inner = createConsoleLogger(scope)
  return { debug: () => undefined, info: () => undefined, warn: inner.warn, error: inner.error }
}

function fmtSeverity(severity: AlertSeverity): string {
  switch (severity) {
    case AlertSeverity.MEDIUM:   return $.yellow(severity)
    case AlertSeverity.HIGH:     return $.red(severity)
    case AlertSeverity.CRITICAL: return $.bgRed.white(severity)
  }
}

function printAlert(alert: Alert): void {
  console.log(`${$.gray(alert.timestamp)} ${fmtSeverity(alert.severity)} ${$.bold(alert.kind)} ${describeAlert(alert)}`)
}

function table(rows: string[][]): void {
  if (rows.length < 2) return
  const headers = rows[0]
  const data    = rows.slice(1)
  const widths  = headers.map((h, i) =>
    Math.max(h.length, ...data.map(r => (r[i] ?? '').replace(/\x1b\[[0-9;]*m/g, '').length))
  )
  const line = (row: string[]) =>
    row.map((cell, i) => cell.padEnd(widths[i] + 2)).join('')
  console.log($.bold(line(headers)))
  console.log($.gray('─'.repeat(widths.reduce((s, w) => s + w + 2, 0))))
  data.forEach(row => console.log(line(row)))
}

interface EnforcerFlags {
  root?: string
  entropyThreshold?: string
  temperatureThreshold?: string
  interval?: string
}

function enforcerConfig(shard_ids: string[], flags: EnforcerFlags): EnforcerConfigInput {
  const stored = config.all()
  return {
    shard_ids,
    entropy_threshold: flags.entropyThreshold !== undefined
      ? Number(flags.entropyThreshold) : stored.entropy_threshold,
    temperature_variance_threshold: flags.temperatureThreshold !== undefined
      ? Number(flags.temperatureThreshold) : stored.temperature_variance_threshold,
    check_interval_seconds: flags.interval !== undefined
      ? Number(flags.interval) : stored.check_interval_seconds,
  }
}

function buildEnforcer(shards: string[], flags: EnforcerFlags, logger?: Logger): ThermodynamicEnforcer {
  try {
    return new ThermodynamicEnforcer(enforcerConfig(shards, flags), {
      store: new FileShardStore(flags.root),
      logger,
    })
  } catch (e) {
    if (e instanceof EnforcerConfigError) return fail(e.message)
    throw e
  }
}

function withEnforcerFlags(command: Command): Command {
  return command
    .option('--root <dir>',                 'Resolve shard ids against this directory')
    .option('--entropy-threshold <bits>',   'Minimum entropy in bits/byte')
    .option('--temperature-threshold <n>',  'Allowed drift from the baseline')
    .option('--interval <seconds>',         'Seconds between checks')
}

// ─── Program ──────────────────────────────────────────────────────────────────

program
  .name('shardwatch')
  .description('ShardWatch — key-shard integrity monitor')
  .version('0.1.0')

// ─── Monitor ──────────────────────────────────────────────────────────────────

withEnforcerFlags(
  program
    .command('monitor <shards...>')
    .description('Monitor shards until interrupted; failing shards are destroyed')
    .option('--alert-log <path>', 'Append every alert to this file as JSON lines')
).action(async (shards: string[], opts: EnforcerFlags & { alertLog?: string }) => {
  const enforcer = buildEnforcer(shards, opts)
  enforcer.registerAlertCallback(printAlert)

  const alertLog = opts.alertLog ?? config.all().alert_log
  if (alertLog) {
    enforcer.registerAlertCallback(createAlertLogSink(alertLog))
    ok(`Appending alerts to ${alertLog}`)
  }

  enforcer.start()
  ok(`Watching ${shards.length} shard(s) — Ctrl-C to stop`)

  await new Promise<void>((resolve) => {
    process.once('SIGINT', resolve)
    process.once('SIGTERM', resolve)
  })

  const spinner = ora('Stopping monitor…').start()
  await enforcer.stop()
  const state = enforcer.getState()
  spinner.succeed(`Stopped after ${state.cycles_completed} cycle(s)`)
  console.log(`  Alerts published:   ${state.bus.alerts_published}`)
  console.log(`  Callback failures:  ${state.bus.callback_failures}`)
  console.log(`  Final baseline:     ${state.baseline.toFixed(2)}`)
})

// ─── Scan ─────────────────────────────────────────────────────────────────────

withEnforcerFlags(
  program
    .command('scan <shards...>')
    .description('Report entropy and regularity per shard without touching them')
).action(async (shards: string[], opts: EnforcerFlags) => {
  const enforcer = buildEnforcer(shards, opts, quietLogger('scan'))
  const spinner = ora(`Scanning ${shards.length} shard(s)…`).start()

  const rows: string[][] = [['Shard', 'Bytes', 'Entropy', 'Regularity', 'Verdict']]
  let failing = 0
  for (const shard of shards) {
    spinner.text = `Scanning ${shard}…`
    try {
      const report = await enforcer.scanShard(shard)
      const regularity = report.regularity === null
        ? $.gray('none')
        : report.regularity.kind === 'bit_balance'
          ? `bit balance ${report.regularity.set_bit_fraction.toFixed(4)}`
          : `pattern ${report.regularity.pattern_hex} ×${report.regularity.occurrences}`
      const healthy = report.entropy_ok && report.regularity === null
      if (!healthy) failing++
      rows.push([
        shard,
        String(report.bytes),
        report.entropy_ok ? report.entropy.toFixed(3) : $.red(report.entropy.toFixed(3)),
        regularity,
        healthy ? $.green('OK') : $.red('FAIL'),
      ])
    } catch (e) {
      if (!(e instanceof ShardStoreError)) throw e
      failing++
      rows.push([shard, '-', '-', '-', $.yellow(e.name)])
    }
  }
  spinner.stop()

  table(rows)
  console.log()
  if (failing > 0) warn(`${failing} of ${shards.length} shard(s) would be remediated by monitor`)
  else ok(`${shards.length} shard(s) clean`)
})

// ─── Apoptosis ────────────────────────────────────────────────────────────────

program
  .command('apoptosis <shard>')
  .description('Irreversibly overwrite a shard with random bytes')
  .option('--root <dir>',     'Resolve the shard id against this directory')
  .option('--bytes <n>',      'Size of the replacement content', String(BACKDOOR_REMEDIATION_BYTES))
  .option('-y, --yes',        'Skip the confirmation prompt')
  .action(async (shard: string, opts: { root?: string; bytes: string; yes?: boolean }) => {
    const size = Number(opts.bytes)
    if (!Number.isInteger(size) || size < 1) fail(`--bytes must be a positive integer, got ${opts.bytes}`)

    if (!opts.yes) {
      const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
        { type: 'confirm', name: 'proceed', default: false, message: `Destroy ${shard}? This cannot be undone.` },
      ])
      if (!proceed) { warn('Aborted'); return }
    }

    const spinner = ora(`Overwriting ${shard}…`).start()
    try {
      await new FileShardStore(opts.root).overwrite(shard, randomBytes(size))
      spinner.succeed(`${shard} overwritten with ${size} random bytes`)
    } catch (e) {
      spinner.fail(e instanceof Error ? e.message : String(e))
      process.exit(1)
    }
  })

// ─── Sharding ─────────────────────────────────────────────────────────────────

interface ShardingFlags {
  threshold: string
  difficulty: string
  shareBytes: string
}

function buildSharding(flags: ShardingFlags): TimelockKeySharding {
  try {
    return new TimelockKeySharding({
      threshold:   Number(flags.threshold),
      difficulty:  Number(flags.difficulty),
      share_bytes: Number(flags.shareBytes),
    })
  } catch (e) {
    if (e instanceof KeyShardingError) return fail(e.message)
    throw e
  }
}

function withShardingFlags(command: Command): Command {
  return command
    .option('--threshold <n>',   'Shards needed to reconstruct', '3')
    .option('--difficulty <n>',  'Time-lock: 2^n sequential hashes per check', '10')
    .option('--share-bytes <n>', 'Pad every share to at least this size', '1024')
}

withShardingFlags(
  program
    .command('shard [key-file]')
    .description('Split a key into shard files (prompts for the key if no file is given)')
    .requiredOption('--out <dir>', 'Directory to write shard-<n>.bin files into')
    .option('--shares <n>', 'Number of shards to produce', '5')
).action(async (keyFile: string | undefined, opts: ShardingFlags & { out: string; shares: string }) => {
  const sharding = buildSharding(opts)

  let key: Uint8Array | string
  if (keyFile) {
    key = new Uint8Array(await readFile(keyFile))
  } else {
    const answers = await inquirer.prompt<{ key: string }>([
      { type: 'password', name: 'key', message: 'Key to shard:', mask: '*' },
    ])
    key = answers.key
  }

  const spinner = ora('Sharding key…').start()
  try {
    const shards = sharding.shard(key, Number(opts.shares))
    const paths = await writeShardFiles(opts.out, shards)
    spinner.succeed(`${paths.length} shard(s) written, any ${sharding.options.threshold} reconstruct the key`)
    paths.forEach(path => console.log(`  ${path}`))
    if (!sharding.checkShardEntropy(shards)) {
      warn('Shards fail the entropy screen; monitor will destroy them. Raise --share-bytes.')
    }
  } catch (e) {
    spinner.fail(e instanceof Error ? e.message : String(e))
    process.exit(1)
  }
})

withShardingFlags(
  program
    .command('reconstruct <shards...>')
    .description('Recombine shard files and print the key')
).action(async (files: string[], opts: ShardingFlags) => {
  const sharding = buildSharding(opts)
  const spinner = ora(`Recombining ${files.length} shard(s)…`).start()
  try {
    const key = sharding.reconstruct(await readShardFiles(files))
    spinner.succeed('Key reconstructed and verified')
    process.stdout.write(Buffer.from(key))
    process.stdout.write('\n')
  } catch (e) {
    spinner.fail(e instanceof Error ? e.message : String(e))
    process.exit(1)
  }
})

// ─── Config ───────────────────────────────────────────────────────────────────

const cfg = program.command('config').description('Manage stored monitoring defaults')

cfg
  .command('show')
  .description('Show stored defaults')
  .action(() => {
    const current = config.all()
    console.log()
    console.log(`  Entropy threshold:      ${current.entropy_threshold} bits/byte`)
    console.log(`  Temperature threshold:  ${current.temperature_variance_threshold}`)
    console.log(`  Check interval:         ${current.check_interval_seconds}s`)
    console.log(`  Alert log:              ${current.alert_log ?? $.gray('none')}`)
    console.log(`  File:                   ${$.gray(config.path)}`)
    console.log()
  })

cfg
  .command('set <key> <value>')
  .description('Set a default (entropy_threshold, temperature_variance_threshold, check_interval_seconds, alert_log)')
  .action((key: string, value: string) => {
    if (!isSettingKey(key)) fail(`Unknown setting: ${key}`)
    else {
      try {
        const update = config.set(key, value)
        ok(`${key} set to ${String(update[key])}`)
      } catch (e) {
        if (e instanceof SettingError) fail(e.message)
        throw e
      }
    }
  })

cfg
  .command('reset')
  .description('Restore built-in defaults')
  .action(() => {
    config.reset()
    ok('Defaults restored')
  })

// ─── Parse ────────────────────────────────────────────────────────────────────

program.parseAsync(process.argv).catch((e: unknown) => {
  fail(e instanceof Error ? e.message : String(e))
})

import { mkdtempSync, rmSync } from 'node:fs'
import { writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { silentLogger } from '../../logger'
import { createBond, found, inProgress, ManualScheduler, ScriptedTransport } from '../../test-support'
import { parseArgs } from '../args'
import { buildSettings, cmdRun } from './run'

const RESOLVE_PATH = '/resolve/GB00BYZW3G56'

describe('cmdRun', () => {
  let tempDir: string
  let configPath: string
  let transport: ScriptedTransport
  let scheduler: ManualScheduler
  let printed: string[]

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'bondref-run-test-'))
    configPath = join(tempDir, 'config.json')
    transport = new ScriptedTransport()
    scheduler = new ManualScheduler()
    printed = []
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
  })

  function run(argv: string[]) {
    const args = parseArgs(['--config-file', configPath, ...argv], false)
    return cmdRun(args, silentLogger, {
      transport,
      scheduler,
      clock: scheduler.now,
      env: {},
      print: (text) => printed.push(text)
    })
  }

  it('prints a single value', async () => {
    transport.enqueue(RESOLVE_PATH, found(createBond()))

    const result = await run(['static', 'GB00BYZW3G56', 'coupon'])

    expect(result).toBe(1.5)
    expect(printed).toEqual(['1.5'])
  })

  it('prints tables as tab-separated rows', async () => {
    transport.enqueue(RESOLVE_PATH, found(createBond()))

    await run(['info', 'GB00BYZW3G56', 'true'])

    expect(printed).toHaveLength(1)
    expect(printed[0]?.split('\n')).toEqual([
      'ISIN\tName\tCountry\tIssuer\tType\tCurrency\tCoupon %\tFrequency\tMaturity\tIssue Date\tOutstanding',
      'GB00BYZW3G56\tUK Treasury 1.5% 2026\tGB\tUnited Kingdom\tNOMINAL\tGBP\t1.5\t2\t2026-07-22\t2016-07-22\t38000000000'
    ])
  })

  it('prints rendered errors without touching the service', async () => {
    const result = await run(['static', 'BADKEY', 'coupon'])

    expect(result).toBe('⚠️ Invalid ISIN format: BADKEY')
    expect(printed).toEqual(['⚠️ Invalid ISIN format: BADKEY'])
    expect(transport.calls).toHaveLength(0)
  })

  it('prints progress while the service is still searching', async () => {
    transport.enqueue(RESOLVE_PATH, inProgress(), found(createBond()))

    await run(['static', 'GB00BYZW3G56', 'coupon'])

    expect(printed).toEqual(['⏳ Searching for GB00BYZW3G56 (attempt 1/5)'])
  })

  it('waits for the search to finish with --wait', async () => {
    transport.enqueue(RESOLVE_PATH, inProgress(), found(createBond()))

    const running = run(['static', 'GB00BYZW3G56', 'coupon', '--wait'])
    await vi.waitFor(() => expect(transport.callsTo(RESOLVE_PATH)).toBe(1))
    await vi.waitFor(() => expect(scheduler.pendingTasks).toBe(2))
    await scheduler.advance(1_000)

    expect(await running).toBe(1.5)
    expect(transport.callsTo(RESOLVE_PATH)).toBe(2)
  })

  it('closes the context when done', async () => {
    await run(['is-valid', 'GB00BYZW3G56'])

    expect(printed).toEqual(['TRUE'])
    expect(transport.closed).toBe(true)
    expect(scheduler.pendingTasks).toBe(0)
  })

  it('requires a function', async () => {
    const args = parseArgs(['config'], false)

    await expect(cmdRun(args, silentLogger, { transport, scheduler, env: {} })).rejects.toThrow(
      'No function given'
    )
  })
})

describe('buildSettings', () => {
  let tempDir: string
  let configPath: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'bondref-settings-test-'))
    configPath = join(tempDir, 'config.json')
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
  })

  it('layers config file, environment and flags', async () => {
    await writeFile(
      configPath,
      JSON.stringify({ apiUrl: 'http://file:8000', cacheTtlSeconds: 120, maxPollAttempts: 8 })
    )
    const env = { BONDREF_API_URL: 'http://env:8000', BONDREF_MAX_POLLS: '3' }

    const fromEnv = await buildSettings(parseArgs(['--config-file', configPath, 'count'], false), env)
    expect(fromEnv.baseUrl).toBe('http://env:8000')
    expect(fromEnv.cacheTtlSeconds).toBe(120)
    expect(fromEnv.maxPollAttempts).toBe(3)

    const fromFlag = await buildSettings(
      parseArgs(['--config-file', configPath, '--api-url', 'http://flag:8000', 'count'], false),
      env
    )
    expect(fromFlag.baseUrl).toBe('http://flag:8000')
  })

  it('falls back to defaults without a config file', async () => {
    const settings = await buildSettings(parseArgs(['--config-file', configPath, 'count'], false), {})

    expect(settings.baseUrl).toBe('http://127.0.0.1:8000')
    expect(settings.cacheTtlSeconds).toBe(300)
  })
})

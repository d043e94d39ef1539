import { describe, expect, it } from 'vitest'
import { FUNCTION_REGISTRY } from '../functions'
import { VERSION } from '../version'
import { createProgram, parseArgs } from './args'

describe('CLI Args', () => {
  describe('parseArgs', () => {
    it('parses a lookup command with its arguments', () => {
      const args = parseArgs(['static', 'GB00BYZW3G56', 'coupon'], false)
      expect(args.command).toBe('run')
      expect(args.functionName).toBe('BONDSTATIC')
      expect(args.functionArgs).toEqual(['GB00BYZW3G56', 'coupon'])
      expect(args.wait).toBe(false)
    })

    it('parses --wait on lookup commands', () => {
      expect(parseArgs(['static', 'GB00BYZW3G56', 'coupon', '--wait'], false).wait).toBe(true)
      expect(parseArgs(['years-to-maturity', 'GB00BYZW3G56', '-w'], false).wait).toBe(true)
    })

    it('rejects --wait on commands that do not look up a bond', () => {
      expect(parseArgs(['count', 'GB', '--wait'], false).command).toBe('help')
    })

    it('keeps optional arguments out when not given', () => {
      const args = parseArgs(['list', 'GB'], false)
      expect(args.functionName).toBe('BONDLIST')
      expect(args.functionArgs).toEqual(['GB'])
    })

    it('collects search filters as pairs in order', () => {
      const args = parseArgs(['search', 'country', 'DE', 'currency', 'EUR'], false)
      expect(args.functionName).toBe('BONDSEARCH')
      expect(args.functionArgs).toEqual(['country', 'DE', 'currency', 'EUR'])
    })

    it('parses commands without arguments', () => {
      const args = parseArgs(['cache-stats'], false)
      expect(args.functionName).toBe('BONDCACHE_STATS')
      expect(args.functionArgs).toEqual([])
    })

    it('parses global options', () => {
      const args = parseArgs(
        ['-q', '--api-url', 'http://localhost:9000', '--config-file', '/tmp/bondref.json', 'count'],
        false
      )
      expect(args.quiet).toBe(true)
      expect(args.verbose).toBe(false)
      expect(args.apiUrl).toBe('http://localhost:9000')
      expect(args.configFile).toBe('/tmp/bondref.json')
      expect(args.functionName).toBe('BONDCOUNT')
    })

    it('parses --verbose', () => {
      expect(parseArgs(['--verbose', 'api-status'], false).verbose).toBe(true)
    })

    it('uses default values when options not provided', () => {
      const args = parseArgs(['is-valid', 'GB00BYZW3G56'], false)
      expect(args.quiet).toBe(false)
      expect(args.verbose).toBe(false)
      expect(args.apiUrl).toBeUndefined()
      expect(args.configFile).toBeUndefined()
    })

    it('returns help for a missing required argument', () => {
      expect(parseArgs(['static'], false).command).toBe('help')
    })

    it('returns help for an unknown command', () => {
      expect(parseArgs(['price', 'GB00BYZW3G56'], false).command).toBe('help')
    })

    it('returns help when no command is given', () => {
      expect(parseArgs([], false).command).toBe('help')
    })

    it('returns help for --version', () => {
      expect(parseArgs(['-V'], false).command).toBe('help')
    })
  })

  describe('config command', () => {
    it('defaults to list', () => {
      const args = parseArgs(['config'], false)
      expect(args.command).toBe('config')
      expect(args.configAction).toBe('list')
    })

    it('parses set with key and value', () => {
      const args = parseArgs(['config', 'set', 'apiUrl', 'http://localhost:9000'], false)
      expect(args.configAction).toBe('set')
      expect(args.configKey).toBe('apiUrl')
      expect(args.configValue).toBe('http://localhost:9000')
    })

    it('parses unset with key', () => {
      const args = parseArgs(['config', 'unset', 'apiKey'], false)
      expect(args.configAction).toBe('unset')
      expect(args.configKey).toBe('apiKey')
      expect(args.configValue).toBeUndefined()
    })

    it('treats an unknown action as list', () => {
      expect(parseArgs(['config', 'show'], false).configAction).toBe('list')
    })
  })

  describe('createProgram', () => {
    it('registers one command per function plus config', () => {
      const names = createProgram().commands.map((c) => c.name())
      expect(names).toEqual([...FUNCTION_REGISTRY.map((d) => d.command), 'config'])
    })

    it('reports the package version', () => {
      expect(createProgram().version()).toBe(VERSION)
    })
  })
})

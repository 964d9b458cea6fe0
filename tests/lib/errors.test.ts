/**
 * Tests for errors.ts
 */

import { describe, it, expect } from 'vitest'
import {
  TapekeeperError,
  ConfigError,
  ConfigNotFoundError,
  InvalidConfigError,
  MissingConfigKeyError,
  CredentialError,
  ClassificationError,
  UnsupportedSizeUnitError,
  RemoteCommandError,
  isTapekeeperError,
  isConfigError,
  formatErrorForCli,
  errorMessage
} from '../../src/lib/errors.js'

describe('error hierarchy', () => {
  it('names the missing key and the file', () => {
    const err = new MissingConfigKeyError('jukebox_name', '/etc/params.yaml')

    expect(err).toBeInstanceOf(ConfigError)
    expect(err.code).toBe('MISSING_CONFIG_KEY')
    expect(err.message).toBe("'jukebox_name' parameter is missing on /etc/params.yaml file")
  })

  it('reports a missing parameters file', () => {
    const err = new ConfigNotFoundError('params.yaml')

    expect(err.message).toBe("The file 'params.yaml' does not exist.")
    expect(err.context).toEqual({ searchedPath: 'params.yaml' })
  })

  it('prefixes invalid config messages with the path', () => {
    expect(new InvalidConfigError('bad', '/etc/p.yaml').message).toBe('Invalid config in /etc/p.yaml: bad')
    expect(new InvalidConfigError('bad').message).toBe('Invalid config: bad')
  })

  it('classifies unit errors', () => {
    const err = new UnsupportedSizeUnitError('PB', '5 PB')

    expect(err).toBeInstanceOf(ClassificationError)
    expect(err.context).toEqual({ unit: 'PB', input: '5 PB' })
  })

  it('keeps the cause of remote failures', () => {
    const cause = new Error('ECONNREFUSED')
    const err = new RemoteCommandError('vtl-test-01', 'vtl status', 'ECONNREFUSED', cause)

    expect(err.message).toBe('Command failed on vtl-test-01: ECONNREFUSED')
    expect(err.cause).toBe(cause)
  })
})

describe('type guards', () => {
  it('treats config and credential errors as fatal', () => {
    expect(isConfigError(new MissingConfigKeyError('pool_name', 'p.yaml'))).toBe(true)
    expect(isConfigError(new CredentialError('unreadable', '/tmp/creds'))).toBe(true)
    expect(isConfigError(new UnsupportedSizeUnitError('PB', '5 PB'))).toBe(false)
    expect(isConfigError(new Error('plain'))).toBe(false)
  })

  it('recognizes every subclass as a TapekeeperError', () => {
    expect(isTapekeeperError(new RemoteCommandError('h', 'c', 'r'))).toBe(true)
    expect(isTapekeeperError(new Error('plain'))).toBe(false)
  })
})

describe('formatting', () => {
  it('adds the suggestion line', () => {
    const err = new MissingConfigKeyError('jukebox_name', '/etc/p.yaml')

    expect(err.toCliOutput()).toBe(
      "Error: 'jukebox_name' parameter is missing on /etc/p.yaml file\n  Suggestion: Add \"jukebox_name\" to /etc/p.yaml"
    )
  })

  it('formats anything thrown', () => {
    expect(formatErrorForCli(new Error('boom'))).toBe('Error: boom')
    expect(formatErrorForCli('boom')).toBe('Error: boom')
    expect(errorMessage(42)).toBe('42')
  })

  it('serializes to JSON', () => {
    const json = new TapekeeperError('x', 'X_CODE', { suggestion: 'try y' }).toJSON()

    expect(json.name).toBe('TapekeeperError')
    expect(json.code).toBe('X_CODE')
    expect(json.suggestion).toBe('try y')
  })
})

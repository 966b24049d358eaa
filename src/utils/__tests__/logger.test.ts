/**
 * Unit tests for src/utils/logger.ts — Pino configuration and token redaction.
 */

import { describe, it, expect } from 'vitest'
import { Writable } from 'node:stream'
import pino from 'pino'
import { PINO_REDACT_PATHS, maskSecrets } from '../../cli/utils/masking.js'
import { createLogger, loggerOptions } from '../logger.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * In-memory pino logger built from the same options as createLogger.
 */
function createCapturingLogger(name: string): { logger: pino.Logger; getLines: () => string[] } {
  const lines: string[] = []
  const stream = new Writable({
    write(chunk: Buffer, _encoding: string, callback: () => void) {
      lines.push(chunk.toString().trim())
      callback()
    },
  })

  return { logger: pino(loggerOptions(name, 'trace'), stream), getLines: () => lines }
}

function withEnv(vars: Record<string, string | undefined>, fn: () => void): void {
  const saved = Object.fromEntries(Object.keys(vars).map((key) => [key, process.env[key]]))
  const apply = (values: Record<string, string | undefined>): void => {
    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) delete process.env[key]
      else process.env[key] = value
    }
  }
  apply(vars)
  try {
    fn()
  } finally {
    apply(saved)
  }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('createLogger', () => {
  it('returns a pino logger instance', () => {
    const logger = createLogger('test-module', { pretty: false })
    expect(typeof logger.info).toBe('function')
    expect(typeof logger.warn).toBe('function')
  })

  it('honours an explicit level', () => {
    expect(createLogger('explicit', { level: 'error', pretty: false }).level).toBe('error')
  })

  it('uses LOG_LEVEL when set', () => {
    withEnv({ LOG_LEVEL: 'warn' }, () => {
      expect(createLogger('test-level', { pretty: false }).level).toBe('warn')
    })
  })

  it('uses info level when NODE_ENV = production', () => {
    withEnv({ LOG_LEVEL: undefined, NODE_ENV: 'production' }, () => {
      expect(createLogger('test-prod', { pretty: false }).level).toBe('info')
    })
  })

  it('defaults to warn for plain CLI use', () => {
    withEnv({ LOG_LEVEL: undefined, NODE_ENV: undefined }, () => {
      expect(createLogger('test-cli', { pretty: false }).level).toBe('warn')
    })
  })
})

describe('loggerOptions', () => {
  it('applies the name, level and redaction paths', () => {
    const options = loggerOptions('collection', 'info')
    expect(options.name).toBe('collection')
    expect(options.level).toBe('info')
    expect(options.redact).toBe(PINO_REDACT_PATHS)
  })

  it('labels levels by name in the output', () => {
    const { logger, getLines } = createCapturingLogger('labels')

    logger.warn('careful')

    const parsed: unknown = JSON.parse(getLines()[0] ?? '')
    expect(parsed).toMatchObject({ level: 'warn', name: 'labels', msg: 'careful' })
  })
})

describe('Pino redaction — PINO_REDACT_PATHS', () => {
  it('redacts token fields at the top level and one level down', () => {
    const { logger, getLines } = createCapturingLogger('redact-test')

    logger.info({ token: 'test-token', credential: { accessToken: 'test-token' } }, 'token issued')

    const lines = getLines()
    expect(lines).toHaveLength(1)
    const parsed: unknown = JSON.parse(lines[0] ?? '')
    expect(parsed).toMatchObject({ token: '[Redacted]', credential: { accessToken: '[Redacted]' } })
  })

  it('redacts the authorization header of a logged request', () => {
    const { logger, getLines } = createCapturingLogger('redact-headers')

    logger.debug({ headers: { Authorization: 'Bearer test-token', ClientType: 'rg-cost-collector' } }, 'request')

    const parsed: unknown = JSON.parse(getLines()[0] ?? '')
    expect(parsed).toMatchObject({ headers: { Authorization: '[Redacted]', ClientType: 'rg-cost-collector' } })
  })
})

describe('maskSecrets', () => {
  it('masks a bearer credential', () => {
    expect(maskSecrets('Authorization: Bearer test-token')).toBe('Authorization: ***')
  })

  it('masks a bare JWT inside a longer message', () => {
    expect(maskSecrets('token eyJtest-header-part.test-payload-part.test-signature-part rejected')).toBe(
      'token *** rejected',
    )
  })

  it('returns input unchanged when no secrets present', () => {
    expect(maskSecrets('HTTP 403: AuthorizationFailed')).toBe('HTTP 403: AuthorizationFailed')
  })

  it('masks every occurrence on repeated calls', () => {
    expect(maskSecrets('Bearer a1 and Bearer b2')).toBe('*** and ***')
    expect(maskSecrets('Bearer c3')).toBe('***')
  })
})

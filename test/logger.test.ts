import fs from 'fs'
import { LOG_PATH } from '../src/config.js'
import { logger, scrub } from '../src/logger.js'

const lastLine = (): unknown => {
  const lines = fs.readFileSync(LOG_PATH, 'utf8').trim().split('\n')
  return JSON.parse(lines[lines.length - 1])
}

describe('logger', () => {
  test('redacts credential-looking keys at any depth', () => {
    expect(scrub({
      tool: 'gmail_get_profile',
      headers: { Authorization: 'Bearer test-secret', Accept: 'application/json' },
      attempts: [{ accessToken: 'test-secret', status: 401 }]
    })).toEqual({
      tool: 'gmail_get_profile',
      headers: { Authorization: '[REDACTED]', Accept: 'application/json' },
      attempts: [{ accessToken: '[REDACTED]', status: 401 }]
    })
  })

  test('reduces errors to their name and message', () => {
    expect(scrub({ error: new TypeError('fetch failed') })).toEqual({ error: { name: 'TypeError', message: 'fetch failed' } })
  })

  test('appends one JSON line per entry', () => {
    logger('warn', 'Tool call failed', { tool: 'gmail_get_thread', kind: 'NotFound', token: 'test-secret' })

    expect(lastLine()).toEqual({
      timestamp: expect.any(String),
      level: 'warn',
      message: 'Tool call failed',
      data: { tool: 'gmail_get_thread', kind: 'NotFound', token: '[REDACTED]' }
    })
  })

  test('skips entries below the configured level', () => {
    logger('info', 'kept')
    logger('debug', 'dropped')

    expect(lastLine()).toMatchObject({ level: 'info', message: 'kept' })
  })
})

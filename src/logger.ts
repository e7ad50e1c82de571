import { LOG_LEVEL, LOG_PATH } from "./config.js"
import fs from "fs"

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error'

type Log = {
  timestamp: string
  level: LogLevel
  message: string
  data?: unknown
}

const LEVELS: Record<LogLevel, number> = { trace: 0, debug: 1, info: 2, warn: 3, error: 4 }

const SECRET_KEY = /authorization|token|secret|password|cookie/i

const isLogLevel = (value: string): value is LogLevel => value in LEVELS

const threshold = LEVELS[isLogLevel(LOG_LEVEL) ? LOG_LEVEL : 'info']

export const scrub = (value: unknown): unknown => {
  if (Array.isArray(value)) return value.map(scrub)
  if (value instanceof Error) return { name: value.name, message: value.message }
  if (!value || typeof value !== 'object') return value

  return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, SECRET_KEY.test(key) ? '[REDACTED]' : scrub(entry)]))
}

export const logger = (level: LogLevel, message: string, data?: unknown) => {
  if (LEVELS[level] < threshold) return

  const log: Log = { timestamp: new Date().toISOString(), level, message }
  if (data !== undefined) log.data = scrub(data)

  try {
    fs.appendFileSync(LOG_PATH, JSON.stringify(log) + '\n')
  } catch (error) {
    console.error('Error writing to log file:', { error: error instanceof Error ? error.message : String(error) })
  }
}

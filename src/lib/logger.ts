export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export interface Logger {
  debug: (...args: unknown[]) => void
  info: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
}

let currentLevel: LogLevel = parseLogLevel(process.env.CCG_LOG_LEVEL) ?? 'info'

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined
  const normalized = value.trim().toLowerCase()
  return LOG_LEVELS.find(level => level === normalized)
}

export function setLogLevel(level: LogLevel) {
  currentLevel = level
}

export function getLogLevel(): LogLevel {
  return currentLevel
}

function enabled(level: LogLevel) {
  return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[currentLevel]
}

/**
 * 带作用域前缀的控制台日志，所有输出都走 stderr，stdout 留给生成的配置
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`
  return {
    debug: (...args) => {
      if (enabled('debug')) console.error(prefix, ...args)
    },
    info: (...args) => {
      if (enabled('info')) console.error(prefix, ...args)
    },
    warn: (...args) => {
      if (enabled('warn')) console.warn(prefix, ...args)
    },
    error: (...args) => {
      if (enabled('error')) console.error(prefix, ...args)
    },
  }
}

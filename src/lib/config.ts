import { parseLogLevel, type LogLevel } from '@/lib/logger'

export interface FetchOptions {
  timeoutSeconds: number
  maxRetries: number
  retryDelaySeconds: number
  userAgent: string
}

export interface GeneratorOptions extends FetchOptions {
  concurrency: number
  basePort: number
  socksPort: number
  logLevel: LogLevel
}

export const DEFAULT_USER_AGENT = 'clash-verge/v1.6.6'

export const DEFAULT_OPTIONS: Readonly<GeneratorOptions> = {
  timeoutSeconds: 60,
  maxRetries: 3,
  retryDelaySeconds: 2,
  concurrency: 4,
  userAgent: DEFAULT_USER_AGENT,
  basePort: 7890,
  socksPort: 7891,
  logLevel: 'info',
}

function positiveInt(value: string | undefined, min = 1): number | undefined {
  if (value === undefined || !/^\d+$/.test(value.trim())) return undefined
  const parsed = parseInt(value, 10)
  return parsed >= min ? parsed : undefined
}

function port(value: string | undefined): number | undefined {
  const parsed = positiveInt(value)
  return parsed !== undefined && parsed <= 65535 ? parsed : undefined
}

/**
 * 从环境变量读取配置，非法值回退到默认值
 */
export function loadOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): GeneratorOptions {
  return {
    timeoutSeconds: positiveInt(env.CCG_TIMEOUT_SECONDS) ?? DEFAULT_OPTIONS.timeoutSeconds,
    maxRetries: positiveInt(env.CCG_MAX_RETRIES) ?? DEFAULT_OPTIONS.maxRetries,
    retryDelaySeconds: positiveInt(env.CCG_RETRY_DELAY_SECONDS, 0) ?? DEFAULT_OPTIONS.retryDelaySeconds,
    concurrency: positiveInt(env.CCG_CONCURRENCY) ?? DEFAULT_OPTIONS.concurrency,
    userAgent: env.CCG_USER_AGENT?.trim() || DEFAULT_OPTIONS.userAgent,
    basePort: port(env.CCG_BASE_PORT) ?? DEFAULT_OPTIONS.basePort,
    socksPort: port(env.CCG_SOCKS_PORT) ?? DEFAULT_OPTIONS.socksPort,
    logLevel: parseLogLevel(env.CCG_LOG_LEVEL) ?? DEFAULT_OPTIONS.logLevel,
  }
}

export function resolveOptions(overrides: Partial<GeneratorOptions> = {}): GeneratorOptions {
  const options = { ...DEFAULT_OPTIONS }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(options, { [key]: value })
  }
  return options
}

import { readFile } from 'node:fs/promises'
import { setTimeout as sleep } from 'node:timers/promises'
import axios, { type AxiosInstance } from 'axios'
import { createHttpClient } from '@/lib/api'
import type { FetchOptions } from '@/lib/config'
import {
  FetchError,
  FetchTimeout,
  GenerationAborted,
  ReadError,
} from '@/lib/errors'
import { describeError, isTimeoutError } from '@/lib/handle-fetch-error'
import { createLogger } from '@/lib/logger'
import type { SubscriptionSource } from '@/lib/types'

const logger = createLogger('fetcher')

/**
 * 来源标识：显式 tag，否则远程为 URL、文件为路径、内联为 inline-<序号>（从 1 开始）
 */
export function sourceTagOf(source: SubscriptionSource, index: number): string {
  if (source.tag) return source.tag
  return source.kind === 'inline' ? `inline-${index + 1}` : source.origin
}

function throwIfAborted(signal?: AbortSignal) {
  if (signal?.aborted) throw new GenerationAborted({ cause: signal.reason })
}

async function waitBeforeRetry(ms: number, signal?: AbortSignal) {
  if (ms <= 0) return
  try {
    await sleep(ms, undefined, { signal })
  } catch (e) {
    throw new GenerationAborted({ cause: e })
  }
}

async function fetchRemote(url: string, options: FetchOptions, client: AxiosInstance, signal?: AbortSignal): Promise<string> {
  const attempts = Math.max(1, options.maxRetries)
  let lastError: unknown

  for (let attempt = 1; attempt <= attempts; attempt++) {
    throwIfAborted(signal)
    if (attempt > 1) {
      await waitBeforeRetry(options.retryDelaySeconds * 1000, signal)
    }

    logger.info(`正在请求订阅 ${url} (尝试 ${attempt}/${attempts})`)
    try {
      const response = await client.get<string>(url, {
        signal,
        timeout: options.timeoutSeconds * 1000,
      })
      return typeof response.data === 'string' ? response.data : String(response.data)
    } catch (e) {
      if (signal?.aborted || axios.isCancel(e)) throw new GenerationAborted({ cause: e })
      lastError = e
      logger.warn(`请求失败 (已尝试 ${attempt}/${attempts}): ${describeError(e)}`)
    }
  }

  logger.error(`获取订阅失败，已达到最大重试次数 (${attempts}): ${url}`)
  if (isTimeoutError(lastError)) {
    throw new FetchTimeout(url, attempts, { cause: lastError })
  }
  throw new FetchError(url, attempts, describeError(lastError), { cause: lastError })
}

async function readSourceFile(path: string, signal?: AbortSignal): Promise<string> {
  try {
    return await readFile(path, { encoding: 'utf8', signal })
  } catch (e) {
    if (signal?.aborted) throw new GenerationAborted({ cause: e })
    throw new ReadError(path, describeError(e), { cause: e })
  }
}

/**
 * 读取一个来源的原始内容：远程请求带超时和重试，内联原样返回，文件按 UTF-8 读取
 */
export async function fetchSource(
  source: SubscriptionSource,
  options: FetchOptions,
  signal?: AbortSignal,
  client?: AxiosInstance
): Promise<string> {
  throwIfAborted(signal)

  switch (source.kind) {
    case 'remote':
      return fetchRemote(source.origin, options, client ?? createHttpClient(options), signal)
    case 'file':
      return readSourceFile(source.origin, signal)
    case 'inline':
      return source.origin
    default: {
      const unreachable: never = source.kind
      throw new ReadError(String(unreachable), 'unknown source kind')
    }
  }
}

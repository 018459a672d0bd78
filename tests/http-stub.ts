import {
  AxiosError,
  type AxiosAdapter,
  type AxiosInstance,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios'
import { createHttpClient } from '@/lib/api'
import type { FetchOptions } from '@/lib/config'

// 测试用的 axios 适配器，请求不会离开当前进程

export const TEST_FETCH_OPTIONS: FetchOptions = {
  timeoutSeconds: 5,
  maxRetries: 3,
  retryDelaySeconds: 0,
  userAgent: 'test-agent/1.0',
}

export function ok(config: InternalAxiosRequestConfig, data: string): AxiosResponse<string> {
  return { data, status: 200, statusText: 'OK', headers: {}, config }
}

export function httpError(config: InternalAxiosRequestConfig, status: number, data: string): AxiosError {
  const response: AxiosResponse<string> = { data, status, statusText: 'Error', headers: {}, config }
  return new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, null, response)
}

export function clientWith(adapter: AxiosAdapter): AxiosInstance {
  const client = createHttpClient(TEST_FETCH_OPTIONS)
  client.defaults.adapter = adapter
  return client
}

/**
 * 按 URL 返回固定内容，未登记的 URL 返回 404
 */
export function routes(table: Record<string, string>, delays: Record<string, number> = {}): AxiosAdapter {
  return async (config) => {
    const url = config.url ?? ''
    const delay = delays[url]
    if (delay) await new Promise(resolve => setTimeout(resolve, delay))
    const body = table[url]
    if (body === undefined) throw httpError(config, 404, 'not found')
    return ok(config, body)
  }
}

import axios, { type AxiosInstance } from 'axios'
import type { FetchOptions } from '@/lib/config'

/**
 * 订阅请求用的 axios 实例：按文本取回响应，不做 JSON 转换，非 2xx 视为失败
 */
export function createHttpClient(options: Pick<FetchOptions, 'timeoutSeconds' | 'userAgent'>): AxiosInstance {
  return axios.create({
    timeout: options.timeoutSeconds * 1000,
    responseType: 'text',
    transformResponse: [(data: unknown) => data],
    maxRedirects: 5,
    headers: {
      'User-Agent': options.userAgent,
      Accept: '*/*',
    },
    validateStatus: (status) => status >= 200 && status < 300,
  })
}

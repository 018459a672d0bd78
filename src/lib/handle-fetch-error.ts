import { AxiosError } from 'axios'
import { isRecord, preview } from '@/lib/utils'

const MESSAGE_FIELDS = ['msg', 'message', 'error', 'title'] as const

export function isTimeoutError(error: unknown): boolean {
  return error instanceof AxiosError && (error.code === AxiosError.ECONNABORTED || error.code === AxiosError.ETIMEDOUT)
}

/**
 * 把请求错误整理成一行可读的描述，用于日志和来源报告
 */
export function describeError(error: unknown): string {
  if (error instanceof AxiosError) {
    if (isTimeoutError(error)) return 'request timed out'

    const status = error.response?.status
    if (status === undefined) {
      return error.code ? `${error.code}: ${error.message}` : error.message
    }

    let detail = ''
    const data: unknown = error.response?.data
    if (typeof data === 'string') {
      detail = preview(data, 80)
    } else if (isRecord(data)) {
      for (const field of MESSAGE_FIELDS) {
        const value = data[field]
        if (typeof value === 'string' && value.trim()) {
          detail = value.trim()
          break
        }
      }
    }
    return detail ? `HTTP ${status}: ${detail}` : `HTTP ${status}`
  }

  if (error instanceof Error) return error.message
  return String(error)
}

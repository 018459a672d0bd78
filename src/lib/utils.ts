import { Base64 } from 'js-base64'
import _ from 'lodash'

// source: https://stackoverflow.com/a/36760050
const IPV4_REGEX = /^((25[0-5]|(2[0-4]|1\d|[1-9]|)\d)(\.(?!$)|$)){4}$/

const BASE64_REGEX = /^[A-Za-z0-9+/_-]+={0,2}$/

/**
 * Base64 解码（支持 URL Safe，补齐 padding），失败返回 null
 */
export function base64Decode(str: string): string | null {
  const compact = str.replace(/\s+/g, '')
  if (!compact || !BASE64_REGEX.test(compact)) return null
  // 余数为 1 的长度不可能是合法的 base64
  if (compact.replace(/=+$/, '').length % 4 === 1) return null
  try {
    return Base64.decode(compact)
  } catch {
    return null
  }
}

export function base64Encode(str: string): string {
  return Base64.encode(str)
}

/**
 * 安全的 URL 解码，解码失败时返回原字符串
 */
export function safeDecodeURIComponent(str: string): string {
  if (!str) return str
  try {
    return decodeURIComponent(str)
  } catch {
    return str
  }
}

/**
 * 解析 URL 查询参数，plusAsSpace 为 false 时保留 +（base64 参数）
 */
export function parseQueryString(query: string, plusAsSpace = true): Record<string, string> {
  const params: Record<string, string> = {}
  if (!query) return params

  for (const pair of query.split('&')) {
    if (!pair) continue
    const eqIndex = pair.indexOf('=')
    const key = eqIndex === -1 ? pair : pair.substring(0, eqIndex)
    const value = eqIndex === -1 ? '' : pair.substring(eqIndex + 1)
    if (key) {
      params[safeDecodeURIComponent(key)] = safeDecodeURIComponent(plusAsSpace ? value.replace(/\+/g, '%20') : value)
    }
  }
  return params
}

export function isIPv4(ip: string): boolean {
  return IPV4_REGEX.test(ip)
}

export function isIPv6(ip: string): boolean {
  return ip.includes(':') && /^[0-9a-fA-F:.]+$/.test(ip)
}

/**
 * 端口号必须是 1-65535 之间的整数，否则返回 null
 */
export function parsePort(value: unknown): number | null {
  const str = typeof value === 'number' ? String(value) : typeof value === 'string' ? value.trim() : ''
  if (!/^\d{1,5}$/.test(str)) return null
  const port = parseInt(str, 10)
  return port >= 1 && port <= 65535 ? port : null
}

/**
 * 拆分 host:port（支持 [ipv6]:port），端口缺失时 port 为 undefined
 */
export function splitHostPort(hostPort: string): { host: string; port?: string } {
  if (hostPort.startsWith('[')) {
    const closeBracketIndex = hostPort.indexOf(']')
    if (closeBracketIndex === -1) return { host: hostPort }
    const host = hostPort.substring(1, closeBracketIndex)
    const rest = hostPort.substring(closeBracketIndex + 1)
    return rest.startsWith(':') ? { host, port: rest.substring(1) } : { host }
  }
  const lastColonIndex = hostPort.lastIndexOf(':')
  if (lastColonIndex === -1) return { host: hostPort }
  return {
    host: hostPort.substring(0, lastColonIndex),
    port: hostPort.substring(lastColonIndex + 1),
  }
}

export function formatHost(server: string): string {
  return isIPv6(server) ? `[${server}]` : server
}

export function isTruthyFlag(value: string | undefined): boolean {
  return value === '1' || value === 'true'
}

/**
 * 截取用于日志和报告的预览
 */
export function preview(text: string, length = 40): string {
  const oneLine = text.replace(/\s+/g, ' ').trim()
  return oneLine.length > length ? `${oneLine.substring(0, length)}...` : oneLine
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * 去掉值为 undefined 的字段（js-yaml 无法输出 undefined）
 */
export function compact(obj: Record<string, unknown>): Record<string, unknown> {
  return _.omitBy(obj, _.isUndefined)
}

export function asString(value: unknown): string {
  if (typeof value === 'string') return value.trim()
  if (typeof value === 'number' && Number.isFinite(value)) return String(value)
  return ''
}

export function splitList(value: string | undefined): string[] | undefined {
  if (!value) return undefined
  const items = value.split(',').map(item => item.trim()).filter(Boolean)
  return items.length > 0 ? items : undefined
}

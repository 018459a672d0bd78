/**
 * 代理协议解析工具
 * 支持解析 vless、vmess、ss、ssr、trojan、hysteria、hysteria2 (hy2) 链接
 * 并转换为统一的 CanonicalNode
 */

import {
  GeneratorError,
  MalformedLink,
  UnsupportedProtocol,
} from '@/lib/errors'
import type {
  CanonicalNode,
  Hysteria2Node,
  HysteriaNode,
  NodeIdentity,
  Protocol,
  ShadowsocksNode,
  ShadowsocksRNode,
  TransportOptions,
  TrojanNode,
  VlessExtra,
  VlessNode,
  VmessNode,
} from '@/lib/types'
import {
  asString,
  base64Decode,
  isRecord,
  isTruthyFlag,
  parsePort,
  parseQueryString,
  safeDecodeURIComponent,
  splitHostPort,
  splitList,
} from '@/lib/utils'

export type DecodeResult =
  | { ok: true; node: CanonicalNode }
  | { ok: false; error: GeneratorError }

const SCHEME_PROTOCOLS = new Map<string, Protocol>([
  ['vless', 'vless'],
  ['vmess', 'vmess'],
  ['ss', 'shadowsocks'],
  ['ssr', 'shadowsocksr'],
  ['trojan', 'trojan'],
  ['hysteria', 'hysteria'],
  ['hysteria2', 'hysteria2'],
  ['hy2', 'hysteria2'],
])

const LINK_REGEX = /^([a-zA-Z][a-zA-Z0-9+.-]*):\/\/(.*)$/s

// 控制字符（C0、DEL、C1）
// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\u0000-\u001f\u007f-\u009f]/g

const DEFAULT_HYSTERIA_MBPS = 50

export function isProxyLink(text: string): boolean {
  return LINK_REGEX.test(text.trim())
}

/**
 * 节点名称清洗：URL 解码、去掉控制字符、去掉首尾空白，为空时使用 server:port
 */
export function sanitizeName(raw: string | undefined, server: string, port: number): string {
  const name = safeDecodeURIComponent(raw ?? '')
    .replace(CONTROL_CHARS, '')
    .trim()
  return name || `${server}:${port}`
}

/**
 * 节点身份：协议、服务器、端口、认证信息，名称不参与
 */
export function nodeIdentity(node: CanonicalNode): NodeIdentity {
  const auth = Object.entries(node.auth)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, value]) => `${key}=${value}`)
  return [node.protocol, node.server.toLowerCase(), String(node.port), ...auth].join('|')
}

interface LinkParts {
  userinfo: string
  host: string
  port?: string
  query: Record<string, string>
  fragment?: string
}

/**
 * 拆分 userinfo@host:port/?query#fragment
 */
function splitLink(content: string): LinkParts {
  let mainPart = content
  let fragment: string | undefined

  const hashIndex = mainPart.indexOf('#')
  if (hashIndex !== -1) {
    fragment = mainPart.substring(hashIndex + 1)
    mainPart = mainPart.substring(0, hashIndex)
  }

  let query: Record<string, string> = {}
  const queryIndex = mainPart.indexOf('?')
  if (queryIndex !== -1) {
    query = parseQueryString(mainPart.substring(queryIndex + 1))
    mainPart = mainPart.substring(0, queryIndex)
  }
  mainPart = mainPart.replace(/\/+$/, '')

  const atIndex = mainPart.lastIndexOf('@')
  const userinfo = atIndex === -1 ? '' : mainPart.substring(0, atIndex)
  const { host, port } = splitHostPort(mainPart.substring(atIndex + 1))

  return { userinfo, host, port, query, fragment }
}

export function requireServer(host: string, protocol: Protocol): string {
  if (!host) throw new MalformedLink(`${protocol} link is missing a server`)
  return host
}

export function requirePort(raw: string | undefined, protocol: Protocol, fallback?: number): number {
  if (raw === undefined || raw === '') {
    if (fallback !== undefined) return fallback
    throw new MalformedLink(`${protocol} link is missing a port`)
  }
  const port = parsePort(raw)
  if (port === null) throw new MalformedLink(`${protocol} link has an invalid port: ${raw}`)
  return port
}

/**
 * 传输层参数（ws / grpc / h2 / http）
 */
export function transportFrom(network: string, path?: string, host?: string, serviceName?: string): TransportOptions {
  switch (network) {
    case 'ws':
    case 'httpupgrade':
    case 'h2':
    case 'http':
      return { network, path: safeDecodeURIComponent(path ?? '') || '/', host: host ? safeDecodeURIComponent(host) : undefined }
    case 'grpc':
      return { network, serviceName: safeDecodeURIComponent(serviceName || path || '') || undefined }
    default:
      return { network }
  }
}

/**
 * 解析 VMess 协议
 * 格式: vmess://base64(json)
 */
function decodeVmess(payload: string, sourceTag: string): VmessNode {
  const jsonStr = base64Decode(payload.split('#')[0])
  if (jsonStr === null) throw new MalformedLink('vmess payload is not valid base64')

  let config: unknown
  try {
    config = JSON.parse(jsonStr)
  } catch (e) {
    throw new MalformedLink('vmess payload is not valid JSON', { cause: e })
  }
  if (!isRecord(config)) throw new MalformedLink('vmess payload is not a JSON object')

  const server = asString(config.add)
  const uuid = asString(config.id)
  if (!server) throw new MalformedLink('vmess link is missing "add"')
  if (!uuid) throw new MalformedLink('vmess link is missing "id"')
  const port = requirePort(asString(config.port), 'vmess')

  const network = asString(config.net) || 'tcp'
  const host = asString(config.host)
  const tls = config.tls === 'tls' || config.tls === true
  const alterId = parseInt(asString(config.aid), 10)

  const node: VmessNode = {
    protocol: 'vmess',
    name: sanitizeName(asString(config.ps), server, port),
    server,
    port,
    auth: { uuid },
    extra: {
      alterId: Number.isNaN(alterId) ? 0 : alterId,
      cipher: asString(config.scy) || 'auto',
      ...transportFrom(network, asString(config.path), host, asString(config.path)),
      udp: true,
    },
    sourceTag,
  }

  if (tls) {
    node.extra.tls = true
    node.extra.sni = asString(config.sni) || host || undefined
    node.extra.fingerprint = asString(config.fp) || undefined
    node.extra.alpn = splitList(asString(config.alpn))
    node.extra.skipCertVerify = config.allowInsecure === true || isTruthyFlag(asString(config.allowInsecure))
  }
  return node
}

/**
 * 解析 VLESS 协议
 * 格式: vless://uuid@server:port?type=ws&security=reality&pbk=...#name
 */
function decodeVless(content: string, sourceTag: string): VlessNode {
  const { userinfo, host, port: rawPort, query, fragment } = splitLink(content)
  const server = requireServer(host, 'vless')
  const port = requirePort(rawPort, 'vless')
  const uuid = safeDecodeURIComponent(userinfo)
  if (!uuid) throw new MalformedLink('vless link is missing a uuid')

  const security: VlessExtra['security'] =
    query.security === 'tls' || query.security === 'reality' ? query.security : 'none'

  const extra: VlessExtra = {
    security,
    encryption: query.encryption || 'none',
    flow: query.flow || undefined,
    ...transportFrom(query.type || 'tcp', query.path, query.host, query.serviceName),
    udp: query.udp === undefined ? true : isTruthyFlag(query.udp),
  }

  if (security !== 'none') {
    extra.tls = true
    extra.sni = query.sni || server
    extra.fingerprint = query.fp || 'chrome'
    extra.alpn = splitList(query.alpn)
    extra.skipCertVerify = isTruthyFlag(query.allowInsecure)
  }

  // Reality 协议必须有 public key
  if (security === 'reality') {
    if (!query.pbk) throw new MalformedLink('vless reality link is missing "pbk"')
    extra.realityPublicKey = query.pbk
    extra.realityShortId = query.sid || undefined
  }

  return {
    protocol: 'vless',
    name: sanitizeName(fragment, server, port),
    server,
    port,
    auth: { uuid },
    extra,
    sourceTag,
  }
}

/**
 * 解析 Trojan 协议
 * 格式: trojan://password@server:port?sni=...&type=ws#name
 */
function decodeTrojan(content: string, sourceTag: string): TrojanNode {
  const { userinfo, host, port: rawPort, query, fragment } = splitLink(content)
  const server = requireServer(host, 'trojan')
  const port = requirePort(rawPort, 'trojan')
  const password = safeDecodeURIComponent(userinfo)
  if (!password) throw new MalformedLink('trojan link is missing a password')

  return {
    protocol: 'trojan',
    name: sanitizeName(fragment, server, port),
    server,
    port,
    auth: { password },
    extra: {
      ...transportFrom(query.type || 'tcp', query.path, query.host, query.serviceName),
      tls: true,
      sni: query.sni || query.peer || server,
      fingerprint: query.fp || undefined,
      alpn: splitList(query.alpn),
      skipCertVerify: isTruthyFlag(query.allowInsecure) || isTruthyFlag(query['skip-cert-verify']),
      udp: query.udp === undefined ? true : isTruthyFlag(query.udp),
    },
    sourceTag,
  }
}

/**
 * 解析 Hysteria 协议
 * 格式: hysteria://server:port?auth=...&peer=...&upmbps=...&downmbps=...#name
 */
function decodeHysteria(content: string, sourceTag: string): HysteriaNode {
  const { userinfo, host, port: rawPort, query, fragment } = splitLink(content)
  const server = requireServer(host, 'hysteria')
  const port = requirePort(rawPort, 'hysteria', 443)
  const auth = safeDecodeURIComponent(userinfo) || query.auth || query['auth-str'] || ''
  if (!auth) throw new MalformedLink('hysteria link is missing "auth"')

  const mbps = (key: 'upmbps' | 'downmbps', alias: 'up' | 'down'): number => {
    const raw = query[key] ?? query[alias]
    if (raw === undefined || raw === '') return DEFAULT_HYSTERIA_MBPS
    const value = Number(raw.replace(/\s*mbps$/i, ''))
    if (!Number.isFinite(value) || value <= 0) {
      throw new MalformedLink(`hysteria link has a non-numeric "${key}": ${raw}`)
    }
    return value
  }

  return {
    protocol: 'hysteria',
    name: sanitizeName(fragment, server, port),
    server,
    port,
    auth: { auth },
    extra: {
      protocol: query.protocol || undefined,
      up: mbps('upmbps', 'up'),
      down: mbps('downmbps', 'down'),
      obfs: query.obfsParam || query.obfs || undefined,
      tls: true,
      sni: query.peer || query.sni || undefined,
      alpn: splitList(query.alpn),
      skipCertVerify: isTruthyFlag(query.insecure) || isTruthyFlag(query.allowInsecure),
    },
    sourceTag,
  }
}

/**
 * 解析 Hysteria2 协议
 * 格式: hysteria2://password@server:port?sni=...&obfs=salamander&obfs-password=...#name
 */
function decodeHysteria2(content: string, sourceTag: string): Hysteria2Node {
  const { userinfo, host, port: rawPort, query, fragment } = splitLink(content)
  const server = requireServer(host, 'hysteria2')
  const port = requirePort(rawPort, 'hysteria2', 443)
  const password = safeDecodeURIComponent(userinfo) || query.password || query.auth || ''
  if (!password) throw new MalformedLink('hysteria2 link is missing a password')

  return {
    protocol: 'hysteria2',
    name: sanitizeName(fragment, server, port),
    server,
    port,
    auth: { password },
    extra: {
      obfs: query.obfs || undefined,
      obfsPassword: query['obfs-password'] || undefined,
      ports: query.mport || undefined,
      tls: true,
      sni: query.sni || query.peer || undefined,
      fingerprint: query.fp || undefined,
      alpn: splitList(query.alpn),
      skipCertVerify: isTruthyFlag(query.insecure) || isTruthyFlag(query.allowInsecure),
      udp: true,
    },
    sourceTag,
  }
}

/**
 * 解析 SS plugin 参数
 * plugin 格式: plugin-name;param1=value1;param2=value2
 * 例如: obfs-local;obfs=http;obfs-host=example.com
 */
function parseSSPlugin(pluginStr: string): { plugin: string; pluginOpts: Record<string, string | boolean> } | null {
  const parts = pluginStr.split(';')
  const pluginName = parts[0].trim()
  if (!pluginName) return null

  const plugin = pluginName === 'obfs-local' || pluginName === 'simple-obfs' ? 'obfs' : pluginName
  const pluginOpts: Record<string, string | boolean> = {}

  for (const part of parts.slice(1)) {
    const eqIndex = part.indexOf('=')
    const key = (eqIndex === -1 ? part : part.substring(0, eqIndex)).trim()
    const value = eqIndex === -1 ? '' : part.substring(eqIndex + 1).trim()
    if (!key) continue

    if (plugin === 'obfs') {
      if (key === 'obfs') pluginOpts.mode = value
      else if (key === 'obfs-host' || key === 'host') pluginOpts.host = value
    } else if (key === 'tls' || key === 'mux') {
      // v2ray-plugin 的开关参数可能没有值
      pluginOpts[key] = value === '' || isTruthyFlag(value)
    } else {
      pluginOpts[key] = value
    }
  }

  return { plugin, pluginOpts }
}

interface SSCredentials {
  cipher: string
  password: string
  hostPort: string
}

function splitCredentials(creds: string, hostPort: string): SSCredentials | null {
  const colonIndex = creds.indexOf(':')
  if (colonIndex <= 0) return null
  return { cipher: creds.substring(0, colonIndex), password: creds.substring(colonIndex + 1), hostPort }
}

// SIP002: base64(method:password)@server:port，userinfo 也可能是明文或 URL 编码的 method:password
function ssSip002(mainPart: string): SSCredentials | null {
  const atIndex = mainPart.lastIndexOf('@')
  if (atIndex === -1) return null
  const userinfo = safeDecodeURIComponent(mainPart.substring(0, atIndex))
  const hostPort = mainPart.substring(atIndex + 1)
  const decoded = base64Decode(userinfo)
  return (decoded !== null ? splitCredentials(decoded, hostPort) : null) ?? splitCredentials(userinfo, hostPort)
}

// 旧格式: base64(method:password@server:port)
function ssLegacy(mainPart: string): SSCredentials | null {
  const decoded = base64Decode(safeDecodeURIComponent(mainPart))
  if (decoded === null) return null
  const atIndex = decoded.lastIndexOf('@')
  if (atIndex === -1) return null
  return splitCredentials(decoded.substring(0, atIndex), decoded.substring(atIndex + 1))
}

/**
 * 解析 Shadowsocks 协议
 * 格式: ss://base64(method:password)@server:port/?plugin=xxx#name
 * 或: ss://base64(method:password@server:port)#name
 */
function decodeShadowsocks(content: string, sourceTag: string): ShadowsocksNode {
  let mainPart = content
  let fragment: string | undefined
  const hashIndex = mainPart.indexOf('#')
  if (hashIndex !== -1) {
    fragment = mainPart.substring(hashIndex + 1)
    mainPart = mainPart.substring(0, hashIndex)
  }
  let query: Record<string, string> = {}
  const queryIndex = mainPart.indexOf('?')
  if (queryIndex !== -1) {
    query = parseQueryString(mainPart.substring(queryIndex + 1))
    mainPart = mainPart.substring(0, queryIndex)
  }
  mainPart = mainPart.replace(/\/+$/, '')

  let credentials: SSCredentials | null = null
  for (const attempt of [ssSip002, ssLegacy]) {
    credentials = attempt(mainPart)
    if (credentials) break
  }
  if (!credentials) throw new MalformedLink('ss link does not match SIP002 or the legacy base64 form')

  const { host, port: rawPort } = splitHostPort(credentials.hostPort)
  const server = requireServer(host, 'shadowsocks')
  const port = requirePort(rawPort, 'shadowsocks')

  const node: ShadowsocksNode = {
    protocol: 'shadowsocks',
    name: sanitizeName(fragment, server, port),
    server,
    port,
    auth: { cipher: credentials.cipher, password: credentials.password },
    extra: { udp: true },
    sourceTag,
  }

  const pluginInfo = query.plugin ? parseSSPlugin(query.plugin) : null
  if (pluginInfo) {
    node.extra.plugin = pluginInfo.plugin
    if (Object.keys(pluginInfo.pluginOpts).length > 0) {
      node.extra.pluginOpts = pluginInfo.pluginOpts
    }
  }
  return node
}

/**
 * 解析 ShadowsocksR 协议
 * 格式: ssr://base64(server:port:protocol:method:obfs:base64(password)/?obfsparam=...&protoparam=...&remarks=...)
 */
function decodeShadowsocksR(payload: string, sourceTag: string): ShadowsocksRNode {
  const decoded = base64Decode(payload)
  if (decoded === null) throw new MalformedLink('ssr payload is not valid base64')

  const separatorIndex = decoded.indexOf('/?')
  const mainPart = (separatorIndex === -1 ? decoded : decoded.substring(0, separatorIndex)).replace(/\/$/, '')
  const params = separatorIndex === -1 ? {} : parseQueryString(decoded.substring(separatorIndex + 2), false)

  // 从右往左解析，server 可能是 IPv6 地址（包含冒号）
  const segments = mainPart.split(':')
  if (segments.length < 6) throw new MalformedLink('ssr link has fewer than six fields')
  const [portStr, protocol, cipher, obfs, passwordBase64] = segments.slice(-5)
  const server = requireServer(segments.slice(0, -5).join(':'), 'shadowsocksr')
  const port = requirePort(portStr, 'shadowsocksr')

  const password = base64Decode(passwordBase64)
  if (!password) throw new MalformedLink('ssr link has an empty or invalid password')
  if (!cipher || !protocol || !obfs) throw new MalformedLink('ssr link is missing method, protocol or obfs')

  const optional = (key: string): string | undefined => {
    const value = params[key]
    return value ? base64Decode(value) || undefined : undefined
  }

  return {
    protocol: 'shadowsocksr',
    name: sanitizeName(optional('remarks'), server, port),
    server,
    port,
    auth: { cipher, password },
    extra: {
      protocol,
      obfs,
      protocolParam: optional('protoparam'),
      obfsParam: optional('obfsparam'),
      udp: true,
    },
    sourceTag,
  }
}

/**
 * 解析单个代理链接，未知协议抛出 UnsupportedProtocol，缺少必要字段抛出 MalformedLink
 */
export function decodeLink(link: string, sourceTag: string): CanonicalNode {
  const match = LINK_REGEX.exec(link.trim())
  if (!match) throw new UnsupportedProtocol('')

  const scheme = match[1].toLowerCase()
  const content = match[2]
  const protocol = SCHEME_PROTOCOLS.get(scheme)
  if (!protocol) throw new UnsupportedProtocol(scheme)

  switch (protocol) {
    case 'vmess':
      return decodeVmess(content, sourceTag)
    case 'vless':
      return decodeVless(content, sourceTag)
    case 'trojan':
      return decodeTrojan(content, sourceTag)
    case 'shadowsocks':
      return decodeShadowsocks(content, sourceTag)
    case 'shadowsocksr':
      return decodeShadowsocksR(content, sourceTag)
    case 'hysteria':
      return decodeHysteria(content, sourceTag)
    case 'hysteria2':
      return decodeHysteria2(content, sourceTag)
    default: {
      const unreachable: never = protocol
      throw new UnsupportedProtocol(unreachable)
    }
  }
}

export function tryDecodeLink(link: string, sourceTag: string): DecodeResult {
  try {
    return { ok: true, node: decodeLink(link, sourceTag) }
  } catch (e) {
    if (e instanceof GeneratorError) return { ok: false, error: e }
    return { ok: false, error: new MalformedLink(e instanceof Error ? e.message : String(e), { cause: e }) }
  }
}

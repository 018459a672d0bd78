/**
 * CanonicalNode 与 Clash 节点格式之间的转换
 */

import _ from 'lodash'
import { MalformedLink, UnsupportedProtocol } from '@/lib/errors'
import {
  requirePort,
  requireServer,
  sanitizeName,
  transportFrom,
} from '@/lib/proxy-parser'
import type {
  CanonicalNode,
  ClashProxy,
  Protocol,
  TlsOptions,
  TransportOptions,
} from '@/lib/types'
import { asString, compact, isRecord, splitList } from '@/lib/utils'

// Clash type -> protocol
const CLASH_TYPES = new Map<string, Protocol>([
  ['vless', 'vless'],
  ['vmess', 'vmess'],
  ['ss', 'shadowsocks'],
  ['shadowsocks', 'shadowsocks'],
  ['ssr', 'shadowsocksr'],
  ['shadowsocksr', 'shadowsocksr'],
  ['trojan', 'trojan'],
  ['hysteria', 'hysteria'],
  ['hysteria2', 'hysteria2'],
  ['hy2', 'hysteria2'],
])

const PROTOCOL_TYPES: Record<Protocol, string> = {
  vless: 'vless',
  vmess: 'vmess',
  shadowsocks: 'ss',
  shadowsocksr: 'ssr',
  trojan: 'trojan',
  hysteria: 'hysteria',
  hysteria2: 'hysteria2',
}

function transportOpts(extra: TransportOptions): Record<string, unknown> {
  const network = extra.network || 'tcp'
  switch (network) {
    case 'ws':
    case 'httpupgrade':
      return {
        network: 'ws',
        'ws-opts': compact({
          path: extra.path || '/',
          headers: extra.host ? { Host: extra.host } : undefined,
          'v2ray-http-upgrade': network === 'httpupgrade' ? true : undefined,
        }),
      }
    case 'h2':
      return {
        network,
        'h2-opts': compact({ host: extra.host ? [extra.host] : undefined, path: extra.path || '/' }),
      }
    case 'http':
      return {
        network,
        'http-opts': compact({
          path: [extra.path || '/'],
          headers: extra.host ? { Host: [extra.host] } : undefined,
        }),
      }
    case 'grpc':
      return { network, 'grpc-opts': { 'grpc-service-name': extra.serviceName ?? '' } }
    default:
      return { network }
  }
}

function tlsOpts(extra: TlsOptions, sniKey: 'servername' | 'sni'): Record<string, unknown> {
  return {
    [sniKey]: extra.sni,
    'client-fingerprint': extra.fingerprint,
    alpn: extra.alpn,
    'skip-cert-verify': extra.skipCertVerify,
  }
}

/**
 * 转换为 Clash 节点，name/type/server/port 排在最前
 */
export function toClashProxy(node: CanonicalNode): ClashProxy {
  const head: ClashProxy = {
    name: node.name,
    type: PROTOCOL_TYPES[node.protocol],
    server: node.server,
    port: node.port,
  }

  let body: Record<string, unknown>
  switch (node.protocol) {
    case 'vmess':
      body = {
        uuid: node.auth.uuid,
        alterId: node.extra.alterId,
        cipher: node.extra.cipher,
        udp: node.extra.udp,
        tls: node.extra.tls,
        ...(node.extra.tls ? tlsOpts(node.extra, 'servername') : {}),
        ...transportOpts(node.extra),
      }
      break
    case 'vless':
      body = {
        uuid: node.auth.uuid,
        udp: node.extra.udp,
        flow: node.extra.flow,
        encryption: node.extra.encryption && node.extra.encryption !== 'none' ? node.extra.encryption : undefined,
        tls: node.extra.tls,
        ...(node.extra.tls ? tlsOpts(node.extra, 'servername') : {}),
        'reality-opts': node.extra.security === 'reality'
          ? compact({ 'public-key': node.extra.realityPublicKey, 'short-id': node.extra.realityShortId })
          : undefined,
        ...transportOpts(node.extra),
      }
      break
    case 'trojan':
      body = {
        password: node.auth.password,
        udp: node.extra.udp,
        ...tlsOpts(node.extra, 'sni'),
        ...transportOpts(node.extra),
      }
      break
    case 'shadowsocks':
      body = {
        cipher: node.auth.cipher,
        password: node.auth.password,
        udp: node.extra.udp,
        plugin: node.extra.plugin,
        'plugin-opts': node.extra.pluginOpts,
      }
      break
    case 'shadowsocksr':
      body = {
        cipher: node.auth.cipher,
        password: node.auth.password,
        protocol: node.extra.protocol,
        'protocol-param': node.extra.protocolParam,
        obfs: node.extra.obfs,
        'obfs-param': node.extra.obfsParam,
        udp: node.extra.udp,
      }
      break
    case 'hysteria':
      body = {
        'auth-str': node.auth.auth,
        protocol: node.extra.protocol,
        up: node.extra.up,
        down: node.extra.down,
        obfs: node.extra.obfs,
        ...tlsOpts(node.extra, 'sni'),
      }
      break
    case 'hysteria2':
      body = {
        password: node.auth.password,
        ports: node.extra.ports,
        obfs: node.extra.obfs,
        'obfs-password': node.extra.obfsPassword,
        udp: node.extra.udp,
        ...tlsOpts(node.extra, 'sni'),
      }
      break
    default: {
      const unreachable: never = node
      throw new UnsupportedProtocol(String(unreachable))
    }
  }

  return { ...head, ...compact(body) }
}

function bool(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') return value
  const text = asString(value).toLowerCase()
  if (text === 'true' || text === '1') return true
  if (text === 'false' || text === '0') return false
  return fallback
}

function firstString(value: unknown): string {
  return Array.isArray(value) ? asString(value[0]) : asString(value)
}

function alpnOf(value: unknown): string[] | undefined {
  if (Array.isArray(value)) {
    const items = value.map(asString).filter(Boolean)
    return items.length > 0 ? items : undefined
  }
  return splitList(asString(value))
}

function readTransport(entry: Record<string, unknown>): TransportOptions {
  let network = asString(entry.network) || 'tcp'
  if (network === 'ws' && _.get(entry, 'ws-opts.v2ray-http-upgrade') === true) network = 'httpupgrade'

  const path =
    firstString(_.get(entry, 'ws-opts.path')) ||
    firstString(_.get(entry, 'h2-opts.path')) ||
    firstString(_.get(entry, 'http-opts.path'))
  const host =
    firstString(_.get(entry, 'ws-opts.headers.Host')) ||
    firstString(_.get(entry, 'h2-opts.host')) ||
    firstString(_.get(entry, 'http-opts.headers.Host'))
  const serviceName = asString(_.get(entry, 'grpc-opts.grpc-service-name'))

  return transportFrom(network, path, host, serviceName)
}

function readTls(entry: Record<string, unknown>, defaultSni: string | undefined, defaultFingerprint?: string): TlsOptions {
  return {
    tls: true,
    sni: asString(entry.servername) || asString(entry.sni) || defaultSni,
    fingerprint: asString(entry['client-fingerprint']) || defaultFingerprint,
    alpn: alpnOf(entry.alpn),
    skipCertVerify: bool(entry['skip-cert-verify'], false),
  }
}

function required(value: string, what: string, type: string): string {
  if (!value) throw new MalformedLink(`${type} entry is missing "${what}"`)
  return value
}

function mbps(value: unknown, key: string): number {
  if (value === undefined || value === null || value === '') return 50
  const parsed = typeof value === 'number' ? value : Number(asString(value).replace(/\s*mbps$/i, ''))
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new MalformedLink(`hysteria entry has a non-numeric "${key}"`)
  }
  return parsed
}

function pluginOptsOf(value: unknown): Record<string, string | boolean> | undefined {
  if (!isRecord(value)) return undefined
  const opts: Record<string, string | boolean> = {}
  for (const [key, item] of Object.entries(value)) {
    if (typeof item === 'boolean') opts[key] = item
    else if (asString(item)) opts[key] = asString(item)
  }
  return Object.keys(opts).length > 0 ? opts : undefined
}

/**
 * 从 Clash 节点（YAML/JSON 结构）直接构造 CanonicalNode
 */
export function fromClashProxy(entry: unknown, sourceTag: string): CanonicalNode {
  if (!isRecord(entry)) throw new MalformedLink('proxy entry is not a mapping')

  const type = asString(entry.type).toLowerCase()
  const protocol = CLASH_TYPES.get(type)
  if (!protocol) throw new UnsupportedProtocol(type || 'unknown')

  const server = requireServer(asString(entry.server), protocol)
  const port = requirePort(asString(entry.port), protocol, protocol === 'hysteria' || protocol === 'hysteria2' ? 443 : undefined)
  const name = sanitizeName(asString(entry.name), server, port)
  const udp = bool(entry.udp, true)

  switch (protocol) {
    case 'vmess': {
      const alterId = parseInt(asString(entry.alterId), 10)
      const tls = bool(entry.tls, false)
      const transport = readTransport(entry)
      return {
        protocol,
        name,
        server,
        port,
        auth: { uuid: required(asString(entry.uuid), 'uuid', type) },
        extra: {
          alterId: Number.isNaN(alterId) ? 0 : alterId,
          cipher: asString(entry.cipher) || 'auto',
          ...transport,
          udp,
          ...(tls ? readTls(entry, transport.host || undefined) : {}),
        },
        sourceTag,
      }
    }
    case 'vless': {
      const publicKey = asString(_.get(entry, 'reality-opts.public-key'))
      const security = publicKey ? 'reality' : bool(entry.tls, false) ? 'tls' : 'none'
      return {
        protocol,
        name,
        server,
        port,
        auth: { uuid: required(asString(entry.uuid), 'uuid', type) },
        extra: {
          security,
          encryption: asString(entry.encryption) || 'none',
          flow: asString(entry.flow) || undefined,
          ...readTransport(entry),
          udp,
          ...(security !== 'none' ? readTls(entry, server, 'chrome') : {}),
          realityPublicKey: publicKey || undefined,
          realityShortId: asString(_.get(entry, 'reality-opts.short-id')) || undefined,
        },
        sourceTag,
      }
    }
    case 'trojan':
      return {
        protocol,
        name,
        server,
        port,
        auth: { password: required(asString(entry.password), 'password', type) },
        extra: {
          ...readTransport(entry),
          ...readTls(entry, server),
          udp,
        },
        sourceTag,
      }
    case 'shadowsocks':
      return {
        protocol,
        name,
        server,
        port,
        auth: {
          cipher: required(asString(entry.cipher), 'cipher', type),
          password: asString(entry.password),
        },
        extra: {
          udp,
          plugin: asString(entry.plugin) || undefined,
          pluginOpts: pluginOptsOf(entry['plugin-opts']),
        },
        sourceTag,
      }
    case 'shadowsocksr':
      return {
        protocol,
        name,
        server,
        port,
        auth: {
          cipher: required(asString(entry.cipher), 'cipher', type),
          password: required(asString(entry.password), 'password', type),
        },
        extra: {
          protocol: required(asString(entry.protocol), 'protocol', type),
          obfs: required(asString(entry.obfs), 'obfs', type),
          protocolParam: asString(entry['protocol-param']) || undefined,
          obfsParam: asString(entry['obfs-param']) || undefined,
          udp,
        },
        sourceTag,
      }
    case 'hysteria':
      return {
        protocol,
        name,
        server,
        port,
        auth: { auth: required(asString(entry['auth-str']) || asString(entry.auth), 'auth-str', type) },
        extra: {
          protocol: asString(entry.protocol) || undefined,
          up: mbps(entry.up, 'up'),
          down: mbps(entry.down, 'down'),
          obfs: asString(entry.obfs) || undefined,
          ...readTls(entry, undefined),
        },
        sourceTag,
      }
    case 'hysteria2':
      return {
        protocol,
        name,
        server,
        port,
        auth: { password: required(asString(entry.password) || asString(entry.auth), 'password', type) },
        extra: {
          obfs: asString(entry.obfs) || undefined,
          obfsPassword: asString(entry['obfs-password']) || undefined,
          ports: asString(entry.ports) || undefined,
          ...readTls(entry, undefined),
          udp,
        },
        sourceTag,
      }
    default: {
      const unreachable: never = protocol
      throw new UnsupportedProtocol(unreachable)
    }
  }
}

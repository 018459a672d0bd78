// Canonical node model and the structures that flow through the generator

export const PROTOCOLS = [
  'vless',
  'vmess',
  'shadowsocks',
  'shadowsocksr',
  'trojan',
  'hysteria',
  'hysteria2',
] as const

export type Protocol = typeof PROTOCOLS[number]

export interface TransportOptions {
  network?: string
  path?: string
  host?: string
  serviceName?: string
}

export interface TlsOptions {
  tls?: boolean
  sni?: string
  fingerprint?: string
  alpn?: string[]
  skipCertVerify?: boolean
}

export interface VlessExtra extends TransportOptions, TlsOptions {
  security: 'none' | 'tls' | 'reality'
  encryption?: string
  flow?: string
  realityPublicKey?: string
  realityShortId?: string
  udp?: boolean
}

export interface VmessExtra extends TransportOptions, TlsOptions {
  alterId: number
  cipher: string
  udp?: boolean
}

export interface ShadowsocksExtra {
  plugin?: string
  pluginOpts?: Record<string, string | boolean>
  udp?: boolean
}

export interface ShadowsocksRExtra {
  protocol: string
  obfs: string
  protocolParam?: string
  obfsParam?: string
  udp?: boolean
}

export interface TrojanExtra extends TransportOptions, TlsOptions {
  udp?: boolean
}

export interface HysteriaExtra extends TlsOptions {
  protocol?: string
  up: number
  down: number
  obfs?: string
}

export interface Hysteria2Extra extends TlsOptions {
  obfs?: string
  obfsPassword?: string
  ports?: string
  udp?: boolean
}

interface NodeBase<P extends Protocol, A, E> {
  protocol: P
  name: string
  server: string
  port: number
  auth: A
  extra: E
  sourceTag: string
}

export type VlessNode = NodeBase<'vless', { uuid: string }, VlessExtra>
export type VmessNode = NodeBase<'vmess', { uuid: string }, VmessExtra>
export type ShadowsocksNode = NodeBase<'shadowsocks', { cipher: string; password: string }, ShadowsocksExtra>
export type ShadowsocksRNode = NodeBase<'shadowsocksr', { cipher: string; password: string }, ShadowsocksRExtra>
export type TrojanNode = NodeBase<'trojan', { password: string }, TrojanExtra>
export type HysteriaNode = NodeBase<'hysteria', { auth: string }, HysteriaExtra>
export type Hysteria2Node = NodeBase<'hysteria2', { password: string }, Hysteria2Extra>

export type CanonicalNode =
  | VlessNode
  | VmessNode
  | ShadowsocksNode
  | ShadowsocksRNode
  | TrojanNode
  | HysteriaNode
  | Hysteria2Node

/** Stable key over (protocol, server, port, auth). */
export type NodeIdentity = string

export type SourceKind = 'remote' | 'inline' | 'file'

export interface SubscriptionSource {
  origin: string
  kind: SourceKind
  tag?: string
}

export type ListenerType = 'http' | 'socks' | 'mixed'

export const LISTENER_TYPES: readonly ListenerType[] = ['http', 'socks', 'mixed']

export interface PortMapping {
  nodeRef: NodeIdentity
  nodeName: string
  port: number
  listenerType: ListenerType
}

// Clash 节点格式（输出）
export interface ClashProxy {
  name: string
  type: string
  server: string
  port: number
  [key: string]: unknown
}

export interface ProxyGroupTemplate {
  name: string
  type: string
  proxies?: string[]
  'include-all'?: boolean
  'include-all-proxies'?: boolean
  [key: string]: unknown
}

export interface RuleTemplate {
  proxyGroups: ProxyGroupTemplate[]
  rules: string[]
  settings: Record<string, unknown>
}

export interface ClashListener {
  name: string
  type: ListenerType
  port: number
  proxy: string
}

export interface GeneratedConfig {
  settings: Record<string, unknown>
  proxies: ClashProxy[]
  'proxy-groups': ProxyGroupTemplate[]
  listeners: ClashListener[]
  rules: string[]
  'rule-providers'?: Record<string, unknown>
}

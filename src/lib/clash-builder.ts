import { dump as dumpYAML } from 'js-yaml'
import { toClashProxy } from '@/lib/clash-proxy'
import {
  EmptyNodeSet,
  PortConflict,
  TemplateError,
  UnknownNodeReference,
} from '@/lib/errors'
import { createLogger } from '@/lib/logger'
import { nodeIdentity } from '@/lib/proxy-parser'
import {
  BUILTIN_POLICIES,
  PROXY_NODES_MARKER,
  formatValidationIssues,
  isAllNodesGroup,
  validateTemplate,
} from '@/lib/template-validator'
import type {
  CanonicalNode,
  ClashListener,
  ClashProxy,
  GeneratedConfig,
  PortMapping,
  ProxyGroupTemplate,
  RuleTemplate,
} from '@/lib/types'
import { isRecord, parsePort } from '@/lib/utils'

const logger = createLogger('builder')

export interface AssembleOptions {
  basePort: number
  socksPort: number
}

export interface AssembleResult {
  config: GeneratedConfig
  warnings: string[]
}

function baseSettings(options: AssembleOptions): Record<string, unknown> {
  return {
    port: options.basePort,
    'socks-port': options.socksPort,
    'allow-lan': true,
    mode: 'Rule',
    'log-level': 'info',
    'external-controller': ':9090',
    dns: {
      enable: true,
      listen: '0.0.0.0:53',
      ipv6: true,
      'enhanced-mode': 'fake-ip',
      nameserver: ['114.114.114.114', '8.8.8.8', '223.5.5.5'],
    },
  }
}

const INBOUND_PORT_KEYS = ['port', 'socks-port', 'mixed-port', 'redir-port', 'tproxy-port'] as const

/**
 * 基础设置被模板覆盖后实际占用的入站端口（端口 -> 设置项）
 */
export function inboundPorts(template: RuleTemplate, options: AssembleOptions): Map<number, string> {
  const settings = { ...baseSettings(options), ...template.settings }
  const ports = new Map<number, string>()
  for (const key of INBOUND_PORT_KEYS) {
    const port = parsePort(settings[key])
    if (port !== null && !ports.has(port)) ports.set(port, key)
  }
  return ports
}

function dstPort(rule: string): number | undefined {
  const parts = rule.split(',').map(part => part.trim())
  if (parts[0] !== 'DST-PORT') return undefined
  const port = Number(parts[1])
  return Number.isInteger(port) ? port : undefined
}

export class ClashConfigBuilder {
  private readonly warnings: string[] = []
  private readonly nodeNames: string[]

  constructor(
    private readonly nodes: readonly CanonicalNode[],
    private readonly template: RuleTemplate,
    private readonly mappings: readonly PortMapping[],
    private readonly options: AssembleOptions
  ) {
    this.nodeNames = nodes.map(node => node.name)
  }

  build(): AssembleResult {
    this.validate()

    const proxies = this.convertProxies()
    const proxyGroups = this.buildProxyGroups()
    const listeners = this.buildListeners()
    const rules = this.buildRules(listeners)

    // rule-providers 放在最后
    const { 'rule-providers': ruleProviders, ...settings } = {
      ...baseSettings(this.options),
      ...this.template.settings,
    }

    const config: GeneratedConfig = {
      settings,
      proxies,
      'proxy-groups': proxyGroups,
      listeners,
      rules,
    }
    if (ruleProviders !== undefined && ruleProviders !== null) {
      config['rule-providers'] = isRecord(ruleProviders) ? ruleProviders : {}
    }

    logger.info(
      `生成配置: ${proxies.length} 个节点, ${proxyGroups.length} 个代理组, ${listeners.length} 个监听器, ${rules.length} 条规则`
    )
    return { config, warnings: this.warnings }
  }

  private validate(): void {
    const result = validateTemplate({
      ...this.template.settings,
      'proxy-groups': this.template.proxyGroups,
      rules: this.template.rules,
    })
    if (!result.valid) {
      throw new TemplateError(`模板无效\n${formatValidationIssues(result.issues.filter(issue => issue.level === 'error'))}`)
    }
    if (this.nodes.length === 0 && this.template.proxyGroups.some(isAllNodesGroup)) {
      throw new EmptyNodeSet()
    }
    const inbound = inboundPorts(this.template, this.options)
    for (const mapping of this.mappings) {
      const key = inbound.get(mapping.port)
      if (key !== undefined) throw new PortConflict(mapping.port, `the ${key} setting`)
    }
  }

  private convertProxies(): ClashProxy[] {
    return this.nodes.map(toClashProxy)
  }

  private warn(message: string): void {
    this.warnings.push(message)
    logger.warn(message)
  }

  private buildProxyGroups(): ProxyGroupTemplate[] {
    const groupNames = new Set(this.template.proxyGroups.map(group => group.name))
    const nodeNames = new Set(this.nodeNames)

    return this.template.proxyGroups.map(group => {
      const members: string[] = []
      const seen = new Set<string>()
      const add = (name: string) => {
        if (seen.has(name)) return
        seen.add(name)
        members.push(name)
      }

      for (const member of group.proxies ?? []) {
        if (member === PROXY_NODES_MARKER) {
          this.nodeNames.forEach(add)
        } else if (nodeNames.has(member) || groupNames.has(member) || BUILTIN_POLICIES.has(member)) {
          add(member)
        } else {
          this.warn(`代理组 "${group.name}" 中的 "${member}" 不存在，已移除`)
        }
      }

      const result: ProxyGroupTemplate = { ...group }
      delete result.proxies

      const selfFilling = isAllNodesGroup(group) || Array.isArray(group.use) || typeof group.filter === 'string'
      if (members.length > 0) {
        result.proxies = members
      } else if (!selfFilling) {
        this.warn(`代理组 "${group.name}" 没有可用的成员，使用 DIRECT`)
        result.proxies = ['DIRECT']
      }
      return reorderGroupFields(result)
    })
  }

  private currentName(mapping: PortMapping, names: Map<string, string>): string {
    const name = names.get(mapping.nodeRef)
    if (name === undefined) throw new UnknownNodeReference(mapping.nodeName)
    return name
  }

  private buildListeners(): ClashListener[] {
    const names = new Map(this.nodes.map((node): [string, string] => [nodeIdentity(node), node.name]))
    return this.mappings.map((mapping, i) => ({
      name: `${mapping.listenerType}${i}`,
      type: mapping.listenerType,
      port: mapping.port,
      proxy: this.currentName(mapping, names),
    }))
  }

  private buildRules(listeners: ClashListener[]): string[] {
    // 端口分流规则放在最前，去掉模板中指向相同端口的 DST-PORT 规则
    const mappedPorts = new Set(listeners.map(listener => listener.port))
    const portRules = listeners.map(listener => `DST-PORT,${listener.port},${listener.proxy}`)
    const templateRules = this.template.rules.filter(rule => {
      const port = dstPort(rule)
      return port === undefined || !mappedPorts.has(port)
    })
    return [...portRules, ...templateRules]
  }
}

/**
 * 重新排序代理组字段
 */
function reorderGroupFields(group: ProxyGroupTemplate): ProxyGroupTemplate {
  const ordered: ProxyGroupTemplate = { name: group.name, type: group.type }
  const priorityKeys = ['proxies', 'use', 'url', 'interval', 'strategy', 'lazy', 'hidden']

  for (const key of priorityKeys) {
    if (key in group) ordered[key] = group[key]
  }
  for (const [key, value] of Object.entries(group)) {
    if (!(key in ordered)) ordered[key] = value
  }
  return ordered
}

/**
 * 组装 Clash 配置：节点、代理组、端口监听器和规则
 */
export function assembleConfig(
  nodes: readonly CanonicalNode[],
  template: RuleTemplate,
  mappings: readonly PortMapping[],
  options: AssembleOptions
): AssembleResult {
  return new ClashConfigBuilder(nodes, template, mappings, options).build()
}

/**
 * 输出 YAML：基础设置、proxies、proxy-groups、listeners（有映射时）、rules、rule-providers
 */
export function renderConfig(config: GeneratedConfig): string {
  const document: Record<string, unknown> = {
    ...config.settings,
    proxies: config.proxies,
    'proxy-groups': config['proxy-groups'],
  }
  if (config.listeners.length > 0) document.listeners = config.listeners
  document.rules = config.rules
  if (config['rule-providers']) document['rule-providers'] = config['rule-providers']

  return dumpYAML(document, { lineWidth: -1, noRefs: true })
}

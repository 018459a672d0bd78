import { load as parseYAML } from 'js-yaml'
import { describe, expect, it } from 'vitest'
import { assembleConfig, inboundPorts, renderConfig, type AssembleOptions } from '@/lib/clash-builder'
import { EmptyNodeSet, PortConflict, TemplateError, UnknownNodeReference } from '@/lib/errors'
import { assignPorts } from '@/lib/port-mapping'
import { decodeLink, nodeIdentity } from '@/lib/proxy-parser'
import type { RuleTemplate } from '@/lib/types'
import { isRecord } from '@/lib/utils'
import { HY2_NODE, TROJAN_P1 } from './fixtures'

const OPTIONS: AssembleOptions = { basePort: 7890, socksPort: 7891 }

const t1 = decodeLink(TROJAN_P1, 's')
const h2 = decodeLink(HY2_NODE, 's')

function template(overrides: Partial<RuleTemplate> = {}): RuleTemplate {
  return {
    proxyGroups: [{ name: 'Proxy', type: 'select', proxies: ['__PROXY_NODES__', 'DIRECT'] }],
    rules: ['DOMAIN-SUFFIX,example.com,Proxy', 'DST-PORT,40000,DIRECT', 'MATCH,Proxy'],
    settings: {},
    ...overrides,
  }
}

describe('assembleConfig', () => {
  it('expands the node marker in proxy groups', () => {
    const { config, warnings } = assembleConfig([t1, h2], template(), [], OPTIONS)
    expect(config['proxy-groups']).toEqual([{ name: 'Proxy', type: 'select', proxies: ['t1', 'H2', 'DIRECT'] }])
    expect(config.proxies.map(proxy => proxy.name)).toEqual(['t1', 'H2'])
    expect(warnings).toEqual([])
  })

  it('emits base settings that the template can override', () => {
    const { config } = assembleConfig(
      [t1],
      template({ settings: { 'log-level': 'debug', 'rule-providers': { ads: { type: 'http' } } } }),
      [],
      OPTIONS
    )
    expect(config.settings).toMatchObject({ port: 7890, 'socks-port': 7891, mode: 'Rule', 'log-level': 'debug' })
    expect(config.settings).not.toHaveProperty('rule-providers')
    expect(config['rule-providers']).toEqual({ ads: { type: 'http' } })
  })

  it('puts port rules first and drops template rules for mapped ports', () => {
    const mappings = assignPorts([t1], 40000, 'mixed')
    const { config } = assembleConfig([t1, h2], template(), mappings, OPTIONS)

    expect(config.listeners).toEqual([{ name: 'mixed0', type: 'mixed', port: 40000, proxy: 't1' }])
    expect(config.rules).toEqual(['DST-PORT,40000,t1', 'DOMAIN-SUFFIX,example.com,Proxy', 'MATCH,Proxy'])
  })

  it('keeps template rules when no port is mapped', () => {
    const { config } = assembleConfig([t1], template(), [], OPTIONS)
    expect(config.listeners).toEqual([])
    expect(config.rules).toEqual(template().rules)
  })

  it('names listeners after their type and position', () => {
    const mappings = [
      ...assignPorts([t1], 40000, 'http'),
      ...assignPorts([h2], 40001, 'socks'),
    ]
    const { config } = assembleConfig([t1, h2], template(), mappings, OPTIONS)
    expect(config.listeners.map(listener => listener.name)).toEqual(['http0', 'socks1'])
  })

  it('points listeners at the current node name', () => {
    const mapping = { nodeRef: nodeIdentity(t1), nodeName: 'old name', port: 40000, listenerType: 'mixed' as const }
    const { config } = assembleConfig([t1], template(), [mapping], OPTIONS)
    expect(config.listeners[0]?.proxy).toBe('t1')
  })

  it('rejects mappings for nodes that are not present', () => {
    const mappings = assignPorts([h2], 40000, 'mixed')
    expect(() => assembleConfig([t1], template(), mappings, OPTIONS)).toThrow(UnknownNodeReference)
  })

  it('removes unknown group members with a warning', () => {
    const { config, warnings } = assembleConfig(
      [t1],
      template({ proxyGroups: [{ name: 'Proxy', type: 'select', proxies: ['Ghost', 't1'] }] }),
      [],
      OPTIONS
    )
    expect(config['proxy-groups'][0]?.proxies).toEqual(['t1'])
    expect(warnings).toEqual(['代理组 "Proxy" 中的 "Ghost" 不存在，已移除'])
  })

  it('falls back to DIRECT for a group left empty', () => {
    const { config, warnings } = assembleConfig(
      [t1],
      template({ proxyGroups: [{ name: 'Proxy', type: 'select', proxies: ['Ghost'] }] }),
      [],
      OPTIONS
    )
    expect(config['proxy-groups'][0]?.proxies).toEqual(['DIRECT'])
    expect(warnings).toEqual(['代理组 "Proxy" 中的 "Ghost" 不存在，已移除', '代理组 "Proxy" 没有可用的成员，使用 DIRECT'])
  })

  it('keeps include-all groups for the client to fill', () => {
    const { config } = assembleConfig(
      [t1],
      template({ proxyGroups: [{ name: 'Proxy', type: 'select', 'include-all': true }] }),
      [],
      OPTIONS
    )
    expect(config['proxy-groups']).toEqual([{ name: 'Proxy', type: 'select', 'include-all': true }])
  })

  it('orders group fields the way clients expect', () => {
    const { config } = assembleConfig(
      [t1],
      template({
        proxyGroups: [
          { name: 'Auto', type: 'url-test', tolerance: 50, url: 'http://www.gstatic.com/generate_204', interval: 300, proxies: ['__PROXY_NODES__'] },
          { name: 'Proxy', type: 'select', proxies: ['Auto'] },
        ],
      }),
      [],
      OPTIONS
    )
    expect(Object.keys(config['proxy-groups'][0] ?? {})).toEqual(['name', 'type', 'proxies', 'url', 'interval', 'tolerance'])
  })

  it('fails with EmptyNodeSet when a group needs nodes and there are none', () => {
    expect(() => assembleConfig([], template(), [], OPTIONS)).toThrow(EmptyNodeSet)
  })

  it('allows an empty node set when no group lists all nodes', () => {
    const { config } = assembleConfig(
      [],
      template({ proxyGroups: [{ name: 'Proxy', type: 'select', proxies: ['DIRECT'] }] }),
      [],
      OPTIONS
    )
    expect(config.proxies).toEqual([])
  })

  it('rejects templates with circular group references', () => {
    const cyclic = template({
      proxyGroups: [
        { name: 'A', type: 'select', proxies: ['B'] },
        { name: 'B', type: 'select', proxies: ['A'] },
      ],
      rules: ['MATCH,A'],
    })
    expect(() => assembleConfig([t1], cyclic, [], OPTIONS)).toThrow(TemplateError)
    expect(() => assembleConfig([t1], cyclic, [], OPTIONS)).toThrow('检测到代理组循环引用: A → B → A')
  })
})

describe('renderConfig', () => {
  it('writes sections in order with listeners only when present', () => {
    const mappings = assignPorts([t1], 40000, 'mixed')
    const withListeners = parseYAML(renderConfig(assembleConfig([t1], template(), mappings, OPTIONS).config))
    const without = parseYAML(renderConfig(assembleConfig([t1], template(), [], OPTIONS).config))

    const base = ['port', 'socks-port', 'allow-lan', 'mode', 'log-level', 'external-controller', 'dns']
    expect(isRecord(withListeners) && Object.keys(withListeners)).toEqual([
      ...base,
      'proxies',
      'proxy-groups',
      'listeners',
      'rules',
    ])
    expect(isRecord(without) && Object.keys(without)).toEqual([...base, 'proxies', 'proxy-groups', 'rules'])
  })

  it('writes rule-providers last', () => {
    const { config } = assembleConfig(
      [t1],
      template({ settings: { 'rule-providers': { ads: { type: 'http', url: 'https://rules.example.com/ads.yaml' } } } }),
      [],
      OPTIONS
    )
    const doc = parseYAML(renderConfig(config))
    expect(isRecord(doc) && Object.keys(doc).slice(-2)).toEqual(['rules', 'rule-providers'])
  })

  it('writes the proxies as clash entries', () => {
    const doc = parseYAML(renderConfig(assembleConfig([t1], template(), [], OPTIONS).config))
    expect(isRecord(doc) && doc.proxies).toEqual([
      {
        name: 't1',
        type: 'trojan',
        server: '9.9.9.9',
        port: 443,
        password: 'p1',
        udp: true,
        sni: '9.9.9.9',
        'skip-cert-verify': false,
        network: 'tcp',
      },
    ])
  })
})

describe('inboundPorts', () => {
  it('reads the base ports after template overrides', () => {
    const ports = inboundPorts(template({ settings: { 'mixed-port': 42000, port: 42001 } }), OPTIONS)
    expect([...ports]).toEqual([
      [42001, 'port'],
      [7891, 'socks-port'],
      [42000, 'mixed-port'],
    ])
  })

  it('ignores values that are not ports', () => {
    const ports = inboundPorts(template({ settings: { 'redir-port': 'auto', 'tproxy-port': 7893 } }), OPTIONS)
    expect([...ports.keys()]).toEqual([7890, 7891, 7893])
  })
})

describe('listener port conflicts', () => {
  it('rejects a mapping on a port the template listens on', () => {
    const mappings = assignPorts([t1], 42000, 'mixed')
    expect(() =>
      assembleConfig([t1], template({ settings: { 'mixed-port': 42000 } }), mappings, OPTIONS)
    ).toThrow(new PortConflict(42000, 'the mixed-port setting'))
  })
})

describe('unicode names', () => {
  it('writes node names without escaping', () => {
    const node = decodeLink(`trojan://p1@9.9.9.9:443#${encodeURIComponent('🇭🇰 香港 01')}`, 's')
    const yaml = renderConfig(assembleConfig([node], template(), [], OPTIONS).config)
    expect(yaml).toContain('  - name: 🇭🇰 香港 01\n')
    expect(yaml).toContain('      - 🇭🇰 香港 01\n')
  })
})

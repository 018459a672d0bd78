import { load as parseYAML } from 'js-yaml'
import { describe, expect, it } from 'vitest'
import { EmptyNodeSet, GenerationAborted, PortConflict, UnknownNodeReference } from '@/lib/errors'
import { DEFAULT_MAPPING_START_PORT, generateConfig, type GenerateRequest } from '@/lib/generator'
import { loadTemplate } from '@/lib/templates'
import { isRecord } from '@/lib/utils'
import { clientWith, routes } from './http-stub'

const SOURCE_A = 'trojan://p1@9.9.9.9:443#t1\nfoo://x'
const SOURCE_B = 'trojan://p1@9.9.9.9:443#dup\nhy2://pw@6.6.6.6:443#t1'

function request(extra: Partial<GenerateRequest> = {}): GenerateRequest {
  return {
    sources: [
      { origin: SOURCE_A, kind: 'inline' },
      { origin: SOURCE_B, kind: 'inline' },
    ],
    ...extra,
  }
}

describe('generateConfig', () => {
  it('merges sources into a config with the default template', async () => {
    const result = await generateConfig(request(), { logLevel: 'silent' })

    expect(result.nodes.map(node => node.name)).toEqual(['t1', 't1_1'])
    expect(result.config['proxy-groups'][0]?.proxies).toEqual(['♻️ 自动选择', 'DIRECT', 't1', 't1_1'])
    expect(result.mappings).toEqual([])
    expect(result.report.totals).toEqual({
      sources: 2,
      failedSources: 0,
      candidates: 4,
      decoded: 3,
      skipped: 1,
      nodes: 2,
      duplicates: 1,
      renamed: 1,
      mappings: 0,
    })
    expect(result.report.duplicates).toEqual([
      { name: 'dup', sourceTag: 'inline-2', keptName: 't1', keptSourceTag: 'inline-1' },
    ])
    expect(result.report.renamed).toEqual([{ from: 't1', to: 't1_1', sourceTag: 'inline-2' }])
  })

  it('renders the config it returns', async () => {
    const result = await generateConfig(request(), { logLevel: 'silent' })
    const doc = parseYAML(result.yaml)
    expect(isRecord(doc) && doc.proxies).toEqual(result.config.proxies)
    expect(isRecord(doc) && doc.rules).toEqual(result.config.rules)
  })

  it('maps every node when no selection is given', async () => {
    const result = await generateConfig(request({ portMapping: { startPort: 40000 } }), { logLevel: 'silent' })

    expect(result.mappings.map(mapping => [mapping.nodeName, mapping.port, mapping.listenerType])).toEqual([
      ['t1', 40000, 'mixed'],
      ['t1_1', 40001, 'mixed'],
    ])
    expect(result.config.listeners.map(listener => listener.name)).toEqual(['mixed0', 'mixed1'])
    expect(result.config.rules.slice(0, 2)).toEqual(['DST-PORT,40000,t1', 'DST-PORT,40001,t1_1'])
  })

  it('uses the default start port', async () => {
    const result = await generateConfig(request({ portMapping: { nodes: ['t1'] } }), { logLevel: 'silent' })
    expect(result.mappings.map(mapping => mapping.port)).toEqual([DEFAULT_MAPPING_START_PORT])
  })

  it('honours selected nodes with explicit ports', async () => {
    const result = await generateConfig(
      request({ portMapping: { listenerType: 'socks', nodes: [{ name: 't1_1', port: 45000 }] } }),
      { logLevel: 'silent' }
    )
    expect(result.mappings.map(mapping => [mapping.nodeName, mapping.port, mapping.listenerType])).toEqual([
      ['t1_1', 45000, 'socks'],
    ])
  })

  it('does not hand out the base ports', async () => {
    const result = await generateConfig(request({ portMapping: { startPort: 7890 } }), { logLevel: 'silent' })
    expect(result.mappings.map(mapping => mapping.port)).toEqual([7892, 7893])
  })

  it('does not hand out ports the template listens on', async () => {
    const template = loadTemplate(
      'mixed-port: 42000\nport: 42001\nproxy-groups:\n  - { name: P, type: select, proxies: [__PROXY_NODES__] }\nrules:\n  - MATCH,P\n'
    )
    const result = await generateConfig(request({ template, portMapping: {} }), { logLevel: 'silent' })

    expect(result.mappings.map(mapping => mapping.port)).toEqual([42002, 42003])
    expect(result.config.settings).toMatchObject({ 'mixed-port': 42000, port: 42001 })
  })

  it('rejects an explicit port the template listens on', async () => {
    const template = loadTemplate(
      'mixed-port: 42000\nproxy-groups:\n  - { name: P, type: select, proxies: [__PROXY_NODES__] }\nrules:\n  - MATCH,P\n'
    )
    await expect(
      generateConfig(request({ template, portMapping: { nodes: [{ name: 't1', port: 42000 }] } }), { logLevel: 'silent' })
    ).rejects.toBeInstanceOf(PortConflict)
  })

  it('rejects selections of unknown nodes', async () => {
    await expect(
      generateConfig(request({ portMapping: { nodes: ['nope'] } }), { logLevel: 'silent' })
    ).rejects.toBeInstanceOf(UnknownNodeReference)
  })

  it('uses a given template', async () => {
    const template = loadTemplate('proxy-groups:\n  - { name: P, type: select, proxies: [__PROXY_NODES__] }\nrules:\n  - MATCH,P\n')
    const result = await generateConfig(request({ template }), { logLevel: 'silent' })
    expect(result.config.rules).toEqual(['MATCH,P'])
    expect(result.config['proxy-groups']).toEqual([{ name: 'P', type: 'select', proxies: ['t1', 't1_1'] }])
  })

  it('fails with EmptyNodeSet when nothing decodes', async () => {
    await expect(
      generateConfig({ sources: [{ origin: 'hello, world!', kind: 'inline' }] }, { logLevel: 'silent' })
    ).rejects.toBeInstanceOf(EmptyNodeSet)
  })

  it('keeps going when a remote source fails', async () => {
    const result = await generateConfig(
      {
        sources: [
          { origin: 'https://down.example.com/sub', kind: 'remote' },
          { origin: 'https://up.example.com/sub', kind: 'remote', tag: 'up' },
        ],
      },
      {
        logLevel: 'silent',
        maxRetries: 1,
        retryDelaySeconds: 0,
        client: clientWith(routes({ 'https://up.example.com/sub': SOURCE_B })),
      }
    )

    expect(result.report.sources.map(source => [source.sourceTag, source.status])).toEqual([
      ['https://down.example.com/sub', 'failed'],
      ['up', 'ok'],
    ])
    expect(result.nodes.map(node => node.name)).toEqual(['dup', 't1'])
    expect(result.report.totals.failedSources).toBe(1)
  })

  it('rejects with GenerationAborted when cancelled', async () => {
    const controller = new AbortController()
    controller.abort()
    await expect(generateConfig(request(), { logLevel: 'silent' }, controller.signal)).rejects.toBeInstanceOf(
      GenerationAborted
    )
  })
})

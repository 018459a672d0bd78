import type { AxiosInstance } from 'axios'
import { assembleConfig, inboundPorts, renderConfig } from '@/lib/clash-builder'
import { resolveOptions, type GeneratorOptions } from '@/lib/config'
import { GenerationAborted, UnknownNodeReference } from '@/lib/errors'
import { createLogger, setLogLevel } from '@/lib/logger'
import { mergeNodes, type DuplicateRecord, type RenameRecord } from '@/lib/node-merger'
import { assignPorts, type PortRequest } from '@/lib/port-mapping'
import { resolveSources, type SourceReport } from '@/lib/subscription/resolver'
import { defaultTemplate } from '@/lib/templates'
import type {
  CanonicalNode,
  GeneratedConfig,
  ListenerType,
  PortMapping,
  RuleTemplate,
  SubscriptionSource,
} from '@/lib/types'

const logger = createLogger('generator')

export const DEFAULT_MAPPING_START_PORT = 42000

/** 按名称选择节点，可以指定端口 */
export type NodeSelection = string | { name: string; port?: number }

export interface PortMappingRequest {
  listenerType?: ListenerType
  startPort?: number
  /** 未指定时映射全部节点 */
  nodes?: NodeSelection[]
  existing?: PortMapping[]
}

export interface GenerateRequest {
  sources: SubscriptionSource[]
  template?: RuleTemplate
  portMapping?: PortMappingRequest
}

export interface GenerationTotals {
  sources: number
  failedSources: number
  candidates: number
  decoded: number
  skipped: number
  nodes: number
  duplicates: number
  renamed: number
  mappings: number
}

export interface GenerationReport {
  sources: SourceReport[]
  duplicates: DuplicateRecord[]
  renamed: RenameRecord[]
  warnings: string[]
  totals: GenerationTotals
}

export interface GenerationResult {
  config: GeneratedConfig
  yaml: string
  nodes: CanonicalNode[]
  mappings: PortMapping[]
  report: GenerationReport
}

export interface GenerateOptions extends Partial<GeneratorOptions> {
  client?: AxiosInstance
}

function selectNodes(nodes: CanonicalNode[], selection: NodeSelection[] | undefined): PortRequest[] {
  if (!selection) return nodes.map(node => ({ node }))

  const byName = new Map(nodes.map((node): [string, CanonicalNode] => [node.name, node]))
  return selection.map(item => {
    const { name, port } = typeof item === 'string' ? { name: item, port: undefined } : item
    const node = byName.get(name)
    if (!node) throw new UnknownNodeReference(name)
    return { node, port }
  })
}

/**
 * 完整流程：获取来源 -> 识别格式并解码 -> 合并去重 -> 端口映射 -> 组装配置
 */
export async function generateConfig(
  request: GenerateRequest,
  overrides: GenerateOptions = {},
  signal?: AbortSignal
): Promise<GenerationResult> {
  const { client, ...rest } = overrides
  const options = resolveOptions(rest)
  if (rest.logLevel) setLogLevel(rest.logLevel)

  const resolved = await resolveSources(request.sources, { ...options, client }, signal)
  const merged = mergeNodes(resolved.flatMap(source => source.nodes))

  if (signal?.aborted) throw new GenerationAborted({ cause: signal.reason })

  const template = request.template ?? defaultTemplate()

  let mappings: PortMapping[] = []
  if (request.portMapping) {
    const { listenerType = 'mixed', startPort = DEFAULT_MAPPING_START_PORT, nodes, existing } = request.portMapping
    mappings = assignPorts(selectNodes(merged.nodes, nodes), startPort, listenerType, {
      reservedPorts: inboundPorts(template, options).keys(),
      existing,
      knownNodes: merged.nodes,
    })
  }

  const { config, warnings } = assembleConfig(merged.nodes, template, mappings, options)
  const yaml = renderConfig(config)

  const reports = resolved.map(source => source.report)
  const totals: GenerationTotals = {
    sources: reports.length,
    failedSources: reports.filter(report => report.status === 'failed').length,
    candidates: reports.reduce((sum, report) => sum + report.candidateCount, 0),
    decoded: reports.reduce((sum, report) => sum + report.decodedCount, 0),
    skipped: reports.reduce((sum, report) => sum + report.skipped.length, 0),
    nodes: merged.nodes.length,
    duplicates: merged.duplicates.length,
    renamed: merged.renamed.length,
    mappings: mappings.length,
  }
  logger.info(`完成: ${totals.nodes} 个节点 (来源 ${totals.sources}, 失败 ${totals.failedSources}, 跳过 ${totals.skipped})`)

  return {
    config,
    yaml,
    nodes: merged.nodes,
    mappings,
    report: { sources: reports, duplicates: merged.duplicates, renamed: merged.renamed, warnings, totals },
  }
}

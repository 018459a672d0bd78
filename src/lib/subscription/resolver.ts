import type { AxiosInstance } from 'axios'
import type { FetchOptions } from '@/lib/config'
import {
  GenerationAborted,
  isGeneratorError,
  type ErrorCode,
} from '@/lib/errors'
import { describeError } from '@/lib/handle-fetch-error'
import { createLogger } from '@/lib/logger'
import { extractNodes, type ContentFormat, type SkippedItem } from '@/lib/subscription/extractor'
import { fetchSource, sourceTagOf } from '@/lib/subscription/fetcher'
import type { CanonicalNode, SourceKind, SubscriptionSource } from '@/lib/types'

const logger = createLogger('resolver')

export interface SourceReport {
  sourceTag: string
  kind: SourceKind
  status: 'ok' | 'failed'
  format?: ContentFormat
  candidateCount: number
  decodedCount: number
  skipped: SkippedItem[]
  diagnostics: string[]
  error?: { code?: ErrorCode; message: string }
}

export interface ResolvedSource {
  source: SubscriptionSource
  report: SourceReport
  nodes: CanonicalNode[]
}

export interface ResolveOptions extends FetchOptions {
  concurrency: number
  client?: AxiosInstance
}

async function resolveOne(
  source: SubscriptionSource,
  index: number,
  options: ResolveOptions,
  signal?: AbortSignal
): Promise<ResolvedSource> {
  const sourceTag = sourceTagOf(source, index)
  const empty = { sourceTag, kind: source.kind, candidateCount: 0, decodedCount: 0, skipped: [], diagnostics: [] }

  let content: string
  try {
    content = await fetchSource(source, options, signal, options.client)
  } catch (e) {
    if (e instanceof GenerationAborted) throw e
    const message = describeError(e)
    logger.warn(`来源 ${sourceTag} 获取失败: ${message}`)
    return {
      source,
      nodes: [],
      report: { ...empty, status: 'failed', error: { code: isGeneratorError(e) ? e.code : undefined, message } },
    }
  }

  const result = extractNodes(content, sourceTag)
  logger.info(
    `来源 ${sourceTag}: 格式 ${result.format}, 候选 ${result.candidateCount}, 解析成功 ${result.decodedCount}, 跳过 ${result.skipped.length}`
  )
  return {
    source,
    nodes: result.nodes,
    report: {
      ...empty,
      status: 'ok',
      format: result.format,
      candidateCount: result.candidateCount,
      decodedCount: result.decodedCount,
      skipped: result.skipped,
      diagnostics: result.diagnostics.map(diagnostic => diagnostic.message),
    },
  }
}

/**
 * 并发解析所有来源，结果按来源顺序返回；单个来源失败只记入报告，中止时抛出 GenerationAborted
 */
export async function resolveSources(
  sources: SubscriptionSource[],
  options: ResolveOptions,
  signal?: AbortSignal
): Promise<ResolvedSource[]> {
  const results = new Array<ResolvedSource | undefined>(sources.length)
  let index = 0

  const worker = async (): Promise<void> => {
    while (index < sources.length) {
      if (signal?.aborted) throw new GenerationAborted({ cause: signal.reason })
      const current = index++
      results[current] = await resolveOne(sources[current], current, options, signal)
    }
  }

  // 限制并发数
  const concurrency = Math.max(1, Math.min(options.concurrency, sources.length))
  const workers: Promise<void>[] = []
  for (let i = 0; i < concurrency; i++) {
    workers.push(worker())
  }
  await Promise.all(workers)

  if (signal?.aborted) throw new GenerationAborted({ cause: signal.reason })
  return results.filter((result): result is ResolvedSource => result !== undefined)
}

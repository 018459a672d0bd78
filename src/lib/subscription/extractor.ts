import { load as parseYAML } from 'js-yaml'
import { fromClashProxy } from '@/lib/clash-proxy'
import {
  GeneratorError,
  MalformedLink,
  UnrecognizedFormat,
  type ErrorCode,
} from '@/lib/errors'
import { createLogger } from '@/lib/logger'
import { isProxyLink, tryDecodeLink, type DecodeResult } from '@/lib/proxy-parser'
import type { CanonicalNode } from '@/lib/types'
import { base64Decode, isRecord, preview } from '@/lib/utils'

const logger = createLogger('extractor')

export type ContentFormat = 'structured' | 'base64' | 'plain' | 'unrecognized'

export type Candidate =
  | { kind: 'link'; link: string }
  | { kind: 'entry'; entry: unknown }

export interface ExtractedContent {
  format: ContentFormat
  candidates: Candidate[]
  links: string[]
  entries: unknown[]
  diagnostics: GeneratorError[]
}

export interface SkippedItem {
  sourceTag: string
  preview: string
  code: ErrorCode
  reason: string
}

export interface ExtractionResult {
  format: ContentFormat
  nodes: CanonicalNode[]
  skipped: SkippedItem[]
  candidateCount: number
  decodedCount: number
  diagnostics: GeneratorError[]
}

const PRINTABLE_RATIO = 0.9

// 可打印字符比例，用于判断 base64 解码结果是否是文本
function printableRatio(text: string): number {
  if (!text) return 0
  let printable = 0
  for (const ch of text) {
    const code = ch.codePointAt(0) ?? 0
    const isControl = (code < 0x20 && ch !== '\n' && ch !== '\r' && ch !== '\t') || (code >= 0x7f && code <= 0x9f)
    if (!isControl && ch !== '\uFFFD') printable++
  }
  return printable / [...text].length
}

function textLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line !== '' && !line.startsWith('#'))
}

function lineCandidate(line: string): Candidate {
  // 单行 JSON 节点：{"type":"ss","server":...}
  if (line.startsWith('{') && line.endsWith('}')) {
    try {
      const entry: unknown = JSON.parse(line)
      if (isRecord(entry)) return { kind: 'entry', entry }
    } catch {
      // 不是 JSON，按链接处理
    }
  }
  return { kind: 'link', link: line }
}

/**
 * YAML/JSON：带 proxies 列表的映射，或链接/节点数组
 */
function tryStructured(text: string): Candidate[] | null {
  let doc: unknown
  try {
    doc = parseYAML(text)
  } catch {
    return null
  }

  let items: unknown[]
  if (isRecord(doc) && Array.isArray(doc.proxies)) {
    items = doc.proxies
  } else if (Array.isArray(doc)) {
    items = doc
  } else {
    return null
  }

  return items.map((item): Candidate =>
    typeof item === 'string' ? { kind: 'link', link: item.trim() } : { kind: 'entry', entry: item }
  )
}

function tryBase64(text: string): { decoded: string } | null {
  const decoded = base64Decode(text)
  if (decoded === null || printableRatio(decoded) < PRINTABLE_RATIO) return null
  return { decoded }
}

function tryPlain(text: string): Candidate[] | null {
  const lines = textLines(text)
  if (!lines.some(isProxyLink)) return null
  return lines.map(lineCandidate)
}

function collect(format: ContentFormat, candidates: Candidate[], diagnostics: GeneratorError[] = []): ExtractedContent {
  const links: string[] = []
  const entries: unknown[] = []
  for (const candidate of candidates) {
    if (candidate.kind === 'link') links.push(candidate.link)
    else entries.push(candidate.entry)
  }
  return { format, candidates, links, entries, diagnostics }
}

/**
 * 识别内容格式并提取候选链接/节点，按顺序尝试：结构化 -> base64 -> 纯文本列表
 */
export function extractLinks(content: string): ExtractedContent {
  const text = content.replace(/^\uFEFF/, '').trim()

  if (text) {
    const structured = tryStructured(text)
    if (structured) return collect('structured', structured)

    const base64 = tryBase64(text)
    if (base64) {
      const nested = tryStructured(base64.decoded.trim())
      return collect('base64', nested ?? textLines(base64.decoded).map(lineCandidate))
    }

    const plain = tryPlain(text)
    if (plain) return collect('plain', plain)
  }

  return collect('unrecognized', [], [new UnrecognizedFormat(preview(text) || '(empty)')])
}

function candidatePreview(candidate: Candidate): string {
  if (candidate.kind === 'link') return preview(candidate.link, 60)
  if (isRecord(candidate.entry) && typeof candidate.entry.name === 'string') return preview(candidate.entry.name, 60)
  return preview(JSON.stringify(candidate.entry) ?? String(candidate.entry), 60)
}

function decodeCandidate(candidate: Candidate, sourceTag: string): DecodeResult {
  if (candidate.kind === 'link') return tryDecodeLink(candidate.link, sourceTag)
  try {
    return { ok: true, node: fromClashProxy(candidate.entry, sourceTag) }
  } catch (e) {
    if (e instanceof GeneratorError) return { ok: false, error: e }
    return { ok: false, error: new MalformedLink(e instanceof Error ? e.message : String(e), { cause: e }) }
  }
}

/**
 * 提取并解码一个来源内的全部节点，失败的候选项记入 skipped，不抛出异常
 */
export function extractNodes(content: string, sourceTag: string): ExtractionResult {
  const extracted = extractLinks(content)
  const nodes: CanonicalNode[] = []
  const skipped: SkippedItem[] = []

  for (const candidate of extracted.candidates) {
    const result = decodeCandidate(candidate, sourceTag)
    if (result.ok) {
      nodes.push(result.node)
      continue
    }
    const item: SkippedItem = {
      sourceTag,
      preview: candidatePreview(candidate),
      code: result.error.code,
      reason: result.error.message,
    }
    logger.debug(`skipped ${item.preview}: ${item.reason}`)
    skipped.push(item)
  }

  return {
    format: extracted.format,
    nodes,
    skipped,
    candidateCount: extracted.candidates.length,
    decodedCount: nodes.length,
    diagnostics: extracted.diagnostics,
  }
}

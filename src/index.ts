export * from '@/lib/types'
export * from '@/lib/errors'
export { DEFAULT_OPTIONS, loadOptionsFromEnv, resolveOptions } from '@/lib/config'
export type { FetchOptions, GeneratorOptions } from '@/lib/config'
export { createLogger, setLogLevel, getLogLevel } from '@/lib/logger'
export type { LogLevel, Logger } from '@/lib/logger'
export { decodeLink, tryDecodeLink, nodeIdentity, sanitizeName } from '@/lib/proxy-parser'
export type { DecodeResult } from '@/lib/proxy-parser'
export { encodeLink } from '@/lib/producers/uri'
export { toClashProxy, fromClashProxy } from '@/lib/clash-proxy'
export { extractLinks, extractNodes } from '@/lib/subscription/extractor'
export type { Candidate, ContentFormat, ExtractedContent, ExtractionResult, SkippedItem } from '@/lib/subscription/extractor'
export { fetchSource, sourceTagOf } from '@/lib/subscription/fetcher'
export { resolveSources } from '@/lib/subscription/resolver'
export type { ResolveOptions, ResolvedSource, SourceReport } from '@/lib/subscription/resolver'
export { mergeNodes } from '@/lib/node-merger'
export type { DuplicateRecord, MergeResult, RenameRecord } from '@/lib/node-merger'
export { assignPorts } from '@/lib/port-mapping'
export type { AssignPortsOptions, PortRequest } from '@/lib/port-mapping'
export { ClashConfigBuilder, assembleConfig, inboundPorts, renderConfig } from '@/lib/clash-builder'
export type { AssembleOptions, AssembleResult } from '@/lib/clash-builder'
export { validateTemplate, formatValidationIssues } from '@/lib/template-validator'
export type { ValidationIssue, ValidationResult } from '@/lib/template-validator'
export { defaultTemplate, loadTemplate, loadTemplateFile } from '@/lib/templates'
export { DEFAULT_MAPPING_START_PORT, generateConfig } from '@/lib/generator'
export type {
  GenerateOptions,
  GenerateRequest,
  GenerationReport,
  GenerationResult,
  GenerationTotals,
  NodeSelection,
  PortMappingRequest,
} from '@/lib/generator'

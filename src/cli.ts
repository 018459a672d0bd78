import { writeFile } from 'node:fs/promises'
import { pathToFileURL } from 'node:url'
import { parseArgs } from 'node:util'
import { loadOptionsFromEnv } from '@/lib/config'
import { isGeneratorError } from '@/lib/errors'
import { generateConfig, type GenerationResult, type NodeSelection, type PortMappingRequest } from '@/lib/generator'
import { describeError } from '@/lib/handle-fetch-error'
import { setLogLevel } from '@/lib/logger'
import { loadTemplateFile } from '@/lib/templates'
import { LISTENER_TYPES, type ListenerType, type SubscriptionSource } from '@/lib/types'
import { parsePort } from '@/lib/utils'

export const USAGE = `用法: clash-config-generator [选项]

  -s, --subscription <url>   订阅地址（可重复）
  -f, --file <path>          本地订阅文件（可重复）
  -l, --link <text>          直接粘贴的节点链接（可重复）
  -t, --template <path>      规则模板 YAML，默认使用内置模板
  -o, --output <path>        输出文件，默认 config.yaml，- 表示标准输出
      --map-ports            为全部节点创建端口映射
      --map-node <name[=port]>  只为指定节点创建端口映射（可重复）
      --start-port <port>    映射起始端口，默认 42000
      --listener-type <type> 监听器类型: mixed | http | socks，默认 mixed
      --debug                输出调试日志
  -h, --help                 显示帮助`

export interface CliOptions {
  sources: SubscriptionSource[]
  templatePath?: string
  output: string
  portMapping?: PortMappingRequest
  debug: boolean
  help: boolean
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CliUsageError'
  }
}

function parseListenerType(value: string | undefined): ListenerType {
  if (value === undefined) return 'mixed'
  const type = LISTENER_TYPES.find(item => item === value)
  if (!type) throw new CliUsageError(`无效的监听器类型: ${value}`)
  return type
}

// 只有规范的端口号后缀才视为端口，节点名本身可以包含 =
function parseNodeSelection(value: string): NodeSelection {
  const eqIndex = value.lastIndexOf('=')
  if (eqIndex === -1) return value
  const suffix = value.substring(eqIndex + 1)
  const port = /^[1-9]\d*$/.test(suffix) ? parsePort(suffix) : null
  return port === null ? value : { name: value.substring(0, eqIndex), port }
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        subscription: { type: 'string', short: 's', multiple: true },
        file: { type: 'string', short: 'f', multiple: true },
        link: { type: 'string', short: 'l', multiple: true },
        template: { type: 'string', short: 't' },
        output: { type: 'string', short: 'o' },
        'map-ports': { type: 'boolean' },
        'map-node': { type: 'string', multiple: true },
        'start-port': { type: 'string' },
        'listener-type': { type: 'string' },
        debug: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    }).values
  } catch (e) {
    throw new CliUsageError(describeError(e))
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const values = readArgs(argv)

  const sources: SubscriptionSource[] = [
    ...(values.subscription ?? []).map((origin): SubscriptionSource => ({ origin, kind: 'remote' })),
    ...(values.file ?? []).map((origin): SubscriptionSource => ({ origin, kind: 'file' })),
    ...(values.link ?? []).map((origin): SubscriptionSource => ({ origin, kind: 'inline' })),
  ]

  let portMapping: PortMappingRequest | undefined
  const mapNodes = values['map-node']
  if (values['map-ports'] || mapNodes) {
    let startPort: number | undefined
    if (values['start-port'] !== undefined) {
      const parsed = parsePort(values['start-port'])
      if (parsed === null) throw new CliUsageError(`无效的起始端口: ${values['start-port']}`)
      startPort = parsed
    }
    portMapping = {
      listenerType: parseListenerType(values['listener-type']),
      startPort,
      nodes: mapNodes?.map(parseNodeSelection),
    }
  }

  return {
    sources,
    templatePath: values.template,
    output: values.output ?? 'config.yaml',
    portMapping,
    debug: values.debug ?? false,
    help: values.help ?? false,
  }
}

export function formatSummary(result: GenerationResult): string {
  const lines: string[] = []
  for (const source of result.report.sources) {
    if (source.status === 'failed') {
      lines.push(`✗ ${source.sourceTag}: ${source.error?.message ?? 'failed'}`)
      continue
    }
    lines.push(`✓ ${source.sourceTag}: ${source.format}, ${source.decodedCount}/${source.candidateCount} 个节点`)
    for (const item of source.skipped) {
      lines.push(`    跳过 ${item.preview} (${item.code}: ${item.reason})`)
    }
    for (const diagnostic of source.diagnostics) {
      lines.push(`    ${diagnostic}`)
    }
  }
  const { totals } = result.report
  lines.push(
    `共 ${totals.nodes} 个节点，去重 ${totals.duplicates}，重命名 ${totals.renamed}，跳过 ${totals.skipped}，端口映射 ${totals.mappings}`
  )
  return lines.join('\n')
}

export async function runCli(argv: string[], signal?: AbortSignal): Promise<number> {
  let options: CliOptions
  try {
    options = parseCliArgs(argv)
  } catch (e) {
    console.error(`${describeError(e)}\n\n${USAGE}`)
    return 2
  }

  if (options.help) {
    console.log(USAGE)
    return 0
  }
  if (options.sources.length === 0) {
    console.error(`请至少指定一个订阅、文件或链接\n\n${USAGE}`)
    return 2
  }

  const envOptions = loadOptionsFromEnv()
  if (options.debug) {
    envOptions.logLevel = 'debug'
  }
  setLogLevel(envOptions.logLevel)

  try {
    const template = options.templatePath ? await loadTemplateFile(options.templatePath) : undefined
    const result = await generateConfig(
      { sources: options.sources, template, portMapping: options.portMapping },
      envOptions,
      signal
    )

    if (options.output === '-') {
      process.stdout.write(result.yaml)
    } else {
      await writeFile(options.output, result.yaml, 'utf8')
    }
    console.error(formatSummary(result))
    if (options.output !== '-') console.error(`配置已保存到 ${options.output}`)
    return 0
  } catch (e) {
    console.error(isGeneratorError(e) ? `${e.code}: ${e.message}` : describeError(e))
    return 1
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  const controller = new AbortController()
  process.once('SIGINT', () => controller.abort())
  runCli(process.argv.slice(2), controller.signal)
    .then(code => {
      process.exitCode = code
    })
    .catch((e: unknown) => {
      console.error(describeError(e))
      process.exitCode = 1
    })
}

import { readFileSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { load as parseYAML } from 'js-yaml'
import { ReadError, TemplateError } from '@/lib/errors'
import { describeError } from '@/lib/handle-fetch-error'
import { createLogger } from '@/lib/logger'
import { formatValidationIssues, validateTemplate } from '@/lib/template-validator'
import type { RuleTemplate } from '@/lib/types'

const logger = createLogger('template')

const DEFAULT_TEMPLATE_URL = new URL('../templates/default.yaml', import.meta.url)

let defaultTemplateCache: RuleTemplate | undefined

/**
 * 解析 YAML 模板文本，无效时抛出 TemplateError
 */
export function loadTemplate(text: string, origin = 'template'): RuleTemplate {
  let doc: unknown
  try {
    doc = parseYAML(text)
  } catch (e) {
    throw new TemplateError(`${origin}: YAML 解析失败: ${describeError(e)}`, { cause: e })
  }

  const result = validateTemplate(doc)
  const warnings = result.issues.filter(issue => issue.level === 'warning')
  if (warnings.length > 0) {
    logger.warn(`${origin}:\n${formatValidationIssues(warnings)}`)
  }
  if (!result.template) {
    throw new TemplateError(`${origin}: 模板无效\n${formatValidationIssues(result.issues.filter(issue => issue.level === 'error'))}`)
  }

  logger.debug(`${origin}: ${result.template.proxyGroups.length} 个代理组, ${result.template.rules.length} 条规则`)
  return result.template
}

export async function loadTemplateFile(path: string): Promise<RuleTemplate> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (e) {
    throw new ReadError(path, describeError(e), { cause: e })
  }
  return loadTemplate(text, path)
}

/**
 * 内置默认模板（src/templates/default.yaml），每次返回新的副本
 */
export function defaultTemplate(): RuleTemplate {
  if (!defaultTemplateCache) {
    defaultTemplateCache = loadTemplate(readFileSync(DEFAULT_TEMPLATE_URL, 'utf8'), 'default template')
  }
  return structuredClone(defaultTemplateCache)
}

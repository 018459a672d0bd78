/**
 * 规则模板校验器
 * 在组装配置前检查代理组和规则的有效性，避免 mihomo 启动失败
 */

import type { ProxyGroupTemplate, RuleTemplate } from '@/lib/types'
import { isRecord } from '@/lib/utils'

export type ValidationLevel = 'error' | 'warning'

export interface ValidationIssue {
  level: ValidationLevel
  message: string
  location?: string // 例如："proxy-groups[0]", "rules[5]"
}

export interface ValidationResult {
  valid: boolean
  issues: ValidationIssue[]
  template?: RuleTemplate
}

export const PROXY_NODES_MARKER = '__PROXY_NODES__'

// 内置策略
export const BUILTIN_POLICIES = new Set(['DIRECT', 'REJECT', 'REJECT-DROP', 'PASS', 'COMPATIBLE'])

// 不会被原样复制到输出的模板键
const RESERVED_KEYS = new Set(['proxy-groups', 'rules', 'proxies', 'listeners'])

export function isAllNodesGroup(group: ProxyGroupTemplate): boolean {
  return group['include-all'] === true ||
    group['include-all-proxies'] === true ||
    (group.proxies?.includes(PROXY_NODES_MARKER) ?? false)
}

function validateGroups(raw: unknown, issues: ValidationIssue[]): ProxyGroupTemplate[] {
  if (!Array.isArray(raw)) {
    issues.push({ level: 'error', message: '模板缺少 proxy-groups 列表', location: 'proxy-groups' })
    return []
  }

  const groups: ProxyGroupTemplate[] = []
  const seenNames = new Set<string>()

  raw.forEach((group: unknown, i) => {
    const location = `proxy-groups[${i}]`

    if (!isRecord(group)) {
      issues.push({ level: 'error', message: `代理组 #${i + 1} 不是有效的对象`, location })
      return
    }

    const name = typeof group.name === 'string' ? group.name.trim() : ''
    if (!name) {
      issues.push({ level: 'error', message: `代理组 #${i + 1} 缺少name字段或name为空`, location })
      return
    }
    if (seenNames.has(name)) {
      issues.push({ level: 'error', message: `代理组名称重复: "${name}"`, location })
      return
    }
    seenNames.add(name)

    const type = typeof group.type === 'string' ? group.type.trim() : ''
    if (!type) {
      issues.push({ level: 'error', message: `代理组 "${name}" 缺少type字段`, location })
      return
    }

    let proxies: string[] | undefined
    if (group.proxies !== undefined && group.proxies !== null) {
      if (!Array.isArray(group.proxies) || group.proxies.some(proxy => typeof proxy !== 'string')) {
        issues.push({ level: 'error', message: `代理组 "${name}" 的proxies字段必须是字符串列表`, location })
        return
      }
      proxies = group.proxies.filter((proxy): proxy is string => typeof proxy === 'string')
      if (proxies.includes(name)) {
        issues.push({ level: 'error', message: `代理组 "${name}" 引用了自己`, location })
        return
      }
    }

    const hasProxies = proxies !== undefined && proxies.length > 0
    const hasUse = Array.isArray(group.use) && group.use.length > 0
    const hasFilter = typeof group.filter === 'string' && group.filter.trim() !== ''
    const hasIncludeAll = group['include-all'] === true || group['include-all-proxies'] === true
    if (!hasProxies && !hasUse && !hasFilter && !hasIncludeAll) {
      issues.push({ level: 'error', message: `代理组 "${name}" 的proxies、use、filter和include-all字段都为空或不存在`, location })
      return
    }

    // name、type、proxies 排在最前
    const normalized: ProxyGroupTemplate = { name, type }
    if (proxies) normalized.proxies = proxies
    for (const [key, value] of Object.entries(group)) {
      if (key === 'name' || key === 'type' || key === 'proxies') continue
      normalized[key] = value
    }
    groups.push(normalized)
  })

  return groups
}

function validateRules(raw: unknown, issues: ValidationIssue[]): string[] {
  if (!Array.isArray(raw)) {
    issues.push({ level: 'error', message: '模板缺少 rules 列表', location: 'rules' })
    return []
  }

  const rules: string[] = []
  raw.forEach((rule: unknown, i) => {
    const location = `rules[${i}]`
    if (typeof rule !== 'string' || rule.trim() === '') {
      issues.push({ level: 'error', message: `规则 #${i + 1} 不是有效的字符串`, location })
      return
    }
    if (rule.split(',').length < 2) {
      issues.push({ level: 'error', message: `规则 "${rule}" 缺少目标策略`, location })
      return
    }
    rules.push(rule.trim())
  })
  return rules
}

/**
 * 规则的目标策略：MATCH,target 或 TYPE,payload,target[,no-resolve]
 */
export function ruleTarget(rule: string): string {
  const parts = rule.split(',').map(part => part.trim())
  if (parts[0] === 'MATCH') return parts[1] ?? ''
  return parts[2] ?? ''
}

/**
 * 检测循环引用
 */
function detectCircularReferences(groups: ProxyGroupTemplate[]): ValidationIssue[] {
  const issues: ValidationIssue[] = []
  const names = new Set(groups.map(group => group.name))
  const groupMap = new Map<string, string[]>()

  // 构建引用图
  for (const group of groups) {
    groupMap.set(group.name, (group.proxies ?? []).filter(proxy => names.has(proxy)))
  }

  // DFS检测循环
  function hasCycle(node: string, visited: Set<string>, recStack: Set<string>, path: string[]): boolean {
    visited.add(node)
    recStack.add(node)
    path.push(node)

    for (const neighbor of groupMap.get(node) ?? []) {
      if (!visited.has(neighbor)) {
        if (hasCycle(neighbor, visited, recStack, path)) return true
      } else if (recStack.has(neighbor)) {
        const cycleStart = path.indexOf(neighbor)
        const cycle = [...path.slice(cycleStart), neighbor].join(' → ')
        issues.push({
          level: 'error',
          message: `检测到代理组循环引用: ${cycle}`,
          location: `proxy-groups[${node}]`,
        })
        return true
      }
    }

    recStack.delete(node)
    path.pop()
    return false
  }

  const visited = new Set<string>()
  for (const [node] of groupMap) {
    if (!visited.has(node)) hasCycle(node, visited, new Set(), [])
  }
  return issues
}

/**
 * 校验解析后的模板文档
 */
export function validateTemplate(doc: unknown): ValidationResult {
  const issues: ValidationIssue[] = []

  if (!isRecord(doc)) {
    return { valid: false, issues: [{ level: 'error', message: '模板不是 YAML 映射' }] }
  }

  const proxyGroups = validateGroups(doc['proxy-groups'], issues)
  const rules = validateRules(doc.rules, issues)
  issues.push(...detectCircularReferences(proxyGroups))

  // 规则目标不是代理组或内置策略时只给出警告（可能直接指向节点）
  const groupNames = new Set(proxyGroups.map(group => group.name))
  rules.forEach((rule, i) => {
    const target = ruleTarget(rule)
    if (target && !groupNames.has(target) && !BUILTIN_POLICIES.has(target)) {
      issues.push({ level: 'warning', message: `规则 "${rule}" 的目标 "${target}" 不是代理组`, location: `rules[${i}]` })
    }
  })

  const settings: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(doc)) {
    if (RESERVED_KEYS.has(key)) continue
    settings[key] = value
  }
  if (doc.proxies !== undefined) {
    issues.push({ level: 'warning', message: '模板中的 proxies 会被生成的节点替换', location: 'proxies' })
  }
  if (doc.listeners !== undefined) {
    issues.push({ level: 'warning', message: '模板中的 listeners 会被端口映射生成的监听器替换', location: 'listeners' })
  }

  const valid = !issues.some(issue => issue.level === 'error')
  return {
    valid,
    issues,
    template: valid ? { proxyGroups, rules, settings } : undefined,
  }
}

/**
 * 格式化校验结果
 */
export function formatValidationIssues(issues: ValidationIssue[]): string {
  return issues
    .map(issue => `${issue.level === 'error' ? '❌' : '⚠️'} ${issue.message}${issue.location ? ` (位置: ${issue.location})` : ''}`)
    .join('\n')
}

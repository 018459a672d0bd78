import { createLogger } from '@/lib/logger'
import { nodeIdentity } from '@/lib/proxy-parser'
import type { CanonicalNode } from '@/lib/types'

const logger = createLogger('merger')

export interface DuplicateRecord {
  name: string
  sourceTag: string
  keptName: string
  keptSourceTag: string
}

export interface RenameRecord {
  from: string
  to: string
  sourceTag: string
}

export interface MergeResult {
  nodes: CanonicalNode[]
  duplicates: DuplicateRecord[]
  renamed: RenameRecord[]
}

/**
 * 合并所有来源的节点：按身份去重（先到先得），重名节点追加 _1、_2 后缀，保持原有顺序
 */
export function mergeNodes(nodes: readonly CanonicalNode[]): MergeResult {
  const seen = new Map<string, CanonicalNode>()
  const usedNames = new Set<string>()
  const merged: CanonicalNode[] = []
  const duplicates: DuplicateRecord[] = []
  const renamed: RenameRecord[] = []

  for (const node of nodes) {
    const identity = nodeIdentity(node)
    const kept = seen.get(identity)
    if (kept) {
      duplicates.push({ name: node.name, sourceTag: node.sourceTag, keptName: kept.name, keptSourceTag: kept.sourceTag })
      continue
    }

    let name = node.name
    if (usedNames.has(name)) {
      let suffix = 1
      while (usedNames.has(`${node.name}_${suffix}`)) suffix++
      name = `${node.name}_${suffix}`
      renamed.push({ from: node.name, to: name, sourceTag: node.sourceTag })
    }
    usedNames.add(name)

    const result = name === node.name ? node : { ...node, name }
    seen.set(identity, result)
    merged.push(result)
  }

  if (duplicates.length > 0 || renamed.length > 0) {
    logger.info(`合并节点: 保留 ${merged.length}, 去重 ${duplicates.length}, 重命名 ${renamed.length}`)
  }
  return { nodes: merged, duplicates, renamed }
}

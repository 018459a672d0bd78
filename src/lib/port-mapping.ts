import {
  PortConflict,
  PortRangeExceeded,
  UnknownNodeReference,
} from '@/lib/errors'
import { nodeIdentity } from '@/lib/proxy-parser'
import type { CanonicalNode, ListenerType, PortMapping } from '@/lib/types'

const MIN_PORT = 1
const MAX_PORT = 65535

/** 选中的节点，可以指定端口 */
export interface PortRequest {
  node: CanonicalNode
  port?: number
}

export interface AssignPortsOptions {
  reservedPorts?: Iterable<number>
  existing?: readonly PortMapping[]
  knownNodes?: readonly CanonicalNode[]
}

function inRange(port: number): boolean {
  return Number.isInteger(port) && port >= MIN_PORT && port <= MAX_PORT
}

function toRequest(item: CanonicalNode | PortRequest): PortRequest {
  return 'node' in item ? item : { node: item }
}

/**
 * 为选中的节点分配监听端口
 * 已有映射保持不变，指定端口优先占用，其余从 startPort 开始依次递增，跳过保留端口和已占用端口
 */
export function assignPorts(
  selected: readonly (CanonicalNode | PortRequest)[],
  startPort: number,
  listenerType: ListenerType,
  options: AssignPortsOptions = {}
): PortMapping[] {
  if (!inRange(startPort)) throw new PortRangeExceeded(startPort)

  const reserved = new Set(options.reservedPorts ?? [])
  const known = options.knownNodes ? new Set(options.knownNodes.map(nodeIdentity)) : null
  const taken = new Map<number, string>()
  const mapped = new Set<string>()
  const result: PortMapping[] = []

  const claim = (port: number, owner: string) => {
    if (!inRange(port)) throw new PortRangeExceeded(port)
    if (reserved.has(port)) throw new PortConflict(port, 'a reserved port')
    const holder = taken.get(port)
    if (holder !== undefined) throw new PortConflict(port, `the mapping for ${holder}`)
    taken.set(port, owner)
  }

  for (const mapping of options.existing ?? []) {
    if (known && !known.has(mapping.nodeRef)) throw new UnknownNodeReference(mapping.nodeName)
    claim(mapping.port, mapping.nodeName)
    mapped.add(mapping.nodeRef)
    result.push(mapping)
  }

  // 去掉已有映射和重复选择的节点
  const pending: { request: PortRequest; nodeRef: string }[] = []
  for (const request of selected.map(toRequest)) {
    const nodeRef = nodeIdentity(request.node)
    if (known && !known.has(nodeRef)) throw new UnknownNodeReference(request.node.name)
    if (mapped.has(nodeRef)) continue
    mapped.add(nodeRef)
    pending.push({ request, nodeRef })
  }

  const ports = new Map<string, number>()
  for (const { request, nodeRef } of pending) {
    if (request.port === undefined) continue
    claim(request.port, request.node.name)
    ports.set(nodeRef, request.port)
  }

  let next = startPort
  for (const { request, nodeRef } of pending) {
    let port = ports.get(nodeRef)
    if (port === undefined) {
      while (reserved.has(next) || taken.has(next)) next++
      if (next > MAX_PORT) throw new PortRangeExceeded(next)
      port = next
      taken.set(port, request.node.name)
      next++
    }
    result.push({ nodeRef, nodeName: request.node.name, port, listenerType })
  }

  return result
}

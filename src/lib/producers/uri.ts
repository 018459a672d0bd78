import { Base64 } from 'js-base64'
import { UnsupportedProtocol } from '@/lib/errors'
import type { CanonicalNode, TlsOptions, TransportOptions } from '@/lib/types'
import { formatHost } from '@/lib/utils'

type QueryValue = string | number | boolean | undefined

function query(params: Record<string, QueryValue>): string {
  const pairs: string[] = []
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === '') continue
    pairs.push(`${key}=${encodeURIComponent(String(value))}`)
  }
  return pairs.length > 0 ? `?${pairs.join('&')}` : ''
}

function transportParams(extra: TransportOptions): Record<string, QueryValue> {
  return {
    type: extra.network,
    path: extra.network === 'grpc' ? undefined : extra.path,
    host: extra.host,
    serviceName: extra.serviceName,
  }
}

function tlsParams(extra: TlsOptions): Record<string, QueryValue> {
  return {
    sni: extra.sni,
    fp: extra.fingerprint,
    alpn: extra.alpn?.join(','),
    allowInsecure: extra.skipCertVerify ? 1 : undefined,
  }
}

function address(node: CanonicalNode): string {
  return `${formatHost(node.server)}:${node.port}`
}

function fragment(name: string): string {
  return `#${encodeURIComponent(name)}`
}

/**
 * 把节点重新编码为分享链接
 */
export function encodeLink(node: CanonicalNode): string {
  switch (node.protocol) {
    case 'vmess': {
      const { extra } = node
      const config = {
        v: '2',
        ps: node.name,
        add: node.server,
        port: String(node.port),
        id: node.auth.uuid,
        aid: String(extra.alterId),
        scy: extra.cipher,
        net: extra.network || 'tcp',
        type: 'none',
        host: extra.host ?? '',
        path: extra.network === 'grpc' ? extra.serviceName ?? '' : extra.path ?? '',
        tls: extra.tls ? 'tls' : '',
        sni: extra.sni ?? '',
        fp: extra.fingerprint ?? '',
        alpn: extra.alpn?.join(',') ?? '',
        allowInsecure: extra.skipCertVerify ? '1' : '',
      }
      return `vmess://${Base64.encode(JSON.stringify(config))}`
    }
    case 'vless': {
      const { extra } = node
      return `vless://${encodeURIComponent(node.auth.uuid)}@${address(node)}${query({
        encryption: extra.encryption,
        security: extra.security,
        flow: extra.flow,
        ...transportParams(extra),
        ...(extra.security !== 'none' ? tlsParams(extra) : {}),
        pbk: extra.realityPublicKey,
        sid: extra.realityShortId,
        udp: extra.udp === false ? 0 : undefined,
      })}${fragment(node.name)}`
    }
    case 'trojan':
      return `trojan://${encodeURIComponent(node.auth.password)}@${address(node)}${query({
        ...transportParams(node.extra),
        ...tlsParams(node.extra),
        udp: node.extra.udp === false ? 0 : undefined,
      })}${fragment(node.name)}`
    case 'shadowsocks': {
      const userinfo = Base64.encodeURI(`${node.auth.cipher}:${node.auth.password}`)
      let plugin: string | undefined
      if (node.extra.plugin) {
        const opts = Object.entries(node.extra.pluginOpts ?? {}).map(([key, value]) => {
          if (node.extra.plugin === 'obfs' && key === 'mode') return `obfs=${value}`
          if (node.extra.plugin === 'obfs' && key === 'host') return `obfs-host=${value}`
          return `${key}=${value}`
        })
        plugin = [node.extra.plugin === 'obfs' ? 'obfs-local' : node.extra.plugin, ...opts].join(';')
      }
      return `ss://${userinfo}@${address(node)}${plugin ? `/${query({ plugin })}` : ''}${fragment(node.name)}`
    }
    case 'shadowsocksr': {
      const { extra } = node
      const params = [
        `remarks=${Base64.encodeURI(node.name)}`,
        extra.obfsParam ? `obfsparam=${Base64.encodeURI(extra.obfsParam)}` : '',
        extra.protocolParam ? `protoparam=${Base64.encodeURI(extra.protocolParam)}` : '',
      ].filter(Boolean)
      const main = [node.server, node.port, extra.protocol, node.auth.cipher, extra.obfs, Base64.encodeURI(node.auth.password)].join(':')
      return `ssr://${Base64.encodeURI(`${main}/?${params.join('&')}`)}`
    }
    case 'hysteria': {
      const { extra } = node
      return `hysteria://${address(node)}${query({
        protocol: extra.protocol,
        auth: node.auth.auth,
        peer: extra.sni,
        upmbps: extra.up,
        downmbps: extra.down,
        alpn: extra.alpn?.join(','),
        obfsParam: extra.obfs,
        insecure: extra.skipCertVerify ? 1 : undefined,
      })}${fragment(node.name)}`
    }
    case 'hysteria2': {
      const { extra } = node
      return `hysteria2://${encodeURIComponent(node.auth.password)}@${address(node)}${query({
        sni: extra.sni,
        obfs: extra.obfs,
        'obfs-password': extra.obfsPassword,
        mport: extra.ports,
        fp: extra.fingerprint,
        alpn: extra.alpn?.join(','),
        insecure: extra.skipCertVerify ? 1 : undefined,
      })}${fragment(node.name)}`
    }
    default: {
      const unreachable: never = node
      throw new UnsupportedProtocol(String(unreachable))
    }
  }
}

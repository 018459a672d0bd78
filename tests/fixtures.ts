import { Base64 } from 'js-base64'

export const VMESS_NODE_A = `vmess://${Base64.encode('{"v":"2","ps":"node-A","add":"1.2.3.4","port":"443","id":"uuid-1"}')}`

export const VMESS_WS_TLS = `vmess://${Base64.encode(
  JSON.stringify({
    v: '2',
    ps: 'ws node',
    add: 'v.example.com',
    port: 8443,
    id: 'uuid-2',
    aid: '0',
    net: 'ws',
    path: '/ray',
    host: 'cdn.example.com',
    tls: 'tls',
  })
)}`

export const VLESS_REALITY =
  'vless://uuid-3@203.0.113.5:443?security=reality&pbk=PUBKEY&sid=ab12&flow=xtls-rprx-vision&type=tcp&sni=www.example.com#Reality%20Node'

export const TROJAN_P1 = 'trojan://p1@9.9.9.9:443#t1'

export const TROJAN_GRPC =
  'trojan://pw@t.example.com:443?type=grpc&serviceName=svc&peer=p.example.com&allowInsecure=1#grpc'

export const SS_SIP002 = `ss://${Base64.encode('aes-256-gcm:secret')}@1.1.1.1:8388#SS%20One`

export const SS_PLUGIN = `ss://${Base64.encode('aes-128-gcm:pw')}@4.4.4.4:8388/?plugin=obfs-local%3Bobfs%3Dhttp%3Bobfs-host%3Dexample.com#plugin`

export const SSR_NODE = `ssr://${Base64.encodeURI(
  `5.5.5.5:8443:auth_aes128_md5:aes-256-cfb:tls1.2_ticket_auth:${Base64.encodeURI('ssrpass')}/?remarks=${Base64.encodeURI('SSR Node')}&obfsparam=${Base64.encodeURI('obfs.example.com')}`
)}`

export const HYSTERIA_NODE =
  'hysteria://h.example.com:8443?auth=hy-auth&peer=sni.example.com&upmbps=20&downmbps=100&obfsParam=xplus&insecure=1#Hy'

export const HY2_NODE = 'hy2://pw2@6.6.6.6:443?sni=s.example.com&obfs=salamander&obfs-password=op#H2'

export const ALL_LINKS = [
  VMESS_NODE_A,
  VMESS_WS_TLS,
  VLESS_REALITY,
  TROJAN_P1,
  TROJAN_GRPC,
  SS_SIP002,
  SS_PLUGIN,
  SSR_NODE,
  HYSTERIA_NODE,
  HY2_NODE,
]

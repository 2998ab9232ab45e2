import type { ProxyNode } from '@/types/config';
import { compact } from '@/utils/coerce';
import {
  buildAuthorityLink,
  getParam,
  parseAuthorityLink,
  parseBooleanParam,
  parseName,
  splitList,
} from '../uri';

// Hysteria (v1) 链接解析；认证串取完整 userinfo，缺省时读 auth 参数
export const parseHysteriaLink = (link: string): ProxyNode => {
  const { hostname, port, userinfo, params, name } = parseAuthorityLink(link);

  return compact<ProxyNode>({
    name: name ?? 'hysteria',
    type: 'hysteria',
    server: hostname,
    port,
    'auth-str': parseName(userinfo) ?? getParam(params, 'auth'),
    protocol: getParam(params, 'protocol') ?? 'udp',
    up: getParam(params, 'up') ?? getParam(params, 'upmbps'),
    down: getParam(params, 'down') ?? getParam(params, 'downmbps'),
    sni: getParam(params, 'sni') ?? getParam(params, 'peer'),
    'skip-cert-verify': parseBooleanParam(params.get('insecure')) || undefined,
    obfs: getParam(params, 'obfs'),
    alpn: splitList(getParam(params, 'alpn')),
  });
};

// Hysteria (v1) 链接生成
export const buildHysteriaLink = (node: ProxyNode): string =>
  buildAuthorityLink({
    scheme: 'hysteria',
    username: node['auth-str'],
    server: node.server,
    port: node.port,
    name: node.name,
    query: [
      ['protocol', node.protocol],
      ['up', node.up],
      ['down', node.down],
      ['sni', node.sni ?? node.servername],
      ['insecure', node['skip-cert-verify'] ? '1' : undefined],
      ['obfs', node.obfs],
      ['alpn', node.alpn?.join(',')],
    ],
  });

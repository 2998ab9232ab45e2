import type { ProxyNode } from '@/types/config';
import { compact } from '@/utils/coerce';
import {
  buildAuthorityLink,
  getParam,
  parseAuthorityLink,
  parseBooleanParam,
  splitList,
} from '../uri';

// v5 使用 uuid:password，v4 使用 token
const UUID_PATTERN = /^[0-9a-fA-F-]{36}$/;

const flag = (params: URLSearchParams, key: string) =>
  parseBooleanParam(params.get(key)) || undefined;

// TUIC 链接解析
export const parseTuicLink = (link: string): ProxyNode => {
  const { hostname, port, username, password, params, name } = parseAuthorityLink(link);
  const isUuid = username !== undefined && UUID_PATTERN.test(username);

  return compact<ProxyNode>({
    name: name ?? 'tuic',
    type: 'tuic',
    server: hostname,
    port,
    uuid: isUuid ? username : undefined,
    token: getParam(params, 'token') ?? (isUuid ? undefined : username),
    password,
    sni: getParam(params, 'sni'),
    'skip-cert-verify': flag(params, 'skip-cert-verify'),
    alpn: splitList(getParam(params, 'alpn')),
    'disable-sni': flag(params, 'disable-sni'),
    'reduce-rtt': flag(params, 'reduce-rtt'),
    'udp-relay-mode': getParam(params, 'udp-relay-mode'),
    'congestion-controller': getParam(params, 'congestion-controller'),
  });
};

// TUIC 链接生成；token 节点的 token 放在查询参数里
export const buildTuicLink = (node: ProxyNode): string =>
  buildAuthorityLink({
    scheme: 'tuic',
    username: node.uuid,
    password: node.password,
    server: node.server,
    port: node.port,
    name: node.name,
    query: [
      ['token', node.uuid ? undefined : node.token],
      ['sni', node.sni ?? node.servername],
      ['skip-cert-verify', node['skip-cert-verify'] ? '1' : undefined],
      ['alpn', node.alpn?.join(',')],
      ['disable-sni', node['disable-sni'] ? '1' : undefined],
      ['reduce-rtt', node['reduce-rtt'] ? '1' : undefined],
      ['udp-relay-mode', node['udp-relay-mode']],
      ['congestion-controller', node['congestion-controller']],
    ],
  });

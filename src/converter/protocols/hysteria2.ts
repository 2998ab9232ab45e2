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

/**
 * Hysteria2 链接解析（hy2:// 在分发前已改写为 hysteria2://）
 *
 * 密码取完整 userinfo；带宽参数兼容 up/upmbps 与 down/downmbps 两种写法。
 */
export const parseHysteria2Link = (link: string): ProxyNode => {
  const { hostname, port, userinfo, params, name } = parseAuthorityLink(link);

  return compact<ProxyNode>({
    name: name ?? 'hysteria2',
    type: 'hysteria2',
    server: hostname,
    port,
    password: parseName(userinfo),
    up: getParam(params, 'up') ?? getParam(params, 'upmbps'),
    down: getParam(params, 'down') ?? getParam(params, 'downmbps'),
    sni: getParam(params, 'sni'),
    'skip-cert-verify': parseBooleanParam(params.get('insecure')) || undefined,
    obfs: getParam(params, 'obfs'),
    'obfs-password': getParam(params, 'obfs-password'),
    alpn: splitList(getParam(params, 'alpn')),
    ports: getParam(params, 'ports'),
  });
};

// Hysteria2 链接生成，统一使用 hysteria2:// 前缀
export const buildHysteria2Link = (node: ProxyNode): string =>
  buildAuthorityLink({
    scheme: 'hysteria2',
    username: node.password,
    server: node.server,
    port: node.port,
    name: node.name,
    query: [
      ['up', node.up],
      ['down', node.down],
      ['sni', node.sni ?? node.servername],
      ['insecure', node['skip-cert-verify'] ? '1' : undefined],
      ['obfs', node.obfs],
      ['obfs-password', node['obfs-password']],
      ['alpn', node.alpn?.join(',')],
      ['ports', node.ports],
    ],
  });

import type { ProxyNode } from '@/types/config';
import { compact } from '@/utils/coerce';
import {
  parseInsecureParam,
  parseSecurityParams,
  parseTransportParams,
  securityQuery,
  transportQuery,
} from '../transport';
import { buildAuthorityLink, getParam, parseAuthorityLink } from '../uri';

// VLESS 链接解析
export const parseVlessLink = (link: string): ProxyNode => {
  const { hostname, port, username, params, name } = parseAuthorityLink(link);
  const network = getParam(params, 'type') ?? 'tcp';

  return compact<ProxyNode>({
    name: name ?? 'vless',
    type: 'vless',
    server: hostname,
    port,
    uuid: username,
    network,
    encryption: getParam(params, 'encryption'),
    flow: getParam(params, 'flow'),
    ...parseSecurityParams(params, { sniKey: 'servername', tlsByDefault: false }),
    'skip-cert-verify': parseInsecureParam(params) || undefined,
    ...parseTransportParams(network, params),
  });
};

// VLESS 链接生成
export const buildVlessLink = (node: ProxyNode): string => {
  const network = node.network || 'tcp';
  return buildAuthorityLink({
    scheme: 'vless',
    username: node.uuid,
    server: node.server,
    port: node.port,
    name: node.name,
    query: [
      ['type', network],
      ['encryption', node.encryption],
      ['flow', node.flow],
      ...securityQuery(node, false),
      ['allowInsecure', node['skip-cert-verify'] ? '1' : undefined],
      ...transportQuery(node, network),
    ],
  });
};

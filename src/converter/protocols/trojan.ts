import type { ProxyNode } from '@/types/config';
import { compact } from '@/utils/coerce';
import {
  parseInsecureParam,
  parseSecurityParams,
  parseTransportParams,
  securityQuery,
  transportQuery,
} from '../transport';
import { buildAuthorityLink, getParam, parseAuthorityLink, parseName } from '../uri';

// Trojan 链接解析：未声明 security 时默认 TLS，sni 缺省时回退到 peer
export const parseTrojanLink = (link: string): ProxyNode => {
  const { hostname, port, userinfo, params, name } = parseAuthorityLink(link);
  const network = getParam(params, 'type') ?? 'tcp';

  return compact<ProxyNode>({
    name: name ?? 'trojan',
    type: 'trojan',
    server: hostname,
    port,
    password: parseName(userinfo),
    network,
    ...parseSecurityParams(params, { sniKey: 'sni', tlsByDefault: true }),
    'skip-cert-verify': parseInsecureParam(params) || undefined,
    ...parseTransportParams(network, params),
  });
};

const PLAIN_SECURITY: Array<[string, string | undefined]> = [['security', 'none']];

// Trojan 链接生成；关闭 TLS 时必须显式写出 security=none
export const buildTrojanLink = (node: ProxyNode): string => {
  const network = node.network || 'tcp';
  const security = securityQuery(node, true);
  return buildAuthorityLink({
    scheme: 'trojan',
    username: node.password,
    server: node.server,
    port: node.port,
    name: node.name,
    query: [
      ['type', network],
      ...(security.length > 0 ? security : PLAIN_SECURITY),
      ['allowInsecure', node['skip-cert-verify'] ? '1' : undefined],
      ...transportQuery(node, network),
    ],
  });
};

import type { ProxyNode, RealityOpts } from '@/types/config';
import { getParam, parseBooleanParam, splitList } from './uri';

type TransportFields = Pick<ProxyNode, 'ws-opts' | 'grpc-opts'>;
type SecurityFields = Pick<
  ProxyNode,
  'tls' | 'sni' | 'servername' | 'alpn' | 'client-fingerprint' | 'reality-opts'
>;

/**
 * 解析 ws / grpc 传输参数（vless、trojan 共用）
 */
export function parseTransportParams(network: string, params: URLSearchParams): TransportFields {
  if (network === 'ws') {
    const host = getParam(params, 'host');
    return {
      'ws-opts': {
        path: getParam(params, 'path') ?? '/',
        ...(host ? { headers: { Host: host } } : {}),
      },
    };
  }
  if (network === 'grpc') {
    return { 'grpc-opts': { 'grpc-service-name': getParam(params, 'serviceName') ?? '' } };
  }
  return {};
}

export function parseRealityParams(params: URLSearchParams): RealityOpts {
  const shortId = getParam(params, 'sid');
  return {
    'public-key': getParam(params, 'pbk') ?? '',
    ...(shortId ? { 'short-id': shortId } : {}),
  };
}

/**
 * 解析 security 参数
 *
 * reality 与 tls 互斥；sniKey 决定写入 servername（vless）还是 sni（trojan）。
 * trojan 未声明 security 时默认启用 TLS。
 */
export function parseSecurityParams(
  params: URLSearchParams,
  { sniKey, tlsByDefault }: { sniKey: 'servername' | 'sni'; tlsByDefault: boolean }
): SecurityFields {
  const security = getParam(params, 'security');
  const sni = getParam(params, 'sni') ?? (sniKey === 'sni' ? getParam(params, 'peer') : undefined);
  const fingerprint = getParam(params, 'fp');

  if (security === 'reality') {
    return {
      tls: true,
      'reality-opts': parseRealityParams(params),
      ...(sniKey === 'sni' ? { sni } : { servername: sni }),
      'client-fingerprint': fingerprint,
    };
  }

  const tls = security === 'tls' || (tlsByDefault && security === undefined);
  if (!tls) {
    return {};
  }
  return {
    tls: true,
    ...(sniKey === 'sni' ? { sni } : { servername: sni }),
    alpn: splitList(getParam(params, 'alpn')),
    'client-fingerprint': fingerprint,
  };
}

export const parseInsecureParam = (params: URLSearchParams) =>
  parseBooleanParam(params.get('allowInsecure')) ?? parseBooleanParam(params.get('insecure'));

/**
 * 生成 ws / grpc 查询参数
 */
export function transportQuery(node: ProxyNode, network: string): Array<[string, string | undefined]> {
  if (network === 'ws' && node['ws-opts']) {
    return [
      ['path', node['ws-opts'].path || '/'],
      ['host', node['ws-opts'].headers?.Host],
    ];
  }
  if (network === 'grpc' && node['grpc-opts']) {
    return [['serviceName', node['grpc-opts']['grpc-service-name']]];
  }
  return [];
}

/**
 * 生成 security 相关查询参数；servername 与 sni 互为回退
 */
export function securityQuery(
  node: ProxyNode,
  preferSni: boolean
): Array<[string, string | undefined]> {
  const reality = node['reality-opts'];
  if (!node.tls && !reality) {
    return [];
  }

  const sni = preferSni ? node.sni ?? node.servername : node.servername ?? node.sni;
  const common: Array<[string, string | undefined]> = [
    ['sni', sni],
    ['fp', node['client-fingerprint']],
  ];
  if (reality) {
    return [
      ['security', 'reality'],
      ['pbk', reality['public-key']],
      ['sid', reality['short-id']],
      ...common,
    ];
  }
  return [['security', 'tls'], ['alpn', node.alpn?.join(',')], ...common];
}

import type { ProxyNode, RealityOpts, WsOpts } from '@/types/config';
import { isProxyType } from '@/types/proxy-configs';
import {
  compact,
  getBoolean,
  getInt,
  getRecord,
  getString,
  getStringList,
  getStringRecord,
  isRecord,
  type PayloadRecord,
} from '@/utils/coerce';

// 按字符串读取的字段
const STRING_FIELDS = [
  'uuid',
  'password',
  'cipher',
  'token',
  'auth-str',
  'network',
  'sni',
  'servername',
  'client-fingerprint',
  'flow',
  'encryption',
  'plugin',
  'protocol',
  'obfs',
  'obfs-param',
  'protocol-param',
  'up',
  'down',
  'obfs-password',
  'ports',
  'udp-relay-mode',
  'congestion-controller',
] as const satisfies ReadonlyArray<keyof ProxyNode>;

// 按布尔读取的字段
const BOOLEAN_FIELDS = [
  'tls',
  'skip-cert-verify',
  'disable-sni',
  'reduce-rtt',
] as const satisfies ReadonlyArray<keyof ProxyNode>;

const readWsOpts = (entry: PayloadRecord): WsOpts | undefined => {
  const opts = getRecord(entry, 'ws-opts');
  if (!opts) return undefined;
  const headers = getStringRecord(opts, 'headers');
  return { path: getString(opts, 'path', '/'), ...(headers ? { headers } : {}) };
};

const readRealityOpts = (entry: PayloadRecord): RealityOpts | undefined => {
  const opts = getRecord(entry, 'reality-opts');
  if (!opts) return undefined;
  const shortId = getString(opts, 'short-id');
  return {
    'public-key': getString(opts, 'public-key', ''),
    ...(shortId ? { 'short-id': shortId } : {}),
  };
};

/**
 * 将 YAML 中的 proxies 条目宽松地转换为节点
 *
 * 端口接受数字或数字字符串，布尔值接受 true/false 与 1/0。
 * type 不受支持或缺少 server 时返回 undefined，由调用方决定如何处理。
 */
export function normalizeProxyEntry(entry: unknown): ProxyNode | undefined {
  if (!isRecord(entry)) return undefined;

  const type = getString(entry, 'type')?.toLowerCase();
  const server = getString(entry, 'server');
  if (!isProxyType(type) || !server) return undefined;

  const node: ProxyNode = {
    name: getString(entry, 'name', type),
    type,
    server,
    port: getInt(entry, 'port', 0),
  };

  for (const key of STRING_FIELDS) {
    node[key] = getString(entry, key);
  }
  for (const key of BOOLEAN_FIELDS) {
    node[key] = getBoolean(entry, key);
  }

  const grpc = getRecord(entry, 'grpc-opts');
  const reality = readRealityOpts(entry);

  node.alterId = getInt(entry, 'alterId');
  node.alpn = getStringList(entry, 'alpn');
  node['ws-opts'] = readWsOpts(entry);
  node['grpc-opts'] = grpc
    ? { 'grpc-service-name': getString(grpc, 'grpc-service-name', '') }
    : undefined;
  node['reality-opts'] = reality;
  node['plugin-opts'] = getRecord(entry, 'plugin-opts');
  if (reality) {
    node.tls = true;
  }

  return compact(node);
}

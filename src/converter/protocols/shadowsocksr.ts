import type { ProxyNode } from '@/types/config';
import { decodeBase64, encodeBase64Url, tryDecodeBase64 } from '@/utils/base64';
import { compact } from '@/utils/coerce';
import { invalidFormat } from '@/utils/errors';
import { buildQuery, getParam, parsePort, splitLink } from '../uri';

// 可选参数同样是 base64，解码失败时当作缺省
const decodeParam = (params: URLSearchParams, key: string) => {
  const value = getParam(params, key);
  return value ? tryDecodeBase64(value) || undefined : undefined;
};

/**
 * ShadowsocksR 链接解析
 *
 * 解码后的格式：host:port:protocol:cipher:obfs:base64(password)/?obfsparam=..&protoparam=..&remarks=..
 * 字段按冒号位置切分，host 中含冒号（IPv6）时字段会整体错位。
 */
export const parseSsrLink = (link: string): ProxyNode => {
  const content = decodeBase64(splitLink(link).body);

  const queryIndex = content.indexOf('/?');
  const main = queryIndex >= 0 ? content.slice(0, queryIndex) : content;
  const params = new URLSearchParams(queryIndex >= 0 ? content.slice(queryIndex + 2) : '');

  const parts = main.split(':');
  if (parts.length < 6) {
    throw invalidFormat('Invalid ssr format');
  }
  const [server, port, protocol, cipher, obfs, password] = parts;
  if (!server) {
    throw invalidFormat('Missing server in ssr link');
  }

  return compact<ProxyNode>({
    name: decodeParam(params, 'remarks') ?? 'ssr',
    type: 'ssr',
    server,
    port: parsePort(port),
    protocol: protocol || undefined,
    cipher: cipher || undefined,
    obfs: obfs || undefined,
    password: tryDecodeBase64(password) || undefined,
    'obfs-param': decodeParam(params, 'obfsparam'),
    'protocol-param': decodeParam(params, 'protoparam'),
  });
};

const encodeParam = (value: string | undefined) => (value ? encodeBase64Url(value) : undefined);

// ShadowsocksR 链接生成
export const buildSsrLink = (node: ProxyNode): string => {
  const main = [
    node.server,
    node.port,
    node.protocol || 'origin',
    node.cipher || 'aes-128-ctr',
    node.obfs || 'plain',
    encodeBase64Url(node.password ?? ''),
  ].join(':');

  const query = buildQuery([
    ['obfsparam', encodeParam(node['obfs-param'])],
    ['protoparam', encodeParam(node['protocol-param'])],
    ['remarks', encodeParam(node.name)],
  ]);

  return `ssr://${encodeBase64Url(query ? `${main}/${query}` : main)}`;
};

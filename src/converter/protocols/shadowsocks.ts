import type { ProxyNode } from '@/types/config';
import { decodeBase64, encodeBase64Url } from '@/utils/base64';
import { compact, getString } from '@/utils/coerce';
import { invalidFormat } from '@/utils/errors';
import {
  buildQuery,
  formatFragment,
  formatHost,
  getParam,
  parseAuthority,
  parseName,
  parsePort,
  splitLink,
} from '../uri';

// 旧版链接：整段 base64 解码后为 cipher:password@host:port
// 密码可含冒号；密码含 @ 时会被切进 host，host 为 IPv6 时匹配失败
const LEGACY_PATTERN = /^([^:@]+):([^@]+)@([^:]+):(\d+)$/;

// 插件参数解析 `name;k=v;k=v`，obfs 插件的 host 统一写成 obfs-host
export const parsePluginParam = (value: string): Pick<ProxyNode, 'plugin' | 'plugin-opts'> => {
  const [plugin, ...pairs] = value.split(';');
  const opts: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) continue;
    const key = pair.slice(0, eq);
    opts[plugin === 'obfs' && key === 'host' ? 'obfs-host' : key] = pair.slice(eq + 1);
  }
  return {
    plugin,
    'plugin-opts': Object.keys(opts).length > 0 ? opts : undefined,
  };
};

export const formatPluginParam = (node: ProxyNode): string | undefined => {
  if (!node.plugin) return undefined;
  const opts = node['plugin-opts'];
  if (!opts) return node.plugin;

  const parts = [node.plugin];
  if (node.plugin === 'obfs') {
    const mode = getString(opts, 'obfs') ?? getString(opts, 'mode');
    const host = getString(opts, 'obfs-host') ?? getString(opts, 'host');
    if (mode) parts.push(`obfs=${mode}`);
    if (host) parts.push(`obfs-host=${host}`);
  } else {
    for (const key of Object.keys(opts)) {
      const value = getString(opts, key);
      if (value !== undefined) parts.push(`${key}=${value}`);
    }
  }
  return parts.join(';');
};

// 用户信息既可能是 base64(cipher:password)，也可能已经是明文 cipher:password
const parseCredentials = (userinfo: string) => {
  const plain = parseName(userinfo) ?? '';
  const decoded = plain.includes(':') ? plain : decodeBase64(plain);
  const colon = decoded.indexOf(':');
  if (colon < 0) {
    throw invalidFormat('Invalid ss userinfo');
  }
  return { cipher: decoded.slice(0, colon), password: decoded.slice(colon + 1) };
};

// Shadowsocks 链接解析
export const parseSsLink = (link: string): ProxyNode => {
  const { body, params, name } = splitLink(link);

  if (body.includes('@')) {
    const { userinfo = '', hostname, port } = parseAuthority(body);
    if (!hostname) {
      throw invalidFormat('Missing server in ss link');
    }
    const plugin = getParam(params, 'plugin');
    return compact<ProxyNode>({
      name: name ?? 'ss',
      type: 'ss',
      server: hostname,
      port,
      ...parseCredentials(userinfo),
      ...(plugin ? parsePluginParam(plugin) : {}),
    });
  }

  const matches = decodeBase64(body.replace(/^\/+/, '')).match(LEGACY_PATTERN);
  if (!matches) {
    throw invalidFormat('Invalid ss format');
  }
  const [, cipher, password, server, port] = matches;
  return {
    name: name ?? 'ss',
    type: 'ss',
    server,
    port: parsePort(port),
    cipher,
    password,
  };
};

// Shadowsocks 链接生成（SIP002）
export const buildSsLink = (node: ProxyNode): string => {
  const userinfo = encodeBase64Url(`${node.cipher ?? ''}:${node.password ?? ''}`);
  const query = buildQuery([['plugin', formatPluginParam(node)]]);
  return `ss://${userinfo}@${formatHost(node.server)}:${node.port}${query}${formatFragment(node.name, 'ss')}`;
};

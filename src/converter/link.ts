import type { ProxyNode } from '@/types/config';
import { isProxyType, type ProxyType } from '@/types/proxy-configs';
import { invalidFormat, unsupportedProtocol } from '@/utils/errors';
import { buildHysteriaLink, parseHysteriaLink } from './protocols/hysteria';
import { buildHysteria2Link, parseHysteria2Link } from './protocols/hysteria2';
import { buildSsLink, parseSsLink } from './protocols/shadowsocks';
import { buildSsrLink, parseSsrLink } from './protocols/shadowsocksr';
import { buildTrojanLink, parseTrojanLink } from './protocols/trojan';
import { buildTuicLink, parseTuicLink } from './protocols/tuic';
import { buildVlessLink, parseVlessLink } from './protocols/vless';
import { buildVmessLink, parseVmessLink } from './protocols/vmess';

const LINK_PARSERS: Record<ProxyType, (link: string) => ProxyNode> = {
  ss: parseSsLink,
  ssr: parseSsrLink,
  vmess: parseVmessLink,
  vless: parseVlessLink,
  trojan: parseTrojanLink,
  hysteria: parseHysteriaLink,
  hysteria2: parseHysteria2Link,
  tuic: parseTuicLink,
};

const LINK_BUILDERS: Record<ProxyType, (node: ProxyNode) => string> = {
  ss: buildSsLink,
  ssr: buildSsrLink,
  vmess: buildVmessLink,
  vless: buildVlessLink,
  trojan: buildTrojanLink,
  hysteria: buildHysteriaLink,
  hysteria2: buildHysteria2Link,
  tuic: buildTuicLink,
};

// 协议别名
const SCHEME_ALIASES: Record<string, ProxyType> = {
  hy2: 'hysteria2',
};

/**
 * 解析单条分享链接
 *
 * 协议头不区分大小写；hy2:// 视同 hysteria2://
 */
export const parseProxyLink = (raw: string): ProxyNode => {
  const link = raw.trim();
  const separator = link.indexOf('://');
  if (separator < 0) {
    throw invalidFormat('Invalid uri format: missing "://"');
  }

  const token = link.slice(0, separator).toLowerCase();
  const scheme = Object.hasOwn(SCHEME_ALIASES, token) ? SCHEME_ALIASES[token] : token;
  if (!isProxyType(scheme)) {
    throw unsupportedProtocol(`Unsupported protocol: ${token}`);
  }

  return LINK_PARSERS[scheme](`${scheme}${link.slice(separator)}`);
};

/**
 * 将节点编码为分享链接
 */
export const buildProxyLink = (node: ProxyNode): string => {
  const type = String(node.type).toLowerCase();
  if (!isProxyType(type)) {
    throw unsupportedProtocol(`Unsupported proxy type: ${node.type}`);
  }
  return LINK_BUILDERS[type](node);
};

import { parse, stringify } from 'yaml';
import type { MihomoConfig, ProxyNode } from '@/types/config';
import { encodeBase64, tryDecodeBase64 } from '@/utils/base64';
import { compact, isRecord } from '@/utils/coerce';
import { formatConverterError, invalidFormat, noProxiesFound } from '@/utils/errors';
import defaultLogger, { type Logger } from '@/utils/logger';
import { buildProxyLink, parseProxyLink } from './link';
import { normalizeProxyEntry } from './normalize';

export interface ExtractOptions {
  logger?: Logger;
}

const STRUCTURED_KEYS = /(?:^|\n)(?:proxies|proxy-groups):/;

/**
 * 判断内容是否为 mihomo / Clash 结构化配置
 */
export const isStructuredConfig = (content: string): boolean =>
  STRUCTURED_KEYS.test(content.trim());

const extractFromYaml = (content: string, logger: Logger): ProxyNode[] => {
  let config: unknown;
  try {
    config = parse(content);
  } catch (error) {
    throw invalidFormat('Failed to parse yaml subscription', error);
  }

  const entries: unknown[] = isRecord(config) && Array.isArray(config.proxies) ? config.proxies : [];
  const nodes: ProxyNode[] = [];
  entries.forEach((entry, index) => {
    const node = normalizeProxyEntry(entry);
    if (node) {
      nodes.push(node);
    } else {
      logger.warn(`Skipped proxy entry #${index + 1}: unsupported type or missing server`);
    }
  });

  if (nodes.length === 0) {
    throw noProxiesFound('No proxies found in yaml');
  }
  logger.info(`Parsed ${nodes.length} nodes from yaml`);
  return nodes;
};

/**
 * 逐条解析链接，失败的行记录日志后跳过，结果保持输入顺序
 */
export function extractFromLinks(links: string[], { logger = defaultLogger }: ExtractOptions = {}) {
  const nodes: ProxyNode[] = [];
  links.forEach((raw, index) => {
    const line = raw.trim();
    if (!line || line.startsWith('#')) return;
    try {
      nodes.push(parseProxyLink(line));
    } catch (error) {
      logger.warn(`Line ${index + 1} parse failed: ${formatConverterError(error)}`);
    }
  });

  if (nodes.length === 0) {
    throw noProxiesFound('No valid nodes found');
  }
  logger.debug(`Parsed ${nodes.length} of ${links.length} lines`);
  return nodes;
}

/**
 * 从订阅内容中提取节点
 *
 * - 含有 proxies: / proxy-groups: 顶层键时按 YAML 配置解析
 * - 否则整体按 base64 解码（标准字母表优先，其次 URL 安全字母表）
 * - 两种字母表都无法解码时，按明文链接列表处理
 */
export function extractProxies(content: string, options: ExtractOptions = {}): ProxyNode[] {
  const logger = options.logger ?? defaultLogger;
  const text = content.trim();

  if (isStructuredConfig(text)) {
    logger.debug('Detected yaml subscription');
    return extractFromYaml(text, logger);
  }

  const decoded = tryDecodeBase64(text);
  if (decoded === undefined) {
    logger.debug('Content is not base64, treating as plain link list');
  }
  return extractFromLinks((decoded ?? text).split('\n'), { logger });
}

/**
 * 生成 base64 订阅内容（每行一个分享链接）
 *
 * 无法编码的节点会被跳过并记录日志
 */
export function buildSubscription(nodes: ProxyNode[], { logger = defaultLogger }: ExtractOptions = {}) {
  const links = nodes.flatMap((node) => {
    try {
      return [buildProxyLink(node)];
    } catch (error) {
      logger.warn(`Skipped node "${node.name}": ${formatConverterError(error)}`);
      return [];
    }
  });
  return encodeBase64(links.join('\n'));
}

/**
 * 输出只包含 proxies 段的 mihomo YAML
 */
export function dumpProxiesYaml(nodes: ProxyNode[]): string {
  const config: MihomoConfig = { proxies: nodes.map((node) => compact(node)) };
  return stringify(config);
}

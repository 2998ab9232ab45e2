/**
 * 代理协议类型定义
 * 使用字面量联合约束节点的 type 字段
 */

// 所有支持的代理类型列表
export const PROXY_TYPES = [
  'ss',
  'ssr',
  'vmess',
  'vless',
  'trojan',
  'hysteria',
  'hysteria2',
  'tuic',
] as const;

// 代理类型字面量
export type ProxyType = (typeof PROXY_TYPES)[number];

// 类型守卫函数
export function isProxyType(value: unknown): value is ProxyType {
  return PROXY_TYPES.some((type) => type === value);
}

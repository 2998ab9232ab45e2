import type { ProxyType } from './proxy-configs';

/**
 * MiHomo 配置（编解码器只关心 proxies 段）
 */
export interface MihomoConfig {
  proxies?: unknown[];
}

/**
 * WebSocket 传输配置
 */
export interface WsOpts {
  path: string;
  headers?: Record<string, string>;
}

/**
 * gRPC 传输配置
 */
export interface GrpcOpts {
  'grpc-service-name': string;
}

/**
 * Reality 配置
 */
export interface RealityOpts {
  'public-key': string;
  'short-id'?: string;
}

/**
 * 代理节点配置
 *
 * 所有协议共用一个扁平结构，字段名与 mihomo 的 YAML 配置保持一致（包括连字符键名）。
 * 缺省字段一律不写入，而不是写成空值。
 */
export interface ProxyNode {
  name: string;
  type: ProxyType;
  server: string;
  port: number;

  // 身份凭据
  uuid?: string;
  password?: string;
  cipher?: string;
  alterId?: number;
  token?: string;
  'auth-str'?: string;

  // 传输层 / TLS
  network?: string;
  tls?: boolean;
  sni?: string;
  servername?: string;
  alpn?: string[];
  'client-fingerprint'?: string;
  'skip-cert-verify'?: boolean;
  flow?: string;
  encryption?: string;
  'ws-opts'?: WsOpts;
  'grpc-opts'?: GrpcOpts;
  'reality-opts'?: RealityOpts;

  // Shadowsocks 插件
  plugin?: string;
  'plugin-opts'?: Record<string, unknown>;

  // ShadowsocksR
  protocol?: string;
  obfs?: string;
  'obfs-param'?: string;
  'protocol-param'?: string;

  // Hysteria / Hysteria2
  up?: string;
  down?: string;
  'obfs-password'?: string;
  ports?: string;

  // TUIC
  'disable-sni'?: boolean;
  'reduce-rtt'?: boolean;
  'udp-relay-mode'?: string;
  'congestion-controller'?: string;
}

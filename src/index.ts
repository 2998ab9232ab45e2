export { parseProxyLink, buildProxyLink } from './converter/link';
export {
  extractProxies,
  extractFromLinks,
  buildSubscription,
  dumpProxiesYaml,
  isStructuredConfig,
} from './converter/subscription';
export type { ExtractOptions } from './converter/subscription';
export { normalizeProxyEntry } from './converter/normalize';
export {
  ConverterError,
  isConverterError,
  redactProxyLink,
  formatConverterError,
} from './utils/errors';
export type { ConverterErrorKind } from './utils/errors';
export { createLogger, resolveLogLevel } from './utils/logger';
export type { Logger, LogLevel, LoggerOptions } from './utils/logger';
export { PROXY_TYPES, isProxyType } from './types/proxy-configs';
export type { ProxyType } from './types/proxy-configs';
export type {
  ProxyNode,
  MihomoConfig,
  WsOpts,
  GrpcOpts,
  RealityOpts,
} from './types/config';

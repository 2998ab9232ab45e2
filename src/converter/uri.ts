import { invalidFormat } from '@/utils/errors';

/**
 * 分享链接的基础拆分结果：协议头、主体、查询参数、名称
 */
export interface LinkParts {
  scheme: string;
  /** `://` 之后、`?` / `#` 之前的原始内容 */
  body: string;
  params: URLSearchParams;
  /** 已解码的 fragment */
  name?: string;
}

/**
 * authority 形式 `[user[:pass]@]host:port` 的解析结果
 */
export interface Authority {
  username?: string;
  password?: string;
  /** 未经解码的完整 userinfo */
  userinfo?: string;
  hostname: string;
  port: number;
}

// 名称解析
export const parseName = (raw: string | undefined) => {
  if (!raw) return undefined;
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
};

// 布尔参数解析
export const parseBooleanParam = (value: string | null | undefined) => {
  if (!value) return undefined;
  return value === '1' || value.toLowerCase() === 'true';
};

// 端口解析：无法解析时返回 0，由下游校验
export const parsePort = (raw: string | undefined): number => {
  if (!raw || !/^\d+$/.test(raw)) return 0;
  return Number.parseInt(raw, 10);
};

// 逗号分隔列表（alpn 等）
export const splitList = (value: string | undefined): string[] | undefined => {
  if (!value) return undefined;
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
  return items.length > 0 ? items : undefined;
};

// 查询参数读取：空值与缺省同样处理
export const getParam = (params: URLSearchParams, key: string): string | undefined =>
  params.get(key) || undefined;

/**
 * 拆分 `scheme://body?query#fragment`
 */
export function splitLink(link: string): LinkParts {
  const separator = link.indexOf('://');
  if (separator < 0) {
    throw invalidFormat('Invalid uri format: missing "://"');
  }

  const scheme = link.slice(0, separator).toLowerCase();
  let rest = link.slice(separator + 3);

  let fragment: string | undefined;
  const hashIndex = rest.indexOf('#');
  if (hashIndex >= 0) {
    fragment = rest.slice(hashIndex + 1);
    rest = rest.slice(0, hashIndex);
  }

  let query = '';
  const queryIndex = rest.indexOf('?');
  if (queryIndex >= 0) {
    query = rest.slice(queryIndex + 1);
    rest = rest.slice(0, queryIndex);
  }

  return {
    scheme,
    body: rest,
    params: new URLSearchParams(query),
    name: parseName(fragment),
  };
}

/**
 * 解析 authority：userinfo 以最后一个 `@` 为界，IPv6 地址需要方括号
 */
export function parseAuthority(body: string): Authority {
  const atIndex = body.lastIndexOf('@');
  const userinfo = atIndex >= 0 ? body.slice(0, atIndex) : undefined;
  const hostPort = (atIndex >= 0 ? body.slice(atIndex + 1) : body).split('/')[0];

  let hostname = hostPort;
  let portRaw: string | undefined;
  if (hostPort.startsWith('[')) {
    const end = hostPort.indexOf(']');
    hostname = end >= 0 ? hostPort.slice(1, end) : hostPort.slice(1);
    if (end >= 0 && hostPort[end + 1] === ':') {
      portRaw = hostPort.slice(end + 2);
    }
  } else {
    const colon = hostPort.lastIndexOf(':');
    if (colon >= 0) {
      hostname = hostPort.slice(0, colon);
      portRaw = hostPort.slice(colon + 1);
    }
  }

  const authority: Authority = { hostname, port: parsePort(portRaw) };
  if (userinfo !== undefined) {
    const colon = userinfo.indexOf(':');
    authority.userinfo = userinfo;
    authority.username = parseName(colon >= 0 ? userinfo.slice(0, colon) : userinfo);
    if (colon >= 0) {
      authority.password = parseName(userinfo.slice(colon + 1));
    }
  }
  return authority;
}

/**
 * 解析 authority 形式的链接；server 为空时视为格式错误
 */
export function parseAuthorityLink(link: string): LinkParts & Authority {
  const parts = splitLink(link);
  const authority = parseAuthority(parts.body);
  if (!authority.hostname) {
    throw invalidFormat(`Missing server in ${parts.scheme} link`);
  }
  return { ...parts, ...authority };
}

// IPv6 地址重新加上方括号
export const formatHost = (server: string) => (server.includes(':') ? `[${server}]` : server);

// 名称编码为 fragment，空名称时回退为协议名
export const formatFragment = (name: string | undefined, fallback: string) =>
  `#${encodeURIComponent(name || fallback)}`;

/**
 * 构建查询串，跳过空值；没有参数时返回空串
 */
export function buildQuery(entries: Array<[string, string | undefined]>): string {
  const params = new URLSearchParams();
  for (const [key, value] of entries) {
    if (value) {
      params.set(key, value);
    }
  }
  const query = params.toString();
  return query ? `?${query}` : '';
}

export interface AuthorityLinkInput {
  scheme: string;
  username?: string;
  password?: string;
  server: string;
  port: number;
  query: Array<[string, string | undefined]>;
  name?: string;
}

/**
 * 构建 `scheme://[user[:pass]@]host:port?query#name`
 */
export function buildAuthorityLink({
  scheme,
  username,
  password,
  server,
  port,
  query,
  name,
}: AuthorityLinkInput): string {
  let auth = '';
  if (password) {
    auth = `${encodeURIComponent(username ?? '')}:${encodeURIComponent(password)}@`;
  } else if (username) {
    auth = `${encodeURIComponent(username)}@`;
  }
  return `${scheme}://${auth}${formatHost(server)}:${port}${buildQuery(query)}${formatFragment(name, scheme)}`;
}

import { describe, it, expect } from 'vitest';
import { ConverterError } from '@/utils/errors';
import {
  buildAuthorityLink,
  buildQuery,
  formatFragment,
  parseAuthority,
  parseAuthorityLink,
  parseName,
  splitLink,
} from './uri';

describe('splitLink', () => {
  it('应该拆分协议头、主体、查询参数和名称', () => {
    const parts = splitLink('Trojan://test-pass@example.com:443?type=ws#My%20Node');

    expect(parts.scheme).toBe('trojan');
    expect(parts.body).toBe('test-pass@example.com:443');
    expect(parts.params.get('type')).toBe('ws');
    expect(parts.name).toBe('My Node');
  });

  it('缺少 :// 时应该抛出 InvalidFormat', () => {
    expect(() => splitLink('example.com:443')).toThrow(ConverterError);
  });
});

describe('parseName', () => {
  it('应该解码百分号编码，无法解码时保留原文', () => {
    expect(parseName('%E4%BD%A0%E5%A5%BD')).toBe('你好');
    expect(parseName('%zz')).toBe('%zz');
    expect(parseName('')).toBeUndefined();
  });
});

describe('parseAuthority', () => {
  it('应该解析 IPv6 地址和编码过的密码', () => {
    expect(parseAuthority('user:p%40ss@[2001:db8::1]:8443')).toEqual({
      userinfo: 'user:p%40ss',
      username: 'user',
      password: 'p@ss',
      hostname: '2001:db8::1',
      port: 8443,
    });
  });

  it('端口缺失或非法时为 0', () => {
    expect(parseAuthority('example.com')).toEqual({ hostname: 'example.com', port: 0 });
    expect(parseAuthority('example.com:abc')).toEqual({ hostname: 'example.com', port: 0 });
  });

  it('应该忽略主机后的路径', () => {
    expect(parseAuthority('u@example.com:443/')).toMatchObject({
      username: 'u',
      hostname: 'example.com',
      port: 443,
    });
  });

  it('server 为空时链接解析应该失败', () => {
    expect(() => parseAuthorityLink('vless://u@:443')).toThrow('Missing server in vless link');
  });
});

describe('buildQuery', () => {
  it('应该跳过空值并进行表单编码', () => {
    expect(
      buildQuery([
        ['a', '1'],
        ['b', undefined],
        ['c', 'x y'],
      ])
    ).toBe('?a=1&c=x+y');
    expect(buildQuery([])).toBe('');
  });
});

describe('formatFragment', () => {
  it('应该编码名称，空名称回退为协议名', () => {
    expect(formatFragment('节点 1', 'ss')).toBe('#%E8%8A%82%E7%82%B9%201');
    expect(formatFragment('', 'ss')).toBe('#ss');
  });
});

describe('buildAuthorityLink', () => {
  it('应该重新加上 IPv6 方括号', () => {
    expect(
      buildAuthorityLink({
        scheme: 'tuic',
        password: 'pw',
        server: '::1',
        port: 443,
        query: [],
        name: 'n',
      })
    ).toBe('tuic://:pw@[::1]:443#n');
  });

  it('应该编码 userinfo 中的保留字符', () => {
    expect(
      buildAuthorityLink({
        scheme: 'trojan',
        username: 'p@ss:word',
        server: 'example.com',
        port: 443,
        query: [],
      })
    ).toBe('trojan://p%40ss%3Aword@example.com:443#trojan');
  });
});

import { describe, it, expect } from 'vitest';
import { encodeBase64, encodeBase64Url } from '@/utils/base64';
import { isConverterError } from '@/utils/errors';
import { catchError } from '@/test/helpers';
import { buildSsLink, formatPluginParam, parsePluginParam, parseSsLink } from './shadowsocks';

const userinfo = encodeBase64Url('aes-256-gcm:test-pass');

describe('parseSsLink', () => {
  it('应该解析 SIP002 链接', () => {
    expect(parseSsLink(`ss://${userinfo}@1.2.3.4:8388#Node`)).toEqual({
      name: 'Node',
      type: 'ss',
      server: '1.2.3.4',
      port: 8388,
      cipher: 'aes-256-gcm',
      password: 'test-pass',
    });
  });

  it('应该接受明文 userinfo', () => {
    expect(parseSsLink('ss://chacha20-ietf-poly1305:pw%3Ax@example.com:443')).toEqual({
      name: 'ss',
      type: 'ss',
      server: 'example.com',
      port: 443,
      cipher: 'chacha20-ietf-poly1305',
      password: 'pw:x',
    });
  });

  it('应该把 obfs 插件的 host 写成 obfs-host', () => {
    const node = parseSsLink(`ss://${userinfo}@1.2.3.4:8388?plugin=obfs;mode=tls;host=cdn.example.com`);

    expect(node.plugin).toBe('obfs');
    expect(node['plugin-opts']).toEqual({ mode: 'tls', 'obfs-host': 'cdn.example.com' });
  });

  it('应该按 obfs=<mode> 形式读取 obfs 插件参数', () => {
    const node = parseSsLink(
      `ss://${userinfo}@example.com:8388?plugin=obfs;obfs=tls;obfs-host=example.com#name`
    );

    expect(node.plugin).toBe('obfs');
    expect(node['plugin-opts']).toEqual({ obfs: 'tls', 'obfs-host': 'example.com' });
  });

  it('应该解析旧版整段 base64 链接，密码可以包含冒号', () => {
    const link = `ss://${encodeBase64('aes-128-gcm:pa:ss@example.com:8388')}#Legacy`;

    expect(parseSsLink(link)).toEqual({
      name: 'Legacy',
      type: 'ss',
      server: 'example.com',
      port: 8388,
      cipher: 'aes-128-gcm',
      password: 'pa:ss',
    });
  });

  it('旧版链接密码含 @ 时会被错误切分', () => {
    const node = parseSsLink(`ss://${encodeBase64('aes-128-gcm:p@ss@example.com:8388')}`);

    expect(node.password).toBe('p');
    expect(node.server).toBe('ss@example.com');
  });

  it('旧版链接 host 为 IPv6 时应该抛出 InvalidFormat', () => {
    const error = catchError(() => parseSsLink(`ss://${encodeBase64('aes-128-gcm:pw@::1:8388')}`));
    expect(isConverterError(error, 'InvalidFormat')).toBe(true);
  });

  it('应该接受填充被百分号编码的 base64 userinfo', () => {
    expect(parseSsLink('ss://YWVzLTI1Ni1nY206dGVzdC1wYXNzMQ%3D%3D@example.com:8388#A')).toEqual({
      name: 'A',
      type: 'ss',
      server: 'example.com',
      port: 8388,
      cipher: 'aes-256-gcm',
      password: 'test-pass1',
    });
  });

  it('userinfo 缺少冒号时应该抛出 InvalidFormat', () => {
    const error = catchError(() => parseSsLink(`ss://${encodeBase64Url('nocolon')}@example.com:443`));
    expect(isConverterError(error, 'InvalidFormat')).toBe(true);
  });
});

describe('parsePluginParam', () => {
  it('没有参数时 plugin-opts 为 undefined', () => {
    expect(parsePluginParam('v2ray-plugin')).toEqual({
      plugin: 'v2ray-plugin',
      'plugin-opts': undefined,
    });
  });

  // 插件参数不做转义：值中含 ; 时会被截断
  it('参数值含分号时无法还原', () => {
    const plugin = formatPluginParam({
      name: 'N',
      type: 'ss',
      server: 'example.com',
      port: 8388,
      plugin: 'v2ray-plugin',
      'plugin-opts': { mode: 'websocket', path: '/a;b' },
    });

    expect(plugin).toBe('v2ray-plugin;mode=websocket;path=/a;b');
    expect(parsePluginParam(plugin ?? '')).toEqual({
      plugin: 'v2ray-plugin',
      'plugin-opts': { mode: 'websocket', path: '/a' },
    });
  });
});

describe('buildSsLink', () => {
  it('应该按 obfs=<mode>;obfs-host=<host> 输出 obfs 插件', () => {
    const link = buildSsLink({
      name: 'Node',
      type: 'ss',
      server: '1.2.3.4',
      port: 8388,
      cipher: 'aes-256-gcm',
      password: 'test-pass',
      plugin: 'obfs',
      'plugin-opts': { mode: 'tls', host: 'cdn.example.com' },
    });

    expect(link).toBe(
      `ss://${userinfo}@1.2.3.4:8388?plugin=obfs%3Bobfs%3Dtls%3Bobfs-host%3Dcdn.example.com#Node`
    );
  });

  it('生成的链接应该能被重新解析', () => {
    const node = {
      name: '香港 01',
      type: 'ss' as const,
      server: '2001:db8::1',
      port: 8388,
      cipher: 'aes-256-gcm',
      password: 'test:pass',
    };

    expect(parseSsLink(buildSsLink(node))).toEqual(node);
  });
});

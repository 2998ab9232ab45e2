import { describe, it, expect } from 'vitest';
import { normalizeProxyEntry } from './normalize';

describe('normalizeProxyEntry', () => {
  it('应该宽松地转换字段类型', () => {
    const entry = {
      name: 'A',
      type: 'VMess',
      server: 'example.com',
      port: '443',
      uuid: 'test-uuid',
      alterId: '0',
      cipher: 'auto',
      tls: 'true',
      'skip-cert-verify': 1,
      network: 'ws',
      'ws-opts': { path: '/ws', headers: { Host: 'cdn.example.com' } },
      alpn: 'h2,h3',
      udp: true,
    };

    expect(normalizeProxyEntry(entry)).toEqual({
      name: 'A',
      type: 'vmess',
      server: 'example.com',
      port: 443,
      uuid: 'test-uuid',
      alterId: 0,
      cipher: 'auto',
      tls: true,
      'skip-cert-verify': true,
      network: 'ws',
      'ws-opts': { path: '/ws', headers: { Host: 'cdn.example.com' } },
      alpn: ['h2', 'h3'],
    });
  });

  it('名称缺省时使用协议名，端口缺省时为 0', () => {
    expect(normalizeProxyEntry({ type: 'hysteria2', server: 'example.com', password: 'pw' })).toEqual({
      name: 'hysteria2',
      type: 'hysteria2',
      server: 'example.com',
      port: 0,
      password: 'pw',
    });
  });

  it('reality-opts 存在时 tls 为 true', () => {
    expect(
      normalizeProxyEntry({
        type: 'vless',
        server: 'example.com',
        port: 443,
        'reality-opts': { 'public-key': 'test-public-key' },
      })
    ).toEqual({
      name: 'vless',
      type: 'vless',
      server: 'example.com',
      port: 443,
      tls: true,
      'reality-opts': { 'public-key': 'test-public-key' },
    });
  });

  it('应该保留插件参数与 grpc 配置', () => {
    const node = normalizeProxyEntry({
      type: 'ss',
      server: 'example.com',
      port: 8388,
      plugin: 'obfs',
      'plugin-opts': { mode: 'tls', host: 'cdn.example.com' },
      'grpc-opts': { 'grpc-service-name': 'svc' },
    });

    expect(node?.['plugin-opts']).toEqual({ mode: 'tls', host: 'cdn.example.com' });
    expect(node?.['grpc-opts']).toEqual({ 'grpc-service-name': 'svc' });
  });

  it('不支持的类型或缺少 server 时返回 undefined', () => {
    expect(normalizeProxyEntry({ type: 'socks5', server: 'example.com', port: 1080 })).toBeUndefined();
    expect(normalizeProxyEntry({ type: 'ss', port: 8388 })).toBeUndefined();
    expect(normalizeProxyEntry('ss')).toBeUndefined();
  });
});

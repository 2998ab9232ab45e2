import type { ProxyNode } from '@/types/config';
import { decodeBase64, encodeBase64 } from '@/utils/base64';
import {
  compact,
  getBoolean,
  getInt,
  getString,
  getStringList,
  isRecord,
  type PayloadRecord,
} from '@/utils/coerce';
import { invalidFormat } from '@/utils/errors';
import { splitLink } from '../uri';

const parsePayload = (body: string): PayloadRecord => {
  const json = decodeBase64(body);
  let payload: unknown;
  try {
    payload = JSON.parse(json);
  } catch (error) {
    throw invalidFormat('Invalid vmess payload', error);
  }
  if (!isRecord(payload)) {
    throw invalidFormat('Invalid vmess payload');
  }
  return payload;
};

// VMess 链接解析（v2rayN JSON 格式）
export const parseVmessLink = (link: string): ProxyNode => {
  const { body, name } = splitLink(link);
  const payload = parsePayload(body);

  const server = getString(payload, 'add');
  if (!server) {
    throw invalidFormat('Missing server in vmess link');
  }

  const network = getString(payload, 'net', 'tcp');
  const tls = getString(payload, 'tls') === 'tls';
  const path = getString(payload, 'path');
  const host = getString(payload, 'host');

  return compact<ProxyNode>({
    name: getString(payload, 'ps') ?? name ?? 'vmess',
    type: 'vmess',
    server,
    port: getInt(payload, 'port', 0),
    uuid: getString(payload, 'id'),
    alterId: getInt(payload, 'aid', 0),
    cipher: getString(payload, 'scy', 'auto'),
    network,
    tls: tls || undefined,
    servername: tls ? getString(payload, 'sni') : undefined,
    alpn: tls ? getStringList(payload, 'alpn') : undefined,
    'client-fingerprint': getString(payload, 'fp'),
    'skip-cert-verify': getBoolean(payload, 'allowInsecure') || undefined,
    'ws-opts':
      network === 'ws'
        ? { path: path ?? '/', ...(host ? { headers: { Host: host } } : {}) }
        : undefined,
    'grpc-opts': network === 'grpc' ? { 'grpc-service-name': path ?? '' } : undefined,
  });
};

// VMess 链接生成
export const buildVmessLink = (node: ProxyNode): string => {
  const network = node.network || 'tcp';
  const payload: PayloadRecord = {
    v: '2',
    ps: node.name,
    add: node.server,
    port: node.port,
    id: node.uuid ?? '',
    aid: node.alterId ?? 0,
    scy: node.cipher || 'auto',
    net: network,
    type: 'none',
    host: '',
    path: '',
    tls: '',
    sni: '',
  };

  if (node.tls) {
    payload.tls = 'tls';
    payload.sni = node.servername ?? node.sni ?? '';
    if (node.alpn?.length) {
      payload.alpn = node.alpn.join(',');
    }
  }
  if (node['client-fingerprint']) {
    payload.fp = node['client-fingerprint'];
  }
  if (node['skip-cert-verify']) {
    payload.allowInsecure = '1';
  }

  if (network === 'ws' && node['ws-opts']) {
    payload.path = node['ws-opts'].path;
    payload.host = node['ws-opts'].headers?.Host ?? '';
  } else if (network === 'grpc' && node['grpc-opts']) {
    payload.path = node['grpc-opts']['grpc-service-name'];
  }

  return `vmess://${encodeBase64(JSON.stringify(payload))}`;
};

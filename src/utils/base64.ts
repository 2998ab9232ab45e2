import { invalidFormat } from './errors';

export type Base64Alphabet = 'standard' | 'url';

const ALPHABET_PATTERNS: Record<Base64Alphabet, RegExp> = {
  standard: /^[A-Za-z0-9+/]*$/,
  url: /^[A-Za-z0-9_-]*$/,
};

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

// 只接受“文本”结果：允许制表符和换行，拒绝其余控制字符
const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/;

/**
 * 标准 base64 编码（带填充）
 */
export const encodeBase64 = (text: string): string => Buffer.from(text, 'utf8').toString('base64');

/**
 * URL 安全 base64 编码（无填充）
 */
export const encodeBase64Url = (text: string): string =>
  Buffer.from(text, 'utf8').toString('base64url');

/**
 * 按指定字母表解码，填充可有可无；内容中的换行会被忽略
 * 未指定字母表时先按标准字母表，再按 URL 安全字母表
 * 解码失败或结果不是 UTF-8 文本时返回 undefined
 */
export function tryDecodeBase64(input: string, alphabet?: Base64Alphabet): string | undefined {
  if (alphabet === undefined) {
    return tryDecodeBase64(input, 'standard') ?? tryDecodeBase64(input, 'url');
  }

  const body = input.trim().replace(/[\r\n]+/g, '').replace(/=+$/, '');
  if (body.length % 4 === 1 || !ALPHABET_PATTERNS[alphabet].test(body)) {
    return undefined;
  }

  try {
    const text = utf8Decoder.decode(Buffer.from(body, alphabet === 'url' ? 'base64url' : 'base64'));
    return CONTROL_CHARS.test(text) ? undefined : text;
  } catch {
    return undefined;
  }
}

/**
 * 宽松解码，失败时抛出 InvalidFormat
 */
export function decodeBase64(input: string): string {
  const decoded = tryDecodeBase64(input);
  if (decoded === undefined) {
    throw invalidFormat('Malformed base64 payload');
  }
  return decoded;
}

/**
 * 宽松字段读取工具
 *
 * 上游生成的 JSON / YAML 字段类型并不统一（端口可能是 443、443.0 或 "443"），
 * 这里按“能读就读，读不了就当缺省”的规则取值，而不是严格反序列化。
 */

export type PayloadRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is PayloadRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function coerceString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value === '' ? undefined : value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value === 'boolean') {
    return String(value);
  }
  return undefined;
}

function coerceInt(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : undefined;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return undefined;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? Math.trunc(parsed) : undefined;
  }
  return undefined;
}

/**
 * 读取字符串；数字和布尔值会被转成字符串，空串视为缺省
 */
export function getString(record: PayloadRecord, key: string): string | undefined;
export function getString(record: PayloadRecord, key: string, fallback: string): string;
export function getString(record: PayloadRecord, key: string, fallback?: string) {
  return coerceString(record[key]) ?? fallback;
}

/**
 * 读取整数；接受整数、浮点数（截断）和数字字符串
 */
export function getInt(record: PayloadRecord, key: string): number | undefined;
export function getInt(record: PayloadRecord, key: string, fallback: number): number;
export function getInt(record: PayloadRecord, key: string, fallback?: number) {
  return coerceInt(record[key]) ?? fallback;
}

/**
 * 读取布尔值；接受 true/false、1/0 以及对应的字符串
 */
export function getBoolean(record: PayloadRecord, key: string): boolean | undefined {
  const value = record[key];
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const lower = value.trim().toLowerCase();
    if (lower === 'true' || lower === '1') return true;
    if (lower === 'false' || lower === '0') return false;
  }
  return undefined;
}

/**
 * 读取字符串列表；既接受数组，也接受逗号分隔的字符串
 */
export function getStringList(record: PayloadRecord, key: string): string[] | undefined {
  const value = record[key];
  const items = Array.isArray(value)
    ? value.map(coerceString)
    : typeof value === 'string'
      ? value.split(',').map((item) => item.trim())
      : [];
  const list = items.filter((item): item is string => Boolean(item));
  return list.length > 0 ? list : undefined;
}

export function getRecord(record: PayloadRecord, key: string): PayloadRecord | undefined {
  const value = record[key];
  return isRecord(value) ? value : undefined;
}

/**
 * 读取字符串映射（如 ws-opts.headers），丢弃无法转成字符串的值
 */
export function getStringRecord(
  record: PayloadRecord,
  key: string
): Record<string, string> | undefined {
  const nested = getRecord(record, key);
  if (!nested) return undefined;

  const entries = Object.keys(nested).flatMap((name) => {
    const value = getString(nested, name);
    return value === undefined ? [] : [[name, value] as const];
  });
  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
}

/**
 * 去掉值为 undefined 的键，保证缺省字段不出现在结果里
 */
export function compact<T extends object>(value: T): T {
  const result = { ...value };
  for (const key of Object.keys(result)) {
    if (Reflect.get(result, key) === undefined) {
      Reflect.deleteProperty(result, key);
    }
  }
  return result;
}

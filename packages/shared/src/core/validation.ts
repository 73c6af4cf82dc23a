import { Vector2 } from './Vector2';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function isEnumValue<T extends string>(values: Record<string, T>, value: unknown): value is T {
  const allowed: readonly string[] = Object.values(values);
  return typeof value === 'string' && allowed.includes(value);
}

// ── 정적 데이터 로더용: 잘못된 값이면 시작 단계에서 바로 실패 ──────────────

export function requireNumber(record: Record<string, unknown>, key: string, context: string): number {
  const value = record[key];
  if (!isFiniteNumber(value)) {
    throw new Error(`${context}: "${key}" must be a finite number`);
  }
  return value;
}

export function requireString(record: Record<string, unknown>, key: string, context: string): string {
  const value = record[key];
  if (typeof value !== 'string') {
    throw new Error(`${context}: "${key}" must be a string`);
  }
  return value;
}

export function requireBoolean(record: Record<string, unknown>, key: string, context: string): boolean {
  const value = record[key];
  if (typeof value !== 'boolean') {
    throw new Error(`${context}: "${key}" must be a boolean`);
  }
  return value;
}

export function requireEnum<T extends string>(
  values: Record<string, T>,
  record: Record<string, unknown>,
  key: string,
  context: string,
): T {
  const value = record[key];
  if (!isEnumValue(values, value)) {
    throw new Error(`${context}: "${key}" has unknown value ${JSON.stringify(value)}`);
  }
  return value;
}

export function requireRecord(record: Record<string, unknown>, key: string, context: string): Record<string, unknown> {
  const value = record[key];
  if (!isRecord(value)) {
    throw new Error(`${context}: "${key}" must be an object`);
  }
  return value;
}

export function requireVector(record: Record<string, unknown>, key: string, context: string): Vector2 {
  const value = requireRecord(record, key, context);
  return {
    x: requireNumber(value, 'x', `${context}.${key}`),
    y: requireNumber(value, 'y', `${context}.${key}`),
  };
}

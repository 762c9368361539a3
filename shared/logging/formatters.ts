import type { Entity } from './types.ts';

export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

export interface Rotator {
  pitch: number;
  yaw: number;
  roll: number;
}

export const NULL_OBJECT_NAME = 'NULL';

export function renderBool(value: boolean): string {
  return value ? 'true' : 'false';
}

/**
 * Base-10 integer. Fractional numbers are truncated toward zero.
 */
export function renderInt(value: number | bigint): string {
  if (typeof value === 'bigint') return value.toString();
  if (!Number.isFinite(value)) return renderFloat(value);
  // BigInt keeps large magnitudes out of exponent form; -0 becomes 0n
  return BigInt(Math.trunc(value)).toString();
}

/**
 * Shortest round-trip decimal, always with a fractional digit: 2.5 -> "2.5",
 * 3 -> "3.0".
 */
export function renderFloat(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  if (value === Infinity) return 'inf';
  if (value === -Infinity) return '-inf';
  if (Object.is(value, -0)) return '-0.0';

  const text = String(value);
  return text.includes('.') || text.includes('e') ? text : `${text}.0`;
}

export function renderVector(value: Vector3): string {
  return `X=${renderFloat(value.x)} Y=${renderFloat(value.y)} Z=${renderFloat(value.z)}`;
}

export function renderRotator(value: Rotator): string {
  return `P=${renderFloat(value.pitch)} Y=${renderFloat(value.yaw)} R=${renderFloat(value.roll)}`;
}

export function renderObject(value: Entity | null | undefined): string {
  return value ? value.name : NULL_OBJECT_NAME;
}

export function appendValue(message: string, rendered: string): string {
  return `${message}: ${rendered}`;
}

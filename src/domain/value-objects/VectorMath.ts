import { InvalidArgumentError } from '../errors/DomainErrors.js';

/** 稠密向量：number[] 或 Float32Array 皆可 */
export type Vector = ArrayLike<number>;

export function dot(a: Vector, b: Vector): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function l2Norm(v: Vector): number {
  return Math.sqrt(dot(v, v));
}

/**
 * L2 正規化為單位向量
 * 零向量（或含 NaN/Infinity）無法正規化，直接丟 InvalidArgumentError
 */
export function normalize(v: Vector, argument: string = 'vector'): Float64Array {
  const norm = l2Norm(v);
  if (!Number.isFinite(norm) || norm === 0) {
    throw new InvalidArgumentError(argument, 'vector has zero or non-finite L2 norm');
  }
  const out = new Float64Array(v.length);
  for (let i = 0; i < v.length; i++) {
    out[i] = v[i] / norm;
  }
  return out;
}

export function cosineSimilarity(a: Vector, b: Vector): number {
  assertSameDimension(a, b, 'vector');
  return dot(normalize(a, 'a'), normalize(b, 'b'));
}

export function assertSameDimension(expected: Vector, actual: Vector, argument: string): void {
  if (expected.length !== actual.length) {
    throw new InvalidArgumentError(
      argument,
      `dimension ${actual.length} does not match expected ${expected.length}`,
    );
  }
}

/** [0,1] 區間的權重檢查（denseWeight、lambda 共用） */
export function assertUnitInterval(value: number, argument: string): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidArgumentError(argument, `must be within [0, 1], got ${value}`);
  }
}

export function assertNonNegativeInteger(value: number, argument: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError(argument, `must be a non-negative integer, got ${value}`);
  }
}

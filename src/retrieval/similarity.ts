import { DegenerateVectorError, DimensionMismatchError } from "../errors.js";

type Vector = readonly number[];

export function dot(a: Vector, b: Vector): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

function maxAbs(v: Vector): number {
  let m = 0;
  for (const x of v) {
    const ax = Math.abs(x);
    if (ax > m) m = ax;
  }
  return m;
}

/** Euclidean norm, computed on the vector scaled by its largest component. */
export function l2Norm(v: Vector): number {
  const scale = maxAbs(v);
  if (scale === 0) {
    return 0;
  }
  let sum = 0;
  for (const x of v) {
    const y = x / scale;
    sum += y * y;
  }
  return scale * Math.sqrt(sum);
}

export function clampUnit(x: number): number {
  return Math.min(1, Math.max(-1, x));
}

/**
 * Cosine similarity clamped to [-1, 1]. A zero-norm input throws
 * DegenerateVectorError.
 *
 * Both vectors are divided by their largest absolute component first, so
 * components near the edges of double range neither overflow nor underflow.
 */
export function cosineSimilarity(a: Vector, b: Vector): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }
  const sa = maxAbs(a);
  const sb = maxAbs(b);
  if (sa === 0 || sb === 0 || !Number.isFinite(sa) || !Number.isFinite(sb)) {
    throw new DegenerateVectorError();
  }
  let d = 0;
  let a2 = 0;
  let b2 = 0;
  for (let i = 0; i < a.length; i += 1) {
    const av = (a[i] ?? 0) / sa;
    const bv = (b[i] ?? 0) / sb;
    d += av * bv;
    a2 += av * av;
    b2 += bv * bv;
  }
  const score = d / (Math.sqrt(a2) * Math.sqrt(b2));
  if (!Number.isFinite(score)) {
    throw new DegenerateVectorError();
  }
  return clampUnit(score);
}

export type VectorStats = {
  mean: number;
  stdDev: number;
  min: number;
  max: number;
  l2Norm: number;
};

export function vectorStats(v: Vector): VectorStats {
  if (v.length === 0) {
    throw new DegenerateVectorError("Cannot compute statistics of an empty vector");
  }
  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const x of v) {
    sum += x;
    if (x < min) min = x;
    if (x > max) max = x;
  }
  const mean = sum / v.length;
  let variance = 0;
  for (const x of v) {
    variance += (x - mean) * (x - mean);
  }
  return {
    mean,
    stdDev: Math.sqrt(variance / v.length),
    min,
    max,
    l2Norm: l2Norm(v)
  };
}

export type SimilarityBand = {
  label: string;
  related: boolean;
};

export function interpretSimilarity(score: number): SimilarityBand {
  if (score > 0.9) return { label: "Very similar - nearly identical meaning", related: true };
  if (score > 0.7) return { label: "Similar - related concepts", related: true };
  if (score > 0.5) return { label: "Somewhat similar - some relation", related: true };
  if (score > 0.3) return { label: "Weakly similar - distant relation", related: false };
  return { label: "Different - unrelated concepts", related: false };
}

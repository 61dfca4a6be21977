import type { Vector } from "../types";

// Scaled by the largest difference; squaring raw differences overflows past ~1e154.
export function euclideanDistance(a: Vector, b: Vector): number {
  if (a.length !== b.length) throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  let scale = 0;
  for (let i = 0; i < a.length; i++) scale = Math.max(scale, Math.abs(a[i] - b[i]));
  if (scale === 0 || !Number.isFinite(scale)) return scale;
  let s = 0;
  for (let i = 0; i < a.length; i++) {
    const d = (a[i] - b[i]) / scale;
    s += d * d;
  }
  return scale * Math.sqrt(s);
}

export function l2Normalize(v: Vector): number[] {
  let s = 0;
  for (const x of v) s += x * x;
  const norm = Math.sqrt(s) || 1;
  return v.map((x) => x / norm);
}

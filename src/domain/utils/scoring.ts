import { ScoreCoercionError } from '../services/exceptions';
import type { DivergenceLevel, QualityLabel } from '../models/stageTypes';

export function round(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/** One additive term of a composite score: `count * weight`, never above `cap`. */
export function cappedTerm(count: number, weight: number, cap: number): number {
  return Math.min(count * weight, cap);
}

/** Points for the first threshold that `length` strictly exceeds; tiers are checked in order. */
export function lengthTier(length: number, tiers: ReadonlyArray<readonly [number, number]>): number {
  for (const [threshold, points] of tiers) {
    if (length > threshold) {
      return points;
    }
  }
  return 0;
}

export function compositeScore(terms: readonly number[]): number {
  const total = terms.reduce((sum, term) => sum + term, 0);
  return round(Math.min(Math.max(total, 0), 100));
}

const NUMERIC_TEXT = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/** Accepts numbers and numeric strings such as "7" or " -3 "; anything else is rejected. */
export function coerceNumber(value: unknown, field: string): number {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && NUMERIC_TEXT.test(value.trim())) {
    return Number(value.trim());
  }
  throw new ScoreCoercionError(field, value);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export interface QualityBand {
  label: Exclude<QualityLabel, 'low'>;
  when: boolean;
}

/** First band whose condition holds, else 'low'. Bands are listed best first. */
export function firstQualityBand(bands: readonly QualityBand[]): QualityLabel {
  return bands.find(band => band.when)?.label ?? 'low';
}

/** Jaccard distance between two sets of strings, as a percentage. Two empty sets do not diverge. */
export function jaccardDivergence(first: Iterable<string>, second: Iterable<string>): number {
  const a = new Set(first);
  const b = new Set(second);
  const union = new Set([...a, ...b]);
  if (union.size === 0) {
    return 0;
  }
  let intersection = 0;
  for (const item of a) {
    if (b.has(item)) intersection++;
  }
  return round((1 - intersection / union.size) * 100);
}

export function divergenceLevel(divergence: number): DivergenceLevel {
  if (divergence >= 70) return 'extreme';
  if (divergence >= 50) return 'high';
  if (divergence >= 30) return 'moderate';
  if (divergence >= 15) return 'low';
  return 'minimal';
}

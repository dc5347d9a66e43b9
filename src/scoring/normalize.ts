/**
 * Normalizer - min-max scaling of raw metrics onto [0,1]
 *
 * Scores are relative to the candidate set they are computed over; the same
 * vendor scored against a different set gets different pillar scores.
 */

import type { ExtractedVendor, NormalizationOptions, PillarScores } from './types';

export type Direction = 'higher_is_better' | 'lower_is_better';

export const WORST_SCORES: Readonly<PillarScores> = Object.freeze({
  totalCost: 0,
  totalTime: 0,
  reliability: 0,
  capacity: 0,
});

const RELATIVE_EPSILON = 1e-9;

function clamp01(v: number): number {
  return Math.max(0, Math.min(1, v));
}

/**
 * Scale values onto [0,1]. When every value is equal there is no signal to
 * discriminate on and every entry is tied-best (1.0).
 */
export function minMaxNormalize(values: readonly number[], direction: Direction): number[] {
  if (values.length === 0) return [];

  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }

  // A spread within rounding noise of the magnitudes is no spread
  const range = max - min;
  if (range <= RELATIVE_EPSILON * Math.max(1, Math.abs(max), Math.abs(min))) return values.map(() => 1);

  return values.map((v) => clamp01(direction === 'lower_is_better' ? (max - v) / range : (v - min) / range));
}

/**
 * Cap outliers at the given percentiles (index floor(p * n) of the sorted values).
 */
export function winsorize(values: readonly number[], lowerPercentile = 0.05, upperPercentile = 0.95): number[] {
  if (values.length === 0) return [];

  const sorted = [...values].sort((a, b) => a - b);
  const n = sorted.length;
  const lowerBound = sorted[Math.min(n - 1, Math.floor(lowerPercentile * n))];
  const upperBound = sorted[Math.min(n - 1, Math.floor(upperPercentile * n))];

  return values.map((v) => Math.max(lowerBound, Math.min(upperBound, v)));
}

/**
 * Pillar scores for every extracted vendor, in input order.
 *
 * Vendors without valid parts are left out of every min/max range and get
 * WORST_SCORES. Reliability is re-scaled by the same min-max rule as the
 * other pillars.
 */
export function normalizeMetrics(
  extracted: readonly ExtractedVendor[],
  options?: NormalizationOptions,
): PillarScores[] {
  const scorable: number[] = [];
  const costs: number[] = [];
  const times: number[] = [];
  const capacities: number[] = [];
  const reliabilities: number[] = [];

  extracted.forEach((entry, index) => {
    const { avgLandedCost, avgTotalTime } = entry.metrics;
    if (!entry.hasParts || avgLandedCost === null || avgTotalTime === null) return;
    scorable.push(index);
    costs.push(avgLandedCost);
    times.push(avgTotalTime);
    capacities.push(entry.metrics.totalCapacity);
    reliabilities.push(entry.metrics.reliability);
  });

  const prepare = (values: number[]): number[] =>
    options?.winsorize ? winsorize(values, options.lowerPercentile, options.upperPercentile) : values;

  const costScores = minMaxNormalize(prepare(costs), 'lower_is_better');
  const timeScores = minMaxNormalize(prepare(times), 'lower_is_better');
  const capacityScores = minMaxNormalize(prepare(capacities), 'higher_is_better');
  const reliabilityScores = minMaxNormalize(reliabilities, 'higher_is_better');

  const result: PillarScores[] = extracted.map(() => ({ ...WORST_SCORES }));
  scorable.forEach((vendorIndex, i) => {
    result[vendorIndex] = {
      totalCost: costScores[i],
      totalTime: timeScores[i],
      reliability: reliabilityScores[i],
      capacity: capacityScores[i],
    };
  });
  return result;
}

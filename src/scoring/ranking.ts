/**
 * Ranking - candidate filters and deterministic ordering
 */

import { SORT_KEYS } from './types';
import type { PartRecord, SortKey, Vendor, VendorEvaluation, VendorFilters } from './types';

export interface RankOptions {
  sortBy?: SortKey;
  limit?: number;
}

export function isSortKey(value: unknown): value is SortKey {
  return SORT_KEYS.some((key) => key === value);
}

/** Every key is higher-is-better: cost and time are already inverted into scores. */
export function sortValue(evaluation: VendorEvaluation, key: SortKey): number {
  switch (key) {
    case 'total_cost':
      return evaluation.pillarScores.totalCost;
    case 'total_time':
      return evaluation.pillarScores.totalTime;
    case 'reliability':
      return evaluation.pillarScores.reliability;
    case 'capacity':
      return evaluation.pillarScores.capacity;
    case 'final_score':
      return evaluation.finalScore;
  }
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function compareEvaluations(key: SortKey): (a: VendorEvaluation, b: VendorEvaluation) => number {
  return (a, b) => {
    const diff = sortValue(b, key) - sortValue(a, key);
    if (diff !== 0) return diff;
    return compareText(a.vendor.name, b.vendor.name) || compareText(a.vendor.id, b.vendor.id);
  };
}

/**
 * Sorted copy: primary key descending, then vendor name ascending, then id.
 */
export function rankVendors(evaluations: readonly VendorEvaluation[], options: RankOptions = {}): VendorEvaluation[] {
  const sorted = [...evaluations].sort(compareEvaluations(options.sortBy ?? 'final_score'));
  return options.limit !== undefined ? sorted.slice(0, Math.max(0, options.limit)) : sorted;
}

export function matchesFilters(vendor: Vendor, parts: readonly PartRecord[], filters: VendorFilters): boolean {
  if (filters.region && vendor.region.toLowerCase() !== filters.region.toLowerCase()) {
    return false;
  }
  if (filters.component) {
    const needle = filters.component.toLowerCase();
    if (!parts.some((p) => p.componentName.toLowerCase().includes(needle))) return false;
  }
  if (filters.mode) {
    const mode = filters.mode.toLowerCase();
    if (!parts.some((p) => p.shippingMode.toLowerCase() === mode)) return false;
  }
  return true;
}

/**
 * Select the candidate set before scoring, so normalization runs over the
 * vendors the caller actually asked about.
 */
export function filterCandidates(
  vendors: readonly Vendor[],
  partsByVendor: ReadonlyMap<string, readonly PartRecord[]>,
  filters: VendorFilters = {},
): Vendor[] {
  return vendors.filter((vendor) => matchesFilters(vendor, partsByVendor.get(vendor.id) ?? [], filters));
}

/** Clamp a requested limit into [1, maxLimit]; missing or invalid gives the default. */
export function resolveLimit(requested: number | undefined, defaultLimit: number, maxLimit: number): number {
  if (requested === undefined || !Number.isFinite(requested) || requested < 1) return Math.min(defaultLimit, maxLimit);
  return Math.min(Math.floor(requested), maxLimit);
}

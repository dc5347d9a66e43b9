/**
 * Weighted Scorer - final score = sum of weight * pillar score
 *
 * evaluateVendors() is a pure function of its inputs. Weights are passed in
 * as one frozen snapshot, so every vendor of a run is scored with the same
 * set even if the store publishes new weights meanwhile.
 */

import { extractMetrics } from './metrics';
import { normalizeMetrics } from './normalize';
import { DEFAULT_RISK_RULES, DEFAULT_RISK_THRESHOLDS, detectRisks, isStale } from './risk-rules';
import { rankVendors } from './ranking';
import { PILLARS } from './types';
import type {
  EvaluationRun,
  NormalizationOptions,
  PartRecord,
  PillarScores,
  RiskThresholds,
  ScoreSnapshot,
  Vendor,
  VendorEvaluation,
  Weights,
} from './types';
import type { RiskRule } from './risk-rules';

export function computeFinalScore(scores: PillarScores, weights: Weights): number {
  return PILLARS.reduce((sum, pillar) => sum + weights[pillar] * scores[pillar], 0);
}

/** How much each pillar adds to the final score. */
export function pillarContributions(scores: PillarScores, weights: Weights): PillarScores {
  return {
    totalCost: weights.totalCost * scores.totalCost,
    totalTime: weights.totalTime * scores.totalTime,
    reliability: weights.reliability * scores.reliability,
    capacity: weights.capacity * scores.capacity,
  };
}

export type PartsByVendor = ReadonlyMap<string, readonly PartRecord[]>;

export interface EvaluateOptions {
  weights: Weights;
  thresholds?: RiskThresholds;
  rules?: readonly RiskRule[];
  /** Latest snapshot per vendor id taken before evaluatedAt */
  previousSnapshots?: ReadonlyMap<string, ScoreSnapshot>;
  normalization?: NormalizationOptions;
  evaluatedAt?: Date;
}

/**
 * Score a candidate set. Output is ordered by final score (descending),
 * ties broken by vendor name.
 */
export function evaluateVendors(
  vendors: readonly Vendor[],
  partsByVendor: PartsByVendor,
  options: EvaluateOptions,
): EvaluationRun {
  const weights = options.weights;
  const thresholds = options.thresholds ?? DEFAULT_RISK_THRESHOLDS;
  const rules = options.rules ?? DEFAULT_RISK_RULES;
  const evaluatedAt = options.evaluatedAt ?? new Date();

  // Every vendor's metrics must exist before any min-max pass
  const extracted = vendors.map((vendor) => extractMetrics(vendor, partsByVendor.get(vendor.id) ?? []));
  const pillarScores = normalizeMetrics(extracted, options.normalization);

  const evaluations: VendorEvaluation[] = extracted.map((entry, index) => {
    const scores = pillarScores[index];
    const riskFlags = detectRisks(
      {
        vendor: entry.vendor,
        parts: entry.parts,
        metrics: entry.metrics,
        hasParts: entry.hasParts,
        previousSnapshot: options.previousSnapshots?.get(entry.vendor.id) ?? null,
        thresholds,
        evaluatedAt,
      },
      rules,
    );

    return {
      vendor: entry.vendor,
      parts: entry.parts,
      metrics: entry.metrics,
      hasParts: entry.hasParts,
      pillarScores: scores,
      finalScore: computeFinalScore(scores, weights),
      contributions: pillarContributions(scores, weights),
      riskFlags,
      isStale: isStale(entry.vendor.lastVerified, evaluatedAt, thresholds.stalenessDays),
      validationErrors: entry.validationErrors,
    };
  });

  return {
    evaluations: rankVendors(evaluations, { sortBy: 'final_score' }),
    weights,
    evaluatedAt,
  };
}

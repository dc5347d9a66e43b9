/**
 * Scoring Engine - binds the weights store and configuration to the pure
 * scoring functions.
 *
 * Each run reads the weights store exactly once, before any vendor is
 * scored, and reports the snapshot it used.
 */

import { createLogger } from '../utils/logger';
import { DEFAULT_RISK_RULES } from './risk-rules';
import { evaluateVendors } from './scorer';
import { filterCandidates, rankVendors, resolveLimit } from './ranking';
import { buildExecutiveSummary } from './summary';
import { createWeightsStore } from './weights';
import type { RiskRule } from './risk-rules';
import type { PartsByVendor } from './scorer';
import type { WeightsStore } from './weights';
import type {
  EvaluationRun,
  ExecutiveSummary,
  NormalizationOptions,
  RiskThresholds,
  ScoreSnapshot,
  SortKey,
  Vendor,
  VendorEvaluation,
  VendorFilters,
  Weights,
} from './types';

const logger = createLogger('scoring-engine');

export interface ScoringEngineConfig {
  weights: Weights;
  risk: RiskThresholds;
  normalization: NormalizationOptions;
  ranking: { defaultLimit: number; maxLimit: number };
}

export interface ScoringEngineOptions {
  config: ScoringEngineConfig;
  /** Share a store between engines; defaults to a new store seeded from config.weights */
  weightsStore?: WeightsStore;
  rules?: readonly RiskRule[];
}

export interface EvaluateRequest {
  previousSnapshots?: ReadonlyMap<string, ScoreSnapshot>;
  evaluatedAt?: Date;
}

export interface RankRequest extends EvaluateRequest {
  sortBy?: SortKey;
  filters?: VendorFilters;
  limit?: number;
}

export interface RankResult {
  run: EvaluationRun;
  ranked: VendorEvaluation[];
  summary: ExecutiveSummary;
  /** Candidates left after filtering, before the limit */
  total: number;
}

export interface ScoringEngine {
  readonly weights: WeightsStore;
  readonly rules: readonly RiskRule[];
  evaluate(vendors: readonly Vendor[], partsByVendor: PartsByVendor, request?: EvaluateRequest): EvaluationRun;
  rank(vendors: readonly Vendor[], partsByVendor: PartsByVendor, request?: RankRequest): RankResult;
}

export function createScoringEngine(options: ScoringEngineOptions): ScoringEngine {
  const { config } = options;
  const weightsStore = options.weightsStore ?? createWeightsStore(config.weights);
  const rules = options.rules ?? DEFAULT_RISK_RULES;

  function evaluate(vendors: readonly Vendor[], partsByVendor: PartsByVendor, request: EvaluateRequest = {}): EvaluationRun {
    const weights = weightsStore.get();
    const run = evaluateVendors(vendors, partsByVendor, {
      weights,
      thresholds: config.risk,
      rules,
      previousSnapshots: request.previousSnapshots,
      normalization: config.normalization,
      evaluatedAt: request.evaluatedAt,
    });

    const top = run.evaluations[0];
    if (top) {
      logger.info(
        { vendors: run.evaluations.length, weights, top: top.vendor.name, topScore: Number(top.finalScore.toFixed(3)) },
        'Scored vendors',
      );
    } else {
      logger.warn('No vendors to score');
    }
    return run;
  }

  return {
    weights: weightsStore,
    rules,
    evaluate,

    rank(vendors, partsByVendor, request = {}) {
      const candidates = filterCandidates(vendors, partsByVendor, request.filters);
      const run = evaluate(candidates, partsByVendor, request);
      const sorted = rankVendors(run.evaluations, { sortBy: request.sortBy ?? 'final_score' });
      const limit = resolveLimit(request.limit, config.ranking.defaultLimit, config.ranking.maxLimit);
      const ranked = sorted.slice(0, limit);
      return {
        run,
        ranked,
        summary: buildExecutiveSummary(ranked, run.evaluatedAt),
        total: sorted.length,
      };
    },
  };
}

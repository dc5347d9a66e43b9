/**
 * vendorscore - supplier comparison scoring and risk flagging
 *
 * Library entry point.
 */

export * from './scoring/types';
export { extractMetrics, isShippingMode, landedCost, toShippingMode, totalTimeDays, validatePart } from './scoring/metrics';
export { minMaxNormalize, normalizeMetrics, winsorize, WORST_SCORES } from './scoring/normalize';
export type { Direction } from './scoring/normalize';
export { computeFinalScore, evaluateVendors, pillarContributions } from './scoring/scorer';
export type { EvaluateOptions, PartsByVendor } from './scoring/scorer';
export { compareEvaluations, filterCandidates, isSortKey, matchesFilters, rankVendors, resolveLimit } from './scoring/ranking';
export type { RankOptions } from './scoring/ranking';
export { buildExecutiveSummary, buildRecommendation, countRiskFlags, STRONG_LEADER_GAP } from './scoring/summary';
export {
  createWeightsStore,
  DEFAULT_WEIGHTS,
  isUnitSum,
  normalizeWeights,
  parseWeights,
  weightSum,
} from './scoring/weights';
export type { PartialWeights, WeightsStore } from './scoring/weights';
export { DEFAULT_RISK_RULES, DEFAULT_RISK_THRESHOLDS, detectRisks, isStale } from './scoring/risk-rules';
export type { RiskContext, RiskRule } from './scoring/risk-rules';
export { buildSnapshot, loadPreviousSnapshots, saveSnapshots } from './scoring/snapshots';
export type { SnapshotReader, SnapshotWriter } from './scoring/snapshots';
export { createScoringEngine } from './scoring/engine';
export type { RankRequest, RankResult, ScoringEngine, ScoringEngineConfig } from './scoring/engine';
export { handleVendorScoringTool, importRecordsSchema, vendorScoringTools } from './scoring/index';
export type { ImportRecords, ToolContext, ToolResult, VendorScoringToolName } from './scoring/index';
export { createVendorStore, MEMORY_PATH } from './db/index';
export type { VendorStore, VendorStoreOptions } from './db/index';
export { DEFAULT_CONFIG, loadConfig, resolveConfig, saveWeights } from './utils/config';
export type { Config } from './utils/config';
export { NotFoundError, ValidationError } from './utils/errors';
export { createLogger, logger } from './utils/logger';

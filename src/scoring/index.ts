/**
 * Vendor Scoring Module - Tool Definitions & Handler
 *
 * Named operations over the vendor store and the scoring engine. Inputs are
 * snake_case JSON objects validated with zod; every call returns
 * { success, data } or { success: false, error } and never throws.
 */

import { z } from 'zod';
import type { VendorStore } from '../db/index';
import { NotFoundError, ValidationError, errorMessage, toValidationIssues } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { landedCost, toShippingMode, totalTimeDays } from './metrics';
import { loadPreviousSnapshots, saveSnapshots, toSnapshotDate } from './snapshots';
import { buildExecutiveSummary } from './summary';
import { isUnitSum, normalizeWeights, weightSum } from './weights';
import { SHIPPING_MODES, SORT_KEYS } from './types';
import type { ScoringEngine } from './engine';
import type { PartRecord, PillarScores, RiskFlag, Vendor, VendorEvaluation, Weights } from './types';

export type {
  Vendor,
  Part,
  PartRecord,
  PillarScores,
  RiskFlag,
  ScoreSnapshot,
  VendorEvaluation,
  EvaluationRun,
  ExecutiveSummary,
  Weights,
} from './types';

const logger = createLogger('vendor-scoring-tools');

export const VERSION = '0.1.0';

export interface ToolContext {
  store: VendorStore;
  engine: ScoringEngine;
  /** Clock used for evaluation and snapshot times */
  now?: () => Date;
}

export interface ToolResult {
  success: boolean;
  data?: unknown;
  error?: string;
}

// ---------------------------------------------------------------------------
// Input schemas
// ---------------------------------------------------------------------------

const weightValue = z.number().finite().nonnegative();

const snakeWeightsSchema = z
  .object({
    total_cost: weightValue,
    total_time: weightValue,
    reliability: weightValue,
    capacity: weightValue,
  })
  .partial()
  .strict();

/** Shipping mode matched case-insensitively, e.g. 'air' -> 'Air' */
const shippingModeInput = z.preprocess(
  (value) => (typeof value === 'string' ? toShippingMode(value) ?? value : value),
  z.enum(SHIPPING_MODES),
);

const rankInput = z.object({
  sort: z.enum(SORT_KEYS).optional(),
  component: z.string().optional(),
  region: z.string().optional(),
  mode: shippingModeInput.optional(),
  limit: z.number().int().positive().optional(),
});

const vendorDetailInput = z.object({
  vendor_id: z.string().min(1),
  history_limit: z.number().int().positive().max(120).optional(),
});

const updateWeightsInput = z.object({
  weights: snakeWeightsSchema,
  /** Replace the whole set instead of merging into the current one */
  replace: z.boolean().optional(),
  /** Rescale the published set to sum to 1 */
  normalize: z.boolean().optional(),
});

const dateString = z
  .string()
  .refine((s) => !Number.isNaN(Date.parse(s)), { message: 'Invalid date' })
  .transform((s) => new Date(s));

const vendorRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  region: z.string().default(''),
  reliability_score: z.number().finite(),
  contact_email: z.string().default(''),
  last_verified: dateString.nullable().optional(),
});

const partRecordSchema = z.object({
  id: z.string().min(1),
  vendor_id: z.string().min(1),
  component_name: z.string().min(1),
  odm_destination: z.string().default(''),
  odm_region: z.string().default(''),
  unit_price: z.number().finite(),
  freight_cost: z.number().finite().default(0),
  tariff_rate: z.number().finite().default(0),
  lead_time_weeks: z.number().finite(),
  transit_days: z.number().finite(),
  shipping_mode: shippingModeInput,
  monthly_capacity: z.number().finite(),
  last_verified: dateString.nullable().optional(),
  notes: z.string().default(''),
});

export const importRecordsSchema = z.object({
  vendors: z.array(vendorRecordSchema).default([]),
  parts: z.array(partRecordSchema).default([]),
});

export type ImportRecords = z.input<typeof importRecordsSchema>;

function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    throw new ValidationError('Invalid input', toValidationIssues(result.error.issues));
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Output formatting
// ---------------------------------------------------------------------------

function weightsToJson(weights: Weights) {
  return {
    total_cost: weights.totalCost,
    total_time: weights.totalTime,
    reliability: weights.reliability,
    capacity: weights.capacity,
  };
}

function pillarsToJson(scores: PillarScores) {
  return {
    total_cost: scores.totalCost,
    total_time: scores.totalTime,
    reliability: scores.reliability,
    capacity: scores.capacity,
  };
}

function flagToJson(flag: RiskFlag, detailed = false) {
  return detailed
    ? { type: flag.type, severity: flag.severity, description: flag.description, value: flag.value ?? null, threshold: flag.threshold ?? null }
    : { type: flag.type, severity: flag.severity, description: flag.description };
}

function dateToJson(date: Date | null): string | null {
  return date ? toSnapshotDate(date) : null;
}

function metricsToJson(evaluation: VendorEvaluation) {
  return {
    avg_landed_cost: evaluation.metrics.avgLandedCost,
    avg_total_time: evaluation.metrics.avgTotalTime,
    total_capacity: evaluation.metrics.totalCapacity,
    part_count: evaluation.metrics.partCount,
  };
}

function evaluationToJson(evaluation: VendorEvaluation) {
  return {
    id: evaluation.vendor.id,
    name: evaluation.vendor.name,
    region: evaluation.vendor.region,
    final_score: evaluation.finalScore,
    pillar_scores: pillarsToJson(evaluation.pillarScores),
    metrics: metricsToJson(evaluation),
    risk_flags: evaluation.riskFlags.map((f) => flagToJson(f)),
    staleness: evaluation.isStale,
    last_verified: dateToJson(evaluation.vendor.lastVerified),
    validation_errors: evaluation.validationErrors,
  };
}

function partToJson(part: PartRecord) {
  return {
    id: part.id,
    component_name: part.componentName,
    odm_destination: part.odmDestination,
    odm_region: part.odmRegion,
    unit_price: part.unitPrice,
    freight_cost: part.freightCost,
    tariff_rate: part.tariffRate,
    total_landed_cost: landedCost(part),
    lead_time_weeks: part.leadTimeWeeks,
    transit_days: part.transitDays,
    total_time_days: totalTimeDays(part),
    shipping_mode: part.shippingMode,
    monthly_capacity: part.monthlyCapacity,
    last_verified: dateToJson(part.lastVerified),
  };
}

// ---------------------------------------------------------------------------
// Data loading
// ---------------------------------------------------------------------------

function loadCandidates(ctx: ToolContext, at: Date) {
  const vendors = ctx.store.listVendors();
  const ids = vendors.map((v) => v.id);
  return {
    vendors,
    partsByVendor: ctx.store.getPartsByVendor(ids),
    previousSnapshots: loadPreviousSnapshots(ctx.store, ids, at),
  };
}

// ---------------------------------------------------------------------------
// Tool Definitions
// ---------------------------------------------------------------------------

export const vendorScoringTools = [
  {
    name: 'rank_vendors',
    description: 'Score vendors and return them ranked, with risk flags and an executive summary. Filters narrow the candidate set before scoring.',
    input_schema: {
      type: 'object' as const,
      properties: {
        sort: { type: 'string' as const, enum: [...SORT_KEYS], description: 'Sort key (default: final_score)' },
        component: { type: 'string' as const, description: 'Component name substring (case-insensitive)' },
        region: { type: 'string' as const, description: 'Vendor region code, exact match' },
        mode: { type: 'string' as const, enum: [...SHIPPING_MODES], description: 'Shipping mode offered by the vendor' },
        limit: { type: 'number' as const, description: 'Max vendors returned (default: 50, max: 100)' },
      },
    },
  },
  {
    name: 'vendor_detail',
    description: 'Scores, pillar contributions, parts, risk flags and snapshot history for one vendor, scored against the full vendor set',
    input_schema: {
      type: 'object' as const,
      properties: {
        vendor_id: { type: 'string' as const, description: 'Vendor ID' },
        history_limit: { type: 'number' as const, description: 'Snapshots returned, newest first (default: 12)' },
      },
      required: ['vendor_id'] as const,
    },
  },
  {
    name: 'get_weights',
    description: 'Current scoring weights',
    input_schema: { type: 'object' as const, properties: {} },
  },
  {
    name: 'update_weights',
    description: 'Publish new scoring weights. Weights are not renormalized unless normalize is true.',
    input_schema: {
      type: 'object' as const,
      properties: {
        weights: {
          type: 'object' as const,
          properties: {
            total_cost: { type: 'number' as const },
            total_time: { type: 'number' as const },
            reliability: { type: 'number' as const },
            capacity: { type: 'number' as const },
          },
        },
        replace: { type: 'boolean' as const, description: 'Replace the whole set (all four weights required)' },
        normalize: { type: 'boolean' as const, description: 'Rescale to sum to 1 before publishing' },
      },
      required: ['weights'] as const,
    },
  },
  {
    name: 'recompute_scores',
    description: 'Recompute every vendor score with the current weights',
    input_schema: { type: 'object' as const, properties: {} },
  },
  {
    name: 'save_snapshots',
    description: 'Score every vendor and append one score snapshot per scored vendor',
    input_schema: { type: 'object' as const, properties: {} },
  },
  {
    name: 'import_records',
    description: 'Insert or update vendor and part records',
    input_schema: {
      type: 'object' as const,
      properties: {
        vendors: { type: 'array' as const, items: { type: 'object' as const } },
        parts: { type: 'array' as const, items: { type: 'object' as const } },
      },
    },
  },
  {
    name: 'health',
    description: 'Store record counts and engine status',
    input_schema: { type: 'object' as const, properties: {} },
  },
] as const;

export type VendorScoringToolName = (typeof vendorScoringTools)[number]['name'];

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

function rankTool(ctx: ToolContext, input: unknown, now: Date): unknown {
  const params = parseInput(rankInput, input);
  const sortBy = params.sort ?? 'final_score';
  const { vendors, partsByVendor, previousSnapshots } = loadCandidates(ctx, now);
  const filters = { component: params.component, region: params.region, mode: params.mode };

  const result = ctx.engine.rank(vendors, partsByVendor, {
    sortBy,
    filters,
    limit: params.limit,
    previousSnapshots,
    evaluatedAt: now,
  });

  return {
    vendors: result.ranked.map(evaluationToJson),
    total: result.ranked.length,
    matched: result.total,
    executive_summary: result.summary,
    weights_used: weightsToJson(result.run.weights),
    filters_applied: {
      sort: sortBy,
      component: params.component ?? '',
      region: params.region ?? '',
      mode: params.mode ?? '',
    },
    generated_at: now.toISOString(),
  };
}

function vendorDetailTool(ctx: ToolContext, input: unknown, now: Date): unknown {
  const params = parseInput(vendorDetailInput, input);
  const vendor = ctx.store.getVendor(params.vendor_id);
  if (!vendor) throw new NotFoundError('Vendor', params.vendor_id);

  const { vendors, partsByVendor, previousSnapshots } = loadCandidates(ctx, now);
  const run = ctx.engine.evaluate(vendors, partsByVendor, { previousSnapshots, evaluatedAt: now });
  const evaluation = run.evaluations.find((e) => e.vendor.id === vendor.id);
  if (!evaluation) throw new NotFoundError('Vendor', params.vendor_id);

  const rank = run.evaluations.indexOf(evaluation) + 1;
  const history = ctx.store.listScoreSnapshots(vendor.id, params.history_limit ?? 12);

  return {
    vendor: {
      id: vendor.id,
      name: vendor.name,
      region: vendor.region,
      reliability_score: vendor.reliabilityScore,
      contact_email: vendor.contactEmail,
      last_verified: dateToJson(vendor.lastVerified),
      is_stale: evaluation.isStale,
    },
    current_score: {
      final_score: evaluation.finalScore,
      rank,
      out_of: run.evaluations.length,
      pillar_scores: pillarsToJson(evaluation.pillarScores),
      contributions: pillarsToJson(evaluation.contributions),
      weights_used: weightsToJson(run.weights),
      computed_at: run.evaluatedAt.toISOString(),
    },
    parts: (partsByVendor.get(vendor.id) ?? []).map(partToJson),
    risk_flags: evaluation.riskFlags.map((f) => flagToJson(f, true)),
    metrics: metricsToJson(evaluation),
    validation_errors: evaluation.validationErrors,
    history: history.map((s) => ({
      snapshot_date: s.snapshotDate,
      computed_at: s.computedAt.toISOString(),
      final_score: s.finalScore,
      pillar_scores: pillarsToJson(s.pillarScores),
    })),
  };
}

function describeWeights(weights: Weights) {
  const sum = weightSum(weights);
  return { weights: weightsToJson(weights), sum, unit_sum: isUnitSum(weights) };
}

function updateWeightsTool(ctx: ToolContext, input: unknown, now: Date): unknown {
  const params = parseInput(updateWeightsInput, input);
  const partial = {
    totalCost: params.weights.total_cost,
    totalTime: params.weights.total_time,
    reliability: params.weights.reliability,
    capacity: params.weights.capacity,
  };

  let published = params.replace ? ctx.engine.weights.set(partial) : ctx.engine.weights.update(partial);
  if (params.normalize) {
    published = ctx.engine.weights.set(normalizeWeights(published));
  }

  return {
    ...describeWeights(published),
    updated_at: now.toISOString(),
    message: 'Scoring weights updated successfully',
  };
}

function recomputeTool(ctx: ToolContext, now: Date): unknown {
  const { vendors, partsByVendor, previousSnapshots } = loadCandidates(ctx, now);
  const run = ctx.engine.evaluate(vendors, partsByVendor, { previousSnapshots, evaluatedAt: now });
  return {
    recomputed: run.evaluations.filter((e) => e.hasParts).length,
    vendors: run.evaluations.length,
    weights_used: weightsToJson(run.weights),
    executive_summary: buildExecutiveSummary(run.evaluations, now),
    computed_at: now.toISOString(),
  };
}

function saveSnapshotsTool(ctx: ToolContext, now: Date): unknown {
  const { vendors, partsByVendor, previousSnapshots } = loadCandidates(ctx, now);
  const run = ctx.engine.evaluate(vendors, partsByVendor, { previousSnapshots, evaluatedAt: now });
  const written = saveSnapshots(ctx.store, run);
  logger.info({ saved: written.length }, 'Score snapshots saved');
  return {
    saved: written.length,
    skipped: run.evaluations.length - written.length,
    snapshot_date: toSnapshotDate(now),
    weights_used: weightsToJson(run.weights),
    computed_at: now.toISOString(),
  };
}

function importTool(ctx: ToolContext, input: unknown): unknown {
  const records = parseInput(importRecordsSchema, input);

  const knownVendors = new Set(records.vendors.map((v) => v.id));
  const orphans = records.parts
    .map((p, index) => ({ p, index }))
    .filter(({ p }) => !knownVendors.has(p.vendor_id) && !ctx.store.getVendor(p.vendor_id));
  if (orphans.length > 0) {
    throw new ValidationError(
      'Parts reference unknown vendors',
      orphans.map(({ p, index }) => ({ path: `parts.${index}.vendor_id`, message: `Unknown vendor ${p.vendor_id}` })),
    );
  }

  for (const v of records.vendors) {
    const vendor: Vendor = {
      id: v.id,
      name: v.name,
      region: v.region,
      reliabilityScore: v.reliability_score,
      contactEmail: v.contact_email,
      lastVerified: v.last_verified ?? null,
    };
    ctx.store.upsertVendor(vendor);
  }
  for (const p of records.parts) {
    const part: PartRecord = {
      id: p.id,
      vendorId: p.vendor_id,
      componentName: p.component_name,
      odmDestination: p.odm_destination,
      odmRegion: p.odm_region,
      unitPrice: p.unit_price,
      freightCost: p.freight_cost,
      tariffRate: p.tariff_rate,
      leadTimeWeeks: p.lead_time_weeks,
      transitDays: p.transit_days,
      shippingMode: p.shipping_mode,
      monthlyCapacity: p.monthly_capacity,
      lastVerified: p.last_verified ?? null,
      notes: p.notes,
    };
    ctx.store.upsertPart(part);
  }

  logger.info({ vendors: records.vendors.length, parts: records.parts.length }, 'Records imported');
  return { vendors_imported: records.vendors.length, parts_imported: records.parts.length };
}

// ---------------------------------------------------------------------------
// Handler
// ---------------------------------------------------------------------------

function formatError(err: unknown): string {
  if (err instanceof ValidationError && err.issues.length > 0) {
    return `${err.message}: ${err.issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`;
  }
  return errorMessage(err);
}

export function handleVendorScoringTool(ctx: ToolContext, toolName: string, input: unknown = {}): ToolResult {
  const now = ctx.now?.() ?? new Date();

  try {
    switch (toolName) {
      case 'rank_vendors':
        return { success: true, data: rankTool(ctx, input, now) };
      case 'vendor_detail':
        return { success: true, data: vendorDetailTool(ctx, input, now) };
      case 'get_weights':
        return { success: true, data: { ...describeWeights(ctx.engine.weights.get()), updated_at: now.toISOString() } };
      case 'update_weights':
        return { success: true, data: updateWeightsTool(ctx, input, now) };
      case 'recompute_scores':
        return { success: true, data: recomputeTool(ctx, now) };
      case 'save_snapshots':
        return { success: true, data: saveSnapshotsTool(ctx, now) };
      case 'import_records':
        return { success: true, data: importTool(ctx, input) };
      case 'health':
        return {
          success: true,
          data: {
            status: 'healthy',
            version: VERSION,
            records: ctx.store.counts(),
            rules: ctx.engine.rules.map((r) => r.kind),
            timestamp: now.toISOString(),
          },
        };
      default:
        return { success: false, error: `Unknown vendor scoring tool: ${toolName}` };
    }
  } catch (err) {
    if (err instanceof ValidationError || err instanceof NotFoundError) {
      logger.warn({ tool: toolName, error: err.message }, 'Tool call rejected');
    } else {
      logger.error({ tool: toolName, err }, 'Tool call failed');
    }
    return { success: false, error: formatError(err) };
  }
}

/**
 * Risk Rules - independent predicates evaluated per vendor
 *
 * Each rule inspects one vendor's context and returns at most one flag.
 * Rules share no state and are applied in registry order; a new rule is
 * added by passing a longer list to detectRisks(), the scorer is untouched.
 *
 * Rule types:
 * - cost_spike: landed cost up more than costSpikePct since the previous snapshot
 * - delay_risk: transit over the mode threshold, or lead time over the ceiling
 * - capacity_shortfall: total monthly capacity under the floor
 * - stale_data: last verification older than the staleness window
 * - reliability_risk: vendor reliability under the minimum
 * - missing_parts: no valid part records to score
 */

import type {
  Part,
  RiskFlag,
  RiskThresholds,
  RiskType,
  ScoreSnapshot,
  Vendor,
  VendorMetrics,
} from './types';

export const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_RISK_THRESHOLDS: RiskThresholds = {
  costSpikePct: 0.1,
  transitDaysByMode: {
    Air: 9,
    Ocean: 50,
    Ground: 10,
  },
  maxLeadTimeWeeks: 16,
  capacityFloor: 10_000,
  stalenessDays: 30,
  minReliability: 0.7,
};

export interface RiskContext {
  vendor: Vendor;
  /** Valid parts only */
  parts: readonly Part[];
  metrics: VendorMetrics;
  hasParts: boolean;
  /** Latest stored snapshot taken before evaluatedAt, if any */
  previousSnapshot: ScoreSnapshot | null;
  thresholds: RiskThresholds;
  evaluatedAt: Date;
}

export interface RiskRule {
  kind: RiskType;
  description: string;
  evaluate(ctx: RiskContext): RiskFlag | null;
}

// =============================================================================
// HELPERS
// =============================================================================

/** Whole days elapsed between two instants (floored, never negative). */
export function daysBetween(from: Date, to: Date): number {
  return Math.max(0, Math.floor((to.getTime() - from.getTime()) / DAY_MS));
}

/** A record never verified is stale. */
export function isStale(lastVerified: Date | null, evaluatedAt: Date, stalenessDays: number): boolean {
  if (!lastVerified) return true;
  return daysBetween(lastVerified, evaluatedAt) > stalenessDays;
}

function formatPct(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}

function formatUnits(value: number): string {
  return value.toLocaleString('en-US');
}

// =============================================================================
// RULES
// =============================================================================

export const costSpikeRule: RiskRule = {
  kind: 'cost_spike',
  description: 'Average landed cost rose faster than the allowed month-over-month change',
  evaluate({ metrics, previousSnapshot, thresholds }) {
    const current = metrics.avgLandedCost;
    const previous = previousSnapshot?.inputs.avgLandedCost ?? null;
    if (current === null || previous === null || previous <= 0) return null;

    const change = (current - previous) / previous;
    if (change <= thresholds.costSpikePct) return null;

    return {
      type: 'cost_spike',
      severity: change > thresholds.costSpikePct * 2 ? 'high' : 'medium',
      description: `Cost increased ${formatPct(change)} since snapshot of ${previousSnapshot?.snapshotDate ?? 'unknown date'}`,
      value: change,
      threshold: thresholds.costSpikePct,
    };
  },
};

export const delayRiskRule: RiskRule = {
  kind: 'delay_risk',
  description: 'Transit time over the shipping-mode threshold or lead time over the ceiling',
  evaluate({ parts, thresholds }) {
    const lateTransit = parts.filter((p) => p.transitDays > thresholds.transitDaysByMode[p.shippingMode]);
    const longLead = parts.filter((p) => p.leadTimeWeeks > thresholds.maxLeadTimeWeeks);
    if (lateTransit.length === 0 && longLead.length === 0) return null;

    const details = [
      ...lateTransit.map(
        (p) => `${p.componentName} ${p.shippingMode} transit ${p.transitDays}d > ${thresholds.transitDaysByMode[p.shippingMode]}d`,
      ),
      ...longLead.map((p) => `${p.componentName} lead time ${p.leadTimeWeeks}w > ${thresholds.maxLeadTimeWeeks}w`),
    ];

    if (lateTransit.length > 0) {
      // Report the part furthest over its own threshold
      const worst = lateTransit.reduce((a, b) =>
        b.transitDays - thresholds.transitDaysByMode[b.shippingMode] >
        a.transitDays - thresholds.transitDaysByMode[a.shippingMode]
          ? b
          : a,
      );
      return {
        type: 'delay_risk',
        severity: lateTransit.some((p) => p.shippingMode === 'Air') ? 'high' : 'medium',
        description: `Delay risk: ${details.join('; ')}`,
        value: worst.transitDays,
        threshold: thresholds.transitDaysByMode[worst.shippingMode],
      };
    }

    const worstLead = Math.max(...longLead.map((p) => p.leadTimeWeeks));
    return {
      type: 'delay_risk',
      severity: 'medium',
      description: `Delay risk: ${details.join('; ')}`,
      value: worstLead,
      threshold: thresholds.maxLeadTimeWeeks,
    };
  },
};

export const capacityShortfallRule: RiskRule = {
  kind: 'capacity_shortfall',
  description: 'Total monthly capacity below the configured floor',
  evaluate({ hasParts, metrics, thresholds }) {
    if (!hasParts || metrics.totalCapacity >= thresholds.capacityFloor) return null;
    return {
      type: 'capacity_shortfall',
      severity: 'high',
      description: `Limited capacity: ${formatUnits(metrics.totalCapacity)} units/month (floor ${formatUnits(thresholds.capacityFloor)})`,
      value: metrics.totalCapacity,
      threshold: thresholds.capacityFloor,
    };
  },
};

export const staleDataRule: RiskRule = {
  kind: 'stale_data',
  description: 'Vendor record not verified within the staleness window',
  evaluate({ vendor, thresholds, evaluatedAt }) {
    if (!isStale(vendor.lastVerified, evaluatedAt, thresholds.stalenessDays)) return null;

    if (!vendor.lastVerified) {
      return {
        type: 'stale_data',
        severity: 'medium',
        description: 'Vendor data has never been verified',
        threshold: thresholds.stalenessDays,
      };
    }

    const days = daysBetween(vendor.lastVerified, evaluatedAt);
    return {
      type: 'stale_data',
      severity: days > thresholds.stalenessDays * 2 ? 'medium' : 'low',
      description: `Vendor data not verified for ${days} days`,
      value: days,
      threshold: thresholds.stalenessDays,
    };
  },
};

export const reliabilityRiskRule: RiskRule = {
  kind: 'reliability_risk',
  description: 'Vendor reliability below the configured minimum',
  evaluate({ metrics, thresholds }) {
    if (metrics.reliability >= thresholds.minReliability) return null;
    return {
      type: 'reliability_risk',
      severity: metrics.reliability < 0.5 ? 'high' : 'medium',
      description: `Low reliability score: ${formatPct(metrics.reliability)}`,
      value: metrics.reliability,
      threshold: thresholds.minReliability,
    };
  },
};

export const missingPartsRule: RiskRule = {
  kind: 'missing_parts',
  description: 'Vendor has no valid part records and is ranked with the worst scores',
  evaluate({ hasParts }) {
    if (hasParts) return null;
    return {
      type: 'missing_parts',
      severity: 'medium',
      description: 'No valid part records; vendor ranked with the lowest possible score',
      value: 0,
    };
  },
};

export const DEFAULT_RISK_RULES: readonly RiskRule[] = Object.freeze([
  costSpikeRule,
  delayRiskRule,
  capacityShortfallRule,
  staleDataRule,
  reliabilityRiskRule,
  missingPartsRule,
]);

/**
 * Run every rule against one vendor. Always a fresh array; nothing is cached.
 */
export function detectRisks(ctx: RiskContext, rules: readonly RiskRule[] = DEFAULT_RISK_RULES): RiskFlag[] {
  const flags: RiskFlag[] = [];
  for (const rule of rules) {
    const flag = rule.evaluate(ctx);
    if (flag) flags.push(flag);
  }
  return flags;
}

/**
 * Executive summary and sourcing recommendation for a scored vendor set
 */

import { rankVendors } from './ranking';
import type { ExecutiveSummary, VendorEvaluation } from './types';

/** Score gap between the top two vendors that makes the leader "strong". */
export const STRONG_LEADER_GAP = 0.15;

function pct(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

function money(value: number): string {
  return `$${value.toFixed(2)}`;
}

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** "2 stale_data, 1 capacity_shortfall" - most frequent first, then by type. */
export function countRiskFlags(evaluations: readonly VendorEvaluation[]): Array<{ type: string; count: number }> {
  const counts = new Map<string, number>();
  for (const evaluation of evaluations) {
    for (const flag of evaluation.riskFlags) {
      counts.set(flag.type, (counts.get(flag.type) ?? 0) + 1);
    }
  }
  return [...counts.entries()]
    .map(([type, count]) => ({ type, count }))
    .sort((a, b) => b.count - a.count || (a.type < b.type ? -1 : a.type > b.type ? 1 : 0));
}

export function buildRecommendation(evaluations: readonly VendorEvaluation[]): string {
  const ranked = rankVendors(evaluations, { sortBy: 'final_score' });
  if (ranked.length === 0) return 'Insufficient data for recommendations.';

  const top = ranked[0];
  if (ranked.length === 1) {
    return `**Single Option**: Proceed with ${top.vendor.name} while developing alternative suppliers.`;
  }

  const runnerUp = ranked[1];
  if (top.finalScore - runnerUp.finalScore > STRONG_LEADER_GAP) {
    return `**Strong Leader**: Prioritize ${top.vendor.name} for primary sourcing given significant performance advantage.`;
  }
  return `**Competitive Landscape**: Consider diversified sourcing between ${top.vendor.name} and ${runnerUp.vendor.name} to balance performance and risk.`;
}

export function buildExecutiveSummary(
  evaluations: readonly VendorEvaluation[],
  generatedAt: Date = new Date(),
): ExecutiveSummary {
  if (evaluations.length === 0) {
    return {
      summary: 'No vendor data available for analysis.',
      recommendation: buildRecommendation(evaluations),
      generatedAt: generatedAt.toISOString(),
    };
  }

  const ranked = rankVendors(evaluations, { sortBy: 'final_score' });
  const total = ranked.length;
  const top = ranked[0];
  const insights: string[] = [];

  insights.push(`**Top Performer**: ${top.vendor.name} leads with ${pct(top.finalScore)} score`);

  const highRisk = ranked.filter((e) => e.riskFlags.some((f) => f.severity === 'high')).length;
  if (highRisk > 0) {
    insights.push(`**Risk Alert**: ${highRisk}/${total} vendors flagged with high-risk issues`);
  }

  const costed = ranked.flatMap((e) => (e.metrics.avgLandedCost === null ? [] : [e.metrics.avgLandedCost]));
  if (costed.length > 0) {
    const avgCost = mean(costed);
    const avgLeaders = mean(costed.slice(0, 3));
    if (avgLeaders < avgCost * 0.9) {
      insights.push(`**Cost Efficiency**: Top performers average 10%+ lower costs (${money(avgLeaders)} vs ${money(avgCost)})`);
    }
  }

  const capacity = ranked.reduce((sum, e) => sum + e.metrics.totalCapacity, 0);
  insights.push(`**Supply Capacity**: ${capacity.toLocaleString('en-US')} total units/month across all vendors`);

  const stale = ranked.filter((e) => e.isStale).length;
  if (stale > 0) {
    insights.push(`**Data Quality**: ${stale}/${total} vendors need data refresh`);
  }

  const flagCounts = countRiskFlags(ranked);
  if (flagCounts.length > 0) {
    insights.push(`**Risk Flags**: ${flagCounts.map((c) => `${c.count} ${c.type}`).join(', ')}`);
  }

  return {
    summary: insights.join(' • '),
    recommendation: buildRecommendation(ranked),
    generatedAt: generatedAt.toISOString(),
  };
}

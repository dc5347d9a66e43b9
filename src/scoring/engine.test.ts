import { describe, it, expect } from 'vitest';
import { createScoringEngine } from './engine';
import type { ScoringEngineConfig } from './engine';
import { DEFAULT_RISK_THRESHOLDS } from './risk-rules';
import { DEFAULT_WEIGHTS, createWeightsStore } from './weights';
import type { Part, Vendor } from './types';

const EVALUATED_AT = new Date('2026-03-01T00:00:00Z');

const config: ScoringEngineConfig = {
  weights: DEFAULT_WEIGHTS,
  risk: DEFAULT_RISK_THRESHOLDS,
  normalization: { winsorize: false, lowerPercentile: 0.05, upperPercentile: 0.95 },
  ranking: { defaultLimit: 2, maxLimit: 3 },
};

function makeVendor(id: string, name: string, region = 'US'): Vendor {
  return { id, name, region, reliabilityScore: 0.9, contactEmail: '', lastVerified: new Date('2026-02-25T00:00:00Z') };
}

function makePart(vendorId: string, unitPrice: number, componentName = 'Solar Panel'): Part {
  return {
    id: `${vendorId}-${componentName}`,
    vendorId,
    componentName,
    odmDestination: '',
    odmRegion: '',
    unitPrice,
    freightCost: 0,
    tariffRate: 0,
    leadTimeWeeks: 2,
    transitDays: 4,
    shippingMode: 'Ground',
    monthlyCapacity: 12000,
    lastVerified: null,
    notes: '',
  };
}

const vendors = [makeVendor('a', 'Alpha'), makeVendor('b', 'Beta', 'MX'), makeVendor('c', 'Gamma'), makeVendor('d', 'Delta')];
const parts = new Map([
  ['a', [makePart('a', 10)]],
  ['b', [makePart('b', 20, 'Inverter')]],
  ['c', [makePart('c', 15)]],
  ['d', [makePart('d', 30)]],
]);

describe('createScoringEngine', () => {
  it('scores with the weights published in its store', () => {
    const engine = createScoringEngine({ config });
    engine.weights.set({ totalCost: 1, totalTime: 0, reliability: 0, capacity: 0 });

    const run = engine.evaluate(vendors, parts, { evaluatedAt: EVALUATED_AT });

    // cost range 10..30: a 1, c 0.75, b 0.5, d 0
    expect(run.weights).toEqual({ totalCost: 1, totalTime: 0, reliability: 0, capacity: 0 });
    expect(run.evaluations.map((e) => [e.vendor.id, e.finalScore])).toEqual([
      ['a', 1],
      ['c', 0.75],
      ['b', 0.5],
      ['d', 0],
    ]);
  });

  it('keeps a completed run on the weights it started with', () => {
    const engine = createScoringEngine({ config });
    const run = engine.evaluate(vendors, parts, { evaluatedAt: EVALUATED_AT });
    engine.weights.update({ capacity: 0.9 });

    expect(run.weights).toEqual(DEFAULT_WEIGHTS);
    expect(engine.weights.get().capacity).toBe(0.9);
  });

  it('shares a weights store passed in', () => {
    const store = createWeightsStore();
    const first = createScoringEngine({ config, weightsStore: store });
    const second = createScoringEngine({ config, weightsStore: store });

    first.weights.update({ reliability: 0.5 });
    expect(second.weights.get().reliability).toBe(0.5);
  });

  it('ranks with the configured default limit and reports the full count', () => {
    const engine = createScoringEngine({ config });
    const result = engine.rank(vendors, parts, { evaluatedAt: EVALUATED_AT });

    expect(result.ranked.map((e) => e.vendor.id)).toEqual(['a', 'c']);
    expect(result.total).toBe(4);
    expect(result.summary.recommendation).toBe(
      '**Competitive Landscape**: Consider diversified sourcing between Alpha and Gamma to balance performance and risk.',
    );
  });

  it('caps the limit at the configured maximum', () => {
    const engine = createScoringEngine({ config });
    expect(engine.rank(vendors, parts, { evaluatedAt: EVALUATED_AT, limit: 50 }).ranked).toHaveLength(3);
  });

  it('normalizes over the filtered candidates only', () => {
    const engine = createScoringEngine({ config });
    const result = engine.rank(vendors, parts, { evaluatedAt: EVALUATED_AT, filters: { region: 'mx' } });

    // Beta alone is best on every pillar
    expect(result.ranked.map((e) => e.vendor.id)).toEqual(['b']);
    expect(result.ranked[0].pillarScores).toEqual({ totalCost: 1, totalTime: 1, reliability: 1, capacity: 1 });
    expect(result.summary.recommendation).toBe(
      '**Single Option**: Proceed with Beta while developing alternative suppliers.',
    );
  });

  it('sorts by a pillar when asked', () => {
    const engine = createScoringEngine({ config });
    engine.weights.set({ totalCost: 0, totalTime: 0, reliability: 0, capacity: 1 });

    // Capacity ties, so every final score is 1 and names decide
    const byFinal = engine.rank(vendors, parts, { evaluatedAt: EVALUATED_AT, limit: 3 });
    const byCost = engine.rank(vendors, parts, { evaluatedAt: EVALUATED_AT, limit: 3, sortBy: 'total_cost' });

    expect(byFinal.ranked.map((e) => e.vendor.name)).toEqual(['Alpha', 'Beta', 'Delta']);
    expect(byCost.ranked.map((e) => e.vendor.name)).toEqual(['Alpha', 'Gamma', 'Beta']);
  });

  it('exposes the registered rules', () => {
    const engine = createScoringEngine({ config, rules: [] });
    expect(engine.rules).toEqual([]);

    const run = engine.evaluate([makeVendor('x', 'Empty')], new Map<string, Part[]>(), { evaluatedAt: EVALUATED_AT });
    expect(run.evaluations[0].riskFlags).toEqual([]);
  });
});

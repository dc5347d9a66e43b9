import { describe, it, expect } from 'vitest';
import { extractMetrics, landedCost, toShippingMode, totalTimeDays, validatePart } from './metrics';
import type { Part, Vendor } from './types';

function makeVendor(overrides: Partial<Vendor> = {}): Vendor {
  return {
    id: 'v1',
    name: 'Acme Cells',
    region: 'KR',
    reliabilityScore: 0.9,
    contactEmail: 'sales@example.com',
    lastVerified: new Date('2026-02-20T00:00:00Z'),
    ...overrides,
  };
}

function makePart(overrides: Partial<Part> = {}): Part {
  return {
    id: 'p1',
    vendorId: 'v1',
    componentName: 'Battery Cell',
    odmDestination: 'Fremont',
    odmRegion: 'US',
    unitPrice: 10,
    freightCost: 0,
    tariffRate: 0,
    leadTimeWeeks: 4,
    transitDays: 5,
    shippingMode: 'Ground',
    monthlyCapacity: 20000,
    lastVerified: null,
    notes: '',
    ...overrides,
  };
}

// =============================================================================
// landedCost / totalTimeDays
// =============================================================================

describe('landedCost', () => {
  it('adds freight and tariff to the unit price', () => {
    // 100 + 5 + 100 * 0.065 = 111.5
    expect(landedCost(makePart({ unitPrice: 100, freightCost: 5, tariffRate: 0.065 }))).toBeCloseTo(111.5, 9);
  });

  it('equals the unit price with no freight or tariff', () => {
    expect(landedCost(makePart({ unitPrice: 42 }))).toBe(42);
  });
});

describe('totalTimeDays', () => {
  it('converts lead time weeks to days and adds transit', () => {
    // 4 * 7 + 5
    expect(totalTimeDays(makePart({ leadTimeWeeks: 4, transitDays: 5 }))).toBe(33);
  });
});

// =============================================================================
// validatePart
// =============================================================================

describe('validatePart', () => {
  it('accepts a well-formed part', () => {
    expect(validatePart(makePart(), 'v1')).toEqual([]);
  });

  it('reports negative numeric fields', () => {
    expect(validatePart(makePart({ id: 'p2', unitPrice: -1 }), 'v1')).toEqual([
      'Part p2 (Battery Cell): unitPrice must be a non-negative number (got -1)',
    ]);
  });

  it('reports non-finite numeric fields', () => {
    expect(validatePart(makePart({ monthlyCapacity: Number.NaN }), 'v1')).toEqual([
      'Part p1 (Battery Cell): monthlyCapacity must be a non-negative number (got NaN)',
    ]);
  });

  it('reports a part filed under another vendor', () => {
    expect(validatePart(makePart({ vendorId: 'v9', componentName: '' }), 'v1')).toEqual([
      'Part p1 (unnamed): belongs to vendor v9',
    ]);
  });

  it('reports a stored shipping mode it does not know', () => {
    expect(validatePart({ ...makePart(), shippingMode: 'Rail' }, 'v1')).toEqual([
      'Part p1 (Battery Cell): unknown shipping mode "Rail"',
    ]);
  });
});

describe('toShippingMode', () => {
  it('maps any casing to the canonical mode', () => {
    expect(toShippingMode('air')).toBe('Air');
    expect(toShippingMode(' OCEAN ')).toBe('Ocean');
    expect(toShippingMode('Rail')).toBeUndefined();
  });
});

// =============================================================================
// extractMetrics
// =============================================================================

describe('extractMetrics', () => {
  it('averages cost and time and sums capacity over parts', () => {
    const result = extractMetrics(makeVendor(), [
      makePart({ id: 'p1', unitPrice: 10, leadTimeWeeks: 4, transitDays: 5, monthlyCapacity: 20000 }),
      makePart({ id: 'p2', unitPrice: 20, leadTimeWeeks: 2, transitDays: 3, monthlyCapacity: 5000 }),
    ]);

    // cost (10 + 20) / 2, time (33 + 17) / 2
    expect(result.hasParts).toBe(true);
    expect(result.metrics).toEqual({
      avgLandedCost: 15,
      avgTotalTime: 25,
      totalCapacity: 25000,
      reliability: 0.9,
      partCount: 2,
    });
    expect(result.validationErrors).toEqual([]);
  });

  it('drops invalid parts and reports them', () => {
    const result = extractMetrics(makeVendor(), [
      makePart({ id: 'p1', unitPrice: 10 }),
      makePart({ id: 'p2', unitPrice: -5 }),
    ]);

    expect(result.parts.map((p) => p.id)).toEqual(['p1']);
    expect(result.metrics.avgLandedCost).toBe(10);
    expect(result.metrics.partCount).toBe(1);
    expect(result.validationErrors).toEqual([
      'Part p2 (Battery Cell): unitPrice must be a non-negative number (got -5)',
    ]);
  });

  it('gives sentinel metrics to a vendor without parts', () => {
    const result = extractMetrics(makeVendor(), []);

    expect(result.hasParts).toBe(false);
    expect(result.metrics).toEqual({
      avgLandedCost: null,
      avgTotalTime: null,
      totalCapacity: 0,
      reliability: 0.9,
      partCount: 0,
    });
  });

  it('treats a vendor whose parts are all invalid as having no parts', () => {
    const result = extractMetrics(makeVendor(), [makePart({ leadTimeWeeks: -1 })]);
    expect(result.hasParts).toBe(false);
    expect(result.validationErrors).toHaveLength(1);
  });

  it('clamps reliability outside [0,1] and reports it', () => {
    const result = extractMetrics(makeVendor({ reliabilityScore: 1.2 }), [makePart()]);

    expect(result.metrics.reliability).toBe(1);
    expect(result.validationErrors).toEqual(['Vendor v1: reliabilityScore 1.2 outside [0,1]; clamped to 1']);
  });

  it('treats a non-numeric reliability as 0', () => {
    const result = extractMetrics(makeVendor({ reliabilityScore: Number.NaN }), [makePart()]);

    expect(result.metrics.reliability).toBe(0);
    expect(result.validationErrors).toEqual(['Vendor v1: reliabilityScore is not a number; treated as 0']);
  });
});

import { describe, it, expect } from 'vitest';
import { evaluateVendors } from './scorer';
import { buildSnapshot, loadPreviousSnapshots, saveSnapshots, toSnapshotDate } from './snapshots';
import type { SnapshotReader, SnapshotWriter } from './snapshots';
import { DEFAULT_WEIGHTS } from './weights';
import type { Part, ScoreSnapshot, Vendor } from './types';

const EVALUATED_AT = new Date('2026-03-01T09:30:00Z');

function makeVendor(id: string): Vendor {
  return { id, name: `Vendor ${id}`, region: 'US', reliabilityScore: 0.8, contactEmail: '', lastVerified: EVALUATED_AT };
}

function makePart(vendorId: string, unitPrice: number): Part {
  return {
    id: `${vendorId}-p1`,
    vendorId,
    componentName: 'Charger',
    odmDestination: '',
    odmRegion: '',
    unitPrice,
    freightCost: 1,
    tariffRate: 0,
    leadTimeWeeks: 3,
    transitDays: 4,
    shippingMode: 'Ground',
    monthlyCapacity: 15000,
    lastVerified: null,
    notes: '',
  };
}

function memoryHistory(): SnapshotWriter & SnapshotReader & { rows: ScoreSnapshot[] } {
  const rows: ScoreSnapshot[] = [];
  return {
    rows,
    addScoreSnapshot(snapshot) {
      rows.push(snapshot);
    },
    getLatestSnapshotBefore(vendorId, before) {
      return rows
        .filter((s) => s.vendorId === vendorId && s.computedAt.getTime() < before.getTime())
        .sort((a, b) => b.computedAt.getTime() - a.computedAt.getTime())[0];
    },
  };
}

function runFor(vendors: Vendor[], parts: Map<string, Part[]>, at = EVALUATED_AT) {
  return evaluateVendors(vendors, parts, { weights: DEFAULT_WEIGHTS, evaluatedAt: at });
}

describe('toSnapshotDate', () => {
  it('formats the UTC calendar date', () => {
    expect(toSnapshotDate(EVALUATED_AT)).toBe('2026-03-01');
  });
});

describe('buildSnapshot', () => {
  it('records scores, weights and raw inputs', () => {
    const run = runFor([makeVendor('a')], new Map([['a', [makePart('a', 9)]]]));
    const snapshot = buildSnapshot(run.evaluations[0], run.weights, run.evaluatedAt);

    expect(snapshot.vendorId).toBe('a');
    expect(snapshot.vendorName).toBe('Vendor a');
    expect(snapshot.finalScore).toBe(run.evaluations[0].finalScore);
    expect(snapshot.weights).toEqual(DEFAULT_WEIGHTS);
    expect(snapshot.inputs).toEqual({
      avgLandedCost: 10,
      avgTotalTime: 25,
      totalCapacity: 15000,
      reliability: 0.8,
      partCount: 1,
    });
    expect(snapshot.snapshotDate).toBe('2026-03-01');
    expect(snapshot.id).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe('saveSnapshots', () => {
  it('writes one snapshot per scored vendor per call', () => {
    const history = memoryHistory();
    const vendors = [makeVendor('a'), makeVendor('b'), makeVendor('empty')];
    const parts = new Map([
      ['a', [makePart('a', 9)]],
      ['b', [makePart('b', 14)]],
    ]);

    const written = saveSnapshots(history, runFor(vendors, parts));
    saveSnapshots(history, runFor(vendors, parts));

    expect(written.map((s) => s.vendorId).sort()).toEqual(['a', 'b']);
    expect(history.rows).toHaveLength(4);
  });
});

describe('loadPreviousSnapshots', () => {
  it('returns the latest snapshot strictly before the given time', () => {
    const history = memoryHistory();
    const parts = new Map([['a', [makePart('a', 9)]]]);
    saveSnapshots(history, runFor([makeVendor('a')], parts, new Date('2026-01-01T00:00:00Z')));
    saveSnapshots(history, runFor([makeVendor('a')], parts, new Date('2026-02-01T00:00:00Z')));
    saveSnapshots(history, runFor([makeVendor('a')], parts, EVALUATED_AT));

    const previous = loadPreviousSnapshots(history, ['a', 'b'], EVALUATED_AT);

    expect(previous.get('a')?.snapshotDate).toBe('2026-02-01');
    expect(previous.has('b')).toBe(false);
  });

  it('feeds the cost spike rule on the next run', () => {
    const history = memoryHistory();
    saveSnapshots(history, runFor([makeVendor('a')], new Map([['a', [makePart('a', 9)]]]), new Date('2026-02-01T00:00:00Z')));

    // landed cost 10 -> 13 is a 30% increase
    const previousSnapshots = loadPreviousSnapshots(history, ['a'], EVALUATED_AT);
    const run = evaluateVendors([makeVendor('a')], new Map([['a', [makePart('a', 12)]]]), {
      weights: DEFAULT_WEIGHTS,
      evaluatedAt: EVALUATED_AT,
      previousSnapshots,
    });

    const flag = run.evaluations[0].riskFlags.find((f) => f.type === 'cost_spike');
    expect(flag?.severity).toBe('high');
    expect(flag?.description).toBe('Cost increased 30.0% since snapshot of 2026-02-01');
  });
});

import { describe, it, expect } from 'vitest';
import { ValidationError } from '../utils/errors';
import { DEFAULT_WEIGHTS, createWeightsStore, isUnitSum, normalizeWeights, parseWeights, weightSum } from './weights';

describe('parseWeights', () => {
  it('returns a frozen copy of valid weights', () => {
    const input = { totalCost: 0.5, totalTime: 0.2, reliability: 0.2, capacity: 0.1 };
    const weights = parseWeights(input);

    expect(weights).toEqual(input);
    expect(weights).not.toBe(input);
    expect(Object.isFrozen(weights)).toBe(true);
  });

  it('rejects negative weights', () => {
    expect(() => parseWeights({ totalCost: -0.1, totalTime: 0.5, reliability: 0.3, capacity: 0.3 })).toThrow(ValidationError);
  });

  it('rejects missing and unknown pillars', () => {
    expect(() => parseWeights({ totalCost: 1 })).toThrow(ValidationError);
    expect(() => parseWeights({ ...DEFAULT_WEIGHTS, price: 0.1 })).toThrow(ValidationError);
  });

  it('reports the offending path', () => {
    try {
      parseWeights({ ...DEFAULT_WEIGHTS, capacity: 'high' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.issues.map((i) => i.path)).toEqual(['capacity']);
      }
    }
  });
});

describe('weight helpers', () => {
  it('sums the default weights to 1', () => {
    expect(weightSum(DEFAULT_WEIGHTS)).toBeCloseTo(1, 10);
    expect(isUnitSum(DEFAULT_WEIGHTS)).toBe(true);
  });

  it('rescales to a unit sum only when asked', () => {
    const weights = { totalCost: 2, totalTime: 1, reliability: 1, capacity: 0 };
    expect(isUnitSum(weights)).toBe(false);
    expect(normalizeWeights(weights)).toEqual({ totalCost: 0.5, totalTime: 0.25, reliability: 0.25, capacity: 0 });
  });

  it('leaves an all-zero set unchanged', () => {
    const zero = { totalCost: 0, totalTime: 0, reliability: 0, capacity: 0 };
    expect(normalizeWeights(zero)).toEqual(zero);
  });
});

// =============================================================================
// WeightsStore
// =============================================================================

describe('createWeightsStore', () => {
  it('starts with the defaults', () => {
    expect(createWeightsStore().get()).toEqual(DEFAULT_WEIGHTS);
  });

  it('merges a partial update into a new frozen object', () => {
    const store = createWeightsStore();
    const before = store.get();
    const after = store.update({ capacity: 0.3 });

    expect(after).toEqual({ totalCost: 0.4, totalTime: 0.3, reliability: 0.2, capacity: 0.3 });
    expect(Object.isFrozen(after)).toBe(true);
    expect(store.get()).toBe(after);
    // Readers holding the old snapshot keep it
    expect(before).toEqual(DEFAULT_WEIGHTS);
  });

  it('accepts weights that do not sum to 1 without renormalizing', () => {
    const store = createWeightsStore();
    const published = store.set({ totalCost: 1, totalTime: 1, reliability: 0, capacity: 0 });
    expect(weightSum(published)).toBe(2);
  });

  it('rejects invalid input without publishing', () => {
    const store = createWeightsStore();
    const before = store.get();

    expect(() => store.update({ totalTime: Number.NaN })).toThrow(ValidationError);
    expect(() => store.set({ totalCost: 1 })).toThrow(ValidationError);
    expect(store.get()).toBe(before);
  });

  it('resets to its initial weights', () => {
    const initial = { totalCost: 0.25, totalTime: 0.25, reliability: 0.25, capacity: 0.25 };
    const store = createWeightsStore(initial);
    store.update({ totalCost: 0.9 });

    expect(store.reset()).toEqual(initial);
  });
});

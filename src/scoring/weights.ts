/**
 * Scoring weights - validation, helpers and the copy-on-write store
 *
 * Weights are never renormalized implicitly. A set that does not sum to 1.0
 * is accepted and produces a final score outside [0,1]; callers that want a
 * unit sum use normalizeWeights() explicitly.
 */

import { z } from 'zod';
import { ValidationError, toValidationIssues } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { PILLARS } from './types';
import type { Pillar, Weights } from './types';

const logger = createLogger('weights');

export const DEFAULT_WEIGHTS: Weights = Object.freeze({
  totalCost: 0.4,
  totalTime: 0.3,
  reliability: 0.2,
  capacity: 0.1,
});

const weightValue = z.number().finite().nonnegative();

export const weightsSchema = z
  .object({
    totalCost: weightValue,
    totalTime: weightValue,
    reliability: weightValue,
    capacity: weightValue,
  })
  .strict();

export const partialWeightsSchema = weightsSchema.partial();

export type PartialWeights = Partial<Record<Pillar, number>>;

/**
 * Validate an untrusted value as a complete weights set.
 * Returns a frozen copy.
 */
export function parseWeights(input: unknown): Weights {
  const result = weightsSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError('Invalid weights', toValidationIssues(result.error.issues));
  }
  return Object.freeze({ ...result.data });
}

export function weightSum(weights: Weights): number {
  return PILLARS.reduce((sum, pillar) => sum + weights[pillar], 0);
}

/** Rescale so the weights sum to 1. A zero-sum set is returned unchanged. */
export function normalizeWeights(weights: Weights): Weights {
  const total = weightSum(weights);
  if (total <= 0) return Object.freeze({ ...weights });
  return Object.freeze({
    totalCost: weights.totalCost / total,
    totalTime: weights.totalTime / total,
    reliability: weights.reliability / total,
    capacity: weights.capacity / total,
  });
}

export function isUnitSum(weights: Weights, tolerance = 1e-9): boolean {
  return Math.abs(weightSum(weights) - 1) <= tolerance;
}

// ---------------------------------------------------------------------------
// Weights store
// ---------------------------------------------------------------------------

export interface WeightsStore {
  /** Current published weights. The returned object is frozen. */
  get(): Weights;
  /** Replace the whole weights set. */
  set(next: unknown): Weights;
  /** Copy-on-write merge of some pillars into the current set. */
  update(partial: unknown): Weights;
  /** Publish the defaults (or the initial value) again. */
  reset(): Weights;
}

/**
 * Single owner of the process-wide weights. Every publish builds a new
 * complete frozen value and swaps the reference in one assignment, so a
 * reader sees either the old set or the new one, never a mix.
 */
export function createWeightsStore(initial: Weights = DEFAULT_WEIGHTS): WeightsStore {
  const initialValue = parseWeights(initial);
  let current = initialValue;

  function publish(next: Weights, reason: string): Weights {
    current = next;
    const sum = weightSum(next);
    if (!isUnitSum(next)) {
      logger.warn({ weights: next, sum }, 'Weights do not sum to 1.0; final scores are not bounded to [0,1]');
    } else {
      logger.info({ weights: next, reason }, 'Scoring weights published');
    }
    return current;
  }

  return {
    get() {
      return current;
    },

    set(next) {
      return publish(parseWeights(next), 'set');
    },

    update(partial) {
      const result = partialWeightsSchema.safeParse(partial);
      if (!result.success) {
        throw new ValidationError('Invalid weights', toValidationIssues(result.error.issues));
      }
      const base = current;
      const merged: Weights = Object.freeze({
        totalCost: result.data.totalCost ?? base.totalCost,
        totalTime: result.data.totalTime ?? base.totalTime,
        reliability: result.data.reliability ?? base.reliability,
        capacity: result.data.capacity ?? base.capacity,
      });
      return publish(merged, 'update');
    },

    reset() {
      return publish(initialValue, 'reset');
    },
  };
}

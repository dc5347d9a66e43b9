/**
 * Score snapshots - append-only history written on an explicit save
 */

import { randomUUID } from 'node:crypto';
import type { EvaluationRun, ScoreSnapshot, VendorEvaluation, Weights } from './types';

export interface SnapshotWriter {
  addScoreSnapshot(snapshot: ScoreSnapshot): void;
}

export interface SnapshotReader {
  getLatestSnapshotBefore(vendorId: string, before: Date): ScoreSnapshot | undefined;
}

export function toSnapshotDate(at: Date): string {
  return at.toISOString().slice(0, 10);
}

export function buildSnapshot(evaluation: VendorEvaluation, weights: Weights, computedAt: Date): ScoreSnapshot {
  return {
    id: randomUUID(),
    vendorId: evaluation.vendor.id,
    vendorName: evaluation.vendor.name,
    pillarScores: { ...evaluation.pillarScores },
    finalScore: evaluation.finalScore,
    weights,
    inputs: {
      avgLandedCost: evaluation.metrics.avgLandedCost,
      avgTotalTime: evaluation.metrics.avgTotalTime,
      totalCapacity: evaluation.metrics.totalCapacity,
      reliability: evaluation.metrics.reliability,
      partCount: evaluation.metrics.partCount,
    },
    computedAt,
    snapshotDate: toSnapshotDate(computedAt),
  };
}

/**
 * Write one snapshot per scored vendor of the run. Vendors without valid
 * parts carry no meaningful score and are skipped.
 */
export function saveSnapshots(writer: SnapshotWriter, run: EvaluationRun): ScoreSnapshot[] {
  const written: ScoreSnapshot[] = [];
  for (const evaluation of run.evaluations) {
    if (!evaluation.hasParts) continue;
    const snapshot = buildSnapshot(evaluation, run.weights, run.evaluatedAt);
    writer.addScoreSnapshot(snapshot);
    written.push(snapshot);
  }
  return written;
}

/** Latest snapshot strictly before `before` for each vendor that has one. */
export function loadPreviousSnapshots(
  reader: SnapshotReader,
  vendorIds: readonly string[],
  before: Date,
): Map<string, ScoreSnapshot> {
  const previous = new Map<string, ScoreSnapshot>();
  for (const id of vendorIds) {
    const snapshot = reader.getLatestSnapshotBefore(id, before);
    if (snapshot) previous.set(id, snapshot);
  }
  return previous;
}

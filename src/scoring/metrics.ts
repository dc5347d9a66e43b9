/**
 * Metrics Extractor
 *
 * Raw per-vendor metrics from the vendor's part records:
 *   landed cost = unit price + freight + unit price * tariff rate
 *   total time  = lead time weeks * 7 + transit days
 *
 * Malformed parts are dropped from the metrics and reported on the vendor;
 * extraction never throws. A vendor left with no valid parts gets sentinel
 * metrics (null cost/time, zero capacity) and hasParts = false, which the
 * normalizer turns into the worst score on every pillar.
 */

import { SHIPPING_MODES } from './types';
import type { ExtractedVendor, Part, PartRecord, ShippingMode, Vendor, VendorMetrics } from './types';

export function landedCost(part: Pick<Part, 'unitPrice' | 'freightCost' | 'tariffRate'>): number {
  return part.unitPrice + part.freightCost + part.unitPrice * part.tariffRate;
}

export function totalTimeDays(part: Pick<Part, 'leadTimeWeeks' | 'transitDays'>): number {
  return part.leadTimeWeeks * 7 + part.transitDays;
}

export function isShippingMode(value: unknown): value is ShippingMode {
  return SHIPPING_MODES.some((mode) => mode === value);
}

/** Canonical mode for a case-insensitive name; undefined when there is none. */
export function toShippingMode(value: string): ShippingMode | undefined {
  const wanted = value.trim().toLowerCase();
  return SHIPPING_MODES.find((mode) => mode.toLowerCase() === wanted);
}

const NON_NEGATIVE_FIELDS = [
  'unitPrice',
  'freightCost',
  'tariffRate',
  'leadTimeWeeks',
  'transitDays',
  'monthlyCapacity',
] as const;

/** Problems with one part record; empty when the part is usable. */
export function validatePart(part: PartRecord, vendorId: string): string[] {
  const label = `Part ${part.id} (${part.componentName || 'unnamed'})`;
  const errors: string[] = [];

  if (part.vendorId !== vendorId) {
    errors.push(`${label}: belongs to vendor ${part.vendorId}`);
  }
  for (const field of NON_NEGATIVE_FIELDS) {
    const value = part[field];
    if (!Number.isFinite(value) || value < 0) {
      errors.push(`${label}: ${field} must be a non-negative number (got ${value})`);
    }
  }
  if (!isShippingMode(part.shippingMode)) {
    errors.push(`${label}: unknown shipping mode "${part.shippingMode}"`);
  }
  return errors;
}

/** Sum in ascending order so the same values give the same total in any order. */
function orderedSum(values: readonly number[]): number {
  return [...values].sort((a, b) => a - b).reduce((sum, v) => sum + v, 0);
}

function mean(values: readonly number[]): number {
  return orderedSum(values) / values.length;
}

function checkReliability(vendor: Vendor, errors: string[]): number {
  const raw = vendor.reliabilityScore;
  if (!Number.isFinite(raw)) {
    errors.push(`Vendor ${vendor.id}: reliabilityScore is not a number; treated as 0`);
    return 0;
  }
  if (raw < 0 || raw > 1) {
    const clamped = Math.max(0, Math.min(1, raw));
    errors.push(`Vendor ${vendor.id}: reliabilityScore ${raw} outside [0,1]; clamped to ${clamped}`);
    return clamped;
  }
  return raw;
}

export function extractMetrics(vendor: Vendor, parts: readonly PartRecord[]): ExtractedVendor {
  const validationErrors: string[] = [];
  const reliability = checkReliability(vendor, validationErrors);

  const valid: Part[] = [];
  for (const part of parts) {
    const errors = validatePart(part, vendor.id);
    if (errors.length > 0 || !isShippingMode(part.shippingMode)) {
      validationErrors.push(...errors);
    } else {
      valid.push({ ...part, shippingMode: part.shippingMode });
    }
  }

  const hasParts = valid.length > 0;
  const metrics: VendorMetrics = hasParts
    ? {
        avgLandedCost: mean(valid.map(landedCost)),
        avgTotalTime: mean(valid.map(totalTimeDays)),
        totalCapacity: orderedSum(valid.map((p) => p.monthlyCapacity)),
        reliability,
        partCount: valid.length,
      }
    : {
        avgLandedCost: null,
        avgTotalTime: null,
        totalCapacity: 0,
        reliability,
        partCount: 0,
      };

  return { vendor, parts: valid, metrics, hasParts, validationErrors };
}

/**
 * Vendor Scoring Types
 */

// ---------------------------------------------------------------------------
// Records supplied by the datastore
// ---------------------------------------------------------------------------

export const SHIPPING_MODES = ['Air', 'Ocean', 'Ground'] as const;
export type ShippingMode = (typeof SHIPPING_MODES)[number];

export interface Vendor {
  id: string;
  name: string;
  /** Region code: US, EU, KR, CN, VN, MX, IN, ... */
  region: string;
  /** 0-1 input metric */
  reliabilityScore: number;
  contactEmail: string;
  lastVerified: Date | null;
}

export interface Part {
  id: string;
  vendorId: string;
  componentName: string;
  odmDestination: string;
  odmRegion: string;
  /** Quoted unit price (FOB) */
  unitPrice: number;
  /** Freight cost per unit */
  freightCost: number;
  /** Decimal fraction, 0.065 = 6.5% */
  tariffRate: number;
  leadTimeWeeks: number;
  transitDays: number;
  shippingMode: ShippingMode;
  monthlyCapacity: number;
  lastVerified: Date | null;
  notes: string;
}

/** A part as stored; the shipping mode is checked when metrics are extracted. */
export interface PartRecord extends Omit<Part, 'shippingMode'> {
  shippingMode: string;
}

// ---------------------------------------------------------------------------
// Scoring
// ---------------------------------------------------------------------------

export const PILLARS = ['totalCost', 'totalTime', 'reliability', 'capacity'] as const;
export type Pillar = (typeof PILLARS)[number];

export type PillarScores = Record<Pillar, number>;

/** Non-negative pillar weights; conventionally summing to 1.0 (not enforced). */
export type Weights = Readonly<Record<Pillar, number>>;

export interface VendorMetrics {
  /** Mean landed cost per unit; null when the vendor has no valid parts */
  avgLandedCost: number | null;
  /** Mean lead + transit time in days; null when the vendor has no valid parts */
  avgTotalTime: number | null;
  totalCapacity: number;
  reliability: number;
  partCount: number;
}

export interface ExtractedVendor {
  vendor: Vendor;
  /** Parts that passed validation and fed the metrics */
  parts: Part[];
  metrics: VendorMetrics;
  hasParts: boolean;
  validationErrors: string[];
}

// ---------------------------------------------------------------------------
// Risk
// ---------------------------------------------------------------------------

export type RiskSeverity = 'low' | 'medium' | 'high';

export type BuiltInRiskType =
  | 'cost_spike'
  | 'delay_risk'
  | 'capacity_shortfall'
  | 'stale_data'
  | 'reliability_risk'
  | 'missing_parts';

/** Open set: registered rules may introduce their own types. */
export type RiskType = BuiltInRiskType | (string & {});

export interface RiskFlag {
  type: RiskType;
  severity: RiskSeverity;
  description: string;
  /** Metric value that triggered the flag */
  value?: number;
  /** Threshold that was crossed */
  threshold?: number;
}

export interface RiskThresholds {
  /** Month-over-month landed cost increase, as a fraction (0.10 = 10%) */
  costSpikePct: number;
  /** Transit days allowed per shipping mode before a delay flag */
  transitDaysByMode: Record<ShippingMode, number>;
  maxLeadTimeWeeks: number;
  /** Minimum total monthly capacity across a vendor's parts */
  capacityFloor: number;
  stalenessDays: number;
  minReliability: number;
}

// ---------------------------------------------------------------------------
// Snapshots
// ---------------------------------------------------------------------------

export interface SnapshotInputs {
  avgLandedCost: number | null;
  avgTotalTime: number | null;
  totalCapacity: number;
  reliability: number;
  partCount: number;
}

export interface ScoreSnapshot {
  id: string;
  vendorId: string;
  vendorName: string;
  pillarScores: PillarScores;
  finalScore: number;
  weights: Weights;
  inputs: SnapshotInputs;
  computedAt: Date;
  /** YYYY-MM-DD of computedAt (UTC) */
  snapshotDate: string;
}

// ---------------------------------------------------------------------------
// Evaluation output
// ---------------------------------------------------------------------------

export interface VendorEvaluation {
  vendor: Vendor;
  parts: Part[];
  metrics: VendorMetrics;
  hasParts: boolean;
  pillarScores: PillarScores;
  finalScore: number;
  contributions: PillarScores;
  riskFlags: RiskFlag[];
  isStale: boolean;
  validationErrors: string[];
}

export interface EvaluationRun {
  evaluations: VendorEvaluation[];
  /** The weights snapshot every vendor in this run was scored with */
  weights: Weights;
  evaluatedAt: Date;
}

export const SORT_KEYS = ['final_score', 'total_cost', 'total_time', 'reliability', 'capacity'] as const;
export type SortKey = (typeof SORT_KEYS)[number];

export interface VendorFilters {
  /** Case-insensitive substring of any part's component name */
  component?: string;
  /** Region code, exact (case-insensitive) */
  region?: string;
  /** Shipping mode present among the vendor's parts */
  mode?: ShippingMode;
}

export interface ExecutiveSummary {
  summary: string;
  recommendation: string;
  generatedAt: string;
}

export interface NormalizationOptions {
  /** Cap cost, time and capacity at the percentiles below before min-max scaling */
  winsorize: boolean;
  lowerPercentile: number;
  upperPercentile: number;
}

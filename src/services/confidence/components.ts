import type { AlertLevel, ConfidenceComponents, Trend } from '../../domain/types.js';
import type { AlertThresholds, ConfidenceWeights } from '../../infrastructure/config.js';
import { isRecord } from '../validation/validator.js';
import type { InputSample, PredictionSample } from './types.js';

export const DEFAULT_COMPONENTS: Readonly<ConfidenceComponents> = Object.freeze({
  domainPhysical: 0.5,
  conceptualCoherence: 0.5,
  orbitalUncertainty: 0.5,
  dataQuality: 0.5,
  predictionQuality: 0.6,
});

const REQUIRED_INPUT_FIELDS = [
  'id',
  'name',
  'diameter_min',
  'diameter_max',
  'absolute_magnitude_h',
  'orbital_data',
] as const;

const ORBITAL_SUBFIELDS = ['eccentricity', 'inclination', 'semi_major_axis'] as const;

const PREDICTION_FIELDS = ['summary', 'confidence_level'] as const;

const BRIGHT_MAGNITUDE = 15;
const FAINT_MAGNITUDE = 25;
const DEFAULT_MAGNITUDE = 20;

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

function readFinite(data: Readonly<Record<string, unknown>>, key: string): number | undefined {
  const value = data[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function isPresent(data: Readonly<Record<string, unknown>>, key: string): boolean {
  return data[key] !== undefined && data[key] !== null;
}

function nested(data: Readonly<Record<string, unknown>>, key: string): Readonly<Record<string, unknown>> {
  const value = data[key];
  return isRecord(value) ? value : {};
}

function presenceRatio(data: Readonly<Record<string, unknown>>, fields: readonly string[]): number {
  return fields.filter((f) => isPresent(data, f)).length / fields.length;
}

/**
 * Confidence from the spread of the size estimate: a tight diameter range
 * means a well-characterised object. Bright objects (H < 15) get a 10% bonus,
 * faint ones (H > 25) a 20% penalty.
 */
export function orbitalUncertaintyConfidence(sample: InputSample): number {
  const min = readFinite(sample, 'diameter_min');
  const max = readFinite(sample, 'diameter_max');
  if (min === undefined || max === undefined || min <= 0 || max <= 0) return 0.5;

  const spread = Math.abs(max - min) / min;
  let confidence = Math.max(0.1, 1 - Math.min(spread, 0.9));

  const magnitude = readFinite(sample, 'absolute_magnitude_h') ?? DEFAULT_MAGNITUDE;
  if (magnitude < BRIGHT_MAGNITUDE) {
    confidence *= 1.1;
  } else if (magnitude > FAINT_MAGNITUDE) {
    confidence *= 0.8;
  }

  return Math.min(1, confidence);
}

/**
 * Mean of diameter ordering (1 or 0), magnitude sanity and eccentricity
 * sanity. A plausible or unknown magnitude or eccentricity scores 0.5, an
 * implausible one 0.2, so a fully consistent record tops out at 2/3.
 */
export function dataConsistency(sample: InputSample): number {
  const min = readFinite(sample, 'diameter_min');
  const max = readFinite(sample, 'diameter_max');
  const diameter = min !== undefined && max !== undefined && min > 0 && max > 0 ? (min <= max ? 1 : 0) : 0.5;

  const h = readFinite(sample, 'absolute_magnitude_h');
  const magnitude = h === undefined || (h >= 5 && h <= 30) ? 0.5 : 0.2;

  const e = readFinite(nested(sample, 'orbital_data'), 'eccentricity');
  const eccentricity = e === undefined || (e >= 0 && e <= 1) ? 0.5 : 0.2;

  return (diameter + magnitude + eccentricity) / 3;
}

export function dataQualityConfidence(sample: InputSample): number {
  const completeness = presenceRatio(sample, REQUIRED_INPUT_FIELDS);
  const orbitalQuality = presenceRatio(nested(sample, 'orbital_data'), ORBITAL_SUBFIELDS);
  const consistency = dataConsistency(sample);

  return Math.min(1, completeness * 0.4 + orbitalQuality * 0.4 + consistency * 0.2);
}

export function summaryCompleteness(summary: unknown): number {
  if (typeof summary !== 'string') return 0.1;
  const words = summary.trim().split(/\s+/).filter(Boolean).length;
  if (words > 20) return 1.0;
  if (words > 10) return 0.7;
  if (words > 5) return 0.4;
  return 0.1;
}

export function predictionQualityConfidence(sample: PredictionSample): number {
  const reported = readFinite(sample, 'confidence_level');
  const selfReported = reported === undefined ? 0.6 : clamp01(reported);
  const consistency = presenceRatio(sample, PREDICTION_FIELDS);
  const completeness = summaryCompleteness(sample.summary);

  return Math.min(1, selfReported * 0.5 + consistency * 0.3 + completeness * 0.2);
}

export function weightedOverall(components: ConfidenceComponents, weights: ConfidenceWeights): number {
  return clamp01(
    clamp01(components.domainPhysical) * weights.domainPhysical +
      clamp01(components.conceptualCoherence) * weights.conceptualCoherence +
      clamp01(components.orbitalUncertainty) * weights.orbitalUncertainty +
      clamp01(components.dataQuality) * weights.dataQuality +
      clamp01(components.predictionQuality) * weights.predictionQuality,
  );
}

/** Rounds away binary noise so a delta of exactly ±threshold compares as equal. */
export function roundDelta(delta: number): number {
  return Math.round(delta * 1e9) / 1e9;
}

/**
 * Compares the mean of the second half of `values` with the mean of the first
 * half (the first half takes floor(n / 2) entries). Open boundaries: a delta
 * of exactly ±threshold is stable.
 */
export function classifyTrend(values: readonly number[], threshold: number): Trend {
  if (values.length < 2) return 'stable';

  const half = Math.floor(values.length / 2);
  const first = values.slice(0, half);
  const second = values.slice(half);
  const mean = (xs: readonly number[]) => xs.reduce((sum, x) => sum + x, 0) / xs.length;

  const delta = roundDelta(mean(second) - mean(first));
  if (delta > threshold) return 'improving';
  if (delta < -threshold) return 'declining';
  return 'stable';
}

export function classifyAlertLevel(overall: number, thresholds: AlertThresholds): AlertLevel {
  if (overall < thresholds.critical) return 'critical';
  if (overall < thresholds.high) return 'high';
  if (overall < thresholds.medium) return 'medium';
  return 'low';
}

export const SEVERITIES = ['critical', 'warning', 'info', 'success'] as const;

export type Severity = (typeof SEVERITIES)[number];

export const VALIDATOR_KINDS = ['physical', 'completeness', 'coherence'] as const;

export type ValidatorKind = (typeof VALIDATOR_KINDS)[number];

export const STAGE_TYPES = [
  'data_collection',
  'trajectory',
  'impact',
  'mitigation',
  'visualization',
  'ml',
  'explanation',
  'unknown',
] as const;

export type StageType = (typeof STAGE_TYPES)[number];

export const RECOMMENDATIONS = ['continue', 'retry', 'investigate', 'stop'] as const;

export type Recommendation = (typeof RECOMMENDATIONS)[number];

export const TRENDS = ['improving', 'stable', 'declining'] as const;

export type Trend = (typeof TRENDS)[number];

export const ALERT_LEVELS = ['low', 'medium', 'high', 'critical'] as const;

export type AlertLevel = (typeof ALERT_LEVELS)[number];

/** Structured record emitted by a pipeline stage. Read-only to everything in this service. */
export type StageOutput = Readonly<Record<string, unknown>>;

export interface StageContext {
  stageName: string;
  stageType?: StageType;
  runId?: string;
  dataType?: string;
  [key: string]: unknown;
}

export type ValidationValue = string | number | boolean | null;

export interface ValidationResult {
  readonly severity: Severity;
  readonly message: string;
  readonly field?: string;
  readonly expected?: ValidationValue;
  readonly observed?: ValidationValue;
  readonly confidence: number;
  readonly timestamp: Date;
}

export interface ConfidenceComponents {
  domainPhysical: number;
  conceptualCoherence: number;
  orbitalUncertainty: number;
  dataQuality: number;
  predictionQuality: number;
}

export interface ConfidenceMetrics extends Readonly<ConfidenceComponents> {
  readonly overall: number;
  readonly trend: Trend;
  readonly alertLevel: AlertLevel;
  readonly timestamp: Date;
}

export interface Alert {
  readonly level: AlertLevel;
  readonly message: string;
  readonly stageName: string;
  readonly timestamp: Date;
  readonly resolved: boolean;
}

import type { Severity, ValidationResult, ValidationValue, ValidatorKind } from '../../domain/types.js';
import type { ReportSummary } from './types.js';

export interface ValidationResultInput {
  severity: Severity;
  message: string;
  field?: string;
  expected?: ValidationValue;
  observed?: ValidationValue;
  confidence: number;
}

export function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

export function createValidationResult(input: ValidationResultInput): ValidationResult {
  return Object.freeze({
    severity: input.severity,
    message: input.message,
    ...(input.field !== undefined && { field: input.field }),
    ...(input.expected !== undefined && { expected: input.expected }),
    ...(input.observed !== undefined && { observed: input.observed }),
    confidence: clampUnit(input.confidence),
    timestamp: new Date(),
  });
}

/**
 * Results of one validator over one stage output.
 *
 * `overallConfidence` is the mean confidence of every result and `isValid`
 * holds while no result is critical; both are recomputed on each `add`.
 * An empty report has confidence 0 and counts as valid.
 */
export class ValidationReport {
  readonly stageName: string;
  readonly validatorName: string;
  readonly validatorKind: ValidatorKind;
  readonly createdAt: Date;

  private readonly entries: ValidationResult[] = [];
  private confidence = 0;
  private criticalCount = 0;

  constructor(stageName: string, validatorName: string, validatorKind: ValidatorKind) {
    this.stageName = stageName;
    this.validatorName = validatorName;
    this.validatorKind = validatorKind;
    this.createdAt = new Date();
  }

  add(result: ValidationResult): this {
    this.entries.push(result);
    if (result.severity === 'critical') this.criticalCount += 1;
    const total = this.entries.reduce((sum, r) => sum + r.confidence, 0);
    this.confidence = total / this.entries.length;
    return this;
  }

  addAll(results: readonly ValidationResult[]): this {
    for (const result of results) this.add(result);
    return this;
  }

  get results(): readonly ValidationResult[] {
    return this.entries;
  }

  get overallConfidence(): number {
    return this.confidence;
  }

  get isValid(): boolean {
    return this.criticalCount === 0;
  }

  get count(): number {
    return this.entries.length;
  }

  get isNarrative(): boolean {
    return this.validatorKind === 'coherence';
  }

  errors(): ValidationResult[] {
    return this.entries.filter((r) => r.severity === 'critical');
  }

  warnings(): ValidationResult[] {
    return this.entries.filter((r) => r.severity === 'warning');
  }

  summary(): ReportSummary {
    return {
      stage: this.stageName,
      validator: this.validatorName,
      valid: this.isValid,
      confidence: this.overallConfidence,
      totalValidations: this.count,
      errors: this.criticalCount,
      warnings: this.warnings().length,
      timestamp: this.createdAt.toISOString(),
    };
  }

  toJSON() {
    return {
      stageName: this.stageName,
      validatorName: this.validatorName,
      validatorKind: this.validatorKind,
      overallConfidence: this.overallConfidence,
      isValid: this.isValid,
      count: this.count,
      results: this.entries,
      createdAt: this.createdAt.toISOString(),
    };
  }
}

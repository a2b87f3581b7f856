import type { StageContext, StageOutput, StageType, ValidatorKind } from '../../domain/types.js';
import type { ValidationReport } from './report.js';

export interface ValidatorContext extends StageContext {
  stageType: StageType;
  validatorName: string;
}

export interface Validator {
  readonly name: string;
  readonly kind: ValidatorKind;
  readonly description: string;
  validate(output: StageOutput, context: ValidatorContext): ValidationReport;
}

export interface RangeRule {
  min: number;
  max: number;
  unit?: string;
  /** Treat `max` as an open bound */
  exclusiveMax?: boolean;
}

export interface ReportSummary {
  stage: string;
  validator: string;
  valid: boolean;
  confidence: number;
  totalValidations: number;
  errors: number;
  warnings: number;
  timestamp: string;
}

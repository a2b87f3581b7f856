import { createAppError, ErrorCode, ValidatorFault, type AppError } from '../../domain/errors.js';
import { ok, err, type Result } from '../../domain/result.js';
import type { StageContext, StageOutput, StageType, ValidatorKind } from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';
import { createValidationResult, ValidationReport } from '../validation/report.js';
import type { Validator, ValidatorContext } from '../validation/types.js';
import { stageRecommendations } from './recommendations.js';
import type { Finding, StagePerformance, StageSupervision } from './types.js';

const log = logger.child({ module: 'stage-supervisor' });

const DEFAULT_HISTORY_CAPACITY = 50;

export interface StageSupervisorOptions {
  stageName: string;
  stageType: StageType;
  validators: readonly Validator[];
  historyCapacity?: number;
}

export class StageSupervisor {
  readonly stageName: string;
  readonly stageType: StageType;
  private readonly validators: readonly Validator[];
  private readonly historyCapacity: number;
  private readonly history: StageSupervision[] = [];

  constructor(options: StageSupervisorOptions) {
    this.stageName = options.stageName;
    this.stageType = options.stageType;
    this.validators = options.validators;
    this.historyCapacity = options.historyCapacity ?? DEFAULT_HISTORY_CAPACITY;
  }

  get validatorNames(): string[] {
    return this.validators.map((v) => v.name);
  }

  get validatorKinds(): ValidatorKind[] {
    return this.validators.map((v) => v.kind);
  }

  /**
   * Runs every validator in order. A validator that faults on the output's
   * shape yields a critical report of its own and the rest still run; any
   * other error propagates.
   */
  supervise(output: StageOutput, context: Partial<StageContext> = {}): StageSupervision {
    const ctx = { stageName: this.stageName, stageType: this.stageType, runId: context.runId };
    log.info({ ...ctx, validators: this.validators.length }, 'Supervising stage');

    const reports = this.validators.map((validator) => {
      const validatorContext: ValidatorContext = {
        ...context,
        stageName: this.stageName,
        stageType: this.stageType,
        validatorName: validator.name,
      };

      const result = this.runValidator(validator, output, validatorContext);
      if (result.ok) return result.value;

      log.warn({ ...ctx, validator: validator.name, errorCode: result.error.code }, result.error.message);
      return faultReport(this.stageName, validator, result.error);
    });

    const errors = collectFindings(reports, 'errors');
    const warnings = collectFindings(reports, 'warnings');
    const overallConfidence =
      reports.length > 0 ? reports.reduce((sum, r) => sum + r.overallConfidence, 0) / reports.length : 0;

    const supervision: StageSupervision = {
      stageName: this.stageName,
      stageType: this.stageType,
      timestamp: new Date().toISOString(),
      validationReports: reports,
      overallConfidence,
      isValid: reports.every((r) => r.isValid),
      errors,
      warnings,
      recommendations: stageRecommendations(overallConfidence, errors.length, warnings.length, this.stageType),
    };

    this.record(supervision);

    log.info(
      { ...ctx, confidence: overallConfidence, isValid: supervision.isValid, errorCount: errors.length },
      'Stage supervision completed',
    );

    return supervision;
  }

  getHistory(limit = 10): StageSupervision[] {
    return limit > 0 ? this.history.slice(-limit) : [];
  }

  getPerformance(): StagePerformance | null {
    const total = this.history.length;
    if (total === 0) return null;

    const validSupervisions = this.history.filter((s) => s.isValid).length;
    const totalErrors = this.history.reduce((sum, s) => sum + s.errors.length, 0);
    const totalWarnings = this.history.reduce((sum, s) => sum + s.warnings.length, 0);

    return {
      stageName: this.stageName,
      totalSupervisions: total,
      validSupervisions,
      successRate: validSupervisions / total,
      averageConfidence: this.history.reduce((sum, s) => sum + s.overallConfidence, 0) / total,
      totalErrors,
      totalWarnings,
      errorRate: totalErrors / total,
      warningRate: totalWarnings / total,
    };
  }

  private runValidator(
    validator: Validator,
    output: StageOutput,
    context: ValidatorContext,
  ): Result<ValidationReport, AppError> {
    try {
      return ok(validator.validate(output, context));
    } catch (error) {
      if (error instanceof ValidatorFault) {
        return err(
          createAppError(
            ErrorCode.VALIDATOR_FAULT,
            `Validator ${validator.name} failed: ${error.message}`,
            false,
            error.field,
          ),
        );
      }
      throw error;
    }
  }

  private record(supervision: StageSupervision): void {
    this.history.push(supervision);
    while (this.history.length > this.historyCapacity) {
      this.history.shift();
    }
  }
}

function faultReport(stageName: string, validator: Validator, error: AppError): ValidationReport {
  return new ValidationReport(stageName, validator.name, validator.kind).add(
    createValidationResult({
      severity: 'critical',
      message: error.message,
      field: error.details,
      confidence: 0.0,
    }),
  );
}

function collectFindings(reports: readonly ValidationReport[], kind: 'errors' | 'warnings'): Finding[] {
  return reports.flatMap((report) =>
    report[kind]().map((result) => ({
      message: result.message,
      ...(result.field !== undefined && { field: result.field }),
      validator: report.validatorName,
    })),
  );
}

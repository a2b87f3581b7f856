import { randomUUID } from 'node:crypto';
import { createAppError, ErrorCode, errorMessage, type AppError } from '../../domain/errors.js';
import { ok, err, type Result } from '../../domain/result.js';
import type { Alert, StageContext, StageOutput, ValidatorKind } from '../../domain/types.js';
import { DEFAULT_SUPERVISION_CONFIG, type SupervisionConfig } from '../../infrastructure/config.js';
import { createRunLogger, logger } from '../../infrastructure/logger.js';
import { ConfidenceSystem, type HealthReport, type IndexedAlert, type TrendReport } from '../confidence/index.js';
import { CoherenceValidator } from '../validation/coherence-validator.js';
import { CompletenessValidator } from '../validation/completeness-validator.js';
import { PhysicalValidator } from '../validation/physical-validator.js';
import type { ValidationReport } from '../validation/report.js';
import type { Validator } from '../validation/types.js';
import { decideRecommendation, runRecommendations } from './recommendations.js';
import { StageSupervisor } from './stage-supervisor.js';
import { RUN_COMPONENTS, STAGE_DEFINITIONS } from './stages.js';
import type {
  RunState,
  RunSupervision,
  StageDefinition,
  StagePerformance,
  StageSupervision,
  StageSupervisionResult,
  SupervisorStatus,
} from './types.js';

const log = logger.child({ module: 'supervisor' });

export interface SupervisorOptions {
  config?: SupervisionConfig;
  confidence?: ConfidenceSystem;
  stages?: readonly StageDefinition[];
  validators?: Partial<Record<ValidatorKind, Validator>>;
}

function isNonEmpty(output: StageOutput | undefined): output is StageOutput {
  return output !== undefined && Object.keys(output).length > 0;
}

/**
 * Entry point for the orchestrator. Maps stage names to their supervisors,
 * feeds every validator report into one confidence session and turns the
 * outcome into a recommendation. Never throws: failures come back as
 * unsupervised results recommending `stop`.
 */
export class Supervisor {
  readonly confidence: ConfidenceSystem;
  private readonly config: SupervisionConfig;
  private readonly stages = new Map<string, StageSupervisor>();
  private readonly validatorCount: number;

  constructor(options: SupervisorOptions = {}) {
    this.config = options.config ?? DEFAULT_SUPERVISION_CONFIG;
    this.confidence = options.confidence ?? new ConfidenceSystem(this.config);

    const validators: Record<ValidatorKind, Validator> = {
      physical: options.validators?.physical ?? new PhysicalValidator(),
      completeness: options.validators?.completeness ?? new CompletenessValidator(),
      coherence: options.validators?.coherence ?? new CoherenceValidator(),
    };
    this.validatorCount = Object.keys(validators).length;

    for (const definition of options.stages ?? STAGE_DEFINITIONS) {
      this.stages.set(
        definition.stageName,
        new StageSupervisor({
          stageName: definition.stageName,
          stageType: definition.stageType,
          validators: definition.validators.map((kind) => validators[kind]),
          historyCapacity: this.config.stageHistoryCapacity,
        }),
      );
    }

    log.info({ stages: this.stages.size, validators: this.validatorCount }, 'Supervisor initialized');
  }

  superviseStage(
    stageName: string,
    output: StageOutput,
    context: Partial<StageContext> = {},
  ): StageSupervisionResult {
    const stage = this.stages.get(stageName);
    if (!stage) {
      log.error({ stageName }, 'No supervisor registered for stage');
      return failClosed(
        stageName,
        createAppError(ErrorCode.STAGE_NOT_REGISTERED, `No supervisor registered for stage '${stageName}'`, false),
      );
    }

    let supervision: StageSupervision;
    try {
      supervision = stage.supervise(output, { ...context, stageName });
    } catch (error) {
      const message = errorMessage(error);
      log.error({ stageName, error: message }, 'Stage supervision failed');
      return failClosed(
        stageName,
        createAppError(ErrorCode.SUPERVISION_FAILED, `Supervision of stage '${stageName}' failed`, false, message),
      );
    }

    const reports = supervision.validationReports;
    const confidenceMetrics = reports.length > 0 ? this.confidence.update(reports) : undefined;
    const recommendation = decideRecommendation(reports, confidenceMetrics, this.config.investigateThreshold);

    log.info({ stageName, recommendation, confidence: supervision.overallConfidence }, 'Stage supervised');

    return {
      stageName,
      supervised: true,
      timestamp: supervision.timestamp,
      validationReports: reports,
      overallConfidence: supervision.overallConfidence,
      isValid: supervision.isValid,
      errors: supervision.errors,
      warnings: supervision.warnings,
      recommendations: supervision.recommendations,
      recommendation,
      ...(confidenceMetrics && { confidenceMetrics }),
    };
  }

  superviseRun(runState: RunState): RunSupervision {
    const runId = runState.runId ?? `run_${randomUUID()}`;
    const runLog = createRunLogger(runId);
    runLog.info('Supervising run');

    const stageReports: Record<string, StageSupervisionResult> = {};
    const allReports: ValidationReport[] = [];

    for (const { field, stageName, dataType } of RUN_COMPONENTS) {
      const output = runState[field];
      if (!isNonEmpty(output)) continue;

      const result = this.superviseStage(stageName, output, { runId, dataType });
      stageReports[stageName] = result;
      allReports.push(...result.validationReports);
    }

    const confidenceMetrics =
      allReports.length > 0
        ? this.confidence.update(allReports, runState.asteroidData, runState.mlPredictions)
        : undefined;
    const overallConfidence = confidenceMetrics?.overall ?? 0;
    const alerts = this.confidence.getActiveAlerts();

    const supervision: RunSupervision = {
      runId,
      timestamp: new Date().toISOString(),
      stageReports,
      overallConfidence,
      runValid: confidenceMetrics !== undefined && overallConfidence >= this.config.runValidThreshold,
      alerts,
      recommendations: runRecommendations(overallConfidence, alerts, this.config.runValidThreshold),
      ...(confidenceMetrics && { confidenceMetrics }),
    };

    runLog.info(
      {
        stages: Object.keys(stageReports).length,
        confidence: overallConfidence,
        runValid: supervision.runValid,
        activeAlerts: alerts.length,
      },
      'Run supervision completed',
    );

    return supervision;
  }

  shouldContinue(): boolean {
    return this.confidence.shouldContinue();
  }

  resolveAlert(index: number): boolean {
    return this.confidence.resolveAlert(index);
  }

  getActiveAlerts(): Alert[] {
    return this.confidence.getActiveAlerts();
  }

  getIndexedActiveAlerts(): IndexedAlert[] {
    return this.confidence.getIndexedActiveAlerts();
  }

  getTrend(): TrendReport {
    return this.confidence.getTrend();
  }

  getHealthReport(): HealthReport {
    return this.confidence.getHealthReport();
  }

  getStatus(): SupervisorStatus {
    return {
      systemHealth: this.confidence.getHealthReport(),
      activeAlerts: this.confidence.getActiveAlerts().length,
      confidenceTrend: this.confidence.getTrend(),
      stagesRegistered: this.stages.size,
      validatorsActive: this.validatorCount,
      lastUpdated: new Date().toISOString(),
    };
  }

  listStages(): StageDefinition[] {
    return [...this.stages.values()].map((s) => ({
      stageName: s.stageName,
      stageType: s.stageType,
      validators: s.validatorKinds,
    }));
  }

  getStagePerformance(stageName: string): Result<StagePerformance | null, AppError> {
    const stage = this.stages.get(stageName);
    if (!stage) {
      return err(createAppError(ErrorCode.STAGE_NOT_REGISTERED, `No supervisor registered for stage '${stageName}'`, false));
    }
    return ok(stage.getPerformance());
  }

  getStageHistory(stageName: string, limit?: number): Result<StageSupervision[], AppError> {
    const stage = this.stages.get(stageName);
    if (!stage) {
      return err(createAppError(ErrorCode.STAGE_NOT_REGISTERED, `No supervisor registered for stage '${stageName}'`, false));
    }
    return ok(stage.getHistory(limit));
  }
}

function failClosed(stageName: string, error: AppError): StageSupervisionResult {
  return {
    stageName,
    supervised: false,
    timestamp: new Date().toISOString(),
    validationReports: [],
    overallConfidence: 0,
    isValid: false,
    errors: [],
    warnings: [],
    recommendations: [error.message],
    recommendation: 'stop',
    error,
  };
}

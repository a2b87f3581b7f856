import type { AppError } from '../../domain/errors.js';
import type {
  Alert,
  ConfidenceMetrics,
  Recommendation,
  StageOutput,
  StageType,
  ValidatorKind,
} from '../../domain/types.js';
import type { HealthReport, TrendReport } from '../confidence/types.js';
import type { ValidationReport } from '../validation/report.js';

export interface Finding {
  message: string;
  field?: string;
  validator: string;
}

/** Outcome of one per-stage supervision pass, before the confidence update. */
export interface StageSupervision {
  stageName: string;
  stageType: StageType;
  timestamp: string;
  validationReports: ValidationReport[];
  overallConfidence: number;
  isValid: boolean;
  errors: Finding[];
  warnings: Finding[];
  recommendations: string[];
}

export interface StagePerformance {
  stageName: string;
  totalSupervisions: number;
  validSupervisions: number;
  successRate: number;
  averageConfidence: number;
  totalErrors: number;
  totalWarnings: number;
  errorRate: number;
  warningRate: number;
}

export interface StageSupervisionResult {
  stageName: string;
  supervised: boolean;
  timestamp: string;
  validationReports: ValidationReport[];
  overallConfidence: number;
  isValid: boolean;
  errors: Finding[];
  warnings: Finding[];
  recommendations: string[];
  recommendation: Recommendation;
  confidenceMetrics?: ConfidenceMetrics;
  error?: AppError;
}

export interface StageDefinition {
  stageName: string;
  stageType: StageType;
  validators: readonly ValidatorKind[];
}

export interface RunStages {
  asteroidData?: StageOutput;
  trajectoryAnalysis?: StageOutput;
  impactAnalysis?: StageOutput;
  mitigationAnalysis?: StageOutput;
  visualizationData?: StageOutput;
  mlPredictions?: StageOutput;
  explanationData?: StageOutput;
}

export interface RunState extends RunStages {
  runId?: string;
}

export interface RunComponent {
  field: keyof RunStages;
  stageName: string;
  dataType: string;
}

export interface RunSupervision {
  runId: string;
  timestamp: string;
  stageReports: Record<string, StageSupervisionResult>;
  overallConfidence: number;
  runValid: boolean;
  alerts: Alert[];
  recommendations: string[];
  confidenceMetrics?: ConfidenceMetrics;
}

export interface SupervisorStatus {
  systemHealth: HealthReport;
  activeAlerts: number;
  confidenceTrend: TrendReport;
  stagesRegistered: number;
  validatorsActive: number;
  lastUpdated: string;
}

import type { Alert, ConfidenceMetrics, Recommendation, StageType } from '../../domain/types.js';
import type { ValidationReport } from '../validation/report.js';
import { STAGE_GUIDANCE } from './stages.js';

export const RUN_CRITICAL_CONFIDENCE = 0.5;
const MANY_ACTIVE_ALERTS = 5;

export function stageRecommendations(
  confidence: number,
  errorCount: number,
  warningCount: number,
  stageType: StageType,
): string[] {
  const recommendations: string[] = [];

  if (confidence < 0.3) {
    recommendations.push('CRITICAL: extremely low confidence, review the stage output completely');
  } else if (confidence < 0.5) {
    recommendations.push('HIGH: low confidence, verify the main calculations');
  } else if (confidence < 0.7) {
    recommendations.push('MEDIUM: moderate confidence, review warnings');
  } else if (confidence < 0.9) {
    recommendations.push('LOW: good confidence, refine details');
  } else {
    recommendations.push('EXCELLENT: high confidence, continue');
  }

  if (errorCount > 5) {
    recommendations.push('CRITICAL: too many errors, stop execution');
  } else if (errorCount > 2) {
    recommendations.push('HIGH: multiple errors, review before continuing');
  } else if (errorCount > 0) {
    recommendations.push('MEDIUM: errors detected, correct before continuing');
  }

  if (warningCount > 10) {
    recommendations.push('MEDIUM: many warnings, review data quality');
  } else if (warningCount > 5) {
    recommendations.push('LOW: several warnings, verify inputs');
  }

  recommendations.push(...STAGE_GUIDANCE[stageType]);
  return recommendations;
}

/**
 * Decision ladder, first match wins: more than 3 critical results stop the
 * pipeline; any critical result or more than 5 warnings asks for a retry;
 * low overall confidence asks for investigation.
 */
export function decideRecommendation(
  reports: readonly ValidationReport[],
  metrics: ConfidenceMetrics | undefined,
  investigateThreshold: number,
): Recommendation {
  if (reports.length === 0) return 'investigate';

  const criticalErrors = reports.reduce((sum, r) => sum + r.errors().length, 0);
  const warnings = reports.reduce((sum, r) => sum + r.warnings().length, 0);

  if (criticalErrors > 3) return 'stop';
  if (criticalErrors > 0 || warnings > 5) return 'retry';
  if (metrics && metrics.overall < investigateThreshold) return 'investigate';
  return 'continue';
}

export function runRecommendations(
  confidence: number,
  alerts: readonly Alert[],
  runValidThreshold: number,
): string[] {
  const recommendations: string[] = [];

  if (confidence < RUN_CRITICAL_CONFIDENCE) {
    recommendations.push('CRITICAL: very low confidence, review every stage');
  } else if (confidence < runValidThreshold) {
    recommendations.push('WARNING: low confidence, verify calculations');
  }

  if (alerts.length > MANY_ACTIVE_ALERTS) {
    recommendations.push('WARNING: many active alerts, review the system');
  }

  if (alerts.some((a) => a.level === 'critical')) {
    recommendations.push('CRITICAL: critical alerts active, stop the run');
  }

  if (recommendations.length === 0) {
    recommendations.push('SUCCESS: run is valid, continue');
  }

  return recommendations;
}

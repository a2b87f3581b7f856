import type { Alert, AlertLevel, ConfidenceComponents, ConfidenceMetrics } from '../../domain/types.js';
import { DEFAULT_SUPERVISION_CONFIG, type SupervisionConfig } from '../../infrastructure/config.js';
import { logger } from '../../infrastructure/logger.js';
import type { ValidationReport } from '../validation/report.js';
import {
  DEFAULT_COMPONENTS,
  classifyAlertLevel,
  classifyTrend,
  dataQualityConfidence,
  orbitalUncertaintyConfidence,
  predictionQualityConfidence,
  weightedOverall,
} from './components.js';
import type { HealthReport, IndexedAlert, InputSample, PredictionSample, TrendReport } from './types.js';

export type { HealthReport, IndexedAlert, InputSample, PredictionSample, TrendReport } from './types.js';
export * from './components.js';

const log = logger.child({ module: 'confidence' });

const SYSTEM_SOURCE = 'system';

function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Trustworthiness session for one supervision host. Holds the bounded
 * snapshot history and the alert list; nothing is shared between instances.
 * Not reentrant: callers serialize `update` calls.
 */
export class ConfidenceSystem {
  private readonly config: SupervisionConfig;
  private readonly clock: () => Date;
  private readonly history: ConfidenceMetrics[] = [];
  private readonly alerts: Alert[] = [];

  constructor(config: SupervisionConfig = DEFAULT_SUPERVISION_CONFIG, clock: () => Date = () => new Date()) {
    this.config = config;
    this.clock = clock;
  }

  update(
    reports: readonly ValidationReport[],
    inputSample?: InputSample,
    predictionSample?: PredictionSample,
  ): ConfidenceMetrics {
    if (reports.length === 0) {
      log.debug('No validation reports, returning neutral snapshot');
      return this.defaultMetrics();
    }

    const physical = reports.filter((r) => !r.isNarrative);
    const narrative = reports.filter((r) => r.isNarrative);

    const components: ConfidenceComponents = {
      domainPhysical: physical.length > 0 ? mean(physical.map((r) => r.overallConfidence)) : 0,
      conceptualCoherence: narrative.length > 0 ? mean(narrative.map((r) => r.overallConfidence)) : 1.0,
      orbitalUncertainty: inputSample ? orbitalUncertaintyConfidence(inputSample) : DEFAULT_COMPONENTS.orbitalUncertainty,
      dataQuality: inputSample ? dataQualityConfidence(inputSample) : DEFAULT_COMPONENTS.dataQuality,
      predictionQuality: predictionSample
        ? predictionQualityConfidence(predictionSample)
        : DEFAULT_COMPONENTS.predictionQuality,
    };

    const overall = weightedOverall(components, this.config.weights);
    const window = this.history.slice(-this.config.trendWindow).map((m) => m.overall);

    const metrics: ConfidenceMetrics = Object.freeze({
      overall,
      ...components,
      trend: classifyTrend(window, this.config.trendDelta),
      alertLevel: classifyAlertLevel(overall, this.config.alertThresholds),
      timestamp: this.clock(),
    });

    this.history.push(metrics);
    while (this.history.length > this.config.historyCapacity) {
      this.history.shift();
    }

    this.raiseAlerts(metrics, reports);

    log.info(
      { overall, trend: metrics.trend, alertLevel: metrics.alertLevel, reportCount: reports.length },
      'Confidence updated',
    );

    return metrics;
  }

  shouldContinue(): boolean {
    if (this.alerts.some((a) => a.level === 'critical' && !a.resolved)) return false;

    const latest = this.getLatest();
    if (!latest) return true;

    return latest.overall >= this.config.alertThresholds.critical;
  }

  resolveAlert(index: number): boolean {
    const alert = this.alerts[index];
    if (alert === undefined) return false;

    this.alerts[index] = { ...alert, resolved: true };
    log.info({ index, level: alert.level }, 'Alert resolved');
    return true;
  }

  /** Every alert raised so far; positions match `resolveAlert` indices. */
  getAlerts(): readonly Alert[] {
    return [...this.alerts];
  }

  getActiveAlerts(): Alert[] {
    return this.alerts.filter((a) => !a.resolved);
  }

  getIndexedActiveAlerts(): IndexedAlert[] {
    return this.alerts.flatMap<IndexedAlert>((alert, index) => (alert.resolved ? [] : [{ ...alert, index }]));
  }

  getHistory(): readonly ConfidenceMetrics[] {
    return [...this.history];
  }

  getLatest(): ConfidenceMetrics | undefined {
    return this.history[this.history.length - 1];
  }

  getTrend(): TrendReport {
    const current = this.history[this.history.length - 1];
    const previous = this.history[this.history.length - 2];

    if (!current || !previous) {
      return { trend: 'insufficient_data', delta: 0, current: current?.overall ?? null, previous: null };
    }

    return {
      trend: current.trend,
      delta: current.overall - previous.overall,
      current: current.overall,
      previous: previous.overall,
    };
  }

  getHealthReport(): HealthReport {
    const latest = this.getLatest();
    const activeAlerts = this.getActiveAlerts().length;

    if (!latest) {
      return { status: 'no_data', confidence: 0, activeAlerts };
    }

    return {
      status: latest.alertLevel === 'low' ? 'healthy' : 'degraded',
      confidence: latest.overall,
      components: {
        domainPhysical: latest.domainPhysical,
        conceptualCoherence: latest.conceptualCoherence,
        orbitalUncertainty: latest.orbitalUncertainty,
        dataQuality: latest.dataQuality,
        predictionQuality: latest.predictionQuality,
      },
      trend: latest.trend,
      alertLevel: latest.alertLevel,
      activeAlerts,
      lastUpdated: latest.timestamp.toISOString(),
    };
  }

  private defaultMetrics(): ConfidenceMetrics {
    const metrics: ConfidenceMetrics = {
      overall: 0.5,
      ...DEFAULT_COMPONENTS,
      trend: 'stable',
      alertLevel: 'medium',
      timestamp: this.clock(),
    };
    return Object.freeze(metrics);
  }

  private raiseAlerts(metrics: ConfidenceMetrics, reports: readonly ValidationReport[]): void {
    const stageNames = new Set(reports.map((r) => r.stageName));
    const source = stageNames.size === 1 ? reports[0].stageName : SYSTEM_SOURCE;

    if (metrics.alertLevel === 'high' || metrics.alertLevel === 'critical') {
      this.pushAlert(metrics.alertLevel, `System confidence ${metrics.alertLevel}: ${metrics.overall.toFixed(2)}`, source);
    }

    if (metrics.trend === 'declining' && metrics.overall < this.config.alertThresholds.declining) {
      this.pushAlert('medium', `Declining confidence trend detected: ${metrics.overall.toFixed(2)}`, source);
    }

    const criticalErrors = reports.reduce((sum, r) => sum + r.errors().length, 0);
    if (criticalErrors > 0) {
      this.pushAlert('critical', `Critical validation errors detected: ${criticalErrors}`, source);
    }
  }

  private pushAlert(level: AlertLevel, message: string, stageName: string): void {
    this.alerts.push({ level, message, stageName, timestamp: this.clock(), resolved: false });
    log.warn({ level, stageName, alertIndex: this.alerts.length - 1 }, message);
  }
}

import { describe, it, expect } from 'vitest';
import type { Severity } from '../../src/domain/types.js';
import { DEFAULT_SUPERVISION_CONFIG, type SupervisionConfig } from '../../src/infrastructure/config.js';
import {
  ConfidenceSystem,
  classifyAlertLevel,
  classifyTrend,
  dataConsistency,
  dataQualityConfidence,
  orbitalUncertaintyConfidence,
  predictionQualityConfidence,
  summaryCompleteness,
  weightedOverall,
} from '../../src/services/confidence/index.js';
import { ValidationReport, createValidationResult } from '../../src/services/validation/report.js';

const words = (n: number) => Array.from({ length: n }, (_, i) => `w${i}`).join(' ');

describe('orbitalUncertaintyConfidence', () => {
  it('scores the diameter spread', () => {
    expect(orbitalUncertaintyConfidence({ diameter_min: 1, diameter_max: 1.5 })).toBe(0.5);
  });

  it('floors wide spreads at 0.1', () => {
    expect(orbitalUncertaintyConfidence({ diameter_min: 1, diameter_max: 10 })).toBe(0.1);
  });

  it('adjusts for bright and faint objects', () => {
    expect(orbitalUncertaintyConfidence({ diameter_min: 1, diameter_max: 1.5, absolute_magnitude_h: 10 })).toBeCloseTo(0.55);
    expect(orbitalUncertaintyConfidence({ diameter_min: 1, diameter_max: 1.5, absolute_magnitude_h: 30 })).toBeCloseTo(0.4);
  });

  it('caps the bright bonus at 1', () => {
    expect(orbitalUncertaintyConfidence({ diameter_min: 1, diameter_max: 1, absolute_magnitude_h: 10 })).toBe(1);
  });

  it('is neutral without usable diameters', () => {
    expect(orbitalUncertaintyConfidence({})).toBe(0.5);
    expect(orbitalUncertaintyConfidence({ diameter_min: 0, diameter_max: 1 })).toBe(0.5);
    expect(orbitalUncertaintyConfidence({ diameter_min: '1', diameter_max: 2 })).toBe(0.5);
  });
});

describe('dataConsistency', () => {
  it('tops out at 2/3 for a consistent record', () => {
    const sample = { diameter_min: 1, diameter_max: 2, absolute_magnitude_h: 20, orbital_data: { eccentricity: 0.3 } };
    expect(dataConsistency(sample)).toBeCloseTo(2 / 3);
  });

  it('scores plausible and unknown magnitude and eccentricity alike', () => {
    const known = { diameter_min: 1, diameter_max: 2, absolute_magnitude_h: 20, orbital_data: { eccentricity: 0.3 } };
    expect(dataConsistency({ diameter_min: 1, diameter_max: 2 })).toBe(dataConsistency(known));
  });

  it('penalizes inverted diameters and implausible magnitudes', () => {
    const sample = { diameter_min: 2, diameter_max: 1, absolute_magnitude_h: 40 };
    expect(dataConsistency(sample)).toBeCloseTo((0 + 0.2 + 0.5) / 3);
  });
});

describe('dataQualityConfidence', () => {
  it('is capped by the consistency share for a complete record', () => {
    const sample = {
      id: 'test-1',
      name: 'Test Object',
      diameter_min: 1,
      diameter_max: 2,
      absolute_magnitude_h: 20,
      orbital_data: { eccentricity: 0.3, inclination: 5, semi_major_axis: 1.2 },
    };
    expect(dataQualityConfidence(sample)).toBeCloseTo(0.4 + 0.4 + 0.2 * (2 / 3));
  });

  it('only keeps the neutral consistency share for an empty record', () => {
    expect(dataQualityConfidence({})).toBeCloseTo(0.1);
  });
});

describe('summaryCompleteness', () => {
  it('buckets by word count', () => {
    expect(summaryCompleteness(words(21))).toBe(1);
    expect(summaryCompleteness(words(11))).toBe(0.7);
    expect(summaryCompleteness(words(6))).toBe(0.4);
    expect(summaryCompleteness(words(5))).toBe(0.1);
    expect(summaryCompleteness(undefined)).toBe(0.1);
  });
});

describe('predictionQualityConfidence', () => {
  it('uses neutral defaults for an empty prediction', () => {
    expect(predictionQualityConfidence({})).toBeCloseTo(0.32);
  });

  it('rewards a confident, complete prediction', () => {
    expect(predictionQualityConfidence({ confidence_level: 0.9, summary: words(21) })).toBeCloseTo(0.95);
  });

  it('clamps the self-reported confidence', () => {
    expect(predictionQualityConfidence({ confidence_level: 3, summary: words(21) })).toBeCloseTo(1);
  });
});

describe('weightedOverall', () => {
  const weights = DEFAULT_SUPERVISION_CONFIG.weights;

  it('blends components by weight', () => {
    const overall = weightedOverall(
      { domainPhysical: 1, conceptualCoherence: 1, orbitalUncertainty: 0.5, dataQuality: 0.5, predictionQuality: 0.6 },
      weights,
    );
    expect(overall).toBeCloseTo(0.765);
  });

  it('clamps out-of-range components', () => {
    const overall = weightedOverall(
      { domainPhysical: 2, conceptualCoherence: -1, orbitalUncertainty: 0, dataQuality: 0, predictionQuality: 0 },
      weights,
    );
    expect(overall).toBeCloseTo(0.3);
  });
});

describe('classifyTrend', () => {
  it('is stable with fewer than two values', () => {
    expect(classifyTrend([], 0.05)).toBe('stable');
    expect(classifyTrend([0.9], 0.05)).toBe('stable');
  });

  it('treats a delta of exactly the threshold as stable', () => {
    expect(classifyTrend([0.5, 0.55], 0.05)).toBe('stable');
    expect(classifyTrend([0.55, 0.5], 0.05)).toBe('stable');
  });

  it('detects movement just beyond the threshold', () => {
    expect(classifyTrend([0.5, 0.5501], 0.05)).toBe('improving');
    expect(classifyTrend([0.55, 0.4999], 0.05)).toBe('declining');
  });

  it('gives the extra value of an odd window to the second half', () => {
    expect(classifyTrend([0.2, 0.5, 0.6], 0.05)).toBe('improving');
    expect(classifyTrend([0.9, 0.5, 0.6], 0.05)).toBe('declining');
  });
});

describe('classifyAlertLevel', () => {
  const thresholds = DEFAULT_SUPERVISION_CONFIG.alertThresholds;

  it('uses half-open bands', () => {
    expect(classifyAlertLevel(0.29, thresholds)).toBe('critical');
    expect(classifyAlertLevel(0.3, thresholds)).toBe('high');
    expect(classifyAlertLevel(0.5, thresholds)).toBe('medium');
    expect(classifyAlertLevel(0.7, thresholds)).toBe('low');
  });
});

// Only the physical component counts, so overall equals the report confidence.
const physicalOnly: SupervisionConfig = {
  ...DEFAULT_SUPERVISION_CONFIG,
  weights: { domainPhysical: 1, conceptualCoherence: 0, orbitalUncertainty: 0, dataQuality: 0, predictionQuality: 0 },
};

const FIXED_TIME = new Date('2026-01-01T00:00:00.000Z');

function report(confidence: number, severity: Severity = 'warning', stageName = 'trajectory'): ValidationReport {
  return new ValidationReport(stageName, 'PhysicalValidator', 'physical').add(
    createValidationResult({ severity, message: 'check', confidence }),
  );
}

function system(config: SupervisionConfig = physicalOnly): ConfidenceSystem {
  return new ConfidenceSystem(config, () => FIXED_TIME);
}

describe('ConfidenceSystem.update', () => {
  it('returns a neutral snapshot for no reports without storing it', () => {
    const confidence = system();
    const metrics = confidence.update([]);
    expect(metrics.overall).toBe(0.5);
    expect(metrics.alertLevel).toBe('medium');
    expect(metrics.trend).toBe('stable');
    expect(metrics.predictionQuality).toBe(0.6);
    expect(confidence.getHistory()).toHaveLength(0);
    expect(confidence.getAlerts()).toHaveLength(0);
  });

  it('uses neutral components when no samples are given', () => {
    const metrics = system(DEFAULT_SUPERVISION_CONFIG).update([report(1, 'success')]);
    expect(metrics.domainPhysical).toBe(1);
    expect(metrics.conceptualCoherence).toBe(1);
    expect(metrics.orbitalUncertainty).toBe(0.5);
    expect(metrics.dataQuality).toBe(0.5);
    expect(metrics.predictionQuality).toBe(0.6);
    expect(metrics.overall).toBeCloseTo(0.765);
    expect(metrics.alertLevel).toBe('low');
  });

  it('splits physical and narrative reports', () => {
    const narrative = new ValidationReport('explainer', 'CoherenceValidator', 'coherence').add(
      createValidationResult({ severity: 'warning', message: 'coherence', confidence: 0.4 }),
    );
    const metrics = system().update([report(0.8), report(0.6), narrative]);
    expect(metrics.domainPhysical).toBeCloseTo(0.7);
    expect(metrics.conceptualCoherence).toBe(0.4);
  });

  it('scores only narrative reports with zero physical confidence', () => {
    const narrative = new ValidationReport('explainer', 'CoherenceValidator', 'coherence').add(
      createValidationResult({ severity: 'success', message: 'coherence', confidence: 0.9 }),
    );
    expect(system().update([narrative]).domainPhysical).toBe(0);
  });

  it('derives data and prediction components from samples', () => {
    const metrics = system().update([report(1)], { diameter_min: 1, diameter_max: 1.5 }, { confidence_level: 0.9 });
    expect(metrics.orbitalUncertainty).toBe(0.5);
    expect(metrics.predictionQuality).toBeCloseTo(0.45 + 0.15 + 0.02);
  });

  it('stamps snapshots with the injected clock', () => {
    expect(system().update([report(0.9)]).timestamp).toBe(FIXED_TIME);
  });

  it('evicts the oldest snapshot beyond capacity', () => {
    const confidence = system({ ...physicalOnly, historyCapacity: 3 });
    for (const value of [0.91, 0.92, 0.93, 0.94, 0.95]) confidence.update([report(value)]);
    expect(confidence.getHistory().map((m) => m.overall)).toEqual([0.93, 0.94, 0.95]);
  });

  it('computes the trend from snapshots stored before the update', () => {
    const confidence = system();
    confidence.update([report(0.9)]);
    confidence.update([report(0.8)]);
    const metrics = confidence.update([report(0.95)]);
    expect(metrics.trend).toBe('declining');
  });

  it('treats an exact threshold move as stable', () => {
    const confidence = system();
    confidence.update([report(0.5)]);
    confidence.update([report(0.55)]);
    expect(confidence.update([report(0.9)]).trend).toBe('stable');
  });
});

describe('ConfidenceSystem alerts', () => {
  it('raises a level alert and a critical-errors alert', () => {
    const confidence = system();
    confidence.update([report(0.2, 'critical', 'impact_analyzer')]);
    expect(confidence.getAlerts().map((a) => [a.level, a.message, a.stageName])).toEqual([
      ['critical', 'System confidence critical: 0.20', 'impact_analyzer'],
      ['critical', 'Critical validation errors detected: 1', 'impact_analyzer'],
    ]);
  });

  it('raises a high alert below the high threshold', () => {
    const confidence = system();
    confidence.update([report(0.4)]);
    expect(confidence.getAlerts().map((a) => a.message)).toEqual(['System confidence high: 0.40']);
  });

  it('attributes alerts from several stages to the system', () => {
    const confidence = system();
    confidence.update([report(0.2, 'warning', 'trajectory'), report(0.2, 'warning', 'impact_analyzer')]);
    expect(confidence.getAlerts()[0].stageName).toBe('system');
  });

  it('raises a declining alert below the declining threshold', () => {
    const confidence = system();
    confidence.update([report(0.9)]);
    confidence.update([report(0.6)]);
    confidence.update([report(0.75)]);
    expect(confidence.getAlerts().map((a) => [a.level, a.message])).toEqual([
      ['medium', 'Declining confidence trend detected: 0.75'],
    ]);
  });

  it('resolves alerts by index', () => {
    const confidence = system();
    confidence.update([report(0.6)]);
    confidence.update([report(0.3)]);
    confidence.update([report(0.2, 'critical')]);
    expect(confidence.getActiveAlerts()).toHaveLength(4);

    expect(confidence.resolveAlert(0)).toBe(true);
    expect(confidence.getAlerts()[0].resolved).toBe(true);
    expect(confidence.getActiveAlerts()).toHaveLength(3);
  });

  it('lists active alerts with their position in the alert log', () => {
    const confidence = system();
    confidence.update([report(0.6)]);
    confidence.update([report(0.3)]);
    confidence.update([report(0.2, 'critical')]);
    confidence.resolveAlert(0);
    confidence.resolveAlert(2);

    expect(confidence.getIndexedActiveAlerts().map((a) => [a.index, a.message])).toEqual([
      [1, 'System confidence critical: 0.20'],
      [3, 'Critical validation errors detected: 1'],
    ]);
  });

  it('returns false for an unknown alert index', () => {
    expect(system().resolveAlert(0)).toBe(false);
  });
});

describe('ConfidenceSystem.shouldContinue', () => {
  it('continues without history', () => {
    expect(system().shouldContinue()).toBe(true);
  });

  it('stops while a critical alert is unresolved', () => {
    const confidence = system();
    confidence.update([
      new ValidationReport('trajectory', 'PhysicalValidator', 'physical').addAll([
        createValidationResult({ severity: 'critical', message: 'bad', confidence: 0 }),
        createValidationResult({ severity: 'success', message: 'ok', confidence: 1 }),
        createValidationResult({ severity: 'success', message: 'ok', confidence: 1 }),
        createValidationResult({ severity: 'success', message: 'ok', confidence: 1 }),
      ]),
    ]);
    expect(confidence.getAlerts().map((a) => a.message)).toEqual(['Critical validation errors detected: 1']);
    expect(confidence.shouldContinue()).toBe(false);

    confidence.resolveAlert(0);
    expect(confidence.shouldContinue()).toBe(true);
  });

  it('stops when the latest confidence is below the critical threshold', () => {
    const confidence = system();
    confidence.update([report(0.2)]);
    confidence.getAlerts().forEach((_, i) => confidence.resolveAlert(i));
    expect(confidence.shouldContinue()).toBe(false);
  });
});

describe('ConfidenceSystem reporting', () => {
  it('reports insufficient data for fewer than two snapshots', () => {
    const confidence = system();
    expect(confidence.getTrend()).toEqual({ trend: 'insufficient_data', delta: 0, current: null, previous: null });
    confidence.update([report(0.8)]);
    expect(confidence.getTrend()).toEqual({ trend: 'insufficient_data', delta: 0, current: 0.8, previous: null });
  });

  it('reports the delta between the last two snapshots', () => {
    const confidence = system();
    confidence.update([report(0.75)]);
    confidence.update([report(1)]);
    expect(confidence.getTrend()).toEqual({ trend: 'stable', delta: 0.25, current: 1, previous: 0.75 });
  });

  it('reports no data before any update', () => {
    expect(system().getHealthReport()).toEqual({ status: 'no_data', confidence: 0, activeAlerts: 0 });
  });

  it('reports healthy at a low alert level', () => {
    const confidence = system();
    confidence.update([report(0.9)]);
    const health = confidence.getHealthReport();
    expect(health.status).toBe('healthy');
    expect(health.confidence).toBe(0.9);
    expect(health.activeAlerts).toBe(0);
    if (health.status !== 'no_data') {
      expect(health.lastUpdated).toBe('2026-01-01T00:00:00.000Z');
      expect(health.components.domainPhysical).toBe(0.9);
    }
  });

  it('reports degraded otherwise', () => {
    const confidence = system();
    confidence.update([report(0.6)]);
    expect(confidence.getHealthReport().status).toBe('degraded');
  });
});

import { ValidatorFault } from '../../domain/errors.js';
import type { StageOutput, ValidationResult } from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';
import {
  AUDIENCE_SCORES,
  DEFAULT_AUDIENCE_SCORE,
  FEASIBILITY_SCORES,
  OVERCLAIMING_TERMS,
  TECHNICAL_TERMS,
  VISUALIZATION_DESCRIPTORS,
  findStrategy,
} from './knowledge-base.js';
import { createValidationResult, ValidationReport } from './report.js';
import type { Validator, ValidatorContext } from './types.js';
import { isRecord, readList, readRecord } from './validator.js';

const log = logger.child({ module: 'coherence-validator' });

export const COHERENCE_THRESHOLDS = {
  technicalCoherence: 0.7,
  scientificAccuracy: 0.8,
  audienceAdaptation: 0.6,
  technicalFeasibility: 0.5,
  scaleCoherence: 0.8,
  representativeness: 0.7,
  generalCoherence: 0.7,
} as const;

const BASE_SCIENTIFIC_ACCURACY = 0.85;
const OVERCLAIM_PENALTY = 0.1;

/**
 * Scores narrative output (explanations, mitigation plans, visualization
 * descriptors) against a small reference knowledge base. Reports from this
 * validator feed the conceptual-coherence confidence component.
 */
export class CoherenceValidator implements Validator {
  readonly name = 'CoherenceValidator';
  readonly kind = 'coherence' as const;
  readonly description = 'Scores narrative output for coherence, accuracy and audience fit';

  validate(output: StageOutput, context: ValidatorContext): ValidationReport {
    const report = new ValidationReport(context.stageName, this.name, this.kind);

    switch (context.stageType) {
      case 'explanation':
        report.addAll(this.checkExplanation(output));
        break;
      case 'mitigation':
        report.addAll(this.checkMitigationStrategies(output));
        break;
      case 'visualization':
        report.addAll(this.checkVisualization(output));
        break;
      default:
        report.addAll(this.checkGeneralContent(output));
        break;
    }

    log.debug(
      { stageName: context.stageName, stageType: context.stageType, confidence: report.overallConfidence },
      'Coherence validation completed',
    );

    return report;
  }

  private checkExplanation(data: StageOutput): ValidationResult[] {
    const text = data.explanation_text;
    if (text === undefined || text === null) {
      return [missing('explanation_text', 'Explanation text not found')];
    }
    if (typeof text !== 'string') {
      throw new ValidatorFault("Expected a string at 'explanation_text'", 'explanation_text');
    }

    const audience = typeof data.target_audience === 'string' ? data.target_audience : 'general';

    return [
      scored(
        'technical_coherence',
        technicalCoherence(text),
        COHERENCE_THRESHOLDS.technicalCoherence,
        'Technical coherence high',
        'Technical coherence low',
      ),
      scored(
        'audience_adaptation',
        audienceAdaptation(audience),
        COHERENCE_THRESHOLDS.audienceAdaptation,
        'Audience adaptation adequate',
        'Audience adaptation inadequate',
      ),
      scored(
        'scientific_accuracy',
        scientificAccuracy(text),
        COHERENCE_THRESHOLDS.scientificAccuracy,
        'Scientific accuracy high',
        'Scientific accuracy low',
      ),
    ];
  }

  private checkMitigationStrategies(data: StageOutput): ValidationResult[] {
    const strategies = readList(data, 'strategies');
    if (!strategies) {
      return [missing('strategies', 'Mitigation strategies not found')];
    }

    return strategies.map((strategy, i) => {
      const name = isRecord(strategy) && typeof strategy.name === 'string' ? strategy.name : `strategy_${i}`;
      const known = findStrategy(name);

      if (!known) {
        return createValidationResult({
          severity: 'warning',
          message: `Strategy ${name} not found in the knowledge base`,
          field: `strategy_${i}_unknown`,
          observed: name,
          confidence: 0.3,
        });
      }

      const feasibility = FEASIBILITY_SCORES[known.feasibility];
      const feasible = feasibility >= COHERENCE_THRESHOLDS.technicalFeasibility;
      return createValidationResult({
        severity: feasible ? 'success' : 'warning',
        message: feasible
          ? `Strategy ${name} is technically feasible`
          : `Strategy ${name} has questionable feasibility`,
        field: `strategy_${i}_feasibility`,
        observed: known.feasibility,
        confidence: feasibility,
      });
    });
  }

  private checkVisualization(data: StageOutput): ValidationResult[] {
    const viz = readRecord(data, 'visualization_data');
    if (!viz) {
      return [missing('visualization_data', 'Visualization data not found')];
    }

    return [
      scored(
        'scale_coherence',
        scaleCoherence(viz.scale),
        COHERENCE_THRESHOLDS.scaleCoherence,
        'Scale coherence high',
        'Scale coherence low',
      ),
      scored(
        'scientific_representativeness',
        representativeness(viz),
        COHERENCE_THRESHOLDS.representativeness,
        'Scientific representativeness high',
        'Scientific representativeness low',
      ),
    ];
  }

  private checkGeneralContent(data: StageOutput): ValidationResult[] {
    if (typeof data.content !== 'string') return [];
    return [
      scored(
        'general_coherence',
        technicalCoherence(data.content),
        COHERENCE_THRESHOLDS.generalCoherence,
        'General coherence',
        'General coherence',
      ),
    ];
  }
}

function missing(field: string, message: string): ValidationResult {
  return createValidationResult({ severity: 'critical', message, field, confidence: 0.0 });
}

function scored(field: string, score: number, threshold: number, passMessage: string, failMessage: string): ValidationResult {
  const passed = score >= threshold;
  return createValidationResult({
    severity: passed ? 'success' : 'warning',
    message: `${passed ? passMessage : failMessage}: ${score.toFixed(2)}`,
    field,
    confidence: score,
  });
}

/** Share of the reference technical vocabulary that appears in the text. */
export function technicalCoherence(text: string): number {
  const lower = text.toLowerCase();
  const found = TECHNICAL_TERMS.filter((term) => lower.includes(term)).length;
  return Math.min(found / TECHNICAL_TERMS.length, 1.0);
}

export function audienceAdaptation(audience: string): number {
  return AUDIENCE_SCORES.get(audience) ?? DEFAULT_AUDIENCE_SCORE;
}

export function scientificAccuracy(text: string): number {
  const lower = text.toLowerCase();
  const overclaims = OVERCLAIMING_TERMS.filter((term) => lower.includes(term)).length;
  return Math.max(0, BASE_SCIENTIFIC_ACCURACY - OVERCLAIM_PENALTY * overclaims);
}

export function scaleCoherence(scale: unknown): number {
  if (scale === undefined || scale === null) return 0.6;
  if (typeof scale === 'number' && Number.isFinite(scale) && scale > 0) return 0.9;
  return 0.3;
}

export function representativeness(viz: Readonly<Record<string, unknown>>): number {
  const present = VISUALIZATION_DESCRIPTORS.filter((key) => viz[key] !== undefined && viz[key] !== null).length;
  return 0.4 + 0.6 * (present / VISUALIZATION_DESCRIPTORS.length);
}

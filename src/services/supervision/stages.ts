import type { StageType } from '../../domain/types.js';
import type { RunComponent, StageDefinition } from './types.js';

export const STAGE_DEFINITIONS: readonly StageDefinition[] = [
  { stageName: 'data_collector', stageType: 'data_collection', validators: ['completeness'] },
  { stageName: 'trajectory', stageType: 'trajectory', validators: ['physical'] },
  { stageName: 'impact_analyzer', stageType: 'impact', validators: ['physical'] },
  { stageName: 'mitigation', stageType: 'mitigation', validators: ['physical', 'coherence'] },
  { stageName: 'visualization', stageType: 'visualization', validators: ['completeness', 'coherence'] },
  { stageName: 'ml_predictor', stageType: 'ml', validators: ['completeness'] },
  { stageName: 'explainer', stageType: 'explanation', validators: ['completeness', 'coherence'] },
];

/** Order in which a run's stage outputs are supervised. */
export const RUN_COMPONENTS: readonly RunComponent[] = [
  { field: 'asteroidData', stageName: 'data_collector', dataType: 'asteroid' },
  { field: 'trajectoryAnalysis', stageName: 'trajectory', dataType: 'trajectory' },
  { field: 'impactAnalysis', stageName: 'impact_analyzer', dataType: 'impact' },
  { field: 'mitigationAnalysis', stageName: 'mitigation', dataType: 'mitigation' },
  { field: 'visualizationData', stageName: 'visualization', dataType: 'visualization' },
  { field: 'mlPredictions', stageName: 'ml_predictor', dataType: 'ml' },
  { field: 'explanationData', stageName: 'explainer', dataType: 'explanation' },
];

export const STAGE_GUIDANCE: Record<StageType, readonly string[]> = {
  data_collection: ['Check connectivity with external data sources', 'Validate the format of received data'],
  trajectory: ['Verify astronomical constants', 'Validate energy conservation'],
  impact: ['Verify impact energy calculations', 'Validate physical value ranges'],
  mitigation: ['Verify strategy feasibility', 'Validate cost-benefit calculations'],
  visualization: ['Verify visualization data integrity', 'Validate coordinate ranges'],
  ml: ['Verify training data quality', 'Validate prediction ranges'],
  explanation: ['Verify language coherence', 'Validate audience adaptation'],
  unknown: [],
};

export { Supervisor } from './supervisor.js';
export type { SupervisorOptions } from './supervisor.js';
export { StageSupervisor } from './stage-supervisor.js';
export type { StageSupervisorOptions } from './stage-supervisor.js';
export { STAGE_DEFINITIONS, RUN_COMPONENTS, STAGE_GUIDANCE } from './stages.js';
export { decideRecommendation, stageRecommendations, runRecommendations } from './recommendations.js';
export type {
  Finding,
  RunComponent,
  RunStages,
  RunState,
  RunSupervision,
  StageDefinition,
  StagePerformance,
  StageSupervision,
  StageSupervisionResult,
  SupervisorStatus,
} from './types.js';

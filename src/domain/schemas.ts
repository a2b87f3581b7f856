import { z } from 'zod';
import { STAGE_TYPES } from './types.js';

export const stageTypeSchema = z.enum(STAGE_TYPES);

const stageRecord = z.record(z.string(), z.unknown());

export const stageContextInput = z
  .object({
    stageType: stageTypeSchema.optional(),
    runId: z.string().min(1).optional(),
    dataType: z.string().min(1).optional(),
  })
  .passthrough();

export const superviseStageInput = z.object({
  output: stageRecord,
  context: stageContextInput.optional(),
});

export const runStateInput = z.object({
  runId: z.string().min(1).optional(),
  asteroidData: stageRecord.optional(),
  trajectoryAnalysis: stageRecord.optional(),
  impactAnalysis: stageRecord.optional(),
  mitigationAnalysis: stageRecord.optional(),
  visualizationData: stageRecord.optional(),
  mlPredictions: stageRecord.optional(),
  explanationData: stageRecord.optional(),
});

export const alertIndexParam = z.coerce.number().int().min(0);

export type StageContextInput = z.infer<typeof stageContextInput>;
export type SuperviseStageInput = z.infer<typeof superviseStageInput>;
export type RunStateInput = z.infer<typeof runStateInput>;

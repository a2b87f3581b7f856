import { z } from 'zod';

const unitInterval = z.coerce.number().min(0).max(1);

/**
 * Weights of the five confidence components. They must add up to 1 so the
 * overall score stays in [0, 1].
 */
export const confidenceWeightsSchema = z
  .object({
    domainPhysical: unitInterval.default(0.3),
    conceptualCoherence: unitInterval.default(0.2),
    orbitalUncertainty: unitInterval.default(0.2),
    dataQuality: unitInterval.default(0.15),
    predictionQuality: unitInterval.default(0.15),
  })
  .refine(
    (w) =>
      Math.abs(
        w.domainPhysical + w.conceptualCoherence + w.orbitalUncertainty + w.dataQuality + w.predictionQuality - 1,
      ) < 1e-9,
    { message: 'Confidence weights must sum to 1' },
  );
export type ConfidenceWeights = z.infer<typeof confidenceWeightsSchema>;

/**
 * Overall-confidence cut points. Below `critical` the alert level is critical,
 * below `high` it is high, below `medium` it is medium. A declining trend
 * raises an alert while overall confidence is below `declining`.
 */
export const alertThresholdsSchema = z
  .object({
    critical: unitInterval.default(0.3),
    high: unitInterval.default(0.5),
    medium: unitInterval.default(0.7),
    declining: unitInterval.default(0.8),
  })
  .refine((t) => t.critical <= t.high && t.high <= t.medium, {
    message: 'Alert thresholds must satisfy critical <= high <= medium',
  });
export type AlertThresholds = z.infer<typeof alertThresholdsSchema>;

export const supervisionConfigSchema = z.object({
  weights: confidenceWeightsSchema.default({}),
  alertThresholds: alertThresholdsSchema.default({}),
  /** Stored confidence snapshots before the oldest is evicted */
  historyCapacity: z.coerce.number().int().positive().default(100),
  /** Supervision outcomes kept per stage */
  stageHistoryCapacity: z.coerce.number().int().positive().default(50),
  /** Stored snapshots compared when classifying the trend */
  trendWindow: z.coerce.number().int().min(2).default(5),
  trendDelta: z.coerce.number().min(0).max(1).default(0.05),
  runValidThreshold: unitInterval.default(0.7),
  investigateThreshold: unitInterval.default(0.6),
});
export type SupervisionConfig = z.infer<typeof supervisionConfigSchema>;

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export const appConfigSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(3000),
  logLevel: logLevelSchema.default('info'),
  supervision: supervisionConfigSchema.default({}),
});
export type AppConfig = z.infer<typeof appConfigSchema>;

export const DEFAULT_SUPERVISION_CONFIG: SupervisionConfig = supervisionConfigSchema.parse({});

/**
 * Load and validate configuration from environment variables
 *
 * @param env - Environment variables (defaults to process.env)
 * @throws Error if validation fails
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rawConfig = {
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    supervision: {
      weights: {
        domainPhysical: env.CONFIDENCE_WEIGHT_DOMAIN_PHYSICAL,
        conceptualCoherence: env.CONFIDENCE_WEIGHT_CONCEPTUAL_COHERENCE,
        orbitalUncertainty: env.CONFIDENCE_WEIGHT_ORBITAL_UNCERTAINTY,
        dataQuality: env.CONFIDENCE_WEIGHT_DATA_QUALITY,
        predictionQuality: env.CONFIDENCE_WEIGHT_PREDICTION_QUALITY,
      },
      alertThresholds: {
        critical: env.ALERT_THRESHOLD_CRITICAL,
        high: env.ALERT_THRESHOLD_HIGH,
        medium: env.ALERT_THRESHOLD_MEDIUM,
        declining: env.ALERT_THRESHOLD_DECLINING,
      },
      historyCapacity: env.CONFIDENCE_HISTORY_CAPACITY,
      stageHistoryCapacity: env.STAGE_HISTORY_CAPACITY,
      trendWindow: env.TREND_WINDOW,
      trendDelta: env.TREND_DELTA,
      runValidThreshold: env.RUN_VALID_THRESHOLD,
      investigateThreshold: env.INVESTIGATE_THRESHOLD,
    },
  };

  const result = appConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `  - ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed:\n${errors}`);
  }

  return result.data;
}

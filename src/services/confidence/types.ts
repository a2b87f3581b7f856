import type { Alert, AlertLevel, ConfidenceComponents, Trend } from '../../domain/types.js';

/** Raw asteroid record from the data-collection stage */
export type InputSample = Readonly<Record<string, unknown>>;

/** Narrative or ML prediction record carrying `summary` and `confidence_level` */
export type PredictionSample = Readonly<Record<string, unknown>>;

export type TrendReport =
  | { trend: 'insufficient_data'; delta: 0; current: number | null; previous: null }
  | { trend: Trend; delta: number; current: number; previous: number };

export type HealthReport =
  | { status: 'no_data'; confidence: 0; activeAlerts: number }
  | {
      status: 'healthy' | 'degraded';
      confidence: number;
      components: ConfidenceComponents;
      trend: Trend;
      alertLevel: AlertLevel;
      activeAlerts: number;
      lastUpdated: string;
    };

/** An alert together with its position in the alert log, as `resolveAlert` expects it */
export type IndexedAlert = Alert & { index: number };

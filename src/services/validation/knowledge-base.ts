export type Feasibility = 'high' | 'medium' | 'low';

export interface KnownStrategy {
  name: string;
  feasibility: Feasibility;
}

export const MITIGATION_STRATEGIES: readonly KnownStrategy[] = [
  { name: 'kinetic_impactor', feasibility: 'high' },
  { name: 'gravity_tractor', feasibility: 'medium' },
  { name: 'nuclear_deflection', feasibility: 'low' },
];

export const FEASIBILITY_SCORES: Record<Feasibility, number> = {
  high: 0.9,
  medium: 0.6,
  low: 0.3,
};

export const TECHNICAL_TERMS = ['asteroid', 'orbit', 'impact', 'energy', 'velocity', 'gravity'] as const;

/** Phrases that state certainty a hazard assessment cannot have */
export const OVERCLAIMING_TERMS = [
  'certainly',
  'definitely',
  'guaranteed',
  'without any doubt',
  'impossible',
  '100%',
] as const;

export const AUDIENCE_SCORES: ReadonlyMap<string, number> = new Map([
  ['general', 0.8],
  ['scientific', 0.9],
]);

export const DEFAULT_AUDIENCE_SCORE = 0.7;

export const VISUALIZATION_DESCRIPTORS = ['trajectory_points', 'impact_zone', 'legend'] as const;

export function findStrategy(name: string): KnownStrategy | undefined {
  return MITIGATION_STRATEGIES.find((s) => s.name === name);
}

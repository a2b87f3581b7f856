import { logger } from '../../infrastructure/logger.js';
import type { StageOutput, ValidationResult } from '../../domain/types.js';
import { createValidationResult, ValidationReport } from './report.js';
import type { RangeRule, Validator, ValidatorContext } from './types.js';
import { checkRange, isRecord, readList, readNumber, readRecord } from './validator.js';

const log = logger.child({ module: 'physical-validator' });

export const PHYSICAL_RANGES = {
  orbital_period: { min: 0.1, max: 1000, unit: 'years' },
  eccentricity: { min: 0, max: 0.999, exclusiveMax: true },
  inclination: { min: 0, max: 180, unit: 'deg' },
  semi_major_axis: { min: 0.1, max: 100, unit: 'AU' },
  orbital_velocity: { min: 1e3, max: 1e5, unit: 'm/s' },
  total_energy_joules: { min: 1e12, max: 1e25, unit: 'J' },
  total_energy_mt_tnt: { min: 0.001, max: 10000, unit: 'MT TNT' },
  crater_diameter_km: { min: 0.1, max: 1000, unit: 'km' },
  seismic_magnitude: { min: 0, max: 10, unit: 'Richter' },
  max_wave_height_m: { min: 0, max: 1000, unit: 'm' },
  strategy_effectiveness: { min: 0, max: 1 },
} as const satisfies Record<string, RangeRule>;

export const ENERGY_CONSERVATION_TOLERANCE = 0.01;
export const KEPLER_TOLERANCE = 0.1;

type Fields = Readonly<Record<string, unknown>>;

export class PhysicalValidator implements Validator {
  readonly name = 'PhysicalValidator';
  readonly kind = 'physical' as const;
  readonly description = 'Checks orbital and impact quantities against physical ranges and conservation laws';

  validate(output: StageOutput, context: ValidatorContext): ValidationReport {
    const report = new ValidationReport(context.stageName, this.name, this.kind);

    report.addAll(scanNonFinite(output));

    switch (context.stageType) {
      case 'trajectory':
        report.addAll(this.checkTrajectory(output));
        break;
      case 'impact':
        report.addAll(this.checkImpact(output));
        break;
      case 'mitigation':
        report.addAll(this.checkMitigation(output));
        break;
      default:
        break;
    }

    log.debug(
      { stageName: context.stageName, stageType: context.stageType, checks: report.count },
      'Physical validation completed',
    );

    return report;
  }

  private checkTrajectory(data: Fields): ValidationResult[] {
    const results: ValidationResult[] = [];
    const elements = readRecord(data, 'orbital_elements');
    const semiMajorAxis = elements
      ? readNumber(elements, 'semi_major_axis', 'orbital_elements.semi_major_axis')
      : undefined;

    if (elements) {
      pushRange(results, semiMajorAxis, PHYSICAL_RANGES.semi_major_axis, 'semi_major_axis');
      pushRange(results, readNumber(elements, 'eccentricity', 'orbital_elements.eccentricity'), PHYSICAL_RANGES.eccentricity, 'eccentricity');
      pushRange(results, readNumber(elements, 'inclination', 'orbital_elements.inclination'), PHYSICAL_RANGES.inclination, 'inclination');
    }

    const period = readNumber(data, 'orbital_period');
    pushRange(results, period, PHYSICAL_RANGES.orbital_period, 'orbital_period');
    pushRange(results, readNumber(data, 'orbital_velocity'), PHYSICAL_RANGES.orbital_velocity, 'orbital_velocity');

    const energy = readRecord(data, 'energy_analysis');
    if (energy) {
      const conservation = checkEnergyConservation(energy);
      if (conservation) results.push(conservation);
    }

    const kepler = checkKeplerThirdLaw(period, semiMajorAxis);
    if (kepler) results.push(kepler);

    return results;
  }

  private checkImpact(data: Fields): ValidationResult[] {
    const results: ValidationResult[] = [];

    const energy = readRecord(data, 'impact_energy');
    if (energy) {
      pushRange(results, readNumber(energy, 'total_energy_joules', 'impact_energy.total_energy_joules'), PHYSICAL_RANGES.total_energy_joules, 'total_energy_joules');
      pushRange(results, readNumber(energy, 'total_energy_mt_tnt', 'impact_energy.total_energy_mt_tnt'), PHYSICAL_RANGES.total_energy_mt_tnt, 'total_energy_mt_tnt');
    }

    const crater = readRecord(data, 'crater_analysis');
    if (crater) {
      pushRange(results, readNumber(crater, 'diameter_km', 'crater_analysis.diameter_km'), PHYSICAL_RANGES.crater_diameter_km, 'crater_diameter_km');
    }

    const seismic = readRecord(data, 'seismic_effects');
    if (seismic) {
      pushRange(results, readNumber(seismic, 'magnitude', 'seismic_effects.magnitude'), PHYSICAL_RANGES.seismic_magnitude, 'seismic_magnitude');
    }

    const tsunami = readRecord(data, 'tsunami_effects');
    if (tsunami) {
      pushRange(results, readNumber(tsunami, 'max_wave_height_m', 'tsunami_effects.max_wave_height_m'), PHYSICAL_RANGES.max_wave_height_m, 'max_wave_height_m');
    }

    return results;
  }

  private checkMitigation(data: Fields): ValidationResult[] {
    const results: ValidationResult[] = [];
    const strategies = readList(data, 'strategies') ?? [];

    strategies.forEach((strategy, i) => {
      if (!isRecord(strategy)) return;

      pushRange(
        results,
        readNumber(strategy, 'effectiveness', `strategies.${i}.effectiveness`),
        PHYSICAL_RANGES.strategy_effectiveness,
        `strategy_${i}_effectiveness`,
      );

      const cost = readNumber(strategy, 'cost', `strategies.${i}.cost`);
      if (cost !== undefined && cost < 0) {
        results.push(
          createValidationResult({
            severity: 'critical',
            message: `Cost of strategy ${i} cannot be negative`,
            field: `strategy_${i}_cost`,
            observed: cost,
            confidence: 0.0,
          }),
        );
      }
    });

    return results;
  }
}

function pushRange(results: ValidationResult[], value: number | undefined, rule: RangeRule, field: string): void {
  // Non-finite values are reported by the scan
  if (value === undefined || !Number.isFinite(value)) return;
  results.push(checkRange(value, rule, field));
}

/** One critical result per NaN or infinite number anywhere in the output. */
export function scanNonFinite(data: unknown, path = ''): ValidationResult[] {
  if (typeof data === 'number') {
    if (Number.isFinite(data)) return [];
    const field = path || 'value';
    return [
      createValidationResult({
        severity: 'critical',
        message: `Non-finite value found in ${field}`,
        field,
        observed: String(data),
        confidence: 0.0,
      }),
    ];
  }
  if (Array.isArray(data)) {
    return data.flatMap((item, i) => scanNonFinite(item, path ? `${path}.${i}` : String(i)));
  }
  if (isRecord(data)) {
    return Object.entries(data).flatMap(([key, value]) => scanNonFinite(value, path ? `${path}.${key}` : key));
  }
  return [];
}

export function checkEnergyConservation(energy: Fields): ValidationResult | null {
  const total = readNumber(energy, 'total_energy', 'energy_analysis.total_energy');
  const kinetic = readNumber(energy, 'kinetic_energy', 'energy_analysis.kinetic_energy');
  const potential = readNumber(energy, 'potential_energy', 'energy_analysis.potential_energy');

  if (total === undefined || kinetic === undefined || potential === undefined) return null;

  const relativeError = total !== 0 ? Math.abs(total - (kinetic + potential)) / Math.abs(total) : Infinity;

  if (relativeError <= ENERGY_CONSERVATION_TOLERANCE) {
    return createValidationResult({
      severity: 'success',
      message: 'Energy conservation verified',
      field: 'energy_conservation',
      confidence: 1.0,
    });
  }

  return createValidationResult({
    severity: 'warning',
    message: `Energy conservation error: ${formatPercent(relativeError)}`,
    field: 'energy_conservation',
    expected: `error <= ${formatPercent(ENERGY_CONSERVATION_TOLERANCE)}`,
    observed: `error = ${formatPercent(relativeError)}`,
    confidence: 0.5,
  });
}

/** T² = a³ with T in years and a in AU for heliocentric orbits. */
export function checkKeplerThirdLaw(periodYears?: number, semiMajorAxisAu?: number): ValidationResult | null {
  if (periodYears === undefined || semiMajorAxisAu === undefined) return null;
  if (!Number.isFinite(periodYears) || !Number.isFinite(semiMajorAxisAu)) return null;
  if (periodYears <= 0 || semiMajorAxisAu <= 0) return null;

  const expected = semiMajorAxisAu ** 3;
  const actual = periodYears ** 2;
  const relativeError = Math.abs(actual - expected) / expected;

  if (relativeError <= KEPLER_TOLERANCE) {
    return createValidationResult({
      severity: 'success',
      message: "Kepler's third law verified",
      field: 'kepler_third_law',
      confidence: 1.0,
    });
  }

  return createValidationResult({
    severity: 'warning',
    message: `Kepler's third law error: ${formatPercent(relativeError)}`,
    field: 'kepler_third_law',
    expected: `T^2 = ${expected.toFixed(2)}`,
    observed: `T^2 = ${actual.toFixed(2)}`,
    confidence: 0.3,
  });
}

function formatPercent(ratio: number): string {
  return Number.isFinite(ratio) ? `${(ratio * 100).toFixed(2)}%` : 'unbounded';
}

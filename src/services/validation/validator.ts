import { ValidatorFault } from '../../domain/errors.js';
import type { ValidationResult } from '../../domain/types.js';
import { createValidationResult } from './report.js';
import type { RangeRule } from './types.js';

const GROSS_VIOLATION_FACTOR = 10;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function withUnit(value: number | string, unit?: string): string {
  return unit ? `${value} ${unit}` : String(value);
}

/**
 * Checks one value against a physical range. Values off by more than a factor
 * of ten from the nearest bound are critical, smaller excursions are warnings.
 */
export function checkRange(value: number, rule: RangeRule, field: string): ValidationResult {
  const aboveMax = rule.exclusiveMax ? value >= rule.max : value > rule.max;

  if (value >= rule.min && !aboveMax) {
    return createValidationResult({
      severity: 'success',
      message: `Value of ${field} is within the expected range`,
      field,
      observed: withUnit(value, rule.unit),
      confidence: 1.0,
    });
  }

  const gross = value < rule.min / GROSS_VIOLATION_FACTOR || value > rule.max * GROSS_VIOLATION_FACTOR;
  const upper = rule.exclusiveMax ? `${rule.max})` : String(rule.max);

  return createValidationResult({
    severity: gross ? 'critical' : 'warning',
    message: `Value of ${field} is outside the expected range`,
    field,
    expected: withUnit(`${rule.min} - ${upper}`, rule.unit),
    observed: withUnit(value, rule.unit),
    confidence: 0.3,
  });
}

export function checkRequiredFields(
  data: Readonly<Record<string, unknown>>,
  fields: readonly string[],
): ValidationResult[] {
  return fields.map((field) => {
    if (!(field in data) || data[field] === undefined) {
      return createValidationResult({
        severity: 'critical',
        message: `Required field '${field}' is missing`,
        field,
        confidence: 0.0,
      });
    }
    if (data[field] === null) {
      return createValidationResult({
        severity: 'critical',
        message: `Required field '${field}' is null`,
        field,
        confidence: 0.0,
      });
    }
    return createValidationResult({
      severity: 'success',
      message: `Field '${field}' is present`,
      field,
      confidence: 1.0,
    });
  });
}

/** @throws {ValidatorFault} If the key holds something other than a number */
export function readNumber(
  data: Readonly<Record<string, unknown>>,
  key: string,
  path: string = key,
): number | undefined {
  const value = data[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number') {
    throw new ValidatorFault(`Expected a number at '${path}', got ${typeof value}`, path);
  }
  return value;
}

/** @throws {ValidatorFault} If the key holds something other than an object */
export function readRecord(
  data: Readonly<Record<string, unknown>>,
  key: string,
  path: string = key,
): Readonly<Record<string, unknown>> | undefined {
  const value = data[key];
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    throw new ValidatorFault(`Expected an object at '${path}'`, path);
  }
  return value;
}

/** @throws {ValidatorFault} If the key holds something other than a list */
export function readList(
  data: Readonly<Record<string, unknown>>,
  key: string,
  path: string = key,
): readonly unknown[] | undefined {
  const value = data[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) {
    throw new ValidatorFault(`Expected a list at '${path}'`, path);
  }
  return value;
}

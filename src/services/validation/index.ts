export type { Validator, ValidatorContext, RangeRule, ReportSummary } from './types.js';
export { ValidationReport, createValidationResult, clampUnit } from './report.js';
export type { ValidationResultInput } from './report.js';
export { checkRange, checkRequiredFields, readNumber, readRecord, readList, isRecord } from './validator.js';
export { PhysicalValidator, PHYSICAL_RANGES, scanNonFinite } from './physical-validator.js';
export { CompletenessValidator, DEFAULT_REQUIRED_FIELDS } from './completeness-validator.js';
export type { RequiredFieldMap } from './completeness-validator.js';
export { CoherenceValidator, COHERENCE_THRESHOLDS } from './coherence-validator.js';

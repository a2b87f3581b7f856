import type { StageOutput, StageType } from '../../domain/types.js';
import { ValidationReport } from './report.js';
import type { Validator, ValidatorContext } from './types.js';
import { checkRequiredFields } from './validator.js';

export type RequiredFieldMap = Partial<Record<StageType, readonly string[]>>;

export const DEFAULT_REQUIRED_FIELDS: RequiredFieldMap = {
  data_collection: ['id', 'name', 'diameter_min', 'diameter_max', 'absolute_magnitude_h', 'orbital_data'],
  ml: ['summary', 'confidence_level', 'impact_probability'],
  visualization: ['visualization_data'],
  explanation: ['explanation_text'],
};

export class CompletenessValidator implements Validator {
  readonly name = 'CompletenessValidator';
  readonly kind = 'completeness' as const;
  readonly description = 'Checks that the fields a stage must produce are present and non-null';

  private readonly requiredFields: RequiredFieldMap;

  constructor(requiredFields: RequiredFieldMap = DEFAULT_REQUIRED_FIELDS) {
    this.requiredFields = requiredFields;
  }

  fieldsFor(stageType: StageType): readonly string[] {
    return this.requiredFields[stageType] ?? [];
  }

  validate(output: StageOutput, context: ValidatorContext): ValidationReport {
    const report = new ValidationReport(context.stageName, this.name, this.kind);
    return report.addAll(checkRequiredFields(output, this.fieldsFor(context.stageType)));
  }
}

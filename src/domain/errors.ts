export const ErrorCode = {
  // Validators
  VALIDATOR_FAULT: 'VALIDATOR_FAULT',

  // Supervision
  STAGE_NOT_REGISTERED: 'STAGE_NOT_REGISTERED',
  SUPERVISION_FAILED: 'SUPERVISION_FAILED',

  // Alerts
  ALERT_NOT_FOUND: 'ALERT_NOT_FOUND',

  // Input
  VALIDATION_ERROR: 'VALIDATION_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  code: ErrorCode;
  message: string;
  details?: string;
  retryable: boolean;
}

export function createAppError(
  code: ErrorCode,
  message: string,
  retryable: boolean,
  details?: string,
): AppError {
  return { code, message, retryable, details };
}

/**
 * Raised by a validator when a stage output does not have the shape it checks
 * (a string where a number belongs, a non-list strategy set). The stage
 * supervisor turns it into a critical report for that validator only.
 */
export class ValidatorFault extends Error {
  readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super(message);
    this.name = 'ValidatorFault';
    this.field = field;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

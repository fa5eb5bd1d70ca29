import { DomainError } from '../error-handling/errors.js';

export const HealthErrorCode = {
  DUPLICATE_CHECK_NAME: 'DUPLICATE_CHECK_NAME',
  INVALID_CHECK_NAME: 'INVALID_CHECK_NAME',
  INVALID_HEALTH_CONFIG: 'INVALID_HEALTH_CONFIG',
} as const;

export class DuplicateCheckNameError extends DomainError {
  constructor(checkName: string) {
    super(`Health check "${checkName}" is already registered`, 409, {
      code: HealthErrorCode.DUPLICATE_CHECK_NAME,
      details: { name: checkName },
    });
    this.name = 'DuplicateCheckNameError';
  }
}

export class InvalidCheckNameError extends DomainError {
  constructor(checkName: string) {
    super('Health check name must be a non-empty string', 400, {
      code: HealthErrorCode.INVALID_CHECK_NAME,
      details: { name: checkName },
    });
    this.name = 'InvalidCheckNameError';
  }
}

export class HealthConfigError extends DomainError {
  constructor(message: string, issues: string[]) {
    super(message, 400, { code: HealthErrorCode.INVALID_HEALTH_CONFIG, details: { issues } });
    this.name = 'HealthConfigError';
  }
}

import { DuplicateCheckNameError, HealthConfigError, InvalidCheckNameError } from './errors.js';
import { checkOptionsSchema, formatIssues } from '../config/health-config.js';
import type { CheckOptions } from './types.js';

/**
 * Throws unless `name` is non-blank and absent from `taken`
 */
export function assertCheckName(name: string, taken: { has(name: string): boolean }): void {
  if (name.trim().length === 0) {
    throw new InvalidCheckNameError(name);
  }
  if (taken.has(name)) {
    throw new DuplicateCheckNameError(name);
  }
}

export function parseCheckOptions(name: string, options: CheckOptions): CheckOptions {
  const parsed = checkOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new HealthConfigError(`Invalid options for health check "${name}"`, formatIssues(parsed.error.issues));
  }
  return parsed.data;
}

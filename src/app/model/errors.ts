/**
 * Raised when a grid or monitor is constructed with values it cannot work with
 * (non-positive dimensions, a zero window). Nothing else in the engine throws.
 */
export class InvalidConfigurationError extends Error {
  readonly field: string;
  readonly value: unknown;

  constructor(field: string, value: unknown, requirement: string) {
    super(`Invalid configuration: ${field} must be ${requirement} (received ${String(value)})`);
    this.name = 'InvalidConfigurationError';
    this.field = field;
    this.value = value;
  }
}

export function requirePositiveInteger(field: string, value: number) {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidConfigurationError(field, value, 'a positive integer');
  }
  return value;
}

// ============================================
// Error Types
// ============================================

/**
 * Thrown when an entity or session is built with parameters that break
 * its invariants (non-positive speed or size, empty arena, negative delay).
 */
export class InvalidConfigurationError extends Error {
  constructor(
    readonly field: string,
    readonly value: unknown,
    reason = 'must be a finite number greater than 0'
  ) {
    super(`Invalid configuration: ${field} ${reason} (got ${String(value)})`);
    this.name = 'InvalidConfigurationError';
  }
}

/**
 * Assert a value is finite and strictly positive
 */
export function requirePositive(field: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidConfigurationError(field, value);
  }
  return value;
}

/**
 * Assert a value is finite and zero or more
 */
export function requireNonNegative(field: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidConfigurationError(field, value, 'must be a finite number of 0 or more');
  }
  return value;
}

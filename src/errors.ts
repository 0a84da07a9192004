/**
 * Raised when an indicator or engine is constructed with parameters it
 * cannot run with. Fatal to the instance being built.
 */
export class ConfigurationError extends Error {
  constructor(
    public readonly field: string,
    message: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function requireInteger(field: string, value: number, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(
      field,
      `${field} must be an integer >= ${min}, got ${value}`
    );
  }
  return value;
}

export function requireFinite(field: string, value: number): number {
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(field, `${field} must be a finite number, got ${value}`);
  }
  return value;
}

/**
 * Indicators reject non-finite closes so a NaN never enters a window
 */
export function assertFinitePrice(indicator: string, close: number): void {
  if (!Number.isFinite(close)) {
    throw new RangeError(`${indicator} received a non-finite close: ${close}`);
  }
}

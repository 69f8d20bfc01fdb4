/**
 * Pricing error types
 *
 * A zero current price is not an error: the engine answers it with an
 * ERROR-strategy sentinel. These classes cover input the engine refuses.
 */

export class PricingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PricingError';
  }
}

/**
 * Rule set or margin parameters that would make a price formula undefined
 * (margin >= 100%, non-positive factors, negative thresholds).
 */
export class InvalidConfigurationError extends PricingError {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = 'InvalidConfigurationError';
    this.field = field;
  }
}

/**
 * SKU metrics that are not finite or are negative.
 */
export class InvalidMetricsError extends PricingError {
  readonly field: string;
  readonly value: number;

  constructor(field: string, value: number, message?: string) {
    super(message ?? `Invalid value for ${field}: ${value}`);
    this.name = 'InvalidMetricsError';
    this.field = field;
    this.value = value;
  }
}

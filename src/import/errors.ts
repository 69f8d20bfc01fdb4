import { PricingError } from '../pricing/errors';

/**
 * A source table could not be read or carries no usable columns.
 */
export class DataSourceError extends PricingError {
  readonly source: string;

  constructor(source: string, message: string) {
    super(`${source}: ${message}`);
    this.name = 'DataSourceError';
    this.source = source;
  }
}

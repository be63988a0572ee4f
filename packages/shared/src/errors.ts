/**
 * Error Types
 *
 * ParseError is the only failure that aborts a record. Everything else a
 * strategy can hit is absorbed by the field chain.
 */

export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ParseError';
  }
}

/**
 * Raised by kernel operations on malformed or unsupported geometry:
 * out-of-range indices, degenerate primitives, invalid edit parameters.
 */
export class GeometryError extends Error {
  readonly code = 'geometry';

  constructor(message: string) {
    super(message);
    this.name = 'GeometryError';
  }
}

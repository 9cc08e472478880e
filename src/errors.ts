// Error taxonomy for path construction and resampling. Everything is thrown
// synchronously at the offending call; nothing is retried.
export class CameraPathError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed input shape: bad coords, non-positive offsets, steps or extents. */
export class ValidationError extends CameraPathError {}

/** A marker, increment or step of the wrong kind for the active time domain. */
export class TypeKindError extends CameraPathError {}

/** An appended marker that does not advance past the previous one. */
export class OrderingError extends CameraPathError {}

/** Resampling requested outside the knot span. */
export class DomainError extends CameraPathError {}

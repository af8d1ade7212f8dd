export class ShuffleError extends Error {
  exitCode: number;
  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

/** Malformed key or argument. */
export class ValidationError extends ShuffleError {}

/**
 * No landmarks were found, so there is no region to operate on.
 * A legitimate "no face" outcome rather than bad input.
 */
export class UndefinedRegionError extends ShuffleError {
  constructor(message = "no face landmarks found; refusing to shuffle without a region") {
    super(message);
  }
}

/** Inverted region, or a region that does not fit inside the pixel grid. */
export class BoundsError extends ShuffleError {}

export class ImageIOError extends ShuffleError {}

/** Bad command line; reported together with usage. */
export class UsageError extends ShuffleError {
  constructor(message: string) {
    super(message, 2);
  }
}

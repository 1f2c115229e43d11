/**
 * All domain error classes for quadplan.
 *
 * Only programmer and input errors are thrown. Refused structural edits and
 * degenerate geometry are reported through return values instead.
 *
 * Each class:
 * - Extends Error
 * - Sets `this.name` to the class name for reliable instanceof checks
 * - Restores the prototype chain for correct instanceof in transpiled output
 */

/** Thrown when a root quad or polygon is built from malformed points. */
export class InvalidGeometryError extends Error {
  override name = "InvalidGeometryError" as const;
  constructor(message: string) {
    super(message);
    this.name = "InvalidGeometryError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Thrown when a `Building` is configured with out-of-range values. */
export class InvalidBuildingConfigError extends Error {
  override name = "InvalidBuildingConfigError" as const;
  constructor(message: string) {
    super(message);
    this.name = "InvalidBuildingConfigError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Thrown when a referenced storey index does not exist. */
export class StoreyNotFoundError extends Error {
  override name = "StoreyNotFoundError" as const;
  constructor(message: string) {
    super(message);
    this.name = "StoreyNotFoundError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Thrown when the tree breaks its own invariants, e.g. a child under an undivided parent. */
export class TreeIntegrityError extends Error {
  override name = "TreeIntegrityError" as const;
  constructor(message: string) {
    super(message);
    this.name = "TreeIntegrityError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

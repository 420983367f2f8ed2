/**
 * Error types raised by the primitive renderer
 */

/**
 * Thrown when circle or arc parameters cannot produce a valid point sequence.
 */
export class GeometryError extends Error {
  constructor(
    readonly parameter: string,
    readonly value: number,
    reason: string
  ) {
    super(`Invalid geometry parameters: ${parameter}=${value} ${reason}`);
    this.name = "GeometryError";
  }
}

/**
 * Thrown at construction time when a required collaborator is missing.
 */
export class DependencyError extends Error {
  constructor(readonly dependency: string, reason: string) {
    super(`Invalid dependency: ${dependency} ${reason}`);
    this.name = "DependencyError";
  }
}

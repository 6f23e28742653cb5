/**
 * Contract violations. Expected conditions (out of range, not found,
 * allocation failure) are reported through return values instead.
 */

export class ContainerReleasedError extends Error {
  readonly operation: string;

  constructor(container: string, operation: string) {
    super(`${container}.${operation}() called after destroy()`);
    this.name = 'ContainerReleasedError';
    this.operation = operation;
  }
}

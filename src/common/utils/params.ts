import { InvalidParameterError } from '../errors/knowledge-graph.errors';

export function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidParameterError(
      `${name} must be a positive integer (got ${value})`,
    );
  }
}

export function assertUnitInterval(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidParameterError(
      `${name} must be between 0 and 1 (got ${value})`,
    );
  }
}

/**
 * Code-unit string order. Used for every canonical-term tie-break so results
 * do not depend on the host locale.
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

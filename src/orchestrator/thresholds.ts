export const DEFAULT_CONFIDENCE_THRESHOLD = 0.7;

export class InvalidThresholdError extends RangeError {
  readonly name = "InvalidThresholdError";
}

/**
 * Thresholds are inclusive lower bounds in [0,1].
 */
export function assertThreshold(value: number, label: string): number {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidThresholdError(`${label} threshold must be within [0,1], got ${value}`);
  }
  return value;
}

/**
 * `confidence >= threshold`. A NaN confidence never passes.
 */
export function meetsThreshold(confidence: number, threshold: number): boolean {
  return confidence >= threshold;
}

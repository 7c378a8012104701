// ==============================================================================
// Numeric helpers shared by the sync and statistics stages
// ==============================================================================

/**
 * Mean and population standard deviation
 * @param values Input values
 * @param skipIndex Index to leave out (e.g. the correlation peak), -1 for none
 * @returns { mean, std, count } over the included values; zeros when nothing is included
 */
export function meanAndStd(
  values: ArrayLike<number>,
  skipIndex: number = -1
): { mean: number; std: number; count: number } {
  let sum = 0;
  let count = 0;
  for (let i = 0; i < values.length; i++) {
    if (i === skipIndex) continue;
    sum += values[i];
    count++;
  }
  if (count === 0) {
    return { mean: 0, std: 0, count: 0 };
  }

  const mean = sum / count;
  let squares = 0;
  for (let i = 0; i < values.length; i++) {
    if (i === skipIndex) continue;
    const d = values[i] - mean;
    squares += d * d;
  }

  return { mean, std: Math.sqrt(squares / count), count };
}

/**
 * Error rate over a record
 * @param errors Number of erroneous entries
 * @param total Number of entries
 * @returns Rate (0.0 to 1.0); 0 for an empty record
 */
export function calculateErrorRate(errors: number, total: number): number {
  return ratio(errors, total);
}

/**
 * Quotient that is 0 when the denominator is 0
 */
export function ratio(numerator: number, denominator: number): number {
  if (denominator === 0) return 0;
  return numerator / denominator;
}


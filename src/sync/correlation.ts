/**
 * Cross-correlation timing recovery
 *
 * C(k) = Σ_i reference[i] · detected[i + k]   for k ∈ [-maxOffset, +maxOffset]
 *
 * The peak is accepted as synchronization only if it stands out from the
 * correlation floor formed by every other candidate offset.
 */

import { requireParameter, type CorrelationResult, type Histogram } from '../core';
import { meanAndStd } from '../utils';

export interface CorrelationOptions {
  /** Minimum peak significance in noise standard deviations (default: 3) */
  sigmaThreshold?: number;
}

export const DEFAULT_SIGMA_THRESHOLD = 3;

/**
 * Raw correlation values over all candidate offsets
 * @param reference Reference counts (template)
 * @param detected Detected counts
 * @param maxOffset Search radius in bins
 * @returns Offsets in ascending order and index-aligned correlation values
 */
export function crossCorrelate(
  reference: Uint32Array,
  detected: Uint32Array,
  maxOffset: number
): { offsets: Int32Array; values: Float64Array } {
  const count = 2 * maxOffset + 1;
  const offsets = new Int32Array(count);
  const values = new Float64Array(count);

  for (let n = 0; n < count; n++) {
    const k = n - maxOffset;
    // Valid overlap: 0 <= i < reference.length and 0 <= i + k < detected.length
    const start = Math.max(0, -k);
    const end = Math.min(reference.length, detected.length - k);

    let sum = 0;
    for (let i = start; i < end; i++) {
      sum += reference[i] * detected[i + k];
    }
    offsets[n] = k;
    values[n] = sum;
  }

  return { offsets, values };
}

/**
 * Index of the maximal correlation value.
 * Ties: smallest |offset| first, then the smallest signed offset.
 */
export function findPeakIndex(offsets: Int32Array, values: Float64Array): number {
  let best = 0;
  for (let n = 1; n < values.length; n++) {
    const value = values[n];
    const bestValue = values[best];
    if (value > bestValue) {
      best = n;
    } else if (value === bestValue) {
      const magnitude = Math.abs(offsets[n]);
      const bestMagnitude = Math.abs(offsets[best]);
      if (magnitude < bestMagnitude || (magnitude === bestMagnitude && offsets[n] < offsets[best])) {
        best = n;
      }
    }
  }
  return best;
}

/**
 * Recover the clock offset between sender and receiver
 * @param reference Sender's reference histogram
 * @param detected Receiver's detected histogram
 * @param maxOffset Search radius in bins (positive integer, below both histogram lengths)
 * @param options Detection threshold
 */
export function correlate(
  reference: Histogram,
  detected: Histogram,
  maxOffset: number,
  options: CorrelationOptions = {}
): CorrelationResult {
  const sigmaThreshold = options.sigmaThreshold ?? DEFAULT_SIGMA_THRESHOLD;

  requireParameter(Number.isInteger(maxOffset) && maxOffset > 0, 'correlation',
    `maxOffset must be a positive integer, got ${maxOffset}`);
  requireParameter(maxOffset < reference.counts.length && maxOffset < detected.counts.length, 'correlation',
    `maxOffset ${maxOffset} exceeds histogram bounds (reference=${reference.counts.length}, detected=${detected.counts.length})`);
  requireParameter(reference.binWidth === detected.binWidth, 'correlation',
    `bin width mismatch: reference=${reference.binWidth}, detected=${detected.binWidth}`);
  requireParameter(Number.isFinite(sigmaThreshold) && sigmaThreshold >= 0, 'correlation',
    `sigmaThreshold must be a finite value >= 0, got ${sigmaThreshold}`);

  const { offsets, values } = crossCorrelate(reference.counts, detected.counts, maxOffset);
  const peakIndex = findPeakIndex(offsets, values);
  const peakValue = values[peakIndex];

  // Noise floor from every offset except the peak
  const noise = meanAndStd(values, peakIndex);
  const peakSignificance = noise.std > 0
    ? (peakValue - noise.mean) / noise.std
    : (peakValue > noise.mean ? Infinity : 0);

  const syncSuccess = peakValue > 0 && peakValue > noise.mean && peakSignificance >= sigmaThreshold;

  return {
    offsets,
    correlationValues: values,
    peakOffset: offsets[peakIndex],
    peakValue,
    syncSuccess,
    noiseMean: noise.mean,
    noiseStd: noise.std,
    peakSignificance
  };
}

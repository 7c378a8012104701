/**
 * Histogram construction for timing recovery
 *
 * reference: sender's signal/decoy pattern, one bin per transmitted pulse
 * detected:  receiver counts per bin over the whole observed window
 *
 * Both histograms share bin 0 (emission of pulse 0), so a delay of k bins
 * shows up as detected[i + k] lining up with reference[i].
 */

import { SimulationError, requireParameter, type DetectionEvent, type Histogram, type PulseRecord } from '../core';

export interface HistogramOptions {
  /** Minimum detected histogram length (default: pulses.length) */
  windowBins?: number;
}

export interface HistogramPair {
  readonly reference: Histogram;
  readonly detected: Histogram;
}

/**
 * Bin the transmitted pattern and the detection record
 * @param pulses Transmitted pulses in index order
 * @param detectedEvents Detection record (any order)
 * @param binWidth Time bin width in seconds
 * @param options Window sizing
 */
export function buildHistograms(
  pulses: readonly PulseRecord[],
  detectedEvents: readonly DetectionEvent[],
  binWidth: number,
  options: HistogramOptions = {}
): HistogramPair {
  requireParameter(Number.isFinite(binWidth) && binWidth > 0, 'preprocessor',
    `binWidth must be a finite value > 0, got ${binWidth}`);
  requireParameter(pulses.length > 0, 'preprocessor', 'no transmitted pulses');

  const windowBins = options.windowBins ?? pulses.length;
  requireParameter(Number.isInteger(windowBins) && windowBins >= pulses.length, 'preprocessor',
    `windowBins must be an integer >= ${pulses.length}, got ${windowBins}`);

  if (detectedEvents.length === 0) {
    throw new SimulationError('EmptyInput', 'preprocessor', 'no detection events to correlate');
  }

  let lastBin = 0;
  for (const event of detectedEvents) {
    requireParameter(Number.isInteger(event.timestampBin) && event.timestampBin >= 0, 'preprocessor',
      `invalid timestampBin ${event.timestampBin}`);
    lastBin = Math.max(lastBin, event.timestampBin);
  }

  const referenceCounts = new Uint32Array(pulses.length);
  pulses.forEach((pulse, i) => {
    referenceCounts[i] = pulse.isSignal ? 1 : 0;
  });

  const detectedCounts = new Uint32Array(Math.max(windowBins, lastBin + 1));
  for (const event of detectedEvents) {
    detectedCounts[event.timestampBin]++;
  }

  return {
    reference: { counts: referenceCounts, binWidth },
    detected: { counts: detectedCounts, binWidth }
  };
}

/**
 * Start time of every bin (seconds)
 */
export function binStartTimes(histogram: Histogram): Float64Array {
  const times = new Float64Array(histogram.counts.length);
  for (let b = 0; b < times.length; b++) {
    times[b] = b * histogram.binWidth;
  }
  return times;
}

/**
 * Count statistics and QBER estimate for one run
 *
 * QBER rule: every detection is aligned to the sent pulse at
 * `timestampBin - peakOffset`. It counts as an error when it is a dark count,
 * when no pulse was sent at that position, or when its origin class
 * (signal/decoy) disagrees with the aligned pulse.
 */

import {
  DetectionOrigin,
  requireParameter,
  type CorrelationResult,
  type DetectionEvent,
  type PulseRecord,
  type SimulationStatistics
} from '../core';
import { calculateErrorRate, ratio } from '../utils';

export interface StatisticsOptions {
  /** Observation window in bins (default: one bin past the last detection, at least the block size) */
  observationBins?: number;
  /** QBER ceiling for qberWithinThreshold (default: 0.11) */
  qberThreshold?: number;
}

export const DEFAULT_QBER_THRESHOLD = 0.11;

/**
 * Whether a detection agrees with the pulse sent at its aligned position
 */
export function isAlignedDetection(
  event: DetectionEvent,
  pulses: readonly PulseRecord[],
  peakOffset: number
): boolean {
  if (event.origin === DetectionOrigin.DARK) return false;

  const sentIndex = event.timestampBin - peakOffset;
  if (sentIndex < 0 || sentIndex >= pulses.length) return false;

  const expectSignal = pulses[sentIndex].isSignal;
  return expectSignal === (event.origin === DetectionOrigin.SIGNAL);
}

/**
 * Summarize a detection record
 * @param detectedEvents Detection record
 * @param correlation Timing recovery result; null only when there are no detections
 * @param pulses Transmitted pulses in index order
 * @param timeBinWidth Time bin width in seconds
 * @param options Observation window and QBER threshold
 */
export function computeStatistics(
  detectedEvents: readonly DetectionEvent[],
  correlation: CorrelationResult | null,
  pulses: readonly PulseRecord[],
  timeBinWidth: number,
  options: StatisticsOptions = {}
): SimulationStatistics {
  const qberThreshold = options.qberThreshold ?? DEFAULT_QBER_THRESHOLD;

  requireParameter(Number.isFinite(timeBinWidth) && timeBinWidth > 0, 'statistics',
    `timeBinWidth must be a finite value > 0, got ${timeBinWidth}`);
  requireParameter(qberThreshold >= 0 && qberThreshold <= 1, 'statistics',
    `qberThreshold must be in [0, 1], got ${qberThreshold}`);
  requireParameter(correlation !== null || detectedEvents.length === 0, 'statistics',
    'a correlation result is required to align a non-empty detection record');

  let lastBin = -1;
  for (const event of detectedEvents) {
    lastBin = Math.max(lastBin, event.timestampBin);
  }
  const observationBins = options.observationBins ?? Math.max(pulses.length, lastBin + 1);
  requireParameter(Number.isInteger(observationBins) && observationBins > 0, 'statistics',
    `observationBins must be a positive integer, got ${observationBins}`);

  let signalCounts = 0;
  let decoyCounts = 0;
  let darkCounts = 0;
  let errorCount = 0;
  const peakOffset = correlation?.peakOffset ?? 0;

  for (const event of detectedEvents) {
    switch (event.origin) {
      case DetectionOrigin.SIGNAL:
        signalCounts++;
        break;
      case DetectionOrigin.DECOY:
        decoyCounts++;
        break;
      case DetectionOrigin.DARK:
        darkCounts++;
        break;
    }
    if (!isAlignedDetection(event, pulses, peakOffset)) {
      errorCount++;
    }
  }

  let signalSent = 0;
  for (const pulse of pulses) {
    if (pulse.isSignal) signalSent++;
  }
  const decoySent = pulses.length - signalSent;

  const totalCounts = detectedEvents.length;
  const degenerate = totalCounts === 0;
  const syncSuccess = correlation?.syncSuccess ?? false;
  const qber = calculateErrorRate(errorCount, totalCounts);

  return {
    totalCounts,
    meanCountRate: totalCounts / (observationBins * timeBinWidth),
    qber,
    syncSuccess,
    degenerate,
    signalCounts,
    decoyCounts,
    darkCounts,
    errorCount,
    signalYield: ratio(signalCounts, signalSent),
    decoyYield: ratio(decoyCounts, decoySent),
    qberWithinThreshold: syncSuccess && !degenerate && qber <= qberThreshold
  };
}

/**
 * Receiver detection record: channel survivors plus detector dark counts
 */

import { DetectionOrigin, requireParameter, type DetectionEvent } from '../core';
import type { SeededRandom } from '../utils/random';

/**
 * Dark counts as a homogeneous Poisson process over the detection window
 * @param darkCountRate Mean dark events per bin (>= 0)
 * @param windowBins Detection window length in bins (positive integer)
 * @param rng Random stream owned by the run
 * @returns DARK events in ascending bin order
 */
export function generateDarkCounts(
  darkCountRate: number,
  windowBins: number,
  rng: SeededRandom
): DetectionEvent[] {
  requireParameter(Number.isFinite(darkCountRate) && darkCountRate >= 0, 'detection',
    `darkCountRate must be a finite value >= 0, got ${darkCountRate}`);
  requireParameter(Number.isInteger(windowBins) && windowBins > 0, 'detection',
    `detectionWindowBins must be a positive integer, got ${windowBins}`);

  const events: DetectionEvent[] = [];
  if (darkCountRate === 0) return events;

  for (let bin = 0; bin < windowBins; bin++) {
    const count = rng.nextPoisson(darkCountRate);
    for (let n = 0; n < count; n++) {
      events.push({ timestampBin: bin, origin: DetectionOrigin.DARK });
    }
  }
  return events;
}

/**
 * Merge survivors with freshly drawn dark counts
 * @param survivorEvents Channel output (any order)
 * @param darkCountRate Mean dark events per bin
 * @param detectionWindowBins Detection window length in bins
 * @param rng Random stream owned by the run
 * @returns All events sorted ascending by timestampBin; same-bin events are all kept
 */
export function recordDetections(
  survivorEvents: readonly DetectionEvent[],
  darkCountRate: number,
  detectionWindowBins: number,
  rng: SeededRandom
): DetectionEvent[] {
  const darkEvents = generateDarkCounts(darkCountRate, detectionWindowBins, rng);

  // Array.prototype.sort is stable: survivors precede dark counts within a bin
  return [...survivorEvents, ...darkEvents].sort((a, b) => a.timestampBin - b.timestampBin);
}

/**
 * Convert a detector dark-count rate to a per-bin mean
 * @param rateCps Dark counts per second
 * @param binWidthSeconds Time bin width in seconds
 */
export function darkCountsPerBin(rateCps: number, binWidthSeconds: number): number {
  requireParameter(Number.isFinite(rateCps) && rateCps >= 0, 'detection',
    `dark count rate must be a finite value >= 0, got ${rateCps}`);
  requireParameter(Number.isFinite(binWidthSeconds) && binWidthSeconds > 0, 'detection',
    `bin width must be a finite value > 0, got ${binWidthSeconds}`);
  return rateCps * binWidthSeconds;
}

/**
 * Check the sortedness invariant of a detection record
 */
export function isTimeOrdered(events: readonly DetectionEvent[]): boolean {
  for (let i = 1; i < events.length; i++) {
    if (events[i].timestampBin < events[i - 1].timestampBin) return false;
  }
  return true;
}

/**
 * Fiber channel: per-pulse loss, propagation delay and timing jitter
 *
 * Loss model
 * ----------
 * A pulse of mean photon number μ survives when at least one photon reaches
 * the detector. Calibrating the per-photon transmittance on the strongest
 * pulse μ_max, whose loss probability is `lossProbability`, gives
 *
 *   P_survive(μ) = 1 - lossProbability ^ (μ / μ_max)
 *
 * A signal pulse therefore survives with probability exactly 1 - lossProbability,
 * while weaker decoy pulses survive less often. That intensity contrast is
 * what lets the receiver correlate its detections against the sender's
 * signal/decoy pattern. Vacuum pulses (μ = 0) survive only a lossless channel.
 */

import { DetectionOrigin, requireParameter, type DetectionEvent, type PulseRecord } from '../core';
import type { SeededRandom } from '../utils/random';

/**
 * Survival probability of a pulse
 * @param intensity Mean photon number of the pulse
 * @param referenceIntensity Strongest intensity in the block
 * @param lossProbability Loss probability of a reference-intensity pulse
 */
export function survivalProbability(
  intensity: number,
  referenceIntensity: number,
  lossProbability: number
): number {
  if (lossProbability === 0) return 1;
  if (intensity <= 0 || referenceIntensity <= 0) return 0;
  return 1 - Math.pow(lossProbability, intensity / referenceIntensity);
}

/**
 * Pass the pulse train through the channel
 * @param pulses Transmitted pulses in index order
 * @param lossProbability Loss probability of a signal pulse (0.0 - 1.0)
 * @param trueOffset Propagation delay in bins (integer)
 * @param jitterStd Timing jitter standard deviation in bins (>= 0)
 * @param rng Random stream owned by the run
 * @returns Surviving pulses as unsorted SIGNAL/DECOY events
 */
export function applyChannel(
  pulses: readonly PulseRecord[],
  lossProbability: number,
  trueOffset: number,
  jitterStd: number,
  rng: SeededRandom
): DetectionEvent[] {
  requireParameter(lossProbability >= 0 && lossProbability <= 1, 'channel',
    `lossProbability must be in [0, 1], got ${lossProbability}`);
  requireParameter(Number.isInteger(trueOffset), 'channel',
    `trueOffset must be an integer number of bins, got ${trueOffset}`);
  requireParameter(Number.isFinite(jitterStd) && jitterStd >= 0, 'channel',
    `jitterStd must be a finite value >= 0, got ${jitterStd}`);

  let referenceIntensity = 0;
  for (const pulse of pulses) {
    requireParameter(Number.isFinite(pulse.intensity) && pulse.intensity >= 0, 'channel',
      `pulse ${pulse.index} has invalid intensity ${pulse.intensity}`);
    referenceIntensity = Math.max(referenceIntensity, pulse.intensity);
  }

  const survivors: DetectionEvent[] = [];
  for (const pulse of pulses) {
    const pSurvive = survivalProbability(pulse.intensity, referenceIntensity, lossProbability);
    if (!rng.nextBernoulli(pSurvive)) continue;

    const jitter = jitterStd > 0 ? Math.round(rng.nextGaussian(jitterStd)) : 0;
    const timestampBin = pulse.index + trueOffset + jitter;

    // Arrived before the detection window opened
    if (timestampBin < 0) continue;

    survivors.push({
      timestampBin,
      origin: pulse.isSignal ? DetectionOrigin.SIGNAL : DetectionOrigin.DECOY
    });
  }

  return survivors;
}

// ==============================================================================
// Link budget
// ==============================================================================

/**
 * Channel transmittance for a loss given in dB
 */
export function transmittanceFromDb(lossDb: number): number {
  requireParameter(Number.isFinite(lossDb) && lossDb >= 0, 'channel',
    `lossDb must be a finite value >= 0, got ${lossDb}`);
  return Math.pow(10, -lossDb / 10);
}

/**
 * Signal-pulse loss probability for a loss given in dB
 */
export function lossProbabilityFromDb(lossDb: number): number {
  return 1 - transmittanceFromDb(lossDb);
}

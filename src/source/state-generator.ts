/**
 * Sender-side decoy-state pulse generation
 *
 * Intensities are drawn i.i.d. per slot; no temporal correlation is introduced here.
 */

import { requireParameter, type PulseRecord } from '../core';
import type { SeededRandom } from '../utils/random';

export interface GeneratedStates {
  readonly states: Float64Array;   // intensity per slot
  readonly isSignal: Uint8Array;   // 1 where states[i] === signalPower
  readonly pulses: readonly PulseRecord[];
}

/**
 * Draw a block of signal/decoy intensities
 * @param signalPower Mean photon number of a signal pulse (>= 0)
 * @param decoyPower Mean photon number of a decoy pulse (>= 0)
 * @param signalProbability Probability of emitting a signal pulse (0.0 - 1.0)
 * @param blockSize Number of pulses (positive integer)
 * @param rng Random stream owned by the run
 */
export function generateStates(
  signalPower: number,
  decoyPower: number,
  signalProbability: number,
  blockSize: number,
  rng: SeededRandom
): GeneratedStates {
  requireParameter(Number.isFinite(signalPower) && signalPower >= 0, 'state-generator',
    `signalPower must be a finite value >= 0, got ${signalPower}`);
  requireParameter(Number.isFinite(decoyPower) && decoyPower >= 0, 'state-generator',
    `decoyPower must be a finite value >= 0, got ${decoyPower}`);
  requireParameter(signalProbability >= 0 && signalProbability <= 1, 'state-generator',
    `signalProbability must be in [0, 1], got ${signalProbability}`);
  requireParameter(Number.isInteger(blockSize) && blockSize > 0, 'state-generator',
    `blockSize must be a positive integer, got ${blockSize}`);

  const states = new Float64Array(blockSize);
  const isSignal = new Uint8Array(blockSize);
  const pulses: PulseRecord[] = new Array(blockSize);

  for (let i = 0; i < blockSize; i++) {
    const intensity = rng.nextBernoulli(signalProbability) ? signalPower : decoyPower;
    // Flag follows the emitted intensity, so equal powers mark every slot as signal
    const signal = intensity === signalPower;
    states[i] = intensity;
    isSignal[i] = signal ? 1 : 0;
    pulses[i] = { index: i, intensity, isSignal: signal };
  }

  return { states, isSignal, pulses };
}

/**
 * Fraction of signal slots in a block
 */
export function signalFraction(isSignal: Uint8Array): number {
  if (isSignal.length === 0) return 0;
  let ones = 0;
  for (const flag of isSignal) ones += flag;
  return ones / isSignal.length;
}

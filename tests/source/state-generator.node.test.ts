import { describe, test, expect } from 'vitest';
import { generateStates, signalFraction } from '../../src/source/state-generator';
import { SimulationError } from '../../src/core';
import { SeededRandom } from '../../src/utils/random';

describe('generateStates', () => {
  test('should return sequences of blockSize length', () => {
    const { states, isSignal, pulses } = generateStates(0.5, 0.1, 0.7, 250, new SeededRandom(1));
    expect(states.length).toBe(250);
    expect(isSignal.length).toBe(250);
    expect(pulses.length).toBe(250);
  });

  test('should flag exactly the slots carrying the signal power', () => {
    const { states, isSignal, pulses } = generateStates(0.5, 0.1, 0.6, 500, new SeededRandom(2));
    for (let i = 0; i < states.length; i++) {
      expect(states[i] === 0.5 || states[i] === 0.1).toBe(true);
      expect(isSignal[i] === 1).toBe(states[i] === 0.5);
      expect(pulses[i]).toEqual({ index: i, intensity: states[i], isSignal: isSignal[i] === 1 });
    }
  });

  test('should flag every slot when signal and decoy powers are equal', () => {
    const { states, isSignal, pulses } = generateStates(0.3, 0.3, 0.5, 100, new SeededRandom(5));
    expect(Array.from(states).every(s => s === 0.3)).toBe(true);
    expect(signalFraction(isSignal)).toBe(1);
    expect(pulses.every(p => p.isSignal)).toBe(true);
  });

  test('should emit only signal pulses at probability 1 and only decoys at 0', () => {
    const allSignal = generateStates(0.5, 0.1, 1, 100, new SeededRandom(3));
    const allDecoy = generateStates(0.5, 0.1, 0, 100, new SeededRandom(3));
    expect(signalFraction(allSignal.isSignal)).toBe(1);
    expect(signalFraction(allDecoy.isSignal)).toBe(0);
  });

  test('should converge to the signal probability within 1/sqrt(N) tolerance', () => {
    for (const [p, n] of [[0.7, 1000], [0.3, 10000], [0.5, 40000]] as const) {
      const { isSignal } = generateStates(0.5, 0.1, p, n, new SeededRandom(n));
      // 4 standard errors
      const tolerance = 4 * Math.sqrt(p * (1 - p) / n);
      expect(Math.abs(signalFraction(isSignal) - p)).toBeLessThan(tolerance);
    }
  });

  test('should be reproducible for a fixed seed', () => {
    const a = generateStates(0.5, 0.1, 0.7, 64, new SeededRandom(99));
    const b = generateStates(0.5, 0.1, 0.7, 64, new SeededRandom(99));
    expect(a.isSignal).toEqual(b.isSignal);
  });

  const invalidCases: Array<{ label: string; args: [number, number, number, number] }> = [
    { label: 'negative signal power', args: [-0.1, 0.1, 0.5, 10] },
    { label: 'negative decoy power', args: [0.5, -0.1, 0.5, 10] },
    { label: 'probability above 1', args: [0.5, 0.1, 1.5, 10] },
    { label: 'probability below 0', args: [0.5, 0.1, -0.1, 10] },
    { label: 'zero block size', args: [0.5, 0.1, 0.5, 0] },
    { label: 'fractional block size', args: [0.5, 0.1, 0.5, 10.5] },
    { label: 'NaN probability', args: [0.5, 0.1, NaN, 10] }
  ];

  test.each(invalidCases)('should reject $label', ({ args }) => {
    const [signalPower, decoyPower, probability, blockSize] = args;
    try {
      generateStates(signalPower, decoyPower, probability, blockSize, new SeededRandom(1));
      expect.unreachable('generateStates should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(SimulationError);
      if (error instanceof SimulationError) {
        expect(error.kind).toBe('InvalidParameter');
        expect(error.component).toBe('state-generator');
      }
    }
  });
});

describe('signalFraction', () => {
  test('should return 0 for an empty block', () => {
    expect(signalFraction(new Uint8Array(0))).toBe(0);
  });

  test('should count flagged slots', () => {
    expect(signalFraction(new Uint8Array([1, 0, 1, 1]))).toBe(0.75);
  });
});

import { describe, test, expect } from 'vitest';
import { computeStatistics, isAlignedDetection } from '../../src/analysis/statistics';
import {
  DetectionOrigin,
  SimulationError,
  type CorrelationResult,
  type DetectionEvent,
  type PulseRecord
} from '../../src/core';

const { SIGNAL, DECOY, DARK } = DetectionOrigin;

const pulsesFromPattern = (pattern: number[]): PulseRecord[] =>
  pattern.map((bit, index) => ({ index, intensity: bit ? 0.5 : 0.1, isSignal: bit === 1 }));

const event = (timestampBin: number, origin: DetectionOrigin): DetectionEvent => ({ timestampBin, origin });

const correlationAt = (peakOffset: number, syncSuccess = true): CorrelationResult => ({
  offsets: Int32Array.from([peakOffset]),
  correlationValues: Float64Array.from([1]),
  peakOffset,
  peakValue: 1,
  syncSuccess,
  noiseMean: 0,
  noiseStd: 0,
  peakSignificance: Infinity
});

describe('isAlignedDetection', () => {
  const pulses = pulsesFromPattern([1, 0, 1]);

  test('should accept a detection matching the aligned pulse class', () => {
    expect(isAlignedDetection(event(3, SIGNAL), pulses, 3)).toBe(true);
    expect(isAlignedDetection(event(4, DECOY), pulses, 3)).toBe(true);
  });

  test('should reject class mismatches, dark counts and positions outside the block', () => {
    expect(isAlignedDetection(event(4, SIGNAL), pulses, 3)).toBe(false);
    expect(isAlignedDetection(event(3, DARK), pulses, 3)).toBe(false);
    expect(isAlignedDetection(event(2, SIGNAL), pulses, 3)).toBe(false);
    expect(isAlignedDetection(event(6, SIGNAL), pulses, 3)).toBe(false);
  });
});

describe('computeStatistics', () => {
  const pulses = pulsesFromPattern([1, 0, 1, 1, 0]);
  const record = [
    event(2, SIGNAL),  // pulse 0 signal: ok
    event(3, DECOY),   // pulse 1 decoy: ok
    event(4, SIGNAL),  // pulse 2 signal: ok
    event(4, DARK),    // dark: error
    event(5, DECOY),   // pulse 3 is signal: error
    event(9, SIGNAL)   // pulse 7 was never sent: error
  ];

  test('should count detections and errors after alignment', () => {
    const stats = computeStatistics(record, correlationAt(2), pulses, 0.5, { observationBins: 10 });

    expect(stats.totalCounts).toBe(6);
    expect(stats.errorCount).toBe(3);
    expect(stats.qber).toBe(0.5);
    expect(stats.signalCounts).toBe(3);
    expect(stats.decoyCounts).toBe(2);
    expect(stats.darkCounts).toBe(1);
    expect(stats.degenerate).toBe(false);
  });

  test('should divide counts by the observation duration', () => {
    const stats = computeStatistics(record, correlationAt(2), pulses, 0.5, { observationBins: 10 });
    expect(stats.meanCountRate).toBe(1.2);
  });

  test('should default the observation window to the block or last detection', () => {
    const stats = computeStatistics(record, correlationAt(2), pulses, 1);
    // Last detection in bin 9 -> 10 bins
    expect(stats.meanCountRate).toBe(0.6);
  });

  test('should report per-class yields', () => {
    const stats = computeStatistics(record, correlationAt(2), pulses, 1);
    expect(stats.signalYield).toBe(1);
    expect(stats.decoyYield).toBe(1);
  });

  test('should propagate the synchronization flag', () => {
    expect(computeStatistics(record, correlationAt(2, false), pulses, 1).syncSuccess).toBe(false);
    expect(computeStatistics(record, correlationAt(2, true), pulses, 1).syncSuccess).toBe(true);
  });

  test('should depend on the recovered offset', () => {
    const aligned = [event(2, SIGNAL), event(4, SIGNAL), event(5, SIGNAL)];
    expect(computeStatistics(aligned, correlationAt(2), pulses, 1).qber).toBe(0);
    // Offset 1 maps bins 2, 4, 5 onto pulses 1 (decoy), 3 (signal), 4 (decoy)
    expect(computeStatistics(aligned, correlationAt(1), pulses, 1).errorCount).toBe(2);
  });

  test('should gate qberWithinThreshold on sync and the QBER ceiling', () => {
    const clean = [event(2, SIGNAL), event(3, DECOY), event(4, SIGNAL), event(6, DARK)];
    // qber = 0.25
    expect(computeStatistics(clean, correlationAt(2), pulses, 1).qberWithinThreshold).toBe(false);
    expect(computeStatistics(clean, correlationAt(2), pulses, 1, { qberThreshold: 0.3 }).qberWithinThreshold).toBe(true);
    expect(computeStatistics(clean, correlationAt(2, false), pulses, 1, { qberThreshold: 0.3 }).qberWithinThreshold).toBe(false);
  });

  test('should mark an empty record as degenerate instead of failing', () => {
    const stats = computeStatistics([], null, pulses, 1e-10, { observationBins: 100 });

    expect(stats.totalCounts).toBe(0);
    expect(stats.meanCountRate).toBe(0);
    expect(stats.qber).toBe(0);
    expect(stats.degenerate).toBe(true);
    expect(stats.syncSuccess).toBe(false);
    expect(stats.qberWithinThreshold).toBe(false);
  });

  test('should require a correlation result for a non-empty record', () => {
    expect(() => computeStatistics(record, null, pulses, 1)).toThrow(SimulationError);
  });

  test('should reject invalid bin widths and thresholds', () => {
    expect(() => computeStatistics(record, correlationAt(2), pulses, 0)).toThrow(SimulationError);
    expect(() => computeStatistics(record, correlationAt(2), pulses, 1, { qberThreshold: 2 })).toThrow(SimulationError);
    expect(() => computeStatistics(record, correlationAt(2), pulses, 1, { observationBins: 0 })).toThrow(SimulationError);
  });
});

import { requireParameter, type ChannelConfig } from './core';
import { lossProbabilityFromDb } from './channel/channel-effects';
import { darkCountsPerBin } from './detection/detection-handler';
import { DEFAULT_SIGMA_THRESHOLD } from './sync/correlation';
import { DEFAULT_QBER_THRESHOLD } from './analysis/statistics';

export interface SimulationConfig {
  // Sender
  signalPower: number;         // mean photon number per signal pulse
  decoyPower: number;          // mean photon number per decoy pulse
  signalProbability: number;
  blockSize: number;           // pulses per block

  // Channel / receiver
  lossProbability: number;     // loss probability of a signal pulse
  darkCountRate: number;       // mean dark counts per bin
  timeBinWidth: number;        // seconds
  trueOffset: number;          // bins
  jitterStd: number;           // bins

  // Processing
  maxOffset: number;           // search radius in bins
  syncSigmaThreshold: number;
  qberThreshold: number;

  seed: number | string;
}

export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  signalPower: 0.5,
  decoyPower: 0.1,
  signalProbability: 0.7,
  blockSize: 1000,
  lossProbability: 0.9,
  darkCountRate: 0.01,
  timeBinWidth: 100e-12,
  trueOffset: 5,
  jitterStd: 0,
  maxOffset: 20,
  syncSigmaThreshold: DEFAULT_SIGMA_THRESHOLD,
  qberThreshold: DEFAULT_QBER_THRESHOLD,
  seed: 1
};

/**
 * Merge overrides onto the defaults
 */
export function resolveConfig(overrides: Partial<SimulationConfig> = {}): SimulationConfig {
  return { ...DEFAULT_SIMULATION_CONFIG, ...overrides };
}

/**
 * Run-level checks. Each pipeline stage still validates its own inputs.
 */
export function validateSimulationConfig(config: SimulationConfig): void {
  const numericFields = [
    'signalPower', 'decoyPower', 'signalProbability', 'blockSize', 'lossProbability',
    'darkCountRate', 'timeBinWidth', 'trueOffset', 'jitterStd', 'maxOffset',
    'syncSigmaThreshold', 'qberThreshold'
  ] as const;
  for (const field of numericFields) {
    requireParameter(Number.isFinite(config[field]), 'config', `${field} must be a finite number, got ${config[field]}`);
  }

  requireParameter(Number.isInteger(config.blockSize) && config.blockSize > 0, 'config',
    `blockSize must be a positive integer, got ${config.blockSize}`);
  requireParameter(Number.isInteger(config.maxOffset) && config.maxOffset > 0, 'config',
    `maxOffset must be a positive integer, got ${config.maxOffset}`);
  requireParameter(config.maxOffset < config.blockSize, 'config',
    `maxOffset (${config.maxOffset}) must be smaller than blockSize (${config.blockSize})`);
  requireParameter(Number.isInteger(config.trueOffset), 'config',
    `trueOffset must be an integer, got ${config.trueOffset}`);
  requireParameter(config.timeBinWidth > 0, 'config',
    `timeBinWidth must be > 0, got ${config.timeBinWidth}`);
  requireParameter(typeof config.seed === 'string' || Number.isInteger(config.seed), 'config',
    `seed must be an integer or a string, got ${config.seed}`);
}

/**
 * Channel parameters of a resolved config
 */
export function channelConfigOf(config: SimulationConfig): ChannelConfig {
  return {
    lossProbability: config.lossProbability,
    darkCountRate: config.darkCountRate,
    timeBinWidth: config.timeBinWidth,
    syncOffsetTrue: config.trueOffset,
    syncJitterStd: config.jitterStd
  };
}

// ==============================================================================
// Grouped link parameters
// ==============================================================================

/**
 * Physical link description, grouped by party
 */
export interface LinkParameters {
  alice: {
    mu1: number;        // signal mean photon number
    mu2: number;        // decoy mean photon number
    p1: number;         // signal probability
  };
  bob: {
    darkCount: number;  // dark counts per second
    timeBin: number;    // bin width in seconds
  };
  channel: {
    loss: number;       // attenuation in dB/km
    length: number;     // fiber length in km
    syncError?: number; // timing jitter std in seconds
    delayBins?: number; // clock offset in bins
  };
  processing: {
    blockSize: number;
    maxOffset: number;
  };
}

/**
 * Convert grouped physical parameters into a simulation config
 * @param params Link description
 * @param overrides Applied last (e.g. seed, thresholds)
 */
export function configFromLinkParameters(
  params: LinkParameters,
  overrides: Partial<SimulationConfig> = {}
): SimulationConfig {
  const { alice, bob, channel, processing } = params;

  requireParameter(Number.isFinite(channel.length) && channel.length >= 0, 'config',
    `channel.length must be a finite value >= 0, got ${channel.length}`);
  requireParameter(Number.isFinite(bob.timeBin) && bob.timeBin > 0, 'config',
    `bob.timeBin must be a finite value > 0, got ${bob.timeBin}`);

  const syncError = channel.syncError ?? 0;
  requireParameter(Number.isFinite(syncError) && syncError >= 0, 'config',
    `channel.syncError must be a finite value >= 0, got ${syncError}`);

  return resolveConfig({
    signalPower: alice.mu1,
    decoyPower: alice.mu2,
    signalProbability: alice.p1,
    darkCountRate: darkCountsPerBin(bob.darkCount, bob.timeBin),
    timeBinWidth: bob.timeBin,
    lossProbability: lossProbabilityFromDb(channel.loss * channel.length),
    jitterStd: syncError / bob.timeBin,
    trueOffset: channel.delayBins ?? DEFAULT_SIMULATION_CONFIG.trueOffset,
    blockSize: processing.blockSize,
    maxOffset: processing.maxOffset,
    ...overrides
  });
}

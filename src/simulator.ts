/**
 * End-to-end QKD link simulation
 *
 * state generation → channel → detection → histograms → correlation → statistics
 *
 * Each run owns its random stream and shares no state with other runs.
 */

import {
  Event,
  EventEmitter,
  SimulationError,
  type ChannelConfig,
  type CorrelationResult,
  type PipelineStage,
  type PulseRecord,
  type SimulationErrorKind,
  type SimulationStatistics
} from './core';
import { channelConfigOf, resolveConfig, validateSimulationConfig, type SimulationConfig } from './config';
import { generateStates, signalFraction } from './source/state-generator';
import { applyChannel } from './channel/channel-effects';
import { recordDetections } from './detection/detection-handler';
import { binStartTimes, buildHistograms } from './sync/preprocessor';
import { correlate } from './sync/correlation';
import { computeStatistics } from './analysis/statistics';
import { SeededRandom } from './utils/random';
import { meanAndStd } from './utils';

/**
 * Raw series handed to visualization
 */
export interface SimulationSeries {
  readonly offsets: Int32Array;
  readonly correlation: Float64Array;
  readonly counts: Uint32Array;           // detected histogram
  readonly referenceCounts: Uint32Array;  // signal/decoy pattern
  readonly binTimes: Float64Array;        // start time of each detected bin (seconds)
}

export interface SimulationResult {
  readonly config: SimulationConfig;
  readonly channel: ChannelConfig;        // channel and receiver parameters the run used
  readonly correlation: CorrelationResult | null; // null when nothing was detected
  readonly statistics: SimulationStatistics;
  readonly series: SimulationSeries;
  readonly warnings: readonly SimulationErrorKind[];
}

export type SimulationOutcome =
  | { readonly ok: true; readonly result: SimulationResult }
  | {
      readonly ok: false;
      readonly error: {
        readonly kind: SimulationErrorKind;
        readonly component: PipelineStage;
        readonly message: string;
      };
    };

export interface StageEventData {
  readonly stage: PipelineStage;
  readonly summary: string;
}

export interface SimulatorOptions {
  /** Log a line per pipeline stage */
  verbose?: boolean;
  /** Instance name used in log prefixes */
  name?: string;
}

export class QkdLinkSimulator extends EventEmitter {
  private readonly verbose: boolean;
  private readonly instanceName: string;

  constructor(options: SimulatorOptions = {}) {
    super();
    this.verbose = options.verbose ?? false;
    this.instanceName = options.name ?? 'default';
  }

  private log(message: string): void {
    if (this.verbose) {
      console.log(`[QkdLinkSimulator:${this.instanceName}] ${message}`);
    }
  }

  private stage(stage: PipelineStage, summary: string): void {
    this.log(`${stage}: ${summary}`);
    const data: StageEventData = { stage, summary };
    this.emit('stage', new Event(data));
  }

  /**
   * Run one simulation
   * @param overrides Parameters merged onto DEFAULT_SIMULATION_CONFIG
   * @param rng Random stream; defaults to a fresh stream from config.seed
   * @throws SimulationError on invalid parameters
   */
  run(overrides: Partial<SimulationConfig> = {}, rng?: SeededRandom): SimulationResult {
    const config = resolveConfig(overrides);
    validateSimulationConfig(config);
    const channel = channelConfigOf(config);
    const random = rng ?? new SeededRandom(config.seed);
    const windowBins = config.blockSize + config.maxOffset;
    const warnings: SimulationErrorKind[] = [];

    const { pulses, isSignal } = generateStates(
      config.signalPower,
      config.decoyPower,
      config.signalProbability,
      config.blockSize,
      random
    );
    this.stage('state-generator', `${pulses.length} pulses, signal fraction ${signalFraction(isSignal).toFixed(3)}`);

    const survivors = applyChannel(
      pulses,
      channel.lossProbability,
      channel.syncOffsetTrue,
      channel.syncJitterStd,
      random
    );
    this.stage('channel', `${survivors.length} pulses survived`);

    const events = recordDetections(survivors, channel.darkCountRate, windowBins, random);
    this.stage('detection', `${events.length} detections (${events.length - survivors.length} dark)`);

    if (events.length === 0) {
      warnings.push('EmptyInput', 'DegenerateStatistics');
      this.log('no detections recorded; skipping timing recovery');
      return this.emptyResult(config, channel, pulses, windowBins, warnings);
    }

    const { reference, detected } = buildHistograms(pulses, events, channel.timeBinWidth, { windowBins });
    this.stage('preprocessor', `reference=${reference.counts.length} bins, detected=${detected.counts.length} bins`);

    const correlation = correlate(reference, detected, config.maxOffset, {
      sigmaThreshold: config.syncSigmaThreshold
    });
    this.stage('correlation',
      `peak offset=${correlation.peakOffset}, value=${correlation.peakValue}, ` +
      `significance=${correlation.peakSignificance.toFixed(2)}σ, sync=${correlation.syncSuccess}`);

    const statistics = computeStatistics(events, correlation, pulses, channel.timeBinWidth, {
      observationBins: detected.counts.length,
      qberThreshold: config.qberThreshold
    });
    this.stage('statistics', `total=${statistics.totalCounts}, qber=${statistics.qber.toFixed(4)}`);

    return {
      config,
      channel,
      correlation,
      statistics,
      series: {
        offsets: correlation.offsets,
        correlation: correlation.correlationValues,
        counts: detected.counts,
        referenceCounts: reference.counts,
        binTimes: binStartTimes(detected)
      },
      warnings
    };
  }

  private emptyResult(
    config: SimulationConfig,
    channel: ChannelConfig,
    pulses: readonly PulseRecord[],
    windowBins: number,
    warnings: SimulationErrorKind[]
  ): SimulationResult {
    const statistics = computeStatistics([], null, pulses, channel.timeBinWidth, {
      observationBins: windowBins,
      qberThreshold: config.qberThreshold
    });
    this.stage('statistics', 'degenerate: zero counts');

    const counts = new Uint32Array(windowBins);
    return {
      config,
      channel,
      correlation: null,
      statistics,
      series: {
        offsets: new Int32Array(0),
        correlation: new Float64Array(0),
        counts,
        referenceCounts: Uint32Array.from(pulses, p => (p.isSignal ? 1 : 0)),
        binTimes: binStartTimes({ counts, binWidth: channel.timeBinWidth })
      },
      warnings
    };
  }
}

/**
 * Run one simulation with a silent simulator
 * @throws SimulationError on invalid parameters
 */
export function runSimulation(overrides: Partial<SimulationConfig> = {}): SimulationResult {
  return new QkdLinkSimulator().run(overrides);
}

/**
 * Run one simulation and report failures as a structured result
 */
export function simulate(overrides: Partial<SimulationConfig> = {}): SimulationOutcome {
  try {
    return { ok: true, result: runSimulation(overrides) };
  } catch (error) {
    if (error instanceof SimulationError) {
      return {
        ok: false,
        error: { kind: error.kind, component: error.component, message: error.message }
      };
    }
    throw error;
  }
}

export interface BatchSummary {
  readonly runs: number;
  readonly syncSuccessRate: number;
  readonly meanQber: number;     // over synchronized runs; 0 when none synchronized
  readonly qberStd: number;
  readonly peakOffsets: Int32Array; // per run; 0 for runs without detections
  readonly results: readonly SimulationResult[];
}

/**
 * Independent repeated runs. Run i draws from base.fork(i).
 * @param overrides Shared parameters
 * @param runs Number of runs (positive integer)
 */
export function runBatch(overrides: Partial<SimulationConfig>, runs: number): BatchSummary {
  if (!Number.isInteger(runs) || runs <= 0) {
    throw new SimulationError('InvalidParameter', 'config', `runs must be a positive integer, got ${runs}`);
  }

  const config = resolveConfig(overrides);
  const base = new SeededRandom(config.seed);
  const simulator = new QkdLinkSimulator();

  const results: SimulationResult[] = [];
  for (let i = 0; i < runs; i++) {
    results.push(simulator.run(config, base.fork(i)));
  }

  const synced = results.filter(r => r.statistics.syncSuccess);
  const qberStats = meanAndStd(synced.map(r => r.statistics.qber));

  return {
    runs,
    syncSuccessRate: synced.length / runs,
    meanQber: qberStats.mean,
    qberStd: qberStats.std,
    peakOffsets: Int32Array.from(results, r => r.correlation?.peakOffset ?? 0),
    results
  };
}

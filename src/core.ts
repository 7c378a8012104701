// Core data model and base classes for the decoy-state QKD link simulator

/**
 * Pipeline stages, in execution order. Errors and progress events carry the
 * stage that produced them.
 */
export type PipelineStage =
  | 'config'
  | 'state-generator'
  | 'channel'
  | 'detection'
  | 'preprocessor'
  | 'correlation'
  | 'statistics';

/**
 * One transmitted pulse. Created in bulk by the state generator, ordered by index.
 */
export interface PulseRecord {
  readonly index: number;
  readonly intensity: number;   // mean photon number (signal or decoy power)
  readonly isSignal: boolean;
}

/**
 * Channel and detector parameters for a single run
 */
export interface ChannelConfig {
  readonly lossProbability: number;  // 0.0 - 1.0, loss of a signal-intensity pulse
  readonly darkCountRate: number;    // mean dark events per bin
  readonly timeBinWidth: number;     // seconds per bin
  readonly syncOffsetTrue: number;   // bins
  readonly syncJitterStd: number;    // bins
}

export enum DetectionOrigin {
  SIGNAL = 'SIGNAL',
  DECOY = 'DECOY',
  DARK = 'DARK'
}

export interface DetectionEvent {
  readonly timestampBin: number;
  readonly origin: DetectionOrigin;
}

/**
 * Fixed-length count histogram.
 *
 * Index semantics: `counts[b]` holds the events whose arrival falls in
 * `[b * binWidth, (b + 1) * binWidth)`. Bin 0 is the opening of the
 * detection window, which coincides with the emission of pulse 0.
 */
export interface Histogram {
  readonly counts: Uint32Array;
  readonly binWidth: number;
}

export interface CorrelationResult {
  readonly offsets: Int32Array;            // candidate offsets, ascending
  readonly correlationValues: Float64Array; // index-aligned with offsets
  readonly peakOffset: number;
  readonly peakValue: number;
  readonly syncSuccess: boolean;
  readonly noiseMean: number;       // mean of C(k) over non-peak offsets
  readonly noiseStd: number;        // population std of C(k) over non-peak offsets
  readonly peakSignificance: number; // (peak - noiseMean) / noiseStd
}

export interface SimulationStatistics {
  readonly totalCounts: number;
  readonly meanCountRate: number;   // counts per second
  readonly qber: number;            // 0.0 - 1.0
  readonly syncSuccess: boolean;
  readonly degenerate: boolean;     // zero counts: rate and QBER carry no information
  readonly signalCounts: number;
  readonly decoyCounts: number;
  readonly darkCounts: number;
  readonly errorCount: number;
  readonly signalYield: number;     // signal detections per signal pulse sent
  readonly decoyYield: number;      // decoy detections per decoy pulse sent
  readonly qberWithinThreshold: boolean;
}

// ==============================================================================
// Errors
// ==============================================================================

export type SimulationErrorKind = 'InvalidParameter' | 'EmptyInput' | 'DegenerateStatistics';

export class SimulationError extends Error {
  constructor(
    public readonly kind: SimulationErrorKind,
    public readonly component: PipelineStage,
    message: string
  ) {
    super(`[${component}] ${message}`);
    this.name = 'SimulationError';
  }
}

/**
 * Throw InvalidParameter from `component` unless `condition` holds
 */
export function requireParameter(condition: boolean, component: PipelineStage, message: string): void {
  if (!condition) {
    throw new SimulationError('InvalidParameter', component, message);
  }
}

// ==============================================================================
// Events
// ==============================================================================

// Base event class
export class Event {
  constructor(public readonly data: unknown = null) {}
}

// Event system base class
export abstract class EventEmitter {
  private listeners = new Map<string, Array<(_event: Event) => void>>();

  on(eventName: string, callback: (_event: Event) => void): void {
    const eventListeners = this.listeners.get(eventName);
    if (eventListeners) {
      eventListeners.push(callback);
    } else {
      this.listeners.set(eventName, [callback]);
    }
  }

  off(eventName: string, callback: (_event: Event) => void): void {
    const eventListeners = this.listeners.get(eventName);
    if (eventListeners) {
      const index = eventListeners.indexOf(callback);
      if (index !== -1) {
        eventListeners.splice(index, 1);
      }
    }
  }

  emit(eventName: string, event: Event = new Event()): void {
    const eventListeners = this.listeners.get(eventName);
    if (eventListeners) {
      eventListeners.forEach(callback => callback(event));
    }
  }

  removeAllListeners(eventName?: string): void {
    if (eventName) {
      this.listeners.delete(eventName);
    } else {
      this.listeners.clear();
    }
  }
}

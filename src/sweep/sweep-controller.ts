/**
 * Sweep Controller
 *
 * Adaptive injection-rate search for the saturation point.
 *
 * State machine: Probing -> Saturated | ExhaustedRange (both terminal)
 *
 * Assumes latency is non-decreasing in the injection rate. A non-monotone
 * oracle can make the sweep stop early or late; there is no backtracking.
 */

import { DEFAULT_ENGINE_CONFIG } from '../shared/config.js';
import { ConfigError, SimulationError } from '../shared/errors.js';
import { EngineLogger } from '../shared/logger.js';
import {
  DEFAULT_MIN_STEP,
  DEFAULT_SLOPE_LIMIT,
  DEFAULT_ZERO_LOAD_FACTOR,
  MAX_INJECTION_RATE,
  type LatencyOracle,
  type LatencyProbe,
  type SweepOptions,
  type SweepResult,
  type SweepSample,
  type SweepState,
} from './types.js';

export function createSweepOptions(overrides: Partial<SweepOptions> = {}): SweepOptions {
  const options: SweepOptions = {
    step: DEFAULT_ENGINE_CONFIG.sweepStep,
    threshold: DEFAULT_ENGINE_CONFIG.sweepThreshold,
    zeroLoadFactor: DEFAULT_ZERO_LOAD_FACTOR,
    slopeLimit: DEFAULT_SLOPE_LIMIT,
    minStep: DEFAULT_MIN_STEP,
    maxRate: MAX_INJECTION_RATE,
    ...overrides,
  };

  if (!(options.step > 0) || options.step > options.maxRate) {
    throw new ConfigError(`Sweep step must be in (0, ${options.maxRate}], got ${options.step}`);
  }
  if (!(options.threshold > 0)) {
    throw new ConfigError(`Sweep threshold must be > 0, got ${options.threshold}`);
  }
  if (!(options.minStep > 0)) {
    throw new ConfigError(`Sweep minStep must be > 0, got ${options.minStep}`);
  }
  return options;
}

/**
 * Adaptive saturation search
 */
export class SweepController {
  private readonly options: SweepOptions;
  private currentState: SweepState = 'Probing';

  constructor(options: Partial<SweepOptions> = {}) {
    this.options = createSweepOptions(options);
  }

  get state(): SweepState {
    return this.currentState;
  }

  /**
   * Sweep from 0% upward until saturation or the end of the range
   *
   * @throws SimulationError when the oracle returns NaN, infinite or negative latency
   */
  async run(oracle: LatencyOracle): Promise<SweepResult> {
    const { step: initialStep, threshold, zeroLoadFactor, slopeLimit, maxRate } = this.options;
    const minStep = Math.min(this.options.minStep, initialStep);
    const samples: SweepSample[] = [];
    let oracleCalls = 0;

    const probe = async (rate: number): Promise<LatencyProbe> => {
      oracleCalls += 1;
      return normalizeAnswer(await oracle(rate), rate);
    };

    this.currentState = 'Probing';

    const zeroLoad = await probe(0);
    const zeroLoadLatency = zeroLoad.latency;
    const saturationLatency = Math.max(threshold, zeroLoadFactor * zeroLoadLatency);
    samples.push({ injectionRate: 0, latency: zeroLoadLatency, step: 0, slope: null, saturated: zeroLoad.saturated });
    EngineLogger.sweepSample(0, zeroLoadLatency, 0);

    let saturationRate: number | null = zeroLoad.saturated ? 0 : null;
    let lastUnsaturatedRate: number | null = zeroLoad.saturated ? null : 0;
    let rate = 0;
    let step = initialStep;
    let previous = zeroLoadLatency;

    while (saturationRate === null && rate < maxRate) {
      // off-grid rates end with one sample at maxRate
      const next = Math.min(rate + step, maxRate);
      const delta = next - rate;

      const answer = await probe(next);
      const slope = (answer.latency - previous) / delta;
      const saturated = answer.saturated || answer.latency > saturationLatency;
      samples.push({ injectionRate: next, latency: answer.latency, step: delta, slope, saturated });
      EngineLogger.sweepSample(next, answer.latency, delta);

      if (saturated) {
        saturationRate = next;
        break;
      }

      lastUnsaturatedRate = next;
      if (slope >= slopeLimit) {
        step = Math.max(minStep, step / 2);
      }
      rate = next;
      previous = answer.latency;
    }

    this.currentState = saturationRate === null ? 'ExhaustedRange' : 'Saturated';
    EngineLogger.sweepFinished(this.currentState, saturationRate, oracleCalls);

    return {
      state: this.currentState,
      samples,
      zeroLoadLatency,
      saturationLatency,
      saturationRate,
      lastUnsaturatedRate,
      oracleCalls,
    };
  }
}

function normalizeAnswer(answer: number | LatencyProbe, rate: number): LatencyProbe {
  const probe = typeof answer === 'number' ? { latency: answer, saturated: false } : answer;

  if (probe.saturated) {
    // a timed-out run may carry no usable latency
    const usable = Number.isFinite(probe.latency) && probe.latency >= 0;
    return { latency: usable ? probe.latency : Number.POSITIVE_INFINITY, saturated: true };
  }

  if (!Number.isFinite(probe.latency) || probe.latency < 0) {
    throw new SimulationError(`Oracle returned invalid latency ${probe.latency} at ${rate}%`, rate);
  }
  return probe;
}

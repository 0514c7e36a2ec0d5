import type { TunerSettings } from '../config/perf-config.js';
import type { Sample, TuningDecision, TuningReason } from '../types/index.js';
import { clampConcurrency } from './worker-pool.js';

const HEADROOM_FACTOR = 0.7;
const ZERO_ERROR_EPSILON = 1e-9;

/**
 * Single-step hill climber over the latest Sample only.
 *
 * Violations (error rate or p95 above target) step down; comfortable latency
 * with zero errors and a backlog steps up; an empty queue with comfortable
 * latency steps down when `scaleDownWhenIdle` is set. The result is always
 * clamped to [min, max].
 */
export class ConcurrencyTuner {
  private lastDecision: TuningDecision | null = null;

  constructor(private readonly settings: TunerSettings) {
    if (settings.min > settings.max) {
      throw new Error(`Tuner bounds are inverted: min ${settings.min} > max ${settings.max}`);
    }
  }

  get bounds(): { min: number; max: number } {
    return { min: this.settings.min, max: this.settings.max };
  }

  getLastDecision(): TuningDecision | null {
    return this.lastDecision;
  }

  evaluate(sample: Sample): TuningDecision {
    const current = clampConcurrency(sample.concurrency, this.settings);
    const { delta, reason } = this.decide(sample);
    const to = clampConcurrency(current + delta, this.settings);
    const direction = to > current ? 'up' : to < current ? 'down' : 'hold';

    const decision: TuningDecision = { direction, from: current, to, reason };
    this.lastDecision = decision;
    return decision;
  }

  private decide(sample: Sample): { delta: number; reason: TuningReason } {
    const { targetErrorRate, targetP95Ms, increaseStep, decreaseStep, scaleDownWhenIdle } = this.settings;

    if (sample.jobCount === 0) {
      return { delta: 0, reason: 'empty_window' };
    }

    if (sample.errorRate > targetErrorRate) {
      return { delta: -decreaseStep, reason: 'error_rate_exceeded' };
    }

    if (sample.p95Ms > targetP95Ms) {
      return { delta: -decreaseStep, reason: 'p95_exceeded' };
    }

    const comfortable = sample.p95Ms < HEADROOM_FACTOR * targetP95Ms;

    if (comfortable && sample.errorRate <= ZERO_ERROR_EPSILON && sample.queueDepth > 0) {
      return { delta: increaseStep, reason: 'headroom_with_demand' };
    }

    if (scaleDownWhenIdle && comfortable && sample.queueDepth === 0) {
      return { delta: -decreaseStep, reason: 'idle' };
    }

    return { delta: 0, reason: 'steady' };
  }
}

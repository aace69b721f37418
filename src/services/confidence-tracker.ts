/**
 * Confidence Tracker
 *
 * Derives the health signals reported alongside every status update from
 * the prediction and parameter-update history. All signals are in [0, 1].
 */

import { HealthSignals, LearnedParameterName, ParameterUpdateRecord, PredictionRecord } from '../types';
import { PARAMETER_BOUNDS } from '../config/control-defaults';
import { RingBuffer } from '../util/ring-buffer';
import { clamp, mean, std, variance } from '../util/stats';

const STABILITY_WINDOW = 10;
const CONSISTENCY_WINDOW = 20;
const INTEGRITY_WINDOW = 50;
const PROGRESS_WINDOW = 20;

const PARAMETERS: readonly LearnedParameterName[] = [
  'thermalTimeConstant',
  'heatLossCoefficient',
  'outletEffectiveness'
];

const HEALTH_WEIGHTS = {
  parameterStability: 0.3,
  predictionConsistency: 0.3,
  physicsAlignment: 0.25,
  learningProgress: 0.15
} as const;

/**
 * Slope of a least-squares line through (index, value).
 */
export function trendSlope(values: readonly number[]): number {
  const n = values.length;
  if (n < 2) return 0;
  const xMean = (n - 1) / 2;
  const yMean = mean(values);
  let numerator = 0;
  let denominator = 0;
  values.forEach((y, x) => {
    numerator += (x - xMean) * (y - yMean);
    denominator += (x - xMean) ** 2;
  });
  return denominator === 0 ? 0 : numerator / denominator;
}

export class ConfidenceTracker {
  private readonly integrityChecks: RingBuffer<boolean>;

  constructor(integrityWindow: number = INTEGRITY_WINDOW) {
    this.integrityChecks = new RingBuffer<boolean>(integrityWindow);
  }

  /** Record one equilibrium bounds check; `violated` true on a fault */
  recordIntegrityCheck(violated: boolean): void {
    this.integrityChecks.push(violated);
  }

  compute(
    predictions: readonly PredictionRecord[],
    updates: readonly ParameterUpdateRecord[]
  ): HealthSignals {
    const parameterStability = this.parameterStability(updates);
    const predictionConsistency = this.predictionConsistency(predictions);
    const physicsAlignment = this.physicsAlignment();
    const learningProgress = this.learningProgress(updates);

    const modelHealth =
      parameterStability * HEALTH_WEIGHTS.parameterStability +
      predictionConsistency * HEALTH_WEIGHTS.predictionConsistency +
      physicsAlignment * HEALTH_WEIGHTS.physicsAlignment +
      learningProgress * HEALTH_WEIGHTS.learningProgress;

    return { parameterStability, predictionConsistency, physicsAlignment, modelHealth, learningProgress };
  }

  /**
   * 1 when recent updates left the parameters where they were; falls as
   * the spread of recent values grows relative to each parameter's range.
   */
  parameterStability(updates: readonly ParameterUpdateRecord[]): number {
    const recent = updates.slice(-STABILITY_WINDOW);
    if (recent.length < 2) {
      return 1;
    }
    const spread = mean(PARAMETERS.map(name => {
      const range = PARAMETER_BOUNDS[name].max - PARAMETER_BOUNDS[name].min;
      return std(recent.map(u => u.values[name])) / range;
    }));
    return clamp(1 - spread * 10, 0, 1);
  }

  predictionConsistency(predictions: readonly PredictionRecord[]): number {
    const errors = predictions.slice(-CONSISTENCY_WINDOW).map(r => r.error);
    if (errors.length === 0) {
      return 0;
    }
    return 1 / (1 + variance(errors));
  }

  physicsAlignment(): number {
    if (this.integrityChecks.size === 0) {
      return 1;
    }
    const violations = this.integrityChecks.toArray().filter(Boolean).length;
    return 1 - violations / this.integrityChecks.size;
  }

  /**
   * Direction of learning confidence over recent updates: 0.5 is flat,
   * above that confidence is rising.
   */
  learningProgress(updates: readonly ParameterUpdateRecord[]): number {
    const confidences = updates.slice(-PROGRESS_WINDOW).map(u => u.confidence);
    if (confidences.length < 2) {
      return 0;
    }
    return clamp(0.5 + trendSlope(confidences) * 5, 0, 1);
  }
}

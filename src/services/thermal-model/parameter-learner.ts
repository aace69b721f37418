/**
 * Parameter Learner
 *
 * Online gradient descent on the one-cycle indoor prediction. Gradients are
 * estimated by central finite differences, averaged over the recent error
 * window, and every step is clamped to the physical parameter ranges.
 */

import {
  LearnedParameterName,
  LearningQuality,
  ParameterUpdateRecord,
  PendingPrediction,
  PredictionRecord,
  ThermalParameters
} from '../../types';
import { LEARNING_CONSTANTS, PARAMETER_BOUNDS } from '../../config/control-defaults';
import { Logger } from '../../util/logger';
import { clamp, mean, std } from '../../util/stats';
import { ThermalPhysicsModel } from './physics-model';

export const LEARNED_PARAMETERS: readonly LearnedParameterName[] = [
  'thermalTimeConstant',
  'heatLossCoefficient',
  'outletEffectiveness'
];

export interface LearningGate {
  blocked: boolean;
  heatingActive: boolean;
}

export interface LearnerOutcome {
  parameters: ThermalParameters;
  /** Null when the cycle was skipped or history is still too short for a step */
  update: ParameterUpdateRecord | null;
  stabilityWarnings: LearnedParameterName[];
  skipped: boolean;
}

export class ParameterLearner {
  constructor(
    private readonly physics: ThermalPhysicsModel,
    private readonly logger?: Pick<Logger, 'learning' | 'warn'>
  ) {}

  assessQuality(error: number): LearningQuality {
    const magnitude = Math.abs(error);
    if (magnitude < 0.1) return 'excellent';
    if (magnitude < 0.3) return 'good';
    if (magnitude < 0.6) return 'fair';
    return 'poor';
  }

  /**
   * Turn last cycle's prediction and the indoor temperature now observed
   * into a feedback record.
   */
  buildRecord(pending: PendingPrediction, actualIndoor: number, timestamp: string): PredictionRecord {
    const predictedIndoorDelta = pending.predictedIndoor - pending.context.startIndoor;
    const actualIndoorDelta = actualIndoor - pending.context.startIndoor;
    const error = actualIndoorDelta - predictedIndoorDelta;
    return {
      timestamp,
      predictedIndoorDelta,
      actualIndoorDelta,
      error,
      context: { ...pending.context },
      quality: this.assessQuality(error)
    };
  }

  /**
   * One learning step.
   *
   * @param history prediction records before `record`, oldest first
   * @param updates earlier parameter updates, oldest first
   */
  update(
    params: ThermalParameters,
    record: PredictionRecord,
    history: readonly PredictionRecord[],
    updates: readonly ParameterUpdateRecord[],
    gate: LearningGate = { blocked: false, heatingActive: true }
  ): LearnerOutcome {
    if (gate.blocked || !gate.heatingActive) {
      return { parameters: params, update: null, stabilityWarnings: [], skipped: true };
    }

    if (!Number.isFinite(record.error)) {
      this.logger?.warn('Ignoring non-finite prediction error', { error: record.error });
      return { parameters: params, update: null, stabilityWarnings: [], skipped: true };
    }

    const window = [...history, record].slice(-LEARNING_CONSTANTS.RECENT_ERRORS_WINDOW);
    const confidence = this.nextConfidence(params.learningConfidence, window);

    if (window.length < LEARNING_CONSTANTS.RECENT_ERRORS_WINDOW) {
      return {
        parameters: { ...params, learningConfidence: confidence },
        update: null,
        stabilityWarnings: [],
        skipped: false
      };
    }

    const rate = this.learningRate(confidence, window, updates);
    const next: ThermalParameters = { ...params, learningConfidence: confidence };
    const deltas: Record<LearnedParameterName, number> = {
      thermalTimeConstant: 0,
      heatLossCoefficient: 0,
      outletEffectiveness: 0
    };
    const clamped: LearnedParameterName[] = [];

    for (const name of LEARNED_PARAMETERS) {
      const gradient = this.gradient(params, name, window);
      const proposed = params[name] + rate * gradient * LEARNING_CONSTANTS.STEP_SCALE[name];
      const bounds = PARAMETER_BOUNDS[name];
      const value = Number.isFinite(proposed) ? clamp(proposed, bounds.min, bounds.max) : params[name];
      if (value !== proposed) {
        clamped.push(name);
      }
      next[name] = value;
      deltas[name] = value - params[name];
    }

    const update: ParameterUpdateRecord = {
      timestamp: record.timestamp,
      deltas,
      values: {
        thermalTimeConstant: next.thermalTimeConstant,
        heatLossCoefficient: next.heatLossCoefficient,
        outletEffectiveness: next.outletEffectiveness
      },
      learningRate: rate,
      confidence,
      clamped
    };

    const stabilityWarnings = this.clampStreaks(clamped, updates);
    for (const name of stabilityWarnings) {
      this.logger?.warn(`Parameter ${name} pinned at its bound for ${LEARNING_CONSTANTS.CLAMP_STREAK_WARNING} consecutive updates`, {
        value: next[name]
      });
    }

    this.logger?.learning('Parameters updated', {
      error: record.error,
      rate,
      confidence,
      tau: next.thermalTimeConstant,
      loss: next.heatLossCoefficient,
      eff: next.outletEffectiveness
    });

    return { parameters: next, update, stabilityWarnings, skipped: false };
  }

  /**
   * Step size: shrinks as confidence grows, shrinks further when recent
   * updates barely moved, grows with recent error magnitude.
   */
  learningRate(
    confidence: number,
    window: readonly PredictionRecord[],
    updates: readonly ParameterUpdateRecord[]
  ): number {
    let rate = LEARNING_CONSTANTS.BASE_LEARNING_RATE * 2 / (1 + confidence);

    const lastThree = updates.slice(-3);
    if (lastThree.length === 3) {
      const stable = LEARNED_PARAMETERS.every(name =>
        std(lastThree.map(u => u.values[name])) < LEARNING_CONSTANTS.STABILITY_THRESHOLD[name]
      );
      if (stable) {
        rate *= LEARNING_CONSTANTS.STABILITY_REDUCTION;
      }
    }

    const recentError = mean(window.slice(-5).map(r => Math.abs(r.error)));
    const boost = LEARNING_CONSTANTS.ERROR_BOOST.find(b => recentError > b.above);
    if (boost) {
      rate *= boost.factor;
    }

    return clamp(rate, LEARNING_CONSTANTS.MIN_LEARNING_RATE, LEARNING_CONSTANTS.MAX_LEARNING_RATE);
  }

  /**
   * Over the last 10 errors: newer half better than older half raises
   * confidence, otherwise it decays.
   */
  nextConfidence(current: number, window: readonly PredictionRecord[]): number {
    const errors = window.slice(-10).map(r => Math.abs(r.error));
    let confidence = current;
    if (errors.length > 5) {
      const older = errors.slice(0, 5);
      const newer = errors.slice(5);
      confidence *= mean(newer) < mean(older)
        ? LEARNING_CONSTANTS.CONFIDENCE_BOOST
        : LEARNING_CONSTANTS.CONFIDENCE_DECAY;
    }
    const bounds = PARAMETER_BOUNDS.learningConfidence;
    return clamp(confidence, bounds.min, bounds.max);
  }

  /**
   * Mean of error * d(prediction)/d(param) over the window.
   */
  gradient(params: ThermalParameters, name: LearnedParameterName, window: readonly PredictionRecord[]): number {
    const eps = LEARNING_CONSTANTS.EPSILON[name];
    const plus: ThermalParameters = { ...params, [name]: params[name] + eps };
    const minus: ThermalParameters = { ...params, [name]: params[name] - eps };

    const terms = window.map(record => {
      const ctx = record.context;
      const inputs = { outletTemp: ctx.outletTemp, outdoorTemp: ctx.outdoorTemp, heatUnits: ctx.heatUnits };
      const up = this.physics.predictIndoorAfter(plus, inputs, ctx.startIndoor, ctx.cycleHours);
      const down = this.physics.predictIndoorAfter(minus, inputs, ctx.startIndoor, ctx.cycleHours);
      return record.error * (up - down) / (2 * eps);
    });

    return mean(terms);
  }

  private clampStreaks(
    clampedNow: readonly LearnedParameterName[],
    updates: readonly ParameterUpdateRecord[]
  ): LearnedParameterName[] {
    const needed = LEARNING_CONSTANTS.CLAMP_STREAK_WARNING - 1;
    const previous = updates.slice(-needed);
    if (previous.length < needed) {
      return [];
    }
    return clampedNow.filter(name => previous.every(u => u.clamped.includes(name)));
  }
}

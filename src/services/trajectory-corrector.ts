/**
 * Trajectory Corrector
 *
 * Compares where the multi-hour trajectory ends against the target and
 * nudges the solver's outlet by an additive amount taken from three
 * severity bands. Also watches the indoor shortfall for a sustained jump
 * (an open window or similar) and lets the correction fade out once it
 * has passed.
 */

import { CorrectorState } from '../types';
import { ControlConfig } from '../config/control-defaults';
import { Logger } from '../util/logger';
import { clamp } from '../util/stats';
import { TrajectoryPoint } from './thermal-model/physics-model';

export type CorrectorConfig = Pick<
  ControlConfig,
  'maxTrajectoryCorrection' | 'openWindowJump' | 'openWindowConfirmCycles' | 'openWindowClearCycles'
>;

export const CORRECTION_BANDS = [
  { upTo: 0.5, multiplier: 5 },
  { upTo: 1.0, multiplier: 8 },
  { upTo: Infinity, multiplier: 12 }
] as const;

const DEADBAND = 0.01;
const DECAY_FACTOR = 0.5;
const DECAY_FLOOR = 0.05;

export interface CorrectionResult {
  outlet: number;
  correction: number;
  trajectoryError: number;
  state: CorrectorState;
  suspendLearning: boolean;
}

/** Outlet degrees per degree of trajectory error for this magnitude */
export function correctionMultiplier(magnitude: number): number {
  const band = CORRECTION_BANDS.find(b => magnitude <= b.upTo);
  return band ? band.multiplier : CORRECTION_BANDS[CORRECTION_BANDS.length - 1].multiplier;
}

export function gentleCorrection(trajectoryError: number): number {
  const magnitude = Math.abs(trajectoryError);
  if (!Number.isFinite(magnitude) || magnitude < DEADBAND) {
    return 0;
  }
  return trajectoryError * correctionMultiplier(magnitude);
}

export function createCorrectorState(): CorrectorState {
  return { mode: 'normal', previousShortfall: null, riseStreak: 0, calmStreak: 0, heldCorrection: 0 };
}

export class TrajectoryCorrector {
  private state: CorrectorState;

  constructor(
    private readonly config: CorrectorConfig,
    private readonly logger?: Pick<Logger, 'control' | 'warn'>,
    initialState?: CorrectorState
  ) {
    this.state = initialState ? { ...initialState } : createCorrectorState();
  }

  getState(): CorrectorState {
    return { ...this.state };
  }

  /**
   * @param cumulativeError smoothed indoor shortfall (target - indoor)
   */
  correct(
    solverOutlet: number,
    trajectory: readonly TrajectoryPoint[],
    target: number,
    cumulativeError: number
  ): CorrectionResult {
    const final = trajectory[trajectory.length - 1];
    const trajectoryError = final ? target - final.indoorTemp : 0;
    const limit = this.config.maxTrajectoryCorrection;
    const normal = clamp(gentleCorrection(trajectoryError), -limit, limit);

    this.trackDisturbance(cumulativeError);

    let correction = normal;
    switch (this.state.mode) {
      case 'disturbance':
        this.state.heldCorrection = normal;
        break;
      case 'decay':
        this.state.heldCorrection *= DECAY_FACTOR;
        if (Math.abs(this.state.heldCorrection) < DECAY_FLOOR) {
          this.logger?.control('Disturbance correction faded out; normal correction resumed');
          this.state.mode = 'normal';
          this.state.heldCorrection = 0;
        } else {
          correction = this.state.heldCorrection;
        }
        break;
      case 'normal':
        break;
    }

    return {
      outlet: solverOutlet + correction,
      correction,
      trajectoryError,
      state: this.getState(),
      suspendLearning: this.state.mode === 'disturbance'
    };
  }

  private trackDisturbance(shortfall: number): void {
    const previous = this.state.previousShortfall;
    this.state.previousShortfall = Number.isFinite(shortfall) ? shortfall : previous;
    if (previous === null || !Number.isFinite(shortfall)) {
      return;
    }

    if (shortfall - previous >= this.config.openWindowJump) {
      this.state.riseStreak++;
      this.state.calmStreak = 0;
    } else {
      this.state.riseStreak = 0;
      this.state.calmStreak++;
    }

    if (this.state.mode !== 'disturbance' && this.state.riseStreak >= this.config.openWindowConfirmCycles) {
      this.state.mode = 'disturbance';
      this.logger?.warn('Sustained rise in heat demand; treating as an unmodelled disturbance', {
        shortfall,
        cycles: this.state.riseStreak
      });
    } else if (this.state.mode === 'disturbance' && this.state.calmStreak >= this.config.openWindowClearCycles) {
      this.state.mode = 'decay';
      this.logger?.control('Disturbance cleared; decaying held correction', {
        held: this.state.heldCorrection
      });
    }
  }
}

/**
 * Outlet Solver
 *
 * Binary search over the outlet domain for the command whose predicted
 * equilibrium lands closest to the target indoor temperature.
 *
 * All inputs that feed the score (outdoor temperature, auxiliary heat,
 * parameters) are frozen into a SolverContext before the first iteration.
 */

import { ThermalParameters } from '../types';
import { ControlConfig } from '../config/control-defaults';
import { Logger } from '../util/logger';
import { clamp } from '../util/stats';
import { ThermalPhysicsModel } from './thermal-model/physics-model';

export type SolverConfig = Pick<
  ControlConfig,
  'outletMinTemp' | 'outletMaxTemp' | 'searchResolution' | 'searchMaxIterations' | 'cycleIntervalMinutes'
>;

export interface SolveRequest {
  target: number;
  outdoorTemp: number;
  /** Outdoor forecast one hour ahead, when a usable forecast exists */
  outdoorForecast1h?: number;
  heatUnits: number;
  params: ThermalParameters;
  previousOutlet: number | null;
}

export interface SolverContext {
  readonly target: number;
  readonly outdoorTemp: number;
  readonly heatUnits: number;
  readonly params: Readonly<ThermalParameters>;
  readonly previousOutlet: number | null;
}

export interface SolverResult {
  outlet: number;
  predictedEquilibrium: number;
  iterations: number;
  converged: boolean;
  /** Iteration cap hit before the bracket narrowed to the resolution */
  degraded: boolean;
  context: SolverContext;
}

const SCORE_TIE_TOLERANCE = 1e-6;

interface Candidate {
  outlet: number;
  equilibrium: number;
  score: number;
}

export class OutletSolver {
  constructor(
    private readonly physics: ThermalPhysicsModel,
    private readonly config: SolverConfig,
    private readonly logger?: Pick<Logger, 'warn' | 'debug'>
  ) {}

  /**
   * Outdoor temperature representative of the coming cycle: the current
   * reading blended toward the 1h forecast by the fraction of an hour the
   * cycle lasts.
   */
  cycleAlignedOutdoor(outdoorTemp: number, forecast1h?: number): number {
    if (forecast1h === undefined || !Number.isFinite(forecast1h)) {
      return outdoorTemp;
    }
    const fraction = clamp(this.config.cycleIntervalMinutes / 60, 0, 1);
    return outdoorTemp + (forecast1h - outdoorTemp) * fraction;
  }

  captureContext(request: SolveRequest): SolverContext {
    return Object.freeze({
      target: request.target,
      outdoorTemp: this.cycleAlignedOutdoor(request.outdoorTemp, request.outdoorForecast1h),
      heatUnits: request.heatUnits,
      params: Object.freeze({ ...request.params }),
      previousOutlet: request.previousOutlet
    });
  }

  solve(request: SolveRequest): SolverResult {
    const context = this.captureContext(request);
    const { outletMinTemp, outletMaxTemp, searchResolution, searchMaxIterations } = this.config;

    let lo = outletMinTemp;
    let hi = outletMaxTemp;
    let best = this.pick(this.evaluate(context, lo), this.evaluate(context, hi), context);
    let iterations = 0;

    while (hi - lo > searchResolution && iterations < searchMaxIterations) {
      const mid = (lo + hi) / 2;
      const candidate = this.evaluate(context, mid);
      best = this.pick(best, candidate, context);
      iterations++;

      if (candidate.equilibrium < context.target) {
        lo = mid;
      } else {
        hi = mid;
      }
    }

    const converged = hi - lo <= searchResolution;
    if (!converged) {
      this.logger?.warn('Outlet search hit its iteration cap; using best candidate', {
        iterations,
        bracket: hi - lo,
        outlet: best.outlet
      });
    }

    return {
      outlet: best.outlet,
      predictedEquilibrium: best.equilibrium,
      iterations,
      converged,
      degraded: !converged,
      context
    };
  }

  private evaluate(context: SolverContext, outlet: number): Candidate {
    const equilibrium = this.physics.rawEquilibrium(context.params, {
      outletTemp: outlet,
      outdoorTemp: context.outdoorTemp,
      heatUnits: context.heatUnits
    });
    return { outlet, equilibrium, score: Math.abs(equilibrium - context.target) };
  }

  private pick(current: Candidate, candidate: Candidate, context: SolverContext): Candidate {
    if (candidate.score < current.score - SCORE_TIE_TOLERANCE) {
      return candidate;
    }
    const previous = context.previousOutlet;
    if (previous !== null && Math.abs(candidate.score - current.score) <= SCORE_TIE_TOLERANCE) {
      return Math.abs(candidate.outlet - previous) < Math.abs(current.outlet - previous) ? candidate : current;
    }
    return current;
  }
}

/**
 * Thermal Physics Model
 *
 * Steady-state heat balance between the heat pump outlet, losses to the
 * outdoor air and auxiliary sources, plus the first-order response of the
 * indoor temperature towards that equilibrium.
 *
 *   T_eq = (eff * outlet + loss * outdoor + heatUnits) / (eff + loss)
 */

import { ThermalParameters } from '../../types';
import { ModelIntegrityError } from '../../util/error-handler';

export interface EquilibriumInputs {
  outletTemp: number;
  outdoorTemp: number;
  /** Sum of auxiliary contributions in heat-balance units */
  heatUnits: number;
}

/** Conditions for one hour of a trajectory */
export interface ForecastStep {
  outdoorTemp: number;
  heatUnits: number;
}

export interface TrajectoryRequest {
  startIndoor: number;
  outletTemp: number;
  outdoorTemp: number;
  heatUnits: number;
  /** Per-hour overrides for +1h, +2h, ...; missing hours reuse the current conditions */
  steps?: readonly ForecastStep[];
  horizonHours: number;
}

export interface TrajectoryPoint {
  offsetHours: number;
  indoorTemp: number;
  equilibrium: number;
}

const INTEGRITY_TOLERANCE = 1e-9;
const MOMENTUM_DECAY_RATE = 0.1;
const MOMENTUM_REDUCTION = 0.2;

export class ThermalPhysicsModel {
  /**
   * Heat-balance equilibrium without the integrity check. Gradient
   * estimation calls this with perturbed parameters.
   */
  rawEquilibrium(params: ThermalParameters, inputs: EquilibriumInputs): number {
    const eff = params.outletEffectiveness;
    const loss = params.heatLossCoefficient;
    const denominator = eff + loss;
    if (!(denominator > 0)) {
      throw new ModelIntegrityError('Heat balance denominator is not positive', { eff, loss });
    }
    return (eff * inputs.outletTemp + loss * inputs.outdoorTemp + inputs.heatUnits) / denominator;
  }

  /**
   * Equilibrium indoor temperature. With non-negative auxiliary heat the
   * result must lie between outdoor and outlet temperature; anything else
   * is a ModelIntegrityError.
   */
  equilibrium(params: ThermalParameters, inputs: EquilibriumInputs): number {
    const value = this.rawEquilibrium(params, inputs);
    this.assertWithinBounds(value, inputs);
    return value;
  }

  /**
   * Returns a description of the violation, or null when the value is admissible.
   */
  checkBounds(value: number, inputs: EquilibriumInputs): string | null {
    if (!Number.isFinite(value)) {
      return `equilibrium is not finite (${value})`;
    }
    if (inputs.heatUnits < 0) {
      return null;
    }
    const lower = Math.min(inputs.outdoorTemp, inputs.outletTemp);
    const upper = Math.max(inputs.outdoorTemp, inputs.outletTemp);
    if (value < lower - INTEGRITY_TOLERANCE) {
      return `equilibrium ${value.toFixed(3)} below ${lower.toFixed(3)}`;
    }
    if (value > upper + INTEGRITY_TOLERANCE) {
      return `equilibrium ${value.toFixed(3)} above ${upper.toFixed(3)}`;
    }
    return null;
  }

  /**
   * Indoor temperature after `hours` of exponential approach to equilibrium.
   */
  predictIndoorAfter(
    params: ThermalParameters,
    inputs: EquilibriumInputs,
    startIndoor: number,
    hours: number
  ): number {
    const eq = this.rawEquilibrium(params, inputs);
    return startIndoor + (eq - startIndoor) * (1 - Math.exp(-hours / params.thermalTimeConstant));
  }

  /**
   * Hour-by-hour indoor trajectory under a fixed outlet command. Lazy and
   * finite: yields exactly `horizonHours` points.
   */
  *trajectory(params: ThermalParameters, request: TrajectoryRequest): Generator<TrajectoryPoint, void, undefined> {
    const approach = 1 - Math.exp(-1 / params.thermalTimeConstant);
    let current = request.startIndoor;

    for (let hour = 0; hour < request.horizonHours; hour++) {
      const step = request.steps?.[hour];
      const equilibrium = this.rawEquilibrium(params, {
        outletTemp: request.outletTemp,
        outdoorTemp: step?.outdoorTemp ?? request.outdoorTemp,
        heatUnits: step?.heatUnits ?? request.heatUnits
      });

      let change = (equilibrium - current) * approach;
      if (hour > 0) {
        // momentum damping: up to 20% smaller steps further out
        change *= 1 - Math.exp(-hour * MOMENTUM_DECAY_RATE) * MOMENTUM_REDUCTION;
      }
      current += change;

      yield { offsetHours: hour + 1, indoorTemp: current, equilibrium };
    }
  }

  /**
   * Analytic inverse: the outlet temperature whose equilibrium equals the
   * target, clamped to the given range.
   */
  equilibriumOutlet(
    params: ThermalParameters,
    target: number,
    outdoorTemp: number,
    heatUnits: number,
    range: { min: number; max: number }
  ): number {
    const eff = params.outletEffectiveness;
    const loss = params.heatLossCoefficient;
    const outlet = (target * (eff + loss) - loss * outdoorTemp - heatUnits) / eff;
    return Math.max(range.min, Math.min(range.max, outlet));
  }

  private assertWithinBounds(value: number, inputs: EquilibriumInputs): void {
    const violation = this.checkBounds(value, inputs);
    if (violation) {
      throw new ModelIntegrityError(`Energy balance violated: ${violation}`, {
        outletTemp: inputs.outletTemp,
        outdoorTemp: inputs.outdoorTemp,
        heatUnits: inputs.heatUnits
      });
    }
  }
}

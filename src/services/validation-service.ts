/**
 * Model validation over a fixed grid of synthetic conditions. Read-only:
 * nothing here touches persisted state.
 */

import { ThermalParameters } from '../types';
import { ControlConfig } from '../config/control-defaults';
import { Logger } from '../util/logger';
import { ThermalPhysicsModel } from './thermal-model/physics-model';
import { OutletSolver } from './outlet-solver';

export type ValidationCheck = 'equilibrium_bounds' | 'trajectory_finite' | 'trajectory_monotone' | 'solver_range' | 'solver_idempotent' | 'solver_inverse';

export interface ValidationFailure {
  check: ValidationCheck;
  outdoorTemp: number;
  outletTemp: number | null;
  heatUnits: number;
  detail: string;
}

export interface ValidationReport {
  parameters: ThermalParameters;
  pointsChecked: number;
  solvesChecked: number;
  failures: ValidationFailure[];
  /** Points where auxiliary heat alone lifts the equilibrium above the outlet */
  auxiliaryOvershoots: number;
  passed: boolean;
}

export const VALIDATION_GRID = {
  outdoor: { from: -15, to: 15, step: 5 },
  outlet: { from: 20, to: 55, step: 5 },
  heatUnits: [0, 0.5],
  startIndoor: 20,
  solverTarget: 21
} as const;

function range(spec: { from: number; to: number; step: number }): number[] {
  const values: number[] = [];
  for (let v = spec.from; v <= spec.to; v += spec.step) values.push(v);
  return values;
}

export class ValidationService {
  private readonly physics = new ThermalPhysicsModel();
  private readonly solver: OutletSolver;

  constructor(
    private readonly config: Pick<ControlConfig,
      'outletMinTemp' | 'outletMaxTemp' | 'searchResolution' | 'searchMaxIterations' | 'cycleIntervalMinutes' | 'predictionHorizonHours'>,
    private readonly logger?: Pick<Logger, 'log' | 'warn'>
  ) {
    this.solver = new OutletSolver(this.physics, config);
  }

  validate(params: ThermalParameters): ValidationReport {
    const failures: ValidationFailure[] = [];
    let pointsChecked = 0;
    let solvesChecked = 0;
    let auxiliaryOvershoots = 0;

    for (const outdoorTemp of range(VALIDATION_GRID.outdoor)) {
      for (const heatUnits of VALIDATION_GRID.heatUnits) {
        for (const outletTemp of range(VALIDATION_GRID.outlet)) {
          pointsChecked++;
          const inputs = { outletTemp, outdoorTemp, heatUnits };
          const fail = (check: ValidationCheck, detail: string) =>
            failures.push({ check, outdoorTemp, outletTemp, heatUnits, detail });

          const eq = this.physics.rawEquilibrium(params, inputs);
          const violation = this.physics.checkBounds(eq, inputs);
          if (violation) {
            const overshoot = heatUnits > 0 && Number.isFinite(eq) && eq > Math.max(outdoorTemp, outletTemp);
            if (overshoot) {
              auxiliaryOvershoots++;
            } else {
              fail('equilibrium_bounds', violation);
            }
          }

          this.checkTrajectory(params, inputs, eq, fail);
        }

        solvesChecked++;
        this.checkSolver(params, outdoorTemp, heatUnits, failures);
      }
    }

    const report: ValidationReport = {
      parameters: { ...params },
      pointsChecked,
      solvesChecked,
      failures,
      auxiliaryOvershoots,
      passed: failures.length === 0
    };

    if (report.passed) {
      this.logger?.log(`Validation passed: ${pointsChecked} points, ${solvesChecked} solves`);
    } else {
      this.logger?.warn(`Validation found ${failures.length} failures`);
    }
    return report;
  }

  private checkTrajectory(
    params: ThermalParameters,
    inputs: { outletTemp: number; outdoorTemp: number; heatUnits: number },
    eq: number,
    fail: (check: ValidationCheck, detail: string) => void
  ): void {
    let previous: number = VALIDATION_GRID.startIndoor;
    const startGap = eq - previous;
    for (const point of this.physics.trajectory(params, {
      startIndoor: previous,
      ...inputs,
      horizonHours: this.config.predictionHorizonHours
    })) {
      if (!Number.isFinite(point.indoorTemp)) {
        fail('trajectory_finite', `indoor temperature not finite at +${point.offsetHours}h`);
        return;
      }
      const gap = eq - point.indoorTemp;
      const approaching = Math.abs(gap) <= Math.abs(eq - previous) + 1e-9;
      const sameSide = startGap === 0 || gap === 0 || Math.sign(gap) === Math.sign(startGap);
      if (!approaching || !sameSide) {
        fail('trajectory_monotone', `indoor ${point.indoorTemp.toFixed(3)} at +${point.offsetHours}h moves away from ${eq.toFixed(3)}`);
        return;
      }
      previous = point.indoorTemp;
    }
  }

  private checkSolver(params: ThermalParameters, outdoorTemp: number, heatUnits: number, failures: ValidationFailure[]): void {
    const request = {
      target: VALIDATION_GRID.solverTarget,
      outdoorTemp,
      heatUnits,
      params,
      previousOutlet: null
    };
    const first = this.solver.solve(request);
    const second = this.solver.solve(request);

    if (first.outlet < this.config.outletMinTemp || first.outlet > this.config.outletMaxTemp) {
      failures.push({
        check: 'solver_range',
        outdoorTemp,
        outletTemp: first.outlet,
        heatUnits,
        detail: `outlet ${first.outlet} outside ${this.config.outletMinTemp}..${this.config.outletMaxTemp}`
      });
    }
    const expected = this.physics.equilibriumOutlet(params, request.target, first.context.outdoorTemp, heatUnits, {
      min: this.config.outletMinTemp,
      max: this.config.outletMaxTemp
    });
    if (Math.abs(first.outlet - expected) > this.config.searchResolution + 1e-9) {
      failures.push({
        check: 'solver_inverse',
        outdoorTemp,
        outletTemp: first.outlet,
        heatUnits,
        detail: `analytic outlet is ${expected.toFixed(2)}`
      });
    }
    if (first.outlet !== second.outlet) {
      failures.push({
        check: 'solver_idempotent',
        outdoorTemp,
        outletTemp: first.outlet,
        heatUnits,
        detail: `repeat solve gave ${second.outlet}`
      });
    }
  }
}

export function formatValidationReport(report: ValidationReport): string {
  const p = report.parameters;
  const lines = [
    `Parameters: tau=${p.thermalTimeConstant.toFixed(2)}h loss=${p.heatLossCoefficient.toFixed(4)} eff=${p.outletEffectiveness.toFixed(3)}`,
    `Grid points: ${report.pointsChecked}, solver runs: ${report.solvesChecked}`,
    `Auxiliary-heat overshoots: ${report.auxiliaryOvershoots}`,
    `Result: ${report.passed ? 'PASS' : `FAIL (${report.failures.length})`}`
  ];
  for (const f of report.failures) {
    const outlet = f.outletTemp === null ? '-' : f.outletTemp.toFixed(1);
    lines.push(`  [${f.check}] outdoor=${f.outdoorTemp} outlet=${outlet} heat=${f.heatUnits}: ${f.detail}`);
  }
  return lines.join('\n');
}

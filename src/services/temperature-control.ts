import { BlockingKind, DHW_LIKE_BLOCKERS } from '../types';
import { ControlConfig } from '../config/control-defaults';
import { Logger } from '../util/logger';
import { clamp } from '../util/stats';

export type TemperatureControlConfig = Pick<
  ControlConfig,
  'outletMinTemp' | 'outletMaxTemp' | 'maxTempChangePerCycle' | 'smartRounding'
>;

export type RoundingDirection = 'floor' | 'ceil' | 'nearest' | 'exact';

export interface CommandInputs {
  /** Solver output after trajectory correction */
  corrected: number;
  target: number;
  /** Predicted indoor temperature for a given outlet command */
  predict: (outlet: number) => number;
  actualOutlet: number;
  lastFinalTemp: number | null;
  lastBlockingReasons: readonly BlockingKind[];
}

export interface ShapedCommand {
  rounded: number;
  rounding: RoundingDirection;
  baseline: number;
  /** True when the per-cycle change limit cut the step */
  rateLimited: boolean;
  final: number;
}

/**
 * TemperatureControl Service
 *
 * Turns the corrected solver output into the command actually written:
 * integer rounding toward the better prediction, a per-cycle change limit
 * and the absolute safety range.
 */
export class TemperatureControl {
  constructor(
    private readonly config: TemperatureControlConfig,
    private readonly logger?: Pick<Logger, 'control'>
  ) {}

  /**
   * Floor or ceil, whichever the model says lands closer to the target.
   */
  smartRound(value: number, target: number, predict: (outlet: number) => number): { value: number; rounding: RoundingDirection } {
    if (Number.isInteger(value)) {
      return { value, rounding: 'exact' };
    }
    if (!this.config.smartRounding) {
      return { value: Math.round(value), rounding: 'nearest' };
    }

    const floor = Math.floor(value);
    const ceil = Math.ceil(value);
    const floorError = Math.abs(predict(floor) - target);
    const ceilError = Math.abs(predict(ceil) - target);

    if (!Number.isFinite(floorError) || !Number.isFinite(ceilError) || floorError === ceilError) {
      return { value: Math.round(value), rounding: 'nearest' };
    }
    return floorError < ceilError
      ? { value: floor, rounding: 'floor' }
      : { value: ceil, rounding: 'ceil' };
  }

  /**
   * Reference for the change limit. After hot-water style blocking the
   * last command is stale, so the measured outlet is used instead.
   */
  gradualBaseline(actualOutlet: number, lastFinalTemp: number | null, lastBlockingReasons: readonly BlockingKind[]): number {
    if (lastBlockingReasons.some(kind => DHW_LIKE_BLOCKERS.includes(kind))) {
      return actualOutlet;
    }
    return lastFinalTemp ?? actualOutlet;
  }

  limitChange(value: number, baseline: number): { value: number; limited: boolean } {
    const max = this.config.maxTempChangePerCycle;
    const delta = value - baseline;
    if (Math.abs(delta) <= max) {
      return { value, limited: false };
    }
    return { value: baseline + Math.sign(delta) * max, limited: true };
  }

  clampToSafety(value: number): number {
    return clamp(value, this.config.outletMinTemp, this.config.outletMaxTemp);
  }

  shape(inputs: CommandInputs): ShapedCommand {
    const { value: rounded, rounding } = this.smartRound(inputs.corrected, inputs.target, inputs.predict);
    const baseline = this.gradualBaseline(inputs.actualOutlet, inputs.lastFinalTemp, inputs.lastBlockingReasons);
    const limited = this.limitChange(rounded, baseline);
    const final = this.clampToSafety(limited.value);

    if (limited.limited) {
      this.logger?.control(`Outlet change limited to ${this.config.maxTempChangePerCycle}°C per cycle`, {
        requested: rounded,
        baseline,
        final
      });
    }

    return { rounded, rounding, baseline, rateLimited: limited.limited, final };
  }
}

/**
 * Heat Source Coordinator
 *
 * Sums the auxiliary heat entering the house besides the heat pump:
 * solar gain, a secondary heater and electronics/occupancy. Each source is
 * computed on its own and the results are added; the total enters the
 * equilibrium numerator in heat-balance units.
 */

import { DateTime } from 'luxon';
import { HeatContribution, HeatSourceId, SecondaryHeaterState, SensorSnapshot } from '../../types';
import { ControlConfig } from '../../config/control-defaults';
import { Logger } from '../../util/logger';
import { ForecastStep } from '../thermal-model/physics-model';
import { resolveForecasts, ResolvedForecast } from './forecast-quality';
import { SecondaryHeaterLearner, SecondaryHeaterReading } from './secondary-heater-learner';

export type HeatSourceConfig = Pick<
  ControlConfig,
  | 'heatUnitsPerKw'
  | 'forecastMaxAgeMinutes'
  | 'secondaryHeaterRatioMin'
  | 'secondaryHeaterRatioMax'
  | 'secondaryHeaterOnThreshold'
  | 'secondaryHeaterOffThreshold'
>;

export const HEAT_SOURCE_CONSTANTS = {
  PV_EFFICIENCY: 0.25,
  PV_MIN_WATTS: 50,
  ELECTRONICS_BASE_KW: 0.25,
  KW_PER_OCCUPANT: 0.1,
  OCCUPANT_ACTIVITY_FACTOR: 1.5,
  DEFAULT_OCCUPANCY: 2,
  PV_CONFIDENCE: 0.9,
  ELECTRONICS_CONFIDENCE: 0.7
} as const;

export interface HeatSourceSummary {
  contributions: HeatContribution[];
  totalKilowatts: number;
  totalHeatUnits: number;
  forecast: ResolvedForecast;
  /** Outdoor temperature and total heat units for +1h..+4h */
  steps: ForecastStep[];
  secondaryHeater: SecondaryHeaterReading | null;
}

/**
 * Colder weather means more of the auxiliary heat stays in the house.
 */
export function weatherFactor(outdoorTemp: number): number {
  if (outdoorTemp <= -10) return 1.3;
  if (outdoorTemp <= 0) return 1.1;
  if (outdoorTemp <= 10) return 1.0;
  return 0.8;
}

export function pvKilowatts(pvWatts: number, outdoorTemp: number): number {
  if (!(pvWatts >= HEAT_SOURCE_CONSTANTS.PV_MIN_WATTS)) {
    return 0;
  }
  return pvWatts * HEAT_SOURCE_CONSTANTS.PV_EFFICIENCY / 1000 * weatherFactor(outdoorTemp);
}

export function electronicsKilowatts(tvOn: boolean, occupancy: number = HEAT_SOURCE_CONSTANTS.DEFAULT_OCCUPANCY): number {
  if (!tvOn) {
    return 0;
  }
  const people = Number.isFinite(occupancy) && occupancy >= 0 ? occupancy : HEAT_SOURCE_CONSTANTS.DEFAULT_OCCUPANCY;
  return HEAT_SOURCE_CONSTANTS.ELECTRONICS_BASE_KW +
    people * HEAT_SOURCE_CONSTANTS.KW_PER_OCCUPANT * HEAT_SOURCE_CONSTANTS.OCCUPANT_ACTIVITY_FACTOR;
}

export class HeatSourceCoordinator {
  private readonly secondaryHeater: SecondaryHeaterLearner;

  constructor(
    private readonly config: HeatSourceConfig,
    private readonly logger?: Pick<Logger, 'learning' | 'warn' | 'debug'>,
    secondaryHeaterState?: SecondaryHeaterState
  ) {
    this.secondaryHeater = new SecondaryHeaterLearner(
      {
        ratioMin: config.secondaryHeaterRatioMin,
        ratioMax: config.secondaryHeaterRatioMax,
        onThreshold: config.secondaryHeaterOnThreshold,
        offThreshold: config.secondaryHeaterOffThreshold,
        heatUnitsPerKw: config.heatUnitsPerKw
      },
      logger,
      secondaryHeaterState
    );
  }

  getSecondaryHeaterState(): SecondaryHeaterState {
    return this.secondaryHeater.getState();
  }

  /**
   * Current contributions from every source. Pure with respect to the
   * secondary heater learner: it reports the learner's present on/off state.
   */
  contributions(snapshot: SensorSnapshot): HeatContribution[] {
    const factor = weatherFactor(snapshot.outdoorTemp);

    const pv = pvKilowatts(snapshot.pvPowerW ?? 0, snapshot.outdoorTemp);

    let secondary = 0;
    if (snapshot.secondaryZoneTemp !== undefined) {
      secondary = this.secondaryHeater.kilowatts(snapshot.secondaryZoneTemp - snapshot.indoorTemp) * factor;
    }

    const electronics = electronicsKilowatts(snapshot.tvOn ?? false, snapshot.occupancy);

    return [
      this.contribution('pv', pv, HEAT_SOURCE_CONSTANTS.PV_CONFIDENCE),
      this.contribution('secondary_heater', secondary, this.secondaryHeater.getConfidence()),
      this.contribution('electronics', electronics, HEAT_SOURCE_CONSTANTS.ELECTRONICS_CONFIDENCE)
    ];
  }

  /**
   * Full per-cycle assessment: advances the secondary heater learner,
   * computes contributions and projects them over the forecast horizon.
   */
  assess(snapshot: SensorSnapshot, now: DateTime = DateTime.now()): HeatSourceSummary {
    let secondaryHeater: SecondaryHeaterReading | null = null;
    if (snapshot.secondaryZoneTemp !== undefined) {
      secondaryHeater = this.secondaryHeater.observe({
        timestamp: snapshot.timestamp,
        zoneTemp: snapshot.secondaryZoneTemp,
        indoorTemp: snapshot.indoorTemp,
        outdoorTemp: snapshot.outdoorTemp
      });
    }

    const contributions = this.contributions(snapshot);
    const forecast = resolveForecasts(snapshot, now, this.config.forecastMaxAgeMinutes);
    if (forecast.fallbackReason !== 'none') {
      this.logger?.debug(`Forecast fallback in use (${forecast.fallbackReason})`);
    }

    const totalKilowatts = contributions.reduce((sum, c) => sum + c.kilowatts, 0);
    const totalHeatUnits = contributions.reduce((sum, c) => sum + c.heatUnits, 0);
    const nonPvHeatUnits = contributions
      .filter(c => c.sourceId !== 'pv')
      .reduce((sum, c) => sum + c.heatUnits, 0);

    return {
      contributions,
      totalKilowatts,
      totalHeatUnits,
      forecast,
      steps: this.projectSteps(forecast, nonPvHeatUnits),
      secondaryHeater
    };
  }

  /**
   * Per-hour conditions for the trajectory. PV follows its forecast; the
   * other sources are held at their current level.
   */
  projectSteps(forecast: ResolvedForecast, heldHeatUnits: number): ForecastStep[] {
    return forecast.outdoor.map((outdoorTemp, hour) => {
      const pvKw = pvKilowatts(forecast.pv[hour] ?? 0, outdoorTemp);
      return {
        outdoorTemp,
        heatUnits: heldHeatUnits + pvKw * this.config.heatUnitsPerKw
      };
    });
  }

  private contribution(sourceId: HeatSourceId, kilowatts: number, confidence: number): HeatContribution {
    const kw = Number.isFinite(kilowatts) && kilowatts > 0 ? kilowatts : 0;
    return {
      sourceId,
      kilowatts: kw,
      heatUnits: kw * this.config.heatUnitsPerKw,
      confidence
    };
  }
}

/**
 * Calibration Service
 *
 * Offline warm start: replays a window of recorded history through the
 * parameter learner without issuing any command, then commits the fitted
 * parameters as the new baseline state.
 */

import * as fs from 'fs';
import { DateTime } from 'luxon';
import {
  BlockingKind,
  LearningState,
  ParameterUpdateRecord,
  PendingPrediction,
  PredictionRecord,
  ThermalParameters
} from '../types';
import { ControlConfig, LEARNING_CONSTANTS } from '../config/control-defaults';
import { Logger } from '../util/logger';
import { errorMessage, PersistenceError } from '../util/error-handler';
import { isRecord } from '../util/validation';
import { std } from '../util/stats';
import { ThermalPhysicsModel } from './thermal-model/physics-model';
import { ParameterLearner } from './thermal-model/parameter-learner';
import { electronicsKilowatts, pvKilowatts } from './heat-sources/heat-source-coordinator';
import { createDefaultControlMemory } from './learning-state-codec';
import { LoadSource } from './learning-state-store';
import { parseBlocking, readBoolean, readNumber } from './snapshot-parser';

/** One recorded sample of the house, oldest first in a history file */
export interface HistorySample {
  timestamp: string;
  indoorTemp: number;
  outdoorTemp: number;
  outletTemp: number;
  heatingActive: boolean;
  blocking: BlockingKind[];
  pvPowerW?: number;
  tvOn?: boolean;
  occupancy?: number;
}

export interface CalibrationStore {
  load(): LearningState;
  save(state: LearningState): void;
  backup(label?: string): string;
  getLastLoadSource(): LoadSource;
}

export interface CalibrationResult {
  success: boolean;
  samplesRead: number;
  samplesInWindow: number;
  stableSamples: number;
  replayedPairs: number;
  before: ThermalParameters;
  after: ThermalParameters;
  backupName: string | null;
  message: string;
}

export const CALIBRATION_CONSTANTS = {
  WINDOW_SIZE: 6,
  MAX_INDOOR_STD: 0.05,
  MAX_OUTLET_STD: 2.0,
  MIN_STABLE_SAMPLES: 10,
  /** Consecutive stable samples further apart than this are not replayed as a pair */
  MAX_PAIR_GAP_HOURS: 2
} as const;

/**
 * Parse one history entry. Entries without the core temperatures are
 * rejected with undefined.
 */
export function parseHistorySample(value: unknown): HistorySample | undefined {
  if (!isRecord(value) || typeof value.timestamp !== 'string' || !DateTime.fromISO(value.timestamp).isValid) {
    return undefined;
  }
  const indoorTemp = readNumber(value.indoorTemp);
  const outdoorTemp = readNumber(value.outdoorTemp);
  const outletTemp = readNumber(value.outletTemp);
  const heatingActive = readBoolean(value.heatingActive);
  if (indoorTemp === undefined || outdoorTemp === undefined || outletTemp === undefined || heatingActive === undefined) {
    return undefined;
  }

  const pvPowerW = readNumber(value.pvPowerW);
  const tvOn = readBoolean(value.tvOn);
  const occupancy = readNumber(value.occupancy);
  return {
    timestamp: value.timestamp,
    indoorTemp,
    outdoorTemp,
    outletTemp,
    heatingActive,
    blocking: parseBlocking(value.blocking),
    ...(pvPowerW !== undefined ? { pvPowerW } : {}),
    ...(tvOn !== undefined ? { tvOn } : {}),
    ...(occupancy !== undefined ? { occupancy } : {})
  };
}

/**
 * @throws PersistenceError when the file cannot be read or is not a JSON array
 */
export function loadHistoryFile(filePath: string, logger?: Pick<Logger, 'warn'>): HistorySample[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new PersistenceError(`Cannot read history file: ${errorMessage(error)}`, error, { filePath });
  }
  if (!Array.isArray(parsed)) {
    throw new PersistenceError('History file must contain a JSON array of samples', undefined, { filePath });
  }

  const samples: HistorySample[] = [];
  for (const entry of parsed) {
    const sample = parseHistorySample(entry);
    if (sample) samples.push(sample);
  }
  if (samples.length < parsed.length) {
    logger?.warn(`Dropped ${parsed.length - samples.length} malformed history samples`);
  }
  return samples.sort((a, b) => DateTime.fromISO(a.timestamp).toMillis() - DateTime.fromISO(b.timestamp).toMillis());
}

/**
 * Samples belonging to at least one window of consecutive samples with the
 * heating on, nothing blocking and indoor and outlet temperatures steady.
 */
export function selectStableSamples(samples: readonly HistorySample[]): HistorySample[] {
  const size = CALIBRATION_CONSTANTS.WINDOW_SIZE;
  const keep = new Set<number>();

  for (let start = 0; start + size <= samples.length; start++) {
    const window = samples.slice(start, start + size);
    const usable = window.every(s => s.heatingActive && s.blocking.length === 0);
    if (!usable) continue;
    if (std(window.map(s => s.indoorTemp)) > CALIBRATION_CONSTANTS.MAX_INDOOR_STD) continue;
    if (std(window.map(s => s.outletTemp)) > CALIBRATION_CONSTANTS.MAX_OUTLET_STD) continue;
    for (let i = start; i < start + size; i++) keep.add(i);
  }

  return samples.filter((_, index) => keep.has(index));
}

export class CalibrationService {
  private readonly physics = new ThermalPhysicsModel();
  private readonly learner: ParameterLearner;

  constructor(
    private readonly config: Pick<ControlConfig, 'calibrationLookbackHours' | 'heatUnitsPerKw'>,
    private readonly store: CalibrationStore,
    private readonly logger: Logger,
    private readonly now: () => DateTime = () => DateTime.now()
  ) {
    this.learner = new ParameterLearner(this.physics, logger);
  }

  calibrate(samples: readonly HistorySample[]): CalibrationResult {
    const state = this.store.load();
    const before = { ...state.parameters };
    const cutoff = this.now().minus({ hours: this.config.calibrationLookbackHours }).toMillis();
    const inWindow = samples.filter(s => DateTime.fromISO(s.timestamp).toMillis() >= cutoff);
    const stable = selectStableSamples(inWindow);

    this.logger.log(`Calibration: ${samples.length} samples, ${inWindow.length} in lookback, ${stable.length} stable`);

    if (stable.length < CALIBRATION_CONSTANTS.MIN_STABLE_SAMPLES) {
      const message = `Only ${stable.length} stable samples (need ${CALIBRATION_CONSTANTS.MIN_STABLE_SAMPLES}); state left unchanged`;
      this.logger.warn(message);
      return {
        success: false,
        samplesRead: samples.length,
        samplesInWindow: inWindow.length,
        stableSamples: stable.length,
        replayedPairs: 0,
        before,
        after: before,
        backupName: null,
        message
      };
    }

    const replay = this.replay(before, stable);
    const fitted: LearningState = {
      ...state,
      parameters: replay.parameters,
      predictionHistory: replay.predictions.slice(-LEARNING_CONSTANTS.PREDICTION_HISTORY_CAP),
      parameterHistory: replay.updates.slice(-LEARNING_CONSTANTS.PARAMETER_HISTORY_CAP),
      learnedCycles: state.learnedCycles + replay.pairs,
      lastUpdated: this.now().toUTC().toISO(),
      control: createDefaultControlMemory()
    };

    const backupName = this.store.getLastLoadSource() === 'stored' ? this.store.backup('pre-calibration') : null;
    this.store.save(fitted);

    const message = `Calibrated from ${replay.pairs} sample pairs`;
    this.logger.log(message, {
      tau: fitted.parameters.thermalTimeConstant,
      loss: fitted.parameters.heatLossCoefficient,
      eff: fitted.parameters.outletEffectiveness,
      confidence: fitted.parameters.learningConfidence
    });

    return {
      success: true,
      samplesRead: samples.length,
      samplesInWindow: inWindow.length,
      stableSamples: stable.length,
      replayedPairs: replay.pairs,
      before,
      after: { ...fitted.parameters },
      backupName,
      message
    };
  }

  private replay(start: ThermalParameters, stable: readonly HistorySample[]): {
    parameters: ThermalParameters;
    predictions: PredictionRecord[];
    updates: ParameterUpdateRecord[];
    pairs: number;
  } {
    let parameters = { ...start };
    const predictions: PredictionRecord[] = [];
    const updates: ParameterUpdateRecord[] = [];
    let pairs = 0;

    for (let i = 1; i < stable.length; i++) {
      const from = stable[i - 1];
      const to = stable[i];
      const hours = DateTime.fromISO(to.timestamp).diff(DateTime.fromISO(from.timestamp), 'hours').hours;
      if (!(hours > 0) || hours > CALIBRATION_CONSTANTS.MAX_PAIR_GAP_HOURS) continue;

      const heatUnits = this.heatUnits(from);
      const pending: PendingPrediction = {
        timestamp: from.timestamp,
        predictedIndoor: this.physics.predictIndoorAfter(
          parameters,
          { outletTemp: from.outletTemp, outdoorTemp: from.outdoorTemp, heatUnits },
          from.indoorTemp,
          hours
        ),
        context: {
          outletTemp: from.outletTemp,
          outdoorTemp: from.outdoorTemp,
          heatUnits,
          startIndoor: from.indoorTemp,
          cycleHours: hours
        }
      };

      const record = this.learner.buildRecord(pending, to.indoorTemp, to.timestamp);
      const outcome = this.learner.update(parameters, record, predictions, updates);
      if (outcome.skipped) continue;

      predictions.push(record);
      if (outcome.update) updates.push(outcome.update);
      parameters = outcome.parameters;
      pairs++;
    }

    return { parameters, predictions, updates, pairs };
  }

  private heatUnits(sample: HistorySample): number {
    const pv = sample.pvPowerW !== undefined ? pvKilowatts(sample.pvPowerW, sample.outdoorTemp) : 0;
    const electronics = electronicsKilowatts(sample.tvOn ?? false, sample.occupancy);
    return (pv + electronics) * this.config.heatUnitsPerKw;
  }
}

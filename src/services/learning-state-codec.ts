/**
 * Decoding of persisted learning state.
 *
 * Stored records are read field by field: anything missing or malformed
 * takes its default, history entries that fail validation are dropped, and
 * unknown fields are ignored. Version 1 records (before the secondary
 * heater and control memory were stored) migrate through the same path.
 */

import {
  BLOCKING_KINDS,
  BlockingEvent,
  BlockingKind,
  BlockingPhase,
  ControlMemory,
  CorrectorState,
  LearnedParameterName,
  LearningQuality,
  LearningState,
  ParameterUpdateRecord,
  PendingPrediction,
  PredictionContext,
  PredictionRecord,
  SecondaryHeaterObservation,
  SecondaryHeaterSession,
  SecondaryHeaterState,
  ThermalParameters
} from '../types';
import { DEFAULT_THERMAL_PARAMETERS, LEARNING_CONSTANTS, PARAMETER_BOUNDS } from '../config/control-defaults';
import { PersistenceError } from '../util/error-handler';
import { clamp } from '../util/stats';
import { isFiniteNumber, isRecord } from '../util/validation';
import { createDefaultSecondaryHeaterState } from './heat-sources/secondary-heater-learner';
import { createCorrectorState } from './trajectory-corrector';

export const LEARNING_STATE_SCHEMA = 'learning-state';
export const LEARNING_STATE_VERSION = 2;

const QUALITIES: readonly LearningQuality[] = ['excellent', 'good', 'fair', 'poor'];
const PARAMETER_NAMES: readonly LearnedParameterName[] = [
  'thermalTimeConstant',
  'heatLossCoefficient',
  'outletEffectiveness'
];

export function createDefaultControlMemory(): ControlMemory {
  return {
    lastFinalTemp: null,
    lastBlockingReasons: [],
    blockingEvent: null,
    phase: { state: 'NORMAL' },
    pendingPrediction: null,
    shortfallEwma: 0,
    corrector: createCorrectorState()
  };
}

export function createDefaultLearningState(): LearningState {
  return {
    schema: LEARNING_STATE_SCHEMA,
    version: LEARNING_STATE_VERSION,
    parameters: { ...DEFAULT_THERMAL_PARAMETERS },
    predictionHistory: [],
    parameterHistory: [],
    cycleCount: 0,
    learnedCycles: 0,
    lastUpdated: null,
    secondaryHeater: createDefaultSecondaryHeaterState(),
    control: createDefaultControlMemory()
  };
}

function numberOr(value: unknown, fallback: number): number {
  return isFiniteNumber(value) ? value : fallback;
}

function numberOrNull(value: unknown): number | null {
  return isFiniteNumber(value) ? value : null;
}

function stringOrNull(value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

function isBlockingKind(value: unknown): value is BlockingKind {
  return BLOCKING_KINDS.some(kind => kind === value);
}

function isQuality(value: unknown): value is LearningQuality {
  return QUALITIES.some(q => q === value);
}

function isParameterName(value: unknown): value is LearnedParameterName {
  return PARAMETER_NAMES.some(name => name === value);
}

function decodeKinds(value: unknown): BlockingKind[] {
  return Array.isArray(value) ? value.filter(isBlockingKind) : [];
}

function decodeParameterMap(value: unknown): Record<LearnedParameterName, number> | null {
  if (!isRecord(value)) return null;
  const { thermalTimeConstant, heatLossCoefficient, outletEffectiveness } = value;
  if (!isFiniteNumber(thermalTimeConstant) || !isFiniteNumber(heatLossCoefficient) || !isFiniteNumber(outletEffectiveness)) {
    return null;
  }
  return { thermalTimeConstant, heatLossCoefficient, outletEffectiveness };
}

export function decodeParameters(value: unknown): ThermalParameters {
  const raw = isRecord(value) ? value : {};
  const bounded = (key: keyof ThermalParameters): number => {
    const range = PARAMETER_BOUNDS[key];
    return clamp(numberOr(raw[key], DEFAULT_THERMAL_PARAMETERS[key]), range.min, range.max);
  };
  return {
    thermalTimeConstant: bounded('thermalTimeConstant'),
    heatLossCoefficient: bounded('heatLossCoefficient'),
    outletEffectiveness: bounded('outletEffectiveness'),
    learningConfidence: bounded('learningConfidence')
  };
}

function decodeContext(value: unknown): PredictionContext | null {
  if (!isRecord(value)) return null;
  const { outletTemp, outdoorTemp, heatUnits, startIndoor, cycleHours } = value;
  if (
    !isFiniteNumber(outletTemp) || !isFiniteNumber(outdoorTemp) || !isFiniteNumber(heatUnits) ||
    !isFiniteNumber(startIndoor) || !isFiniteNumber(cycleHours)
  ) {
    return null;
  }
  return { outletTemp, outdoorTemp, heatUnits, startIndoor, cycleHours };
}

function decodePredictionRecord(value: unknown): PredictionRecord | null {
  if (!isRecord(value)) return null;
  const timestamp = stringOrNull(value.timestamp);
  const context = decodeContext(value.context);
  const { predictedIndoorDelta, actualIndoorDelta, error, quality } = value;
  if (
    timestamp === null || context === null ||
    !isFiniteNumber(predictedIndoorDelta) || !isFiniteNumber(actualIndoorDelta) || !isFiniteNumber(error)
  ) {
    return null;
  }
  return {
    timestamp,
    predictedIndoorDelta,
    actualIndoorDelta,
    error,
    context,
    quality: isQuality(quality) ? quality : 'poor'
  };
}

function decodeUpdateRecord(value: unknown): ParameterUpdateRecord | null {
  if (!isRecord(value)) return null;
  const timestamp = stringOrNull(value.timestamp);
  const deltas = decodeParameterMap(value.deltas);
  const values = decodeParameterMap(value.values);
  if (timestamp === null || deltas === null || values === null || !isFiniteNumber(value.learningRate)) {
    return null;
  }
  return {
    timestamp,
    deltas,
    values,
    learningRate: value.learningRate,
    confidence: numberOr(value.confidence, DEFAULT_THERMAL_PARAMETERS.learningConfidence),
    clamped: Array.isArray(value.clamped) ? value.clamped.filter(isParameterName) : []
  };
}

function decodeObservation(value: unknown): SecondaryHeaterObservation | null {
  if (!isRecord(value)) return null;
  const timestamp = stringOrNull(value.timestamp);
  const { peakDifferential, durationMinutes, indoorRise, outdoorTemp } = value;
  if (
    timestamp === null || !isFiniteNumber(peakDifferential) || !isFiniteNumber(durationMinutes) ||
    !isFiniteNumber(indoorRise) || !isFiniteNumber(outdoorTemp)
  ) {
    return null;
  }
  return { timestamp, peakDifferential, durationMinutes, indoorRise, outdoorTemp };
}

function decodeSession(value: unknown): SecondaryHeaterSession | null {
  if (!isRecord(value)) return null;
  const startTime = stringOrNull(value.startTime);
  const { startIndoor, peakDifferential, outdoorTemp } = value;
  if (startTime === null || !isFiniteNumber(startIndoor) || !isFiniteNumber(peakDifferential) || !isFiniteNumber(outdoorTemp)) {
    return null;
  }
  return { startTime, startIndoor, peakDifferential, outdoorTemp };
}

export function decodeSecondaryHeater(value: unknown): SecondaryHeaterState {
  const defaults = createDefaultSecondaryHeaterState();
  if (!isRecord(value)) return defaults;
  const observations = Array.isArray(value.observations)
    ? value.observations.map(decodeObservation).filter((o): o is SecondaryHeaterObservation => o !== null)
    : [];
  return {
    ratio: numberOr(value.ratio, defaults.ratio),
    confidence: numberOr(value.confidence, defaults.confidence),
    active: value.active === true,
    session: decodeSession(value.session),
    observations
  };
}

function decodeEvent(value: unknown): BlockingEvent | null {
  if (!isRecord(value) || !isBlockingKind(value.kind)) return null;
  const startTime = stringOrNull(value.startTime);
  if (startTime === null) return null;
  return {
    kind: value.kind,
    kinds: decodeKinds(value.kinds),
    startTime,
    preEventTarget: numberOrNull(value.preEventTarget),
    endTime: stringOrNull(value.endTime)
  };
}

function decodePhase(value: unknown): BlockingPhase {
  if (!isRecord(value)) return { state: 'NORMAL' };
  if (value.state === 'BLOCKED' && isBlockingKind(value.kind)) {
    return { state: 'BLOCKED', kind: value.kind };
  }
  if (value.state === 'GRACE' && isBlockingKind(value.kind)) {
    const startedAt = stringOrNull(value.startedAt);
    const direction = value.direction === 'cooldown' || value.direction === 'recovery' ? value.direction : null;
    if (startedAt !== null && direction !== null && isFiniteNumber(value.interimTarget)) {
      return { state: 'GRACE', kind: value.kind, direction, interimTarget: value.interimTarget, startedAt };
    }
  }
  return { state: 'NORMAL' };
}

function decodePending(value: unknown): PendingPrediction | null {
  if (!isRecord(value)) return null;
  const timestamp = stringOrNull(value.timestamp);
  const context = decodeContext(value.context);
  if (timestamp === null || context === null || !isFiniteNumber(value.predictedIndoor)) return null;
  return { timestamp, predictedIndoor: value.predictedIndoor, context };
}

function decodeCorrector(value: unknown): CorrectorState {
  const defaults = createCorrectorState();
  if (!isRecord(value)) return defaults;
  const mode = value.mode === 'disturbance' || value.mode === 'decay' ? value.mode : 'normal';
  return {
    mode,
    previousShortfall: numberOrNull(value.previousShortfall),
    riseStreak: numberOr(value.riseStreak, 0),
    calmStreak: numberOr(value.calmStreak, 0),
    heldCorrection: numberOr(value.heldCorrection, 0)
  };
}

function decodeControl(value: unknown): ControlMemory {
  if (!isRecord(value)) return createDefaultControlMemory();
  return {
    lastFinalTemp: numberOrNull(value.lastFinalTemp),
    lastBlockingReasons: decodeKinds(value.lastBlockingReasons),
    blockingEvent: decodeEvent(value.blockingEvent),
    phase: decodePhase(value.phase),
    pendingPrediction: decodePending(value.pendingPrediction),
    shortfallEwma: numberOr(value.shortfallEwma, 0),
    corrector: decodeCorrector(value.corrector)
  };
}

/**
 * Build a LearningState from parsed JSON.
 *
 * @throws PersistenceError when the value is not a learning-state record
 */
export function decodeLearningState(value: unknown): LearningState {
  if (!isRecord(value)) {
    throw new PersistenceError('Stored learning state is not an object');
  }
  if (value.schema !== undefined && value.schema !== LEARNING_STATE_SCHEMA) {
    throw new PersistenceError(`Unexpected schema tag: ${String(value.schema)}`);
  }

  const storedVersion = numberOr(value.version, 1);
  const migrated = storedVersion < 2;

  const predictionHistory = Array.isArray(value.predictionHistory)
    ? value.predictionHistory.map(decodePredictionRecord).filter((r): r is PredictionRecord => r !== null)
    : [];
  const parameterHistory = Array.isArray(value.parameterHistory)
    ? value.parameterHistory.map(decodeUpdateRecord).filter((r): r is ParameterUpdateRecord => r !== null)
    : [];

  return {
    schema: LEARNING_STATE_SCHEMA,
    version: LEARNING_STATE_VERSION,
    parameters: decodeParameters(value.parameters),
    predictionHistory: predictionHistory.slice(-LEARNING_CONSTANTS.PREDICTION_HISTORY_CAP),
    parameterHistory: parameterHistory.slice(-LEARNING_CONSTANTS.PARAMETER_HISTORY_CAP),
    cycleCount: Math.max(0, Math.floor(numberOr(value.cycleCount, 0))),
    learnedCycles: Math.max(0, Math.floor(numberOr(value.learnedCycles, 0))),
    lastUpdated: stringOrNull(value.lastUpdated),
    secondaryHeater: migrated ? createDefaultSecondaryHeaterState() : decodeSecondaryHeater(value.secondaryHeater),
    control: migrated ? createDefaultControlMemory() : decodeControl(value.control)
  };
}

/**
 * Default controller configuration
 *
 * Operational constants live here so installations can override them
 * through the settings file or environment without code changes.
 */

import { LearnedParameterName, ParameterRange, ThermalParameters } from '../types';

export interface ControlConfig {
  cycleIntervalMinutes: number;
  blockingPollSeconds: number;

  /** Absolute outlet safety range */
  outletMinTemp: number;
  outletMaxTemp: number;
  maxTempChangePerCycle: number;
  smartRounding: boolean;

  searchResolution: number;
  searchMaxIterations: number;

  predictionHorizonHours: number;
  forecastMaxAgeMinutes: number;

  gracePeriodMaxMinutes: number;
  graceStabilizationTolerance: number;

  maxTrajectoryCorrection: number;
  openWindowJump: number;
  openWindowConfirmCycles: number;
  openWindowClearCycles: number;

  secondaryHeaterRatioMin: number;
  secondaryHeaterRatioMax: number;
  secondaryHeaterOnThreshold: number;
  secondaryHeaterOffThreshold: number;
  heatUnitsPerKw: number;

  lowConfidenceThreshold: number;
  trainingCycles: number;

  stateFilePath: string;
  backupDir: string;
  gatewayUrl: string;
  gatewayToken: string;
  logLevel: string;

  calibrationLookbackHours: number;
}

export const DefaultControlConfig: ControlConfig = {
  cycleIntervalMinutes: 30,
  blockingPollSeconds: 60,

  outletMinTemp: 14,
  outletMaxTemp: 65,
  maxTempChangePerCycle: 2.0,
  smartRounding: true,

  searchResolution: 0.1,
  searchMaxIterations: 20,

  predictionHorizonHours: 4,
  forecastMaxAgeMinutes: 90,

  gracePeriodMaxMinutes: 30,
  graceStabilizationTolerance: 0,

  maxTrajectoryCorrection: 10,
  openWindowJump: 0.5,
  openWindowConfirmCycles: 2,
  openWindowClearCycles: 3,

  secondaryHeaterRatioMin: 1.0,
  secondaryHeaterRatioMax: 5.0,
  secondaryHeaterOnThreshold: 2.0,
  secondaryHeaterOffThreshold: 0.8,
  heatUnitsPerKw: 0.1,

  lowConfidenceThreshold: 0.5,
  trainingCycles: 10,

  stateFilePath: './data/learning-state.json',
  backupDir: './data/backups',
  gatewayUrl: 'http://localhost:8123/heatpump',
  gatewayToken: '',
  logLevel: 'INFO',

  calibrationLookbackHours: 672
};

/** Physical ranges every learned parameter is clamped to */
export const PARAMETER_BOUNDS: Record<LearnedParameterName, ParameterRange> & { learningConfidence: ParameterRange } = {
  thermalTimeConstant: { min: 6, max: 72 },
  heatLossCoefficient: { min: 0.01, max: 0.15 },
  outletEffectiveness: { min: 0.3, max: 1.5 },
  learningConfidence: { min: 0, max: 5 }
};

/** Cold-start parameters for a moderately insulated house */
export const DEFAULT_THERMAL_PARAMETERS: ThermalParameters = {
  thermalTimeConstant: 24,
  heatLossCoefficient: 0.05,
  outletEffectiveness: 0.5,
  learningConfidence: 1.0
};

export const LEARNING_CONSTANTS = {
  BASE_LEARNING_RATE: 0.05,
  MIN_LEARNING_RATE: 0.01,
  MAX_LEARNING_RATE: 0.3,
  RECENT_ERRORS_WINDOW: 10,
  CONFIDENCE_BOOST: 1.1,
  CONFIDENCE_DECAY: 0.99,
  STABILITY_REDUCTION: 0.8,
  CLAMP_STREAK_WARNING: 3,
  PREDICTION_HISTORY_CAP: 50,
  PARAMETER_HISTORY_CAP: 100,
  EPSILON: {
    thermalTimeConstant: 2.0,
    heatLossCoefficient: 0.005,
    outletEffectiveness: 0.05
  },
  STEP_SCALE: {
    thermalTimeConstant: 50,
    heatLossCoefficient: 0.005,
    outletEffectiveness: 0.05
  },
  STABILITY_THRESHOLD: {
    thermalTimeConstant: 0.05,
    heatLossCoefficient: 0.0005,
    outletEffectiveness: 0.005
  },
  ERROR_BOOST: [
    { above: 2.0, factor: 3.0 },
    { above: 1.0, factor: 2.0 },
    { above: 0.5, factor: 1.5 }
  ]
} as const;

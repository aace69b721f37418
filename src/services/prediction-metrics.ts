/**
 * Prediction accuracy metrics over the prediction history.
 */

import { PredictionRecord } from '../types';
import { mean, round } from '../util/stats';

export interface ErrorWindowStats {
  count: number;
  mae: number;
  rmse: number;
}

export type AccuracyBand = 'excellent' | 'veryGood' | 'good' | 'acceptable' | 'poor';

export interface AccuracyBreakdown {
  counts: Record<AccuracyBand, number>;
  percentages: Record<AccuracyBand, number>;
}

export type AccuracyTrend = 'improving' | 'stable' | 'degrading' | 'insufficient_data';

export interface PredictionMetricsReport {
  last12: ErrorWindowStats;
  last48: ErrorWindowStats;
  all: ErrorWindowStats;
  breakdown: AccuracyBreakdown;
  trend: AccuracyTrend;
  /** Share of predictions within ±0.5 °C */
  goodControlPercent: number;
}

const BAND_LIMITS: ReadonlyArray<{ band: AccuracyBand; upTo: number }> = [
  { band: 'excellent', upTo: 0.1 },
  { band: 'veryGood', upTo: 0.2 },
  { band: 'good', upTo: 0.5 },
  { band: 'acceptable', upTo: 1.0 }
];

const ACCURACY_BANDS: readonly AccuracyBand[] = ['excellent', 'veryGood', 'good', 'acceptable', 'poor'];

const GOOD_CONTROL_LIMIT = 0.5;
const TREND_THRESHOLD = 0.1;
const MIN_TREND_RECORDS = 4;

export function accuracyBand(error: number): AccuracyBand {
  const magnitude = Math.abs(error);
  return BAND_LIMITS.find(b => magnitude <= b.upTo)?.band ?? 'poor';
}

export function windowStats(errors: readonly number[]): ErrorWindowStats {
  if (errors.length === 0) {
    return { count: 0, mae: 0, rmse: 0 };
  }
  return {
    count: errors.length,
    mae: mean(errors.map(Math.abs)),
    rmse: Math.sqrt(mean(errors.map(e => e * e)))
  };
}

function emptyBands(): Record<AccuracyBand, number> {
  return { excellent: 0, veryGood: 0, good: 0, acceptable: 0, poor: 0 };
}

export function accuracyBreakdown(errors: readonly number[]): AccuracyBreakdown {
  const counts = emptyBands();
  for (const error of errors) {
    counts[accuracyBand(error)]++;
  }
  const percentages = emptyBands();
  if (errors.length > 0) {
    for (const band of ACCURACY_BANDS) {
      percentages[band] = round(counts[band] / errors.length * 100, 1);
    }
  }
  return { counts, percentages };
}

/**
 * Compare MAE of the newer half against the older half.
 */
export function accuracyTrend(errors: readonly number[]): AccuracyTrend {
  if (errors.length < MIN_TREND_RECORDS) {
    return 'insufficient_data';
  }
  const half = Math.floor(errors.length / 2);
  const older = mean(errors.slice(0, half).map(Math.abs));
  const newer = mean(errors.slice(errors.length - half).map(Math.abs));

  if (newer < older * (1 - TREND_THRESHOLD)) return 'improving';
  if (newer > older * (1 + TREND_THRESHOLD)) return 'degrading';
  return 'stable';
}

export function computePredictionMetrics(records: readonly PredictionRecord[]): PredictionMetricsReport {
  const errors = records.map(r => r.error).filter(Number.isFinite);
  const good = errors.filter(e => Math.abs(e) <= GOOD_CONTROL_LIMIT).length;

  return {
    last12: windowStats(errors.slice(-12)),
    last48: windowStats(errors.slice(-48)),
    all: windowStats(errors),
    breakdown: accuracyBreakdown(errors),
    trend: accuracyTrend(errors),
    goodControlPercent: errors.length > 0 ? round(good / errors.length * 100, 1) : 0
  };
}

/**
 * Forecast quality checks and the fallback used when forecasts cannot be
 * trusted. Missing or stale forecasts never fail a cycle: outdoor
 * temperature is held at its current value and PV is assumed to be zero.
 */

import { DateTime } from 'luxon';
import { SensorSnapshot } from '../../types';
import { isFiniteNumber } from '../../util/validation';

export const FORECAST_HOURS = 4;

const OUTDOOR_RANGE = { min: -40, max: 50 };
const PV_RANGE = { min: 0, max: 15000 };

export interface ForecastQuality {
  outdoorAvailability: number;
  pvAvailability: number;
  outdoorConfidence: number;
  pvConfidence: number;
  overallConfidence: number;
}

export type ForecastFallbackReason = 'none' | 'missing' | 'stale' | 'low_confidence';

export interface ResolvedForecast {
  outdoor: number[];
  pv: number[];
  fallbackReason: ForecastFallbackReason;
  quality: ForecastQuality;
}

function ratio(part: number, whole: number): number {
  return whole > 0 ? part / whole : 0;
}

export function analyzeForecastQuality(outdoor: readonly unknown[], pv: readonly unknown[]): ForecastQuality {
  const validOutdoor = outdoor.slice(0, FORECAST_HOURS).filter(isFiniteNumber);
  const validPv = pv.slice(0, FORECAST_HOURS).filter(isFiniteNumber).filter(v => v >= 0);

  const outdoorAvailability = ratio(validOutdoor.length, FORECAST_HOURS);
  const pvAvailability = ratio(validPv.length, FORECAST_HOURS);

  const outdoorConfidence = ratio(
    validOutdoor.filter(v => v >= OUTDOOR_RANGE.min && v <= OUTDOOR_RANGE.max).length,
    validOutdoor.length
  );
  const pvConfidence = ratio(validPv.filter(v => v <= PV_RANGE.max).length, validPv.length);

  return {
    outdoorAvailability,
    pvAvailability,
    outdoorConfidence,
    pvConfidence,
    overallConfidence: (outdoorAvailability * outdoorConfidence + pvAvailability * pvConfidence) / 2
  };
}

function fallback(snapshot: SensorSnapshot, reason: ForecastFallbackReason, quality: ForecastQuality): ResolvedForecast {
  return {
    outdoor: new Array<number>(FORECAST_HOURS).fill(snapshot.outdoorTemp),
    pv: new Array<number>(FORECAST_HOURS).fill(0),
    fallbackReason: reason,
    quality
  };
}

/**
 * Per-hour outdoor and PV values for +1h..+4h, usable as-is.
 */
export function resolveForecasts(
  snapshot: SensorSnapshot,
  now: DateTime,
  maxAgeMinutes: number
): ResolvedForecast {
  const forecast = snapshot.forecast;
  const empty = analyzeForecastQuality([], []);

  if (!forecast || (forecast.outdoor.length === 0 && forecast.pv.length === 0)) {
    return fallback(snapshot, 'missing', empty);
  }

  const quality = analyzeForecastQuality(forecast.outdoor, forecast.pv);

  if (forecast.issuedAt) {
    const issued = DateTime.fromISO(forecast.issuedAt);
    if (!issued.isValid || now.diff(issued, 'minutes').minutes > maxAgeMinutes) {
      return fallback(snapshot, 'stale', quality);
    }
  }

  if (quality.overallConfidence < 0.5) {
    return fallback(snapshot, 'low_confidence', quality);
  }

  const outdoor: number[] = [];
  const pv: number[] = [];
  for (let hour = 0; hour < FORECAST_HOURS; hour++) {
    const t = forecast.outdoor[hour];
    const p = forecast.pv[hour];
    outdoor.push(isFiniteNumber(t) && t >= OUTDOOR_RANGE.min && t <= OUTDOOR_RANGE.max ? t : snapshot.outdoorTemp);
    pv.push(isFiniteNumber(p) && p >= PV_RANGE.min && p <= PV_RANGE.max ? p : 0);
  }

  return { outdoor, pv, fallbackReason: 'none', quality };
}

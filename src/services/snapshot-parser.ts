/**
 * Snapshot parsing
 *
 * Converts the flat record read from the building-automation bridge into a
 * SensorSnapshot. Every missing required field is collected so a single
 * NoDataError names all of them.
 */

import { DateTime } from 'luxon';
import { BLOCKING_KINDS, BlockingKind, BlockingReading, ForecastVectors, RawSnapshot, SensorSnapshot } from '../types';
import { NoDataError } from '../util/error-handler';
import { isFiniteNumber, isRecord } from '../util/validation';

export const REQUIRED_FIELDS = [
  'indoorTemp',
  'outdoorTemp',
  'outletTempActual',
  'targetIndoorTemp',
  'heatingActive'
] as const;

/** Numbers may arrive as numeric strings */
export function readNumber(value: unknown): number | undefined {
  if (isFiniteNumber(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function readBoolean(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (value === 'on' || value === 'true' || value === 1) return true;
  if (value === 'off' || value === 'false' || value === 0) return false;
  return undefined;
}

function toBlockingKind(value: unknown): BlockingKind | undefined {
  if (typeof value !== 'string') return undefined;
  const upper = value.trim().toUpperCase();
  return BLOCKING_KINDS.find(kind => kind === upper);
}

/**
 * Active blocking modes from either a list of names (`["dhw"]`) or a map of
 * flags (`{ "DHW": true, "DEFROST": false }`).
 */
export function parseBlocking(value: unknown): BlockingKind[] {
  const kinds = new Set<BlockingKind>();
  if (Array.isArray(value)) {
    for (const entry of value) {
      const kind = toBlockingKind(entry);
      if (kind) kinds.add(kind);
    }
  } else if (isRecord(value)) {
    for (const [key, flag] of Object.entries(value)) {
      const kind = toBlockingKind(key);
      if (kind && readBoolean(flag) === true) kinds.add(kind);
    }
  }
  return BLOCKING_KINDS.filter(kind => kinds.has(kind));
}

function readSeries(value: unknown): number[] {
  if (!Array.isArray(value)) return [];
  return value.map(entry => readNumber(entry) ?? Number.NaN);
}

function parseForecast(raw: RawSnapshot): ForecastVectors | undefined {
  const outdoor = readSeries(raw.outdoorForecast);
  const pv = readSeries(raw.pvForecast);
  if (outdoor.length === 0 && pv.length === 0) {
    return undefined;
  }
  const issuedAt = typeof raw.forecastIssuedAt === 'string' ? raw.forecastIssuedAt : undefined;
  return issuedAt ? { outdoor, pv, issuedAt } : { outdoor, pv };
}

/**
 * @throws NoDataError listing every required field that is absent or invalid
 */
export function parseSnapshot(raw: RawSnapshot, now: DateTime = DateTime.now()): SensorSnapshot {
  const missing: string[] = [];
  const number = (field: string): number => {
    const value = readNumber(raw[field]);
    if (value === undefined) {
      missing.push(field);
      return Number.NaN;
    }
    return value;
  };

  const indoorTemp = number('indoorTemp');
  const outdoorTemp = number('outdoorTemp');
  const outletTempActual = number('outletTempActual');
  const targetIndoorTemp = number('targetIndoorTemp');
  const heatingActive = readBoolean(raw.heatingActive);
  if (heatingActive === undefined) {
    missing.push('heatingActive');
  }

  if (missing.length > 0 || heatingActive === undefined) {
    throw new NoDataError(missing);
  }

  const timestamp = typeof raw.timestamp === 'string' && DateTime.fromISO(raw.timestamp).isValid
    ? raw.timestamp
    : now.toUTC().toISO() ?? new Date(now.toMillis()).toISOString();

  const pvPowerW = readNumber(raw.pvPowerW);
  const secondaryZoneTemp = readNumber(raw.secondaryZoneTemp);
  const tvOn = readBoolean(raw.tvOn);
  const occupancy = readNumber(raw.occupancy);
  const forecast = parseForecast(raw);

  return {
    timestamp,
    indoorTemp,
    outdoorTemp,
    outletTempActual,
    targetIndoorTemp,
    heatingActive,
    blocking: parseBlocking(raw.blocking),
    ...(pvPowerW !== undefined ? { pvPowerW } : {}),
    ...(secondaryZoneTemp !== undefined ? { secondaryZoneTemp } : {}),
    ...(tvOn !== undefined ? { tvOn } : {}),
    ...(occupancy !== undefined ? { occupancy } : {}),
    ...(forecast ? { forecast } : {})
  };
}

/**
 * Blocking poll payload: `{ blocking, outletTempActual }`.
 */
export function parseBlockingReading(raw: RawSnapshot): BlockingReading {
  return {
    blocking: parseBlocking(raw.blocking),
    outletTempActual: readNumber(raw.outletTempActual) ?? null
  };
}

import { DateTime } from 'luxon';
import {
  parseBlocking,
  parseBlockingReading,
  parseSnapshot,
  readBoolean,
  readNumber
} from '../../src/services/snapshot-parser';
import { NoDataError } from '../../src/util/error-handler';

const now = DateTime.fromISO('2026-01-15T10:00:00.000Z', { zone: 'utc' });

const complete = {
  timestamp: '2026-01-15T09:30:00.000Z',
  indoorTemp: '20.5',
  outdoorTemp: -3,
  outletTempActual: 31.5,
  targetIndoorTemp: 21,
  heatingActive: 'on',
  blocking: ['dhw', 'bogus']
};

describe('snapshot parsing', () => {
  test('reads a complete snapshot', () => {
    expect(parseSnapshot(complete, now)).toEqual({
      timestamp: '2026-01-15T09:30:00.000Z',
      indoorTemp: 20.5,
      outdoorTemp: -3,
      outletTempActual: 31.5,
      targetIndoorTemp: 21,
      heatingActive: true,
      blocking: ['DHW']
    });
  });

  test('names every missing required field', () => {
    expect.assertions(2);
    try {
      parseSnapshot({ indoorTemp: 20, outdoorTemp: 'n/a' }, now);
    } catch (error) {
      expect(error).toBeInstanceOf(NoDataError);
      if (error instanceof NoDataError) {
        expect(error.missing).toEqual(['outdoorTemp', 'outletTempActual', 'targetIndoorTemp', 'heatingActive']);
      }
    }
  });

  test('stamps snapshots without a valid timestamp', () => {
    const snapshot = parseSnapshot({ ...complete, timestamp: 'yesterday' }, now);
    expect(DateTime.fromISO(snapshot.timestamp).toMillis()).toBe(now.toMillis());
  });

  test('keeps optional heat-source readings and forecasts', () => {
    const snapshot = parseSnapshot({
      ...complete,
      pvPowerW: '1200',
      tvOn: 'off',
      occupancy: 2,
      outdoorForecast: [1, '2', 'x'],
      forecastIssuedAt: '2026-01-15T09:00:00.000Z'
    }, now);
    expect(snapshot.pvPowerW).toBe(1200);
    expect(snapshot.tvOn).toBe(false);
    expect(snapshot.occupancy).toBe(2);
    expect(snapshot.secondaryZoneTemp).toBeUndefined();
    expect(snapshot.forecast).toEqual({
      outdoor: [1, 2, Number.NaN],
      pv: [],
      issuedAt: '2026-01-15T09:00:00.000Z'
    });
  });

  test('reads blocking flags from a map', () => {
    expect(parseBlocking({ boost: 1, DHW: true, DEFROST: 'off' })).toEqual(['DHW', 'BOOST']);
    expect(parseBlocking('DHW')).toEqual([]);
  });

  test('reads a blocking poll payload', () => {
    expect(parseBlockingReading({ blocking: ['DEFROST'], outletTempActual: 'x' })).toEqual({
      blocking: ['DEFROST'],
      outletTempActual: null
    });
  });

  test('coerces scalar readings', () => {
    expect(readNumber(' 7 ')).toBe(7);
    expect(readNumber('')).toBeUndefined();
    expect(readNumber(Number.POSITIVE_INFINITY)).toBeUndefined();
    expect(readBoolean('true')).toBe(true);
    expect(readBoolean(0)).toBe(false);
    expect(readBoolean('yes')).toBeUndefined();
  });
});

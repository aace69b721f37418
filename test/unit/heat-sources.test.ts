import { DateTime } from 'luxon';
import {
  electronicsKilowatts,
  HeatSourceCoordinator,
  pvKilowatts,
  weatherFactor
} from '../../src/services/heat-sources/heat-source-coordinator';
import { analyzeForecastQuality, resolveForecasts } from '../../src/services/heat-sources/forecast-quality';
import { SecondaryHeaterLearner } from '../../src/services/heat-sources/secondary-heater-learner';
import { DefaultControlConfig } from '../../src/config/control-defaults';
import { createMockLogger } from '../mocks/logger.mock';
import { makeSnapshot } from '../mocks/snapshot.mock';

const NOW = DateTime.fromISO('2026-01-15T10:00:00.000Z');

describe('heat source helpers', () => {
  test('weather factor by outdoor temperature', () => {
    expect(weatherFactor(-10)).toBe(1.3);
    expect(weatherFactor(0)).toBe(1.1);
    expect(weatherFactor(10)).toBe(1.0);
    expect(weatherFactor(10.1)).toBe(0.8);
  });

  test('PV below the minimum contributes nothing', () => {
    expect(pvKilowatts(49, 5)).toBe(0);
    expect(pvKilowatts(2000, 5)).toBeCloseTo(0.5, 9);
    expect(pvKilowatts(2000, -15)).toBeCloseTo(0.65, 9);
  });

  test('electronics only while the TV is on', () => {
    expect(electronicsKilowatts(false, 4)).toBe(0);
    expect(electronicsKilowatts(true)).toBeCloseTo(0.55, 9);
    expect(electronicsKilowatts(true, 4)).toBeCloseTo(0.85, 9);
  });
});

describe('HeatSourceCoordinator', () => {
  let coordinator: HeatSourceCoordinator;

  beforeEach(() => {
    coordinator = new HeatSourceCoordinator(DefaultControlConfig, createMockLogger());
  });

  test('reports every source and sums them', () => {
    const summary = coordinator.assess(makeSnapshot({ pvPowerW: 2000, tvOn: true }), NOW);
    expect(summary.contributions.map(c => c.sourceId)).toEqual(['pv', 'secondary_heater', 'electronics']);
    expect(summary.totalKilowatts).toBeCloseTo(1.05, 9);
    expect(summary.totalHeatUnits).toBeCloseTo(0.105, 9);
    expect(summary.secondaryHeater).toBeNull();
  });

  test('no auxiliary heat without optional inputs', () => {
    const summary = coordinator.assess(makeSnapshot(), NOW);
    expect(summary.totalHeatUnits).toBe(0);
    expect(summary.forecast.fallbackReason).toBe('missing');
    expect(summary.steps).toEqual([
      { outdoorTemp: 5, heatUnits: 0 },
      { outdoorTemp: 5, heatUnits: 0 },
      { outdoorTemp: 5, heatUnits: 0 },
      { outdoorTemp: 5, heatUnits: 0 }
    ]);
  });

  test('projects PV from the forecast and holds the other sources', () => {
    const summary = coordinator.assess(makeSnapshot({
      tvOn: true,
      forecast: { outdoor: [4, 3, 2, 1], pv: [1000, 0, 0, 0], issuedAt: '2026-01-15T09:50:00.000Z' }
    }), NOW);
    expect(summary.forecast.fallbackReason).toBe('none');
    expect(summary.steps.map(s => s.outdoorTemp)).toEqual([4, 3, 2, 1]);
    expect(summary.steps[0].heatUnits).toBeCloseTo(0.08, 9);
    expect(summary.steps[1].heatUnits).toBeCloseTo(0.055, 9);
  });

  test('counts the secondary heater once it is burning', () => {
    coordinator.assess(makeSnapshot({ indoorTemp: 20, secondaryZoneTemp: 24 }), NOW);
    const summary = coordinator.assess(makeSnapshot({
      timestamp: '2026-01-15T10:30:00.000Z',
      indoorTemp: 20,
      secondaryZoneTemp: 23
    }), NOW);
    const secondary = summary.contributions.find(c => c.sourceId === 'secondary_heater');
    expect(secondary?.kilowatts).toBeCloseTo(3 * 2.5, 9);
    expect(summary.secondaryHeater?.active).toBe(true);
  });
});

describe('SecondaryHeaterLearner', () => {
  const options = { ratioMin: 1, ratioMax: 5, onThreshold: 2, offThreshold: 0.8, heatUnitsPerKw: 0.1 };

  function session(learner: SecondaryHeaterLearner, day: number): boolean {
    const d = String(day).padStart(2, '0');
    learner.observe({ timestamp: `2026-01-${d}T10:00:00.000Z`, zoneTemp: 24, indoorTemp: 20, outdoorTemp: 0 });
    learner.observe({ timestamp: `2026-01-${d}T10:30:00.000Z`, zoneTemp: 25, indoorTemp: 20.5, outdoorTemp: 0 });
    return learner.observe({ timestamp: `2026-01-${d}T11:00:00.000Z`, zoneTemp: 21, indoorTemp: 21, outdoorTemp: 0 }).recorded;
  }

  test('switches with hysteresis', () => {
    const learner = new SecondaryHeaterLearner(options);
    expect(learner.observe({ timestamp: '2026-01-01T10:00:00.000Z', zoneTemp: 21.5, indoorTemp: 20, outdoorTemp: 0 }).active).toBe(false);
    expect(learner.observe({ timestamp: '2026-01-01T10:10:00.000Z', zoneTemp: 22.5, indoorTemp: 20, outdoorTemp: 0 }).transition).toBe('started');
    expect(learner.observe({ timestamp: '2026-01-01T10:20:00.000Z', zoneTemp: 21.5, indoorTemp: 20, outdoorTemp: 0 }).active).toBe(true);
    expect(learner.observe({ timestamp: '2026-01-01T10:40:00.000Z', zoneTemp: 20.5, indoorTemp: 20, outdoorTemp: 0 }).transition).toBe('ended');
    expect(learner.isActive()).toBe(false);
  });

  test('ignores sessions of ten minutes or less', () => {
    const learner = new SecondaryHeaterLearner(options);
    learner.observe({ timestamp: '2026-01-01T10:00:00.000Z', zoneTemp: 24, indoorTemp: 20, outdoorTemp: 0 });
    const end = learner.observe({ timestamp: '2026-01-01T10:10:00.000Z', zoneTemp: 20, indoorTemp: 20, outdoorTemp: 0 });
    expect(end.transition).toBe('ended');
    expect(end.recorded).toBe(false);
    expect(learner.getState().observations).toHaveLength(0);
  });

  test('learns the ratio after three sessions', () => {
    const learner = new SecondaryHeaterLearner(options);
    expect(session(learner, 1)).toBe(true);
    expect(session(learner, 2)).toBe(true);
    expect(learner.getRatio()).toBe(2.5);

    session(learner, 3);
    const estimate = 1.0 / (4.5 * 0.1);
    expect(learner.getRatio()).toBeCloseTo(2.5 * 0.9 + estimate * 0.1, 9);
    expect(learner.getConfidence()).toBeCloseTo(0.06, 9);

    const obs = learner.getState().observations[0];
    expect(obs.durationMinutes).toBe(60);
    expect(obs.peakDifferential).toBe(4.5);
    expect(obs.indoorRise).toBeCloseTo(1.0, 9);
  });

  test('clamps a stored ratio to the configured bounds', () => {
    const logger = createMockLogger();
    const learner = new SecondaryHeaterLearner(options, logger, {
      ratio: 12, confidence: 0.5, active: false, session: null, observations: []
    });
    expect(learner.getRatio()).toBe(5);
    expect(logger.warn).toHaveBeenCalled();
  });
});

describe('forecast quality', () => {
  test('scores availability and plausibility', () => {
    const q = analyzeForecastQuality([1, 2, 100, Number.NaN], [0, 500]);
    expect(q.outdoorAvailability).toBe(0.75);
    expect(q.outdoorConfidence).toBeCloseTo(2 / 3, 9);
    expect(q.pvAvailability).toBe(0.5);
    expect(q.pvConfidence).toBe(1);
    expect(q.overallConfidence).toBeCloseTo((0.75 * 2 / 3 + 0.5) / 2, 9);
  });

  test('falls back on a stale forecast', () => {
    const resolved = resolveForecasts(makeSnapshot({
      outdoorTemp: -3,
      forecast: { outdoor: [1, 2, 3, 4], pv: [0, 0, 0, 0], issuedAt: '2026-01-15T08:00:00.000Z' }
    }), NOW, 90);
    expect(resolved.fallbackReason).toBe('stale');
    expect(resolved.outdoor).toEqual([-3, -3, -3, -3]);
    expect(resolved.pv).toEqual([0, 0, 0, 0]);
  });

  test('falls back on an implausible forecast', () => {
    const resolved = resolveForecasts(makeSnapshot({
      forecast: { outdoor: [100, 100, 100, 100], pv: [] }
    }), NOW, 90);
    expect(resolved.fallbackReason).toBe('low_confidence');
  });

  test('patches single bad hours with current values', () => {
    const resolved = resolveForecasts(makeSnapshot({
      outdoorTemp: 5,
      forecast: { outdoor: [4, 99, 2, 1], pv: [100, 200, 300, 400] }
    }), NOW, 90);
    expect(resolved.fallbackReason).toBe('none');
    expect(resolved.outdoor).toEqual([4, 5, 2, 1]);
    expect(resolved.pv).toEqual([100, 200, 300, 400]);
  });
});

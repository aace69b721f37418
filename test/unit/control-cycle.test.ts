import { DateTime } from 'luxon';
import { ControlCycle } from '../../src/services/control-cycle';
import { createDefaultLearningState } from '../../src/services/learning-state-codec';
import { DefaultControlConfig } from '../../src/config/control-defaults';
import { NetworkError, PersistenceError } from '../../src/util/error-handler';
import { LearningState } from '../../src/types';
import { createMockLogger, MockLogger } from '../mocks/logger.mock';
import { FakeGateway, MemoryStore, rawSnapshot as raw } from '../mocks/gateway.mock';

const NOW = DateTime.fromISO('2026-01-15T10:00:00.000Z', { zone: 'utc' });

describe('ControlCycle', () => {
  let gateway: FakeGateway;
  let store: MemoryStore;
  let logger: MockLogger;

  function cycle(initial?: LearningState): ControlCycle {
    if (initial) {
      store = new MemoryStore(initial);
    }
    return new ControlCycle({ config: DefaultControlConfig, gateway, store, logger, clock: () => NOW });
  }

  beforeEach(() => {
    gateway = new FakeGateway();
    store = new MemoryStore();
    logger = createMockLogger();
  });

  describe('input faults', () => {
    test('reports NETWORK_ERROR when the snapshot cannot be read', async () => {
      gateway.snapshots.push(new NetworkError('bridge unreachable'));
      const result = await cycle().runCycle();

      expect(result.status.code).toBe('NETWORK_ERROR');
      expect(result.status.lastError).toBe('bridge unreachable');
      expect(result.command).toBeNull();
      expect(result.status.cycle).toBe(0);
      expect(store.saved).toHaveLength(0);
      expect(gateway.publishStatus).toHaveBeenCalledTimes(1);
    });

    test('reports NO_DATA with the missing inputs', async () => {
      gateway.snapshots.push({ ...raw(), outdoorTemp: null, indoorTemp: 'n/a' });
      const result = await cycle().runCycle();

      expect(result.status.code).toBe('NO_DATA');
      expect(result.status.missingInputs).toEqual(['indoorTemp', 'outdoorTemp']);
      expect(result.status.description).toBe('Required sensor inputs missing');
      expect(gateway.writeOutletCommand).not.toHaveBeenCalled();
      expect(store.saved).toHaveLength(0);
    });
  });

  describe('normal control', () => {
    test('first cycle writes a rate-limited command and leaves a pending prediction', async () => {
      gateway.snapshots.push(raw());
      const result = await cycle().runCycle();

      // the solver asks for roughly 23 °C; the step from the measured 30 °C is capped at 2
      expect(result.command).toBe(28);
      expect(gateway.writeOutletCommand).toHaveBeenCalledWith(28);
      expect(result.status).toMatchObject({
        code: 'TRAINING',
        finalTemp: 28,
        cycle: 1,
        timestamp: '2026-01-15T10:00:00.000Z',
        lastUpdated: '2026-01-15T10:00:00.000Z',
        lastError: null,
        degraded: false
      });
      expect(result.learned).toBe(false);

      const saved = store.last();
      expect(saved?.cycleCount).toBe(1);
      expect(saved?.control.lastFinalTemp).toBe(28);
      expect(saved?.control.pendingPrediction).toMatchObject({
        timestamp: '2026-01-15T10:00:00.000Z',
        context: { outletTemp: 28, outdoorTemp: 5, heatUnits: 0, startIndoor: 20.5, cycleHours: 0.5 }
      });
      expect(logger.marker).toHaveBeenCalledWith('Control cycle 1');
    });

    test('learns from the previous prediction on the next cycle', async () => {
      const control = cycle();
      gateway.snapshots.push(raw(), raw({ timestamp: '2026-01-15T10:30:00.000Z', indoorTemp: 20.6 }));
      await control.runCycle();
      const second = await control.runCycle();

      expect(second.learned).toBe(true);
      const state = control.getState();
      expect(state.learnedCycles).toBe(1);
      expect(state.predictionHistory).toHaveLength(1);
      expect(state.predictionHistory[0].context.startIndoor).toBe(20.5);
      expect(control.getMetrics().all.count).toBe(1);
    });

    test('drops a prediction whose outcome arrives cycles late', async () => {
      const control = cycle();
      gateway.snapshots.push(
        raw(),
        new NetworkError('bridge unreachable'),
        new NetworkError('bridge unreachable'),
        raw({ timestamp: '2026-01-15T11:30:00.000Z', indoorTemp: 20.6 })
      );
      for (let i = 0; i < 3; i++) {
        await control.runCycle();
      }
      const late = await control.runCycle();

      expect(late.learned).toBe(false);
      expect(control.getState().learnedCycles).toBe(0);
      expect(control.getState().predictionHistory).toEqual([]);
      expect(logger.learning).toHaveBeenCalledWith(
        'Pending prediction dropped: outcome not one cycle later',
        { elapsedHours: 1.5, expectedHours: 0.5 }
      );
    });

    test('heats a slightly cool room with a moderate outlet', async () => {
      const trained = { ...createDefaultLearningState(), learnedCycles: 20 };
      gateway.snapshots.push(raw({ indoorTemp: 20.4, targetIndoorTemp: 21 }));
      const result = await cycle(trained).runCycle();

      expect(result.status.code).toBe('OK');
      expect(result.command).not.toBeNull();
      expect(result.command ?? Number.NaN).toBeGreaterThan(5);
      expect(result.command ?? Number.NaN).toBeLessThan(DefaultControlConfig.outletMaxTemp);
    });

    test('reports a search that hits its iteration cap as degraded', async () => {
      const control = new ControlCycle({
        config: { ...DefaultControlConfig, searchMaxIterations: 2 },
        gateway,
        store,
        logger,
        clock: () => NOW
      });
      gateway.snapshots.push(raw());
      const result = await control.runCycle();

      // two halvings of 14..65 stop at 26.75
      expect(result.status).toMatchObject({
        code: 'TRAINING',
        suggestedTemp: 26.75,
        degraded: true,
        lastError: 'Outlet search did not converge after 2 iterations'
      });
      expect(result.command).not.toBeNull();
      expect(logger.warn).toHaveBeenCalledWith(
        'SEARCH_NON_CONVERGENCE: Outlet search did not converge after 2 iterations',
        expect.objectContaining({ category: 'SEARCH_NON_CONVERGENCE', outlet: 26.75 })
      );
    });

    test('reports OK once trained and confident', async () => {
      const trained = { ...createDefaultLearningState(), learnedCycles: 20 };
      gateway.snapshots.push(raw());
      expect((await cycle(trained).runCycle()).status.code).toBe('OK');
    });

    test('reports LOW_CONFIDENCE after training when confidence is low', async () => {
      const state = createDefaultLearningState();
      const shaky = { ...state, learnedCycles: 20, parameters: { ...state.parameters, learningConfidence: 0.3 } };
      gateway.snapshots.push(raw());
      const result = await cycle(shaky).runCycle();
      expect(result.status.code).toBe('LOW_CONFIDENCE');
      expect(result.status.confidence).toBe(0.3);
    });

    test('pauses while heating is off', async () => {
      const control = cycle();
      gateway.snapshots.push(raw(), raw({ heatingActive: false }));
      await control.runCycle();
      const result = await control.runCycle();

      expect(result.status.code).toBe('HEATING_OFF');
      expect(result.command).toBeNull();
      expect(gateway.writeOutletCommand).toHaveBeenCalledTimes(1);
      expect(control.getState().control.pendingPrediction).toBeNull();
    });
  });

  describe('blocking', () => {
    test('holds during hot water, cools down, then resumes', async () => {
      const control = cycle();
      gateway.snapshots.push(
        raw(),
        raw({ timestamp: '2026-01-15T10:30:00.000Z', blocking: ['DHW'], outletTempActual: 50 }),
        raw({ timestamp: '2026-01-15T11:00:00.000Z', outletTempActual: 50 }),
        raw({ timestamp: '2026-01-15T11:15:00.000Z', outletTempActual: 30 })
      );
      await control.runCycle();

      const blocked = await control.runCycle();
      expect(blocked.status).toMatchObject({
        code: 'BLOCKED',
        blockingReasons: ['DHW'],
        finalTemp: 28,
        description: 'Blocked by DHW; command held'
      });
      expect(blocked.command).toBeNull();
      expect(gateway.writeOutletCommand).toHaveBeenCalledTimes(1);
      expect(control.getState().control.pendingPrediction).toBeNull();

      const grace = await control.runCycle();
      expect(grace.status.code).toBe('BLOCKED');
      expect(grace.status.description).toBe('Grace period after DHW: waiting for cooldown to 30.0°C');
      expect(grace.command).toBe(30);
      expect(gateway.writeOutletCommand).toHaveBeenLastCalledWith(30);

      const resumed = await control.runCycle();
      expect(resumed.status.code).toBe('TRAINING');
      expect(resumed.learned).toBe(false);
      const memory = control.getState().control;
      expect(memory.phase).toEqual({ state: 'NORMAL' });
      expect(memory.blockingEvent).toBeNull();
      expect(memory.lastBlockingReasons).toEqual([]);
    });

    test('polling picks up blocking between cycles', async () => {
      gateway.readBlockingState.mockResolvedValueOnce({ blocking: ['DEFROST'], outletTempActual: 20 });
      const control = cycle();
      const decision = await control.pollBlocking();

      expect(decision?.transition).toBe('blocked');
      expect(control.getState().control.phase).toEqual({ state: 'BLOCKED', kind: 'DEFROST' });
      expect(store.last()?.control.phase).toEqual({ state: 'BLOCKED', kind: 'DEFROST' });
      expect(store.last()?.control.blockingEvent?.kinds).toEqual(['DEFROST']);
      expect(gateway.publishStatus).toHaveBeenCalledWith(expect.objectContaining({ code: 'BLOCKED' }));
    });

    test('a poll that sees the block end writes the grace target', async () => {
      const control = cycle();
      gateway.snapshots.push(raw());
      await control.runCycle();
      gateway.readBlockingState
        .mockResolvedValueOnce({ blocking: ['DHW'], outletTempActual: 50 })
        .mockResolvedValueOnce({ blocking: [], outletTempActual: 50 });

      expect((await control.pollBlocking())?.transition).toBe('blocked');
      expect(gateway.writeOutletCommand).toHaveBeenCalledTimes(1);

      expect((await control.pollBlocking())?.transition).toBe('grace');
      expect(gateway.writeOutletCommand).toHaveBeenCalledTimes(2);
      expect(gateway.writeOutletCommand).toHaveBeenLastCalledWith(30);
      expect(control.getLastStatus()?.description).toBe('Grace period after DHW: waiting for cooldown to 30.0°C');
      expect(store.last()?.control.phase).toMatchObject({ state: 'GRACE', interimTarget: 30 });
    });

    test('a poll without a phase change neither writes nor saves', async () => {
      const control = cycle();
      await expect(control.pollBlocking()).resolves.toMatchObject({ transition: 'none' });
      expect(gateway.writeOutletCommand).not.toHaveBeenCalled();
      expect(store.saved).toHaveLength(0);
    });

    test('a failed poll changes nothing', async () => {
      gateway.readBlockingState.mockRejectedValueOnce(new NetworkError('bridge unreachable'));
      const control = cycle();
      await expect(control.pollBlocking()).resolves.toBeNull();
      expect(control.getState().control.phase).toEqual({ state: 'NORMAL' });
    });
  });

  describe('output faults', () => {
    test('a failed write reports NETWORK_ERROR and drops the prediction', async () => {
      gateway.writeOutletCommand.mockRejectedValueOnce(new NetworkError('write refused'));
      gateway.snapshots.push(raw());
      const control = cycle();
      const result = await control.runCycle();

      expect(result.status.code).toBe('NETWORK_ERROR');
      expect(result.status.lastError).toBe('write refused');
      expect(result.command).toBeNull();
      expect(store.last()?.control.pendingPrediction).toBeNull();
      expect(store.last()?.control.lastFinalTemp).toBeNull();
    });

    test('a failed save is reported but does not stop control', async () => {
      store.failWith = new PersistenceError('disk full');
      gateway.snapshots.push(raw());
      const result = await cycle().runCycle();

      expect(result.status.code).toBe('TRAINING');
      expect(result.command).toBe(28);
      expect(result.status.lastError).toBe('disk full');
      expect(logger.error).toHaveBeenCalledTimes(1);
    });

    test('a failed status publish is only logged', async () => {
      gateway.publishStatus.mockRejectedValueOnce(new Error('bridge offline'));
      gateway.snapshots.push(raw());
      const control = cycle();
      const result = await control.runCycle();

      expect(result.status.code).toBe('TRAINING');
      expect(logger.warn).toHaveBeenCalledWith('Could not publish status TRAINING: bridge offline');
      expect(control.getLastStatus()).toBe(result.status);
    });
  });
});

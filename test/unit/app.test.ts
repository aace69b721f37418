import { cycleCronExpression, HeatingControlApp, main, parseRunMode, pollCronExpression } from '../../src/app';
import { DefaultControlConfig } from '../../src/config/control-defaults';
import { BlockingReading, RawSnapshot } from '../../src/types';
import { createMockLogger, MockLogger } from '../mocks/logger.mock';
import { FakeGateway, MemoryStore, rawSnapshot } from '../mocks/gateway.mock';

describe('cron expressions', () => {
  test('control cycle', () => {
    expect(cycleCronExpression(30)).toBe('0 */30 * * * *');
    expect(cycleCronExpression(0)).toBe('0 */1 * * * *');
    expect(cycleCronExpression(120)).toBe('0 0 */2 * * *');
  });

  test('blocking poll', () => {
    expect(pollCronExpression(15)).toBe('*/15 * * * * *');
    expect(pollCronExpression(60)).toBe('0 */1 * * * *');
    expect(pollCronExpression(300)).toBe('0 */5 * * * *');
  });
});

describe('parseRunMode', () => {
  test('defaults to run', () => {
    expect(parseRunMode(undefined)).toBe('run');
    expect(parseRunMode('run')).toBe('run');
    expect(parseRunMode('calibrate')).toBe('calibrate');
    expect(parseRunMode('validate')).toBe('validate');
    expect(parseRunMode('optimize')).toBeUndefined();
  });
});

describe('HeatingControlApp', () => {
  let gateway: FakeGateway;
  let logger: MockLogger;
  let app: HeatingControlApp;

  beforeEach(() => {
    gateway = new FakeGateway();
    logger = createMockLogger();
    app = new HeatingControlApp(DefaultControlConfig, { logger, gateway, store: new MemoryStore() });
  });

  afterEach(() => {
    app.stop();
  });

  test('runs one cycle per tick', async () => {
    gateway.snapshots.push(rawSnapshot());
    await expect(app.tick()).resolves.toBe(true);
    expect(app.cycle.getLastStatus()?.code).toBe('TRAINING');
  });

  test('skips a tick while a cycle is still running', async () => {
    let release: (() => void) | undefined;
    jest.spyOn(gateway, 'readSnapshot').mockImplementationOnce(
      () => new Promise<RawSnapshot>(resolve => {
        release = () => resolve(rawSnapshot());
      })
    );

    const first = app.tick();
    await expect(app.tick()).resolves.toBe(false);
    await expect(app.poll()).resolves.toBe(false);
    expect(logger.warn).toHaveBeenCalledWith('Previous cycle still running; skipping this tick');

    release?.();
    await expect(first).resolves.toBe(true);
    await expect(app.poll()).resolves.toBe(true);
  });

  test('a tick waits for an in-flight poll instead of skipping', async () => {
    let release: (() => void) | undefined;
    gateway.readBlockingState.mockImplementationOnce(
      () => new Promise<BlockingReading>(resolve => {
        release = () => resolve({ blocking: [], outletTempActual: 30 });
      })
    );
    gateway.snapshots.push(rawSnapshot());

    const polling = app.poll();
    const ticking = app.tick();
    await expect(app.poll()).resolves.toBe(false);
    expect(gateway.writeOutletCommand).not.toHaveBeenCalled();

    release?.();
    await expect(polling).resolves.toBe(true);
    await expect(ticking).resolves.toBe(true);
    expect(gateway.writeOutletCommand).toHaveBeenCalledWith(28);
    expect(logger.warn).not.toHaveBeenCalledWith('Previous cycle still running; skipping this tick');
  });

  test('start and stop manage the schedules', () => {
    gateway.snapshots.push(rawSnapshot());
    expect(app.isRunning()).toBe(false);
    app.start();
    expect(app.isRunning()).toBe(true);
    app.stop();
    expect(app.isRunning()).toBe(false);
  });
});

describe('main', () => {
  test('rejects an unknown mode', async () => {
    const errors = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jest.spyOn(console, 'log').mockImplementation(() => undefined);

    await expect(main(['optimize'])).resolves.toBe(2);
    expect(errors).toHaveBeenCalledTimes(1);
    jest.restoreAllMocks();
  });

  test('calibrate needs a history file', async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jest.spyOn(console, 'log').mockImplementation(() => undefined);

    await expect(main(['calibrate'])).resolves.toBe(2);
    jest.restoreAllMocks();
  });
});

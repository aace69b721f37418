import {
  ConsoleLogger,
  formatValue,
  LogCategory,
  LogLevel,
  LogSink,
  parseLogLevel
} from '../../src/util/logger';

function captureSink(): LogSink & { lines: string[]; errors: string[] } {
  const lines: string[] = [];
  const errors: string[] = [];
  return {
    lines,
    errors,
    out: line => { lines.push(line); },
    err: line => { errors.push(line); }
  };
}

describe('ConsoleLogger', () => {
  let sink: ReturnType<typeof captureSink>;
  let logger: ConsoleLogger;

  beforeEach(() => {
    sink = captureSink();
    logger = new ConsoleLogger({ includeTimestamps: false, verboseMode: false }, sink);
  });

  test('writes info with context', () => {
    logger.info('Cycle complete', { cycle: 3 });
    expect(sink.lines).toEqual(['INFO: Cycle complete {"cycle":3}']);
  });

  test('writes warnings and errors to the error stream', () => {
    logger.warn('Forecast stale');
    logger.error('Save failed', new Error('disk full'), { file: 'state.json' });
    expect(sink.lines).toEqual([]);
    expect(sink.errors).toEqual([
      'WARN: Forecast stale',
      'ERROR: Save failed disk full {"file":"state.json"}'
    ]);
  });

  test('respects the log level', () => {
    logger.setLogLevel(LogLevel.WARN);
    logger.info('hidden');
    logger.control('hidden');
    logger.warn('shown');
    expect(sink.lines).toEqual([]);
    expect(sink.errors).toEqual(['WARN: shown']);
    expect(logger.getLogLevel()).toBe(LogLevel.WARN);
  });

  test('filters by category', () => {
    logger.disableCategory(LogCategory.LEARNING);
    logger.learning('Parameters updated');
    logger.control('Outlet 35', { outlet: 35 });
    expect(sink.lines).toEqual(['CONTROL: Outlet 35 {"outlet":35}']);
    expect(logger.isCategoryEnabled(LogCategory.LEARNING)).toBe(false);
    logger.enableCategory(LogCategory.LEARNING);
    expect(logger.isCategoryEnabled(LogCategory.LEARNING)).toBe(true);
  });

  test('debug output needs verbose mode', () => {
    logger.setLogLevel(LogLevel.DEBUG);
    logger.debug('quiet');
    const verbose = new ConsoleLogger({ level: LogLevel.DEBUG, includeTimestamps: false, verboseMode: true }, sink);
    verbose.debug('loud', 1.5);
    expect(sink.lines).toEqual(['DEBUG: loud 1.500']);
  });

  test('child loggers carry a module prefix', () => {
    logger.child('Solver').info('converged');
    expect(sink.lines).toEqual(['INFO: [Solver] converged']);
  });

  test('markers frame the message', () => {
    logger.marker('Cycle 7');
    expect(sink.lines).toEqual(['===== Cycle 7 =====']);
  });
});

describe('formatValue', () => {
  test('formats scalars', () => {
    expect(formatValue(null)).toBe('null');
    expect(formatValue(undefined)).toBe('undefined');
    expect(formatValue(3)).toBe('3');
    expect(formatValue(1.23456)).toBe('1.235');
    expect(formatValue('text')).toBe('text');
    expect(formatValue(new Date('2026-01-15T10:00:00.000Z'))).toBe('2026-01-15T10:00:00.000Z');
  });

  test('shortens long arrays', () => {
    const values = Array.from({ length: 12 }, (_, i) => i + 1);
    expect(formatValue(values)).toBe('Array(12) [1, 2, 3, ... 6 more ..., 10, 11, 12]');
    expect(formatValue([1, 2])).toBe('[1, 2]');
  });
});

describe('parseLogLevel', () => {
  test('reads level names', () => {
    expect(parseLogLevel('warn')).toBe(LogLevel.WARN);
    expect(parseLogLevel(' DEBUG ')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('loud')).toBe(LogLevel.INFO);
    expect(parseLogLevel(undefined, LogLevel.ERROR)).toBe(LogLevel.ERROR);
  });
});

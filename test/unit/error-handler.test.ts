import {
  AppError,
  ErrorCategory,
  ErrorHandler,
  ModelIntegrityError,
  NetworkError,
  NoDataError,
  PersistenceError,
  errorMessage
} from '../../src/util/error-handler';
import { createMockLogger, MockLogger } from '../mocks/logger.mock';

describe('ErrorHandler', () => {
  let logger: MockLogger;
  let handler: ErrorHandler;

  beforeEach(() => {
    logger = createMockLogger();
    handler = new ErrorHandler(logger);
  });

  test('keeps the category of typed faults', () => {
    expect(handler.categorizeError(new NoDataError(['indoorTemp']))).toBe(ErrorCategory.NO_DATA);
    expect(handler.categorizeError(new ModelIntegrityError('out of band'))).toBe(ErrorCategory.MODEL_INTEGRITY);
    expect(handler.categorizeError(new PersistenceError('write failed'))).toBe(ErrorCategory.PERSISTENCE);
    expect(handler.categorizeError(new NetworkError('gateway down'))).toBe(ErrorCategory.NETWORK);
  });

  test('classifies plain errors by message and code', () => {
    expect(handler.categorizeError(new Error('Request timeout after 50ms'))).toBe(ErrorCategory.NETWORK);
    const refused = Object.assign(new Error('connect failed'), { code: 'ECONNREFUSED' });
    expect(handler.categorizeError(refused)).toBe(ErrorCategory.NETWORK);
    const missing = Object.assign(new Error('open failed'), { code: 'ENOENT' });
    expect(handler.categorizeError(missing)).toBe(ErrorCategory.PERSISTENCE);
    expect(handler.categorizeError(new Error('Invalid outlet'))).toBe(ErrorCategory.VALIDATION);
    expect(handler.categorizeError(new Error('boom'))).toBe(ErrorCategory.INTERNAL);
    expect(handler.categorizeError('boom')).toBe(ErrorCategory.UNKNOWN);
  });

  test('missing inputs are listed on the error', () => {
    const error = new NoDataError(['indoorTemp', 'outdoorTemp']);
    expect(error.message).toBe('Missing required inputs: indoorTemp, outdoorTemp');
    expect(error.missing).toEqual(['indoorTemp', 'outdoorTemp']);
    expect(error).toBeInstanceOf(AppError);
  });

  test('logs recoverable faults as warnings', () => {
    handler.logError(new NetworkError('gateway down'), { cycle: 2 });
    expect(logger.warn).toHaveBeenCalledWith('Network Error: gateway down', {
      category: ErrorCategory.NETWORK,
      recoverable: true,
      cycle: 2
    });
    expect(logger.error).not.toHaveBeenCalled();
  });

  test('logs persistence faults as errors', () => {
    const cause = new Error('EACCES');
    handler.logError(new PersistenceError('write failed', cause));
    expect(logger.error).toHaveBeenCalledWith('PERSISTENCE Error: write failed', cause, {
      category: ErrorCategory.PERSISTENCE,
      recoverable: true
    });
  });

  test('merges context into an existing AppError', () => {
    const original = new ModelIntegrityError('out of band', { outlet: 40 });
    const merged = handler.createAppError(original, { cycle: 5 });
    expect(merged).toBe(original);
    expect(merged.context).toEqual({ outlet: 40, cycle: 5 });
  });

  test('handleError rethrows unless told not to', () => {
    expect(() => handler.handleError(new Error('boom'))).toThrow(AppError);
    const returned = handler.handleError(new Error('boom'), undefined, 'Cycle failed', false);
    expect(returned.message).toBe('Cycle failed');
    expect(returned.category).toBe(ErrorCategory.INTERNAL);
  });

  test('reports recoverability', () => {
    expect(handler.isRecoverable(new AppError('fatal', ErrorCategory.INTERNAL, undefined, undefined, false))).toBe(false);
    expect(handler.isRecoverable(new Error('plain'))).toBe(true);
  });

  test('errorMessage reads any thrown value', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});

import { CircuitBreaker, CircuitBreakerOptions, CircuitOpenError, CircuitState } from '../../src/util/circuit-breaker';
import { createMockLogger } from '../mocks/logger.mock';

describe('CircuitBreaker', () => {
  let clock: number;
  const now = () => clock;
  const fail = () => Promise.reject(new Error('gateway down'));
  const succeed = () => Promise.resolve('ok');

  function breaker(overrides: Partial<CircuitBreakerOptions> = {}) {
    return new CircuitBreaker('gateway', createMockLogger(), {
      failureThreshold: 2,
      resetTimeout: 1000,
      halfOpenSuccessThreshold: 1,
      timeout: 0,
      maxResetTimeout: 3000,
      ...overrides
    }, now);
  }

  beforeEach(() => {
    clock = 0;
  });

  test('passes results through while closed', async () => {
    const circuit = breaker();
    await expect(circuit.execute(succeed)).resolves.toBe('ok');
    expect(circuit.getState()).toBe(CircuitState.CLOSED);
  });

  test('opens after consecutive failures and fails fast', async () => {
    const circuit = breaker();
    await expect(circuit.execute(fail)).rejects.toThrow('gateway down');
    expect(circuit.getState()).toBe(CircuitState.CLOSED);
    await expect(circuit.execute(fail)).rejects.toThrow('gateway down');
    expect(circuit.getState()).toBe(CircuitState.OPEN);

    const call = jest.fn(succeed);
    await expect(circuit.execute(call)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(call).not.toHaveBeenCalled();
  });

  test('a success resets the failure count', async () => {
    const circuit = breaker();
    await expect(circuit.execute(fail)).rejects.toThrow();
    await circuit.execute(succeed);
    await expect(circuit.execute(fail)).rejects.toThrow();
    expect(circuit.getState()).toBe(CircuitState.CLOSED);
  });

  test('closes again after a successful trial call', async () => {
    const circuit = breaker();
    await expect(circuit.execute(fail)).rejects.toThrow();
    await expect(circuit.execute(fail)).rejects.toThrow();
    clock = 1000;
    await expect(circuit.execute(succeed)).resolves.toBe('ok');
    expect(circuit.getState()).toBe(CircuitState.CLOSED);
  });

  test('backs off when the trial call fails', async () => {
    const circuit = breaker();
    await expect(circuit.execute(fail)).rejects.toThrow();
    await expect(circuit.execute(fail)).rejects.toThrow();
    expect(circuit.getCurrentResetTimeout()).toBe(1000);

    clock = 1000;
    await expect(circuit.execute(fail)).rejects.toThrow('gateway down');
    expect(circuit.getState()).toBe(CircuitState.OPEN);
    expect(circuit.getCurrentResetTimeout()).toBe(2000);

    clock = 3000;
    await expect(circuit.execute(fail)).rejects.toThrow('gateway down');
    expect(circuit.getCurrentResetTimeout()).toBe(3000);
  });

  test('times out slow calls', async () => {
    const circuit = breaker({ timeout: 10 });
    const never = () => new Promise<string>(() => undefined);
    await expect(circuit.execute(never)).rejects.toThrow('Request timeout after 10ms');
  });
});

import { formatValidationReport, ValidationReport, ValidationService } from '../../src/services/validation-service';
import { DEFAULT_THERMAL_PARAMETERS, DefaultControlConfig } from '../../src/config/control-defaults';
import { createMockLogger } from '../mocks/logger.mock';

describe('ValidationService', () => {
  test('default parameters pass the grid', () => {
    const logger = createMockLogger();
    const report = new ValidationService(DefaultControlConfig, logger).validate(DEFAULT_THERMAL_PARAMETERS);

    expect(report.failures).toEqual([]);
    expect(report.passed).toBe(true);
    expect(report.pointsChecked).toBe(112);
    expect(report.solvesChecked).toBe(14);
    // only 0.5 units of auxiliary heat at 15 °C outside with a 20 °C outlet
    expect(report.auxiliaryOvershoots).toBe(1);
    expect(logger.log).toHaveBeenCalledWith('Validation passed: 112 points, 14 solves');
  });

  test('flags solver results away from the analytic outlet', () => {
    const logger = createMockLogger();
    // two halvings of 14..65 leave 26.75 as the closest candidate everywhere
    const config = { ...DefaultControlConfig, searchMaxIterations: 2 };
    const report = new ValidationService(config, logger).validate(DEFAULT_THERMAL_PARAMETERS);

    expect(report.passed).toBe(false);
    expect(report.failures).toHaveLength(14);
    expect(report.failures.every(f => f.check === 'solver_inverse' && f.outletTemp === 26.75)).toBe(true);
    expect(report.failures[0]).toEqual({
      check: 'solver_inverse',
      outdoorTemp: -15,
      outletTemp: 26.75,
      heatUnits: 0,
      detail: 'analytic outlet is 24.60'
    });
    expect(logger.warn).toHaveBeenCalledWith('Validation found 14 failures');
  });

  test('does not modify the parameters it checks', () => {
    const params = { ...DEFAULT_THERMAL_PARAMETERS };
    const report = new ValidationService(DefaultControlConfig).validate(params);
    expect(params).toEqual(DEFAULT_THERMAL_PARAMETERS);
    expect(report.parameters).not.toBe(params);
  });
});

describe('formatValidationReport', () => {
  test('lists failures', () => {
    const report: ValidationReport = {
      parameters: { thermalTimeConstant: 24, heatLossCoefficient: 0.05, outletEffectiveness: 0.5, learningConfidence: 1 },
      pointsChecked: 112,
      solvesChecked: 14,
      failures: [{ check: 'solver_range', outdoorTemp: -15, outletTemp: 70, heatUnits: 0, detail: 'outlet 70 outside 14..65' }],
      auxiliaryOvershoots: 0,
      passed: false
    };
    expect(formatValidationReport(report).split('\n')).toEqual([
      'Parameters: tau=24.00h loss=0.0500 eff=0.500',
      'Grid points: 112, solver runs: 14',
      'Auxiliary-heat overshoots: 0',
      'Result: FAIL (1)',
      '  [solver_range] outdoor=-15 outlet=70.0 heat=0: outlet 70 outside 14..65'
    ]);
  });
});

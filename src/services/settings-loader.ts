import * as fs from 'fs';
import { Logger } from '../util/logger';
import {
  EnvSettingsSource,
  LayeredSettingsSource,
  ObjectSettingsSource,
  SettingsAccessor,
  SettingsSource
} from '../util/settings-accessor';
import { ControlConfig, DefaultControlConfig } from '../config/control-defaults';
import { errorMessage } from '../util/error-handler';

/**
 * SettingsLoader Service
 *
 * Builds the typed ControlConfig from a settings source, applying range
 * checks and falling back to documented defaults key by key.
 */
export class SettingsLoader {
  private readonly settings: SettingsAccessor;

  constructor(
    source: SettingsSource,
    private readonly logger: Logger
  ) {
    this.settings = new SettingsAccessor(source, logger);
  }

  /**
   * Standard source stack: environment over the JSON settings file.
   */
  static fromEnvironment(logger: Logger, env: NodeJS.ProcessEnv = process.env): SettingsLoader {
    const filePath = env.HEATPUMP_CONFIG || './config.json';
    const fileValues = readSettingsFile(filePath, logger);
    return new SettingsLoader(
      new LayeredSettingsSource([new EnvSettingsSource(env), new ObjectSettingsSource(fileValues)]),
      logger
    );
  }

  load(): ControlConfig {
    const d = DefaultControlConfig;
    const s = this.settings;

    const outletMinTemp = s.getNumber('outletMinTemp', d.outletMinTemp, { min: 5, max: 40 });
    let outletMaxTemp = s.getNumber('outletMaxTemp', d.outletMaxTemp, { min: 20, max: 80 });
    if (outletMaxTemp <= outletMinTemp) {
      this.logger.warn(`outletMaxTemp ${outletMaxTemp} not above outletMinTemp ${outletMinTemp}; using default range`);
      outletMaxTemp = Math.max(d.outletMaxTemp, outletMinTemp + 1);
    }

    let ratioMin = s.getNumber('secondaryHeaterRatioMin', d.secondaryHeaterRatioMin, { min: 0.1, max: 20 });
    let ratioMax = s.getNumber('secondaryHeaterRatioMax', d.secondaryHeaterRatioMax, { min: 0.1, max: 20 });
    if (ratioMax < ratioMin) {
      this.logger.warn('Secondary heater ratio bounds inverted; using defaults');
      ratioMin = d.secondaryHeaterRatioMin;
      ratioMax = d.secondaryHeaterRatioMax;
    }

    let onThreshold = s.getNumber('secondaryHeaterOnThreshold', d.secondaryHeaterOnThreshold, { min: 0.1, max: 10 });
    let offThreshold = s.getNumber('secondaryHeaterOffThreshold', d.secondaryHeaterOffThreshold, { min: 0, max: 10 });
    if (offThreshold >= onThreshold) {
      this.logger.warn('Secondary heater hysteresis thresholds overlap; using defaults');
      onThreshold = d.secondaryHeaterOnThreshold;
      offThreshold = d.secondaryHeaterOffThreshold;
    }

    return {
      cycleIntervalMinutes: s.getNumber('cycleIntervalMinutes', d.cycleIntervalMinutes, { min: 1, max: 240 }),
      blockingPollSeconds: s.getNumber('blockingPollSeconds', d.blockingPollSeconds, { min: 5, max: 3600 }),

      outletMinTemp,
      outletMaxTemp,
      maxTempChangePerCycle: s.getNumber('maxTempChangePerCycle', d.maxTempChangePerCycle, { min: 0.1, max: 20 }),
      smartRounding: s.getBoolean('smartRounding', d.smartRounding),

      searchResolution: s.getNumber('searchResolution', d.searchResolution, { min: 0.001, max: 1 }),
      searchMaxIterations: Math.round(s.getNumber('searchMaxIterations', d.searchMaxIterations, { min: 1, max: 100 })),

      predictionHorizonHours: Math.round(s.getNumber('predictionHorizonHours', d.predictionHorizonHours, { min: 1, max: 24 })),
      forecastMaxAgeMinutes: s.getNumber('forecastMaxAgeMinutes', d.forecastMaxAgeMinutes, { min: 1 }),

      gracePeriodMaxMinutes: s.getNumber('gracePeriodMaxMinutes', d.gracePeriodMaxMinutes, { min: 1, max: 240 }),
      graceStabilizationTolerance: s.getNumber('graceStabilizationTolerance', d.graceStabilizationTolerance, { min: 0, max: 5 }),

      maxTrajectoryCorrection: s.getNumber('maxTrajectoryCorrection', d.maxTrajectoryCorrection, { min: 0, max: 30 }),
      openWindowJump: s.getNumber('openWindowJump', d.openWindowJump, { min: 0.05, max: 5 }),
      openWindowConfirmCycles: Math.round(s.getNumber('openWindowConfirmCycles', d.openWindowConfirmCycles, { min: 1, max: 20 })),
      openWindowClearCycles: Math.round(s.getNumber('openWindowClearCycles', d.openWindowClearCycles, { min: 1, max: 20 })),

      secondaryHeaterRatioMin: ratioMin,
      secondaryHeaterRatioMax: ratioMax,
      secondaryHeaterOnThreshold: onThreshold,
      secondaryHeaterOffThreshold: offThreshold,
      heatUnitsPerKw: s.getNumber('heatUnitsPerKw', d.heatUnitsPerKw, { min: 0, max: 5 }),

      lowConfidenceThreshold: s.getNumber('lowConfidenceThreshold', d.lowConfidenceThreshold, { min: 0, max: 5 }),
      trainingCycles: Math.round(s.getNumber('trainingCycles', d.trainingCycles, { min: 0, max: 1000 })),

      stateFilePath: s.getString('stateFilePath', d.stateFilePath),
      backupDir: s.getString('backupDir', d.backupDir),
      gatewayUrl: s.getString('gatewayUrl', d.gatewayUrl),
      gatewayToken: s.getString('gatewayToken', d.gatewayToken),
      logLevel: s.getString('logLevel', d.logLevel),

      calibrationLookbackHours: s.getNumber('calibrationLookbackHours', d.calibrationLookbackHours, { min: 1 })
    };
  }
}

/**
 * Read a JSON settings file. A missing file is normal (all defaults);
 * an unreadable one is logged and treated the same way.
 */
export function readSettingsFile(filePath: string, logger: Logger): Record<string, unknown> {
  if (!fs.existsSync(filePath)) {
    logger.debug(`No settings file at ${filePath}; using defaults`);
    return {};
  }

  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    logger.warn(`Settings file ${filePath} is not a JSON object; ignoring`);
  } catch (error) {
    logger.warn(`Could not read settings file ${filePath}: ${errorMessage(error)}`);
  }
  return {};
}

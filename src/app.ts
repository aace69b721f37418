#!/usr/bin/env node
import { CronJob } from 'cron';
import { ConsoleLogger, Logger, LogLevel, parseLogLevel } from './util/logger';
import { errorMessage } from './util/error-handler';
import { ControlConfig } from './config/control-defaults';
import { SettingsLoader } from './services/settings-loader';
import { ControlCycle, StateRepository } from './services/control-cycle';
import { HttpSensorGateway, SensorGateway } from './services/sensor-gateway';
import { LearningStateStore } from './services/learning-state-store';
import { CalibrationService, loadHistoryFile } from './services/calibration-service';
import { formatValidationReport, ValidationService } from './services/validation-service';

export type RunMode = 'run' | 'calibrate' | 'validate';

/**
 * Six-field cron expression (seconds first) firing every `minutes`.
 */
export function cycleCronExpression(minutes: number): string {
  const m = Math.max(1, Math.round(minutes));
  if (m < 60) return `0 */${m} * * * *`;
  return `0 0 */${Math.max(1, Math.round(m / 60))} * * *`;
}

export function pollCronExpression(seconds: number): string {
  const s = Math.max(1, Math.round(seconds));
  if (s < 60) return `*/${s} * * * * *`;
  return cycleCronExpression(s / 60);
}

export interface HeatingControlAppDeps {
  logger?: Logger;
  gateway?: SensorGateway;
  store?: StateRepository;
}

/**
 * Heat pump outlet controller
 *
 * Owns one ControlCycle and drives it from two cron jobs: the control
 * cycle itself and a faster blocking poll. A tick that arrives during a
 * cycle is skipped; a tick that arrives during a poll waits for it. Polls
 * are skipped while a cycle runs.
 */
export class HeatingControlApp {
  readonly logger: Logger;
  readonly cycle: ControlCycle;
  private cycleJob?: CronJob;
  private pollJob?: CronJob;
  private cycleRunning = false;
  private inFlightPoll: Promise<boolean> | null = null;

  constructor(private readonly config: ControlConfig, deps: HeatingControlAppDeps = {}) {
    this.logger = deps.logger ?? new ConsoleLogger({
      level: parseLogLevel(config.logLevel),
      prefix: 'App',
      includeTimestamps: true
    });
    const gateway = deps.gateway ?? new HttpSensorGateway({
      baseUrl: config.gatewayUrl,
      token: config.gatewayToken
    }, this.logger);
    const store = deps.store ?? new LearningStateStore({
      filePath: config.stateFilePath,
      backupDir: config.backupDir
    }, this.logger);
    this.cycle = new ControlCycle({ config, gateway, store, logger: this.logger });
  }

  start(): void {
    this.logger.log('Heat pump controller starting', {
      cycleMinutes: this.config.cycleIntervalMinutes,
      pollSeconds: this.config.blockingPollSeconds
    });

    this.cycleJob = new CronJob(cycleCronExpression(this.config.cycleIntervalMinutes), async () => {
      await this.tick();
    }, null, true);
    this.pollJob = new CronJob(pollCronExpression(this.config.blockingPollSeconds), async () => {
      await this.poll();
    }, null, true);

    void this.tick();
  }

  stop(): void {
    this.cycleJob?.stop();
    this.pollJob?.stop();
    this.cycleJob = undefined;
    this.pollJob = undefined;
    this.logger.log('Heat pump controller stopped');
  }

  isRunning(): boolean {
    return this.cycleJob !== undefined;
  }

  /** Run one control cycle unless one is already in progress */
  async tick(): Promise<boolean> {
    if (this.cycleRunning) {
      this.logger.warn('Previous cycle still running; skipping this tick');
      return false;
    }
    this.cycleRunning = true;
    try {
      if (this.inFlightPoll) {
        await this.inFlightPoll;
      }
      await this.cycle.runCycle();
      return true;
    } catch (error) {
      this.logger.error('Control cycle failed', error);
      return false;
    } finally {
      this.cycleRunning = false;
    }
  }

  async poll(): Promise<boolean> {
    if (this.cycleRunning || this.inFlightPoll) {
      return false;
    }
    const running = this.runPoll();
    this.inFlightPoll = running;
    try {
      return await running;
    } finally {
      this.inFlightPoll = null;
    }
  }

  private async runPoll(): Promise<boolean> {
    try {
      await this.cycle.pollBlocking();
      return true;
    } catch (error) {
      this.logger.error('Blocking poll failed', error);
      return false;
    }
  }
}

export function parseRunMode(value: string | undefined): RunMode | undefined {
  if (value === undefined || value === 'run') return 'run';
  if (value === 'calibrate' || value === 'validate') return value;
  return undefined;
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const bootLogger = new ConsoleLogger({ prefix: 'Boot', level: LogLevel.INFO });
  const config = SettingsLoader.fromEnvironment(bootLogger).load();
  const logger = new ConsoleLogger({ level: parseLogLevel(config.logLevel), prefix: 'Controller' });

  const mode = parseRunMode(argv[0]);
  if (!mode) {
    logger.error(`Unknown mode "${argv[0]}"; expected run, calibrate or validate`);
    return 2;
  }

  const store = new LearningStateStore({ filePath: config.stateFilePath, backupDir: config.backupDir }, logger);

  switch (mode) {
    case 'calibrate': {
      const historyPath = argv[1];
      if (!historyPath) {
        logger.error('Usage: calibrate <history.json>');
        return 2;
      }
      try {
        const samples = loadHistoryFile(historyPath, logger);
        const result = new CalibrationService(config, store, logger).calibrate(samples);
        return result.success ? 0 : 1;
      } catch (error) {
        logger.error(`Calibration failed: ${errorMessage(error)}`, error);
        return 1;
      }
    }
    case 'validate': {
      const report = new ValidationService(config, logger).validate(store.load().parameters);
      logger.log(formatValidationReport(report));
      return report.passed ? 0 : 1;
    }
    case 'run': {
      const app = new HeatingControlApp(config, { logger, store });
      app.start();
      const shutdown = () => {
        app.stop();
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
      return 0;
    }
  }
}

if (require.main === module) {
  main().then(code => {
    if (code !== 0) process.exitCode = code;
  }).catch((error: unknown) => {
    console.error('Fatal:', error);
    process.exitCode = 1;
  });
}

/**
 * Control Cycle
 *
 * The single owner of all mutable learning state. One call to runCycle()
 * reads a snapshot, gates on blocking and heating mode, learns from the
 * previous cycle's prediction, solves for a new outlet command, writes it
 * and persists the result. pollBlocking() is the only other entry point;
 * it touches blocking state and the grace interim command, never the
 * learned parameters.
 */

import { DateTime } from 'luxon';
import {
  BlockingKind,
  BlockingReading,
  RawSnapshot,
  ControlMemory,
  HealthSignals,
  LearnedParameterName,
  LearningState,
  ParameterUpdateRecord,
  PendingPrediction,
  PredictionRecord,
  SensorSnapshot,
  StatusCode,
  StatusReport,
  ThermalParameters
} from '../types';
import { ControlConfig, LEARNING_CONSTANTS } from '../config/control-defaults';
import { Logger } from '../util/logger';
import { ErrorHandler, errorMessage, NoDataError, SearchNonConvergenceError } from '../util/error-handler';
import { RingBuffer } from '../util/ring-buffer';
import { ThermalPhysicsModel } from './thermal-model/physics-model';
import { ParameterLearner } from './thermal-model/parameter-learner';
import { HeatSourceCoordinator } from './heat-sources/heat-source-coordinator';
import { OutletSolver } from './outlet-solver';
import { TrajectoryCorrector } from './trajectory-corrector';
import { BlockingDecision, BlockingStateMachine } from './blocking-state-machine';
import { TemperatureControl } from './temperature-control';
import { ConfidenceTracker } from './confidence-tracker';
import { computePredictionMetrics, PredictionMetricsReport } from './prediction-metrics';
import { parseSnapshot } from './snapshot-parser';
import { SensorGateway } from './sensor-gateway';
import { LEARNING_STATE_SCHEMA, LEARNING_STATE_VERSION } from './learning-state-codec';

/** Weight of the newest shortfall in the smoothed shortfall fed to the corrector */
const SHORTFALL_SMOOTHING = 0.5;

/** Allowed drift of the outcome time from one cycle interval, as a fraction of it */
const OUTCOME_TIMING_TOLERANCE = 0.5;

export interface StateRepository {
  load(): LearningState;
  save(state: LearningState): void;
}

export interface ControlCycleDeps {
  config: ControlConfig;
  gateway: SensorGateway;
  store: StateRepository;
  logger: Logger;
  clock?: () => DateTime;
}

export interface CycleResult {
  status: StatusReport;
  /** Command written this cycle, or null when none was written */
  command: number | null;
  learned: boolean;
}

const STATUS_DESCRIPTIONS: Record<StatusCode, string> = {
  OK: 'Controlling normally',
  LOW_CONFIDENCE: 'Controlling with low model confidence',
  BLOCKED: 'Heat pump in a blocking mode; command held',
  NETWORK_ERROR: 'Could not reach the heat pump bridge',
  NO_DATA: 'Required sensor inputs missing',
  TRAINING: 'Learning the house; too few cycles for full confidence',
  HEATING_OFF: 'Heating is off; control paused',
  MODEL_ERROR: 'Model prediction failed its physics check'
};

interface StatusDetails {
  suggestedTemp?: number | null;
  finalTemp?: number | null;
  predictedIndoor?: number | null;
  blockingReasons?: readonly BlockingKind[];
  missingInputs?: readonly string[];
  lastError?: string | null;
  degraded?: boolean;
  description?: string;
}

export class ControlCycle {
  private readonly config: ControlConfig;
  private readonly gateway: SensorGateway;
  private readonly store: StateRepository;
  private readonly logger: Logger;
  private readonly clock: () => DateTime;
  private readonly errorHandler: ErrorHandler;

  private readonly physics = new ThermalPhysicsModel();
  private readonly learner: ParameterLearner;
  private readonly heatSources: HeatSourceCoordinator;
  private readonly solver: OutletSolver;
  private readonly corrector: TrajectoryCorrector;
  private readonly blocking: BlockingStateMachine;
  private readonly temperatureControl: TemperatureControl;
  private readonly confidence = new ConfidenceTracker();

  private parameters: ThermalParameters;
  private readonly predictions: RingBuffer<PredictionRecord>;
  private readonly updates: RingBuffer<ParameterUpdateRecord>;
  private cycleCount: number;
  private learnedCycles: number;
  private lastUpdated: string | null;
  private control: ControlMemory;
  private stabilityWarnings: LearnedParameterName[] = [];
  private lastStatus: StatusReport | null = null;

  constructor(deps: ControlCycleDeps, initialState?: LearningState) {
    this.config = deps.config;
    this.gateway = deps.gateway;
    this.store = deps.store;
    this.logger = deps.logger;
    this.clock = deps.clock ?? (() => DateTime.now());
    this.errorHandler = new ErrorHandler(deps.logger);

    const state = initialState ?? deps.store.load();

    this.parameters = { ...state.parameters };
    this.predictions = RingBuffer.from(state.predictionHistory, LEARNING_CONSTANTS.PREDICTION_HISTORY_CAP);
    this.updates = RingBuffer.from(state.parameterHistory, LEARNING_CONSTANTS.PARAMETER_HISTORY_CAP);
    this.cycleCount = state.cycleCount;
    this.learnedCycles = state.learnedCycles;
    this.lastUpdated = state.lastUpdated;
    this.control = { ...state.control, lastBlockingReasons: [...state.control.lastBlockingReasons] };

    this.learner = new ParameterLearner(this.physics, deps.logger);
    this.heatSources = new HeatSourceCoordinator(deps.config, deps.logger, state.secondaryHeater);
    this.solver = new OutletSolver(this.physics, deps.config, deps.logger);
    this.corrector = new TrajectoryCorrector(deps.config, deps.logger, state.control.corrector);
    this.blocking = new BlockingStateMachine(deps.config, deps.logger, {
      phase: state.control.phase,
      event: state.control.blockingEvent
    });
    this.temperatureControl = new TemperatureControl(deps.config, deps.logger);
  }

  getState(): LearningState {
    return {
      schema: LEARNING_STATE_SCHEMA,
      version: LEARNING_STATE_VERSION,
      parameters: { ...this.parameters },
      predictionHistory: this.predictions.toArray(),
      parameterHistory: this.updates.toArray(),
      cycleCount: this.cycleCount,
      learnedCycles: this.learnedCycles,
      lastUpdated: this.lastUpdated,
      secondaryHeater: this.heatSources.getSecondaryHeaterState(),
      control: {
        ...this.control,
        lastBlockingReasons: [...this.control.lastBlockingReasons],
        phase: this.blocking.getPhase(),
        blockingEvent: this.blocking.getEvent(),
        corrector: this.corrector.getState()
      }
    };
  }

  getLastStatus(): StatusReport | null {
    return this.lastStatus;
  }

  getMetrics(): PredictionMetricsReport {
    return computePredictionMetrics(this.predictions.toArray());
  }

  getHealth(): HealthSignals {
    return this.confidence.compute(this.predictions.toArray(), this.updates.toArray());
  }

  async runCycle(): Promise<CycleResult> {
    let raw: RawSnapshot;
    try {
      raw = await this.gateway.readSnapshot();
    } catch (error) {
      const appError = this.errorHandler.logError(error, { step: 'read-snapshot' });
      return this.finish('NETWORK_ERROR', { lastError: appError.message }, null, false, false);
    }

    let snapshot: SensorSnapshot;
    try {
      snapshot = parseSnapshot(raw, this.clock());
    } catch (error) {
      const appError = this.errorHandler.logError(error, { step: 'validate' });
      const missing = error instanceof NoDataError ? error.missing : [];
      return this.finish('NO_DATA', { missingInputs: missing, lastError: appError.message }, null, false, false);
    }

    this.cycleCount++;
    this.logger.marker(`Control cycle ${this.cycleCount}`);

    try {
      return await this.controlStep(snapshot);
    } catch (error) {
      const appError = this.errorHandler.logError(error, { step: 'control', cycle: this.cycleCount });
      this.control.pendingPrediction = null;
      return this.finish('MODEL_ERROR', { lastError: appError.message }, null, false, true);
    }
  }

  /**
   * Faster check for blocking onset and end between control cycles. A phase
   * change is persisted and reported; entering GRACE writes the interim target.
   */
  async pollBlocking(): Promise<BlockingDecision | null> {
    let reading: BlockingReading;
    try {
      reading = await this.gateway.readBlockingState();
    } catch (error) {
      this.errorHandler.logError(error, { step: 'poll-blocking' });
      return null;
    }

    const timestamp = this.timestamp();
    const decision = this.blocking.update({
      blocking: reading.blocking,
      outletTempActual: reading.outletTempActual,
      timestamp,
      lastFinalTemp: this.control.lastFinalTemp
    });
    this.applyBlockingDecision(decision);

    if (decision.transition === 'none') {
      return decision;
    }
    if (decision.controlSuspended) {
      await this.holdDuringBlocking(decision, reading.blocking, decision.transition === 'grace');
    } else {
      this.logger.blocking(`Blocking over (${decision.transition}); control resumes next cycle`);
      this.saveState();
    }
    return decision;
  }

  private async controlStep(snapshot: SensorSnapshot): Promise<CycleResult> {
    const decision = this.blocking.update({
      blocking: snapshot.blocking,
      outletTempActual: snapshot.outletTempActual,
      timestamp: snapshot.timestamp,
      lastFinalTemp: this.control.lastFinalTemp
    });
    this.applyBlockingDecision(decision);

    if (decision.controlSuspended) {
      return this.holdDuringBlocking(decision, snapshot.blocking, true);
    }

    if (!snapshot.heatingActive) {
      this.control.pendingPrediction = null;
      this.logger.control('Heating off; skipping learning and control');
      return this.finish('HEATING_OFF', {}, null, false, true);
    }

    const heat = this.heatSources.assess(snapshot, this.clock());
    const learned = this.learnFromPending(snapshot);

    const target = snapshot.targetIndoorTemp;
    const shortfall = target - snapshot.indoorTemp;
    this.control.shortfallEwma = SHORTFALL_SMOOTHING * shortfall + (1 - SHORTFALL_SMOOTHING) * this.control.shortfallEwma;

    const result = this.solver.solve({
      target,
      outdoorTemp: snapshot.outdoorTemp,
      outdoorForecast1h: heat.forecast.fallbackReason === 'none' ? heat.forecast.outdoor[0] : undefined,
      heatUnits: heat.totalHeatUnits,
      params: this.parameters,
      previousOutlet: this.control.lastFinalTemp
    });
    let searchError: string | null = null;
    if (result.degraded) {
      searchError = this.errorHandler.logError(
        new SearchNonConvergenceError(result.iterations, { outlet: result.outlet })
      ).message;
    }

    const ctx = result.context;
    const violation = this.physics.checkBounds(result.predictedEquilibrium, {
      outletTemp: result.outlet,
      outdoorTemp: ctx.outdoorTemp,
      heatUnits: ctx.heatUnits
    });
    this.confidence.recordIntegrityCheck(violation !== null);

    const trajectory = [...this.physics.trajectory(this.parameters, {
      startIndoor: snapshot.indoorTemp,
      outletTemp: result.outlet,
      outdoorTemp: ctx.outdoorTemp,
      heatUnits: ctx.heatUnits,
      steps: heat.steps,
      horizonHours: this.config.predictionHorizonHours
    })];

    const correction = this.corrector.correct(result.outlet, trajectory, target, this.control.shortfallEwma);
    const shaped = this.temperatureControl.shape({
      corrected: correction.outlet,
      target,
      predict: outlet => this.physics.rawEquilibrium(this.parameters, {
        outletTemp: outlet,
        outdoorTemp: ctx.outdoorTemp,
        heatUnits: ctx.heatUnits
      }),
      actualOutlet: snapshot.outletTempActual,
      lastFinalTemp: this.control.lastFinalTemp,
      lastBlockingReasons: this.control.lastBlockingReasons
    });

    this.logger.control('Outlet decision', {
      solver: result.outlet,
      equilibrium: result.predictedEquilibrium,
      trajectoryError: correction.trajectoryError,
      correction: correction.correction,
      final: shaped.final,
      heatUnits: ctx.heatUnits
    });

    const cycleHours = this.config.cycleIntervalMinutes / 60;
    const predictedIndoor = this.physics.predictIndoorAfter(
      this.parameters,
      { outletTemp: shaped.final, outdoorTemp: ctx.outdoorTemp, heatUnits: ctx.heatUnits },
      snapshot.indoorTemp,
      cycleHours
    );

    const details: StatusDetails = {
      suggestedTemp: result.outlet,
      finalTemp: shaped.final,
      predictedIndoor,
      lastError: violation ? `Energy balance violated: ${violation}` : searchError,
      degraded: result.degraded
    };

    try {
      await this.gateway.writeOutletCommand(shaped.final);
    } catch (error) {
      const appError = this.errorHandler.logError(error, { step: 'write-command' });
      this.control.pendingPrediction = null;
      return this.finish('NETWORK_ERROR', { ...details, lastError: appError.message }, null, learned, true);
    }

    this.control.lastFinalTemp = shaped.final;
    this.control.lastBlockingReasons = [];
    this.control.pendingPrediction = violation ? null : this.pending(snapshot, shaped.final, ctx.outdoorTemp, ctx.heatUnits, predictedIndoor, cycleHours);

    if (violation) {
      this.logger.warn(`Prediction discarded: energy balance violated (${violation})`);
      return this.finish('MODEL_ERROR', details, shaped.final, learned, true);
    }

    return this.finish(this.normalStatus(), details, shaped.final, learned, true);
  }

  private pending(
    snapshot: SensorSnapshot,
    outletTemp: number,
    outdoorTemp: number,
    heatUnits: number,
    predictedIndoor: number,
    cycleHours: number
  ): PendingPrediction {
    return {
      timestamp: snapshot.timestamp,
      predictedIndoor,
      context: { outletTemp, outdoorTemp, heatUnits, startIndoor: snapshot.indoorTemp, cycleHours }
    };
  }

  private learnFromPending(snapshot: SensorSnapshot): boolean {
    const pending = this.control.pendingPrediction;
    this.control.pendingPrediction = null;
    if (!pending) {
      return false;
    }

    const expectedHours = pending.context.cycleHours;
    const elapsedHours = DateTime.fromISO(snapshot.timestamp).diff(DateTime.fromISO(pending.timestamp), 'hours').hours;
    if (!Number.isFinite(elapsedHours) || Math.abs(elapsedHours - expectedHours) > expectedHours * OUTCOME_TIMING_TOLERANCE) {
      this.logger.learning('Pending prediction dropped: outcome not one cycle later', { elapsedHours, expectedHours });
      return false;
    }

    if (this.corrector.getState().mode === 'disturbance') {
      this.logger.learning('Learning suspended during disturbance');
      return false;
    }

    const record = this.learner.buildRecord(pending, snapshot.indoorTemp, snapshot.timestamp);
    const outcome = this.learner.update(
      this.parameters,
      record,
      this.predictions.toArray(),
      this.updates.toArray(),
      { blocked: false, heatingActive: snapshot.heatingActive }
    );
    if (outcome.skipped) {
      return false;
    }

    this.predictions.push(record);
    this.parameters = outcome.parameters;
    if (outcome.update) {
      this.updates.push(outcome.update);
    }
    this.stabilityWarnings = outcome.stabilityWarnings;
    this.learnedCycles++;
    return true;
  }

  /**
   * @param writeInterim write the grace interim target when in GRACE
   */
  private async holdDuringBlocking(
    decision: BlockingDecision,
    blocking: readonly BlockingKind[],
    writeInterim: boolean
  ): Promise<CycleResult> {
    this.control.pendingPrediction = null;
    const reasons = decision.event?.kinds ?? [...blocking];
    const phase = decision.phase;
    const description = phase.state === 'GRACE'
      ? `Grace period after ${phase.kind}: waiting for ${phase.direction} to ${phase.interimTarget.toFixed(1)}°C`
      : `Blocked by ${reasons.join(', ')}; command held`;

    let written: number | null = null;
    if (writeInterim && phase.state === 'GRACE' && decision.heldCommand !== null) {
      const held = this.temperatureControl.clampToSafety(decision.heldCommand);
      try {
        await this.gateway.writeOutletCommand(held);
        written = held;
      } catch (error) {
        const appError = this.errorHandler.logError(error, { step: 'write-held-command' });
        return this.finish('NETWORK_ERROR', { blockingReasons: reasons, lastError: appError.message }, null, false, true);
      }
    }

    this.logger.blocking(description);
    return this.finish('BLOCKED', {
      blockingReasons: reasons,
      finalTemp: decision.heldCommand,
      description
    }, written, false, true);
  }

  private applyBlockingDecision(decision: BlockingDecision): void {
    this.control.phase = decision.phase;
    this.control.blockingEvent = decision.event;
    if (decision.completedEvent) {
      this.control.lastBlockingReasons = [...decision.completedEvent.kinds];
    }
    if (decision.controlSuspended) {
      this.control.pendingPrediction = null;
    }
  }

  private normalStatus(): StatusCode {
    if (this.learnedCycles < this.config.trainingCycles) return 'TRAINING';
    if (this.parameters.learningConfidence < this.config.lowConfidenceThreshold) return 'LOW_CONFIDENCE';
    return 'OK';
  }

  private finish(
    code: StatusCode,
    details: StatusDetails,
    command: number | null,
    learned: boolean,
    persist: boolean
  ): Promise<CycleResult> {
    const timestamp = this.timestamp();
    let lastError = details.lastError ?? null;

    if (persist) {
      const saveError = this.saveState(timestamp);
      lastError = lastError ?? saveError;
    }

    const status: StatusReport = {
      code,
      description: details.description ?? STATUS_DESCRIPTIONS[code],
      confidence: this.parameters.learningConfidence,
      suggestedTemp: details.suggestedTemp ?? null,
      finalTemp: details.finalTemp ?? null,
      predictedIndoor: details.predictedIndoor ?? null,
      blockingReasons: [...(details.blockingReasons ?? [])],
      missingInputs: [...(details.missingInputs ?? [])],
      lastError,
      degraded: details.degraded ?? false,
      stabilityWarnings: [...this.stabilityWarnings],
      health: this.getHealth(),
      cycle: this.cycleCount,
      timestamp,
      lastUpdated: this.lastUpdated
    };
    this.lastStatus = status;

    return this.publish(status).then(() => ({ status, command, learned }));
  }

  /** Returns the failure message when the save did not succeed */
  private saveState(timestamp: string = this.timestamp()): string | null {
    this.lastUpdated = timestamp;
    try {
      this.store.save(this.getState());
      return null;
    } catch (error) {
      return this.errorHandler.logError(error, { step: 'save' }).message;
    }
  }

  private async publish(status: StatusReport): Promise<void> {
    try {
      await this.gateway.publishStatus(status);
    } catch (error) {
      this.logger.warn(`Could not publish status ${status.code}: ${errorMessage(error)}`);
    }
    if (status.code === 'OK' || status.code === 'TRAINING' || status.code === 'LOW_CONFIDENCE') {
      this.logger.info(`Status ${status.code}`, { final: status.finalTemp, confidence: status.confidence });
    } else if (!(status.code === 'BLOCKED' || status.code === 'HEATING_OFF')) {
      this.logger.warn(`Status ${status.code}: ${status.description}`, { lastError: status.lastError });
    }
  }

  private timestamp(): string {
    const now = this.clock().toUTC();
    return now.toISO() ?? now.toJSDate().toISOString();
  }
}


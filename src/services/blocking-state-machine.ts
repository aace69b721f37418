/**
 * Blocking State Machine
 *
 * Tracks abnormal heat-pump modes (hot water, defrost, disinfection,
 * boost) and the grace period after them.
 *
 *   NORMAL --blocking seen--> BLOCKED --blocking gone--> GRACE --stable/timeout--> NORMAL
 *                                ^                          |
 *                                +------blocking again------+
 *
 * While BLOCKED or GRACE no learning or solving happens; the last command
 * (or the grace interim target) is held.
 */

import { DateTime } from 'luxon';
import { BlockingEvent, BlockingKind, BlockingPhase, GraceDirection } from '../types';
import { ControlConfig } from '../config/control-defaults';
import { Logger } from '../util/logger';

export type BlockingConfig = Pick<
  ControlConfig,
  'maxTempChangePerCycle' | 'gracePeriodMaxMinutes' | 'graceStabilizationTolerance'
>;

export type BlockingTransition = 'none' | 'blocked' | 'grace' | 'stabilized' | 'timeout' | 'aborted';

export interface BlockingObservation {
  blocking: readonly BlockingKind[];
  outletTempActual: number | null;
  timestamp: string;
  /** Last command applied in normal control */
  lastFinalTemp: number | null;
}

export interface BlockingDecision {
  phase: BlockingPhase;
  event: BlockingEvent | null;
  /** The event whose grace period ended on this update */
  completedEvent: BlockingEvent | null;
  transition: BlockingTransition;
  controlSuspended: boolean;
  /** Command to hold while suspended */
  heldCommand: number | null;
}

export class BlockingStateMachine {
  private phase: BlockingPhase;
  private event: BlockingEvent | null;
  private completed: BlockingEvent | null = null;

  constructor(
    private readonly config: BlockingConfig,
    private readonly logger?: Pick<Logger, 'blocking' | 'warn'>,
    initial?: { phase: BlockingPhase; event: BlockingEvent | null }
  ) {
    this.phase = initial ? initial.phase : { state: 'NORMAL' };
    this.event = initial?.event ? { ...initial.event, kinds: [...initial.event.kinds] } : null;
  }

  getPhase(): BlockingPhase {
    return this.phase;
  }

  getEvent(): BlockingEvent | null {
    return this.event ? { ...this.event, kinds: [...this.event.kinds] } : null;
  }

  isSuspended(): boolean {
    return this.phase.state !== 'NORMAL';
  }

  update(observation: BlockingObservation): BlockingDecision {
    this.completed = null;
    const blocked = observation.blocking.length > 0;
    let transition: BlockingTransition = 'none';

    switch (this.phase.state) {
      case 'NORMAL':
        if (blocked) {
          this.enterBlocked(observation, observation.lastFinalTemp, false);
          transition = 'blocked';
        }
        break;

      case 'BLOCKED':
        if (blocked) {
          this.mergeKinds(observation.blocking);
        } else {
          transition = this.enterGrace(observation);
        }
        break;

      case 'GRACE':
        if (blocked) {
          this.logger?.blocking('Blocking resumed during grace period', { kinds: [...observation.blocking] });
          this.enterBlocked(observation, this.event?.preEventTarget ?? observation.lastFinalTemp, true);
          transition = 'aborted';
        } else {
          transition = this.checkGrace(observation);
        }
        break;
    }

    return this.decision(transition, observation.lastFinalTemp);
  }

  private enterBlocked(observation: BlockingObservation, preEventTarget: number | null, resumed: boolean): void {
    const kind = observation.blocking[0];
    const previous = resumed ? this.event : null;
    this.phase = { state: 'BLOCKED', kind };
    this.event = {
      kind,
      kinds: [...new Set([...(previous?.kinds ?? []), ...observation.blocking])],
      startTime: previous ? previous.startTime : observation.timestamp,
      preEventTarget,
      endTime: null
    };
    this.logger?.blocking(`Blocking detected: ${this.event.kinds.join(', ')}`, { preEventTarget });
  }

  private mergeKinds(kinds: readonly BlockingKind[]): void {
    if (this.event) {
      this.event.kinds = [...new Set([...this.event.kinds, ...kinds])];
    }
  }

  private enterGrace(observation: BlockingObservation): BlockingTransition {
    const kind = this.phase.state === 'BLOCKED' ? this.phase.kind : 'DHW';
    const reference = this.event?.preEventTarget ?? observation.lastFinalTemp;
    if (this.event) {
      this.event.endTime = observation.timestamp;
    }

    if (reference === null || observation.outletTempActual === null) {
      this.logger?.blocking('Blocking ended without a reference temperature; resuming control');
      this.finishGrace();
      return 'stabilized';
    }

    const delta = observation.outletTempActual - reference;
    const direction: GraceDirection = delta > 0 ? 'cooldown' : 'recovery';
    const interimTarget = direction === 'cooldown' ? reference + this.config.maxTempChangePerCycle : reference;

    this.phase = { state: 'GRACE', kind, direction, interimTarget, startedAt: observation.timestamp };
    this.logger?.blocking(`Blocking ended; grace period waiting for ${direction}`, {
      actual: observation.outletTempActual,
      reference,
      interimTarget
    });

    const settled = this.checkGrace(observation);
    return settled === 'none' ? 'grace' : settled;
  }

  private checkGrace(observation: BlockingObservation): BlockingTransition {
    if (this.phase.state !== 'GRACE') {
      return 'none';
    }
    const grace = this.phase;

    const elapsed = DateTime.fromISO(observation.timestamp).diff(DateTime.fromISO(grace.startedAt), 'minutes').minutes;
    if (!Number.isFinite(elapsed) || elapsed >= this.config.gracePeriodMaxMinutes) {
      this.logger?.warn(`Grace period timed out after ${this.config.gracePeriodMaxMinutes} minutes; resuming control`, {
        direction: grace.direction,
        actual: observation.outletTempActual
      });
      this.finishGrace();
      return 'timeout';
    }

    const actual = observation.outletTempActual;
    if (actual === null) {
      return 'none';
    }

    const tolerance = this.config.graceStabilizationTolerance;
    const stable = grace.direction === 'cooldown'
      ? actual <= grace.interimTarget + tolerance
      : actual >= grace.interimTarget - tolerance;

    if (stable) {
      this.logger?.blocking(`Outlet stabilized after ${grace.direction}`, { actual, target: grace.interimTarget });
      this.finishGrace();
      return 'stabilized';
    }
    return 'none';
  }

  private finishGrace(): void {
    this.completed = this.event;
    this.event = null;
    this.phase = { state: 'NORMAL' };
  }

  private decision(transition: BlockingTransition, lastFinalTemp: number | null): BlockingDecision {
    let heldCommand: number | null = null;
    if (this.phase.state === 'GRACE') {
      heldCommand = this.phase.interimTarget;
    } else if (this.phase.state === 'BLOCKED') {
      heldCommand = this.event?.preEventTarget ?? lastFinalTemp;
    }
    return {
      phase: this.phase,
      event: this.getEvent(),
      completedEvent: this.completed ? { ...this.completed, kinds: [...this.completed.kinds] } : null,
      transition,
      controlSuspended: this.phase.state !== 'NORMAL',
      heldCommand
    };
  }
}

/**
 * Secondary Heater Learner
 *
 * Detects a wood stove or similar heater from the temperature differential
 * between its room and the rest of the house, and learns how many kW of
 * heat each degree of differential represents.
 *
 * Features:
 * - Hysteresis on the differential so the on/off state does not chatter
 * - Session tracking (start, peak differential, indoor rise)
 * - Bounded, slowly blended ratio; learner state is persisted with the
 *   rest of the learning state
 *
 * @module services/heat-sources/secondary-heater-learner
 */

import { DateTime } from 'luxon';
import { SecondaryHeaterObservation, SecondaryHeaterState } from '../../types';
import { Logger } from '../../util/logger';
import { clamp, mean } from '../../util/stats';

/**
 * Configuration constants for secondary heater learning
 */
export const SECONDARY_HEATER_CONFIG = {
  /** kW per °C differential before anything is learned */
  DEFAULT_RATIO: 2.5,
  /** Weight of a new estimate when blending */
  LEARNING_RATE: 0.1,
  MIN_OBSERVATIONS_FOR_LEARNING: 3,
  MAX_OBSERVATIONS: 100,
  /** Sessions this short are not recorded */
  MIN_SESSION_MINUTES: 10,
  /** Observations used for a ratio estimate must last this long */
  MIN_USABLE_SESSION_MINUTES: 15,
  MIN_USABLE_PEAK_DIFFERENTIAL: 1.0,
  RECENT_OBSERVATIONS: 20,
  FULL_CONFIDENCE_OBSERVATIONS: 50,
  MAX_CONFIDENCE: 0.9,
} as const;

export interface SecondaryHeaterOptions {
  ratioMin: number;
  ratioMax: number;
  onThreshold: number;
  offThreshold: number;
  heatUnitsPerKw: number;
}

export interface SecondaryHeaterInput {
  timestamp: string;
  zoneTemp: number;
  indoorTemp: number;
  outdoorTemp: number;
}

export type SessionTransition = 'started' | 'ended' | 'none';

export interface SecondaryHeaterReading {
  active: boolean;
  differential: number;
  transition: SessionTransition;
  /** True when a finished session was recorded as an observation */
  recorded: boolean;
}

export function createDefaultSecondaryHeaterState(): SecondaryHeaterState {
  return {
    ratio: SECONDARY_HEATER_CONFIG.DEFAULT_RATIO,
    confidence: 0,
    active: false,
    session: null,
    observations: []
  };
}

export class SecondaryHeaterLearner {
  private state: SecondaryHeaterState;

  constructor(
    private readonly options: SecondaryHeaterOptions,
    private readonly logger?: Pick<Logger, 'learning' | 'warn' | 'debug'>,
    initialState?: SecondaryHeaterState
  ) {
    this.state = initialState ? this.sanitize(initialState) : createDefaultSecondaryHeaterState();
  }

  getState(): SecondaryHeaterState {
    return {
      ...this.state,
      session: this.state.session ? { ...this.state.session } : null,
      observations: this.state.observations.map(o => ({ ...o }))
    };
  }

  isActive(): boolean {
    return this.state.active;
  }

  getRatio(): number {
    return this.state.ratio;
  }

  getConfidence(): number {
    return this.state.confidence;
  }

  /**
   * Feed one cycle's readings. Updates the on/off state, session tracking
   * and, when a session ends, the learned ratio.
   */
  observe(input: SecondaryHeaterInput): SecondaryHeaterReading {
    const differential = input.zoneTemp - input.indoorTemp;
    const wasActive = this.state.active;

    if (!wasActive && differential > this.options.onThreshold) {
      this.state.active = true;
    } else if (wasActive && differential < this.options.offThreshold) {
      this.state.active = false;
    }

    if (this.state.active && !wasActive) {
      this.state.session = {
        startTime: input.timestamp,
        startIndoor: input.indoorTemp,
        peakDifferential: differential,
        outdoorTemp: input.outdoorTemp
      };
      this.logger?.learning('Secondary heater session started', { differential, outdoor: input.outdoorTemp });
      return { active: true, differential, transition: 'started', recorded: false };
    }

    if (this.state.active && this.state.session) {
      this.state.session.peakDifferential = Math.max(this.state.session.peakDifferential, differential);
      return { active: true, differential, transition: 'none', recorded: false };
    }

    if (!this.state.active && wasActive) {
      const recorded = this.closeSession(input);
      return { active: false, differential, transition: 'ended', recorded };
    }

    return { active: this.state.active, differential, transition: 'none', recorded: false };
  }

  /**
   * Heat output implied by the current differential while active.
   */
  kilowatts(differential: number): number {
    if (!this.state.active || differential <= 0) {
      return 0;
    }
    return differential * this.state.ratio;
  }

  private closeSession(input: SecondaryHeaterInput): boolean {
    const session = this.state.session;
    this.state.session = null;
    if (!session) {
      return false;
    }

    const durationMinutes = DateTime.fromISO(input.timestamp)
      .diff(DateTime.fromISO(session.startTime), 'minutes').minutes;

    if (!Number.isFinite(durationMinutes) || durationMinutes <= SECONDARY_HEATER_CONFIG.MIN_SESSION_MINUTES) {
      this.logger?.debug(`Secondary heater session too short to learn from (${durationMinutes} min)`);
      return false;
    }

    const observation: SecondaryHeaterObservation = {
      timestamp: session.startTime,
      peakDifferential: session.peakDifferential,
      durationMinutes,
      indoorRise: input.indoorTemp - session.startIndoor,
      outdoorTemp: session.outdoorTemp
    };

    this.state.observations.push(observation);
    if (this.state.observations.length > SECONDARY_HEATER_CONFIG.MAX_OBSERVATIONS) {
      this.state.observations.shift();
    }

    this.logger?.learning('Secondary heater session ended', {
      minutes: Math.round(durationMinutes),
      peak: observation.peakDifferential,
      indoorRise: observation.indoorRise
    });

    this.updateRatio();
    return true;
  }

  private updateRatio(): void {
    const observations = this.state.observations;
    if (observations.length < SECONDARY_HEATER_CONFIG.MIN_OBSERVATIONS_FOR_LEARNING) {
      return;
    }

    const usable = observations
      .slice(-SECONDARY_HEATER_CONFIG.RECENT_OBSERVATIONS)
      .filter(o =>
        o.durationMinutes > SECONDARY_HEATER_CONFIG.MIN_USABLE_SESSION_MINUTES &&
        o.peakDifferential > SECONDARY_HEATER_CONFIG.MIN_USABLE_PEAK_DIFFERENTIAL &&
        o.indoorRise > 0
      );

    if (usable.length > 0 && this.options.heatUnitsPerKw > 0) {
      const estimates = usable.map(o =>
        clamp(o.indoorRise / (o.peakDifferential * this.options.heatUnitsPerKw), this.options.ratioMin, this.options.ratioMax)
      );
      const rate = SECONDARY_HEATER_CONFIG.LEARNING_RATE;
      const blended = this.state.ratio * (1 - rate) + mean(estimates) * rate;
      this.state.ratio = clamp(blended, this.options.ratioMin, this.options.ratioMax);
    }

    this.state.confidence = Math.min(
      SECONDARY_HEATER_CONFIG.MAX_CONFIDENCE,
      observations.length / SECONDARY_HEATER_CONFIG.FULL_CONFIDENCE_OBSERVATIONS
    );
  }

  private sanitize(state: SecondaryHeaterState): SecondaryHeaterState {
    const ratio = Number.isFinite(state.ratio)
      ? clamp(state.ratio, this.options.ratioMin, this.options.ratioMax)
      : SECONDARY_HEATER_CONFIG.DEFAULT_RATIO;
    if (ratio !== state.ratio) {
      this.logger?.warn(`Stored secondary heater ratio ${state.ratio} outside configured bounds; using ${ratio}`);
    }
    return {
      ratio,
      confidence: Number.isFinite(state.confidence) ? clamp(state.confidence, 0, SECONDARY_HEATER_CONFIG.MAX_CONFIDENCE) : 0,
      active: state.active,
      session: state.session ? { ...state.session } : null,
      observations: state.observations.slice(-SECONDARY_HEATER_CONFIG.MAX_OBSERVATIONS).map(o => ({ ...o }))
    };
  }
}

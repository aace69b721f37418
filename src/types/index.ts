// Thermal model types
export interface ThermalParameters {
  /** Hours for the indoor temperature to close ~63% of the gap to equilibrium */
  thermalTimeConstant: number;
  heatLossCoefficient: number;
  outletEffectiveness: number;
  learningConfidence: number;
}

export type LearnedParameterName = 'thermalTimeConstant' | 'heatLossCoefficient' | 'outletEffectiveness';

export interface ParameterRange {
  min: number;
  max: number;
}

export type LearningQuality = 'excellent' | 'good' | 'fair' | 'poor';

// Sensor input types
export type BlockingKind = 'DHW' | 'DEFROST' | 'DISINFECT' | 'BOOST';

export const BLOCKING_KINDS: readonly BlockingKind[] = ['DHW', 'DEFROST', 'DISINFECT', 'BOOST'];

/** Hot-water style blockers leave the outlet hot when they end */
export const DHW_LIKE_BLOCKERS: readonly BlockingKind[] = ['DHW', 'DISINFECT', 'BOOST'];

export interface ForecastVectors {
  /** Outdoor temperature forecast for +1h..+4h */
  outdoor: number[];
  /** PV generation forecast in W for +1h..+4h */
  pv: number[];
  issuedAt?: string;
}

/**
 * One cycle's validated input. Built once at the gateway boundary and
 * never mutated by the engine.
 */
export interface SensorSnapshot {
  readonly timestamp: string;
  readonly indoorTemp: number;
  readonly outdoorTemp: number;
  readonly outletTempActual: number;
  readonly targetIndoorTemp: number;
  readonly heatingActive: boolean;
  readonly blocking: readonly BlockingKind[];
  readonly pvPowerW?: number;
  /** Temperature of the room holding the secondary heater */
  readonly secondaryZoneTemp?: number;
  readonly tvOn?: boolean;
  readonly occupancy?: number;
  readonly forecast?: Readonly<ForecastVectors>;
}

export type RawSnapshot = Record<string, unknown>;

export interface BlockingReading {
  blocking: BlockingKind[];
  outletTempActual: number | null;
}

// Heat sources
export type HeatSourceId = 'pv' | 'secondary_heater' | 'electronics';

export interface HeatContribution {
  sourceId: HeatSourceId;
  kilowatts: number;
  /** Contribution in heat-balance units, summed into the equilibrium numerator */
  heatUnits: number;
  confidence: number;
}

export interface SecondaryHeaterObservation {
  timestamp: string;
  peakDifferential: number;
  durationMinutes: number;
  indoorRise: number;
  outdoorTemp: number;
}

export interface SecondaryHeaterSession {
  startTime: string;
  startIndoor: number;
  peakDifferential: number;
  outdoorTemp: number;
}

export interface SecondaryHeaterState {
  /** kW of heat per °C of zone differential */
  ratio: number;
  confidence: number;
  active: boolean;
  session: SecondaryHeaterSession | null;
  observations: SecondaryHeaterObservation[];
}

// History records
export interface PredictionContext {
  outletTemp: number;
  outdoorTemp: number;
  heatUnits: number;
  startIndoor: number;
  cycleHours: number;
}

export interface PredictionRecord {
  timestamp: string;
  predictedIndoorDelta: number;
  actualIndoorDelta: number;
  /** actual - predicted */
  error: number;
  context: PredictionContext;
  quality: LearningQuality;
}

export interface ParameterUpdateRecord {
  timestamp: string;
  deltas: Record<LearnedParameterName, number>;
  values: Record<LearnedParameterName, number>;
  learningRate: number;
  confidence: number;
  clamped: LearnedParameterName[];
}

// Blocking
export interface BlockingEvent {
  kind: BlockingKind;
  kinds: BlockingKind[];
  startTime: string;
  preEventTarget: number | null;
  endTime: string | null;
}

export type GraceDirection = 'cooldown' | 'recovery';

export type BlockingPhase =
  | { state: 'NORMAL' }
  | { state: 'BLOCKED'; kind: BlockingKind }
  | { state: 'GRACE'; kind: BlockingKind; direction: GraceDirection; interimTarget: number; startedAt: string };

/** The prediction made this cycle, checked against reality next cycle */
export interface PendingPrediction {
  timestamp: string;
  predictedIndoor: number;
  context: PredictionContext;
}

export type CorrectorMode = 'normal' | 'disturbance' | 'decay';

export interface CorrectorState {
  mode: CorrectorMode;
  previousShortfall: number | null;
  riseStreak: number;
  calmStreak: number;
  /** Correction carried through a disturbance and decayed afterwards */
  heldCorrection: number;
}

export interface ControlMemory {
  lastFinalTemp: number | null;
  lastBlockingReasons: BlockingKind[];
  blockingEvent: BlockingEvent | null;
  phase: BlockingPhase;
  pendingPrediction: PendingPrediction | null;
  shortfallEwma: number;
  corrector: CorrectorState;
}

/**
 * Serialized engine state: the one record that is persisted.
 */
export interface LearningState {
  schema: 'learning-state';
  version: number;
  parameters: ThermalParameters;
  predictionHistory: PredictionRecord[];
  parameterHistory: ParameterUpdateRecord[];
  cycleCount: number;
  learnedCycles: number;
  lastUpdated: string | null;
  secondaryHeater: SecondaryHeaterState;
  control: ControlMemory;
}

// Status surface
export type StatusCode =
  | 'OK'
  | 'LOW_CONFIDENCE'
  | 'BLOCKED'
  | 'NETWORK_ERROR'
  | 'NO_DATA'
  | 'TRAINING'
  | 'HEATING_OFF'
  | 'MODEL_ERROR';

export interface HealthSignals {
  parameterStability: number;
  predictionConsistency: number;
  physicsAlignment: number;
  modelHealth: number;
  learningProgress: number;
}

export interface StatusReport {
  code: StatusCode;
  description: string;
  confidence: number;
  suggestedTemp: number | null;
  finalTemp: number | null;
  predictedIndoor: number | null;
  blockingReasons: BlockingKind[];
  missingInputs: string[];
  lastError: string | null;
  /** Command came from a search that hit its iteration cap */
  degraded: boolean;
  stabilityWarnings: LearnedParameterName[];
  health: HealthSignals;
  cycle: number;
  timestamp: string;
  lastUpdated: string | null;
}

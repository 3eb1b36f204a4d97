
/**
 * Where the user physically is. Drives which network is in range.
 */
export enum Location {
  AT_OFFICE = 'At Office',
  WALKING = 'Walking'
}

/**
 * Network technologies the user's devices can attach to.
 */
export enum NetworkType {
  WIFI = 'Wi-Fi',
  FIVE_G = '5G'
}

/**
 * Devices in the user's ecosystem. The session lives on exactly one of them.
 */
export enum Device {
  LAPTOP = 'Laptop',
  PHONE = 'Phone'
}

/**
 * Progress of moving the session between devices.
 */
export enum MigrationStatus {
  /** No transfer running and the session sits on the device in use. */
  IDLE = 'IDLE',
  /** Session state is in flight towards a target device. */
  IN_PROGRESS = 'IN_PROGRESS',
  /** The last chunk has landed. The target may not be in use yet (staged session). */
  COMPLETE = 'COMPLETE'
}

/**
 * How a migration relates to the user.
 */
export enum MigrationMode {
  /** Blocking transfer. The session is unusable until it lands. */
  FOREGROUND = 'Foreground',
  /** Predictive transfer. The user keeps working on the current device. */
  BACKGROUND = 'Background'
}

/**
 * Quality-of-service tier the session streams at.
 */
export enum QosTier {
  HIGH = 'High',
  STANDARD = 'Standard'
}

/**
 * Power-draw classes understood by the PowerModel.
 * Exactly one class is charged per step.
 */
export enum ActivityClass {
  /** User waiting on a switch while nothing moves. Lowest draw. */
  IDLE = 'Idle',
  /** Session usable, normal work. */
  ACTIVE_USE = 'Active Use',
  /** On-device adaptation work (network re-association, QoS renegotiation). */
  CPU_BURST = 'CPU Burst',
  /** Session data on the air. Scales with volume and link type. */
  TRANSMIT = 'Transmit'
}

/**
 * Kinds of exogenous events a ScenarioScript can hold.
 */
export enum ScenarioEventType {
  CONTEXT_CHANGE = 'CONTEXT_CHANGE',
  DEVICE_SWITCH_INTENT = 'DEVICE_SWITCH_INTENT'
}

/**
 * The user moves to a new place and the devices re-attach to another network.
 */
export interface ContextChangeEvent {
  type: ScenarioEventType.CONTEXT_CHANGE;
  location: Location;
  network: NetworkType;
}

/**
 * The user picks up another device and expects the session there.
 */
export interface DeviceSwitchIntentEvent {
  type: ScenarioEventType.DEVICE_SWITCH_INTENT;
  device: Device;
}

export type ScenarioEvent = ContextChangeEvent | DeviceSwitchIntentEvent;

/**
 * A scripted event pinned to the step it fires on.
 */
export interface ScheduledEvent {
  step: number;
  event: ScenarioEvent;
}

/**
 * Decisions an agent can return for a step.
 */
export enum ActionType {
  NONE = 'NONE',
  ADAPT_QOS = 'ADAPT_QOS',
  BEGIN_MIGRATION = 'BEGIN_MIGRATION',
  COMPLETE_MIGRATION = 'COMPLETE_MIGRATION'
}

export type AgentAction =
  | { type: ActionType.NONE }
  | { type: ActionType.ADAPT_QOS; tier: QosTier }
  | { type: ActionType.BEGIN_MIGRATION; target: Device; mode: MigrationMode }
  | { type: ActionType.COMPLETE_MIGRATION; target: Device };

/**
 * Identifies the built-in policies.
 */
export enum AgentKind {
  REACTIVE = 'Reactive',
  MYOPIC = 'Myopic',
  PASS = 'PASS'
}

/**
 * A session transfer that has started and not yet landed.
 */
export interface InFlightTransfer {
  /** Device the session is moving to */
  target: Device;
  mode: MigrationMode;
  /** MB still to move */
  remainingMB: number;
  /** Chunks moved so far */
  stepsTaken: number;
  /** Bandwidth of the link the transfer was opened on (MB/s) */
  bandwidthMBps: number;
  /** Network the transfer was opened on. Transmit power is billed against it. */
  network: NetworkType;
  /** Step on which the transfer began */
  startedAt: number;
}

/**
 * The complete mutable context of one simulation run.
 */
export interface WorldState {
  /** Current step, 0-based */
  timeStep: number;
  location: Location;
  network: NetworkType;
  /** Bandwidth of the current network in MB/s. Always changes together with `network`. */
  bandwidthMBps: number;
  /** Device the user is working on */
  activeDevice: Device;
  /** Device holding the session state */
  sessionLocation: Device;
  migrationStatus: MigrationStatus;
  qosTier: QosTier;
  /** Device the user asked to move to and is still waiting on */
  pendingSwitch: Device | null;
  transfer: InFlightTransfer | null;
  /** Size of the session state in MB (constant per run) */
  sessionSizeMB: number;
  /** Accumulator: power drawn so far */
  cumulativePowerUnits: number;
  /** Accumulator: MB moved by background (predictive) transfers */
  proactiveDataMB: number;
  /** Accumulator: steps with session data in flight */
  migrationSteps: number;
}

/**
 * Power profile consumed by the PowerModel. Units are arbitrary but consistent.
 */
export interface PowerProfile {
  idle: number;
  activeUse: number;
  cpuBurst: number;
  /** Transmit cost per MB for each network */
  transmitPerMB: Record<NetworkType, number>;
}

/**
 * Selects how Kleinrock's power is derived from a run.
 */
export type KleinrockFormula =
  /** γ = session size / steps with data in flight; power = γ / latency */
  | { kind: 'transferThroughput' }
  /** power = γ · horizon / latency */
  | { kind: 'scenarioDuration'; gamma: number };

/**
 * Immutable configuration shared by the script, the runner and the aggregator.
 */
export interface SimulationConfig {
  /** Number of steps in a run */
  horizon: number;
  /** Size of the session state in MB */
  sessionSizeMB: number;
  /** Wall-clock seconds represented by one step */
  secondsPerStep: number;
  /** Bandwidth per network in MB/s */
  bandwidthMBps: Record<NetworkType, number>;
  initialLocation: Location;
  initialNetwork: NetworkType;
  initialDevice: Device;
  /** Devices available to the user, in preference order */
  devices: Device[];
  /** Exogenous events, fired identically for every agent */
  events: ScheduledEvent[];
  power: PowerProfile;
  kleinrock: KleinrockFormula;
  /** QoE score while the session is usable */
  qoeExcellent: number;
  /** QoE score while the user waits on a blocking migration */
  qoePoor: number;
}

/**
 * One row of the append-only per-step log.
 */
export interface LogEntry {
  timeStep: number;
  /** Scripted event that fired on this step, if any */
  event: ScenarioEvent | null;
  action: AgentAction;
  activity: ActivityClass;
  /** Power drawn on this step */
  power: number;
  location: Location;
  network: NetworkType;
  bandwidthMBps: number;
  activeDevice: Device;
  sessionLocation: Device;
  migrationStatus: MigrationStatus;
  qosTier: QosTier;
  cumulativePowerUnits: number;
  proactiveDataMB: number;
  /** MB of session state moved on this step */
  transferredMB: number;
  /** Steps with data in flight, up to and including this one */
  migrationSteps: number;
  /** False while the user waits on a blocking migration */
  sessionUsable: boolean;
  qoe: number;
}

/**
 * Summary record handed to the table printer and the chart renderer.
 */
export interface RunSummary {
  handoverLatencySteps: number;
  totalPowerUnits: number;
  kleinrockPower: number;
  proactiveDataMB: number;
}

/**
 * Human-readable happenings buffered by the engine for the console logger.
 */
export enum SimulationEventType {
  CONTEXT_CHANGE = 'CONTEXT_CHANGE',
  SWITCH_INTENT = 'SWITCH_INTENT',
  QOS_ADAPTED = 'QOS_ADAPTED',
  MIGRATION_STARTED = 'MIGRATION_STARTED',
  MIGRATION_PROMOTED = 'MIGRATION_PROMOTED',
  MIGRATION_COMPLETED = 'MIGRATION_COMPLETED',
  FOCUS_SWITCHED = 'FOCUS_SWITCHED',
  ACTION_IGNORED = 'ACTION_IGNORED'
}

export interface SimulationEvent {
  type: SimulationEventType;
  time: number;
  message: string;
}

/**
 * Result of one agent's run inside a comparison.
 */
export type RunOutcome =
  | { agent: string; ok: true; log: LogEntry[]; summary: RunSummary; events: SimulationEvent[] }
  /** `log` holds the steps completed before the fault */
  | { agent: string; ok: false; error: Error; log: LogEntry[] };

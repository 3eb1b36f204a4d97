import {
    ActionType,
    ActivityClass,
    Device,
    MigrationMode,
    MigrationStatus,
    NetworkType,
    QosTier,
    ScenarioEventType,
    SimulationEventType
} from './types';
import type {
    AgentAction,
    LogEntry,
    ScenarioEvent,
    SimulationConfig,
    SimulationEvent,
    WorldState
} from './types';
import type { AgentPolicy } from './agents';
import { PowerModel } from './PowerModel';
import { ScenarioScript } from './ScenarioScript';
import { SimulationError } from './errors';
import { chunkSizeMB, transferDurationSteps } from './mathUtils';
import { advanceTime, applyEvent, createWorldState, snapshotState } from './worldState';

// Residue below this counts as "all data moved"
const TRANSFER_EPSILON_MB = 1e-9;

interface ChunkResult {
    movedMB: number;
    network: NetworkType;
    mode: MigrationMode;
}

/**
 * Discrete-time runner for one agent over the scenario horizon.
 *
 * Each tick: settle a finished migration, look up the scripted event, ask the
 * agent, apply its action, apply the event, move one chunk of any in-flight
 * transfer, charge power and append a LogEntry.
 */
export class SimulationEngine {
    private state: WorldState;
    private readonly config: SimulationConfig;
    private readonly agent: AgentPolicy;
    private readonly script: ScenarioScript;
    private readonly powerModel: PowerModel;
    private log: LogEntry[] = [];

    // Event buffers: the last tick only, and the whole run
    private recentEvents: SimulationEvent[] = [];
    private eventHistory: SimulationEvent[] = [];

    constructor(config: SimulationConfig, agent: AgentPolicy, script: ScenarioScript = ScenarioScript.fromConfig(config)) {
        if (script.horizon !== config.horizon) {
            throw new SimulationError(`Script horizon ${script.horizon} does not match configured horizon ${config.horizon}`);
        }
        this.config = config;
        this.agent = agent;
        this.script = script;
        this.powerModel = new PowerModel(config.power);
        this.state = createWorldState(config);
    }

    /**
     * Returns a snapshot of the current world. Mutating it has no effect on the run.
     */
    public getState(): WorldState {
        return snapshotState(this.state);
    }

    public getLog(): LogEntry[] {
        return [...this.log];
    }

    /** Events raised during the most recent tick. */
    public getRecentEvents(): SimulationEvent[] {
        return [...this.recentEvents];
    }

    /** Every event raised since the last reset. */
    public getEventHistory(): SimulationEvent[] {
        return [...this.eventHistory];
    }

    /**
     * Back to step 0 with a brand-new world.
     */
    public reset() {
        this.state = createWorldState(this.config);
        this.log = [];
        this.recentEvents = [];
        this.eventHistory = [];
    }

    public isComplete(): boolean {
        return this.log.length >= this.config.horizon;
    }

    /**
     * Runs the remaining steps and returns the full log.
     */
    public run(): LogEntry[] {
        while (!this.isComplete()) {
            this.tick();
        }
        return this.getLog();
    }

    /**
     * Executes exactly one step.
     */
    public tick(): LogEntry {
        if (this.isComplete()) {
            throw new SimulationError(`Run already covers the ${this.config.horizon}-step horizon`);
        }
        this.recentEvents = [];
        const s = this.state;
        const t = s.timeStep;

        // 1. A migration that landed last step is settled once session and user agree
        if (s.migrationStatus === MigrationStatus.COMPLETE && !s.transfer && s.sessionLocation === s.activeDevice) {
            s.migrationStatus = MigrationStatus.IDLE;
        }

        // 2-3. Scripted event, then the agent's decision on the pre-event world
        const event = this.script.eventAt(t);
        const action = this.agent.decide(snapshotState(s), event);

        // 4. Action (new transfers bind to the link that is up right now)
        let cpuBurst = this.applyAction(action, t);

        // 5. Event
        if (event) {
            this.recordEvent(event, t);
            applyEvent(s, event, this.config);
            // Re-attaching to a new network is on-device work
            if (event.type === ScenarioEventType.CONTEXT_CHANGE) cpuBurst = true;
        }

        // 6. Transfer progress
        const chunk = this.advanceTransfer(t);

        // 7. Power
        const blockedOnTransfer = chunk !== null && chunk.mode === MigrationMode.FOREGROUND;
        const waitingOnSwitch = s.pendingSwitch !== null && s.pendingSwitch !== s.activeDevice;
        const sessionUsable = !blockedOnTransfer && !waitingOnSwitch;
        const activity = this.classifyStep(chunk, cpuBurst, sessionUsable);
        const power = this.powerModel.charge(activity, chunk ? chunk.network : s.network, chunk ? chunk.movedMB : 0);
        s.cumulativePowerUnits += power;

        // 8. Log
        const entry: LogEntry = {
            timeStep: t,
            event,
            action: { ...action },
            activity,
            power,
            location: s.location,
            network: s.network,
            bandwidthMBps: s.bandwidthMBps,
            activeDevice: s.activeDevice,
            sessionLocation: s.sessionLocation,
            migrationStatus: s.migrationStatus,
            qosTier: s.qosTier,
            cumulativePowerUnits: s.cumulativePowerUnits,
            proactiveDataMB: s.proactiveDataMB,
            transferredMB: chunk ? chunk.movedMB : 0,
            migrationSteps: s.migrationSteps,
            sessionUsable,
            qoe: sessionUsable ? this.config.qoeExcellent : this.config.qoePoor
        };
        this.log.push(entry);
        advanceTime(s, this.config.horizon);
        return entry;
    }

    private classifyStep(chunk: ChunkResult | null, cpuBurst: boolean, sessionUsable: boolean): ActivityClass {
        if (chunk && chunk.movedMB > 0) return ActivityClass.TRANSMIT;
        if (cpuBurst) return ActivityClass.CPU_BURST;
        if (!sessionUsable) return ActivityClass.IDLE;
        return ActivityClass.ACTIVE_USE;
    }

    /**
     * Applies the agent's action. Returns true when it cost on-device CPU work.
     */
    private applyAction(action: AgentAction, t: number): boolean {
        switch (action.type) {
            case ActionType.NONE:
                return false;
            case ActionType.ADAPT_QOS:
                return this.adaptQos(action.tier, t);
            case ActionType.BEGIN_MIGRATION:
                this.beginMigration(action.target, action.mode, t);
                return false;
            case ActionType.COMPLETE_MIGRATION:
                this.completeMigration(action.target, t);
                return false;
        }
    }

    private adaptQos(tier: QosTier, t: number): boolean {
        if (this.state.qosTier === tier) {
            this.emit(SimulationEventType.ACTION_IGNORED, t, `QoS already at ${tier}`);
            return false;
        }
        this.emit(SimulationEventType.QOS_ADAPTED, t, `${this.agent.name} changes QoS from ${this.state.qosTier} to ${tier}`);
        this.state.qosTier = tier;
        return true;
    }

    private beginMigration(target: Device, mode: MigrationMode, t: number) {
        const s = this.state;
        if (!this.config.devices.includes(target)) {
            this.emit(SimulationEventType.ACTION_IGNORED, t, `Unknown migration target ${target}`);
            return;
        }

        if (s.transfer) {
            if (s.transfer.target === target && s.transfer.mode === MigrationMode.BACKGROUND && mode === MigrationMode.FOREGROUND) {
                s.transfer.mode = MigrationMode.FOREGROUND;
                this.emit(SimulationEventType.MIGRATION_PROMOTED, t,
                    `Background migration to ${target} now blocking (${s.transfer.remainingMB.toFixed(2)} MB left)`);
            } else {
                this.emit(SimulationEventType.ACTION_IGNORED, t, `Migration to ${s.transfer.target} already in progress`);
            }
            return;
        }

        if (s.sessionLocation === target) {
            this.emit(SimulationEventType.ACTION_IGNORED, t, `Session already on ${target}`);
            return;
        }

        // Faults on a dead link before any state changes
        const expectedSteps = transferDurationSteps(s.sessionSizeMB, s.bandwidthMBps, this.config.secondsPerStep);

        s.transfer = {
            target,
            mode,
            remainingMB: s.sessionSizeMB,
            stepsTaken: 0,
            bandwidthMBps: s.bandwidthMBps,
            network: s.network,
            startedAt: t
        };
        s.migrationStatus = MigrationStatus.IN_PROGRESS;
        this.emit(SimulationEventType.MIGRATION_STARTED, t,
            `${this.agent.name} starts ${mode.toLowerCase()} migration ${s.sessionLocation} -> ${target} (${expectedSteps} steps over ${s.network})`);
    }

    private completeMigration(target: Device, t: number) {
        const s = this.state;
        const staged = s.migrationStatus === MigrationStatus.COMPLETE && s.sessionLocation === target;
        if (!staged || s.activeDevice === target) {
            this.emit(SimulationEventType.ACTION_IGNORED, t, `No session staged on ${target}`);
            return;
        }
        this.switchFocus(target, t);
    }

    private switchFocus(target: Device, t: number) {
        const s = this.state;
        this.emit(SimulationEventType.FOCUS_SWITCHED, t, `Session active on ${target} (was ${s.activeDevice})`);
        s.activeDevice = target;
        if (s.pendingSwitch === target) {
            s.pendingSwitch = null;
        }
    }

    /**
     * Moves one chunk of the in-flight transfer at the bandwidth it was opened with.
     */
    private advanceTransfer(t: number): ChunkResult | null {
        const s = this.state;
        const transfer = s.transfer;
        if (!transfer) return null;

        const movedMB = Math.min(transfer.remainingMB, chunkSizeMB(transfer.bandwidthMBps, this.config.secondsPerStep));
        transfer.remainingMB -= movedMB;
        transfer.stepsTaken += 1;
        s.migrationSteps += 1;
        if (transfer.mode === MigrationMode.BACKGROUND) {
            s.proactiveDataMB += movedMB;
        }

        if (transfer.remainingMB <= TRANSFER_EPSILON_MB) {
            s.transfer = null;
            s.sessionLocation = transfer.target;
            s.migrationStatus = MigrationStatus.COMPLETE;
            this.emit(SimulationEventType.MIGRATION_COMPLETED, t,
                `${transfer.mode} migration to ${transfer.target} completed in ${transfer.stepsTaken} steps`);
            if (transfer.mode === MigrationMode.FOREGROUND) {
                this.switchFocus(transfer.target, t);
            }
        }

        return { movedMB, network: transfer.network, mode: transfer.mode };
    }

    private recordEvent(event: ScenarioEvent, t: number) {
        if (event.type === ScenarioEventType.CONTEXT_CHANGE) {
            this.emit(SimulationEventType.CONTEXT_CHANGE, t,
                `User now ${event.location} (${this.state.network} -> ${event.network})`);
        } else {
            this.emit(SimulationEventType.SWITCH_INTENT, t,
                `User switches from ${this.state.activeDevice} to ${event.device}`);
        }
    }

    private emit(type: SimulationEventType, time: number, message: string) {
        const evt: SimulationEvent = { type, time, message };
        this.recentEvents.push(evt);
        this.eventHistory.push(evt);
    }
}

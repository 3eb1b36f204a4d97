import { ActivityClass, ScenarioEventType } from './types';
import type { LogEntry, RunSummary, SimulationConfig } from './types';
import { SimulationError } from './errors';
import { kleinrockPower } from './mathUtils';

export interface ActivitySegment {
    activity: ActivityClass;
    start: number;
    /** Exclusive */
    end: number;
}

export interface QoePoint {
    timeStep: number;
    qoe: number;
}

/**
 * HANDOVER LATENCY
 *
 * Counted from the first switch-intent step up to and including the first step on
 * which the session runs on the requested device with the user on it.
 * Checks the session location rather than a Complete status: a migration lands
 * with status Complete on that same step, and a switch to the device already
 * holding the session never migrates, so it settles on the intent step.
 * A switch that never lands costs the steps left to the end of the run.
 * Returns 0 for a log with no switch intent.
 */
export const handoverLatency = (log: readonly LogEntry[]): number => {
    const intentIndex = log.findIndex(e => e.event?.type === ScenarioEventType.DEVICE_SWITCH_INTENT);
    if (intentIndex < 0) return 0;

    const intent = log[intentIndex].event;
    if (intent?.type !== ScenarioEventType.DEVICE_SWITCH_INTENT) return 0;
    const target = intent.device;

    for (let k = intentIndex; k < log.length; k++) {
        if (log[k].activeDevice === target && log[k].sessionLocation === target) {
            return k - intentIndex + 1;
        }
    }
    return log.length - intentIndex;
};

/**
 * Reduces a finished run to the four figures the report compares.
 */
export const summarizeRun = (log: readonly LogEntry[], config: SimulationConfig): RunSummary => {
    if (log.length === 0) {
        throw new SimulationError('Cannot summarize an empty log');
    }
    const last = log[log.length - 1];
    const latency = handoverLatency(log);

    return {
        handoverLatencySteps: latency,
        totalPowerUnits: last.cumulativePowerUnits,
        kleinrockPower: kleinrockPower(config.kleinrock, {
            sessionSizeMB: config.sessionSizeMB,
            migrationSteps: last.migrationSteps,
            handoverLatencySteps: latency,
            horizon: config.horizon
        }),
        proactiveDataMB: last.proactiveDataMB
    };
};

export const qoeSeries = (log: readonly LogEntry[]): QoePoint[] =>
    log.map(e => ({ timeStep: e.timeStep, qoe: e.qoe }));

/**
 * Mean QoE over the run; 0 for an empty log.
 */
export const averageQoe = (log: readonly LogEntry[]): number => {
    if (log.length === 0) return 0;
    return log.reduce((sum, e) => sum + e.qoe, 0) / log.length;
};

/**
 * Collapses the log into runs of consecutive steps with the same activity class.
 */
export const activitySegments = (log: readonly LogEntry[]): ActivitySegment[] => {
    const segments: ActivitySegment[] = [];
    log.forEach(e => {
        const current = segments[segments.length - 1];
        if (current && current.activity === e.activity && current.end === e.timeStep) {
            current.end = e.timeStep + 1;
        } else {
            segments.push({ activity: e.activity, start: e.timeStep, end: e.timeStep + 1 });
        }
    });
    return segments;
};

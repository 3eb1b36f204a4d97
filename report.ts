import type { AgentAction, LogEntry, RunOutcome, SimulationEvent } from './types';
import { ActionType } from './types';
import { formatFixed, generateCSV } from './mathUtils';
import type { CsvValue } from './mathUtils';

export const SUMMARY_HEADERS = [
    'Agent',
    'Handover Latency (steps)',
    'Total Power Consumed (units)',
    "Kleinrock's Power (γ/T)",
    'Proactive Data (MB)'
];

export const LOG_CSV_HEADERS = [
    'timeStep',
    'location',
    'network',
    'bandwidthMBps',
    'activeDevice',
    'sessionLocation',
    'migrationStatus',
    'qosTier',
    'event',
    'action',
    'activity',
    'power',
    'cumulativePowerUnits',
    'transferredMB',
    'proactiveDataMB',
    'migrationSteps',
    'sessionUsable',
    'qoe'
];

/**
 * Fixed-width summary table with one row per successful run.
 * Failed runs are listed underneath with their error.
 */
export const formatSummaryTable = (outcomes: readonly RunOutcome[]): string => {
    const rows: string[][] = [];
    const failures: string[] = [];
    outcomes.forEach(o => {
        if (o.ok) {
            rows.push([
                o.agent,
                String(o.summary.handoverLatencySteps),
                formatFixed(o.summary.totalPowerUnits),
                formatFixed(o.summary.kleinrockPower),
                formatFixed(o.summary.proactiveDataMB)
            ]);
        } else {
            failures.push(`${o.agent} failed: ${o.error.name}: ${o.error.message}`);
        }
    });

    const widths = SUMMARY_HEADERS.map((h, i) => Math.max(h.length, ...rows.map(r => r[i].length)));
    const line = (cells: string[]) => cells.map((c, i) => c.padEnd(widths[i])).join(' | ');

    return [
        line(SUMMARY_HEADERS),
        widths.map(w => '-'.repeat(w)).join('-+-'),
        ...rows.map(line),
        ...failures
    ].join('\n');
};

/**
 * One line per simulation event, prefixed with the agent and step.
 */
export const formatEventLog = (agent: string, events: readonly SimulationEvent[]): string[] =>
    events.map(e => `[${agent}] t=${e.time} ${e.type}: ${e.message}`);

export const describeAction = (action: AgentAction): string => {
    switch (action.type) {
        case ActionType.NONE:
            return '';
        case ActionType.ADAPT_QOS:
            return `${action.type}(${action.tier})`;
        case ActionType.BEGIN_MIGRATION:
            return `${action.type}(${action.target}, ${action.mode})`;
        case ActionType.COMPLETE_MIGRATION:
            return `${action.type}(${action.target})`;
    }
};

const describeEvent = (entry: LogEntry): string => {
    const event = entry.event;
    if (!event) return '';
    return 'device' in event ? `${event.type}(${event.device})` : `${event.type}(${event.location}, ${event.network})`;
};

const toRow = (entry: LogEntry): Record<string, CsvValue> => ({
    timeStep: entry.timeStep,
    location: entry.location,
    network: entry.network,
    bandwidthMBps: entry.bandwidthMBps,
    activeDevice: entry.activeDevice,
    sessionLocation: entry.sessionLocation,
    migrationStatus: entry.migrationStatus,
    qosTier: entry.qosTier,
    event: describeEvent(entry) || null,
    action: describeAction(entry.action) || null,
    activity: entry.activity,
    power: entry.power,
    cumulativePowerUnits: entry.cumulativePowerUnits,
    transferredMB: entry.transferredMB,
    proactiveDataMB: entry.proactiveDataMB,
    migrationSteps: entry.migrationSteps,
    sessionUsable: entry.sessionUsable,
    qoe: entry.qoe
});

export const logToCSV = (log: readonly LogEntry[]): string => generateCSV(log.map(toRow), LOG_CSV_HEADERS);

/**
 * File-name-safe slug for an agent's CSV.
 */
export const logFileName = (agent: string): string =>
    `${agent.toLowerCase().replace(/[^a-z0-9]+/g, '_')}_log.csv`;

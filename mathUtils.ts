import { Device } from './types';
import type { KleinrockFormula } from './types';
import { ArithmeticFault } from './errors';

/**
 * Divides, refusing to produce Infinity or NaN from a zero divisor.
 * @param what Names the quantity in the fault message
 */
export const safeDivide = (numerator: number, denominator: number, what: string): number => {
    if (denominator === 0 || !Number.isFinite(denominator)) {
        throw new ArithmeticFault(`Cannot compute ${what}: divisor is ${denominator}`);
    }
    return numerator / denominator;
};

/**
 * MB a link moves in one step.
 * Example: 25 MB/s over a 0.125 s step = 3.125 MB.
 */
export const chunkSizeMB = (bandwidthMBps: number, secondsPerStep: number): number => {
    return bandwidthMBps * secondsPerStep;
};

/**
 * Number of steps needed to move `sizeMB` over a link.
 *
 * Formula: ceil(size / (bandwidth * secondsPerStep)), never below 1.
 * 100 MB over 5G (25 MB/s) = 32 steps, over Wi-Fi (50 MB/s) = 16 steps.
 */
export const transferDurationSteps = (sizeMB: number, bandwidthMBps: number, secondsPerStep: number): number => {
    const perStep = chunkSizeMB(bandwidthMBps, secondsPerStep);
    return Math.max(1, Math.ceil(safeDivide(sizeMB, perStep, 'transfer duration')));
};

/**
 * Inputs for Kleinrock's power, lifted from a finished run.
 */
export interface KleinrockInputs {
    sessionSizeMB: number;
    /** Steps with session data in flight over the whole run */
    migrationSteps: number;
    handoverLatencySteps: number;
    horizon: number;
}

/**
 * KLEINROCK'S POWER
 *
 * Throughput over delay. Higher is better.
 *
 * transferThroughput: γ = size / migrationSteps (MB per step in flight), P = γ / T
 * scenarioDuration:   P = γ * horizon / T, with a configured γ
 *
 * T is the handover latency in steps, floored at 1. γ is 0 when nothing moved.
 */
export const kleinrockPower = (formula: KleinrockFormula, inputs: KleinrockInputs): number => {
    const latency = Math.max(inputs.handoverLatencySteps, 1);
    switch (formula.kind) {
        case 'transferThroughput': {
            const gamma = inputs.migrationSteps > 0 ? inputs.sessionSizeMB / inputs.migrationSteps : 0;
            return gamma / latency;
        }
        case 'scenarioDuration':
            return (formula.gamma * inputs.horizon) / latency;
    }
};

/**
 * Picks the first device in the roster that is not `current`.
 */
export const otherDevice = (devices: readonly Device[], current: Device): Device | null => {
    return devices.find(d => d !== current) ?? null;
};

/**
 * Formats a number with fixed decimals, passing non-finite values through as text.
 */
export const formatFixed = (value: number, decimals: number = 2): string => {
    return Number.isFinite(value) ? value.toFixed(decimals) : String(value);
};

export type CsvValue = string | number | boolean | null;

/**
 * Generates CSV content from an array of flat rows.
 * Numbers are written with 4 decimals, everything else quoted.
 */
export const generateCSV = (data: Record<string, CsvValue>[], headers: string[]): string => {
    if (data.length === 0) return '';
    const headerRow = headers.join(',') + '\n';
    const rows = data.map(obj => {
        return headers.map(header => {
            const val = obj[header];
            if (typeof val === 'number') return Number.isInteger(val) ? String(val) : val.toFixed(4);
            if (val === null || val === undefined) return '';
            return `"${String(val).replace(/"/g, '""')}"`;
        }).join(',');
    }).join('\n');
    return headerRow + rows;
};

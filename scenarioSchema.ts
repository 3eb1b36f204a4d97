import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { Device, Location, NetworkType, ScenarioEventType } from './types';
import type { ConfigOverrides } from './config';
import { ConfigurationError } from './errors';

const perNetwork = z
    .object({
        [NetworkType.WIFI]: z.number().nonnegative().optional(),
        [NetworkType.FIVE_G]: z.number().nonnegative().optional()
    })
    .strict();

const scenarioEventSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal(ScenarioEventType.CONTEXT_CHANGE),
        location: z.nativeEnum(Location),
        network: z.nativeEnum(NetworkType)
    }),
    z.object({
        type: z.literal(ScenarioEventType.DEVICE_SWITCH_INTENT),
        device: z.nativeEnum(Device)
    })
]);

const kleinrockSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('transferThroughput') }),
    z.object({ kind: z.literal('scenarioDuration'), gamma: z.number().nonnegative() })
]);

export const scenarioSchema = z
    .object({
        horizon: z.number().int('Horizon must be a whole number of steps').min(1).optional(),
        sessionSizeMB: z.number().positive('Session size must be greater than zero').optional(),
        secondsPerStep: z.number().positive().optional(),
        bandwidthMBps: perNetwork.optional(),
        initialLocation: z.nativeEnum(Location).optional(),
        initialNetwork: z.nativeEnum(NetworkType).optional(),
        initialDevice: z.nativeEnum(Device).optional(),
        devices: z.array(z.nativeEnum(Device)).min(2).optional(),
        events: z
            .array(z.object({ step: z.number().int().nonnegative(), event: scenarioEventSchema }))
            .optional(),
        power: z
            .object({
                idle: z.number().nonnegative().optional(),
                activeUse: z.number().nonnegative().optional(),
                cpuBurst: z.number().nonnegative().optional(),
                transmitPerMB: perNetwork.optional()
            })
            .strict()
            .optional(),
        kleinrock: kleinrockSchema.optional(),
        qoeExcellent: z.number().optional(),
        qoePoor: z.number().optional()
    })
    .strict();

/**
 * Validates parsed JSON into configuration overrides.
 * @throws ConfigurationError listing every schema issue
 */
export const parseScenario = (input: unknown): ConfigOverrides => {
    const result = scenarioSchema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new ConfigurationError(`Invalid scenario: ${issues.join('; ')}`);
    }
    return result.data;
};

export const loadScenarioFile = async (filePath: string): Promise<ConfigOverrides> => {
    const raw = await readFile(filePath, 'utf8');
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ConfigurationError(`Scenario file ${filePath} is not valid JSON: ${reason}`);
    }
    return parseScenario(json);
};

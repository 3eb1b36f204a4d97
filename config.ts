import { Device, Location, NetworkType, ScenarioEventType } from './types';
import type { KleinrockFormula, PowerProfile, ScheduledEvent, SimulationConfig } from './types';
import { ConfigurationError } from './errors';

/**
 * Reference scenario: the user leaves the office at step 30 (Wi-Fi -> 5G)
 * and picks up the phone at step 60.
 */
export const REFERENCE_EVENTS: ScheduledEvent[] = [
    {
        step: 30,
        event: { type: ScenarioEventType.CONTEXT_CHANGE, location: Location.WALKING, network: NetworkType.FIVE_G }
    },
    {
        step: 60,
        event: { type: ScenarioEventType.DEVICE_SWITCH_INTENT, device: Device.PHONE }
    }
];

export const DEFAULT_POWER_PROFILE: PowerProfile = {
    idle: 0.05,
    activeUse: 0.10,
    cpuBurst: 0.20,
    transmitPerMB: {
        [NetworkType.WIFI]: 0.16,
        [NetworkType.FIVE_G]: 0.20
    }
};

export const DEFAULT_KLEINROCK: KleinrockFormula = { kind: 'transferThroughput' };

/**
 * Overrides accepted by createConfig. Nested records merge key by key.
 */
export interface ConfigOverrides {
    horizon?: number;
    sessionSizeMB?: number;
    secondsPerStep?: number;
    bandwidthMBps?: Partial<Record<NetworkType, number>>;
    initialLocation?: Location;
    initialNetwork?: NetworkType;
    initialDevice?: Device;
    devices?: Device[];
    events?: ScheduledEvent[];
    power?: Partial<Omit<PowerProfile, 'transmitPerMB'>> & {
        transmitPerMB?: Partial<Record<NetworkType, number>>;
    };
    kleinrock?: KleinrockFormula;
    qoeExcellent?: number;
    qoePoor?: number;
}

const deepFreeze = <T>(value: T): T => {
    if (value && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.values(value).forEach(deepFreeze);
        Object.freeze(value);
    }
    return value;
};

const cloneEvents = (events: ScheduledEvent[]): ScheduledEvent[] =>
    events.map(e => ({ step: e.step, event: { ...e.event } }));

const requireNumber = (value: number, label: string, opts: { min?: number; integer?: boolean; exclusiveMin?: boolean } = {}) => {
    if (!Number.isFinite(value)) {
        throw new ConfigurationError(`${label} must be a finite number (got ${value})`);
    }
    if (opts.integer && !Number.isInteger(value)) {
        throw new ConfigurationError(`${label} must be an integer (got ${value})`);
    }
    if (opts.min !== undefined) {
        const tooSmall = opts.exclusiveMin ? value <= opts.min : value < opts.min;
        if (tooSmall) {
            throw new ConfigurationError(`${label} must be ${opts.exclusiveMin ? '>' : '>='} ${opts.min} (got ${value})`);
        }
    }
};

/**
 * Checks a fully merged configuration.
 * Bandwidth may be zero here: a transfer over a dead link faults when it starts.
 */
export const validateConfig = (config: SimulationConfig): void => {
    requireNumber(config.horizon, 'horizon', { min: 1, integer: true });
    requireNumber(config.sessionSizeMB, 'sessionSizeMB', { min: 0, exclusiveMin: true });
    requireNumber(config.secondsPerStep, 'secondsPerStep', { min: 0, exclusiveMin: true });

    Object.values(NetworkType).forEach(network => {
        requireNumber(config.bandwidthMBps[network], `bandwidthMBps[${network}]`, { min: 0 });
        requireNumber(config.power.transmitPerMB[network], `power.transmitPerMB[${network}]`, { min: 0 });
    });
    requireNumber(config.power.idle, 'power.idle', { min: 0 });
    requireNumber(config.power.activeUse, 'power.activeUse', { min: 0 });
    requireNumber(config.power.cpuBurst, 'power.cpuBurst', { min: 0 });

    if (config.kleinrock.kind === 'scenarioDuration') {
        requireNumber(config.kleinrock.gamma, 'kleinrock.gamma', { min: 0 });
    }

    if (new Set(config.devices).size < 2) {
        throw new ConfigurationError('At least two distinct devices are required');
    }
    if (!config.devices.includes(config.initialDevice)) {
        throw new ConfigurationError(`Initial device ${config.initialDevice} is not in the device roster`);
    }

    const seen = new Set<number>();
    config.events.forEach(({ step, event }) => {
        requireNumber(step, 'event step', { min: 0, integer: true });
        if (step >= config.horizon) {
            throw new ConfigurationError(`Event at step ${step} is outside the ${config.horizon}-step horizon`);
        }
        if (seen.has(step)) {
            throw new ConfigurationError(`More than one event scheduled at step ${step}`);
        }
        seen.add(step);
        if (event.type === ScenarioEventType.DEVICE_SWITCH_INTENT && !config.devices.includes(event.device)) {
            throw new ConfigurationError(`Switch intent at step ${step} targets unknown device ${event.device}`);
        }
    });
};

/**
 * Builds a validated, deeply frozen configuration.
 * Every run, script and aggregator reads from one of these and never writes to it.
 */
export const createConfig = (overrides: ConfigOverrides = {}): SimulationConfig => {
    const config: SimulationConfig = {
        horizon: overrides.horizon ?? 100,
        sessionSizeMB: overrides.sessionSizeMB ?? 100.0,
        secondsPerStep: overrides.secondsPerStep ?? 0.125,
        bandwidthMBps: {
            [NetworkType.WIFI]: 50.0,
            [NetworkType.FIVE_G]: 25.0,
            ...overrides.bandwidthMBps
        },
        initialLocation: overrides.initialLocation ?? Location.AT_OFFICE,
        initialNetwork: overrides.initialNetwork ?? NetworkType.WIFI,
        initialDevice: overrides.initialDevice ?? Device.LAPTOP,
        devices: [...(overrides.devices ?? [Device.LAPTOP, Device.PHONE])],
        events: cloneEvents(overrides.events ?? REFERENCE_EVENTS),
        power: {
            ...DEFAULT_POWER_PROFILE,
            ...overrides.power,
            transmitPerMB: {
                ...DEFAULT_POWER_PROFILE.transmitPerMB,
                ...overrides.power?.transmitPerMB
            }
        },
        kleinrock: { ...(overrides.kleinrock ?? DEFAULT_KLEINROCK) },
        qoeExcellent: overrides.qoeExcellent ?? 5,
        qoePoor: overrides.qoePoor ?? 1.5
    };

    validateConfig(config);
    return deepFreeze(config);
};

export const DEFAULT_CONFIG: SimulationConfig = createConfig();

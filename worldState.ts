import { MigrationStatus, QosTier, ScenarioEventType } from './types';
import type { ScenarioEvent, SimulationConfig, WorldState } from './types';

/**
 * Fresh world for the start of a run. Nothing is shared with any other run.
 */
export const createWorldState = (config: SimulationConfig): WorldState => ({
    timeStep: 0,
    location: config.initialLocation,
    network: config.initialNetwork,
    bandwidthMBps: config.bandwidthMBps[config.initialNetwork],
    activeDevice: config.initialDevice,
    sessionLocation: config.initialDevice,
    migrationStatus: MigrationStatus.IDLE,
    qosTier: QosTier.HIGH,
    pendingSwitch: null,
    transfer: null,
    sessionSizeMB: config.sessionSizeMB,
    cumulativePowerUnits: 0,
    proactiveDataMB: 0,
    migrationSteps: 0
});

/**
 * Applies a scripted event in place.
 * A context change swaps location, network and bandwidth together.
 * A switch intent leaves the user waiting on the requested device.
 */
export const applyEvent = (state: WorldState, event: ScenarioEvent, config: SimulationConfig): void => {
    switch (event.type) {
        case ScenarioEventType.CONTEXT_CHANGE:
            state.location = event.location;
            state.network = event.network;
            state.bandwidthMBps = config.bandwidthMBps[event.network];
            break;
        case ScenarioEventType.DEVICE_SWITCH_INTENT:
            if (state.activeDevice !== event.device) {
                state.pendingSwitch = event.device;
            }
            break;
    }
};

/**
 * Moves the clock forward, stopping at the last step of the horizon.
 */
export const advanceTime = (state: WorldState, horizon: number): void => {
    if (state.timeStep < horizon - 1) {
        state.timeStep += 1;
    }
};

/**
 * Deep copy suitable for handing to an agent or a UI.
 */
export const snapshotState = (state: WorldState): WorldState => ({
    ...state,
    transfer: state.transfer ? { ...state.transfer } : null
});

import {
    ActionType,
    AgentKind,
    Device,
    Location,
    MigrationMode,
    MigrationStatus,
    NetworkType,
    QosTier,
    ScenarioEventType
} from './types';
import type { AgentAction, ScenarioEvent, SimulationConfig, WorldState } from './types';
import { otherDevice } from './mathUtils';

const NO_ACTION: AgentAction = { type: ActionType.NONE };

/**
 * A session-migration policy. The runner is agnostic to which one it drives.
 *
 * `decide` sees a snapshot of the world before this step's event lands,
 * plus the event itself (or null). It must not throw for event kinds it ignores.
 */
export interface AgentPolicy {
    readonly name: string;
    decide(state: Readonly<WorldState>, event: ScenarioEvent | null): AgentAction;
}

/**
 * What the intent predictor gets to look at.
 */
export interface PredictionContext {
    timeStep: number;
    location: Location;
    network: NetworkType;
    activeDevice: Device;
}

/**
 * Predicts whether the user is about to change device.
 * A trained model can replace the scripted one without touching agents or runner.
 */
export interface IntentPredictor {
    predict(context: PredictionContext): boolean;
}

/**
 * Stand-in for the sequence model: fires for one fixed context.
 */
export class ScriptedIntentPredictor implements IntentPredictor {
    constructor(
        private readonly trigger: { location: Location; network: NetworkType; device: Device } = {
            location: Location.WALKING,
            network: NetworkType.FIVE_G,
            device: Device.LAPTOP
        }
    ) {}

    public predict(context: PredictionContext): boolean {
        return context.location === this.trigger.location
            && context.network === this.trigger.network
            && context.activeDevice === this.trigger.device;
    }
}

const beginMigration = (target: Device, mode: MigrationMode): AgentAction => ({
    type: ActionType.BEGIN_MIGRATION,
    target,
    mode
});

/**
 * Baseline 1: passive until the user actually switches, then a blocking full transfer.
 */
export class ReactiveAgent implements AgentPolicy {
    public readonly name: string = AgentKind.REACTIVE;

    public decide(state: Readonly<WorldState>, event: ScenarioEvent | null): AgentAction {
        if (event?.type === ScenarioEventType.DEVICE_SWITCH_INTENT && event.device !== state.activeDevice) {
            return beginMigration(event.device, MigrationMode.FOREGROUND);
        }
        return NO_ACTION;
    }
}

/**
 * Baseline 2: adapts QoS to the network it is on, but cannot see the switch coming.
 * Switch handling is delegated to the reactive policy.
 */
export class MyopicAgent implements AgentPolicy {
    public readonly name: string = AgentKind.MYOPIC;
    private readonly onSwitch = new ReactiveAgent();

    public decide(state: Readonly<WorldState>, event: ScenarioEvent | null): AgentAction {
        if (event?.type === ScenarioEventType.CONTEXT_CHANGE) {
            if (event.network === NetworkType.FIVE_G && state.qosTier === QosTier.HIGH) {
                return { type: ActionType.ADAPT_QOS, tier: QosTier.STANDARD };
            }
            if (event.network === NetworkType.WIFI && state.qosTier === QosTier.STANDARD) {
                return { type: ActionType.ADAPT_QOS, tier: QosTier.HIGH };
            }
            return NO_ACTION;
        }
        return this.onSwitch.decide(state, event);
    }
}

/**
 * Proactive agent.
 *
 * On a context change it consults the predictor ("LSTM" stage) and, when a
 * switch is predicted, stages the session on the other device in the
 * background ("DRL" stage). When the switch arrives a staged session only
 * needs the focus moved.
 */
export class PassAgent implements AgentPolicy {
    public readonly name: string = AgentKind.PASS;

    constructor(
        private readonly devices: readonly Device[],
        private readonly predictor: IntentPredictor = new ScriptedIntentPredictor()
    ) {}

    public decide(state: Readonly<WorldState>, event: ScenarioEvent | null): AgentAction {
        if (!event) return NO_ACTION;

        switch (event.type) {
            case ScenarioEventType.CONTEXT_CHANGE: {
                const switchPredicted = this.predictor.predict({
                    timeStep: state.timeStep,
                    location: event.location,
                    network: event.network,
                    activeDevice: state.activeDevice
                });
                if (!switchPredicted || state.migrationStatus !== MigrationStatus.IDLE) return NO_ACTION;

                const target = otherDevice(this.devices, state.activeDevice);
                return target ? beginMigration(target, MigrationMode.BACKGROUND) : NO_ACTION;
            }
            case ScenarioEventType.DEVICE_SWITCH_INTENT: {
                if (event.device === state.activeDevice) return NO_ACTION;

                const staged = state.migrationStatus === MigrationStatus.COMPLETE
                    && state.sessionLocation === event.device;
                if (staged) {
                    return { type: ActionType.COMPLETE_MIGRATION, target: event.device };
                }
                // Still in flight (or never predicted): finish it in the foreground.
                return beginMigration(event.device, MigrationMode.FOREGROUND);
            }
            default:
                return NO_ACTION;
        }
    }
}

/**
 * Builds one of the built-in policies for a configuration.
 */
export const createAgent = (kind: AgentKind, config: SimulationConfig, predictor?: IntentPredictor): AgentPolicy => {
    switch (kind) {
        case AgentKind.REACTIVE:
            return new ReactiveAgent();
        case AgentKind.MYOPIC:
            return new MyopicAgent();
        case AgentKind.PASS:
            return new PassAgent(config.devices, predictor);
    }
};

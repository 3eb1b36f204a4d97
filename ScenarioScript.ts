import type { ScenarioEvent, ScheduledEvent, SimulationConfig } from './types';
import { ConfigurationError } from './errors';

/**
 * Immutable, time-indexed list of exogenous events.
 * Every agent's run reads the same script; nothing a run does can alter it.
 */
export class ScenarioScript {
    private readonly byStep: ReadonlyMap<number, ScenarioEvent>;
    public readonly horizon: number;

    constructor(events: readonly ScheduledEvent[], horizon: number) {
        const byStep = new Map<number, ScenarioEvent>();
        events.forEach(({ step, event }) => {
            if (!Number.isInteger(step) || step < 0 || step >= horizon) {
                throw new ConfigurationError(`Event at step ${step} is outside the ${horizon}-step horizon`);
            }
            if (byStep.has(step)) {
                throw new ConfigurationError(`More than one event scheduled at step ${step}`);
            }
            byStep.set(step, Object.freeze({ ...event }));
        });
        this.byStep = byStep;
        this.horizon = horizon;
    }

    public static fromConfig(config: SimulationConfig): ScenarioScript {
        return new ScenarioScript(config.events, config.horizon);
    }

    /**
     * Returns the event scheduled for step `t`, or null when nothing fires.
     * Steps outside the horizon simply have no event.
     */
    public eventAt(t: number): ScenarioEvent | null {
        const event = this.byStep.get(t);
        return event ? { ...event } : null;
    }

    /**
     * All scheduled events in step order.
     */
    public entries(): ScheduledEvent[] {
        return [...this.byStep.entries()]
            .sort(([a], [b]) => a - b)
            .map(([step, event]) => ({ step, event: { ...event } }));
    }
}

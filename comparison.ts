import { AgentKind } from './types';
import type { RunOutcome, SimulationConfig } from './types';
import { createAgent } from './agents';
import type { AgentPolicy } from './agents';
import { SimulationEngine } from './SimulationEngine';
import { ScenarioScript } from './ScenarioScript';
import { SimulationError } from './errors';
import { summarizeRun } from './metrics';

export const DEFAULT_AGENT_KINDS: readonly AgentKind[] = [AgentKind.REACTIVE, AgentKind.MYOPIC, AgentKind.PASS];

/**
 * Runs one agent on its own engine and summarizes the log.
 * Any fault is captured in the outcome instead of thrown, along with the steps logged so far.
 */
export const runAgent = (config: SimulationConfig, agent: AgentPolicy, script: ScenarioScript): RunOutcome => {
    let engine: SimulationEngine | null = null;
    try {
        engine = new SimulationEngine(config, agent, script);
        const log = engine.run();
        return {
            agent: agent.name,
            ok: true,
            log,
            summary: summarizeRun(log, config),
            events: engine.getEventHistory()
        };
    } catch (err) {
        return {
            agent: agent.name,
            ok: false,
            error: err instanceof Error ? err : new SimulationError(String(err)),
            log: engine ? engine.getLog() : []
        };
    }
};

/**
 * Runs every agent against the same script, in order.
 * A failed run is reported in place; the others are unaffected.
 */
export const runComparison = (
    config: SimulationConfig,
    agents: readonly AgentPolicy[] = DEFAULT_AGENT_KINDS.map(kind => createAgent(kind, config))
): RunOutcome[] => {
    const script = ScenarioScript.fromConfig(config);
    return agents.map(agent => runAgent(config, agent, script));
};

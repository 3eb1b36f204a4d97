import { describe, it, expect } from 'vitest';
import { DEFAULT_AGENT_KINDS, runComparison } from '../comparison';
import { createAgent } from '../agents';
import type { AgentPolicy } from '../agents';
import { createConfig, DEFAULT_CONFIG } from '../config';
import { ArithmeticFault } from '../errors';
import { ActionType, AgentKind, Device, Location, NetworkType, ScenarioEventType } from '../types';
import type { ScheduledEvent } from '../types';

describe('runComparison', () => {

  it('should run the three built-in agents in order', () => {
    const outcomes = runComparison(DEFAULT_CONFIG);
    expect(outcomes.map(o => o.agent)).toEqual(['Reactive', 'Myopic', 'PASS']);
    expect(outcomes.every(o => o.ok)).toBe(true);
    expect(DEFAULT_AGENT_KINDS).toEqual([AgentKind.REACTIVE, AgentKind.MYOPIC, AgentKind.PASS]);
  });

  it('should isolate a faulting run', () => {
    const config = createConfig({ bandwidthMBps: { [NetworkType.FIVE_G]: 0 } });
    const [reactive, myopic, pass] = runComparison(config);

    expect(reactive.ok).toBe(false);
    if (!reactive.ok) {
      expect(reactive.error).toBeInstanceOf(ArithmeticFault);
      // Steps before the failed migration are kept
      expect(reactive.log).toHaveLength(60);
      expect(reactive.log[59].timeStep).toBe(59);
    }
    expect(myopic.ok).toBe(false);

    // Staging binds to Wi-Fi before the network drops
    expect(pass.ok).toBe(true);
    if (pass.ok) {
      expect(pass.summary.handoverLatencySteps).toBe(1);
      expect(pass.log).toHaveLength(100);
    }
  });

  it('should wrap non-Error throws', () => {
    const broken: AgentPolicy = {
      name: 'Broken',
      decide: () => {
        throw 'no decision';
      }
    };
    const [outcome, pass] = runComparison(DEFAULT_CONFIG, [broken, createAgent(AgentKind.PASS, DEFAULT_CONFIG)]);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error.message).toBe('no decision');
    expect(pass.ok).toBe(true);
  });

  it('should accept custom agents', () => {
    const idle: AgentPolicy = { name: 'Idle', decide: () => ({ type: ActionType.NONE }) };
    const [outcome] = runComparison(DEFAULT_CONFIG, [idle]);
    // Never migrates: the switch costs the rest of the run and nothing is transferred
    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.summary.handoverLatencySteps).toBe(40);
      expect(outcome.summary.kleinrockPower).toBe(0);
    }
  });

  const quietScenarios: [string, ScheduledEvent[]][] = [
    ['only a context change', [
      { step: 30, event: { type: ScenarioEventType.CONTEXT_CHANGE, location: Location.AT_OFFICE, network: NetworkType.WIFI } }
    ]],
    ['a switch to the device in use', [
      { step: 60, event: { type: ScenarioEventType.DEVICE_SWITCH_INTENT, device: Device.LAPTOP } }
    ]]
  ];

  it.each(quietScenarios)('should complete every run for a scenario with %s', (_label, events) => {
    const outcomes = runComparison(createConfig({ events }));
    expect(outcomes.every(o => o.ok)).toBe(true);
    outcomes.forEach(o => expect(o.log).toHaveLength(100));
  });
});

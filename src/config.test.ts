import { describe, it, expect } from 'vitest';
import { createConfig, DEFAULT_CONFIG, REFERENCE_EVENTS } from '../config';
import type { ConfigOverrides } from '../config';
import { ConfigurationError } from '../errors';
import { Device, Location, NetworkType, ScenarioEventType } from '../types';
import type { ScheduledEvent } from '../types';

describe('Configuration', () => {

  it('should default to the reference scenario', () => {
    expect(DEFAULT_CONFIG.horizon).toBe(100);
    expect(DEFAULT_CONFIG.sessionSizeMB).toBe(100);
    expect(DEFAULT_CONFIG.bandwidthMBps[NetworkType.WIFI]).toBe(50);
    expect(DEFAULT_CONFIG.bandwidthMBps[NetworkType.FIVE_G]).toBe(25);
    expect(DEFAULT_CONFIG.initialLocation).toBe(Location.AT_OFFICE);
    expect(DEFAULT_CONFIG.initialDevice).toBe(Device.LAPTOP);
    expect(DEFAULT_CONFIG.events).toEqual(REFERENCE_EVENTS);
    expect(DEFAULT_CONFIG.kleinrock).toEqual({ kind: 'transferThroughput' });
  });

  it('should merge nested overrides key by key', () => {
    const config = createConfig({
      bandwidthMBps: { [NetworkType.FIVE_G]: 10 },
      power: { transmitPerMB: { [NetworkType.WIFI]: 0.3 } }
    });
    expect(config.bandwidthMBps[NetworkType.WIFI]).toBe(50);
    expect(config.bandwidthMBps[NetworkType.FIVE_G]).toBe(10);
    expect(config.power.transmitPerMB[NetworkType.WIFI]).toBe(0.3);
    expect(config.power.transmitPerMB[NetworkType.FIVE_G]).toBe(0.2);
    expect(config.power.idle).toBe(0.05);
  });

  it('should freeze the result deeply', () => {
    const config = createConfig();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.bandwidthMBps)).toBe(true);
    expect(Object.isFrozen(config.events[0].event)).toBe(true);
  });

  it('should not share event objects with the caller', () => {
    const events: ScheduledEvent[] = [{ step: 5, event: { type: ScenarioEventType.DEVICE_SWITCH_INTENT, device: Device.PHONE } }];
    const config = createConfig({ events });
    events[0].step = 6;
    expect(config.events[0].step).toBe(5);
  });

  it('should accept zero bandwidth', () => {
    expect(createConfig({ bandwidthMBps: { [NetworkType.FIVE_G]: 0 } }).bandwidthMBps[NetworkType.FIVE_G]).toBe(0);
  });

  describe('validation', () => {
    const invalid: [string, ConfigOverrides][] = [
      ['a zero horizon', { horizon: 0 }],
      ['a fractional horizon', { horizon: 10.5 }],
      ['an empty session', { sessionSizeMB: 0 }],
      ['a zero step duration', { secondsPerStep: 0 }],
      ['negative bandwidth', { bandwidthMBps: { [NetworkType.WIFI]: -1 } }],
      ['a negative power rate', { power: { idle: -0.1 } }],
      ['a negative gamma', { kleinrock: { kind: 'scenarioDuration', gamma: -1 } }],
      ['a single device', { devices: [Device.LAPTOP] }],
      ['a roster with one distinct device', { devices: [Device.PHONE, Device.PHONE], initialDevice: Device.PHONE }]
    ];

    it.each(invalid)('should reject %s', (_label, overrides) => {
      expect(() => createConfig(overrides)).toThrow(ConfigurationError);
    });

    it('should reject an event beyond the horizon', () => {
      expect(() => createConfig({ horizon: 50 })).toThrow('Event at step 60 is outside the 50-step horizon');
    });

    it('should reject two events on the same step', () => {
      expect(() => createConfig({
        events: [
          { step: 3, event: { type: ScenarioEventType.DEVICE_SWITCH_INTENT, device: Device.PHONE } },
          { step: 3, event: { type: ScenarioEventType.CONTEXT_CHANGE, location: Location.WALKING, network: NetworkType.FIVE_G } }
        ]
      })).toThrow('More than one event scheduled at step 3');
    });
  });
});

import { describe, it, expect } from 'vitest';
import {
  chunkSizeMB,
  formatFixed,
  generateCSV,
  kleinrockPower,
  otherDevice,
  safeDivide,
  transferDurationSteps
} from '../mathUtils';
import { Device } from '../types';
import { ArithmeticFault } from '../errors';

describe('Math Utils', () => {

  describe('safeDivide', () => {
    it('should divide normally', () => {
      expect(safeDivide(10, 4, 'ratio')).toBe(2.5);
    });

    it('should raise an ArithmeticFault on a zero divisor', () => {
      expect(() => safeDivide(1, 0, 'ratio')).toThrow(ArithmeticFault);
      expect(() => safeDivide(1, 0, 'ratio')).toThrow('Cannot compute ratio: divisor is 0');
    });

    it('should refuse a non-finite divisor', () => {
      expect(() => safeDivide(1, Infinity, 'ratio')).toThrow(ArithmeticFault);
    });
  });

  describe('transferDurationSteps', () => {
    it('should take 32 steps for 100 MB over 5G', () => {
      // 25 MB/s * 0.125 s = 3.125 MB per step
      expect(chunkSizeMB(25, 0.125)).toBe(3.125);
      expect(transferDurationSteps(100, 25, 0.125)).toBe(32);
    });

    it('should take 16 steps for 100 MB over Wi-Fi', () => {
      expect(transferDurationSteps(100, 50, 0.125)).toBe(16);
    });

    it('should round a partial chunk up and never go below one step', () => {
      expect(transferDurationSteps(10, 3, 1)).toBe(4);
      expect(transferDurationSteps(0.5, 50, 1)).toBe(1);
    });

    it('should fault on a dead link', () => {
      expect(() => transferDurationSteps(100, 0, 0.125)).toThrow(ArithmeticFault);
    });
  });

  describe("kleinrockPower (Kleinrock's power)", () => {
    it('should divide transfer throughput by latency', () => {
      // gamma = 100 / 32, power = gamma / 32
      const p = kleinrockPower({ kind: 'transferThroughput' }, {
        sessionSizeMB: 100, migrationSteps: 32, handoverLatencySteps: 32, horizon: 100
      });
      expect(p).toBeCloseTo(0.0977, 4);
    });

    it('should reward a one-step handover', () => {
      const p = kleinrockPower({ kind: 'transferThroughput' }, {
        sessionSizeMB: 100, migrationSteps: 16, handoverLatencySteps: 1, horizon: 100
      });
      expect(p).toBe(6.25);
    });

    it('should scale a configured gamma by the horizon in scenarioDuration mode', () => {
      const p = kleinrockPower({ kind: 'scenarioDuration', gamma: 2 }, {
        sessionSizeMB: 100, migrationSteps: 0, handoverLatencySteps: 4, horizon: 100
      });
      expect(p).toBe(50);
    });

    it('should count a zero latency as one step', () => {
      expect(kleinrockPower({ kind: 'scenarioDuration', gamma: 1 }, {
        sessionSizeMB: 100, migrationSteps: 10, handoverLatencySteps: 0, horizon: 100
      })).toBe(100);
      expect(kleinrockPower({ kind: 'transferThroughput' }, {
        sessionSizeMB: 100, migrationSteps: 16, handoverLatencySteps: 0, horizon: 100
      })).toBe(6.25);
    });

    it('should score zero when nothing was ever transferred', () => {
      expect(kleinrockPower({ kind: 'transferThroughput' }, {
        sessionSizeMB: 100, migrationSteps: 0, handoverLatencySteps: 5, horizon: 100
      })).toBe(0);
      expect(kleinrockPower({ kind: 'transferThroughput' }, {
        sessionSizeMB: 100, migrationSteps: 0, handoverLatencySteps: 0, horizon: 100
      })).toBe(0);
    });
  });

  describe('otherDevice', () => {
    it('should pick the first device that is not the current one', () => {
      expect(otherDevice([Device.LAPTOP, Device.PHONE], Device.LAPTOP)).toBe(Device.PHONE);
      expect(otherDevice([Device.LAPTOP, Device.PHONE], Device.PHONE)).toBe(Device.LAPTOP);
    });

    it('should return null when there is no alternative', () => {
      expect(otherDevice([Device.LAPTOP], Device.LAPTOP)).toBeNull();
    });
  });

  describe('formatting', () => {
    it('should format finite numbers with fixed decimals', () => {
      expect(formatFixed(26.900000000000002)).toBe('26.90');
      expect(formatFixed(1, 0)).toBe('1');
    });

    it('should pass non-finite numbers through as text', () => {
      expect(formatFixed(Infinity)).toBe('Infinity');
    });

    it('should generate CSV with quoted text and empty nulls', () => {
      const csv = generateCSV([{ a: 1, b: 'say "hi"', c: null, d: 0.5 }], ['a', 'b', 'c', 'd']);
      expect(csv).toBe('a,b,c,d\n1,"say ""hi""",,0.5000');
    });

    it('should return an empty string for no rows', () => {
      expect(generateCSV([], ['a'])).toBe('');
    });
  });
});

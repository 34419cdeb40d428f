import { describe, expect, it } from '@jest/globals';
import { effectiveDutyCycle, isPowerPolicy, shouldInfer } from '../powerPolicy';

describe('Power policies', () => {
  it('should always run inference under Aggressive', () => {
    expect(shouldInfer('Aggressive', { currentWh: 0.1, capacityWh: 10, harvestW: 0 })).toBe(true);
  });

  it('should run Conservative only above half charge', () => {
    expect(shouldInfer('Conservative', { currentWh: 6, capacityWh: 10, harvestW: 0 })).toBe(true);
    expect(shouldInfer('Conservative', { currentWh: 5, capacityWh: 10, harvestW: 100 })).toBe(false);
  });

  it('should run SmartAdaptive freely in strong sun, otherwise above 30% charge', () => {
    expect(shouldInfer('SmartAdaptive', { currentWh: 1, capacityWh: 10, harvestW: 6 })).toBe(true);
    expect(shouldInfer('SmartAdaptive', { currentWh: 3.1, capacityWh: 10, harvestW: 4 })).toBe(true);
    expect(shouldInfer('SmartAdaptive', { currentWh: 3, capacityWh: 10, harvestW: 4 })).toBe(false);
    expect(shouldInfer('SmartAdaptive', { currentWh: 3, capacityWh: 10, harvestW: 5 })).toBe(false);
  });

  it('should zero the duty cycle when the policy declines', () => {
    const low = { currentWh: 1, capacityWh: 10, harvestW: 0 };
    expect(effectiveDutyCycle('Conservative', 0.8, low)).toBe(0);
    expect(effectiveDutyCycle('Aggressive', 0.8, low)).toBe(0.8);
  });

  it('should treat a zero-capacity battery as empty', () => {
    expect(shouldInfer('Conservative', { currentWh: 0, capacityWh: 0, harvestW: 0 })).toBe(false);
  });

  it('should recognise policy names', () => {
    expect(isPowerPolicy('SmartAdaptive')).toBe(true);
    expect(isPowerPolicy('smartadaptive')).toBe(false);
  });
});

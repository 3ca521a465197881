import { describe, expect, it } from 'vitest';
import { isOrchestratorError } from '@venuepilot/shared';
import { ArmGate } from './armGate';

const T = 1_700_000_000_000;
const minutes = (m: number, s = 0) => m * 60_000 + s * 1000;

function expectNotArmed(fn: () => void): void {
  let caught: unknown;
  try {
    fn();
  } catch (err) {
    caught = err;
  }
  expect(isOrchestratorError(caught, 'NotArmed')).toBe(true);
}

describe('ArmGate', () => {
  it('accepts a destructive command at T+14:59 and rejects one at T+15:01', () => {
    const early = new ArmGate({ requireArm: true, ttlMinutes: 15, mode: 'single_shot' });
    expect(early.requestArm(42, T)).toBe(T + minutes(15));
    expect(() => early.check('go_long', T + minutes(14, 59))).not.toThrow();

    const late = new ArmGate({ requireArm: true, ttlMinutes: 15, mode: 'single_shot' });
    late.requestArm(42, T);
    expectNotArmed(() => late.check('go_long', T + minutes(15, 1)));
    expect(late.snapshot(T + minutes(15, 1))).toEqual({ mode: 'disarmed' });
  });

  it('expires exactly at the deadline', () => {
    const gate = new ArmGate({ requireArm: true, ttlMinutes: 15, mode: 'window' });
    gate.requestArm(42, T);
    expectNotArmed(() => gate.check('flat', T + minutes(15)));
  });

  it('rejects destructive commands when never armed', () => {
    const gate = new ArmGate({ requireArm: true, ttlMinutes: 15, mode: 'single_shot' });
    expectNotArmed(() => gate.check('flat', T));
  });

  it('consumes the arm on a destructive command in single_shot mode', () => {
    const gate = new ArmGate({ requireArm: true, ttlMinutes: 15, mode: 'single_shot' });
    gate.requestArm(42, T);
    gate.check('go_short', T + 1000);
    expect(gate.snapshot(T + 1000).mode).toBe('armed');
    gate.consume('go_short');
    expect(gate.snapshot(T + 2000).mode).toBe('disarmed');
    expectNotArmed(() => gate.check('flat', T + 3000));
  });

  it('keeps the arm for the whole window in window mode', () => {
    const gate = new ArmGate({ requireArm: true, ttlMinutes: 15, mode: 'window' });
    gate.requestArm(42, T);
    gate.check('go_long', T + 1000);
    gate.consume('go_long');
    gate.check('flat', T + minutes(10));
    gate.consume('flat');
    expect(gate.snapshot(T + minutes(10))).toEqual({ mode: 'armed', expiresAt: T + minutes(15), armedBy: 42 });
  });

  it('resets the expiry when anyone re-arms', () => {
    const gate = new ArmGate({ requireArm: true, ttlMinutes: 15, mode: 'single_shot' });
    gate.requestArm(1, T);
    gate.requestArm(2, T + minutes(10));
    expect(() => gate.check('go_long', T + minutes(20))).not.toThrow();
  });

  it('disarm drops a pending arm', () => {
    const gate = new ArmGate({ requireArm: true, ttlMinutes: 15, mode: 'single_shot' });
    gate.requestArm(1, T);
    gate.disarm();
    expectNotArmed(() => gate.check('go_long', T + 1000));
  });

  it('lets everything through when arming is not required', () => {
    const gate = new ArmGate({ requireArm: false, ttlMinutes: 15, mode: 'single_shot' });
    expect(gate.required).toBe(false);
    expect(() => gate.check('flat', T)).not.toThrow();
    expect(() => gate.check('go_long', T)).not.toThrow();
  });
});

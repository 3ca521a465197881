import { ArmState, CommandKind, isDestructive, OrchestratorError } from '@venuepilot/shared';

export type ArmMode = 'single_shot' | 'window';

export type ArmGateOptions = {
  requireArm: boolean;
  ttlMinutes: number;
  /** `single_shot` consumes the arm on each destructive command; `window` keeps it until expiry. */
  mode: ArmMode;
};

const DISARMED: ArmState = Object.freeze({ mode: 'disarmed' });

export class ArmGate {
  private state: ArmState = DISARMED;

  constructor(private readonly options: ArmGateOptions) {}

  get required(): boolean {
    return this.options.requireArm;
  }

  requestArm(user: number, now: number): number {
    const expiresAt = now + this.options.ttlMinutes * 60_000;
    this.state = Object.freeze({ mode: 'armed', expiresAt, armedBy: user });
    return expiresAt;
  }

  /** Throws NotArmed unless the gate is open; leaves the arm in place. */
  check(kind: CommandKind, now: number): void {
    if (!this.options.requireArm) {
      return;
    }
    const current = this.snapshot(now);
    if (current.mode !== 'armed') {
      throw new OrchestratorError('NotArmed', `/${kind} requires /arm first`, { detail: { command: kind } });
    }
  }

  /** Spends a single-shot arm once a destructive command has been admitted. */
  consume(kind: CommandKind): void {
    if (this.options.requireArm && isDestructive(kind) && this.options.mode === 'single_shot') {
      this.state = DISARMED;
    }
  }

  disarm(): void {
    this.state = DISARMED;
  }

  /** Current state; an arm whose expiry has passed is dropped here. */
  snapshot(now: number): ArmState {
    if (this.state.mode === 'armed' && now >= this.state.expiresAt) {
      this.state = DISARMED;
    }
    return this.state;
  }
}

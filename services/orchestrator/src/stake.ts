import { invalidArguments } from '@venuepilot/shared';

export function parseStakeAmount(raw: string): number {
  const trimmed = raw.trim();
  const amount = trimmed === '' ? Number.NaN : Number(trimmed);
  if (!Number.isFinite(amount) || amount <= 0) {
    throw invalidArguments(`stake must be a positive number, got "${raw}"`, { value: raw });
  }
  return amount;
}

/** Default entry amount used by entry steps that carry no explicit amount. */
export class StakeSetting {
  private amount: number;

  constructor(initial: number) {
    this.amount = StakeSetting.validate(initial);
  }

  get(): number {
    return this.amount;
  }

  set(amount: number): number {
    this.amount = StakeSetting.validate(amount);
    return this.amount;
  }

  private static validate(amount: number): number {
    if (!Number.isFinite(amount) || amount <= 0) {
      throw invalidArguments(`stake must be a positive number, got ${amount}`, { value: amount });
    }
    return amount;
  }
}

import {
  ArmState,
  isOrchestratorError,
  OpenTrade,
  VenueBalance,
  VenueCount,
  VenueName,
  VENUES
} from '@venuepilot/shared';
import type { DispatchResult, StepOutcome } from './dispatcher';
import type { LeaseSnapshot } from './venueLease';

export interface NotificationSink {
  send(text: string): Promise<void>;
}

/** Keeps every message in memory; used where no chat transport is configured and in tests. */
export class MemorySink implements NotificationSink {
  readonly messages: string[] = [];

  async send(text: string): Promise<void> {
    this.messages.push(text);
  }
}

function formatAmount(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

function formatClock(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(11, 19);
}

export function renderError(err: unknown): string {
  if (isOrchestratorError(err)) {
    return `${err.code}: ${err.message}`;
  }
  return `error: ${err instanceof Error ? err.message : String(err)}`;
}

function renderStep(outcome: StepOutcome): string {
  const head = `  ${outcome.venue} ${outcome.action}`;
  switch (outcome.status) {
    case 'ok': {
      const pair = typeof outcome.detail.pair === 'string' ? ` ${outcome.detail.pair}` : '';
      return `${head}${pair}: ok`;
    }
    case 'failed':
      return `${head}: failed (${outcome.error.code})`;
    case 'skipped':
      return `${head}: skipped (${outcome.reason})`;
  }
}

export function renderDispatchResult(result: DispatchResult): string {
  const lines = [`${result.command} ${result.status === 'completed' ? 'completed' : 'PartialExecution'}`];
  for (const venue of VENUES) {
    const conclusion = result.venues[venue];
    if (!conclusion) continue;
    const suffix = conclusion.error ? `: ${conclusion.error.message}` : '';
    lines.push(`${venue}: ${conclusion.status}${suffix}`);
  }
  for (const outcome of result.steps.values()) {
    lines.push(renderStep(outcome));
  }
  return lines.join('\n');
}

export function renderBasket(pairs: readonly string[]): string {
  if (pairs.length === 0) {
    return 'basket is empty';
  }
  return [`basket (${pairs.length}):`, ...pairs.map((pair) => `  ${pair}`)].join('\n');
}

export function renderArm(state: ArmState, now: number): string {
  if (state.mode === 'disarmed') {
    return 'disarmed';
  }
  const minutes = Math.max(0, Math.ceil((state.expiresAt - now) / 60_000));
  return `armed by ${state.armedBy} until ${formatClock(state.expiresAt)} UTC (${minutes}m left)`;
}

export type VenueReport =
  | { venue: VenueName; ok: true; trades: OpenTrade[]; balance: VenueBalance; count: VenueCount }
  | { venue: VenueName; ok: false; error: unknown };

export type StatusReport = {
  now: number;
  arm: ArmState;
  requireArm: boolean;
  stake: number;
  basket: readonly string[];
  leases: LeaseSnapshot;
  venues: VenueReport[];
  auto?: string;
};

function renderVenue(report: VenueReport, leases: LeaseSnapshot): string[] {
  const lease = leases[report.venue];
  const busy = lease ? ` [busy: ${lease.holder}]` : '';
  if (!report.ok) {
    return [`${report.venue}${busy}: ${renderError(report.error)}`];
  }
  const { balance, count, trades } = report;
  const lines = [
    `${report.venue}${busy}: ${count.current}/${count.max} open, balance ${formatAmount(balance.total)} ${balance.currency}`.trimEnd()
  ];
  for (const trade of trades) {
    const side = trade.isShort ? 'short' : 'long';
    const pnl = trade.profitAbs === undefined ? '' : ` pnl ${formatAmount(trade.profitAbs)}`;
    lines.push(`  #${trade.tradeId} ${trade.pair} ${side} stake ${formatAmount(trade.stakeAmount)}${pnl}`);
  }
  return lines;
}

export function renderStatus(report: StatusReport): string {
  const lines = [
    `arm: ${report.requireArm ? renderArm(report.arm, report.now) : 'not required'}`,
    `stake: ${formatAmount(report.stake)}`,
    `basket: ${report.basket.length === 0 ? 'empty' : report.basket.join(', ')}`
  ];
  if (report.auto) {
    lines.push(`auto: ${report.auto}`);
  }
  for (const venue of report.venues) {
    lines.push(...renderVenue(venue, report.leases));
  }
  return lines.join('\n');
}

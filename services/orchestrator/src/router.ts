import { createLogger } from '@venuepilot/logger';
import type { AuditEvent } from '@venuepilot/persistence';
import {
  Command,
  CommandKind,
  InboundMessage,
  invalidArguments,
  isOrchestratorError,
  OrchestratorError,
  PUBLIC_COMMANDS,
  toOrchestratorError,
  unauthorized,
  VenueName,
  VENUES
} from '@venuepilot/shared';
import { Clock, systemClock } from '@venuepilot/util';
import type { ArmGate } from './armGate';
import type { AutoToggleControl } from './autoToggle';
import type { BasketStore } from './basketStore';
import { buildCommand, HELP_TEXT, resolveKind, tokenize } from './commands';
import type { DispatchResult, InstanceDispatcher } from './dispatcher';
import type { VenueClient } from './freqtrade';
import { armedGauge, commandsReceived, commandsRejected } from './metrics';
import {
  renderArm,
  renderBasket,
  renderDispatchResult,
  renderError,
  renderStatus,
  VenueReport
} from './notifier';
import { buildEntryPlan, buildFlatPlan, DispatchPlan } from './plan';
import type { StakeSetting } from './stake';
import type { VenueLeases } from './venueLease';

const logger = createLogger('orchestrator.router');

export type AuditSink = (event: AuditEvent) => void;

export type RouterDeps = {
  admins: readonly number[];
  gate: ArmGate;
  basket: BasketStore;
  stake: StakeSetting;
  dispatcher: InstanceDispatcher;
  clients: Readonly<Record<VenueName, VenueClient>>;
  leases: VenueLeases;
  delayMs: number;
  autoToggle?: AutoToggleControl;
  audit?: AuditSink;
  clock?: Clock;
};

export type RouteOutcome = {
  command?: CommandKind;
  reply: string;
  /** `ok`, `PartialExecution`, or the rejecting error's code. */
  outcome: string;
  dispatch?: DispatchResult;
};

type Reply = { reply: string; dispatch?: DispatchResult };

/**
 * Authorizes, parses and runs chat commands. Unknown commands, non-admin issuers and bad
 * arguments are rejected before anything is touched.
 */
export class CommandRouter {
  private readonly admins: ReadonlySet<number>;
  private readonly clock: Clock;

  constructor(private readonly deps: RouterDeps) {
    this.admins = new Set(deps.admins);
    this.clock = deps.clock ?? systemClock;
  }

  isAdmin(userId: number): boolean {
    return this.admins.has(userId);
  }

  /** Routes one inbound message; null when the text is not a command. */
  async handle(message: InboundMessage): Promise<RouteOutcome | null> {
    const tokens = tokenize(message.text);
    if (!tokens) {
      return null;
    }
    commandsReceived.inc({ command: tokens.name });
    const now = this.clock.now();
    let kind: CommandKind | undefined;
    try {
      kind = resolveKind(tokens.name);
      if (!PUBLIC_COMMANDS.has(kind) && !this.isAdmin(message.fromId)) {
        throw unauthorized(message.fromId);
      }
      const command = buildCommand(kind, tokens.args, {
        issuerId: message.fromId,
        chatId: message.chatId,
        topicId: message.topicId,
        timestamp: now
      });
      const { reply, dispatch } = await this.route(command);
      const outcome = dispatch && dispatch.status !== 'completed' ? 'PartialExecution' : 'ok';
      this.audit(message, kind, outcome, dispatch ? { planId: dispatch.planId, status: dispatch.status } : undefined);
      return { command: kind, reply, outcome, dispatch };
    } catch (err) {
      const error = toOrchestratorError(err);
      commandsRejected.inc({ command: kind ?? tokens.name, code: error.code });
      logger.warn({ command: kind ?? tokens.name, issuer: message.fromId, code: error.code, err: error }, 'command rejected');
      this.audit(message, kind ?? tokens.name, error.code, { message: error.message });
      return { command: kind, reply: renderError(error), outcome: error.code };
    }
  }

  async route(command: Command): Promise<Reply> {
    const now = this.clock.now();
    switch (command.kind) {
      case 'start':
        return { reply: `venue pilot ready. ${this.isAdmin(command.meta.issuerId) ? 'You are an admin.' : 'Read-only access.'}\n${HELP_TEXT}` };
      case 'help':
        return { reply: HELP_TEXT };
      case 'show_basket':
        return { reply: renderBasket(this.deps.basket.getBasket()) };
      case 'set_basket': {
        const pairs = await this.deps.basket.setBasket(command.pairs);
        logger.info({ pairs, issuer: command.meta.issuerId }, 'basket replaced');
        return { reply: `basket set:\n${renderBasket(pairs)}` };
      }
      case 'set_stake': {
        const amount = this.deps.stake.set(command.amount);
        logger.info({ amount, issuer: command.meta.issuerId }, 'stake updated');
        return { reply: `stake set to ${amount}` };
      }
      case 'status':
        return { reply: await this.status(now) };
      case 'arm': {
        if (!this.deps.gate.required) {
          return { reply: 'arming is not required' };
        }
        this.deps.gate.requestArm(command.meta.issuerId, now);
        armedGauge.set(1);
        return { reply: renderArm(this.deps.gate.snapshot(now), now) };
      }
      case 'disarm':
        this.deps.gate.disarm();
        armedGauge.set(0);
        return { reply: 'disarmed' };
      case 'auto':
        return { reply: this.auto(command.mode) };
      case 'go_long':
      case 'go_short': {
        const plan = buildEntryPlan({
          side: command.kind === 'go_long' ? 'long' : 'short',
          pairs: this.deps.basket.getBasket(),
          stakeAmount: command.stake ?? this.deps.stake.get(),
          delayMs: this.deps.delayMs
        });
        return this.dispatch(command.kind, plan, now);
      }
      case 'flat':
        return this.dispatch(command.kind, buildFlatPlan(this.deps.delayMs), now);
      default:
        return this.unhandled(command);
    }
  }

  private unhandled(command: never): never {
    throw invalidArguments('unhandled command', { command });
  }

  private async dispatch(kind: CommandKind, plan: DispatchPlan, now: number): Promise<Reply> {
    this.deps.gate.check(kind, now);
    const result = await this.deps.dispatcher.execute(plan, {
      onAdmitted: () => {
        this.deps.gate.consume(kind);
        armedGauge.set(this.deps.gate.snapshot(now).mode === 'armed' ? 1 : 0);
      }
    });
    return { reply: renderDispatchResult(result), dispatch: result };
  }

  private auto(mode: 'on' | 'off' | 'status'): string {
    const control = this.deps.autoToggle;
    if (!control) {
      throw new OrchestratorError('InvalidArguments', 'auto toggle is not configured (external_status.url is empty)');
    }
    if (mode !== 'status') {
      control.setEnabled(mode === 'on');
    }
    return `auto: ${control.describe()}`;
  }

  private async status(now: number): Promise<string> {
    const venues = await Promise.all(VENUES.map((venue) => this.readVenue(venue)));
    return renderStatus({
      now,
      arm: this.deps.gate.snapshot(now),
      requireArm: this.deps.gate.required,
      stake: this.deps.stake.get(),
      basket: this.deps.basket.getBasket(),
      leases: this.deps.leases.snapshot(),
      venues,
      auto: this.deps.autoToggle?.describe()
    });
  }

  private async readVenue(venue: VenueName): Promise<VenueReport> {
    const client = this.deps.clients[venue];
    try {
      const [trades, balance, count] = await Promise.all([client.status(), client.balance(), client.count()]);
      return { venue, ok: true, trades, balance, count };
    } catch (err) {
      logger.warn({ venue, err }, 'status read failed');
      return { venue, ok: false, error: isOrchestratorError(err) ? err : toOrchestratorError(err, venue) };
    }
  }

  private audit(message: InboundMessage, kind: string, outcome: string, detail?: Record<string, unknown>): void {
    if (!this.deps.audit) return;
    try {
      this.deps.audit({
        ts: this.clock.now(),
        kind,
        actor: String(message.fromId),
        outcome,
        detail: { ...detail, chatId: message.chatId }
      });
    } catch (err) {
      logger.error({ err, kind }, 'audit write failed');
    }
  }
}

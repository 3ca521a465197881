import { createLogger } from '@venuepilot/logger';
import {
  isOrchestratorError,
  OrchestratorError,
  superseded,
  toOrchestratorError,
  VenueName
} from '@venuepilot/shared';
import { abortReason, Clock, systemClock } from '@venuepilot/util';
import type { OrchestratorEventBus } from './eventBus';
import type { VenueClient } from './freqtrade';
import { leaseHeld, plansTotal, stepFailures } from './metrics';
import { assertFlattenBeforeEnter, Checkpoint, DispatchPlan, PlanCommand, PlanStage, PlanStep, venuesOf } from './plan';
import { describePredicate } from './predicates';
import type { OutcomeReconciler, ReconcileOptions } from './reconciler';
import type { LeaseSet, VenueLease, VenueLeases } from './venueLease';

export type { DispatchPlan } from './plan';

const logger = createLogger('orchestrator.dispatcher');

type StepRef = {
  planId: string;
  stepId: string;
  stage: string;
  venue: VenueName;
  action: PlanStep['action']['kind'];
};

export type SkipReason = 'venue_failed' | 'prerequisite_failed' | 'superseded';

export type StepOutcome = StepRef &
  (
    | { status: 'ok'; detail: Record<string, unknown> }
    | { status: 'failed'; error: OrchestratorError }
    | { status: 'skipped'; reason: SkipReason }
  );

export type VenueConclusion = {
  venue: VenueName;
  status: 'completed' | 'timed_out' | 'failed' | 'skipped';
  error?: OrchestratorError;
  polls: number;
};

export type DispatchResult = {
  planId: string;
  command: PlanCommand;
  status: 'completed' | 'partial';
  /** Keyed by step id, in the plan's declared order. */
  steps: ReadonlyMap<string, StepOutcome>;
  venues: Partial<Record<VenueName, VenueConclusion>>;
  startedAt: number;
  finishedAt: number;
};

export type DispatcherOptions = {
  clients: Readonly<Record<VenueName, VenueClient>>;
  leases: VenueLeases;
  reconciler: OutcomeReconciler;
  reconcile: ReconcileOptions;
  clock?: Clock;
  bus?: OrchestratorEventBus;
};

export type ExecuteHooks = {
  /** Runs once every lease is held, before the first venue call. */
  onAdmitted?: () => void;
};

type RunState = {
  plan: DispatchPlan;
  leases: LeaseSet;
  outcomes: Map<string, StepOutcome>;
  failures: Map<VenueName, OrchestratorError>;
  blocked: Set<VenueName>;
  polls: Map<VenueName, number>;
};

function refOf(plan: DispatchPlan, stage: PlanStage, step: PlanStep): StepRef {
  return { planId: plan.id, stepId: step.id, stage: stage.label, venue: step.venue, action: step.action.kind };
}

function groupByVenue(steps: readonly PlanStep[]): Map<VenueName, PlanStep[]> {
  const groups = new Map<VenueName, PlanStep[]>();
  for (const step of steps) {
    const group = groups.get(step.venue);
    if (group) {
      group.push(step);
    } else {
      groups.set(step.venue, [step]);
    }
  }
  return groups;
}

function cancellation(lease: VenueLease): OrchestratorError {
  const reason = abortReason(lease.signal);
  return isOrchestratorError(reason) ? reason : superseded(lease.venue);
}

export class InstanceDispatcher {
  private readonly clock: Clock;

  constructor(private readonly options: DispatcherOptions) {
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Runs `plan` under leases on every venue it touches. Rejects with InstanceBusy, before any
   * call is made, when a venue is already leased and the plan cannot preempt its holder.
   */
  async execute(plan: DispatchPlan, hooks: ExecuteHooks = {}): Promise<DispatchResult> {
    assertFlattenBeforeEnter(plan);
    const venues = venuesOf(plan);
    const leases = await this.options.leases.acquire(venues, plan.id, { preempt: plan.preempt });
    hooks.onAdmitted?.();
    for (const venue of venues) leaseHeld.set({ venue }, 1);
    const startedAt = this.clock.now();
    const state: RunState = {
      plan,
      leases,
      outcomes: new Map(),
      failures: new Map(),
      blocked: new Set(),
      polls: new Map()
    };
    logger.info({ planId: plan.id, command: plan.command, venues, preempt: plan.preempt }, 'dispatching plan');

    try {
      for (const stage of plan.stages) {
        const unmet = stage.dependsOn.filter((venue) => state.failures.has(venue) || state.blocked.has(venue));
        if (unmet.length > 0) {
          this.skipStage(state, stage, unmet);
          continue;
        }
        const groups = groupByVenue(stage.steps);
        await Promise.all(Array.from(groups, ([venue, steps]) => this.runVenueSteps(state, stage, venue, steps)));
        await Promise.all(stage.checkpoints.map((checkpoint) => this.runCheckpoint(state, checkpoint)));
      }
    } finally {
      for (const venue of venues) this.releaseVenue(state, venue);
    }

    const result = this.conclude(state, venues, startedAt);
    plansTotal.inc({ command: plan.command, outcome: result.status });
    logger.info(
      { planId: plan.id, status: result.status, elapsedMs: result.finishedAt - startedAt },
      'plan finished'
    );
    this.options.bus?.emitPlan(plan, result);
    return result;
  }

  private record(state: RunState, outcome: StepOutcome): void {
    state.outcomes.set(outcome.stepId, outcome);
    this.options.bus?.emitStep(outcome);
  }

  private fail(state: RunState, venue: VenueName, error: OrchestratorError): void {
    if (!state.failures.has(venue)) {
      state.failures.set(venue, error);
      logger.warn({ planId: state.plan.id, venue, code: error.code, err: error }, 'venue failed; remaining steps skipped');
    }
    this.releaseVenue(state, venue);
  }

  private releaseVenue(state: RunState, venue: VenueName): void {
    const lease = state.leases.get(venue);
    if (lease.released) return;
    lease.release();
    leaseHeld.set({ venue }, this.options.leases.isHeld(venue) ? 1 : 0);
  }

  private skipStage(state: RunState, stage: PlanStage, unmet: VenueName[]): void {
    logger.warn({ planId: state.plan.id, stage: stage.label, unmet }, 'prerequisite venue failed; stage skipped');
    for (const step of stage.steps) {
      state.blocked.add(step.venue);
      this.record(state, { ...refOf(state.plan, stage, step), status: 'skipped', reason: 'prerequisite_failed' });
    }
    for (const checkpoint of stage.checkpoints) {
      state.blocked.add(checkpoint.venue);
    }
    for (const venue of state.blocked) {
      this.releaseVenue(state, venue);
    }
  }

  private async runVenueSteps(state: RunState, stage: PlanStage, venue: VenueName, steps: PlanStep[]): Promise<void> {
    const lease = state.leases.get(venue);
    for (const [index, step] of steps.entries()) {
      const ref = refOf(state.plan, stage, step);
      if (state.failures.has(venue)) {
        this.record(state, { ...ref, status: 'skipped', reason: 'venue_failed' });
        continue;
      }
      if (lease.signal.aborted) {
        this.fail(state, venue, cancellation(lease));
        this.record(state, { ...ref, status: 'skipped', reason: 'superseded' });
        continue;
      }
      try {
        const detail = await this.perform(step, lease.signal);
        this.record(state, { ...ref, status: 'ok', detail });
      } catch (err) {
        const error = lease.signal.aborted ? cancellation(lease) : toOrchestratorError(err, venue);
        stepFailures.inc({ venue, action: step.action.kind });
        this.record(state, { ...ref, status: 'failed', error });
        this.fail(state, venue, error);
        continue;
      }
      if (index < steps.length - 1 && step.delayMs > 0) {
        try {
          await this.clock.sleep(step.delayMs, lease.signal);
        } catch (err) {
          this.fail(state, venue, lease.signal.aborted ? cancellation(lease) : toOrchestratorError(err, venue));
        }
      }
    }
  }

  private async runCheckpoint(state: RunState, checkpoint: Checkpoint): Promise<void> {
    const { venue, predicate } = checkpoint;
    if (state.failures.has(venue) || state.blocked.has(venue)) {
      return;
    }
    const lease = state.leases.get(venue);
    let result;
    try {
      result = await this.options.reconciler.awaitCompletion(lease, predicate, this.options.reconcile);
    } catch (err) {
      this.fail(state, venue, toOrchestratorError(err, venue));
      return;
    }
    state.polls.set(venue, (state.polls.get(venue) ?? 0) + result.polls);
    if (result.status === 'completed') {
      return;
    }
    if (result.status === 'timed_out') {
      const seconds = Math.round(this.options.reconcile.timeoutMs / 1000);
      this.fail(
        state,
        venue,
        new OrchestratorError('ReconciliationTimeout', `${venue} did not reach "${describePredicate(predicate)}" within ${seconds}s`, {
          venue,
          detail: { polls: result.polls, lastError: result.lastError }
        })
      );
      return;
    }
    this.fail(state, venue, result.error);
  }

  private async perform(step: PlanStep, signal: AbortSignal): Promise<Record<string, unknown>> {
    const client = this.options.clients[step.venue];
    const action = step.action;
    switch (action.kind) {
      case 'flatten_pair': {
        const trades = await client.status({ signal });
        const matching = trades.filter((trade) => trade.pair === action.pair);
        for (const trade of matching) {
          await client.forceExit({ tradeId: trade.tradeId }, { signal });
        }
        return { pair: action.pair, exited: matching.map((trade) => trade.tradeId) };
      }
      case 'exit_all': {
        const response = await client.forceExit({ tradeId: 'all' }, { signal });
        return { result: response.result ?? 'ok' };
      }
      case 'enter': {
        const response = await client.forceEnter(
          { pair: action.pair, side: action.side, stakeAmount: action.stakeAmount, rate: action.rate },
          { signal }
        );
        return { pair: action.pair, side: action.side, stakeAmount: action.stakeAmount, tradeId: response.tradeId };
      }
      case 'start':
        return { state: await client.start({ signal }) };
      case 'stop':
        return { state: await client.stop({ signal }) };
    }
  }

  private conclude(state: RunState, venues: VenueName[], startedAt: number): DispatchResult {
    const conclusions: Partial<Record<VenueName, VenueConclusion>> = {};
    for (const venue of venues) {
      const polls = state.polls.get(venue) ?? 0;
      const error = state.failures.get(venue);
      if (error) {
        conclusions[venue] = {
          venue,
          status: error.code === 'ReconciliationTimeout' ? 'timed_out' : 'failed',
          error,
          polls
        };
      } else if (state.blocked.has(venue)) {
        conclusions[venue] = { venue, status: 'skipped', polls };
      } else {
        conclusions[venue] = { venue, status: 'completed', polls };
      }
    }
    const steps = new Map<string, StepOutcome>();
    for (const stage of state.plan.stages) {
      for (const step of stage.steps) {
        const outcome = state.outcomes.get(step.id);
        if (outcome) steps.set(step.id, outcome);
      }
    }
    const status = venues.every((venue) => conclusions[venue]?.status === 'completed') ? 'completed' : 'partial';
    return {
      planId: state.plan.id,
      command: state.plan.command,
      status,
      steps,
      venues: conclusions,
      startedAt,
      finishedAt: this.clock.now()
    };
  }
}

import { randomUUID } from 'node:crypto';
import { invalidArguments, oppositeVenue, TradeSide, VenueName } from '@venuepilot/shared';
import { NO_OPEN_TRADES, noOpenPosition, openPosition, Predicate, predicatePairs } from './predicates';

export type StepAction =
  | { kind: 'flatten_pair'; pair: string }
  | { kind: 'exit_all' }
  | { kind: 'enter'; pair: string; side: TradeSide; stakeAmount: number; rate?: number }
  | { kind: 'start' }
  | { kind: 'stop' };

export type PlanStep = {
  id: string;
  venue: VenueName;
  action: StepAction;
  /** Pause before the next step on the same venue. */
  delayMs: number;
};

export type Checkpoint = {
  venue: VenueName;
  predicate: Predicate;
};

/**
 * Steps of one stage run venue by venue in parallel, in declared order within a venue.
 * Checkpoints are awaited after the steps; a later stage only starts once every venue in
 * its `dependsOn` has come through all earlier stages without failing.
 */
export type PlanStage = {
  label: string;
  dependsOn: readonly VenueName[];
  steps: readonly PlanStep[];
  checkpoints: readonly Checkpoint[];
};

export type PlanCommand = 'go_long' | 'go_short' | 'flat' | 'auto_switch';

export type DispatchPlan = {
  readonly id: string;
  readonly command: PlanCommand;
  /** Supersedes whichever plans hold the venues instead of failing with InstanceBusy. */
  readonly preempt: boolean;
  readonly stages: readonly PlanStage[];
};

function planId(command: PlanCommand): string {
  return `${command}-${randomUUID().slice(0, 8)}`;
}

function freeze(plan: DispatchPlan): DispatchPlan {
  for (const stage of plan.stages) {
    Object.freeze(stage.steps);
    Object.freeze(stage.checkpoints);
    Object.freeze(stage);
  }
  Object.freeze(plan.stages);
  return Object.freeze(plan);
}

export type EntryPlanInput = {
  side: TradeSide;
  pairs: readonly string[];
  stakeAmount: number;
  delayMs: number;
  rate?: number;
};

/** Flattens the pairs on the opposite venue, waits until it reports them closed, then enters. */
export function buildEntryPlan(input: EntryPlanInput): DispatchPlan {
  if (input.pairs.length === 0) {
    throw invalidArguments('basket is empty; set one with /bs first');
  }
  const target: VenueName = input.side;
  const opposite = oppositeVenue(target);
  const command: PlanCommand = input.side === 'long' ? 'go_long' : 'go_short';
  const id = planId(command);
  const flatten: PlanStage = {
    label: `flatten ${opposite}`,
    dependsOn: [],
    steps: input.pairs.map((pair, index) => ({
      id: `${id}/flatten-${index}`,
      venue: opposite,
      action: { kind: 'flatten_pair', pair },
      delayMs: input.delayMs
    })),
    checkpoints: [{ venue: opposite, predicate: noOpenPosition(input.pairs) }]
  };
  const enter: PlanStage = {
    label: `enter ${target}`,
    dependsOn: [opposite],
    steps: input.pairs.map((pair, index) => ({
      id: `${id}/enter-${index}`,
      venue: target,
      action: { kind: 'enter', pair, side: input.side, stakeAmount: input.stakeAmount, rate: input.rate },
      delayMs: input.delayMs
    })),
    checkpoints: [{ venue: target, predicate: openPosition(input.pairs, input.side) }]
  };
  return freeze({ id, command, preempt: false, stages: [flatten, enter] });
}

export function buildFlatPlan(delayMs: number): DispatchPlan {
  const id = planId('flat');
  return freeze({
    id,
    command: 'flat',
    preempt: true,
    stages: [
      {
        label: 'exit all',
        dependsOn: [],
        steps: [
          { id: `${id}/exit-long`, venue: 'long', action: { kind: 'exit_all' }, delayMs },
          { id: `${id}/exit-short`, venue: 'short', action: { kind: 'exit_all' }, delayMs }
        ],
        checkpoints: [
          { venue: 'long', predicate: NO_OPEN_TRADES },
          { venue: 'short', predicate: NO_OPEN_TRADES }
        ]
      }
    ]
  });
}

/** Stops the venue trading against `direction`, then starts the `direction` venue. */
export function buildSwitchPlan(direction: TradeSide, delayMs: number): DispatchPlan {
  const id = planId('auto_switch');
  const target: VenueName = direction;
  const opposite = oppositeVenue(target);
  return freeze({
    id,
    command: 'auto_switch',
    preempt: false,
    stages: [
      {
        label: `stop ${opposite}`,
        dependsOn: [],
        steps: [{ id: `${id}/stop-${opposite}`, venue: opposite, action: { kind: 'stop' }, delayMs }],
        checkpoints: []
      },
      {
        label: `start ${target}`,
        dependsOn: [opposite],
        steps: [{ id: `${id}/start-${target}`, venue: target, action: { kind: 'start' }, delayMs }],
        checkpoints: []
      }
    ]
  });
}

export function venuesOf(plan: DispatchPlan): VenueName[] {
  const venues = new Set<VenueName>();
  for (const stage of plan.stages) {
    for (const step of stage.steps) venues.add(step.venue);
    for (const checkpoint of stage.checkpoints) venues.add(checkpoint.venue);
  }
  return Array.from(venues);
}

function clearsPair(predicate: Predicate, pair: string): boolean {
  return predicate.kind === 'no_open_trades' || (predicate.kind === 'no_open_position' && predicatePairs(predicate).includes(pair));
}

/**
 * Rejects any plan that could enter a pair on one venue before the other venue has been
 * confirmed flat on it: the entry's stage must depend on the opposite venue, and an earlier
 * stage must carry a checkpoint on that venue clearing the pair.
 */
export function assertFlattenBeforeEnter(plan: DispatchPlan): void {
  plan.stages.forEach((stage, index) => {
    for (const step of stage.steps) {
      if (step.action.kind !== 'enter') continue;
      const pair = step.action.pair;
      const opposite = oppositeVenue(step.venue);
      const gated = stage.dependsOn.includes(opposite);
      const flattened = plan.stages
        .slice(0, index)
        .some((earlier) => earlier.checkpoints.some((cp) => cp.venue === opposite && clearsPair(cp.predicate, pair)));
      if (!gated || !flattened) {
        throw invalidArguments(`plan ${plan.id} enters ${pair} on ${step.venue} before ${opposite} is confirmed flat`, {
          planId: plan.id,
          stepId: step.id
        });
      }
    }
  });
}

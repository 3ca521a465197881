import { createLogger } from '@venuepilot/logger';
import { instanceBusy, isOrchestratorError, OrchestratorError, superseded, VenueName } from '@venuepilot/shared';
import { abortReason, Clock, systemClock } from '@venuepilot/util';
import type { VenueClient } from './freqtrade';
import { reconcileDuration, reconcilePolls } from './metrics';
import { describePredicate, evaluatePredicate, Predicate } from './predicates';
import type { VenueLease } from './venueLease';

const logger = createLogger('orchestrator.reconciler');

export type ReconcileOptions = {
  timeoutMs: number;
  intervalMs: number;
};

type PollStats = { venue: VenueName; polls: number; elapsedMs: number };

export type PollResult =
  | (PollStats & { status: 'completed' })
  | (PollStats & { status: 'timed_out'; lastError?: string })
  | (PollStats & { status: 'failed'; error: OrchestratorError });

export class OutcomeReconciler {
  private readonly inFlight = new Set<VenueName>();

  constructor(
    private readonly clients: Readonly<Record<VenueName, VenueClient>>,
    private readonly clock: Clock = systemClock
  ) {}

  isReconciling(venue: VenueName): boolean {
    return this.inFlight.has(venue);
  }

  /**
   * Polls the leased venue's status until `predicate` holds or `timeoutMs` elapses.
   * A failed poll is retried on the next interval; aborting the lease ends the wait as superseded.
   */
  async awaitCompletion(lease: VenueLease, predicate: Predicate, options: ReconcileOptions): Promise<PollResult> {
    const venue = lease.venue;
    if (this.inFlight.has(venue)) {
      throw instanceBusy(venue, lease.holder);
    }
    this.inFlight.add(venue);
    const client = this.clients[venue];
    const started = this.clock.now();
    let polls = 0;
    let lastError: string | undefined;

    const stats = (): PollStats => ({ venue, polls, elapsedMs: this.clock.now() - started });
    const finish = (result: PollResult): PollResult => {
      reconcileDuration.observe({ venue, status: result.status }, result.elapsedMs / 1000);
      logger.info(
        { venue, holder: lease.holder, status: result.status, polls: result.polls, elapsedMs: result.elapsedMs },
        `reconcile ${describePredicate(predicate)}`
      );
      return result;
    };
    const cancelled = (): PollResult => {
      const reason = abortReason(lease.signal);
      return finish({ ...stats(), status: 'failed', error: isOrchestratorError(reason) ? reason : superseded(venue) });
    };

    try {
      if (lease.released) {
        return finish({ ...stats(), status: 'failed', error: superseded(venue) });
      }
      for (;;) {
        if (lease.signal.aborted) {
          return cancelled();
        }
        polls += 1;
        reconcilePolls.inc({ venue });
        const remainingMs = options.timeoutMs - (this.clock.now() - started);
        try {
          const trades = await client.status({ signal: lease.signal, timeoutMs: Math.max(1, remainingMs) });
          if (evaluatePredicate(predicate, trades)) {
            return finish({ ...stats(), status: 'completed' });
          }
        } catch (err) {
          if (lease.signal.aborted) {
            return cancelled();
          }
          lastError = err instanceof Error ? err.message : String(err);
          logger.warn({ venue, err, polls }, 'status poll failed; retrying next interval');
        }
        const elapsed = this.clock.now() - started;
        if (elapsed >= options.timeoutMs) {
          return finish({ ...stats(), status: 'timed_out', lastError });
        }
        try {
          await this.clock.sleep(Math.min(options.intervalMs, options.timeoutMs - elapsed), lease.signal);
        } catch (err) {
          if (lease.signal.aborted) {
            return cancelled();
          }
          throw err;
        }
        if (this.clock.now() - started >= options.timeoutMs) {
          return finish({ ...stats(), status: 'timed_out', lastError });
        }
      }
    } finally {
      this.inFlight.delete(venue);
    }
  }
}

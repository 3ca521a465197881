import { instanceBusy, superseded, VenueName } from '@venuepilot/shared';

export interface VenueLease {
  readonly venue: VenueName;
  readonly holder: string;
  readonly preempting: boolean;
  readonly acquiredAt: number;
  /** Aborted when a preempting plan supersedes this holder. */
  readonly signal: AbortSignal;
  readonly released: boolean;
  release(): void;
}

export type LeaseSet = {
  readonly holder: string;
  get(venue: VenueName): VenueLease;
  venues(): VenueName[];
  releaseAll(): void;
};

export type LeaseSnapshot = Partial<Record<VenueName, { holder: string; since: number; superseded: boolean }>>;

type Waiter = { holder: string; resume: () => void };

type Slot = { state: 'held'; lease: Lease; waiter?: Waiter } | { state: 'reserved'; holder: string };

class Lease implements VenueLease {
  private readonly controller = new AbortController();
  private done = false;

  constructor(
    readonly venue: VenueName,
    readonly holder: string,
    readonly preempting: boolean,
    readonly acquiredAt: number,
    private readonly onRelease: (lease: Lease) => void
  ) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get released(): boolean {
    return this.done;
  }

  supersede(): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort(superseded(this.venue));
    }
  }

  release(): void {
    if (this.done) return;
    this.done = true;
    this.onRelease(this);
  }
}

/**
 * Per-venue single-slot admission. A plan either gets every venue it asks for or none;
 * a busy venue is reported immediately and never queued. A preempting request supersedes
 * the current holders, waits for them to let go, and takes their slots before anyone else can.
 */
export class VenueLeases {
  private readonly slots = new Map<VenueName, Slot>();

  constructor(private readonly now: () => number = Date.now) {}

  isHeld(venue: VenueName): boolean {
    return this.slots.has(venue);
  }

  holderOf(venue: VenueName): string | undefined {
    const slot = this.slots.get(venue);
    if (!slot) return undefined;
    return slot.state === 'held' ? slot.lease.holder : slot.holder;
  }

  snapshot(): LeaseSnapshot {
    const result: LeaseSnapshot = {};
    for (const [venue, slot] of this.slots) {
      if (slot.state === 'held') {
        result[venue] = { holder: slot.lease.holder, since: slot.lease.acquiredAt, superseded: slot.lease.signal.aborted };
      }
    }
    return result;
  }

  tryAcquire(venues: readonly VenueName[], holder: string): LeaseSet {
    const unique = Array.from(new Set(venues));
    for (const venue of unique) {
      if (this.slots.has(venue)) {
        throw instanceBusy(venue, this.holderOf(venue));
      }
    }
    return this.grant(unique, holder, false);
  }

  async acquire(venues: readonly VenueName[], holder: string, options: { preempt?: boolean } = {}): Promise<LeaseSet> {
    if (!options.preempt) {
      return this.tryAcquire(venues, holder);
    }
    const unique = Array.from(new Set(venues));
    for (const venue of unique) {
      const slot = this.slots.get(venue);
      if (slot && (slot.state === 'reserved' || slot.waiter || slot.lease.preempting)) {
        throw instanceBusy(venue, this.holderOf(venue));
      }
    }
    const waits: Array<Promise<void>> = [];
    for (const venue of unique) {
      const slot = this.slots.get(venue);
      if (!slot) {
        this.slots.set(venue, { state: 'reserved', holder });
        continue;
      }
      if (slot.state !== 'held') continue;
      waits.push(
        new Promise<void>((resume) => {
          slot.waiter = { holder, resume };
        })
      );
      slot.lease.supersede();
    }
    await Promise.all(waits);
    return this.grant(unique, holder, true);
  }

  private grant(venues: VenueName[], holder: string, preempting: boolean): LeaseSet {
    const leases = new Map<VenueName, Lease>();
    const acquiredAt = this.now();
    for (const venue of venues) {
      const lease = new Lease(venue, holder, preempting, acquiredAt, (released) => this.onRelease(released));
      this.slots.set(venue, { state: 'held', lease });
      leases.set(venue, lease);
    }
    return {
      holder,
      get: (venue) => {
        const lease = leases.get(venue);
        if (!lease) {
          throw new Error(`plan ${holder} holds no lease for ${venue}`);
        }
        return lease;
      },
      venues: () => Array.from(leases.keys()),
      releaseAll: () => {
        for (const lease of leases.values()) {
          lease.release();
        }
      }
    };
  }

  private onRelease(lease: Lease): void {
    const slot = this.slots.get(lease.venue);
    if (slot?.state !== 'held' || slot.lease !== lease) {
      return;
    }
    if (slot.waiter) {
      this.slots.set(lease.venue, { state: 'reserved', holder: slot.waiter.holder });
      slot.waiter.resume();
      return;
    }
    this.slots.delete(lease.venue);
  }
}

import { invalidArguments, normalizePairList, OrchestratorError } from '@venuepilot/shared';
import { createSerialQueue, SerialQueue } from '@venuepilot/util';

export type BasketWriter = (pairs: readonly string[]) => Promise<void>;

export class BasketStore {
  private pairs: readonly string[] = Object.freeze([]);
  private readonly writes: SerialQueue = createSerialQueue();

  constructor(initial: readonly string[] = [], private readonly writer?: BasketWriter) {
    this.pairs = BasketStore.normalize(initial);
  }

  getBasket(): readonly string[] {
    return this.pairs;
  }

  size(): number {
    return this.pairs.length;
  }

  /**
   * Validates, de-duplicates and persists `raw`, then swaps it in as a whole.
   * Writes are serialized; a failed validation or write leaves the current basket untouched.
   */
  async setBasket(raw: readonly string[]): Promise<readonly string[]> {
    const next = BasketStore.normalize(raw);
    return this.writes.run(async () => {
      if (this.writer) {
        try {
          await this.writer(next);
        } catch (err) {
          const reason = err instanceof Error ? err.message : String(err);
          throw new OrchestratorError('ConfigInvalid', `watchlist could not be saved: ${reason}`, { cause: err });
        }
      }
      this.pairs = next;
      return next;
    });
  }

  private static normalize(raw: readonly string[]): readonly string[] {
    const result = normalizePairList(raw);
    if (!result.ok) {
      throw invalidArguments(`invalid pair "${result.invalid}", expected BASE/QUOTE:SETTLE`, { pair: result.invalid });
    }
    return Object.freeze(result.pairs);
  }
}

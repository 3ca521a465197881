import { OpenTrade, TradeSide } from '@venuepilot/shared';

export type Predicate =
  | { kind: 'no_open_position'; pairs: readonly string[] }
  | { kind: 'open_position'; pairs: readonly string[]; side: TradeSide }
  | { kind: 'no_open_trades' };

export function noOpenPosition(pairs: readonly string[]): Predicate {
  return { kind: 'no_open_position', pairs: [...pairs] };
}

export function openPosition(pairs: readonly string[], side: TradeSide): Predicate {
  return { kind: 'open_position', pairs: [...pairs], side };
}

export const NO_OPEN_TRADES: Predicate = Object.freeze({ kind: 'no_open_trades' });

function sideOf(trade: OpenTrade): TradeSide {
  return trade.isShort ? 'short' : 'long';
}

export function evaluatePredicate(predicate: Predicate, trades: readonly OpenTrade[]): boolean {
  switch (predicate.kind) {
    case 'no_open_trades':
      return trades.length === 0;
    case 'no_open_position': {
      const pairs = new Set(predicate.pairs);
      return !trades.some((trade) => pairs.has(trade.pair));
    }
    case 'open_position':
      return predicate.pairs.every((pair) =>
        trades.some((trade) => trade.pair === pair && sideOf(trade) === predicate.side)
      );
  }
}

/** Pairs a predicate speaks about; empty for `no_open_trades`, which covers every pair. */
export function predicatePairs(predicate: Predicate): readonly string[] {
  return predicate.kind === 'no_open_trades' ? [] : predicate.pairs;
}

export function describePredicate(predicate: Predicate): string {
  switch (predicate.kind) {
    case 'no_open_trades':
      return 'no open trades';
    case 'no_open_position':
      return `no open position on ${predicate.pairs.join(', ')}`;
    case 'open_position':
      return `${predicate.side} open on ${predicate.pairs.join(', ')}`;
  }
}

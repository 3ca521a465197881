import {
  AutoMode,
  Command,
  CommandBody,
  CommandKind,
  CommandMeta,
  invalidArguments,
  normalizePairList
} from '@venuepilot/shared';
import { parseStakeAmount } from './stake';

export type Tokenized = {
  name: string;
  args: string[];
};

const ALIASES: Readonly<Record<string, CommandKind>> = {
  start: 'start',
  help: 'help',
  basket: 'show_basket',
  bs: 'set_basket',
  basket_set: 'set_basket',
  stake: 'set_stake',
  go_long: 'go_long',
  go_short: 'go_short',
  flat: 'flat',
  status: 'status',
  arm: 'arm',
  disarm: 'disarm',
  auto: 'auto'
};

export const HELP_TEXT = [
  '/basket - show the watched pairs',
  '/bs <pairs...> - replace the basket (also /basket_set), e.g. /bs BTC/USDT:USDT ETH/USDT:USDT',
  '/stake <amount> - set the entry amount',
  '/status - venue positions, balances and open-trade counts',
  '/arm - allow the next destructive command',
  '/disarm - cancel a pending arm',
  '/go_long [amount] - flatten the basket on short, then enter it on long',
  '/go_short [amount] - flatten the basket on long, then enter it on short',
  '/flat - exit every trade on both venues',
  '/auto on|off|status - PnL-driven direction switching'
].join('\n');

/**
 * Splits a chat message into a command name and its arguments. Returns null for text that
 * is not a command. A `@botname` suffix on the command is dropped; arguments split on
 * whitespace and commas.
 */
export function tokenize(text: string): Tokenized | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith('/')) {
    return null;
  }
  const [head, ...rest] = trimmed.slice(1).split(/\s+/);
  const name = head.split('@')[0].toLowerCase();
  if (!name) {
    return null;
  }
  const args = rest
    .join(' ')
    .split(/[\s,]+/)
    .filter((arg) => arg.length > 0);
  return { name, args };
}

export function resolveKind(name: string): CommandKind {
  const kind = Object.prototype.hasOwnProperty.call(ALIASES, name) ? ALIASES[name] : undefined;
  if (!kind) {
    throw invalidArguments(`unknown command /${name}; see /help`, { command: name });
  }
  return kind;
}

function parseAutoMode(args: string[]): AutoMode {
  const raw = (args[0] ?? 'status').toLowerCase();
  if (raw === 'on' || raw === 'off' || raw === 'status') {
    return raw;
  }
  throw invalidArguments(`/auto takes on, off or status, got "${args[0]}"`, { value: args[0] });
}

function parseBody(kind: CommandKind, args: string[]): CommandBody {
  switch (kind) {
    case 'start':
    case 'help':
    case 'show_basket':
    case 'flat':
    case 'status':
    case 'arm':
    case 'disarm':
      return { kind };
    case 'set_basket': {
      if (args.length === 0) {
        throw invalidArguments('/bs needs at least one pair, e.g. /bs BTC/USDT:USDT');
      }
      const result = normalizePairList(args);
      if (!result.ok) {
        throw invalidArguments(`invalid pair "${result.invalid}", expected BASE/QUOTE:SETTLE`, { pair: result.invalid });
      }
      return { kind, pairs: result.pairs };
    }
    case 'set_stake': {
      if (args.length !== 1) {
        throw invalidArguments('/stake takes exactly one amount, e.g. /stake 500');
      }
      return { kind, amount: parseStakeAmount(args[0]) };
    }
    case 'go_long':
    case 'go_short': {
      if (args.length > 1) {
        throw invalidArguments(`/${kind} takes at most one amount`);
      }
      return args.length === 1 ? { kind, stake: parseStakeAmount(args[0]) } : { kind };
    }
    case 'auto':
      return { kind, mode: parseAutoMode(args) };
  }
}

export function buildCommand(kind: CommandKind, args: string[], meta: Omit<CommandMeta, 'rawArgs'>): Command {
  const body = parseBody(kind, args);
  return Object.freeze({ ...body, meta: Object.freeze({ ...meta, rawArgs: [...args] }) });
}

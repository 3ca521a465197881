export type VenueName = 'long' | 'short';

export const VENUES: readonly VenueName[] = ['long', 'short'];

export type TradeSide = 'long' | 'short';

export function oppositeVenue(venue: VenueName): VenueName {
  return venue === 'long' ? 'short' : 'long';
}

export type InstanceCredentials = {
  username: string;
  password: string;
};

export type InstanceTarget = {
  readonly name: VenueName;
  readonly baseUrl: string;
  readonly credentials: Readonly<InstanceCredentials>;
};

export type CommandMeta = {
  issuerId: number;
  chatId: number;
  topicId?: number;
  timestamp: number;
  rawArgs: string[];
};

export type AutoMode = 'on' | 'off' | 'status';

export type CommandBody =
  | { kind: 'start' }
  | { kind: 'help' }
  | { kind: 'show_basket' }
  | { kind: 'set_basket'; pairs: string[] }
  | { kind: 'set_stake'; amount: number }
  | { kind: 'go_long'; stake?: number }
  | { kind: 'go_short'; stake?: number }
  | { kind: 'flat' }
  | { kind: 'status' }
  | { kind: 'arm' }
  | { kind: 'disarm' }
  | { kind: 'auto'; mode: AutoMode };

export type CommandKind = CommandBody['kind'];

export type Command = Readonly<CommandBody & { meta: Readonly<CommandMeta> }>;

export const DESTRUCTIVE_COMMANDS: ReadonlySet<CommandKind> = new Set<CommandKind>(['go_long', 'go_short', 'flat']);

export const PUBLIC_COMMANDS: ReadonlySet<CommandKind> = new Set<CommandKind>(['start', 'help']);

export function isDestructive(kind: CommandKind): boolean {
  return DESTRUCTIVE_COMMANDS.has(kind);
}

export type ArmState =
  | { mode: 'disarmed' }
  | { mode: 'armed'; expiresAt: number; armedBy: number };

/** Subset of a venue's `/status` trade entry the orchestrator reads. */
export type OpenTrade = {
  tradeId: number;
  pair: string;
  isShort: boolean;
  amount: number;
  stakeAmount: number;
  profitAbs?: number;
  profitPct?: number;
};

export type VenueBalance = {
  currency: string;
  total: number;
  startingCapital?: number;
};

export type VenueCount = {
  current: number;
  max: number;
  totalStake?: number;
};

export type InboundMessage = {
  updateId: number;
  chatId: number;
  topicId?: number;
  fromId: number;
  fromName?: string;
  text: string;
  date: number;
};

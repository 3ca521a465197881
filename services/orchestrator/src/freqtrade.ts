import { z } from 'zod';
import {
  InstanceCredentials,
  OpenTrade,
  OrchestratorError,
  TradeSide,
  VenueBalance,
  VenueCount,
  VenueName,
  instanceUnreachable,
  toOrchestratorError
} from '@venuepilot/shared';
import { abortReason, basicAuthHeader, buildServiceUrl, withTimeoutSignal } from '@venuepilot/util';

export type CallOptions = {
  signal?: AbortSignal;
  /** Caps this call below the client's request timeout. */
  timeoutMs?: number;
};

export type ForceEnterRequest = {
  pair: string;
  side: TradeSide;
  stakeAmount?: number;
  rate?: number;
};

export type ForceExitRequest = {
  tradeId: number | 'all';
  orderType?: 'market' | 'limit';
  amount?: number;
};

export interface VenueClient {
  readonly name: VenueName | 'external';
  forceEnter(req: ForceEnterRequest, call?: CallOptions): Promise<{ tradeId?: number }>;
  forceExit(req: ForceExitRequest, call?: CallOptions): Promise<{ result?: string }>;
  status(call?: CallOptions): Promise<OpenTrade[]>;
  balance(call?: CallOptions): Promise<VenueBalance>;
  count(call?: CallOptions): Promise<VenueCount>;
  start(call?: CallOptions): Promise<string>;
  stop(call?: CallOptions): Promise<string>;
}

export type ClientTarget = {
  name: VenueName | 'external';
  baseUrl: string;
  credentials?: InstanceCredentials;
};

export type FreqtradeClientOptions = {
  timeoutMs: number;
  apiPrefix?: string;
  fetchImpl?: typeof fetch;
};

const tradeSchema = z
  .object({
    trade_id: z.number(),
    pair: z.string(),
    is_short: z.boolean().default(false),
    is_open: z.boolean().default(true),
    amount: z.number().default(0),
    stake_amount: z.number().default(0),
    profit_abs: z.number().nullish(),
    profit_pct: z.number().nullish()
  })
  .passthrough();

const statusSchema = z
  .union([z.array(tradeSchema), z.object({ trades: z.array(tradeSchema) }).passthrough()])
  .transform((body) => (Array.isArray(body) ? body : body.trades))
  .transform((trades): OpenTrade[] =>
    trades
      .filter((trade) => trade.is_open)
      .map((trade) => ({
        tradeId: trade.trade_id,
        pair: trade.pair,
        isShort: trade.is_short,
        amount: trade.amount,
        stakeAmount: trade.stake_amount,
        profitAbs: trade.profit_abs ?? undefined,
        profitPct: trade.profit_pct ?? undefined
      }))
  );

const balanceSchema = z
  .object({
    total: z.number(),
    stake: z.string().default(''),
    starting_capital: z.number().optional()
  })
  .passthrough()
  .transform((body): VenueBalance => ({
    currency: body.stake,
    total: body.total,
    startingCapital: body.starting_capital
  }));

const countSchema = z
  .object({
    current: z.number(),
    max: z.number(),
    total_stake: z.number().optional()
  })
  .passthrough()
  .transform((body): VenueCount => ({ current: body.current, max: body.max, totalStake: body.total_stake }));

const enterSchema = z
  .object({ trade_id: z.number().optional() })
  .passthrough()
  .transform((body) => ({ tradeId: body.trade_id }));

const exitSchema = z
  .object({ result: z.string().optional() })
  .passthrough()
  .transform((body) => ({ result: body.result }));

const stateSchema = z
  .object({ status: z.string() })
  .passthrough()
  .transform((body) => body.status);

class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    readonly body: string
  ) {
    super(`HTTP ${status}${body ? `: ${body.slice(0, 200)}` : ''}`);
    this.name = 'HttpStatusError';
  }
}

/**
 * REST client for one trading-engine instance (`{base_url}/api/v1/...`, HTTP basic auth).
 * Every call is bounded by the request timeout and by the caller's signal; failures surface
 * as `InstanceUnreachable`, or as the caller's abort reason when the caller cancelled.
 */
export class FreqtradeClient implements VenueClient {
  private readonly fetchImpl: typeof fetch;
  private readonly apiPrefix: string;

  constructor(
    private readonly target: ClientTarget,
    private readonly options: FreqtradeClientOptions
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.apiPrefix = options.apiPrefix ?? '/api/v1';
  }

  get name(): VenueName | 'external' {
    return this.target.name;
  }

  forceEnter(req: ForceEnterRequest, call?: CallOptions): Promise<{ tradeId?: number }> {
    const body: Record<string, unknown> = { pair: req.pair, side: req.side };
    if (req.stakeAmount !== undefined) body.stakeamount = req.stakeAmount;
    if (req.rate !== undefined) body.price = req.rate;
    return this.request('POST', '/forceenter', enterSchema, body, call);
  }

  forceExit(req: ForceExitRequest, call?: CallOptions): Promise<{ result?: string }> {
    const body: Record<string, unknown> = { tradeid: req.tradeId === 'all' ? 'all' : String(req.tradeId) };
    if (req.orderType) body.ordertype = req.orderType;
    if (req.amount !== undefined) body.amount = req.amount;
    return this.request('POST', '/forceexit', exitSchema, body, call);
  }

  status(call?: CallOptions): Promise<OpenTrade[]> {
    return this.request('GET', '/status', statusSchema, undefined, call);
  }

  balance(call?: CallOptions): Promise<VenueBalance> {
    return this.request('GET', '/balance', balanceSchema, undefined, call);
  }

  count(call?: CallOptions): Promise<VenueCount> {
    return this.request('GET', '/count', countSchema, undefined, call);
  }

  start(call?: CallOptions): Promise<string> {
    return this.request('POST', '/start', stateSchema, undefined, call);
  }

  stop(call?: CallOptions): Promise<string> {
    return this.request('POST', '/stop', stateSchema, undefined, call);
  }

  private async request<T>(
    method: 'GET' | 'POST',
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body: Record<string, unknown> | undefined,
    call: CallOptions = {}
  ): Promise<T> {
    const url = buildServiceUrl(this.target.baseUrl, `${this.apiPrefix}${path}`);
    const timeoutMs = Math.min(call.timeoutMs ?? this.options.timeoutMs, this.options.timeoutMs);
    const guard = withTimeoutSignal(timeoutMs, call.signal);
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.target.credentials) {
      headers.Authorization = basicAuthHeader(this.target.credentials.username, this.target.credentials.password);
    }
    if (body) {
      headers['Content-Type'] = 'application/json';
    }
    try {
      const res = await this.fetchImpl(url, {
        method,
        headers,
        body: body ? JSON.stringify(body) : undefined,
        signal: guard.signal
      });
      if (!res.ok) {
        throw new HttpStatusError(res.status, await res.text());
      }
      const parsed = schema.safeParse(await res.json());
      if (!parsed.success) {
        throw new Error(`unexpected ${method} ${path} response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`);
      }
      return parsed.data;
    } catch (err) {
      if (call.signal?.aborted) {
        throw this.attribute(abortReason(call.signal));
      }
      if (guard.timedOut()) {
        throw this.unreachable(new Error(`${method} ${path} timed out after ${timeoutMs}ms`));
      }
      throw this.unreachable(err);
    } finally {
      guard.dispose();
    }
  }

  private attribute(err: unknown): OrchestratorError {
    return this.target.name === 'external' ? this.unreachable(err) : toOrchestratorError(err, this.target.name);
  }

  private unreachable(err: unknown): OrchestratorError {
    const detail = err instanceof HttpStatusError ? { status: err.status } : undefined;
    if (this.target.name === 'external') {
      const reason = err instanceof Error ? err.message : String(err);
      return new OrchestratorError('InstanceUnreachable', `external status unreachable: ${reason}`, { cause: err, detail });
    }
    const wrapped = instanceUnreachable(this.target.name, err);
    return detail ? new OrchestratorError(wrapped.code, wrapped.message, { venue: wrapped.venue, detail, cause: err }) : wrapped;
  }
}

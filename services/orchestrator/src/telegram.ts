import { z } from 'zod';
import { createLogger } from '@venuepilot/logger';
import { InboundMessage } from '@venuepilot/shared';
import { abortReason, Clock, systemClock, withTimeoutSignal } from '@venuepilot/util';
import type { NotificationSink } from './notifier';

const logger = createLogger('orchestrator.telegram');

export type TelegramTransportOptions = {
  token: string;
  chatId: number;
  topicId?: number;
  pollTimeoutSec: number;
  apiBase?: string;
  fetchImpl?: typeof fetch;
  clock?: Clock;
};

export type ChatFilter = {
  chatId: number;
  topicId?: number;
};

export type MessageHandler = (message: InboundMessage) => Promise<void>;

export type TransportStatus = { state: 'idle' | 'running' | 'error'; detail: string };

const updateSchema = z
  .object({
    update_id: z.number().int(),
    message: z
      .object({
        date: z.number(),
        text: z.string().optional(),
        message_thread_id: z.number().int().optional(),
        chat: z.object({ id: z.number().int() }).passthrough(),
        from: z
          .object({ id: z.number().int(), username: z.string().optional(), first_name: z.string().optional() })
          .passthrough()
          .optional()
      })
      .passthrough()
      .optional()
  })
  .passthrough();

const envelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional()
});

export function updateIdOf(raw: unknown): number | undefined {
  const parsed = z.object({ update_id: z.number().int() }).passthrough().safeParse(raw);
  return parsed.success ? parsed.data.update_id : undefined;
}

/**
 * Turns one `getUpdates` entry into an inbound message, or null when it is not a text message
 * from a user in the configured chat (and topic, when one is set).
 */
export function parseUpdate(raw: unknown, filter: ChatFilter): InboundMessage | null {
  const parsed = updateSchema.safeParse(raw);
  if (!parsed.success) return null;
  const { update_id: updateId, message } = parsed.data;
  if (!message?.text || !message.from) return null;
  if (message.chat.id !== filter.chatId) return null;
  if (filter.topicId !== undefined && message.message_thread_id !== filter.topicId) return null;
  return {
    updateId,
    chatId: message.chat.id,
    topicId: message.message_thread_id,
    fromId: message.from.id,
    fromName: message.from.username ?? message.from.first_name,
    text: message.text,
    date: message.date * 1000
  };
}

/** Bot API long-polling transport bound to one chat; also the sink for replies and alerts. */
export class TelegramTransport implements NotificationSink {
  private readonly fetchImpl: typeof fetch;
  private readonly apiBase: string;
  private readonly clock: Clock;
  private controller?: AbortController;
  private loop?: Promise<void>;
  private offset = 0;
  private statusState: TransportStatus = { state: 'idle', detail: 'not started' };

  constructor(private readonly options: TelegramTransportOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.apiBase = options.apiBase ?? 'https://api.telegram.org';
    this.clock = options.clock ?? systemClock;
  }

  status(): TransportStatus {
    return this.statusState;
  }

  async send(text: string): Promise<void> {
    const payload: Record<string, unknown> = { chat_id: this.options.chatId, text };
    if (this.options.topicId !== undefined) {
      payload.message_thread_id = this.options.topicId;
    }
    await this.call('sendMessage', payload, 10_000);
  }

  /** Fetches the next batch of updates and advances the offset past them. */
  async pollOnce(signal?: AbortSignal): Promise<InboundMessage[]> {
    const timeout = this.options.pollTimeoutSec;
    const result = await this.call(
      'getUpdates',
      { offset: this.offset, timeout, allowed_updates: ['message'] },
      (timeout + 10) * 1000,
      signal
    );
    if (!Array.isArray(result)) {
      throw new Error('getUpdates returned a non-array result');
    }
    const messages: InboundMessage[] = [];
    for (const raw of result) {
      const updateId = updateIdOf(raw);
      if (updateId !== undefined && updateId >= this.offset) {
        this.offset = updateId + 1;
      }
      const message = parseUpdate(raw, { chatId: this.options.chatId, topicId: this.options.topicId });
      if (message) messages.push(message);
    }
    return messages;
  }

  /**
   * Starts the polling loop. Each message is handed to `handler` without being awaited, so a
   * long-running plan never holds up `/flat` or `/status` arriving behind it.
   */
  start(handler: MessageHandler): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    this.updateStatus({ state: 'running', detail: 'polling for updates' });
    this.loop = this.run(handler, controller.signal);
  }

  async stop(): Promise<void> {
    this.controller?.abort();
    const loop = this.loop;
    this.loop = undefined;
    this.controller = undefined;
    if (loop) {
      await loop;
    }
    this.updateStatus({ state: 'idle', detail: 'stopped' });
  }

  private async run(handler: MessageHandler, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        const messages = await this.pollOnce(signal);
        for (const message of messages) {
          handler(message).catch((err) => logger.error({ err, updateId: message.updateId }, 'message handler failed'));
        }
        if (this.statusState.state !== 'running') {
          this.updateStatus({ state: 'running', detail: 'polling for updates' });
        }
      } catch (err) {
        if (signal.aborted) break;
        logger.error({ err }, 'getUpdates failed; backing off');
        this.updateStatus({ state: 'error', detail: err instanceof Error ? err.message : String(err) });
        try {
          await this.clock.sleep(5_000, signal);
        } catch {
          break;
        }
      }
    }
  }

  private async call(method: string, payload: Record<string, unknown>, timeoutMs: number, signal?: AbortSignal): Promise<unknown> {
    const guard = withTimeoutSignal(timeoutMs, signal);
    try {
      const res = await this.fetchImpl(`${this.apiBase}/bot${this.options.token}/${method}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: guard.signal
      });
      const envelope = envelopeSchema.safeParse(await res.json());
      if (!envelope.success) {
        throw new Error(`${method}: unexpected response (HTTP ${res.status})`);
      }
      if (!envelope.data.ok) {
        throw new Error(`${method}: ${envelope.data.description ?? `HTTP ${res.status}`}`);
      }
      return envelope.data.result;
    } catch (err) {
      if (signal?.aborted) {
        throw abortReason(signal);
      }
      throw err;
    } finally {
      guard.dispose();
    }
  }

  private updateStatus(status: TransportStatus): void {
    this.statusState = status;
  }
}

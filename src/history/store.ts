import { randomUUID } from "node:crypto";

import { z } from "zod";

import type { ChatExchange } from "../setups/types.js";

/** Input accepted by {@link ChatHistoryStore.append}; identifier and timestamp are assigned by the store. */
export interface NewChatExchange {
  readonly prompt: string;
  readonly response: string;
}

/**
 * Append-only log of completed answer requests. There is no update or delete
 * path: entries are frozen once appended.
 */
export interface ChatHistoryStore {
  append(exchange: NewChatExchange): Promise<ChatExchange>;
  /** Oldest first. When {@link limit} is given, the most recent {@link limit} entries. */
  list(limit?: number): Promise<ChatExchange[]>;
  size(): Promise<number>;
}

export const chatExchangeSchema = z.object({
  id: z.string().min(1),
  prompt: z.string(),
  response: z.string(),
  timestamp: z.string().datetime(),
});

export function createExchange(input: NewChatExchange, now: number, idFactory: () => string = randomUUID): ChatExchange {
  return Object.freeze({
    id: idFactory(),
    prompt: input.prompt,
    response: input.response,
    timestamp: new Date(now).toISOString(),
  });
}

export function tail<T>(entries: readonly T[], limit: number | undefined): T[] {
  if (limit === undefined) {
    return [...entries];
  }
  if (!Number.isFinite(limit) || limit <= 0) {
    return [];
  }
  return entries.slice(Math.max(0, entries.length - Math.floor(limit)));
}

/** Options shared by the history implementations. */
export interface ChatHistoryOptions {
  readonly clock?: () => number;
  readonly idFactory?: () => string;
}

export class InMemoryChatHistory implements ChatHistoryStore {
  private readonly entries: ChatExchange[] = [];
  private readonly clock: () => number;
  private readonly idFactory: () => string;

  constructor(options: ChatHistoryOptions = {}) {
    this.clock = options.clock ?? (() => Date.now());
    this.idFactory = options.idFactory ?? randomUUID;
  }

  async append(input: NewChatExchange): Promise<ChatExchange> {
    const exchange = createExchange(input, this.clock(), this.idFactory);
    this.entries.push(exchange);
    return exchange;
  }

  async list(limit?: number): Promise<ChatExchange[]> {
    return tail(this.entries, limit);
  }

  async size(): Promise<number> {
    return this.entries.length;
  }
}

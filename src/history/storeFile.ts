import { randomUUID } from "node:crypto";

import { JsonlJournal, type FsyncMode } from "../infra/jsonlJournal.js";
import { StoreError } from "../setups/store.js";
import type { ChatExchange } from "../setups/types.js";

import {
  chatExchangeSchema,
  createExchange,
  tail,
  type ChatHistoryOptions,
  type ChatHistoryStore,
  type NewChatExchange,
} from "./store.js";

export interface FileChatHistoryOptions extends ChatHistoryOptions {
  /** Directory holding `history.jsonl`. */
  readonly directory: string;
  readonly fsyncMode?: FsyncMode;
  readonly log?: (level: "warn" | "info", message: string) => void;
}

/** Chat history persisted as one JSON line per exchange. */
export class FileChatHistory implements ChatHistoryStore {
  private readonly journal: JsonlJournal;
  private readonly clock: () => number;
  private readonly idFactory: () => string;
  private readonly log: (level: "warn" | "info", message: string) => void;
  private readonly entries: ChatExchange[] = [];
  private ready: Promise<void> | null = null;

  constructor(options: FileChatHistoryOptions) {
    this.clock = options.clock ?? (() => Date.now());
    this.idFactory = options.idFactory ?? randomUUID;
    this.log = options.log ?? (() => {});
    this.journal = new JsonlJournal({
      directory: options.directory,
      fileName: "history.jsonl",
      fsyncMode: options.fsyncMode,
      log: this.log,
    });
  }

  initialise(): Promise<void> {
    if (!this.ready) {
      this.ready = this.load().catch((error: unknown) => {
        this.ready = null;
        throw new StoreError("initialise", `Failed to open history journal ${this.journal.journalPath}`, {
          cause: error,
        });
      });
    }
    return this.ready;
  }

  async append(input: NewChatExchange): Promise<ChatExchange> {
    await this.initialise();
    const exchange = createExchange(input, this.clock(), this.idFactory);
    try {
      await this.journal.append(exchange);
    } catch (error) {
      throw new StoreError("appendHistory", "Failed to persist chat exchange", { cause: error });
    }
    this.entries.push(exchange);
    return exchange;
  }

  async list(limit?: number): Promise<ChatExchange[]> {
    await this.initialise();
    return tail(this.entries, limit);
  }

  async size(): Promise<number> {
    await this.initialise();
    return this.entries.length;
  }

  async dispose(): Promise<void> {
    if (this.ready) {
      await this.ready.catch(() => undefined);
    }
    await this.journal.close();
    this.ready = null;
  }

  private async load(): Promise<void> {
    this.entries.length = 0;
    for (const entry of await this.journal.open()) {
      const parsed = chatExchangeSchema.safeParse(entry);
      if (!parsed.success) {
        this.log("warn", "Skipping malformed history journal entry");
        continue;
      }
      this.entries.push(Object.freeze(parsed.data));
    }
  }
}

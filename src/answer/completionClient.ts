import { z } from "zod";

import type { CompletionConfig } from "../config/appConfig.js";

import type { AssembledContext } from "./contextAssembler.js";

export const ERROR_COMPLETION_HTTP = "E-COMPLETION-HTTP" as const;
export const ERROR_COMPLETION_SCHEMA = "E-COMPLETION-SCHEMA" as const;
export const ERROR_COMPLETION_NETWORK = "E-COMPLETION-NETWORK" as const;
export const ERROR_COMPLETION_TIMEOUT = "E-COMPLETION-TIMEOUT" as const;
export const ERROR_COMPLETION_AUTH = "E-COMPLETION-AUTH" as const;

export type ProviderErrorCode =
  | typeof ERROR_COMPLETION_HTTP
  | typeof ERROR_COMPLETION_SCHEMA
  | typeof ERROR_COMPLETION_NETWORK
  | typeof ERROR_COMPLETION_TIMEOUT
  | typeof ERROR_COMPLETION_AUTH;

/** Error raised when the completion provider cannot produce an answer. */
export class ProviderError extends Error {
  public readonly code: ProviderErrorCode;
  public readonly provider: string;
  public readonly status: number | null;

  constructor(
    message: string,
    options: { code: ProviderErrorCode; provider: string; status?: number | null; cause?: unknown },
  ) {
    super(message, { cause: options.cause });
    this.name = "ProviderError";
    this.code = options.code;
    this.provider = options.provider;
    this.status = options.status ?? null;
  }
}

export interface CompletionOptions {
  readonly signal?: AbortSignal;
}

/** Language model backend turning an assembled context into an answer. */
export interface CompletionProvider {
  readonly name: string;
  complete(context: AssembledContext, options?: CompletionOptions): Promise<string>;
}

const chatCompletionSchema = z
  .object({
    choices: z
      .array(
        z
          .object({
            message: z.object({ content: z.string() }).passthrough(),
          })
          .passthrough(),
      )
      .min(1),
  })
  .passthrough();

/** Client for an OpenAI-compatible `/chat/completions` endpoint. */
export class TogetherCompletionClient implements CompletionProvider {
  readonly name = "together";
  private readonly config: CompletionConfig;
  private readonly fetchImpl: typeof fetch;

  constructor(config: CompletionConfig, fetchImpl: typeof fetch = fetch) {
    this.config = config;
    this.fetchImpl = fetchImpl;
  }

  async complete(context: AssembledContext, options: CompletionOptions = {}): Promise<string> {
    if (!this.config.apiKey) {
      throw new ProviderError("No API key configured for the completion provider", {
        code: ERROR_COMPLETION_AUTH,
        provider: this.name,
      });
    }

    const body = {
      model: this.config.model,
      messages: [
        { role: "system", content: context.system },
        { role: "user", content: context.user },
      ],
      temperature: this.config.temperature,
      max_tokens: this.config.maxTokens,
    };

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.config.baseUrl.replace(/\/+$/, "")}/chat/completions`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body: JSON.stringify(body),
        signal: options.signal,
      });
    } catch (error) {
      const aborted = options.signal?.aborted || (error instanceof Error && error.name === "AbortError");
      throw new ProviderError(aborted ? "Completion request timed out" : "Completion request failed", {
        code: aborted ? ERROR_COMPLETION_TIMEOUT : ERROR_COMPLETION_NETWORK,
        provider: this.name,
        cause: error,
      });
    }

    if (response.status === 401 || response.status === 403) {
      throw new ProviderError(`Completion provider rejected the API key (HTTP ${response.status})`, {
        code: ERROR_COMPLETION_AUTH,
        provider: this.name,
        status: response.status,
      });
    }
    if (!response.ok) {
      throw new ProviderError(`Completion provider responded with HTTP ${response.status}`, {
        code: ERROR_COMPLETION_HTTP,
        provider: this.name,
        status: response.status,
      });
    }

    let parsed: unknown;
    try {
      parsed = await response.json();
    } catch (error) {
      throw new ProviderError("Unable to parse completion payload", {
        code: ERROR_COMPLETION_SCHEMA,
        provider: this.name,
        status: response.status,
        cause: error,
      });
    }

    const result = chatCompletionSchema.safeParse(parsed);
    if (!result.success) {
      throw new ProviderError("Completion payload did not match the expected schema", {
        code: ERROR_COMPLETION_SCHEMA,
        provider: this.name,
        status: response.status,
        cause: result.error,
      });
    }
    const content = result.data.choices[0]?.message.content.trim() ?? "";
    if (content.length === 0) {
      throw new ProviderError("Completion provider returned an empty message", {
        code: ERROR_COMPLETION_SCHEMA,
        provider: this.name,
        status: response.status,
      });
    }
    return content;
  }
}

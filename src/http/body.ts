import { Buffer } from "node:buffer";

/** Default upper bound on request bodies (64 KiB). */
export const DEFAULT_MAX_BODY_BYTES = 64 * 1024;

/** Error raised when a request target or body cannot be accepted. Carries the HTTP status to answer with. */
export class RequestBodyError extends Error {
  public readonly status: 400 | 413;
  public readonly code: "E-VALIDATION" | "E-PAYLOAD-TOO-LARGE";

  constructor(status: 400 | 413, message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "RequestBodyError";
    this.status = status;
    this.code = status === 413 ? "E-PAYLOAD-TOO-LARGE" : "E-VALIDATION";
  }
}

/** Structured JSON payload returned by {@link readJsonBody}. */
export interface JsonBody {
  readonly parsed: unknown;
  /** Number of bytes read from the stream. */
  readonly bytes: number;
}

/**
 * Reads and parses a JSON payload while enforcing an upper bound on the
 * number of bytes accepted. An empty body parses as `{}` so routes whose
 * fields are all optional accept a bare POST.
 */
export async function readJsonBody(
  stream: AsyncIterable<Buffer | string | Uint8Array>,
  maxBytes = DEFAULT_MAX_BODY_BYTES,
): Promise<JsonBody> {
  const buffers: Buffer[] = [];
  let totalBytes = 0;

  for await (const chunk of stream) {
    const buffer = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk);
    totalBytes += buffer.length;
    if (totalBytes > maxBytes) {
      throw new RequestBodyError(413, `Request body exceeds ${maxBytes} bytes`);
    }
    buffers.push(buffer);
  }

  const raw = Buffer.concat(buffers).toString("utf8");
  if (raw.trim().length === 0) {
    return { parsed: {}, bytes: totalBytes };
  }
  try {
    return { parsed: JSON.parse(raw), bytes: totalBytes };
  } catch (error) {
    throw new RequestBodyError(400, "Request body is not valid JSON", { cause: error });
  }
}

export interface RecordedRequest {
  readonly url: string;
  readonly init: RequestInit | undefined;
}

export type FetchRecorder = RecordedRequest[];

/** A canned response, or a function producing one (it may throw to simulate a network error). */
export type FetchStep = Response | ((request: RecordedRequest) => Response | Promise<Response>);

/**
 * Builds a `fetch` replacement answering with {@link sequence} in order and
 * recording every call. Running out of steps fails the test.
 */
export function createFetchStub(sequence: readonly FetchStep[], recorder: FetchRecorder = []): typeof fetch {
  const steps = [...sequence];
  return async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const request: RecordedRequest = {
      url: typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url,
      init,
    };
    recorder.push(request);
    const next = steps.shift();
    if (!next) {
      throw new Error(`Unexpected fetch call in test: ${request.url}`);
    }
    return typeof next === "function" ? next(request) : next;
  };
}

export function jsonResponse(payload: unknown, status = 200, contentType = "application/json"): () => Response {
  return () =>
    new Response(JSON.stringify(payload), {
      status,
      headers: { "content-type": contentType },
    });
}

export function htmlResponse(html: string, status = 200): () => Response {
  return () =>
    new Response(html, {
      status,
      headers: { "content-type": "text/html; charset=utf-8" },
    });
}

/** Step rejecting like `fetch` does on DNS or socket failures. */
export function networkFailure(message = "socket hang up"): () => Response {
  return () => {
    throw new TypeError(message);
  };
}

/** Step that never settles until the request signal aborts, then rejects with an AbortError. */
export function hangingResponse(): (request: RecordedRequest) => Promise<Response> {
  return (request) =>
    new Promise<Response>((_, reject) => {
      const signal = request.init?.signal;
      if (!signal) {
        return;
      }
      const abort = () => {
        const error = new Error("The operation was aborted");
        error.name = "AbortError";
        reject(error);
      };
      if (signal.aborted) {
        abort();
      } else {
        signal.addEventListener("abort", abort, { once: true });
      }
    });
}

export function headerOf(request: RecordedRequest | undefined, name: string): string | null {
  return new Headers(request?.init?.headers).get(name);
}

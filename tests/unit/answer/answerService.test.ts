import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { AnswerService, type SearchResolver } from "../../../src/answer/answerService.js";
import { ProviderError, type CompletionProvider } from "../../../src/answer/completionClient.js";
import type { AssembledContext } from "../../../src/answer/contextAssembler.js";
import { canonicalJson } from "../../../src/answer/setupExtraction.js";
import { InMemoryChatHistory } from "../../../src/history/store.js";
import type { SearchResolution } from "../../../src/search/fallbackChain.js";
import { InMemorySetupStore } from "../../../src/setups/storeMemory.js";
import { makeSetup, steppingClock } from "../../helpers/setups.js";
import { RecordingLogger } from "../../helpers/recordingLogger.js";

const PROMPT = "Setup for BMW M4 GT3 at Monza";
const GENERATED = { tire_pressure_front: 26.5, brake_bias: 54 };
const SETUP_RESPONSE = `Here is your setup:\n\`\`\`json\n${JSON.stringify(GENERATED)}\n\`\`\``;

function fakeSearch(formatted = "- Monza guide: https://a.test/monza"): SearchResolver & { queries: string[] } {
  const queries: string[] = [];
  return {
    queries,
    async resolve(query: string): Promise<SearchResolution> {
      queries.push(query);
      return { query, provider: "brave", results: [], formatted, attempts: [] };
    },
  };
}

class FakeCompletion implements CompletionProvider {
  readonly name = "fake";
  readonly contexts: AssembledContext[] = [];
  readonly signals: (AbortSignal | undefined)[] = [];

  constructor(private readonly behaviour: () => Promise<string>) {}

  complete(context: AssembledContext, options: { signal?: AbortSignal } = {}): Promise<string> {
    this.contexts.push(context);
    this.signals.push(options.signal);
    return this.behaviour();
  }
}

function createService(completion: CompletionProvider, overrides: { completionTimeoutMs?: number } = {}) {
  const setups = new InMemorySetupStore({ clock: steppingClock() });
  const history = new InMemoryChatHistory({ clock: steppingClock(), idFactory: () => "exchange-1" });
  const search = fakeSearch();
  const logger = new RecordingLogger();
  const service = new AnswerService({
    search,
    completion,
    setups,
    history,
    recentSetupLimit: 2,
    completionTimeoutMs: overrides.completionTimeoutMs,
    logger,
  });
  return { service, setups, history, search, logger };
}

describe("answer/answerService", () => {
  it("answers with search and recent setups in the context, then records the exchange", async () => {
    const completion = new FakeCompletion(async () => "Use wing 5 and 54% brake bias.");
    const { service, setups, history, search } = createService(completion);
    await setups.insertIfAbsent(makeSetup({ track: "Spa" }));
    await setups.insertIfAbsent(makeSetup({ track: "Imola" }));
    await setups.insertIfAbsent(makeSetup({ track: "Suzuka" }));

    const outcome = await service.answer(`  ${PROMPT}  `);

    expect(search.queries).to.deep.equal([PROMPT]);
    expect(completion.contexts[0]?.user).to.equal(
      [
        `User request: ${PROMPT}`,
        "",
        "Search results:",
        "- Monza guide: https://a.test/monza",
        "",
        "Recently collected setups:",
        "- Porsche 911 GT3 R at Suzuka → https://setups.test/porsche-spa",
        "- Porsche 911 GT3 R at Imola → https://setups.test/porsche-spa",
        "",
        "Please provide the detailed setup parameters or a full expert setup.",
      ].join("\n"),
    );
    expect(outcome.ok).to.equal(true);
    if (outcome.ok) {
      expect(outcome.response).to.equal("Use wing 5 and 54% brake bias.");
      expect(outcome.setup).to.equal(null);
      expect(outcome.exchange).to.deep.equal({
        id: "exchange-1",
        prompt: PROMPT,
        response: "Use wing 5 and 54% brake bias.",
        timestamp: "2024-05-01T10:00:00.000Z",
      });
    }
    expect(await history.size()).to.equal(1);
    expect(await setups.size()).to.equal(3);
  });

  it("stores a generated setup once and recognises it on the next identical answer", async () => {
    const completion = new FakeCompletion(async () => SETUP_RESPONSE);
    const { service, setups, history } = createService(completion);

    const first = await service.answer(PROMPT);
    const second = await service.answer(PROMPT);

    const expectedFingerprint = makeSetup({
      car: "BMW M4 GT3",
      track: "Monza",
      notes: canonicalJson(GENERATED),
    }).fingerprint;
    expect(first.ok && first.setup).to.deep.equal({ fingerprint: expectedFingerprint, inserted: true });
    expect(second.ok && second.setup).to.deep.equal({ fingerprint: expectedFingerprint, inserted: false });
    expect(await history.size()).to.equal(2);
    const [stored] = await setups.recent(1);
    expect(stored).to.deep.include({ car: "BMW M4 GT3", track: "Monza", url: "N/A", source: "ai" });
  });

  it("skips a generated setup identical to one already collected from a site", async () => {
    const completion = new FakeCompletion(async () => SETUP_RESPONSE);
    const { service, setups } = createService(completion);
    await setups.insertIfAbsent(
      makeSetup({ car: "BMW M4 GT3", track: "Monza", notes: canonicalJson(GENERATED), source: "scraped-site-b" }),
    );

    const outcome = await service.answer(PROMPT);

    expect(outcome.ok && outcome.setup?.inserted).to.equal(false);
    expect(await setups.size()).to.equal(1);
    expect((await setups.recent(1))[0]?.source).to.equal("scraped-site-b");
  });

  it("keeps the answer but stores no setup when the prompt names no car", async () => {
    const completion = new FakeCompletion(async () => SETUP_RESPONSE);
    const { service, setups, history, logger } = createService(completion);

    const outcome = await service.answer("Best Monza setup please");

    expect(outcome.ok && outcome.setup).to.equal(null);
    expect(await history.size()).to.equal(1);
    expect(await setups.size()).to.equal(0);
    expect(logger.find("answer_setup_unresolved")?.level).to.equal("info");
  });

  it("returns the provider error and persists nothing when the completion fails", async () => {
    const completion = new FakeCompletion(async () => {
      throw new ProviderError("Completion provider responded with HTTP 503", {
        code: "E-COMPLETION-HTTP",
        provider: "together",
        status: 503,
      });
    });
    const { service, setups, history, logger } = createService(completion);

    const outcome = await service.answer(PROMPT);

    expect(outcome.ok).to.equal(false);
    if (!outcome.ok) {
      expect(outcome.error).to.deep.equal({
        code: "E-COMPLETION-HTTP",
        message: "Completion provider responded with HTTP 503",
        provider: "together",
      });
      expect(outcome.search.provider).to.equal("brave");
    }
    expect(await history.size()).to.equal(0);
    expect(await setups.size()).to.equal(0);
    expect(logger.messages("warn")).to.deep.equal(["answer_completion_failed"]);
  });

  it("wraps unexpected completion failures", async () => {
    const completion = new FakeCompletion(async () => {
      throw new Error("kaboom");
    });
    const { service } = createService(completion);

    const outcome = await service.answer(PROMPT);

    expect(outcome.ok ? null : outcome.error).to.deep.equal({
      code: "E-COMPLETION-NETWORK",
      message: "Completion provider failed",
      provider: "fake",
    });
  });

  it("aborts a completion that exceeds its time budget", async () => {
    const clock = sinon.useFakeTimers();
    try {
      const completion = new FakeCompletion(() => new Promise<string>(() => {}));
      const { service, history } = createService(completion, { completionTimeoutMs: 100 });

      const pending = service.answer(PROMPT);
      await clock.tickAsync(100);
      const outcome = await pending;

      expect(outcome.ok ? null : outcome.error).to.deep.equal({
        code: "E-COMPLETION-TIMEOUT",
        message: "Completion exceeded 100ms",
        provider: "fake",
      });
      expect(completion.signals[0]?.aborted).to.equal(true);
      expect(await history.size()).to.equal(0);
    } finally {
      clock.restore();
    }
  });

  it("rejects a blank prompt before doing any work", async () => {
    const completion = new FakeCompletion(async () => "unused");
    const { service, search } = createService(completion);

    let caught: unknown;
    try {
      await service.answer("   ");
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(RangeError);
    expect(search.queries).to.deep.equal([]);
    expect(completion.contexts).to.deep.equal([]);
  });
});

import type { SearchResolution } from "../search/fallbackChain.js";
import type { SetupRecord } from "../setups/types.js";

import { SETUP_ENGINEER_SYSTEM_PROMPT, SETUP_REQUEST_CLOSING } from "./prompts.js";

/** Line rendered when the store has nothing to quote yet. */
export const NO_RECENT_SETUPS = "- none stored yet";

export interface AssembledContext {
  readonly system: string;
  readonly user: string;
}

export interface ContextInput {
  readonly query: string;
  readonly search: Pick<SearchResolution, "formatted">;
  /** Newest first, as returned by the store. */
  readonly recent: readonly Pick<SetupRecord, "car" | "track" | "url">[];
}

export function formatRecentSetups(recent: ContextInput["recent"]): string {
  if (recent.length === 0) {
    return NO_RECENT_SETUPS;
  }
  return recent.map((setup) => `- ${setup.car} at ${setup.track} → ${setup.url}`).join("\n");
}

/**
 * Builds the two prompt messages sent to the completion provider. Pure: the
 * same input always produces the same strings.
 */
export function assembleContext(input: ContextInput): AssembledContext {
  const user = [
    `User request: ${input.query.trim()}`,
    "",
    "Search results:",
    input.search.formatted,
    "",
    "Recently collected setups:",
    formatRecentSetups(input.recent),
    "",
    SETUP_REQUEST_CLOSING,
  ].join("\n");
  return { system: SETUP_ENGINEER_SYSTEM_PROMPT, user };
}

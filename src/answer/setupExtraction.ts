import { normalizeRawItem, type NormalizationOutcome } from "../setups/normalizer.js";

import { REQUIRED_SETUP_KEY } from "./prompts.js";

export type SetupObject = Readonly<Record<string, unknown>>;

const FENCED_BLOCK = /```(?:json)?\s*\n?([\s\S]*?)```/gi;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseSetup(text: string): SetupObject | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  return isPlainObject(parsed) && REQUIRED_SETUP_KEY in parsed ? parsed : null;
}

/**
 * Finds a setup object in a completion body: the whole body first, then each
 * fenced code block in order. Only objects carrying the required key count.
 */
export function extractSetupObject(response: string): SetupObject | null {
  const whole = parseSetup(response.trim());
  if (whole) {
    return whole;
  }
  for (const match of response.matchAll(FENCED_BLOCK)) {
    const block = match[1]?.trim();
    if (!block) {
      continue;
    }
    const setup = parseSetup(block);
    if (setup) {
      return setup;
    }
  }
  return null;
}

/** JSON with object keys sorted at every depth, so equal setups serialise identically. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((entry) => sortKeys(entry));
  }
  if (isPlainObject(value)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key]);
    }
    return sorted;
  }
  return value;
}

/**
 * Normalises a generated setup like any other source item: the prompt is the
 * title (car and track come from "for <car> at <track>") and the canonical
 * JSON is the notes.
 */
export function normalizeGeneratedSetup(prompt: string, setup: SetupObject): NormalizationOutcome {
  return normalizeRawItem({ source: "ai", url: null, title: prompt, body: canonicalJson(setup) });
}

import { createHash } from "node:crypto";

import { describe, it } from "mocha";
import { expect } from "chai";

import {
  FINGERPRINT_PATTERN,
  computeSetupFingerprint,
  fingerprintCandidate,
} from "../../../src/setups/fingerprint.js";

describe("setups/fingerprint", () => {
  it("hashes the lower-cased car, track and notes joined by pipes", () => {
    const expected = createHash("sha256").update("bmw m4 gt3|monza|wing 5", "utf8").digest("hex");

    expect(computeSetupFingerprint("BMW M4 GT3", "Monza", "Wing 5")).to.equal(expected);
  });

  it("treats missing notes as an empty string", () => {
    expect(computeSetupFingerprint("BMW M4 GT3", "Monza", null)).to.equal(
      computeSetupFingerprint("bmw m4 gt3", "MONZA", ""),
    );
  });

  it("ignores provenance so the same content from two sources collides", () => {
    const fromSiteA = fingerprintCandidate({
      car: "BMW M4 GT3",
      track: "Monza",
      url: "https://a.test/1",
      source: "scraped-site-a",
      notes: "Wing 5",
    });
    const fromSocial = fingerprintCandidate({
      car: "bmw m4 gt3",
      track: "monza",
      url: "https://b.test/2",
      source: "social-api",
      notes: "wing 5",
    });

    expect(fromSiteA.fingerprint).to.equal(fromSocial.fingerprint);
    expect(fromSiteA.fingerprint).to.match(FINGERPRINT_PATTERN);
  });

  it("distinguishes different notes", () => {
    expect(computeSetupFingerprint("BMW M4 GT3", "Monza", "Wing 5")).to.not.equal(
      computeSetupFingerprint("BMW M4 GT3", "Monza", "Wing 6"),
    );
  });
});

import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    assert.deepEqual(loadConfig({}), {
      port: 3001,
      labelConfidenceThreshold: 0.5,
      frontConfidenceThreshold: 0.3,
      lineTolerance: 0.02,
      vndToInrRate: 0.0033,
      priceLookupTimeoutMs: 5000,
      priceLookupMode: "off",
      scanRateLimitPerMinute: 30,
    });
  });

  it("reads overrides and ignores values that are not numbers", () => {
    const config = loadConfig({ PORT: "8080", PRICE_LOOKUP_MODE: "MOCK", VND_TO_INR_RATE: "abc" });
    assert.equal(config.port, 8080);
    assert.equal(config.priceLookupMode, "mock");
    assert.equal(config.vndToInrRate, 0.0033);
  });
});

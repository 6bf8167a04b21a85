import test from "node:test";
import assert from "node:assert/strict";
import { getLboConfig } from "../lib/config";

test("getLboConfig falls back to defaults", () => {
  assert.deepEqual(getLboConfig({}), {
    trace: false,
    irrMaxIterations: 100,
    irrTolerance: 1e-12,
    irrGuess: 0.1,
    defaultProjectionYears: 5,
    maxProjectionYears: 50,
  });
});

test("getLboConfig reads overrides from the environment", () => {
  const config = getLboConfig({
    LBO_TRACE: "TRUE",
    LBO_IRR_MAX_ITERATIONS: "250",
    LBO_IRR_TOLERANCE: "1e-9",
    LBO_IRR_GUESS: "0.2",
    LBO_DEFAULT_PROJECTION_YEARS: "7",
    LBO_MAX_PROJECTION_YEARS: "30",
  });

  assert.equal(config.trace, true);
  assert.equal(config.irrMaxIterations, 250);
  assert.equal(config.irrTolerance, 1e-9);
  assert.equal(config.irrGuess, 0.2);
  assert.equal(config.defaultProjectionYears, 7);
  assert.equal(config.maxProjectionYears, 30);
});

test("getLboConfig ignores malformed values", () => {
  const config = getLboConfig({
    LBO_TRACE: "yes",
    LBO_IRR_MAX_ITERATIONS: "2.5",
    LBO_IRR_TOLERANCE: "-1",
    LBO_IRR_GUESS: "-3",
    LBO_DEFAULT_PROJECTION_YEARS: "five",
    LBO_MAX_PROJECTION_YEARS: "0",
  });

  assert.equal(config.trace, false);
  assert.equal(config.irrMaxIterations, 100);
  assert.equal(config.irrTolerance, 1e-12);
  assert.equal(config.irrGuess, 0.1);
  assert.equal(config.defaultProjectionYears, 5);
  assert.equal(config.maxProjectionYears, 50);
});

test("LBO_TRACE=1 enables tracing", () => {
  assert.equal(getLboConfig({ LBO_TRACE: "1" }).trace, true);
});

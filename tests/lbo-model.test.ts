import test from "node:test";
import assert from "node:assert/strict";
import {
  buildLboModel,
  createMemoryTraceSink,
  LboInputError,
  serializeLboModel,
  verifyDecompositionIdentity,
} from "../lib/lbo";
import { Decimal } from "../lib/math";
import { approxEqual, SCENARIO_A } from "./helpers";

test("buildLboModel passes its roll-forward and identity checks", () => {
  const model = buildLboModel(SCENARIO_A);

  assert.equal(model.checks.debtRollForward.passed, true);
  assert.equal(model.checks.cashRollForward.passed, true);
  assert.equal(model.checks.decompositionIdentity.passed, true);
  assert.ok(model.buildDurationMs >= 0);
});

test("credit stats follow the debt schedule", () => {
  const { creditStats } = buildLboModel(SCENARIO_A);
  const [year1, year2] = creditStats;

  assert.equal(creditStats.length, 5);
  assert.equal(year1.year, 1);
  assert.equal(year1.netDebt.toNumber(), 773.75);
  assert.equal(year1.interestTaxShield.toNumber(), 16);
  // (110 - 11 - 8.75) / (64 + 26.25)
  assert.equal(year1.debtServiceCoverage?.toNumber(), 1);
  assert.equal(year2.cumulativeDebtRepaid.toNumber(), 61.5);
  approxEqual(year1.netDebtToEBITDA?.toNumber() ?? NaN, 773.75 / 110, 1e-12);
});

test("coverage is absent when there is no debt service", () => {
  const { creditStats } = buildLboModel({ ...SCENARIO_A, entryDebt: 0 });

  assert.equal(creditStats[0].debtServiceCoverage, null);
  assert.ok(creditStats[0].netDebt.lt(0));
});

test("buildLboModel rejects invalid assumptions before projecting", () => {
  const sink = createMemoryTraceSink();

  assert.throws(
    () => buildLboModel({ ...SCENARIO_A, entryEBITDA: 0 }, { trace: sink }),
    (error: unknown) =>
      error instanceof LboInputError && error.issues.includes("entryEBITDA must be positive")
  );
  assert.equal(sink.events.length, 0);
});

test("buildLboModel traces start and completion", () => {
  const sink = createMemoryTraceSink();
  buildLboModel(SCENARIO_A, { trace: sink });

  const messages = sink.events.map((event) => `${event.scope}:${event.message}`);
  assert.equal(messages[0], "Model:Building LBO model");
  assert.equal(messages[messages.length - 1], "Model:LBO model complete");
  assert.ok(messages.includes("Returns:Returns analyzed"));
});

test("decomposition identity check flags an inconsistent attribution", () => {
  const check = verifyDecompositionIdentity({
    ebitdaGrowth: new Decimal(0.05),
    multipleChange: new Decimal(0),
    tevGrowth: new Decimal(0.05),
    yield: new Decimal(0.1),
    covariance: new Decimal(-0.01),
    unleveredIRR: new Decimal(0.14),
    leverageImpact: new Decimal(0.06),
    leveredIRR: new Decimal(0.25),
  });

  assert.equal(check.passed, false);
  approxEqual(check.error.toNumber(), 0.05, 1e-12);
});

test("serializeLboModel converts decimals to numbers", () => {
  const serialized = serializeLboModel(buildLboModel(SCENARIO_A));

  assert.equal(serialized.assumptions.projectionYears, 5);
  assert.equal(serialized.assumptions.cashPolicy, "RETAIN");
  assert.equal(serialized.schedule[1].endingDebt, 773.75);
  assert.equal(serialized.schedule[1].revenue, null);
  assert.equal(serialized.exitTEV, 3059.969);
  assert.equal(serialized.returns.levered.irrStatus, "CONVERGED");
  assert.equal(serialized.returns.levered.entryEquity, 1200);
  assert.equal(typeof serialized.returns.leveredIRR, "number");
  assert.equal(serialized.returns.decomposition.yield, 0.05);
  assert.equal(serialized.checks.debtRollForward.passed, true);
});

test("serializeLboModel keeps an absent IRR as null with its reason", () => {
  const serialized = serializeLboModel(buildLboModel({ ...SCENARIO_A, entryDebt: 2000 }));

  assert.equal(serialized.returns.leveredIRR, null);
  assert.equal(serialized.returns.levered.irr, null);
  assert.equal(serialized.returns.levered.irrStatus, "NO_SIGN_CHANGE");
  assert.equal(serialized.returns.decomposition.leverageImpact, null);
});

test("serializeLboModel reports a solve that ran out of iterations", () => {
  const model = buildLboModel(SCENARIO_A, { irr: { maxIterations: 1 } });
  const serialized = serializeLboModel(model);

  assert.equal(serialized.returns.leveredIRR, null);
  assert.equal(serialized.returns.levered.irr, null);
  assert.equal(serialized.returns.levered.irrStatus, "DID_NOT_CONVERGE");
  assert.equal(serialized.returns.unlevered.irrStatus, "DID_NOT_CONVERGE");
  assert.equal(model.checks.decompositionIdentity.passed, true);
});

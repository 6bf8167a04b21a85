import test from "node:test";
import assert from "node:assert/strict";
import { LboInputError, parseAssumptionsPayload, resolveAssumptions } from "../lib/lbo";
import { SCENARIO_A } from "./helpers";

const issuesOf = (fn: () => unknown): string[] => {
  try {
    fn();
  } catch (error) {
    if (error instanceof LboInputError) return error.issues;
    throw error;
  }
  assert.fail("Expected LboInputError");
};

test("resolveAssumptions applies defaults", () => {
  const { projectionYears, ...rest } = SCENARIO_A;
  const resolved = resolveAssumptions(rest);

  assert.equal(resolved.projectionYears, 5);
  assert.equal(resolved.sweepPercent.toNumber(), 1);
  assert.equal(resolved.cashPolicy, "RETAIN");
  assert.equal(resolved.shortfallPolicy, "NEGATIVE_CASH");
  assert.equal(resolved.entryRevenue, null);
  assert.ok(resolved.revenueCAGR.eq(resolved.ebitdaCAGR));
  assert.equal(projectionYears, 5);
  assert.ok(Object.isFrozen(resolved));
});

test("resolveAssumptions accepts numeric strings", () => {
  const resolved = resolveAssumptions({ ...SCENARIO_A, entryEBITDA: "100", taxRate: "0.25" });

  assert.equal(resolved.entryEBITDA.toNumber(), 100);
  assert.equal(resolved.taxRate.toNumber(), 0.25);
});

test("non-positive entry EBITDA is rejected", () => {
  assert.deepEqual(issuesOf(() => resolveAssumptions({ ...SCENARIO_A, entryEBITDA: 0 })), [
    "entryEBITDA must be positive",
  ]);
  assert.deepEqual(issuesOf(() => resolveAssumptions({ ...SCENARIO_A, entryEBITDA: -5 })), [
    "entryEBITDA must be positive",
  ]);
});

test("projection horizon must be a positive integer", () => {
  assert.deepEqual(issuesOf(() => resolveAssumptions({ ...SCENARIO_A, projectionYears: -1 })), [
    "projectionYears must be a positive integer",
  ]);
  assert.deepEqual(issuesOf(() => resolveAssumptions({ ...SCENARIO_A, projectionYears: 2.5 })), [
    "projectionYears must be a positive integer",
  ]);
});

test("projection horizon is capped", () => {
  assert.deepEqual(issuesOf(() => resolveAssumptions({ ...SCENARIO_A, projectionYears: 51 })), [
    "projectionYears must be at most 50",
  ]);
  assert.deepEqual(issuesOf(() => resolveAssumptions({ ...SCENARIO_A, projectionYears: 20000 })), [
    "projectionYears must be at most 50",
  ]);
  assert.equal(resolveAssumptions({ ...SCENARIO_A, projectionYears: 50 }).projectionYears, 50);
});

test("every problem is reported at once", () => {
  const issues = issuesOf(() =>
    resolveAssumptions({
      ...SCENARIO_A,
      entryTEV: "abc",
      taxRate: 1.5,
      interestRate: -0.01,
      sweepPercent: 2,
    })
  );

  assert.deepEqual(issues, [
    "entryTEV must be a finite number",
    "entryTEV must be positive",
    "taxRate must be between 0 and 1",
    "interestRate must be non-negative",
    "sweepPercent must be between 0 and 1",
  ]);
});

test("entry debt above entry TEV is allowed", () => {
  const resolved = resolveAssumptions({ ...SCENARIO_A, entryDebt: 2500 });
  assert.equal(resolved.entryDebt.toNumber(), 2500);
});

test("parseAssumptionsPayload reads nested and flat bodies", () => {
  const nested = parseAssumptionsPayload({ assumptions: { ...SCENARIO_A, cashPolicy: "DISTRIBUTE" } });
  assert.equal(nested.entryTEV, 2000);
  assert.equal(nested.cashPolicy, "DISTRIBUTE");
  assert.equal(nested.projectionYears, 5);

  const flat = parseAssumptionsPayload({ ...SCENARIO_A, projectionYears: "7", sweepPercent: "0.5" });
  assert.equal(flat.projectionYears, 7);
  assert.equal(flat.sweepPercent, "0.5");
  assert.equal(flat.cashPolicy, undefined);
});

test("parseAssumptionsPayload reports missing and mistyped fields", () => {
  const { entryTEV, ...withoutTev } = SCENARIO_A;
  assert.equal(entryTEV, 2000);

  assert.deepEqual(
    issuesOf(() => parseAssumptionsPayload({ ...withoutTev, taxRate: true, cashPolicy: "HOARD" })),
    [
      "Missing required field: entryTEV",
      "taxRate must be a number",
      "cashPolicy must be one of RETAIN, DISTRIBUTE",
    ]
  );
  assert.deepEqual(issuesOf(() => parseAssumptionsPayload("nope")), ["Request body must be a JSON object"]);
  assert.deepEqual(issuesOf(() => parseAssumptionsPayload([1, 2])), ["Request body must be a JSON object"]);
});

test("parseAssumptionsPayload only takes integers or integer strings as the horizon", () => {
  assert.equal(parseAssumptionsPayload({ ...SCENARIO_A, projectionYears: 3 }).projectionYears, 3);
  assert.equal(parseAssumptionsPayload({ ...SCENARIO_A, projectionYears: " 4 " }).projectionYears, 4);

  for (const projectionYears of [[3], true, "", "3.5", 2.5, { years: 3 }]) {
    assert.deepEqual(
      issuesOf(() => parseAssumptionsPayload({ ...SCENARIO_A, projectionYears })),
      ["projectionYears must be an integer"]
    );
  }
});

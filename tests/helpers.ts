import assert from "node:assert/strict";
import type { Decimal } from "../lib/math";
import type { LboAssumptionsInput } from "../lib/lbo";

export const approxEqual = (actual: number, expected: number, tolerance = 1e-6) => {
  assert.ok(
    Math.abs(actual - expected) <= tolerance,
    `Expected ${actual} to be within ${tolerance} of ${expected}`
  );
};

export const requireDecimal = (value: Decimal | null, label = "value"): Decimal => {
  assert.ok(value !== null, `Expected ${label} to be present`);
  return value;
};

// 20x entry, 19x exit, 40% leverage
export const SCENARIO_A: LboAssumptionsInput = {
  entryEBITDA: 100,
  ebitdaCAGR: 0.1,
  entryTEV: 2000,
  exitMultiple: 19,
  entryDebt: 800,
  taxRate: 0.25,
  interestRate: 0.08,
  capexPct: 0.1,
  projectionYears: 5,
};

// Flat EBITDA, capex eats half of it, interest exceeds EBIT
export const SHORTFALL_CASE: LboAssumptionsInput = {
  entryEBITDA: 100,
  ebitdaCAGR: 0,
  entryTEV: 1000,
  exitMultiple: 10,
  entryDebt: 800,
  taxRate: 0.25,
  interestRate: 0.1,
  capexPct: 0.5,
  projectionYears: 3,
};

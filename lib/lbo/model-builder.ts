// lib/lbo/model-builder.ts
// Full LBO model: projection → returns → credit stats → checks

import {
  calculateCreditStats,
  verifyCashRollForward,
  verifyDebtRollForward,
  verifyDecompositionIdentity,
} from './checks';
import { project } from './projection-engine';
import { analyze } from './return-analyzer';
import { defaultTraceSink } from './trace';
import type { TraceSink } from './trace';
import type { IrrSolverOptions, LboAssumptionsInput, LboModelOutput } from './types';
import { resolveAssumptions } from './validation';

export interface BuildLboModelOptions {
  trace?: TraceSink;
  irr?: IrrSolverOptions;
}

/**
 * Build the LBO model. Throws LboInputError on invalid assumptions; an IRR that
 * cannot be solved is reported as null, not thrown.
 */
export function buildLboModel(input: LboAssumptionsInput, options: BuildLboModelOptions = {}): LboModelOutput {
  const startTime = Date.now();
  const trace = options.trace ?? defaultTraceSink();

  const assumptions = resolveAssumptions(input);

  trace.trace({
    scope: 'Model',
    message: 'Building LBO model',
    data: {
      entryTEV: assumptions.entryTEV.toFixed(2),
      entryDebt: assumptions.entryDebt.toFixed(2),
      years: assumptions.projectionYears,
    },
  });

  const projection = project(assumptions, { trace });
  const returns = analyze(assumptions, projection, { trace, irr: options.irr });
  const creditStats = calculateCreditStats(projection.schedule, assumptions.taxRate);

  const checks = {
    debtRollForward: verifyDebtRollForward(projection.schedule),
    cashRollForward: verifyCashRollForward(projection.schedule),
    decompositionIdentity: verifyDecompositionIdentity(returns.decomposition),
  };

  const buildDurationMs = Date.now() - startTime;

  trace.trace({
    scope: 'Model',
    message: 'LBO model complete',
    data: {
      debtCheck: checks.debtRollForward.passed ? 'PASS' : 'FAIL',
      cashCheck: checks.cashRollForward.passed ? 'PASS' : 'FAIL',
      identityCheck: checks.decompositionIdentity.passed ? 'PASS' : 'FAIL',
      buildDurationMs,
    },
  });

  return {
    projection,
    returns,
    creditStats,
    checks,
    buildDurationMs,
  };
}

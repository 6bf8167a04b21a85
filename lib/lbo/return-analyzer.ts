// lib/lbo/return-analyzer.ts
// Equity returns: levered vs unlevered IRR and IRR attribution

import { Decimal, FinMath, ONE, ZERO } from '@/lib/math';
import { solveIrr } from './irr-solver';
import { project } from './projection-engine';
import { defaultTraceSink } from './trace';
import type { TraceSink } from './trace';
import type {
  EquityCase,
  IrrDecomposition,
  IrrSolverOptions,
  LboAssumptionsInput,
  ProjectionResult,
  ReturnSummary,
} from './types';
import { resolveAssumptions } from './validation';

export interface AnalyzeOptions {
  trace?: TraceSink;
  irr?: IrrSolverOptions;
}

/**
 * Equity cash flows seen by the sponsor:
 *   [-entryEquity, f_1, ..., f_N + exitEquity]
 * where f_y = distributions - equity cures.
 * Exit equity nets debt against cash (net-debt convention).
 */
export function buildEquityFlows(projection: ProjectionResult): {
  entryEquity: Decimal;
  exitEquity: Decimal;
  equityFlows: Decimal[];
} {
  const { assumptions, schedule, exitTEV } = projection;
  const last = schedule[schedule.length - 1];

  const entryEquity = assumptions.entryTEV.minus(assumptions.entryDebt);
  const exitEquity = exitTEV.minus(last.endingDebt).plus(last.endingCash);

  const equityFlows = schedule.map((record) =>
    record.year === 0 ? entryEquity.negated() : record.distribution.minus(record.equityCure)
  );
  equityFlows[equityFlows.length - 1] = equityFlows[equityFlows.length - 1].plus(exitEquity);

  return { entryEquity, exitEquity, equityFlows };
}

/**
 * Multiple of invested capital: money returned / money invested.
 */
export function computeMoic(flows: Decimal[]): Decimal | null {
  const invested = FinMath.sum(flows.filter((flow) => flow.lt(0))).negated();
  if (invested.isZero()) return null;
  const returned = FinMath.sum(flows.filter((flow) => flow.gt(0)));
  return returned.div(invested);
}

function evaluateCase(
  projection: ProjectionResult,
  irrOptions: IrrSolverOptions,
  trace: TraceSink
): EquityCase {
  const { entryEquity, exitEquity, equityFlows } = buildEquityFlows(projection);
  return {
    entryEquity,
    exitEquity,
    equityFlows,
    irr: solveIrr(equityFlows, irrOptions, trace),
    moic: computeMoic(equityFlows),
  };
}

/**
 * IRR attribution, annualized over the holding period:
 *   tevGrowth = (1 + ebitdaGrowth)(1 + multipleChange) - 1
 *   covariance = unleveredIRR - (tevGrowth + yield)
 *   leverageImpact = leveredIRR - unleveredIRR
 * so leveredIRR = tevGrowth + yield + covariance + leverageImpact.
 */
export function decomposeIrr(params: {
  entryEBITDA: Decimal;
  exitEBITDA: Decimal;
  entryTEV: Decimal;
  exitMultiple: Decimal;
  years: number;
  leveredIRR: Decimal | null;
  unleveredIRR: Decimal | null;
}): IrrDecomposition {
  const { entryEBITDA, exitEBITDA, entryTEV, exitMultiple, years, leveredIRR, unleveredIRR } = params;

  const entryMultiple = entryTEV.div(entryEBITDA);
  const ebitdaGrowth = FinMath.cagr(entryEBITDA, exitEBITDA, years);
  const multipleChange = FinMath.cagr(entryMultiple, exitMultiple, years);
  const tevGrowth = ONE.plus(ebitdaGrowth).times(ONE.plus(multipleChange)).minus(ONE);
  const yieldComponent = ONE.div(entryMultiple);

  const covariance = unleveredIRR ? unleveredIRR.minus(tevGrowth.plus(yieldComponent)) : null;
  const leverageImpact = leveredIRR && unleveredIRR ? leveredIRR.minus(unleveredIRR) : null;

  return {
    ebitdaGrowth,
    multipleChange,
    tevGrowth,
    yield: yieldComponent,
    covariance,
    unleveredIRR,
    leverageImpact,
    leveredIRR,
  };
}

/**
 * Levered returns from the given projection, plus an all-equity counterfactual
 * (same assumptions, entryDebt = 0) for the leverage attribution.
 */
export function analyze(
  input: LboAssumptionsInput,
  projection: ProjectionResult,
  options: AnalyzeOptions = {}
): ReturnSummary {
  const assumptions = resolveAssumptions(input);
  const trace = options.trace ?? defaultTraceSink();
  const irrOptions = options.irr ?? {};

  const levered = evaluateCase(projection, irrOptions, trace);

  // With no debt the counterfactual is the same computation, so reuse it.
  const unleveredProjection = assumptions.entryDebt.isZero()
    ? projection
    : project({ ...assumptions, entryDebt: ZERO }, { trace });
  const unlevered = assumptions.entryDebt.isZero()
    ? levered
    : evaluateCase(unleveredProjection, irrOptions, trace);

  const leveredIRR = levered.irr.converged ? levered.irr.rate : null;
  const unleveredIRR = unlevered.irr.converged ? unlevered.irr.rate : null;

  const decomposition = decomposeIrr({
    entryEBITDA: assumptions.entryEBITDA,
    exitEBITDA: projection.exitEBITDA,
    entryTEV: assumptions.entryTEV,
    exitMultiple: assumptions.exitMultiple,
    years: assumptions.projectionYears,
    leveredIRR,
    unleveredIRR,
  });

  trace.trace({
    scope: 'Returns',
    message: 'Returns analyzed',
    data: {
      entryEquity: levered.entryEquity.toFixed(2),
      exitEquity: levered.exitEquity.toFixed(2),
      leveredIRR: leveredIRR ? leveredIRR.toFixed(6) : null,
      unleveredIRR: unleveredIRR ? unleveredIRR.toFixed(6) : null,
    },
  });

  return {
    levered,
    unlevered,
    leveredIRR,
    unleveredIRR,
    entryMultiple: assumptions.entryTEV.div(assumptions.entryEBITDA),
    decomposition,
  };
}

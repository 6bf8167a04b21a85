// lib/lbo/projection-engine.ts
// Operating projection with debt paydown & cash waterfall

import { Decimal, ONE, ZERO } from '@/lib/math';
import { defaultTraceSink } from './trace';
import type { TraceSink } from './trace';
import type { LboAssumptionsInput, ProjectionResult, YearRecord } from './types';
import { resolveAssumptions } from './validation';

export interface ProjectOptions {
  trace?: TraceSink;
}

/**
 * Value after `years` of compounding: base × (1 + rate)^years
 */
export function compound(base: Decimal, rate: Decimal, years: number): Decimal {
  return base.times(ONE.plus(rate).pow(years));
}

/**
 * Project the income statement, debt and cash balances for years 0..N.
 *
 * Waterfall per year:
 *   EBIT = EBITDA - Capex (D&A assumed equal to Capex)
 *   EBT = EBIT - Interest on beginning debt
 *   Taxes = max(0, EBT × rate), losses carry no value
 *   FCF = EBT - Taxes
 *   Paydown = min(max(0, FCF) × sweep, beginning debt)
 *   Whatever is left is distributed or retained, per cash policy.
 */
export function project(input: LboAssumptionsInput, options: ProjectOptions = {}): ProjectionResult {
  const assumptions = resolveAssumptions(input);
  const trace = options.trace ?? defaultTraceSink();
  const years = assumptions.projectionYears;

  trace.trace({
    scope: 'Projection',
    message: 'Projecting operating model',
    data: {
      years,
      entryDebt: assumptions.entryDebt.toFixed(2),
      cashPolicy: assumptions.cashPolicy,
      shortfallPolicy: assumptions.shortfallPolicy,
    },
  });

  const ebitdaPath: Decimal[] = [];
  for (let year = 0; year <= years; year++) {
    ebitdaPath.push(compound(assumptions.entryEBITDA, assumptions.ebitdaCAGR, year));
  }

  const revenueAt = (year: number) =>
    assumptions.entryRevenue ? compound(assumptions.entryRevenue, assumptions.revenueCAGR, year) : null;

  // Year 0: closing balance sheet, no flows
  const schedule: YearRecord[] = [
    {
      year: 0,
      revenue: revenueAt(0),
      ebitda: ebitdaPath[0],
      capex: ZERO,
      ebit: ZERO,
      interestPayment: ZERO,
      ebt: ZERO,
      taxes: ZERO,
      netIncome: ZERO,
      freeCashFlow: ZERO,
      beginningDebt: assumptions.entryDebt,
      debtPaydown: ZERO,
      endingDebt: assumptions.entryDebt,
      beginningCash: ZERO,
      cashGenerated: ZERO,
      distribution: ZERO,
      equityCure: ZERO,
      endingCash: ZERO,
      fundingShortfall: ZERO,
    },
  ];

  const shortfallYears: number[] = [];
  let prevDebt = assumptions.entryDebt;
  let prevCash = ZERO;

  for (let year = 1; year <= years; year++) {
    const ebitda = ebitdaPath[year];

    // ========================================================================
    // Income statement
    // ========================================================================
    const capex = ebitda.times(assumptions.capexPct);
    const beginningDebt = prevDebt;
    const interestPayment = beginningDebt.times(assumptions.interestRate);
    const ebit = ebitda.minus(capex);
    const ebt = ebit.minus(interestPayment);
    const taxes = Decimal.max(ebt.times(assumptions.taxRate), 0); // No negative taxes
    const netIncome = ebt.minus(taxes);
    const freeCashFlow = netIncome;

    // ========================================================================
    // Debt paydown (no new issuance)
    // ========================================================================
    const cashAvailableForPaydown = Decimal.max(freeCashFlow, 0).times(assumptions.sweepPercent);
    const debtPaydown = Decimal.min(cashAvailableForPaydown, beginningDebt);
    const endingDebt = beginningDebt.minus(debtPaydown);

    // ========================================================================
    // Cash roll-forward
    // ========================================================================
    const beginningCash = prevCash;
    const cashGenerated = freeCashFlow.minus(debtPaydown);
    const fundingShortfall = Decimal.max(freeCashFlow.negated(), 0);

    const distribution =
      assumptions.cashPolicy === 'DISTRIBUTE' ? Decimal.max(cashGenerated, 0) : ZERO;

    const preCureCash = beginningCash.plus(cashGenerated).minus(distribution);
    const equityCure =
      assumptions.shortfallPolicy === 'EQUITY_CURE' ? Decimal.max(preCureCash.negated(), 0) : ZERO;
    const endingCash = preCureCash.plus(equityCure);

    if (fundingShortfall.gt(0)) {
      shortfallYears.push(year);
      trace.trace({
        scope: 'Projection',
        message: 'Funding shortfall',
        data: {
          year,
          shortfall: fundingShortfall.toFixed(2),
          equityCure: equityCure.toFixed(2),
          endingCash: endingCash.toFixed(2),
        },
      });
    }

    schedule.push({
      year,
      revenue: revenueAt(year),
      ebitda,
      capex,
      ebit,
      interestPayment,
      ebt,
      taxes,
      netIncome,
      freeCashFlow,
      beginningDebt,
      debtPaydown,
      endingDebt,
      beginningCash,
      cashGenerated,
      distribution,
      equityCure,
      endingCash,
      fundingShortfall,
    });

    prevDebt = endingDebt;
    prevCash = endingCash;
  }

  const exitEBITDA = ebitdaPath[years];
  const exitTEV = exitEBITDA.times(assumptions.exitMultiple);

  trace.trace({
    scope: 'Projection',
    message: 'Projection complete',
    data: {
      exitEBITDA: exitEBITDA.toFixed(2),
      exitTEV: exitTEV.toFixed(2),
      endingDebt: prevDebt.toFixed(2),
      endingCash: prevCash.toFixed(2),
    },
  });

  return {
    assumptions,
    ebitdaPath,
    schedule: Object.freeze(schedule.map((record) => Object.freeze(record))),
    exitEBITDA,
    exitTEV,
    shortfallYears,
  };
}

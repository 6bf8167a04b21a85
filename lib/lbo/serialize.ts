// lib/lbo/serialize.ts
// Decimal → number conversion for JSON responses and the workbench UI

import { Decimal } from '@/lib/math';
import type {
  CashPolicy,
  CheckResult,
  CreditStats,
  EquityCase,
  IrrDecomposition,
  LboModelOutput,
  ShortfallPolicy,
  YearRecord,
} from './types';

type Serialized<T> = {
  [K in keyof T]: T[K] extends Decimal
    ? number
    : T[K] extends Decimal | null
      ? number | null
      : T[K] extends Decimal[]
        ? number[]
        : T[K];
};

export type SerializedYearRecord = Serialized<YearRecord>;
export type SerializedCreditStats = Serialized<CreditStats>;
export type SerializedDecomposition = Serialized<IrrDecomposition>;
export type SerializedCheck = Serialized<CheckResult>;

export type SerializedEquityCase = {
  entryEquity: number;
  exitEquity: number;
  equityFlows: number[];
  irr: number | null;
  irrStatus: 'CONVERGED' | 'NO_SIGN_CHANGE' | 'DID_NOT_CONVERGE';
  moic: number | null;
};

export type SerializedLboModel = {
  assumptions: {
    entryEBITDA: number;
    ebitdaCAGR: number;
    entryTEV: number;
    exitMultiple: number;
    entryDebt: number;
    taxRate: number;
    interestRate: number;
    capexPct: number;
    projectionYears: number;
    entryRevenue: number | null;
    revenueCAGR: number;
    sweepPercent: number;
    cashPolicy: CashPolicy;
    shortfallPolicy: ShortfallPolicy;
  };
  schedule: SerializedYearRecord[];
  exitEBITDA: number;
  exitTEV: number;
  shortfallYears: number[];
  returns: {
    leveredIRR: number | null;
    unleveredIRR: number | null;
    entryMultiple: number;
    levered: SerializedEquityCase;
    unlevered: SerializedEquityCase;
    decomposition: SerializedDecomposition;
  };
  creditStats: SerializedCreditStats[];
  checks: {
    debtRollForward: SerializedCheck;
    cashRollForward: SerializedCheck;
    decompositionIdentity: SerializedCheck;
  };
  buildDurationMs: number;
};

const num = (value: Decimal) => value.toNumber();
const numOrNull = (value: Decimal | null) => (value ? value.toNumber() : null);

function serializeYear(record: YearRecord): SerializedYearRecord {
  return {
    year: record.year,
    revenue: numOrNull(record.revenue),
    ebitda: num(record.ebitda),
    capex: num(record.capex),
    ebit: num(record.ebit),
    interestPayment: num(record.interestPayment),
    ebt: num(record.ebt),
    taxes: num(record.taxes),
    netIncome: num(record.netIncome),
    freeCashFlow: num(record.freeCashFlow),
    beginningDebt: num(record.beginningDebt),
    debtPaydown: num(record.debtPaydown),
    endingDebt: num(record.endingDebt),
    beginningCash: num(record.beginningCash),
    cashGenerated: num(record.cashGenerated),
    distribution: num(record.distribution),
    equityCure: num(record.equityCure),
    endingCash: num(record.endingCash),
    fundingShortfall: num(record.fundingShortfall),
  };
}

function serializeCase(equityCase: EquityCase): SerializedEquityCase {
  const { irr } = equityCase;
  return {
    entryEquity: num(equityCase.entryEquity),
    exitEquity: num(equityCase.exitEquity),
    equityFlows: equityCase.equityFlows.map(num),
    irr: irr.converged ? num(irr.rate) : null,
    irrStatus: irr.converged ? 'CONVERGED' : irr.reason,
    moic: numOrNull(equityCase.moic),
  };
}

const serializeCheck = (check: CheckResult): SerializedCheck => ({
  passed: check.passed,
  error: num(check.error),
});

export function serializeLboModel(output: LboModelOutput): SerializedLboModel {
  const { projection, returns } = output;
  const { assumptions } = projection;
  const { decomposition } = returns;

  return {
    assumptions: {
      entryEBITDA: num(assumptions.entryEBITDA),
      ebitdaCAGR: num(assumptions.ebitdaCAGR),
      entryTEV: num(assumptions.entryTEV),
      exitMultiple: num(assumptions.exitMultiple),
      entryDebt: num(assumptions.entryDebt),
      taxRate: num(assumptions.taxRate),
      interestRate: num(assumptions.interestRate),
      capexPct: num(assumptions.capexPct),
      projectionYears: assumptions.projectionYears,
      entryRevenue: numOrNull(assumptions.entryRevenue),
      revenueCAGR: num(assumptions.revenueCAGR),
      sweepPercent: num(assumptions.sweepPercent),
      cashPolicy: assumptions.cashPolicy,
      shortfallPolicy: assumptions.shortfallPolicy,
    },
    schedule: projection.schedule.map(serializeYear),
    exitEBITDA: num(projection.exitEBITDA),
    exitTEV: num(projection.exitTEV),
    shortfallYears: [...projection.shortfallYears],
    returns: {
      leveredIRR: numOrNull(returns.leveredIRR),
      unleveredIRR: numOrNull(returns.unleveredIRR),
      entryMultiple: num(returns.entryMultiple),
      levered: serializeCase(returns.levered),
      unlevered: serializeCase(returns.unlevered),
      decomposition: {
        ebitdaGrowth: num(decomposition.ebitdaGrowth),
        multipleChange: num(decomposition.multipleChange),
        tevGrowth: num(decomposition.tevGrowth),
        yield: num(decomposition.yield),
        covariance: numOrNull(decomposition.covariance),
        unleveredIRR: numOrNull(decomposition.unleveredIRR),
        leverageImpact: numOrNull(decomposition.leverageImpact),
        leveredIRR: numOrNull(decomposition.leveredIRR),
      },
    },
    creditStats: output.creditStats.map((stats) => ({
      year: stats.year,
      netDebt: num(stats.netDebt),
      netDebtToEBITDA: numOrNull(stats.netDebtToEBITDA),
      debtServiceCoverage: numOrNull(stats.debtServiceCoverage),
      interestTaxShield: num(stats.interestTaxShield),
      cumulativeDebtRepaid: num(stats.cumulativeDebtRepaid),
    })),
    checks: {
      debtRollForward: serializeCheck(output.checks.debtRollForward),
      cashRollForward: serializeCheck(output.checks.cashRollForward),
      decompositionIdentity: serializeCheck(output.checks.decompositionIdentity),
    },
    buildDurationMs: output.buildDurationMs,
  };
}

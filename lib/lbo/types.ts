// lib/lbo/types.ts
// LBO Returns Engine - Type Definitions

import type { Decimal } from '@/lib/math';

// ============================================================================
// Policies
// ============================================================================

/**
 * RETAIN: post-paydown cash stays on the balance sheet until exit.
 * DISTRIBUTE: positive post-paydown cash is paid out to equity every year.
 */
export type CashPolicy = 'RETAIN' | 'DISTRIBUTE';

/**
 * NEGATIVE_CASH: a negative free cash flow year draws the cash balance below zero.
 * EQUITY_CURE: the sponsor injects just enough equity to keep cash at zero.
 */
export type ShortfallPolicy = 'NEGATIVE_CASH' | 'EQUITY_CURE';

export const CASH_POLICIES: readonly CashPolicy[] = ['RETAIN', 'DISTRIBUTE'];
export const SHORTFALL_POLICIES: readonly ShortfallPolicy[] = ['NEGATIVE_CASH', 'EQUITY_CURE'];

// ============================================================================
// Assumptions
// ============================================================================

export interface LboAssumptionsInput {
  entryEBITDA: Decimal.Value;
  ebitdaCAGR: Decimal.Value; // e.g., 0.10 = 10% per year
  entryTEV: Decimal.Value;
  exitMultiple: Decimal.Value; // Exit TEV / Exit EBITDA
  entryDebt: Decimal.Value;
  taxRate: Decimal.Value;
  interestRate: Decimal.Value; // Simple annual, on beginning balance
  capexPct: Decimal.Value; // % of EBITDA
  projectionYears?: number;

  // Optional revenue line (EBITDA margin display)
  entryRevenue?: Decimal.Value | null;
  revenueCAGR?: Decimal.Value;

  sweepPercent?: Decimal.Value; // Share of positive FCF offered to debt paydown
  cashPolicy?: CashPolicy;
  shortfallPolicy?: ShortfallPolicy;
}

export interface LboAssumptions {
  entryEBITDA: Decimal;
  ebitdaCAGR: Decimal;
  entryTEV: Decimal;
  exitMultiple: Decimal;
  entryDebt: Decimal;
  taxRate: Decimal;
  interestRate: Decimal;
  capexPct: Decimal;
  projectionYears: number;

  entryRevenue: Decimal | null;
  revenueCAGR: Decimal;

  sweepPercent: Decimal;
  cashPolicy: CashPolicy;
  shortfallPolicy: ShortfallPolicy;
}

// ============================================================================
// Projection Output
// ============================================================================

export interface YearRecord {
  year: number;

  // Income statement
  revenue: Decimal | null;
  ebitda: Decimal;
  capex: Decimal;
  ebit: Decimal;
  interestPayment: Decimal;
  ebt: Decimal;
  taxes: Decimal;
  netIncome: Decimal;
  freeCashFlow: Decimal;

  // Debt roll-forward
  beginningDebt: Decimal;
  debtPaydown: Decimal;
  endingDebt: Decimal;

  // Cash roll-forward
  beginningCash: Decimal;
  cashGenerated: Decimal; // FCF after paydown
  distribution: Decimal;
  equityCure: Decimal;
  endingCash: Decimal;

  fundingShortfall: Decimal; // max(0, -FCF)
}

export type Schedule = readonly YearRecord[];

export interface ProjectionResult {
  assumptions: LboAssumptions;
  ebitdaPath: Decimal[];
  schedule: Schedule;
  exitEBITDA: Decimal;
  exitTEV: Decimal;
  shortfallYears: number[];
}

// ============================================================================
// IRR
// ============================================================================

export interface IrrSolverOptions {
  guess?: Decimal.Value;
  maxIterations?: number;
  tolerance?: Decimal.Value;
}

export type IrrSolution =
  | {
      converged: true;
      rate: Decimal;
      iterations: number;
      method: 'NEWTON' | 'BISECTION';
    }
  | {
      converged: false;
      reason: 'NO_SIGN_CHANGE' | 'DID_NOT_CONVERGE';
      iterations: number;
    };

// ============================================================================
// Returns
// ============================================================================

export interface IrrDecomposition {
  ebitdaGrowth: Decimal;
  multipleChange: Decimal;
  tevGrowth: Decimal;
  yield: Decimal;
  covariance: Decimal | null;
  unleveredIRR: Decimal | null;
  leverageImpact: Decimal | null;
  leveredIRR: Decimal | null;
}

export type DecompositionKey = keyof IrrDecomposition;

export interface EquityCase {
  entryEquity: Decimal;
  exitEquity: Decimal;
  equityFlows: Decimal[];
  irr: IrrSolution;
  moic: Decimal | null;
}

export interface ReturnSummary {
  levered: EquityCase;
  unlevered: EquityCase;
  leveredIRR: Decimal | null;
  unleveredIRR: Decimal | null;
  entryMultiple: Decimal;
  decomposition: IrrDecomposition;
}

// ============================================================================
// Model Output (projection + returns + checks)
// ============================================================================

export interface CreditStats {
  year: number;
  netDebt: Decimal;
  netDebtToEBITDA: Decimal | null;
  debtServiceCoverage: Decimal | null;
  interestTaxShield: Decimal;
  cumulativeDebtRepaid: Decimal;
}

export interface CheckResult {
  passed: boolean;
  error: Decimal;
}

export interface LboModelOutput {
  projection: ProjectionResult;
  returns: ReturnSummary;
  creditStats: CreditStats[];
  checks: {
    debtRollForward: CheckResult;
    cashRollForward: CheckResult;
    decompositionIdentity: CheckResult;
  };
  buildDurationMs: number;
}

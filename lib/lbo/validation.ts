// lib/lbo/validation.ts
// Assumption resolution: defaults, range checks and request payload parsing

import { getLboConfig } from '@/lib/config';
import { Decimal, ONE, ZERO } from '@/lib/math';
import { LboInputError } from './errors';
import { CASH_POLICIES, SHORTFALL_POLICIES } from './types';
import type { CashPolicy, LboAssumptions, LboAssumptionsInput, ShortfallPolicy } from './types';

type RequiredField =
  | 'entryEBITDA'
  | 'ebitdaCAGR'
  | 'entryTEV'
  | 'exitMultiple'
  | 'entryDebt'
  | 'taxRate'
  | 'interestRate'
  | 'capexPct';

const OPTIONAL_DECIMAL_FIELDS = ['entryRevenue', 'revenueCAGR', 'sweepPercent'] as const;

function readDecimal(value: Decimal.Value | null | undefined): Decimal | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' && value.trim() === '') return null;
  try {
    const decimal = new Decimal(value);
    return decimal.isFinite() ? decimal : null;
  } catch {
    return null;
  }
}

/**
 * Apply defaults and validate ranges. Every problem is collected before throwing,
 * so the caller sees the full list at once.
 */
export function resolveAssumptions(input: LboAssumptionsInput): LboAssumptions {
  const issues: string[] = [];

  const read = (field: RequiredField): Decimal => {
    const value = readDecimal(input[field]);
    if (value === null) {
      issues.push(`${field} must be a finite number`);
      return ZERO;
    }
    return value;
  };

  const entryEBITDA = read('entryEBITDA');
  const ebitdaCAGR = read('ebitdaCAGR');
  const entryTEV = read('entryTEV');
  const exitMultiple = read('exitMultiple');
  const entryDebt = read('entryDebt');
  const taxRate = read('taxRate');
  const interestRate = read('interestRate');
  const capexPct = read('capexPct');

  const config = getLboConfig();
  const projectionYears = input.projectionYears ?? config.defaultProjectionYears;
  if (!Number.isInteger(projectionYears) || projectionYears < 1) {
    issues.push('projectionYears must be a positive integer');
  } else if (projectionYears > config.maxProjectionYears) {
    issues.push(`projectionYears must be at most ${config.maxProjectionYears}`);
  }

  if (entryEBITDA.lte(0)) issues.push('entryEBITDA must be positive');
  if (entryTEV.lte(0)) issues.push('entryTEV must be positive');
  if (exitMultiple.lte(0)) issues.push('exitMultiple must be positive');
  if (ebitdaCAGR.lte(-1)) issues.push('ebitdaCAGR must be greater than -100%');
  if (entryDebt.lt(0)) issues.push('entryDebt must be non-negative');
  if (taxRate.lt(0) || taxRate.gt(1)) issues.push('taxRate must be between 0 and 1');
  if (interestRate.lt(0)) issues.push('interestRate must be non-negative');
  if (capexPct.lt(0)) issues.push('capexPct must be non-negative');

  let entryRevenue: Decimal | null = null;
  if (input.entryRevenue !== undefined && input.entryRevenue !== null) {
    entryRevenue = readDecimal(input.entryRevenue);
    if (entryRevenue === null || entryRevenue.lte(0)) {
      issues.push('entryRevenue must be a positive number when provided');
    }
  }

  let revenueCAGR = ebitdaCAGR;
  if (input.revenueCAGR !== undefined && input.revenueCAGR !== null) {
    const parsed = readDecimal(input.revenueCAGR);
    if (parsed === null || parsed.lte(-1)) {
      issues.push('revenueCAGR must be greater than -100%');
    } else {
      revenueCAGR = parsed;
    }
  }

  let sweepPercent = ONE;
  if (input.sweepPercent !== undefined && input.sweepPercent !== null) {
    const parsed = readDecimal(input.sweepPercent);
    if (parsed === null || parsed.lt(0) || parsed.gt(1)) {
      issues.push('sweepPercent must be between 0 and 1');
    } else {
      sweepPercent = parsed;
    }
  }

  const cashPolicy: CashPolicy = input.cashPolicy ?? 'RETAIN';
  if (!CASH_POLICIES.includes(cashPolicy)) {
    issues.push(`cashPolicy must be one of ${CASH_POLICIES.join(', ')}`);
  }

  const shortfallPolicy: ShortfallPolicy = input.shortfallPolicy ?? 'NEGATIVE_CASH';
  if (!SHORTFALL_POLICIES.includes(shortfallPolicy)) {
    issues.push(`shortfallPolicy must be one of ${SHORTFALL_POLICIES.join(', ')}`);
  }

  if (issues.length > 0) {
    throw new LboInputError(issues);
  }

  return Object.freeze({
    entryEBITDA,
    ebitdaCAGR,
    entryTEV,
    exitMultiple,
    entryDebt,
    taxRate,
    interestRate,
    capexPct,
    projectionYears,
    entryRevenue,
    revenueCAGR,
    sweepPercent,
    cashPolicy,
    shortfallPolicy,
  });
}

// ============================================================================
// Request payload parsing
// ============================================================================

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isCashPolicy = (value: unknown): value is CashPolicy =>
  typeof value === 'string' && CASH_POLICIES.some((policy) => policy === value);

const isShortfallPolicy = (value: unknown): value is ShortfallPolicy =>
  typeof value === 'string' && SHORTFALL_POLICIES.some((policy) => policy === value);

function readNumeric(raw: Record<string, unknown>, field: string, issues: string[]): string | number | undefined {
  const value = raw[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number' || typeof value === 'string') return value;
  issues.push(`${field} must be a number`);
  return undefined;
}

// A JSON number, or a numeric string, that holds an integer
function readInteger(value: unknown): number | null {
  if (typeof value === 'number') return Number.isInteger(value) ? value : null;
  if (typeof value !== 'string' || value.trim() === '') return null;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : null;
}

/**
 * Turn an untrusted JSON body into assumptions input.
 * Accepts `{ assumptions: {...} }` or the flat object.
 */
export function parseAssumptionsPayload(body: unknown): LboAssumptionsInput {
  if (!isRecord(body)) {
    throw new LboInputError(['Request body must be a JSON object']);
  }

  const raw = isRecord(body.assumptions) ? body.assumptions : body;
  const issues: string[] = [];

  const take = (field: RequiredField): string | number => {
    const value = readNumeric(raw, field, issues);
    if (value === undefined) {
      if (raw[field] === undefined || raw[field] === null) {
        issues.push(`Missing required field: ${field}`);
      }
      return 0;
    }
    return value;
  };

  const required = {
    entryEBITDA: take('entryEBITDA'),
    ebitdaCAGR: take('ebitdaCAGR'),
    entryTEV: take('entryTEV'),
    exitMultiple: take('exitMultiple'),
    entryDebt: take('entryDebt'),
    taxRate: take('taxRate'),
    interestRate: take('interestRate'),
    capexPct: take('capexPct'),
  };

  const optional: Partial<Record<(typeof OPTIONAL_DECIMAL_FIELDS)[number], string | number>> = {};
  for (const field of OPTIONAL_DECIMAL_FIELDS) {
    const value = readNumeric(raw, field, issues);
    if (value !== undefined) optional[field] = value;
  }

  let projectionYears: number | undefined;
  if (raw.projectionYears !== undefined && raw.projectionYears !== null) {
    const years = readInteger(raw.projectionYears);
    if (years === null) issues.push('projectionYears must be an integer');
    else projectionYears = years;
  }

  let cashPolicy: CashPolicy | undefined;
  if (raw.cashPolicy !== undefined) {
    if (isCashPolicy(raw.cashPolicy)) cashPolicy = raw.cashPolicy;
    else issues.push(`cashPolicy must be one of ${CASH_POLICIES.join(', ')}`);
  }

  let shortfallPolicy: ShortfallPolicy | undefined;
  if (raw.shortfallPolicy !== undefined) {
    if (isShortfallPolicy(raw.shortfallPolicy)) shortfallPolicy = raw.shortfallPolicy;
    else issues.push(`shortfallPolicy must be one of ${SHORTFALL_POLICIES.join(', ')}`);
  }

  if (issues.length > 0) {
    throw new LboInputError(issues);
  }

  return {
    ...required,
    ...optional,
    projectionYears,
    cashPolicy,
    shortfallPolicy,
  };
}

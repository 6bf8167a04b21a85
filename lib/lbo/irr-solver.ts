// lib/lbo/irr-solver.ts
// IRR root-finding: Newton-Raphson with bisection fallback

import { getLboConfig } from '@/lib/config';
import { Decimal, ONE, ZERO, toDecimal } from '@/lib/math';
import { silentTraceSink } from './trace';
import type { TraceSink } from './trace';
import type { IrrSolution, IrrSolverOptions } from './types';

const LOWER_BOUND = new Decimal(-0.99);
const LOWER_BOUND_FLOOR = new Decimal('-0.999999999'); // -1 + 1e-9
const UPPER_BOUND_CAP = new Decimal(1_000_000);
const TWO = new Decimal(2);
const TEN = new Decimal(10);

/**
 * NPV = Σ flows[t] / (1 + rate)^t
 */
export function npv(flows: Decimal.Value[], rate: Decimal.Value): Decimal {
  const growth = ONE.plus(rate);
  return flows.reduce<Decimal>(
    (acc, flow, t) => acc.plus(toDecimal(flow).div(growth.pow(t))),
    ZERO
  );
}

/**
 * dNPV/dr = Σ -t × flows[t] / (1 + rate)^(t+1)
 */
function npvDerivative(flows: Decimal[], rate: Decimal): Decimal {
  const growth = ONE.plus(rate);
  return flows.reduce<Decimal>(
    (acc, flow, t) => (t === 0 ? acc : acc.minus(flow.times(t).div(growth.pow(t + 1)))),
    ZERO
  );
}

/**
 * IRR is only defined when money goes in and comes out.
 */
export function hasSignChange(flows: Decimal.Value[]): boolean {
  const values = flows.map((flow) => toDecimal(flow));
  return values.some((flow) => flow.gt(0)) && values.some((flow) => flow.lt(0));
}

function resolveOptions(options: IrrSolverOptions) {
  const config = getLboConfig();
  return {
    guess: toDecimal(options.guess ?? config.irrGuess),
    maxIterations: options.maxIterations ?? config.irrMaxIterations,
    tolerance: toDecimal(options.tolerance ?? config.irrTolerance),
  };
}

/**
 * Bisection over [lo, hi], starting from [-0.99, 1]. Until the NPV changes sign,
 * lo moves ten times closer to -1 (down to -1 + 1e-9) and hi doubles (up to 1e6).
 */
export function solveIrrByBisection(
  flows: Decimal.Value[],
  options: IrrSolverOptions = {},
  trace: TraceSink = silentTraceSink
): IrrSolution {
  const values = flows.map((flow) => toDecimal(flow));
  if (!hasSignChange(values)) {
    return { converged: false, reason: 'NO_SIGN_CHANGE', iterations: 0 };
  }

  const { maxIterations, tolerance } = resolveOptions(options);

  let lo = LOWER_BOUND;
  let hi = ONE;
  let npvLo = npv(values, lo);
  let npvHi = npv(values, hi);

  while (npvLo.times(npvHi).gt(0)) {
    const canLower = lo.gt(LOWER_BOUND_FLOOR);
    const canRaise = hi.lt(UPPER_BOUND_CAP);
    if (!canLower && !canRaise) break;

    if (canLower) {
      lo = Decimal.max(lo.plus(ONE).div(TEN).minus(ONE), LOWER_BOUND_FLOOR);
      npvLo = npv(values, lo);
    }
    if (canRaise && npvLo.times(npvHi).gt(0)) {
      hi = hi.times(TWO);
      npvHi = npv(values, hi);
    }
  }

  if (npvLo.times(npvHi).gt(0)) {
    trace.trace({
      scope: 'IRR',
      message: 'No bracketing interval found',
      data: { lower: lo.toString(), upper: hi.toString() },
    });
    return { converged: false, reason: 'DID_NOT_CONVERGE', iterations: 0 };
  }

  for (let iteration = 0; iteration < maxIterations; iteration++) {
    const mid = lo.plus(hi).div(TWO);
    const npvMid = npv(values, mid);

    if (npvMid.abs().lt(tolerance) || hi.minus(lo).div(TWO).lt(tolerance)) {
      trace.trace({
        scope: 'IRR',
        message: 'Bisection converged',
        data: { iterations: iteration + 1, rate: mid.toString() },
      });
      return { converged: true, rate: mid, iterations: iteration + 1, method: 'BISECTION' };
    }

    if (npvMid.times(npvLo).gt(0)) {
      lo = mid;
    } else {
      hi = mid;
    }
  }

  trace.trace({ scope: 'IRR', message: 'Bisection did not converge', data: { maxIterations } });
  return { converged: false, reason: 'DID_NOT_CONVERGE', iterations: maxIterations };
}

/**
 * Solve NPV(rate) = 0.
 *
 * Newton-Raphson first; a step that leaves (-1, ∞), a flat derivative or running out
 * of iterations hands over to bisection. Unsolvable flows come back with
 * `converged: false`, never as a thrown error or a zero rate.
 */
export function solveIrr(
  flows: Decimal.Value[],
  options: IrrSolverOptions = {},
  trace: TraceSink = silentTraceSink
): IrrSolution {
  const values = flows.map((flow) => toDecimal(flow));

  if (!hasSignChange(values)) {
    trace.trace({ scope: 'IRR', message: 'Equity flows have no sign change', data: { periods: values.length } });
    return { converged: false, reason: 'NO_SIGN_CHANGE', iterations: 0 };
  }

  const { guess, maxIterations, tolerance } = resolveOptions(options);

  let rate = guess;
  let iterations = 0;

  for (let iteration = 0; iteration < maxIterations; iteration++) {
    iterations = iteration + 1;
    const derivative = npvDerivative(values, rate);
    if (derivative.isZero()) break;

    const next = rate.minus(npv(values, rate).div(derivative));
    if (!next.isFinite() || next.lte(-1)) break;

    if (next.minus(rate).abs().lt(tolerance)) {
      trace.trace({
        scope: 'IRR',
        message: 'Newton converged',
        data: { iterations, rate: next.toString() },
      });
      return { converged: true, rate: next, iterations, method: 'NEWTON' };
    }

    rate = next;
  }

  trace.trace({ scope: 'IRR', message: 'Newton failed, falling back to bisection', data: { iterations } });

  const fallback = solveIrrByBisection(values, { maxIterations, tolerance }, trace);
  return { ...fallback, iterations: fallback.iterations + iterations };
}

/**
 * Rate or null. Null means "no IRR exists", never "IRR is zero".
 */
export function computeIrr(flows: Decimal.Value[], options: IrrSolverOptions = {}): Decimal | null {
  const solution = solveIrr(flows, options);
  return solution.converged ? solution.rate : null;
}

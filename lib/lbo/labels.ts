// lib/lbo/labels.ts
// Display labels for the IRR decomposition (no runtime engine imports, safe for client components)

import type { DecompositionKey } from './types';

export const DECOMPOSITION_LABELS: Record<DecompositionKey, string> = {
  ebitdaGrowth: 'EBITDA Growth',
  multipleChange: 'Multiple Change',
  tevGrowth: 'Implied TEV Growth',
  yield: 'Yield',
  covariance: 'Covariance',
  unleveredIRR: 'Unlevered IRR',
  leverageImpact: 'Leverage Impact',
  leveredIRR: 'Levered IRR',
};

// Subtotal rows of the attribution table
export const DECOMPOSITION_SUBTOTALS: readonly DecompositionKey[] = ['tevGrowth', 'unleveredIRR', 'leveredIRR'];

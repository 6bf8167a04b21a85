import { type ClassValue, clsx } from 'clsx';
import { twMerge } from 'tailwind-merge';

export function cn(...inputs: ClassValue[]) {
  return twMerge(clsx(inputs));
}

const numberFormatter = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 1,
  maximumFractionDigits: 1,
});

/**
 * Accounting style: negatives in parentheses, missing values as '-'.
 */
export const formatAmount = (value: number | null | undefined): string => {
  if (value == null || Number.isNaN(value)) return '-';
  const formatted = numberFormatter.format(Math.abs(value));
  return value < 0 ? `(${formatted})` : formatted;
};

export const formatPercent = (value: number | null | undefined, decimals = 1): string => {
  if (value == null || Number.isNaN(value)) return 'n/a';
  return new Intl.NumberFormat('en-US', {
    style: 'percent',
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals,
  }).format(value);
};

export const formatMultiple = (value: number | null | undefined): string => {
  if (value == null || Number.isNaN(value)) return 'n/a';
  return `${value.toFixed(1)}x`;
};

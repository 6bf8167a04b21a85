'use client';

import { useMemo, useState } from 'react';
import { cn, formatAmount, formatMultiple, formatPercent } from '@/lib/utils';
import type { SerializedCreditStats, SerializedYearRecord } from '@/lib/lbo/serialize';

export type ScheduleRowDef = {
  id: string;
  label: string;
  kind?: 'section' | 'value' | 'ratio' | 'total';
  format?: 'number' | 'percent' | 'multiple';
  value?: (record: SerializedYearRecord, stats: SerializedCreditStats | undefined) => number | null;
  children?: ScheduleRowDef[];
};

type DisplayRow = ScheduleRowDef & { level: number };

const field =
  (key: keyof Omit<SerializedYearRecord, 'year'>) =>
  (record: SerializedYearRecord) =>
    record[key];

const negate =
  (key: keyof Omit<SerializedYearRecord, 'year'>) =>
  (record: SerializedYearRecord) => {
    const value = record[key];
    return value == null ? null : -value;
  };

const ROWS: ScheduleRowDef[] = [
  {
    id: 'income',
    label: 'Income Statement',
    kind: 'section',
    children: [
      { id: 'revenue', label: 'Revenue', value: field('revenue') },
      { id: 'ebitda', label: 'EBITDA', value: field('ebitda'), kind: 'total' },
      {
        id: 'ebitda_margin',
        label: 'EBITDA Margin',
        kind: 'ratio',
        format: 'percent',
        value: (r) => (r.revenue ? r.ebitda / r.revenue : null),
      },
      { id: 'capex', label: 'Capex', value: negate('capex') },
      { id: 'ebit', label: 'EBIT', value: field('ebit') },
      { id: 'interest', label: 'Interest Expense', value: negate('interestPayment') },
      { id: 'ebt', label: 'EBT', value: field('ebt') },
      { id: 'taxes', label: 'Taxes', value: negate('taxes') },
      { id: 'fcf', label: 'Free Cash Flow', value: field('freeCashFlow'), kind: 'total' },
    ],
  },
  {
    id: 'debt',
    label: 'Debt Schedule',
    kind: 'section',
    children: [
      { id: 'begin_debt', label: 'Beginning Debt', value: field('beginningDebt') },
      { id: 'paydown', label: 'Debt Paydown', value: negate('debtPaydown') },
      { id: 'end_debt', label: 'Ending Debt', value: field('endingDebt'), kind: 'total' },
      {
        id: 'net_debt_ebitda',
        label: 'Net Debt / EBITDA',
        kind: 'ratio',
        format: 'multiple',
        value: (_r, stats) => stats?.netDebtToEBITDA ?? null,
      },
      {
        id: 'dscr',
        label: 'Debt Service Coverage',
        kind: 'ratio',
        format: 'multiple',
        value: (_r, stats) => stats?.debtServiceCoverage ?? null,
      },
    ],
  },
  {
    id: 'cash',
    label: 'Cash',
    kind: 'section',
    children: [
      { id: 'begin_cash', label: 'Beginning Cash', value: field('beginningCash') },
      { id: 'generated', label: 'Cash Generated', value: field('cashGenerated') },
      { id: 'distribution', label: 'Distributions', value: negate('distribution') },
      { id: 'cure', label: 'Equity Cure', value: field('equityCure') },
      { id: 'end_cash', label: 'Ending Cash', value: field('endingCash'), kind: 'total' },
      { id: 'shortfall', label: 'Funding Shortfall', value: field('fundingShortfall') },
    ],
  },
];

interface LboScheduleTableProps {
  schedule: SerializedYearRecord[];
  creditStats: SerializedCreditStats[];
}

export default function LboScheduleTable({ schedule, creditStats }: LboScheduleTableProps) {
  const [showRatios, setShowRatios] = useState(true);
  const [collapsed, setCollapsed] = useState<Record<string, boolean>>({});

  const statsByYear = useMemo(
    () => new Map(creditStats.map((stats) => [stats.year, stats])),
    [creditStats]
  );

  const rows = useMemo<DisplayRow[]>(() => {
    const output: DisplayRow[] = [];
    const walk = (items: ScheduleRowDef[], level: number) => {
      items.forEach((row) => {
        if (!showRatios && row.kind === 'ratio') return;
        output.push({ ...row, level });
        if (row.children && !collapsed[row.id]) walk(row.children, level + 1);
      });
    };
    walk(ROWS, 0);
    return output;
  }, [showRatios, collapsed]);

  const formatValue = (row: ScheduleRowDef, value: number | null) => {
    if (row.kind === 'section') return '';
    if (row.format === 'percent') return formatPercent(value);
    if (row.format === 'multiple') return formatMultiple(value);
    return formatAmount(value);
  };

  return (
    <div className="w-full font-[calibri,arial,sans-serif]">
      <div className="flex items-center justify-between border-b border-blue-700 bg-blue-600 px-3 py-2 text-xs font-semibold uppercase tracking-wide text-white">
        <span>Projection Schedule</span>
        <label className="inline-flex items-center gap-1 normal-case">
          <input type="checkbox" checked={showRatios} onChange={(e) => setShowRatios(e.target.checked)} />
          Ratios
        </label>
      </div>
      <div className="overflow-auto">
        <table className="min-w-full border-collapse text-[11px]">
          <thead className="sticky top-0 bg-slate-50">
            <tr>
              <th className="sticky left-0 border-b border-r bg-slate-50 px-2 py-1 text-left font-semibold text-gray-600">
                Line
              </th>
              {schedule.map((record) => (
                <th key={record.year} className="border-b border-r px-2 py-1 text-right font-semibold text-gray-600">
                  Year {record.year}
                </th>
              ))}
            </tr>
          </thead>
          <tbody>
            {rows.map((row) => {
              const rowClasses =
                row.kind === 'section'
                  ? 'bg-gray-100 font-semibold text-gray-700'
                  : row.kind === 'total'
                    ? 'bg-gray-50/70 font-semibold text-gray-800'
                    : row.kind === 'ratio'
                      ? 'bg-amber-50/60 text-gray-600'
                      : 'text-gray-700';

              return (
                <tr key={row.id} className={cn('border-b', rowClasses)}>
                  <td className="sticky left-0 border-r bg-inherit px-2 py-0.5" style={{ paddingLeft: 10 + row.level * 12 }}>
                    <div className="flex items-center gap-2">
                      {row.children && (
                        <button
                          className="h-4 w-4 rounded border text-[10px] leading-none text-gray-500"
                          onClick={() => setCollapsed((prev) => ({ ...prev, [row.id]: !prev[row.id] }))}
                        >
                          {collapsed[row.id] ? '+' : '−'}
                        </button>
                      )}
                      <span className={cn(row.kind === 'section' && 'uppercase tracking-wide')}>{row.label}</span>
                    </div>
                  </td>
                  {schedule.map((record) => (
                    <td key={record.year} className="border-r px-2 py-0.5 text-right font-mono tabular-nums">
                      {row.value ? formatValue(row, row.value(record, statsByYear.get(record.year))) : ''}
                    </td>
                  ))}
                </tr>
              );
            })}
          </tbody>
        </table>
      </div>
    </div>
  );
}

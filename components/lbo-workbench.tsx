"use client";

import { useState } from "react";
import type { ReactNode } from "react";
import { Calculator, Landmark, Loader2, Percent, TrendingUp } from "lucide-react";
import LboScheduleTable from "@/components/lbo-schedule-table";
import { DECOMPOSITION_LABELS, DECOMPOSITION_SUBTOTALS } from "@/lib/lbo/labels";
import type { SerializedLboModel } from "@/lib/lbo/serialize";
import type { DecompositionKey } from "@/lib/lbo/types";
import { cn, formatAmount, formatMultiple, formatPercent } from "@/lib/utils";

type FieldDef = {
  key: string;
  label: string;
  step: string;
};

const FIELDS: FieldDef[] = [
  { key: "entryEBITDA", label: "Entry EBITDA", step: "1" },
  { key: "ebitdaCAGR", label: "EBITDA CAGR", step: "0.01" },
  { key: "entryTEV", label: "Entry TEV", step: "10" },
  { key: "exitMultiple", label: "Exit Multiple", step: "0.5" },
  { key: "entryDebt", label: "Entry Debt", step: "10" },
  { key: "taxRate", label: "Tax Rate", step: "0.01" },
  { key: "interestRate", label: "Interest Rate", step: "0.005" },
  { key: "capexPct", label: "Capex % of EBITDA", step: "0.01" },
  { key: "projectionYears", label: "Projection Years", step: "1" },
];

// Base case: 20x entry, 40% leverage
const DEFAULT_VALUES: Record<string, string> = {
  entryEBITDA: "100",
  ebitdaCAGR: "0.10",
  entryTEV: "2000",
  exitMultiple: "19",
  entryDebt: "800",
  taxRate: "0.25",
  interestRate: "0.08",
  capexPct: "0.10",
  projectionYears: "5",
};

const DECOMPOSITION_KEYS = Object.keys(DECOMPOSITION_LABELS).filter(
  (key): key is DecompositionKey => key in DECOMPOSITION_LABELS
);

type ApiError = { error?: string; issues?: string[] };

export default function LboWorkbench() {
  const [values, setValues] = useState<Record<string, string>>(DEFAULT_VALUES);
  const [cashPolicy, setCashPolicy] = useState<"RETAIN" | "DISTRIBUTE">("RETAIN");
  const [shortfallPolicy, setShortfallPolicy] = useState<"NEGATIVE_CASH" | "EQUITY_CURE">("NEGATIVE_CASH");
  const [model, setModel] = useState<SerializedLboModel | null>(null);
  const [loading, setLoading] = useState(false);
  const [errors, setErrors] = useState<string[]>([]);

  async function runModel() {
    setLoading(true);
    setErrors([]);
    try {
      const res = await fetch("/api/model/lbo", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ assumptions: { ...values, cashPolicy, shortfallPolicy } }),
      });

      if (!res.ok) {
        const body: ApiError = await res.json();
        setErrors(body.issues && body.issues.length > 0 ? body.issues : [body.error || `${res.status} ${res.statusText}`]);
        setModel(null);
        return;
      }

      const json: { data: SerializedLboModel } = await res.json();
      setModel(json.data);
    } catch (error) {
      console.error(error);
      setErrors([error instanceof Error ? error.message : "Failed to run model"]);
    } finally {
      setLoading(false);
    }
  }

  const returns = model?.returns;

  return (
    <div className="space-y-6">
      <section className="rounded-lg border bg-white p-4 shadow-sm">
        <div className="mb-3 flex items-center gap-2 text-sm font-semibold text-gray-700">
          <Calculator className="h-4 w-4" />
          Assumptions
        </div>
        <div className="grid grid-cols-2 gap-3 sm:grid-cols-3 lg:grid-cols-5">
          {FIELDS.map((field) => (
            <label key={field.key} className="flex flex-col gap-1 text-xs text-gray-600">
              {field.label}
              <input
                type="number"
                step={field.step}
                value={values[field.key] ?? ""}
                onChange={(e) => setValues((prev) => ({ ...prev, [field.key]: e.target.value }))}
                className="rounded border px-2 py-1 font-mono text-sm text-gray-900"
              />
            </label>
          ))}
          <label className="flex flex-col gap-1 text-xs text-gray-600">
            Cash Policy
            <select
              value={cashPolicy}
              onChange={(e) => setCashPolicy(e.target.value === "DISTRIBUTE" ? "DISTRIBUTE" : "RETAIN")}
              className="rounded border px-2 py-1 text-sm"
            >
              <option value="RETAIN">Retain</option>
              <option value="DISTRIBUTE">Distribute</option>
            </select>
          </label>
          <label className="flex flex-col gap-1 text-xs text-gray-600">
            Shortfall Policy
            <select
              value={shortfallPolicy}
              onChange={(e) =>
                setShortfallPolicy(e.target.value === "EQUITY_CURE" ? "EQUITY_CURE" : "NEGATIVE_CASH")
              }
              className="rounded border px-2 py-1 text-sm"
            >
              <option value="NEGATIVE_CASH">Negative cash</option>
              <option value="EQUITY_CURE">Equity cure</option>
            </select>
          </label>
        </div>
        <button
          onClick={runModel}
          disabled={loading}
          className="mt-4 inline-flex items-center gap-2 rounded bg-blue-600 px-4 py-2 text-sm font-semibold text-white disabled:opacity-50"
        >
          {loading && <Loader2 className="h-4 w-4 animate-spin" />}
          Run Model
        </button>
        {errors.length > 0 && (
          <ul className="mt-3 list-disc pl-5 text-xs text-red-600">
            {errors.map((message) => (
              <li key={message}>{message}</li>
            ))}
          </ul>
        )}
      </section>

      {model && returns && (
        <>
          <section className="grid grid-cols-2 gap-3 lg:grid-cols-4">
            <SummaryCard icon={<TrendingUp className="h-4 w-4" />} label="Levered IRR" value={formatPercent(returns.leveredIRR)} />
            <SummaryCard icon={<Percent className="h-4 w-4" />} label="Unlevered IRR" value={formatPercent(returns.unleveredIRR)} />
            <SummaryCard icon={<Calculator className="h-4 w-4" />} label="MOIC" value={formatMultiple(returns.levered.moic)} />
            <SummaryCard icon={<Landmark className="h-4 w-4" />} label="Exit Equity" value={formatAmount(returns.levered.exitEquity)} />
          </section>

          {model.shortfallYears.length > 0 && (
            <div className="rounded border border-amber-300 bg-amber-50 px-3 py-2 text-xs text-amber-800">
              Funding shortfall in year {model.shortfallYears.join(", ")} ({model.assumptions.shortfallPolicy === "EQUITY_CURE" ? "cured with sponsor equity" : "cash balance goes negative"}).
            </div>
          )}

          <section className="rounded-lg border bg-white shadow-sm">
            <LboScheduleTable schedule={model.schedule} creditStats={model.creditStats} />
          </section>

          <section className="rounded-lg border bg-white p-4 shadow-sm">
            <div className="mb-2 text-sm font-semibold text-gray-700">IRR Decomposition</div>
            <table className="w-full max-w-md text-xs">
              <tbody>
                {DECOMPOSITION_KEYS.map((key) => (
                  <tr key={key} className={cn("border-b", DECOMPOSITION_SUBTOTALS.includes(key) && "font-semibold")}>
                    <td className="py-1 text-gray-600">{DECOMPOSITION_LABELS[key]}</td>
                    <td className="py-1 text-right font-mono">{formatPercent(returns.decomposition[key], 2)}</td>
                  </tr>
                ))}
              </tbody>
            </table>
          </section>
        </>
      )}
    </div>
  );
}

function SummaryCard({ icon, label, value }: { icon: ReactNode; label: string; value: string }) {
  return (
    <div className="rounded-lg border bg-white p-4 shadow-sm">
      <div className="flex items-center gap-2 text-xs text-gray-500">
        {icon}
        {label}
      </div>
      <div className="mt-1 text-2xl font-semibold tabular-nums text-gray-900">{value}</div>
    </div>
  );
}

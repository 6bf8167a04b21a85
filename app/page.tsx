import { Activity, ShieldCheck } from "lucide-react";
import LboWorkbench from "@/components/lbo-workbench";

export default function Home() {
  return (
    <div className="min-h-screen bg-slate-50 p-8">
      <main className="mx-auto flex max-w-6xl flex-col gap-6">
        <div className="space-y-1">
          <h1 className="text-3xl font-bold tracking-tight">
            LBO <span className="text-blue-600">Returns Model</span>
          </h1>
          <p className="text-sm text-gray-500">
            Debt paydown waterfall, levered vs. unlevered IRR, and IRR attribution.
          </p>
        </div>

        <LboWorkbench />
      </main>
      <footer className="mx-auto mt-12 flex max-w-6xl flex-wrap gap-6 text-xs text-gray-500">
        <div className="flex items-center gap-2"><Activity className="h-4 w-4" /> Deterministic projection</div>
        <div className="flex items-center gap-2"><ShieldCheck className="h-4 w-4" /> Roll-forward checks on every run</div>
      </footer>
    </div>
  );
}

import { useCallback } from "react";
import { useReactorStore } from "@/stores/reactorStore";
import { useKeyboardShortcuts } from "@/hooks/useKeyboardShortcuts";
import { InputsCard } from "@/components/panels/InputsCard";
import { ConfigCard } from "@/components/panels/ConfigCard";
import { OutputsTable } from "@/components/results/OutputsTable";
import { HistoryTable } from "@/components/results/HistoryTable";
import { ErrorBanner } from "@/components/results/ErrorBanner";
import { Button } from "@/components/ui/Button";
import { formatNumber } from "@/lib/units";
import { toast } from "sonner";

export function AppShell() {
  const runReaction = useReactorStore((s) => s.runReaction);
  const reset = useReactorStore((s) => s.reset);

  const handleRun = useCallback(() => {
    const outputs = runReaction();
    toast.success(`Reaction complete: ${outputs.map((v) => formatNumber(v)).join(" / ")}`);
  }, [runReaction]);

  const handleReset = useCallback(() => {
    reset();
    toast.info("Inputs and outputs cleared");
  }, [reset]);

  useKeyboardShortcuts({ onRunReaction: handleRun, onReset: handleReset });

  return (
    <div className="min-h-screen bg-background text-foreground">
      <header className="border-b border-border px-4 py-3 flex items-center justify-between">
        <h1 className="text-xl font-bold">Reactor Stage</h1>
        <span className="text-xs text-muted-foreground">1 A + 1 B → R (+ S)</span>
      </header>

      <main className="grid gap-4 p-4 md:grid-cols-[320px_1fr]">
        <aside className="space-y-4">
          <InputsCard />
          <ConfigCard />
          <div className="flex gap-2">
            <Button id="run-reaction" onClick={handleRun} variant="success" size="block">
              Run (Ctrl+Enter)
            </Button>
            <Button id="reset-reactor" onClick={handleReset} variant="destructive" size="block">
              Reset
            </Button>
          </div>
        </aside>

        <section className="space-y-4">
          <ErrorBanner />
          <div className="rounded-lg border border-border bg-card p-4 space-y-2">
            <h3 className="font-semibold text-sm text-foreground">Products</h3>
            <OutputsTable />
          </div>
          <div className="rounded-lg border border-border bg-card p-4 space-y-2">
            <h3 className="font-semibold text-sm text-foreground">History</h3>
            <HistoryTable />
          </div>
        </section>
      </main>
    </div>
  );
}

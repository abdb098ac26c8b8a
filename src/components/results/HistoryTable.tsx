import { useReactorStore } from "@/stores/reactorStore";
import { formatNumber, formatPercent } from "@/lib/units";
import { Button } from "@/components/ui/Button";

export function HistoryTable() {
  const history = useReactorStore((s) => s.history);
  const clearHistory = useReactorStore((s) => s.clearHistory);

  if (history.length === 0) {
    return <p className="text-xs text-muted-foreground italic">No runs yet.</p>;
  }

  return (
    <div className="space-y-2">
      <div className="overflow-x-auto">
        <table id="history-table" className="w-full text-xs">
          <thead>
            <tr className="text-muted-foreground text-left">
              <th className="px-2 py-1">#</th>
              <th className="px-2 py-1">A</th>
              <th className="px-2 py-1">B</th>
              <th className="px-2 py-1">Conversion</th>
              <th className="px-2 py-1">Split</th>
              <th className="px-2 py-1">Outputs</th>
            </tr>
          </thead>
          <tbody>
            {history.map((run) => (
              <tr key={run.id} className="border-b border-border font-mono">
                <td className="px-2 py-1">{run.id}</td>
                <td className="px-2 py-1">{formatNumber(run.inputs.a)}</td>
                <td className="px-2 py-1">{formatNumber(run.inputs.b)}</td>
                <td className="px-2 py-1">{formatPercent(run.config.conversion)}</td>
                <td className="px-2 py-1">
                  {run.config.twoOutputs ? formatPercent(run.config.splitRatio) : "-"}
                </td>
                <td className="px-2 py-1">
                  {run.outputs.map((v) => formatNumber(v)).join(" / ")}
                </td>
              </tr>
            ))}
          </tbody>
        </table>
      </div>
      <Button onClick={clearHistory} variant="link" size="sm" className="px-0 h-auto">
        Clear history
      </Button>
    </div>
  );
}

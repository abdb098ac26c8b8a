import { useReactorStore } from "@/stores/reactorStore";
import { outputLabel } from "@/config/reactor";
import { formatNumber } from "@/lib/units";

export function OutputsTable() {
  const lastOutputs = useReactorStore((s) => s.snapshot.lastOutputs);

  if (lastOutputs.length === 0) {
    return (
      <p className="text-xs text-muted-foreground italic">
        Run the reaction to see product amounts.
      </p>
    );
  }

  const total = lastOutputs.reduce((sum, v) => sum + v, 0);

  return (
    <table id="outputs-table" className="w-full text-sm">
      <tbody>
        {lastOutputs.map((value, i) => (
          <tr key={i} className="border-b border-border">
            <td className="px-2 py-1 text-xs text-muted-foreground">{outputLabel(i)}</td>
            <td className="px-2 py-1 text-xs font-mono text-foreground text-right">
              {formatNumber(value)}
            </td>
          </tr>
        ))}
        {lastOutputs.length > 1 && (
          <tr>
            <td className="px-2 py-1 text-xs text-muted-foreground">Reacted</td>
            <td className="px-2 py-1 text-xs font-mono text-foreground text-right">
              {formatNumber(total)}
            </td>
          </tr>
        )}
      </tbody>
    </table>
  );
}

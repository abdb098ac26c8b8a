import { useReactorStore } from "@/stores/reactorStore";
import { Button } from "@/components/ui/Button";

export function ErrorBanner() {
  const error = useReactorStore((s) => s.error);
  const clearError = useReactorStore((s) => s.clearError);

  if (!error) return null;

  return (
    <div
      id="reactor-error-display"
      className="rounded border border-destructive bg-destructive/10 p-4 flex items-start justify-between gap-2"
    >
      <div>
        <h4 className="text-sm font-medium text-destructive mb-1">Rejected</h4>
        <pre className="text-xs text-destructive whitespace-pre-wrap">{error}</pre>
      </div>
      <Button onClick={clearError} variant="ghost" size="sm">
        Dismiss
      </Button>
    </div>
  );
}

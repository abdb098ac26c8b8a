import { useEffect, useState } from "react";
import { useReactorStore } from "@/stores/reactorStore";
import { REACTOR_PRESETS } from "@/config/reactor";
import { formatPercent, parseQuantity } from "@/lib/units";
import { errorMessage } from "@/lib/errors";
import { Button } from "@/components/ui/Button";
import { toast } from "sonner";

const inputClass =
  "block w-full mt-1 px-2 py-1.5 text-sm rounded-md bg-input text-foreground border border-border";

export function ConfigCard() {
  const snapshot = useReactorStore((s) => s.snapshot);
  const configure = useReactorStore((s) => s.configure);
  const setTwoOutputs = useReactorStore((s) => s.setTwoOutputs);
  const loadPreset = useReactorStore((s) => s.loadPreset);
  const [conversion, setConversion] = useState(String(snapshot.conversion));
  const [splitRatio, setSplitRatio] = useState(String(snapshot.splitRatio));

  useEffect(() => {
    setConversion(String(snapshot.conversion));
    setSplitRatio(String(snapshot.splitRatio));
  }, [snapshot.conversion, snapshot.splitRatio]);

  const handleApply = () => {
    try {
      configure({
        conversion: parseQuantity(conversion),
        splitRatio: parseQuantity(splitRatio),
      });
      toast.success("Configuration saved");
    } catch (err) {
      toast.error(`Failed: ${errorMessage(err)}`);
    }
  };

  const handlePreset = (id: string) => {
    if (!id) return;
    try {
      loadPreset(id);
      toast.info(`Loaded preset ${id}`);
    } catch (err) {
      toast.error(`Failed: ${errorMessage(err)}`);
    }
  };

  return (
    <div id="config-card" className="rounded-lg border border-border bg-card p-4 space-y-3">
      <h3 className="font-semibold text-sm text-foreground">Configuration</h3>

      <label className="block text-xs text-muted-foreground">
        Preset
        <select
          id="preset-select"
          value=""
          onChange={(e) => handlePreset(e.target.value)}
          className={inputClass}
        >
          <option value="">Choose a preset...</option>
          {REACTOR_PRESETS.map((p) => (
            <option key={p.id} value={p.id}>
              {p.label}
            </option>
          ))}
        </select>
      </label>

      <div className="grid grid-cols-2 gap-2">
        <label className="block text-xs text-muted-foreground">
          Conversion ({formatPercent(snapshot.conversion)})
          <input
            id="conversion-input"
            type="number"
            min="0"
            max="1"
            step="0.05"
            value={conversion}
            onChange={(e) => setConversion(e.target.value)}
            className={inputClass}
          />
        </label>
        <label className="block text-xs text-muted-foreground">
          Split to R ({formatPercent(snapshot.splitRatio)})
          <input
            id="split-ratio-input"
            type="number"
            min="0"
            max="1"
            step="0.05"
            value={splitRatio}
            disabled={!snapshot.twoOutputs}
            onChange={(e) => setSplitRatio(e.target.value)}
            className={inputClass}
          />
        </label>
      </div>

      <label className="flex items-center gap-2 text-xs text-foreground">
        <input
          id="two-outputs-toggle"
          type="checkbox"
          checked={snapshot.twoOutputs}
          onChange={(e) => setTwoOutputs(e.target.checked)}
        />
        Two products (R and S)
      </label>

      <Button id="apply-config" onClick={handleApply} variant="secondary" size="sm">
        Apply
      </Button>
    </div>
  );
}

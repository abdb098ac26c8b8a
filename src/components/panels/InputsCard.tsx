import { useEffect, useState } from "react";
import { useReactorStore } from "@/stores/reactorStore";
import { labelWithUnit, parseQuantity } from "@/lib/units";
import { errorMessage } from "@/lib/errors";
import { Button } from "@/components/ui/Button";
import { toast } from "sonner";

const inputClass =
  "block w-full mt-1 px-2 py-1.5 text-sm rounded-md bg-input text-foreground border border-border";

export function InputsCard() {
  const inputA = useReactorStore((s) => s.snapshot.inputA);
  const inputB = useReactorStore((s) => s.snapshot.inputB);
  const setInputs = useReactorStore((s) => s.setInputs);
  const [a, setA] = useState(String(inputA));
  const [b, setB] = useState(String(inputB));

  // Follow store changes from presets and resets
  useEffect(() => {
    setA(String(inputA));
    setB(String(inputB));
  }, [inputA, inputB]);

  const handleApply = () => {
    try {
      setInputs(parseQuantity(a), parseQuantity(b));
      toast.success("Inputs staged");
    } catch (err) {
      toast.error(`Failed: ${errorMessage(err)}`);
    }
  };

  return (
    <div id="inputs-card" className="rounded-lg border border-border bg-card p-4 space-y-3">
      <h3 className="font-semibold text-sm text-foreground">Reagents</h3>

      <div className="grid grid-cols-2 gap-2">
        <label className="block text-xs text-muted-foreground">
          {labelWithUnit("A", "mol")}
          <input
            id="input-a"
            type="number"
            min="0"
            step="0.1"
            value={a}
            onChange={(e) => setA(e.target.value)}
            className={inputClass}
          />
        </label>
        <label className="block text-xs text-muted-foreground">
          {labelWithUnit("B", "mol")}
          <input
            id="input-b"
            type="number"
            min="0"
            step="0.1"
            value={b}
            onChange={(e) => setB(e.target.value)}
            className={inputClass}
          />
        </label>
      </div>

      <Button id="apply-inputs" onClick={handleApply} variant="secondary" size="sm">
        Stage inputs
      </Button>
    </div>
  );
}

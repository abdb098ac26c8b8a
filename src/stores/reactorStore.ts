import { create } from "zustand";
import { ReactorModel } from "@/lib/ReactorModel";
import { errorMessage } from "@/lib/errors";
import { DEFAULT_REACTOR_CONFIG, MAX_HISTORY, findPreset } from "@/config/reactor";
import type { ReactorConfig, ReactorRun, ReactorSnapshot } from "@/types/reactor";

interface ReactorState {
  model: ReactorModel;
  snapshot: ReactorSnapshot;
  history: ReactorRun[];
  nextRunId: number;
  error: string | null;

  // Actions
  setInputs: (a: number, b: number) => void;
  setConversion: (conversion: number) => void;
  setTwoOutputs: (two: boolean) => void;
  setSplitRatio: (ratio: number) => void;
  configure: (updates: Partial<ReactorConfig>) => void;
  runReaction: () => number[];
  reset: () => void;
  loadPreset: (id: string) => void;
  getLastOutput: (index: number) => number;
  clearHistory: () => void;
  clearError: () => void;
}

/** Fresh state for a model built from `config`; used on creation and in tests. */
export function initialReactorState(
  config: ReactorConfig = DEFAULT_REACTOR_CONFIG,
): Pick<ReactorState, "model" | "snapshot" | "history" | "nextRunId" | "error"> {
  const model = ReactorModel.fromConfig(config);
  return {
    model,
    snapshot: model.snapshot(),
    history: [],
    nextRunId: 1,
    error: null,
  };
}

export const useReactorStore = create<ReactorState>((set, get) => {
  // Runs a model mutation; on failure the message is kept and the error rethrown.
  const mutate = (fn: (model: ReactorModel) => void) => {
    const { model } = get();
    try {
      fn(model);
    } catch (err) {
      set({ error: errorMessage(err) });
      throw err;
    }
    set({ snapshot: model.snapshot(), error: null });
  };

  return {
    ...initialReactorState(),

    setInputs: (a, b) => mutate((m) => m.setInputs(a, b)),
    setConversion: (conversion) => mutate((m) => m.setConversion(conversion)),
    setTwoOutputs: (two) => mutate((m) => m.setTwoOutputs(two)),
    setSplitRatio: (ratio) => mutate((m) => m.setSplitRatio(ratio)),
    configure: (updates) => mutate((m) => m.configure(updates)),

    runReaction: () => {
      const { model, history, nextRunId } = get();
      const outputs = model.runReaction();
      const run: ReactorRun = {
        id: nextRunId,
        inputs: { a: model.inputA, b: model.inputB },
        config: {
          conversion: model.conversion,
          twoOutputs: model.twoOutputs,
          splitRatio: model.splitRatio,
        },
        outputs,
      };
      set({
        snapshot: model.snapshot(),
        history: [run, ...history].slice(0, MAX_HISTORY),
        nextRunId: nextRunId + 1,
        error: null,
      });
      return [...outputs];
    },

    reset: () => mutate((m) => m.reset()),

    loadPreset: (id) => {
      const preset = findPreset(id);
      if (!preset) {
        throw new Error(`Unknown preset: ${id}`);
      }
      const model = ReactorModel.fromConfig(preset.config);
      model.setInputs(preset.inputs.a, preset.inputs.b);
      set({ model, snapshot: model.snapshot(), error: null });
    },

    getLastOutput: (index) => get().model.getLastOutput(index),

    clearHistory: () => set({ history: [], nextRunId: 1 }),

    clearError: () => set({ error: null }),
  };
});

import type { ReactorConfig, ReactorPreset } from "@/types/reactor";

export const DEFAULT_REACTOR_CONFIG: ReactorConfig = {
  conversion: 0.5,
  twoOutputs: false,
  splitRatio: 0.5,
};

/** Display names of the product streams, in output order. */
export const OUTPUT_LABELS = ["R", "S"] as const;

/** Number of runs kept in the store's history. */
export const MAX_HISTORY = 20;

export const REACTOR_PRESETS: ReactorPreset[] = [
  {
    id: "single-half",
    label: "Single output, 50% conversion",
    config: { conversion: 0.5, twoOutputs: false, splitRatio: 0.5 },
    inputs: { a: 2, b: 2 },
  },
  {
    id: "split-70-30",
    label: "Full conversion, 70/30 split",
    config: { conversion: 1, twoOutputs: true, splitRatio: 0.7 },
    inputs: { a: 1, b: 1 },
  },
  {
    id: "limiting-a",
    label: "A limiting, full conversion",
    config: { conversion: 1, twoOutputs: false, splitRatio: 0.5 },
    inputs: { a: 0.5, b: 10 },
  },
  {
    id: "even-split",
    label: "Even split, 50% conversion",
    config: { conversion: 0.5, twoOutputs: true, splitRatio: 0.5 },
    inputs: { a: 2, b: 2 },
  },
];

export function findPreset(id: string): ReactorPreset | undefined {
  return REACTOR_PRESETS.find((p) => p.id === id);
}

export function outputLabel(index: number): string {
  return OUTPUT_LABELS[index] ?? `#${index + 1}`;
}

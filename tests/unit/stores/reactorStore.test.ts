import { describe, it, expect, beforeEach } from "vitest";
import { initialReactorState, useReactorStore } from "@/stores/reactorStore";
import { MAX_HISTORY } from "@/config/reactor";
import { InvalidArgumentError, OutOfRangeError } from "@/lib/errors";

describe("useReactorStore", () => {
  beforeEach(() => {
    useReactorStore.setState(initialReactorState());
  });

  it("should start from the default configuration", () => {
    expect(useReactorStore.getState().snapshot).toEqual({
      inputA: 0,
      inputB: 0,
      conversion: 0.5,
      twoOutputs: false,
      splitRatio: 0.5,
      lastOutputs: [],
    });
    expect(useReactorStore.getState().history).toHaveLength(0);
    expect(useReactorStore.getState().error).toBeNull();
  });

  it("should stage inputs and run the reaction", () => {
    const store = useReactorStore.getState();
    store.setInputs(2, 2);
    const out = useReactorStore.getState().runReaction();

    expect(out).toEqual([1]);
    expect(useReactorStore.getState().snapshot.lastOutputs).toEqual([1]);
    expect(useReactorStore.getState().getLastOutput(0)).toBe(1);
  });

  it("should keep the previous snapshot and record the error on invalid input", () => {
    const store = useReactorStore.getState();
    store.setInputs(3, 4);

    expect(() => useReactorStore.getState().setInputs(-1, 4)).toThrow(InvalidArgumentError);

    const state = useReactorStore.getState();
    expect(state.snapshot.inputA).toBe(3);
    expect(state.snapshot.inputB).toBe(4);
    expect(state.error).toBe("inputs must be non-negative");
  });

  it("should clear the error after a successful action", () => {
    expect(() => useReactorStore.getState().setSplitRatio(2)).toThrow(
      "splitRatio must be in [0,1]",
    );
    expect(useReactorStore.getState().error).toBe("splitRatio must be in [0,1]");

    useReactorStore.getState().setSplitRatio(0.25);
    expect(useReactorStore.getState().error).toBeNull();
    expect(useReactorStore.getState().snapshot.splitRatio).toBe(0.25);
  });

  it("should update configuration fields", () => {
    const store = useReactorStore.getState();
    store.setConversion(1);
    store.setTwoOutputs(true);
    store.configure({ splitRatio: 0.75 });
    store.setInputs(4, 8);

    expect(useReactorStore.getState().runReaction()).toEqual([3, 1]);
  });

  it("should leave the snapshot untouched when configure fails", () => {
    useReactorStore.getState().setInputs(2, 2);
    const before = useReactorStore.getState().snapshot;

    expect(() =>
      useReactorStore.getState().configure({ conversion: 0.9, splitRatio: 3 }),
    ).toThrow(InvalidArgumentError);

    const state = useReactorStore.getState();
    expect(state.snapshot).toEqual(before);
    expect(state.snapshot.conversion).toBe(0.5);
    expect(state.model.conversion).toBe(0.5);
    expect(state.error).toBe("splitRatio must be in [0,1]");
  });

  it("should record runs most recent first", () => {
    const store = useReactorStore.getState();
    store.setInputs(2, 2);
    store.runReaction();
    useReactorStore.getState().setInputs(1, 1);
    useReactorStore.getState().runReaction();

    const { history } = useReactorStore.getState();
    expect(history).toHaveLength(2);
    expect(history[0]).toEqual({
      id: 2,
      inputs: { a: 1, b: 1 },
      config: { conversion: 0.5, twoOutputs: false, splitRatio: 0.5 },
      outputs: [0.5],
    });
    expect(history[1].id).toBe(1);
    expect(history[1].outputs).toEqual([1]);
  });

  it("should cap the history", () => {
    useReactorStore.getState().setInputs(1, 1);
    for (let i = 0; i < MAX_HISTORY + 5; i++) {
      useReactorStore.getState().runReaction();
    }

    const { history } = useReactorStore.getState();
    expect(history).toHaveLength(MAX_HISTORY);
    expect(history[0].id).toBe(MAX_HISTORY + 5);
  });

  it("should reset inputs and outputs but keep history and config", () => {
    const store = useReactorStore.getState();
    store.setConversion(0.8);
    store.setInputs(2, 2);
    useReactorStore.getState().runReaction();
    useReactorStore.getState().reset();

    const state = useReactorStore.getState();
    expect(state.snapshot.inputA).toBe(0);
    expect(state.snapshot.inputB).toBe(0);
    expect(state.snapshot.lastOutputs).toEqual([]);
    expect(state.snapshot.conversion).toBe(0.8);
    expect(state.history).toHaveLength(1);
    expect(() => state.getLastOutput(0)).toThrow(OutOfRangeError);
  });

  it("should load a preset", () => {
    useReactorStore.getState().loadPreset("split-70-30");

    const state = useReactorStore.getState();
    expect(state.snapshot.conversion).toBe(1);
    expect(state.snapshot.twoOutputs).toBe(true);
    expect(state.snapshot.splitRatio).toBe(0.7);
    expect(state.snapshot.inputA).toBe(1);
    expect(state.snapshot.inputB).toBe(1);

    const [r, s] = state.runReaction();
    expect(r).toBeCloseTo(0.7, 9);
    expect(s).toBeCloseTo(0.3, 9);
  });

  it("should reject unknown presets", () => {
    expect(() => useReactorStore.getState().loadPreset("nope")).toThrow("Unknown preset: nope");
  });

  it("should clear history and restart run ids", () => {
    useReactorStore.getState().setInputs(1, 1);
    useReactorStore.getState().runReaction();
    useReactorStore.getState().clearHistory();
    expect(useReactorStore.getState().history).toHaveLength(0);

    useReactorStore.getState().runReaction();
    expect(useReactorStore.getState().history[0].id).toBe(1);
  });
});

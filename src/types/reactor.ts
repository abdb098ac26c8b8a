/** Configuration of a single reaction stage. */
export interface ReactorConfig {
  /** Fraction (0..1) of the limiting reagent that reacts. */
  conversion: number;
  twoOutputs: boolean;
  /** Fraction (0..1) of reacted mass routed to product R in two-output mode. */
  splitRatio: number;
}

/** Staged reagent quantities. */
export interface ReactorInputs {
  a: number;
  b: number;
}

/** Read-only copy of the model state. */
export interface ReactorSnapshot extends ReactorConfig {
  inputA: number;
  inputB: number;
  lastOutputs: number[];
}

/** One recorded run of the reaction. */
export interface ReactorRun {
  id: number;
  inputs: ReactorInputs;
  config: ReactorConfig;
  outputs: number[];
}

/** A named configuration with staged inputs. */
export interface ReactorPreset {
  id: string;
  label: string;
  config: ReactorConfig;
  inputs: ReactorInputs;
}

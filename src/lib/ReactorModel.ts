import { InvalidArgumentError, OutOfRangeError } from "@/lib/errors";
import type { ReactorConfig, ReactorSnapshot } from "@/types/reactor";

/**
 * Two-input reaction stage with one or two product streams.
 *
 * Assumes 1 A + 1 B -> products. The amount reacted is
 * `min(A, B) * conversion`; in two-output mode it is divided between
 * R and S as `splitRatio : (1 - splitRatio)`.
 *
 * Every mutator validates before assigning, so a failed call leaves the
 * model exactly as it was.
 */
export class ReactorModel {
  private a = 0;
  private b = 0;
  private conversionValue: number;
  private twoOutputsValue: boolean;
  private splitRatioValue: number;
  private outputs: number[] = [];

  /**
   * @throws InvalidArgumentError if `conversion` or `splitRatio` is outside [0,1].
   */
  constructor(conversion = 0.5, twoOutputs = false, splitRatio = 0.5) {
    validateFractions(conversion, splitRatio);
    this.conversionValue = conversion;
    this.twoOutputsValue = twoOutputs;
    this.splitRatioValue = splitRatio;
  }

  static fromConfig(config: ReactorConfig): ReactorModel {
    return new ReactorModel(config.conversion, config.twoOutputs, config.splitRatio);
  }

  get inputA(): number {
    return this.a;
  }

  get inputB(): number {
    return this.b;
  }

  get conversion(): number {
    return this.conversionValue;
  }

  get twoOutputs(): boolean {
    return this.twoOutputsValue;
  }

  get splitRatio(): number {
    return this.splitRatioValue;
  }

  get lastOutputs(): number[] {
    return [...this.outputs];
  }

  get hasOutput(): boolean {
    return this.outputs.length > 0;
  }

  /**
   * Stage reagent quantities. Both must be finite and non-negative.
   */
  setInputs(a: number, b: number): void {
    if (!isNonNegative(a) || !isNonNegative(b)) {
      throw new InvalidArgumentError("inputs must be non-negative");
    }
    this.a = a;
    this.b = b;
  }

  setConversion(conversion: number): void {
    validateFractions(conversion, this.splitRatioValue);
    this.conversionValue = conversion;
  }

  setTwoOutputs(two: boolean): void {
    this.twoOutputsValue = two;
  }

  setSplitRatio(ratio: number): void {
    validateFractions(this.conversionValue, ratio);
    this.splitRatioValue = ratio;
  }

  /**
   * Apply several configuration fields at once. Nothing changes unless all
   * of them are valid.
   */
  configure(updates: Partial<ReactorConfig>): void {
    const conversion = updates.conversion ?? this.conversionValue;
    const splitRatio = updates.splitRatio ?? this.splitRatioValue;
    validateFractions(conversion, splitRatio);
    this.conversionValue = conversion;
    this.splitRatioValue = splitRatio;
    this.twoOutputsValue = updates.twoOutputs ?? this.twoOutputsValue;
  }

  /**
   * Run the reaction on the staged inputs. Inputs are not consumed, so
   * repeated calls return the same result.
   *
   * @returns `[R]` in single-output mode, `[R, S]` in two-output mode.
   */
  runReaction(): number[] {
    const limiting = Math.min(this.a, this.b);
    const reacted = limiting * this.conversionValue;

    this.outputs = this.twoOutputsValue
      ? [reacted * this.splitRatioValue, reacted * (1 - this.splitRatioValue)]
      : [reacted];
    return [...this.outputs];
  }

  /** Zero the inputs and drop the cached result. Configuration is kept. */
  reset(): void {
    this.a = 0;
    this.b = 0;
    this.outputs = [];
  }

  /**
   * @param index 0 for product R, 1 for S in two-output mode.
   * @throws OutOfRangeError if there is no cached output at `index`.
   */
  getLastOutput(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.outputs.length) {
      throw new OutOfRangeError("output index out of range");
    }
    return this.outputs[index];
  }

  snapshot(): ReactorSnapshot {
    return {
      inputA: this.a,
      inputB: this.b,
      conversion: this.conversionValue,
      twoOutputs: this.twoOutputsValue,
      splitRatio: this.splitRatioValue,
      lastOutputs: [...this.outputs],
    };
  }
}

function isFraction(value: number): boolean {
  return value >= 0 && value <= 1;
}

function isNonNegative(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

function validateFractions(conversion: number, splitRatio: number): void {
  if (!isFraction(conversion)) throw new InvalidArgumentError("conversion must be in [0,1]");
  if (!isFraction(splitRatio)) throw new InvalidArgumentError("splitRatio must be in [0,1]");
}

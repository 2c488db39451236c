import { MAX_INPUT_LENGTH, evaluate } from "xcalc";

/** Optionally negative decimal literal; `1.` and `.5` count, `.` does not. */
const decimal = /^-?(?:[0-9]+\.?[0-9]*|\.[0-9]+)$/;

/** Holds the current value of `x` and renders results for display. */
export class Calculator {
  x: number;
  xText: string;

  constructor() {
    this.x = 0;
    this.xText = "0";
  }

  calculate(text: string): string {
    if (text.length === 0) return "Empty input";
    if (text.length > MAX_INPUT_LENGTH) return "Too large input";
    const outcome = evaluate(text, this.x);
    switch (outcome.status) {
      case "Success":
        return outcome.value.toFixed(8);
      case "MathError":
        return "Error in calculation";
      case "InputError":
        return "Error in input";
    }
  }

  /**
   * Binds `x` to the number written in `text`.
   * @returns `text` if it was accepted, else the previous text of `x`
   */
  setX(text: string): string {
    if (text.length === 0 || text.length > MAX_INPUT_LENGTH) return this.xText;
    if (!decimal.test(text)) return this.xText;
    this.x = Number(text);
    this.xText = text;
    return text;
  }
}

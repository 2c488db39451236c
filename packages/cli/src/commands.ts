import { InputError, check, show, toPostfix, tokenize } from "xcalc";
import { Calculator } from "./calculator.js";
import {
  AxesText,
  checkExpression,
  parseAxes,
  plot,
  samples,
  stepFor,
  visible,
} from "./graph.js";
import { log } from "./log.js";

/** Sample coordinates carry float noise such as `0.9900000000000002`. */
export const coordinate = (v: number): string => `${Number(v.toFixed(10))}`;

/** Lines for stdout, or a message explaining why there are none. */
export type Report =
  | { ok: true; lines: string[] }
  | { ok: false; error: string };

const calculator = (x: string): Calculator | undefined => {
  const calc = new Calculator();
  return calc.setX(x) === x ? calc : undefined;
};

export const evalCommand = (expression: string, x: string): Report => {
  const calc = calculator(x);
  if (calc === undefined) return { ok: false, error: `invalid x: ${x}` };
  return { ok: true, lines: [calc.calculate(expression)] };
};

export const rpnCommand = (expression: string, x: string): Report => {
  const calc = calculator(x);
  if (calc === undefined) return { ok: false, error: `invalid x: ${x}` };
  try {
    check(expression);
  } catch (e) {
    if (e instanceof InputError)
      return { ok: false, error: `Error in input (${e.data.kind})` };
    throw e;
  }
  const postfix = toPostfix(tokenize(expression, calc.x));
  log.debug(`${postfix.length} tokens in postfix order`);
  return { ok: true, lines: [show(postfix)] };
};

export const graphCommand = (expression: string, text: AxesText): Report => {
  const message = checkExpression(expression);
  if (message !== "") return { ok: false, error: message };
  const axes = parseAxes(text);
  if (axes === "Invalid cords") return { ok: false, error: axes };
  log.debug(`sampling every ${stepFor(axes.xMax - axes.xMin)}`);
  const points = plot(expression, axes);
  const shown = points.filter((point) => visible(axes, point));
  log.info(
    `${shown.length} of ${[...samples(axes)].length} samples plotted` +
      ` (${points.length} defined)`,
  );
  const lines = shown.map(({ x, y }) => `${coordinate(x)} ${coordinate(y)}`);
  return { ok: true, lines };
};

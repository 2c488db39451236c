import { toPostfix } from "./postfix.js";
import { evaluatePostfix } from "./rpn.js";
import { tokenize } from "./tokenize.js";
import { check, validate } from "./validate.js";

export { lexer, lexemes } from "./lex.js";
export { toPostfix } from "./postfix.js";
export { MathError, evaluatePostfix } from "./rpn.js";
export type { MathErrorData, Result } from "./rpn.js";
export { show } from "./show.js";
export { Precedence, TokenKind, num, precedence, token } from "./token.js";
export type { Token } from "./token.js";
export { tokenize } from "./tokenize.js";
export { InputError, MAX_INPUT_LENGTH, check, validate } from "./validate.js";
export type { ErrorData } from "./validate.js";

export type Outcome =
  | { status: "Success"; value: number }
  | { status: "MathError" }
  | { status: "InputError" };

export interface Point {
  x: number;
  y: number;
}

const run = (text: string, x: number): Outcome => {
  const result = evaluatePostfix(toPostfix(tokenize(text, x)));
  return result.ok
    ? { status: "Success", value: result.value }
    : { status: "MathError" };
};

export const evaluate = (text: string, x: number): Outcome => {
  if (!validate(text)) return { status: "InputError" };
  return run(text, x);
};

/**
 * Validates `text` once, throwing an `InputError` if it is malformed.
 * @returns the expression as a function of `x`
 */
export const compile = (text: string): ((x: number) => Outcome) => {
  check(text);
  return (x) => run(text, x);
};

/**
 * Evaluates `text` at each of `xs` in order, leaving out the points where
 * evaluation fails with a math error.
 */
export const evaluateMany = (text: string, xs: Iterable<number>): Point[] => {
  const f = compile(text);
  const points: Point[] = [];
  for (const x of xs) {
    const outcome = f(x);
    if (outcome.status === "Success") points.push({ x, y: outcome.value });
  }
  return points;
};

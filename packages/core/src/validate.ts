import { Token } from "moo";
import {
  endsOperand,
  isBinary,
  isFunction,
  isOperand,
  lexemes,
  startsOperand,
} from "./lex.js";

export const MAX_INPUT_LENGTH = 256;

/** Index of a lexeme once whitespace has been dropped. */
export type LexemeId = number;

export type ErrorData =
  // length
  | { kind: "Empty" }
  | { kind: "TooLong"; length: number }

  // characters
  | { kind: "Unrecognized"; offset: number }
  | { kind: "Malformed"; num: LexemeId }

  // brackets
  | { kind: "Unmatched"; left: LexemeId }
  | { kind: "Extra"; right: LexemeId }
  | { kind: "EmptyGroup"; left: LexemeId }
  | { kind: "FunctionParenMissing"; func: LexemeId }

  // operators
  | { kind: "OperatorMisplaced"; op: LexemeId }
  | { kind: "OperatorLast"; op: LexemeId }
  | { kind: "Juxtaposed"; left: LexemeId; right: LexemeId };

export class InputError extends Error {
  data: ErrorData;

  constructor(data: ErrorData) {
    super(`input error: ${data.kind}`);
    this.data = data;
  }
}

const length = (text: string) => {
  if (text.trim().length === 0) throw new InputError({ kind: "Empty" });
  if (text.length > MAX_INPUT_LENGTH)
    throw new InputError({ kind: "TooLong", length: text.length });
};

const characters = (tokens: Token[]) => {
  for (const tok of tokens)
    if (tok.type === "error")
      throw new InputError({ kind: "Unrecognized", offset: tok.offset });
  tokens.forEach((tok, i) => {
    if (tok.type !== "num") return;
    const dots = tok.text.split(".").length - 1;
    if (dots > 1 || tok.text === ".")
      throw new InputError({ kind: "Malformed", num: i });
  });
};

const brackets = (tokens: Token[]) => {
  const open: LexemeId[] = [];
  tokens.forEach((tok, i) => {
    if (tok.type === "lparen") open.push(i);
    else if (tok.type === "rparen") {
      const left = open.pop();
      if (left === undefined) throw new InputError({ kind: "Extra", right: i });
      if (left === i - 1) throw new InputError({ kind: "EmptyGroup", left });
    }
  });
  const left = open.pop();
  if (left !== undefined) throw new InputError({ kind: "Unmatched", left });
};

/** Whether `left` directly followed by `right` reads as a product. */
const implicit = (left: Token, right: Token): boolean => {
  if (isOperand(left))
    return right.type === "lparen" || right.type === "x" || isFunction(right);
  if (left.type === "rparen") return startsOperand(right);
  return false;
};

const adjacency = (tokens: Token[]) => {
  tokens.forEach((tok, i) => {
    const prev: Token | undefined = tokens[i - 1];
    if (prev !== undefined && isFunction(prev) && tok.type !== "lparen")
      throw new InputError({ kind: "FunctionParenMissing", func: i - 1 });
    if (tok.type === "minus") return;
    if (isBinary(tok) || tok.type === "rparen") {
      if (prev === undefined || !endsOperand(prev))
        throw new InputError({ kind: "OperatorMisplaced", op: i });
      return;
    }
    if (prev !== undefined && endsOperand(prev) && !implicit(prev, tok))
      throw new InputError({ kind: "Juxtaposed", left: i - 1, right: i });
  });
  const last = tokens.length - 1;
  if (isFunction(tokens[last]))
    throw new InputError({ kind: "FunctionParenMissing", func: last });
  if (!endsOperand(tokens[last]))
    throw new InputError({ kind: "OperatorLast", op: last });
};

/**
 * Throws an `InputError` describing the first problem with `text`.
 * @returns the lexemes of `text`, whitespace dropped
 */
export const check = (text: string): Token[] => {
  length(text);
  const tokens = lexemes(text);
  characters(tokens);
  brackets(tokens);
  adjacency(tokens);
  return tokens;
};

export const validate = (text: string): boolean => {
  try {
    check(text);
    return true;
  } catch (e) {
    if (e instanceof InputError) return false;
    throw e;
  }
};

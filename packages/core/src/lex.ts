import moo from "moo";
import type { Lexer, Token } from "moo";

export const lexer = (): Lexer =>
  moo.compile({
    num: /[0-9.]+/,
    asin: "asin",
    acos: "acos",
    atan: "atan",
    sin: "sin",
    cos: "cos",
    tan: "tan",
    sqrt: "sqrt",
    ln: "ln",
    log: "log",
    mod: "mod",
    x: "x",
    plus: "+",
    minus: "-",
    times: "*",
    divide: "/",
    caret: "^",
    lparen: "(",
    rparen: ")",
    error: moo.error,
  });

/** Lexemes of `source` once all whitespace is removed. */
export const lexemes = (source: string): Token[] => {
  const lex = lexer();
  lex.reset(source.replace(/\s+/g, ""));
  return [...lex];
};

export const functions = new Set([
  "sin",
  "cos",
  "tan",
  "asin",
  "acos",
  "atan",
  "sqrt",
  "ln",
  "log",
]);

export const isFunction = (tok: Token): boolean =>
  tok.type !== undefined && functions.has(tok.type);

export const isOperand = (tok: Token): boolean =>
  tok.type === "num" || tok.type === "x";

export const isBinary = (tok: Token): boolean => {
  switch (tok.type) {
    case "plus":
    case "minus":
    case "times":
    case "divide":
    case "mod":
    case "caret":
      return true;
    default:
      return false;
  }
};

/** Can end an operand: a number, the variable or a closing bracket. */
export const endsOperand = (tok: Token): boolean =>
  isOperand(tok) || tok.type === "rparen";

/** Can start an operand: a number, the variable, a bracket or a function. */
export const startsOperand = (tok: Token): boolean =>
  isOperand(tok) || tok.type === "lparen" || isFunction(tok);

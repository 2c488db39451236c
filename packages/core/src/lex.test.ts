import { expect, test } from "vitest";
import { lexemes } from "./lex.js";

const tokens = (
  source: string,
): { type: string | undefined; text: string }[] =>
  lexemes(source).map(({ type, text }) => ({ type, text }));

test("function", () => {
  expect(tokens("sin(x)")).toEqual([
    { type: "sin", text: "sin" },
    { type: "lparen", text: "(" },
    { type: "x", text: "x" },
    { type: "rparen", text: ")" },
  ]);
});

test("longest function name wins", () => {
  expect(tokens("asin")).toEqual([{ type: "asin", text: "asin" }]);
});

test("whitespace", () => {
  expect(tokens(" 1 +\t2 ")).toEqual([
    { type: "num", text: "1" },
    { type: "plus", text: "+" },
    { type: "num", text: "2" },
  ]);
});

test("mod without spaces", () => {
  expect(tokens("3mod2")).toEqual([
    { type: "num", text: "3" },
    { type: "mod", text: "mod" },
    { type: "num", text: "2" },
  ]);
});

test("digit and dot run", () => {
  expect(tokens("1.2.3")).toEqual([{ type: "num", text: "1.2.3" }]);
});

test("variable followed by function", () => {
  expect(tokens("xcos(x)").map(({ type }) => type)).toEqual([
    "x",
    "cos",
    "lparen",
    "x",
    "rparen",
  ]);
});

test("whitespace inside a number", () => {
  expect(tokens("1 0.5")).toEqual([{ type: "num", text: "10.5" }]);
});

test("whitespace inside a name", () => {
  expect(tokens("as in")).toEqual([{ type: "asin", text: "asin" }]);
});

test("unrecognized character", () => {
  expect(tokens("2 $ 3")).toEqual([
    { type: "num", text: "2" },
    { type: "error", text: "$3" },
  ]);
});

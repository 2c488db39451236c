import { beforeAll, describe, expect, test } from "vitest";
import {
  coordinate,
  evalCommand,
  graphCommand,
  rpnCommand,
} from "./commands.js";
import { setLogLevel } from "./log.js";

beforeAll(() => {
  setLogLevel("error");
});

describe("eval", () => {
  test("with x", () => {
    expect(evalCommand("2x", "3")).toEqual({
      ok: true,
      lines: ["6.00000000"],
    });
  });

  test("invalid x", () => {
    expect(evalCommand("2x", "three")).toEqual({
      ok: false,
      error: "invalid x: three",
    });
  });
});

describe("rpn", () => {
  test("postfix order", () => {
    expect(rpnCommand("1-2*12-3^2", "0")).toEqual({
      ok: true,
      lines: ["1 2 12 * - 3 2 ^ -"],
    });
  });

  test("input error kind", () => {
    expect(rpnCommand("2+", "0")).toEqual({
      ok: false,
      error: "Error in input (OperatorLast)",
    });
  });
});

describe("graph", () => {
  test("points inside the y range", () => {
    expect(
      graphCommand("x", { xMin: "-300", xMax: "300", yMin: "-2", yMax: "2" }),
    ).toEqual({ ok: true, lines: ["-2 -2", "-1 -1", "0 0", "1 1", "2 2"] });
  });

  test("coordinates are rounded", () => {
    const report = graphCommand("x", {
      xMin: "-2",
      xMax: "2",
      yMin: "-1",
      yMax: "1",
    });
    if (!report.ok) throw Error(report.error);
    expect(report.lines[0]).toBe("-1 -1");
    expect(report.lines).toContain("0.99 0.99");
    for (const line of report.lines)
      expect(line).toMatch(/^(-?\d+(?:\.\d{1,2})?) \1$/);
  });

  test("empty expression", () => {
    expect(
      graphCommand("", { xMin: "-1", xMax: "1", yMin: "-1", yMax: "1" }),
    ).toEqual({ ok: false, error: "Empty input" });
  });

  test("invalid axes", () => {
    expect(
      graphCommand("x", { xMin: "5", xMax: "1", yMin: "-1", yMax: "1" }),
    ).toEqual({ ok: false, error: "Invalid cords" });
  });
});

test("coordinate", () => {
  expect(coordinate(0.9900000000000002)).toBe("0.99");
  expect(coordinate(-0.0000000000001)).toBe("0");
  expect(coordinate(2.5)).toBe("2.5");
});

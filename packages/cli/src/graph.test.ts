import { describe, expect, test } from "vitest";
import {
  Axes,
  checkExpression,
  defaultAxes,
  parseAxes,
  plot,
  samples,
  stepFor,
  visible,
} from "./graph.js";

const wide: Axes = { xMin: -100, xMax: 100, yMin: -10, yMax: 10 };

test("stepFor", () => {
  expect(stepFor(1)).toBe(0.01);
  expect(stepFor(19)).toBe(0.01);
  expect(stepFor(20)).toBe(0.1);
  expect(stepFor(199)).toBe(0.1);
  expect(stepFor(200)).toBe(1);
  expect(stepFor(9999)).toBe(1);
  expect(stepFor(10_000)).toBe(2);
  expect(stepFor(100_000)).toBe(4);
  expect(stepFor(200_000)).toBe(8);
  expect(stepFor(2_000_000)).toBe(8);
});

describe("parseAxes", () => {
  test("valid", () => {
    expect(
      parseAxes({ xMin: "-10", xMax: "10", yMin: "-5", yMax: "+5" }),
    ).toEqual({ xMin: -10, xMax: 10, yMin: -5, yMax: 5 });
  });

  test.each([
    { xMin: "10", xMax: "-10", yMin: "-5", yMax: "5" },
    { xMin: "-10", xMax: "10", yMin: "5", yMax: "5" },
    { xMin: "1.5", xMax: "10", yMin: "-5", yMax: "5" },
    { xMin: "", xMax: "10", yMin: "-5", yMax: "5" },
    { xMin: "-10", xMax: "2000000", yMin: "-5", yMax: "5" },
    { xMin: "-10", xMax: "1000000000", yMin: "-5", yMax: "5" },
    { xMin: "-10", xMax: "ten", yMin: "-5", yMax: "5" },
  ])("invalid %o", (text) => {
    expect(parseAxes(text)).toBe("Invalid cords");
  });

  test("limits are inclusive", () => {
    expect(
      parseAxes({ xMin: "-1000000", xMax: "1000000", yMin: "0", yMax: "1" }),
    ).toEqual({ xMin: -1_000_000, xMax: 1_000_000, yMin: 0, yMax: 1 });
  });

  test("defaults read back as themselves", () => {
    const { xMin, xMax, yMin, yMax } = defaultAxes;
    expect(
      parseAxes({
        xMin: `${xMin}`,
        xMax: `${xMax}`,
        yMin: `${yMin}`,
        yMax: `${yMax}`,
      }),
    ).toEqual({ xMin: -10, xMax: 10, yMin: -10, yMax: 10 });
  });
});

test("checkExpression", () => {
  expect(checkExpression("")).toBe("Empty input");
  expect(checkExpression("x".repeat(257))).toBe("Too large input");
  expect(checkExpression("x+")).toBe("Incorrect input");
  expect(checkExpression("x^2")).toBe("");
});

test("samples", () => {
  const xs = [...samples(wide)];
  expect(xs.length).toBe(200);
  expect(xs[0]).toBe(-100);
  expect(xs[1]).toBe(-99);
  expect(xs[199]).toBe(99);
});

test("plot skips undefined points", () => {
  const points = plot("1/x", wide);
  expect(points.length).toBe(199);
  expect(points.some(({ x }) => x === 0)).toBe(false);
  expect(points[0]).toEqual({ x: -100, y: -0.01 });
});

test("visible", () => {
  expect(visible(wide, { x: 0, y: 10 })).toBe(true);
  expect(visible(wide, { x: 0, y: -10.5 })).toBe(false);
});

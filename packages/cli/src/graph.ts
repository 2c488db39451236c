import { MAX_INPUT_LENGTH, Point, evaluateMany, validate } from "xcalc";
import { z } from "zod";

export interface Axes {
  xMin: number;
  xMax: number;
  yMin: number;
  yMax: number;
}

export const defaultAxes: Axes = { xMin: -10, xMax: 10, yMin: -10, yMax: 10 };

export const AXIS_LIMIT = 1_000_000;

const bound = z
  .string()
  .min(1)
  .max(9)
  .regex(/^[+-]?[0-9]+$/)
  .transform(Number)
  .pipe(z.number().int().min(-AXIS_LIMIT).max(AXIS_LIMIT));

const axes = z
  .object({ xMin: bound, xMax: bound, yMin: bound, yMax: bound })
  .refine(({ xMin, xMax }) => xMin < xMax, { path: ["xMax"] })
  .refine(({ yMin, yMax }) => yMin < yMax, { path: ["yMax"] });

export type AxesText = { [K in keyof Axes]: string };

/** Parses integer axis bounds, each within `[-AXIS_LIMIT, AXIS_LIMIT]`. */
export const parseAxes = (text: AxesText): Axes | "Invalid cords" => {
  const parsed = axes.safeParse(text);
  return parsed.success ? parsed.data : "Invalid cords";
};

/** @returns a message for the user, empty if `text` can be plotted */
export const checkExpression = (text: string): string => {
  if (text.length === 0) return "Empty input";
  if (text.length > MAX_INPUT_LENGTH) return "Too large input";
  return validate(text) ? "" : "Incorrect input";
};

const steps: [span: number, step: number][] = [
  [200_000, 8],
  [100_000, 4],
  [10_000, 2],
  [200, 1],
  [20, 0.1],
];

/** Distance between neighbouring samples for an x-axis of width `span`. */
export const stepFor = (span: number): number =>
  steps.find(([min]) => span >= min)?.[1] ?? 0.01;

export function* samples({ xMin, xMax }: Axes): Generator<number> {
  const h = stepFor(xMax - xMin);
  for (let i = 0; xMin + i * h < xMax; i++) yield xMin + i * h;
}

/** Points of `text` over the x-axis, whatever their y. */
export const plot = (text: string, axes: Axes): Point[] =>
  evaluateMany(text, samples(axes));

/** Whether `point` falls inside the visible y range. */
export const visible = ({ yMin, yMax }: Axes, { y }: Point): boolean =>
  y >= yMin && y <= yMax;

import { PointLoad } from "../elements/load";
import { InvalidInputError } from "../errors";
import { assertFinite, assertGreaterThan } from "../logic/assertions";
import { Equation } from "../logic/simultaneousEqn";

export type SupportSpan = { readonly start: number; readonly end: number };

export type SupportReactions = { readonly left: number; readonly right: number };

/** Transverse point force in the shear sign convention (upward +). */
export type DiagramLoad = { position: number; force: number };

export type DiagramPoint = { readonly x: number; readonly value: number };

export type ShaftDiagram = {
  readonly span: SupportSpan;
  readonly reactions: SupportReactions;
  readonly shear: readonly DiagramPoint[];
  readonly moment: readonly DiagramPoint[];
  readonly peakShear: DiagramPoint;
  readonly peakMoment: DiagramPoint;
};

export type DiagramOptions = {
  /** Sampling step in length units, 0 < step <= span. Defaults to 1. */
  step?: number;
  /** Bearing positions; defaults to the shaft ends. */
  supports?: SupportSpan;
};

const EPS = 1e-9;

function assertSpan(span: SupportSpan) {
  assertFinite("support start", span.start);
  assertFinite("support end", span.end);
  if (span.end - span.start <= 0) {
    throw new InvalidInputError(
      "supports",
      `Support span must be > 0. Received start=${span.start}, end=${span.end}.`,
    );
  }
}

/**
 * Reactions of a simply supported shaft under downward point loads.
 *
 * ΣM about B = 0:  RA·(B - A) - Σ F·(B - x) = 0
 * ΣFy = 0:         RA + RB - ΣF = 0
 */
export function solveSupportReactions(
  loads: readonly PointLoad[],
  span: SupportSpan,
): SupportReactions {
  assertSpan(span);
  const { start: A, end: B } = span;

  const totalForce = loads.reduce((acc, load) => acc + load.force, 0);
  const momentAboutB = loads.reduce(
    (acc, load) => acc + load.force * (B - load.position),
    0,
  );

  const solution = new Equation().solveEquations([
    { RA: B - A, c: -momentAboutB },
    { RA: 1, RB: 1, c: -totalForce },
  ]);

  return Object.freeze({ left: solution.RA ?? 0, right: solution.RB ?? 0 });
}

function samplePositions(span: SupportSpan, step: number): number[] {
  const length = span.end - span.start;
  const count = Math.floor(length / step + EPS);
  const xs: number[] = [];
  for (let i = 0; i <= count; i++) {
    xs.push(span.start + i * step);
  }
  if (span.end - xs[xs.length - 1] > EPS * Math.max(1, length)) {
    xs.push(span.end);
  }
  return xs;
}

function peakOf(points: readonly DiagramPoint[]): DiagramPoint {
  return points.reduce((peak, p) =>
    Math.abs(p.value) > Math.abs(peak.value) ? p : peak,
  );
}

/**
 * Shear force and bending moment along [A, B] by stepping through sample
 * positions. A load switches on once x reaches its position (inclusive):
 *
 * V(x) = RA + Σ F            for loads with pos <= x
 * M(x) = RA·(x - A) + Σ F·(x - pos)
 *
 * Sample positions carry rounding from `A + i·step`, so a load within a
 * span-relative tolerance of x counts as reached.
 */
export function generateShaftDiagram(
  span: SupportSpan,
  reactionA: number,
  loads: readonly DiagramLoad[],
  step = 1,
): Omit<ShaftDiagram, "reactions"> {
  assertSpan(span);
  assertGreaterThan("diagram step", step, 0);
  if (step > span.end - span.start) {
    throw new InvalidInputError(
      "diagram step",
      `diagram step must not exceed the support span (${span.end - span.start}). Received ${step}.`,
    );
  }

  const tolerance = EPS * Math.max(1, span.end - span.start);
  const shear: DiagramPoint[] = [];
  const moment: DiagramPoint[] = [];

  for (const x of samplePositions(span, step)) {
    let V = reactionA;
    let M = reactionA * (x - span.start);

    for (const load of loads) {
      if (load.position - x <= tolerance) {
        V += load.force;
        M += load.force * (x - load.position);
      }
    }

    shear.push(Object.freeze({ x, value: V }));
    moment.push(Object.freeze({ x, value: M }));
  }

  return Object.freeze({
    span: Object.freeze({ start: span.start, end: span.end }),
    shear: Object.freeze(shear),
    moment: Object.freeze(moment),
    peakShear: peakOf(shear),
    peakMoment: peakOf(moment),
  });
}

/**
 * Solves the bearing reactions for downward point loads and samples the
 * shear and moment diagrams. Supports default to the shaft ends.
 */
export function buildShaftDiagram(
  length: number,
  loads: readonly PointLoad[],
  options: DiagramOptions = {},
): ShaftDiagram {
  const span = options.supports ?? { start: 0, end: length };
  const reactions = solveSupportReactions(loads, span);

  const diagram = generateShaftDiagram(
    span,
    reactions.left,
    loads.map((load) => ({ position: load.position, force: -load.force })),
    options.step ?? 1,
  );

  return Object.freeze({ ...diagram, reactions });
}

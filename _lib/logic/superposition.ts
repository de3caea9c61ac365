import { MomentContribution, PointLoad } from "../elements/load";
import { pointLoadMoment } from "./mechanics";

/**
 * Algebraic sum of bending moment contributions (N·m).
 *
 * Every contribution is a signed scalar about the same reduction point:
 * gears, pulleys and extra moments are all treated as acting in one
 * bending plane. Loads in different planes are not resolved into a vector
 * resultant.
 *
 * Uses Neumaier compensated summation, left to right.
 */
export function combineBendingMoments(
  moments: readonly (number | MomentContribution)[],
): number {
  let sum = 0;
  let compensation = 0;

  for (const entry of moments) {
    const value = typeof entry === "number" ? entry : entry.moment;
    const t = sum + value;
    if (Math.abs(sum) >= Math.abs(value)) {
      compensation += sum - t + value;
    } else {
      compensation += value - t + sum;
    }
    sum = t;
  }

  return sum + compensation;
}

export function momentContributions(
  loads: readonly PointLoad[],
): MomentContribution[] {
  return loads.map(
    (load) =>
      new MomentContribution(
        load.position,
        pointLoadMoment(load.force, load.position),
        load.source,
      ),
  );
}

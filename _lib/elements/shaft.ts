import type { Gear } from "./gear";
import type { Material } from "./material";
import type { Pulley } from "./pulley";
import { assertFinite, assertGreaterThan, assertInRange } from "../logic/assertions";

export type ShaftSpecInput = {
  length: number;
  material: Material;
  factorOfSafety: number;
  power: number;
  rpm: number;
  gears?: readonly Gear[];
  pulleys?: readonly Pulley[];
  extraBendingMoment?: number;
  extraTorsionalMoment?: number;
};

/**
 * One design case: a shaft on bearings at x = 0 and x = length carrying
 * gears and pulleys. Units are m, kW, rev/min, MPa, N·m.
 *
 * Instances are frozen; the gear and pulley lists are copied on
 * construction so later edits to the caller's arrays do not leak in.
 */
export class ShaftSpec {
  readonly length: number;
  readonly material: Material;
  readonly factorOfSafety: number;
  readonly power: number;
  readonly rpm: number;
  readonly gears: readonly Gear[];
  readonly pulleys: readonly Pulley[];
  readonly extraBendingMoment: number;
  readonly extraTorsionalMoment: number;

  constructor(input: ShaftSpecInput) {
    assertGreaterThan("shaft length", input.length, 0);
    assertGreaterThan(
      `yield strength of ${input.material.name}`,
      input.material.yieldStrength,
      0,
    );
    assertGreaterThan("factor of safety", input.factorOfSafety, 0);
    assertGreaterThan("power", input.power, 0, true);
    assertFinite("rpm", input.rpm);

    const gears = [...(input.gears ?? [])];
    const pulleys = [...(input.pulleys ?? [])];
    gears.forEach((gear, i) =>
      assertInRange(`gear #${i + 1} position`, gear.position, 0, input.length),
    );
    pulleys.forEach((pulley, i) =>
      assertInRange(`pulley #${i + 1} position`, pulley.position, 0, input.length),
    );

    const extraBendingMoment = input.extraBendingMoment ?? 0;
    const extraTorsionalMoment = input.extraTorsionalMoment ?? 0;
    assertFinite("extra bending moment", extraBendingMoment);
    assertFinite("extra torsional moment", extraTorsionalMoment);

    this.length = input.length;
    this.material = Object.freeze({ ...input.material });
    this.factorOfSafety = input.factorOfSafety;
    this.power = input.power;
    this.rpm = input.rpm;
    this.gears = Object.freeze(gears);
    this.pulleys = Object.freeze(pulleys);
    this.extraBendingMoment = extraBendingMoment;
    this.extraTorsionalMoment = extraTorsionalMoment;
    Object.freeze(this);
  }
}

export const createShaftSpec = (input: ShaftSpecInput): ShaftSpec =>
  new ShaftSpec(input);
